import { assertSchema, validateBuildTargets } from "../config/schema-validation.js";
import { readJsonFile } from "../utils/json-io.js";
import type {
  BuildTargetDecl,
  BuildTargetsDocument,
  PlatformSelect,
  ResolvedTarget
} from "./types.js";

const DEFAULT_CONDITION = "default";

const PLATFORM_FAMILIES: Partial<Record<NodeJS.Platform, string[]>> = {
  win32: ["windows"],
  darwin: ["macos", "osx"],
  linux: ["linux"]
};

const isLocalDep = (dep: string): boolean => dep.startsWith(":");

const localDepName = (dep: string): string => dep.slice(1);

const selectConditions = (select: PlatformSelect | undefined): string[] =>
  select ? Object.keys(select) : [];

const checkTargets = (document: BuildTargetsDocument): string[] => {
  const problems: string[] = [];
  const declared = new Set(Object.keys(document.platform_conditions));
  const names = new Set<string>();

  for (const target of document.targets) {
    if (names.has(target.name)) {
      problems.push(`duplicate target name: ${target.name}`);
    }
    names.add(target.name);
  }

  for (const target of document.targets) {
    for (const dep of target.deps.filter(isLocalDep)) {
      const depName = localDepName(dep);
      if (depName === target.name) {
        problems.push(`${target.name}: depends on itself`);
      } else if (!names.has(depName)) {
        problems.push(`${target.name}: unknown local dependency ${dep}`);
      }
    }

    const selects: Array<[string, PlatformSelect | undefined]> = [
      ["copts", target.copts],
      ["features", target.features]
    ];
    for (const [field, select] of selects) {
      if (!select) {
        continue;
      }
      if (!(DEFAULT_CONDITION in select)) {
        problems.push(`${target.name}: ${field} has no "${DEFAULT_CONDITION}" branch`);
      }
      for (const condition of selectConditions(select)) {
        if (condition !== DEFAULT_CONDITION && !declared.has(condition)) {
          problems.push(`${target.name}: ${field} uses undeclared condition ${condition}`);
        }
      }
    }

    if (target.kind === "shared_object" && target.linkshared !== true) {
      problems.push(`${target.name}: shared_object targets must set linkshared`);
    }
  }

  return problems;
};

export const parseBuildTargets = (value: unknown): BuildTargetsDocument => {
  const document = assertSchema("build_targets", validateBuildTargets, value);
  const problems = checkTargets(document);
  if (problems.length > 0) {
    throw new Error(`Invalid build targets:\n${problems.map((problem) => `- ${problem}`).join("\n")}`);
  }
  return document;
};

export const readBuildTargets = (path: string): BuildTargetsDocument => parseBuildTargets(readJsonFile(path));

/** "@bazel_tools//platforms:windows" -> "windows" */
const constraintValue = (constraint: string): string => {
  const colon = constraint.lastIndexOf(":");
  const slash = constraint.lastIndexOf("/");
  return constraint.slice(Math.max(colon, slash) + 1).toLowerCase();
};

export const matchingConditions = (
  document: BuildTargetsDocument,
  platform: NodeJS.Platform
): string[] => {
  const families = PLATFORM_FAMILIES[platform] ?? [platform];
  return Object.entries(document.platform_conditions)
    .filter(([, condition]) => families.includes(constraintValue(condition.constraint)))
    .map(([name]) => name);
};

const pickBranch = (
  select: PlatformSelect | undefined,
  conditions: readonly string[]
): { condition: string; values: string[] } => {
  if (!select) {
    return { condition: DEFAULT_CONDITION, values: [] };
  }
  const condition = conditions.find((name) => name in select) ?? DEFAULT_CONDITION;
  return { condition, values: (select[condition] ?? []).slice() };
};

const collectFlagValues = (copts: readonly string[], pattern: RegExp): string[] =>
  copts.flatMap((flag) => {
    const match = pattern.exec(flag);
    return match ? [match[1]] : [];
  });

const findTarget = (document: BuildTargetsDocument, name: string): BuildTargetDecl => {
  const normalized = isLocalDep(name) ? localDepName(name) : name;
  const target = document.targets.find((candidate) => candidate.name === normalized);
  if (!target) {
    const known = document.targets.map((candidate) => candidate.name).join(", ");
    throw new Error(`Unknown build target: ${name} (known: ${known})`);
  }
  return target;
};

export const resolveTargetFlags = (
  document: BuildTargetsDocument,
  targetName: string,
  platform: NodeJS.Platform
): ResolvedTarget => {
  const target = findTarget(document, targetName);
  const conditions = matchingConditions(document, platform);
  const copts = pickBranch(target.copts, conditions);
  const features = pickBranch(target.features, conditions);

  return {
    name: target.name,
    kind: target.kind,
    condition: copts.condition,
    srcs: target.srcs.slice(),
    hdrs: (target.hdrs ?? []).slice(),
    deps: target.deps.slice(),
    localDeps: target.deps.filter(isLocalDep).map(localDepName),
    copts: copts.values,
    features: features.values,
    // MSVC takes both /D and -D spellings.
    defines: collectFlagValues(copts.values, /^[-/]D(.+)$/),
    undefines: collectFlagValues(copts.values, /^[-/]U(.+)$/),
    includeDirs: collectFlagValues(copts.values, /^[-/]I(.+)$/),
    suppressedWarnings: collectFlagValues(copts.values, /^\/wd(\d+)$/)
  };
};

/** Every target, local dependencies before their dependents. */
export const resolveAllTargets = (
  document: BuildTargetsDocument,
  platform: NodeJS.Platform
): ResolvedTarget[] => {
  const ordered: string[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (name: string, trail: string[]): void => {
    const status = state.get(name);
    if (status === "done") {
      return;
    }
    if (status === "visiting") {
      const start = trail.indexOf(name);
      throw new Error(`Dependency cycle: ${[...trail.slice(start), name].join(" -> ")}`);
    }
    state.set(name, "visiting");
    const target = findTarget(document, name);
    for (const dep of target.deps.filter(isLocalDep)) {
      visit(localDepName(dep), [...trail, name]);
    }
    state.set(name, "done");
    ordered.push(name);
  };

  document.targets.forEach((target) => visit(target.name, []));
  return ordered.map((name) => resolveTargetFlags(document, name, platform));
};
