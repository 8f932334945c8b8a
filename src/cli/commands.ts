import { resolve } from "node:path";

import { readBuildTargets, resolveAllTargets, resolveTargetFlags } from "../build/targets.js";
import type { ResolvedTarget } from "../build/types.js";
import type { ResolvedLedgerConfig } from "../config/types.js";
import type { EventBus } from "../events/event-bus.js";
import { appendRunToFile } from "../ledger/append.js";
import { lookupRun } from "../ledger/lookup.js";
import { countRuns, readTrainingHistory } from "../ledger/read-ledger.js";
import type { TrainingHistory } from "../ledger/types.js";
import {
  buildLeaderboard,
  contributorStats,
  formatContributorsText,
  formatLeaderboardJson,
  formatLeaderboardMarkdown,
  formatLeaderboardText,
  formatPercent,
  type LeaderboardSort
} from "../tools/report-leaderboard.js";
import { formatVerifyReport, verifyLedgerFile } from "../tools/verify-ledger.js";
import type { Formatter } from "../ui/fmt.js";
import { readJsonFile } from "../utils/json-io.js";
import type { WarningSink } from "../utils/warnings.js";

export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

export type CommandContext = {
  config: ResolvedLedgerConfig;
  bus: EventBus;
  fmt: Formatter;
  warnings: WarningSink;
  write: (text: string) => void;
  platform?: NodeJS.Platform;
};

/** Exit code for the process. */
export type CommandResult = number;

export const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

export const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

export const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

export const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = getFlag(flags, name);
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${name} value: ${value} (expected a number)`);
  }
  return parsed;
};

const getFormat = <T extends string>(flags: ParsedArgs["flags"], allowed: readonly T[]): T => {
  const value = getFlag(flags, "--format") ?? allowed[0];
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Invalid --format (expected ${allowed.join("|")})`);
  }
  return match;
};

const loadLedger = (context: CommandContext, path: string): TrainingHistory => {
  const history = readTrainingHistory(path);
  context.bus.emit({
    type: "ledger.loaded",
    payload: {
      path,
      models: history.models.size,
      runs: countRuns(history),
      loaded_at: new Date().toISOString()
    }
  });
  return history;
};

/**
 * `verify` takes the ledger as a positional argument; it stands in for
 * `--ledger` so the activity log lands beside the file actually checked.
 */
export const ledgerPathOverride = (command: string, parsed: ParsedArgs): string | undefined =>
  getFlag(parsed.flags, "--ledger") ?? (command === "verify" ? parsed.positional[0] : undefined);

export const runVerify = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const ledgerPath = context.config.ledgerPath;
  const baseline = getFlag(parsed.flags, "--baseline");
  const report = verifyLedgerFile(ledgerPath, {
    baselinePath: baseline ? resolve(process.cwd(), baseline) : undefined,
    bus: context.bus
  });

  context.write(`${formatVerifyReport(report, context.fmt)}\n`);
  context.write(
    report.ok
      ? `${context.fmt.success("Ledger OK")}: ${ledgerPath}\n`
      : `Ledger has problems: ${ledgerPath}\n`
  );
  return report.ok ? 0 : 1;
};

export const runLookup = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const [model, version] = parsed.positional;
  if (!model) {
    throw new Error("Usage: training-ledger lookup <model> [version]");
  }
  const format = getFormat(parsed.flags, ["text", "json"] as const);
  const history = loadLedger(context, context.config.ledgerPath);
  const result = lookupRun(history, model, version);

  if (format === "json") {
    context.write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  }

  const { fmt } = context;
  const { record } = result;
  const lines = [
    fmt.header(`${result.model} ${result.version}`),
    fmt.kv("accuracy", formatPercent(result.accuracy, context.config.leaderboard.accuracyDigits)),
    fmt.kv("epochs_trained", String(record.epochs_trained)),
    fmt.kv("accelerators", String(record.accelerators)),
    fmt.kv("contributor", record.contributor),
    fmt.kv("script", `${record.script.name} @ ${record.script.version}`),
    fmt.kv("script authors", result.authors.length > 0 ? result.authors.join(", ") : "(none)"),
    fmt.kv("tensorboard_logs", record.tensorboard_logs)
  ];
  for (const [key, value] of Object.entries(record.args)) {
    lines.push(fmt.kv(`args.${key}`, value));
  }
  context.write(`${lines.join("\n")}\n`);
  return 0;
};

export const runAppend = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const model = parsed.positional[0];
  const from = getFlag(parsed.flags, "--from");
  if (!model || !from) {
    throw new Error("Usage: training-ledger append <model> --from <run.json> [--authors a,b]");
  }
  const authors = getFlag(parsed.flags, "--authors");
  const ledgerPath = context.config.ledgerPath;

  const result = appendRunToFile(ledgerPath, model, readJsonFile(resolve(process.cwd(), from)), {
    scriptAuthors: authors ? authors.split(",") : undefined,
    bus: context.bus
  });

  if (result.newScript) {
    context.warnings.warn(`Registered new script ${result.newScript}`, "append");
  }
  context.write(`Appended ${result.model} ${result.version} to ${ledgerPath}\n`);
  return 0;
};

const LEADERBOARD_SORTS: readonly LeaderboardSort[] = ["accuracy", "model"];

export const runLeaderboard = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const format = getFormat(parsed.flags, ["text", "markdown", "json"] as const);
  const sortFlag = getFlag(parsed.flags, "--sort") ?? "accuracy";
  const sortBy = LEADERBOARD_SORTS.find((candidate) => candidate === sortFlag);
  if (!sortBy) {
    throw new Error("Invalid --sort (expected accuracy|model)");
  }

  const ledgerPath = context.config.ledgerPath;
  const history = loadLedger(context, ledgerPath);
  const model = buildLeaderboard(history, {
    top: context.config.leaderboard.top,
    sortBy,
    accuracyDigits: context.config.leaderboard.accuracyDigits,
    source: ledgerPath
  });

  if (format === "json") {
    context.write(formatLeaderboardJson(model));
  } else if (format === "markdown") {
    context.write(formatLeaderboardMarkdown(model));
  } else {
    context.write(formatLeaderboardText(model));
  }
  return 0;
};

export const runContributors = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const format = getFormat(parsed.flags, ["text", "json"] as const);
  const stats = contributorStats(loadLedger(context, context.config.ledgerPath));
  context.write(format === "json" ? `${JSON.stringify(stats, null, 2)}\n` : formatContributorsText(stats));
  return 0;
};

const PLATFORMS: readonly NodeJS.Platform[] = [
  "aix",
  "android",
  "darwin",
  "freebsd",
  "haiku",
  "linux",
  "openbsd",
  "sunos",
  "win32",
  "cygwin",
  "netbsd"
];

const formatTargetText = (target: ResolvedTarget): string => {
  const lines = [
    `${target.name} (${target.kind}, ${target.condition})`,
    `  srcs: ${target.srcs.join(" ")}`,
    `  copts: ${target.copts.join(" ") || "(none)"}`
  ];
  if (target.localDeps.length > 0) {
    lines.push(`  local deps: ${target.localDeps.join(", ")}`);
  }
  if (target.features.length > 0) {
    lines.push(`  features: ${target.features.join(", ")}`);
  }
  if (target.defines.length > 0) {
    lines.push(`  defines: ${target.defines.join(", ")}`);
  }
  if (target.suppressedWarnings.length > 0) {
    lines.push(`  suppressed warnings: ${target.suppressedWarnings.join(", ")}`);
  }
  return lines.join("\n");
};

export const runTargets = (parsed: ParsedArgs, context: CommandContext): CommandResult => {
  const path = parsed.positional[0]
    ? resolve(process.cwd(), parsed.positional[0])
    : context.config.buildTargetsPath;
  const platformFlag = getFlag(parsed.flags, "--platform");
  const platform = platformFlag
    ? PLATFORMS.find((candidate) => candidate === platformFlag)
    : context.platform ?? process.platform;
  if (!platform) {
    throw new Error(`Unknown --platform: ${platformFlag} (expected one of ${PLATFORMS.join(", ")})`);
  }
  const format = getFormat(parsed.flags, ["text", "json"] as const);

  const document = readBuildTargets(path);
  const targetName = getFlag(parsed.flags, "--target");
  const targets = targetName
    ? [resolveTargetFlags(document, targetName, platform)]
    : resolveAllTargets(document, platform);

  if (format === "json") {
    context.write(`${JSON.stringify(targets, null, 2)}\n`);
  } else {
    context.write(`${targets.map(formatTargetText).join("\n\n")}\n`);
  }
  return 0;
};

export type CommandHandler = (parsed: ParsedArgs, context: CommandContext) => CommandResult;

export const COMMAND_HANDLERS: Record<string, CommandHandler> = {
  verify: runVerify,
  lookup: runLookup,
  append: runAppend,
  leaderboard: runLeaderboard,
  contributors: runContributors,
  targets: runTargets
};

/** Commands whose activity is written to the ledger's activity log. */
export const LOGGED_COMMANDS = new Set(["verify", "append"]);
