import { existsSync } from "node:fs";
import { basename } from "node:path";

import { formatAjvErrors, validateTrainingHistory } from "../config/schema-validation.js";
import type { EventBus } from "../events/event-bus.js";
import { isAccuracyInRange, parseAccuracy } from "../ledger/lookup.js";
import { countRuns, fromDocument } from "../ledger/read-ledger.js";
import type { TrainingHistory } from "../ledger/types.js";
import { parseVersionLabel } from "../ledger/version-label.js";
import type { Formatter } from "../ui/fmt.js";
import { canonicallyEqual } from "../utils/canonical-json.js";
import { readJsonFile } from "../utils/json-io.js";

export type VerifyStatus = "OK" | "WARN" | "FAIL";

export type VerifyResult = {
  status: VerifyStatus;
  label: string;
  detail?: string;
};

export type VerifyReport = {
  results: VerifyResult[];
  ok: boolean;
};

export type VerifyOptions = {
  label?: string;
  /** An earlier revision of the ledger; enables the append-only check. */
  baseline?: TrainingHistory;
};

const addResult = (
  results: VerifyResult[],
  status: VerifyStatus,
  label: string,
  detail?: string
): void => {
  results.push({ status, label, detail });
};

type Problem = { status: Exclude<VerifyStatus, "OK">; detail: string };

const addProblems = (
  results: VerifyResult[],
  label: string,
  problems: Problem[],
  okDetail?: string
): void => {
  if (problems.length === 0) {
    addResult(results, "OK", label, okDetail);
    return;
  }
  problems.forEach((problem) => addResult(results, problem.status, label, problem.detail));
};

const checkVersionOrder = (history: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];
  for (const [model, runs] of history.models) {
    let previous: { label: string; value: number } | null = null;
    for (const run of runs) {
      const value = parseVersionLabel(run.version) ?? -1;
      if (!previous) {
        if (value !== 0) {
          problems.push({ status: "FAIL", detail: `${model}: first version is ${run.version}, expected v0` });
        }
      } else if (value <= previous.value) {
        problems.push({ status: "FAIL", detail: `${model}: ${run.version} follows ${previous.label}` });
      } else if (value > previous.value + 1) {
        problems.push({
          status: "WARN",
          detail: `${model}: gap between ${previous.label} and ${run.version}`
        });
      }
      previous = { label: run.version, value };
    }
  }
  return problems;
};

const checkAccuracy = (history: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];
  for (const [model, runs] of history.models) {
    for (const { version, record } of runs) {
      const accuracy = parseAccuracy(record.validation_accuracy);
      if (accuracy === null) {
        problems.push({
          status: "FAIL",
          detail: `${model} ${version}: validation_accuracy ${JSON.stringify(record.validation_accuracy)} is not a decimal`
        });
      } else if (!isAccuracyInRange(record.validation_accuracy)) {
        problems.push({
          status: "FAIL",
          detail: `${model} ${version}: validation_accuracy ${record.validation_accuracy} is outside [0, 1]`
        });
      }
    }
  }
  return problems;
};

const checkPositiveCounts = (history: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];
  for (const [model, runs] of history.models) {
    for (const { version, record } of runs) {
      const counts: Array<[string, number]> = [
        ["accelerators", record.accelerators],
        ["epochs_trained", record.epochs_trained]
      ];
      for (const [field, value] of counts) {
        if (!Number.isInteger(value) || value < 1) {
          problems.push({ status: "FAIL", detail: `${model} ${version}: ${field} is ${value}` });
        }
      }
    }
  }
  return problems;
};

const checkScriptReferences = (history: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];
  for (const [model, runs] of history.models) {
    for (const { version, record } of runs) {
      if (!history.scriptAuthors.has(record.script.name)) {
        problems.push({
          status: "FAIL",
          detail: `${model} ${version}: script ${record.script.name} has no script_authors entry`
        });
      }
    }
  }
  return problems;
};

const checkAuthorLists = (history: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];
  const referenced = new Set<string>();
  for (const runs of history.models.values()) {
    runs.forEach((run) => referenced.add(run.record.script.name));
  }

  for (const [script, authors] of history.scriptAuthors) {
    const seen = new Set<string>();
    for (const author of authors) {
      if (seen.has(author)) {
        problems.push({ status: "FAIL", detail: `${script}: duplicate author ${author}` });
      }
      seen.add(author);
    }
    if (authors.length === 0) {
      problems.push({ status: "FAIL", detail: `${script}: no authors listed` });
    }
    if (!referenced.has(script)) {
      problems.push({ status: "WARN", detail: `${script} is not referenced by any run` });
    }
  }
  return problems;
};

const checkAppendOnly = (baseline: TrainingHistory, current: TrainingHistory): Problem[] => {
  const problems: Problem[] = [];

  for (const [model, baseRuns] of baseline.models) {
    const currentRuns = current.models.get(model);
    if (!currentRuns) {
      problems.push({ status: "FAIL", detail: `model ${model} was removed` });
      continue;
    }
    baseRuns.forEach((baseRun, index) => {
      const currentRun = currentRuns[index];
      if (!currentRun) {
        problems.push({ status: "FAIL", detail: `${model} ${baseRun.version} was removed` });
      } else if (currentRun.version !== baseRun.version) {
        problems.push({
          status: "FAIL",
          detail: `${model}: expected ${baseRun.version} at position ${index}, found ${currentRun.version}`
        });
      } else if (!canonicallyEqual(currentRun.record, baseRun.record)) {
        problems.push({ status: "FAIL", detail: `${model} ${baseRun.version} was modified` });
      }
    });
  }

  for (const [script, baseAuthors] of baseline.scriptAuthors) {
    const currentAuthors = current.scriptAuthors.get(script);
    if (!currentAuthors) {
      problems.push({ status: "FAIL", detail: `script_authors entry ${script} was removed` });
      continue;
    }
    const prefix = currentAuthors.slice(0, baseAuthors.length);
    if (!canonicallyEqual(prefix, baseAuthors)) {
      problems.push({
        status: "FAIL",
        detail: `${script}: authors changed (expected to start with ${baseAuthors.join(", ")})`
      });
    }
  }

  return problems;
};

export const verifyTrainingHistory = (value: unknown, options: VerifyOptions = {}): VerifyReport => {
  const results: VerifyResult[] = [];
  const label = options.label ?? "training_history.json";

  if (!validateTrainingHistory(value)) {
    const errors = formatAjvErrors(label, validateTrainingHistory.errors);
    addResult(results, "FAIL", label, errors.join("; ") || "Schema validation failed");
    addResult(results, "WARN", "semantic checks", "Skipped: schema validation failed");
    return { results, ok: false };
  }
  addResult(results, "OK", label);

  const history = fromDocument(value);
  addProblems(results, "version order", checkVersionOrder(history));
  addProblems(results, "validation_accuracy range", checkAccuracy(history));
  addProblems(results, "positive counts", checkPositiveCounts(history));
  addProblems(results, "script references", checkScriptReferences(history));
  addProblems(results, "script authors", checkAuthorLists(history));

  if (options.baseline) {
    addProblems(
      results,
      "append-only",
      checkAppendOnly(options.baseline, history),
      `${countRuns(options.baseline)} baseline run(s) preserved`
    );
  }

  const ok = !results.some((result) => result.status === "FAIL");
  return { results, ok };
};

const loadBaseline = (
  results: VerifyResult[],
  baselinePath: string
): TrainingHistory | undefined => {
  if (!existsSync(baselinePath)) {
    addResult(results, "FAIL", "baseline", `Missing file: ${baselinePath}`);
    return undefined;
  }
  try {
    const value = readJsonFile(baselinePath);
    if (!validateTrainingHistory(value)) {
      const errors = formatAjvErrors("baseline", validateTrainingHistory.errors);
      addResult(results, "FAIL", "baseline", errors.join("; ") || "Schema validation failed");
      return undefined;
    }
    return fromDocument(value);
  } catch (error) {
    addResult(results, "FAIL", "baseline", error instanceof Error ? error.message : String(error));
    return undefined;
  }
};

export type VerifyFileOptions = {
  baselinePath?: string;
  bus?: EventBus;
};

/** Never throws for bad content: unreadable files become FAIL results. */
export const verifyLedgerFile = (path: string, options: VerifyFileOptions = {}): VerifyReport => {
  const label = basename(path);
  const preflight: VerifyResult[] = [];
  const baseline = options.baselinePath ? loadBaseline(preflight, options.baselinePath) : undefined;

  let report: VerifyReport;
  if (!existsSync(path)) {
    report = { results: [{ status: "FAIL", label, detail: `Missing file: ${path}` }], ok: false };
  } else {
    try {
      report = verifyTrainingHistory(readJsonFile(path), { label, baseline });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      report = { results: [{ status: "FAIL", label, detail }], ok: false };
    }
  }

  const results = [...preflight, ...report.results];
  const ok = !results.some((result) => result.status === "FAIL");

  options.bus?.emit({
    type: "ledger.verified",
    payload: {
      path,
      ok,
      fail_count: results.filter((result) => result.status === "FAIL").length,
      warn_count: results.filter((result) => result.status === "WARN").length,
      baseline_path: options.baselinePath,
      verified_at: new Date().toISOString()
    }
  });

  return { results, ok };
};

const STATUS_LEVELS = { OK: "success", WARN: "warn", FAIL: "error" } as const;

export const formatVerifyReport = (report: VerifyReport, fmt?: Formatter): string => {
  return report.results
    .map((result) => {
      if (fmt?.isTTY) {
        return fmt.statusChip(result.label, STATUS_LEVELS[result.status], result.detail);
      }
      const detail = result.detail ? `: ${result.detail}` : "";
      return `${result.status} ${result.label}${detail}`;
    })
    .join("\n");
};
