import { assertSchema, validateTrainingRun } from "../config/schema-validation.js";
import type { EventBus } from "../events/event-bus.js";
import { writeJsonAtomic } from "../utils/json-io.js";
import { isAccuracyInRange } from "./lookup.js";
import { readTrainingHistory, serializeTrainingHistory } from "./read-ledger.js";
import type { TrainingHistory, TrainingRunRecord, VersionedRun } from "./types.js";
import { nextVersionLabel } from "./version-label.js";

export type AppendOptions = {
  /** Registers (or extends) the authors of `input.script.name`. */
  scriptAuthors?: string[];
};

export type AppendResult = {
  history: TrainingHistory;
  model: string;
  version: string;
  record: TrainingRunRecord;
  /** Set when the append registered a script that had no authors entry. */
  newScript?: string;
};

export type AppendToFileOptions = AppendOptions & {
  bus?: EventBus;
};

const checkRecord = (record: TrainingRunRecord): string[] => {
  const problems: string[] = [];
  if (!Number.isInteger(record.accelerators) || record.accelerators < 1) {
    problems.push(`accelerators must be a positive integer (got ${record.accelerators})`);
  }
  if (!Number.isInteger(record.epochs_trained) || record.epochs_trained < 1) {
    problems.push(`epochs_trained must be a positive integer (got ${record.epochs_trained})`);
  }
  if (!isAccuracyInRange(record.validation_accuracy)) {
    problems.push(
      `validation_accuracy must be a decimal in [0, 1] (got ${JSON.stringify(record.validation_accuracy)})`
    );
  }
  return problems;
};

const mergeAuthors = (existing: readonly string[], added: readonly string[]): string[] => {
  const merged = existing.slice();
  for (const name of added) {
    if (!merged.includes(name)) {
      merged.push(name);
    }
  }
  return merged;
};

const normalizeAuthors = (authors: readonly string[]): string[] => {
  const trimmed = authors.map((name) => name.trim()).filter((name) => name.length > 0);
  if (trimmed.length === 0) {
    throw new Error("Script authors must list at least one contributor");
  }
  const duplicates = trimmed.filter((name, index) => trimmed.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new Error(`Duplicate script authors: ${Array.from(new Set(duplicates)).join(", ")}`);
  }
  return trimmed;
};

/**
 * Returns a new history with `input` recorded as the next version of `model`.
 * The given history is left untouched.
 */
export const appendRun = (
  history: TrainingHistory,
  model: string,
  input: unknown,
  options: AppendOptions = {}
): AppendResult => {
  if (model.trim().length === 0) {
    throw new Error("Model name must not be empty");
  }
  if (model === "script_authors") {
    throw new Error("script_authors is reserved and cannot be used as a model name");
  }

  const record = assertSchema("run", validateTrainingRun, input);
  const problems = checkRecord(record);
  if (problems.length > 0) {
    throw new Error(`Invalid run for ${model}:\n${problems.map((problem) => `- ${problem}`).join("\n")}`);
  }

  const scriptName = record.script.name;
  const existingAuthors = history.scriptAuthors.get(scriptName);
  const addedAuthors = options.scriptAuthors ? normalizeAuthors(options.scriptAuthors) : undefined;
  if (!existingAuthors && !addedAuthors) {
    throw new Error(
      `Script ${scriptName} has no authors entry; pass script authors to register it`
    );
  }

  const existingRuns = history.models.get(model) ?? [];
  const version = nextVersionLabel(existingRuns.map((run) => run.version));
  const appended: VersionedRun = { version, record: structuredClone(record) };

  const models = new Map(history.models);
  models.set(model, [...existingRuns, appended]);

  const scriptAuthors = new Map(history.scriptAuthors);
  scriptAuthors.set(scriptName, mergeAuthors(existingAuthors ?? [], addedAuthors ?? []));

  return {
    history: { models, scriptAuthors },
    model,
    version,
    record: appended.record,
    newScript: existingAuthors ? undefined : scriptName
  };
};

export const appendRunToFile = (
  path: string,
  model: string,
  input: unknown,
  options: AppendToFileOptions = {}
): AppendResult => {
  const current = readTrainingHistory(path);
  const result = appendRun(current, model, input, options);
  writeJsonAtomic(path, serializeTrainingHistory(result.history));

  options.bus?.emit({
    type: "run.appended",
    payload: {
      path,
      model,
      version: result.version,
      contributor: result.record.contributor,
      validation_accuracy: result.record.validation_accuracy,
      new_script: result.newScript,
      appended_at: new Date().toISOString()
    }
  });

  return result;
};
