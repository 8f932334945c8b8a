import { assertSchema, validateTrainingHistory } from "../config/schema-validation.js";
import { readJsonFile } from "../utils/json-io.js";
import {
  SCRIPT_AUTHORS_KEY,
  type ModelEntryDocument,
  type ScriptAuthors,
  type TrainingHistory,
  type TrainingHistoryDocument,
  type TrainingRunRecord,
  type VersionedRun
} from "./types.js";

const isRunRecord = (value: TrainingRunRecord | string[]): value is TrainingRunRecord =>
  !Array.isArray(value);

const toVersionedRuns = (entry: ModelEntryDocument | ScriptAuthors): VersionedRun[] => {
  const values: Record<string, TrainingRunRecord | string[]> = entry;
  const runs: VersionedRun[] = [];
  for (const [version, record] of Object.entries(values)) {
    if (isRunRecord(record)) {
      runs.push({ version, record });
    }
  }
  return runs;
};

export const fromDocument = (document: TrainingHistoryDocument): TrainingHistory => {
  const models = new Map<string, VersionedRun[]>();
  for (const [name, entry] of Object.entries(document)) {
    if (name === SCRIPT_AUTHORS_KEY) {
      continue;
    }
    models.set(name, toVersionedRuns(entry));
  }

  const scriptAuthors = new Map<string, string[]>(
    Object.entries(document.script_authors).map(([script, authors]) => [script, authors.slice()])
  );

  return { models, scriptAuthors };
};

export const parseTrainingHistory = (value: unknown): TrainingHistory =>
  fromDocument(assertSchema("training_history", validateTrainingHistory, value));

export const readTrainingHistory = (path: string): TrainingHistory => {
  const value = readJsonFile(path);
  try {
    return parseTrainingHistory(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid training history ${path}:\n${reason}`);
  }
};

// Field order matches the ledger's established layout so appends diff cleanly.
const orderRecord = (record: TrainingRunRecord): TrainingRunRecord => ({
  accelerators: record.accelerators,
  args: { ...record.args },
  contributor: record.contributor,
  epochs_trained: record.epochs_trained,
  script: { name: record.script.name, version: record.script.version },
  tensorboard_logs: record.tensorboard_logs,
  validation_accuracy: record.validation_accuracy
});

// Built from entries: plain assignment would drop a model named "__proto__".
export const serializeTrainingHistory = (history: TrainingHistory): TrainingHistoryDocument => {
  const models: Record<string, ModelEntryDocument> = Object.fromEntries(
    Array.from(history.models, ([name, runs]) => [
      name,
      Object.fromEntries(runs.map((run) => [run.version, orderRecord(run.record)]))
    ])
  );
  const authors: ScriptAuthors = Object.fromEntries(
    Array.from(history.scriptAuthors, ([script, names]) => [script, names.slice()])
  );

  return { ...models, script_authors: authors };
};

export const listModels = (history: TrainingHistory): string[] => Array.from(history.models.keys());

export const listVersions = (history: TrainingHistory, model: string): string[] =>
  (history.models.get(model) ?? []).map((run) => run.version);

export const countRuns = (history: TrainingHistory): number => {
  let total = 0;
  for (const runs of history.models.values()) {
    total += runs.length;
  }
  return total;
};
