export const SCRIPT_AUTHORS_KEY = "script_authors";

export interface TrainingScriptRef {
  name: string;
  /** Commit hash of the script revision that produced the run. */
  version: string;
}

export interface TrainingRunRecord {
  accelerators: number;
  args: Record<string, string>;
  contributor: string;
  epochs_trained: number;
  script: TrainingScriptRef;
  tensorboard_logs: string;
  /** Decimal string, e.g. "0.7713". */
  validation_accuracy: string;
}

export type ScriptAuthors = Record<string, string[]>;

export type ModelEntryDocument = Record<string, TrainingRunRecord>;

/** On-disk shape: model names at the top level beside the reserved `script_authors` key. */
export interface TrainingHistoryDocument {
  script_authors: ScriptAuthors;
  [model: string]: ModelEntryDocument | ScriptAuthors;
}

export type VersionedRun = {
  version: string;
  record: TrainingRunRecord;
};

export type TrainingHistory = {
  /** Model name to runs, both in the order they were introduced. */
  models: Map<string, VersionedRun[]>;
  scriptAuthors: Map<string, string[]>;
};
