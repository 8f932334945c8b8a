import type { TrainingHistory, TrainingRunRecord, VersionedRun } from "./types.js";
import { LATEST, compareVersionLabels, isVersionLabel } from "./version-label.js";

export type LookupResult = {
  model: string;
  version: string;
  record: TrainingRunRecord;
  accuracy: number | null;
  authors: string[];
};

const DECIMAL_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

/** Plain decimals only: no sign, exponent or bare leading dot. */
export const parseAccuracy = (text: string): number | null => {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
};

const UNIT_INTERVAL_PATTERN = /^(0+(\.[0-9]+)?|0*1(\.0+)?)$/;

/** Compared on the digits: "1.00000000000000001" is above 1 but parses to exactly 1. */
export const isAccuracyInRange = (text: string): boolean => UNIT_INTERVAL_PATTERN.test(text);

const requireModel = (history: TrainingHistory, model: string): VersionedRun[] => {
  const runs = history.models.get(model);
  if (!runs) {
    const known = Array.from(history.models.keys()).sort();
    const hint = known.length > 0 ? ` (known: ${known.join(", ")})` : "";
    throw new Error(`Unknown model: ${model}${hint}`);
  }
  return runs;
};

/** Highest suffix, not last position, so a hand-edited ledger still resolves sensibly. */
export const latestRun = (runs: readonly VersionedRun[]): VersionedRun | undefined =>
  runs.reduce<VersionedRun | undefined>((latest, run) => {
    if (!latest || compareVersionLabels(run.version, latest.version) > 0) {
      return run;
    }
    return latest;
  }, undefined);

const toResult = (history: TrainingHistory, model: string, run: VersionedRun): LookupResult => ({
  model,
  version: run.version,
  record: run.record,
  accuracy: parseAccuracy(run.record.validation_accuracy),
  authors: (history.scriptAuthors.get(run.record.script.name) ?? []).slice()
});

export const lookupRun = (
  history: TrainingHistory,
  model: string,
  version: string = LATEST
): LookupResult => {
  const runs = requireModel(history, model);

  if (version === LATEST) {
    const latest = latestRun(runs);
    if (!latest) {
      throw new Error(`Model ${model} has no recorded runs`);
    }
    return toResult(history, model, latest);
  }

  if (!isVersionLabel(version)) {
    throw new Error(`Invalid version label: ${version}`);
  }
  const run = runs.find((candidate) => candidate.version === version);
  if (!run) {
    throw new Error(`Unknown version ${version} for model ${model}`);
  }
  return toResult(history, model, run);
};

/** Ties keep the earlier version. Runs with unparsable accuracy never win. */
export const bestRun = (history: TrainingHistory, model: string): LookupResult | undefined => {
  const runs = requireModel(history, model);
  let best: { run: VersionedRun; accuracy: number } | undefined;
  for (const run of runs) {
    const accuracy = parseAccuracy(run.record.validation_accuracy);
    if (accuracy === null) {
      continue;
    }
    if (!best || accuracy > best.accuracy) {
      best = { run, accuracy };
    }
  }
  return best ? toResult(history, model, best.run) : undefined;
};
