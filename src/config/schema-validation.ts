import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, ValidateFunction, Options } from "ajv";
import { readFileSync } from "node:fs";

import type { TrainingHistoryDocument, TrainingRunRecord } from "../ledger/types.js";
import type { BuildTargetsDocument } from "../build/types.js";
import type { LedgerConfigFile } from "./types.js";
import { resolveAssetPath } from "../utils/asset-root.js";

const loadSchema = (fileName: string): unknown => {
  const raw = readFileSync(resolveAssetPath("schemas", fileName), "utf8");
  return JSON.parse(raw) as unknown;
};

type AjvInstance = {
  addSchema: (schema: unknown) => unknown;
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => AjvInstance;

const ajv = new Ajv2020Ctor({
  allErrors: true,
  strict: true,
  validateSchema: true
});

const applyFormats = addFormats as unknown as (instance: unknown) => void;
applyFormats(ajv);

const trainingHistorySchema = loadSchema("training-history.schema.json");
ajv.addSchema(trainingHistorySchema);

export const validateTrainingHistory: ValidateFunction<TrainingHistoryDocument> = ajv.compile(
  { $ref: "training-history.schema.json" }
);
export const validateTrainingRun: ValidateFunction<TrainingRunRecord> = ajv.compile({
  $ref: "training-history.schema.json#/$defs/training_run"
});
export const validateBuildTargets: ValidateFunction<BuildTargetsDocument> = ajv.compile(
  loadSchema("build-targets.schema.json")
);
export const validateLedgerConfig: ValidateFunction<LedgerConfigFile> = ajv.compile(
  loadSchema("config.schema.json")
);

export const formatAjvErrors = (
  schemaName: string,
  errors: ErrorObject[] | null | undefined
): string[] => {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || "";
    const message = error.message ?? "is invalid";
    return `${schemaName}${path}: ${message}`.trim();
  });
};

/** Throws one Error carrying every schema violation, one per line. */
export const assertSchema = <T>(
  name: string,
  validate: ValidateFunction<T>,
  value: unknown
): T => {
  if (validate(value)) {
    return value;
  }
  const formatted = formatAjvErrors(name, validate.errors);
  throw new Error(formatted.length > 0 ? formatted.join("\n") : `${name} is invalid`);
};
