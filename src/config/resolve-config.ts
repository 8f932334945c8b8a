import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { assertSchema, validateLedgerConfig } from "./schema-validation.js";
import type { LedgerConfigFile, ResolvedLedgerConfig } from "./types.js";
import { readJsonFile } from "../utils/json-io.js";

export const DEFAULT_CONFIG_PATH = "training-ledger.config.json";
export const DEFAULT_LEDGER_PATH = "training_history.json";
export const DEFAULT_BUILD_TARGETS_PATH = "custom_ops.targets.json";
export const DEFAULT_ACTIVITY_LOG = "ledger.log";
export const DEFAULT_ACCURACY_DIGITS = 2;

export const LEDGER_PATH_ENV = "TRAINING_LEDGER_PATH";
export const NO_LOG_ENV = "TRAINING_LEDGER_NO_LOG";

export interface ResolveConfigOptions {
  /** An explicit path must exist; the default one is optional. */
  configPath?: string;
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: {
    ledgerPath?: string;
    buildTargetsPath?: string;
    top?: number;
  };
}

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const loadConfigFile = (
  rootDir: string,
  explicitPath: string | undefined
): { path: string | null; config: LedgerConfigFile } => {
  const path = resolve(rootDir, explicitPath ?? DEFAULT_CONFIG_PATH);
  if (!existsSync(path)) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${path}`);
    }
    return { path: null, config: {} };
  }
  return { path, config: assertSchema("config", validateLedgerConfig, readJsonFile(path)) };
};

/** Flag > environment > config file > defaults. Config-relative paths resolve against the config's directory. */
export const resolveConfig = (options: ResolveConfigOptions = {}): ResolvedLedgerConfig => {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const { path: configPath, config } = loadConfigFile(rootDir, options.configPath);
  const configDir = configPath ? dirname(configPath) : rootDir;

  const envLedgerPath = env[LEDGER_PATH_ENV]?.trim();
  const ledgerPath = overrides.ledgerPath
    ? resolve(rootDir, overrides.ledgerPath)
    : envLedgerPath
      ? resolve(rootDir, envLedgerPath)
      : resolve(configDir, config.ledger_path ?? DEFAULT_LEDGER_PATH);

  const buildTargetsPath = overrides.buildTargetsPath
    ? resolve(rootDir, overrides.buildTargetsPath)
    : resolve(configDir, config.build_targets_path ?? DEFAULT_BUILD_TARGETS_PATH);

  let activityLogPath: string | null;
  if (isTruthyEnv(env[NO_LOG_ENV]) || config.activity_log === false) {
    activityLogPath = null;
  } else if (typeof config.activity_log === "string") {
    activityLogPath = resolve(configDir, config.activity_log);
  } else {
    activityLogPath = resolve(dirname(ledgerPath), DEFAULT_ACTIVITY_LOG);
  }

  const top = overrides.top ?? config.leaderboard?.top;
  if (top !== undefined && (!Number.isInteger(top) || top < 1)) {
    throw new Error(`Invalid leaderboard top: ${top} (expected a positive integer)`);
  }

  return {
    configPath,
    ledgerPath,
    buildTargetsPath,
    activityLogPath,
    leaderboard: {
      top,
      accuracyDigits: config.leaderboard?.accuracy_digits ?? DEFAULT_ACCURACY_DIGITS
    }
  };
};
