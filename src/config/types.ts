export interface LedgerConfigFile {
  ledger_path?: string;
  build_targets_path?: string;
  /** `false` disables the activity log; a string relocates it. */
  activity_log?: boolean | string;
  leaderboard?: {
    top?: number;
    accuracy_digits?: number;
  };
}

export type ResolvedLedgerConfig = {
  configPath: string | null;
  ledgerPath: string;
  buildTargetsPath: string;
  activityLogPath: string | null;
  leaderboard: {
    top?: number;
    accuracyDigits: number;
  };
};
