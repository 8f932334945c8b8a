import type { WarningRecord } from "../utils/warnings.js";

export type LedgerLoadedPayload = {
  path: string;
  models: number;
  runs: number;
  loaded_at: string;
};

export type RunAppendedPayload = {
  path: string;
  model: string;
  version: string;
  contributor: string;
  validation_accuracy: string;
  new_script?: string;
  appended_at: string;
};

export type LedgerVerifiedPayload = {
  path: string;
  ok: boolean;
  fail_count: number;
  warn_count: number;
  baseline_path?: string;
  verified_at: string;
};

export type Event =
  | { type: "ledger.loaded"; payload: LedgerLoadedPayload }
  | { type: "run.appended"; payload: RunAppendedPayload }
  | { type: "ledger.verified"; payload: LedgerVerifiedPayload }
  | { type: "warning.raised"; payload: WarningRecord };

export type EventType = Event["type"];
