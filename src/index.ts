export type {
  ScriptAuthors,
  TrainingHistory,
  TrainingHistoryDocument,
  TrainingRunRecord,
  TrainingScriptRef,
  VersionedRun
} from "./ledger/types.js";
export {
  countRuns,
  listModels,
  listVersions,
  parseTrainingHistory,
  readTrainingHistory,
  serializeTrainingHistory
} from "./ledger/read-ledger.js";
export {
  compareVersionLabels,
  formatVersionLabel,
  nextVersionLabel,
  parseVersionLabel
} from "./ledger/version-label.js";
export { bestRun, lookupRun, parseAccuracy, type LookupResult } from "./ledger/lookup.js";
export { appendRun, appendRunToFile, type AppendOptions, type AppendResult } from "./ledger/append.js";
export {
  formatVerifyReport,
  verifyLedgerFile,
  verifyTrainingHistory,
  type VerifyReport,
  type VerifyResult
} from "./tools/verify-ledger.js";
export {
  buildLeaderboard,
  contributorStats,
  formatLeaderboardJson,
  formatLeaderboardMarkdown,
  formatLeaderboardText,
  type LeaderboardModel,
  type LeaderboardRow
} from "./tools/report-leaderboard.js";
export {
  parseBuildTargets,
  readBuildTargets,
  resolveAllTargets,
  resolveTargetFlags
} from "./build/targets.js";
export type { BuildTargetDecl, BuildTargetsDocument, ResolvedTarget } from "./build/types.js";
export { resolveConfig } from "./config/resolve-config.js";
export type { ResolvedLedgerConfig } from "./config/types.js";
export { EventBus } from "./events/event-bus.js";
export { ActivityLogger } from "./ui/activity-log.js";
