// Reconcile Services - Re-exports
export { compareKey, exactKey, cleanDisplayName, cleanDatasetNames } from "./names.js";
export { LookupIndex } from "./lookup-index.js";
export {
  applyLookup,
  countMissing,
  countResolved,
  type ApplyResult,
} from "./apply.js";
export {
  evaluatePage,
  evaluateFailedPage,
  INITIAL_STOP_STATE,
  type StopDecision,
  type StopState,
} from "./stop-conditions.js";
export {
  Checkpointer,
  CrawlCheckpointService,
  type CheckpointInfo,
  type RunOverview,
} from "./checkpoints.js";
export { diagnoseMissing, type MissingReport } from "./diagnose.js";
export { planResume, type ResumePlan } from "./resume.js";
export {
  ReconcileOrchestrator,
  type CrawlReport,
  type CrawlProgress,
  type CrawlState,
  type PageSource,
} from "./orchestrator.js";
