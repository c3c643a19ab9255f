export { PhaseGateEngine, type EngineOptions } from "./core/engine";
export * from "./core/errors";
export { EngineLogger, silentLogger, type LogLevel, type LogSink } from "./core/logger";
export { definePhase, derived, manual, standardCriteria } from "./core/phase-definition";
export {
  PhaseController,
  type AdvanceResult,
  type GateSources,
  type PhaseTransition,
} from "./core/phase-controller";
export * from "./core/types";
export {
  CatalogueStore,
  type ChangeDecision,
  type ChangeRequest,
  type CatalogueNotice,
} from "./ledger/catalogue-store";
export {
  ChronicleStore,
  type ChronicleQuery,
} from "./ledger/chronicle-store";
export {
  CatalogueExportSchema,
  ChronicleExportSchema,
  type CatalogueExport,
  type ChronicleExport,
} from "./ledger/export";
export { buildStatusReport, buildReportLines, type ReportSection } from "./observability/report";
export { defaultPhasePlan } from "./phases";
export {
  EngineConfigSchema,
  defaultEngineConfig,
  defineEngineConfig,
  loadEngineConfig,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type ReviewPolicy,
} from "./project/config";
export { changeRank, decideConflict, type ConflictResolver, type ResolverDecision } from "./review/conflict-resolver";
export { EscalationManager, type HumanDecisionPort } from "./review/escalation-manager";
export {
  MAX_DEBATE_ROUNDS,
  ReviewCoordinator,
  type ReviewOutcome,
  type ReviewReceipt,
} from "./review/review-coordinator";
export { ReviewInbox, type InboxMessage, type ReviewRequest, type ReviewerChannel } from "./review/review-inbox";
export { TaskRouter, type ProposalDraft, type Submission } from "./routing/task-router";
export { WorkerPool } from "./routing/worker-pool";
export { ControlServer } from "./runtime/control-server";
export {
  createStallMonitor,
  findStalled,
  watchStalls,
  type StallAlert,
  type StallMonitor,
  type StalledSubject,
} from "./runtime/stall-monitor";
