export * from "./core/types";
export * from "./core/errors";
export {
  compileCondition,
  evaluateCondition,
  parseCondition,
  type ConditionNode,
} from "./core/condition";
export {
  CollaborationPatternSchema,
  definePattern,
  loadPatternDirectory,
  onError,
  step,
  validatePattern,
} from "./core/pattern-definition";
export { AgentRegistry } from "./core/agent-registry";
export {
  MessageBus,
  type DeadLetter,
  type MessageBusOptions,
  type SendMessageInput,
} from "./core/message-bus";
export {
  FileSessionStore,
  MemorySessionStore,
  type SessionStore,
} from "./core/session-store";
export {
  CollaborationManager,
  RESUME_ACTIONS,
  type CollaborationManagerOptions,
  type FallbackHandler,
  type FallbackInput,
  type FallbackOutcome,
  type ResumeAction,
  type SendOptions,
} from "./core/collaboration-manager";
export {
  ApplicationStateMachine,
  TRANSITIONS,
  canTransition,
  nextStateForTask,
  stageOf,
  type DecisionOutcome,
  type StateHandler,
  type TaskOutcome,
} from "./lifecycle/application-state-machine";
export {
  DEFAULT_TASK_ROUTES,
  TaskRouter,
  type TaskRoute,
  type TaskRoutes,
} from "./lifecycle/task-router";
export {
  DEFAULT_STRATEGIES,
  ErrorRecoveryManager,
  actionsForPolicy,
  severityFallback,
  type ErrorStatistics,
  type RecoveryController,
  type RecoveryStrategy,
} from "./recovery/error-recovery-manager";
export {
  AuditLogger,
  GENESIS_HASH,
  defaultAuditSettings,
  parseAuditLine,
  segmentKeyFor,
  type AuditEntry,
  type AuditEventInput,
  type AuditSearchQuery,
  type AuditSettings,
} from "./audit/audit-logger";
export { REDACTION_MARKER, redactRecord } from "./audit/redaction";
export {
  FileSegmentStore,
  MemorySegmentStore,
  type SegmentStore,
} from "./audit/segment-store";
export {
  createLogger,
  createNoopLogger,
  type LogLevel,
  type Logger,
  type ModuleLogger,
} from "./logging/logger";
export { HandlerAgent, type StepHandler } from "./agents/handler-agent";
export { OrchestratorAgent } from "./agents/orchestrator-agent";
export { BUILTIN_PATTERNS } from "./patterns";
export {
  type ProjectConfig,
  defaultProjectConfig,
  loadProjectConfig,
} from "./project/config";
export { bootstrapProjectConfig } from "./project/bootstrap";
export { buildReportLines, type ReportSection } from "./observability/report";
export {
  MaintenanceScheduler,
  auditIntegrityCheck,
  auditRetentionCheck,
} from "./runtime/maintenance-scheduler";
export {
  createLendingRuntime,
  type LendingRuntime,
  type LendingRuntimeOptions,
} from "./runtime/bootstrap";
