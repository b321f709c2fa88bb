export type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type AgentId = Brand<string, "AgentId">;
export type MessageId = Brand<string, "MessageId">;
export type ApplicationId = Brand<string, "ApplicationId">;
export type ErrorId = Brand<string, "ErrorId">;

export const asSessionId = (value: string): SessionId => value as SessionId;
export const asAgentId = (value: string): AgentId => value as AgentId;
export const asMessageId = (value: string): MessageId => value as MessageId;
export const asApplicationId = (value: string): ApplicationId =>
  value as ApplicationId;
export const asErrorId = (value: string): ErrorId => value as ErrorId;

/** Ids that end up in audit lines and file names. */
export const SAFE_ID = /^[A-Za-z0-9_.:-]+$/;

export const isSafeId = (value: string): boolean => SAFE_ID.test(value);

// --- Collaboration patterns ---

export type OnErrorPolicy = "retry" | "notify_orchestrator" | "notify_human";

export const BUILTIN_FALLBACKS = [
  "abort_workflow",
  "skip_step",
  "manual_intervention",
  "conservative_assessment",
] as const;

export type BuiltinFallback = (typeof BUILTIN_FALLBACKS)[number];

/** A built-in fallback or the name of one registered on the engine. */
export type FallbackAction = BuiltinFallback | (string & {});

export interface ErrorPolicy {
  onError?: OnErrorPolicy;
  maxRetries?: number;
  fallback?: FallbackAction;
}

export interface StepDefinition {
  name: string;
  agent: string;
  inputs?: string[];
  outputs?: string[];
  required: boolean;
  timeoutSeconds?: number;
  requiresConfirmation?: boolean;
  eventTriggered?: boolean;
  triggerEvent?: string;
  /**
   * Boolean expression over session context, e.g.
   * `exception_type == 'document' && amount > 1000`. Only consulted for
   * steps that are not `required`.
   */
  condition?: string;
}

export interface CollaborationPattern {
  name: string;
  description: string;
  agents: string[];
  initiator: string;
  steps: StepDefinition[];
  /** Keyed by step name. */
  errorHandling?: Record<string, ErrorPolicy>;
}

// --- Agents ---

export type StepResult =
  | { status: "success"; output?: Record<string, unknown> }
  | { status: "error"; error: string };

export interface StepExecutionOptions {
  signal?: AbortSignal;
}

export interface Agent {
  executeStep(
    stepName: string,
    inputs: Record<string, unknown>,
    options?: StepExecutionOptions,
  ): Promise<StepResult>;
  receiveMessage(message: Message): void | Promise<void>;
  canHandleStep(stepName: string): boolean;
  getCapabilities(): ReadonlySet<string>;
}

// --- Messages ---

export const MESSAGE_TYPES = [
  "request",
  "response",
  "notification",
  "error",
  "decision",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type Priority = "low" | "medium" | "high";

export interface Message {
  id: MessageId;
  sender: AgentId;
  recipient: AgentId;
  timestamp: string;
  type: MessageType;
  content: Record<string, unknown>;
  session_id?: SessionId;
  in_response_to?: MessageId;
  priority: Priority;
}

export const isMessageType = (value: string): value is MessageType =>
  MESSAGE_TYPES.some((type) => type === value);

// --- Sessions ---

export type SessionStatus =
  | "initialized"
  | "step_in_progress"
  | "waiting_for_event"
  | "awaiting_confirmation"
  | "retrying_step"
  | "awaiting_orchestrator_instruction"
  | "awaiting_human_intervention"
  | "aborted"
  | "completed";

export const TERMINAL_SESSION_STATUSES: readonly SessionStatus[] = [
  "aborted",
  "completed",
];

export type StepExecutionStatus =
  | "in_progress"
  | "completed"
  | "failed"
  | "skipped";

export interface StepExecution {
  execution_id: string;
  step_name: string;
  step_index: number;
  agent: string;
  inputs: Record<string, unknown>;
  started_at: string;
  ended_at?: string;
  timeout_seconds: number;
  status: StepExecutionStatus;
  attempt: number;
  output?: Record<string, unknown>;
  error?: string;
}

export interface SessionCheckpoint {
  step_index: number;
  context: Record<string, unknown>;
}

export interface SessionDecision {
  message_id: MessageId;
  agent: AgentId;
  timestamp: string;
  content: Record<string, unknown>;
}

export interface WorkflowSession {
  session_id: SessionId;
  pattern_name: string;
  application_id: ApplicationId;
  initiator: string;
  status: SessionStatus;
  current_step_index: number;
  context: Record<string, unknown>;
  initial_context: Record<string, unknown>;
  current_execution?: StepExecution;
  steps_completed: StepExecution[];
  steps_failed: StepExecution[];
  messages: Message[];
  decisions: SessionDecision[];
  errors: ErrorId[];
  checkpoints: SessionCheckpoint[];
  /** Retries consumed per step name. */
  retry_counts: Record<string, number>;
  execution_seq: number;
  started_at: string;
  updated_at: string;
  ended_at?: string;
}

export interface SessionStatusSummary {
  session_id: SessionId;
  pattern_name: string;
  status: SessionStatus;
  started_at: string;
  ended_at?: string;
  progress: string;
  current_step?: string;
  errors: number;
  /** Messages of type `error` exchanged within the session. */
  error_messages: number;
  message_count: number;
}

// --- Errors & recovery ---

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export type ErrorCategory =
  | "validation"
  | "document_processing"
  | "agent_failure"
  | "communication"
  | "security"
  | "system"
  | "integration"
  | "data"
  | "unknown";

export const ERROR_SEVERITIES: readonly ErrorSeverity[] = [
  "low",
  "medium",
  "high",
  "critical",
];

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "validation",
  "document_processing",
  "agent_failure",
  "communication",
  "security",
  "system",
  "integration",
  "data",
  "unknown",
];

export type RecoveryAction =
  | "retry"
  | "fallback"
  | "revert"
  | "restart"
  | "alternate"
  | "diagnostic"
  | "escalate"
  | "suspend"
  | "ignore";

export type ErrorRecordStatus =
  | "detected"
  | "recovery_planned"
  | "recovery_in_progress"
  | "recovery_successful"
  | "recovery_failed"
  | "recovery_error";

export const ERROR_RECORD_STATUSES: readonly ErrorRecordStatus[] = [
  "detected",
  "recovery_planned",
  "recovery_in_progress",
  "recovery_successful",
  "recovery_failed",
  "recovery_error",
];

export interface RecoveryAttempt {
  action: RecoveryAction;
  timestamp: string;
  result: "pending" | "success" | "failure" | "error";
  requested?: RecoveryAction;
  error?: string;
}

/** Context the engine attaches to errors raised while running a step. */
export interface StepErrorContext {
  session_id?: SessionId;
  step_name?: string;
  step_index?: number;
  agent_id?: string;
  retry_count?: number;
  max_retries?: number;
  fallback?: FallbackAction;
  escalate_to?: "orchestrator" | "human";
  [key: string]: unknown;
}

export interface ErrorRecord {
  error_id: ErrorId;
  application_id: ApplicationId;
  timestamp: string;
  error_type: string;
  error_message: string;
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: StepErrorContext;
  recovery_actions: RecoveryAction[];
  recovery_attempts: RecoveryAttempt[];
  status: ErrorRecordStatus;
  resolved: boolean;
}

// --- Application lifecycle ---

export const APPLICATION_STATES = [
  "initiated",
  "document_collection",
  "document_validation",
  "document_analysis",
  "underwriting",
  "compliance_check",
  "decision_pending",
  "approved",
  "conditionally_approved",
  "declined",
  "suspended",
  "completed",
] as const;

export type ApplicationState = (typeof APPLICATION_STATES)[number];

export type ApplicationStage =
  | "application_intake"
  | "document_processing"
  | "underwriting"
  | "decision"
  | "post_decision";

export interface ApplicationHistoryEntry {
  state: ApplicationState;
  timestamp: string;
  reason?: string;
}

export interface ApplicationRecord {
  application_id: ApplicationId;
  state: ApplicationState;
  context: Record<string, unknown>;
  history: ApplicationHistoryEntry[];
  created_at: string;
  updated_at: string;
}

export const isApplicationState = (
  value: string,
): value is ApplicationState =>
  APPLICATION_STATES.some((state) => state === value);

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
};
