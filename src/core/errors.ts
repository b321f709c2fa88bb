import type { ErrorCategory, ErrorSeverity } from "./types";

export class LendingError extends Error {
  readonly severity: ErrorSeverity = "medium";
  readonly category: ErrorCategory = "unknown";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends LendingError {
  override readonly severity: ErrorSeverity = "medium";
  override readonly category: ErrorCategory = "validation";
}

export class ConditionSyntaxError extends ValidationError {
  constructor(
    readonly expression: string,
    readonly position: number,
    detail: string,
  ) {
    super(`${detail} at position ${position} in condition: ${expression}`);
  }
}

export class AgentFailureError extends LendingError {
  override readonly severity: ErrorSeverity = "high";
  override readonly category: ErrorCategory = "agent_failure";
}

export class AgentTimeoutError extends AgentFailureError {
  constructor(
    readonly agentId: string,
    readonly stepName: string,
    readonly timeoutSeconds: number,
  ) {
    super(
      `Agent ${agentId} timed out after ${timeoutSeconds}s on step ${stepName}`,
    );
  }
}

export class UnregisteredAgentError extends AgentFailureError {
  constructor(readonly agentId: string) {
    super(`Agent not registered: ${agentId}`);
  }
}

export class MalformedStepResultError extends AgentFailureError {
  constructor(
    readonly agentId: string,
    readonly stepName: string,
  ) {
    super(`Agent ${agentId} returned a malformed result for step ${stepName}`);
  }
}

/** Raised when an agent reports `status: "error"` for a step. */
export class StepFailedError extends AgentFailureError {
  constructor(
    readonly stepName: string,
    detail: string,
  ) {
    super(detail);
  }
}

export class CommunicationError extends LendingError {
  override readonly severity: ErrorSeverity = "medium";
  override readonly category: ErrorCategory = "communication";
}

export class SystemError extends LendingError {
  override readonly severity: ErrorSeverity = "critical";
  override readonly category: ErrorCategory = "system";
}

export class ConfigurationError extends SystemError {}

export class DuplicateAgentError extends ConfigurationError {
  constructor(readonly agentId: string) {
    super(`Agent already registered: ${agentId}`);
  }
}

export class SecurityError extends LendingError {
  override readonly severity: ErrorSeverity = "high";
  override readonly category: ErrorCategory = "security";
}

export class UnknownPatternError extends SecurityError {
  constructor(readonly patternName: string) {
    super(`Unknown collaboration pattern: ${patternName}`);
  }
}

export class UnauthorizedInitiatorError extends SecurityError {
  constructor(
    readonly patternName: string,
    readonly initiator: string,
  ) {
    super(`${initiator} is not authorized to initiate pattern ${patternName}`);
  }
}

export class WorkflowError extends LendingError {
  override readonly severity: ErrorSeverity = "high";
  override readonly category: ErrorCategory = "unknown";
}

export class UnknownSessionError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super(`Unknown session: ${sessionId}`);
  }
}

export class InvalidSessionStateError extends WorkflowError {
  constructor(
    readonly sessionId: string,
    readonly status: string,
    operation: string,
  ) {
    super(`Cannot ${operation} session ${sessionId} in status ${status}`);
  }
}

export interface ErrorClassification {
  severity: ErrorSeverity;
  category: ErrorCategory;
}

export const classifyError = (error: unknown): ErrorClassification => {
  if (error instanceof LendingError) {
    return { severity: error.severity, category: error.category };
  }
  if (error instanceof Error) {
    return { severity: "critical", category: "unknown" };
  }
  return { severity: "medium", category: "unknown" };
};

export const describeError = (
  error: unknown,
): { type: string; message: string } => {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
};

export class PatternValidationError extends ValidationError {
  constructor(
    readonly patternName: string,
    readonly issues: string[],
  ) {
    super(`Invalid collaboration pattern ${patternName}: ${issues.join("; ")}`);
  }
}
