import { nanoid } from "nanoid";
import type { AuditLogger } from "../audit/audit-logger";
import { ValidationError, classifyError, describeError } from "../core/errors";
import {
  type ApplicationId,
  type ErrorCategory,
  type ErrorId,
  type ErrorPolicy,
  type ErrorRecord,
  type ErrorRecordStatus,
  type ErrorSeverity,
  type RecoveryAction,
  type RecoveryAttempt,
  type StepErrorContext,
  asApplicationId,
  asErrorId,
  assertNever,
} from "../core/types";
import type {
  ApplicationStateMachine,
} from "../lifecycle/application-state-machine";
import type { ModuleLogger } from "../logging/logger";

/**
 * Session-level recovery actions, supplied by the orchestration engine.
 * Each resolves to whether the action was carried out.
 */
export interface RecoveryController {
  retry(record: ErrorRecord): Promise<boolean>;
  fallback(record: ErrorRecord): Promise<boolean>;
  revert(record: ErrorRecord): Promise<boolean>;
  restart(record: ErrorRecord): Promise<boolean>;
  alternate(record: ErrorRecord): Promise<boolean>;
  escalate(record: ErrorRecord): Promise<boolean>;
  suspend(record: ErrorRecord): Promise<boolean>;
  diagnose(record: ErrorRecord): Promise<Record<string, unknown>>;
}

export type RecoveryStrategy = (severity: ErrorSeverity) => RecoveryAction[];

const lowOrMedium = (severity: ErrorSeverity): boolean =>
  severity === "low" || severity === "medium";

export const DEFAULT_STRATEGIES: ReadonlyMap<ErrorCategory, RecoveryStrategy> =
  new Map<ErrorCategory, RecoveryStrategy>([
    ["validation", () => ["revert", "alternate"]],
    [
      "agent_failure",
      (severity) =>
        lowOrMedium(severity)
          ? ["retry", "alternate"]
          : ["diagnostic", "escalate"],
    ],
    ["communication", () => ["retry", "fallback"]],
    ["system", () => ["escalate", "suspend"]],
  ]);

export const severityFallback = (
  severity: ErrorSeverity,
): RecoveryAction[] => {
  switch (severity) {
    case "low":
      return ["retry"];
    case "medium":
      return ["retry", "fallback"];
    case "high":
    case "critical":
      return ["escalate", "suspend"];
  }
};

/** Maps a step's declared policy to the actions tried for it. */
export const actionsForPolicy = (policy: ErrorPolicy): RecoveryAction[] => {
  switch (policy.onError) {
    case "retry":
      return ["retry"];
    case "notify_orchestrator":
    case "notify_human":
      return ["escalate"];
    case undefined:
      return ["fallback"];
  }
};

export interface ErrorStatistics {
  total: number;
  by_severity: Record<ErrorSeverity, number>;
  by_category: Record<ErrorCategory, number>;
  by_status: Record<ErrorRecordStatus, number>;
  /** successful / (successful + failed); 0 when nothing has finished. */
  recovery_success_rate: number;
}

export interface ErrorRecoveryManagerOptions {
  audit: AuditLogger;
  logger: ModuleLogger;
  stateMachine?: ApplicationStateMachine;
  /** Retry budget for records whose context names none. */
  defaultMaxRetries?: number;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Classifies failures into error records, plans recovery and executes
 * actions one at a time. Session-scoped actions go through the attached
 * controller; without one only application-level actions (suspend,
 * revert, ignore) can succeed.
 */
export class ErrorRecoveryManager {
  private readonly records = new Map<ErrorId, ErrorRecord>();
  private readonly byApplication = new Map<ApplicationId, ErrorId[]>();
  private readonly strategies = new Map(DEFAULT_STRATEGIES);
  private controller: RecoveryController | undefined;
  private readonly audit: AuditLogger;
  private readonly logger: ModuleLogger;
  private readonly stateMachine: ApplicationStateMachine | undefined;
  private readonly defaultMaxRetries: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: ErrorRecoveryManagerOptions) {
    this.audit = options.audit;
    this.logger = options.logger;
    this.stateMachine = options.stateMachine;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 1;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? nanoid;
  }

  attachController(controller: RecoveryController): void {
    this.controller = controller;
  }

  registerStrategy(
    category: ErrorCategory,
    strategy: RecoveryStrategy | RecoveryAction[],
  ): void {
    this.strategies.set(
      category,
      Array.isArray(strategy) ? () => [...strategy] : strategy,
    );
  }

  planRecovery(
    severity: ErrorSeverity,
    category: ErrorCategory,
  ): RecoveryAction[] {
    const strategy = this.strategies.get(category);
    return strategy ? strategy(severity) : severityFallback(severity);
  }

  handleError(
    applicationId: string,
    error: unknown,
    context: StepErrorContext = {},
    severity?: ErrorSeverity,
    category?: ErrorCategory,
  ): ErrorRecord {
    const inferred = classifyError(error);
    const described = describeError(error);
    const record: ErrorRecord = {
      error_id: asErrorId(this.generateId()),
      application_id: asApplicationId(applicationId),
      timestamp: this.now().toISOString(),
      error_type: described.type,
      error_message: described.message,
      severity: severity ?? inferred.severity,
      category: category ?? inferred.category,
      context: { ...context },
      recovery_actions: [],
      recovery_attempts: [],
      status: "detected",
      resolved: false,
    };
    this.records.set(record.error_id, record);
    this.byApplication.set(record.application_id, [
      ...(this.byApplication.get(record.application_id) ?? []),
      record.error_id,
    ]);

    this.audit.logSecurityEvent(
      "error_detected",
      {
        error_id: record.error_id,
        error_type: record.error_type,
        error_message: record.error_message,
        severity: record.severity,
        category: record.category,
        context: record.context,
      },
      { resourceId: record.application_id, success: false },
    );

    record.recovery_actions = this.planRecovery(
      record.severity,
      record.category,
    );
    record.status = "recovery_planned";
    this.logger.warn(
      "error_detected",
      {
        error: record.error_id,
        application: record.application_id,
        severity: record.severity,
        category: record.category,
        plan: record.recovery_actions.join(","),
      },
      `${record.error_type}: ${record.error_message}`,
    );
    return structuredClone(record);
  }

  /**
   * Executes one action. A retry past the record's retry budget (retries
   * before the error plus retries already run for it) runs the fallback
   * instead. Resolves to whether the error is now handled.
   */
  async executeRecovery(
    applicationId: string,
    errorId: string,
    action: RecoveryAction,
  ): Promise<boolean> {
    const record = this.requireRecord(applicationId, errorId);
    const effective = this.boundedAction(record, action);
    const attempt: RecoveryAttempt = {
      action: effective,
      timestamp: this.now().toISOString(),
      result: "pending",
      ...(effective !== action ? { requested: action } : {}),
    };
    record.recovery_attempts.push(attempt);
    record.status = "recovery_in_progress";

    let resolved: boolean;
    try {
      resolved = await this.perform(record, effective);
      attempt.result =
        resolved || effective === "diagnostic" ? "success" : "failure";
      record.status = resolved ? "recovery_successful" : "recovery_failed";
      record.resolved = resolved;
    } catch (error) {
      resolved = false;
      attempt.result = "error";
      attempt.error = describeError(error).message;
      record.status = "recovery_error";
    }

    this.audit.logEvent({
      eventType: "error_recovery",
      action: effective,
      resourceId: record.application_id,
      details: {
        error_id: record.error_id,
        result: attempt.result,
        ...(attempt.requested ? { requested: attempt.requested } : {}),
        ...(attempt.error ? { error: attempt.error } : {}),
      },
      success: attempt.result === "success",
    });
    this.logger.info(
      "recovery_attempt",
      {
        error: record.error_id,
        action: effective,
        requested: attempt.requested,
        result: attempt.result,
      },
      `Recovery ${effective} for ${record.error_id}: ${attempt.result}`,
    );
    return resolved;
  }

  /**
   * Tries the policy's actions (or the planned list when the step has no
   * policy) in order until one handles the error.
   */
  async recover(
    applicationId: string,
    errorId: string,
    policy?: ErrorPolicy,
  ): Promise<boolean> {
    const record = this.requireRecord(applicationId, errorId);
    const actions = policy
      ? actionsForPolicy(policy)
      : [...record.recovery_actions];
    for (const action of actions) {
      if (await this.executeRecovery(applicationId, errorId, action)) {
        return true;
      }
    }
    return false;
  }

  getErrorRecord(errorId: string): ErrorRecord | undefined {
    const record = this.records.get(asErrorId(errorId));
    return record ? structuredClone(record) : undefined;
  }

  /** Newest first. */
  getErrorHistory(applicationId: string, limit = 10): ErrorRecord[] {
    const ids = this.byApplication.get(asApplicationId(applicationId)) ?? [];
    return ids
      .slice(-limit)
      .reverse()
      .flatMap((id) => {
        const record = this.records.get(id);
        return record ? [structuredClone(record)] : [];
      });
  }

  getErrorStatistics(applicationId?: string): ErrorStatistics {
    const records = applicationId
      ? (this.byApplication.get(asApplicationId(applicationId)) ?? []).flatMap(
          (id) => {
            const record = this.records.get(id);
            return record ? [record] : [];
          },
        )
      : [...this.records.values()];

    const stats: ErrorStatistics = {
      total: records.length,
      by_severity: { low: 0, medium: 0, high: 0, critical: 0 },
      by_category: {
        validation: 0,
        document_processing: 0,
        agent_failure: 0,
        communication: 0,
        security: 0,
        system: 0,
        integration: 0,
        data: 0,
        unknown: 0,
      },
      by_status: {
        detected: 0,
        recovery_planned: 0,
        recovery_in_progress: 0,
        recovery_successful: 0,
        recovery_failed: 0,
        recovery_error: 0,
      },
      recovery_success_rate: 0,
    };
    for (const record of records) {
      stats.by_severity[record.severity] += 1;
      stats.by_category[record.category] += 1;
      stats.by_status[record.status] += 1;
    }
    const finished =
      stats.by_status.recovery_successful + stats.by_status.recovery_failed;
    stats.recovery_success_rate =
      finished === 0 ? 0 : stats.by_status.recovery_successful / finished;
    return stats;
  }

  private requireRecord(applicationId: string, errorId: string): ErrorRecord {
    const record = this.records.get(asErrorId(errorId));
    if (!record || record.application_id !== applicationId) {
      throw new ValidationError(
        `Unknown error record ${errorId} for application ${applicationId}`,
      );
    }
    return record;
  }

  private boundedAction(
    record: ErrorRecord,
    action: RecoveryAction,
  ): RecoveryAction {
    if (action !== "retry") {
      return action;
    }
    const retries =
      (record.context.retry_count ?? 0) +
      record.recovery_attempts.filter((attempt) => attempt.action === "retry")
        .length;
    const maxRetries = record.context.max_retries ?? this.defaultMaxRetries;
    return retries >= maxRetries ? "fallback" : "retry";
  }

  private async perform(
    record: ErrorRecord,
    action: RecoveryAction,
  ): Promise<boolean> {
    const controller = record.context.session_id ? this.controller : undefined;

    switch (action) {
      case "ignore":
        return true;
      case "diagnostic":
        record.context.diagnostic = controller
          ? await controller.diagnose(record)
          : {
              application_state: this.stateMachine?.getState(
                record.application_id,
              ),
              prior_errors:
                (this.byApplication.get(record.application_id)?.length ?? 1) -
                1,
            };
        return false;
      case "suspend":
        if (controller) {
          return controller.suspend(record);
        }
        return (
          this.stateMachine?.transition(
            record.application_id,
            "suspended",
            `error ${record.error_id}`,
          ) ?? false
        );
      case "revert":
        if (controller) {
          return controller.revert(record);
        }
        return (
          this.stateMachine?.revert(
            record.application_id,
            `error ${record.error_id}`,
          ) ?? false
        );
      case "retry":
        return controller ? controller.retry(record) : false;
      case "fallback":
        return controller ? controller.fallback(record) : false;
      case "restart":
        return controller ? controller.restart(record) : false;
      case "alternate":
        return controller ? controller.alternate(record) : false;
      case "escalate":
        return controller ? controller.escalate(record) : false;
      default:
        return assertNever(action);
    }
  }
}
