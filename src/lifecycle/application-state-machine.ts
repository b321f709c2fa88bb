import type { AuditLogger } from "../audit/audit-logger";
import { ValidationError, describeError } from "../core/errors";
import {
  type ApplicationId,
  type ApplicationRecord,
  type ApplicationStage,
  type ApplicationState,
  asApplicationId,
} from "../core/types";
import type { ModuleLogger } from "../logging/logger";
import type { TaskRouter } from "./task-router";

export const TRANSITIONS: Readonly<
  Record<ApplicationState, readonly ApplicationState[]>
> = {
  initiated: ["document_collection"],
  document_collection: ["document_validation"],
  document_validation: ["document_collection", "document_analysis"],
  document_analysis: ["document_validation", "underwriting"],
  underwriting: ["compliance_check"],
  compliance_check: ["underwriting", "decision_pending"],
  decision_pending: [
    "approved",
    "conditionally_approved",
    "declined",
    "suspended",
  ],
  approved: ["completed"],
  conditionally_approved: ["completed"],
  declined: ["completed"],
  suspended: ["document_collection", "underwriting"],
  completed: [],
};

const STAGES: Record<ApplicationState, ApplicationStage> = {
  initiated: "application_intake",
  document_collection: "application_intake",
  document_validation: "document_processing",
  document_analysis: "document_processing",
  underwriting: "underwriting",
  compliance_check: "underwriting",
  decision_pending: "decision",
  approved: "post_decision",
  conditionally_approved: "post_decision",
  declined: "post_decision",
  suspended: "post_decision",
  completed: "post_decision",
};

export type DecisionOutcome =
  | "approved"
  | "conditionally_approved"
  | "declined"
  | "suspended";

export interface TaskOutcome {
  success: boolean;
  /** Only read for `decision` tasks. */
  decision?: DecisionOutcome;
}

export type StateHandler = (application: Readonly<ApplicationRecord>) => void;

export const canTransition = (
  from: ApplicationState,
  to: ApplicationState,
): boolean => TRANSITIONS[from].includes(to);

export const stageOf = (state: ApplicationState): ApplicationStage =>
  STAGES[state];

/**
 * State an agent's task outcome leads to, or undefined when the outcome
 * has no registered edge out of the task's state.
 */
export const nextStateForTask = (
  taskType: string,
  outcome: TaskOutcome,
): ApplicationState | undefined => {
  switch (taskType) {
    case "document_collection":
      return outcome.success ? "document_validation" : undefined;
    case "document_validation":
      return outcome.success ? "document_analysis" : "document_collection";
    case "document_analysis":
      return outcome.success ? "underwriting" : "document_validation";
    case "underwriting":
      return outcome.success ? "compliance_check" : undefined;
    case "compliance_check":
      return outcome.success ? "decision_pending" : "underwriting";
    case "decision":
      return outcome.decision ?? "suspended";
    default:
      return undefined;
  }
};

export interface ApplicationStateMachineOptions {
  audit: AuditLogger;
  logger: ModuleLogger;
  /** Routes the entered state's task to its agent; runs before `onEnter` handlers. */
  router?: TaskRouter;
  now?: () => Date;
}

/**
 * Per-application lifecycle over a fixed transition graph. Rejected
 * transitions are logged and reported as `false`; state is left as it was.
 */
export class ApplicationStateMachine {
  private readonly applications = new Map<ApplicationId, ApplicationRecord>();
  private readonly handlers = new Map<ApplicationState, StateHandler[]>();
  private readonly audit: AuditLogger;
  private readonly logger: ModuleLogger;
  private readonly router: TaskRouter | undefined;
  private readonly now: () => Date;

  constructor(options: ApplicationStateMachineOptions) {
    this.audit = options.audit;
    this.logger = options.logger;
    this.router = options.router;
    this.now = options.now ?? (() => new Date());
  }

  onEnter(state: ApplicationState, handler: StateHandler): void {
    this.handlers.set(state, [...(this.handlers.get(state) ?? []), handler]);
  }

  createApplication(
    applicationId: string,
    context: Record<string, unknown> = {},
  ): ApplicationRecord {
    const id = asApplicationId(applicationId);
    if (this.applications.has(id)) {
      throw new ValidationError(`Application already exists: ${applicationId}`);
    }

    const timestamp = this.now().toISOString();
    const record: ApplicationRecord = {
      application_id: id,
      state: "initiated",
      context: { ...context },
      history: [{ state: "initiated", timestamp, reason: "created" }],
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.applications.set(id, record);
    this.audit.logEvent({
      eventType: "application_submission",
      action: "application_created",
      resourceId: id,
      details: record.context,
    });
    this.logger.info(
      "application_created",
      { application: id },
      `Application ${id} created`,
    );
    this.enter(record);
    return structuredClone(record);
  }

  hasApplication(applicationId: string): boolean {
    return this.applications.has(asApplicationId(applicationId));
  }

  getApplication(applicationId: string): ApplicationRecord | undefined {
    const record = this.applications.get(asApplicationId(applicationId));
    return record ? structuredClone(record) : undefined;
  }

  getState(applicationId: string): ApplicationState | undefined {
    return this.applications.get(asApplicationId(applicationId))?.state;
  }

  getHistory(applicationId: string): ApplicationRecord["history"] {
    const record = this.applications.get(asApplicationId(applicationId));
    return record ? structuredClone(record.history) : [];
  }

  getStage(applicationId: string): ApplicationStage | undefined {
    const state = this.getState(applicationId);
    return state ? stageOf(state) : undefined;
  }

  listByState(state: ApplicationState): ApplicationId[] {
    return [...this.applications.values()]
      .filter((record) => record.state === state)
      .map((record) => record.application_id);
  }

  transition(
    applicationId: string,
    newState: ApplicationState,
    reason?: string,
  ): boolean {
    const record = this.applications.get(asApplicationId(applicationId));
    if (!record) {
      this.logger.warn(
        "transition_rejected",
        { application: applicationId, to: newState },
        `Unknown application ${applicationId}`,
      );
      return false;
    }

    const from = record.state;
    if (!canTransition(from, newState)) {
      this.logger.warn(
        "transition_rejected",
        { application: applicationId, from, to: newState },
        `Transition ${from} -> ${newState} is not allowed`,
      );
      return false;
    }

    const timestamp = this.now().toISOString();
    record.state = newState;
    record.updated_at = timestamp;
    record.history.push({
      state: newState,
      timestamp,
      ...(reason ? { reason } : {}),
    });
    this.audit.logStateTransition(
      record.application_id,
      from,
      newState,
      reason,
    );
    this.logger.info(
      "state_transition",
      { application: applicationId, from, to: newState },
      `${applicationId}: ${from} -> ${newState}`,
    );
    this.enter(record);
    return true;
  }

  /** Applies an agent's task outcome; returns the state entered, if any. */
  applyTaskResult(
    applicationId: string,
    taskType: string,
    outcome: TaskOutcome,
    details: Record<string, unknown> = {},
  ): ApplicationState | undefined {
    const record = this.applications.get(asApplicationId(applicationId));
    if (!record) {
      return undefined;
    }
    Object.assign(record.context, details);

    const next = nextStateForTask(taskType, outcome);
    if (!next) {
      this.logger.info(
        "task_result_unmapped",
        { application: applicationId, task: taskType, success: outcome.success },
        `No state change for ${taskType} outcome on ${applicationId}`,
      );
      return undefined;
    }
    if (taskType === "decision") {
      this.audit.logDecision(record.application_id, next, details);
    }
    const reason = `${taskType} ${outcome.success ? "succeeded" : "failed"}`;
    return this.transition(applicationId, next, reason) ? next : undefined;
  }

  /** Steps back to the previous state when the graph has that edge. */
  revert(applicationId: string, reason = "revert"): boolean {
    const history = this.getHistory(applicationId);
    const previous = history[history.length - 2];
    if (!previous) {
      return false;
    }
    return this.transition(applicationId, previous.state, reason);
  }

  private enter(record: ApplicationRecord): void {
    const snapshot = structuredClone(record);
    const router = this.router;
    const handlers: StateHandler[] = [
      ...(router ? [(entered: ApplicationRecord) => router.route(entered)] : []),
      ...(this.handlers.get(record.state) ?? []),
    ];
    for (const handler of handlers) {
      try {
        handler(snapshot);
      } catch (error) {
        this.logger.error(
          "state_handler_failed",
          { application: record.application_id, state: record.state },
          `Handler for ${record.state} failed: ${describeError(error).message}`,
        );
      }
    }
  }
}
