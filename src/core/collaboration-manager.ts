import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { nanoid } from "nanoid";
import type { AuditLogger } from "../audit/audit-logger";
import type { ApplicationStateMachine } from "../lifecycle/application-state-machine";
import type { ModuleLogger } from "../logging/logger";
import type {
  ErrorRecoveryManager,
  RecoveryController,
} from "../recovery/error-recovery-manager";
import type { AgentRegistry } from "./agent-registry";
import { type ConditionNode, evaluateCondition, parseCondition } from "./condition";
import {
  AgentTimeoutError,
  InvalidSessionStateError,
  MalformedStepResultError,
  StepFailedError,
  UnauthorizedInitiatorError,
  UnknownPatternError,
  UnknownSessionError,
  UnregisteredAgentError,
  ValidationError,
  describeError,
} from "./errors";
import type { MessageBus } from "./message-bus";
import { loadPatternDirectory, validatePattern } from "./pattern-definition";
import type { SessionStore } from "./session-store";
import { KeyedMutex } from "./keyed-lock";
import {
  type Agent,
  type AgentId,
  type CollaborationPattern,
  type ErrorPolicy,
  type ErrorRecord,
  type FallbackAction,
  type Message,
  type MessageId,
  type Priority,
  type SessionId,
  type SessionStatus,
  type SessionStatusSummary,
  type StepDefinition,
  type StepErrorContext,
  type StepExecution,
  type StepResult,
  type WorkflowSession,
  BUILTIN_FALLBACKS,
  TERMINAL_SESSION_STATUSES,
  asApplicationId,
  asSessionId,
  assertNever,
  isSafeId,
} from "./types";

const StepResultSchema = Type.Union([
  Type.Object({
    status: Type.Literal("success"),
    output: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
  Type.Object({
    status: Type.Literal("error"),
    error: Type.String(),
  }),
]);

export type ResumeAction = "continue" | "retry" | "abort" | "skip";

export const RESUME_ACTIONS: readonly ResumeAction[] = [
  "continue",
  "retry",
  "abort",
  "skip",
];

export type FallbackOutcome =
  | { action: "advance"; context?: Record<string, unknown> }
  | { action: "await_human" }
  | { action: "abort"; reason?: string };

export interface FallbackInput {
  session: Readonly<WorkflowSession>;
  step: StepDefinition;
  error: Readonly<ErrorRecord>;
}

export type FallbackHandler = (
  input: FallbackInput,
) => FallbackOutcome | Promise<FallbackOutcome>;

/** Denial-leaning defaults substituted when a risk step cannot finish. */
const CONSERVATIVE_ASSESSMENTS: Readonly<
  Record<string, Record<string, unknown>>
> = {
  underwriting_agent: {
    risk_assessment: "high",
    loan_terms: {
      approved: false,
      reason: "Conservative assessment due to error",
    },
  },
  compliance_agent: {
    compliance_results: "needs_review",
    compliance_issues: ["Automatic compliance check failed"],
  },
};

type ParkedStatus = Extract<
  SessionStatus,
  | "waiting_for_event"
  | "awaiting_confirmation"
  | "awaiting_orchestrator_instruction"
  | "awaiting_human_intervention"
>;

const AWAITING_INSTRUCTION: readonly SessionStatus[] = [
  "awaiting_orchestrator_instruction",
  "awaiting_human_intervention",
];

export interface SendOptions {
  sessionId?: string;
  inResponseTo?: MessageId;
  priority?: Priority;
}

export interface CollaborationManagerOptions {
  registry: AgentRegistry;
  bus: MessageBus;
  recovery: ErrorRecoveryManager;
  audit: AuditLogger;
  logger: ModuleLogger;
  store?: SessionStore;
  stateMachine?: ApplicationStateMachine;
  orchestratorAgentId?: string;
  defaultTimeoutSeconds?: number;
  defaultMaxRetries?: number;
  defaultFallback?: FallbackAction;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Drives sessions through collaboration patterns. Every public operation
 * on a session runs under that session's lock, so at most one step per
 * session is in flight; different sessions proceed independently.
 *
 * Step failures never escape: they become error records and are handed
 * to the recovery manager, which calls back through the controller this
 * engine attaches.
 */
export class CollaborationManager {
  private readonly patterns = new Map<string, CollaborationPattern>();
  private readonly conditions = new Map<string, ConditionNode>();
  private readonly active = new Map<SessionId, WorkflowSession>();
  private readonly finished = new Map<SessionId, WorkflowSession>();
  private readonly fallbacks = new Map<string, FallbackHandler>();
  private readonly lock = new KeyedMutex();

  private readonly registry: AgentRegistry;
  private readonly bus: MessageBus;
  private readonly recovery: ErrorRecoveryManager;
  private readonly audit: AuditLogger;
  private readonly logger: ModuleLogger;
  private readonly store: SessionStore | undefined;
  private readonly stateMachine: ApplicationStateMachine | undefined;
  private readonly orchestratorAgentId: string;
  private readonly defaultTimeoutSeconds: number;
  private readonly defaultMaxRetries: number;
  private readonly defaultFallback: FallbackAction;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: CollaborationManagerOptions) {
    this.registry = options.registry;
    this.bus = options.bus;
    this.recovery = options.recovery;
    this.audit = options.audit;
    this.logger = options.logger;
    this.store = options.store;
    this.stateMachine = options.stateMachine;
    this.orchestratorAgentId = options.orchestratorAgentId ?? "orchestrator";
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? 60;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 1;
    this.defaultFallback = options.defaultFallback ?? "abort_workflow";
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => nanoid(8));
    this.recovery.attachController(this.createRecoveryController());
  }

  // --- Patterns, agents, fallbacks ---

  /** Validates and freezes a pattern; a later pattern replaces one of the same name. */
  registerPattern(candidate: unknown): CollaborationPattern {
    const pattern = validatePattern(candidate);
    if (!isSafeId(pattern.name)) {
      throw new ValidationError(
        `Pattern name may only use letters, digits and _.:-: ${pattern.name}`,
      );
    }
    for (const step of pattern.steps) {
      const key = conditionKey(pattern.name, step.name);
      if (step.condition) {
        this.conditions.set(key, parseCondition(step.condition));
      } else {
        this.conditions.delete(key);
      }
    }
    if (this.patterns.has(pattern.name)) {
      this.logger.info(
        "pattern_replaced",
        { pattern: pattern.name },
        `Pattern ${pattern.name} replaced`,
      );
    }
    this.patterns.set(pattern.name, pattern);
    return pattern;
  }

  async loadPatterns(directories: readonly string[]): Promise<number> {
    let loaded = 0;
    for (const directory of directories) {
      for (const pattern of await loadPatternDirectory(directory)) {
        this.registerPattern(pattern);
        loaded += 1;
      }
    }
    this.logger.info(
      "patterns_loaded",
      { count: loaded },
      `Loaded ${loaded} collaboration pattern(s)`,
    );
    return loaded;
  }

  getPattern(name: string): CollaborationPattern | undefined {
    return this.patterns.get(name);
  }

  listPatterns(): CollaborationPattern[] {
    return [...this.patterns.values()];
  }

  registerAgent(agentId: string, agent: Agent): AgentId {
    const id = this.registry.register(agentId, agent);
    this.audit.logAgentAction(id, "agent_registered", {
      details: { capabilities: [...agent.getCapabilities()] },
    });
    this.logger.info("agent_registered", { agent: id }, `Agent ${id} registered`);
    return id;
  }

  registerFallback(name: string, handler: FallbackHandler): void {
    if (BUILTIN_FALLBACKS.some((builtin) => builtin === name)) {
      throw new ValidationError(`Cannot override built-in fallback ${name}`);
    }
    this.fallbacks.set(name, handler);
  }

  // --- Session operations ---

  async createSession(
    patternName: string,
    initialContext: Record<string, unknown>,
    initiator: string,
  ): Promise<SessionId> {
    const pattern = this.patterns.get(patternName);
    if (!pattern) {
      this.audit.logSecurityEvent(
        "unknown_pattern",
        { pattern: patternName, initiator },
        { success: false },
      );
      throw new UnknownPatternError(patternName);
    }
    if (pattern.initiator !== initiator) {
      this.audit.logSecurityEvent(
        "unauthorized_initiator",
        { pattern: patternName, initiator },
        { success: false },
      );
      throw new UnauthorizedInitiatorError(patternName, initiator);
    }

    const sessionId = asSessionId(`${patternName}-${this.generateId()}`);
    const applicationId = initialContext.application_id ?? sessionId;
    if (typeof applicationId !== "string" || !isSafeId(applicationId)) {
      throw new ValidationError(
        "application_id must be a string of letters, digits and _.:-",
      );
    }

    const timestamp = this.timestamp();
    const session: WorkflowSession = {
      session_id: sessionId,
      pattern_name: patternName,
      application_id: asApplicationId(applicationId),
      initiator,
      status: "initialized",
      current_step_index: 0,
      context: structuredClone(initialContext),
      initial_context: structuredClone(initialContext),
      steps_completed: [],
      steps_failed: [],
      messages: [],
      decisions: [],
      errors: [],
      checkpoints: [],
      retry_counts: {},
      execution_seq: 0,
      started_at: timestamp,
      updated_at: timestamp,
    };
    this.active.set(sessionId, session);
    this.persist(session);
    this.audit.logEvent({
      eventType: "workflow_event",
      action: "session_created",
      userId: initiator,
      resourceId: session.application_id,
      details: { session_id: sessionId, pattern: patternName },
    });
    this.logger.info(
      "session_created",
      { session: sessionId, pattern: patternName, initiator },
      `Session ${sessionId} created for ${patternName}`,
    );

    await this.lock.runExclusive(sessionId, () =>
      this.executeNextStep(session),
    );
    return sessionId;
  }

  async confirmStep(
    sessionId: string,
    confirmed: boolean,
  ): Promise<SessionStatus> {
    return this.withActiveSession(sessionId, async (session) => {
      if (session.status !== "awaiting_confirmation") {
        throw new InvalidSessionStateError(
          sessionId,
          session.status,
          "confirm a step of",
        );
      }
      const step = this.currentStep(session);
      this.audit.logEvent({
        eventType: "workflow_event",
        action: confirmed ? "step_confirmed" : "step_rejected",
        resourceId: session.application_id,
        details: { session_id: session.session_id, step: step?.name },
      });

      if (confirmed || !step) {
        await this.advance(session);
        return session.status;
      }
      await this.handleStepFailure(
        session,
        step,
        undefined,
        new ValidationError(`Step ${step.name} was not confirmed`),
      );
      return session.status;
    });
  }

  async resume(
    sessionId: string,
    action: ResumeAction,
    data?: Record<string, unknown>,
  ): Promise<SessionStatus> {
    return this.withActiveSession(sessionId, async (session) => {
      if (!AWAITING_INSTRUCTION.includes(session.status)) {
        throw new InvalidSessionStateError(sessionId, session.status, "resume");
      }
      if (data) {
        Object.assign(session.context, data);
      }
      this.audit.logEvent({
        eventType: "workflow_event",
        action: `resume_${action}`,
        resourceId: session.application_id,
        details: { session_id: session.session_id },
      });
      this.logger.info(
        "session_resumed",
        { session: session.session_id, action },
        `Session ${session.session_id} resumed with ${action}`,
      );

      const step = this.currentStep(session);
      switch (action) {
        case "continue":
          await this.advance(session);
          break;
        case "retry":
          if (step) {
            session.status = "retrying_step";
            await this.runStep(session, step, step.agent);
          } else {
            await this.executeNextStep(session);
          }
          break;
        case "abort":
          this.abort(session, "aborted by instruction");
          break;
        case "skip":
          if (step) {
            this.recordSkipped(session, step, "skipped by instruction");
          }
          await this.advance(session);
          break;
        default:
          assertNever(action);
      }
      return session.status;
    });
  }

  /** Resumes every session waiting on `eventType`; returns their ids. */
  async handleEvent(
    eventType: string,
    eventData: Record<string, unknown> = {},
  ): Promise<SessionId[]> {
    const waiting = [...this.active.values()].filter(
      (session) =>
        session.status === "waiting_for_event" &&
        this.currentStep(session)?.triggerEvent === eventType,
    );

    const resumed = await Promise.all(
      waiting.map((candidate) =>
        this.lock.runExclusive(candidate.session_id, async () => {
          const session = this.active.get(candidate.session_id);
          const step = session ? this.currentStep(session) : undefined;
          if (
            !session ||
            !step ||
            session.status !== "waiting_for_event" ||
            step.triggerEvent !== eventType
          ) {
            return [];
          }
          Object.assign(session.context, eventData);
          this.logger.info(
            "event_received",
            { session: session.session_id, event: eventType },
            `Event ${eventType} resumed ${session.session_id}`,
          );
          await this.runStep(session, step, step.agent);
          return [session.session_id];
        }),
      ),
    );
    return resumed.flat();
  }

  sendMessage(
    sender: string,
    recipient: string,
    type: string,
    content: Record<string, unknown>,
    options: SendOptions = {},
  ): MessageId {
    const session = options.sessionId
      ? this.active.get(asSessionId(options.sessionId))
      : undefined;
    if (options.sessionId && !session) {
      throw new UnknownSessionError(options.sessionId);
    }

    const message = this.bus.send({
      sender,
      recipient,
      type,
      content,
      ...(session ? { sessionId: session.session_id } : {}),
      ...(options.inResponseTo ? { inResponseTo: options.inResponseTo } : {}),
      ...(options.priority ? { priority: options.priority } : {}),
    });
    if (session) {
      this.recordMessage(session, message);
    }
    return message.id;
  }

  // --- Queries ---

  getSession(sessionId: string): WorkflowSession | undefined {
    const session = this.lookup(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  getSessionStatus(sessionId: string): SessionStatusSummary | undefined {
    const session = this.lookup(sessionId);
    if (!session) {
      return undefined;
    }
    const total = this.patterns.get(session.pattern_name)?.steps.length ?? 0;
    const current = TERMINAL_SESSION_STATUSES.includes(session.status)
      ? undefined
      : this.currentStep(session);
    return {
      session_id: session.session_id,
      pattern_name: session.pattern_name,
      status: session.status,
      started_at: session.started_at,
      progress: `${session.steps_completed.length}/${total}`,
      errors: session.errors.length,
      error_messages: session.messages.filter((m) => m.type === "error").length,
      message_count: session.messages.length,
      ...(session.ended_at ? { ended_at: session.ended_at } : {}),
      ...(current ? { current_step: current.name } : {}),
    };
  }

  listActiveSessions(): WorkflowSession[] {
    return [...this.active.values()].map((session) => structuredClone(session));
  }

  listCompletedSessions(): WorkflowSession[] {
    return [...this.finished.values()].map((session) =>
      structuredClone(session),
    );
  }

  /**
   * Reloads persisted sessions. A session saved mid-step cannot be
   * continued safely and is parked for a human.
   */
  restoreSessions(): number {
    if (!this.store) {
      return 0;
    }
    let restored = 0;
    for (const session of this.store.list()) {
      if (!this.patterns.has(session.pattern_name)) {
        this.logger.warn(
          "session_restore_skipped",
          { session: session.session_id, pattern: session.pattern_name },
          `Pattern ${session.pattern_name} is not registered`,
        );
        continue;
      }
      if (TERMINAL_SESSION_STATUSES.includes(session.status)) {
        this.finished.set(session.session_id, session);
      } else {
        if (
          session.status === "step_in_progress" ||
          session.status === "retrying_step" ||
          session.status === "initialized"
        ) {
          delete session.current_execution;
          this.park(session, "awaiting_human_intervention", "restored mid-step");
        }
        this.active.set(session.session_id, session);
      }
      restored += 1;
    }
    return restored;
  }

  // --- Step execution ---

  private async executeNextStep(session: WorkflowSession): Promise<void> {
    if (this.isTerminal(session)) {
      return;
    }
    const pattern = this.patternOf(session);
    const step = pattern.steps[session.current_step_index];
    if (!step) {
      this.complete(session);
      return;
    }

    const condition = this.conditions.get(conditionKey(pattern.name, step.name));
    if (!step.required && condition && !evaluateCondition(condition, session.context)) {
      this.logger.info(
        "step_skipped",
        { session: session.session_id, step: step.name },
        `Condition for ${step.name} not met; skipping`,
      );
      session.current_step_index += 1;
      this.persist(session);
      return this.executeNextStep(session);
    }

    if (step.eventTriggered) {
      this.park(session, "waiting_for_event", step.triggerEvent ?? "event");
      this.logger.info(
        "waiting_for_event",
        {
          session: session.session_id,
          step: step.name,
          event: step.triggerEvent,
        },
        `${step.name} waits for ${step.triggerEvent ?? "an event"}`,
      );
      return;
    }

    await this.runStep(session, step, step.agent);
  }

  private async runStep(
    session: WorkflowSession,
    step: StepDefinition,
    agentId: string,
  ): Promise<void> {
    if (this.isTerminal(session)) {
      return;
    }
    const index = session.current_step_index;
    const agent = this.registry.get(agentId);
    if (!agent) {
      const error = new UnregisteredAgentError(agentId);
      const record = this.recovery.handleError(
        session.application_id,
        error,
        this.errorContext(session, step, agentId),
      );
      session.errors.push(record.error_id);
      this.abort(session, error.message);
      throw error;
    }

    if (!session.checkpoints.some((entry) => entry.step_index === index)) {
      session.checkpoints.push({
        step_index: index,
        context: structuredClone(session.context),
      });
    }

    const inputs: Record<string, unknown> = {};
    for (const key of step.inputs ?? []) {
      if (Object.hasOwn(session.context, key)) {
        inputs[key] = session.context[key];
      } else {
        this.logger.warn(
          "missing_input",
          { session: session.session_id, step: step.name, key },
          `Input ${key} missing for ${step.name}`,
        );
      }
    }

    session.execution_seq += 1;
    const timeoutSeconds = step.timeoutSeconds ?? this.defaultTimeoutSeconds;
    const execution: StepExecution = {
      execution_id: `${session.session_id}-${session.execution_seq}`,
      step_name: step.name,
      step_index: index,
      agent: agentId,
      inputs,
      started_at: this.timestamp(),
      timeout_seconds: timeoutSeconds,
      status: "in_progress",
      attempt: (session.retry_counts[step.name] ?? 0) + 1,
    };
    session.current_execution = execution;
    session.status = "step_in_progress";
    this.persist(session);
    this.logger.info(
      "step_started",
      {
        session: session.session_id,
        step: step.name,
        agent: agentId,
        execution: execution.execution_id,
      },
      `Executing ${step.name} with ${agentId}`,
    );

    let result: StepResult;
    try {
      result = await this.invokeAgent(agent, agentId, step, inputs, timeoutSeconds);
    } catch (error) {
      return this.handleStepFailure(session, step, execution, error);
    }
    if (result.status === "error") {
      return this.handleStepFailure(
        session,
        step,
        execution,
        new StepFailedError(step.name, result.error),
      );
    }
    return this.handleStepSuccess(session, step, execution, result.output ?? {});
  }

  private async invokeAgent(
    agent: Agent,
    agentId: string,
    step: StepDefinition,
    inputs: Record<string, unknown>,
    timeoutSeconds: number,
  ): Promise<StepResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new AgentTimeoutError(agentId, step.name, timeoutSeconds));
        controller.abort();
      }, timeoutSeconds * 1000);
    });

    try {
      const raw: unknown = await Promise.race([
        agent.executeStep(step.name, { ...inputs }, { signal: controller.signal }),
        timeout,
      ]);
      if (!Value.Check(StepResultSchema, raw)) {
        throw new MalformedStepResultError(agentId, step.name);
      }
      return raw;
    } finally {
      clearTimeout(timer);
    }
  }

  private async handleStepSuccess(
    session: WorkflowSession,
    step: StepDefinition,
    execution: StepExecution,
    output: Record<string, unknown>,
  ): Promise<void> {
    for (const key of step.outputs ?? []) {
      if (Object.hasOwn(output, key)) {
        session.context[key] = output[key];
      }
    }
    execution.status = "completed";
    execution.ended_at = this.timestamp();
    execution.output = output;
    session.steps_completed.push(execution);
    delete session.current_execution;

    this.audit.logAgentAction(execution.agent, "step_completed", {
      resourceId: session.application_id,
      details: {
        session_id: session.session_id,
        step: step.name,
        execution_id: execution.execution_id,
      },
    });
    this.logger.info(
      "step_completed",
      { session: session.session_id, step: step.name },
      `${step.name} completed`,
    );

    if (step.requiresConfirmation) {
      this.park(session, "awaiting_confirmation", `${step.name} completed`);
      return;
    }
    await this.advance(session);
  }

  private async handleStepFailure(
    session: WorkflowSession,
    step: StepDefinition,
    execution: StepExecution | undefined,
    error: unknown,
  ): Promise<void> {
    const described = describeError(error);
    if (execution) {
      execution.status = "failed";
      execution.ended_at = this.timestamp();
      execution.error = described.message;
      session.steps_failed.push(execution);
      delete session.current_execution;
    }
    this.persist(session);

    const agentId = execution?.agent ?? step.agent;
    this.audit.logAgentAction(agentId, "step_failed", {
      resourceId: session.application_id,
      success: false,
      details: {
        session_id: session.session_id,
        step: step.name,
        error: described.message,
      },
    });
    this.logger.warn(
      "step_failed",
      { session: session.session_id, step: step.name, agent: agentId },
      `${step.name} failed: ${described.message}`,
    );

    const policy = this.policyFor(session, step);
    const record = this.recovery.handleError(
      session.application_id,
      error,
      this.errorContext(session, step, agentId),
    );
    session.errors.push(record.error_id);
    this.persist(session);

    const recovered = await this.recovery.recover(
      session.application_id,
      record.error_id,
      policy,
    );
    if (!recovered && !this.isTerminal(session)) {
      this.abort(session, `recovery exhausted for ${step.name}`);
    }
  }

  // --- Recovery actions ---

  private createRecoveryController(): RecoveryController {
    return {
      retry: (record) =>
        this.onSessionStep(record, async (session, step) => {
          if (!this.consumeBudget(session, step)) {
            this.logger.info(
              "retry_budget_spent",
              { session: session.session_id, step: step.name },
              `No retries left for ${step.name}; applying fallback`,
            );
            return this.applyFallback(session, step, record);
          }
          session.status = "retrying_step";
          this.persist(session);
          await this.runStep(session, step, step.agent);
          return true;
        }),
      fallback: (record) =>
        this.onSessionStep(record, (session, step) =>
          this.applyFallback(session, step, record),
        ),
      revert: (record) =>
        this.onSessionStep(record, (session, step) =>
          this.revertToCheckpoint(session, step),
        ),
      restart: (record) =>
        this.onSessionStep(record, async (session, step) => {
          if (!this.consumeBudget(session, step)) {
            return false;
          }
          session.context = structuredClone(session.initial_context);
          session.current_step_index = 0;
          session.checkpoints = [];
          this.persist(session);
          await this.executeNextStep(session);
          return true;
        }),
      alternate: (record) =>
        this.onSessionStep(record, async (session, step) => {
          const failedAgent = record.context.agent_id ?? step.agent;
          const [alternate] = this.registry.findAlternates(step.name, failedAgent);
          if (!alternate || !this.consumeBudget(session, step)) {
            return false;
          }
          this.logger.info(
            "alternate_agent",
            { session: session.session_id, step: step.name, agent: alternate },
            `Re-running ${step.name} with ${alternate}`,
          );
          await this.runStep(session, step, alternate);
          return true;
        }),
      escalate: (record) =>
        this.onSessionStep(record, async (session, step) =>
          this.escalate(session, step, record),
        ),
      suspend: (record) =>
        this.onSessionStep(record, async (session) => {
          if (this.stateMachine?.hasApplication(session.application_id)) {
            this.stateMachine.transition(
              session.application_id,
              "suspended",
              `error ${record.error_id}`,
            );
          }
          this.park(
            session,
            "awaiting_human_intervention",
            `suspended after ${record.error_id}`,
          );
          return true;
        }),
      diagnose: async (record) => {
        const session = this.sessionOf(record);
        const agentId = record.context.agent_id ?? "";
        const agent = this.registry.get(agentId);
        return {
          agent_id: agentId,
          agent_registered: agent !== undefined,
          capabilities: agent ? [...agent.getCapabilities()] : [],
          step_failures: session
            ? session.steps_failed.filter(
                (entry) => entry.step_name === record.context.step_name,
              ).length
            : 0,
          session_status: session?.status,
        };
      },
    };
  }

  /**
   * Runs a recovery action against the session step an error record
   * describes. Records for a step the session has moved past are stale,
   * and nothing runs while an execution of the step is still in flight.
   */
  private async onSessionStep(
    record: ErrorRecord,
    action: (session: WorkflowSession, step: StepDefinition) => Promise<boolean>,
  ): Promise<boolean> {
    const session = this.sessionOf(record);
    if (!session) {
      return false;
    }
    return this.lock.runExclusive(session.session_id, async () => {
      const step = this.currentStep(session);
      if (
        this.isTerminal(session) ||
        !step ||
        session.current_execution !== undefined ||
        record.context.step_index !== session.current_step_index
      ) {
        return false;
      }
      return action(session, step);
    });
  }

  private async applyFallback(
    session: WorkflowSession,
    step: StepDefinition,
    record: ErrorRecord,
  ): Promise<boolean> {
    const fallback = record.context.fallback ?? this.defaultFallback;
    this.logger.info(
      "fallback_applied",
      { session: session.session_id, step: step.name, fallback },
      `Applying ${fallback} for ${step.name}`,
    );

    switch (fallback) {
      case "abort_workflow":
        this.abort(session, `fallback after ${record.error_id}`);
        return true;
      case "skip_step":
        this.recordSkipped(session, step, `fallback after ${record.error_id}`);
        await this.advance(session);
        return true;
      case "manual_intervention":
        this.park(
          session,
          "awaiting_human_intervention",
          `fallback after ${record.error_id}`,
        );
        return true;
      case "conservative_assessment":
        Object.assign(
          session.context,
          structuredClone(CONSERVATIVE_ASSESSMENTS[step.agent] ?? {}),
        );
        await this.advance(session);
        return true;
    }

    const handler = this.fallbacks.get(fallback);
    if (!handler) {
      this.logger.warn(
        "fallback_unknown",
        { session: session.session_id, fallback },
        `No fallback registered as ${fallback}`,
      );
      return false;
    }
    const outcome = await handler({
      session: structuredClone(session),
      step,
      error: structuredClone(record),
    });
    switch (outcome.action) {
      case "advance":
        Object.assign(session.context, outcome.context ?? {});
        await this.advance(session);
        return true;
      case "await_human":
        this.park(
          session,
          "awaiting_human_intervention",
          `fallback ${fallback}`,
        );
        return true;
      case "abort":
        this.abort(session, outcome.reason ?? `fallback ${fallback}`);
        return true;
      default:
        return assertNever(outcome);
    }
  }

  private async revertToCheckpoint(
    session: WorkflowSession,
    step: StepDefinition,
  ): Promise<boolean> {
    const index = session.current_step_index;
    const target =
      [...session.checkpoints]
        .reverse()
        .find((entry) => entry.step_index < index) ??
      session.checkpoints.find((entry) => entry.step_index === index);
    if (!target || !this.consumeBudget(session, step)) {
      return false;
    }

    session.context = structuredClone(target.context);
    session.current_step_index = target.step_index;
    session.checkpoints = session.checkpoints.filter(
      (entry) => entry.step_index < target.step_index,
    );
    this.persist(session);
    this.logger.info(
      "session_reverted",
      { session: session.session_id, step_index: target.step_index },
      `Reverted ${session.session_id} to step ${target.step_index}`,
    );
    await this.executeNextStep(session);
    return true;
  }

  private async escalate(
    session: WorkflowSession,
    step: StepDefinition,
    record: ErrorRecord,
  ): Promise<boolean> {
    if (record.context.escalate_to === "human") {
      this.park(
        session,
        "awaiting_human_intervention",
        `escalated ${record.error_id}`,
      );
      this.logger.warn(
        "escalated_to_human",
        { session: session.session_id, step: step.name },
        `${step.name} needs human intervention`,
      );
      return true;
    }

    const message = this.bus.notify({
      recipient: this.orchestratorAgentId,
      type: "error",
      priority: "high",
      sessionId: session.session_id,
      content: {
        session_id: session.session_id,
        step_name: step.name,
        error_id: record.error_id,
        error: record.error_message,
        context: structuredClone(session.context),
      },
    });
    this.recordMessage(session, message);
    this.park(
      session,
      "awaiting_orchestrator_instruction",
      `escalated ${record.error_id}`,
    );
    return true;
  }

  // --- Helpers ---

  private async withActiveSession<T>(
    sessionId: string,
    task: (session: WorkflowSession) => Promise<T>,
  ): Promise<T> {
    const id = asSessionId(sessionId);
    return this.lock.runExclusive(id, async () => {
      const session = this.active.get(id);
      if (!session) {
        const done = this.finished.get(id);
        if (done) {
          throw new InvalidSessionStateError(sessionId, done.status, "modify");
        }
        throw new UnknownSessionError(sessionId);
      }
      return task(session);
    });
  }

  /** Moves a session into a status that waits on an outside call. */
  private park(
    session: WorkflowSession,
    status: ParkedStatus,
    reason: string,
  ): void {
    session.status = status;
    this.persist(session);
    this.audit.logEvent({
      eventType: "workflow_event",
      action: "status_changed",
      resourceId: session.application_id,
      details: {
        session_id: session.session_id,
        status,
        step: this.currentStep(session)?.name,
        reason,
      },
    });
  }

  private async advance(session: WorkflowSession): Promise<void> {
    session.current_step_index += 1;
    this.persist(session);
    await this.executeNextStep(session);
  }

  private recordSkipped(
    session: WorkflowSession,
    step: StepDefinition,
    reason: string,
  ): void {
    session.execution_seq += 1;
    const timestamp = this.timestamp();
    session.steps_completed.push({
      execution_id: `${session.session_id}-${session.execution_seq}`,
      step_name: step.name,
      step_index: session.current_step_index,
      agent: step.agent,
      inputs: {},
      started_at: timestamp,
      ended_at: timestamp,
      timeout_seconds: 0,
      status: "skipped",
      attempt: 0,
      error: reason,
    });
  }

  private recordMessage(session: WorkflowSession, message: Message): void {
    session.messages.push(message);
    switch (message.type) {
      case "decision":
        session.decisions.push({
          message_id: message.id,
          agent: message.sender,
          timestamp: message.timestamp,
          content: message.content,
        });
        this.audit.logDecision(
          session.application_id,
          "decision_recorded",
          { session_id: session.session_id, ...message.content },
          message.sender,
        );
        break;
      case "error":
        this.logger.warn(
          "error_message",
          { session: session.session_id, from: message.sender },
          `Error message ${message.id} in ${session.session_id}`,
        );
        break;
      case "request":
      case "response":
      case "notification":
        break;
      default:
        assertNever(message.type);
    }
    this.persist(session);
  }

  private consumeBudget(session: WorkflowSession, step: StepDefinition): boolean {
    const used = session.retry_counts[step.name] ?? 0;
    const budget = this.policyFor(session, step)?.maxRetries ?? this.defaultMaxRetries;
    if (used >= budget) {
      return false;
    }
    session.retry_counts[step.name] = used + 1;
    return true;
  }

  private errorContext(
    session: WorkflowSession,
    step: StepDefinition,
    agentId: string,
  ): StepErrorContext {
    const policy = this.policyFor(session, step);
    return {
      session_id: session.session_id,
      pattern_name: session.pattern_name,
      step_name: step.name,
      step_index: session.current_step_index,
      agent_id: agentId,
      retry_count: session.retry_counts[step.name] ?? 0,
      max_retries: policy?.maxRetries ?? this.defaultMaxRetries,
      fallback: policy?.fallback ?? this.defaultFallback,
      escalate_to: policy?.onError === "notify_human" ? "human" : "orchestrator",
    };
  }

  private abort(session: WorkflowSession, reason: string): void {
    if (session.current_execution) {
      session.current_execution.status = "failed";
      session.current_execution.ended_at = this.timestamp();
      session.steps_failed.push(session.current_execution);
      delete session.current_execution;
    }
    this.finish(session, "aborted", reason);
  }

  private complete(session: WorkflowSession): void {
    this.finish(session, "completed", "all steps finished");
  }

  private finish(
    session: WorkflowSession,
    status: "aborted" | "completed",
    reason: string,
  ): void {
    session.status = status;
    session.ended_at = this.timestamp();
    this.active.delete(session.session_id);
    this.finished.set(session.session_id, session);
    this.persist(session);
    this.audit.logEvent({
      eventType: "workflow_event",
      action: status === "completed" ? "session_completed" : "session_aborted",
      resourceId: session.application_id,
      success: status === "completed",
      details: { session_id: session.session_id, reason },
    });
    const message = `Session ${session.session_id} ${status}: ${reason}`;
    if (status === "completed") {
      this.logger.info("session_completed", { session: session.session_id }, message);
    } else {
      this.logger.warn("session_aborted", { session: session.session_id }, message);
    }
  }

  private sessionOf(record: ErrorRecord): WorkflowSession | undefined {
    const sessionId = record.context.session_id;
    return sessionId ? this.active.get(sessionId) : undefined;
  }

  private lookup(sessionId: string): WorkflowSession | undefined {
    const id = asSessionId(sessionId);
    return this.active.get(id) ?? this.finished.get(id);
  }

  private patternOf(session: WorkflowSession): CollaborationPattern {
    const pattern = this.patterns.get(session.pattern_name);
    if (!pattern) {
      throw new UnknownPatternError(session.pattern_name);
    }
    return pattern;
  }

  private currentStep(session: WorkflowSession): StepDefinition | undefined {
    return this.patterns.get(session.pattern_name)?.steps[
      session.current_step_index
    ];
  }

  private policyFor(
    session: WorkflowSession,
    step: StepDefinition,
  ): ErrorPolicy | undefined {
    return this.patterns.get(session.pattern_name)?.errorHandling?.[step.name];
  }

  private isTerminal(session: WorkflowSession): boolean {
    return TERMINAL_SESSION_STATUSES.includes(session.status);
  }

  private persist(session: WorkflowSession): void {
    session.updated_at = this.timestamp();
    this.store?.save(session);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

const conditionKey = (pattern: string, step: string): string =>
  `${pattern}/${step}`;
