import path from "node:path";
import { OrchestratorAgent } from "../agents/orchestrator-agent";
import { AuditLogger } from "../audit/audit-logger";
import { FileSegmentStore, type SegmentStore } from "../audit/segment-store";
import { AgentRegistry } from "../core/agent-registry";
import { CollaborationManager } from "../core/collaboration-manager";
import { MessageBus } from "../core/message-bus";
import {
  FileSessionStore,
  MemorySessionStore,
  type SessionStore,
} from "../core/session-store";
import type { Agent } from "../core/types";
import { ApplicationStateMachine } from "../lifecycle/application-state-machine";
import { TaskRouter } from "../lifecycle/task-router";
import { type Logger, createLogger } from "../logging/logger";
import { type ReportSection, buildReportLines } from "../observability/report";
import { BUILTIN_PATTERNS } from "../patterns";
import { type ProjectConfig, loadProjectConfig } from "../project/config";
import { ErrorRecoveryManager } from "../recovery/error-recovery-manager";
import {
  MaintenanceScheduler,
  auditIntegrityCheck,
  auditRetentionCheck,
} from "./maintenance-scheduler";

export interface LendingRuntimeOptions {
  /** Project root; relative config paths resolve against it. */
  cwd?: string;
  /** Skips reading `.lending/project.*` when given. */
  config?: ProjectConfig;
  logger?: Logger;
  segmentStore?: SegmentStore;
  sessionStore?: SessionStore;
  orchestrator?: Agent;
  /** Interval for audit verification and retention; 0 disables it. */
  maintenanceIntervalMs?: number;
  now?: () => Date;
}

export interface LendingRuntime {
  config: ProjectConfig;
  logger: Logger;
  registry: AgentRegistry;
  bus: MessageBus;
  audit: AuditLogger;
  router: TaskRouter;
  stateMachine: ApplicationStateMachine;
  recovery: ErrorRecoveryManager;
  manager: CollaborationManager;
  orchestrator: Agent;
  maintenance: MaintenanceScheduler;
  report(section?: ReportSection, page?: number, pageSize?: number): string[];
  /** Stops maintenance and waits for queued message deliveries. */
  shutdown(): Promise<void>;
}

/**
 * Builds every component with explicit wiring, registers the built-in
 * and project patterns plus the orchestrator, and reloads persisted
 * sessions.
 */
export const createLendingRuntime = async (
  options: LendingRuntimeOptions = {},
): Promise<LendingRuntime> => {
  const cwd = options.cwd ?? process.cwd();
  const config = options.config ?? (await loadProjectConfig(cwd));
  const now = options.now ?? (() => new Date());
  const resolve = (target: string): string => path.resolve(cwd, target);

  const logger =
    options.logger ??
    createLogger({
      ...(config.logDir ? { logDir: resolve(config.logDir) } : {}),
      fileLevel: config.logLevel,
      consoleLevel: config.consoleLevel,
      now,
    });

  const segmentStore =
    options.segmentStore ?? new FileSegmentStore(resolve(config.auditDir));
  const sessionStore =
    options.sessionStore ??
    (config.stateDir
      ? new FileSessionStore(resolve(config.stateDir), logger.engine)
      : new MemorySessionStore());

  const registry = new AgentRegistry();
  const audit = new AuditLogger(segmentStore, logger.audit, config.audit, now);
  const bus = new MessageBus(registry, logger.messages, {
    allowedTypes: config.messageTypes,
    audit,
    now,
  });
  const router = new TaskRouter(bus, logger.lifecycle, config.taskRoutes);
  const stateMachine = new ApplicationStateMachine({
    audit,
    logger: logger.lifecycle,
    router,
    now,
  });
  const recovery = new ErrorRecoveryManager({
    audit,
    logger: logger.recovery,
    stateMachine,
    defaultMaxRetries: config.defaultMaxRetries,
    now,
  });
  const manager = new CollaborationManager({
    registry,
    bus,
    recovery,
    audit,
    logger: logger.engine,
    store: sessionStore,
    stateMachine,
    orchestratorAgentId: config.orchestratorAgentId,
    defaultTimeoutSeconds: config.defaultTimeoutSeconds,
    defaultMaxRetries: config.defaultMaxRetries,
    defaultFallback: config.defaultFallback,
    now,
  });

  for (const pattern of BUILTIN_PATTERNS) {
    manager.registerPattern(pattern);
  }
  await manager.loadPatterns(config.patternDirs.map(resolve));

  const orchestrator = options.orchestrator ?? new OrchestratorAgent();
  manager.registerAgent(config.orchestratorAgentId, orchestrator);
  const restored = manager.restoreSessions();

  const maintenance = new MaintenanceScheduler({
    intervalMs: options.maintenanceIntervalMs ?? 0,
    checks: [auditIntegrityCheck(audit), auditRetentionCheck(audit)],
    logger: logger.runtime,
    now,
  });
  if ((options.maintenanceIntervalMs ?? 0) > 0) {
    maintenance.start();
  }

  logger.runtime.info(
    "runtime_started",
    {
      patterns: manager.listPatterns().length,
      restored,
      orchestrator: config.orchestratorAgentId,
    },
    `${config.name} ready`,
  );

  const summaries = (ids: string[]) =>
    ids.flatMap((id) => {
      const summary = manager.getSessionStatus(id);
      return summary ? [summary] : [];
    });

  return {
    config,
    logger,
    registry,
    bus,
    audit,
    router,
    stateMachine,
    recovery,
    manager,
    orchestrator,
    maintenance,
    report: (section = "overview", page = 1, pageSize = 20) =>
      buildReportLines({
        section,
        page,
        pageSize,
        active: summaries(
          manager.listActiveSessions().map((session) => session.session_id),
        ),
        finished: summaries(
          manager.listCompletedSessions().map((session) => session.session_id),
        ),
        errors: recovery.getErrorStatistics(),
        auditSegments: audit.getEventCountsBySegment(),
      }),
    shutdown: async () => {
      maintenance.stop();
      await bus.drain();
      logger.runtime.info("runtime_stopped", {}, `${config.name} stopped`);
    },
  };
};
