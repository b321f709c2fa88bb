import { vi } from "vitest";
import { HandlerAgent, type StepHandler } from "../src/agents/handler-agent";
import { AuditLogger } from "../src/audit/audit-logger";
import { MemorySegmentStore } from "../src/audit/segment-store";
import { AgentRegistry } from "../src/core/agent-registry";
import { CollaborationManager } from "../src/core/collaboration-manager";
import { MessageBus } from "../src/core/message-bus";
import { MemorySessionStore } from "../src/core/session-store";
import type { StepResult } from "../src/core/types";
import { ApplicationStateMachine } from "../src/lifecycle/application-state-machine";
import type { LogLevel, LogTags, ModuleLogger } from "../src/logging/logger";
import { ErrorRecoveryManager } from "../src/recovery/error-recovery-manager";

export interface RecordedLine {
  level: LogLevel;
  event: string;
  tags: LogTags;
  message: string;
}

export const createRecordingLogger = (): ModuleLogger & {
  lines: RecordedLine[];
  events: (level?: LogLevel) => string[];
} => {
  const lines: RecordedLine[] = [];
  const record =
    (level: LogLevel) => (event: string, tags: LogTags, message: string) => {
      lines.push({ level, event, tags, message });
    };
  return {
    lines,
    events: (level) =>
      lines
        .filter((line) => level === undefined || line.level === level)
        .map((line) => line.event),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
};

export const fixedClock = (iso = "2026-03-02T10:00:00.000Z") => {
  let current = Date.parse(iso);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
};

export const sequentialIds = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next}`;
  };
};

export const succeed =
  (output: Record<string, unknown> = {}): StepHandler =>
  () => ({ status: "success", output });

export const fail =
  (error = "boom"): StepHandler =>
  () => ({ status: "error", error });

export const handlerAgent = (handlers: Record<string, StepHandler>) =>
  new HandlerAgent({ handlers });

/** Spy wrapper that keeps the handler's typing. */
export const spyHandler = (
  result: StepResult = { status: "success", output: {} },
) => vi.fn<StepHandler>(() => result);

export interface HarnessOptions {
  defaultMaxRetries?: number;
  defaultTimeoutSeconds?: number;
  sessions?: MemorySessionStore;
}

/** Every component wired in memory, with a fixed clock and predictable ids. */
export const createHarness = (options: HarnessOptions = {}) => {
  const clock = fixedClock();
  const logs = {
    engine: createRecordingLogger(),
    messages: createRecordingLogger(),
    lifecycle: createRecordingLogger(),
    recovery: createRecordingLogger(),
    audit: createRecordingLogger(),
  };
  const segments = new MemorySegmentStore();
  const sessions = options.sessions ?? new MemorySessionStore();
  const registry = new AgentRegistry();
  const audit = new AuditLogger(
    segments,
    logs.audit,
    {},
    clock.now,
    sequentialIds("audit-"),
  );
  const bus = new MessageBus(registry, logs.messages, {
    audit,
    now: clock.now,
  });
  const stateMachine = new ApplicationStateMachine({
    audit,
    logger: logs.lifecycle,
    now: clock.now,
  });
  const recovery = new ErrorRecoveryManager({
    audit,
    logger: logs.recovery,
    stateMachine,
    defaultMaxRetries: options.defaultMaxRetries ?? 1,
    now: clock.now,
    generateId: sequentialIds("err-"),
  });
  const manager = new CollaborationManager({
    registry,
    bus,
    recovery,
    audit,
    logger: logs.engine,
    store: sessions,
    stateMachine,
    defaultMaxRetries: options.defaultMaxRetries ?? 1,
    defaultTimeoutSeconds: options.defaultTimeoutSeconds ?? 5,
    now: clock.now,
    generateId: sequentialIds("s"),
  });

  return {
    clock,
    logs,
    segments,
    sessions,
    registry,
    bus,
    audit,
    stateMachine,
    recovery,
    manager,
  };
};
