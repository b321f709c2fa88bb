import fs from "node:fs";
import path from "node:path";
import type { ModuleLogger } from "../logging/logger";
import { describeError } from "./errors";
import type { SessionId, SessionStatus, WorkflowSession } from "./types";

export interface SessionStore {
  save(session: WorkflowSession): void;
  load(sessionId: SessionId): WorkflowSession | null;
  list(): WorkflowSession[];
}

const SESSION_STATUSES: readonly SessionStatus[] = [
  "initialized",
  "step_in_progress",
  "waiting_for_event",
  "awaiting_confirmation",
  "retrying_step",
  "awaiting_orchestrator_instruction",
  "awaiting_human_intervention",
  "aborted",
  "completed",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Shallow structural check for session snapshots read back from disk. */
export const isWorkflowSession = (value: unknown): value is WorkflowSession =>
  isRecord(value) &&
  typeof value.session_id === "string" &&
  typeof value.pattern_name === "string" &&
  typeof value.application_id === "string" &&
  typeof value.status === "string" &&
  SESSION_STATUSES.some((status) => status === value.status) &&
  typeof value.current_step_index === "number" &&
  isRecord(value.context) &&
  isRecord(value.initial_context) &&
  isRecord(value.retry_counts) &&
  Array.isArray(value.steps_completed) &&
  Array.isArray(value.steps_failed) &&
  Array.isArray(value.messages) &&
  Array.isArray(value.decisions) &&
  Array.isArray(value.errors) &&
  Array.isArray(value.checkpoints) &&
  typeof value.started_at === "string";

const byStart = (a: WorkflowSession, b: WorkflowSession): number =>
  a.started_at.localeCompare(b.started_at);

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<SessionId, WorkflowSession>();

  save(session: WorkflowSession): void {
    this.sessions.set(session.session_id, structuredClone(session));
  }

  load(sessionId: SessionId): WorkflowSession | null {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  list(): WorkflowSession[] {
    return [...this.sessions.values()]
      .map((session) => structuredClone(session))
      .sort(byStart);
  }
}

export class FileSessionStore implements SessionStore {
  constructor(
    private readonly rootDir: string,
    private readonly logger?: ModuleLogger,
  ) {}

  sessionPath(sessionId: SessionId): string {
    return path.join(this.rootDir, "sessions", `${sessionId}.json`);
  }

  save(session: WorkflowSession): void {
    const file = this.sessionPath(session.session_id);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(session, null, 2));
  }

  load(sessionId: SessionId): WorkflowSession | null {
    return this.read(this.sessionPath(sessionId));
  }

  list(): WorkflowSession[] {
    const dir = path.join(this.rootDir, "sessions");
    if (!fs.existsSync(dir)) {
      return [];
    }

    return fs
      .readdirSync(dir)
      .filter((entry) => entry.endsWith(".json"))
      .flatMap((entry) => {
        const session = this.read(path.join(dir, entry));
        return session ? [session] : [];
      })
      .sort(byStart);
  }

  private read(file: string): WorkflowSession | null {
    if (!fs.existsSync(file)) {
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      this.logger?.warn(
        "session_file_unreadable",
        { file },
        `Skipping ${file}: ${describeError(error).message}`,
      );
      return null;
    }
    return isWorkflowSession(parsed) ? parsed : null;
  }
}
