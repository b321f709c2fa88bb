import { createHash } from "node:crypto";
import { nanoid } from "nanoid";
import { ValidationError } from "../core/errors";
import type { ModuleLogger } from "../logging/logger";
import { DEFAULT_SENSITIVE_FIELDS, redactRecord } from "./redaction";
import type { SegmentStore } from "./segment-store";

export interface AuditEntry {
  timestamp: string;
  entry_id: string;
  event_type: string;
  user_id?: string;
  agent_id?: string;
  action: string;
  resource_id?: string;
  details: Record<string, unknown>;
  success: boolean;
  hash: string;
}

export interface AuditEventInput {
  eventType: string;
  action: string;
  userId?: string;
  agentId?: string;
  resourceId?: string;
  details?: Record<string, unknown>;
  success?: boolean;
}

export interface AuditSearchQuery {
  /** Inclusive, `YYYY-MM-DD`. Defaults to 1970-01-01. */
  startDate?: string;
  /** Inclusive, `YYYY-MM-DD`. Defaults to today (UTC). */
  endDate?: string;
  eventTypes?: string[];
  userId?: string;
  agentId?: string;
  resourceId?: string;
  action?: string;
}

export interface AuditSettings {
  logAllEvents: boolean;
  sensitiveEvents: string[];
  sensitiveFields: string[];
  retentionDays: number;
}

export const defaultAuditSettings: AuditSettings = {
  logAllEvents: true,
  sensitiveEvents: [
    "application_submission",
    "document_access",
    "decision_made",
    "pii_accessed",
  ],
  sensitiveFields: [...DEFAULT_SENSITIVE_FIELDS],
  retentionDays: 90,
};

export interface SegmentVerification {
  ok: boolean;
  /** 1-based line of the first entry whose hash does not match. */
  line?: number;
}

const ABSENT = "-";
const SEGMENT_PREFIX = "audit_";
const DAY_MS = 24 * 60 * 60 * 1000;

const sha256 = (value: string): string =>
  createHash("sha256").update(value, "utf8").digest("hex");

export const GENESIS_HASH = sha256("initial");

export const segmentKeyFor = (date: Date): string =>
  `${SEGMENT_PREFIX}${date.toISOString().slice(0, 10)}`;

const segmentDate = (key: string): string | null =>
  /^audit_\d{4}-\d{2}-\d{2}$/.test(key)
    ? key.slice(SEGMENT_PREFIX.length)
    : null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const splitLines = (content: string): string[] =>
  content.split("\n").filter((line) => line.length > 0);

/** Splits a stored line; the JSON details may themselves contain `|`. */
export const parseAuditLine = (line: string): AuditEntry | null => {
  const parts = line.split("|");
  if (parts.length < 10) {
    return null;
  }
  const [timestamp, entryId, eventType, userId, agentId, action, resourceId] =
    parts;
  const success = parts[parts.length - 2];
  const hash = parts[parts.length - 1];
  if (
    timestamp === undefined ||
    entryId === undefined ||
    eventType === undefined ||
    userId === undefined ||
    agentId === undefined ||
    action === undefined ||
    resourceId === undefined ||
    success === undefined ||
    hash === undefined
  ) {
    return null;
  }

  let details: unknown;
  try {
    details = JSON.parse(parts.slice(7, -2).join("|"));
  } catch {
    return null;
  }

  return {
    timestamp,
    entry_id: entryId,
    event_type: eventType,
    action,
    details: isRecord(details) ? details : {},
    success: success === "true",
    hash,
    ...(userId !== ABSENT ? { user_id: userId } : {}),
    ...(agentId !== ABSENT ? { agent_id: agentId } : {}),
    ...(resourceId !== ABSENT ? { resource_id: resourceId } : {}),
  };
};

/**
 * Append-only, hash-chained audit trail, one segment per UTC day. Each
 * line is `timestamp|id|event_type|user|agent|action|resource|json|success|hash`
 * where `hash = sha256(previous_hash + "|" + everything before it)` and
 * the first entry of a segment chains from the genesis hash.
 *
 * Writes are synchronous so hashing and appending to a segment is one
 * uninterrupted step.
 */
export class AuditLogger {
  private readonly lastHashes = new Map<string, string>();
  private readonly settings: AuditSettings;

  constructor(
    private readonly store: SegmentStore,
    private readonly logger: ModuleLogger,
    settings: Partial<AuditSettings> = {},
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = nanoid,
  ) {
    this.settings = { ...defaultAuditSettings, ...settings };
  }

  /** Returns the entry id, or undefined when the event type is not recorded. */
  logEvent(input: AuditEventInput): string | undefined {
    if (
      !this.settings.logAllEvents &&
      !this.settings.sensitiveEvents.includes(input.eventType)
    ) {
      return undefined;
    }

    const scalars = [
      input.eventType,
      input.action,
      input.userId,
      input.agentId,
      input.resourceId,
    ];
    for (const value of scalars) {
      if (value !== undefined && /[|\r\n]/.test(value)) {
        throw new ValidationError(
          `Audit field may not contain '|' or line breaks: ${JSON.stringify(value)}`,
        );
      }
    }

    const timestamp = this.now();
    const entryId = this.generateId();
    const details = redactRecord(
      input.details ?? {},
      this.settings.sensitiveFields,
    );
    const success = input.success ?? true;
    const entryData = [
      timestamp.toISOString(),
      entryId,
      input.eventType,
      input.userId ?? ABSENT,
      input.agentId ?? ABSENT,
      input.action,
      input.resourceId ?? ABSENT,
      JSON.stringify(details),
      String(success),
    ].join("|");

    const key = segmentKeyFor(timestamp);
    const hash = sha256(`${this.lastHash(key)}|${entryData}`);
    this.store.append(key, `${entryData}|${hash}\n`);
    this.lastHashes.set(key, hash);

    this.logger.debug(
      "audit_written",
      {
        id: entryId,
        type: input.eventType,
        action: input.action,
        resource: input.resourceId,
        success,
      },
      `${input.eventType}/${input.action}`,
    );
    return entryId;
  }

  logAgentAction(
    agentId: string,
    action: string,
    options: {
      resourceId?: string;
      details?: Record<string, unknown>;
      success?: boolean;
    } = {},
  ): string | undefined {
    return this.logEvent({
      eventType: "agent_action",
      agentId,
      action,
      ...options,
    });
  }

  logSecurityEvent(
    action: string,
    details: Record<string, unknown>,
    options: { userId?: string; resourceId?: string; success?: boolean } = {},
  ): string | undefined {
    return this.logEvent({
      eventType: "security_event",
      action,
      details,
      ...options,
    });
  }

  logDecision(
    applicationId: string,
    decision: string,
    details: Record<string, unknown> = {},
    agentId?: string,
  ): string | undefined {
    return this.logEvent({
      eventType: "decision_made",
      action: decision,
      resourceId: applicationId,
      details,
      ...(agentId ? { agentId } : {}),
    });
  }

  logStateTransition(
    applicationId: string,
    fromState: string,
    toState: string,
    reason?: string,
  ): string | undefined {
    return this.logEvent({
      eventType: "state_transition",
      action: `${fromState}->${toState}`,
      resourceId: applicationId,
      details: {
        from_state: fromState,
        to_state: toState,
        ...(reason ? { reason } : {}),
      },
    });
  }

  listSegments(): string[] {
    return this.store.list().filter((key) => segmentDate(key) !== null);
  }

  verifySegment(key: string): SegmentVerification {
    let previous = GENESIS_HASH;
    const lines = splitLines(this.store.read(key));
    for (const [index, line] of lines.entries()) {
      const separator = line.lastIndexOf("|");
      const data = line.slice(0, Math.max(separator, 0));
      const hash = line.slice(separator + 1);
      if (separator < 0 || sha256(`${previous}|${data}`) !== hash) {
        this.logger.warn(
          "audit_integrity_failed",
          { segment: key, line: index + 1 },
          `Hash mismatch in ${key} at line ${index + 1}`,
        );
        return { ok: false, line: index + 1 };
      }
      previous = hash;
    }
    return { ok: true };
  }

  /** Checks one segment, or every segment when none is named. */
  verifyIntegrity(segment?: string): boolean {
    const keys = segment ? [segment] : this.listSegments();
    return keys.every((key) => this.verifySegment(key).ok);
  }

  search(query: AuditSearchQuery = {}): AuditEntry[] {
    const results: AuditEntry[] = [];
    for (const key of this.segmentsBetween(query.startDate, query.endDate)) {
      for (const line of splitLines(this.store.read(key))) {
        const entry = parseAuditLine(line);
        if (entry && matches(entry, query)) {
          results.push(entry);
        }
      }
    }
    return results;
  }

  getEventCounts(startDate?: string, endDate?: string): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of this.search({
      ...(startDate ? { startDate } : {}),
      ...(endDate ? { endDate } : {}),
    })) {
      counts[entry.event_type] = (counts[entry.event_type] ?? 0) + 1;
    }
    return counts;
  }

  getEventCountsBySegment(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const key of this.listSegments()) {
      counts[key] = splitLines(this.store.read(key)).length;
    }
    return counts;
  }

  /** Drops segments older than the retention window; returns their keys. */
  pruneSegments(now: Date = this.now()): string[] {
    const cutoff = segmentKeyFor(
      new Date(now.getTime() - this.settings.retentionDays * DAY_MS),
    );
    const expired = this.listSegments().filter((key) => key < cutoff);
    for (const key of expired) {
      this.store.remove(key);
      this.lastHashes.delete(key);
    }
    if (expired.length > 0) {
      this.logger.info(
        "audit_pruned",
        { segments: expired.length },
        `Removed ${expired.length} audit segment(s) past retention`,
      );
    }
    return expired;
  }

  private lastHash(key: string): string {
    const cached = this.lastHashes.get(key);
    if (cached) {
      return cached;
    }
    const lines = splitLines(this.store.read(key));
    const last = lines[lines.length - 1];
    return last ? last.slice(last.lastIndexOf("|") + 1) : GENESIS_HASH;
  }

  private segmentsBetween(startDate?: string, endDate?: string): string[] {
    const start = startDate ?? "1970-01-01";
    const end = endDate ?? this.now().toISOString().slice(0, 10);
    return this.listSegments().filter((key) => {
      const date = segmentDate(key);
      return date !== null && date >= start && date <= end;
    });
  }
}

const matches = (entry: AuditEntry, query: AuditSearchQuery): boolean =>
  (!query.eventTypes || query.eventTypes.includes(entry.event_type)) &&
  (query.userId === undefined || entry.user_id === query.userId) &&
  (query.agentId === undefined || entry.agent_id === query.agentId) &&
  (query.resourceId === undefined || entry.resource_id === query.resourceId) &&
  (query.action === undefined || entry.action === query.action);
