import type { AuditLogger } from "../audit/audit-logger";
import { describeError } from "../core/errors";
import type { ModuleLogger } from "../logging/logger";

export interface MaintenanceCheckResult {
  name: string;
  ok: boolean;
  message: string;
}

export type MaintenanceCheck = () =>
  | Promise<MaintenanceCheckResult>
  | MaintenanceCheckResult;

export interface MaintenanceEscalation {
  at: string;
  streak: number;
  failing: MaintenanceCheckResult[];
}

export interface MaintenanceSchedulerOptions {
  intervalMs: number;
  checks: MaintenanceCheck[];
  logger: ModuleLogger;
  onEscalation?: (escalation: MaintenanceEscalation) => void;
  /** Consecutive failing runs before `onEscalation` fires. */
  escalationThreshold?: number;
  now?: () => Date;
}

/** Chain verification across every audit segment. */
export const auditIntegrityCheck =
  (audit: AuditLogger): MaintenanceCheck =>
  () => {
    const failing = audit
      .listSegments()
      .map((segment) => ({ segment, result: audit.verifySegment(segment) }))
      .filter(({ result }) => !result.ok);
    return failing.length === 0
      ? { name: "audit_integrity", ok: true, message: "all segments verified" }
      : {
          name: "audit_integrity",
          ok: false,
          message: failing
            .map(({ segment, result }) => `${segment}@${result.line ?? "?"}`)
            .join(","),
        };
  };

/** Drops audit segments older than the configured retention. */
export const auditRetentionCheck =
  (audit: AuditLogger): MaintenanceCheck =>
  () => {
    const removed = audit.pruneSegments();
    return {
      name: "audit_retention",
      ok: true,
      message: `removed=${removed.length}`,
    };
  };

/**
 * Runs periodic checks; a run with failures extends the failure streak
 * and a clean run resets it.
 */
export class MaintenanceScheduler {
  private timer: NodeJS.Timeout | undefined;
  private running: Promise<MaintenanceCheckResult[]> | undefined;
  private failureStreak = 0;
  private escalation: MaintenanceEscalation | undefined;
  private readonly escalationThreshold: number;
  private readonly now: () => Date;

  constructor(private readonly options: MaintenanceSchedulerOptions) {
    this.escalationThreshold = options.escalationThreshold ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      if (this.running) {
        return;
      }
      this.running = this.runOnce();
      void this.running
        .catch((error: unknown) => {
          this.options.logger.error(
            "maintenance_failed",
            {},
            describeError(error).message,
          );
        })
        .finally(() => {
          this.running = undefined;
        });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async runOnce(): Promise<MaintenanceCheckResult[]> {
    const results: MaintenanceCheckResult[] = [];
    for (const check of this.options.checks) {
      try {
        results.push(await check());
      } catch (error) {
        results.push({
          name: "unknown",
          ok: false,
          message: describeError(error).message,
        });
      }
    }

    const failing = results.filter((result) => !result.ok);
    for (const result of failing) {
      this.options.logger.warn(
        "maintenance_check_failed",
        { check: result.name },
        result.message,
      );
    }
    if (failing.length > 0) {
      this.failureStreak += 1;
    } else {
      this.failureStreak = 0;
      this.escalation = undefined;
    }

    if (failing.length > 0 && this.failureStreak >= this.escalationThreshold) {
      const escalation: MaintenanceEscalation = {
        at: this.now().toISOString(),
        streak: this.failureStreak,
        failing,
      };
      this.escalation = escalation;
      this.options.onEscalation?.(escalation);
    }
    return results;
  }

  getState(): {
    failureStreak: number;
    escalationThreshold: number;
    escalation?: MaintenanceEscalation;
  } {
    return {
      failureStreak: this.failureStreak,
      escalationThreshold: this.escalationThreshold,
      ...(this.escalation ? { escalation: this.escalation } : {}),
    };
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
  }
}
