import { afterEach, describe, expect, it, vi } from "vitest";
import { AuditLogger } from "../src/audit/audit-logger";
import { MemorySegmentStore } from "../src/audit/segment-store";
import {
  MaintenanceScheduler,
  auditIntegrityCheck,
  auditRetentionCheck,
} from "../src/runtime/maintenance-scheduler";
import { createRecordingLogger, fixedClock } from "./helpers";

afterEach(() => {
  vi.useRealTimers();
});

describe("MaintenanceScheduler", () => {
  it("runs checks and reports results", async () => {
    const logger = createRecordingLogger();
    const scheduler = new MaintenanceScheduler({
      intervalMs: 1000,
      logger,
      checks: [
        () => ({ name: "a", ok: true, message: "ok" }),
        () => {
          throw new Error("boom");
        },
      ],
    });

    const results = await scheduler.runOnce();
    expect(results).toEqual([
      { name: "a", ok: true, message: "ok" },
      { name: "unknown", ok: false, message: "boom" },
    ]);
    expect(logger.events("warn")).toEqual(["maintenance_check_failed"]);
    expect(scheduler.getState().failureStreak).toBe(1);
  });

  it("escalates after threshold and resets on recovery", async () => {
    const onEscalation = vi.fn();
    let healthy = false;
    const scheduler = new MaintenanceScheduler({
      intervalMs: 1000,
      logger: createRecordingLogger(),
      checks: [() => ({ name: "a", ok: healthy, message: healthy ? "ok" : "warn" })],
      onEscalation,
      escalationThreshold: 2,
      now: fixedClock().now,
    });

    await scheduler.runOnce();
    expect(onEscalation).not.toHaveBeenCalled();
    await scheduler.runOnce();
    expect(onEscalation).toHaveBeenCalledWith({
      at: "2026-03-02T10:00:00.000Z",
      streak: 2,
      failing: [{ name: "a", ok: false, message: "warn" }],
    });
    expect(scheduler.getState().escalation?.streak).toBe(2);

    healthy = true;
    await scheduler.runOnce();
    expect(scheduler.getState()).toEqual({
      failureStreak: 0,
      escalationThreshold: 2,
    });
  });

  it("starts once and can stop safely", async () => {
    vi.useFakeTimers();
    const check = vi.fn(() => ({ name: "a", ok: true, message: "ok" }));
    const scheduler = new MaintenanceScheduler({
      intervalMs: 1000,
      logger: createRecordingLogger(),
      checks: [check],
    });

    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(2500);
    expect(check).toHaveBeenCalledTimes(2);

    scheduler.stop();
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(2000);
    expect(check).toHaveBeenCalledTimes(2);
  });
});

describe("audit maintenance checks", () => {
  it("reports the first broken line of each segment", () => {
    const store = new MemorySegmentStore();
    const audit = new AuditLogger(store, createRecordingLogger(), {}, fixedClock().now);
    audit.logAgentAction("intake", "collect");
    store.append("audit_2026-03-02", "tampered|line\n");

    expect(auditIntegrityCheck(audit)()).toEqual({
      name: "audit_integrity",
      ok: false,
      message: "audit_2026-03-02@2",
    });
  });

  it("prunes expired segments", () => {
    const clock = fixedClock("2026-01-01T00:00:00.000Z");
    const audit = new AuditLogger(
      new MemorySegmentStore(),
      createRecordingLogger(),
      { retentionDays: 7 },
      clock.now,
    );
    audit.logAgentAction("intake", "collect");
    clock.advance(10 * 24 * 60 * 60 * 1000);

    expect(auditRetentionCheck(audit)()).toEqual({
      name: "audit_retention",
      ok: true,
      message: "removed=1",
    });
    expect(auditIntegrityCheck(audit)()).toEqual({
      name: "audit_integrity",
      ok: true,
      message: "all segments verified",
    });
  });
});
