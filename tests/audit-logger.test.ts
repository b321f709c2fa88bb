import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  AuditLogger,
  GENESIS_HASH,
  parseAuditLine,
} from "../src/audit/audit-logger";
import { redactRecord } from "../src/audit/redaction";
import { FileSegmentStore, MemorySegmentStore } from "../src/audit/segment-store";
import { ValidationError } from "../src/core/errors";
import { createRecordingLogger, fixedClock, sequentialIds } from "./helpers";

const sha256 = (value: string) =>
  createHash("sha256").update(value, "utf8").digest("hex");

const setup = (
  options: {
    store?: MemorySegmentStore | FileSegmentStore;
    clock?: ReturnType<typeof fixedClock>;
    logAllEvents?: boolean;
  } = {},
) => {
  const store = options.store ?? new MemorySegmentStore();
  const clock = options.clock ?? fixedClock();
  const logger = createRecordingLogger();
  const audit = new AuditLogger(
    store,
    logger,
    options.logAllEvents === undefined
      ? {}
      : { logAllEvents: options.logAllEvents },
    clock.now,
    sequentialIds("audit-"),
  );
  return { store, clock, logger, audit };
};

describe("AuditLogger", () => {
  it("writes pipe-delimited lines chained from the genesis hash", () => {
    const { store, audit } = setup();

    const id = audit.logEvent({
      eventType: "application_submission",
      action: "submit",
      userId: "u-1",
      resourceId: "app-1",
      details: { ssn: "000-00-0000", amount: 1 },
    });

    const data =
      '2026-03-02T10:00:00.000Z|audit-1|application_submission|u-1|-|submit|app-1|{"ssn":"[REDACTED]","amount":1}|true';
    expect(id).toBe("audit-1");
    expect(store.read("audit_2026-03-02")).toBe(
      `${data}|${sha256(`${GENESIS_HASH}|${data}`)}\n`,
    );
  });

  it("parses lines back, keeping pipes inside details", () => {
    const { audit } = setup();
    audit.logAgentAction("underwriter", "review", {
      resourceId: "app-7",
      details: { note: "a|b" },
    });

    const [entry] = audit.search();

    expect(entry).toMatchObject({
      entry_id: "audit-1",
      event_type: "agent_action",
      agent_id: "underwriter",
      action: "review",
      resource_id: "app-7",
      details: { note: "a|b" },
      success: true,
    });
    expect(entry?.user_id).toBeUndefined();
    expect(parseAuditLine("not|enough|fields")).toBeNull();
  });

  it("rejects scalar fields that would break the line format", () => {
    const { audit } = setup();
    expect(() =>
      audit.logEvent({ eventType: "agent_action", action: "a|b" }),
    ).toThrow(ValidationError);
    expect(() =>
      audit.logEvent({ eventType: "agent_action", action: "ok", userId: "x\ny" }),
    ).toThrow(ValidationError);
  });

  it("records only sensitive events when logAllEvents is off", () => {
    const { audit } = setup({ logAllEvents: false });

    expect(audit.logAgentAction("intake", "collect")).toBeUndefined();
    expect(audit.logDecision("app-1", "approved", {}, "underwriter")).toBe(
      "audit-1",
    );
    expect(audit.getEventCounts()).toEqual({ decision_made: 1 });
  });

  it("filters search results by date and fields", () => {
    const clock = fixedClock("2026-03-01T08:00:00.000Z");
    const { audit } = setup({ clock });
    audit.logStateTransition("app-1", "submitted", "document_review");
    clock.advance(24 * 60 * 60 * 1000);
    audit.logStateTransition("app-1", "document_review", "analysis", "docs ok");
    audit.logSecurityEvent("unauthorized_access", { pattern: "x" }, { userId: "u-9", success: false });

    expect(audit.search({ startDate: "2026-03-02" }).map((e) => e.action)).toEqual([
      "document_review->analysis",
      "unauthorized_access",
    ]);
    expect(audit.search({ endDate: "2026-03-01" }).map((e) => e.details)).toEqual([
      { from_state: "submitted", to_state: "document_review" },
    ]);
    expect(
      audit.search({ eventTypes: ["security_event"], userId: "u-9" }),
    ).toMatchObject([{ success: false, details: { pattern: "x" } }]);
    expect(audit.getEventCountsBySegment()).toEqual({
      "audit_2026-03-01": 1,
      "audit_2026-03-02": 2,
    });
  });

  it("detects a tampered line and keeps chaining after a restart", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "lending-audit-"));
    const store = new FileSegmentStore(root);
    const { audit } = setup({ store });
    audit.logDecision("app-1", "approved", { amount: 1 });
    audit.logDecision("app-2", "denied", { amount: 2 });

    const { audit: restarted } = setup({ store: new FileSegmentStore(root) });
    restarted.logDecision("app-3", "approved", { amount: 3 });
    expect(restarted.verifyIntegrity()).toBe(true);

    const file = path.join(root, "audit_2026-03-02.log");
    fs.writeFileSync(
      file,
      fs.readFileSync(file, "utf8").replace('"amount":2', '"amount":20'),
    );
    expect(restarted.verifySegment("audit_2026-03-02")).toEqual({
      ok: false,
      line: 2,
    });
    expect(restarted.verifyIntegrity()).toBe(false);
  });

  it("prunes segments past the retention window", () => {
    const clock = fixedClock("2026-01-01T12:00:00.000Z");
    const { audit, logger } = setup({ clock });
    audit.logAgentAction("intake", "collect");
    clock.advance(100 * 24 * 60 * 60 * 1000);
    audit.logAgentAction("intake", "collect");

    expect(audit.pruneSegments()).toEqual(["audit_2026-01-01"]);
    expect(audit.listSegments()).toEqual(["audit_2026-04-11"]);
    expect(logger.events("info")).toEqual(["audit_pruned"]);
  });
});

describe("redactRecord", () => {
  it("masks sensitive keys at any depth", () => {
    expect(
      redactRecord({
        applicant: { name: "Sam", SSN_last4: "0000" },
        accounts: [{ account_number: "123", bank: "Test Bank" }],
      }),
    ).toEqual({
      applicant: { name: "Sam", SSN_last4: "[REDACTED]" },
      accounts: [{ account_number: "[REDACTED]", bank: "Test Bank" }],
    });
  });
});
