import { describe, expect, it } from "vitest";
import { type SessionStatusSummary, asSessionId } from "../src/core/types";
import {
  buildErrorStatisticsLines,
  buildReportLines,
  buildSessionDetailLines,
} from "../src/observability/report";
import { createHarness, handlerAgent, succeed } from "./helpers";

const summary = (
  id: string,
  status: SessionStatusSummary["status"],
  overrides: Partial<SessionStatusSummary> = {},
): SessionStatusSummary => ({
  session_id: asSessionId(id),
  pattern_name: "application_processing",
  status,
  started_at: "2026-03-02T10:00:00.000Z",
  progress: "1/5",
  errors: 0,
  error_messages: 0,
  message_count: 0,
  ...overrides,
});

const noErrors = () => createHarness().recovery.getErrorStatistics();

describe("report", () => {
  it("renders the overview with waiting and finished counts", () => {
    const lines = buildReportLines({
      section: "overview",
      page: 1,
      pageSize: 20,
      active: [
        summary("a-1", "step_in_progress", { current_step: "assess_risk" }),
        summary("a-2", "awaiting_human_intervention"),
      ],
      finished: [summary("f-1", "completed"), summary("f-2", "aborted")],
      errors: noErrors(),
      auditSegments: {},
    });

    expect(lines).toEqual([
      "=== overview ===",
      "active=2",
      "needs_instruction=1",
      "completed=1",
      "aborted=1",
      "errors=0",
      "=== active sessions ===",
      "a-1: step_in_progress 1/5 at assess_risk",
      "a-2: awaiting_human_intervention 1/5",
    ]);
  });

  it("pages the session table", () => {
    const lines = buildReportLines({
      section: "sessions",
      page: 2,
      pageSize: 1,
      active: [summary("a-1", "step_in_progress")],
      finished: [summary("f-1", "completed", { progress: "5/5", errors: 2 })],
      errors: noErrors(),
      auditSegments: {},
    });

    expect(lines).toEqual([
      "=== sessions ===",
      "page=2",
      "page_size=1",
      "id  | pattern                | status    | progress | errors",
      "----+------------------------+-----------+----------+-------",
      "f-1 | application_processing | completed | 5/5      | 2",
    ]);
  });

  it("lists audit segments in order and marks empty tables", () => {
    const base = {
      section: "audit" as const,
      page: 1,
      pageSize: 10,
      active: [],
      finished: [],
      errors: noErrors(),
    };

    expect(
      buildReportLines({
        ...base,
        auditSegments: { "audit_2026-03-02": 4, "audit_2026-03-01": 12 },
      }),
    ).toEqual([
      "=== audit ===",
      "segments=2",
      "segment          | entries",
      "-----------------+--------",
      "audit_2026-03-01 | 12",
      "audit_2026-03-02 | 4",
    ]);
    expect(buildReportLines({ ...base, auditSegments: {} })).toEqual([
      "=== audit ===",
      "segments=0",
      "(empty)",
    ]);
  });

  it("formats error statistics without zero buckets", () => {
    const stats = noErrors();
    stats.total = 2;
    stats.by_severity.high = 2;
    stats.by_category.agent_failure = 2;
    stats.by_status.recovery_successful = 1;
    stats.by_status.recovery_failed = 1;
    stats.recovery_success_rate = 0.5;

    expect(buildErrorStatisticsLines(stats)).toEqual([
      "total=2",
      "by_severity=high:2",
      "by_category=agent_failure:2",
      "by_status=recovery_successful:1,recovery_failed:1",
      "recovery_success_rate=0.50",
    ]);
  });

  it("describes a single session", async () => {
    const { manager } = createHarness();
    manager.registerPattern({
      name: "p1",
      description: "",
      agents: ["agent_a"],
      initiator: "agent_a",
      steps: [{ name: "step1", agent: "agent_a", required: true }],
    });
    manager.registerAgent("agent_a", handlerAgent({ step1: succeed() }));
    const id = await manager.createSession("p1", {}, "agent_a");

    expect(buildSessionDetailLines(manager.getSession(id))).toEqual([
      "session=p1-s1",
      "pattern=p1",
      "application=p1-s1",
      "status=completed",
      "step_index=1",
      "completed_steps=1",
      "failed_steps=0",
      "messages=0",
      "decisions=0",
      "errors=none",
      "step1 -> completed attempt=1",
    ]);
    expect(buildSessionDetailLines(undefined)).toEqual(["session not found"]);
  });
});
