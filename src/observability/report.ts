import type { SessionStatusSummary, WorkflowSession } from "../core/types";
import type { ErrorStatistics } from "../recovery/error-recovery-manager";

export type ReportSection = "overview" | "sessions" | "errors" | "audit";

export const buildOverviewLines = (input: {
  active: SessionStatusSummary[];
  finished: SessionStatusSummary[];
  errors: ErrorStatistics;
}): string[] => {
  const waiting = input.active.filter(
    (session) =>
      session.status === "awaiting_orchestrator_instruction" ||
      session.status === "awaiting_human_intervention",
  ).length;
  const aborted = input.finished.filter(
    (session) => session.status === "aborted",
  ).length;
  return [
    `active=${input.active.length}`,
    `needs_instruction=${waiting}`,
    `completed=${input.finished.length - aborted}`,
    `aborted=${aborted}`,
    `errors=${input.errors.total}`,
  ];
};

export const buildSessionLines = (
  sessions: SessionStatusSummary[],
): string[] =>
  sessions.length > 0
    ? sessions.map(
        (session) =>
          `${session.session_id}: ${session.status} ${session.progress}${session.current_step ? ` at ${session.current_step}` : ""}`,
      )
    : ["No sessions"];

export const buildSessionDetailLines = (
  session: WorkflowSession | undefined,
): string[] => {
  if (!session) {
    return ["session not found"];
  }

  const stepLines = [...session.steps_completed, ...session.steps_failed]
    .sort((a, b) => a.started_at.localeCompare(b.started_at))
    .slice(-3)
    .map(
      (execution) =>
        `${execution.step_name} -> ${execution.status} attempt=${execution.attempt}`,
    );

  return [
    `session=${session.session_id}`,
    `pattern=${session.pattern_name}`,
    `application=${session.application_id}`,
    `status=${session.status}`,
    `step_index=${session.current_step_index}`,
    `completed_steps=${session.steps_completed.length}`,
    `failed_steps=${session.steps_failed.length}`,
    `messages=${session.messages.length}`,
    `decisions=${session.decisions.length}`,
    `errors=${session.errors.join(",") || "none"}`,
    ...stepLines,
  ];
};

const formatCounts = (counts: Record<string, number>): string =>
  Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([key, count]) => `${key}:${count}`)
    .join(",") || "none";

export const buildErrorStatisticsLines = (stats: ErrorStatistics): string[] => [
  `total=${stats.total}`,
  `by_severity=${formatCounts(stats.by_severity)}`,
  `by_category=${formatCounts(stats.by_category)}`,
  `by_status=${formatCounts(stats.by_status)}`,
  `recovery_success_rate=${stats.recovery_success_rate.toFixed(2)}`,
];

const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

const paginate = <T>(items: T[], page: number, pageSize: number): T[] => {
  const current = Math.max(1, page);
  const offset = (current - 1) * pageSize;
  return items.slice(offset, offset + pageSize);
};

export const buildReportLines = (input: {
  section: ReportSection;
  page: number;
  pageSize: number;
  active: SessionStatusSummary[];
  finished: SessionStatusSummary[];
  errors: ErrorStatistics;
  auditSegments: Record<string, number>;
}): string[] => {
  const page = Math.max(1, input.page);
  const pageSize = Math.max(1, input.pageSize);

  switch (input.section) {
    case "overview":
      return [
        ...renderSection("overview", buildOverviewLines(input)),
        ...renderSection(
          "active sessions",
          buildSessionLines(input.active).slice(0, 5),
        ),
      ];
    case "sessions": {
      const rows = paginate(
        [...input.active, ...input.finished],
        page,
        pageSize,
      ).map((session) => [
        session.session_id,
        session.pattern_name,
        session.status,
        session.progress,
        `${session.errors}`,
      ]);
      return [
        ...renderSection("sessions", [`page=${page}`, `page_size=${pageSize}`]),
        ...renderTable(["id", "pattern", "status", "progress", "errors"], rows),
      ];
    }
    case "errors":
      return renderSection("errors", buildErrorStatisticsLines(input.errors));
    case "audit": {
      const rows = paginate(
        Object.entries(input.auditSegments).sort(([a], [b]) =>
          a.localeCompare(b),
        ),
        page,
        pageSize,
      ).map(([segment, count]) => [segment, `${count}`]);
      return [
        ...renderSection("audit", [`segments=${Object.keys(input.auditSegments).length}`]),
        ...renderTable(["segment", "entries"], rows),
      ];
    }
  }
};
