import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { OrchestratorAgent } from "../src/agents/orchestrator-agent";
import { MemorySegmentStore } from "../src/audit/segment-store";
import { MemorySessionStore } from "../src/core/session-store";
import { createNoopLogger } from "../src/logging/logger";
import { defaultProjectConfig } from "../src/project/config";
import { createLendingRuntime } from "../src/runtime/bootstrap";
import { fail, fixedClock, handlerAgent, succeed } from "./helpers";

const projectDir = () => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-runtime-"));
  const patterns = path.join(cwd, ".lending", "patterns.d");
  fs.mkdirSync(patterns, { recursive: true });
  fs.writeFileSync(
    path.join(patterns, "income-verification.ts"),
    `export default {
  name: "income_verification",
  description: "Confirm stated income",
  agents: ["orchestrator", "document_agent"],
  initiator: "orchestrator",
  steps: [{ name: "verify_income", agent: "document_agent", required: true }],
};
`,
  );
  return cwd;
};

const start = (
  cwd: string,
  sessionStore: MemorySessionStore,
  orchestrator: OrchestratorAgent,
) =>
  createLendingRuntime({
    cwd,
    config: defaultProjectConfig,
    logger: createNoopLogger(),
    segmentStore: new MemorySegmentStore(),
    sessionStore,
    orchestrator,
    now: fixedClock().now,
  });

describe("createLendingRuntime", () => {
  it("wires patterns, agents and escalation to the orchestrator", async () => {
    const cwd = projectDir();
    const orchestrator = new OrchestratorAgent({
      handlers: { final_decision: succeed({ decision: "approved" }) },
    });
    const runtime = await start(cwd, new MemorySessionStore(), orchestrator);

    expect(runtime.manager.listPatterns().map((pattern) => pattern.name)).toEqual([
      "application_processing",
      "exception_resolution",
      "income_verification",
    ]);
    expect(runtime.registry.list()).toEqual(["orchestrator"]);

    runtime.manager.registerAgent(
      "document_agent",
      handlerAgent({
        collect_documents: succeed({ document_status: "complete" }),
        analyze_documents: fail("ocr unavailable"),
      }),
    );
    runtime.manager.registerAgent(
      "underwriting_agent",
      handlerAgent({ assess_risk: succeed({ risk_assessment: "low" }) }),
    );
    runtime.manager.registerAgent(
      "compliance_agent",
      handlerAgent({ check_compliance: succeed({ compliance_results: "pass" }) }),
    );

    const id = await runtime.manager.createSession(
      "application_processing",
      { application_id: "app-500", documents: [] },
      "orchestrator",
    );
    await runtime.bus.drain();

    expect(runtime.manager.getSessionStatus(id)).toMatchObject({
      status: "awaiting_orchestrator_instruction",
      current_step: "analyze_documents",
      error_messages: 1,
    });
    const [escalation] = orchestrator.pendingEscalations();
    expect(escalation?.content).toMatchObject({
      session_id: id,
      step_name: "analyze_documents",
      error: "ocr unavailable",
    });

    await expect(
      runtime.manager.resume(id, "continue", { document_analysis: "manual" }),
    ).resolves.toBe("awaiting_confirmation");
    expect(runtime.report("overview").slice(0, 6)).toEqual([
      "=== overview ===",
      "active=1",
      "needs_instruction=0",
      "completed=0",
      "aborted=0",
      "errors=1",
    ]);

    await runtime.shutdown();
  });

  it("restores parked sessions into a new runtime", async () => {
    const cwd = projectDir();
    const sessions = new MemorySessionStore();
    const first = await start(cwd, sessions, new OrchestratorAgent());
    first.manager.registerAgent("document_agent", handlerAgent({}));
    const parked = await first.manager.createSession(
      "income_verification",
      { application_id: "app-600" },
      "orchestrator",
    );
    expect(first.manager.getSession(parked)?.status).toBe(
      "awaiting_orchestrator_instruction",
    );
    await first.shutdown();

    const second = await start(cwd, sessions, new OrchestratorAgent());
    expect(second.manager.getSession(parked)?.status).toBe(
      "awaiting_orchestrator_instruction",
    );

    second.manager.registerAgent(
      "document_agent",
      handlerAgent({ verify_income: succeed({}) }),
    );
    await expect(second.manager.resume(parked, "retry")).resolves.toBe(
      "completed",
    );
    expect(second.manager.listActiveSessions()).toEqual([]);
    await second.shutdown();
  });
});
