import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/core/errors";
import {
  defaultProjectConfig,
  loadProjectConfig,
  normalizeProjectConfig,
} from "../src/project/config";

const writeConfig = (cwd: string, file: string, content: string) => {
  const target = path.join(cwd, ".lending", file);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, "utf8");
};

describe("project config", () => {
  it("returns defaults when project config file is missing", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-project-"));
    const config = await loadProjectConfig(cwd);

    expect(config).toEqual(defaultProjectConfig);
    expect(config.auditDir).toBe(path.join(".lending", "audit"));
    expect(config.defaultFallback).toBe("abort_workflow");
  });

  it("loads and filters project config from .lending/project.json", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-project-"));
    writeConfig(
      cwd,
      "project.json",
      JSON.stringify({
        name: "harbor-lending",
        stateDir: ".lending/state",
        logLevel: "loud",
        defaultTimeoutSeconds: -5,
        defaultMaxRetries: 3,
        taskRoutes: {
          underwriting: { agent: "senior_underwriter", taskType: "underwriting" },
          compliance_check: { agent: 7 },
        },
        audit: { logAllEvents: false, retentionDays: 30 },
      }),
    );

    const config = await loadProjectConfig(cwd);
    expect(config.name).toBe("harbor-lending");
    expect(config.stateDir).toBe(".lending/state");
    expect(config.logDir).toBeUndefined();
    expect(config.logLevel).toBe("info");
    expect(config.defaultTimeoutSeconds).toBe(60);
    expect(config.defaultMaxRetries).toBe(3);
    expect(config.taskRoutes).toEqual({
      underwriting: { agent: "senior_underwriter", taskType: "underwriting" },
    });
    expect(config.audit).toEqual({
      ...defaultProjectConfig.audit,
      logAllEvents: false,
      retentionDays: 30,
    });
  });

  it("prefers .lending/project.ts when present", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-project-"));
    writeConfig(
      cwd,
      "project.ts",
      `export default {
        name: "from-ts",
        orchestratorAgentId: "lead_underwriter",
        messageTypes: ["request", "error"],
      };
`,
    );
    writeConfig(cwd, "project.json", JSON.stringify({ name: "from-json" }));

    const config = await loadProjectConfig(cwd);
    expect(config.name).toBe("from-ts");
    expect(config.orchestratorAgentId).toBe("lead_underwriter");
    expect(config.messageTypes).toEqual(["request", "error"]);
  });

  it("rejects invalid JSON with a configuration error", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-project-"));
    writeConfig(cwd, "project.json", "{ not json");

    await expect(loadProjectConfig(cwd)).rejects.toThrow(ConfigurationError);
  });

  it("rejects unknown message types and application states", () => {
    expect(() =>
      normalizeProjectConfig({ messageTypes: ["request", "gossip"] }),
    ).toThrow("Unknown message type(s): gossip");
    expect(() =>
      normalizeProjectConfig({
        taskRoutes: { appraisal: { agent: "a", taskType: "t" } },
      }),
    ).toThrow("Unknown application state: appraisal");
  });

  it("treats non-object input as defaults", () => {
    expect(normalizeProjectConfig(null)).toBe(defaultProjectConfig);
  });
});
