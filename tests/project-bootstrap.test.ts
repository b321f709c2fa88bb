import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { bootstrapProjectConfig } from "../src/project/bootstrap";
import { loadProjectConfig } from "../src/project/config";

describe("project bootstrap", () => {
  it("creates .lending/project.ts from defaults and package name", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-bootstrap-"));
    fs.writeFileSync(
      path.join(cwd, "package.json"),
      JSON.stringify({ name: "demo-lender" }),
      "utf8",
    );

    const result = bootstrapProjectConfig(cwd);
    expect(result.created).toBe(true);
    expect(result.overwritten).toBe(false);
    expect(result.skipped).toBe(false);

    const target = path.join(cwd, ".lending", "project.ts");
    expect(result.file).toBe(target);
    const content = fs.readFileSync(target, "utf8");
    expect(content).toContain('  name: "demo-lender",\n');
    expect(content).toContain('  defaultFallback: "abort_workflow",\n');
    expect(content).not.toContain("stateDir");

    const loaded = await loadProjectConfig(cwd);
    expect(loaded.name).toBe("demo-lender");
    expect(loaded.patternDirs).toEqual([path.join(".lending", "patterns.d")]);
  });

  it("skips when file exists unless force is true", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "lending-bootstrap-"));
    const target = path.join(cwd, ".lending", "project.ts");
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, "export default { name: 'existing' };\n", "utf8");

    const skipped = bootstrapProjectConfig(cwd);
    expect(skipped.skipped).toBe(true);
    expect(skipped.reason).toBe(
      "project.ts already exists (use force to overwrite)",
    );

    const forced = bootstrapProjectConfig(cwd, {
      force: true,
      overrides: { name: "forced", stateDir: ".lending/state", defaultMaxRetries: 4 },
    });
    expect(forced.overwritten).toBe(true);

    const loaded = await loadProjectConfig(cwd);
    expect(loaded.name).toBe("forced");
    expect(loaded.stateDir).toBe(".lending/state");
    expect(loaded.defaultMaxRetries).toBe(4);
  });
});
