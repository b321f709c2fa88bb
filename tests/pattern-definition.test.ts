import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { PatternValidationError } from "../src/core/errors";
import {
  definePattern,
  loadPatternDirectory,
  onError,
  step,
  validatePattern,
} from "../src/core/pattern-definition";

const basePattern = () =>
  definePattern({
    name: "income_check",
    description: "Verify stated income",
    agents: ["intake", "verifier"],
    initiator: "intake",
    steps: [
      step({ name: "collect", agent: "intake", required: true }),
      step({
        name: "verify",
        agent: "verifier",
        required: false,
        condition: "income > 0",
      }),
    ],
    errorHandling: { verify: onError({ onError: "retry", maxRetries: 2 }) },
  });

describe("pattern builders", () => {
  it("drops unset optional fields", () => {
    expect(
      step({
        name: "wait",
        agent: "intake",
        required: true,
        eventTriggered: true,
        triggerEvent: "documents_uploaded",
        requiresConfirmation: false,
      }),
    ).toEqual({
      name: "wait",
      agent: "intake",
      required: true,
      eventTriggered: true,
      triggerEvent: "documents_uploaded",
    });
    expect(onError({ fallback: "skip_step" })).toEqual({
      fallback: "skip_step",
    });
  });
});

describe("validatePattern", () => {
  it("returns a frozen copy of a valid pattern", () => {
    const source = basePattern();
    const pattern = validatePattern(source);

    expect(pattern).toEqual(source);
    expect(pattern).not.toBe(source);
    expect(Object.isFrozen(pattern.steps[0])).toBe(true);
  });

  it("reports schema problems with their path", () => {
    const broken = { ...basePattern(), steps: [] };

    expect(() => validatePattern(broken)).toThrow(PatternValidationError);
    expect(() => validatePattern(broken)).toThrow(/\/steps/);
  });

  it("reports cross-reference problems together", () => {
    const source = basePattern();
    const candidate = {
      ...source,
      initiator: "outsider",
      steps: [
        ...source.steps,
        step({ name: "collect", agent: "appraiser", required: true }),
        step({ name: "await", agent: "intake", required: true, eventTriggered: true }),
        step({ name: "gate", agent: "intake", required: false, condition: "a ==" }),
      ],
      errorHandling: { missing: onError({ onError: "notify_human" }) },
    };

    let caught: unknown;
    try {
      validatePattern(candidate);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PatternValidationError);
    expect(caught instanceof PatternValidationError && caught.issues).toEqual([
      "initiator outsider is not a pattern agent",
      "duplicate step name collect",
      "step collect uses agent appraiser outside the pattern",
      "step await is event-triggered but names no event",
      "step gate: Unexpected end of expression at position 4 in condition: a ==",
      "error policy missing does not name a step",
    ]);
  });

  it("rejects agent ids that cannot appear in audit lines", () => {
    const candidate = {
      ...basePattern(),
      agents: ["intake", "verifier", "under writer"],
    };

    expect(() => validatePattern(candidate)).toThrow(
      'Invalid collaboration pattern income_check: agent id "under writer" may only use letters, digits and _.:-',
    );
  });

  it("labels unnamed candidates", () => {
    expect(() => validatePattern(42)).toThrow(
      /^Invalid collaboration pattern <unnamed>/,
    );
  });
});

describe("loadPatternDirectory", () => {
  it("loads default exports in file name order", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lending-patterns-"));
    const write = (file: string, name: string) =>
      fs.writeFileSync(
        path.join(dir, file),
        `export default {
  name: "${name}",
  description: "",
  agents: ["intake"],
  initiator: "intake",
  steps: [{ name: "only", agent: "intake", required: true }],
};
`,
      );
    write("b-second.ts", "second");
    write("a-first.ts", "first");
    fs.writeFileSync(path.join(dir, "notes.md"), "# not a pattern\n");

    const patterns = await loadPatternDirectory(dir);

    expect(patterns.map((pattern) => pattern.name)).toEqual([
      "first",
      "second",
    ]);
  });

  it("returns nothing for a missing directory", async () => {
    await expect(
      loadPatternDirectory(path.join(os.tmpdir(), "lending-no-such-dir")),
    ).resolves.toEqual([]);
  });
});
