import fs from "node:fs";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createJiti } from "jiti";
import { compileCondition } from "./condition";
import { ConditionSyntaxError, PatternValidationError } from "./errors";
import {
  type CollaborationPattern,
  type ErrorPolicy,
  type StepDefinition,
  isSafeId,
} from "./types";

const ErrorPolicySchema = Type.Object({
  onError: Type.Optional(
    Type.Union([
      Type.Literal("retry"),
      Type.Literal("notify_orchestrator"),
      Type.Literal("notify_human"),
    ]),
  ),
  maxRetries: Type.Optional(Type.Integer({ minimum: 0 })),
  fallback: Type.Optional(Type.String({ minLength: 1 })),
});

const StepSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  agent: Type.String({ minLength: 1 }),
  inputs: Type.Optional(Type.Array(Type.String())),
  outputs: Type.Optional(Type.Array(Type.String())),
  required: Type.Boolean(),
  timeoutSeconds: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  requiresConfirmation: Type.Optional(Type.Boolean()),
  eventTriggered: Type.Optional(Type.Boolean()),
  triggerEvent: Type.Optional(Type.String({ minLength: 1 })),
  condition: Type.Optional(Type.String({ minLength: 1 })),
});

export const CollaborationPatternSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.String(),
  agents: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  initiator: Type.String({ minLength: 1 }),
  steps: Type.Array(StepSchema, { minItems: 1 }),
  errorHandling: Type.Optional(Type.Record(Type.String(), ErrorPolicySchema)),
});

export type CollaborationPatternInput = Static<
  typeof CollaborationPatternSchema
>;

export const definePattern = (
  pattern: CollaborationPattern,
): CollaborationPattern => pattern;

export const step = (definition: StepDefinition): StepDefinition => ({
  name: definition.name,
  agent: definition.agent,
  required: definition.required,
  ...(definition.inputs ? { inputs: definition.inputs } : {}),
  ...(definition.outputs ? { outputs: definition.outputs } : {}),
  ...(definition.timeoutSeconds !== undefined
    ? { timeoutSeconds: definition.timeoutSeconds }
    : {}),
  ...(definition.requiresConfirmation ? { requiresConfirmation: true } : {}),
  ...(definition.eventTriggered
    ? { eventTriggered: true, triggerEvent: definition.triggerEvent }
    : {}),
  ...(definition.condition ? { condition: definition.condition } : {}),
});

export const onError = (policy: ErrorPolicy): ErrorPolicy => ({
  ...(policy.onError ? { onError: policy.onError } : {}),
  ...(policy.maxRetries !== undefined ? { maxRetries: policy.maxRetries } : {}),
  ...(policy.fallback ? { fallback: policy.fallback } : {}),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

const semanticIssues = (pattern: CollaborationPatternInput): string[] => {
  const issues: string[] = [];
  const agents = new Set(pattern.agents);
  const stepNames = new Set<string>();

  for (const agent of pattern.agents) {
    if (!isSafeId(agent)) {
      issues.push(`agent id ${JSON.stringify(agent)} may only use letters, digits and _.:-`);
    }
  }
  if (!agents.has(pattern.initiator)) {
    issues.push(`initiator ${pattern.initiator} is not a pattern agent`);
  }

  for (const entry of pattern.steps) {
    if (stepNames.has(entry.name)) {
      issues.push(`duplicate step name ${entry.name}`);
    }
    stepNames.add(entry.name);

    if (!agents.has(entry.agent)) {
      issues.push(`step ${entry.name} uses agent ${entry.agent} outside the pattern`);
    }
    if (entry.eventTriggered && !entry.triggerEvent) {
      issues.push(`step ${entry.name} is event-triggered but names no event`);
    }
    if (entry.condition) {
      try {
        compileCondition(entry.condition);
      } catch (error) {
        if (!(error instanceof ConditionSyntaxError)) {
          throw error;
        }
        issues.push(`step ${entry.name}: ${error.message}`);
      }
    }
  }

  for (const key of Object.keys(pattern.errorHandling ?? {})) {
    if (!stepNames.has(key)) {
      issues.push(`error policy ${key} does not name a step`);
    }
  }

  return issues;
};

/**
 * Checks shape and cross-references, then returns a frozen copy safe to
 * share between sessions.
 */
export const validatePattern = (candidate: unknown): CollaborationPattern => {
  const label =
    isRecord(candidate) && typeof candidate.name === "string"
      ? candidate.name
      : "<unnamed>";

  if (!Value.Check(CollaborationPatternSchema, candidate)) {
    const issues = [...Value.Errors(CollaborationPatternSchema, candidate)].map(
      (issue) => `${issue.path || "/"} ${issue.message}`,
    );
    throw new PatternValidationError(label, issues);
  }

  const issues = semanticIssues(candidate);
  if (issues.length > 0) {
    throw new PatternValidationError(label, issues);
  }

  const pattern: CollaborationPattern = structuredClone(candidate);
  return deepFreeze(pattern);
};

const PATTERN_EXTENSIONS = new Set([".ts", ".js", ".mts", ".mjs"]);

/** Loads every pattern module in a directory; missing directories yield nothing. */
export const loadPatternDirectory = async (
  directory: string,
): Promise<CollaborationPattern[]> => {
  if (!fs.existsSync(directory)) {
    return [];
  }

  const jiti = createJiti(import.meta.url);
  const patterns: CollaborationPattern[] = [];
  const entries = fs
    .readdirSync(directory)
    .filter((file) => PATTERN_EXTENSIONS.has(path.extname(file)))
    .filter((file) => !file.endsWith(".d.ts"))
    .sort();

  for (const entry of entries) {
    const modulePath = path.join(directory, entry);
    const loaded: unknown = await jiti.import(modulePath);
    const candidate =
      isRecord(loaded) && "default" in loaded ? loaded.default : loaded;
    patterns.push(validatePattern(candidate));
  }
  return patterns;
};
