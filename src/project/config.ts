import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { defaultAuditSettings, type AuditSettings } from "../audit/audit-logger";
import { ConfigurationError } from "../core/errors";
import {
  type FallbackAction,
  type MessageType,
  MESSAGE_TYPES,
  isApplicationState,
} from "../core/types";
import type { TaskRoute, TaskRoutes } from "../lifecycle/task-router";
import { type LogLevel, isLogLevel } from "../logging/logger";

export const CONFIG_DIR = ".lending";

export interface ProjectConfig {
  name: string;
  /** Audit segments, relative to the project root. */
  auditDir: string;
  /** Persisted sessions; unset keeps sessions in memory only. */
  stateDir?: string;
  /** Per-module log files; unset disables file logging. */
  logDir?: string;
  logLevel: LogLevel;
  consoleLevel: LogLevel;
  orchestratorAgentId: string;
  defaultTimeoutSeconds: number;
  defaultMaxRetries: number;
  defaultFallback: FallbackAction;
  messageTypes: MessageType[];
  /** Directories of pattern modules, relative to the project root. */
  patternDirs: string[];
  taskRoutes: TaskRoutes;
  audit: AuditSettings;
}

export const defaultProjectConfig: ProjectConfig = {
  name: "lending-orchestrator",
  auditDir: path.join(CONFIG_DIR, "audit"),
  logLevel: "info",
  consoleLevel: "warn",
  orchestratorAgentId: "orchestrator",
  defaultTimeoutSeconds: 60,
  defaultMaxRetries: 1,
  defaultFallback: "abort_workflow",
  messageTypes: [...MESSAGE_TYPES],
  patternDirs: [path.join(CONFIG_DIR, "patterns.d")],
  taskRoutes: {},
  audit: defaultAuditSettings,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v: unknown) => typeof v === "string");

const positiveNumber = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value > 0
    ? value
    : fallback;

const nonNegativeInteger = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0
    ? value
    : fallback;

const normalizeMessageTypes = (raw: unknown): MessageType[] | undefined => {
  if (!isStringArray(raw)) return undefined;
  const types = MESSAGE_TYPES.filter((type) => raw.includes(type));
  const unrecognized = raw.filter(
    (entry) => !MESSAGE_TYPES.some((type) => type === entry),
  );
  if (unrecognized.length > 0) {
    throw new ConfigurationError(
      `Unknown message type(s): ${unrecognized.join(", ")}`,
    );
  }
  return types;
};

const normalizeTaskRoutes = (raw: unknown): TaskRoutes => {
  if (!isRecord(raw)) return {};
  const routes: TaskRoutes = {};
  for (const [state, value] of Object.entries(raw)) {
    if (!isApplicationState(state)) {
      throw new ConfigurationError(`Unknown application state: ${state}`);
    }
    if (
      !isRecord(value) ||
      typeof value.agent !== "string" ||
      typeof value.taskType !== "string"
    ) {
      continue;
    }
    const route: TaskRoute = { agent: value.agent, taskType: value.taskType };
    routes[state] = route;
  }
  return routes;
};

const normalizeAudit = (raw: unknown): AuditSettings => {
  const base = defaultAuditSettings;
  if (!isRecord(raw)) return base;
  return {
    logAllEvents:
      typeof raw.logAllEvents === "boolean"
        ? raw.logAllEvents
        : base.logAllEvents,
    sensitiveEvents: isStringArray(raw.sensitiveEvents)
      ? raw.sensitiveEvents
      : base.sensitiveEvents,
    sensitiveFields: isStringArray(raw.sensitiveFields)
      ? raw.sensitiveFields
      : base.sensitiveFields,
    retentionDays: positiveNumber(raw.retentionDays, base.retentionDays),
  };
};

export const normalizeProjectConfig = (parsed: unknown): ProjectConfig => {
  if (!isRecord(parsed)) {
    return defaultProjectConfig;
  }
  const base = defaultProjectConfig;

  return {
    name: typeof parsed.name === "string" ? parsed.name : base.name,
    auditDir:
      typeof parsed.auditDir === "string" ? parsed.auditDir : base.auditDir,
    ...(typeof parsed.stateDir === "string"
      ? { stateDir: parsed.stateDir }
      : {}),
    ...(typeof parsed.logDir === "string" ? { logDir: parsed.logDir } : {}),
    logLevel: isLogLevel(parsed.logLevel) ? parsed.logLevel : base.logLevel,
    consoleLevel: isLogLevel(parsed.consoleLevel)
      ? parsed.consoleLevel
      : base.consoleLevel,
    orchestratorAgentId:
      typeof parsed.orchestratorAgentId === "string"
        ? parsed.orchestratorAgentId
        : base.orchestratorAgentId,
    defaultTimeoutSeconds: positiveNumber(
      parsed.defaultTimeoutSeconds,
      base.defaultTimeoutSeconds,
    ),
    defaultMaxRetries: nonNegativeInteger(
      parsed.defaultMaxRetries,
      base.defaultMaxRetries,
    ),
    defaultFallback:
      typeof parsed.defaultFallback === "string"
        ? parsed.defaultFallback
        : base.defaultFallback,
    messageTypes: normalizeMessageTypes(parsed.messageTypes) ?? base.messageTypes,
    patternDirs: isStringArray(parsed.patternDirs)
      ? parsed.patternDirs
      : base.patternDirs,
    taskRoutes: normalizeTaskRoutes(parsed.taskRoutes),
    audit: normalizeAudit(parsed.audit),
  };
};

/**
 * Reads `.lending/project.ts` (default export) or `.lending/project.json`
 * under `cwd`; defaults apply when neither exists.
 */
export const loadProjectConfig = async (cwd: string): Promise<ProjectConfig> => {
  const tsPath = path.join(cwd, CONFIG_DIR, "project.ts");
  if (fs.existsSync(tsPath)) {
    const jiti = createJiti(import.meta.url);
    let loaded: unknown;
    try {
      loaded = await jiti.import(tsPath);
    } catch (error) {
      throw new ConfigurationError(`Failed to load ${tsPath}`, { cause: error });
    }
    const parsed =
      isRecord(loaded) && "default" in loaded ? loaded.default : loaded;
    return normalizeProjectConfig(parsed);
  }

  const jsonPath = path.join(cwd, CONFIG_DIR, "project.json");
  if (!fs.existsSync(jsonPath)) {
    return defaultProjectConfig;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${jsonPath}`, {
      cause: error,
    });
  }
  return normalizeProjectConfig(parsed);
};
