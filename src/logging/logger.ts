import fs from "node:fs";
import path from "node:path";

/**
 * Structured operational logging. Each component writes through its own
 * module logger; lines land in `<logDir>/<module>.log` and warnings/errors
 * are duplicated into `errors.log`. Console output stays minimal.
 *
 * Line format: [ISO-timestamp] [module] [level] [event:name] [key:value]... message
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_MODULES = [
  "engine",
  "messages",
  "lifecycle",
  "recovery",
  "audit",
  "runtime",
] as const;

export type LogModule = (typeof LOG_MODULES)[number];

export type LogTags = Record<string, string | number | boolean | undefined>;

export interface ModuleLogger {
  debug(event: string, tags: LogTags, message: string): void;
  info(event: string, tags: LogTags, message: string): void;
  warn(event: string, tags: LogTags, message: string): void;
  error(event: string, tags: LogTags, message: string): void;
}

export type Logger = Record<LogModule, ModuleLogger>;

export interface LoggerOptions {
  /** Directory for per-module log files. No files are written when unset. */
  logDir?: string;
  /** Minimum level for file output (default: debug). */
  fileLevel?: LogLevel;
  /** Minimum level for console output (default: warn). */
  consoleLevel?: LogLevel;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);

export const formatLogEntry = (
  timestamp: string,
  module: LogModule,
  level: LogLevel,
  event: string,
  tags: LogTags,
  message: string,
): string => {
  const parts = [
    `[${timestamp}]`,
    `[${module}]`,
    `[${level}]`,
    `[event:${event}]`,
  ];
  for (const [key, value] of Object.entries(tags)) {
    if (value !== undefined) {
      parts.push(`[${key}:${value}]`);
    }
  }
  parts.push(message);
  return parts.join(" ");
};

const CONSOLE_SYMBOLS: Record<LogLevel, string> = {
  debug: "*",
  info: "[ok]",
  warn: "[!]",
  error: "[x]",
};

const writeLine = (file: string, line: string): void => {
  try {
    fs.appendFileSync(file, `${line}\n`, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[logger] failed to write ${file}: ${reason}`);
  }
};

interface ModuleSettings {
  logDir: string | undefined;
  fileLevel: LogLevel;
  consoleLevel: LogLevel;
  now: () => Date;
}

const createModuleLogger = (
  module: LogModule,
  settings: ModuleSettings,
): ModuleLogger => {
  const logDir = settings.logDir;
  const log = (
    level: LogLevel,
    event: string,
    tags: LogTags,
    message: string,
  ): void => {
    if (logDir && LOG_LEVELS[level] >= LOG_LEVELS[settings.fileLevel]) {
      const entry = formatLogEntry(
        settings.now().toISOString(),
        module,
        level,
        event,
        tags,
        message,
      );
      writeLine(path.join(logDir, `${module}.log`), entry);
      if (level === "warn" || level === "error") {
        writeLine(path.join(logDir, "errors.log"), entry);
      }
    }

    if (LOG_LEVELS[level] >= LOG_LEVELS[settings.consoleLevel]) {
      const line = `${CONSOLE_SYMBOLS[level]} ${message}`;
      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
  };

  return {
    debug: (event, tags, message) => log("debug", event, tags, message),
    info: (event, tags, message) => log("info", event, tags, message),
    warn: (event, tags, message) => log("warn", event, tags, message),
    error: (event, tags, message) => log("error", event, tags, message),
  };
};

/**
 * Environment overrides win over options:
 * LENDING_LOG_LEVEL, LENDING_CONSOLE_LEVEL, LENDING_LOG_DIR.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const env = options.env ?? process.env;
  const envFileLevel = env.LENDING_LOG_LEVEL;
  const envConsoleLevel = env.LENDING_CONSOLE_LEVEL;
  const settings: ModuleSettings = {
    fileLevel: isLogLevel(envFileLevel)
      ? envFileLevel
      : (options.fileLevel ?? "debug"),
    consoleLevel: isLogLevel(envConsoleLevel)
      ? envConsoleLevel
      : (options.consoleLevel ?? "warn"),
    now: options.now ?? (() => new Date()),
    logDir: env.LENDING_LOG_DIR ?? options.logDir,
  };

  if (settings.logDir) {
    fs.mkdirSync(settings.logDir, { recursive: true });
  }

  return {
    engine: createModuleLogger("engine", settings),
    messages: createModuleLogger("messages", settings),
    lifecycle: createModuleLogger("lifecycle", settings),
    recovery: createModuleLogger("recovery", settings),
    audit: createModuleLogger("audit", settings),
    runtime: createModuleLogger("runtime", settings),
  };
};

const noopModule: ModuleLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const createNoopLogger = (): Logger => ({
  engine: noopModule,
  messages: noopModule,
  lifecycle: noopModule,
  recovery: noopModule,
  audit: noopModule,
  runtime: noopModule,
});
