import fs from "node:fs";
import path from "node:path";
import { CONFIG_DIR, type ProjectConfig, defaultProjectConfig } from "./config";

const toLiteral = (value: unknown): string => JSON.stringify(value);

const buildTemplate = (config: ProjectConfig): string => `export default {
  name: ${toLiteral(config.name)},
  auditDir: ${toLiteral(config.auditDir)},
${config.stateDir ? `  stateDir: ${toLiteral(config.stateDir)},\n` : ""}${config.logDir ? `  logDir: ${toLiteral(config.logDir)},\n` : ""}  logLevel: ${toLiteral(config.logLevel)},
  consoleLevel: ${toLiteral(config.consoleLevel)},
  orchestratorAgentId: ${toLiteral(config.orchestratorAgentId)},
  defaultTimeoutSeconds: ${config.defaultTimeoutSeconds},
  defaultMaxRetries: ${config.defaultMaxRetries},
  defaultFallback: ${toLiteral(config.defaultFallback)},
  patternDirs: ${toLiteral(config.patternDirs)},
  audit: {
    logAllEvents: ${config.audit.logAllEvents},
    retentionDays: ${config.audit.retentionDays},
  },
};
`;

export interface ProjectBootstrapOptions {
  force?: boolean;
  overrides?: Partial<ProjectConfig>;
}

export interface ProjectBootstrapResult {
  file: string;
  created: boolean;
  overwritten: boolean;
  skipped: boolean;
  reason?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const loadPackageName = (cwd: string): string | undefined => {
  const packagePath = path.join(cwd, "package.json");
  if (!fs.existsSync(packagePath)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(packagePath, "utf8"));
  } catch {
    return undefined;
  }
  return isRecord(parsed) && typeof parsed.name === "string"
    ? parsed.name
    : undefined;
};

/** Writes `.lending/project.ts` seeded from defaults and the package name. */
export const bootstrapProjectConfig = (
  cwd: string,
  options: ProjectBootstrapOptions = {},
): ProjectBootstrapResult => {
  const file = path.join(cwd, CONFIG_DIR, "project.ts");
  const exists = fs.existsSync(file);

  if (exists && !options.force) {
    return {
      file,
      created: false,
      overwritten: false,
      skipped: true,
      reason: "project.ts already exists (use force to overwrite)",
    };
  }

  const packageName = loadPackageName(cwd);
  const merged: ProjectConfig = {
    ...defaultProjectConfig,
    ...(packageName ? { name: packageName } : {}),
    ...(options.overrides ?? {}),
  };

  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, buildTemplate(merged), "utf8");

  return {
    file,
    created: !exists,
    overwritten: exists,
    skipped: false,
  };
};
