export default {
  name: "lending-orchestrator",
  auditDir: ".lending/audit",
  stateDir: ".lending/state",
  logDir: ".lending/logs",
  logLevel: "info",
  consoleLevel: "warn",
  orchestratorAgentId: "orchestrator",
  defaultTimeoutSeconds: 60,
  defaultMaxRetries: 1,
  defaultFallback: "abort_workflow",
  patternDirs: [".lending/patterns.d"],
  audit: {
    logAllEvents: true,
    retentionDays: 90,
  },
};
