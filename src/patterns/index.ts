import type { CollaborationPattern } from "../core/types";
import applicationProcessing from "./application-processing";
import exceptionResolution from "./exception-resolution";

export const BUILTIN_PATTERNS: readonly CollaborationPattern[] = [
  applicationProcessing,
  exceptionResolution,
];
