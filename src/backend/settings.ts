// Settings come from the environment, optionally seeded from .env files in
// the working directory:
// 1. .env
// 2. .env.local (overrides .env)
//
// CPRBIN_LOG_FILE  mirror console output to this file
// CPRBIN_VERBOSE   1/true/yes prints per-chunk detail

import { config } from "dotenv";
import * as path from "path";

export interface CprbinSettings {
  logFilePath: string | null;
  verbose: boolean;
}

function parseBoolFlag(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

export function loadSettings(workingDir: string): CprbinSettings {
  config({ path: path.join(workingDir, ".env") });
  config({ path: path.join(workingDir, ".env.local"), override: true });

  const env = process.env;
  const logFile = env.CPRBIN_LOG_FILE?.trim();
  return {
    logFilePath: logFile ? path.resolve(workingDir, logFile) : null,
    verbose: parseBoolFlag(env.CPRBIN_VERBOSE),
  };
}
