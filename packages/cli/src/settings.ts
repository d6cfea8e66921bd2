/**
 * CLI settings from the environment and command-line options
 */

import { config as loadEnv } from "dotenv";
import type { VitalsConfig } from "@vitals/core";
import { createConfig } from "@vitals/core";

export const DEFAULT_VITALS_FILE = "myVitals.csv";

export type GlobalOptions = {
  file?: string;
  timezone?: string;
  dryRun?: boolean;
};

export interface CliSettings {
  /** Path of the vitals CSV file */
  file: string;
  config: VitalsConfig;
  dryRun: boolean;
}

/**
 * Load .env from the working directory into process.env
 */
export function loadEnvironment(): void {
  loadEnv();
}

/**
 * Options win over VITALS_FILE / VITALS_TIMEZONE, which win over defaults.
 * Throws when the timezone is not a known IANA name.
 */
export function resolveSettings(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CliSettings {
  const timezone = options.timezone || env.VITALS_TIMEZONE;
  return {
    file: options.file || env.VITALS_FILE || DEFAULT_VITALS_FILE,
    config: createConfig(timezone ? { timezone } : {}),
    dryRun: options.dryRun ?? false,
  };
}
