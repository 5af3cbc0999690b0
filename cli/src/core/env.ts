/**
 * Environment loading
 *
 * Reads `<home>/.env` into process.env with dotenv. Variables already set in
 * the environment win over the file.
 */

import { config } from "dotenv";
import { homedir } from "os";
import { join } from "path";

const DEFAULT_HOME_DIRNAME = ".taskminder";

/** Directory for the .env file, token file and logs. */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.TASKMINDER_HOME?.trim();
  return configured ? configured : join(homedir(), DEFAULT_HOME_DIRNAME);
}

/**
 * Load `<home>/.env` into process.env if present. Returns the path that was tried, and
 * whether it was loaded.
 */
export function loadEnvFile(homeDir: string = resolveHomeDir()): { path: string; loaded: boolean } {
  const path = join(homeDir, ".env");
  // A missing file is the normal case; dotenv reports it as an error
  const result = config({ path, override: false });
  return { path, loaded: result.error === undefined };
}
