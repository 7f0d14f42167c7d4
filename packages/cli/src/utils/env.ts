import { resolve } from "node:path";
import { config } from "dotenv";
import { CONFIG_DIR } from "../config/index.js";

/**
 * Load environment variables from .env files.
 * Priority: CWD .env (project-scoped) > ~/.reelsmith/.env (user-wide).
 * Later loads don't override earlier values, so CWD takes precedence.
 */
export function loadEnv(cwd: string = process.cwd()): void {
  config({ path: resolve(cwd, ".env") });
  config({ path: resolve(CONFIG_DIR, ".env") });
}
