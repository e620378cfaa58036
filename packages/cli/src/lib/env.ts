/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_RESOURCE = "./config.ini";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the resource file path
 * Priority: --file option > INIKV_FILE env var > default "./config.ini"
 */
export function resolveResourcePath(cliFile?: string): string {
  const file = cliFile ?? process.env.INIKV_FILE ?? DEFAULT_RESOURCE;
  return path.resolve(expandTilde(file.trim()));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.INIKV_CLI_DEBUG === "1";
}
