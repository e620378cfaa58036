/**
 * CLI testing utilities
 */

import { execa } from "execa";
import { fileURLToPath } from "node:url";

/**
 * Workspace root; tsx resolves from its node_modules
 */
const WORKSPACE_ROOT = fileURLToPath(new URL("../../..", import.meta.url));

/**
 * CLI entry source, run through the tsx loader so no build is needed
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Execute the inikv CLI in a child process
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { env, input, timeout = 15000 } = options;

  const result = await execa(process.execPath, ["--import", "tsx", CLI_ENTRY, ...args], {
    cwd: WORKSPACE_ROOT,
    env: { ...process.env, ...env },
    input,
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}
