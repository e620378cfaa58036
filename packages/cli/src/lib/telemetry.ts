/**
 * Command timing on stderr, shown when INIKV_CLI_DEBUG=1
 */

import { isVerbose } from "./env.js";

export type Outcome = "ok" | "error";

const LINE_BREAKS = /[\r\n]+/g;

export function formatMetric(command: string, elapsedMs: number, outcome: Outcome): string {
  const name = command.replace(LINE_BREAKS, " ").trim();
  return `metric command=${name} elapsed_ms=${elapsedMs} outcome=${outcome}\n`;
}

/**
 * Run a command body and report how long it took
 *
 * Store operations are synchronous, so the body is too. Errors propagate after
 * the metric is written.
 */
export function timed<T>(command: string, run: () => T): T {
  const started = performance.now();
  let outcome: Outcome = "error";

  try {
    const result = run();
    outcome = "ok";
    return result;
  } finally {
    if (isVerbose()) {
      process.stderr.write(formatMetric(command, Math.round(performance.now() - started), outcome));
    }
  }
}
