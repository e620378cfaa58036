/**
 * Output rendering helpers
 */

import type { SectionRecord } from "@inikv/sdk";

/**
 * Print section names, one per line or as a JSON array
 */
export function printSectionNames(names: string[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(names, null, 2));
    return;
  }
  for (const name of names) {
    console.log(name);
  }
}

/**
 * Print one section's entries as `key = value` lines or as a JSON object
 */
export function printEntries(entries: SectionRecord, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }
  for (const [key, value] of Object.entries(entries)) {
    console.log(`${key} = ${value}`);
  }
}

/**
 * Wrap text in red when the stream is a terminal
 */
export function red(text: string, stream: NodeJS.WriteStream): string {
  return stream.isTTY ? `\x1b[31m${text}\x1b[0m` : text;
}
