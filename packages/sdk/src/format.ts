/**
 * Sectioned key=value text format
 *
 * ```
 * [section]
 * key = value
 *
 * [other]
 * ...
 * ```
 *
 * Reading skips blank lines and `;` comments; writing emits neither comments
 * nor anything beyond one blank line after each section.
 */

import { trimText } from "./keys.js";
import type { SectionMap, SectionRecord } from "./types.js";

/**
 * Code-unit ordering, independent of locale
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Parse resource text into sections
 *
 * A `[name]` line starts a section; lines before any header belong to the
 * section named "". A line with an `=` is split at the first `=` and both
 * sides are trimmed. Other lines are ignored. A header without entries does
 * not create a section.
 */
export function parseIni(content: string): SectionMap {
  const sections: SectionMap = new Map();
  let current = "";

  for (const raw of content.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;

    // skip blanks and comments
    if (line.length === 0 || line.startsWith(";")) {
      continue;
    }

    if (line.startsWith("[") && line.endsWith("]")) {
      current = line.slice(1, -1);
      continue;
    }

    const eq = line.indexOf("=");
    if (eq === -1) {
      continue;
    }

    const key = trimText(line.slice(0, eq));
    const value = trimText(line.slice(eq + 1));

    let entries = sections.get(current);
    if (!entries) {
      entries = new Map();
      sections.set(current, entries);
    }
    entries.set(key, value);
  }

  return sections;
}

/**
 * Keys of a map in serialization order
 */
export function sortedKeys(map: ReadonlyMap<string, unknown>): string[] {
  return [...map.keys()].sort(compareText);
}

/**
 * Copy one section into a sorted plain object
 */
export function toRecord(entries: ReadonlyMap<string, string>): SectionRecord {
  const record: SectionRecord = {};
  for (const key of sortedKeys(entries)) {
    record[key] = entries.get(key) ?? "";
  }
  return record;
}

/**
 * Serialize sections in deterministic order
 *
 * Sections and keys are sorted by code unit. Every section ends with a blank
 * line, so the output of a non-empty store ends with "\n\n".
 */
export function serializeIni(sections: SectionMap): string {
  const lines: string[] = [];

  for (const section of sortedKeys(sections)) {
    lines.push(`[${section}]`);
    const entries = sections.get(section) ?? new Map<string, string>();
    for (const key of sortedKeys(entries)) {
      lines.push(`${key} = ${entries.get(key) ?? ""}`);
    }
    lines.push("");
  }

  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Check if two resource texts hold the same sections, keys and values
 * (ignoring comments, whitespace and ordering)
 */
export function iniEqual(a: string, b: string): boolean {
  return serializeIni(parseIni(a)) === serializeIni(parseIni(b));
}
