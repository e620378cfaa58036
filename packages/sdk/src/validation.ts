/**
 * Validation of entries before they are written
 *
 * Each check rejects text that would change meaning when the file is read
 * back: a line break splits the entry, a bracket or `=` in a section name
 * breaks its header line, and a key starting with `;` or `[` reads back as a
 * comment or a header. Keys and values are trimmed on read, so blanks at
 * either end are rejected too.
 */

import { InvalidEntryError } from "./errors.js";

const LINE_BREAK = /[\r\n]/;
const SECTION_FORBIDDEN = /[[\]=]/;
const EDGE_BLANKS = /^[ \t]|[ \t]$/;

export function validateSection(section: string): InvalidEntryError | undefined {
  if (LINE_BREAK.test(section)) {
    return new InvalidEntryError("section", `"${section}" contains a line break`);
  }
  if (SECTION_FORBIDDEN.test(section)) {
    return new InvalidEntryError("section", `"${section}" cannot contain "[", "]" or "="`);
  }
  return undefined;
}

export function validateKey(key: string): InvalidEntryError | undefined {
  if (LINE_BREAK.test(key)) {
    return new InvalidEntryError("key", `"${key}" contains a line break`);
  }
  if (key.includes("=")) {
    return new InvalidEntryError("key", `"${key}" cannot contain "="`);
  }
  if (key.startsWith(";") || key.startsWith("[")) {
    return new InvalidEntryError("key", `"${key}" cannot start with ";" or "["`);
  }
  if (EDGE_BLANKS.test(key)) {
    return new InvalidEntryError("key", `"${key}" cannot start or end with a space or tab`);
  }
  return undefined;
}

export function validateValue(value: string): InvalidEntryError | undefined {
  if (LINE_BREAK.test(value)) {
    return new InvalidEntryError("value", "values cannot contain line breaks");
  }
  if (EDGE_BLANKS.test(value)) {
    return new InvalidEntryError("value", "values cannot start or end with a space or tab");
  }
  return undefined;
}

/**
 * Validate all parts of an entry, reporting the first problem found
 */
export function validateEntry(
  section: string,
  key: string,
  value: string
): InvalidEntryError | undefined {
  return validateSection(section) ?? validateKey(key) ?? validateValue(value);
}
