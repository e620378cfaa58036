/**
 * Text trimming and composite key handling
 */

import type { CompositeKey } from "./types.js";

const LEADING_BLANKS = /^[ \t]+/;
const TRAILING_BLANKS = /[ \t]+$/;

/**
 * Strip leading and trailing spaces/tabs, then one trailing newline.
 *
 * Blanks are removed before the newline, so `"value \n"` keeps its inner space.
 */
export function trimText(value: string): string {
  const trimmed = value.replace(LEADING_BLANKS, "").replace(TRAILING_BLANKS, "");
  return trimmed.endsWith("\n") ? trimmed.slice(0, -1) : trimmed;
}

/**
 * Split a composite key at its first dot into section and key.
 *
 * A key without a dot is malformed: the whole input becomes the section and the
 * key is empty. Callers decide how to report it; the split never fails.
 *
 * @example
 * splitCompositeKey("db.pool.size") // { section: "db", key: "pool.size", malformed: false }
 */
export function splitCompositeKey(compositeKey: string): CompositeKey {
  const dot = compositeKey.indexOf(".");
  if (dot === -1) {
    return { section: compositeKey, key: "", malformed: true };
  }

  return {
    section: compositeKey.slice(0, dot),
    key: compositeKey.slice(dot + 1),
    malformed: false,
  };
}

