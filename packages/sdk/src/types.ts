/**
 * Core types for inikv
 */

import type { IniStoreError } from "./errors.js";
import type { Logger } from "./observability/logs.js";

/**
 * In-memory store contents: section name → (key → value)
 */
export type SectionMap = Map<string, Map<string, string>>;

/**
 * Plain-object view of one section, keys in sorted order
 */
export type SectionRecord = Record<string, string>;

/**
 * A composite key split into its parts
 */
export interface CompositeKey {
  section: string;
  key: string;
  /** True when the input had no dot and the key part is empty */
  malformed: boolean;
}

/**
 * Outcome of a fallible store operation
 */
export type StoreResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: IniStoreError };

/**
 * What set/delete do with their in-memory change when persisting fails
 * - "keep": the change stays applied (memory may diverge from disk)
 * - "rollback": the change is undone before the failure is returned
 */
export type PersistFailurePolicy = "keep" | "rollback";

/**
 * Options for opening a store
 */
export interface StoreOptions {
  /** Diagnostics sink (default: the global logger) */
  logger?: Logger;
  /** Persist-failure handling for set/delete (default: "keep") */
  onPersistFailure?: PersistFailurePolicy;
}

/**
 * Store backed by a sectioned key=value text file
 *
 * Composite keys take the form `section.key`; only the first dot separates.
 */
export interface Store {
  /** Path of the most recently loaded resource, or null before any load */
  readonly backingPath: string | null;

  /** True once a load has succeeded */
  readonly loaded: boolean;

  /**
   * Replace the store contents with the parsed contents of a file
   * @param path - Resource path; surrounding blanks and a trailing newline are trimmed
   */
  load(path: string): StoreResult;

  /**
   * Look up a value by composite key
   */
  get(compositeKey: string): StoreResult<string>;

  /**
   * Insert or overwrite a value, then persist the whole store
   */
  set(compositeKey: string, value: string): StoreResult;

  /**
   * Remove a value, pruning its section when it becomes empty, then persist
   */
  delete(compositeKey: string): StoreResult;

  /**
   * Write every section to the backing file
   */
  persist(): StoreResult;

  /**
   * Check whether a composite key resolves to a value
   */
  has(compositeKey: string): boolean;

  /**
   * Section names in serialization order
   */
  sections(): string[];

  /**
   * Entries of one section in serialization order
   */
  entries(section: string): StoreResult<SectionRecord>;

  /**
   * Sorted plain-object copy of the whole store
   */
  snapshot(): Record<string, SectionRecord>;

  /**
   * Forget the backing path and all sections
   */
  reset(): void;
}
