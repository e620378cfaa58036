/**
 * inikv SDK
 *
 * An embeddable key-value store backed by sectioned key=value text files
 */

// Re-export types
export type {
  CompositeKey,
  PersistFailurePolicy,
  SectionMap,
  SectionRecord,
  Store,
  StoreOptions,
  StoreResult,
} from "./types.js";

// Store
export { openStore } from "./store.js";

// Status-code facade over a process-wide store
export {
  loadResource,
  getValue,
  setValue,
  deleteValue,
  dumpValues,
  resetResource,
  type ValueLookup,
} from "./resource.js";
export { StatusCode, statusOfError, toStatusCode } from "./status.js";

// Re-export utilities
export { trimText, splitCompositeKey } from "./keys.js";
export { parseIni, serializeIni, iniEqual } from "./format.js";
export { validateEntry, validateSection, validateKey, validateValue } from "./validation.js";
export { readResource, writeResource } from "./io.js";
export { StoreOptionsSchema, PersistFailurePolicySchema } from "./schemas.js";

// Diagnostics
export { Logger, logger, resolveLogLevel, type LogLevel, type LogEntry } from "./observability/logs.js";

// Re-export errors
export {
  IniStoreError,
  FileOpenError,
  FileWriteError,
  StoreNotLoadedError,
  SectionNotFoundError,
  KeyNotFoundError,
  InvalidEntryError,
  InvalidOptionsError,
} from "./errors.js";
