/**
 * Error types for inikv store operations
 *
 * Invariants:
 * - Store operations return these errors inside a StoreResult; they are never thrown
 * - File errors include the target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all inikv errors
 */
export abstract class IniStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A resource file could not be opened for reading
 */
export class FileOpenError extends IniStoreError {
  readonly code = "E_OPEN";

  constructor(public readonly path: string, options?: ErrorOptions) {
    super(`Unable to open resource file: ${path}`, options);
  }
}

/**
 * The backing file could not be opened or written
 */
export class FileWriteError extends IniStoreError {
  readonly code = "E_WRITE";

  constructor(public readonly path: string, options?: ErrorOptions) {
    super(`Unable to open resource file for writing: ${path}`, options);
  }
}

/**
 * An accessor or mutator ran before any resource was loaded
 */
export class StoreNotLoadedError extends IniStoreError {
  readonly code = "E_NOT_LOADED";

  constructor(options?: ErrorOptions) {
    super("No resource file has been loaded yet", options);
  }
}

export class SectionNotFoundError extends IniStoreError {
  readonly code = "E_NO_SECTION";

  constructor(public readonly section: string, options?: ErrorOptions) {
    super(`Section '${section}' not found in the resource file`, options);
  }
}

export class KeyNotFoundError extends IniStoreError {
  readonly code = "E_NO_KEY";

  constructor(
    public readonly section: string,
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key '${key}' not found in section '${section}'`, options);
  }
}

/**
 * A section, key or value cannot be written without changing on reload
 */
export class InvalidEntryError extends IniStoreError {
  readonly code = "E_INVALID_ENTRY";

  constructor(
    public readonly part: "section" | "key" | "value",
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${part}: ${reason}`, options);
  }
}

/**
 * Thrown by openStore when options fail validation
 */
export class InvalidOptionsError extends IniStoreError {
  readonly code = "E_OPTIONS";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid store options: ${reason}`, options);
  }
}
