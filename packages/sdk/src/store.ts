/**
 * Main store implementation
 */

import type {
  CompositeKey,
  PersistFailurePolicy,
  SectionMap,
  SectionRecord,
  Store,
  StoreOptions,
  StoreResult,
} from "./types.js";
import {
  FileOpenError,
  KeyNotFoundError,
  SectionNotFoundError,
  StoreNotLoadedError,
} from "./errors.js";
import { readResource, writeResource } from "./io.js";
import { parseIni, serializeIni, sortedKeys, toRecord } from "./format.js";
import { splitCompositeKey, trimText } from "./keys.js";
import { validateEntry } from "./validation.js";
import { ok, okWith, fail } from "./result.js";
import { resolveStoreOptions } from "./schemas.js";
import type { Logger } from "./observability/logs.js";

/**
 * Key-value store backed by a sectioned text file
 *
 * Every operation is synchronous. Mutations rewrite the whole backing file
 * before returning; their result is the result of that write.
 *
 * @example
 * ```typescript
 * const store = openStore();
 *
 * store.load("./app.ini");
 *
 * const port = store.get("db.port");
 * if (port.ok) console.log(port.value);
 *
 * store.set("db.port", "5433");
 * store.delete("app.name");
 * ```
 */
class IniStore implements Store {
  #sections: SectionMap = new Map();
  #backingPath: string | null = null;
  #logger: Logger;
  #onPersistFailure: PersistFailurePolicy;

  constructor(options?: StoreOptions) {
    const resolved = resolveStoreOptions(options);
    this.#logger = resolved.logger;
    this.#onPersistFailure = resolved.onPersistFailure;
  }

  get backingPath(): string | null {
    return this.#backingPath;
  }

  get loaded(): boolean {
    return this.#backingPath !== null;
  }

  /**
   * Replace the store contents with a parsed resource file
   *
   * On failure the previous sections and backing path are left as they were.
   * On success anything not yet persisted from the previous resource is lost.
   */
  load(path: string): StoreResult {
    const resourcePath = trimText(path);
    const content = readResource(resourcePath);

    if (content instanceof FileOpenError) {
      this.#logger.error("resource.open_failed", {
        path: resourcePath,
        message: describeCause(content),
      });
      return fail(content);
    }

    this.#sections = parseIni(content);
    this.#backingPath = resourcePath;

    let entries = 0;
    for (const section of this.#sections.values()) {
      entries += section.size;
    }
    this.#logger.info("resource.loaded", {
      path: resourcePath,
      details: { sections: this.#sections.size, entries },
    });

    return ok();
  }

  get(compositeKey: string): StoreResult<string> {
    const parts = this.#resolve(compositeKey);
    if (!parts.ok) {
      return parts;
    }

    const { section, key } = parts.value;
    const entries = this.#sections.get(section);
    if (!entries) {
      this.#logger.error("section.not_found", { section });
      return fail(new SectionNotFoundError(section));
    }

    const value = entries.get(key);
    if (value === undefined) {
      this.#logger.error("key.not_found", { section, key });
      return fail(new KeyNotFoundError(section, key));
    }

    return okWith(value);
  }

  /**
   * Insert or overwrite a value, creating its section when needed
   */
  set(compositeKey: string, value: string): StoreResult {
    const parts = this.#resolve(compositeKey);
    if (!parts.ok) {
      return parts;
    }

    const { section, key } = parts.value;
    const invalid = validateEntry(section, key, value);
    if (invalid) {
      this.#logger.error("entry.invalid", { section, key, message: invalid.message });
      return fail(invalid);
    }

    let entries = this.#sections.get(section);
    const createdSection = entries === undefined;
    if (!entries) {
      entries = new Map();
      this.#sections.set(section, entries);
    }
    const previous = entries.get(key);
    entries.set(key, value);

    const target = entries;
    return this.#persistOrRollback(section, key, () => {
      if (createdSection) {
        this.#sections.delete(section);
      } else if (previous === undefined) {
        target.delete(key);
      } else {
        target.set(key, previous);
      }
    });
  }

  /**
   * Remove a value; a section left without entries is removed too
   */
  delete(compositeKey: string): StoreResult {
    const parts = this.#resolve(compositeKey);
    if (!parts.ok) {
      return parts;
    }

    const { section, key } = parts.value;
    const entries = this.#sections.get(section);
    if (!entries) {
      this.#logger.error("section.not_found", { section });
      return fail(new SectionNotFoundError(section));
    }

    const previous = entries.get(key);
    if (previous === undefined) {
      this.#logger.error("key.not_found", { section, key });
      return fail(new KeyNotFoundError(section, key));
    }

    entries.delete(key);
    const pruned = entries.size === 0;
    if (pruned) {
      this.#sections.delete(section);
    }

    return this.#persistOrRollback(section, key, () => {
      entries.set(key, previous);
      if (pruned) {
        this.#sections.set(section, entries);
      }
    });
  }

  /**
   * Rewrite the backing file from the in-memory sections
   *
   * A store that was never loaded has no backing path and fails like any
   * other unwritable target.
   */
  persist(): StoreResult {
    const target = this.#backingPath ?? "";
    const error = writeResource(target, serializeIni(this.#sections));

    if (error) {
      this.#logger.error("resource.write_failed", {
        path: target,
        message: describeCause(error),
      });
      return fail(error);
    }

    this.#logger.debug("resource.persisted", {
      path: target,
      details: { sections: this.#sections.size },
    });
    return ok();
  }

  has(compositeKey: string): boolean {
    if (!this.loaded) {
      return false;
    }
    const { section, key } = splitCompositeKey(trimText(compositeKey));
    return this.#sections.get(section)?.has(key) ?? false;
  }

  sections(): string[] {
    return sortedKeys(this.#sections);
  }

  entries(section: string): StoreResult<SectionRecord> {
    if (!this.loaded) {
      return fail(new StoreNotLoadedError());
    }

    const name = trimText(section);
    const entries = this.#sections.get(name);
    if (!entries) {
      return fail(new SectionNotFoundError(name));
    }
    return okWith(toRecord(entries));
  }

  snapshot(): Record<string, SectionRecord> {
    const copy: Record<string, SectionRecord> = {};
    for (const section of sortedKeys(this.#sections)) {
      copy[section] = toRecord(this.#sections.get(section) ?? new Map<string, string>());
    }
    return copy;
  }

  reset(): void {
    this.#sections = new Map();
    this.#backingPath = null;
  }

  /**
   * Common preamble of get/set/delete: loaded check, trim, split
   */
  #resolve(compositeKey: string): StoreResult<CompositeKey> {
    const trimmed = trimText(compositeKey);

    if (!this.loaded) {
      this.#logger.error("store.not_loaded", { message: `cannot resolve "${trimmed}"` });
      return fail(new StoreNotLoadedError());
    }

    const parts = splitCompositeKey(trimmed);
    if (parts.malformed) {
      this.#logger.warn("key.malformed", {
        section: parts.section,
        key: parts.key,
        message: `no "." in "${trimmed}"; using an empty key`,
      });
    }

    return okWith(parts);
  }

  #persistOrRollback(section: string, key: string, undo: () => void): StoreResult {
    const result = this.persist();
    if (!result.ok && this.#onPersistFailure === "rollback") {
      undo();
      this.#logger.warn("store.rollback", { section, key });
    }
    return result;
  }
}

function describeCause(error: Error): string {
  return error.cause instanceof Error ? error.cause.message : error.message;
}

/**
 * Open an empty store
 *
 * Call `load` before any accessor or mutator.
 *
 * @throws InvalidOptionsError if options fail validation
 */
export function openStore(options?: StoreOptions): Store {
  return new IniStore(options);
}
