/**
 * Store adapter for CLI
 * Loads the resource up front and turns failed results into thrown errors
 */

import { Logger, openStore, type Store, type StoreResult } from "@inikv/sdk";

/**
 * Return the value of a successful result, or throw its error
 */
export function unwrap<T>(result: StoreResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Open a store and load the resource file
 * @param resourcePath - Absolute path of the resource
 * @param options.verbose - Show store warnings and errors on stderr
 */
export function openCliStore(resourcePath: string, options: { verbose?: boolean } = {}): Store {
  // Store diagnostics stay off stdout so command output can be piped
  const logger = new Logger("warn");
  logger.setEnabled(options.verbose ?? false);

  const store = openStore({ logger });
  unwrap(store.load(resourcePath));
  return store;
}
