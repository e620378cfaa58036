/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger, openStore } from "@inikv/sdk";
import type { Store, StoreOptions } from "@inikv/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "inikv-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "inikv-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a resource file into a directory
 * @returns Absolute path of the written file
 */
export async function writeResourceFile(
  dir: string,
  content: string,
  name = "resource.ini"
): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, content, "utf-8");
  return filePath;
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a store loaded from a temporary resource file
 *
 * The store logs nothing unless a logger is passed in the options.
 *
 * @param content - Initial resource file content
 * @param fn - Function to execute with the loaded store and file path
 * @param options - Optional store options
 * @returns Result of fn
 */
export async function withTempStore<T>(
  content: string,
  fn: (store: Store, filePath: string) => Promise<T>,
  options?: StoreOptions
): Promise<T> {
  return withTempDir(async (dir) => {
    const filePath = await writeResourceFile(dir, content);

    let logger = options?.logger;
    if (!logger) {
      logger = new Logger();
      logger.setEnabled(false);
    }

    const store = openStore({ ...options, logger });
    const loaded = store.load(filePath);
    if (!loaded.ok) {
      throw loaded.error;
    }

    return fn(store, filePath);
  });
}
