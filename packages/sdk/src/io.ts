/**
 * Synchronous file I/O for resource files
 *
 * Invariants:
 * - Reads are UTF-8 only; any failure surfaces as FileOpenError
 * - Writes truncate the target in place (no temp file, no rename)
 * - Descriptors are closed on every exit path
 * - Both functions return errors instead of throwing them
 */

import * as fs from "node:fs";
import { FileOpenError, FileWriteError } from "./errors.js";

/**
 * Read a resource file
 * @returns File contents, or the FileOpenError describing why it could not be read
 */
export function readResource(filePath: string): string | FileOpenError {
  if (!filePath) {
    return new FileOpenError(filePath, {
      cause: new TypeError("Resource path must be a non-empty string"),
    });
  }

  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return new FileOpenError(filePath, { cause: err });
  }
}

/**
 * Truncate a file and write content to it
 * @returns FileWriteError on failure, undefined on success
 */
export function writeResource(filePath: string, content: string): FileWriteError | undefined {
  if (!filePath) {
    return new FileWriteError(filePath, {
      cause: new TypeError("No backing path; load a resource first"),
    });
  }

  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, "w");
    fs.writeFileSync(fd, content, "utf-8");
    return undefined;
  } catch (err) {
    return new FileWriteError(filePath, { cause: err });
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
  }
}
