/**
 * Numeric status codes for hosts that consume plain integers
 */

import {
  FileOpenError,
  FileWriteError,
  InvalidEntryError,
  KeyNotFoundError,
  SectionNotFoundError,
  StoreNotLoadedError,
  type IniStoreError,
} from "./errors.js";
import type { StoreResult } from "./types.js";

export const StatusCode = {
  Ok: 0,
  FileOpenFailed: 1,
  InvalidEntry: 2,
  NotFound: 3,
  NotLoaded: 4,
  WriteFailed: 255,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

/**
 * Map an error to its status code
 *
 * Missing sections and missing keys share NotFound; inspect the error class
 * to tell them apart.
 */
export function statusOfError(error: IniStoreError): StatusCode {
  if (error instanceof FileOpenError) return StatusCode.FileOpenFailed;
  if (error instanceof FileWriteError) return StatusCode.WriteFailed;
  if (error instanceof StoreNotLoadedError) return StatusCode.NotLoaded;
  if (error instanceof SectionNotFoundError || error instanceof KeyNotFoundError) {
    return StatusCode.NotFound;
  }
  if (error instanceof InvalidEntryError) return StatusCode.InvalidEntry;
  return StatusCode.WriteFailed;
}

export function toStatusCode(result: StoreResult<unknown>): StatusCode {
  return result.ok ? StatusCode.Ok : statusOfError(result.error);
}
