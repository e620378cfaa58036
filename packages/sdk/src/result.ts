import type { IniStoreError } from "./errors.js";
import type { StoreResult } from "./types.js";

export function ok(): StoreResult {
  return { ok: true, value: undefined };
}

export function okWith<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function fail<T = void>(error: IniStoreError): StoreResult<T> {
  return { ok: false, error };
}
