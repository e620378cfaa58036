/**
 * Process-wide resource accessor with integer status codes
 *
 * Each function delegates to one shared store. Hosts that manage their own
 * stores should use `openStore` instead.
 */

import { openStore } from "./store.js";
import { StatusCode, toStatusCode } from "./status.js";
import type { Store } from "./types.js";

const resource: Store = openStore();

export interface ValueLookup {
  status: StatusCode;
  /** Present only when status is Ok */
  value?: string;
}

export function loadResource(path: string): StatusCode {
  return toStatusCode(resource.load(path));
}

export function getValue(key: string): ValueLookup {
  const result = resource.get(key);
  return result.ok ? { status: StatusCode.Ok, value: result.value } : { status: toStatusCode(result) };
}

export function setValue(key: string, value: string): StatusCode {
  return toStatusCode(resource.set(key, value));
}

export function deleteValue(key: string): StatusCode {
  return toStatusCode(resource.delete(key));
}

export function dumpValues(): StatusCode {
  return toStatusCode(resource.persist());
}

/**
 * Drop the loaded resource so the next call starts from an unloaded store
 */
export function resetResource(): void {
  resource.reset();
}
