/**
 * Zod schemas for validating store options
 */

import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import { Logger, logger as defaultLogger } from "./observability/logs.js";
import type { PersistFailurePolicy, StoreOptions } from "./types.js";

export const PersistFailurePolicySchema = z.enum(["keep", "rollback"]);

export const StoreOptionsSchema = z
  .object({
    logger: z.instanceof(Logger).optional(),
    onPersistFailure: PersistFailurePolicySchema.optional(),
  })
  .strict();

export interface ResolvedStoreOptions {
  logger: Logger;
  onPersistFailure: PersistFailurePolicy;
}

/**
 * Validate options and fill in defaults
 * @throws InvalidOptionsError listing every failing field
 */
export function resolveStoreOptions(options: StoreOptions = {}): ResolvedStoreOptions {
  const parsed = StoreOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new InvalidOptionsError(reason, { cause: parsed.error });
  }

  return {
    logger: parsed.data.logger ?? defaultLogger,
    onPersistFailure: parsed.data.onPersistFailure ?? "keep",
  };
}
