// Configuration.
//
// Options are validated once, when a codec is created. Everything is
// optional; unset options fall back to the defaults of the component that
// reads them.

import { z } from "zod";
import { InvalidArgumentError, formatIssues } from "@shapewire/codec";

export const ShapewireConfigSchema = z
  .object({
    /** Debug namespace patterns, e.g. "shapewire:*,-shapewire:unmarshall" */
    debug: z.string().optional(),
    /** Separator between list items in header values */
    headerListSeparator: z.string().min(1).optional(),
    /** Source of idempotency tokens */
    idempotencyTokenProvider: z
      .custom<() => string>((value) => typeof value === "function", {
        message: "idempotencyTokenProvider must be a function",
      })
      .optional(),
  })
  .strict();

export type ShapewireConfig = z.infer<typeof ShapewireConfigSchema>;

/**
 * Validate a configuration object.
 *
 * @throws InvalidArgumentError on unknown keys or values of the wrong type
 */
export function parseConfig(input: unknown): ShapewireConfig {
  const result = ShapewireConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid configuration: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Configuration from environment variables (`DEBUG`, `SHAPEWIRE_HEADER_LIST_SEPARATOR`). */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ShapewireConfig {
  return parseConfig({
    debug: env.DEBUG,
    headerListSeparator: env.SHAPEWIRE_HEADER_LIST_SEPARATOR,
  });
}
