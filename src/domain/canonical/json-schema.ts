import { z } from 'zod';
import type { JsonValue } from './json-types.js';

/**
 * Zod schema for JSON values.
 *
 * Free-form values (builder options) pass through this before they are
 * written into a manifest, so canonicalization never sees a function or
 * `undefined`.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);
