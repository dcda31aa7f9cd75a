import { z } from 'zod';

/**
 * Zod schema for validating a single inbound event.
 *
 * - `type` is the only required field and must be non-empty.
 * - `payload` is an opaque string; absent or `null` is stored as `""`.
 * - Unknown keys are stripped rather than rejected.
 */
export const newEventSchema = z.object({
  type: z.string().min(1),
  payload: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
});

/** Inferred type representing a validated event candidate. */
export type NewEventInput = z.infer<typeof newEventSchema>;
