// backend/services/trends/src/contracts/risingTerm.contract.ts
/**
 * Purpose:
 * - Wire contract for one "top rising term" row accepted by POST /terms.
 *
 * Invariants:
 * - Dates are YYYY-MM-DD calendar dates (they bind to DATE parameters).
 * - Counters are integers (they bind to INT64 parameters).
 * - Unknown keys are rejected to surface client drift.
 */

import { z } from "zod";
import { calendarDateMs } from "../filters/RangeFilterBuilder";
import { PayloadError } from "../errors";

const calendarDate = z
  .string()
  .refine((v) => calendarDateMs(v) !== null, "must be a YYYY-MM-DD calendar date");

export const RisingTermSchema = z
  .object({
    refresh_date: calendarDate,
    dma_name: z.string(),
    dma_id: z.number().int().safe(),
    term: z.string(),
    week: calendarDate,
    score: z.number().int().safe(),
    rank: z.number().int().safe(),
    percent_gain: z.number().int().safe(),
  })
  .strict();

export type RisingTermPayload = z.infer<typeof RisingTermSchema>;

/** Parse or throw PayloadError naming every offending field. */
export function assertRisingTerm(input: unknown): RisingTermPayload {
  const parsed = RisingTermSchema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((i) => ({
    path: i.path.join(".") || "<body>",
    message: i.message,
  }));
  throw new PayloadError(
    `invalid rising term payload: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
    { meta: { issues } }
  );
}
