import { z } from "zod";

/** Sidecar written next to each raw partition file by the snapshot writer. */
export const RawSummarySchema = z.object({
  records: z.number().int().nonnegative().nullable().optional(),
  bytes: z.number().int().nonnegative().nullable().optional(),
  hash: z.string().nullable().optional(),
  dq_passed: z.boolean().nullable().optional(),
  dq_level: z.string().nullable().optional(),
  snapshot_version: z.string().min(1),
  start_year: z.number().int().optional(),
  cutoff_year: z.number().int().optional()
});

export type RawSummary = z.infer<typeof RawSummarySchema>;
