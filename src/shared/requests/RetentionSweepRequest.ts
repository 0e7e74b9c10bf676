import { z } from "zod";

export const retentionSweepRequestSchema = z
  .object({
    dryRun: z.boolean().default(false),
  })
  .strict();

export type RetentionSweepRequest = z.output<typeof retentionSweepRequestSchema>;
