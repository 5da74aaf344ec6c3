import { z } from 'zod';

/**
 * Zod schema for a single inbound event submission.
 *
 * The address is trimmed but otherwise passed through untouched;
 * lookups downstream degrade on malformed addresses instead of failing.
 */
export const ingestEventSchema = z.object({
  description: z.string().trim().min(1).max(1024),
  source_ip: z.string().trim().min(1).max(255),
});

export type IngestEventInput = z.infer<typeof ingestEventSchema>;
