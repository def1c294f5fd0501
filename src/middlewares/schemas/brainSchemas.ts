/**
 * Brain Validation Schemas
 * Zod schemas for signature and report requests.
 */

import { z } from "zod";

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Must be an ISO date" })
  .transform((value) => new Date(value).toISOString());

export const transcriptParamsSchema = z.object({
  transcriptId: z.string().trim().min(1).max(200),
});

export const convergenceQuerySchema = z
  .object({
    from: isoDate,
    to: isoDate,
    channelId: z.string().trim().min(1).optional(),
    outliers: z.coerce.number().int().min(0).max(100).optional(),
    resonant: z.coerce.number().int().min(0).max(100).optional(),
  })
  .refine((q) => Date.parse(q.from) < Date.parse(q.to), {
    message: "'from' must be earlier than 'to'",
    path: ["from"],
  });

export const climateQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});
