import { z } from "zod";

export const summaryPayloadSchema = z.object({
  url: z.string()
});

export const summaryResponseSchema = summaryPayloadSchema.extend({
  id: z.coerce.number().int()
});

export type SummaryPayload = z.infer<typeof summaryPayloadSchema>;
export type SummaryResponse = z.infer<typeof summaryResponseSchema>;
