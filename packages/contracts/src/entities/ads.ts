import { z } from 'zod';

export const CommercialPayloadSchema = z.object({
  length: z.number().int(),
  message: z.string(),
  retry_after: z.number().int(),
});

export const AdSchedulePayloadSchema = z.object({
  snooze_count: z.number().int(),
  snooze_refresh_at: z.union([z.string(), z.number()]),
  next_ad_at: z.union([z.string(), z.number()]),
  duration: z.number().int(),
  last_ad_at: z.union([z.string(), z.number()]),
  preroll_free_time: z.number().int(),
});

export type CommercialPayload = z.infer<typeof CommercialPayloadSchema>;
export type AdSchedulePayload = z.infer<typeof AdSchedulePayloadSchema>;

export const SnoozeNextAdPayloadSchema = z.object({
  snooze_count: z.number().int(),
  snooze_refresh_at: z.union([z.string(), z.number()]),
  next_ad_at: z.union([z.string(), z.number()]),
});

export type SnoozeNextAdPayload = z.infer<typeof SnoozeNextAdPayloadSchema>;
