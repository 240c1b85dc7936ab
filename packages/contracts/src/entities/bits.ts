import { z } from 'zod';

const CheerImageSizesSchema = z.record(z.string(), z.string());

export const CheerEmoteTierPayloadSchema = z.object({
  min_bits: z.number().int(),
  id: z.string(),
  color: z.string(),
  images: z.record(
    z.string(),
    z.object({
      animated: CheerImageSizesSchema,
      static: CheerImageSizesSchema,
    })
  ),
  can_cheer: z.boolean(),
  show_in_bits_card: z.boolean(),
});

export const CheerEmotePayloadSchema = z.object({
  prefix: z.string(),
  tiers: z.array(CheerEmoteTierPayloadSchema),
  type: z.enum(['global_first_party', 'global_third_party', 'channel_custom', 'display_only', 'sponsored']),
  order: z.number().int(),
  last_updated: z.string(),
  is_charitable: z.boolean(),
});

export const BitsLeaderboardEntryPayloadSchema = z.object({
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string(),
  rank: z.number().int(),
  score: z.number().int(),
});

export type CheerEmoteTierPayload = z.infer<typeof CheerEmoteTierPayloadSchema>;
export type CheerEmotePayload = z.infer<typeof CheerEmotePayloadSchema>;
export type BitsLeaderboardEntryPayload = z.infer<typeof BitsLeaderboardEntryPayloadSchema>;

export const BitsLeaderboardResponseSchema = z.object({
  data: z.array(BitsLeaderboardEntryPayloadSchema),
  date_range: z.object({
    started_at: z.string(),
    ended_at: z.string(),
  }),
  total: z.number().int(),
});

export type BitsLeaderboardResponse = z.infer<typeof BitsLeaderboardResponseSchema>;
