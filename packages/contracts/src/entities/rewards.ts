import { z } from 'zod';

export const CustomRewardPayloadSchema = z.object({
  broadcaster_id: z.string(),
  broadcaster_login: z.string(),
  broadcaster_name: z.string(),
  id: z.string(),
  title: z.string(),
  prompt: z.string(),
  cost: z.number().int(),
  background_color: z.string(),
  is_enabled: z.boolean(),
  is_user_input_required: z.boolean(),
  is_paused: z.boolean(),
  is_in_stock: z.boolean(),
  should_redemptions_skip_request_queue: z.boolean(),
  redemptions_redeemed_current_stream: z.number().int().nullable(),
  cooldown_expires_at: z.string().nullable(),
});

export type CustomRewardPayload = z.infer<typeof CustomRewardPayloadSchema>;

export type CustomRewardCreate = {
  title: string;
  cost: number;
  prompt?: string;
  is_enabled?: boolean;
  background_color?: string;
  is_user_input_required?: boolean;
  should_redemptions_skip_request_queue?: boolean;
};
