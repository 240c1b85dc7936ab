import { z } from 'zod';

export const StreamPayloadSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  user_login: z.string().optional(),
  user_name: z.string(),
  game_id: z.string(),
  game_name: z.string(),
  type: z.string(),
  title: z.string(),
  viewer_count: z.number().int(),
  started_at: z.string(),
  language: z.string(),
  thumbnail_url: z.string(),
  tag_ids: z.array(z.string()).nullable().optional(),
  tags: z.array(z.string()).nullable().optional(),
  is_mature: z.boolean(),
});

export type StreamPayload = z.infer<typeof StreamPayloadSchema>;
