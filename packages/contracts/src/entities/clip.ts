import { z } from 'zod';

export const ClipPayloadSchema = z.object({
  id: z.string(),
  url: z.string(),
  embed_url: z.string(),
  broadcaster_id: z.string(),
  broadcaster_name: z.string(),
  creator_id: z.string(),
  creator_name: z.string(),
  video_id: z.string(),
  game_id: z.string(),
  language: z.string(),
  title: z.string(),
  view_count: z.number().int(),
  created_at: z.string(),
  thumbnail_url: z.string(),
  is_featured: z.boolean(),
});

export type ClipPayload = z.infer<typeof ClipPayloadSchema>;
