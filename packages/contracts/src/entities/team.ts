import { z } from 'zod';

export const TeamMemberPayloadSchema = z.object({
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string().optional(),
});

export const TeamPayloadSchema = z.object({
  id: z.string(),
  users: z.array(TeamMemberPayloadSchema),
  background_image_url: z.string().nullable(),
  banner: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  info: z.string(),
  thumbnail_url: z.string(),
  team_name: z.string(),
  team_display_name: z.string(),
});

export type TeamPayload = z.infer<typeof TeamPayloadSchema>;
