import { z } from 'zod';

export const ChannelInfoPayloadSchema = z.object({
  broadcaster_id: z.string(),
  broadcaster_login: z.string().optional(),
  broadcaster_name: z.string(),
  broadcaster_language: z.string(),
  game_id: z.string(),
  game_name: z.string(),
  title: z.string(),
  delay: z.number().int(),
  tags: z.array(z.string()),
  content_classification_labels: z.array(z.string()),
  is_branded_content: z.boolean(),
});

export const SearchChannelPayloadSchema = z.object({
  id: z.string(),
  broadcaster_login: z.string(),
  display_name: z.string(),
  broadcaster_language: z.string(),
  game_id: z.string(),
  game_name: z.string().optional(),
  title: z.string(),
  thumbnail_url: z.string(),
  is_live: z.boolean(),
  started_at: z.string(),
  tag_ids: z.array(z.string()).default([]),
  tags: z.array(z.string()).optional(),
});

export const ChannelEditorPayloadSchema = z.object({
  user_id: z.string(),
  user_name: z.string(),
  created_at: z.string(),
});

export const ContentClassificationLabelPayloadSchema = z.object({
  id: z.string(),
  description: z.string(),
  name: z.string(),
});

export const ChannelFollowerPayloadSchema = z.object({
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string(),
  followed_at: z.string(),
});

export const FollowedChannelPayloadSchema = z.object({
  broadcaster_id: z.string(),
  broadcaster_login: z.string(),
  broadcaster_name: z.string(),
  followed_at: z.string(),
});

export type ChannelInfoPayload = z.infer<typeof ChannelInfoPayloadSchema>;
export type SearchChannelPayload = z.infer<typeof SearchChannelPayloadSchema>;
export type ChannelEditorPayload = z.infer<typeof ChannelEditorPayloadSchema>;
export type ContentClassificationLabelPayload = z.infer<typeof ContentClassificationLabelPayloadSchema>;
export type ChannelFollowerPayload = z.infer<typeof ChannelFollowerPayloadSchema>;
export type FollowedChannelPayload = z.infer<typeof FollowedChannelPayloadSchema>;
