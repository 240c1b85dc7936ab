import { z } from 'zod';

export const ChatterColorPayloadSchema = z.object({
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string().optional(),
  color: z.string(),
});

export const EmoteImagesSchema = z.object({
  url_1x: z.string(),
  url_2x: z.string(),
  url_4x: z.string(),
});

export const GlobalEmotePayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  images: EmoteImagesSchema,
  format: z.array(z.string()),
  scale: z.array(z.string()),
  theme_mode: z.array(z.string()),
});

export const ChannelEmotePayloadSchema = GlobalEmotePayloadSchema.extend({
  tier: z.string().optional(),
  emote_type: z.string(),
  emote_set_id: z.string(),
});

export const ChatBadgeVersionSchema = z.object({
  id: z.string(),
  image_url_1x: z.string(),
  image_url_2x: z.string(),
  image_url_4x: z.string(),
  title: z.string(),
  description: z.string(),
});

export const ChatBadgeSetPayloadSchema = z.object({
  set_id: z.string(),
  versions: z.array(ChatBadgeVersionSchema),
});

export type ChatterColorPayload = z.infer<typeof ChatterColorPayloadSchema>;
export type EmoteImages = z.infer<typeof EmoteImagesSchema>;
export type GlobalEmotePayload = z.infer<typeof GlobalEmotePayloadSchema>;
export type ChannelEmotePayload = z.infer<typeof ChannelEmotePayloadSchema>;
export type ChatBadgeSetPayload = z.infer<typeof ChatBadgeSetPayloadSchema>;

export const ChannelEmotesResponseSchema = z.object({
  data: z.array(ChannelEmotePayloadSchema),
  template: z.string(),
});

export type ChannelEmotesResponse = z.infer<typeof ChannelEmotesResponseSchema>;
