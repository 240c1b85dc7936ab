import { z } from 'zod';

export const VideoMutedSegmentSchema = z.object({
  duration: z.number().int(),
  offset: z.number().int(),
});

export const VideoPayloadSchema = z.object({
  id: z.string(),
  stream_id: z.string().nullable(),
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string(),
  title: z.string(),
  description: z.string(),
  created_at: z.string(),
  published_at: z.string(),
  url: z.string(),
  thumbnail_url: z.string(),
  viewable: z.string(),
  view_count: z.number().int(),
  language: z.string(),
  type: z.enum(['archive', 'highlight', 'upload']),
  duration: z.string(),
  muted_segments: z.array(VideoMutedSegmentSchema).nullable(),
});

export type VideoPayload = z.infer<typeof VideoPayloadSchema>;
