import { VideoPayloadSchema } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type Video = {
  id: string;
  streamId: string | null;
  user: PartialUser;
  title: string;
  description: string;
  createdAt: Date;
  publishedAt: Date;
  url: string;
  thumbnailUrl: string;
  viewable: string;
  viewCount: number;
  language: string;
  type: 'archive' | 'highlight' | 'upload';
  duration: string;
  mutedSegments: { duration: number; offset: number }[];
};

export function mapVideo(raw: unknown): Video {
  const data = parsePayload(VideoPayloadSchema, raw, 'video');
  return {
    id: data.id,
    streamId: data.stream_id,
    user: partialUser(data.user_id, data.user_name),
    title: data.title,
    description: data.description,
    createdAt: parseTimestamp(data.created_at, 'video'),
    publishedAt: parseTimestamp(data.published_at, 'video'),
    url: data.url,
    thumbnailUrl: data.thumbnail_url,
    viewable: data.viewable,
    viewCount: data.view_count,
    language: data.language,
    type: data.type,
    duration: data.duration,
    mutedSegments: data.muted_segments ?? [],
  };
}
