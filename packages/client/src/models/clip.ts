import { ClipPayloadSchema } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type Clip = {
  id: string;
  url: string;
  embedUrl: string;
  broadcaster: PartialUser;
  creator: PartialUser;
  videoId: string;
  gameId: string;
  language: string;
  title: string;
  views: number;
  createdAt: Date;
  thumbnailUrl: string;
  isFeatured: boolean;
};

export function mapClip(raw: unknown): Clip {
  const data = parsePayload(ClipPayloadSchema, raw, 'clip');
  return {
    id: data.id,
    url: data.url,
    embedUrl: data.embed_url,
    broadcaster: partialUser(data.broadcaster_id, data.broadcaster_name),
    creator: partialUser(data.creator_id, data.creator_name),
    videoId: data.video_id,
    gameId: data.game_id,
    language: data.language,
    title: data.title,
    views: data.view_count,
    createdAt: parseTimestamp(data.created_at, 'clip'),
    thumbnailUrl: data.thumbnail_url,
    isFeatured: data.is_featured,
  };
}
