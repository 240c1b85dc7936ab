import { StreamPayloadSchema } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type Stream = {
  id: string;
  user: PartialUser;
  gameId: string;
  gameName: string;
  type: string;
  title: string;
  viewerCount: number;
  startedAt: Date;
  language: string;
  thumbnailUrl: string;
  tagIds: string[];
  tags: string[];
  isMature: boolean;
};

export function mapStream(raw: unknown): Stream {
  const data = parsePayload(StreamPayloadSchema, raw, 'stream');
  return {
    id: data.id,
    user: partialUser(data.user_id, data.user_name),
    gameId: data.game_id,
    gameName: data.game_name,
    type: data.type,
    title: data.title,
    viewerCount: data.viewer_count,
    startedAt: parseTimestamp(data.started_at, 'stream'),
    language: data.language,
    thumbnailUrl: data.thumbnail_url,
    tagIds: data.tag_ids ?? [],
    tags: data.tags ?? [],
    isMature: data.is_mature,
  };
}
