import {
  ChannelFollowerPayloadSchema,
  ChannelInfoPayloadSchema,
  ContentClassificationLabelPayloadSchema,
  FollowedChannelPayloadSchema,
  SearchChannelPayloadSchema,
} from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type ChannelInfo = {
  user: PartialUser;
  gameId: string;
  gameName: string;
  title: string;
  language: string;
  /** Seconds; Helix reports 0 unless the token belongs to the broadcaster. */
  delay: number;
  tags: string[];
  contentClassificationLabels: string[];
  isBrandedContent: boolean;
};

export type SearchChannel = {
  id: string;
  name: string;
  displayName: string;
  gameId: string;
  title: string;
  thumbnailUrl: string;
  language: string;
  live: boolean;
  startedAt: Date | null;
  tagIds: string[];
};

export type ContentClassificationLabel = {
  id: string;
  name: string;
  description: string;
};

export type ChannelFollowerEvent = {
  user: PartialUser;
  followedAt: Date;
};

export type ChannelFollowedEvent = {
  broadcaster: PartialUser;
  followedAt: Date;
};

export function mapChannelInfo(raw: unknown): ChannelInfo {
  const data = parsePayload(ChannelInfoPayloadSchema, raw, 'channel');
  return {
    user: partialUser(data.broadcaster_id, data.broadcaster_name),
    gameId: data.game_id,
    gameName: data.game_name,
    title: data.title,
    language: data.broadcaster_language,
    delay: data.delay,
    tags: data.tags,
    contentClassificationLabels: data.content_classification_labels,
    isBrandedContent: data.is_branded_content,
  };
}

export function mapSearchChannel(raw: unknown): SearchChannel {
  const data = parsePayload(SearchChannelPayloadSchema, raw, 'search channel');
  return {
    id: data.id,
    name: data.broadcaster_login,
    displayName: data.display_name,
    gameId: data.game_id,
    title: data.title,
    thumbnailUrl: data.thumbnail_url,
    language: data.broadcaster_language,
    live: data.is_live,
    // Offline channels carry an empty started_at.
    startedAt: data.is_live ? parseTimestamp(data.started_at, 'search channel') : null,
    tagIds: data.tag_ids,
  };
}

export function mapContentClassificationLabel(raw: unknown): ContentClassificationLabel {
  const data = parsePayload(ContentClassificationLabelPayloadSchema, raw, 'content classification label');
  return { id: data.id, name: data.name, description: data.description };
}

export function mapChannelFollower(raw: unknown): ChannelFollowerEvent {
  const data = parsePayload(ChannelFollowerPayloadSchema, raw, 'channel follower');
  return {
    user: partialUser(data.user_id, data.user_login),
    followedAt: parseTimestamp(data.followed_at, 'channel follower'),
  };
}

export function mapFollowedChannel(raw: unknown): ChannelFollowedEvent {
  const data = parsePayload(FollowedChannelPayloadSchema, raw, 'followed channel');
  return {
    broadcaster: partialUser(data.broadcaster_id, data.broadcaster_login),
    followedAt: parseTimestamp(data.followed_at, 'followed channel'),
  };
}
