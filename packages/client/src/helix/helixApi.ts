import {
  AdSchedulePayloadSchema,
  BitsLeaderboardResponseSchema,
  ChannelEditorPayloadSchema,
  ChannelEmotesResponseSchema,
  ChatBadgeSetPayloadSchema,
  CommercialPayloadSchema,
  ConduitPayloadSchema,
  ConduitShardUpdateResponseSchema,
  CustomRewardPayloadSchema,
  DEFAULT_PAGE_SIZE,
  HelixPageEnvelopeSchema,
  SnoozeNextAdPayloadSchema,
  createHelixResponseSchema,
  type AdSchedulePayload,
  type BitsLeaderboardResponse,
  type ChannelEditorPayload,
  type ChannelEmotesResponse,
  type ChatBadgeSetPayload,
  type CommercialPayload,
  type ConduitPayload,
  type ConduitShardUpdate,
  type ConduitShardUpdateResponse,
  type CustomRewardCreate,
  type CustomRewardPayload,
  type ParamMapping,
  type SnoozeNextAdPayload,
} from '@helix-sdk/contracts';
import { z } from 'zod';
import type { HttpClient } from '../http/httpClient.js';
import type { HelixPaginator } from '../http/paginator.js';
import { Route } from '../http/route.js';
import { mapCheerEmote, type CheerEmote } from '../models/bits.js';
import {
  mapChannelFollower,
  mapChannelInfo,
  mapContentClassificationLabel,
  mapFollowedChannel,
  mapSearchChannel,
  type ChannelFollowedEvent,
  type ChannelFollowerEvent,
  type ChannelInfo,
  type ContentClassificationLabel,
  type SearchChannel,
} from '../models/channel.js';
import { mapChatterColor, mapGlobalEmote, type ChatterColor, type GlobalEmote } from '../models/chat.js';
import { mapClip, type Clip } from '../models/clip.js';
import { mapConduitShard, type ConduitShard } from '../models/conduit.js';
import { mapExtensionTransaction, type ExtensionTransaction } from '../models/extension.js';
import { boxArtUrl, mapGame, BOX_ART_DIMENSIONS, type Game } from '../models/game.js';
import { parsePayload } from '../models/parsePayload.js';
import { mapStream, type Stream } from '../models/stream.js';
import { mapTeam, type Team } from '../models/team.js';
import { mapVideo, type Video } from '../models/video.js';

type Id = string | number;

type TokenOption = { tokenFor?: string | null };
type PageOptions = TokenOption & { first?: number; maxResults?: number | null };

export type ClipQuery = PageOptions & {
  broadcasterId?: string;
  gameId?: string;
  clipIds?: string[];
  startedAt?: Date;
  endedAt?: Date;
  isFeatured?: boolean;
};

export type StreamQuery = PageOptions & {
  userIds?: Id[];
  gameIds?: Id[];
  userLogins?: string[];
  languages?: string[];
  type?: 'all' | 'live';
};

export type VideoQuery = PageOptions & {
  ids?: Id[];
  userId?: Id;
  gameId?: Id;
  language?: string;
  period?: 'all' | 'day' | 'month' | 'week';
  sort?: 'time' | 'trending' | 'views';
  type?: 'all' | 'archive' | 'highlight' | 'upload';
};

export type ChannelInfoUpdate = {
  gameId?: Id;
  language?: string;
  title?: string;
  delay?: number;
  tags?: string[];
  brandedContent?: boolean;
  /** e.g. `[{ Gambling: true }, { ProfanityVulgarity: false }]` */
  classificationLabels?: Record<string, boolean>[];
};

export type BitsLeaderboardQuery = {
  count?: number;
  period?: 'day' | 'week' | 'month' | 'year' | 'all';
  startedAt?: Date;
  userId?: Id;
};

const DeletedVideosSchema = z.object({ data: z.array(z.string()) });

/**
 * Typed wrappers over Helix endpoints. Single-shot endpoints resolve to
 * validated data; list endpoints return a `HelixPaginator` the caller can
 * iterate or await for the first page.
 */
export class HelixApi {
  constructor(private readonly http: HttpClient) {}

  private async listData(route: Route, label: string): Promise<unknown[]> {
    const body = await this.http.requestJson(route);
    return parsePayload(HelixPageEnvelopeSchema, body, label).data;
  }

  async getGlobalChatBadges(opts: TokenOption = {}): Promise<ChatBadgeSetPayload[]> {
    const route = new Route('GET', 'chat/badges/global', { tokenFor: opts.tokenFor });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(ChatBadgeSetPayloadSchema), body, 'chat badges').data;
  }

  async getChattersColor(userIds: Id[], opts: TokenOption = {}): Promise<ChatterColor[]> {
    const route = new Route('GET', 'chat/color', { params: { user_id: userIds }, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'chat color')).map(mapChatterColor);
  }

  async getChannels(broadcasterIds: Id[], opts: TokenOption = {}): Promise<ChannelInfo[]> {
    const route = new Route('GET', 'channels', { params: { broadcaster_id: broadcasterIds }, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'channels')).map(mapChannelInfo);
  }

  async getCheermotes(broadcasterId: Id | null = null, opts: TokenOption = {}): Promise<CheerEmote[]> {
    const route = new Route('GET', 'bits/cheermotes', { params: { broadcaster_id: broadcasterId }, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'cheermotes')).map(mapCheerEmote);
  }

  async getChannelEmotes(broadcasterId: Id, opts: TokenOption = {}): Promise<ChannelEmotesResponse> {
    const route = new Route('GET', 'chat/emotes', { params: { broadcaster_id: broadcasterId }, tokenFor: opts.tokenFor });
    return parsePayload(ChannelEmotesResponseSchema, await this.http.requestJson(route), 'channel emotes');
  }

  async getContentClassificationLabels(locale: string, opts: TokenOption = {}): Promise<ContentClassificationLabel[]> {
    const route = new Route('GET', 'content_classification_labels', { params: { locale }, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'content classification labels')).map(mapContentClassificationLabel);
  }

  async getGlobalEmotes(opts: TokenOption = {}): Promise<GlobalEmote[]> {
    const route = new Route('GET', 'chat/emotes/global', { tokenFor: opts.tokenFor });
    return (await this.listData(route, 'global emotes')).map(mapGlobalEmote);
  }

  getClips(query: ClipQuery): HelixPaginator<Clip> {
    const params: ParamMapping = { first: query.first ?? DEFAULT_PAGE_SIZE };
    if (query.broadcasterId) {
      params.broadcaster_id = query.broadcasterId;
    } else if (query.gameId) {
      params.game_id = query.gameId;
    } else if (query.clipIds) {
      params.id = query.clipIds;
    }
    if (query.startedAt) params.started_at = query.startedAt.toISOString();
    if (query.endedAt) params.ended_at = query.endedAt.toISOString();
    if (query.isFeatured !== undefined) params.is_featured = query.isFeatured;

    const route = new Route('GET', 'clips', { params, tokenFor: query.tokenFor });
    return this.http.requestPaginated(route, { maxResults: query.maxResults, converter: mapClip });
  }

  getExtensionTransactions(
    extensionId: string,
    opts: PageOptions & { ids?: string[] } = {}
  ): HelixPaginator<ExtensionTransaction> {
    const params: ParamMapping = { extension_id: extensionId, first: opts.first ?? DEFAULT_PAGE_SIZE };
    if (opts.ids) params.id = opts.ids;

    const route = new Route('GET', 'extensions/transactions', { params, tokenFor: opts.tokenFor });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapExtensionTransaction });
  }

  getStreams(query: StreamQuery = {}): HelixPaginator<Stream> {
    const params: ParamMapping = { type: query.type ?? 'all', first: query.first ?? DEFAULT_PAGE_SIZE };
    if (query.userIds !== undefined) params.user_id = query.userIds;
    if (query.gameIds !== undefined) params.game_id = query.gameIds;
    if (query.userLogins !== undefined) params.user_login = query.userLogins;
    if (query.languages !== undefined) params.language = query.languages;

    const route = new Route('GET', 'streams', { params, tokenFor: query.tokenFor });
    return this.http.requestPaginated(route, { maxResults: query.maxResults, converter: mapStream });
  }

  searchCategories(query: string, opts: PageOptions = {}): HelixPaginator<Game> {
    const route = new Route('GET', 'search/categories', {
      params: { query, first: opts.first ?? DEFAULT_PAGE_SIZE },
      tokenFor: opts.tokenFor,
    });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapGame });
  }

  searchChannels(query: string, opts: PageOptions & { live?: boolean } = {}): HelixPaginator<SearchChannel> {
    const route = new Route('GET', 'search/channels', {
      params: { query, live: opts.live ?? false, first: opts.first ?? DEFAULT_PAGE_SIZE },
      tokenFor: opts.tokenFor,
    });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapSearchChannel });
  }

  async getTeams(opts: TokenOption & { teamName?: string; teamId?: string }): Promise<Team[]> {
    let params: ParamMapping = {};
    if (opts.teamName) {
      params = { name: opts.teamName };
    } else if (opts.teamId) {
      params = { id: opts.teamId };
    }
    const route = new Route('GET', 'teams', { params, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'teams')).map(mapTeam);
  }

  async getGames(opts: TokenOption & { names?: string[]; ids?: string[]; igdbIds?: string[] }): Promise<Game[]> {
    const params: ParamMapping = {};
    if (opts.names !== undefined) params.name = opts.names;
    if (opts.ids !== undefined) params.id = opts.ids;
    if (opts.igdbIds !== undefined) params.igdb_id = opts.igdbIds;

    const route = new Route('GET', 'games', { params, tokenFor: opts.tokenFor });
    return (await this.listData(route, 'games')).map(mapGame);
  }

  /** Stream a game's box art, sized from the url template. */
  fetchBoxArt(
    game: Game,
    opts: { width?: number; height?: number; chunkSize?: number } = {}
  ): AsyncGenerator<Uint8Array, void, undefined> {
    const url = boxArtUrl(game, opts.width ?? BOX_ART_DIMENSIONS.width, opts.height ?? BOX_ART_DIMENSIONS.height);
    return this.http.requestAsset(url, { chunkSize: opts.chunkSize });
  }

  getTopGames(opts: PageOptions = {}): HelixPaginator<Game> {
    const route = new Route('GET', 'games/top', { params: { first: opts.first ?? DEFAULT_PAGE_SIZE }, tokenFor: opts.tokenFor });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapGame });
  }

  getVideos(query: VideoQuery): HelixPaginator<Video> {
    const params: ParamMapping = {
      first: query.first ?? DEFAULT_PAGE_SIZE,
      period: query.period ?? 'all',
      sort: query.sort ?? 'time',
      type: query.type ?? 'all',
    };
    if (query.ids !== undefined) params.id = query.ids;
    if (query.userId !== undefined) params.user_id = query.userId;
    if (query.gameId !== undefined) params.game_id = query.gameId;
    if (query.language !== undefined) params.language = query.language;

    const route = new Route('GET', 'videos', { params, tokenFor: query.tokenFor });
    return this.http.requestPaginated(route, { maxResults: query.maxResults, converter: mapVideo });
  }

  /** Resolves to the ids Helix actually deleted. */
  async deleteVideos(ids: Id[], tokenFor: string): Promise<string[]> {
    const route = new Route('DELETE', 'videos', { params: { id: ids }, tokenFor });
    return parsePayload(DeletedVideosSchema, await this.http.requestJson(route), 'deleted videos').data;
  }

  async createConduit(shardCount: number): Promise<ConduitPayload[]> {
    const route = new Route('POST', 'eventsub/conduits', { params: { shard_count: shardCount } });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(ConduitPayloadSchema), body, 'conduit').data;
  }

  async getConduits(): Promise<ConduitPayload[]> {
    const route = new Route('GET', 'eventsub/conduits');
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(ConduitPayloadSchema), body, 'conduits').data;
  }

  getConduitShards(conduitId: string, opts: { maxResults?: number | null } = {}): HelixPaginator<ConduitShard> {
    const route = new Route('GET', 'eventsub/conduits/shards', { params: { conduit_id: conduitId } });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapConduitShard });
  }

  async updateConduitShards(conduitId: string, shards: ConduitShardUpdate[]): Promise<ConduitShardUpdateResponse> {
    const route = new Route('PATCH', 'eventsub/conduits/shards', { json: { conduit_id: conduitId, shards } });
    return parsePayload(ConduitShardUpdateResponseSchema, await this.http.requestJson(route), 'conduit shard update');
  }

  async startCommercial(broadcasterId: Id, length: number, tokenFor: string): Promise<CommercialPayload[]> {
    const route = new Route('POST', 'channels/commercial', {
      json: { broadcaster_id: broadcasterId, length },
      tokenFor,
    });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(CommercialPayloadSchema), body, 'commercial').data;
  }

  async getAdSchedule(broadcasterId: Id, tokenFor: string): Promise<AdSchedulePayload[]> {
    const route = new Route('GET', 'channels/ads', { params: { broadcaster_id: broadcasterId }, tokenFor });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(AdSchedulePayloadSchema), body, 'ad schedule').data;
  }

  async snoozeNextAd(broadcasterId: Id, tokenFor: string): Promise<SnoozeNextAdPayload[]> {
    const route = new Route('POST', 'channels/ads/schedule/snooze', { params: { broadcaster_id: broadcasterId }, tokenFor });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(SnoozeNextAdPayloadSchema), body, 'ad snooze').data;
  }

  async getBitsLeaderboard(
    broadcasterId: Id,
    tokenFor: string,
    query: BitsLeaderboardQuery = {}
  ): Promise<BitsLeaderboardResponse> {
    const params: ParamMapping = {
      broadcaster_id: broadcasterId,
      count: query.count ?? 10,
      period: query.period ?? 'all',
    };
    if (query.startedAt !== undefined) params.started_at = query.startedAt.toISOString();
    if (query.userId) params.user_id = query.userId;

    const route = new Route('GET', 'bits/leaderboard', { params, tokenFor });
    return parsePayload(BitsLeaderboardResponseSchema, await this.http.requestJson(route), 'bits leaderboard');
  }

  /** Helix answers 204 No Content on success. */
  async patchChannelInfo(broadcasterId: Id, tokenFor: string, update: ChannelInfoUpdate): Promise<void> {
    const fields: Record<string, unknown> = {
      game_id: update.gameId,
      broadcaster_language: update.language,
      title: update.title,
      delay: update.delay,
      tags: update.tags,
      is_branded_content: update.brandedContent,
    };
    const json: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined && value !== null) json[key] = value;
    }
    if (update.classificationLabels !== undefined) {
      json.content_classification_labels = update.classificationLabels.flatMap((item) =>
        Object.entries(item).map(([id, isEnabled]) => ({ id, is_enabled: isEnabled }))
      );
    }

    const route = new Route('PATCH', 'channels', { params: { broadcaster_id: broadcasterId }, json, tokenFor });
    await this.http.request(route);
  }

  async getChannelEditors(broadcasterId: Id, tokenFor: string): Promise<ChannelEditorPayload[]> {
    const route = new Route('GET', 'channels/editors', { params: { broadcaster_id: broadcasterId }, tokenFor });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(ChannelEditorPayloadSchema), body, 'channel editors').data;
  }

  getFollowedChannels(
    userId: Id,
    tokenFor: string,
    opts: PageOptions & { broadcasterId?: Id } = {}
  ): HelixPaginator<ChannelFollowedEvent> {
    const params: ParamMapping = { first: opts.first ?? DEFAULT_PAGE_SIZE, user_id: userId };
    if (opts.broadcasterId !== undefined) params.broadcaster_id = opts.broadcasterId;

    const route = new Route('GET', 'channels/followed', { params, tokenFor });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapFollowedChannel });
  }

  getChannelFollowers(
    broadcasterId: Id,
    tokenFor: string,
    opts: PageOptions & { userId?: Id } = {}
  ): HelixPaginator<ChannelFollowerEvent> {
    const params: ParamMapping = { first: opts.first ?? DEFAULT_PAGE_SIZE, broadcaster_id: broadcasterId };
    if (opts.userId !== undefined) params.user_id = opts.userId;

    const route = new Route('GET', 'channels/followers', { params, tokenFor });
    return this.http.requestPaginated(route, { maxResults: opts.maxResults, converter: mapChannelFollower });
  }

  async createCustomReward(
    broadcasterId: string,
    reward: CustomRewardCreate,
    tokenFor: string
  ): Promise<CustomRewardPayload[]> {
    const route = new Route('POST', 'channel_points/custom_rewards', {
      params: { broadcaster_id: broadcasterId },
      json: { ...reward },
      tokenFor,
    });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(CustomRewardPayloadSchema), body, 'custom reward').data;
  }

  /** Helix answers 204 No Content on success. */
  async deleteCustomReward(broadcasterId: string, rewardId: string, tokenFor: string): Promise<void> {
    const route = new Route('DELETE', 'channel_points/custom_rewards', {
      params: { broadcaster_id: broadcasterId, id: rewardId },
      tokenFor,
    });
    await this.http.request(route);
  }

  async getCustomRewards(
    broadcasterId: string,
    tokenFor: string,
    opts: { rewardId?: string; manageable?: boolean } = {}
  ): Promise<CustomRewardPayload[]> {
    const params: ParamMapping = {
      broadcaster_id: broadcasterId,
      only_manageable_rewards: opts.manageable ?? false,
    };
    if (opts.rewardId !== undefined) params.id = opts.rewardId;

    const route = new Route('GET', 'channel_points/custom_rewards', { params, tokenFor });
    const body = await this.http.requestJson(route);
    return parsePayload(createHelixResponseSchema(CustomRewardPayloadSchema), body, 'custom rewards').data;
  }
}
