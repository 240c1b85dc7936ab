import { ChatterColorPayloadSchema, GlobalEmotePayloadSchema, type EmoteImages } from '@helix-sdk/contracts';
import { parsePayload } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type ChatterColor = {
  user: PartialUser;
  /** Hex colour, empty when the user never picked one. */
  color: string;
};

export type GlobalEmote = {
  id: string;
  name: string;
  images: EmoteImages;
  format: string[];
  scale: string[];
  themeMode: string[];
};

export function mapChatterColor(raw: unknown): ChatterColor {
  const data = parsePayload(ChatterColorPayloadSchema, raw, 'chatter color');
  return { user: partialUser(data.user_id, data.user_login), color: data.color };
}

export function mapGlobalEmote(raw: unknown): GlobalEmote {
  const data = parsePayload(GlobalEmotePayloadSchema, raw, 'global emote');
  return {
    id: data.id,
    name: data.name,
    images: data.images,
    format: data.format,
    scale: data.scale,
    themeMode: data.theme_mode,
  };
}
