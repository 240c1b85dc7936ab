import { GamePayloadSchema } from '@helix-sdk/contracts';
import { parsePayload } from './parsePayload.js';

export type Game = {
  id: string;
  name: string;
  igdbId: string | null;
  boxArtUrl: string;
};

export const BOX_ART_DIMENSIONS = { width: 1080, height: 1440 } as const;

export function mapGame(raw: unknown): Game {
  const data = parsePayload(GamePayloadSchema, raw, 'game');
  return {
    id: data.id,
    name: data.name,
    igdbId: data.igdb_id || null,
    boxArtUrl: data.box_art_url,
  };
}

/** Fill the `{width}x{height}` template Helix returns for box art. */
export function boxArtUrl(game: Game, width: number = BOX_ART_DIMENSIONS.width, height: number = BOX_ART_DIMENSIONS.height): string {
  return game.boxArtUrl.replace('{width}', String(width)).replace('{height}', String(height));
}
