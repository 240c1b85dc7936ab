import { CheerEmotePayloadSchema, type CheerEmotePayload, type CheerEmoteTierPayload } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';

export type CheerEmoteTier = {
  id: string;
  minBits: number;
  color: string;
  /** `images.light.animated['1']` and so on. */
  images: CheerEmoteTierPayload['images'];
  canCheer: boolean;
  showInBitsCard: boolean;
};

export type CheerEmote = {
  prefix: string;
  tiers: CheerEmoteTier[];
  type: CheerEmotePayload['type'];
  order: number;
  lastUpdated: Date;
  charitable: boolean;
};

function mapTier(tier: CheerEmoteTierPayload): CheerEmoteTier {
  return {
    id: tier.id,
    minBits: tier.min_bits,
    color: tier.color,
    images: tier.images,
    canCheer: tier.can_cheer,
    showInBitsCard: tier.show_in_bits_card,
  };
}

export function mapCheerEmote(raw: unknown): CheerEmote {
  const data = parsePayload(CheerEmotePayloadSchema, raw, 'cheermote');
  return {
    prefix: data.prefix,
    tiers: data.tiers.map(mapTier),
    type: data.type,
    order: data.order,
    lastUpdated: parseTimestamp(data.last_updated, 'cheermote'),
    charitable: data.is_charitable,
  };
}
