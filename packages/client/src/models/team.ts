import { TeamPayloadSchema } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type Team = {
  id: string;
  users: PartialUser[];
  backgroundImageUrl: string | null;
  banner: string | null;
  createdAt: Date;
  updatedAt: Date;
  info: string;
  thumbnailUrl: string;
  teamName: string;
  teamDisplayName: string;
};

export function mapTeam(raw: unknown): Team {
  const data = parsePayload(TeamPayloadSchema, raw, 'team');
  return {
    id: data.id,
    users: data.users.map((member) => partialUser(member.user_id, member.user_login)),
    backgroundImageUrl: data.background_image_url,
    banner: data.banner,
    createdAt: parseTimestamp(data.created_at, 'team'),
    updatedAt: parseTimestamp(data.updated_at, 'team'),
    info: data.info,
    thumbnailUrl: data.thumbnail_url,
    teamName: data.team_name,
    teamDisplayName: data.team_display_name,
  };
}
