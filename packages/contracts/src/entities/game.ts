import { z } from 'zod';

export const GamePayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  box_art_url: z.string(),
  igdb_id: z.string().nullable().optional(),
});

export type GamePayload = z.infer<typeof GamePayloadSchema>;
