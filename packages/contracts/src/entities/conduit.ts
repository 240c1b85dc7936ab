import { z } from 'zod';

export const ConduitPayloadSchema = z.object({
  id: z.string(),
  shard_count: z.number().int(),
});

export const ConduitShardTransportSchema = z.object({
  method: z.enum(['webhook', 'websocket']),
  callback: z.string().optional(),
  session_id: z.string().optional(),
  connected_at: z.string().optional(),
  disconnected_at: z.string().optional(),
});

export const ConduitShardPayloadSchema = z.object({
  id: z.string(),
  status: z.string(),
  transport: ConduitShardTransportSchema,
});

export type ConduitPayload = z.infer<typeof ConduitPayloadSchema>;
export type ConduitShardPayload = z.infer<typeof ConduitShardPayloadSchema>;

export type ConduitShardUpdate = {
  id: string;
  transport: {
    method: 'webhook' | 'websocket';
    callback?: string;
    secret?: string;
    session_id?: string;
  };
};

export const ConduitShardUpdateErrorSchema = z.object({
  id: z.string(),
  message: z.string(),
  code: z.string(),
});

export const ConduitShardUpdateResponseSchema = z.object({
  data: z.array(ConduitShardPayloadSchema),
  errors: z.array(ConduitShardUpdateErrorSchema).default([]),
});

export type ConduitShardUpdateResponse = z.infer<typeof ConduitShardUpdateResponseSchema>;
