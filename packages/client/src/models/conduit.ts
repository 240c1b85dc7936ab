import { ConduitShardPayloadSchema, type ConduitShardPayload } from '@helix-sdk/contracts';
import { parsePayload } from './parsePayload.js';

export type ConduitShard = {
  id: string;
  status: string;
  transport: ConduitShardPayload['transport'];
};

export function mapConduitShard(raw: unknown): ConduitShard {
  const data = parsePayload(ConduitShardPayloadSchema, raw, 'conduit shard');
  return { id: data.id, status: data.status, transport: data.transport };
}
