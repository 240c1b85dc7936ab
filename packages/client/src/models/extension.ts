import { ExtensionTransactionPayloadSchema, type ExtensionTransactionPayload } from '@helix-sdk/contracts';
import { parsePayload, parseTimestamp } from './parsePayload.js';
import { partialUser, type PartialUser } from './user.js';

export type ExtensionTransaction = {
  id: string;
  timestamp: Date;
  broadcaster: PartialUser;
  user: PartialUser;
  productType: string;
  product: ExtensionTransactionPayload['product_data'];
};

export function mapExtensionTransaction(raw: unknown): ExtensionTransaction {
  const data = parsePayload(ExtensionTransactionPayloadSchema, raw, 'extension transaction');
  return {
    id: data.id,
    timestamp: parseTimestamp(data.timestamp, 'extension transaction'),
    broadcaster: partialUser(data.broadcaster_id, data.broadcaster_login),
    user: partialUser(data.user_id, data.user_login),
    productType: data.product_type,
    product: data.product_data,
  };
}
