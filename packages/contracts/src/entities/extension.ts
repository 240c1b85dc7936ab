import { z } from 'zod';

export const ExtensionTransactionPayloadSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  broadcaster_id: z.string(),
  broadcaster_login: z.string(),
  broadcaster_name: z.string(),
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string(),
  product_type: z.string(),
  product_data: z.object({
    sku: z.string(),
    domain: z.string(),
    cost: z.object({
      amount: z.number().int(),
      type: z.string(),
    }),
    inDevelopment: z.boolean(),
    displayName: z.string(),
    expiration: z.string(),
    broadcast: z.boolean(),
  }),
});

export type ExtensionTransactionPayload = z.infer<typeof ExtensionTransactionPayloadSchema>;
