import { z } from 'zod';
import { HelixConfigError } from '../shared/errors.js';
import { DEFAULT_HTTP_TIMEOUT_MS, resolveHttpTimeoutMs } from '../http/httpTimeouts.js';

const envSchema = z.object({
  TWITCH_CLIENT_ID: z.string().trim().min(1),
  HELIX_USER_AGENT: z.string().min(1).optional(),
  HELIX_HTTP_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((raw) => resolveHttpTimeoutMs(raw, DEFAULT_HTTP_TIMEOUT_MS)),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
});

export type ClientEnv = z.infer<typeof envSchema>;

export type ClientConfig = {
  clientId: string;
  userAgent?: string;
  timeoutMs: number;
};

export function validateEnv(source: NodeJS.ProcessEnv = process.env): ClientEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.'));
    throw new HelixConfigError(`Invalid environment: ${keys.join(', ')}`, result.error.format());
  }
  return result.data;
}

export function loadClientConfig(source: NodeJS.ProcessEnv = process.env): ClientConfig {
  const env = validateEnv(source);
  return {
    clientId: env.TWITCH_CLIENT_ID,
    userAgent: env.HELIX_USER_AGENT,
    timeoutMs: env.HELIX_HTTP_TIMEOUT_MS,
  };
}
