import type { z } from 'zod';
import { HelixProtocolError } from '../shared/errors.js';

export function parsePayload<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new HelixProtocolError(`Unexpected ${label} payload`, result.error.issues);
  }
  return result.data;
}

export function parseTimestamp(value: string, label: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new HelixProtocolError(`Invalid timestamp in ${label} payload`, { value });
  }
  return date;
}
