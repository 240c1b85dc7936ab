import { z } from 'zod';

export const HttpMethodSchema = z.enum(['GET', 'POST', 'PATCH', 'DELETE']);

export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export type ParamScalar = string | number | boolean;

// null/undefined mean "drop this key" when a route URL is rebuilt.
export type ParamValue = ParamScalar | readonly ParamScalar[] | null | undefined;

export type ParamMapping = Record<string, ParamValue>;
