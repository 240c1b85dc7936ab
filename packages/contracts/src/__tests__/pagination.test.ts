import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { createHelixResponseSchema, HelixPageEnvelopeSchema } from '../common/pagination.js';

describe('HelixPageEnvelopeSchema', () => {
  it('accepts a page without pagination info', () => {
    const result = HelixPageEnvelopeSchema.safeParse({ data: [{ id: '1' }] });
    expect(result.success).toBe(true);
  });

  it('accepts an empty pagination object', () => {
    const parsed = HelixPageEnvelopeSchema.parse({ data: [], pagination: {} });
    expect(parsed.pagination?.cursor).toBeUndefined();
  });

  it('rejects a body without data', () => {
    const result = HelixPageEnvelopeSchema.safeParse({ pagination: { cursor: 'abc' } });
    expect(result.success).toBe(false);
  });
});

describe('createHelixResponseSchema', () => {
  it('validates every item against the item schema', () => {
    const schema = createHelixResponseSchema(z.object({ id: z.string() }));
    expect(schema.safeParse({ data: [{ id: '1' }, { id: '2' }] }).success).toBe(true);
    expect(schema.safeParse({ data: [{ id: 1 }] }).success).toBe(false);
  });
});
