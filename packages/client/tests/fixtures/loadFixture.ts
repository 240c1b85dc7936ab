import { readFileSync } from 'node:fs';
import { z } from 'zod';

const FixtureSchema = z.record(z.string(), z.unknown());

const cache = new Map<string, string>();

/** Fresh parsed copy of `tests/fixtures/helix/<name>.json`. */
export function helixFixture(name: string): Record<string, unknown> {
  let text = cache.get(name);
  if (text === undefined) {
    text = readFileSync(new URL(`./helix/${name}.json`, import.meta.url), 'utf8');
    cache.set(name, text);
  }
  return FixtureSchema.parse(JSON.parse(text));
}
