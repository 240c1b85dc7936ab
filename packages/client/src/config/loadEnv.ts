import dotenv from 'dotenv';

/**
 * Load a `.env` file into `process.env`. Keys already present in the
 * environment win over the file. A missing file yields no keys.
 */
export function loadEnvFile(path?: string): Record<string, string> {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOENT') return {};
    throw result.error;
  }
  return result.parsed ?? {};
}
