import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from the package root when one exists, quietly: dotenv v17
 * otherwise prints a banner to stdout, which corrupts the MCP stdio stream.
 *
 * @param importMetaUrl - `import.meta.url` of the entry point
 * @param levelsUp - directories between the entry point and the package root
 * @returns the path that was loaded, or null
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) {
    return null;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
