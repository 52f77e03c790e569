import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

let cachedVersion: string | null = null;

/** Package version, read from package.json beside src/ or dist/ */
export function getVersion(): string {
  if (cachedVersion !== null) return cachedVersion;
  cachedVersion = '0.0.0';
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(resolve(here, '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      cachedVersion = pkg.version;
    }
  } catch (e) {
    if (process.env.DEBUG) console.debug('[radar]', 'version lookup:', e instanceof Error ? e.message : e);
  }
  return cachedVersion;
}
