import { readFileSync } from 'fs';

/**
 * Version of this package, read from package.json beside src/ or dist/
 */
export function getVersion(): string {
  const manifestUrl = new URL('../../package.json', import.meta.url);
  const manifest: unknown = JSON.parse(readFileSync(manifestUrl, 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}
