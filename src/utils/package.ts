import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

/**
 * Version of the installed labsetup package, read from its package.json
 */
export function getVersion(): string {
  // Same relative location from src/utils and dist/utils
  const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${manifestPath}`, error);
  }
  return '0.0.0';
}
