/**
 * graphlint version constants.
 *
 * Read from the @graphlint/core package.json at module load time.
 */
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const manifestPath = join(__dirname, '..', 'package.json');
const pkg: unknown = existsSync(manifestPath) ? JSON.parse(readFileSync(manifestPath, 'utf-8')) : null;

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full version string (e.g., "0.3.0-beta") */
export const LINT_VERSION: string = readVersion(pkg);

/**
 * major.minor.patch without pre-release tag
 *
 * "0.3.0-beta" → "0.3.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
