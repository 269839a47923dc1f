/**
 * matrix-ci: Version Management
 *
 * Role:
 *   Lazy-load and cache package version information.
 *
 * The manifest is located relative to this module, not the working
 * directory: the CLI runs from inside the projects it tests.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

let cachedPkgVersion: string | undefined;

const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

function readVersionField(text: string): string {
  const pkg: unknown = JSON.parse(text);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
    const { version } = pkg;
    if (typeof version === 'string' || typeof version === 'number') {
      return String(version);
    }
  }
  return PKG_VERSION_FALLBACK;
}

/**
 * Read and cache the package version from package.json.
 *
 * Falls back to `PKG_VERSION_FALLBACK` when the file cannot be read and
 * logs the failure.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    cachedPkgVersion = readVersionField(readFileSync(pkgPath, 'utf8'));
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

const PKG_VERSION = getPkgVersion();

/**
 * Resolved package version, read once at module load.
 */
export function getPackageVersion(): string {
  return PKG_VERSION;
}

/**
 * Test-only helpers that expose private helpers without reloading the module.
 */
export const __test__ = {
  getPkgVersion,
  pkgPath,
};
