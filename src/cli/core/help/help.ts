/**
 * matrix-ci: Help & Version API
 */

/* biome-ignore assist/source/organizeImports: Keep manual import/export ordering for readability */
import { getPackageVersion } from '../version/version.ts';
export { showHelp } from './formatter.ts';

/** Version line for `--version`, e.g. `matrix-ci v1.2.3`. */
export function showVersion(): string {
  return `matrix-ci v${getPackageVersion()}`;
}
