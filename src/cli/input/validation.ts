/**
 * CLI validation: cell selection and safe output paths.
 */

import fs from 'node:fs';
import path from 'node:path';

import picomatch from 'picomatch';

import { CliError } from '../../errors/errors.ts';
import type { MatrixCell } from '../../matrix/types.ts';

/**
 * Select the cells whose id matches any of the given glob patterns, keeping
 * declaration order. With no patterns every cell is selected.
 *
 * @throws {CliError} when a pattern matches no cell.
 */
export function resolveCells(
  cells: readonly MatrixCell[],
  patterns?: readonly string[],
): readonly MatrixCell[] {
  if (!patterns || patterns.length === 0) {
    return cells;
  }

  const matchers = patterns.map((pattern) => ({
    pattern,
    isMatch: picomatch(pattern, { nocase: true }),
  }));

  const unmatched = matchers
    .filter(({ isMatch }) => !cells.some((cell) => isMatch(cell.id)))
    .map(({ pattern }) => pattern);

  if (unmatched.length > 0) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `No cells match: ${unmatched.join(', ')}\nAvailable cells: ${cells.map((c) => c.id).join(', ')}`,
    );
  }

  return cells.filter((cell) => matchers.some(({ isMatch }) => isMatch(cell.id)));
}

function isOutside(base: string, candidate: string): boolean {
  const relativePath = path.relative(base, candidate);
  return (
    relativePath === '..' ||
    relativePath.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relativePath)
  );
}

/**
 * Ensure that `inputPath` resolves to a directory that lives under `baseDir`,
 * following symlinks when the directory already exists.
 *
 * @returns Resolved, safe path string.
 * @throws {CliError} when the resolved path escapes the base directory.
 */
export function ensureSafeDirectoryPath(baseDir: string, inputPath: string): string {
  const resolvedBase = path.resolve(baseDir);
  const outside = (): CliError =>
    new CliError('CLI_INVALID_PATH', `Log directory must be within ${resolvedBase}`, {
      details: { resolvedBase, inputPath },
    });

  // Windows-style separators are traversal attempts on POSIX hosts
  if (path.sep !== '\\' && inputPath.includes('\\')) {
    throw outside();
  }

  const resolvedPath = path.resolve(resolvedBase, inputPath);
  if (isOutside(resolvedBase, resolvedPath)) {
    throw outside();
  }

  let realResolved: string | undefined;
  try {
    realResolved = fs.realpathSync(resolvedPath);
  } catch {
    realResolved = undefined;
  }

  if (realResolved !== undefined && isOutside(fs.realpathSync(resolvedBase), realResolved)) {
    throw outside();
  }

  return resolvedPath;
}
