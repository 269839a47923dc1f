/**
 * Host platform checks.
 *
 * Shell adapters provision environments on the machine running the CLI, so
 * a cell declared for another operating-system family cannot run here. By
 * default such cells are skipped and reported as SKIPPED; with the `fail`
 * policy they are attempted and fail provisioning.
 */

import type { MatrixCell, OsFamily } from '../../../matrix/types.ts';

export type ForeignOsPolicy = 'skip' | 'fail';

export interface SkipDecision {
  readonly skip: boolean;
  readonly reason?: string;
}

export interface CellPlan {
  /** Cells that will run, in declaration order. */
  readonly runnable: readonly MatrixCell[];
  readonly skipped: readonly { readonly cell: MatrixCell; readonly reason: string }[];
}

export function detectHostFamily(platform: NodeJS.Platform = process.platform): OsFamily {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export function shouldSkipCell(
  cell: MatrixCell,
  hostFamily: OsFamily,
  policy: ForeignOsPolicy,
): SkipDecision {
  if (policy === 'fail' || cell.osFamily === hostFamily) {
    return { skip: false };
  }
  return { skip: true, reason: `Requires a ${cell.osFamily} host (running on ${hostFamily})` };
}

/**
 * Split cells into those that run on this host and those skipped.
 */
export function planCells(
  cells: readonly MatrixCell[],
  hostFamily: OsFamily,
  policy: ForeignOsPolicy,
): CellPlan {
  const runnable: MatrixCell[] = [];
  const skipped: { cell: MatrixCell; reason: string }[] = [];

  for (const cell of cells) {
    const decision = shouldSkipCell(cell, hostFamily, policy);
    if (decision.skip) {
      skipped.push({ cell, reason: decision.reason ?? 'Skipped' });
    } else {
      runnable.push(cell);
    }
  }

  return { runnable, skipped };
}
