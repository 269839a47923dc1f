/**
 * Result building and status determination used by the executor.
 *
 * Turns `JobResult` values and skipped cells into the `CellOutcome` rows the
 * dashboard and the report show, and sums them up.
 */

import type { JobResult, TestTally } from '../../../job/types.ts';
import type { MatrixCell } from '../../../matrix/types.ts';
import type { CellOutcome, CellStatus } from '../types.ts';

const NO_TESTS: TestTally = Object.freeze({ total: 0, passed: 0, failed: 0, skipped: 0 });

/**
 * PASS/FAIL when the tests ran to completion, ERROR when a step failed.
 */
export function determineStatus(result: JobResult): CellStatus {
  if (result.state.kind === 'Failed') {
    return 'ERROR';
  }
  return result.exitStatus === 'success' ? 'PASS' : 'FAIL';
}

export function buildCellOutcome(result: JobResult, logPath: string): CellOutcome {
  const { cell } = result;
  const status = determineStatus(result);

  let error: string | undefined;
  if (result.failure) {
    error = `${result.failure.code}: ${result.failure.message}`;
  } else if (status === 'FAIL') {
    error = `Tests exited with code ${result.testExitCode ?? 'unknown'}`;
  }

  return {
    id: cell.id,
    os: cell.os,
    runtime: cell.runtimeVersion,
    status,
    ...(result.failure ? { stage: result.failure.stage } : {}),
    exitCode: result.testExitCode ?? null,
    ...(error === undefined ? {} : { error }),
    tests: result.tests,
    ...(result.coverageArtifact ? { coverageArtifact: result.coverageArtifact.id } : {}),
    duration: result.durationMs,
    logPath,
  };
}

export function buildSkippedOutcome(cell: MatrixCell, reason: string, logPath: string): CellOutcome {
  return {
    id: cell.id,
    os: cell.os,
    runtime: cell.runtimeVersion,
    status: 'SKIPPED',
    exitCode: null,
    error: reason,
    tests: NO_TESTS,
    duration: 0,
    logPath,
  };
}

export interface ExecutionSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly errors: number;
  readonly skipped: number;
  readonly duration: number;
}

/**
 * Count outcomes by status.
 */
export function calculateSummary(
  outcomes: readonly CellOutcome[],
  duration: number,
): ExecutionSummary {
  return {
    total: outcomes.length,
    passed: outcomes.filter((o) => o.status === 'PASS').length,
    failed: outcomes.filter((o) => o.status === 'FAIL').length,
    errors: outcomes.filter((o) => o.status === 'ERROR').length,
    skipped: outcomes.filter((o) => o.status === 'SKIPPED').length,
    duration,
  };
}
