/**
 * Shared types for the CLI's execution modules.
 */

import type { JobStage } from '../../job/job-state.ts';
import type { TestTally } from '../../job/types.ts';

/** Row status shown on the dashboard and written to the report. */
export type CellStatus = 'PENDING' | 'RUNNING' | 'PASS' | 'FAIL' | 'ERROR' | 'SKIPPED';

/**
 * Normalized outcome of one matrix cell.
 *
 * `FAIL` means the tests ran and failed; `ERROR` means a step before or
 * around the tests could not complete.
 */
export interface CellOutcome {
  readonly id: string;
  readonly os: string;
  readonly runtime: string;
  readonly status: CellStatus;
  /** Stage that failed, for `ERROR`. */
  readonly stage?: JobStage;
  /** Test runner exit code when the tests ran. */
  readonly exitCode: number | null;
  readonly error?: string;
  readonly tests: TestTally;
  /** Id of the coverage artifact the cell produced. */
  readonly coverageArtifact?: string;
  readonly duration: number;
  readonly logPath: string;
}
