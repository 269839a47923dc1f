/**
 * Tests for result builder module
 *
 * Exercises:
 *   - `determineStatus` for completed, failing and crashed cells
 *   - `buildCellOutcome` / `buildSkippedOutcome` row contents
 *   - `calculateSummary` aggregation
 */

import { describe, expect, it } from 'vitest';

import { createArtifact, fileCoverage } from '../../../__test-utils__/fixtures/coverage/coverage-fixtures.ts';
import { createCell } from '../../../__test-utils__/fixtures/job/job-fixtures.ts';
import type { JobResult } from '../../../job/types.ts';
import type { CellOutcome } from '../types.ts';
import {
  buildCellOutcome,
  buildSkippedOutcome,
  calculateSummary,
  determineStatus,
} from './result-builder.ts';

const cell = createCell({ os: 'windows-latest', runtime: '3.8', dependencies: { qutip: '==4.6.*' } });
const tests = { total: 3, passed: 2, failed: 1, skipped: 0 };

const completed = (exitCode: number): JobResult => ({
  cell,
  exitStatus: exitCode === 0 ? 'success' : 'failure',
  state: { kind: 'Reported' },
  tests,
  testExitCode: exitCode,
  durationMs: 1200,
});

const crashed: JobResult = {
  cell,
  exitStatus: 'failure',
  state: {
    kind: 'Failed',
    after: 'Provisioned',
    stage: 'dependencies',
    code: 'DEPENDENCY_INSTALL_FAILED',
    message: 'Installing qutip==4.6.* exited with code 1',
  },
  failure: {
    stage: 'dependencies',
    code: 'DEPENDENCY_INSTALL_FAILED',
    message: 'Installing qutip==4.6.* exited with code 1',
  },
  tests: { total: 0, passed: 0, failed: 0, skipped: 0 },
  durationMs: 300,
};

describe('Result Builder Module', () => {
  describe('determineStatus', () => {
    it('passes cells whose tests succeeded', () => {
      expect(determineStatus(completed(0))).toBe('PASS');
    });

    it('fails cells whose tests failed', () => {
      expect(determineStatus(completed(1))).toBe('FAIL');
    });

    it('reports cells that never finished as errors', () => {
      expect(determineStatus(crashed)).toBe('ERROR');
    });
  });

  describe('buildCellOutcome', () => {
    it('describes a passing cell with its artifact', () => {
      const artifact = createArtifact('sha-1', cell.id, { 'pkg/a.py': fileCoverage([1], [1, 2]) });

      expect(buildCellOutcome({ ...completed(0), coverageArtifact: artifact }, 'logs/cell.log')).toEqual({
        id: 'windows-latest-3.8-qutip-4.6.x',
        os: 'windows-latest',
        runtime: '3.8',
        status: 'PASS',
        exitCode: 0,
        tests,
        coverageArtifact: 'sha-1',
        duration: 1200,
        logPath: 'logs/cell.log',
      });
    });

    it('names the test exit code of a failing cell', () => {
      expect(buildCellOutcome(completed(2), 'x.log')).toMatchObject({
        status: 'FAIL',
        exitCode: 2,
        error: 'Tests exited with code 2',
      });
    });

    it('carries the failed stage and reason of a crashed cell', () => {
      expect(buildCellOutcome(crashed, 'x.log')).toMatchObject({
        status: 'ERROR',
        stage: 'dependencies',
        exitCode: null,
        error: 'DEPENDENCY_INSTALL_FAILED: Installing qutip==4.6.* exited with code 1',
      });
    });
  });

  describe('buildSkippedOutcome', () => {
    it('records the skip reason', () => {
      expect(buildSkippedOutcome(cell, 'Requires a windows host (running on linux)', 'x.log')).toMatchObject({
        status: 'SKIPPED',
        error: 'Requires a windows host (running on linux)',
        duration: 0,
      });
    });
  });

  describe('calculateSummary', () => {
    it('counts outcomes by status', () => {
      const outcomes: CellOutcome[] = [
        buildCellOutcome(completed(0), 'a.log'),
        buildCellOutcome(completed(1), 'b.log'),
        buildCellOutcome(crashed, 'c.log'),
        buildSkippedOutcome(cell, 'skip', 'd.log'),
      ];

      expect(calculateSummary(outcomes, 5000)).toEqual({
        total: 4,
        passed: 1,
        failed: 1,
        errors: 1,
        skipped: 1,
        duration: 5000,
      });
    });
  });
});
