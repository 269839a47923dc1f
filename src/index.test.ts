/**
 * matrix-ci main entry point tests
 *
 * Verifies the public surface is reachable from the package root and works
 * together: a matrix expanded here runs through the executor with a fake
 * toolchain and merges its coverage.
 */

import { describe, expect, it } from 'vitest';

import { createArtifact, fileCoverage } from './__test-utils__/fixtures/coverage/coverage-fixtures.ts';
import { createFakeToolchain } from './__test-utils__/fixtures/job/job-fixtures.ts';
import { createTempDir, removeTempDir } from './__test-utils__/utils/temp-utils.ts';
import * as matrixCi from './index.ts';

describe('matrix-ci main entry point', () => {
  it('exports each component', () => {
    expect(typeof matrixCi.expandMatrix).toBe('function');
    expect(typeof matrixCi.runCell).toBe('function');
    expect(typeof matrixCi.CoverageAggregator).toBe('function');
    expect(typeof matrixCi.verifyDocumentation).toBe('function');
    expect(typeof matrixCi.executeMatrix).toBe('function');
    expect(typeof matrixCi.loadPipelineConfig).toBe('function');
    expect(typeof matrixCi.main).toBe('function');
    expect(typeof matrixCi.AppError).toBe('function');
  });

  it('exports the package version', () => {
    expect(matrixCi.getPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it('round-trips a trace context through traceparent', () => {
    const ctx = matrixCi.createTraceContext();

    const parsed = matrixCi.parseTraceparent(matrixCi.formatTraceparent(ctx));

    expect(parsed?.traceId).toBe(ctx.traceId);
    expect(parsed?.spanId).toBe(ctx.spanId);
  });

  it('runs an expanded matrix and merges its coverage', async () => {
    const cells = matrixCi.expandMatrix({
      axes: { os: ['ubuntu-latest'], runtime: ['3.10', '3.11'] },
    });
    const artifacts = new Map([
      ['ubuntu-latest-3.10', createArtifact('a1', 'ubuntu-latest-3.10', { 'pkg/a.py': fileCoverage([1], [1, 2]) })],
      ['ubuntu-latest-3.11', createArtifact('a2', 'ubuntu-latest-3.11', { 'pkg/a.py': fileCoverage([2], [1, 2]) })],
    ]);
    const logDir = await createTempDir('index-');

    const result = await matrixCi.executeMatrix(
      cells,
      [],
      (cell) => {
        const artifact = artifacts.get(cell.id);
        return createFakeToolchain(artifact ? { artifact } : {});
      },
      {
        runId: 'run-1',
        logDir,
        test: { suite: 'tests', strictMarkers: true, coverageTarget: 'pkg', coverageReportMode: 'immediate' },
        observationWindowMs: 1000,
      },
    );

    await removeTempDir(logDir);

    expect(result.barrier).toBe('complete');
    expect(result.report.totals.lines).toEqual({ covered: 2, total: 2, percent: 100 });
    expect(result.outcomes.map((o) => o.status)).toEqual(['PASS', 'PASS']);
  });
});
