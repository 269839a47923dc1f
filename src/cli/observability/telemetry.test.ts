/**
 * Tests for the per-job telemetry collector.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTempDir, removeTempDir } from '../../__test-utils__/utils/temp-utils.ts';
import { TELEMETRY_FILENAME, TelemetryCollector } from './telemetry.ts';
import type { TraceContext } from './tracing.ts';

const ctx = (spanId: string): TraceContext => ({ traceId: 't'.repeat(32), spanId, samplingDecision: true });

/** Clock returning the given instants in order. */
function clock(...instants: number[]): () => number {
  let index = 0;
  return () => instants[Math.min(index++, instants.length - 1)] ?? 0;
}

describe('TelemetryCollector', () => {
  let logDir = '';

  beforeEach(async () => {
    logDir = await createTempDir('telemetry-');
  });

  afterEach(async () => {
    await removeTempDir(logDir);
  });

  it('records one metric per job with its duration', () => {
    const telemetry = new TelemetryCollector(true, clock(1000, 1250));

    const tracker = telemetry.startExecution('ubuntu-latest-3.10', ctx('span-a'));
    telemetry.recordExecution(tracker, false, 'Tests exited with code 1');

    expect(telemetry.getAllMetrics()).toEqual([
      {
        jobId: 'ubuntu-latest-3.10',
        traceId: 't'.repeat(32),
        spanId: 'span-a',
        startTime: 1000,
        endTime: 1250,
        durationMs: 250,
        success: false,
        failureReason: 'Tests exited with code 1',
      },
    ]);
  });

  it('records nothing when disabled', () => {
    const telemetry = new TelemetryCollector(false);

    telemetry.recordExecution(telemetry.startExecution('docs', ctx('span-d')), true);

    expect(telemetry.getAllMetrics()).toEqual([]);
  });

  it('calculates stats, optionally filtered', () => {
    const telemetry = new TelemetryCollector(true, clock(0, 100, 0, 300));
    telemetry.recordExecution(telemetry.startExecution('a', ctx('s1')), true);
    telemetry.recordExecution(telemetry.startExecution('b', ctx('s2')), false);

    expect(telemetry.calculateStats()).toEqual({
      totalExecutions: 2,
      successfulExecutions: 1,
      failedExecutions: 1,
      averageDurationMs: 200,
      minDurationMs: 100,
      maxDurationMs: 300,
    });
    expect(telemetry.calculateStats((m) => m.success).totalExecutions).toBe(1);
    expect(telemetry.calculateStats(() => false).averageDurationMs).toBe(0);
  });

  it('clears recorded metrics', () => {
    const telemetry = new TelemetryCollector();
    telemetry.recordExecution(telemetry.startExecution('a', ctx('s1')), true);

    telemetry.clear();

    expect(telemetry.getAllMetrics()).toEqual([]);
  });

  it('writes the export next to the job logs', async () => {
    const telemetry = new TelemetryCollector(true, clock(0, 40, Date.UTC(2026, 0, 2)));
    telemetry.recordExecution(telemetry.startExecution('a', ctx('s1')), true);

    const file = await telemetry.writeTo(path.join(logDir, 'nested'));

    expect(file).toBe(path.join(logDir, 'nested', TELEMETRY_FILENAME));
    const written: unknown = JSON.parse(await readFile(file, 'utf8'));
    expect(written).toMatchObject({
      version: '1.0',
      collectedAt: '2026-01-02T00:00:00.000Z',
      stats: { totalExecutions: 1, successfulExecutions: 1, averageDurationMs: 40 },
    });
  });
});
