/**
 * Per-job telemetry.
 *
 * One metric per matrix cell (and one for the documentation run), keyed by
 * the job's span id. Exported as JSON next to the job logs after every run.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { TraceContext } from './tracing.ts';

export const TELEMETRY_FILENAME = 'telemetry.json';

export interface JobMetrics {
  readonly jobId: string;
  readonly traceId: string;
  readonly spanId: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly durationMs: number;
  readonly success: boolean;
  /** Failure code or reason when the job did not succeed. */
  readonly failureReason?: string;
}

export interface TelemetryStats {
  readonly totalExecutions: number;
  readonly successfulExecutions: number;
  readonly failedExecutions: number;
  readonly averageDurationMs: number;
  readonly minDurationMs: number;
  readonly maxDurationMs: number;
}

export interface ExecutionTracker {
  readonly jobId: string;
  readonly traceId: string;
  readonly spanId: string;
  readonly startTime: number;
}

export interface TelemetryExport {
  readonly version: '1.0';
  readonly collectedAt: string;
  readonly metrics: readonly JobMetrics[];
  readonly stats: TelemetryStats;
}

export class TelemetryCollector {
  private readonly metrics = new Map<string, JobMetrics>();
  private readonly enabled: boolean;
  private readonly now: () => number;

  constructor(enabled = true, now: () => number = Date.now) {
    this.enabled = enabled;
    this.now = now;
  }

  startExecution(jobId: string, ctx: TraceContext): ExecutionTracker {
    return { jobId, traceId: ctx.traceId, spanId: ctx.spanId, startTime: this.now() };
  }

  recordExecution(tracker: ExecutionTracker, success: boolean, failureReason?: string): void {
    if (!this.enabled) {
      return;
    }

    const endTime = this.now();
    this.metrics.set(tracker.spanId, {
      jobId: tracker.jobId,
      traceId: tracker.traceId,
      spanId: tracker.spanId,
      startTime: tracker.startTime,
      endTime,
      durationMs: endTime - tracker.startTime,
      success,
      ...(failureReason === undefined ? {} : { failureReason }),
    });
  }

  getAllMetrics(): readonly JobMetrics[] {
    return [...this.metrics.values()];
  }

  clear(): void {
    this.metrics.clear();
  }

  calculateStats(filter?: (metric: JobMetrics) => boolean): TelemetryStats {
    const filtered = filter ? this.getAllMetrics().filter(filter) : this.getAllMetrics();

    if (filtered.length === 0) {
      return {
        totalExecutions: 0,
        successfulExecutions: 0,
        failedExecutions: 0,
        averageDurationMs: 0,
        minDurationMs: 0,
        maxDurationMs: 0,
      };
    }

    const durations = filtered.map((m) => m.durationMs);
    const successful = filtered.filter((m) => m.success).length;

    return {
      totalExecutions: filtered.length,
      successfulExecutions: successful,
      failedExecutions: filtered.length - successful,
      averageDurationMs: durations.reduce((a, b) => a + b, 0) / durations.length,
      minDurationMs: Math.min(...durations),
      maxDurationMs: Math.max(...durations),
    };
  }

  export(): TelemetryExport {
    return {
      version: '1.0',
      collectedAt: new Date(this.now()).toISOString(),
      metrics: this.getAllMetrics(),
      stats: this.calculateStats(),
    };
  }

  /**
   * Write the export to `<logDir>/telemetry.json`.
   *
   * @returns The written path.
   */
  async writeTo(logDir: string): Promise<string> {
    await mkdir(logDir, { recursive: true });
    const file = path.join(logDir, TELEMETRY_FILENAME);
    await writeFile(file, `${JSON.stringify(this.export(), null, 2)}\n`, 'utf8');
    return file;
  }
}
