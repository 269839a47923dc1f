/**
 * Parallel matrix execution.
 *
 * Runs one Job Executor per cell with bounded concurrency, feeds every result
 * to the coverage aggregator as it arrives, and finalizes the aggregate once
 * every expected cell has reported or the observation window closes.
 *
 * Cells never share state; a failing cell only changes its own outcome.
 */

import { cpus } from 'node:os';

import pMap from 'p-map';

import { CoverageAggregator } from '../../coverage/aggregator.ts';
import type { BarrierOutcome } from '../../coverage/barrier.ts';
import type { CoverageSubmissionClient } from '../../coverage/submission.ts';
import type { AggregateReport, IngestOutcome } from '../../coverage/types.ts';
import { formatErrorMessage } from '../../errors/errors.ts';
import { runCell } from '../../job/job-runner.ts';
import { isTerminal, pendingStage, type JobStage } from '../../job/job-state.ts';
import type { JobResult, JobToolchain, TestRunRequest } from '../../job/types.ts';
import type { MatrixCell } from '../../matrix/types.ts';
import {
  buildCellOutcome,
  buildSkippedOutcome,
  determineStatus,
  type CellOutcome,
  type CellStatus,
} from '../modules/index.ts';
import { appendToLog, getLogPath, makeLogOptions } from '../observability/logger.ts';
import { TelemetryCollector } from '../observability/telemetry.ts';
import {
  createChildTraceContext,
  createTraceContext,
  type TraceContext,
} from '../observability/tracing.ts';

export type ToolchainFactory = (cell: MatrixCell, traceContext: TraceContext) => JobToolchain;

export interface MatrixExecutionOptions {
  readonly runId: string;
  readonly logDir: string;
  readonly test: TestRunRequest;
  /** Defaults to one less than the CPU count, at least 1. */
  readonly concurrency?: number;
  readonly provisionTimeoutMs?: number;
  /** Longest wait for every expected cell before finalizing anyway. */
  readonly observationWindowMs: number;
  readonly structuredLogs?: boolean;
  /** Root context; each cell runs in a child span. */
  readonly traceContext?: TraceContext;
  readonly telemetry?: TelemetryCollector;
  readonly submission?: CoverageSubmissionClient;
  /** `detail` names the running stage. */
  readonly onStatusChange?: (id: string, status: CellStatus, detail?: JobStage) => void;
  readonly onWarning?: (message: string) => void;
  readonly now?: () => number;
}

export interface SkippedCell {
  readonly cell: MatrixCell;
  readonly reason: string;
}

export interface MatrixRunResult {
  /** Every planned cell, in matrix order. */
  readonly outcomes: readonly CellOutcome[];
  readonly results: readonly JobResult[];
  readonly ingest: Readonly<Record<string, IngestOutcome>>;
  readonly barrier: BarrierOutcome;
  readonly report: AggregateReport;
  /** One entry per failed submission call. */
  readonly submissionErrors: readonly string[];
}

export function defaultConcurrency(): number {
  return Math.max(1, cpus().length - 1);
}

function describeResult(result: JobResult, status: CellStatus): string {
  const { tests } = result;
  if (result.failure) {
    return `Result: ${status} at ${result.failure.stage} (${result.failure.code}: ${result.failure.message})`;
  }
  const tally = tests.total > 0 ? `, ${tests.passed}/${tests.total} tests passed` : '';
  return `Result: ${status} (exit ${result.testExitCode ?? 'n/a'}${tally})`;
}

/**
 * Run one cell with tracing, telemetry and a fresh job log.
 */
export async function executeCell(
  cell: MatrixCell,
  createToolchain: ToolchainFactory,
  options: MatrixExecutionOptions,
): Promise<JobResult> {
  const traceContext = options.traceContext
    ? createChildTraceContext(options.traceContext)
    : createTraceContext();
  const telemetry = options.telemetry ?? new TelemetryCollector(false);
  const execution = telemetry.startExecution(cell.id, traceContext);
  const log = makeLogOptions({
    logDir: options.logDir,
    jobId: cell.id,
    structured: options.structuredLogs,
    traceContext,
  });

  // truncates the log left by an earlier run
  await appendToLog(
    { ...log, append: false },
    `Cell ${cell.id} (os=${cell.os}, runtime=${cell.runtimeVersion})`,
  );

  options.onStatusChange?.(cell.id, 'RUNNING', 'provision');
  const warnings: string[] = [];

  const result = await runCell(cell, createToolchain(cell, traceContext), {
    test: options.test,
    ...(options.provisionTimeoutMs === undefined
      ? {}
      : { provisionTimeoutMs: options.provisionTimeoutMs }),
    onStateChange: (_cell, state) => {
      if (!isTerminal(state)) {
        options.onStatusChange?.(cell.id, 'RUNNING', pendingStage(state));
      }
    },
    onWarning: (message) => warnings.push(message),
    ...(options.now ? { now: options.now } : {}),
  });

  for (const warning of warnings) {
    await appendToLog(log, `WARNING: ${warning}`);
    options.onWarning?.(warning);
  }

  const status = determineStatus(result);
  await appendToLog(log, describeResult(result, status));

  const failureReason =
    result.failure?.code ??
    (status === 'FAIL' ? `tests exited with code ${result.testExitCode ?? 'n/a'}` : undefined);
  telemetry.recordExecution(execution, result.exitStatus === 'success', failureReason);
  options.onStatusChange?.(cell.id, status);

  return result;
}

/**
 * Run the matrix and aggregate coverage.
 *
 * @param cells - Cells to run; each is expected by the aggregator.
 * @param skipped - Cells planned out of this run; reported, never expected.
 */
export async function executeMatrix(
  cells: readonly MatrixCell[],
  skipped: readonly SkippedCell[],
  createToolchain: ToolchainFactory,
  options: MatrixExecutionOptions,
): Promise<MatrixRunResult> {
  const aggregator = new CoverageAggregator({
    runId: options.runId,
    expectedCells: cells.map((cell) => cell.id),
  });
  const ingest: Record<string, IngestOutcome> = {};
  const submissionErrors: string[] = [];
  const submission = options.submission;
  const uploads: Promise<void>[] = [];

  for (const { cell } of skipped) {
    options.onStatusChange?.(cell.id, 'SKIPPED');
  }

  const matrixRun = pMap(
    cells,
    async (cell) => {
      const result = await executeCell(cell, createToolchain, options);
      const outcome = aggregator.ingest(result);
      ingest[cell.id] = outcome;

      if (outcome === 'accepted' && submission && result.coverageArtifact) {
        // registered in the same tick as the ingest, so it is known before finalize
        const upload = submission
          .submit(result.coverageArtifact, { parallel: true })
          .catch((error: unknown) => {
            submissionErrors.push(`${cell.id}: ${formatErrorMessage(error)}`);
          });
        uploads.push(upload);
        await upload;
      }
      return result;
    },
    { concurrency: options.concurrency ?? defaultConcurrency() },
  );

  // every cell ingests before its task settles, so the matrix finishing
  // first only happens when the barrier is already open
  let barrier: BarrierOutcome;
  try {
    barrier = await Promise.race([
      aggregator.waitForCompletion(options.observationWindowMs),
      matrixRun.then((): BarrierOutcome => 'complete'),
    ]);
  } catch (error) {
    // releases the barrier timer
    aggregator.finalize();
    throw error;
  }
  const report = aggregator.finalize();

  if (submission) {
    // the remote build must not close before the last upload lands
    await Promise.allSettled(uploads);
    try {
      await submission.finalize(options.runId);
    } catch (error) {
      submissionErrors.push(`finalize: ${formatErrorMessage(error)}`);
    }
  }

  const results = await matrixRun;
  const byId = new Map<string, CellOutcome>();
  for (const result of results) {
    byId.set(result.cell.id, buildCellOutcome(result, getLogPath(options.logDir, result.cell.id)));
  }
  for (const { cell, reason } of skipped) {
    byId.set(cell.id, buildSkippedOutcome(cell, reason, getLogPath(options.logDir, cell.id)));
  }

  const outcomes = [...cells, ...skipped.map((s) => s.cell)]
    .sort((a, b) => a.index - b.index)
    .flatMap((cell) => {
      const outcome = byId.get(cell.id);
      return outcome ? [outcome] : [];
    });

  return { outcomes, results, ingest, barrier, report, submissionErrors };
}
