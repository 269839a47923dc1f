/**
 * Coverage: cross-job aggregator.
 *
 * The single synchronization point of a run. Job results arrive in any order,
 * possibly more than once; each artifact is merged at most once (keyed by its
 * digest) and the report is finalized exactly once, either when the last
 * expected cell reports or on an explicit `finalize()`.
 */

import { CountDownBarrier, type BarrierOutcome } from './barrier.ts';
import { EMPTY_COVERAGE, mergeCoverage, summarizeCoverage, summarizeFiles } from './merge.ts';
import type {
  AggregateReport,
  CellReport,
  CellReportStatus,
  CoverageData,
  CoverageSubmissionInput,
  IngestOutcome,
} from './types.ts';

export interface CoverageAggregatorOptions {
  readonly runId: string;
  /** Cell ids that must report before the run is complete. */
  readonly expectedCells: readonly string[];
}

interface CellState {
  status: CellReportStatus;
  readonly artifacts: Set<string>;
}

export class CoverageAggregator {
  readonly runId: string;
  private readonly expected: readonly string[];
  private readonly expectedSet: ReadonlySet<string>;
  private readonly barrier: CountDownBarrier;
  private readonly cells = new Map<string, CellState>();
  private readonly received = new Set<string>();
  private merged: CoverageData = EMPTY_COVERAGE;
  private finalReport: AggregateReport | undefined;

  constructor(options: CoverageAggregatorOptions) {
    this.runId = options.runId;
    this.expected = [...new Set(options.expectedCells)];
    this.expectedSet = new Set(this.expected);
    this.barrier = new CountDownBarrier(this.expected);
  }

  get isFinalized(): boolean {
    return this.finalReport !== undefined;
  }

  /**
   * Record one job result. Never throws.
   */
  ingest(result: CoverageSubmissionInput): IngestOutcome {
    const cellId = result.cell.id;
    if (!this.expectedSet.has(cellId)) {
      return 'unexpected';
    }
    if (this.finalReport) {
      return 'late';
    }

    const cell = this.cells.get(cellId);
    if (cell) {
      // any success wins, so arrival order does not matter
      if (result.exitStatus === 'success') {
        cell.status = 'success';
      }
    } else {
      this.cells.set(cellId, { status: result.exitStatus, artifacts: new Set() });
    }

    const outcome = this.mergeArtifact(cellId, result);
    if (this.barrier.arrive(cellId)) {
      this.finalize();
    }
    return outcome;
  }

  /**
   * Close the run. Idempotent; before every expected cell has reported the
   * report is marked incomplete and names the missing cells.
   */
  finalize(): AggregateReport {
    if (this.finalReport) {
      return this.finalReport;
    }
    const report = this.buildReport(true);
    this.finalReport = report;
    this.barrier.release();
    return report;
  }

  /** Current state of the merge without closing the run. */
  snapshot(): AggregateReport {
    return this.finalReport ?? this.buildReport(false);
  }

  /**
   * Resolve once every expected cell has reported or the run was finalized.
   */
  waitForCompletion(timeoutMs: number): Promise<BarrierOutcome> {
    return this.barrier.wait(timeoutMs);
  }

  private mergeArtifact(cellId: string, result: CoverageSubmissionInput): IngestOutcome {
    const artifact = result.coverageArtifact;
    if (!artifact) {
      return 'no-artifact';
    }
    if (this.received.has(artifact.id)) {
      return 'duplicate';
    }
    this.received.add(artifact.id);
    this.cells.get(cellId)?.artifacts.add(artifact.id);
    this.merged = mergeCoverage(this.merged, artifact.data);
    return 'accepted';
  }

  private buildReport(finalized: boolean): AggregateReport {
    const missingCells = this.expected.filter((id) => !this.cells.has(id));
    const cells: CellReport[] = [];
    for (const id of this.expected) {
      const state = this.cells.get(id);
      if (state) {
        cells.push({ cellId: id, status: state.status, artifacts: [...state.artifacts].sort() });
      }
    }

    return Object.freeze({
      runId: this.runId,
      expectedCount: this.expected.length,
      reportedCount: cells.length,
      receivedArtifacts: [...this.received].sort(),
      finalized,
      incomplete: finalized && missingCells.length > 0,
      missingCells,
      failedCells: cells.filter((c) => c.status === 'failure').map((c) => c.cellId),
      cells,
      totals: summarizeCoverage(this.merged),
      files: summarizeFiles(this.merged),
    });
  }
}
