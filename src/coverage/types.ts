/**
 * Coverage: shared types.
 */

/** Line and branch sets for one source file. Branches are keyed `from->to`. */
export interface FileCoverage {
  readonly coveredLines: ReadonlySet<number>;
  readonly coverableLines: ReadonlySet<number>;
  readonly coveredBranches: ReadonlySet<string>;
  readonly coverableBranches: ReadonlySet<string>;
}

/** Per-file coverage keyed by forward-slash relative path. */
export type CoverageData = ReadonlyMap<string, FileCoverage>;

/** Supported on-disk artifact formats. */
export type CoverageFormat = 'coverage-json' | 'lcov';

/**
 * A coverage artifact produced by one job.
 */
export interface CoverageArtifact {
  /** SHA-256 of the artifact bytes; the reference used for idempotent ingest. */
  readonly id: string;
  readonly cellId: string;
  /** Where the artifact was read from. */
  readonly source: string;
  readonly data: CoverageData;
}

export interface CoverageCounter {
  readonly covered: number;
  readonly total: number;
  /** Percentage rounded to two decimals; 100 when nothing is coverable. */
  readonly percent: number;
}

export interface CoverageTotals {
  readonly lines: CoverageCounter;
  readonly branches: CoverageCounter;
}

export interface FileCoverageSummary extends CoverageTotals {
  readonly path: string;
}

export type CellReportStatus = 'success' | 'failure';

export interface CellReport {
  readonly cellId: string;
  readonly status: CellReportStatus;
  readonly artifacts: readonly string[];
}

/**
 * Merged view across all ingested jobs.
 */
export interface AggregateReport {
  readonly runId: string;
  readonly expectedCount: number;
  readonly reportedCount: number;
  /** Sorted artifact ids. */
  readonly receivedArtifacts: readonly string[];
  readonly finalized: boolean;
  /** True when finalized before every expected cell reported. */
  readonly incomplete: boolean;
  /** Expected cells that have not reported, in expectation order. */
  readonly missingCells: readonly string[];
  /** Reported cells whose every result failed, in expectation order. */
  readonly failedCells: readonly string[];
  readonly cells: readonly CellReport[];
  readonly totals: CoverageTotals;
  readonly files: readonly FileCoverageSummary[];
}

/**
 * What the aggregator reads from a finished job.
 */
export interface CoverageSubmissionInput {
  readonly cell: { readonly id: string };
  readonly exitStatus: CellReportStatus;
  readonly coverageArtifact?: CoverageArtifact;
}

/** How an ingest call was handled. */
export type IngestOutcome = 'accepted' | 'duplicate' | 'no-artifact' | 'late' | 'unexpected';
