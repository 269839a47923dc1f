/**
 * Coverage: Public API Surface
 */

export { CoverageAggregator, type CoverageAggregatorOptions } from './aggregator.ts';
export {
  loadCoverageArtifact,
  normalizeCoveragePath,
  parseCoverageArtifact,
  parseCoverageJson,
  parseLcov,
  type ParseArtifactOptions,
} from './artifact.ts';
export { CountDownBarrier, type BarrierOutcome } from './barrier.ts';
export {
  EMPTY_COVERAGE,
  mergeCoverage,
  mergeFileCoverage,
  summarizeCoverage,
  summarizeFile,
  summarizeFiles,
} from './merge.ts';
export {
  buildSubmissionPayload,
  HttpCoverageSubmissionClient,
  postJson,
  type CoverageSubmissionClient,
  type HttpResponse,
  type HttpSubmissionConfig,
  type PostJson,
  type SubmissionOptions,
  type SubmissionPayload,
} from './submission.ts';
export type {
  AggregateReport,
  CellReport,
  CellReportStatus,
  CoverageArtifact,
  CoverageCounter,
  CoverageData,
  CoverageFormat,
  CoverageSubmissionInput,
  CoverageTotals,
  FileCoverage,
  FileCoverageSummary,
  IngestOutcome,
} from './types.ts';
