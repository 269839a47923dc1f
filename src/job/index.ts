/**
 * Job Executor: Public API Surface
 */

export {
  advance,
  failJob,
  INITIAL_JOB_STATE,
  isTerminal,
  pendingStage,
  type ActiveJobState,
  type FailedJobState,
  type JobPhase,
  type JobStage,
  type JobState,
} from './job-state.ts';
export { describeStageFailure, runCell, type RunCellOptions } from './job-runner.ts';
export { parseTestReportLog, tallyTests } from './test-report.ts';
export type {
  CoverageReportMode,
  EnvironmentProvider,
  ExecutionEnvironment,
  ExitStatus,
  JobFailure,
  JobResult,
  JobToolchain,
  PackageInstaller,
  ProjectInstaller,
  TestCaseOutcome,
  TestCaseResult,
  TestRunner,
  TestRunOutcome,
  TestRunRequest,
  TestTally,
} from './types.ts';
