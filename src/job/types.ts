/**
 * Job Executor: collaborator contracts and result types.
 */

import type { CoverageArtifact } from '../coverage/types.ts';
import type { ErrorCode } from '../errors/errors.ts';
import type { DependencyConstraint, MatrixCell } from '../matrix/types.ts';
import type { JobState, JobStage } from './job-state.ts';

/** Whether the test run was instrumented and reported immediately or exported afterwards. */
export type CoverageReportMode = 'immediate' | 'deferred';

/**
 * Isolated environment acquired for one cell.
 */
export interface ExecutionEnvironment {
  readonly cell: MatrixCell;
  /** Directory owned by this cell (artifacts, reports). */
  readonly workDir: string;
  /** Directory holding the provisioned runtime. */
  readonly envDir: string;
  /** Extra process environment for every command run inside this environment. */
  readonly variables: Readonly<Record<string, string>>;
  dispose(): Promise<void>;
}

export interface EnvironmentProvider {
  provision(cell: MatrixCell, signal?: AbortSignal): Promise<ExecutionEnvironment>;
}

export interface PackageInstaller {
  install(env: ExecutionEnvironment, constraint: DependencyConstraint): Promise<void>;
}

export interface ProjectInstaller {
  installLive(env: ExecutionEnvironment): Promise<void>;
}

export interface TestRunRequest {
  readonly suite: string;
  /** Reject test markers that are not declared in the runner configuration. */
  readonly strictMarkers: boolean;
  /** Module path the coverage instrumentation is scoped to. */
  readonly coverageTarget: string;
  readonly coverageReportMode: CoverageReportMode;
}

export type TestCaseOutcome = 'passed' | 'failed' | 'skipped';

export interface TestCaseResult {
  readonly id: string;
  readonly outcome: TestCaseOutcome;
  readonly durationMs?: number;
}

export interface TestRunOutcome {
  readonly exitCode: number;
  readonly perTestResults: readonly TestCaseResult[];
  readonly coverageArtifact?: CoverageArtifact;
}

export interface TestRunner {
  execute(env: ExecutionEnvironment, request: TestRunRequest): Promise<TestRunOutcome>;
}

/**
 * Everything a Job Executor needs from the outside world.
 */
export interface JobToolchain {
  readonly environments: EnvironmentProvider;
  readonly packages: PackageInstaller;
  readonly project: ProjectInstaller;
  readonly tests: TestRunner;
}

/** Why a cell ended in the `Failed` state. */
export interface JobFailure {
  readonly stage: JobStage;
  readonly code: ErrorCode;
  readonly message: string;
}

export interface TestTally {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
}

export type ExitStatus = 'success' | 'failure';

/**
 * Outcome of one cell. Immutable once emitted.
 */
export interface JobResult {
  readonly cell: MatrixCell;
  readonly exitStatus: ExitStatus;
  readonly state: JobState;
  readonly coverageArtifact?: CoverageArtifact;
  readonly failure?: JobFailure;
  readonly tests: TestTally;
  readonly testExitCode?: number;
  readonly durationMs: number;
}
