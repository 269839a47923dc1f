/**
 * Job Executor: runs one matrix cell to completion.
 *
 * Steps run strictly in order through the job state machine. A step failure
 * is recorded on the result and ends the job; it is never thrown, so one
 * cell cannot affect another. The environment is disposed however the job
 * ends.
 */

import {
  AppError,
  DependencyError,
  formatErrorMessage,
  InstallError,
  ProvisionError,
  type ErrorCode,
} from '../errors/errors.ts';
import type { MatrixCell } from '../matrix/types.ts';
import {
  advance,
  failJob,
  INITIAL_JOB_STATE,
  pendingStage,
  type JobStage,
  type JobState,
} from './job-state.ts';
import { tallyTests } from './test-report.ts';
import type {
  EnvironmentProvider,
  ExecutionEnvironment,
  JobFailure,
  JobResult,
  JobToolchain,
  TestRunOutcome,
  TestRunRequest,
} from './types.ts';

export interface RunCellOptions {
  readonly test: TestRunRequest;
  /** Abort provisioning after this long. */
  readonly provisionTimeoutMs?: number;
  readonly onStateChange?: (cell: MatrixCell, state: JobState) => void;
  /** Non-fatal problems, such as a failed environment disposal. */
  readonly onWarning?: (message: string) => void;
  readonly now?: () => number;
}

const DEFAULT_CODES: Readonly<Record<JobStage, ErrorCode>> = {
  provision: 'PROVISION_FAILED',
  dependencies: 'DEPENDENCY_INSTALL_FAILED',
  install: 'INSTALL_FAILED',
  test: 'TEST_RUNNER_CRASHED',
  report: 'UNEXPECTED_ERROR',
};

function stageOwnsError(stage: JobStage, error: unknown): error is AppError {
  switch (stage) {
    case 'provision':
      return error instanceof ProvisionError;
    case 'dependencies':
      return error instanceof DependencyError;
    case 'install':
      return error instanceof InstallError;
    default:
      return false;
  }
}

/**
 * Map whatever a step threw onto the failure recorded for its stage.
 */
export function describeStageFailure(stage: JobStage, error: unknown): JobFailure {
  if (stageOwnsError(stage, error)) {
    return { stage, code: error.code, message: error.message };
  }
  return { stage, code: DEFAULT_CODES[stage], message: formatErrorMessage(error) };
}

async function provisionWithTimeout(
  provider: EnvironmentProvider,
  cell: MatrixCell,
  timeoutMs: number | undefined,
  onLateEnvironment: (env: ExecutionEnvironment) => void,
): Promise<ExecutionEnvironment> {
  if (timeoutMs === undefined) {
    return provider.provision(cell);
  }

  const controller = new AbortController();
  const provisioning = provider.provision(cell, controller.signal);
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ProvisionError(
          'PROVISION_TIMEOUT',
          `Provisioning ${cell.id} exceeded ${timeoutMs}ms`,
          { details: { cellId: cell.id, timeoutMs } },
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([provisioning, timeout]);
  } finally {
    clearTimeout(timer);
    if (controller.signal.aborted) {
      // an environment that arrives after the deadline still has to be released
      void provisioning.then(onLateEnvironment, () => undefined);
    }
  }
}

/**
 * Run every step for one cell and describe how it ended.
 */
export async function runCell(
  cell: MatrixCell,
  toolchain: JobToolchain,
  options: RunCellOptions,
): Promise<JobResult> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const warn = options.onWarning ?? ((): void => undefined);
  const job: { state: JobState; env?: ExecutionEnvironment; outcome?: TestRunOutcome } = {
    state: INITIAL_JOB_STATE,
  };

  const moveTo = (next: JobState): void => {
    job.state = next;
    options.onStateChange?.(cell, next);
  };

  const dispose = async (target: ExecutionEnvironment): Promise<void> => {
    try {
      await target.dispose();
    } catch (error) {
      warn(`Failed to dispose environment for ${cell.id}: ${formatErrorMessage(error)}`);
    }
  };

  const step = async (work: () => Promise<void>): Promise<boolean> => {
    const stage = pendingStage(job.state);
    try {
      await work();
    } catch (error) {
      const failure = describeStageFailure(stage, error);
      moveTo(failJob(job.state, failure.code, failure.message));
      return false;
    }
    moveTo(advance(job.state));
    return true;
  };

  try {
    const ok =
      (await step(async () => {
        job.env = await provisionWithTimeout(
          toolchain.environments,
          cell,
          options.provisionTimeoutMs,
          (late) => {
            void dispose(late);
          },
        );
      })) &&
      (await step(async () => {
        const env = requireEnv(job.env, cell);
        for (const constraint of cell.dependencySpecs) {
          await toolchain.packages.install(env, constraint);
        }
      })) &&
      (await step(async () => {
        await toolchain.project.installLive(requireEnv(job.env, cell));
      })) &&
      (await step(async () => {
        job.outcome = await toolchain.tests.execute(requireEnv(job.env, cell), options.test);
      }));

    if (ok) {
      moveTo(advance(job.state));
    }
  } finally {
    if (job.env) {
      await dispose(job.env);
    }
  }

  return buildResult(cell, job.state, job.outcome, now() - startedAt);
}

function requireEnv(env: ExecutionEnvironment | undefined, cell: MatrixCell): ExecutionEnvironment {
  if (!env) {
    throw new AppError('UNEXPECTED_ERROR', `No environment for ${cell.id}`);
  }
  return env;
}

function buildResult(
  cell: MatrixCell,
  state: JobState,
  outcome: TestRunOutcome | undefined,
  durationMs: number,
): JobResult {
  const tests = tallyTests(outcome?.perTestResults ?? []);

  if (state.kind === 'Failed') {
    const failed: JobResult = {
      cell,
      exitStatus: 'failure',
      state,
      failure: { stage: state.stage, code: state.code, message: state.message },
      tests,
      durationMs,
    };
    return Object.freeze(failed);
  }

  const result: JobResult = {
    cell,
    exitStatus: outcome?.exitCode === 0 ? 'success' : 'failure',
    state,
    ...(outcome?.coverageArtifact ? { coverageArtifact: outcome.coverageArtifact } : {}),
    tests,
    ...(outcome ? { testExitCode: outcome.exitCode } : {}),
    durationMs,
  };
  return Object.freeze(result);
}
