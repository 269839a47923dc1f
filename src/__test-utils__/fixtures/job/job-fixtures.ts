/**
 * In-process stand-ins for the Job Executor's collaborators.
 *
 * Every fake records the calls it received so tests can assert ordering,
 * and can be told to fail at a chosen step.
 */

import type { CoverageArtifact } from '../../../coverage/types.ts';
import type {
  ExecutionEnvironment,
  JobToolchain,
  TestRunOutcome,
  TestRunRequest,
} from '../../../job/types.ts';
import { expandMatrix } from '../../../matrix/descriptor.ts';
import type { MatrixCell, MatrixEntry } from '../../../matrix/types.ts';

export function createCell(entry: Partial<MatrixEntry> = {}): MatrixCell {
  const [cell] = expandMatrix({
    include: [{ os: 'ubuntu-latest', runtime: '3.10', ...entry }],
  });
  if (!cell) {
    throw new Error('matrix expansion produced no cell');
  }
  return cell;
}

export const DEFAULT_TEST_REQUEST: TestRunRequest = {
  suite: 'tests',
  strictMarkers: true,
  coverageTarget: 'pkg',
  coverageReportMode: 'deferred',
};

export interface FakeToolchainOptions {
  provisionError?: unknown;
  /** Resolve provisioning only when this promise settles. */
  provisionGate?: Promise<void>;
  /** Dependency name whose install throws. */
  failDependency?: { name: string; error: unknown };
  installError?: unknown;
  testError?: unknown;
  disposeError?: unknown;
  exitCode?: number;
  artifact?: CoverageArtifact;
  perTestResults?: TestRunOutcome['perTestResults'];
}

export interface FakeToolchain extends JobToolchain {
  readonly calls: string[];
  readonly signals: (AbortSignal | undefined)[];
}

export function createFakeToolchain(options: FakeToolchainOptions = {}): FakeToolchain {
  const calls: string[] = [];
  const signals: (AbortSignal | undefined)[] = [];

  const makeEnv = (cell: MatrixCell): ExecutionEnvironment => ({
    cell,
    workDir: `/work/${cell.id}`,
    envDir: `/work/${cell.id}/env`,
    variables: {},
    dispose: () => {
      calls.push(`dispose:${cell.id}`);
      return options.disposeError === undefined
        ? Promise.resolve()
        : Promise.reject(options.disposeError);
    },
  });

  return {
    calls,
    signals,
    environments: {
      async provision(cell, signal) {
        calls.push(`provision:${cell.id}`);
        signals.push(signal);
        if (options.provisionGate) {
          await options.provisionGate;
        }
        if (options.provisionError !== undefined) {
          throw options.provisionError;
        }
        return makeEnv(cell);
      },
    },
    packages: {
      install(_env, constraint) {
        calls.push(`dependency:${constraint.name}`);
        if (options.failDependency?.name === constraint.name) {
          return Promise.reject(options.failDependency.error);
        }
        return Promise.resolve();
      },
    },
    project: {
      installLive(env) {
        calls.push(`install:${env.cell.id}`);
        return options.installError === undefined
          ? Promise.resolve()
          : Promise.reject(options.installError);
      },
    },
    tests: {
      execute(env) {
        calls.push(`test:${env.cell.id}`);
        if (options.testError !== undefined) {
          return Promise.reject(options.testError);
        }
        return Promise.resolve({
          exitCode: options.exitCode ?? 0,
          perTestResults: options.perTestResults ?? [],
          ...(options.artifact ? { coverageArtifact: options.artifact } : {}),
        });
      },
    },
  };
}
