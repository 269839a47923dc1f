/**
 * Shell toolchain.
 *
 * Implements the job collaborators by rendering the configured command
 * templates and running them through the platform shell. Each cell gets its
 * own toolchain bound to the cell's trace context, so every command it runs
 * logs under the cell id and receives the cell's span as `TRACEPARENT`.
 */

import { mkdir, readFile, rm } from 'node:fs/promises';
import path from 'node:path';

import type { CoverageArtifact } from '../../../coverage/types.ts';
import { loadCoverageArtifact } from '../../../coverage/artifact.ts';
import {
  AppError,
  CoverageError,
  DependencyError,
  formatErrorMessage,
  hasErrorProperty,
  InstallError,
  isProcessError,
  ProvisionError,
  type ErrorCode,
} from '../../../errors/errors.ts';
import { parseTestReportLog } from '../../../job/test-report.ts';
import type {
  EnvironmentProvider,
  ExecutionEnvironment,
  JobToolchain,
  PackageInstaller,
  ProjectInstaller,
  TestCaseResult,
  TestRunner,
  TestRunOutcome,
  TestRunRequest,
} from '../../../job/types.ts';
import {
  formatRegistryRequirement,
  formatVcsRequirement,
} from '../../../matrix/dependency-spec.ts';
import type { DependencyConstraint, MatrixCell } from '../../../matrix/types.ts';
import { provisionCommandFor, type PipelineConfig } from '../../config/pipeline-config.ts';
import { makeLogOptions } from '../../observability/logger.ts';
import { formatTraceparent, TRACEPARENT_ENV, type TraceContext } from '../../observability/tracing.ts';
import { renderCommand, type PlaceholderValues } from '../command-template/command-template.ts';
import { runCommand, type CommandRunner } from '../process-manager/process-manager.ts';

export const TEST_REPORT_FILENAME = 'test-report.jsonl';

export interface ShellToolchainOptions {
  readonly config: PipelineConfig;
  /** Absolute project directory; commands run here. */
  readonly projectDir: string;
  /** Absolute directory holding one work directory per cell. */
  readonly workRoot: string;
  readonly logDir: string;
  readonly structuredLogs?: boolean;
  readonly traceContext?: TraceContext;
  readonly runner?: CommandRunner;
  readonly platform?: NodeJS.Platform;
  readonly baseEnv?: NodeJS.ProcessEnv;
}

/** Paths of the runtime inside a provisioned environment. */
export interface RuntimeLayout {
  readonly binDir: string;
  readonly python: string;
}

export function runtimeLayout(envDir: string, platform: NodeJS.Platform): RuntimeLayout {
  if (platform === 'win32') {
    const binDir = path.win32.join(envDir, 'Scripts');
    return { binDir, python: path.win32.join(binDir, 'python.exe') };
  }
  const binDir = path.posix.join(envDir, 'bin');
  return { binDir, python: path.posix.join(binDir, 'python') };
}

function pathFor(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

/**
 * Environment variables for commands run inside an environment: its bin
 * directory first on the search path, plus the trace header.
 */
export function environmentVariables(
  envDir: string,
  platform: NodeJS.Platform,
  baseEnv: NodeJS.ProcessEnv,
  traceContext?: TraceContext,
): Record<string, string> {
  const { binDir } = runtimeLayout(envDir, platform);
  // Windows spells it `Path`; keep whichever key the parent uses
  const pathKey = Object.keys(baseEnv).find((key) => key.toUpperCase() === 'PATH') ?? 'PATH';
  const inherited = baseEnv[pathKey];
  const delimiter = pathFor(platform).delimiter;

  return {
    VIRTUAL_ENV: envDir,
    [pathKey]: inherited === undefined || inherited === '' ? binDir : `${binDir}${delimiter}${inherited}`,
    ...(traceContext ? { [TRACEPARENT_ENV]: formatTraceparent(traceContext) } : {}),
  };
}

/* -------------------------------------------------------------------------- */
/* Command execution                                                           */
/* -------------------------------------------------------------------------- */

interface StepCommand {
  readonly template: string;
  /** Configuration path of the template, for messages. */
  readonly context: string;
  readonly step: string;
  readonly values: PlaceholderValues;
  readonly variables: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
}

class CommandContext {
  readonly runner: CommandRunner;
  readonly platform: NodeJS.Platform;

  constructor(
    readonly options: ShellToolchainOptions,
    readonly cell: MatrixCell,
  ) {
    this.runner = options.runner ?? runCommand;
    this.platform = options.platform ?? process.platform;
  }

  /** Runs a rendered command and resolves its exit code. */
  async run(command: StepCommand): Promise<number> {
    const rendered = renderCommand(command.template, command.values, command.context, this.platform);
    const result = await this.runner({
      command: rendered,
      cwd: this.options.projectDir,
      env: command.variables,
      timeoutMs: this.options.config.execution.stepTimeoutMs,
      log: makeLogOptions({
        logDir: this.options.logDir,
        jobId: this.cell.id,
        step: command.step,
        structured: this.options.structuredLogs,
        traceContext: this.options.traceContext,
      }),
      ...(command.signal ? { signal: command.signal } : {}),
    });
    return result.exitCode;
  }

  baseValues(env: ExecutionEnvironment): Record<string, string> {
    return {
      python: runtimeLayout(env.envDir, this.platform).python,
      runtime: this.cell.runtimeVersion,
      os: this.cell.os,
      envDir: env.envDir,
      workDir: env.workDir,
      cellId: this.cell.id,
      projectDir: this.options.projectDir,
    };
  }
}

type StepErrorFactory = (code: ErrorCode, message: string, cause?: unknown) => AppError;

/**
 * Run a command, turning a non-zero exit or a process failure into the
 * step's own error.
 */
async function runOrFail(
  ctx: CommandContext,
  command: StepCommand,
  action: string,
  code: ErrorCode,
  makeError: StepErrorFactory,
): Promise<void> {
  let exitCode: number;
  try {
    exitCode = await ctx.run(command);
  } catch (error) {
    throw makeError(code, `${action} failed: ${formatErrorMessage(error)}`, error);
  }
  if (exitCode !== 0) {
    throw makeError(code, `${action} exited with code ${exitCode}`);
  }
}

/* -------------------------------------------------------------------------- */
/* Collaborators                                                               */
/* -------------------------------------------------------------------------- */

class ShellEnvironmentProvider implements EnvironmentProvider {
  constructor(private readonly ctx: CommandContext) {}

  async provision(cell: MatrixCell, signal?: AbortSignal): Promise<ExecutionEnvironment> {
    const { options, platform } = this.ctx;
    const template = provisionCommandFor(options.config.environment, cell.osFamily);
    if (template === undefined) {
      throw new ProvisionError(
        'PROVISION_UNSUPPORTED_OS',
        `No provision command for ${cell.osFamily} (cell ${cell.id})`,
        { details: { cellId: cell.id, osFamily: cell.osFamily } },
      );
    }

    const workDir = path.join(options.workRoot, cell.id);
    const envDir = path.join(workDir, 'env');
    await rm(workDir, { recursive: true, force: true });
    await mkdir(workDir, { recursive: true });

    const variables = environmentVariables(
      envDir,
      platform,
      options.baseEnv ?? process.env,
      options.traceContext,
    );
    const keep = options.config.environment.keep;
    const env: ExecutionEnvironment = {
      cell,
      workDir,
      envDir,
      variables,
      dispose: async () => {
        if (!keep) {
          await rm(workDir, { recursive: true, force: true });
        }
      },
    };

    try {
      await runOrFail(
        this.ctx,
        {
          template,
          context: 'environment.provision',
          step: 'provision',
          values: this.ctx.baseValues(env),
          // the environment does not exist yet; run with the parent's tools
          variables: options.traceContext
            ? { [TRACEPARENT_ENV]: formatTraceparent(options.traceContext) }
            : {},
          ...(signal ? { signal } : {}),
        },
        `Provisioning ${cell.id}`,
        'PROVISION_FAILED',
        (code, message, cause) =>
          new ProvisionError(
            isProcessError(cause) && cause.code === 'PROCESS_TIMEOUT' ? 'PROVISION_TIMEOUT' : code,
            message,
            { cause },
          ),
      );
    } catch (error) {
      await env.dispose();
      throw error;
    }

    return env;
  }
}

class ShellPackageInstaller implements PackageInstaller {
  constructor(private readonly ctx: CommandContext) {}

  async install(env: ExecutionEnvironment, constraint: DependencyConstraint): Promise<void> {
    const { config } = this.ctx.options;
    const toError: StepErrorFactory = (code, message, cause) =>
      new DependencyError(code, message, { cause, details: { dependency: constraint.name } });

    if (constraint.sourceKind === 'registry') {
      const requirement = formatRegistryRequirement(constraint);
      await this.installRequirement(env, config.install.registry, 'install.registry', requirement, toError);
      return;
    }

    const source = config.dependencies[constraint.name];
    if (source?.repository === undefined) {
      throw toError(
        'DEPENDENCY_SOURCE_MISSING',
        `No repository configured for ${constraint.name}`,
      );
    }

    if (source.buildRequirements.length > 0) {
      await this.installRequirement(
        env,
        config.install.registry,
        'install.registry',
        source.buildRequirements,
        toError,
      );
    }

    await this.installRequirement(
      env,
      config.install.vcs,
      'install.vcs',
      formatVcsRequirement(constraint, source.repository),
      toError,
    );
  }

  private async installRequirement(
    env: ExecutionEnvironment,
    template: string,
    context: string,
    requirement: string | readonly string[],
    toError: StepErrorFactory,
  ): Promise<void> {
    const label = typeof requirement === 'string' ? requirement : requirement.join(' ');
    await runOrFail(
      this.ctx,
      {
        template,
        context,
        step: 'dependencies',
        values: { ...this.ctx.baseValues(env), requirement },
        variables: env.variables,
      },
      `Installing ${label}`,
      'DEPENDENCY_INSTALL_FAILED',
      toError,
    );
  }
}

class ShellProjectInstaller implements ProjectInstaller {
  constructor(private readonly ctx: CommandContext) {}

  async installLive(env: ExecutionEnvironment): Promise<void> {
    const { project } = this.ctx.options.config;
    await runOrFail(
      this.ctx,
      {
        template: project.install,
        context: 'project.install',
        step: 'install',
        values: this.ctx.baseValues(env),
        variables: env.variables,
      },
      `Installing ${project.name}`,
      'INSTALL_FAILED',
      (code, message, cause) => new InstallError(code, message, { cause }),
    );
  }
}

async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

class ShellTestRunner implements TestRunner {
  constructor(private readonly ctx: CommandContext) {}

  async execute(env: ExecutionEnvironment, request: TestRunRequest): Promise<TestRunOutcome> {
    const { config, projectDir } = this.ctx.options;
    const artifactPath = path.join(env.workDir, config.coverage.artifact);
    const reportLogPath = path.join(env.workDir, TEST_REPORT_FILENAME);

    // stale files from an earlier run would be read as this run's output
    await rm(artifactPath, { force: true });
    await rm(reportLogPath, { force: true });

    const values: PlaceholderValues = {
      ...this.ctx.baseValues(env),
      suite: request.suite,
      coverageTarget: request.coverageTarget,
      strictMarkersFlag: request.strictMarkers ? config.test.strictMarkersFlag : '',
      artifactPath,
      reportLogPath,
    };

    // a non-zero exit is a test failure; only a crash propagates
    const exitCode = await this.ctx.run({
      template: config.test.command,
      context: 'test.command',
      step: 'test',
      values,
      variables: env.variables,
    });

    if (request.coverageReportMode === 'deferred' && config.coverage.export !== undefined) {
      const exportCode = await this.ctx.run({
        template: config.coverage.export,
        context: 'coverage.export',
        step: 'coverage',
        values,
        variables: env.variables,
      });
      if (exportCode !== 0) {
        throw new CoverageError(
          'COVERAGE_ARTIFACT_INVALID',
          `Coverage export exited with code ${exportCode}`,
        );
      }
    }

    const coverageArtifact: CoverageArtifact | undefined = await loadCoverageArtifact(artifactPath, {
      format: config.coverage.format,
      cellId: env.cell.id,
      rootDir: projectDir,
    });

    let perTestResults: readonly TestCaseResult[] = [];
    if (config.test.reportLog) {
      const text = await readOptionalFile(reportLogPath);
      perTestResults = text === undefined ? [] : parseTestReportLog(text);
    }

    return {
      exitCode,
      perTestResults,
      ...(coverageArtifact ? { coverageArtifact } : {}),
    };
  }
}

/**
 * Build the shell-backed collaborators for one cell.
 */
export function createShellToolchain(cell: MatrixCell, options: ShellToolchainOptions): JobToolchain {
  const ctx = new CommandContext(options, cell);
  return {
    environments: new ShellEnvironmentProvider(ctx),
    packages: new ShellPackageInstaller(ctx),
    project: new ShellProjectInstaller(ctx),
    tests: new ShellTestRunner(ctx),
  };
}
