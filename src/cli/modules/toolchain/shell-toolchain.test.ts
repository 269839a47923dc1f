/**
 * Tests for the shell-backed job collaborators.
 *
 * Commands never reach a shell: a recording runner stands in for the
 * process manager and writes the files a real test run would leave behind.
 */

import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { createCell, DEFAULT_TEST_REQUEST } from '../../../__test-utils__/fixtures/job/job-fixtures.ts';
import { createTempDir, removeTempDir } from '../../../__test-utils__/utils/temp-utils.ts';
import { DependencyError, InstallError, ProcessError, ProvisionError } from '../../../errors/errors.ts';
import type { ExecutionEnvironment } from '../../../job/types.ts';
import { parsePipelineConfig, type PipelineConfig } from '../../config/pipeline-config.ts';
import type { TraceContext } from '../../observability/tracing.ts';
import type { CommandRunner, CommandSpec } from '../process-manager/process-manager.ts';
import { createShellToolchain, environmentVariables, runtimeLayout } from './shell-toolchain.ts';

const TRACE: TraceContext = {
  traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
  spanId: '00f067aa0ba902b7',
  samplingDecision: true,
};

const buildConfig = (overrides: Record<string, unknown> = {}): PipelineConfig =>
  parsePipelineConfig(
    {
      project: { name: 'demo', install: '{python} -m pip install -e {projectDir}' },
      environment: { provision: { linux: 'python{runtime} -m venv {envDir}' } },
      dependencies: { qutip: { repository: 'https://github.com/qutip/qutip.git', buildRequirements: ['numpy', 'cython'] } },
      matrix: { include: [{ os: 'ubuntu-latest', runtime: '3.10' }] },
      coverage: { target: 'demo' },
      ...overrides,
    },
    'matrix-ci.yml',
  );

describe('createShellToolchain', () => {
  let root: string;
  let specs: CommandSpec[];
  let exitCodes: number[];
  let runner: Mock<CommandRunner>;

  beforeEach(async () => {
    root = await createTempDir('shell-toolchain-');
    specs = [];
    exitCodes = [];
    runner = vi.fn<CommandRunner>(async (spec) => {
      specs.push(spec);
      return { exitCode: exitCodes.shift() ?? 0, durationMs: 5 };
    });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  const toolchainFor = (config: PipelineConfig, cell = createCell()) =>
    createShellToolchain(cell, {
      config,
      projectDir: root,
      workRoot: path.join(root, '.matrix-ci'),
      logDir: path.join(root, 'logs'),
      traceContext: TRACE,
      runner,
      platform: 'linux',
      baseEnv: { PATH: '/usr/bin' },
    });

  const provisioned = async (config: PipelineConfig): Promise<ExecutionEnvironment> =>
    toolchainFor(config).environments.provision(createCell());

  describe('environments', () => {
    it('runs the provision command and exposes the environment', async () => {
      const env = await provisioned(buildConfig());
      const workDir = path.join(root, '.matrix-ci', 'ubuntu-latest-3.10');

      expect(env.workDir).toBe(workDir);
      expect(env.envDir).toBe(path.join(workDir, 'env'));
      expect(existsSync(workDir)).toBe(true);
      expect(env.variables).toEqual({
        VIRTUAL_ENV: env.envDir,
        PATH: `${env.envDir}/bin:/usr/bin`,
        TRACEPARENT: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01',
      });
      expect(specs[0]).toEqual({
        command: `python3.10 -m venv ${env.envDir}`,
        cwd: root,
        env: { TRACEPARENT: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01' },
        timeoutMs: 1_800_000,
        log: {
          logDir: path.join(root, 'logs'),
          jobId: 'ubuntu-latest-3.10',
          step: 'provision',
          traceContext: TRACE,
        },
      });
    });

    it('removes the work directory on dispose unless asked to keep it', async () => {
      const env = await provisioned(buildConfig());
      await env.dispose();
      expect(existsSync(env.workDir)).toBe(false);

      const kept = await provisioned(
        buildConfig({ environment: { provision: 'python{runtime} -m venv {envDir}', keep: true } }),
      );
      await kept.dispose();
      expect(existsSync(kept.workDir)).toBe(true);
    });

    it('fails when the provision command exits non-zero', async () => {
      exitCodes = [3];

      const error: unknown = await provisioned(buildConfig()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProvisionError);
      expect(error).toMatchObject({
        code: 'PROVISION_FAILED',
        message: 'Provisioning ubuntu-latest-3.10 exited with code 3',
      });
      expect(existsSync(path.join(root, '.matrix-ci', 'ubuntu-latest-3.10'))).toBe(false);
    });

    it('reports a timed out provision command as a provisioning timeout', async () => {
      runner.mockRejectedValueOnce(new ProcessError('PROCESS_TIMEOUT', 'Timeout exceeded (10ms)'));

      await expect(provisioned(buildConfig())).rejects.toMatchObject({
        code: 'PROVISION_TIMEOUT',
        message: 'Provisioning ubuntu-latest-3.10 failed: PROCESS_TIMEOUT: Timeout exceeded (10ms)',
      });
    });

    it('refuses families without a provision command', async () => {
      const cell = createCell({ os: 'windows-latest', runtime: '3.8' });

      await expect(toolchainFor(buildConfig(), cell).environments.provision(cell)).rejects.toMatchObject({
        code: 'PROVISION_UNSUPPORTED_OS',
        message: 'No provision command for windows (cell windows-latest-3.8)',
      });
      expect(runner).not.toHaveBeenCalled();
    });

    it('passes the abort signal to the provision command', async () => {
      const controller = new AbortController();

      await toolchainFor(buildConfig()).environments.provision(createCell(), controller.signal);

      expect(specs[0]?.signal).toBe(controller.signal);
    });
  });

  describe('packages', () => {
    it('installs registry releases with the quoted requirement', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      const python = `${env.envDir}/bin/python`;

      await toolchainFor(config).packages.install(env, {
        name: 'qutip',
        sourceKind: 'registry',
        versionExpression: '==4.6.*',
      });

      expect(specs[1]?.command).toBe(`${python} -m pip install 'qutip==4.6.*'`);
      expect(specs[1]?.env).toBe(env.variables);
      expect(specs[1]?.log.step).toBe('dependencies');
    });

    it('installs build requirements before building from a ref', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      const python = `${env.envDir}/bin/python`;

      await toolchainFor(config).packages.install(env, {
        name: 'qutip',
        sourceKind: 'vcs-ref',
        versionExpression: 'dev.major',
      });

      expect(specs.slice(1).map((spec) => spec.command)).toEqual([
        `${python} -m pip install numpy cython`,
        `${python} -m pip install git+https://github.com/qutip/qutip.git@dev.major`,
      ]);
    });

    it('fails a ref install without a repository', async () => {
      const config = buildConfig();
      const env = await provisioned(config);

      const error: unknown = await toolchainFor(config)
        .packages.install(env, { name: 'qiskit', sourceKind: 'vcs-ref', versionExpression: 'main' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DependencyError);
      expect(error).toMatchObject({
        code: 'DEPENDENCY_SOURCE_MISSING',
        message: 'No repository configured for qiskit',
      });
    });

    it('fails when the installer exits non-zero', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      exitCodes = [1];

      await expect(
        toolchainFor(config).packages.install(env, {
          name: 'qiskit',
          sourceKind: 'registry',
          versionExpression: '==0.36.*',
        }),
      ).rejects.toMatchObject({
        code: 'DEPENDENCY_INSTALL_FAILED',
        message: 'Installing qiskit==0.36.* exited with code 1',
      });
    });
  });

  describe('project', () => {
    it('installs the project in place', async () => {
      const config = buildConfig();
      const env = await provisioned(config);

      await toolchainFor(config).project.installLive(env);

      expect(specs[1]?.command).toBe(`${env.envDir}/bin/python -m pip install -e ${root}`);
      expect(specs[1]?.log.step).toBe('install');
    });

    it('fails with an install error', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      exitCodes = [2];

      const error: unknown = await toolchainFor(config).project.installLive(env).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InstallError);
      expect(error).toMatchObject({ code: 'INSTALL_FAILED', message: 'Installing demo exited with code 2' });
    });
  });

  describe('tests', () => {
    const COVERAGE_JSON = JSON.stringify({
      files: { 'demo/core.py': { executed_lines: [1, 2], missing_lines: [3] } },
    });

    it('runs the test command and reads the coverage artifact', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      const artifactPath = path.join(env.workDir, 'coverage.json');
      runner.mockImplementationOnce(async (spec) => {
        specs.push(spec);
        await writeFile(artifactPath, COVERAGE_JSON);
        return { exitCode: 1, durationMs: 20 };
      });

      const outcome = await toolchainFor(config).tests.execute(env, {
        ...DEFAULT_TEST_REQUEST,
        coverageTarget: 'demo',
        coverageReportMode: 'immediate',
      });

      expect(specs[1]?.command).toBe(
        `${env.envDir}/bin/python -m pytest tests --strict-markers --cov=demo --cov-report=json:${artifactPath}`,
      );
      expect(outcome.exitCode).toBe(1);
      expect(outcome.perTestResults).toEqual([]);
      expect(outcome.coverageArtifact?.cellId).toBe('ubuntu-latest-3.10');
      expect(outcome.coverageArtifact?.source).toBe(artifactPath);
      expect([...(outcome.coverageArtifact?.data.get('demo/core.py')?.coveredLines ?? [])]).toEqual([1, 2]);
    });

    it('leaves the marker flag out when markers are not strict', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      const artifactPath = path.join(env.workDir, 'coverage.json');

      const outcome = await toolchainFor(config).tests.execute(env, {
        ...DEFAULT_TEST_REQUEST,
        strictMarkers: false,
        coverageTarget: 'demo',
        coverageReportMode: 'immediate',
      });

      expect(specs[1]?.command).toBe(
        `${env.envDir}/bin/python -m pytest tests  --cov=demo --cov-report=json:${artifactPath}`,
      );
      expect(outcome.coverageArtifact).toBeUndefined();
    });

    it('exports deferred coverage and reads the report log', async () => {
      const config = buildConfig({
        test: { command: '{python} -m pytest {suite} --report-log={reportLogPath}', reportLog: true },
        coverage: { target: 'demo', reportMode: 'deferred', export: '{python} -m coverage json -o {artifactPath}' },
      });
      const env = await provisioned(config);
      const artifactPath = path.join(env.workDir, 'coverage.json');
      const reportLogPath = path.join(env.workDir, 'test-report.jsonl');
      runner
        .mockImplementationOnce(async (spec) => {
          specs.push(spec);
          await writeFile(
            reportLogPath,
            `${JSON.stringify({ $report_type: 'TestReport', nodeid: 'tests/test_a.py::test_x', when: 'call', outcome: 'passed', duration: 0.25 })}\n`,
          );
          return { exitCode: 0, durationMs: 20 };
        })
        .mockImplementationOnce(async (spec) => {
          specs.push(spec);
          await writeFile(artifactPath, COVERAGE_JSON);
          return { exitCode: 0, durationMs: 3 };
        });

      const outcome = await toolchainFor(config).tests.execute(env, {
        ...DEFAULT_TEST_REQUEST,
        coverageTarget: 'demo',
        coverageReportMode: 'deferred',
      });

      expect(specs.slice(1).map((spec) => [spec.log.step, spec.command])).toEqual([
        ['test', `${env.envDir}/bin/python -m pytest tests --report-log=${reportLogPath}`],
        ['coverage', `${env.envDir}/bin/python -m coverage json -o ${artifactPath}`],
      ]);
      expect(outcome.perTestResults).toEqual([
        { id: 'tests/test_a.py::test_x', outcome: 'passed', durationMs: 250 },
      ]);
      expect(outcome.coverageArtifact).toBeDefined();
    });

    it('treats a failed export as a crash', async () => {
      const config = buildConfig({
        coverage: { target: 'demo', reportMode: 'deferred', export: '{python} -m coverage json -o {artifactPath}' },
      });
      const env = await provisioned(config);
      exitCodes = [0, 1];

      await expect(
        toolchainFor(config).tests.execute(env, { ...DEFAULT_TEST_REQUEST, coverageTarget: 'demo' }),
      ).rejects.toMatchObject({
        code: 'COVERAGE_ARTIFACT_INVALID',
        message: 'Coverage export exited with code 1',
      });
    });

    it('lets process failures propagate', async () => {
      const config = buildConfig();
      const env = await provisioned(config);
      runner.mockRejectedValueOnce(new ProcessError('PROCESS_SPAWN_FAILED', 'Process spawn failed: ENOENT'));

      await expect(
        toolchainFor(config).tests.execute(env, { ...DEFAULT_TEST_REQUEST, coverageReportMode: 'immediate' }),
      ).rejects.toBeInstanceOf(ProcessError);
    });
  });
});

describe('runtimeLayout', () => {
  it('uses Scripts and python.exe on Windows', () => {
    expect(runtimeLayout(String.raw`C:\work\env`, 'win32')).toEqual({
      binDir: String.raw`C:\work\env\Scripts`,
      python: String.raw`C:\work\env\Scripts\python.exe`,
    });
    expect(runtimeLayout('/work/env', 'darwin').python).toBe('/work/env/bin/python');
  });
});

describe('environmentVariables', () => {
  it('keeps the parent spelling of the search path variable', () => {
    expect(environmentVariables(String.raw`C:\env`, 'win32', { Path: String.raw`C:\Windows` })).toEqual({
      VIRTUAL_ENV: String.raw`C:\env`,
      Path: String.raw`C:\env\Scripts;C:\Windows`,
    });
  });

  it('uses the bin directory alone when no search path is inherited', () => {
    expect(environmentVariables('/env', 'linux', {})).toEqual({ VIRTUAL_ENV: '/env', PATH: '/env/bin' });
  });
});
