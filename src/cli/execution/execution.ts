/**
 * CLI main execution.
 *
 * Loads the configuration, plans the matrix for this host, runs the matrix
 * and the documentation verification side by side, then writes the report
 * and telemetry and decides the exit code.
 */

import { Console } from 'node:console';
import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  HttpCoverageSubmissionClient,
  type CoverageSubmissionClient,
  type HttpSubmissionConfig,
} from '../../coverage/submission.ts';
import type { VerificationResult } from '../../docs/types.ts';
import { verifyDocumentation } from '../../docs/verifier.ts';
import { formatErrorMessage } from '../../errors/errors.ts';
import type { TestRunRequest } from '../../job/types.ts';
import type { MatrixCell } from '../../matrix/types.ts';
import { loadPipelineConfig, type PipelineConfig } from '../config/pipeline-config.ts';
import { DEFAULT_REPORT_FILENAME, DOCS_LOG_ID } from '../constants/paths.ts';
import type { CLIArgs } from '../input/args.ts';
import { ensureSafeDirectoryPath, resolveCells } from '../input/validation.ts';
import {
  calculateSummary,
  createDocumentationSession,
  createShellToolchain,
  detectHostFamily,
  planCells,
  type CellStatus,
  type CommandRunner,
  type DocToolchainOptions,
  type ExecutionSummary,
} from '../modules/index.ts';
import { appendToLog, getLogPath, makeLogOptions } from '../observability/logger.ts';
import { TELEMETRY_FILENAME, TelemetryCollector } from '../observability/telemetry.ts';
import { resolveRootTraceContext, type TraceContext } from '../observability/tracing.ts';
import { buildRunReport, writeRunReport, type RunReport } from '../output/report.ts';
import { renderDashboard, type DashboardRow } from '../output/ui.tsx';
import { executeMatrix, type MatrixRunResult } from './executor.ts';

type OutputConsole = Pick<typeof console, 'log' | 'error'>;

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Allows callers (tests or alternative entrypoints) to supply fakes for
 * filesystem helpers, dashboard rendering, the command runner and the
 * coverage submission client.
 */
export interface MainDeps {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly platform?: NodeJS.Platform;
  readonly console?: OutputConsole;
  readonly stdout?: NodeJS.WriteStream;
  readonly stderr?: NodeJS.WriteStream;
  readonly mkdirFn?: typeof mkdir;
  readonly writeFileFn?: typeof writeFile;
  readonly renameFn?: typeof rename;
  readonly loadConfigFn?: typeof loadPipelineConfig;
  readonly renderDashboardFn?: typeof renderDashboard;
  readonly executeMatrixFn?: typeof executeMatrix;
  /** Runs every shell command of the matrix and the documentation. */
  readonly runner?: CommandRunner;
  readonly createSubmissionClientFn?: (config: HttpSubmissionConfig) => CoverageSubmissionClient;
  readonly now?: () => number;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly summary?: ExecutionSummary;
  readonly report?: RunReport;
}

export function testRequestFrom(config: PipelineConfig): TestRunRequest {
  return {
    suite: config.test.suite,
    strictMarkers: config.test.strictMarkers,
    coverageTarget: config.coverage.target,
    coverageReportMode: config.coverage.reportMode,
  };
}

function describeCell(cell: MatrixCell): string {
  const deps = cell.dependencySpecs
    .map((d) =>
      d.sourceKind === 'vcs-ref' ? `${d.name}@${d.versionExpression}` : `${d.name}${d.versionExpression}`,
    )
    .join(' ');
  return `${cell.id.padEnd(36)} os=${cell.os} runtime=${cell.runtimeVersion}${deps ? ` ${deps}` : ''}`;
}

function docsStatus(result: VerificationResult): CellStatus {
  if (!result.docBuildOk) {
    return 'ERROR';
  }
  return result.snippetResults.every((r) => r.status === 'pass') ? 'PASS' : 'FAIL';
}

async function runDocumentation(
  options: DocToolchainOptions,
  onStatus: (status: CellStatus, detail?: string) => void,
): Promise<VerificationResult> {
  const log = makeLogOptions({
    logDir: options.logDir,
    jobId: DOCS_LOG_ID,
    structured: options.structuredLogs,
    traceContext: options.traceContext,
  });
  await appendToLog({ ...log, append: false }, 'Documentation verification');

  const session = await createDocumentationSession(options);
  try {
    onStatus('RUNNING', 'build');
    const result = await verifyDocumentation(session.builder, session.checks, {
      onSnippetStart: () => onStatus('RUNNING', 'snippets'),
    });
    if (!result.docBuildOk) {
      await appendToLog(log, `Build failed: ${result.buildError ?? 'unknown error'}`);
    }
    for (const snippet of result.snippetResults) {
      await appendToLog(
        log,
        `Snippet ${snippet.name}: ${snippet.status}${snippet.error ? ` (${snippet.error})` : ''}`,
      );
    }
    onStatus(docsStatus(result));
    return result;
  } finally {
    await session.dispose();
  }
}

/**
 * Execute CLI with provided args and optional dependency overrides.
 */
export async function executeWithArgs(args: CLIArgs, deps: MainDeps = {}): Promise<MainResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    platform = process.platform,
    stdout = process.stdout,
    stderr = process.stderr,
    mkdirFn = mkdir,
    writeFileFn = writeFile,
    renameFn = rename,
    loadConfigFn = loadPipelineConfig,
    renderDashboardFn = renderDashboard,
    executeMatrixFn = executeMatrix,
    createSubmissionClientFn = (config) => new HttpCoverageSubmissionClient(config),
    now = Date.now,
  } = deps;

  const scopedConsole = deps.console ?? new Console({ stdout, stderr });
  const log = scopedConsole.log.bind(scopedConsole);
  const error = scopedConsole.error.bind(scopedConsole);
  let telemetry: TelemetryCollector | undefined;
  let logDirForTelemetry: string | undefined;

  try {
    const logDir = ensureSafeDirectoryPath(cwd, args.logDir);
    const loaded = await loadConfigFn(args.configPath, cwd);
    const { config } = loaded;
    const selected = resolveCells(loaded.cells, args.cells);

    if (args.list) {
      for (const cell of selected) {
        log(describeCell(cell));
      }
      return { exitCode: 0 };
    }

    const runMatrix = !args.docsOnly;
    const runDocs = !args.skipDocs && config.docs.enabled;
    const hostFamily = detectHostFamily(platform);
    const plan = runMatrix
      ? planCells(selected, hostFamily, config.environment.foreignOs)
      : { runnable: [], skipped: [] };

    const projectDir = path.resolve(path.dirname(loaded.configPath), config.project.directory);
    const workRoot = path.resolve(projectDir, config.environment.workRoot);
    const rootTrace: TraceContext = resolveRootTraceContext(env);
    const runId = rootTrace.traceId;

    // Fail early before side effects
    await mkdirFn(logDir, { recursive: true });
    telemetry = new TelemetryCollector(true, now);
    logDirForTelemetry = logDir;

    log('🚀 matrix-ci\n');
    log(`Config: ${loaded.configPath}`);
    log(`Cells: ${plan.runnable.length} to run, ${plan.skipped.length} skipped`);
    log(`Documentation: ${runDocs ? 'ENABLED' : 'DISABLED'}`);
    log(`Log directory: ${logDir}`);
    if (args.verbose) {
      log(`Verbose mode: ENABLED`);
      log(`Run id: ${runId}`);
      log(`Project directory: ${projectDir}`);
      log(`Work root: ${workRoot}`);
      log(`Host: ${hostFamily}`);
    }
    log('');

    const planned = [...plan.runnable, ...plan.skipped.map((s) => s.cell)].sort(
      (a, b) => a.index - b.index,
    );
    const rows: DashboardRow[] = planned.map((cell) => ({
      id: cell.id,
      label: cell.id,
      logPath: getLogPath(logDir, cell.id),
    }));
    if (runDocs) {
      rows.push({ id: DOCS_LOG_ID, label: 'docs', logPath: getLogPath(logDir, DOCS_LOG_ID) });
    }

    const dashboard = renderDashboardFn(rows, { stdout, stderr }, now);
    const startTime = now();

    const toolchainBase = {
      config,
      projectDir,
      workRoot,
      logDir,
      structuredLogs: args.structuredLogs,
      ...(deps.runner ? { runner: deps.runner } : {}),
      platform,
      baseEnv: env,
    };

    const { submission: submissionConfig } = config.coverage;
    const token = submissionConfig?.tokenEnv === undefined ? undefined : env[submissionConfig.tokenEnv];
    if (submissionConfig?.tokenEnv !== undefined && token === undefined && runMatrix) {
      log(`WARN: ${submissionConfig.tokenEnv} is not set; submitting coverage without a token`);
    }
    const submission =
      runMatrix && submissionConfig
        ? createSubmissionClientFn({
            endpoint: submissionConfig.endpoint,
            runId,
            ...(token === undefined ? {} : { token }),
            ...(submissionConfig.timeoutMs === undefined
              ? {}
              : { timeoutMs: submissionConfig.timeoutMs }),
          })
        : undefined;

    const concurrency = args.concurrency ?? config.execution.concurrency;
    const { provisionTimeoutMs } = config.environment;

    const matrixRun: Promise<MatrixRunResult | undefined> = runMatrix
      ? executeMatrixFn(
          plan.runnable,
          plan.skipped,
          (cell, traceContext) => createShellToolchain(cell, { ...toolchainBase, traceContext }),
          {
            runId,
            logDir,
            test: testRequestFrom(config),
            observationWindowMs: config.coverage.observationWindowMs,
            structuredLogs: args.structuredLogs,
            traceContext: rootTrace,
            telemetry,
            ...(concurrency === undefined ? {} : { concurrency }),
            ...(provisionTimeoutMs === undefined ? {} : { provisionTimeoutMs }),
            ...(submission ? { submission } : {}),
            onStatusChange: (id, status, detail) => dashboard.updateStatus(id, status, detail),
            onWarning: (message) => {
              if (args.verbose) {
                error(`WARN: ${message}`);
              }
            },
          },
        )
      : Promise.resolve(undefined);

    const docsRun: Promise<VerificationResult | undefined> = runDocs
      ? runDocumentation({ ...toolchainBase, traceContext: rootTrace }, (status, detail) =>
          dashboard.updateStatus(DOCS_LOG_ID, status, detail),
        ).catch((docsError: unknown) => {
          // a crash of the docs toolchain is reported like a failed build
          dashboard.updateStatus(DOCS_LOG_ID, 'ERROR');
          return { docBuildOk: false, buildError: formatErrorMessage(docsError), snippetResults: [] };
        })
      : Promise.resolve(undefined);

    const [matrix, docs] = await Promise.all([matrixRun, docsRun]);
    await dashboard.waitForExit();

    const cells = matrix?.outcomes ?? [];
    const summary = calculateSummary(cells, now() - startTime);
    const report = buildRunReport({
      runId,
      generatedAt: new Date(now()),
      summary,
      cells,
      ...(matrix
        ? { coverage: matrix.report, barrier: matrix.barrier, submissionErrors: matrix.submissionErrors }
        : {}),
      ...(docs ? { docs } : {}),
    });

    const reportPath = path.resolve(cwd, args.reportPath ?? path.join(logDir, DEFAULT_REPORT_FILENAME));
    await writeRunReport(reportPath, report, { mkdirFn, writeFileFn, renameFn });

    if (matrix) {
      const { lines } = matrix.report.totals;
      log(`\nCoverage: ${lines.covered}/${lines.total} lines (${lines.percent}%)`);
    }
    log(`Report: ${reportPath}`);

    if (!report.passed) {
      error('\n❌ Run failed');
      for (const failure of report.failures) {
        error(`  - ${failure}`);
      }
      return { exitCode: 1, summary, report };
    }

    log('\n✅ All jobs passed');
    return { exitCode: 0, summary, report };
  } catch (err) {
    error(`\n❌ Fatal error: ${formatErrorMessage(err)}`);
    return { exitCode: 1 };
  } finally {
    // Export telemetry to the log directory (best-effort)
    if (telemetry && logDirForTelemetry !== undefined) {
      try {
        await writeFileFn(
          path.join(logDirForTelemetry, TELEMETRY_FILENAME),
          `${JSON.stringify(telemetry.export(), null, 2)}\n`,
          'utf8',
        );
      } catch (error_) {
        error(`\nWARN: Failed to write ${TELEMETRY_FILENAME}: ${formatErrorMessage(error_)}`);
      }
    }
  }
}
