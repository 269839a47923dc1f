/**
 * matrix-ci CLI
 *
 * Role:
 *   Orchestration layer that expands a build matrix, runs every cell in its
 *   own environment, merges the coverage the cells report, and verifies the
 *   documentation, with deterministic logging and auditable outcomes.
 *
 * Principles:
 *   - Fail fast on invalid input
 *   - One cell's failure never stops another cell
 *   - Deterministic execution and exit codes
 */

// Config re-exports
export {
  loadPipelineConfig,
  parsePipelineConfig,
  type LoadedPipeline,
  type PipelineConfig,
} from '../config/index.ts';
// Execution re-exports
export {
  executeMatrix,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type MatrixRunResult,
} from '../execution/index.ts';
// Input handling re-exports
export {
  type CLIArgs,
  ensureSafeDirectoryPath,
  parseCliArgs,
  resolveCells,
} from '../input/index.ts';
// Observability re-exports
export {
  appendToLog,
  createChildTraceContext,
  createLogger,
  createTraceContext,
  makeLogOptions,
  TelemetryCollector,
  type TraceContext,
} from '../observability/index.ts';
// Output re-exports
export { buildRunReport, renderDashboard, type RunReport } from '../output/index.ts';
// Core exports
export { type EntrypointDeps, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp } from './help/formatter.ts';
export { showVersion } from './help/help.ts';
export { main, type MainOptions, USAGE_EXIT_CODE } from './main/main.ts';
