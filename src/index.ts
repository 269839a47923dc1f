/**
 * matrix-ci: main entry point
 *
 * Matrix build and test orchestration: expand a matrix declaration into
 * cells, run each cell's job through its state machine, aggregate the
 * coverage the cells report, and verify the documentation.
 */

export * from './coverage/index.ts';
export * from './docs/index.ts';
export * from './errors/errors.ts';
export * from './job/index.ts';
export * from './matrix/index.ts';

export { getPackageVersion } from './cli/core/version/version.ts';
export { main, type MainOptions } from './cli/core/main/main.ts';
export {
  loadPipelineConfig,
  parsePipelineConfig,
  type LoadedPipeline,
  type PipelineConfig,
} from './cli/config/index.ts';
export {
  executeMatrix,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type MatrixExecutionOptions,
  type MatrixRunResult,
  type ToolchainFactory,
} from './cli/execution/index.ts';
export { createShellToolchain, type CellOutcome, type CellStatus } from './cli/modules/index.ts';
export { buildRunReport, type RunReport } from './cli/output/index.ts';

// Observability
export type { TelemetryExport } from './cli/observability/telemetry.ts';
export { TelemetryCollector } from './cli/observability/telemetry.ts';
export type { TraceContext } from './cli/observability/tracing.ts';
export {
  createChildTraceContext,
  createTraceContext,
  formatTraceparent,
  generateSpanId,
  generateTraceId,
  parseTraceparent,
  traceContextToJSON,
} from './cli/observability/tracing.ts';
