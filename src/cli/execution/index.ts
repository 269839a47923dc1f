/**
 * Execution orchestration and coordination
 */

export {
  executeWithArgs,
  testRequestFrom,
  type MainDeps,
  type MainResult,
} from './execution.ts';
export {
  defaultConcurrency,
  executeCell,
  executeMatrix,
  type MatrixExecutionOptions,
  type MatrixRunResult,
  type SkippedCell,
  type ToolchainFactory,
} from './executor.ts';
