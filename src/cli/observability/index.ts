/**
 * Observability: logging, telemetry, and tracing
 */

export { appendToLog, createLogger, getLogPath, makeLogOptions, type LogOptions } from './logger.ts';
export { TELEMETRY_FILENAME, TelemetryCollector, type TelemetryExport } from './telemetry.ts';
export {
  createChildTraceContext,
  createTraceContext,
  formatTraceparent,
  parseTraceparent,
  resolveRootTraceContext,
  TRACEPARENT_ENV,
  type TraceContext,
} from './tracing.ts';
