/**
 * Trace context for correlating a run, its cells and their child processes.
 *
 * Contexts follow the W3C Trace Context `traceparent` format so a run started
 * from an outer pipeline joins that pipeline's trace, and every command a
 * cell spawns receives the cell's span as `TRACEPARENT`.
 */

import { randomBytes } from 'node:crypto';

export interface TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly samplingDecision: boolean;
}

export const TRACEPARENT_ENV = 'TRACEPARENT';

const ZERO_TRACE_ID = '0'.repeat(32);
const ZERO_SPAN_ID = '0'.repeat(16);

function generateRandomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/** 32 lowercase hex digits. */
export function generateTraceId(): string {
  return generateRandomHex(16);
}

/** 16 lowercase hex digits. */
export function generateSpanId(): string {
  return generateRandomHex(8);
}

export function createTraceContext(traceId?: string, samplingDecision = true): TraceContext {
  return {
    traceId: traceId ?? generateTraceId(),
    spanId: generateSpanId(),
    samplingDecision,
  };
}

/**
 * New span in the same trace, parented on `parent`.
 */
export function createChildTraceContext(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    samplingDecision: parent.samplingDecision,
  };
}

/**
 * @example
 * formatTraceparent(ctx) // "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01"
 */
export function formatTraceparent(ctx: TraceContext): string {
  const traceFlags = ctx.samplingDecision ? '01' : '00';
  return `00-${ctx.traceId}-${ctx.spanId}-${traceFlags}`;
}

/**
 * Parse a `traceparent` header. Returns null for anything malformed,
 * including the all-zero ids the format reserves as invalid.
 */
export function parseTraceparent(traceparent: string): TraceContext | null {
  const match = /^00-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/.exec(
    traceparent.trim().toLowerCase(),
  );
  if (!match) {
    return null;
  }

  const [, traceId, spanId, traceFlags] = match;
  if (
    traceId === undefined ||
    spanId === undefined ||
    traceFlags === undefined ||
    traceId === ZERO_TRACE_ID ||
    spanId === ZERO_SPAN_ID
  ) {
    return null;
  }

  return {
    traceId,
    spanId,
    // bit 0 of the flags is "sampled"
    samplingDecision: (Number.parseInt(traceFlags, 16) & 1) === 1,
  };
}

/**
 * Root context for a run: a child of an inherited `TRACEPARENT` when one is
 * present and valid, otherwise a fresh trace.
 */
export function resolveRootTraceContext(env: NodeJS.ProcessEnv = process.env): TraceContext {
  const inherited = env[TRACEPARENT_ENV];
  const parent = inherited === undefined ? null : parseTraceparent(inherited);
  return parent ? createChildTraceContext(parent) : createTraceContext();
}

export interface TraceContextJSON {
  traceId: string;
  spanId: string;
  sampled: boolean;
  parentSpanId?: string;
}

export function traceContextToJSON(ctx: TraceContext): TraceContextJSON {
  const result: TraceContextJSON = {
    traceId: ctx.traceId,
    spanId: ctx.spanId,
    sampled: ctx.samplingDecision,
  };
  if (ctx.parentSpanId !== undefined) {
    result.parentSpanId = ctx.parentSpanId;
  }
  return result;
}
