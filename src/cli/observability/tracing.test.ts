/**
 * Tests for trace context helpers.
 */

import { describe, expect, it } from 'vitest';

import {
  createChildTraceContext,
  createTraceContext,
  formatTraceparent,
  parseTraceparent,
  resolveRootTraceContext,
  traceContextToJSON,
} from './tracing.ts';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
const SPAN_ID = '00f067aa0ba902b7';
const TRACEPARENT = `00-${TRACE_ID}-${SPAN_ID}-01`;

describe('tracing', () => {
  it('creates contexts with ids of the right shape', () => {
    const ctx = createTraceContext();

    expect(ctx.traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(ctx.spanId).toMatch(/^[0-9a-f]{16}$/);
    expect(ctx.samplingDecision).toBe(true);
  });

  it('keeps the trace id and parents child spans', () => {
    const parent = createTraceContext(TRACE_ID);

    const child = createChildTraceContext(parent);

    expect(child.traceId).toBe(TRACE_ID);
    expect(child.parentSpanId).toBe(parent.spanId);
    expect(child.spanId).not.toBe(parent.spanId);
  });

  it('formats the sampled flag', () => {
    expect(formatTraceparent({ traceId: TRACE_ID, spanId: SPAN_ID, samplingDecision: true })).toBe(TRACEPARENT);
    expect(formatTraceparent({ traceId: TRACE_ID, spanId: SPAN_ID, samplingDecision: false })).toBe(
      `00-${TRACE_ID}-${SPAN_ID}-00`,
    );
  });

  describe('parseTraceparent', () => {
    it('parses a valid header', () => {
      expect(parseTraceparent(TRACEPARENT)).toEqual({ traceId: TRACE_ID, spanId: SPAN_ID, samplingDecision: true });
    });

    it('accepts upper case and surrounding whitespace', () => {
      expect(parseTraceparent(`  ${TRACEPARENT.toUpperCase()} `)?.traceId).toBe(TRACE_ID);
    });

    it('reads the sampled bit from the flags', () => {
      expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-00`)?.samplingDecision).toBe(false);
      expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-03`)?.samplingDecision).toBe(true);
    });

    it.each([
      ['an unknown version', `01-${TRACE_ID}-${SPAN_ID}-01`],
      ['a short trace id', `00-${TRACE_ID.slice(1)}-${SPAN_ID}-01`],
      ['an all-zero trace id', `00-${'0'.repeat(32)}-${SPAN_ID}-01`],
      ['an all-zero span id', `00-${TRACE_ID}-${'0'.repeat(16)}-01`],
      ['garbage', 'not-a-traceparent'],
    ])('rejects %s', (_label, header) => {
      expect(parseTraceparent(header)).toBeNull();
    });
  });

  describe('resolveRootTraceContext', () => {
    it('joins an inherited trace', () => {
      const root = resolveRootTraceContext({ TRACEPARENT });

      expect(root.traceId).toBe(TRACE_ID);
      expect(root.parentSpanId).toBe(SPAN_ID);
    });

    it('starts a fresh trace when the inherited header is invalid or absent', () => {
      const invalid = resolveRootTraceContext({ TRACEPARENT: 'bogus' });
      const absent = resolveRootTraceContext({});

      expect(invalid.traceId).not.toBe(TRACE_ID);
      expect(invalid.parentSpanId).toBeUndefined();
      expect(absent.parentSpanId).toBeUndefined();
    });
  });

  it('serializes contexts with the parent only when present', () => {
    expect(traceContextToJSON({ traceId: TRACE_ID, spanId: SPAN_ID, samplingDecision: false })).toEqual({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      sampled: false,
    });
    expect(
      traceContextToJSON({ traceId: TRACE_ID, spanId: 'a'.repeat(16), parentSpanId: SPAN_ID, samplingDecision: true }),
    ).toEqual({ traceId: TRACE_ID, spanId: 'a'.repeat(16), sampled: true, parentSpanId: SPAN_ID });
  });
});
