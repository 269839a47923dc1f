/**
 * Job Executor: per-test results from a JSON-lines report log.
 *
 * Each line is one JSON object. Only `TestReport` records are read; a test
 * is counted once, from its `call` phase, unless setup or teardown failed or
 * skipped it.
 */

import { z } from 'zod';

import type { TestCaseOutcome, TestCaseResult, TestTally } from './types.ts';

const TestReportRecord = z
  .object({
    $report_type: z.literal('TestReport'),
    nodeid: z.string(),
    when: z.enum(['setup', 'call', 'teardown']),
    outcome: z.enum(['passed', 'failed', 'skipped']),
    duration: z.number().optional(),
  })
  .passthrough();

/**
 * Parse a report log. Lines that are not JSON or not test reports are ignored.
 *
 * @returns Results in first-seen order.
 */
export function parseTestReportLog(text: string): TestCaseResult[] {
  const results = new Map<string, { outcome: TestCaseOutcome; durationMs: number }>();

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = TestReportRecord.safeParse(raw);
    if (!parsed.success) {
      continue;
    }

    const record = parsed.data;
    const durationMs = Math.round((record.duration ?? 0) * 1000);
    const current = results.get(record.nodeid);

    if (!current) {
      results.set(record.nodeid, { outcome: record.outcome, durationMs });
      continue;
    }

    current.durationMs += durationMs;
    if (record.outcome === 'failed') {
      current.outcome = 'failed';
    } else if (record.when === 'call' && current.outcome !== 'failed') {
      current.outcome = record.outcome;
    }
  }

  return [...results].map(([id, { outcome, durationMs }]) => ({ id, outcome, durationMs }));
}

export function tallyTests(results: readonly TestCaseResult[]): TestTally {
  let passed = 0;
  let failed = 0;
  let skipped = 0;
  for (const result of results) {
    if (result.outcome === 'passed') {
      passed++;
    } else if (result.outcome === 'failed') {
      failed++;
    } else {
      skipped++;
    }
  }
  return { total: results.length, passed, failed, skipped };
}
