/**
 * Run report.
 *
 * The JSON document written after every run, the itemized failure list shown
 * to the user, and the pass/fail decision both are derived from.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { BarrierOutcome } from '../../coverage/barrier.ts';
import type { AggregateReport } from '../../coverage/types.ts';
import type { VerificationResult } from '../../docs/types.ts';
import type { ExecutionSummary } from '../modules/result-builder/result-builder.ts';
import type { CellOutcome } from '../modules/types.ts';

export const REPORT_VERSION = '1.0';

export interface RunReport {
  readonly version: typeof REPORT_VERSION;
  readonly runId: string;
  readonly generatedAt: string;
  readonly passed: boolean;
  readonly summary: ExecutionSummary;
  readonly cells: readonly CellOutcome[];
  /** Null when the matrix was not run (`--docs-only`). */
  readonly coverage: AggregateReport | null;
  readonly barrier: BarrierOutcome | null;
  readonly submissionErrors: readonly string[];
  /** Null when documentation was disabled or skipped. */
  readonly docs: VerificationResult | null;
  readonly failures: readonly string[];
}

export interface RunReportInput {
  readonly runId: string;
  readonly generatedAt: Date;
  readonly summary: ExecutionSummary;
  readonly cells: readonly CellOutcome[];
  readonly coverage?: AggregateReport;
  readonly barrier?: BarrierOutcome;
  readonly submissionErrors?: readonly string[];
  readonly docs?: VerificationResult;
}

/**
 * One line per problem, in the order cells, coverage, submission, docs.
 */
export function listFailures(input: RunReportInput): string[] {
  const failures: string[] = [];

  for (const cell of input.cells) {
    if (cell.status === 'FAIL' || cell.status === 'ERROR') {
      failures.push(`${cell.id}: ${cell.error ?? cell.status}`);
    }
  }

  if (input.coverage?.incomplete) {
    failures.push(`coverage: incomplete, missing ${input.coverage.missingCells.join(', ')}`);
  }

  for (const message of input.submissionErrors ?? []) {
    failures.push(`coverage submission: ${message}`);
  }

  const { docs } = input;
  if (docs && !docs.docBuildOk) {
    failures.push(`docs: build failed: ${docs.buildError ?? 'unknown error'}`);
  }
  for (const snippet of docs?.snippetResults ?? []) {
    if (snippet.status === 'fail') {
      failures.push(`docs/${snippet.name}: ${snippet.error ?? 'failed'}`);
    }
  }

  return failures;
}

export function buildRunReport(input: RunReportInput): RunReport {
  const failures = listFailures(input);

  return {
    version: REPORT_VERSION,
    runId: input.runId,
    generatedAt: input.generatedAt.toISOString(),
    passed: failures.length === 0,
    summary: input.summary,
    cells: input.cells,
    coverage: input.coverage ?? null,
    barrier: input.barrier ?? null,
    submissionErrors: input.submissionErrors ?? [],
    docs: input.docs ?? null,
    failures,
  };
}

/**
 * Write the report atomically (temporary file, then rename).
 */
export async function writeRunReport(
  file: string,
  report: RunReport,
  fs: {
    readonly mkdirFn?: typeof mkdir;
    readonly writeFileFn?: typeof writeFile;
    readonly renameFn?: typeof rename;
  } = {},
): Promise<void> {
  const { mkdirFn = mkdir, writeFileFn = writeFile, renameFn = rename } = fs;
  const temporary = `${file}.${process.pid}.tmp`;

  await mkdirFn(path.dirname(file), { recursive: true });
  await writeFileFn(temporary, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  await renameFn(temporary, file);
}
