/**
 * Coverage: merge and summary.
 *
 * Merging is a set union per file: a line or branch covered in any job is
 * covered overall, and coverable sets are unioned as well. The operation is
 * commutative, associative and idempotent, so ingest order and duplicates
 * never change the result.
 */

import type {
  CoverageCounter,
  CoverageData,
  CoverageTotals,
  FileCoverage,
  FileCoverageSummary,
} from './types.ts';

export const EMPTY_COVERAGE: CoverageData = new Map();

function union<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): ReadonlySet<T> {
  if (b.size === 0) {
    return a;
  }
  if (a.size === 0) {
    return b;
  }
  return new Set([...a, ...b]);
}

/**
 * Union two file records.
 */
export function mergeFileCoverage(a: FileCoverage, b: FileCoverage): FileCoverage {
  return {
    coveredLines: union(a.coveredLines, b.coveredLines),
    coverableLines: union(a.coverableLines, b.coverableLines),
    coveredBranches: union(a.coveredBranches, b.coveredBranches),
    coverableBranches: union(a.coverableBranches, b.coverableBranches),
  };
}

/**
 * Union two coverage maps without mutating either.
 */
export function mergeCoverage(a: CoverageData, b: CoverageData): CoverageData {
  const merged = new Map(a);
  for (const [path, file] of b) {
    const existing = merged.get(path);
    merged.set(path, existing ? mergeFileCoverage(existing, file) : file);
  }
  return merged;
}

function counter(covered: number, total: number): CoverageCounter {
  const percent = total === 0 ? 100 : Math.round((covered / total) * 10_000) / 100;
  return { covered, total, percent };
}

/**
 * Count covered items, only counting covered entries that are also coverable.
 */
function countCovered<T>(covered: ReadonlySet<T>, coverable: ReadonlySet<T>): number {
  let count = 0;
  for (const item of covered) {
    if (coverable.has(item)) {
      count++;
    }
  }
  return count;
}

export function summarizeFile(path: string, file: FileCoverage): FileCoverageSummary {
  return {
    path,
    lines: counter(countCovered(file.coveredLines, file.coverableLines), file.coverableLines.size),
    branches: counter(
      countCovered(file.coveredBranches, file.coverableBranches),
      file.coverableBranches.size,
    ),
  };
}

/**
 * Per-file summaries sorted by path.
 */
export function summarizeFiles(data: CoverageData): readonly FileCoverageSummary[] {
  return [...data.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, file]) => summarizeFile(path, file));
}

/**
 * Overall line and branch totals.
 */
export function summarizeCoverage(data: CoverageData): CoverageTotals {
  let coveredLines = 0;
  let totalLines = 0;
  let coveredBranches = 0;
  let totalBranches = 0;

  for (const file of data.values()) {
    coveredLines += countCovered(file.coveredLines, file.coverableLines);
    totalLines += file.coverableLines.size;
    coveredBranches += countCovered(file.coveredBranches, file.coverableBranches);
    totalBranches += file.coverableBranches.size;
  }

  return {
    lines: counter(coveredLines, totalLines),
    branches: counter(coveredBranches, totalBranches),
  };
}
