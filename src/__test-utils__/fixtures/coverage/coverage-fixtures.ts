/**
 * Builders for coverage data used across coverage and CLI tests.
 */

import type { CoverageArtifact, CoverageData, FileCoverage } from '../../../coverage/types.ts';

/** Inclusive range of line numbers. */
export function lineRange(from: number, to: number): number[] {
  const lines: number[] = [];
  for (let line = from; line <= to; line++) {
    lines.push(line);
  }
  return lines;
}

export function fileCoverage(
  covered: readonly number[],
  coverable: readonly number[],
  branches: { covered?: readonly string[]; coverable?: readonly string[] } = {},
): FileCoverage {
  return {
    coveredLines: new Set(covered),
    coverableLines: new Set(coverable),
    coveredBranches: new Set(branches.covered ?? []),
    coverableBranches: new Set(branches.coverable ?? []),
  };
}

export function coverageData(files: Record<string, FileCoverage>): CoverageData {
  return new Map(Object.entries(files));
}

export function createArtifact(
  id: string,
  cellId: string,
  files: Record<string, FileCoverage>,
): CoverageArtifact {
  return { id, cellId, source: `${cellId}/coverage.json`, data: coverageData(files) };
}
