/**
 * Coverage: artifact parsing.
 *
 * Reads the per-job coverage artifact written by the test runner into
 * line/branch sets. Two formats are understood:
 *
 *   coverage-json  coverage.py `coverage json` output
 *   lcov           LCOV tracefiles (SF / DA / BRDA records)
 *
 * Paths are normalized to forward slashes relative to the project root so
 * artifacts from different operating systems merge into the same file keys.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { CoverageError, hasErrorProperty } from '../errors/errors.ts';
import type { CoverageArtifact, CoverageData, CoverageFormat, FileCoverage } from './types.ts';

const LineNumbers = z.array(z.number().int().nonnegative());
const BranchArcs = z.array(z.tuple([z.number().int(), z.number().int()]));

const CoverageJsonFile = z
  .object({
    executed_lines: LineNumbers,
    missing_lines: LineNumbers,
    executed_branches: BranchArcs.optional(),
    missing_branches: BranchArcs.optional(),
  })
  .passthrough();

const CoverageJsonReport = z
  .object({
    files: z.record(CoverageJsonFile),
  })
  .passthrough();

export interface ParseArtifactOptions {
  readonly format: CoverageFormat;
  readonly cellId: string;
  readonly source: string;
  /** Absolute project root stripped from absolute paths. */
  readonly rootDir?: string;
}

/**
 * Normalize a reported path to a forward-slash path relative to `rootDir`.
 */
export function normalizeCoveragePath(filePath: string, rootDir?: string): string {
  let normalized = filePath.replaceAll('\\', '/');
  if (rootDir !== undefined) {
    const root = rootDir.replaceAll('\\', '/').replace(/\/+$/, '');
    if (root.length > 0 && normalized.startsWith(`${root}/`)) {
      normalized = normalized.slice(root.length + 1);
    }
  }
  return normalized.replace(/^(\.\/)+/, '');
}

function arcKey([from, to]: readonly [number, number]): string {
  return `${from}->${to}`;
}

function addFile(target: Map<string, FileCoverage>, filePath: string, file: FileCoverage): void {
  const existing = target.get(filePath);
  target.set(
    filePath,
    existing
      ? {
          coveredLines: new Set([...existing.coveredLines, ...file.coveredLines]),
          coverableLines: new Set([...existing.coverableLines, ...file.coverableLines]),
          coveredBranches: new Set([...existing.coveredBranches, ...file.coveredBranches]),
          coverableBranches: new Set([...existing.coverableBranches, ...file.coverableBranches]),
        }
      : file,
  );
}

function invalid(source: string, message: string, cause?: unknown): CoverageError {
  return new CoverageError('COVERAGE_ARTIFACT_INVALID', `${source}: ${message}`, {
    ...(cause === undefined ? {} : { cause }),
    details: { source },
  });
}

/**
 * Parse coverage.py JSON output.
 */
export function parseCoverageJson(content: string, source: string, rootDir?: string): CoverageData {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw invalid(source, 'artifact is not valid JSON', error);
  }

  const parsed = CoverageJsonReport.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    throw invalid(source, `unexpected coverage JSON shape at ${where}`, parsed.error);
  }

  const data = new Map<string, FileCoverage>();
  for (const [filePath, file] of Object.entries(parsed.data.files)) {
    const executedBranches = (file.executed_branches ?? []).map(arcKey);
    const missingBranches = (file.missing_branches ?? []).map(arcKey);
    addFile(data, normalizeCoveragePath(filePath, rootDir), {
      coveredLines: new Set(file.executed_lines),
      coverableLines: new Set([...file.executed_lines, ...file.missing_lines]),
      coveredBranches: new Set(executedBranches),
      coverableBranches: new Set([...executedBranches, ...missingBranches]),
    });
  }
  return data;
}

function parseCount(value: string | undefined, source: string, lineNo: number): number {
  const count = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isInteger(count) || count < 0) {
    throw invalid(source, `malformed record on line ${lineNo}`);
  }
  return count;
}

/**
 * Parse an LCOV tracefile.
 */
export function parseLcov(content: string, source: string, rootDir?: string): CoverageData {
  const data = new Map<string, FileCoverage>();
  let current:
    | {
        path: string;
        covered: Set<number>;
        coverable: Set<number>;
        coveredBranches: Set<string>;
        coverableBranches: Set<string>;
      }
    | undefined;

  const lines = content.split(/\r?\n/);
  for (const [i, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    const lineNo = i + 1;
    if (line.length === 0) {
      continue;
    }

    if (line.startsWith('SF:')) {
      current = {
        path: normalizeCoveragePath(line.slice(3), rootDir),
        covered: new Set(),
        coverable: new Set(),
        coveredBranches: new Set(),
        coverableBranches: new Set(),
      };
      continue;
    }

    if (line === 'end_of_record') {
      if (!current) {
        throw invalid(source, `end_of_record without SF on line ${lineNo}`);
      }
      addFile(data, current.path, {
        coveredLines: current.covered,
        coverableLines: current.coverable,
        coveredBranches: current.coveredBranches,
        coverableBranches: current.coverableBranches,
      });
      current = undefined;
      continue;
    }

    if (line.startsWith('DA:')) {
      if (!current) {
        throw invalid(source, `DA record outside a file on line ${lineNo}`);
      }
      const [lineField, hitsField] = line.slice(3).split(',');
      const lineNumber = parseCount(lineField, source, lineNo);
      const hits = parseCount(hitsField, source, lineNo);
      current.coverable.add(lineNumber);
      if (hits > 0) {
        current.covered.add(lineNumber);
      }
      continue;
    }

    if (line.startsWith('BRDA:')) {
      if (!current) {
        throw invalid(source, `BRDA record outside a file on line ${lineNo}`);
      }
      const [lineField, block, branch, taken] = line.slice(5).split(',');
      if (block === undefined || branch === undefined || taken === undefined) {
        throw invalid(source, `malformed record on line ${lineNo}`);
      }
      const key = `${parseCount(lineField, source, lineNo)}:${block}:${branch}`;
      current.coverableBranches.add(key);
      if (taken !== '-' && parseCount(taken, source, lineNo) > 0) {
        current.coveredBranches.add(key);
      }
    }
    // Other record types (TN, FN, FNDA, LF, LH, ...) carry nothing we merge.
  }

  if (current) {
    throw invalid(source, `missing end_of_record for ${current.path}`);
  }
  return data;
}

/**
 * Build an artifact from raw artifact bytes.
 */
export function parseCoverageArtifact(
  content: string,
  options: ParseArtifactOptions,
): CoverageArtifact {
  const data =
    options.format === 'lcov'
      ? parseLcov(content, options.source, options.rootDir)
      : parseCoverageJson(content, options.source, options.rootDir);

  // identical reports from two cells are still two artifacts
  return {
    id: createHash('sha256').update(options.cellId).update('\n').update(content).digest('hex'),
    cellId: options.cellId,
    source: options.source,
    data,
  };
}

/**
 * Read and parse an artifact file.
 *
 * @returns The artifact, or `undefined` when the file was never written.
 */
export async function loadCoverageArtifact(
  filePath: string,
  options: Omit<ParseArtifactOptions, 'source'>,
  readFileFn: typeof readFile = readFile,
): Promise<CoverageArtifact | undefined> {
  let content: string;
  try {
    content = await readFileFn(filePath, 'utf8');
  } catch (error) {
    if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
      return undefined;
    }
    throw invalid(filePath, 'artifact could not be read', error);
  }
  return parseCoverageArtifact(content, { ...options, source: filePath });
}
