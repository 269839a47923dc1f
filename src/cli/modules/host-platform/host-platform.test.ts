/**
 * Tests for host platform checks.
 */

import { describe, expect, it } from 'vitest';

import { expandMatrix } from '../../../matrix/descriptor.ts';
import { detectHostFamily, planCells, shouldSkipCell } from './host-platform.ts';

const CELLS = expandMatrix({
  axes: { os: ['ubuntu-latest', 'windows-latest', 'macos-13'], runtime: ['3.11'] },
});

describe('detectHostFamily', () => {
  it('maps node platforms onto OS families', () => {
    expect(detectHostFamily('win32')).toBe('windows');
    expect(detectHostFamily('darwin')).toBe('macos');
    expect(detectHostFamily('linux')).toBe('linux');
    expect(detectHostFamily('freebsd')).toBe('linux');
  });
});

describe('shouldSkipCell', () => {
  it('runs cells that match the host family', () => {
    const [linux] = CELLS;
    if (!linux) {
      throw new Error('missing cell');
    }

    expect(shouldSkipCell(linux, 'linux', 'skip')).toEqual({ skip: false });
  });

  it('skips foreign cells under the skip policy', () => {
    const windows = CELLS[1];
    if (!windows) {
      throw new Error('missing cell');
    }

    expect(shouldSkipCell(windows, 'linux', 'skip')).toEqual({
      skip: true,
      reason: 'Requires a windows host (running on linux)',
    });
    expect(shouldSkipCell(windows, 'linux', 'fail')).toEqual({ skip: false });
  });
});

describe('planCells', () => {
  it('partitions cells keeping declaration order', () => {
    const plan = planCells(CELLS, 'macos', 'skip');

    expect(plan.runnable.map((c) => c.id)).toEqual(['macos-13-3.11']);
    expect(plan.skipped.map((s) => s.cell.id)).toEqual([
      'ubuntu-latest-3.11',
      'windows-latest-3.11',
    ]);
  });

  it('runs everything under the fail policy', () => {
    expect(planCells(CELLS, 'linux', 'fail').runnable).toHaveLength(3);
  });
});
