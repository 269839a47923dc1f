/**
 * Fixtures for end-to-end runs of `executeWithArgs` against a temporary
 * project: a configuration file and a command runner that stands in for the
 * shell.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PassThrough } from 'node:stream';

import { vi, type Mock } from 'vitest';

import type { CommandRunner, CommandSpec } from '../../../cli/modules/process-manager/process-manager.ts';

export const BASE_CONFIG = `
project:
  name: demo
  install: '{python} -m pip install -e {projectDir}'
environment:
  provision: 'python{runtime} -m venv {envDir}'
matrix:
  include:
    - { os: ubuntu-latest, runtime: '3.10' }
    - { os: ubuntu-latest, runtime: '3.11' }
    - { os: windows-latest, runtime: '3.10' }
coverage:
  target: demo
docs:
  build: make doctest
  snippets:
    - name: readme
      command: '{python} -m doctest README.md'
`;

export async function writeConfig(
  root: string,
  text: string = BASE_CONFIG,
  file = 'matrix-ci.yml',
): Promise<string> {
  const target = path.join(root, file);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, text, 'utf8');
  return target;
}

/** Lines covered by each runtime's test run, out of lines 1-4 of `demo/core.py`. */
export const COVERED_LINES: Readonly<Record<string, readonly number[]>> = {
  '3.10': [1, 2],
  '3.11': [3],
};

export interface FakeShell {
  readonly runner: Mock<CommandRunner>;
  readonly specs: CommandSpec[];
  /** Exit code for commands containing the given text; 0 otherwise. */
  readonly exitCodes: Map<string, number>;
}

const ARTIFACT_FLAG = /--cov-report=json:'?([^'\s]+)/;

/**
 * Runner that records every command and, for test commands, writes the
 * coverage JSON the real test runner would produce.
 */
export function createFakeShell(): FakeShell {
  const specs: CommandSpec[] = [];
  const exitCodes = new Map<string, number>();

  const runner = vi.fn<CommandRunner>(async (spec) => {
    specs.push(spec);

    const artifact = ARTIFACT_FLAG.exec(spec.command)?.[1];
    if (artifact !== undefined) {
      // cell ids end in the runtime version
      const runtime = spec.log.jobId.split('-').at(-1) ?? '';
      const executed = COVERED_LINES[runtime] ?? [];
      const missing = [1, 2, 3, 4].filter((line) => !executed.includes(line));
      await writeFile(
        artifact,
        JSON.stringify({
          files: { 'demo/core.py': { executed_lines: executed, missing_lines: missing } },
        }),
        'utf8',
      );
    }

    let exitCode = 0;
    for (const [needle, code] of exitCodes) {
      if (spec.command.includes(needle)) {
        exitCode = code;
      }
    }
    return { exitCode, durationMs: 1 };
  });

  return { runner, specs, exitCodes };
}

export interface CapturedOutput {
  readonly console: { log: Mock<(...args: unknown[]) => void>; error: Mock<(...args: unknown[]) => void> };
  readonly stdout: NodeJS.WriteStream;
  readonly text: () => string;
}

/** Console and non-TTY stdout that keep what was written. */
export function captureOutput(): CapturedOutput {
  const stream = new PassThrough();
  let text = '';
  stream.on('data', (chunk: Buffer | string) => {
    text += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
  });

  return {
    console: { log: vi.fn(), error: vi.fn() },
    stdout: stream as unknown as NodeJS.WriteStream,
    text: () => text,
  };
}
