import { describe, expect, it, vi } from 'vitest';

import { fakeConsole } from '../../../__test-utils__/mocks/console/fake-console.ts';
import type { CLIArgs } from '../../input/args.ts';
import { main, USAGE_EXIT_CODE } from './main.ts';

describe('main', () => {
  it('prints help without executing', async () => {
    const console = fakeConsole();
    const executeFn = vi.fn();

    const result = await main({ argv: ['--help'], console, executeFn });

    expect(result).toEqual({ exitCode: 0 });
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('USAGE:\n  matrix-ci [OPTIONS]'));
    expect(executeFn).not.toHaveBeenCalled();
  });

  it('prints the version', async () => {
    const console = fakeConsole();

    const result = await main({ argv: ['-v'], console, executeFn: vi.fn() });

    expect(result).toEqual({ exitCode: 0 });
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^matrix-ci v/));
  });

  it('reports usage errors with exit code 2', async () => {
    const console = fakeConsole();
    const executeFn = vi.fn();

    const result = await main({ argv: ['--bogus'], console, executeFn });

    expect(result).toEqual({ exitCode: USAGE_EXIT_CODE });
    expect(console.error).toHaveBeenCalledWith(
      '❌ CLI_UNKNOWN_OPTION: Unknown option: --bogus\nRun with --help for usage.',
    );
    expect(executeFn).not.toHaveBeenCalled();
  });

  it('passes the parsed arguments and dependencies to the executor', async () => {
    const console = fakeConsole();
    const executeFn = vi.fn().mockResolvedValue({ exitCode: 1 });

    const result = await main({
      argv: ['--cells', 'ubuntu-*', '--skip-docs'],
      console,
      cwd: '/work',
      executeFn,
    });

    expect(result).toEqual({ exitCode: 1 });
    const [args, deps] = executeFn.mock.calls[0] ?? [];
    expect(args).toMatchObject({ cells: ['ubuntu-*'], skipDocs: true } satisfies Partial<CLIArgs>);
    expect(deps).toEqual({ console, cwd: '/work' });
  });
});
