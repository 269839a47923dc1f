/**
 * Tests for the CLI entrypoint wiring (broken pipes, error handling, signals).
 */

import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  expectSanitizedArgv,
  findFatalErrorCall,
} from '../../../__test-utils__/assertions/entrypoint-helpers.ts';
import { createDeferred } from '../../../__test-utils__/utils/deferred.ts';
import {
  captureErrorListeners,
  removeNewListeners,
} from '../../../__test-utils__/mocks/process/error-listeners.ts';
import { runEntrypoint, sanitizeArgs } from './entrypoint.ts';

type ErrorHandler = (err: NodeJS.ErrnoException) => void;

function errnoError(message: string, code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('entrypoint.ts', () => {
  let before: ReturnType<typeof captureErrorListeners>;
  let originalArgv: string[];

  beforeEach(() => {
    before = captureErrorListeners();
    originalArgv = [...process.argv];
    process.exitCode = undefined;
  });

  afterEach(() => {
    removeNewListeners(before);
    process.argv = originalArgv;
    process.exitCode = undefined;
  });

  it('registers broken pipe handlers that ignore EPIPE only', async () => {
    await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });

    for (const stream of [process.stdout, process.stderr]) {
      const known = stream === process.stdout ? before.stdout : before.stderr;
      const handler = stream.listeners('error').find((listener) => !known.has(listener)) as
        | ErrorHandler
        | undefined;

      expect(handler).toBeDefined();
      expect(() => handler?.(errnoError('EPIPE', 'EPIPE'))).not.toThrow();
      expect(() => handler?.(errnoError('boom', 'OTHER'))).toThrow(/boom/);
    }
  });

  it('sets the exit code from the result', async () => {
    await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 1 }) });

    expect(process.exitCode).toBe(1);
  });

  it('reports rejected main promises with sanitized argv', async () => {
    const errorSpy = vi.fn();

    await runEntrypoint({
      mainFn: () => Promise.reject(new Error('boom')),
      console: { error: errorSpy },
    });

    const passedError = findFatalErrorCall(errorSpy);
    expect(passedError).toMatchObject({ code: 'UNEXPECTED_ERROR', message: 'boom' });
    expectSanitizedArgv(passedError);
    expect(process.exitCode).toBe(1);
  });

  it('wraps non-Error rejections', async () => {
    const errorSpy = vi.fn();

    await runEntrypoint({
      mainFn: () => Promise.reject('boom-string'),
      console: { error: errorSpy },
    });

    expect(findFatalErrorCall(errorSpy)).toMatchObject({
      code: 'UNEXPECTED_ERROR',
      message: 'boom-string',
      cause: 'boom-string',
    });
  });

  it('uses the default console when no console is injected', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await runEntrypoint({ mainFn: () => Promise.reject(new Error('boom')) });

    expect(errorSpy).toHaveBeenCalledWith('\n❌ Fatal error:', expect.any(Error));
  });

  it('uses the exit code of an interrupting signal', async () => {
    const main = createDeferred<{ exitCode: number }>();
    const errorSpy = vi.fn();

    const done = runEntrypoint({ mainFn: () => main.promise, console: { error: errorSpy } });
    process.emit('SIGINT');
    main.resolve({ exitCode: 0 });
    await done;

    expect(process.exitCode).toBe(130);
    expect(errorSpy).toHaveBeenCalledWith(
      '\nSIGINT received; waiting for running commands (repeat to force exit)',
    );
  });

  it('calls the signal handler once and forces exit on a repeated signal', async () => {
    const main = createDeferred<{ exitCode: number }>();
    const onSignal = vi.fn();
    const exitFn = vi.fn();

    const done = runEntrypoint({
      mainFn: () => main.promise,
      console: { error: vi.fn() },
      onSignal,
      exitFn,
    });
    process.emit('SIGTERM');
    process.emit('SIGINT');
    main.resolve({ exitCode: 1 });
    await done;

    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledWith('SIGTERM');
    expect(exitFn).toHaveBeenCalledWith(143);
    expect(process.exitCode).toBe(143);
  });

  it('logs synchronous and asynchronous signal handler failures', async () => {
    for (const onSignal of [
      () => {
        throw new Error('signal-fail');
      },
      () => Promise.reject(new Error('async-signal-fail')),
    ]) {
      const main = createDeferred<{ exitCode: number }>();
      const errorSpy = vi.fn();

      const done = runEntrypoint({ mainFn: () => main.promise, console: { error: errorSpy }, onSignal });
      process.emit('SIGTERM');
      await new Promise((resolve) => setImmediate(resolve));
      main.resolve({ exitCode: 0 });
      await done;

      expect(errorSpy).toHaveBeenCalledWith('\nWARN: signal handler failed:', expect.any(Error));
    }
  });

  it('removes signal handlers after completion and after rejection', async () => {
    const sigint = new Set(process.listeners('SIGINT'));
    const sigterm = new Set(process.listeners('SIGTERM'));

    await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });
    await runEntrypoint({
      mainFn: () => Promise.reject(new Error('boom')),
      console: { error: vi.fn() },
    });

    expect(process.listeners('SIGINT').filter((l) => !sigint.has(l))).toEqual([]);
    expect(process.listeners('SIGTERM').filter((l) => !sigterm.has(l))).toEqual([]);
  });

  it('skips self-execution when argv[1] is missing', async () => {
    process.argv = [originalArgv[0] ?? 'node'];

    vi.resetModules();
    await import('./entrypoint.ts');

    const after = captureErrorListeners();
    expect(after.stdout.size).toBe(before.stdout.size);
    expect(after.stderr.size).toBe(before.stderr.size);
  });

  it('runs itself when argv[1] is the module path', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const modulePath = fileURLToPath(new URL('entrypoint.ts', import.meta.url));
    process.argv = [originalArgv[0] ?? 'node', modulePath, '--help'];

    vi.resetModules();
    await import('./entrypoint.ts');
    await vi.waitFor(() => expect(process.exitCode).toBe(0));

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('matrix-ci [OPTIONS]'));
    const after = captureErrorListeners();
    expect(after.stdout.size).toBeGreaterThan(before.stdout.size);
  });
});

describe('sanitizeArgs', () => {
  it('keeps flag names and short flags and redacts values', () => {
    expect(sanitizeArgs(['-v', 'secret', '--token=abc', '--verbose', undefined])).toEqual([
      '-v',
      '<redacted>',
      '--token=<redacted>',
      '--verbose',
      '<redacted>',
    ]);
  });
});
