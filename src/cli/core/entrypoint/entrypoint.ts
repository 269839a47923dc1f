#!/usr/bin/env -S node --import tsx
/**
 * matrix-ci: CLI entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors)
 *   and turn the run's result into the process exit code.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { AppError } from '../../../errors/errors.ts';
import { main } from '../main/main.ts';

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<{ exitCode: number }>;
  readonly console?: Pick<typeof console, 'error'>;
  /** Optional graceful shutdown handler invoked on the first SIGINT/SIGTERM */
  readonly onSignal?: (signal: ShutdownSignal) => Promise<void> | void;
  /** Called on a repeated signal; defaults to `process.exit`. */
  readonly exitFn?: (code: number) => void;
}

// Standard exit codes: SIGINT (2) -> 128 + 2 = 130, SIGTERM (15) -> 128 + 15 = 143
export const SIGNAL_EXIT_CODES: Readonly<Record<ShutdownSignal, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Ignore EPIPE raised when the output is piped into a closed reader;
 * rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);
}

interface SignalState {
  /** Exit code of the first signal received, if any. */
  code: number | undefined;
  remove(): void;
}

/**
 * Register SIGINT/SIGTERM handlers. The first signal lets running commands
 * wind down; a second one exits at once.
 */
function setupSignalHandlers(
  deps: EntrypointDeps,
  errorConsole: Pick<typeof console, 'error'>,
): SignalState {
  const exitFn = deps.exitFn ?? ((code: number) => process.exit(code));
  const state: SignalState = { code: undefined, remove: () => undefined };

  const createHandler = (signal: ShutdownSignal) => () => {
    const code = SIGNAL_EXIT_CODES[signal];
    if (state.code !== undefined) {
      exitFn(state.code);
      return;
    }

    state.code = code;
    process.exitCode = code;
    errorConsole.error(`\n${signal} received; waiting for running commands (repeat to force exit)`);

    if (deps.onSignal) {
      try {
        const maybe = deps.onSignal(signal);
        if (maybe instanceof Promise) {
          maybe.catch((e: unknown) => errorConsole.error('\nWARN: signal handler failed:', e));
        }
      } catch (e) {
        errorConsole.error('\nWARN: signal handler failed:', e);
      }
    }
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  state.remove = () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
  return state;
}

/**
 * Scrub argv values for logging to avoid leaking secrets.
 *
 * Long flags keep their name, short flags are shown, anything else is
 * replaced by `<redacted>`.
 */
export function sanitizeArgs(argv: readonly unknown[]): string[] {
  return argv.map((arg) => {
    if (typeof arg !== 'string') {
      return '<redacted>';
    }

    if (arg.startsWith('--')) {
      const [key = arg, val] = arg.split('=', 2);
      return val === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    // Positional args may contain sensitive data
    return '<redacted>';
  });
}

/**
 * Run the CLI: wire up broken pipes and signal handling, report uncaught
 * errors, and set `process.exitCode` from the result.
 *
 * @returns A promise settled once the exit code is set.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): Promise<void> {
  const { mainFn = main, console: injectedConsole } = deps;
  const errorConsole = injectedConsole ?? console;

  setupBrokenPipeHandlers();
  const signals = setupSignalHandlers(deps, errorConsole);

  return mainFn()
    .then((result) => {
      process.exitCode = signals.code ?? result.exitCode;
    })
    .catch((error: unknown) => {
      const wrapped = new AppError(
        'UNEXPECTED_ERROR',
        error instanceof Error ? error.message : String(error),
        {
          cause: error,
          details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
        },
      );

      errorConsole.error('\n❌ Fatal error:', wrapped);
      process.exitCode = 1;
    })
    .finally(() => {
      signals.remove();
    });
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

// bin links point at this file; compare the resolved path
function resolveEntryUrl(file: string): string {
  try {
    return pathToFileURL(realpathSync(file)).href;
  } catch {
    return pathToFileURL(file).href;
  }
}

const entryUrl = process.argv[1] === undefined ? null : resolveEntryUrl(process.argv[1]);

if (entryUrl !== null && import.meta.url === entryUrl) {
  void runEntrypoint();
}
