/**
 * Shell command execution for the toolchain adapters.
 *
 * Commands run through the platform shell with their combined output
 * streamed into the job log. A timeout kills the whole process tree.
 */

import { spawn } from 'node:child_process';
import { Readable } from 'node:stream';

import { formatErrorMessage, ProcessError } from '../../../errors/errors.ts';
import { createLogger, type LogOptions } from '../../observability/logger.ts';

export interface CommandSpec {
  readonly command: string;
  readonly cwd: string;
  /** Variables layered over the current process environment. */
  readonly env?: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  readonly log: LogOptions;
  /** Kills the process tree when aborted. */
  readonly signal?: AbortSignal;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly durationMs: number;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

/**
 * Run a shell command, stream its output to the job log and wait for exit.
 *
 * @throws {ProcessError} `PROCESS_SPAWN_FAILED` or `PROCESS_TIMEOUT`.
 */
export async function runCommand(spec: CommandSpec): Promise<CommandResult> {
  const startedAt = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), spec.timeoutMs);
  const onExternalAbort = (): void => controller.abort();
  spec.signal?.addEventListener('abort', onExternalAbort, { once: true });
  if (spec.signal?.aborted === true) {
    controller.abort();
  }

  const proc = spawn(spec.command, {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: true,
    detached: process.platform !== 'win32',
    windowsHide: true,
  });

  const combined = new Readable({
    read(): void {
      // pushed from the child's stdout/stderr
    },
  });
  let combinedEnded = false;

  const endCombined = (): void => {
    if (combinedEnded) {
      return;
    }
    combinedEnded = true;
    combined.push(null);
  };

  const forward = (chunk: Buffer): void => {
    if (!combinedEnded) {
      combined.push(chunk);
    }
  };

  proc.stdout.on('data', forward);
  proc.stderr.on('data', forward);

  const logPromise: Promise<void> = (async () => {
    const logger = await createLogger({ ...spec.log, append: true });
    await logger(combined);
  })();
  // awaited below; avoid an unhandled rejection if the process fails first
  logPromise.catch(() => undefined);

  try {
    const exitCode = await new Promise<number>((resolve, reject) => {
      const onAbort = (): void => {
        endCombined();
        killProcessTree(proc);
        const message =
          spec.signal?.aborted === true ? 'Aborted' : `Timeout exceeded (${spec.timeoutMs}ms)`;
        reject(new ProcessError('PROCESS_TIMEOUT', message, { details: { command: spec.command } }));
      };

      proc.on('close', (code) => {
        controller.signal.removeEventListener('abort', onAbort);
        endCombined();
        resolve(code ?? 1);
      });

      proc.on('error', (err) => {
        controller.signal.removeEventListener('abort', onAbort);
        endCombined();
        reject(
          new ProcessError('PROCESS_SPAWN_FAILED', `Process spawn failed: ${err.message}`, {
            cause: err,
            details: { command: spec.command },
          }),
        );
      });

      if (controller.signal.aborted) {
        onAbort();
      } else {
        controller.signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    await logPromise;
    return { exitCode, durationMs: Date.now() - startedAt };
  } catch (error) {
    endCombined();
    await logPromise.catch((logError: unknown) => {
      process.stderr.write(`Failed to write ${spec.log.jobId} log: ${formatErrorMessage(logError)}\n`);
    });
    throw error;
  } finally {
    clearTimeout(timeout);
    spec.signal?.removeEventListener('abort', onExternalAbort);
  }
}

/**
 * Terminate a process tree, preferring SIGTERM before SIGKILL.
 */
export function killProcessTree(proc: ReturnType<typeof spawn>, graceful = true): void {
  const GRACEFUL_KILL_TIMEOUT_MS = 5000;
  const pid = proc.pid;
  /* v8 ignore next 3 */
  if (pid === undefined || pid === 0) {
    return;
  }

  const killSignal = (signal: NodeJS.Signals): void => {
    /* v8 ignore next 9 */
    if (process.platform === 'win32') {
      try {
        spawn(String.raw`C:\Windows\System32\taskkill.exe`, ['/pid', String(pid), '/T', '/F'], {
          stdio: 'ignore',
        });
      } catch {
        // fall through to proc.kill
      }
    } else {
      try {
        // negative pid targets the detached process group
        process.kill(-pid, signal);
      } catch {
        try {
          process.kill(pid, signal);
        } catch {
          // already gone
        }
      }
    }

    try {
      proc.kill(signal);
    } catch {
      // already gone
    }
  };

  if (graceful) {
    killSignal('SIGTERM');
    /* v8 ignore next */
    setTimeout(() => killSignal('SIGKILL'), GRACEFUL_KILL_TIMEOUT_MS).unref();
  } else {
    killSignal('SIGKILL');
  }
}
