/**
 * CLI main.
 *
 * Parses argv, answers `--help` and `--version`, and otherwise delegates to
 * `executeWithArgs`. Usage errors are reported here so they never surface as
 * fatal errors.
 */

import { CliError, formatErrorMessage } from '../../../errors/errors.ts';
import { executeWithArgs, type MainDeps, type MainResult } from '../../execution/execution.ts';
import { parseCliArgs, type CLIArgs } from '../../input/args.ts';
import { showHelp } from '../help/formatter.ts';
import { showVersion } from '../help/help.ts';

/** Exit code for invalid command-line usage. */
export const USAGE_EXIT_CODE = 2;

export interface MainOptions extends MainDeps {
  /** Arguments without the node binary and script (default: `process.argv.slice(2)`). */
  readonly argv?: readonly string[];
  readonly executeFn?: typeof executeWithArgs;
}

export async function main(options: MainOptions = {}): Promise<MainResult> {
  const { argv = process.argv.slice(2), executeFn = executeWithArgs, ...deps } = options;
  const out = deps.console ?? console;

  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliError) {
      out.error(`❌ ${formatErrorMessage(error)}\nRun with --help for usage.`);
      return { exitCode: USAGE_EXIT_CODE };
    }
    throw error;
  }

  // Handle help and version early
  if (args.help) {
    out.log(showHelp());
    return { exitCode: 0 };
  }

  if (args.version) {
    out.log(showVersion());
    return { exitCode: 0 };
  }

  return executeFn(args, deps);
}
