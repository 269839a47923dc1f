/**
 * CLI argument parsing.
 *
 * Turns raw argv into a typed `CLIArgs` and maps `parseArgs` failures onto
 * `CliError` codes the entrypoint knows how to report.
 */

import { parseArgs } from 'node:util';

import { CliError, hasErrorProperty } from '../../errors/errors.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

export interface CLIArgs {
  /** Explicit configuration file; the default file is looked up otherwise. */
  readonly configPath?: string;
  readonly logDir: string;
  readonly reportPath?: string;
  /** Glob patterns selecting cells by id. */
  readonly cells?: readonly string[];
  readonly concurrency?: number;
  readonly skipDocs: boolean;
  readonly docsOnly: boolean;
  readonly list: boolean;
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
  readonly structuredLogs: boolean;
}

export const DEFAULT_LOG_DIR = './logs';

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @param argv - Raw arguments (defaults to `process.argv.slice(2)`).
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  const sanitizedArgv = argv.filter((arg): arg is string => typeof arg === 'string');

  try {
    const { values, positionals } = parseArgs({
      args: sanitizedArgv,
      strict: true,
      allowPositionals: true,
      options: {
        config: { type: 'string', short: 'c' },
        'log-dir': { type: 'string', default: DEFAULT_LOG_DIR },
        report: { type: 'string' },
        cells: { type: 'string', multiple: true },
        concurrency: { type: 'string', short: 'j' },
        'skip-docs': { type: 'boolean', default: false },
        'docs-only': { type: 'boolean', default: false },
        list: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        verbose: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        'structured-logs': { type: 'boolean', default: false },
      },
    });

    return normalizeCliArgs(values, positionals);
  } catch (error) {
    throw mapParseArgsError(error);
  }
}

interface RawCliValues {
  readonly config?: string;
  readonly 'log-dir'?: string;
  readonly report?: string;
  readonly cells?: readonly string[];
  readonly concurrency?: string;
  readonly 'skip-docs'?: boolean;
  readonly 'docs-only'?: boolean;
  readonly list?: boolean;
  readonly help?: boolean;
  readonly version?: boolean;
  readonly verbose?: boolean;
  readonly debug?: boolean;
  readonly 'structured-logs'?: boolean;
}

function requirePath(value: string | undefined, flag: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value.trim().length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `${flag} requires a path`);
  }
  return value;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(count) || count < 1) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `--concurrency must be a positive integer, got "${value}"`,
    );
  }
  return count;
}

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  if (positionals.length > 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}`);
  }

  const logDir = requirePath(values['log-dir'], '--log-dir') ?? DEFAULT_LOG_DIR;
  const configPath = requirePath(values.config, '--config');
  const reportPath = requirePath(values.report, '--report');
  const concurrency = parseConcurrency(values.concurrency);

  const cells = values.cells
    ?.flatMap((entry) => entry.split(',').map((id) => id.trim()))
    .filter((id) => id.length > 0);

  if (values.cells !== undefined && (!cells || cells.length === 0)) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--cells requires at least one pattern');
  }

  const skipDocs = values['skip-docs'] === true;
  const docsOnly = values['docs-only'] === true;
  if (skipDocs && docsOnly) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--skip-docs and --docs-only cannot be combined');
  }

  return {
    ...(configPath === undefined ? {} : { configPath }),
    logDir,
    ...(reportPath === undefined ? {} : { reportPath }),
    ...(cells && cells.length > 0 ? { cells } : {}),
    ...(concurrency === undefined ? {} : { concurrency }),
    skipDocs,
    docsOnly,
    list: values.list === true,
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true || values.debug === true,
    structuredLogs: values['structured-logs'] === true,
  };
}

const VALUE_FLAGS: Readonly<Record<string, string>> = {
  '--config': '--config requires a path',
  '--log-dir': '--log-dir requires a path',
  '--report': '--report requires a path',
  '--cells': '--cells requires at least one pattern',
  '--concurrency': '--concurrency must be a positive integer',
};

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof Error && hasErrorProperty(error, 'code')) {
    if (error.code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      const option = /'(-{1,2}[\w-]+)/.exec(error.message)?.[1];
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    const flag = /(--[\w-]+)/.exec(error.message)?.[1];
    if (error.code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE' && flag !== undefined) {
      const message = VALUE_FLAGS[flag];
      if (message !== undefined) {
        return new CliError('CLI_INVALID_ARGUMENT', message, { cause: error });
      }
    }
  }

  if (error instanceof Error) {
    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }
  return new CliError('CLI_PARSE_ERROR', String(error));
}
