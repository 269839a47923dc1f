/**
 * matrix-ci: Help Text Formatter
 *
 * Role:
 *   Format and display help information, including the placeholders command
 *   templates in the configuration file may use.
 */

import { DEFAULT_LOG_DIR } from '../../input/args.ts';
import { DEFAULT_CONFIG_FILENAME, DEFAULT_REPORT_FILENAME } from '../../constants/paths.ts';
import { KNOWN_PLACEHOLDERS } from '../../modules/command-template/command-template.ts';

/** Column the option descriptions start at. */
const DESCRIPTION_INDENT = 24;
const LINE_WIDTH = 80;

/**
 * Sanitize a token for inclusion in help output.
 *
 * Removes non-printable or non-ASCII characters to avoid control
 * characters or terminal escape sequences in the help text.
 */
export const escapeHelpToken = (value: string): string =>
  value.replaceAll(/[^ -~]/g, '');

/**
 * Join tokens with `, ` and wrap them to the help text's description column.
 */
export function wrapTokens(tokens: readonly string[], indent = DESCRIPTION_INDENT, width = LINE_WIDTH): string {
  const lines: string[] = [];
  let current = '';
  for (const [i, token] of tokens.entries()) {
    const piece = i < tokens.length - 1 ? `${token},` : token;
    if (current !== '' && indent + current.length + 1 + piece.length > width) {
      lines.push(current);
      current = piece;
    } else {
      current = current === '' ? piece : `${current} ${piece}`;
    }
  }
  if (current !== '') {
    lines.push(current);
  }
  return lines.join(`\n${' '.repeat(indent)}`);
}

/**
 * Static help message template. `[PLACEHOLDERS]` is replaced at runtime by
 * `showHelp()`.
 */
const HELP_MESSAGE = `
matrix-ci: matrix build and test orchestrator

USAGE:
  matrix-ci [OPTIONS]

OPTIONS:
  -c, --config <path>   Configuration file (default: ./${DEFAULT_CONFIG_FILENAME})
  --log-dir <path>      Directory for log files (default: ${DEFAULT_LOG_DIR})
  --report <path>       Run report file (default: <log-dir>/${DEFAULT_REPORT_FILENAME})
  --cells <patterns>    Comma-separated cell id globs; repeatable
  -j, --concurrency <n> Cells run at once (default: CPU cores - 1)
  --skip-docs           Do not verify the documentation
  --docs-only           Verify the documentation without running the matrix
  --list                Print the matrix cells and exit
  --structured-logs     Write JSON-lines log records
  --verbose             Enable verbose logging (alias: --debug)
  -h, --help            Show this help message
  -v, --version         Show version number

TEMPLATE PLACEHOLDERS:
                        [PLACEHOLDERS]

EXIT CODES:
  0    every cell, the coverage merge and the documentation passed
  1    something failed; the report lists each failure
  2    invalid command-line usage
  130  interrupted (SIGINT); 143 terminated (SIGTERM)

EXAMPLES:
  matrix-ci
  matrix-ci --list
  matrix-ci --cells 'ubuntu-*' --skip-docs
  matrix-ci --config ci/matrix.yml --log-dir ./build/matrix-logs
`;

/**
 * Build the help message.
 *
 * @param placeholders - Placeholder names to list (default: every known one).
 */
export function showHelp(placeholders: readonly string[] = KNOWN_PLACEHOLDERS): string {
  const tokens = placeholders.map((name) => `{${escapeHelpToken(name)}}`);
  return HELP_MESSAGE.replace('[PLACEHOLDERS]', wrapTokens(tokens));
}
