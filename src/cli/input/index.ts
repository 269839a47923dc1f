/**
 * Input handling utilities: argument parsing and validation helpers.
 *
 * This barrel re-exports the CLI argument parser and validation helpers so
 * other layers import from a single stable path.
 */

export { type CLIArgs, DEFAULT_LOG_DIR, parseCliArgs } from './args.ts';
export { ensureSafeDirectoryPath, resolveCells } from './validation.ts';
