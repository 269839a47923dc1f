import { expect } from 'vitest';

import type { CLIArgs } from '../../cli/input/args.ts';

export const DEFAULT_ARGS: CLIArgs = {
  logDir: './logs',
  skipDocs: false,
  docsOnly: false,
  list: false,
  help: false,
  version: false,
  verbose: false,
  structuredLogs: false,
};

export function expectDefaultArgs(args: CLIArgs): void {
  expect(args).toEqual(DEFAULT_ARGS);
}

export function expectParsedFlags(args: CLIArgs, expected: Partial<CLIArgs>): void {
  expect(args).toEqual({ ...DEFAULT_ARGS, ...expected });
}
