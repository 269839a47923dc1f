/**
 * Command templates.
 *
 * Configured commands are shell strings with `{placeholder}` slots. Values
 * are quoted for the host shell when substituted; a list value expands to
 * several quoted words and an empty value to nothing.
 */

import { ConfigError } from '../../../errors/errors.ts';

export type PlaceholderValue = string | readonly string[];
export type PlaceholderValues = Readonly<Record<string, PlaceholderValue>>;

/** Every placeholder a configured command may use. */
export const KNOWN_PLACEHOLDERS = [
  'python',
  'runtime',
  'os',
  'envDir',
  'workDir',
  'cellId',
  'requirement',
  'suite',
  'coverageTarget',
  'strictMarkersFlag',
  'artifactPath',
  'reportLogPath',
  'file',
  'projectDir',
] as const;

export type Placeholder = (typeof KNOWN_PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = /\{([A-Za-z][A-Za-z0-9]*)\}/g;
const POSIX_SAFE = /^[\w\-.,:/@%+=]+$/;
const WINDOWS_SAFE = /^[\w\-.,:/\\@%+=]+$/;

/**
 * Quote one word for the platform's shell (`sh` or `cmd.exe`).
 */
export function quoteArg(value: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return WINDOWS_SAFE.test(value) ? value : `"${value.replaceAll('"', '\\"')}"`;
  }
  return POSIX_SAFE.test(value) ? value : `'${value.replaceAll("'", String.raw`'\''`)}'`;
}

/** Placeholder names used by a template, in order of first use. */
export function listPlaceholders(template: string): string[] {
  const names = [...template.matchAll(PLACEHOLDER_PATTERN)].map((m) => m[1] ?? '');
  return [...new Set(names)];
}

function isKnownPlaceholder(name: string): name is Placeholder {
  return KNOWN_PLACEHOLDERS.some((known) => known === name);
}

/**
 * Reject templates that use placeholders no command can supply.
 *
 * @param context - Configuration path of the template, used in the message.
 */
export function assertKnownPlaceholders(template: string, context: string): void {
  const unknown = listPlaceholders(template).filter((name) => !isKnownPlaceholder(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      'CONFIG_UNKNOWN_PLACEHOLDER',
      `Unknown placeholder ${unknown.map((n) => `{${n}}`).join(', ')} in ${context}`,
      { details: { context, unknown } },
    );
  }
}

/**
 * Substitute placeholder values into a template.
 *
 * @throws {ConfigError} `CONFIG_UNKNOWN_PLACEHOLDER` when the template uses a
 *   placeholder that has no value here.
 */
export function renderCommand(
  template: string,
  values: PlaceholderValues,
  context: string,
  platform: NodeJS.Platform = process.platform,
): string {
  return template.replaceAll(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = Object.hasOwn(values, name) ? values[name] : undefined;
    if (value === undefined) {
      throw new ConfigError(
        'CONFIG_UNKNOWN_PLACEHOLDER',
        `Placeholder {${name}} is not available in ${context}`,
        { details: { context, placeholder: name } },
      );
    }
    const words = typeof value === 'string' ? [value] : value;
    return words
      .filter((word) => word.length > 0)
      .map((word) => quoteArg(word, platform))
      .join(' ');
  });
}
