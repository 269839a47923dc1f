/**
 * Tests for the help formatter's escaping and message assembly.
 */

import { describe, expect, it } from 'vitest';

import { KNOWN_PLACEHOLDERS } from '../../modules/command-template/command-template.ts';
import { escapeHelpToken, showHelp, wrapTokens } from './formatter.ts';

describe('help formatter', () => {
  it('escapeHelpToken removes control chars and emoji', () => {
    expect(escapeHelpToken('ok')).toBe('ok');
    expect(escapeHelpToken('bad\nid')).toBe('badid');
    expect(escapeHelpToken('weird💥')).toBe('weird');
  });

  it('wrapTokens joins tokens and breaks at the width', () => {
    expect(wrapTokens(['{a}', '{bb}', '{c}'], 0, 8)).toBe('{a},\n{bb},\n{c}');
    expect(wrapTokens(['{a}', '{bb}', '{c}'], 0, 10)).toBe('{a}, {bb},\n{c}');
    expect(wrapTokens(['{a}', '{bb}', '{c}'], 2, 12)).toBe('{a}, {bb},\n  {c}');
    expect(wrapTokens([])).toBe('');
  });

  it('showHelp lists the given placeholders in the description column', () => {
    const help = showHelp(['python', 'runtime']);

    expect(help).toContain(`TEMPLATE PLACEHOLDERS:\n${' '.repeat(24)}{python}, {runtime}\n`);
  });

  it('showHelp sanitizes placeholder names', () => {
    expect(showHelp(['bad\nid'])).toContain('{badid}');
  });

  it('lists every known placeholder by default', () => {
    const help = showHelp();

    for (const name of KNOWN_PLACEHOLDERS) {
      expect(help).toContain(`{${name}}`);
    }
    expect(help.split('\n').every((line) => line.length <= 80)).toBe(true);
  });

  it('documents the flags the parser accepts', () => {
    const help = showHelp();

    for (const flag of ['--config', '--log-dir', '--report', '--cells', '--concurrency', '--skip-docs', '--docs-only', '--list']) {
      expect(help).toContain(flag);
    }
    expect(help).toContain('matrix-ci.yml');
  });

  it('HELP_MESSAGE template remains immutable across calls', () => {
    expect(showHelp()).toBe(showHelp());
  });
});
