/**
 * Tests for the documentation verifier.
 */

import { describe, expect, it } from 'vitest';

import { BuildError } from '../errors/errors.ts';
import type { DocumentationBuilder, SnippetCheck } from './types.ts';
import { isVerificationSuccessful, verifyDocumentation } from './verifier.ts';

const BUILDER: DocumentationBuilder = {
  build: () => Promise.resolve({ root: '/docs' }),
};

function check(name: string, ok: boolean, log: string[], error?: string): SnippetCheck {
  return {
    name,
    run: (tree) => {
      log.push(`${name}@${tree.root}`);
      return Promise.resolve(error === undefined ? { ok } : { ok, error });
    },
  };
}

describe('verifyDocumentation', () => {
  it('runs every snippet in order after a successful build', async () => {
    const log: string[] = [];

    const result = await verifyDocumentation(BUILDER, [
      check('doctest', true, log),
      check('user-guide', true, log),
    ], { now: () => 0 });

    expect(log).toEqual(['doctest@/docs', 'user-guide@/docs']);
    expect(result).toEqual({
      docBuildOk: true,
      snippetResults: [
        { name: 'doctest', status: 'pass', durationMs: 0 },
        { name: 'user-guide', status: 'pass', durationMs: 0 },
      ],
    });
    expect(isVerificationSuccessful(result)).toBe(true);
  });

  it('keeps running after a failing snippet', async () => {
    const log: string[] = [];

    const result = await verifyDocumentation(BUILDER, [
      check('first', false, log, 'exit code 1'),
      check('second', true, log),
      {
        name: 'third',
        run: () => Promise.reject(new Error('spawn failed')),
      },
    ], { now: () => 0 });

    expect(log).toEqual(['first@/docs', 'second@/docs']);
    expect(result.snippetResults).toEqual([
      { name: 'first', status: 'fail', error: 'exit code 1', durationMs: 0 },
      { name: 'second', status: 'pass', durationMs: 0 },
      { name: 'third', status: 'fail', error: 'spawn failed', durationMs: 0 },
    ]);
    expect(isVerificationSuccessful(result)).toBe(false);
  });

  it('runs no snippets when the build fails', async () => {
    const log: string[] = [];
    const builds: string[] = [];
    const failing: DocumentationBuilder = {
      build: () => Promise.reject(new BuildError('DOC_BUILD_FAILED', 'make html exited 2')),
    };

    const result = await verifyDocumentation(failing, [check('doctest', true, log)], {
      onBuildEnd: (ok, error) => builds.push(`${ok}:${error ?? ''}`),
    });

    expect(log).toEqual([]);
    expect(builds).toEqual(['false:DOC_BUILD_FAILED: make html exited 2']);
    expect(result).toEqual({
      docBuildOk: false,
      buildError: 'DOC_BUILD_FAILED: make html exited 2',
      snippetResults: [],
    });
  });

  it('reports progress through hooks', async () => {
    const events: string[] = [];

    await verifyDocumentation(BUILDER, [check('doctest', true, [])], {
      onBuildStart: () => events.push('build'),
      onBuildEnd: (ok) => events.push(`built:${ok}`),
      onSnippetStart: (name) => events.push(`start:${name}`),
      onSnippetResult: (r) => events.push(`done:${r.name}:${r.status}`),
    });

    expect(events).toEqual(['build', 'built:true', 'start:doctest', 'done:doctest:pass']);
  });
});
