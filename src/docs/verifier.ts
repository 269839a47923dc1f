/**
 * Documentation Verifier.
 *
 * Builds the documentation once, then runs every snippet check one after
 * another in declaration order. A failing snippet is recorded and the next
 * one still runs; a failing build means no snippet runs at all.
 */

import { formatErrorMessage } from '../errors/errors.ts';
import type {
  BuiltTree,
  DocumentationBuilder,
  SnippetCheck,
  SnippetResult,
  VerificationHooks,
  VerificationResult,
} from './types.ts';

export async function verifyDocumentation(
  builder: DocumentationBuilder,
  checks: readonly SnippetCheck[],
  hooks: VerificationHooks = {},
): Promise<VerificationResult> {
  const now = hooks.now ?? Date.now;

  hooks.onBuildStart?.();
  let tree: BuiltTree;
  try {
    tree = await builder.build();
  } catch (error) {
    const buildError = formatErrorMessage(error);
    hooks.onBuildEnd?.(false, buildError);
    return { docBuildOk: false, buildError, snippetResults: [] };
  }
  hooks.onBuildEnd?.(true);

  const snippetResults: SnippetResult[] = [];
  for (const check of checks) {
    hooks.onSnippetStart?.(check.name);
    const startedAt = now();
    let result: SnippetResult;
    try {
      const outcome = await check.run(tree);
      result = {
        name: check.name,
        status: outcome.ok ? 'pass' : 'fail',
        ...(outcome.ok || outcome.error === undefined ? {} : { error: outcome.error }),
        durationMs: now() - startedAt,
      };
    } catch (error) {
      result = {
        name: check.name,
        status: 'fail',
        error: formatErrorMessage(error),
        durationMs: now() - startedAt,
      };
    }
    snippetResults.push(result);
    hooks.onSnippetResult?.(result);
  }

  return { docBuildOk: true, snippetResults };
}

/** True when the build passed and every snippet passed. */
export function isVerificationSuccessful(result: VerificationResult): boolean {
  return result.docBuildOk && result.snippetResults.every((r) => r.status === 'pass');
}
