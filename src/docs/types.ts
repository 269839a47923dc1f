/**
 * Documentation Verifier: collaborator contracts and result types.
 */

/** Output of a successful documentation build. */
export interface BuiltTree {
  /** Directory the build ran in. */
  readonly root: string;
}

export interface DocumentationBuilder {
  /** @throws {BuildError} when the build fails. */
  build(): Promise<BuiltTree>;
}

export interface SnippetCheckOutcome {
  readonly ok: boolean;
  readonly error?: string;
}

export interface SnippetCheck {
  readonly name: string;
  run(tree: BuiltTree): Promise<SnippetCheckOutcome>;
}

export type SnippetStatus = 'pass' | 'fail';

export interface SnippetResult {
  readonly name: string;
  readonly status: SnippetStatus;
  readonly error?: string;
  readonly durationMs: number;
}

export interface VerificationResult {
  readonly docBuildOk: boolean;
  readonly buildError?: string;
  readonly snippetResults: readonly SnippetResult[];
}

export interface VerificationHooks {
  readonly onBuildStart?: () => void;
  readonly onBuildEnd?: (ok: boolean, error?: string) => void;
  readonly onSnippetStart?: (name: string) => void;
  readonly onSnippetResult?: (result: SnippetResult) => void;
  readonly now?: () => number;
}
