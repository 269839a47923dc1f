/**
 * Documentation Verifier: Public API Surface
 */

export { isVerificationSuccessful, verifyDocumentation } from './verifier.ts';
export type {
  BuiltTree,
  DocumentationBuilder,
  SnippetCheck,
  SnippetCheckOutcome,
  SnippetResult,
  SnippetStatus,
  VerificationHooks,
  VerificationResult,
} from './types.ts';
