/**
 * Matrix: Public API Surface
 *
 * Static matrix declarations and their deterministic expansion into cells.
 */

export { cellKey, expandMatrix, resolveOsFamily } from './descriptor.ts';
export {
  describeConstraint,
  formatRegistryRequirement,
  formatVcsRequirement,
  parseDependencyExpression,
} from './dependency-spec.ts';
export type {
  DependencyConstraint,
  DependencySourceKind,
  MatrixAxes,
  MatrixCell,
  MatrixDefinition,
  MatrixEntry,
  MatrixExclusion,
  OsFamily,
} from './types.ts';
