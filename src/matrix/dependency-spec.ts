/**
 * Matrix: dependency expressions.
 *
 * A matrix entry declares each optional dependency as one string:
 *
 *   ''            not installed in this cell
 *   '@dev.major'  built from the `dev.major` ref of the dependency's repository
 *   '==4.6.*'     published release matching the comparator expression
 *   '4.6'         shorthand for '==4.6'
 */

import { ConfigError } from '../errors/errors.ts';
import type { DependencyConstraint } from './types.ts';

const VCS_PREFIX = '@';
const COMPARATOR_CLAUSE = /^(===|==|!=|~=|>=|<=|>|<)\s*[\w.*+!-]+$/;
const BARE_VERSION = /^\d[\w.*+!-]*$/;
const DEPENDENCY_NAME = /^[A-Za-z0-9][\w.-]*$/;

/**
 * Parse a declared dependency expression.
 *
 * @returns The constraint, or `null` when the dependency is not installed.
 * @throws {ConfigError} when the name or expression is malformed.
 */
export function parseDependencyExpression(
  name: string,
  expression: string,
): DependencyConstraint | null {
  if (!DEPENDENCY_NAME.test(name)) {
    throw new ConfigError('CONFIG_INVALID', `Invalid dependency name: "${name}"`, {
      details: { name },
    });
  }

  const trimmed = expression.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (trimmed.startsWith(VCS_PREFIX)) {
    const ref = trimmed.slice(VCS_PREFIX.length).trim();
    if (ref.length === 0 || /\s/.test(ref)) {
      throw new ConfigError('CONFIG_INVALID', `Invalid ref for ${name}: "${expression}"`, {
        details: { name, expression },
      });
    }
    return { name, sourceKind: 'vcs-ref', versionExpression: ref };
  }

  if (BARE_VERSION.test(trimmed)) {
    return { name, sourceKind: 'registry', versionExpression: `==${trimmed}` };
  }

  const clauses = trimmed.split(',').map((clause) => clause.trim());
  if (clauses.some((clause) => !COMPARATOR_CLAUSE.test(clause))) {
    throw new ConfigError(
      'CONFIG_INVALID',
      `Invalid version expression for ${name}: "${expression}"`,
      { details: { name, expression } },
    );
  }

  return { name, sourceKind: 'registry', versionExpression: clauses.join(',') };
}

/**
 * Render the requirement string handed to a registry installer, e.g. `qutip==4.6.*`.
 */
export function formatRegistryRequirement(constraint: DependencyConstraint): string {
  return `${constraint.name}${constraint.versionExpression}`;
}

/**
 * Render a version-control requirement, e.g. `git+https://host/repo.git@dev.major`.
 */
export function formatVcsRequirement(constraint: DependencyConstraint, repository: string): string {
  const base = repository.startsWith('git+') ? repository : `git+${repository}`;
  return `${base}@${constraint.versionExpression}`;
}

/**
 * Human-readable form used in logs and cell ids.
 */
export function describeConstraint(constraint: DependencyConstraint): string {
  return constraint.sourceKind === 'vcs-ref'
    ? `${constraint.name}@${constraint.versionExpression}`
    : formatRegistryRequirement(constraint);
}
