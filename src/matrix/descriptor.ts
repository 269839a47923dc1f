/**
 * Matrix: Environment Descriptor
 *
 * Expands a static matrix declaration into an ordered list of cells.
 *
 * Guarantees:
 *   - Pure: no I/O, no hidden state
 *   - Deterministic declaration order (axis product first, then includes)
 *   - Unique axis tuples; duplicates are a ConfigError
 *   - Cells and their dependency lists are frozen
 */

import { ConfigError } from '../errors/errors.ts';
import { parseDependencyExpression } from './dependency-spec.ts';
import type {
  DependencyConstraint,
  MatrixAxes,
  MatrixCell,
  MatrixDefinition,
  MatrixEntry,
  MatrixExclusion,
  OsFamily,
} from './types.ts';

const OS_FAMILY_PREFIXES: ReadonlyArray<readonly [string, OsFamily]> = [
  ['ubuntu', 'linux'],
  ['linux', 'linux'],
  ['debian', 'linux'],
  ['windows', 'windows'],
  ['macos', 'macos'],
  ['osx', 'macos'],
];

const OPERATOR_SLUGS: Readonly<Record<string, string>> = {
  '===': '',
  '==': '',
  '!=': 'ne',
  '~=': 'compat',
  '>=': 'ge',
  '<=': 'le',
  '>': 'gt',
  '<': 'lt',
};

/**
 * Resolve the OS family for a runner label such as `macOS-latest`.
 *
 * @throws {ConfigError} when the label does not name a known family.
 */
export function resolveOsFamily(os: string): OsFamily {
  const label = os.trim().toLowerCase();
  const match = OS_FAMILY_PREFIXES.find(([prefix]) => label.startsWith(prefix));
  if (!match) {
    throw new ConfigError('CONFIG_INVALID', `Unknown operating system: "${os}"`, {
      details: { os },
    });
  }
  return match[1];
}

/**
 * Identity of a cell: its axis values. Dependency order does not matter.
 */
export function cellKey(
  cell: Pick<MatrixCell, 'os' | 'runtimeVersion' | 'dependencySpecs'>,
): string {
  const deps = [...cell.dependencySpecs]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((d) => [d.name, d.sourceKind, d.versionExpression]);
  return JSON.stringify([cell.os.toLowerCase(), cell.runtimeVersion, deps]);
}

function versionSlug(expression: string): string {
  return expression
    .split(',')
    .map((clause) => {
      const match = /^(===|==|!=|~=|>=|<=|>|<)(.*)$/.exec(clause);
      const operator = match?.[1] ?? '';
      const version = (match?.[2] ?? clause).replaceAll('*', 'x');
      return `${OPERATOR_SLUGS[operator] ?? ''}${version}`;
    })
    .join('-');
}

function dependencySlug(constraint: DependencyConstraint): string {
  return constraint.sourceKind === 'vcs-ref'
    ? `${constraint.name}-${constraint.versionExpression}`
    : `${constraint.name}-${versionSlug(constraint.versionExpression)}`;
}

function cellSlug(os: string, runtime: string, deps: readonly DependencyConstraint[]): string {
  return [os, runtime, ...deps.map(dependencySlug)]
    .join('-')
    .replaceAll(/[^A-Za-z0-9._-]+/g, '-')
    .replaceAll(/-{2,}/g, '-');
}

function assertNonEmpty(values: readonly unknown[], axis: string): void {
  if (values.length === 0) {
    throw new ConfigError('CONFIG_INVALID', `Matrix axis "${axis}" declares no values`, {
      details: { axis },
    });
  }
}

function matchesExclusion(entry: MatrixEntry, exclusion: MatrixExclusion): boolean {
  if (exclusion.os !== undefined && exclusion.os.toLowerCase() !== entry.os.toLowerCase()) {
    return false;
  }
  if (exclusion.runtime !== undefined && exclusion.runtime !== entry.runtime) {
    return false;
  }
  for (const [name, expression] of Object.entries(exclusion.dependencies ?? {})) {
    if ((entry.dependencies?.[name] ?? '').trim() !== expression.trim()) {
      return false;
    }
  }
  return true;
}

/**
 * Cartesian product of the declared axes: os outermost, then runtime, then
 * each dependency axis in declared key order.
 */
function expandAxes(axes: MatrixAxes): MatrixEntry[] {
  assertNonEmpty(axes.os, 'os');
  assertNonEmpty(axes.runtime, 'runtime');

  let dependencyCombos: Array<Record<string, string>> = [{}];
  for (const [name, values] of Object.entries(axes.dependencies ?? {})) {
    assertNonEmpty(values, `dependencies.${name}`);
    dependencyCombos = dependencyCombos.flatMap((combo) =>
      values.map((value) => ({ ...combo, [name]: value })),
    );
  }

  const entries: MatrixEntry[] = [];
  for (const os of axes.os) {
    for (const runtime of axes.runtime) {
      for (const dependencies of dependencyCombos) {
        entries.push({ os, runtime, dependencies });
      }
    }
  }
  return entries;
}

function toCell(entry: MatrixEntry, index: number): Omit<MatrixCell, 'id'> {
  const os = entry.os.trim().toLowerCase();
  const runtimeVersion = entry.runtime.trim();
  if (os.length === 0 || runtimeVersion.length === 0) {
    throw new ConfigError(
      'CONFIG_INVALID',
      `Matrix entry ${index + 1} must declare both os and runtime`,
      { details: { index } },
    );
  }

  const dependencySpecs = Object.entries(entry.dependencies ?? {})
    .map(([name, expression]) => parseDependencyExpression(name, expression))
    .filter((constraint): constraint is DependencyConstraint => constraint !== null)
    .map((constraint) => Object.freeze(constraint));

  return {
    index,
    os,
    osFamily: resolveOsFamily(os),
    runtimeVersion,
    dependencySpecs: Object.freeze(dependencySpecs),
  };
}

/**
 * Expand a matrix declaration into its cells.
 *
 * @throws {ConfigError} for an empty matrix, empty axes, unknown operating
 *   systems, malformed dependency expressions, or duplicate axis tuples.
 */
export function expandMatrix(definition: MatrixDefinition): readonly MatrixCell[] {
  if (definition.exclude !== undefined && definition.exclude.length > 0 && !definition.axes) {
    throw new ConfigError('CONFIG_INVALID', 'Matrix "exclude" requires "axes"');
  }

  const product = definition.axes ? expandAxes(definition.axes) : [];
  const exclusions = definition.exclude ?? [];
  const entries = [
    ...product.filter((entry) => !exclusions.some((ex) => matchesExclusion(entry, ex))),
    ...(definition.include ?? []),
  ];

  if (entries.length === 0) {
    throw new ConfigError('CONFIG_INVALID', 'Matrix declares no cells');
  }

  const positions = new Map<string, number>();
  const usedIds = new Set<string>();

  const cells = entries.map((entry, index): MatrixCell => {
    const cell = toCell(entry, index);
    const key = cellKey(cell);
    const previous = positions.get(key);
    if (previous !== undefined) {
      throw new ConfigError(
        'CONFIG_DUPLICATE_CELL',
        `Matrix entry ${index + 1} duplicates entry ${previous + 1} (${cell.os}, runtime ${cell.runtimeVersion})`,
        { details: { index, duplicateOf: previous } },
      );
    }
    positions.set(key, index);

    const slug = cellSlug(cell.os, cell.runtimeVersion, cell.dependencySpecs);
    const id = usedIds.has(slug) ? `${slug}-${index + 1}` : slug;
    usedIds.add(id);

    return Object.freeze({ id, ...cell });
  });

  return Object.freeze(cells);
}
