/**
 * Matrix: shared types for the environment descriptor.
 */

/** Operating system families the orchestrator knows how to schedule. */
export type OsFamily = 'linux' | 'windows' | 'macos';

/** Where a dependency is fetched from. */
export type DependencySourceKind = 'registry' | 'vcs-ref';

/**
 * A single optional dependency pinned for one matrix cell.
 */
export interface DependencyConstraint {
  readonly name: string;
  readonly sourceKind: DependencySourceKind;
  /** Comparator expression for `registry` (e.g. `==4.6.*`), ref name for `vcs-ref`. */
  readonly versionExpression: string;
}

/**
 * One expanded cell of the build matrix. Frozen after expansion.
 */
export interface MatrixCell {
  /** Stable slug derived from the axis values; unique within a run. */
  readonly id: string;
  /** Declaration-order position. */
  readonly index: number;
  /** Runner label, e.g. `ubuntu-latest`. */
  readonly os: string;
  readonly osFamily: OsFamily;
  readonly runtimeVersion: string;
  readonly dependencySpecs: readonly DependencyConstraint[];
}

/**
 * One explicit matrix entry. Dependency values use the expression syntax
 * understood by `parseDependencyExpression` (empty string = not installed).
 */
export interface MatrixEntry {
  readonly os: string;
  readonly runtime: string;
  readonly dependencies?: Readonly<Record<string, string>>;
}

/** Entry used to remove combinations from the axis product. */
export interface MatrixExclusion {
  readonly os?: string;
  readonly runtime?: string;
  readonly dependencies?: Readonly<Record<string, string>>;
}

export interface MatrixAxes {
  readonly os: readonly string[];
  readonly runtime: readonly string[];
  readonly dependencies?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Static matrix declaration. `axes` expands to a cartesian product, `exclude`
 * removes combinations from that product, `include` appends explicit entries.
 */
export interface MatrixDefinition {
  readonly axes?: MatrixAxes;
  readonly exclude?: readonly MatrixExclusion[];
  readonly include?: readonly MatrixEntry[];
}
