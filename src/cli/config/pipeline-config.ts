/**
 * Pipeline configuration.
 *
 * The orchestrator is driven by one YAML file (`matrix-ci.yml` by default)
 * declaring the project, how environments are provisioned, how dependencies
 * and the project are installed, the matrix itself, and the test, coverage
 * and documentation steps. Unknown keys are rejected so a typo never turns
 * into a silently ignored setting.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { ConfigError, hasErrorProperty } from '../../errors/errors.ts';
import { expandMatrix } from '../../matrix/descriptor.ts';
import type { MatrixCell, OsFamily } from '../../matrix/types.ts';
import { DEFAULT_CONFIG_FILENAME } from '../constants/paths.ts';
import { DEFAULT_OBSERVATION_WINDOW_MS, DEFAULT_STEP_TIMEOUT_MS } from '../constants/time.ts';
import { assertKnownPlaceholders } from '../modules/command-template/command-template.ts';

/* -------------------------------------------------------------------------- */
/* Schema                                                                      */
/* -------------------------------------------------------------------------- */

// YAML reads an unquoted 3.10 as the number 3.1, so versions must be quoted.
const versionString = z.string({
  invalid_type_error: 'must be a quoted string, e.g. "3.10"',
});

const dependencyValues = z.record(versionString);

const positiveInt = z.number().int().positive();

const ProjectSchema = z
  .object({
    name: z.string().min(1),
    directory: z.string().min(1).default('.'),
    install: z.string().min(1).default('{python} -m pip install -e {projectDir}'),
  })
  .strict();

const ProvisionCommands = z
  .object({
    linux: z.string().min(1).optional(),
    windows: z.string().min(1).optional(),
    macos: z.string().min(1).optional(),
  })
  .strict();

const EnvironmentSchema = z
  .object({
    workRoot: z.string().min(1).default('.matrix-ci'),
    provision: z.union([z.string().min(1), ProvisionCommands]),
    provisionTimeoutMs: positiveInt.optional(),
    keep: z.boolean().default(false),
    foreignOs: z.enum(['skip', 'fail']).default('skip'),
  })
  .strict();

const DependencySourceSchema = z
  .object({
    repository: z.string().min(1).optional(),
    buildRequirements: z.array(z.string().min(1)).default([]),
  })
  .strict();

const InstallSchema = z
  .object({
    registry: z.string().min(1).default('{python} -m pip install {requirement}'),
    vcs: z.string().min(1).default('{python} -m pip install {requirement}'),
  })
  .strict();

const MatrixEntrySchema = z
  .object({
    os: z.string().min(1),
    runtime: versionString,
    dependencies: dependencyValues.optional(),
  })
  .strict();

const MatrixExclusionSchema = z
  .object({
    os: z.string().optional(),
    runtime: versionString.optional(),
    dependencies: dependencyValues.optional(),
  })
  .strict();

const MatrixSchema = z
  .object({
    axes: z
      .object({
        os: z.array(z.string().min(1)).min(1),
        runtime: z.array(versionString).min(1),
        dependencies: z.record(z.array(versionString).min(1)).optional(),
      })
      .strict()
      .optional(),
    exclude: z.array(MatrixExclusionSchema).optional(),
    include: z.array(MatrixEntrySchema).optional(),
  })
  .strict();

const TestSchema = z
  .object({
    suite: z.string().min(1).default('tests'),
    command: z
      .string()
      .min(1)
      .default(
        '{python} -m pytest {suite} {strictMarkersFlag} --cov={coverageTarget} --cov-report=json:{artifactPath}',
      ),
    strictMarkers: z.boolean().default(true),
    strictMarkersFlag: z.string().default('--strict-markers'),
    /** Whether the command writes a JSON-lines report to `{reportLogPath}`. */
    reportLog: z.boolean().default(false),
  })
  .strict();

const SubmissionSchema = z
  .object({
    endpoint: z.string().url(),
    tokenEnv: z.string().min(1).optional(),
    /** Per request; the client's own default applies when unset. */
    timeoutMs: positiveInt.optional(),
  })
  .strict();

const CoverageSchema = z
  .object({
    target: z.string().min(1),
    reportMode: z.enum(['immediate', 'deferred']).default('immediate'),
    format: z.enum(['coverage-json', 'lcov']).default('coverage-json'),
    /** Artifact file name inside the cell's work directory. */
    artifact: z.string().min(1).default('coverage.json'),
    /** Turns raw data into the artifact in deferred mode. */
    export: z.string().min(1).optional(),
    observationWindowMs: positiveInt.default(DEFAULT_OBSERVATION_WINDOW_MS),
    submission: SubmissionSchema.optional(),
  })
  .strict()
  .refine((coverage) => coverage.reportMode === 'immediate' || coverage.export !== undefined, {
    message: 'deferred coverage needs an export command',
    path: ['export'],
  });

const SnippetSchema = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1),
    /** Relative to the project directory. */
    directory: z.string().min(1).optional(),
    acceptExitCodes: z.array(z.number().int().min(0)).min(1).default([0]),
    /** Globs relative to `directory`; one check runs per matching file. */
    files: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

const DocsSchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Runtime of a dedicated environment; the host's tools are used without one. */
    runtime: versionString.optional(),
    /** Relative to the project directory; the build runs here. */
    directory: z.string().min(1).default('doc'),
    setup: z.array(z.string().min(1)).default([]),
    build: z.string().min(1).optional(),
    snippets: z.array(SnippetSchema).default([]),
  })
  .strict();

const ExecutionSchema = z
  .object({
    concurrency: positiveInt.optional(),
    stepTimeoutMs: positiveInt.default(DEFAULT_STEP_TIMEOUT_MS),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    project: ProjectSchema,
    environment: EnvironmentSchema,
    dependencies: z.record(DependencySourceSchema).default({}),
    install: InstallSchema.default({}),
    matrix: MatrixSchema,
    test: TestSchema.default({}),
    coverage: CoverageSchema,
    docs: DocsSchema.default({ enabled: false }),
    execution: ExecutionSchema.default({}),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type DocsConfig = PipelineConfig['docs'];
export type SnippetConfig = DocsConfig['snippets'][number];
export type CoverageConfig = PipelineConfig['coverage'];
export type EnvironmentConfig = PipelineConfig['environment'];

/* -------------------------------------------------------------------------- */
/* Loading                                                                     */
/* -------------------------------------------------------------------------- */

export interface LoadedPipeline {
  /** Absolute path of the file that was read. */
  readonly configPath: string;
  readonly config: PipelineConfig;
  readonly cells: readonly MatrixCell[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${at}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Validate an already parsed document.
 *
 * @param source - File name used in error messages.
 * @throws {ConfigError} `CONFIG_INVALID` or `CONFIG_UNKNOWN_PLACEHOLDER`.
 */
export function parsePipelineConfig(raw: unknown, source: string): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'CONFIG_INVALID',
      `${source}: invalid configuration\n${formatIssues(result.error)}`,
      { details: { source } },
    );
  }

  for (const [context, template] of listTemplates(result.data)) {
    assertKnownPlaceholders(template, `${source} ${context}`);
  }

  return result.data;
}

/**
 * Every command template in the file, paired with its configuration path.
 */
export function listTemplates(config: PipelineConfig): [string, string][] {
  const templates: [string, string][] = [
    ['project.install', config.project.install],
    ['install.registry', config.install.registry],
    ['install.vcs', config.install.vcs],
    ['test.command', config.test.command],
  ];

  const { provision } = config.environment;
  if (typeof provision === 'string') {
    templates.push(['environment.provision', provision]);
  } else {
    for (const [family, command] of Object.entries(provision)) {
      if (command !== undefined) {
        templates.push([`environment.provision.${family}`, command]);
      }
    }
  }

  if (config.coverage.export !== undefined) {
    templates.push(['coverage.export', config.coverage.export]);
  }

  config.docs.setup.forEach((command, i) => templates.push([`docs.setup[${i}]`, command]));
  if (config.docs.build !== undefined) {
    templates.push(['docs.build', config.docs.build]);
  }
  config.docs.snippets.forEach((snippet, i) =>
    templates.push([`docs.snippets[${i}].command`, snippet.command]),
  );

  return templates;
}

/**
 * Expand the matrix and check every cell can be installed as declared.
 *
 * @throws {ConfigError} `DEPENDENCY_SOURCE_MISSING` when a cell builds a
 *   dependency from a ref but no repository is configured for it.
 */
export function resolveCellsFromConfig(config: PipelineConfig): readonly MatrixCell[] {
  const cells = expandMatrix(config.matrix);

  for (const cell of cells) {
    for (const constraint of cell.dependencySpecs) {
      if (
        constraint.sourceKind === 'vcs-ref' &&
        config.dependencies[constraint.name]?.repository === undefined
      ) {
        throw new ConfigError(
          'DEPENDENCY_SOURCE_MISSING',
          `Cell ${cell.id} builds ${constraint.name} from a ref but dependencies.${constraint.name}.repository is not set`,
          { details: { cellId: cell.id, dependency: constraint.name } },
        );
      }
    }
  }

  return cells;
}

/**
 * Provision command for an OS family, if one is configured.
 */
export function provisionCommandFor(
  environment: EnvironmentConfig,
  family: OsFamily,
): string | undefined {
  return typeof environment.provision === 'string'
    ? environment.provision
    : environment.provision[family];
}

/**
 * Read, parse and validate the configuration file.
 *
 * @param configPath - Explicit path; `matrix-ci.yml` in `cwd` otherwise.
 * @throws {ConfigError} for a missing, unreadable or invalid file.
 */
export async function loadPipelineConfig(
  configPath: string | undefined,
  cwd: string = process.cwd(),
  readFileFn: typeof readFile = readFile,
): Promise<LoadedPipeline> {
  const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILENAME);
  const source = path.basename(resolved);

  let text: string;
  try {
    text = await readFileFn(resolved, 'utf8');
  } catch (error) {
    if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
      throw new ConfigError('CONFIG_NOT_FOUND', `Configuration file not found: ${resolved}`, {
        cause: error,
        details: { path: resolved },
      });
    }
    throw new ConfigError('CONFIG_PARSE_ERROR', `Cannot read ${resolved}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('CONFIG_PARSE_ERROR', `${source}: invalid YAML (${reason})`, {
      cause: error,
    });
  }

  const config = parsePipelineConfig(raw, source);
  return { configPath: resolved, config, cells: resolveCellsFromConfig(config) };
}
