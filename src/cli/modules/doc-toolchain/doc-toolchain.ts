/**
 * Documentation toolchain.
 *
 * Builds the documentation with the configured setup and build commands and
 * turns each configured snippet into a check. A snippet with `files` globs
 * becomes one check per matching file, in sorted order.
 */

import { readdir } from 'node:fs/promises';
import path from 'node:path';

import picomatch from 'picomatch';

import type { BuiltTree, DocumentationBuilder, SnippetCheck, SnippetCheckOutcome } from '../../../docs/types.ts';
import { BuildError, formatErrorMessage, hasErrorProperty } from '../../../errors/errors.ts';
import type { ExecutionEnvironment } from '../../../job/types.ts';
import type { MatrixCell, OsFamily } from '../../../matrix/types.ts';
import type { PipelineConfig, SnippetConfig } from '../../config/pipeline-config.ts';
import { DOCS_LOG_ID } from '../../constants/paths.ts';
import { makeLogOptions } from '../../observability/logger.ts';
import { formatTraceparent, TRACEPARENT_ENV, type TraceContext } from '../../observability/tracing.ts';
import { renderCommand, type PlaceholderValues } from '../command-template/command-template.ts';
import { detectHostFamily } from '../host-platform/host-platform.ts';
import { runCommand, type CommandRunner } from '../process-manager/process-manager.ts';
import { createShellToolchain, runtimeLayout } from '../toolchain/shell-toolchain.ts';

export interface DocToolchainOptions {
  readonly config: PipelineConfig;
  readonly projectDir: string;
  readonly workRoot: string;
  readonly logDir: string;
  readonly structuredLogs?: boolean;
  readonly traceContext?: TraceContext;
  readonly runner?: CommandRunner;
  readonly platform?: NodeJS.Platform;
  readonly baseEnv?: NodeJS.ProcessEnv;
}

export interface DocumentationSession {
  readonly builder: DocumentationBuilder;
  readonly checks: readonly SnippetCheck[];
  /** Releases the documentation environment, if one was provisioned. */
  dispose(): Promise<void>;
}

/** Pseudo-cell the documentation environment is provisioned for. */
function docsCell(runtime: string, family: OsFamily): MatrixCell {
  return Object.freeze({
    id: DOCS_LOG_ID,
    index: -1,
    os: family,
    osFamily: family,
    runtimeVersion: runtime,
    dependencySpecs: Object.freeze([]),
  });
}

/**
 * Files under `dir` matching any of `patterns`, as sorted forward-slash
 * paths. A missing directory matches nothing.
 */
export async function listMatchingFiles(dir: string, patterns: readonly string[]): Promise<string[]> {
  const isMatch = picomatch([...patterns]);
  let entries: string[];
  try {
    entries = await readdir(dir, { recursive: true });
  } catch (error) {
    if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .map((entry) => entry.split(path.sep).join('/'))
    .filter((relative) => isMatch(relative))
    .sort();
}

class DocCommands {
  private env: ExecutionEnvironment | undefined;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;

  constructor(private readonly options: DocToolchainOptions) {
    this.runner = options.runner ?? runCommand;
    this.platform = options.platform ?? process.platform;
  }

  async provision(): Promise<void> {
    const { runtime } = this.options.config.docs;
    if (runtime === undefined || this.env) {
      return;
    }
    const cell = docsCell(runtime, detectHostFamily(this.platform));
    this.env = await createShellToolchain(cell, this.options).environments.provision(cell);
  }

  async dispose(): Promise<void> {
    const env = this.env;
    this.env = undefined;
    await env?.dispose();
  }

  private values(extra: PlaceholderValues): PlaceholderValues {
    const { env } = this;
    const { projectDir } = this.options;
    return {
      python: env ? runtimeLayout(env.envDir, this.platform).python : 'python',
      runtime: this.options.config.docs.runtime ?? '',
      envDir: env?.envDir ?? '',
      workDir: env?.workDir ?? projectDir,
      cellId: DOCS_LOG_ID,
      projectDir,
      ...extra,
    };
  }

  private variables(): Readonly<Record<string, string>> {
    if (this.env) {
      return this.env.variables;
    }
    const { traceContext } = this.options;
    return traceContext ? { [TRACEPARENT_ENV]: formatTraceparent(traceContext) } : {};
  }

  async run(
    template: string,
    context: string,
    step: string,
    cwd: string,
    extra: PlaceholderValues = {},
  ): Promise<number> {
    const command = renderCommand(template, this.values(extra), context, this.platform);
    const result = await this.runner({
      command,
      cwd,
      env: this.variables(),
      timeoutMs: this.options.config.execution.stepTimeoutMs,
      log: makeLogOptions({
        logDir: this.options.logDir,
        jobId: DOCS_LOG_ID,
        step,
        structured: this.options.structuredLogs,
        traceContext: this.options.traceContext,
      }),
    });
    return result.exitCode;
  }
}

function buildFailure(message: string, cause?: unknown): BuildError {
  return new BuildError('DOC_BUILD_FAILED', message, cause === undefined ? undefined : { cause });
}

class ShellDocumentationBuilder implements DocumentationBuilder {
  constructor(
    private readonly commands: DocCommands,
    private readonly options: DocToolchainOptions,
  ) {}

  async build(): Promise<BuiltTree> {
    const { docs } = this.options.config;
    const { projectDir } = this.options;
    const root = path.resolve(projectDir, docs.directory);

    try {
      await this.commands.provision();
    } catch (error) {
      throw buildFailure(`Documentation environment failed: ${formatErrorMessage(error)}`, error);
    }

    for (const [i, template] of docs.setup.entries()) {
      const exitCode = await this.commands.run(template, `docs.setup[${i}]`, 'setup', projectDir);
      if (exitCode !== 0) {
        throw buildFailure(`Documentation setup step ${i + 1} exited with code ${exitCode}`);
      }
    }

    if (docs.build !== undefined) {
      const exitCode = await this.commands.run(docs.build, 'docs.build', 'build', root);
      if (exitCode !== 0) {
        throw buildFailure(`Documentation build exited with code ${exitCode}`);
      }
    }

    return { root };
  }
}

class ShellSnippetCheck implements SnippetCheck {
  constructor(
    readonly name: string,
    private readonly snippet: SnippetConfig,
    private readonly index: number,
    private readonly commands: DocCommands,
    private readonly cwd: string,
    private readonly file?: string,
  ) {}

  async run(): Promise<SnippetCheckOutcome> {
    const exitCode = await this.commands.run(
      this.snippet.command,
      `docs.snippets[${this.index}].command`,
      this.name,
      this.cwd,
      this.file === undefined ? {} : { file: this.file },
    );
    if (this.snippet.acceptExitCodes.includes(exitCode)) {
      return { ok: true };
    }
    return { ok: false, error: `exited with code ${exitCode}` };
  }
}

/** Check standing in for a snippet whose globs matched nothing. */
class EmptySnippetCheck implements SnippetCheck {
  constructor(
    readonly name: string,
    private readonly reason: string,
  ) {}

  run(): Promise<SnippetCheckOutcome> {
    return Promise.resolve({ ok: false, error: this.reason });
  }
}

/**
 * Prepare the builder and the snippet checks for one verification run.
 */
export async function createDocumentationSession(
  options: DocToolchainOptions,
): Promise<DocumentationSession> {
  const { docs } = options.config;
  const commands = new DocCommands(options);
  const checks: SnippetCheck[] = [];

  for (const [index, snippet] of docs.snippets.entries()) {
    const relativeDir = snippet.directory ?? docs.directory;
    const cwd = path.resolve(options.projectDir, relativeDir);

    if (snippet.files === undefined) {
      checks.push(new ShellSnippetCheck(snippet.name, snippet, index, commands, cwd));
      continue;
    }

    const files = await listMatchingFiles(cwd, snippet.files);
    if (files.length === 0) {
      checks.push(
        new EmptySnippetCheck(
          snippet.name,
          `No files match ${snippet.files.join(', ')} in ${relativeDir}`,
        ),
      );
      continue;
    }
    for (const file of files) {
      checks.push(new ShellSnippetCheck(`${snippet.name}/${file}`, snippet, index, commands, cwd, file));
    }
  }

  return {
    builder: new ShellDocumentationBuilder(commands, options),
    checks,
    dispose: () => commands.dispose(),
  };
}
