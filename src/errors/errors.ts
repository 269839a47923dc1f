/**
 * Shared error hierarchy for consistent error handling.
 *
 * Cell-local failures (provisioning, dependency resolution, project install)
 * are raised as exceptions inside a job and converted to data on the
 * `JobResult`; they never cross cell boundaries. Configuration and CLI errors
 * abort the run before any job starts.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'CONFIG_DUPLICATE_CELL'
  | 'CONFIG_UNKNOWN_PLACEHOLDER'
  | 'PROVISION_FAILED'
  | 'PROVISION_TIMEOUT'
  | 'PROVISION_UNSUPPORTED_OS'
  | 'DEPENDENCY_INSTALL_FAILED'
  | 'DEPENDENCY_SOURCE_MISSING'
  | 'INSTALL_FAILED'
  | 'PROCESS_SPAWN_FAILED'
  | 'PROCESS_TIMEOUT'
  | 'TEST_RUNNER_CRASHED'
  | 'COVERAGE_ARTIFACT_INVALID'
  | 'COVERAGE_SUBMISSION_FAILED'
  | 'DOC_BUILD_FAILED'
  | 'JOB_INVALID_TRANSITION'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base class for every error raised by the orchestrator.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      // Fall back to the cause's stack when ours is empty
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

/** Invalid command-line usage. */
export class CliError extends AppError {}
/** Malformed configuration or matrix declaration. Fatal before any job starts. */
export class ConfigError extends AppError {}
/** Environment acquisition failed for one cell. */
export class ProvisionError extends AppError {}
/** A declared dependency could not be resolved or installed for one cell. */
export class DependencyError extends AppError {}
/** The project under test could not be installed in live mode for one cell. */
export class InstallError extends AppError {}
/** A child process could not be spawned or exceeded its timeout. */
export class ProcessError extends AppError {}
/** A coverage artifact could not be read, or the submission service rejected it. */
export class CoverageError extends AppError {}
/** The documentation build step failed; snippet checks are skipped. */
export class BuildError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to a ProcessError.
 */
export function isProcessError(error: unknown): error is ProcessError {
  return error instanceof ProcessError;
}

/**
 * Check whether an unknown value has the given property name.
 * Useful before accessing properties on caught errors.
 */
export function hasErrorProperty<T extends string>(
  error: unknown,
  prop: T,
): error is Record<T, unknown> {
  return typeof error === 'object' && error !== null && Reflect.has(error, prop);
}
