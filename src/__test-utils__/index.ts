/**
 * Test utilities index
 *
 * Single import source for the fixtures, fakes and helpers shared by the
 * test suites. Pure re-exports with no logic.
 */

export { DEFAULT_ARGS, expectDefaultArgs, expectParsedFlags } from './assertions/args-helpers.ts';
export { expectSanitizedArgv, findFatalErrorCall } from './assertions/entrypoint-helpers.ts';
export { coverageData, createArtifact, fileCoverage, lineRange } from './fixtures/coverage/coverage-fixtures.ts';
export {
  BASE_CONFIG,
  captureOutput,
  type CapturedOutput,
  COVERED_LINES,
  createFakeShell,
  type FakeShell,
  writeConfig,
} from './fixtures/execution/execution-fixtures.ts';
export {
  createCell,
  createFakeToolchain,
  DEFAULT_TEST_REQUEST,
  type FakeToolchain,
  type FakeToolchainOptions,
} from './fixtures/job/job-fixtures.ts';
export { fakeConsole, type FakeConsole } from './mocks/console/fake-console.ts';
export { captureErrorListeners, removeNewListeners } from './mocks/process/error-listeners.ts';
export { createDeferred, type Deferred } from './utils/deferred.ts';
export { restoreEnv, snapshotEnv, withEnv } from './utils/env.ts';
export { createTempDir, removeTempDir, writeTree } from './utils/temp-utils.ts';
