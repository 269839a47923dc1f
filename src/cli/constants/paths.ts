/**
 * @packageDocumentation
 * File names the CLI reads and writes by default.
 */

/** Package manifest read for the version banner. */
export const PKG_FILENAME = 'package.json';

/** Shown when the manifest cannot be read. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Configuration looked up in the working directory when `--config` is absent. */
export const DEFAULT_CONFIG_FILENAME = 'matrix-ci.yml';

/** Run report written under the log directory when `--report` is absent. */
export const DEFAULT_REPORT_FILENAME = 'matrix-report.json';

/** Log id of the documentation verifier. */
export const DOCS_LOG_ID = 'docs';
