/**
 * @packageDocumentation
 * Time units and the default timeouts derived from them.
 */

export const MS_PER_SECOND = 1000;

export const MINUTE_MS = 60 * MS_PER_SECOND;

/** Per shell step (provision, install, test, docs command). */
export const DEFAULT_STEP_TIMEOUT_MS = 30 * MINUTE_MS;

/** How long the run waits for every expected cell before finalizing anyway. */
export const DEFAULT_OBSERVATION_WINDOW_MS = 10 * MINUTE_MS;
