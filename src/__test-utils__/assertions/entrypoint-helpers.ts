import { expect, type Mock } from 'vitest';

export const FATAL_ERROR_PREFIX = '\n❌ Fatal error:';

/**
 * Payload of the first `console.error('\n❌ Fatal error:', payload)` call.
 */
export function findFatalErrorCall(errorSpy: Mock): object | undefined {
  const fatalCall = errorSpy.mock.calls.find((call) => call[0] === FATAL_ERROR_PREFIX);
  const payload: unknown = fatalCall?.[1];
  return typeof payload === 'object' && payload !== null ? payload : undefined;
}

function argvOf(payload: object | undefined): unknown {
  const details = payload && 'details' in payload ? payload.details : undefined;
  const context =
    typeof details === 'object' && details !== null && 'context' in details ? details.context : undefined;
  return typeof context === 'object' && context !== null && 'argv' in context ? context.argv : undefined;
}

/**
 * Assert the payload carries `details.context.argv` holding nothing but
 * flags and redaction markers.
 */
export function expectSanitizedArgv(payload: object | undefined): void {
  const argv = argvOf(payload);

  expect(Array.isArray(argv)).toBe(true);
  for (const arg of Array.isArray(argv) ? argv : []) {
    expect(typeof arg === 'string' && (arg === '<redacted>' || arg.startsWith('-'))).toBe(true);
  }
}
