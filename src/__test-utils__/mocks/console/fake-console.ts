/**
 * Console stand-in whose methods are spies.
 */

import { vi, type Mock } from 'vitest';

type ConsoleMethod = Mock<(...args: unknown[]) => void>;

export interface FakeConsole {
  readonly log: ConsoleMethod;
  readonly error: ConsoleMethod;
  readonly warn: ConsoleMethod;
  readonly info: ConsoleMethod;
}

export function fakeConsole(): FakeConsole {
  return { log: vi.fn(), error: vi.fn(), warn: vi.fn(), info: vi.fn() };
}
