import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { EventFields, LogEvent } from '../src/domain/index.js';

/** Logger stand-in; `child()` returns the same object so calls stay observable. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Builds a frozen-shape event with a fixed timestamp unless overridden. */
export function makeEvent(
  category = 'test',
  fields: EventFields = {},
  timestamp: number | string = 1700000000,
): LogEvent {
  return { category, fields, timestamp };
}

/** Lets pending promise chains run to completion (real timers only). */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
