/**
 * Logger double for tests
 */

import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Logger whose methods are vi.fn() spies. Children are the logger itself, so calls
 * made through createChild() show up on the returned object.
 */
export function createMockLogger(level: LogLevel = 'info'): Logger {
    let current = level;
    const logger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => logger),
        setLevel: vi.fn((next: LogLevel) => {
            current = next;
        }),
        getLevel: vi.fn(() => current),
        destroy: vi.fn(async () => {}),
    };
    return logger;
}
