import { vi } from 'vitest';
import type { ILogger } from '../../src/config/logger';

export function createMockLogger() {
    return {
        info: vi.fn<ILogger['info']>(),
        error: vi.fn<ILogger['error']>(),
        warn: vi.fn<ILogger['warn']>(),
        debug: vi.fn<ILogger['debug']>()
    } satisfies ILogger;
}

// Module stand-in for src/config/logger
export const logger = createMockLogger();

export function errorFields(error: unknown): Record<string, unknown> {
    return { error: error instanceof Error ? error.message : String(error) };
}
