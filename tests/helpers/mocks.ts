import { vi } from 'vitest';
import type { Logger } from '../../src/types/index.js';

/**
 * Create a mock Logger for testing
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    log: vi.fn(),
  };
}
