/**
 * Shared Vitest setup.
 *
 * Every suite starts from real timers and unmocked console methods, so a test
 * that forgets to restore a spy cannot leak into the next file.
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
