/**
 * Test setup file
 * Restores timers and globals that individual tests replace
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
