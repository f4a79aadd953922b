/**
 * Test Utilities
 *
 * Helper functions and patterns used across multiple test files.
 */

import { vi } from 'vitest';
import type { MockInstance } from 'vitest';

/**
 * Silence console.warn for the duration of a test and keep the calls for
 * assertions. Restore with `vi.restoreAllMocks()` in afterEach.
 */
export function captureWarnings(): MockInstance<typeof console.warn> {
  return vi.spyOn(console, 'warn').mockImplementation(() => undefined);
}
