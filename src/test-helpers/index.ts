/**
 * Test Helpers
 *
 * Centralized test utilities, builders, and constants to improve
 * test code organization and reduce duplication.
 */

export * from './constants.js';
export * from './builders.js';
export * from './utils.js';
