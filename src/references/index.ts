/**
 * Reference Registry
 *
 * Exports for tagged-record parsing, citation tracking and output.
 */

export * from './types.js';
export * from './errors.js';
export * from './fields.js';
export * from './citation-key.js';
export * from './epoch.js';
export * from './registry.js';
export * from './aggregator.js';
export * from './journal-format.js';
export * from './xml-export.js';
export * from './record-parser.js';
export * from './loader.js';
