/**
 * Bulk loading of parsed records into a registry.
 */

import { CapacityExceededError, ReferenceRegistryError } from './errors.js';
import type { ReferenceRegistry } from './registry.js';
import type { ParsedRecord } from './types.js';

export interface SkippedRecord {
  /** 0-based position in the input */
  index: number;
  error: ReferenceRegistryError;
}

export interface LoadResult {
  handles: number[];
  skipped: SkippedRecord[];
}

/**
 * Add records in order. Records whose citation key cannot be derived are
 * skipped with a warning; a full registry stops the load.
 */
export function loadReferences(
  registry: ReferenceRegistry,
  records: readonly ParsedRecord[]
): LoadResult {
  const result: LoadResult = { handles: [], skipped: [] };

  records.forEach(({ record, doi }, index) => {
    try {
      result.handles.push(registry.add(record, doi));
    } catch (error) {
      if (error instanceof CapacityExceededError || !(error instanceof ReferenceRegistryError)) {
        throw error;
      }
      console.warn(`[ReferenceLoader] Skipping record ${index + 1}: ${error.message}`);
      result.skipped.push({ index, error });
    }
  });

  return result;
}
