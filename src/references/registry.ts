/**
 * Reference Registry
 *
 * Owns every reference added during a run. References live in a dense,
 * append-only arena addressed by 1-based handles; callers only ever hold
 * the handle.
 */

import { generateCitationKey } from './citation-key.js';
import { sortByEpochDescending } from './epoch.js';
import { AggregationMismatchError, CapacityExceededError, InvalidHandleError } from './errors.js';
import { DEFAULT_REGISTRY_OPTIONS } from './types.js';
import type { Reference, ReferenceRegistryOptions, TaggedRecord } from './types.js';

export class ReferenceRegistry {
  private references: Reference[] = [];
  readonly capacity: number;

  constructor(options: Partial<ReferenceRegistryOptions> = {}) {
    const capacity = options.capacity ?? DEFAULT_REGISTRY_OPTIONS.capacity;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Registry capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Number of stored references; valid handles are 1..count.
   */
  get count(): number {
    return this.references.length;
  }

  /**
   * Store a record and return its handle.
   * Nothing is stored when the key cannot be derived or the registry is full.
   */
  add(record: TaggedRecord, doi: string = ''): number {
    if (this.references.length >= this.capacity) {
      throw new CapacityExceededError(this.capacity);
    }

    const citationKey = generateCitationKey(
      record,
      this.references.map((ref) => ref.citationKey)
    );

    const handle = this.references.length + 1;
    this.references.push({
      handle,
      record: Object.freeze([...record]),
      doi,
      cited: false,
      citationKey,
    });

    return handle;
  }

  /**
   * Mark a reference as used in this run. Idempotent.
   */
  cite(handle: number): void {
    this.lookup(handle).cited = true;
  }

  isCited(handle: number): boolean {
    return this.lookup(handle).cited;
  }

  citationKey(handle: number): string {
    return this.lookup(handle).citationKey;
  }

  record(handle: number): TaggedRecord {
    return this.lookup(handle).record;
  }

  doi(handle: number): string {
    return this.lookup(handle).doi;
  }

  /**
   * All handles in insertion order.
   */
  handles(): number[] {
    return this.references.map((ref) => ref.handle);
  }

  citedHandles(): number[] {
    return this.references.filter((ref) => ref.cited).map((ref) => ref.handle);
  }

  /**
   * Exact, case-sensitive key lookup.
   */
  handleForKey(citationKey: string): number | undefined {
    return this.references.find((ref) => ref.citationKey === citationKey)?.handle;
  }

  /**
   * Cited state as 0/1 flags, index i holding handle i+1.
   */
  citedFlags(): number[] {
    return this.references.map((ref) => (ref.cited ? 1 : 0));
  }

  /**
   * Overwrite every cited flag. Used after a cross-worker reduction, so
   * the flag count must match the reference count exactly.
   */
  applyCitedFlags(flags: readonly number[]): void {
    if (flags.length !== this.references.length) {
      throw new AggregationMismatchError(
        `Expected ${this.references.length} citation flags, got ${flags.length}`
      );
    }
    this.references.forEach((ref, index) => {
      ref.cited = flags[index] !== 0;
    });
  }

  /**
   * Drop every reference. The next add returns handle 1 again.
   */
  clear(): void {
    this.references = [];
  }

  private lookup(handle: number): Reference {
    if (!Number.isInteger(handle) || handle < 1 || handle > this.references.length) {
      throw new InvalidHandleError(handle, this.references.length);
    }
    return this.references[handle - 1];
  }
}

/**
 * Handles ordered newest publication first, ties in insertion order.
 */
export function rankByEpoch(registry: ReferenceRegistry): number[] {
  return sortByEpochDescending(registry.handles(), (handle) => registry.record(handle));
}
