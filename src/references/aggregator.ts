/**
 * Usage Aggregator
 *
 * Reconciles cited flags across cooperating workers that each hold a
 * registry filled in the same order. A reference counts as cited when any
 * worker cited it.
 */

import { AggregationMismatchError } from './errors.js';
import type { ReferenceRegistry } from './registry.js';

/**
 * Collective element-wise max over equally sized 0/1 sequences.
 * Every member of the group must call it; it settles on all of them once
 * the last one arrives.
 */
export interface FlagReducer {
  allReduceMax(flags: readonly number[]): Promise<number[]>;
}

/**
 * OR-reduce this worker's cited flags with every other worker's and write
 * the result back. Acts as a barrier across the group.
 */
export async function collectCitationsFromWorkers(
  registry: ReferenceRegistry,
  reducer: FlagReducer
): Promise<void> {
  const reduced = await reducer.allReduceMax(registry.citedFlags());
  registry.applyCitedFlags(reduced);
}

interface PendingContribution {
  flags: number[];
  resolve: (reduced: number[]) => void;
  reject: (error: AggregationMismatchError) => void;
}

/**
 * In-process reduction group. Each worker takes one member endpoint by
 * rank; a round completes when every rank has contributed.
 */
export class ReductionGroup {
  readonly size: number;
  private pending: Map<number, PendingContribution> = new Map();

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Reduction group size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /**
   * Endpoint for the worker with the given 0-based rank.
   */
  member(rank: number): FlagReducer {
    if (!Number.isInteger(rank) || rank < 0 || rank >= this.size) {
      throw new RangeError(`Rank ${rank} is outside group of size ${this.size}`);
    }
    return {
      allReduceMax: (flags) => this.contribute(rank, flags),
    };
  }

  private contribute(rank: number, flags: readonly number[]): Promise<number[]> {
    return new Promise((resolve, reject) => {
      if (this.pending.has(rank)) {
        reject(new AggregationMismatchError(`Worker ${rank} joined the same reduction twice`));
        return;
      }

      this.pending.set(rank, { flags: [...flags], resolve, reject });
      if (this.pending.size === this.size) {
        this.complete();
      }
    });
  }

  private complete(): void {
    const contributions = [...this.pending.values()];
    this.pending.clear();

    const lengths = contributions.map((c) => c.flags.length);
    const length = lengths[0];
    if (lengths.some((l) => l !== length)) {
      const error = new AggregationMismatchError(
        `Workers contributed different reference counts: ${lengths.join(', ')}`
      );
      for (const contribution of contributions) contribution.reject(error);
      return;
    }

    const reduced = Array.from({ length }, (_, i) =>
      Math.max(...contributions.map((c) => c.flags[i]))
    );
    for (const contribution of contributions) contribution.resolve([...reduced]);
  }
}
