/**
 * Bounded sample collector
 */

import type { SampleSetOptions } from "./types.js";

export const DEFAULT_SAMPLE_CAPACITY = 10;

/**
 * Insertion-ordered set of distinct string samples that stops accepting
 * values once full. Nothing is ever evicted: the first N distinct values
 * seen are the ones kept.
 */
export class SampleSet {
  private readonly values = new Set<string>();
  readonly capacity: number;

  constructor(options: SampleSetOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_SAMPLE_CAPACITY;
  }

  /**
   * Add a sample; returns false when it was a duplicate or the set is full
   */
  add(sample: string): boolean {
    if (this.isFull() || this.values.has(sample)) {
      return false;
    }
    this.values.add(sample);
    return true;
  }

  isFull(): boolean {
    return this.values.size >= this.capacity;
  }

  get size(): number {
    return this.values.size;
  }

  toArray(): string[] {
    return [...this.values];
  }
}
