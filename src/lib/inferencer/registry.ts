/**
 * Flat schema registry: normalized path -> type and bounded samples
 */

import type { ClassifiedType, StructuralPath } from "../../types/data-model.js";
import { SampleSet, DEFAULT_SAMPLE_CAPACITY } from "../sampler/index.js";
import { setProperty } from "../synthesizer/merge.js";

export interface SchemaEntry {
  type: ClassifiedType;
  samples: SampleSet;
}

export interface RegistryOptions {
  /** Sample capacity of every entry (default: 10) */
  maxSamples?: number;
}

export class SchemaRegistry {
  private readonly entries = new Map<StructuralPath, SchemaEntry>();
  readonly maxSamples: number;

  constructor(options: RegistryOptions = {}) {
    this.maxSamples = options.maxSamples ?? DEFAULT_SAMPLE_CAPACITY;
  }

  /**
   * Return the entry for a path, creating it on first sight. The type
   * recorded first is kept; later values of another shape do not change it.
   */
  ensure(path: StructuralPath, type: ClassifiedType): SchemaEntry {
    const existing = this.entries.get(path);
    if (existing) {
      return existing;
    }

    const entry: SchemaEntry = {
      type,
      samples: new SampleSet({ capacity: this.maxSamples }),
    };
    this.entries.set(path, entry);
    return entry;
  }

  get(path: StructuralPath): SchemaEntry | undefined {
    return this.entries.get(path);
  }

  has(path: StructuralPath): boolean {
    return this.entries.has(path);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Entries ordered by path (code-unit order), for reproducible output
   */
  sortedEntries(): [StructuralPath, SchemaEntry][] {
    return [...this.entries.entries()].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
  }

  /**
   * Plain snapshot, useful for debugging and tests
   */
  toJSON(): Record<StructuralPath, { type: ClassifiedType; samples: string[] }> {
    const snapshot: Record<StructuralPath, { type: ClassifiedType; samples: string[] }> = {};
    for (const [path, entry] of this.sortedEntries()) {
      setProperty(snapshot, path, { type: entry.type, samples: entry.samples.toArray() });
    }
    return snapshot;
  }
}
