/**
 * Recursive schema walker
 */

import type { StructuralPath } from "../../types/data-model.js";
import { classify, isComposite, isPlainObject } from "../classifier/index.js";
import {
  PathNormalizer,
  appendArrayMarker,
  appendKey,
} from "../normalizer/index.js";
import type { SchemaRegistry } from "./registry.js";

export interface WalkStats {
  /** Object keys that matched a date grammar */
  dateKeysCollapsed: number;
}

/**
 * Descends a parsed value and records every path it reaches in the registry.
 *
 * Object children are addressed by their raw key appended to the raw parent
 * path, and each call normalizes its own path, so every segment is matched at
 * its true position. Arrays contribute only their first element.
 */
export class SchemaWalker {
  private stats: WalkStats = { dateKeysCollapsed: 0 };

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly normalizer: PathNormalizer = new PathNormalizer(),
  ) {}

  walk(path: StructuralPath, value: unknown): void {
    const normalizedPath = this.normalizer.normalize(path);
    const type = classify(value);
    const entry = this.registry.ensure(normalizedPath, type);

    if (!isComposite(type) && !entry.samples.isFull()) {
      entry.samples.add(String(value));
    }

    if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        if (this.normalizer.detectDateFormat(key)) {
          this.stats.dateKeysCollapsed++;
        }
        this.walk(appendKey(path, key), child);
      }
    } else if (Array.isArray(value) && value.length > 0) {
      this.walk(appendArrayMarker(normalizedPath), value[0]);
    }
  }

  getStats(): WalkStats {
    return { ...this.stats };
  }
}
