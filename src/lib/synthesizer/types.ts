/**
 * Synthesizer module types
 */

import type { SchemaTree } from "../../types/data-model.js";

export interface SynthesizerOptions {
  /** Attach collected samples as `examples` on scalar nodes (default: true) */
  includeExamples?: boolean;
}

export interface SynthesizerResult {
  tree: SchemaTree;
  metadata: {
    /** Registry entries turned into nodes */
    pathsBuilt: number;
    /** Entries skipped because their path was empty */
    pathsSkipped: number;
  };
}
