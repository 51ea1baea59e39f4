/**
 * Inferencer module types
 */

import type { SchemaTree } from "../../types/data-model.js";
import type { DateFormatName } from "../../types/config.js";

export interface InferencerOptions {
  /** Distinct example values kept per path (default: 10) */
  maxSamples?: number;
  /** Date grammars used for key normalization; [] disables it */
  dateFormats?: DateFormatName[];
  /** Attach examples to scalar nodes (default: true) */
  includeExamples?: boolean;
}

export interface InferencerResult {
  tree: SchemaTree;
  metadata: {
    documentKind: "list" | "map";
    recordsInDocument: number;
    /** Always 0 or 1: inference inspects a single representative record */
    recordsAnalyzed: number;
    /** Index or key of the representative record */
    representativeRecord?: number | string;
    pathsDiscovered: number;
    leafFields: number;
    dateKeysCollapsed: number;
  };
}
