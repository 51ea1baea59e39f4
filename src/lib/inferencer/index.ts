/**
 * Inferencer module - schema inference from a parsed dataset export
 */

import type { SchemaTree } from "../../types/data-model.js";
import type { InferencerOptions, InferencerResult } from "./types.js";
import { SchemaRegistry } from "./registry.js";
import { SchemaWalker } from "./walker.js";
import { PathNormalizer } from "../normalizer/index.js";
import {
  countRecords,
  sampleDocument,
  toDocument,
  DEFAULT_SAMPLE_CAPACITY,
} from "../sampler/index.js";
import { SchemaTreeBuilder, collectLeafPaths } from "../synthesizer/index.js";
import { logger } from "../../utils/logger.js";
import { ConfigError } from "../../utils/errors.js";

export * from "./types.js";
export * from "./registry.js";
export * from "./walker.js";

/**
 * Default inferencer options
 */
const DEFAULT_OPTIONS: InferencerOptions = {
  maxSamples: DEFAULT_SAMPLE_CAPACITY,
  includeExamples: true,
};

function resolveMaxSamples(options: InferencerOptions): number {
  const maxSamples = options.maxSamples ?? DEFAULT_SAMPLE_CAPACITY;
  if (!Number.isInteger(maxSamples) || maxSamples < 1) {
    throw new ConfigError(`maxSamples must be a positive integer, got ${maxSamples}`);
  }
  return maxSamples;
}

interface RecordAnalysis {
  tree: SchemaTree;
  pathsDiscovered: number;
  dateKeysCollapsed: number;
}

/**
 * Walk one record and build its tree
 */
function analyzeRecord(
  record: unknown,
  options: InferencerOptions,
): RecordAnalysis {
  const registry = new SchemaRegistry({ maxSamples: resolveMaxSamples(options) });
  const walker = new SchemaWalker(
    registry,
    new PathNormalizer({ dateFormats: options.dateFormats }),
  );

  walker.walk("", record);

  const builder = new SchemaTreeBuilder({ includeExamples: options.includeExamples });
  const { tree } = builder.build(registry);

  return {
    tree,
    pathsDiscovered: registry.size,
    dateKeysCollapsed: walker.getStats().dateKeysCollapsed,
  };
}

/**
 * Infer the schema of a single record the caller has already selected
 *
 * @example
 * inferRecordSchema({ user: { id: 1 } }).user
 * // { type: "object", properties: { id: { type: "integer", examples: ["1"] } } }
 */
export function inferRecordSchema(
  record: unknown,
  options: InferencerOptions = {},
): SchemaTree {
  return analyzeRecord(record, { ...DEFAULT_OPTIONS, ...options }).tree;
}

/**
 * Infer the schema of a dataset export.
 *
 * The input must be a top-level list or mapping of records. Only the first
 * record is inspected, so the tree describes that record's shape and not a
 * union across the dataset.
 */
export function inferSchema(
  input: unknown,
  options: InferencerOptions = {},
): InferencerResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxSamples = resolveMaxSamples(opts);
  const document = toDocument(input);
  const recordsInDocument = countRecords(document);

  logger.info("Starting schema inference", {
    documentKind: document.kind,
    recordsInDocument,
    maxSamples,
  });

  const selected = sampleDocument(document);
  const analysis: RecordAnalysis = selected
    ? analyzeRecord(selected.record, opts)
    : { tree: {}, pathsDiscovered: 0, dateKeysCollapsed: 0 };

  const result: InferencerResult = {
    tree: analysis.tree,
    metadata: {
      documentKind: document.kind,
      recordsInDocument,
      recordsAnalyzed: selected ? 1 : 0,
      representativeRecord: selected?.source,
      pathsDiscovered: analysis.pathsDiscovered,
      leafFields: collectLeafPaths(analysis.tree).length,
      dateKeysCollapsed: analysis.dateKeysCollapsed,
    },
  };

  logger.info("Schema inference complete", { ...result.metadata });

  return result;
}

/**
 * Main inferencer class
 */
export class Inferencer {
  private options: InferencerOptions;

  constructor(options: InferencerOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  infer(input: unknown): InferencerResult {
    return inferSchema(input, this.options);
  }
}
