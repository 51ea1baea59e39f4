/**
 * Synthesizer module - rebuilds a nested schema tree from the flat registry
 */

import type {
  SchemaNode,
  SchemaTree,
  StructuralPath,
} from "../../types/data-model.js";
import type { SchemaEntry, SchemaRegistry } from "../inferencer/registry.js";
import type { SynthesizerOptions, SynthesizerResult } from "./types.js";
import {
  appendArrayMarker,
  appendKey,
  parseSegment,
  splitPath,
} from "../normalizer/index.js";
import { isArrayNode, isObjectNode, mergeProperties } from "./merge.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./merge.js";

/**
 * Default synthesizer options
 */
const DEFAULT_OPTIONS: Required<SynthesizerOptions> = {
  includeExamples: true,
};

/**
 * Main schema tree builder class
 */
export class SchemaTreeBuilder {
  private options: Required<SynthesizerOptions>;

  constructor(options: SynthesizerOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Build the tree. Entries are visited in path order; each path becomes a
   * standalone branch that is merged into the tree built so far.
   */
  build(registry: SchemaRegistry): SynthesizerResult {
    let tree: SchemaTree = {};
    let pathsBuilt = 0;
    let pathsSkipped = 0;

    for (const [path, entry] of registry.sortedEntries()) {
      const segments = splitPath(path);
      if (segments.length === 0) {
        // the representative record itself
        pathsSkipped++;
        continue;
      }

      tree = mergeProperties(tree, this.buildBranch(segments, entry));
      pathsBuilt++;
    }

    logger.debug("Schema tree built", {
      pathsBuilt,
      pathsSkipped,
      topLevelFields: Object.keys(tree).length,
    });

    return { tree, metadata: { pathsBuilt, pathsSkipped } };
  }

  /**
   * Build a single-path tree, e.g. ["orders[]", "id"] becomes
   * { orders: array of object { id: <leaf> } }
   */
  private buildBranch(segments: string[], entry: SchemaEntry): SchemaTree {
    const [head, ...rest] = segments;
    const { name, arrayDepth } = parseSegment(head ?? "");

    let node: SchemaNode =
      rest.length === 0
        ? this.buildLeaf(entry)
        : { type: "object", properties: this.buildBranch(rest, entry) };

    for (let level = 0; level < arrayDepth; level++) {
      node = { type: "array", items: node };
    }

    return { [name]: node };
  }

  private buildLeaf(entry: SchemaEntry): SchemaNode {
    if (entry.type === "object") {
      return { type: "object", properties: {} };
    }
    if (entry.type === "array") {
      return { type: "array" };
    }

    const examples = entry.samples.toArray();
    if (this.options.includeExamples && examples.length > 0) {
      return { type: entry.type, examples };
    }
    return { type: entry.type };
  }
}

/**
 * Build a schema tree from a registry with default options
 */
export function buildSchemaTree(registry: SchemaRegistry): SchemaTree {
  return new SchemaTreeBuilder().build(registry).tree;
}

/**
 * Paths of every leaf in a tree, in registry path notation
 */
export function collectLeafPaths(
  tree: SchemaTree,
  prefix: StructuralPath = "",
): StructuralPath[] {
  const paths: StructuralPath[] = [];
  for (const [name, node] of Object.entries(tree)) {
    paths.push(...leafPaths(appendKey(prefix, name), node));
  }
  return paths;
}

function leafPaths(path: StructuralPath, node: SchemaNode): StructuralPath[] {
  if (isArrayNode(node)) {
    return node.items ? leafPaths(appendArrayMarker(path), node.items) : [path];
  }
  if (isObjectNode(node)) {
    const children = collectLeafPaths(node.properties, path);
    return children.length > 0 ? children : [path];
  }
  return [path];
}
