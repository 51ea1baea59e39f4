/**
 * Node guards and structural merge for schema trees
 */

import type {
  ArrayNode,
  ObjectNode,
  SchemaNode,
  SchemaTree,
} from "../../types/data-model.js";

export function isObjectNode(node: SchemaNode): node is ObjectNode {
  return node.type === "object" && "properties" in node;
}

export function isArrayNode(node: SchemaNode): node is ArrayNode {
  return node.type === "array" && !("examples" in node);
}

/**
 * Merge two nodes that landed on the same position.
 *
 * Objects union their properties, merging shared keys recursively; arrays
 * merge their item schemas. Any other pairing resolves to `incoming`.
 */
export function mergeNodes(existing: SchemaNode, incoming: SchemaNode): SchemaNode {
  if (isObjectNode(existing) && isObjectNode(incoming)) {
    return {
      type: "object",
      properties: mergeProperties(existing.properties, incoming.properties),
    };
  }

  if (isArrayNode(existing) && isArrayNode(incoming)) {
    const items =
      existing.items && incoming.items
        ? mergeNodes(existing.items, incoming.items)
        : (incoming.items ?? existing.items);
    return items ? { type: "array", items } : { type: "array" };
  }

  return incoming;
}

/**
 * Define an own enumerable property. Plain assignment would run the
 * `__proto__` setter for a field of that name.
 */
export function setProperty<T>(target: Record<string, T>, name: string, value: T): void {
  Object.defineProperty(target, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Union two property mappings into a new mapping
 */
export function mergeProperties(existing: SchemaTree, incoming: SchemaTree): SchemaTree {
  const merged: SchemaTree = { ...existing };
  for (const [name, node] of Object.entries(incoming)) {
    const current = Object.hasOwn(merged, name) ? merged[name] : undefined;
    setProperty(merged, name, current ? mergeNodes(current, node) : node);
  }
  return merged;
}
