/**
 * Structural path helpers
 */

import type { PathSegment, StructuralPath } from "../../types/data-model.js";

export const PATH_SEPARATOR = ".";
export const ARRAY_MARKER = "[]";

export function splitPath(path: StructuralPath): string[] {
  return path === "" ? [] : path.split(PATH_SEPARATOR);
}

export function joinPath(segments: string[]): StructuralPath {
  return segments.join(PATH_SEPARATOR);
}

/**
 * Append an object key; the root path yields the bare key
 */
export function appendKey(path: StructuralPath, key: string): StructuralPath {
  return path ? `${path}${PATH_SEPARATOR}${key}` : key;
}

/**
 * Mark the last segment of a path as "element of this array"
 */
export function appendArrayMarker(path: StructuralPath): StructuralPath {
  return `${path}${ARRAY_MARKER}`;
}

/**
 * Split a segment into its field name and the number of array markers
 *
 * @example
 * parseSegment("matrix[][]") // { name: "matrix", arrayDepth: 2 }
 */
export function parseSegment(segment: string): PathSegment {
  let name = segment;
  let arrayDepth = 0;
  while (name.endsWith(ARRAY_MARKER)) {
    name = name.slice(0, -ARRAY_MARKER.length);
    arrayDepth++;
  }
  return { name, arrayDepth };
}
