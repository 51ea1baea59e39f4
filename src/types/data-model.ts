/**
 * Core data model types for shapesift
 */

/**
 * Semantic type of a JSON value
 */
export type TypeTag =
  | "null"
  | "boolean"
  | "integer"
  | "float"
  | "string"
  | "array"
  | "object";

/**
 * A TypeTag, or the runtime type name of a value that is not JSON
 * (e.g. "undefined", "bigint", "Date")
 */
export type ClassifiedType = TypeTag | (string & {});

/**
 * Serialized structural path: segments joined by ".", with "[]" appended to
 * a segment for each array level it descends into (e.g. "orders[].items[]")
 */
export type StructuralPath = string;

/**
 * Parsed form of a single path segment
 */
export interface PathSegment {
  /** Field name without array markers ("" for the root record itself) */
  name: string;
  /** Number of "[]" markers trailing the name */
  arrayDepth: number;
}

/**
 * SchemaNode - one node of the nested schema tree
 */
export interface ScalarNode {
  type: ClassifiedType;
  examples?: string[];
}

export interface ObjectNode {
  type: "object";
  properties: Record<string, SchemaNode>;
}

export interface ArrayNode {
  type: "array";
  /** Absent when the array was only ever observed empty */
  items?: SchemaNode;
}

export type SchemaNode = ScalarNode | ObjectNode | ArrayNode;

/**
 * SchemaTree - properties of the representative record
 */
export type SchemaTree = Record<string, SchemaNode>;

/**
 * Document - a dataset export, either a list of records or a mapping of
 * record id to record
 */
export interface RecordList {
  kind: "list";
  records: unknown[];
}

export interface RecordMap {
  kind: "map";
  records: Record<string, unknown>;
}

export type Document = RecordList | RecordMap;
