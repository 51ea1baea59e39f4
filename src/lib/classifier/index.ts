/**
 * Classifier module - maps a single value to its semantic type tag
 */

import type { ClassifiedType } from "../../types/data-model.js";

/**
 * Check for a plain JSON object (not an array, not a class instance)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value by its runtime shape.
 *
 * Booleans are tested before numbers and integers before floats. Values that
 * are not JSON fall back to their runtime type name.
 *
 * @example
 * classify(42)        // "integer"
 * classify(4.2)       // "float"
 * classify([1, 2])    // "array"
 * classify(new Date()) // "Date"
 */
export function classify(value: unknown): ClassifiedType {
  if (value === null) return "null";
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float";
  }
  if (typeof value === "string") return "string";
  if (Array.isArray(value)) return "array";
  if (isPlainObject(value)) return "object";

  return runtimeTypeName(value);
}

function runtimeTypeName(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === "function" && ctor.name) {
      return ctor.name;
    }
    return "object";
  }
  return typeof value;
}

/**
 * Composite values are recursed into, never sampled
 */
export function isComposite(type: ClassifiedType): boolean {
  return type === "object" || type === "array";
}
