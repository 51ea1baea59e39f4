/**
 * Sampler module - representative record selection and bounded value samples
 */

import type { Document } from "../../types/data-model.js";
import type { RepresentativeRecord } from "./types.js";
import { isPlainObject } from "../classifier/index.js";
import { InferenceError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./sample-set.js";

/**
 * Wrap a parsed JSON value as a Document.
 *
 * Only a top-level list or mapping is a dataset export; anything else is
 * rejected.
 */
export function toDocument(input: unknown): Document {
  if (Array.isArray(input)) {
    return { kind: "list", records: input };
  }
  if (isPlainObject(input)) {
    return { kind: "map", records: input };
  }

  throw new InferenceError(
    "Expected a top-level JSON array or object of records",
    { received: input === null ? "null" : typeof input },
  );
}

/**
 * Number of records in a document
 */
export function countRecords(document: Document): number {
  return document.kind === "list"
    ? document.records.length
    : Object.keys(document.records).length;
}

/**
 * Pick the record inference runs against: the first element of a record
 * list, or the first value of a record map. Inference deliberately inspects
 * this single record, so fields that only appear in later records are not
 * reported.
 *
 * @returns undefined for an empty document
 */
export function selectRepresentativeRecord(
  document: Document,
): RepresentativeRecord | undefined {
  if (document.kind === "list") {
    if (document.records.length === 0) {
      return undefined;
    }
    return { source: 0, record: document.records[0] };
  }

  const [firstKey] = Object.keys(document.records);
  if (firstKey === undefined) {
    return undefined;
  }
  return { source: firstKey, record: document.records[firstKey] };
}

/**
 * Select the representative record, logging what was skipped
 */
export function sampleDocument(document: Document): RepresentativeRecord | undefined {
  const total = countRecords(document);
  const selected = selectRepresentativeRecord(document);

  if (!selected) {
    logger.warn("Document contains no records; schema will be empty", {
      kind: document.kind,
    });
    return undefined;
  }

  logger.debug("Representative record selected", {
    kind: document.kind,
    source: selected.source,
    recordsSkipped: total - 1,
  });

  return selected;
}
