/**
 * Loader module - reads a dataset export from disk
 */

import fs from "fs/promises";
import { extname } from "path";
import { FileIOError, InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type InputFormat = "json" | "ndjson";

export type TextEncodingName = "utf-8" | "latin1";

export interface LoadedInput {
  data: unknown;
  format: InputFormat;
  encoding: TextEncodingName;
  bytes: number;
}

const NDJSON_EXTENSIONS = new Set([".ndjson", ".jsonl"]);

/**
 * Input format implied by a file name
 */
export function detectInputFormat(filePath: string): InputFormat {
  return NDJSON_EXTENSIONS.has(extname(filePath).toLowerCase()) ? "ndjson" : "json";
}

/**
 * Decode file bytes as UTF-8 (a leading BOM is dropped), falling back to
 * latin-1 when they are not valid UTF-8
 */
export function decodeText(buffer: Uint8Array): { text: string; encoding: TextEncodingName } {
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    return { text, encoding: "utf-8" };
  } catch (error) {
    logger.debug("Input is not valid UTF-8, decoding as latin-1", {
      reason: error instanceof Error ? error.message : String(error),
    });
    return { text: Buffer.from(buffer).toString("latin1"), encoding: "latin1" };
  }
}

/**
 * Parse one JSON value
 */
export function parseJson(text: string, source: string): unknown {
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new InputReadError(
      `Failed to parse JSON from ${source}`,
      { source },
      { cause: error },
    );
  }
}

/**
 * Parse newline-delimited JSON into a list of records; blank lines are skipped
 */
export function parseNdjson(text: string, source: string): unknown[] {
  const records: unknown[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      throw new InputReadError(
        `Failed to parse NDJSON line ${index + 1} of ${source}`,
        { source, line: index + 1 },
        { cause: error },
      );
    }
  });

  return records;
}

/**
 * Load and parse a dataset export
 */
export async function loadDocument(
  filePath: string,
  format: InputFormat = detectInputFormat(filePath),
): Promise<LoadedInput> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new FileIOError(
      `Failed to read input file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  const { text, encoding } = decodeText(buffer);
  const data = format === "ndjson" ? parseNdjson(text, filePath) : parseJson(text, filePath);

  logger.info("Loaded input document", {
    filePath,
    format,
    encoding,
    bytes: buffer.length,
  });

  return { data, format, encoding, bytes: buffer.length };
}
