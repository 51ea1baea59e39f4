/**
 * Emitter module - renders schema trees for display or storage
 */

import fs from "fs/promises";
import { dirname } from "path";
import { stringify as stringifyYaml } from "yaml";
import type { SchemaTree } from "../../types/data-model.js";
import type { EmitterOptions, EmitterResult, RenderOptions } from "./types.js";
import { FileIOError, RenderError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

const GUTTER = " │ ";

/**
 * Number each line, right-aligning numbers to the widest one
 *
 * @example
 * addLineNumbers("{\n}") // "1 │ {\n2 │ }"
 */
export function addLineNumbers(text: string): string {
  const lines = text.split("\n");
  const width = String(lines.length).length;
  return lines
    .map((line, index) => `${String(index + 1).padStart(width)}${GUTTER}${line}`)
    .join("\n");
}

/**
 * Serialize a schema tree; the result always ends with a single newline
 */
export function renderSchema(tree: SchemaTree, options: RenderOptions = {}): string {
  const format = options.format ?? "json";

  let body: string;
  try {
    body =
      format === "yaml"
        ? stringifyYaml(tree).trimEnd()
        : JSON.stringify(tree, null, 2);
  } catch (error) {
    throw new RenderError(`Failed to render schema as ${format}`, { format }, { cause: error });
  }

  return `${options.lineNumbers ? addLineNumbers(body) : body}\n`;
}

/**
 * Render a schema tree and write it to a file, or stdout
 */
export async function emitSchema(
  tree: SchemaTree,
  options: EmitterOptions = {},
): Promise<EmitterResult> {
  const output = renderSchema(tree, options);
  const bytes = Buffer.byteLength(output);

  if (!options.destination) {
    process.stdout.write(output);
    return { destination: "stdout", bytes };
  }

  try {
    await fs.mkdir(dirname(options.destination), { recursive: true });
    await fs.writeFile(options.destination, output, "utf-8");
  } catch (error) {
    throw new FileIOError(
      `Failed to write schema to ${options.destination}`,
      { destination: options.destination },
      { cause: error },
    );
  }

  logger.info("Schema written", { destination: options.destination, bytes });
  return { destination: options.destination, bytes };
}
