/**
 * Infer command - derive the schema of a JSON dataset export
 */

import { Command, InvalidArgumentError } from "commander";
import type { GlobalOptions, InferCommandOptions } from "../config/types.js";
import type { ShapeSiftConfig, ShapeSiftConfigFile } from "../../types/config.js";
import { parseConfigFile } from "../config/parser.js";
import { loadDocument, type InputFormat } from "../../lib/loader/index.js";
import { inferSchema, type InferencerResult } from "../../lib/inferencer/index.js";
import { emitSchema } from "../../lib/emitter/index.js";
import { loadConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import { ConfigError, ShapeSiftError, ErrorCode } from "../../utils/errors.js";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseInputFormat(value: string | undefined): InputFormat | undefined {
  if (value === undefined || value === "json" || value === "ndjson") {
    return value;
  }
  throw new ConfigError(`Unsupported input format: ${value}. Must be json or ndjson`);
}

/**
 * Resolve the effective configuration for one run
 */
export function resolveInferConfig(
  options: InferCommandOptions,
  logLevel?: string,
): ShapeSiftConfig {
  const configFile: ShapeSiftConfigFile = options.config
    ? parseConfigFile(options.config)
    : {};

  return loadConfig(
    {
      logLevel,
      maxSamples: options.maxSamples,
      dateFormats: options.dateFormats,
      disableDateNormalization: options.dateNormalization === false,
      format: options.format,
      lineNumbers: options.lineNumbers,
      output: options.output,
    },
    configFile,
  );
}

/**
 * Load, infer and emit
 */
export async function runInfer(
  inputPath: string,
  options: InferCommandOptions,
  logLevel?: string,
): Promise<InferencerResult> {
  const config = resolveInferConfig(options, logLevel);
  logger.setLevel(config.logLevel);

  const { data } = await loadDocument(inputPath, parseInputFormat(options.inputFormat));

  const result = inferSchema(data, {
    maxSamples: config.inference.maxSamples,
    dateFormats: config.inference.dateFormats,
  });

  await emitSchema(result.tree, {
    format: config.output.format,
    lineNumbers: config.output.lineNumbers,
    destination: config.output.path,
  });

  return result;
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  command
    .description("Infer the structural schema of a JSON dataset export")
    .argument("<input>", "JSON or NDJSON file to analyze")
    .option("-c, --config <path>", "Config file (.json, .yaml, .yml)")
    .option("-f, --format <format>", "Output format: json, yaml")
    .option("-n, --line-numbers", "Prefix output lines with line numbers")
    .option("--max-samples <count>", "Distinct example values kept per field", parsePositiveInt)
    .option("--date-formats <list>", "Comma-separated date key grammars, in priority order")
    .option("--no-date-normalization", "Keep date-valued keys as literal path segments")
    .option("--input-format <format>", "Force input parsing: json, ndjson")
    .option("-o, --output <path>", "Write the schema to a file instead of stdout")
    .action(async (input: string, options: InferCommandOptions, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      try {
        await runInfer(input, options, globals.logLevel);
      } catch (error) {
        const wrapped =
          error instanceof ShapeSiftError
            ? error
            : new ShapeSiftError(
                ErrorCode.GENERAL_ERROR,
                error instanceof Error ? error.message : String(error),
                undefined,
                { cause: error },
              );
        logger.error("Schema inference failed", { code: wrapped.code, message: wrapped.message });
        console.error(JSON.stringify(wrapped.toResponse("inference"), null, 2));
        process.exitCode = 1;
      }
    });

  return command;
}
