/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import AjvModule from "ajv";
import type { ShapeSiftConfigFile } from "../../types/config.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

// ajv is CommonJS; its class is the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ShapeSiftConfigFile>(CONFIG_FILE_SCHEMA);

/**
 * Parse configuration text. `format` selects the syntax.
 */
export function parseConfigText(
  content: string,
  format: "json" | "yaml",
  source: string,
): ShapeSiftConfigFile {
  let raw: unknown;
  try {
    raw = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${source}`, { source }, { cause: error });
  }

  // an empty YAML document parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  if (!validateConfigFile(raw)) {
    const problems = (validateConfigFile.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file: ${source}`, { source, problems });
  }

  return raw;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): ShapeSiftConfigFile {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  const config = parseConfigText(content, isYaml ? "yaml" : "json", filePath);

  logger.debug("Configuration file parsed successfully", {
    hasInferenceConfig: !!config.inference,
    hasOutputConfig: !!config.output,
  });

  return config;
}
