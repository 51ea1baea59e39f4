/**
 * Configuration loader: CLI flags > config file > defaults
 */

import type {
  DateFormatName,
  OutputFormat,
  ShapeSiftConfig,
  ShapeSiftConfigFile,
} from "../types/config.js";
import { DATE_FORMAT_NAMES } from "../lib/normalizer/index.js";
import { DEFAULT_SAMPLE_CAPACITY } from "../lib/sampler/index.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger } from "./logger.js";

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ShapeSiftConfig = {
  logLevel: "info",
  inference: {
    maxSamples: DEFAULT_SAMPLE_CAPACITY,
    dateFormats: [...DATE_FORMAT_NAMES],
  },
  output: {
    format: "json",
    lineNumbers: false,
  },
};

/**
 * CLI overrides, already separated from commander's raw option bag
 */
export interface CliOverrides {
  logLevel?: string;
  maxSamples?: number;
  /** Comma-separated grammar names */
  dateFormats?: string;
  /** --no-date-normalization */
  disableDateNormalization?: boolean;
  format?: string;
  lineNumbers?: boolean;
  output?: string;
}

function isDateFormatName(value: string): value is DateFormatName {
  return DATE_FORMAT_NAMES.some((name) => name === value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "json" || value === "yaml";
}

/**
 * Parse a comma-separated list of date grammar names
 *
 * @example
 * parseDateFormats("yyyy-mm-dd, yyyy-mm") // ["yyyy-mm-dd", "yyyy-mm"]
 */
export function parseDateFormats(list: string): DateFormatName[] {
  const names = list
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return names.map((name) => {
    if (!isDateFormatName(name)) {
      throw new ConfigError(`Unknown date format: ${name}`, {
        supported: [...DATE_FORMAT_NAMES],
      });
    }
    return name;
  });
}

/**
 * Merge CLI overrides and a config file section over the defaults
 */
export function loadConfig(
  cli: CliOverrides = {},
  configFile: ShapeSiftConfigFile = {},
): ShapeSiftConfig {
  const logLevel =
    cli.logLevel ?? configFile.logLevel ?? process.env.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid log level: ${logLevel}`);
  }

  const format = cli.format ?? configFile.output?.format ?? DEFAULT_CONFIG.output.format;
  if (!isOutputFormat(format)) {
    throw new ConfigError(`Unsupported output format: ${format}. Must be json or yaml`);
  }

  let dateFormats: DateFormatName[];
  if (cli.disableDateNormalization) {
    dateFormats = [];
  } else if (cli.dateFormats !== undefined) {
    dateFormats = parseDateFormats(cli.dateFormats);
  } else {
    dateFormats = configFile.inference?.dateFormats ?? DEFAULT_CONFIG.inference.dateFormats;
  }

  const config: ShapeSiftConfig = {
    logLevel,
    inference: {
      maxSamples:
        cli.maxSamples ??
        configFile.inference?.maxSamples ??
        DEFAULT_CONFIG.inference.maxSamples,
      dateFormats,
    },
    output: {
      format,
      lineNumbers:
        cli.lineNumbers ??
        configFile.output?.lineNumbers ??
        DEFAULT_CONFIG.output.lineNumbers,
      path: cli.output ?? configFile.output?.path,
    },
  };

  validateConfig(config);

  logger.debug("Configuration resolved", {
    maxSamples: config.inference.maxSamples,
    dateFormats: config.inference.dateFormats.length,
    format: config.output.format,
  });

  return config;
}

/**
 * Validate a resolved configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: ShapeSiftConfig): void {
  const { maxSamples } = config.inference;
  if (!Number.isInteger(maxSamples) || maxSamples < 1) {
    throw new ConfigError(`maxSamples must be a positive integer, got ${maxSamples}`);
  }

  const seen = new Set<DateFormatName>();
  for (const name of config.inference.dateFormats) {
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate date format: ${name}`);
    }
    seen.add(name);
  }
}
