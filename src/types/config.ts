/**
 * Configuration types for shapesift
 */

import type { LogLevel } from "../utils/logger.js";

/**
 * Readable names of the supported date-key grammars
 */
export type DateFormatName =
  | "yyyy-mm-dd"
  | "dd-mm-yyyy"
  | "yyyy/mm/dd"
  | "dd/mm/yyyy"
  | "yyyymmdd"
  | "ddmmyyyy"
  | "month dd, yyyy"
  | "dd month yyyy"
  | "yyyy-mm"
  | "mm-yyyy";

export type OutputFormat = "json" | "yaml";

/**
 * InferenceConfig - inference engine behaviour
 */
export interface InferenceConfig {
  /** Maximum number of distinct example values kept per path */
  maxSamples: number;
  /** Date grammars tried on every path segment, in priority order */
  dateFormats: DateFormatName[];
}

/**
 * OutputConfig - rendering and destination
 */
export interface OutputConfig {
  format: OutputFormat;
  lineNumbers: boolean;
  /** File path; stdout when absent */
  path?: string;
}

/**
 * ShapeSiftConfig - complete resolved configuration
 */
export interface ShapeSiftConfig {
  logLevel: LogLevel;
  inference: InferenceConfig;
  output: OutputConfig;
}

/**
 * ShapeSiftConfigFile - configuration as written in a .json/.yaml file,
 * every field optional
 */
export interface ShapeSiftConfigFile {
  logLevel?: LogLevel;
  inference?: Partial<InferenceConfig>;
  output?: Partial<OutputConfig>;
}
