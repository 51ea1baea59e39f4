/**
 * CLI configuration types
 */

/**
 * Options accepted by the infer command, as parsed by commander
 */
export interface InferCommandOptions {
  config?: string;
  format?: string;
  lineNumbers?: boolean;
  maxSamples?: number;
  dateFormats?: string;
  /** false when --no-date-normalization is passed */
  dateNormalization: boolean;
  output?: string;
  inputFormat?: string;
}

/**
 * Global program options
 */
export interface GlobalOptions {
  logLevel?: string;
}
