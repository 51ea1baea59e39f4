/**
 * Sampler module types
 */

export interface SampleSetOptions {
  /** Maximum number of distinct values retained (default: 10) */
  capacity?: number;
}

/**
 * The record inference is run against
 */
export interface RepresentativeRecord {
  /** Index (record list) or key (record map) of the selected record */
  source: number | string;
  record: unknown;
}
