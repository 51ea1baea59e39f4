/**
 * Normalizer module types
 */

import type { DateFormatName } from "../../types/config.js";

export interface NormalizerOptions {
  /** Date grammars to try, in priority order; defaults to all built-ins */
  dateFormats?: DateFormatName[];
}

export interface DateKeyMatch {
  format: DateFormatName;
  /** Position of the segment within its path */
  position: number;
  token: string;
}
