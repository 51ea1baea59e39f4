/**
 * Emitter module types
 */

import type { OutputFormat } from "../../types/config.js";

export interface RenderOptions {
  format?: OutputFormat;
  /** Prefix every line with its number */
  lineNumbers?: boolean;
}

export interface EmitterOptions extends RenderOptions {
  /** Output file; stdout when absent */
  destination?: string;
}

export interface EmitterResult {
  destination: string;
  bytes: number;
}
