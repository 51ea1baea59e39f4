/**
 * JSON schema for shapesift configuration files
 */

import { DATE_FORMAT_NAMES } from "../../lib/normalizer/index.js";
import { LOG_LEVELS } from "../../utils/logger.js";

export const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: { type: "string", enum: [...LOG_LEVELS] },
    inference: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxSamples: { type: "integer", minimum: 1 },
        dateFormats: {
          type: "array",
          items: { type: "string", enum: [...DATE_FORMAT_NAMES] },
          uniqueItems: true,
        },
      },
    },
    output: {
      type: "object",
      additionalProperties: false,
      properties: {
        format: { type: "string", enum: ["json", "yaml"] },
        lineNumbers: { type: "boolean" },
        path: { type: "string", minLength: 1 },
      },
    },
  },
} as const;
