/**
 * shapesift: structural schema inference for undocumented JSON dataset exports
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/classifier/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
