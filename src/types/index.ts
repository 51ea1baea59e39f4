/**
 * Core types for shapesift
 */

export * from "./data-model.js";
export * from "./config.js";
