/**
 * Harscribe: data models and replayable HTTP clients from recorded traffic
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/reader/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/renderer/index.js";
export * from "./lib/generator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
