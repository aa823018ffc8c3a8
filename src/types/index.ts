// Core re-exports for the Harscribe type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/reader/types.js";
export * from "../lib/resolver/types.js";
export * from "../lib/synthesizer/types.js";
export * from "../lib/renderer/types.js";
export * from "../lib/generator/types.js";
