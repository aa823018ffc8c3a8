/**
 * Synthesizer module - model and client definitions from captured calls
 */

export * from "./types.js";
export * from "./model-synthesizer.js";
export * from "./client-synthesizer.js";
