/**
 * Renderer module - turns synthesized definitions into source text
 */

import {
  TARGET_LANGUAGES,
  isTargetLanguage,
  type TargetLanguage,
} from "../../types/config.js";
import type { Renderer } from "./types.js";
import { TypeScriptRenderer } from "./typescript-renderer.js";
import { PythonRenderer } from "./python-renderer.js";
import { ConfigError } from "../../utils/errors.js";

export * from "./types.js";
export * from "./typescript-renderer.js";
export * from "./python-renderer.js";
export * from "./reserved-words.js";

const RENDERERS: Record<TargetLanguage, () => Renderer> = {
  typescript: () => new TypeScriptRenderer(),
  python: () => new PythonRenderer(),
};

/**
 * Create the renderer for a target language
 */
export function createRenderer(target: TargetLanguage): Renderer {
  if (!isTargetLanguage(target)) {
    throw new ConfigError(`Unsupported target language: ${String(target)}`, {
      supported: TARGET_LANGUAGES,
    });
  }
  return RENDERERS[target]();
}
