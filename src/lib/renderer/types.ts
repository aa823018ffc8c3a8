/**
 * Renderer module types
 */

import type {
  ClientDefinition,
  ModelDefinition,
  ModelTable,
} from "../../types/data-model.js";
import type { TargetLanguage } from "../../types/config.js";

export interface ClientRenderOptions {
  modelsModule?: string; // defaults to the renderer's own sibling-module path
}

/**
 * Renderer - turns synthesized definitions into source text for one language
 */
export interface Renderer {
  readonly id: TargetLanguage;
  readonly reservedWords: ReadonlySet<string>;
  readonly defaultModelsModule: string;
  renderModel(definition: ModelDefinition): string;
  renderModelsFile(table: ModelTable): string;
  renderClient(definition: ClientDefinition, options?: ClientRenderOptions): string;
}
