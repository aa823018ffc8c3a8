/**
 * Generator module types
 */

import type { ClientDefinition, ModelTable } from "../../types/data-model.js";
import type { EndpointGroup } from "../resolver/types.js";

export interface ClientGenerationOptions {
  useModelAnnotations?: boolean; // falls back to the generator's configured value
}

export interface GenerationResult {
  models: Map<string, string>; // source URL → rendered model text
  modelTable: ModelTable;
  modelsFile: string;
  groups: EndpointGroup[];
  clientDefinition: ClientDefinition;
  client: string;
}
