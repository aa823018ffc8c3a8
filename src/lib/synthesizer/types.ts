/**
 * Synthesizer module types
 */

import type { ModelTable } from "../../types/data-model.js";

export interface ModelSynthesisOptions {
  reservedWords: ReadonlySet<string>; // lower-cased keywords of the target language
}

export type SkipReason = "no-body" | "invalid-json";

export interface SkippedResponse {
  url: string;
  index: number;
  reason: SkipReason;
}

export interface ModelGenerationResult {
  table: ModelTable;
  skipped: SkippedResponse[];
  renamed: number; // models whose name was suffixed to avoid a clash
}

export interface ClientSynthesisOptions {
  name: string;
  useModelAnnotations: boolean;
  models?: ModelTable;
  excludeHeaders?: readonly string[];
}
