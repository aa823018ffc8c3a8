/**
 * Generator configuration types
 */

export type TargetLanguage = "typescript" | "python";

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ["typescript", "python"];

export function isTargetLanguage(value: unknown): value is TargetLanguage {
  return TARGET_LANGUAGES.some((target) => target === value);
}

export interface GeneratorOptions {
  target: TargetLanguage;
  clientName: string;
  modelsModule?: string; // module the client imports model types from; renderer default when unset
  useModelAnnotations: boolean;
  excludeHeaders: string[]; // extra header names never replayed
}

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
  target: "typescript",
  clientName: "CapturedClient",
  useModelAnnotations: false,
  excludeHeaders: [],
};
