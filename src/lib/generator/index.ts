/**
 * Generator module - drives model and client generation for one capture
 */

import type {
  CapturedCall,
  ClientDefinition,
  ModelTable,
} from "../../types/data-model.js";
import type { GeneratorOptions } from "../../types/config.js";
import type { CaptureSource } from "../reader/types.js";
import type { Renderer } from "../renderer/types.js";
import type { ClientGenerationOptions, GenerationResult } from "./types.js";
import { createRenderer } from "../renderer/index.js";
import { groupCalls } from "../resolver/index.js";
import {
  generateModelsFromResponses,
  synthesizeClient,
} from "../synthesizer/index.js";
import { loadGeneratorConfig } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

/**
 * Main generator class
 *
 * Calls come either from the capture source given at construction or from
 * each method's `calls` argument; with neither, generation fails with a
 * ConfigError.
 */
export class CaptureGenerator {
  readonly options: GeneratorOptions;
  private readonly renderer: Renderer;
  private modelTable: ModelTable | undefined;
  private modelCalls: readonly CapturedCall[] | undefined;

  constructor(
    private readonly source?: CaptureSource,
    options: Partial<GeneratorOptions> = {},
  ) {
    this.options = loadGeneratorConfig(options);
    this.renderer = createRenderer(this.options.target);
  }

  private resolveCalls(calls?: readonly CapturedCall[]): readonly CapturedCall[] {
    if (calls) {
      return calls;
    }
    if (!this.source) {
      throw new ConfigError("No captured calls or capture source provided");
    }
    return this.source.getCalls();
  }

  /**
   * Infer models from response bodies; returns rendered text keyed by URL
   */
  generateModels(calls?: readonly CapturedCall[]): Map<string, string> {
    const resolved = this.resolveCalls(calls);
    const result = generateModelsFromResponses(resolved, {
      reservedWords: this.renderer.reservedWords,
    });
    this.modelTable = result.table;
    this.modelCalls = calls === undefined ? undefined : resolved;

    const rendered = new Map<string, string>();
    for (const [url, entry] of result.table) {
      rendered.set(url, this.renderer.renderModel(entry.definition));
    }
    return rendered;
  }

  /**
   * Model table from the last generateModels run (empty before the first)
   */
  getModelTable(): ModelTable {
    return this.modelTable ?? new Map();
  }

  /**
   * All models of the last run as one source file
   */
  renderModelsFile(): string {
    return this.renderer.renderModelsFile(this.getModelTable());
  }

  /**
   * Build the structured client definition. Annotated clients use the model
   * table of the last generateModels run when it was built from the same
   * calls, and regenerate it otherwise.
   */
  buildClientDefinition(
    calls?: readonly CapturedCall[],
    options: ClientGenerationOptions = {},
  ): ClientDefinition {
    const resolved = this.resolveCalls(calls);
    const useModelAnnotations =
      options.useModelAnnotations ?? this.options.useModelAnnotations;

    if (useModelAnnotations && (!this.modelTable || calls !== this.modelCalls)) {
      this.generateModels(calls);
    }

    return synthesizeClient(groupCalls(resolved), {
      name: this.options.clientName,
      useModelAnnotations,
      models: this.modelTable,
      excludeHeaders: this.options.excludeHeaders,
    });
  }

  /**
   * Generate client source text with one method per endpoint group
   */
  generateClient(
    calls?: readonly CapturedCall[],
    options: ClientGenerationOptions = {},
  ): string {
    return this.renderer.renderClient(this.buildClientDefinition(calls, options), {
      modelsModule: this.options.modelsModule,
    });
  }

  /**
   * Run the whole pipeline over one capture
   */
  generate(calls?: readonly CapturedCall[]): GenerationResult {
    const resolved = this.resolveCalls(calls);
    logger.info("Starting generation", {
      calls: resolved.length,
      target: this.options.target,
    });

    const models = this.generateModels(resolved);
    const groups = groupCalls(resolved);
    const clientDefinition = synthesizeClient(groups, {
      name: this.options.clientName,
      useModelAnnotations: this.options.useModelAnnotations,
      models: this.getModelTable(),
      excludeHeaders: this.options.excludeHeaders,
    });

    const result: GenerationResult = {
      models,
      modelTable: this.getModelTable(),
      modelsFile: this.renderModelsFile(),
      groups,
      clientDefinition,
      client: this.renderer.renderClient(clientDefinition, {
        modelsModule: this.options.modelsModule,
      }),
    };

    logger.info("Generation complete", {
      models: models.size,
      methods: clientDefinition.methods.length,
    });

    return result;
  }
}
