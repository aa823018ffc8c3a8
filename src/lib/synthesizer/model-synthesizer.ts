/**
 * Model synthesizer - turns sampled response bodies into named model definitions
 */

import type {
  CapturedCall,
  InferredField,
  JsonObject,
  JsonValue,
  ModelDefinition,
  ModelTable,
  RecordModel,
} from "../../types/data-model.js";
import type {
  ModelGenerationResult,
  ModelSynthesisOptions,
  SkippedResponse,
} from "./types.js";
import { inferType } from "../inferencer/index.js";
import { parseJson } from "../inferencer/json-value.js";
import { splitUrl, lastPathSegment } from "../../utils/url.js";
import { claimName } from "../../utils/names.js";
import { logger } from "../../utils/logger.js";

const MODEL_SUFFIX = "Model";
const ITEM_SUFFIX = "Item";

/**
 * Make a response key usable as a field name in the target language
 */
export function sanitizeFieldName(
  name: string,
  reservedWords: ReadonlySet<string>,
): string {
  let sanitized = name.replace(/[-. ]/g, "_");

  if (!sanitized) {
    return "_";
  }

  if (/^[0-9]/.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  if (reservedWords.has(sanitized.toLowerCase())) {
    sanitized = `${sanitized}_`;
  }

  return sanitized;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Derive a PascalCase model name from the last path segment of a URL.
 *
 * @example
 * urlToModelName("https://api.example.com/v1/user-profiles.json", 0) // "UserProfilesModel"
 * urlToModelName("https://api.example.com/", 3) // "Response3Model"
 */
export function urlToModelName(url: string, index: number): string {
  const fallback = `Response${index}`;
  const segment = lastPathSegment(splitUrl(url).path);

  let stem = fallback;
  if (segment !== undefined) {
    const words = segment
      .split("?")[0]
      .split(".")[0]
      .split(/[^A-Za-z0-9]+/)
      .filter((word) => word.length > 0);
    const joined = words.map(capitalize).join("");
    stem = !joined || /^[0-9]/.test(joined) ? fallback : joined;
  }

  return `${stem}${MODEL_SUFFIX}`;
}

function synthesizeRecord(
  value: JsonObject,
  name: string,
  options: ModelSynthesisOptions,
): RecordModel {
  // "a-b" and "a_b" both sanitize to a_b; the later key becomes a_b2
  const claimed = new Set<string>();
  const fields: InferredField[] = value.entries.map(([key, fieldValue]) => ({
    name: claimName(sanitizeFieldName(key, options.reservedWords), claimed),
    originalName: key,
    type: inferType(fieldValue),
  }));

  return { kind: "record", name, fields };
}

/**
 * Build the model definition for one sampled JSON value.
 *
 * Objects become records (possibly with no fields). Arrays are sampled by
 * their first element: objects yield `{name}Item` records, primitives a list
 * alias. Empty arrays and bare primitives only get a placeholder.
 */
export function synthesizeModel(
  value: JsonValue,
  modelName: string,
  options: ModelSynthesisOptions,
): ModelDefinition {
  if (value.kind === "object") {
    return synthesizeRecord(value, modelName, options);
  }

  if (value.kind === "array" && value.items.length > 0) {
    const first = value.items[0];
    if (first.kind === "object") {
      return {
        kind: "list-of-record",
        name: modelName,
        item: synthesizeRecord(first, `${modelName}${ITEM_SUFFIX}`, options),
      };
    }
    return {
      kind: "list-of-primitive",
      name: modelName,
      itemType: inferType(first),
    };
  }

  return { kind: "placeholder", name: modelName, sampled: inferType(value) };
}

/**
 * Names a definition puts into the output namespace
 */
export function declaredNames(definition: ModelDefinition): string[] {
  switch (definition.kind) {
    case "record":
    case "list-of-primitive":
      return [definition.name];
    case "list-of-record":
      return [definition.name, definition.item.name];
    case "placeholder":
      return [];
  }
}

/**
 * Infer a model for every JSON response in the capture.
 *
 * Responses without a body or with a body that is not JSON are skipped. The
 * table is keyed by URL and the last call for a URL replaces earlier ones.
 * Once the table is final, a model whose name was already taken by an
 * earlier URL gets a numeric suffix.
 */
export function generateModelsFromResponses(
  calls: readonly CapturedCall[],
  options: ModelSynthesisOptions,
): ModelGenerationResult {
  logger.info("Starting model generation", { callCount: calls.length });

  const sampled = new Map<string, { index: number; value: JsonValue }>();
  const skipped: SkippedResponse[] = [];

  calls.forEach((call, index) => {
    const text = call.response.body?.text;
    if (!text) {
      skipped.push({ url: call.url, index, reason: "no-body" });
      return;
    }

    const parsed = parseJson(text);
    if (!parsed.ok) {
      logger.debug("Skipping non-JSON response", {
        url: call.url,
        index,
        error: parsed.error,
      });
      skipped.push({ url: call.url, index, reason: "invalid-json" });
      return;
    }

    sampled.set(call.url, { index, value: parsed.value });
  });

  const table: ModelTable = new Map();
  const claimed = new Set<string>();
  let renamed = 0;

  for (const [url, { index, value }] of sampled) {
    const base = urlToModelName(url, index);
    const name = claimName(base, claimed);
    if (name !== base) {
      renamed++;
    }

    const definition = synthesizeModel(value, name, options);
    for (const declared of declaredNames(definition)) {
      claimed.add(declared);
    }
    table.set(url, { url, index, definition });
  }

  if (renamed > 0) {
    logger.warn("Suffixed model names shared by different URLs", { renamed });
  }

  logger.info("Model generation complete", {
    models: table.size,
    skipped: skipped.length,
  });

  return { table, skipped, renamed };
}
