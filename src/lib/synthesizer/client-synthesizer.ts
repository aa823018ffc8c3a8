/**
 * Client synthesizer - one replayable method per endpoint group
 */

import type {
  CapturedCall,
  ClientDefinition,
  ClientMethod,
  ModelTable,
  QueryValue,
  RequestBody,
} from "../../types/data-model.js";
import type { EndpointGroup } from "../resolver/types.js";
import type { ClientSynthesisOptions } from "./types.js";
import { parseJson } from "../inferencer/json-value.js";
import { splitUrl } from "../../utils/url.js";
import { logger } from "../../utils/logger.js";

/**
 * Headers the HTTP stack sets itself; never replayed
 */
export const TRANSPORT_HEADERS: ReadonlySet<string> = new Set([
  "host",
  "content-length",
  "connection",
]);

function isExcludedHeader(name: string, extra: ReadonlySet<string>): boolean {
  // HTTP/2 pseudo-headers such as ":authority" show up in browser captures
  return TRANSPORT_HEADERS.has(name) || name.startsWith(":") || extra.has(name);
}

/**
 * Union of the headers of every call in a group.
 * The first value seen for a name wins; names compare case-insensitively.
 */
export function mergeHeaders(
  calls: readonly CapturedCall[],
  excludeHeaders: readonly string[] = [],
): Array<[string, string]> {
  const extra = new Set(excludeHeaders.map((name) => name.toLowerCase()));
  const seen = new Set<string>();
  const merged: Array<[string, string]> = [];

  for (const call of calls) {
    for (const header of call.request.headers) {
      const key = header.name.toLowerCase();
      if (seen.has(key) || isExcludedHeader(key, extra)) {
        continue;
      }
      seen.add(key);
      merged.push([header.name, header.value]);
    }
  }

  return merged;
}

/**
 * Parse a query string. Blank values are dropped, repeated names keep every
 * value in order and single values are flattened to a string.
 */
export function parseQuery(search: string): Array<[string, QueryValue]> {
  const values = new Map<string, string[]>();

  for (const [key, value] of new URLSearchParams(search)) {
    if (!value) {
      continue;
    }
    const existing = values.get(key);
    if (existing) {
      existing.push(value);
    } else {
      values.set(key, [value]);
    }
  }

  return Array.from(values, ([key, list]): [string, QueryValue] => [
    key,
    list.length === 1 ? list[0] : list,
  ]);
}

export function extractBody(call: CapturedCall): RequestBody {
  const text = call.request.body?.text;
  if (!text) {
    return { kind: "none" };
  }

  const parsed = parseJson(text);
  return parsed.ok ? { kind: "json", value: parsed.value } : { kind: "text", text };
}

function resolveReturnType(
  url: string,
  models: ModelTable | undefined,
): string | undefined {
  const entry = models?.get(url);
  if (!entry || entry.definition.kind === "placeholder") {
    return undefined;
  }
  return entry.definition.name;
}

function synthesizeMethod(
  group: EndpointGroup,
  options: ClientSynthesisOptions,
): ClientMethod {
  const representative = group.calls[0];
  const { origin, rawPath, search } = splitUrl(representative.url);

  const method: ClientMethod = {
    name: group.name,
    httpMethod: representative.method.toUpperCase(),
    url: representative.url,
    baseUrl: `${origin}${rawPath}`,
    path: rawPath,
    headers: mergeHeaders(group.calls, options.excludeHeaders),
    query: parseQuery(search),
    body: extractBody(representative),
    callCount: group.calls.length,
  };

  if (options.useModelAnnotations) {
    const returnType = resolveReturnType(representative.url, options.models);
    if (returnType) {
      method.returnType = returnType;
    }
  }

  return method;
}

/**
 * Build the client definition: exactly one method per endpoint group
 */
export function synthesizeClient(
  groups: readonly EndpointGroup[],
  options: ClientSynthesisOptions,
): ClientDefinition {
  logger.info("Starting client synthesis", {
    groups: groups.length,
    useModelAnnotations: options.useModelAnnotations,
  });

  const methods: ClientMethod[] = [];
  const emitted = new Set<string>();

  for (const group of groups) {
    if (group.calls.length === 0 || emitted.has(group.name)) {
      continue;
    }
    emitted.add(group.name);
    methods.push(synthesizeMethod(group, options));
  }

  const modelImports = Array.from(
    new Set(
      methods
        .map((method) => method.returnType)
        .filter((name): name is string => name !== undefined),
    ),
  );

  logger.info("Client synthesis complete", {
    methods: methods.length,
    typedMethods: methods.filter((method) => method.returnType).length,
  });

  return { name: options.name, methods, modelImports };
}
