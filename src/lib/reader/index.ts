/**
 * Reader module - turns HAR files into CapturedCall records
 */

import { readFile } from "node:fs/promises";
import type { CapturedBody, CapturedCall, Header } from "../../types/data-model.js";
import type { CaptureSource } from "./types.js";
import { CaptureFormatError, ConfigError, FileIOError } from "../../utils/errors.js";
import { splitUrl } from "../../utils/url.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function readNameValues(value: unknown): Header[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const pairs: Header[] = [];
  for (const item of value) {
    if (isObject(item) && typeof item.name === "string" && typeof item.value === "string") {
      pairs.push({ name: item.name, value: item.value });
    }
  }
  return pairs;
}

function encodeQuery(params: Header[]): string {
  const search = new URLSearchParams();
  for (const { name, value } of params) {
    search.append(name, value);
  }
  return search.toString();
}

function readResponseBody(content: unknown): CapturedBody | undefined {
  if (!isObject(content)) {
    return undefined;
  }
  const text = optionalString(content.text);
  if (text === undefined) {
    return undefined;
  }
  const mimeType = optionalString(content.mimeType);
  const decoded =
    content.encoding === "base64" ? Buffer.from(text, "base64").toString("utf-8") : text;
  return mimeType === undefined ? { text: decoded } : { text: decoded, mimeType };
}

function readRequestBody(postData: unknown): CapturedBody | undefined {
  if (!isObject(postData)) {
    return undefined;
  }
  const text = optionalString(postData.text);
  if (text === undefined) {
    return undefined;
  }
  const mimeType = optionalString(postData.mimeType);
  return mimeType === undefined ? { text } : { text, mimeType };
}

/**
 * Convert one HAR entry, failing on entries that lack the fields every
 * exchange must carry
 */
export function parseHarEntry(entry: unknown, index: number): CapturedCall {
  const request = isObject(entry) ? entry.request : undefined;
  const response = isObject(entry) ? entry.response : undefined;
  if (!isObject(request) || !isObject(response)) {
    throw new CaptureFormatError("HAR entry is missing its request or response", { index });
  }

  if (typeof request.url !== "string" || typeof request.method !== "string") {
    throw new CaptureFormatError("HAR request needs a string url and method", { index });
  }

  const queryString = readNameValues(request.queryString);
  const query = queryString.length > 0 ? encodeQuery(queryString) : splitUrl(request.url).search;

  const requestBody = readRequestBody(request.postData);
  const responseBody = readResponseBody(response.content);

  return {
    url: request.url,
    method: request.method.toUpperCase(),
    request: {
      headers: readNameValues(request.headers),
      query,
      ...(requestBody ? { body: requestBody } : {}),
    },
    response: {
      status: typeof response.status === "number" ? response.status : 0,
      ...(responseBody ? { body: responseBody } : {}),
    },
  };
}

/**
 * Parse HAR JSON text into captured calls, in recorded order
 */
export function parseHar(text: string): CapturedCall[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new CaptureFormatError("Invalid HAR content: failed to parse JSON", undefined, {
      cause: error,
    });
  }

  const log = isObject(document) ? document.log : undefined;
  const entries = isObject(log) ? log.entries : undefined;
  if (!Array.isArray(entries)) {
    throw new CaptureFormatError("Invalid HAR format: missing log.entries");
  }

  return entries.map((entry: unknown, index: number) => parseHarEntry(entry, index));
}

/**
 * Reader for HAR files on disk
 */
export class HarReader implements CaptureSource {
  private calls: CapturedCall[] | undefined;

  constructor(private readonly harPath: string) {}

  async load(): Promise<this> {
    logger.info("Loading capture", { path: this.harPath });

    let content: string;
    try {
      content = await readFile(this.harPath, "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to read capture file: ${this.harPath}`, {
        path: this.harPath,
      }, { cause: error });
    }

    this.calls = parseHar(content);
    logger.info("Capture loaded", { path: this.harPath, entries: this.calls.length });
    return this;
  }

  getCalls(): CapturedCall[] {
    if (!this.calls) {
      throw new ConfigError("Capture not loaded: call load() first", {
        path: this.harPath,
      });
    }
    return [...this.calls];
  }

  filterByStatus(status: number): CapturedCall[] {
    return this.getCalls().filter((call) => call.response.status === status);
  }

  filterByMethod(method: string): CapturedCall[] {
    const wanted = method.toUpperCase();
    return this.getCalls().filter((call) => call.method.toUpperCase() === wanted);
  }
}
