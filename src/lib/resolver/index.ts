/**
 * Resolver module - derives endpoint names and groups calls that share one
 */

import type { CapturedCall } from "../../types/data-model.js";
import type { EndpointGroup } from "./types.js";
import { splitUrl, lastPathSegment } from "../../utils/url.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

const DIGIT_PREFIX = "call_";

/**
 * Reduce a path segment to letters, digits and single underscores
 */
export function cleanSegment(segment: string): string {
  return toIdentifierChars(
    segment.split(".")[0].split("?")[0].replace(/[ -]/g, "_"),
  );
}

function toIdentifierChars(text: string): string {
  return text
    .replace(/[^A-Za-z0-9_]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Derive the method name for a call.
 *
 * `{method}_{last path segment}`, falling back to `{method}_request_{index}`
 * when the path yields nothing usable.
 *
 * @example
 * deriveEndpointName(call("POST", "https://api.example.com/user@domain.com#section"), 0)
 * // => "post_user_domain"
 */
export function deriveEndpointName(call: CapturedCall, index: number): string {
  const method = toIdentifierChars(call.method.toLowerCase());
  const segment = lastPathSegment(splitUrl(call.url).path);
  const cleaned = segment === undefined ? "" : cleanSegment(segment);

  const name = cleaned ? `${method}_${cleaned}` : `${method}_request_${index}`;

  if (/^[0-9]/.test(name)) {
    return `${DIGIT_PREFIX}${name}`;
  }
  return name;
}

/**
 * Group calls by derived endpoint name, keeping first-seen order
 */
export function groupCalls(calls: readonly CapturedCall[]): EndpointGroup[] {
  const groups = new Map<string, EndpointGroup>();

  calls.forEach((call, index) => {
    const name = deriveEndpointName(call, index);
    const existing = groups.get(name);
    if (existing) {
      existing.calls.push(call);
      existing.indices.push(index);
      return;
    }
    groups.set(name, { name, calls: [call], indices: [index] });
  });

  logger.debug("Grouped captured calls by endpoint", {
    callCount: calls.length,
    groupCount: groups.size,
  });

  return Array.from(groups.values());
}
