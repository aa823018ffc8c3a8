/**
 * URL helpers shared by the resolver and the synthesizers
 */

const RELATIVE_BASE = "http://localhost";

export interface UrlParts {
  origin: string;
  path: string; // percent-decoded where possible
  rawPath: string;
  search: string; // without the leading "?"
}

/**
 * Split a captured URL. Relative URLs resolve against a placeholder host so
 * their path and query can still be read.
 */
export function splitUrl(url: string): UrlParts {
  const absolute = tryParse(url);
  const parsed = absolute ?? tryParse(url, RELATIVE_BASE);
  if (!parsed) {
    return splitUnparseable(url);
  }

  return {
    origin: absolute && absolute.origin !== "null" ? absolute.origin : "",
    path: decodePath(parsed.pathname),
    rawPath: parsed.pathname,
    search: parsed.search.replace(/^\?/, ""),
  };
}

function tryParse(url: string, base?: string): URL | undefined {
  try {
    return new URL(url, base);
  } catch {
    return undefined;
  }
}

function splitUnparseable(url: string): UrlParts {
  const withoutFragment = url.split("#")[0] ?? "";
  const queryStart = withoutFragment.indexOf("?");
  const rawPath =
    queryStart === -1 ? withoutFragment : withoutFragment.slice(0, queryStart);
  return {
    origin: "",
    path: decodePath(rawPath),
    rawPath,
    search: queryStart === -1 ? "" : withoutFragment.slice(queryStart + 1),
  };
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // malformed escape sequence, keep the encoded form
    return path;
  }
}

/**
 * Last non-empty "/"-delimited segment of a path, or undefined
 */
export function lastPathSegment(path: string): string | undefined {
  const trimmed = path.replace(/^\/+|\/+$/g, "");
  if (!trimmed) {
    return undefined;
  }
  const parts = trimmed.split("/");
  return parts[parts.length - 1] || undefined;
}
