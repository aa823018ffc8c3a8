/**
 * Conversion from parsed JSON to the tagged JsonValue representation
 */

import type { JsonValue } from "../../types/data-model.js";

export type JsonParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: string };

/**
 * Convert the output of JSON.parse into a JsonValue.
 * Values JSON cannot produce (undefined, functions, symbols) map to null.
 */
export function toJsonValue(raw: unknown): JsonValue {
  if (raw === null || raw === undefined) {
    return { kind: "null" };
  }
  if (typeof raw === "boolean") {
    return { kind: "bool", value: raw };
  }
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) {
      return { kind: "float", value: raw, raw: String(raw) };
    }
    // String(1e21) is "1e+21"; spell large integers out in full
    const digits = Number.isSafeInteger(raw) ? String(raw) : BigInt(raw).toString();
    return { kind: "int", value: raw, raw: digits };
  }
  if (typeof raw === "string") {
    return { kind: "string", value: raw };
  }
  if (Array.isArray(raw)) {
    return { kind: "array", items: raw.map((item: unknown) => toJsonValue(item)) };
  }
  if (typeof raw === "object") {
    return {
      kind: "object",
      entries: Object.entries(raw).map(
        ([key, value]: [string, unknown]) => [key, toJsonValue(value)] as const,
      ),
    };
  }
  return { kind: "null" };
}

const NUMBER = /-?(?:0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?/y;
const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

/**
 * Walks JSON text that JSON.parse has already accepted, keeping object keys
 * in document order and telling integers from floats by their lexeme.
 */
class JsonScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  scan(): JsonValue {
    return this.value();
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && WHITESPACE.has(this.text[this.pos])) {
      this.pos++;
    }
  }

  private peek(): string {
    this.skipWhitespace();
    return this.text[this.pos];
  }

  private value(): JsonValue {
    switch (this.peek()) {
      case "{":
        return this.object();
      case "[":
        return this.array();
      case '"':
        return { kind: "string", value: this.string() };
      case "t":
        this.pos += 4;
        return { kind: "bool", value: true };
      case "f":
        this.pos += 5;
        return { kind: "bool", value: false };
      case "n":
        this.pos += 4;
        return { kind: "null" };
      default:
        return this.number();
    }
  }

  private object(): JsonValue {
    this.pos++; // {
    const entries: Array<[string, JsonValue]> = [];
    const positions = new Map<string, number>();

    while (this.peek() !== "}") {
      const key = this.string();
      this.peek();
      this.pos++; // :
      const item = this.value();

      // duplicate keys: last value wins, first position stays (as JSON.parse)
      const existing = positions.get(key);
      if (existing === undefined) {
        positions.set(key, entries.length);
        entries.push([key, item]);
      } else {
        entries[existing] = [key, item];
      }

      if (this.peek() === ",") {
        this.pos++;
      }
    }
    this.pos++; // }

    return { kind: "object", entries };
  }

  private array(): JsonValue {
    this.pos++; // [
    const items: JsonValue[] = [];
    while (this.peek() !== "]") {
      items.push(this.value());
      if (this.peek() === ",") {
        this.pos++;
      }
    }
    this.pos++; // ]
    return { kind: "array", items };
  }

  private string(): string {
    this.peek();
    const start = this.pos;
    this.pos++; // opening quote
    while (this.pos < this.text.length && this.text[this.pos] !== '"') {
      this.pos += this.text[this.pos] === "\\" ? 2 : 1;
    }
    this.pos++; // closing quote

    const decoded: unknown = JSON.parse(this.text.slice(start, this.pos));
    return typeof decoded === "string" ? decoded : "";
  }

  private number(): JsonValue {
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) {
      throw new SyntaxError(`Unexpected token at position ${this.pos}`);
    }
    this.pos += match[0].length;

    const raw = match[0];
    const value = Number(raw);
    const isFloat = match[1] !== undefined || match[2] !== undefined;
    return isFloat ? { kind: "float", value, raw } : { kind: "int", value, raw };
  }
}

/**
 * Parse JSON text without throwing.
 *
 * Unlike toJsonValue(JSON.parse(text)), object keys keep document order even
 * when they look like integers, and `1.0` or `1e3` are floats.
 */
export function parseJson(text: string): JsonParseResult {
  try {
    JSON.parse(text);
    return { ok: true, value: new JsonScanner(text).scan() };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Convert a JsonValue back to a plain value (for JSON.stringify and tests)
 */
export function fromJsonValue(value: JsonValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "int":
    case "float":
    case "string":
      return value.value;
    case "array":
      return value.items.map(fromJsonValue);
    case "object":
      return Object.fromEntries(
        value.entries.map(([key, item]) => [key, fromJsonValue(item)]),
      );
  }
}
