/**
 * Inferencer module - maps sampled JSON values to field type tags
 */

import type { JsonValue, TypeTag } from "../../types/data-model.js";

export * from "./json-value.js";

const OPTIONAL_ANY: TypeTag = { kind: "optional-any" };
const ANY: TypeTag = { kind: "any" };

/**
 * Infer the type tag of a JSON value.
 *
 * Arrays are typed by their first element only; nested objects stay
 * `dict-string-any` and are not expanded into models of their own.
 */
export function inferType(value: JsonValue): TypeTag {
  switch (value.kind) {
    case "null":
      return OPTIONAL_ANY;
    case "bool":
      return { kind: "bool" };
    case "int":
      return { kind: "int" };
    case "float":
      return { kind: "float" };
    case "string":
      return { kind: "string" };
    case "array": {
      const first = value.items[0];
      return { kind: "list-of", item: first === undefined ? ANY : inferType(first) };
    }
    case "object":
      return { kind: "dict-string-any" };
  }
}

/**
 * Render a tag in the neutral notation used by logs and diagnostics
 */
export function formatTypeTag(tag: TypeTag): string {
  if (tag.kind === "list-of") {
    return `list-of(${formatTypeTag(tag.item)})`;
  }
  return tag.kind;
}
