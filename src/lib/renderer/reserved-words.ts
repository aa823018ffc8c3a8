/**
 * Reserved-word tables per target language, loaded from reserved-words.json
 */

import { readFileSync } from "node:fs";
import type { TargetLanguage } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";

type ReservedWordTable = Record<TargetLanguage, ReadonlySet<string>>;

let cached: ReservedWordTable | undefined;

function readWordList(raw: Record<string, unknown>, target: TargetLanguage): ReadonlySet<string> {
  const list = raw[target];
  if (!Array.isArray(list) || !list.every((word): word is string => typeof word === "string")) {
    throw new ConfigError(`Reserved-word table has no string list for "${target}"`);
  }
  return new Set(list.map((word) => word.toLowerCase()));
}

function loadTable(): ReservedWordTable {
  const file = new URL("./reserved-words.json", import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError("Reserved-word table must be a JSON object", {
      file: file.pathname,
    });
  }

  const entries = Object.fromEntries(Object.entries(raw));
  return {
    typescript: readWordList(entries, "typescript"),
    python: readWordList(entries, "python"),
  };
}

/**
 * Lower-cased reserved words of a target language
 */
export function getReservedWords(target: TargetLanguage): ReadonlySet<string> {
  cached ??= loadTable();
  return cached[target];
}
