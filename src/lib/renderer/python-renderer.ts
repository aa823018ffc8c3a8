/**
 * Python renderer - dataclasses for models, a requests-based client
 */

import type {
  ClientDefinition,
  ClientMethod,
  JsonValue,
  ModelDefinition,
  ModelTable,
  RecordModel,
  TypeTag,
} from "../../types/data-model.js";
import type { ClientRenderOptions, Renderer } from "./types.js";
import { getReservedWords } from "./reserved-words.js";
import { escapeDocstring, indentContinuation, quote, singleLine } from "./text.js";
import { claimName, hasScheme } from "../../utils/names.js";

const MODELS_HEADER = [
  '"""',
  "Generated models from captured HTTP responses.",
  '"""',
  "",
  "from dataclasses import dataclass",
  "from typing import Any, Dict, List, Optional",
].join("\n");

const CLIENT_HEADER = ['"""', "Generated HTTP client from captured traffic.", '"""'].join("\n");

const CLIENT_IMPORTS = [
  "from typing import Optional",
  "",
  "import requests",
  "from requests.structures import CaseInsensitiveDict",
].join("\n");

export function pythonType(tag: TypeTag): string {
  switch (tag.kind) {
    case "optional-any":
      return "Optional[Any]";
    case "bool":
      return "bool";
    case "int":
      return "int";
    case "float":
      return "float";
    case "string":
      return "str";
    case "list-of":
      return `List[${pythonType(tag.item)}]`;
    case "dict-string-any":
      return "Dict[str, Any]";
    case "any":
      return "Any";
  }
}

/**
 * Python literal for a JSON value, pretty-printed with four-space indentation
 */
export function pythonLiteral(value: JsonValue, depth = 0): string {
  const pad = "    ".repeat(depth + 1);
  const closing = "    ".repeat(depth);

  switch (value.kind) {
    case "null":
      return "None";
    case "bool":
      return value.value ? "True" : "False";
    case "int":
    case "float":
      // JSON number lexemes are valid Python literals of the same kind
      return value.raw;
    case "string":
      return quote(value.value);
    case "array":
      if (value.items.length === 0) {
        return "[]";
      }
      return `[\n${value.items.map((item) => `${pad}${pythonLiteral(item, depth + 1)},`).join("\n")}\n${closing}]`;
    case "object":
      if (value.entries.length === 0) {
        return "{}";
      }
      return `{\n${value.entries
        .map(([key, item]) => `${pad}${quote(key)}: ${pythonLiteral(item, depth + 1)},`)
        .join("\n")}\n${closing}}`;
  }
}

/**
 * Field names keep only identifier characters ("@type" -> "_type")
 */
export function pythonFieldName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

function dictWithOverrides(
  variable: string,
  entries: string[],
  kwarg: string,
  wrapper?: string,
): string[] {
  const open = wrapper ? `${wrapper}({` : "{";
  const close = wrapper ? "})" : "}";
  const lines =
    entries.length === 0
      ? [`        ${variable} = ${open}${close}`]
      : [
          `        ${variable} = ${open}`,
          ...entries.map((entry) => `            ${entry},`),
          `        ${close}`,
        ];
  lines.push(`        ${variable}.update(kwargs.get(${quote(kwarg)}, {}))`);
  return lines;
}

// requests sends `data` when it is set and falls back to `json` otherwise
function renderBody(method: ClientMethod): string[] {
  const { body } = method;
  switch (body.kind) {
    case "json":
      if (body.value.kind === "object") {
        return [
          ...dictWithOverrides(
            "json_data",
            body.value.entries.map(
              ([key, value]) => `${quote(key)}: ${indentContinuation(pythonLiteral(value), 12)}`,
            ),
            "json",
          ),
          '        data = kwargs.get("data")',
        ];
      }
      return [
        `        json_data = kwargs.get("json", ${indentContinuation(pythonLiteral(body.value), 8)})`,
        '        data = kwargs.get("data")',
      ];
    case "text":
      return [
        '        json_data = kwargs.get("json")',
        `        data = kwargs.get("data", ${quote(body.text)} if json_data is None else None)`,
      ];
    case "none":
      return ['        json_data = kwargs.get("json")', '        data = kwargs.get("data")'];
  }
}

function renderMethod(method: ClientMethod): string {
  const signatureReturn = method.returnType ? ` -> ${method.returnType}` : "";

  const docLines = [
    '        """',
    `        ${escapeDocstring(`${method.httpMethod} ${method.path}`)}`,
    "",
    `        Original URL: ${escapeDocstring(method.url)}`,
  ];
  if (!hasScheme(method.baseUrl)) {
    docLines.push("        The captured URL is relative; construct the client with a base_url.");
  }
  docLines.push('        """');

  const lines = [
    `    def ${method.name}(self, **kwargs)${signatureReturn}:`,
    ...docLines,
    `        url = self.base_url + ${quote(method.path)} if self.base_url else ${quote(method.baseUrl)}`,
    "",
    ...dictWithOverrides(
      "headers",
      method.headers.map(([name, value]) => `${quote(name)}: ${quote(value)}`),
      "headers",
      "CaseInsensitiveDict",
    ),
    "",
    ...dictWithOverrides(
      "params",
      method.query.map(([name, value]) => `${quote(name)}: ${JSON.stringify(value)}`),
      "params",
    ),
    "",
    ...renderBody(method),
    "",
  ];

  lines.push(
    "        response = self.session.request(",
    `            ${quote(method.httpMethod)},`,
    "            url,",
    "            headers=headers,",
    "            params=params,",
    "            json=json_data,",
    "            data=data,",
    "        )",
    method.returnType ? "        return response.json()" : "        return response",
  );
  return lines.join("\n");
}

export class PythonRenderer implements Renderer {
  readonly id = "python" as const;
  readonly defaultModelsModule = ".models";
  readonly reservedWords: ReadonlySet<string> = getReservedWords("python");

  private renderRecord(model: RecordModel): string {
    const lines = [
      "@dataclass",
      `class ${model.name}:`,
      '    """Model generated from captured response data."""',
    ];

    if (model.fields.length === 0) {
      lines.push("    pass");
    }
    const claimed = new Set<string>();
    for (const field of model.fields) {
      const name = claimName(pythonFieldName(field.name), claimed);
      lines.push(`    ${name}: ${pythonType(field.type)}`);
    }

    return lines.join("\n");
  }

  renderModel(definition: ModelDefinition): string {
    switch (definition.kind) {
      case "record":
        return this.renderRecord(definition);
      case "list-of-record":
        return `${this.renderRecord(definition.item)}\n\n\n${definition.name} = List[${definition.item.name}]`;
      case "list-of-primitive":
        return `${definition.name} = List[${pythonType(definition.itemType)}]`;
      case "placeholder":
        return `# ${definition.name}: simple type ${pythonType(definition.sampled)}, no fields to derive`;
    }
  }

  renderModelsFile(table: ModelTable): string {
    const blocks = [MODELS_HEADER];
    for (const entry of table.values()) {
      blocks.push(`# Model for: ${singleLine(entry.url)}\n${this.renderModel(entry.definition)}`);
    }
    return `${blocks.join("\n\n\n")}\n`;
  }

  renderClient(definition: ClientDefinition, options: ClientRenderOptions = {}): string {
    const modelsModule = options.modelsModule ?? this.defaultModelsModule;
    const imports = [CLIENT_IMPORTS];
    if (definition.modelImports.length > 0) {
      imports.push(`from ${modelsModule} import ${definition.modelImports.join(", ")}`);
    }

    const classLines = [
      `class ${definition.name}:`,
      '    """HTTP client replaying calls recorded in a capture."""',
      "",
      "    def __init__(self, base_url: Optional[str] = None):",
      "        self.base_url = base_url",
      "        self.session = requests.Session()",
    ];

    const members = [classLines.join("\n"), ...definition.methods.map(renderMethod)];

    return `${CLIENT_HEADER}\n\n${imports.join("\n\n")}\n\n\n${members.join("\n\n")}\n`;
  }
}
