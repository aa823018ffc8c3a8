/**
 * TypeScript renderer - interfaces for models, a fetch-based class for the client
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
import { hasScheme } from "../../utils/names.js";
import { escapeBlockComment, indentContinuation, quote, singleLine } from "./text.js";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const MODELS_HEADER = [
  "/**",
  " * Models inferred from captured HTTP responses.",
  " */",
].join("\n");

const CLIENT_HEADER = [
  "/**",
  " * HTTP client generated from captured traffic.",
  " */",
].join("\n");

const CLIENT_PRELUDE = [
  "export type QueryValue = string | string[];",
  "",
  "export interface RequestOverrides {",
  "  headers?: Record<string, string>;",
  "  params?: Record<string, QueryValue>;",
  "  json?: unknown;",
  "  data?: string;",
  "}",
].join("\n");

// captured headers give way to overrides whose name matches in any case
const HEADER_HELPER = [
  "function withHeaderOverrides(",
  "  captured: Record<string, string>,",
  "  overrides: Record<string, string> = {},",
  "): Record<string, string> {",
  "  const replaced = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));",
  "  const kept = Object.entries(captured).filter(([name]) => !replaced.has(name.toLowerCase()));",
  "  return { ...Object.fromEntries(kept), ...overrides };",
  "}",
].join("\n");

const AS_RECORD_HELPER = [
  "function asRecord(value: unknown): Record<string, unknown> {",
  '  return typeof value === "object" && value !== null && !Array.isArray(value)',
  "    ? (value as Record<string, unknown>)",
  "    : {};",
  "}",
].join("\n");

const SEND_HELPER = [
  "  constructor(private readonly baseUrl?: string) {}",
  "",
  "  private async send(",
  "    method: string,",
  "    url: string,",
  "    headers: Record<string, string>,",
  "    params: Record<string, QueryValue>,",
  "    body?: string,",
  "  ): Promise<Response> {",
  "    const target = new URL(url);",
  "    for (const [key, value] of Object.entries(params)) {",
  "      for (const item of Array.isArray(value) ? value : [value]) {",
  "        target.searchParams.append(key, item);",
  "      }",
  "    }",
  "    return fetch(target, { method, headers, body });",
  "  }",
].join("\n");

export function tsType(tag: TypeTag): string {
  switch (tag.kind) {
    case "optional-any":
    case "any":
      return "unknown";
    case "bool":
      return "boolean";
    case "int":
    case "float":
      return "number";
    case "string":
      return "string";
    case "list-of":
      return `${tsType(tag.item)}[]`;
    case "dict-string-any":
      return "Record<string, unknown>";
  }
}

function propertyName(name: string): string {
  return IDENTIFIER.test(name) ? name : quote(name);
}

/**
 * Literal for a JSON value, laid out like JSON.stringify(value, null, 2).
 * Numbers are written from their captured lexeme.
 */
export function tsLiteral(value: JsonValue, depth = 0): string {
  const pad = "  ".repeat(depth + 1);
  const closing = "  ".repeat(depth);

  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return String(value.value);
    case "int":
    case "float":
      return value.raw;
    case "string":
      return quote(value.value);
    case "array":
      if (value.items.length === 0) {
        return "[]";
      }
      return `[\n${value.items.map((item) => `${pad}${tsLiteral(item, depth + 1)}`).join(",\n")}\n${closing}]`;
    case "object":
      if (value.entries.length === 0) {
        return "{}";
      }
      return `{\n${value.entries
        .map(([key, item]) => `${pad}${quote(key)}: ${tsLiteral(item, depth + 1)}`)
        .join(",\n")}\n${closing}}`;
  }
}

/**
 * Object literal assignment with captured entries followed by an override spread
 */
function objectWithOverrides(
  declaration: string,
  entries: string[],
  spread: string,
): string[] {
  if (entries.length === 0) {
    return [`    ${declaration} = { ...${spread} };`];
  }
  return [
    `    ${declaration} = {`,
    ...entries.map((entry) => `      ${entry},`),
    `      ...${spread},`,
    "    };",
  ];
}

function renderHeaders(method: ClientMethod): string[] {
  if (method.headers.length === 0) {
    return ["    const headers = withHeaderOverrides({}, overrides.headers);"];
  }
  return [
    "    const headers = withHeaderOverrides(",
    "      {",
    ...method.headers.map(([name, value]) => `        ${quote(name)}: ${quote(value)},`),
    "      },",
    "      overrides.headers,",
    "    );",
  ];
}

function renderBody(method: ClientMethod): string[] {
  const { body } = method;
  switch (body.kind) {
    case "json":
      if (body.value.kind === "object") {
        return [
          ...objectWithOverrides(
            "const json: Record<string, unknown>",
            body.value.entries.map(
              ([key, value]) => `${quote(key)}: ${indentContinuation(tsLiteral(value), 6)}`,
            ),
            "asRecord(overrides.json)",
          ),
          "    const body = overrides.data ?? JSON.stringify(json);",
        ];
      }
      return [
        `    const json = overrides.json !== undefined ? overrides.json : ${indentContinuation(tsLiteral(body.value), 4)};`,
        "    const body = overrides.data ?? JSON.stringify(json);",
      ];
    case "text":
      return [
        "    const body =",
        `      overrides.json !== undefined ? JSON.stringify(overrides.json) : overrides.data ?? ${quote(body.text)};`,
      ];
    case "none":
      return [
        "    const body = overrides.json !== undefined ? JSON.stringify(overrides.json) : overrides.data;",
      ];
  }
}

function renderMethod(method: ClientMethod): string {
  const docLines = [
    "  /**",
    `   * ${escapeBlockComment(`${method.httpMethod} ${method.path}`)}`,
    "   *",
    `   * Original URL: ${escapeBlockComment(method.url)}`,
  ];
  if (method.callCount > 1) {
    docLines.push(`   * Headers merged from ${method.callCount} captured calls.`);
  }
  if (!hasScheme(method.baseUrl)) {
    docLines.push("   * The captured URL is relative; construct the client with a baseUrl.");
  }
  docLines.push("   */");

  const returnType = method.returnType ? method.returnType : "Response";
  const lines = [
    ...docLines,
    `  async ${method.name}(overrides: RequestOverrides = {}): Promise<${returnType}> {`,
    `    const url = this.baseUrl ? this.baseUrl + ${quote(method.path)} : ${quote(method.baseUrl)};`,
    ...renderHeaders(method),
    ...objectWithOverrides(
      "const params: Record<string, QueryValue>",
      method.query.map(([name, value]) => `${quote(name)}: ${JSON.stringify(value)}`),
      "overrides.params",
    ),
    ...renderBody(method),
    `    const response = await this.send(${quote(method.httpMethod)}, url, headers, params, body);`,
    method.returnType
      ? `    return (await response.json()) as ${method.returnType};`
      : "    return response;",
    "  }",
  ];
  return lines.join("\n");
}

export class TypeScriptRenderer implements Renderer {
  readonly id = "typescript" as const;
  readonly defaultModelsModule = "./models.js";
  readonly reservedWords: ReadonlySet<string> = getReservedWords("typescript");

  private renderRecord(model: RecordModel): string {
    const lines = [
      "/**",
      " * Model generated from captured response data.",
      " */",
      `export interface ${model.name} {`,
    ];

    if (model.fields.length === 0) {
      lines.push("  // no fields observed");
    }
    for (const field of model.fields) {
      const optional = field.type.kind === "optional-any" ? "?" : "";
      lines.push(`  ${propertyName(field.name)}${optional}: ${tsType(field.type)};`);
    }

    lines.push("}");
    return lines.join("\n");
  }

  renderModel(definition: ModelDefinition): string {
    switch (definition.kind) {
      case "record":
        return this.renderRecord(definition);
      case "list-of-record":
        return `${this.renderRecord(definition.item)}\n\nexport type ${definition.name} = ${definition.item.name}[];`;
      case "list-of-primitive":
        return `export type ${definition.name} = ${tsType(definition.itemType)}[];`;
      case "placeholder":
        return `// ${definition.name}: simple type ${tsType(definition.sampled)}, no fields to derive`;
    }
  }

  renderModelsFile(table: ModelTable): string {
    const blocks = [MODELS_HEADER];
    for (const entry of table.values()) {
      blocks.push(`// Model for: ${singleLine(entry.url)}\n${this.renderModel(entry.definition)}`);
    }
    return `${blocks.join("\n\n")}\n`;
  }

  renderClient(definition: ClientDefinition, options: ClientRenderOptions = {}): string {
    const modelsModule = options.modelsModule ?? this.defaultModelsModule;
    const blocks = [CLIENT_HEADER];

    if (definition.modelImports.length > 0) {
      blocks.push(
        `import type { ${definition.modelImports.join(", ")} } from ${quote(modelsModule)};`,
      );
    }

    blocks.push(CLIENT_PRELUDE, HEADER_HELPER);

    const needsRecordHelper = definition.methods.some(
      (method) => method.body.kind === "json" && method.body.value.kind === "object",
    );
    if (needsRecordHelper) {
      blocks.push(AS_RECORD_HELPER);
    }

    const members = [SEND_HELPER, ...definition.methods.map(renderMethod)];
    blocks.push(`export class ${definition.name} {\n${members.join("\n\n")}\n}`);

    return `${blocks.join("\n\n")}\n`;
  }
}
