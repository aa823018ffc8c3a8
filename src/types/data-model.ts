/**
 * Core data model types for Harscribe
 * These structures flow through the pipeline: capture → grouping → inference → synthesis → rendering
 */

/**
 * Header - one name/value pair as recorded on the wire
 */
export interface Header {
  readonly name: string;
  readonly value: string;
}

export interface CapturedBody {
  readonly text: string;
  readonly mimeType?: string;
}

export interface CapturedRequest {
  readonly headers: readonly Header[];
  readonly query: string; // raw query string, without the leading "?"
  readonly body?: CapturedBody;
}

export interface CapturedResponse {
  readonly status: number;
  readonly body?: CapturedBody;
}

/**
 * CapturedCall - one observed HTTP exchange, built once by the capture reader
 */
export interface CapturedCall {
  readonly url: string;
  readonly method: string; // uppercase token
  readonly request: CapturedRequest;
  readonly response: CapturedResponse;
}

/**
 * JsonValue - parsed JSON with integers and floats told apart.
 * Numbers keep their source lexeme in `raw`; `value` may round it.
 */
export type JsonValue =
  | { readonly kind: "null" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "int"; readonly value: number; readonly raw: string }
  | { readonly kind: "float"; readonly value: number; readonly raw: string }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly items: readonly JsonValue[] }
  | {
      readonly kind: "object";
      readonly entries: readonly (readonly [string, JsonValue])[];
    };

export type JsonObject = Extract<JsonValue, { kind: "object" }>;

/**
 * TypeTag - inferred field type, independent of any target language
 */
export type TypeTag =
  | { readonly kind: "optional-any" }
  | { readonly kind: "bool" }
  | { readonly kind: "int" }
  | { readonly kind: "float" }
  | { readonly kind: "string" }
  | { readonly kind: "list-of"; readonly item: TypeTag }
  | { readonly kind: "dict-string-any" }
  | { readonly kind: "any" };

export interface InferredField {
  name: string; // sanitized identifier
  originalName: string; // key as it appeared in the response
  type: TypeTag;
}

export interface RecordModel {
  kind: "record";
  name: string;
  fields: InferredField[];
}

export interface ListOfRecordModel {
  kind: "list-of-record";
  name: string;
  item: RecordModel;
}

export interface ListOfPrimitiveModel {
  kind: "list-of-primitive";
  name: string;
  itemType: TypeTag;
}

/**
 * PlaceholderModel - empty array or bare primitive; rendered as a comment only
 */
export interface PlaceholderModel {
  kind: "placeholder";
  name: string;
  sampled: TypeTag;
}

export type ModelDefinition =
  | RecordModel
  | ListOfRecordModel
  | ListOfPrimitiveModel
  | PlaceholderModel;

export interface ModelEntry {
  url: string;
  index: number; // position of the winning call in the capture
  definition: ModelDefinition;
}

/**
 * ModelTable - keyed by source URL; the last call for a URL wins
 */
export type ModelTable = Map<string, ModelEntry>;

export type QueryValue = string | string[];

export type RequestBody =
  | { kind: "json"; value: JsonValue }
  | { kind: "text"; text: string }
  | { kind: "none" };

/**
 * ClientMethod - one replayable endpoint, derived from the first call of its group
 */
export interface ClientMethod {
  name: string;
  httpMethod: string;
  url: string; // original URL of the representative call
  baseUrl: string; // scheme, host and path; no query or fragment
  path: string;
  headers: Array<[string, string]>;
  query: Array<[string, QueryValue]>;
  body: RequestBody;
  returnType?: string;
  callCount: number;
}

export interface ClientDefinition {
  name: string;
  methods: ClientMethod[];
  modelImports: string[];
}
