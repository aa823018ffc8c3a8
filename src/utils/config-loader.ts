/**
 * Configuration loader for generator options
 * Supports JSON and YAML config files
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_GENERATOR_OPTIONS,
  TARGET_LANGUAGES,
  isTargetLanguage,
  type GeneratorOptions,
  type TargetLanguage,
} from "../types/config.js";
import { ConfigError, FileIOError } from "./errors.js";
import { type LogLevel, isLogLevel, logger } from "./logger.js";

/**
 * Config file section for the generator
 */
export interface GeneratorConfigSection {
  target?: TargetLanguage;
  clientName?: string;
  modelsModule?: string;
  useModelAnnotations?: boolean;
  excludeHeaders?: string[];
  logLevel?: LogLevel;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
function readOption<T>(
  raw: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  description: string,
): T | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!guard(value)) {
    throw new ConfigError(`Config option "${key}" must be ${description}`, {
      key,
      received: value,
    });
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === "string";
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Check a parsed config document and keep the options it sets
 */
export function readConfigSection(document: unknown): GeneratorConfigSection {
  if (document === null || document === undefined) {
    return {};
  }
  if (typeof document !== "object" || Array.isArray(document)) {
    throw new ConfigError("Config file must contain a mapping of options");
  }

  const raw = Object.fromEntries(Object.entries(document));
  return {
    target: readOption(raw, "target", isTargetLanguage, `one of: ${TARGET_LANGUAGES.join(", ")}`),
    clientName: readOption(raw, "clientName", isString, "a string"),
    modelsModule: readOption(raw, "modelsModule", isString, "a string"),
    useModelAnnotations: readOption(raw, "useModelAnnotations", isBoolean, "a boolean"),
    excludeHeaders: readOption(raw, "excludeHeaders", isStringArray, "a list of strings"),
    logLevel: readOption(raw, "logLevel", isLogLevel, "one of: error, warn, info, debug"),
  };
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): GeneratorConfigSection {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");
  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  return readConfigSection(document);
}

/**
 * Validate merged generator options
 */
export function validateGeneratorOptions(options: GeneratorOptions): void {
  if (!isTargetLanguage(options.target)) {
    throw new ConfigError(`Unsupported target language: ${String(options.target)}`, {
      supported: TARGET_LANGUAGES,
    });
  }

  if (!IDENTIFIER.test(options.clientName)) {
    throw new ConfigError("clientName must be a valid identifier", {
      clientName: options.clientName,
    });
  }

  if (options.modelsModule !== undefined && !options.modelsModule.trim()) {
    throw new ConfigError("modelsModule must not be empty");
  }

  const blank = options.excludeHeaders.filter((name) => !name.trim());
  if (blank.length > 0) {
    throw new ConfigError("excludeHeaders must not contain blank header names");
  }
}

/**
 * Build generator options with precedence: explicit options > config file > defaults
 *
 * @example
 * const options = loadGeneratorConfig({ target: "python" }, { clientName: "ShopClient" });
 * // => { ...DEFAULT_GENERATOR_OPTIONS, target: "python", clientName: "ShopClient" }
 */
export function loadGeneratorConfig(
  explicit: Partial<GeneratorOptions> = {},
  configFile: GeneratorConfigSection = {},
): GeneratorOptions {
  if (configFile.logLevel) {
    logger.setLevel(configFile.logLevel);
  }

  const config: GeneratorOptions = {
    target: explicit.target ?? configFile.target ?? DEFAULT_GENERATOR_OPTIONS.target,
    clientName:
      explicit.clientName ?? configFile.clientName ?? DEFAULT_GENERATOR_OPTIONS.clientName,
    modelsModule: explicit.modelsModule ?? configFile.modelsModule,
    useModelAnnotations:
      explicit.useModelAnnotations ??
      configFile.useModelAnnotations ??
      DEFAULT_GENERATOR_OPTIONS.useModelAnnotations,
    excludeHeaders:
      explicit.excludeHeaders ??
      configFile.excludeHeaders ??
      DEFAULT_GENERATOR_OPTIONS.excludeHeaders,
  };

  validateGeneratorOptions(config);

  logger.debug("Generator config loaded", {
    target: config.target,
    clientName: config.clientName,
    useModelAnnotations: config.useModelAnnotations,
    excludeHeaders: config.excludeHeaders.length,
  });

  return config;
}

/**
 * Read a config file and merge it under explicit options
 */
export function loadGeneratorConfigFile(
  filePath: string,
  explicit: Partial<GeneratorOptions> = {},
): GeneratorOptions {
  return loadGeneratorConfig(explicit, parseConfigFile(filePath));
}
