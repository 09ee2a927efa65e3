/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { DEFAULT_COMPILE_OPTIONS, type NullHandling } from "@dtoshape/compiler";
import type {
  CliOptions,
  CommentOutput,
  DtoshapeConfig,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "dtoshape.json";
export const DEFAULT_OUTPUT_FILE = "src/generated/dtoshape.generated.ts";
export const DEFAULT_SELECTOR_NAMES: readonly string[] = ["selectExpr"];

type JsonObject = { readonly [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isNullHandling = (value: unknown): value is NullHandling =>
  value === "guard" || value === "optional-chain";

const isCommentOutput = (value: unknown): value is CommentOutput =>
  value === "all" || value === "none";

const KNOWN_KEYS = new Set([
  "$schema",
  "include",
  "outputFile",
  "selectorNames",
  "mapOperators",
  "nullHandling",
  "arrayNullabilityRemoval",
  "readonlyProperties",
  "commentOutput",
  "strict",
]);

const optionalString = (
  raw: JsonObject,
  key: string
): Result<string | undefined, string> => {
  const value = raw[key];
  if (value === undefined || typeof value === "string") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${key}' must be a string` };
};

const optionalBoolean = (
  raw: JsonObject,
  key: string
): Result<boolean | undefined, string> => {
  const value = raw[key];
  if (value === undefined || typeof value === "boolean") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${key}' must be a boolean` };
};

const optionalStringArray = (
  raw: JsonObject,
  key: string
): Result<readonly string[] | undefined, string> => {
  const value = raw[key];
  if (value === undefined || isStringArray(value)) {
    return { ok: true, value };
  }
  return {
    ok: false,
    error: `${CONFIG_FILE_NAME}: '${key}' must be an array of strings`,
  };
};

/**
 * Check a parsed dtoshape.json against the known keys and their types
 */
export const validateConfig = (raw: unknown): Result<DtoshapeConfig, string> => {
  if (!isObject(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const unknownKey = Object.keys(raw).find((key) => !KNOWN_KEYS.has(key));
  if (unknownKey !== undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: unknown option '${unknownKey}'`,
    };
  }

  const include = raw.include;
  if (!isStringArray(include) || include.length === 0) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'include' must list at least one entry file`,
    };
  }

  const nullHandling = raw.nullHandling;
  if (nullHandling !== undefined && !isNullHandling(nullHandling)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'nullHandling' must be "guard" or "optional-chain"`,
    };
  }

  const commentOutput = raw.commentOutput;
  if (commentOutput !== undefined && !isCommentOutput(commentOutput)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'commentOutput' must be "all" or "none"`,
    };
  }

  const schema = optionalString(raw, "$schema");
  if (!schema.ok) return schema;
  const outputFile = optionalString(raw, "outputFile");
  if (!outputFile.ok) return outputFile;
  const selectorNames = optionalStringArray(raw, "selectorNames");
  if (!selectorNames.ok) return selectorNames;
  const mapOperators = optionalStringArray(raw, "mapOperators");
  if (!mapOperators.ok) return mapOperators;
  const arrayNullabilityRemoval = optionalBoolean(raw, "arrayNullabilityRemoval");
  if (!arrayNullabilityRemoval.ok) return arrayNullabilityRemoval;
  const readonlyProperties = optionalBoolean(raw, "readonlyProperties");
  if (!readonlyProperties.ok) return readonlyProperties;
  const strict = optionalBoolean(raw, "strict");
  if (!strict.ok) return strict;

  return {
    ok: true,
    value: {
      $schema: schema.value,
      include,
      outputFile: outputFile.value,
      selectorNames: selectorNames.value,
      mapOperators: mapOperators.value,
      nullHandling,
      arrayNullabilityRemoval: arrayNullabilityRemoval.value,
      readonlyProperties: readonlyProperties.value,
      commentOutput,
      strict: strict.value,
    },
  };
};

/**
 * Load dtoshape.json
 */
export const loadConfig = (
  configPath: string
): Result<DtoshapeConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return validateConfig(parsed);
};

/**
 * Find dtoshape.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from config file + CLI args
 */
export const resolveConfig = (
  config: DtoshapeConfig,
  cliOptions: CliOptions,
  projectRoot: string
): ResolvedConfig => {
  const commentOutput: CommentOutput = config.commentOutput ?? "all";
  return {
    projectRoot,
    include: config.include.map((file) => resolve(projectRoot, file)),
    outputFile: resolve(
      projectRoot,
      cliOptions.out ?? config.outputFile ?? DEFAULT_OUTPUT_FILE
    ),
    selectorNames:
      cliOptions.selectors && cliOptions.selectors.length > 0
        ? cliOptions.selectors
        : config.selectorNames ?? DEFAULT_SELECTOR_NAMES,
    mapOperators: config.mapOperators ?? DEFAULT_COMPILE_OPTIONS.mapOperators,
    nullHandling:
      cliOptions.nullHandling ??
      config.nullHandling ??
      DEFAULT_COMPILE_OPTIONS.nullHandling,
    arrayNullabilityRemoval:
      config.arrayNullabilityRemoval ??
      DEFAULT_COMPILE_OPTIONS.arrayNullabilityRemoval,
    readonlyProperties: config.readonlyProperties ?? true,
    commentOutput,
    strict: config.strict ?? true,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
