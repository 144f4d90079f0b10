// Build configuration (netschema.yaml)

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { ConfigError, SchemaParseError } from "./errors.js";
import { FORMAT_TYPES, isFormatType } from "./model.js";
import type { FormatType } from "./model.js";
import { loadMapping } from "./parser.js";
import type { OutputFormat } from "./serializer.js";
import { compareVersions, sortVersions } from "./versions.js";

export const DEFAULT_CONFIG_FILE = "netschema.yaml";

export interface BuildConfig {
  baseVersion: string;
  versions: string[];        // ascending
  formats: FormatType[];
  rawDir: string;            // <rawDir>/<version>/<format>.json
  curatedDir: string;        // <curatedDir>/<format>.yaml
  outDir: string;            // <outDir>/<version>/<format>.schema.<ext>
  idBase?: string;
  outputFormat: OutputFormat;
}

type RawMap = Record<string, unknown>;

function asStringList(value: unknown, field: string): string[] {
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) throw new ConfigError(`Config field '${field}' must be a list`);
  return value.map(String);
}

/**
 * Build a BuildConfig from a plain object. Relative directories resolve
 * against `rootDir`.
 */
export function parseConfigDict(data: RawMap, rootDir: string): BuildConfig {
  const requestedBase = data["base_version"] !== undefined ? String(data["base_version"]) : "";
  if (!requestedBase) throw new ConfigError("Config field 'base_version' is required");

  let versions: string[];
  try {
    versions = sortVersions(asStringList(data["versions"], "versions"));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(err instanceof Error ? err.message : String(err), err);
  }
  // The spelling used in 'versions' names directories, so the base adopts it
  const baseVersion = versions.find((v) => compareVersions(v, requestedBase) === 0);
  if (baseVersion === undefined) {
    throw new ConfigError(`Base version '${requestedBase}' is not listed in 'versions'`);
  }

  const formatNames = data["formats"] === undefined ? [...FORMAT_TYPES] : asStringList(data["formats"], "formats");
  const formats: FormatType[] = [];
  for (const name of formatNames) {
    if (!isFormatType(name)) {
      throw new ConfigError(`Unknown format type '${name}' (expected: ${FORMAT_TYPES.join(", ")})`);
    }
    formats.push(name);
  }

  const outputFormat = String(data["output_format"] ?? "json");
  if (outputFormat !== "json" && outputFormat !== "yaml") {
    throw new ConfigError(`Config field 'output_format' must be json or yaml, got '${outputFormat}'`);
  }

  const dir = (field: string, fallback: string): string =>
    resolve(rootDir, String(data[field] ?? fallback));

  const config: BuildConfig = {
    baseVersion,
    versions,
    formats,
    rawDir: dir("raw_dir", "raw"),
    curatedDir: dir("curated_dir", "curated"),
    outDir: dir("out_dir", "schemas"),
    outputFormat,
  };
  if (data["id_base"] !== undefined) config.idBase = String(data["id_base"]).replace(/\/+$/, "");
  return config;
}

export function loadConfig(filePath: string): BuildConfig {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, err);
  }
  try {
    return parseConfigDict(loadMapping(text, filePath), dirname(resolve(filePath)));
  } catch (err) {
    if (err instanceof SchemaParseError) throw new ConfigError(err.message, err);
    throw err;
  }
}
