// Raw and curated schema document parser
// Documents are YAML or JSON; both go through the same safe YAML loader.

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { InputUnavailable, SchemaParseError } from "./errors.js";
import { isFormatType, isValueKind } from "./model.js";
import type {
  Constraints,
  CuratedSchemaDocument,
  CuratedSection,
  DefaultValue,
  FormatType,
  KeyDefinition,
  Provenance,
  RawSchemaDocument,
  RawSection,
  Scalar,
} from "./model.js";

// --- Raw YAML type helpers ---

type RawMap = Record<string, unknown>;

function isMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asMap(value: unknown, ctx: string): RawMap {
  if (value === null || value === undefined) return {};
  if (!isMap(value)) throw new SchemaParseError(`${ctx}: expected a mapping`);
  return value;
}

function asOptionalString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  return String(value);
}

function asStringArray(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

function asOptionalNumber(value: unknown, ctx: string): number | undefined {
  if (value === null || value === undefined) return undefined;
  const n = typeof value === "number" ? value : Number(value);
  if (Number.isNaN(n)) throw new SchemaParseError(`${ctx}: '${String(value)}' is not a number`);
  return n;
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function asDefault(value: unknown, ctx: string): DefaultValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (isScalar(value)) return value;
  if (Array.isArray(value) && value.every(isScalar)) return value;
  throw new SchemaParseError(`${ctx}: default must be a scalar or a list of scalars`);
}

function asFormat(value: unknown, ctx: string): FormatType {
  const format = String(value ?? "");
  if (!isFormatType(format)) {
    throw new SchemaParseError(`${ctx}: unknown format type '${format}'`);
  }
  return format;
}

function asVersion(value: unknown, ctx: string): string {
  const version = asOptionalString(value);
  if (!version) throw new SchemaParseError(`${ctx}: missing required field 'version'`);
  return version;
}

function sortedUnique(values: string[]): string[] {
  return [...new Set(values)].sort();
}

// --- Raw documents ---

function parseRawSection(name: string, raw: unknown): RawSection {
  // A bare list of keys is shorthand for a non-repeatable section
  if (Array.isArray(raw)) {
    return { name, repeatable: false, keys: sortedUnique(raw.map(String)) };
  }
  const map = asMap(raw, `Section '${name}'`);
  return {
    name,
    repeatable: map["repeatable"] === true,
    keys: sortedUnique(asStringArray(map["keys"])),
  };
}

/**
 * Parse a plain object (YAML/JSON load output) into a RawSchemaDocument.
 */
export function parseRawDict(data: RawMap): RawSchemaDocument {
  const ctx = "Raw schema";
  const sections: Record<string, RawSection> = {};
  for (const [name, value] of Object.entries(asMap(data["sections"], ctx))) {
    sections[name] = parseRawSection(name, value);
  }
  return {
    format: asFormat(data["format"], ctx),
    version: asVersion(data["version"], ctx),
    sections,
  };
}

// --- Curated documents ---

function parseConstraints(raw: unknown, ctx: string): Constraints {
  const map = asMap(raw, `${ctx} constraints`);
  const constraints: Constraints = {};
  const pattern = asOptionalString(map["pattern"]);
  if (pattern !== undefined) constraints.pattern = pattern;
  const minimum = asOptionalNumber(map["minimum"], `${ctx} minimum`);
  if (minimum !== undefined) constraints.minimum = minimum;
  const maximum = asOptionalNumber(map["maximum"], `${ctx} maximum`);
  if (maximum !== undefined) constraints.maximum = maximum;
  if (map["enum"] !== undefined) constraints.enum = asStringArray(map["enum"]);
  return constraints;
}

function parseKey(name: string, raw: unknown, sectionName: string): KeyDefinition {
  const ctx = `Key '${sectionName}.${name}'`;
  const map = asMap(raw, ctx);
  const kind = String(map["value_kind"] ?? "string");
  if (!isValueKind(kind)) {
    throw new SchemaParseError(`${ctx}: unknown value_kind '${kind}'`);
  }
  const key: KeyDefinition = {
    name,
    value_kind: kind,
    constraints: parseConstraints(map["constraints"], ctx),
    description: String(map["description"] ?? ""),
    examples: asStringArray(map["examples"]),
    curated: map["curated"] !== false,
  };
  const def = asDefault(map["default"], ctx);
  if (def !== undefined) key.default = def;
  const since = asOptionalString(map["since_version"]);
  if (since !== undefined) key.since_version = since;
  const until = asOptionalString(map["until_version"]);
  if (until !== undefined) key.until_version = until;
  if (map["deprecated"] === true) key.deprecated = true;
  const documentation = asOptionalString(map["documentation"]);
  if (documentation !== undefined) key.documentation = documentation;
  return key;
}

function parseCuratedSection(name: string, raw: unknown): CuratedSection {
  const map = asMap(raw, `Section '${name}'`);
  const keys: Record<string, KeyDefinition> = {};
  for (const [keyName, value] of Object.entries(asMap(map["keys"], `Section '${name}' keys`))) {
    keys[keyName] = parseKey(keyName, value, name);
  }
  return { name, repeatable: map["repeatable"] === true, keys };
}

function parseProvenance(raw: unknown): Provenance | undefined {
  if (raw === null || raw === undefined) return undefined;
  const map = asMap(raw, "generated_from");
  return {
    base_version: String(map["base_version"] ?? ""),
    diff: String(map["diff"] ?? ""),
  };
}

/**
 * Parse a plain object (YAML/JSON load output) into a CuratedSchemaDocument.
 */
export function parseCuratedDict(data: RawMap): CuratedSchemaDocument {
  const ctx = "Curated schema";
  const sections: Record<string, CuratedSection> = {};
  for (const [name, value] of Object.entries(asMap(data["sections"], ctx))) {
    sections[name] = parseCuratedSection(name, value);
  }
  const doc: CuratedSchemaDocument = {
    format: asFormat(data["format"], ctx),
    version: asVersion(data["version"], ctx),
    sections,
  };
  const id = asOptionalString(data["id"]);
  if (id !== undefined) doc.id = id;
  const title = asOptionalString(data["title"]);
  if (title !== undefined) doc.title = title;
  const provenance = parseProvenance(data["generated_from"]);
  if (provenance) doc.generated_from = provenance;
  return doc;
}

// --- Files ---

/**
 * Load YAML/JSON text into a mapping. Uses YAML safe load — no arbitrary type
 * instantiation.
 */
export function loadMapping(text: string, source: string): RawMap {
  let data: unknown;
  try {
    data = yaml.load(text, { schema: yaml.DEFAULT_SCHEMA, filename: source });
  } catch (err) {
    throw new SchemaParseError(`Invalid YAML/JSON in: ${source}`, err);
  }
  if (!isMap(data)) {
    throw new SchemaParseError(`Invalid document structure in: ${source}`);
  }
  return data;
}

function readSource(filePath: string): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InputUnavailable(`Cannot read ${filePath}`, err, { path: filePath });
  }
}

export function parseRawFile(filePath: string): RawSchemaDocument {
  return parseRawDict(loadMapping(readSource(filePath), filePath));
}

export function parseCuratedFile(filePath: string): CuratedSchemaDocument {
  return parseCuratedDict(loadMapping(readSource(filePath), filePath));
}
