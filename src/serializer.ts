// Stable serializer — canonical rendering and atomic, change-detecting writes

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import yaml from "js-yaml";
import { SerializationWriteFailure } from "./errors.js";
import type { CuratedSchemaDocument, CuratedSection, KeyDefinition } from "./model.js";
import { loadMapping, parseCuratedDict } from "./parser.js";

export type OutputFormat = "json" | "yaml";

type Plain = Record<string, unknown>;

function byName<T>(record: Record<string, T>): [string, T][] {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

// Fixed field order; absent optional fields are left out entirely
function canonicalKey(key: KeyDefinition): Plain {
  const out: Plain = { value_kind: key.value_kind };
  const constraints: Plain = {};
  if (key.constraints.pattern !== undefined) constraints["pattern"] = key.constraints.pattern;
  if (key.constraints.minimum !== undefined) constraints["minimum"] = key.constraints.minimum;
  if (key.constraints.maximum !== undefined) constraints["maximum"] = key.constraints.maximum;
  if (key.constraints.enum !== undefined) constraints["enum"] = [...key.constraints.enum];
  out["constraints"] = constraints;
  if (key.default !== undefined) out["default"] = key.default;
  out["description"] = key.description;
  out["examples"] = [...key.examples];
  if (key.since_version !== undefined) out["since_version"] = key.since_version;
  if (key.until_version !== undefined) out["until_version"] = key.until_version;
  if (key.deprecated) out["deprecated"] = true;
  if (key.documentation !== undefined) out["documentation"] = key.documentation;
  out["curated"] = key.curated;
  return out;
}

function canonicalSection(section: CuratedSection): Plain {
  const keys: Plain = {};
  for (const [name, key] of byName(section.keys)) keys[name] = canonicalKey(key);
  return { repeatable: section.repeatable, keys };
}

export function toCanonical(doc: CuratedSchemaDocument): Plain {
  const out: Plain = { format: doc.format, version: doc.version };
  if (doc.id !== undefined) out["id"] = doc.id;
  if (doc.title !== undefined) out["title"] = doc.title;
  if (doc.generated_from) {
    out["generated_from"] = {
      base_version: doc.generated_from.base_version,
      diff: doc.generated_from.diff,
    };
  }
  const sections: Plain = {};
  for (const [name, section] of byName(doc.sections)) sections[name] = canonicalSection(section);
  out["sections"] = sections;
  return out;
}

export function renderDocument(doc: CuratedSchemaDocument, format: OutputFormat = "json"): string {
  const canonical = toCanonical(doc);
  if (format === "yaml") {
    return yaml.dump(canonical, { lineWidth: -1, noRefs: true });
  }
  return `${JSON.stringify(canonical, null, 2)}\n`;
}

/** Re-read rendered JSON or YAML text into a curated document. */
export function parseDocument(text: string, source = "<memory>"): CuratedSchemaDocument {
  return parseCuratedDict(loadMapping(text, source));
}

// --- Atomic writes ---

export type WriteOutcome = "written" | "unchanged";

export interface WriteOptions {
  /** Replace the file even when its content is already identical. */
  force?: boolean;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readExisting(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

/**
 * Write `content` to `filePath` through a temp file and a rename, so readers
 * never observe a partial file. Identical content is left untouched unless
 * `force` is set.
 *
 * Throws SerializationWriteFailure naming the path on any filesystem error.
 */
export async function writeIfChanged(
  filePath: string,
  content: string,
  options: WriteOptions = {}
): Promise<WriteOutcome> {
  try {
    if (!options.force && (await readExisting(filePath)) === content) {
      return "unchanged";
    }
    const dir = dirname(filePath);
    await mkdir(dir, { recursive: true });
    const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmp, content, "utf-8");
      await rename(tmp, filePath);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    return "written";
  } catch (err) {
    throw new SerializationWriteFailure(filePath, err);
  }
}
