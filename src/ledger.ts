// Lifespan ledger — per-key presence intervals folded over the whole release chain

import { VersionMismatch } from "./errors.js";
import { ownValue } from "./model.js";
import type { CuratedSchemaDocument, KeyDefinition, RawSchemaDocument } from "./model.js";
import { compareVersions } from "./versions.js";

/** Half-open presence interval: present from `since` up to, not including, `until`. */
export interface Lifespan {
  since: string;
  until?: string;
}

export function lifespanContains(span: Lifespan, version: string): boolean {
  return (
    compareVersions(span.since, version) <= 0 &&
    (span.until === undefined || compareVersions(version, span.until) < 0)
  );
}

function hasKey(doc: RawSchemaDocument | undefined, section: string, key: string): boolean {
  if (!doc) return false;
  return ownValue(doc.sections, section)?.keys.includes(key) ?? false;
}

export class LifespanLedger {
  private readonly spans = new Map<string, Map<string, Lifespan[]>>();
  private readonly seen: string[] = [];
  private previous: RawSchemaDocument | undefined;

  get versions(): readonly string[] {
    return this.seen;
  }

  /**
   * Record the next release of the chain. Releases must arrive in ascending
   * order and belong to one format type.
   */
  observe(doc: RawSchemaDocument): this {
    const prev = this.previous;
    if (prev) {
      if (prev.format !== doc.format) {
        throw new VersionMismatch(
          `Ledger for ${prev.format} cannot record a ${doc.format} release`,
          prev.format,
          doc.format
        );
      }
      if (compareVersions(prev.version, doc.version) >= 0) {
        throw new Error(
          `Releases must be recorded in ascending order: ${doc.version} after ${prev.version}`
        );
      }
    }

    for (const section of Object.values(doc.sections)) {
      for (const key of section.keys) {
        if (!hasKey(prev, section.name, key)) {
          this.spansFor(section.name, key).push({ since: doc.version });
        }
      }
    }
    if (prev) {
      for (const section of Object.values(prev.sections)) {
        for (const key of section.keys) {
          if (hasKey(doc, section.name, key)) continue;
          const open = this.spansFor(section.name, key).at(-1);
          if (open) open.until = doc.version;
        }
      }
    }

    this.seen.push(doc.version);
    this.previous = doc;
    return this;
  }

  lifespans(section: string, key: string): readonly Lifespan[] {
    return this.spans.get(section)?.get(key) ?? [];
  }

  lifespanAt(section: string, key: string, version: string): Lifespan | undefined {
    return this.lifespans(section, key).find((span) => lifespanContains(span, version));
  }

  private spansFor(section: string, key: string): Lifespan[] {
    let keys = this.spans.get(section);
    if (!keys) {
      keys = new Map();
      this.spans.set(section, keys);
    }
    let list = keys.get(key);
    if (!list) {
      list = [];
      keys.set(key, list);
    }
    return list;
  }
}

/** Fold the full release chain (any order) into a ledger. */
export function buildLedger(releases: readonly RawSchemaDocument[]): LifespanLedger {
  return [...releases]
    .sort((a, b) => compareVersions(a.version, b.version))
    .reduce((ledger, doc) => ledger.observe(doc), new LifespanLedger());
}

function annotateKey(
  key: KeyDefinition,
  span: Lifespan,
  version: string,
  baseVersion: string
): KeyDefinition {
  const carriesBase = key.curated && lifespanContains(span, baseVersion);
  const authoredSince =
    carriesBase && key.since_version !== undefined && compareVersions(key.since_version, version) <= 0
      ? key.since_version
      : undefined;
  const authoredUntil =
    carriesBase && key.until_version !== undefined && compareVersions(version, key.until_version) < 0
      ? key.until_version
      : undefined;

  const annotated: KeyDefinition = { ...key, since_version: authoredSince ?? span.since };
  const until = span.until ?? authoredUntil;
  if (until === undefined) delete annotated.until_version;
  else annotated.until_version = until;
  return annotated;
}

/**
 * Set `since_version`/`until_version` on every key of `doc` from the presence
 * interval containing the document's release. A curated key whose interval
 * also spans the baseline keeps its hand-authored bounds where they are
 * consistent with that release.
 */
export function annotateLifespans(
  doc: CuratedSchemaDocument,
  ledger: LifespanLedger,
  baseVersion: string
): CuratedSchemaDocument {
  const sections: CuratedSchemaDocument["sections"] = {};
  for (const [name, section] of Object.entries(doc.sections)) {
    const keys: Record<string, KeyDefinition> = {};
    for (const [keyName, key] of Object.entries(section.keys)) {
      const span = ledger.lifespanAt(name, keyName, doc.version);
      keys[keyName] = span ? annotateKey(key, span, doc.version, baseVersion) : key;
    }
    sections[name] = { ...section, keys };
  }
  return { ...doc, sections };
}
