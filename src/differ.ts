// Structural differ — section/key set difference between two raw releases

import { InputUnavailable, VersionMismatch } from "./errors.js";
import { ownValue } from "./model.js";
import type { KeyRef, RawSchemaDocument, StructuralDiff } from "./model.js";

function difference(a: Iterable<string>, b: ReadonlySet<string>): string[] {
  const out: string[] = [];
  for (const item of a) {
    if (!b.has(item)) out.push(item);
  }
  return out.sort();
}

function requireContent(doc: RawSchemaDocument, role: string): void {
  if (Object.keys(doc.sections).length === 0) {
    throw new InputUnavailable(
      `Raw ${role} schema for ${doc.format}@${doc.version} has no sections; release data unavailable`,
      undefined,
      { format: doc.format, version: doc.version }
    );
  }
}

/**
 * Compute the structural difference that turns `base` into `target`.
 *
 * Section additions and removals are not repeated as key-level changes, and
 * the `repeatable` flag is not compared.
 */
export function diffRaw(base: RawSchemaDocument, target: RawSchemaDocument): StructuralDiff {
  if (base.format !== target.format) {
    throw new VersionMismatch(
      `Cannot diff ${base.format} against ${target.format}`,
      base.format,
      target.format
    );
  }
  requireContent(base, "base");
  requireContent(target, "target");

  const baseSections = new Set(Object.keys(base.sections));
  const targetSections = new Set(Object.keys(target.sections));
  const addedSections = difference(targetSections, baseSections);

  const addedKeys: KeyRef[] = [];
  const removedKeys: KeyRef[] = [];
  for (const section of [...baseSections].sort()) {
    const targetSection = ownValue(target.sections, section);
    if (!targetSection) continue;
    const baseKeys = new Set(base.sections[section].keys);
    const targetKeys = new Set(targetSection.keys);
    for (const key of difference(targetKeys, baseKeys)) addedKeys.push({ section, key });
    for (const key of difference(baseKeys, targetKeys)) removedKeys.push({ section, key });
  }

  const addedSectionKeys: Record<string, string[]> = {};
  for (const section of addedSections) {
    addedSectionKeys[section] = [...target.sections[section].keys];
  }

  return {
    format: base.format,
    base_version: base.version,
    target_version: target.version,
    added_sections: addedSections,
    removed_sections: difference(baseSections, targetSections),
    added_keys: addedKeys,
    removed_keys: removedKeys,
    added_section_keys: addedSectionKeys,
  };
}

export function isEmptyDiff(diff: StructuralDiff): boolean {
  return (
    diff.added_sections.length === 0 &&
    diff.removed_sections.length === 0 &&
    diff.added_keys.length === 0 &&
    diff.removed_keys.length === 0
  );
}

/** Stable identity of a diff, recorded as provenance on derived documents. */
export function describeDiff(diff: StructuralDiff): string {
  return `${diff.format}@${diff.base_version}..${diff.target_version}`;
}
