// Diff applicator — derive a curated document for a target release from the curated base

import { describeDiff } from "./differ.js";
import { PostconditionViolation, VersionMismatch } from "./errors.js";
import { ownValue } from "./model.js";
import type {
  CuratedSchemaDocument,
  CuratedSection,
  KeyDefinition,
  ParityReport,
  RawSchemaDocument,
  StructuralDiff,
} from "./model.js";
import { versionLabel } from "./versions.js";

export function undocumentedDescription(targetVersion: string): string {
  return `(undocumented — added in ${targetVersion})`;
}

/** Minimal, explicitly degraded definition for a key with no curated precedent. */
export function synthesizeKey(name: string, targetVersion: string): KeyDefinition {
  return {
    name,
    value_kind: "string",
    constraints: {},
    description: undocumentedDescription(targetVersion),
    examples: [],
    since_version: targetVersion,
    curated: false,
  };
}

function cloneKey(key: KeyDefinition): KeyDefinition {
  const copy: KeyDefinition = {
    ...key,
    constraints: { ...key.constraints },
    examples: [...key.examples],
  };
  if (key.constraints.enum) copy.constraints.enum = [...key.constraints.enum];
  if (Array.isArray(key.default)) copy.default = [...key.default];
  return copy;
}

function cloneSection(section: CuratedSection): CuratedSection {
  const keys: Record<string, KeyDefinition> = {};
  for (const [name, key] of Object.entries(section.keys)) keys[name] = cloneKey(key);
  return { name: section.name, repeatable: section.repeatable, keys };
}

/**
 * Point a manual URL at the target release, replacing the path segment that
 * names the base release (e.g. `/man/257/` becomes `/man/259/`).
 */
export function retargetDocumentationUrl(url: string, base: string, target: string): string {
  const from = versionLabel(base);
  const to = versionLabel(target);
  if (from === to) return url;
  return url
    .split("/")
    .map((segment) => {
      if (segment === from) return to;
      if (segment === `v${from}`) return `v${to}`;
      return segment;
    })
    .join("/");
}

/**
 * Rewrite a trailing release suffix such as `(257)` or `(v257)` in a title to
 * the target release. Titles without such a suffix are returned as is.
 */
export function retargetTitle(title: string, base: string, target: string): string {
  const from = versionLabel(base);
  const to = versionLabel(target);
  const match = /^(.*)\((v?)([^()]*)\)\s*$/.exec(title);
  if (!match || match[3].trim() !== from) return title;
  return `${match[1]}(${match[2]}${to})`;
}

export interface ApplyOptions {
  /** Rewrite `documentation` URLs to name the target release. Defaults to true. */
  retargetDocumentation?: boolean;
}

/**
 * Apply a structural diff to the curated base. The base is never mutated.
 *
 * Throws VersionMismatch when the diff was not computed from the base's release.
 */
export function applyDiff(
  base: CuratedSchemaDocument,
  diff: StructuralDiff,
  options: ApplyOptions = {}
): CuratedSchemaDocument {
  if (diff.format !== base.format) {
    throw new VersionMismatch(
      `Diff for ${diff.format} applied to curated ${base.format} schema`,
      base.format,
      diff.format
    );
  }
  if (diff.base_version !== base.version) {
    throw new VersionMismatch(
      `Diff base release ${diff.base_version} does not match curated base ${base.version} (${base.format})`,
      base.version,
      diff.base_version
    );
  }

  const target = diff.target_version;
  const sections: Record<string, CuratedSection> = {};
  for (const [name, section] of Object.entries(base.sections)) {
    sections[name] = cloneSection(section);
  }

  for (const name of diff.removed_sections) delete sections[name];
  for (const { section, key } of diff.removed_keys) {
    const existing = ownValue(sections, section);
    if (existing) delete existing.keys[key];
  }

  for (const name of diff.added_sections) {
    const keys: Record<string, KeyDefinition> = {};
    for (const key of ownValue(diff.added_section_keys, name) ?? []) keys[key] = synthesizeKey(key, target);
    sections[name] = { name, repeatable: false, keys };
  }
  for (const { section, key } of diff.added_keys) {
    // The curated base may lack a section both raw releases have; parity checking reports it
    let existing = ownValue(sections, section);
    if (!existing) {
      existing = { name: section, repeatable: false, keys: {} };
      sections[section] = existing;
    }
    if (!ownValue(existing.keys, key)) existing.keys[key] = synthesizeKey(key, target);
  }

  if (options.retargetDocumentation !== false) {
    for (const section of Object.values(sections)) {
      for (const key of Object.values(section.keys)) {
        if (key.curated && key.documentation) {
          key.documentation = retargetDocumentationUrl(key.documentation, base.version, target);
        }
      }
    }
  }

  const derived: CuratedSchemaDocument = {
    format: base.format,
    version: target,
    sections,
  };
  if (base.title !== undefined) derived.title = retargetTitle(base.title, base.version, target);
  if (target !== base.version) {
    derived.generated_from = { base_version: base.version, diff: describeDiff(diff) };
  } else if (base.generated_from) {
    derived.generated_from = { ...base.generated_from };
  }
  if (base.id !== undefined) derived.id = base.id;
  return derived;
}

// --- Structural parity ---

export function checkParity(curated: CuratedSchemaDocument, raw: RawSchemaDocument): ParityReport {
  const curatedNames = new Set(Object.keys(curated.sections));
  const rawNames = new Set(Object.keys(raw.sections));
  const shared = new Set([...curatedNames].filter((name) => rawNames.has(name)));

  const report: ParityReport = {
    missing_sections: [...rawNames].filter((name) => !curatedNames.has(name)).sort(),
    extra_sections: [...curatedNames].filter((name) => !rawNames.has(name)).sort(),
    missing_keys: [],
    extra_keys: [],
  };
  for (const section of [...shared].sort()) {
    const curatedKeys = new Set(Object.keys(curated.sections[section].keys));
    const rawKeys = new Set(raw.sections[section].keys);
    for (const key of [...rawKeys].sort()) {
      if (!curatedKeys.has(key)) report.missing_keys.push({ section, key });
    }
    for (const key of [...curatedKeys].sort()) {
      if (!rawKeys.has(key)) report.extra_keys.push({ section, key });
    }
  }
  return report;
}

export function isParityClean(report: ParityReport): boolean {
  return (
    report.missing_sections.length === 0 &&
    report.extra_sections.length === 0 &&
    report.missing_keys.length === 0 &&
    report.extra_keys.length === 0
  );
}

/** Throws PostconditionViolation unless `curated` has exactly the sections and keys of `raw`. */
export function assertParity(curated: CuratedSchemaDocument, raw: RawSchemaDocument): void {
  const report = checkParity(curated, raw);
  if (!isParityClean(report)) {
    throw new PostconditionViolation(
      `Derived ${curated.format} schema for ${curated.version} diverges from the raw release`,
      report
    );
  }
}
