// Release-to-release changes between two derived schemas of one format

import type { CuratedSchemaDocument, KeyDefinition } from "./model.js";
import { compareVersions } from "./versions.js";

export interface ChangeSet {
  added: string[];
  removed: string[];
  deprecated: string[];
}

export interface ChangelogEntry {
  format: CuratedSchemaDocument["format"];
  previous: string;
  current: string;
  changes: ChangeSet;
}

function flatten(doc: CuratedSchemaDocument): Map<string, KeyDefinition> {
  const options = new Map<string, KeyDefinition>();
  for (const [sectionName, section] of Object.entries(doc.sections)) {
    for (const [keyName, key] of Object.entries(section.keys)) {
      options.set(`${sectionName}.${keyName}`, key);
    }
  }
  return options;
}

export function compareDocuments(
  prev: CuratedSchemaDocument,
  curr: CuratedSchemaDocument
): ChangeSet {
  const prevOpts = flatten(prev);
  const currOpts = flatten(curr);
  const changes: ChangeSet = { added: [], removed: [], deprecated: [] };

  for (const id of [...new Set([...prevOpts.keys(), ...currOpts.keys()])].sort()) {
    const before = prevOpts.get(id);
    const after = currOpts.get(id);
    if (!before) changes.added.push(id);
    else if (!after) changes.removed.push(id);
    else if (after.deprecated && !before.deprecated) changes.deprecated.push(id);
  }
  return changes;
}

export function isEmptyChangeSet(changes: ChangeSet): boolean {
  return (
    changes.added.length === 0 &&
    changes.removed.length === 0 &&
    changes.deprecated.length === 0
  );
}

/** Pair every release with its predecessor, oldest first. */
export function buildChangelog(docs: readonly CuratedSchemaDocument[]): ChangelogEntry[] {
  const ordered = [...docs].sort((a, b) => compareVersions(a.version, b.version));
  const entries: ChangelogEntry[] = [];
  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const current = ordered[i];
    entries.push({
      format: current.format,
      previous: previous.version,
      current: current.version,
      changes: compareDocuments(previous, current),
    });
  }
  return entries;
}
