// Curated schema validator — structural shape only, never content semantics

import type { CuratedSchemaDocument, KeyDefinition, ValidationResult } from "./model.js";
import { compareVersions } from "./versions.js";

function validateKey(key: KeyDefinition, ctx: string, errors: string[], warnings: string[]): void {
  const { constraints } = key;

  if (key.value_kind === "enum" || key.value_kind === "list<enum>") {
    if (!constraints.enum || constraints.enum.length === 0) {
      errors.push(`${ctx}: ${key.value_kind} key has no allowed values`);
    }
  } else if (constraints.enum) {
    warnings.push(`${ctx}: allowed values given for a ${key.value_kind} key`);
  }

  if (constraints.minimum !== undefined && constraints.maximum !== undefined) {
    if (constraints.minimum > constraints.maximum) {
      errors.push(`${ctx}: minimum ${constraints.minimum} exceeds maximum ${constraints.maximum}`);
    }
  }

  if (constraints.pattern !== undefined) {
    try {
      new RegExp(constraints.pattern);
    } catch (err) {
      errors.push(
        `${ctx}: invalid pattern '${constraints.pattern}' (${err instanceof Error ? err.message : String(err)})`
      );
    }
  }

  if (key.since_version !== undefined && key.until_version !== undefined) {
    if (compareVersions(key.since_version, key.until_version) >= 0) {
      errors.push(`${ctx}: since_version ${key.since_version} is not before until_version ${key.until_version}`);
    }
  }

  if (!key.curated) {
    warnings.push(`${ctx}: undocumented key (degraded metadata)`);
  } else if (!key.description) {
    warnings.push(`${ctx}: curated key has no description`);
  }
}

export function validateCurated(doc: CuratedSchemaDocument): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!doc.format) errors.push("Root field 'format' is required");
  if (!doc.version) errors.push("Root field 'version' is required");
  if (Object.keys(doc.sections).length === 0) warnings.push("Schema has no sections");

  for (const [name, section] of Object.entries(doc.sections)) {
    if (section.name !== name) {
      errors.push(`Section '${name}' is recorded under the name '${section.name}'`);
    }
    const keys = Object.entries(section.keys);
    if (keys.length === 0) warnings.push(`Section '${name}' has no keys`);
    for (const [keyName, key] of keys) {
      const ctx = `Key '${name}.${keyName}'`;
      if (key.name !== keyName) {
        errors.push(`${ctx}: recorded under the name '${key.name}'`);
      }
      validateKey(key, ctx, errors, warnings);
    }
  }

  return { errors, warnings, isValid: errors.length === 0 };
}
