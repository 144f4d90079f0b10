// netschema data model — raw (structure-only) and curated (typed, documented) schemas

export const FORMAT_TYPES = ["network", "netdev", "link", "networkd.conf"] as const;
export type FormatType = (typeof FORMAT_TYPES)[number];

export const SCALAR_KINDS = ["boolean", "integer", "string", "enum"] as const;
export type ScalarKind = (typeof SCALAR_KINDS)[number];
export type ValueKind = ScalarKind | `list<${ScalarKind}>`;

export type Scalar = string | number | boolean;
export type DefaultValue = Scalar | Scalar[];

export interface Constraints {
  pattern?: string;
  minimum?: number;
  maximum?: number;
  enum?: string[];
}

export interface KeyDefinition {
  name: string;
  value_kind: ValueKind;
  constraints: Constraints;
  default?: DefaultValue;
  description: string;
  examples: string[];
  since_version?: string;
  until_version?: string;  // exclusive
  deprecated?: boolean;
  documentation?: string;  // upstream manual URL
  curated: boolean;        // false = synthesized, degraded metadata
}

export interface CuratedSection {
  name: string;
  repeatable: boolean;
  keys: Record<string, KeyDefinition>;
}

export interface Provenance {
  base_version: string;
  diff: string;
}

export interface CuratedSchemaDocument {
  format: FormatType;
  version: string;
  id?: string;
  title?: string;
  generated_from?: Provenance;
  sections: Record<string, CuratedSection>;
}

export interface RawSection {
  name: string;
  repeatable: boolean;
  keys: string[];          // sorted, unique
}

export interface RawSchemaDocument {
  format: FormatType;
  version: string;
  sections: Record<string, RawSection>;
}

export interface KeyRef {
  section: string;
  key: string;
}

export interface StructuralDiff {
  format: FormatType;
  base_version: string;
  target_version: string;
  added_sections: string[];
  removed_sections: string[];
  added_keys: KeyRef[];
  removed_keys: KeyRef[];
  added_section_keys: Record<string, string[]>;  // target keys of each added section
}

export interface ParityReport {
  missing_sections: string[];
  extra_sections: string[];
  missing_keys: KeyRef[];
  extra_keys: KeyRef[];
}

export interface ValidationResult {
  errors: string[];
  warnings: string[];
  isValid: boolean;
}

export function isFormatType(value: string): value is FormatType {
  return (FORMAT_TYPES as readonly string[]).includes(value);
}

export function isValueKind(value: string): value is ValueKind {
  const inner = /^list<(.+)>$/.exec(value)?.[1] ?? value;
  return (SCALAR_KINDS as readonly string[]).includes(inner);
}

export function keyRefId(ref: KeyRef): string {
  return `${ref.section}.${ref.key}`;
}

/** Own-property lookup: section and option names like `constructor` are plain data here. */
export function ownValue<T>(record: Readonly<Record<string, T>>, name: string): T | undefined {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}
