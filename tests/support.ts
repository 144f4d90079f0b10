import type {
  CuratedSchemaDocument,
  FormatType,
  KeyDefinition,
  RawSchemaDocument,
} from "../src/model.js";

export function raw(
  version: string,
  sections: Record<string, string[]>,
  format: FormatType = "network"
): RawSchemaDocument {
  const out: RawSchemaDocument = { format, version, sections: {} };
  for (const [name, keys] of Object.entries(sections)) {
    out.sections[name] = { name, repeatable: false, keys: [...keys].sort() };
  }
  return out;
}

export function key(name: string, overrides: Partial<KeyDefinition> = {}): KeyDefinition {
  return {
    name,
    value_kind: "string",
    constraints: {},
    description: `${name} option.`,
    examples: [],
    curated: true,
    ...overrides,
  };
}

/** Curated baseline "7": Network {DHCP, Address} plus a richly documented Bridge section. */
export function curatedBase(): CuratedSchemaDocument {
  return {
    format: "network",
    version: "7",
    sections: {
      Network: {
        name: "Network",
        repeatable: false,
        keys: {
          DHCP: key("DHCP", {
            value_kind: "enum",
            constraints: { enum: ["yes", "no", "ipv4", "ipv6"] },
            default: "no",
            examples: ["yes"],
            documentation: "https://example.org/man/7/network.html",
          }),
          Address: key("Address", { value_kind: "list<string>" }),
        },
      },
      Bridge: {
        name: "Bridge",
        repeatable: false,
        keys: {
          STP: key("STP", { value_kind: "boolean", default: false }),
          Priority: key("Priority", {
            value_kind: "integer",
            constraints: { minimum: 0, maximum: 65535 },
          }),
        },
      },
    },
  };
}

export function rawBase(): RawSchemaDocument {
  return raw("7", { Network: ["DHCP", "Address"], Bridge: ["STP", "Priority"] });
}

export function keyPairs(doc: { sections: Record<string, { keys: object | string[] }> }): string[] {
  const pairs: string[] = [];
  for (const [section, value] of Object.entries(doc.sections)) {
    const keys = Array.isArray(value.keys) ? value.keys : Object.keys(value.keys);
    for (const k of keys) pairs.push(`${section}.${k}`);
  }
  return pairs.sort();
}
