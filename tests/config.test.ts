import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { loadConfig, parseConfigDict } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const PROJECT_DIR = join(import.meta.dirname, "fixtures/project");

describe("parseConfigDict", () => {
  it("applies defaults", () => {
    const config = parseConfigDict({ base_version: "257", versions: ["257"] }, "/srv/schemas");
    expect(config).toEqual({
      baseVersion: "257",
      versions: ["257"],
      formats: ["network", "netdev", "link", "networkd.conf"],
      rawDir: "/srv/schemas/raw",
      curatedDir: "/srv/schemas/curated",
      outDir: "/srv/schemas/schemas",
      outputFormat: "json",
    });
  });

  it("adopts the spelling of the versions list for the base", () => {
    const config = parseConfigDict({ base_version: 257, versions: ["v256", "v257"] }, "/srv");
    expect(config.baseVersion).toBe("v257");
  });

  it("requires the base release among the versions", () => {
    expect(() => parseConfigDict({ base_version: "257", versions: ["250"] }, "/srv")).toThrow(
      "Base version '257' is not listed in 'versions'"
    );
  });

  it("requires a base release", () => {
    expect(() => parseConfigDict({ versions: ["250"] }, "/srv")).toThrow(ConfigError);
  });

  it("rejects unknown formats and output formats", () => {
    expect(() =>
      parseConfigDict({ base_version: "1", versions: ["1"], formats: ["service"] }, "/srv")
    ).toThrow("Unknown format type 'service'");
    expect(() =>
      parseConfigDict({ base_version: "1", versions: ["1"], output_format: "toml" }, "/srv")
    ).toThrow("must be json or yaml");
  });

  it("rejects duplicate releases", () => {
    expect(() => parseConfigDict({ base_version: "1", versions: ["1", "v1"] }, "/srv")).toThrow(
      ConfigError
    );
  });
});

describe("loadConfig", () => {
  it("loads the fixture project", () => {
    const config = loadConfig(join(PROJECT_DIR, "netschema.yaml"));
    expect(config.baseVersion).toBe("7");
    expect(config.versions).toEqual(["5", "7", "9"]);
    expect(config.formats).toEqual(["network"]);
    expect(config.rawDir).toBe(join(PROJECT_DIR, "raw"));
    expect(config.idBase).toBe("https://schemas.example.org/netschema");
  });

  it("reports a missing file", () => {
    expect(() => loadConfig(join(PROJECT_DIR, "missing.yaml"))).toThrow(ConfigError);
  });
});
