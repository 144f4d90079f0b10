import { describe, it, expect } from "vitest";
import { deriveRelease } from "../src/derive.js";
import { PostconditionViolation } from "../src/errors.js";
import { LifespanLedger, buildLedger, lifespanContains } from "../src/ledger.js";
import { curatedBase, key, keyPairs, raw, rawBase } from "./support.js";

describe("LifespanLedger", () => {
  it("opens one interval for a key present throughout", () => {
    const ledger = buildLedger([
      raw("9", { Network: ["DHCP"] }),
      raw("5", { Network: ["DHCP"] }),
      raw("7", { Network: ["DHCP"] }),
    ]);
    expect(ledger.versions).toEqual(["5", "7", "9"]);
    expect(ledger.lifespans("Network", "DHCP")).toEqual([{ since: "5" }]);
  });

  it("treats a removal followed by a re-add as two lifecycles", () => {
    const ledger = buildLedger([
      raw("7", { Network: ["DHCP", "LLMNR"] }),
      raw("8", { Network: ["DHCP"] }),
      raw("9", { Network: ["DHCP", "LLMNR"] }),
    ]);
    expect(ledger.lifespans("Network", "LLMNR")).toEqual([
      { since: "7", until: "8" },
      { since: "9" },
    ]);
    expect(ledger.lifespanAt("Network", "LLMNR", "8")).toBeUndefined();
    expect(ledger.lifespanAt("Network", "LLMNR", "9")).toEqual({ since: "9" });
  });

  it("closes intervals of keys whose section disappears", () => {
    const ledger = buildLedger([
      raw("5", { Network: ["DHCP"], Bridge: ["STP"] }),
      raw("6", { Network: ["DHCP"] }),
    ]);
    expect(ledger.lifespans("Bridge", "STP")).toEqual([{ since: "5", until: "6" }]);
  });

  it("tracks sections named like object builtins", () => {
    const ledger = buildLedger([
      raw("7", { Network: ["DHCP"], constructor: ["Mode"] }),
      raw("8", { Network: ["DHCP"] }),
      raw("9", { Network: ["DHCP"], toString: ["Mode"] }),
    ]);
    expect(ledger.lifespans("constructor", "Mode")).toEqual([{ since: "7", until: "8" }]);
    expect(ledger.lifespans("toString", "Mode")).toEqual([{ since: "9" }]);
  });

  it("requires ascending releases", () => {
    const ledger = new LifespanLedger().observe(raw("9", { Network: ["DHCP"] }));
    expect(() => ledger.observe(raw("7", { Network: ["DHCP"] }))).toThrow("ascending order");
  });

  it("uses half-open intervals", () => {
    const span = { since: "5", until: "8" };
    expect(lifespanContains(span, "5")).toBe(true);
    expect(lifespanContains(span, "7")).toBe(true);
    expect(lifespanContains(span, "8")).toBe(false);
    expect(lifespanContains({ since: "5" }, "250")).toBe(true);
  });
});

describe("deriveRelease", () => {
  const network9 = raw("9", {
    Network: ["DHCP", "Address", "IPv6AcceptRA"],
    Bridge: ["STP", "Priority"],
  });

  it("derives release 9 with an undocumented IPv6AcceptRA", () => {
    const { diff, document } = deriveRelease({
      curatedBase: curatedBase(),
      rawBase: rawBase(),
      rawTarget: network9,
    });

    expect(diff.added_keys).toEqual([{ section: "Network", key: "IPv6AcceptRA" }]);
    expect(diff.removed_keys).toEqual([]);
    expect(diff.added_sections).toEqual([]);
    expect(diff.removed_sections).toEqual([]);

    const added = document.sections["Network"].keys["IPv6AcceptRA"];
    expect(Object.keys(document.sections["Network"].keys)).toHaveLength(3);
    expect(added.value_kind).toBe("string");
    expect(added.curated).toBe(false);
    expect(added.description).toBe("(undocumented — added in 9)");
    expect(added.since_version).toBe("9");
  });

  it("dates a key from its first release across the whole chain", () => {
    const network8 = raw("8", {
      Network: ["DHCP", "Address", "IPv6AcceptRA"],
      Bridge: ["STP", "Priority"],
    });
    const ledger = buildLedger([rawBase(), network8, network9]);
    const { document } = deriveRelease({
      curatedBase: curatedBase(),
      rawBase: rawBase(),
      rawTarget: network9,
      ledger,
    });

    expect(document.sections["Network"].keys["IPv6AcceptRA"].since_version).toBe("8");
    expect(document.sections["Network"].keys["DHCP"].since_version).toBe("7");
  });

  it("gives a re-added key a fresh since_version and the earlier one an until_version", () => {
    const base = curatedBase();
    base.sections["Network"].keys["LLMNR"] = key("LLMNR", { value_kind: "boolean", since_version: "2" });
    const r7 = raw("7", { Network: ["DHCP", "Address", "LLMNR"], Bridge: ["STP", "Priority"] });
    const r8 = raw("8", { Network: ["DHCP", "Address"], Bridge: ["STP", "Priority"] });
    const r9 = raw("9", { Network: ["DHCP", "Address", "LLMNR"], Bridge: ["STP", "Priority"] });
    const ledger = buildLedger([r7, r8, r9]);
    const derive = (target: typeof r7) =>
      deriveRelease({ curatedBase: base, rawBase: r7, rawTarget: target, ledger }).document;

    const at7 = derive(r7).sections["Network"].keys["LLMNR"];
    expect(at7.since_version).toBe("2");
    expect(at7.until_version).toBe("8");

    expect(derive(r8).sections["Network"].keys["LLMNR"]).toBeUndefined();

    const at9 = derive(r9).sections["Network"].keys["LLMNR"];
    expect(at9.since_version).toBe("9");
    expect(at9.until_version).toBeUndefined();
  });

  it("keeps structural parity with the raw target", () => {
    const target = raw("5", { Network: ["DHCP"], Tunnel: ["Local"] });
    const { document } = deriveRelease({
      curatedBase: curatedBase(),
      rawBase: rawBase(),
      rawTarget: target,
      ledger: buildLedger([target, rawBase()]),
    });
    expect(keyPairs(document)).toEqual(["Network.DHCP", "Tunnel.Local"]);
  });

  it("fails when the curated base lacks options its own release has", () => {
    const r7 = raw("7", { Network: ["DHCP", "Address", "DNS"], Bridge: ["STP", "Priority"] });
    expect(() =>
      deriveRelease({ curatedBase: curatedBase(), rawBase: r7, rawTarget: r7 })
    ).toThrow(PostconditionViolation);
  });
});
