import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  ComparisonReport,
  DirectoryFootprintResolver,
  collectLibraries,
  compareFootprintLibraries,
  compareLibraryPaths,
  comparePins,
  compareSymbolLibraries,
} from "../compare/LibraryComparator";
import { SymbolLibrary, writeSymbolLibraryFile } from "../kicad/SymbolLibrary";
import { selectRules } from "../rules/registry";
import { KicadFootprint } from "../synth/KicadFootprint";
import { KicadSymbol } from "../synth/KicadSymbol";

function part(name: string, pin2X = 5.08, footprint = ""): KicadSymbol {
  return new KicadSymbol({ name, footprint })
    .addRect({ x1: -2.54, y1: 2.54, x2: 2.54, y2: -2.54 })
    .addPin({ name: "A", number: "1", x: -5.08, y: 0, side: "left", type: "passive" })
    .addPin({ name: "B", number: "2", x: pin2X, y: 0, side: "right", type: "passive" });
}

function library(...symbols: KicadSymbol[]): SymbolLibrary {
  const lib = new SymbolLibrary("Dev");
  symbols.forEach(s => lib.add(s.build("Dev")));
  return lib;
}

const child = () => new KicadSymbol({ name: "Child", extends: "Parent" });

function withTempDir(fn: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-cmp-"));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

// ─── Symbols ─────────────────────────────────────────────────────────

describe("compareSymbolLibraries", () => {
  const before = () => library(part("Parent"), child(), part("Gone"));
  const after = () => library(part("Parent", 7.62), child(), part("New"));

  it("classifies every symbol by its canonical text", () => {
    const result = compareSymbolLibraries(before(), after());
    expect(result.status).toBe("changed");
    expect(result.changes).toEqual([
      { name: "Child", status: "unchanged", extends: "Parent" },
      { name: "Gone", status: "removed" },
      { name: "New", status: "added" },
      { name: "Parent", status: "changed", reason: "content" },
    ]);
    expect(result.counts).toEqual({ added: 1, removed: 1, changed: 1, unchanged: 1 });
  });

  it("marks derived symbols changed through their parent when asked", () => {
    const result = compareSymbolLibraries(before(), after(), { checkDerived: true });
    expect(result.changes[0]).toEqual({ name: "Child", status: "changed", reason: "derived", via: "Parent", extends: "Parent" });
    expect(result.counts.changed).toBe(2);
  });

  it("carries parent changes down to grandchildren", () => {
    const grandChild = () => new KicadSymbol({ name: "GrandChild", extends: "Child" });
    const result = compareSymbolLibraries(library(part("Parent"), child(), grandChild()), library(part("Parent", 7.62), child(), grandChild()), {
      checkDerived: true,
    });
    expect(result.changes).toEqual([
      { name: "Child", status: "changed", reason: "derived", via: "Parent", extends: "Parent" },
      { name: "GrandChild", status: "changed", reason: "derived", via: "Child", extends: "Child" },
      { name: "Parent", status: "changed", reason: "content" },
    ]);
  });

  it("records inheritance cycles as findings", () => {
    const cycle = () => library(new KicadSymbol({ name: "A", extends: "B" }), new KicadSymbol({ name: "B", extends: "A" }));
    const result = compareSymbolLibraries(cycle(), cycle(), { checkDerived: true });
    expect(result.findings.map(f => [f.severity, f.name, f.message])).toEqual([
      ["warning", "A", 'Symbol "A" has a circular inheritance'],
      ["warning", "B", 'Symbol "B" has a circular inheritance'],
    ]);
    expect(result.changes.map(c => c.status)).toEqual(["unchanged", "unchanged"]);
  });

  it("can leave derived symbols out", () => {
    const result = compareSymbolLibraries(before(), after(), { skipDerived: true });
    expect(result.changes.map(c => c.name)).toEqual(["Gone", "New", "Parent"]);
  });

  it("reports moved pins and removed symbols as design-breaking", () => {
    const result = compareSymbolLibraries(before(), after(), { designBreakingChanges: true });
    expect(result.breaking).toEqual([
      { library: "Dev", name: "Gone", kind: "removed", details: [] },
      { library: "Dev", name: "Parent", kind: "pins", details: ["Pin 2 (B) moved from (5.08, 0) to (7.62, 0)"] },
    ]);
    expect(new ComparisonReport([result]).exitStatus).toBe(3);
  });

  it("reports a removed library", () => {
    const result = compareSymbolLibraries(before(), undefined, { designBreakingChanges: true });
    expect(result.status).toBe("removed");
    expect(result.counts.removed).toBe(3);
    expect(result.breaking).toEqual([{ library: "Dev", name: "", kind: "removed-library", details: [] }]);
  });

  it("checks only added and changed symbols", () => {
    const result = compareSymbolLibraries(before(), after(), { rules: selectRules("symbol", { only: ["S4.5"] }) });
    expect(result.check?.entities.map(e => e.name)).toEqual(["New", "Parent"]);
    expect(new ComparisonReport([result]).exitStatus).toBe(0);
  });

  it("warns about footprint links that do not resolve", () => {
    withTempDir(dir => {
      new KicadFootprint({ name: "Exists" }).writeFile(path.join(dir, "Lib.pretty"));
      const next = library(part("A", 5.08, "Lib:Exists"), part("B", 5.08, "Lib:Missing"));
      const result = compareSymbolLibraries(undefined, next, { footprints: new DirectoryFootprintResolver(dir) });
      expect(result.status).toBe("added");
      expect(result.findings.map(f => [f.name, f.message])).toEqual([
        ["B", 'Symbol "B" uses footprint "Lib:Missing", which does not exist'],
      ]);
    });
  });
});

describe("comparePins", () => {
  const pinsOf = (symbol: KicadSymbol) => symbol.build().pins;

  it("separates no-connect pins from real ones", () => {
    const old = pinsOf(new KicadSymbol({ name: "X" }).addPin({ name: "NC", number: "3", x: 0, y: 0, side: "left", type: "no_connect" }));
    expect(comparePins(old, [])).toEqual({ kind: "nc-pins", details: ["Pin 3 (NC) was removed or renumbered"] });
  });

  it("is quiet when nothing moved", () => {
    const pins = pinsOf(part("X"));
    expect(comparePins(pins, pinsOf(part("X")))).toEqual({ details: [] });
  });
});

// ─── Footprints ──────────────────────────────────────────────────────

describe("compareFootprintLibraries", () => {
  const fp = (name: string, x = 0) =>
    new KicadFootprint({ name }).addPad({ number: "1", type: "smd", shape: "rect", x, y: 0, width: 1, height: 1 }).build("Fp");

  it("classifies footprints and reports removals", () => {
    const result = compareFootprintLibraries("Fp", [fp("A"), fp("B"), fp("C")], [fp("A"), fp("B", 1)], {
      designBreakingChanges: true,
    });
    expect(result.changes.map(c => [c.name, c.status])).toEqual([
      ["A", "unchanged"],
      ["B", "changed"],
      ["C", "removed"],
    ]);
    expect(result.breaking).toEqual([{ library: "Fp", name: "C", kind: "removed", details: [] }]);
  });
});

describe("compareLibraryPaths with .pretty directories", () => {
  const fp = (name: string, x = 0) =>
    new KicadFootprint({ name }).addPad({ number: "1", type: "smd", shape: "rect", x, y: 0, width: 1, height: 1 });

  it("compares the readable footprints and records the unreadable file", () => {
    withTempDir(dir => {
      const oldPretty = path.join(dir, "old", "Fp.pretty");
      const newPretty = path.join(dir, "new", "Fp.pretty");
      fp("A").writeFile(oldPretty);
      fp("B").writeFile(oldPretty);
      fp("A", 1).writeFile(newPretty);
      fp("B").writeFile(newPretty);
      fs.writeFileSync(path.join(newPretty, "Broken.kicad_mod"), "(footprint");

      const report = compareLibraryPaths([path.join(dir, "old")], [path.join(dir, "new")]);
      const lib = report.libraries[0];
      expect(lib.loadError).toBeUndefined();
      expect(lib.changes.map(c => [c.name, c.status])).toEqual([
        ["A", "changed"],
        ["B", "unchanged"],
      ]);
      expect(lib.fileErrors.map(e => e.context.file)).toEqual([path.join(newPretty, "Broken.kicad_mod")]);
      expect(report.loadErrors).toHaveLength(1);
      expect(report.exitStatus).toBe(3);
    });
  });
});

// ─── Paths ───────────────────────────────────────────────────────────

describe("compareLibraryPaths", () => {
  it("pairs libraries by file name and records ones that fail to load", () => {
    withTempDir(dir => {
      const oldDir = path.join(dir, "old");
      const newDir = path.join(dir, "new");
      writeSymbolLibraryFile(library(part("Parent")), path.join(oldDir, "Dev.kicad_sym"));
      writeSymbolLibraryFile(library(part("Parent", 7.62)), path.join(newDir, "Dev.kicad_sym"));
      fs.writeFileSync(path.join(newDir, "Broken.kicad_sym"), "(kicad_symbol_lib");
      new KicadFootprint({ name: "A" }).writeFile(path.join(oldDir, "Fp.pretty"));
      new KicadFootprint({ name: "A" }).writeFile(path.join(newDir, "Fp.pretty"));
      new KicadFootprint({ name: "B" }).writeFile(path.join(newDir, "Fp.pretty"));

      expect([...collectLibraries([newDir]).keys()]).toEqual(["Broken.kicad_sym", "Dev.kicad_sym", "Fp.pretty"]);

      const report = compareLibraryPaths([oldDir], [newDir], { designBreakingChanges: true });
      expect(report.libraries.map(l => [l.kind, l.library, l.status])).toEqual([
        ["symbol", "Broken", "changed"],
        ["symbol", "Dev", "changed"],
        ["footprint", "Fp", "changed"],
      ]);
      expect(report.libraries[0].loadError).toBeDefined();
      expect(report.libraries[2].changes.map(c => [c.name, c.status])).toEqual([
        ["A", "unchanged"],
        ["B", "added"],
      ]);
      expect(report.designBreakingChanges.map(b => b.name)).toEqual(["Parent"]);
      expect(report.loadErrors).toHaveLength(1);
      expect(report.exitStatus).toBe(3);
    });
  });
});
