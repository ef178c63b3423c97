import { describe, it, expect } from "vitest";
import { ConfigError, SchemaError } from "../kicad/errors";
import { SExpressionParser } from "../kicad/SExpressionParser";
import { SymbolLibrary, loadSymbolLibrary } from "../kicad/SymbolLibrary";
import { LibSymbol } from "../kicad/SymbolModel";
import {
  checkEntity,
  checkLibrary,
  checkSymbolLibrary,
  exitStatus,
  failedLibrary,
  filterEntities,
  findExceptions,
  runUnitTest,
} from "../rules/engine";
import type { EntityReport } from "../rules/engine";
import { defineRule, ruleUrl } from "../rules/helpers";
import { compareRuleCodes, selectRules } from "../rules/registry";
import { KicadSymbol } from "../synth/KicadSymbol";

function gappedPart(name: string): KicadSymbol {
  return new KicadSymbol({ name })
    .addPin({ name: "A", number: "1", x: -5.08, y: 0, side: "left", type: "passive" })
    .addPin({ name: "B", number: "3", x: 5.08, y: 0, side: "right", type: "passive" });
}

const S4_5 = () => selectRules("symbol", { only: ["S4.5"] });

// ─── Exceptions ──────────────────────────────────────────────────────

describe("rule exceptions", () => {
  it("are read from KLC_ properties, with or without a suffix", () => {
    const symbol = gappedPart("P")
      .addProperty("KLC_S4.5", "Pin 2 is not fitted")
      .addProperty("KLC_S4.5_second", "Second note")
      .addProperty("KLC_S4.1", "")
      .build();
    expect([...findExceptions(symbol)]).toEqual([
      ["S4.5", ["Pin 2 is not fitted", "Second note"]],
      ["S4.1", [""]],
    ]);
  });

  it("move violations of excepted rules out of the counts", () => {
    const symbol = gappedPart("P").addProperty("KLC_S4.5", "Pin 2 is not fitted").build();
    const report = checkEntity(symbol, S4_5());
    expect(report.violations).toEqual([]);
    expect(report.excepted.map(v => v.message)).toEqual(["Pin 2 is missing."]);
    expect(report.results[0].exception).toEqual({ notes: ["Pin 2 is not fitted"] });
    expect(report.warnings).toBe(0);
    expect(report.verdict).toBe("pass");
  });

  it("can be ignored", () => {
    const symbol = gappedPart("P").addProperty("KLC_S4.5", "Pin 2 is not fitted").build();
    const report = checkEntity(symbol, S4_5(), { disableExceptions: true });
    expect(report.warnings).toBe(1);
    expect(report.verdict).toBe("warn");
  });
});

// ─── Checking ────────────────────────────────────────────────────────

describe("checkEntity", () => {
  it("turns a crashing rule into one error and keeps going", () => {
    const crash = defineRule<LibSymbol>("symbol", "X1", "Always throws", () => {
      throw new Error("boom");
    });
    const report = checkEntity(gappedPart("P").build(), [crash, ...S4_5()]);
    expect(report.violations).toEqual([
      { rule: "X1", severity: "error", message: "Rule crashed: boom", extras: [] },
      { rule: "S4.5", severity: "warning", message: "Pin 2 is missing.", extras: [] },
    ]);
    expect(report.errors).toBe(1);
    expect(report.warnings).toBe(1);
    expect(report.verdict).toBe("fail");
  });

  it("counts load issues as warnings", () => {
    const lib = loadSymbolLibrary(SExpressionParser.parseOne('(kicad_symbol_lib (symbol "Bad" (rectangle (start 0 0))))'), "L");
    const bad = lib.get("Bad");
    if (!bad) throw new Error("symbol did not load");
    const report = checkEntity(bad, []);
    expect(report.issues).toEqual(["(rectangle ...): missing (end x y)"]);
    expect(report.warnings).toBe(1);
    expect(report.verdict).toBe("warn");
  });

  it("hands rules a view they cannot change", () => {
    const rename = defineRule<LibSymbol>("symbol", "X2", "Renames a pin", symbol => {
      symbol.pins[0].name = "Z";
    });
    const symbol = gappedPart("P").build();
    const report = checkEntity(symbol, [rename, ...S4_5()]);
    expect(report.violations.map(v => v.message)).toEqual([
      "Rule crashed: Cannot modify 'name' of a checked entity",
      "Pin 2 is missing.",
    ]);
    expect(symbol.pins.map(p => p.name)).toEqual(["A", "B"]);
  });

  it("gives the same results whatever the rule order", () => {
    const symbol = new KicadSymbol({ name: "Mixed" })
      .addRect({ x1: 0, y1: 0, x2: 5.08, y2: -5.08 })
      .addPin({ name: "GND", number: "1", x: -2.54, y: 1.27, side: "left", type: "passive" })
      .addPin({ name: "NC", number: "4", x: 7.62, y: -2.54, side: "right", type: "passive" })
      .build("L");
    const rules = selectRules("symbol");
    const byRule = (report: EntityReport) => Object.fromEntries(report.results.map(r => [r.rule, r.violations]));

    const forward = checkEntity(symbol, rules);
    const backward = checkEntity(symbol, [...rules].reverse());
    expect(forward.errors).toBeGreaterThan(0);
    expect(byRule(backward)).toEqual(byRule(forward));
    expect(backward.errors).toBe(forward.errors);
    expect(backward.warnings).toBe(forward.warnings);
  });
});

describe("inheritance errors", () => {
  it("fail a symbol whose parent is missing", () => {
    const lib = new SymbolLibrary("L").add(new KicadSymbol({ name: "Child", extends: "Missing" }).build("L"));
    const report = checkSymbolLibrary(lib, S4_5());
    expect(report.entities[0].referenceErrors).toEqual(['Symbol "Child" extends "Missing", which is not in library "L"']);
    expect(report.entities[0].errors).toBe(1);
    expect(report.entities[0].verdict).toBe("fail");
    expect(report.errors).toBe(1);
    expect(exitStatus([report])).toBe(3);
  });

  it("fail every symbol of an inheritance cycle", () => {
    const lib = new SymbolLibrary("L")
      .add(new KicadSymbol({ name: "A", extends: "B" }).build("L"))
      .add(new KicadSymbol({ name: "B", extends: "A" }).build("L"));
    const report = checkSymbolLibrary(lib, S4_5());
    expect(report.entities.map(e => e.referenceErrors)).toEqual([
      ['Symbol "A" has a circular inheritance'],
      ['Symbol "B" has a circular inheritance'],
    ]);
    expect(report.verdict).toBe("fail");
  });

  it("leave symbols checked on their own alone", () => {
    const child = new KicadSymbol({ name: "Child", extends: "Missing" }).build("L");
    expect(checkEntity(child, S4_5()).referenceErrors).toEqual([]);
  });
});

describe("checkLibrary", () => {
  it("sorts entities by name and counts load errors as errors", () => {
    const report = checkLibrary(
      {
        kind: "symbol",
        library: "L",
        entities: [gappedPart("B").build("L"), gappedPart("A").build("L")],
        loadErrors: [new SchemaError("symbol", "unreadable")],
      },
      S4_5()
    );
    expect(report.entities.map(e => e.name)).toEqual(["A", "B"]);
    expect(report.errors).toBe(1);
    expect(report.warnings).toBe(2);
    expect(report.verdict).toBe("fail");
  });

  it("filters a symbol library by component and pattern", () => {
    const lib = new SymbolLibrary("L")
      .add(gappedPart("R").build("L"))
      .add(gappedPart("R_Small").build("L"))
      .add(gappedPart("C").build("L"));
    expect(checkSymbolLibrary(lib, S4_5(), { component: "r" }).entities.map(e => e.name)).toEqual(["R"]);
    expect(checkSymbolLibrary(lib, S4_5(), { pattern: "^r" }).entities.map(e => e.name)).toEqual(["R", "R_Small"]);
  });
});

describe("filterEntities", () => {
  const entities = [{ name: "R" }, { name: "R_Small" }, { name: "C" }];

  it("keeps everything without filters", () => {
    expect(filterEntities(entities, {})).toHaveLength(3);
  });

  it("rejects invalid patterns", () => {
    expect(() => filterEntities(entities, { pattern: "(" })).toThrow(ConfigError);
    expect(() => filterEntities(entities, { pattern: "(" })).toThrow(/^Invalid pattern '\('/);
  });
});

describe("exitStatus", () => {
  const report = (name: string) => checkLibrary({ kind: "symbol", library: "L", entities: [gappedPart(name).build()], loadErrors: [] }, S4_5());
  const clean = checkLibrary({ kind: "symbol", library: "L", entities: [], loadErrors: [] }, S4_5());

  it("is 0 when clean, 2 for warnings and 3 for errors", () => {
    expect(exitStatus([clean])).toBe(0);
    expect(exitStatus([clean, report("P")])).toBe(2);
    expect(exitStatus([report("P"), failedLibrary("symbol", "Broken", new SchemaError("x", "bad"))])).toBe(3);
  });
});

// ─── Unit-test mode ──────────────────────────────────────────────────

describe("runUnitTest", () => {
  const rules = selectRules("symbol");

  it("passes when the named rule behaves as the name says", () => {
    expect(runUnitTest(gappedPart("Warn__S4.5__missing_pin").build(), rules)).toEqual({
      name: "Warn__S4.5__missing_pin",
      passed: true,
      message: "Test 'Warn__S4.5__missing_pin' passed",
    });
  });

  it("fails when the outcome differs", () => {
    const result = runUnitTest(gappedPart("Fail__S4.5__missing_pin").build(), rules);
    expect(result.passed).toBe(false);
    expect(result.message).toBe("Test 'Fail__S4.5__missing_pin' failed");
  });

  it("reports names it cannot parse", () => {
    expect(runUnitTest(gappedPart("Plain").build(), rules).message).toBe("Test 'Plain' could not be parsed");
  });
});

// ─── Registry ────────────────────────────────────────────────────────

describe("rule registry", () => {
  it("orders codes naturally", () => {
    const codes = ["G1.10", "G1.7", "EC02", "F5.2", "S4.1", "EC01"];
    expect(codes.sort(compareRuleCodes)).toEqual(["EC01", "EC02", "F5.2", "G1.7", "G1.10", "S4.1"]);
  });

  it("rejects unknown codes", () => {
    expect(() => selectRules("symbol", { only: ["X9"] })).toThrow("Unknown symbol rule: X9");
    expect(() => selectRules("symbol", { exclude: ["F5.2", "Q1"] })).toThrow("Unknown symbol rules: F5.2, Q1");
  });

  it("applies exclusions", () => {
    const codes = selectRules("footprint", { exclude: ["G1.7", "F5.4"] }).map(r => r.code);
    expect(codes).toEqual(["F5.2", "F5.3", "F6.1", "F6.2", "F7.1", "F9.1", "F9.3", "G1.10", "G1.11"]);
  });

  it("links each code to its KLC page", () => {
    expect(ruleUrl("S4.1")).toBe("https://klc.kicad.org/symbol/s4/s4.1/");
    expect(ruleUrl("F5.2")).toBe("https://klc.kicad.org/footprint/f5/f5.2/");
    expect(ruleUrl("G1.7")).toBe("https://klc.kicad.org/general/g1/g1.7/");
    expect(ruleUrl("EC01")).toBe("(extended check)");
  });
});
