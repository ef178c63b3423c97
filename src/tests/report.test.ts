import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ConfigError } from "../kicad/errors";
import { SymbolLibrary } from "../kicad/SymbolLibrary";
import { LibSymbol } from "../kicad/SymbolModel";
import { LibraryReport, checkLibrary, checkSymbolLibrary } from "../rules/engine";
import { selectRules } from "../rules/registry";
import { JUnitReport, JUnitTestCase, JUnitTestSuite, renderSuite } from "../report/junit";
import { metricsLines, writeMetrics } from "../report/metrics";
import { appendErrorLog, readErrorLog, violationsToLog } from "../report/errorLog";
import { KicadSymbol } from "../synth/KicadSymbol";

function gapped(name: string): KicadSymbol {
  return new KicadSymbol({ name })
    .addPin({ name: "A", number: "1", x: -5.08, y: 0, side: "left", type: "passive" })
    .addPin({ name: "B", number: "3", x: 5.08, y: 0, side: "right", type: "passive" });
}

/** A has a warning, B is clean, C has an excepted warning. */
function sampleReport(): LibraryReport {
  const b = new KicadSymbol({ name: "B" })
    .addPin({ name: "A", number: "1", x: -5.08, y: 0, side: "left", type: "passive" })
    .addPin({ name: "B", number: "2", x: 5.08, y: 0, side: "right", type: "passive" });
  return checkLibrary(
    {
      kind: "symbol",
      library: "Dev",
      file: "Dev.kicad_sym",
      entities: [gapped("C").addProperty("KLC_S4.5", "Pin 2 not fitted").build("Dev"), b.build("Dev"), gapped("A").build("Dev")],
      loadErrors: [],
    },
    selectRules("symbol", { only: ["S4.5"] })
  );
}

function withTempDir(fn: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-report-"));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

// ─── JUnit ───────────────────────────────────────────────────────────

const SAMPLE_SUITE = [
  '  <testsuite name="KLC" id="sym" tests="3" failures="1">',
  '    <testcase classname="KLC" name="Dev:A - Warnings" type="Warnings">',
  '      <failure message="Pin 2 is missing.">Pin 2 is missing.\n</failure>',
  "    </testcase>",
  '    <testcase classname="KLC" name="Dev:B" />',
  '    <testcase classname="KLC" name="Dev:C" />',
  "  </testsuite>",
].join("\n");

describe("JUnitTestSuite.fromReports", () => {
  it("makes one case per entity and notes exceptions as info", () => {
    const suite = JUnitTestSuite.fromReports("KLC", "sym", [sampleReport()]);
    expect(suite.cases.map(c => c.name)).toEqual(["Dev:A", "Dev:B", "Dev:C"]);
    expect(suite.cases[2].results.get("info")).toEqual([
      {
        message: "Exception Dev:C, Rule: S4.5 - https://klc.kicad.org/symbol/s4/s4.5/, Note: Pin 2 not fitted",
        extras: [],
      },
    ]);
    expect(suite.cases[2].failing).toEqual([]);
  });

  it("fails a derived symbol whose parent is missing", () => {
    const lib = new SymbolLibrary("Dev").add(new KicadSymbol({ name: "Child", extends: "Missing" }).build("Dev"));
    const suite = JUnitTestSuite.fromReports("KLC", "sym", [checkSymbolLibrary(lib, selectRules("symbol", { only: ["S4.5"] }))]);
    expect(suite.cases[0].failing).toEqual([
      ["error", [{ message: 'Symbol "Child" extends "Missing", which is not in library "Dev"', extras: [] }]],
    ]);
  });

  it("renders failing cases per severity and passing cases empty", () => {
    expect(renderSuite(JUnitTestSuite.fromReports("KLC", "sym", [sampleReport()]))).toBe(SAMPLE_SUITE);
  });

  it("escapes XML and drops duplicate results", () => {
    const result = { message: 'a "b" & <c>', extras: ["line2"] };
    const suite = new JUnitTestSuite("S").addCase(new JUnitTestCase("x<y").addResult("error", result).addResult("error", result));
    const xml = renderSuite(suite);
    expect(xml).toContain('<testsuite name="S" tests="1" failures="1">');
    expect(xml).toContain('<testcase classname="S" name="x&lt;y - Errors" type="Errors">');
    expect(xml).toContain('<failure message="a &quot;b&quot; &amp; &lt;c&gt;">a "b" &amp; &lt;c&gt;\nline2</failure>');
  });
});

describe("JUnitReport", () => {
  it("writes a new report and appends suites to an existing one", () => {
    withTempDir(dir => {
      const file = path.join(dir, "out", "junit.xml");
      new JUnitReport(file).addSuite(JUnitTestSuite.fromReports("KLC", "sym", [sampleReport()])).save();
      expect(fs.readFileSync(file, "utf-8")).toBe(
        `<?xml version='1.0' encoding='utf-8'?>\n<testsuites>\n${SAMPLE_SUITE}\n</testsuites>\n`
      );

      const second = new JUnitTestSuite("Other").addCase(new JUnitTestCase("ok"));
      const merged = new JUnitReport(file).addSuite(second).render();
      expect(merged).toBe(
        `<?xml version='1.0' encoding='utf-8'?>\n<testsuites>\n${SAMPLE_SUITE}\n${renderSuite(second)}\n</testsuites>\n`
      );
    });
  });

  it("renders an empty document without suites", () => {
    withTempDir(dir => {
      expect(new JUnitReport(path.join(dir, "none.xml")).render()).toBe("<?xml version='1.0' encoding='utf-8'?>\n<testsuites />\n");
    });
  });

  it("refuses to merge into a file that is not a JUnit report", () => {
    withTempDir(dir => {
      const file = path.join(dir, "junit.xml");
      fs.writeFileSync(file, "<junit/>");
      expect(() => new JUnitReport(file)).toThrow(ConfigError);
    });
  });
});

// ─── Metrics ─────────────────────────────────────────────────────────

describe("metrics", () => {
  const expected = [
    "Dev.A.warnings 1",
    "Dev.A.errors 0",
    "Dev.B.warnings 0",
    "Dev.B.errors 0",
    "Dev.C.warnings 0",
    "Dev.C.errors 0",
    "Dev.total_errors 0",
    "Dev.total_warnings 1",
  ];

  it("lists per-entity counts then library totals", () => {
    expect(metricsLines([sampleReport()])).toEqual(expected);
  });

  it("appends to the metrics file", () => {
    withTempDir(dir => {
      const file = path.join(dir, "metrics.txt");
      writeMetrics([], file);
      expect(fs.existsSync(file)).toBe(false);
      writeMetrics(expected, file);
      writeMetrics(["Dev.total_errors 3"], file);
      expect(fs.readFileSync(file, "utf-8")).toBe(`${expected.join("\n")}\nDev.total_errors 3\n`);
    });
  });
});

// ─── Error log ───────────────────────────────────────────────────────

describe("error log", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("merges violations into sorted sections", () => {
    withTempDir(dir => {
      const first = appendErrorLog(path.join(dir, "log"), [
        { rule: "S4.1", library: "Dev", item: "B" },
        { rule: "F5.2", library: "Fp", item: "X", warning: true },
      ]);
      expect(first).toBe(path.join(dir, "log.json"));
      appendErrorLog(first, [
        { rule: "EC01", library: "Dev", item: "A" },
        { rule: "S4.1", library: "Dev", item: "C" },
      ]);

      const expected = {
        errors: {
          EC01: [{ item: "A", library: "Dev" }],
          "S4.1": [
            { item: "B", library: "Dev" },
            { item: "C", library: "Dev" },
          ],
        },
        warnings: { "F5.2": [{ item: "X", library: "Fp" }] },
      };
      expect(fs.readFileSync(first, "utf-8")).toBe(JSON.stringify(expected, null, 4));
      expect(readErrorLog(first)).toEqual(expected);
    });
  });

  it("starts over when the file is not a valid log", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    withTempDir(dir => {
      const file = path.join(dir, "log.json");
      fs.writeFileSync(file, "not json");
      expect(readErrorLog(file)).toEqual({});
      fs.writeFileSync(file, '{"errors": []}');
      expect(readErrorLog(file)).toEqual({});
    });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith("⚠️  Found bad JSON data - clearing");
  });

  it("logs one entry per entity and failing rule", () => {
    const report = checkLibrary(
      { kind: "symbol", library: "Dev", entities: [new LibSymbol("Bare", "Dev")], loadErrors: [] },
      selectRules("symbol", { only: ["S6.1", "S4.5"] })
    );
    expect(violationsToLog([report, sampleReport()])).toEqual([{ rule: "S6.1", library: "Dev", item: "Bare" }]);
  });
});
