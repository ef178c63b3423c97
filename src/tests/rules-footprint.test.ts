import { describe, it, expect } from "vitest";
import * as path from "path";
import { Footprint, loadFootprintFile } from "../kicad/FootprintModel";
import { checkEntity } from "../rules/engine";
import { selectRules } from "../rules/registry";
import { KicadFootprint } from "../synth/KicadFootprint";

const SAMPLE = path.join(__dirname, "assets", "Sample.pretty", "R_0603_1608Metric.kicad_mod");

function run(fp: Footprint, code: string) {
  return checkEntity(fp, selectRules("footprint", { only: [code] })).violations;
}

function withModelPath(fp: Footprint, modelPath: string): Footprint {
  fp.items = fp.items.map(i => (i.kind === "model" ? { ...i, path: modelPath } : i));
  return fp;
}

describe("footprint rules", () => {
  it("pass a well-formed SMD footprint", () => {
    const report = checkEntity(loadFootprintFile(SAMPLE), selectRules("footprint"));
    expect(report.results.map(r => r.rule)).toEqual([
      "F5.2", "F5.3", "F5.4", "F6.1", "F6.2", "F7.1", "F9.1", "F9.3", "G1.7", "G1.10", "G1.11",
    ]);
    expect(report.violations).toEqual([]);
    expect(report.verdict).toBe("pass");
  });

  // ─── Fabrication and courtyard ─────────────────────────────────────

  it("F5.2 collects value field problems into one error", () => {
    const fp = loadFootprintFile(SAMPLE);
    const value = fp.getProperty("Value");
    if (!value) throw new Error("fixture has no Value");
    fp.items = fp.items.map(i => (i === value ? { ...value, layer: "F.SilkS", hide: true } : i));
    expect(run(fp, "F5.2")).toEqual([
      {
        rule: "F5.2",
        severity: "error",
        message: "Value Label Errors",
        extras: [
          "Component value is on layer F.SilkS but should be on F.Fab or B.Fab",
          "Component value is hidden (should be set to visible)",
        ],
      },
    ]);
  });

  it("F5.3 reports where an open courtyard stops", () => {
    const fp = loadFootprintFile(SAMPLE);
    const last = fp.linesOn("F.CrtYd")[3];
    fp.items = fp.items.filter(i => i !== last);
    expect(run(fp, "F5.3")).toEqual([
      {
        rule: "F5.3",
        severity: "error",
        message: "Courtyard must be closed.",
        extras: ["The following lines have unconnected endpoints", "Line from (-1.48, -0.73) to (1.48, -0.73) on F.CrtYd"],
      },
    ]);
  });

  it("F5.4 reports collinear overlapping lines once per pair", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.items.push({
      kind: "line",
      start: { x: -0.8, y: -0.4125 },
      end: { x: 0, y: -0.4125 },
      stroke: { width: 0.1, type: "solid" },
      layer: "F.Fab",
      unit: 0,
      style: 0,
    });
    expect(run(fp, "F5.4")).toEqual([
      {
        rule: "F5.4",
        severity: "error",
        message: "F.Fab graphic elements should not overlap.",
        extras: [
          "The following elements overlap at least one other graphic element on layer F.Fab:",
          "Line from (-0.8, -0.4125) to (0.8, -0.4125) with Line from (-0.8, -0.4125) to (0, -0.4125)",
        ],
      },
    ]);
  });

  // ─── Placement type and anchor ─────────────────────────────────────

  it("F6.1 requires the SMD attribute on SMD-only footprints", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.attr = undefined;
    expect(run(fp, "F6.1")).toEqual([
      {
        rule: "F6.1",
        severity: "error",
        message: "Surface Mount attribute not set",
        extras: ["For SMD footprints, 'Placement type' must be set to 'Surface mount'"],
      },
    ]);
  });

  it("F6.2 flags an anchor away from the pad centre", () => {
    const fp = new KicadFootprint({ name: "Offset" })
      .addPad({ number: "1", type: "smd", shape: "rect", x: 1, y: 0, width: 1, height: 1 })
      .addPad({ number: "2", type: "smd", shape: "rect", x: 3, y: 0, width: 1, height: 1 })
      .build("Test");
    expect(run(fp, "F6.2")).toEqual([
      {
        rule: "F6.2",
        severity: "error",
        message: "Footprint anchor does not match calculated center of Pads or F.Fab",
        extras: ["calculated center for Pads [2,0mm]", "calculated center for F.Fab [2,0mm]"],
        location: { x: 2, y: 0 },
      },
    ]);
  });

  it("F7.1 needs THT pads when the type says through hole", () => {
    const fp = loadFootprintFile(SAMPLE);
    if (!fp.attr) throw new Error("fixture has no attributes");
    fp.attr = { ...fp.attr, type: "through_hole" };
    expect(run(fp, "F7.1").map(v => v.message)).toEqual(["Through hole footprint type is set, but no THT pads found"]);
  });

  // ─── Metadata and models ───────────────────────────────────────────

  it("F9.1 checks file name, description and tags", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.fileName = path.join("lib", "Other.kicad_mod");
    fp.descr = "https://example.com/r.pdf";
    fp.tags = "a,b";
    expect(run(fp, "F9.1").map(v => v.message)).toEqual([
      "footprint name (in file) was 'R_0603_1608Metric', but expected (from filename) 'Other'.",
      "Description contains only a URL - add more description before the URL",
      "Tags contain illegal character: (',')",
    ]);
  });

  it("F9.3 rejects outdated prefixes and non-STEP models", () => {
    const fp = withModelPath(loadFootprintFile(SAMPLE), "${KICAD6_3DMODEL_DIR}/Sample.3dshapes/R_0603_1608Metric.wrl");
    expect(run(fp, "F9.3").map(v => v.message)).toEqual([
      "Model path starts with outdated prefix '${KICAD6_3DMODEL_DIR}/'; it should start with '${KICAD9_3DMODEL_DIR}/'",
      "Model is incompatible format (must be STEP file)",
    ]);
  });

  it("F9.3 wants models in the library's own .3dshapes directory", () => {
    const fp = withModelPath(loadFootprintFile(SAMPLE), "${KICAD9_3DMODEL_DIR}/Other.3dshapes/R_0603_1608Metric.step");
    expect(run(fp, "F9.3")).toEqual([
      {
        rule: "F9.3",
        severity: "error",
        message: "3D model directory is different from footprint directory (found 'Other.3dshapes', should be 'Sample.3dshapes')",
        extras: ["3D model path: Other.3dshapes/R_0603_1608Metric.step"],
      },
    ]);
  });

  it("F9.3 requires a model unless the footprint is virtual", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.items = fp.items.filter(i => i.kind !== "model");
    expect(run(fp, "F9.3").map(v => v.message)).toEqual(["3D model file path missing from the 3D model settings of the footprint"]);
    if (!fp.attr) throw new Error("fixture has no attributes");
    fp.attr = { ...fp.attr, type: "virtual" };
    expect(run(fp, "F9.3").map(v => v.severity)).toEqual(["warning"]);
  });

  // ─── General ───────────────────────────────────────────────────────

  it("G1.7 rejects CRLF files", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.lineEnding = "crlf";
    expect(run(fp, "G1.7")).toEqual([
      {
        rule: "G1.7",
        severity: "error",
        message: "Incorrect line endings",
        extras: ["Library files must use Unix-style line endings (LF)"],
      },
    ]);
  });

  it("G1.10 rejects embedded fonts", () => {
    const fp = loadFootprintFile(SAMPLE);
    fp.embeddedFonts = true;
    expect(run(fp, "G1.10").map(v => v.message)).toEqual(["The checkbox 'embedded fonts' must be unchecked."]);
  });

  it("G1.11 reports text in a non-default font with its location", () => {
    const fp = loadFootprintFile(SAMPLE);
    const [text] = fp.userTexts;
    const effects = text.effects;
    if (!effects) throw new Error("fixture text has no effects");
    fp.items = fp.items.map(i =>
      i === text ? { ...text, effects: { ...effects, font: { ...effects.font, face: "Arial" } } } : i
    );
    expect(run(fp, "G1.11")).toEqual([
      {
        rule: "G1.11",
        severity: "error",
        message: "Text uses non kicad font Arial",
        extras: ['Text item "${REFERENCE}" on layer F.Fab at (0, 0)'],
        location: { x: 0, y: 0, layer: "F.Fab" },
      },
    ]);
  });
});
