import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { SExpressionParser, findChild, keywordOf } from "../kicad/SExpressionParser";
import { SchemaError } from "../kicad/errors";
import {
  Footprint,
  detectLineEnding,
  dumpFootprint,
  loadFootprint,
  loadFootprintDirectory,
  loadFootprintFile,
  writeFootprintFile,
} from "../kicad/FootprintModel";
import { KicadFootprint } from "../synth/KicadFootprint";

const PRETTY = path.join(__dirname, "assets", "Sample.pretty");
const SAMPLE = path.join(PRETTY, "R_0603_1608Metric.kicad_mod");

function parseFootprint(text: string): Footprint {
  return loadFootprint(SExpressionParser.parseOne(text));
}

function dumpedChild(fp: Footprint, keyword: string): string {
  const node = findChild(dumpFootprint(fp), keyword);
  if (!node) throw new Error(`no (${keyword}) in output`);
  return SExpressionParser.format(node);
}

// ─── Loading ─────────────────────────────────────────────────────────

describe("loadFootprintFile", () => {
  const fp = loadFootprintFile(SAMPLE);

  it("reads the header and names the library after the .pretty directory", () => {
    expect(fp.name).toBe("R_0603_1608Metric");
    expect(fp.libName).toBe("Sample");
    expect(fp.fileName).toBe(SAMPLE);
    expect(fp.version).toBe(20241229);
    expect(fp.generator).toBe("pcbnew");
    expect(fp.layer).toBe("F.Cu");
    expect(fp.tags).toBe("resistor");
    expect(fp.description).toBe("Resistor SMD 0603 (1608 Metric), https://example.com/r0603.pdf");
    expect(fp.embeddedFonts).toBe(false);
    expect(fp.lineEnding).toBe("lf");
    expect(fp.issues).toEqual([]);
  });

  it("reads attributes, pads and models", () => {
    expect(fp.attr).toEqual({
      type: "smd",
      excludeFromBom: false,
      excludeFromPosFiles: false,
      boardOnly: false,
      dnp: false,
      other: [],
    });
    expect(fp.pads.map(p => p.number)).toEqual(["1", "2"]);
    expect(fp.pads[0].at).toEqual({ x: -0.825, y: 0, rotation: 0 });
    expect(fp.pads[0].size).toEqual({ w: 0.8, h: 0.95 });
    expect(fp.pads[0].layers).toEqual(["F.Cu", "F.Mask", "F.Paste"]);
    expect(fp.pads[0].roundrectRatio).toBe(0.25);
    expect(fp.padsOfType("smd")).toHaveLength(2);
    expect(fp.models).toHaveLength(1);
    expect(fp.models[0].path).toBe("${KICAD9_3DMODEL_DIR}/Sample.3dshapes/R_0603_1608Metric.step");
    expect(fp.models[0].scale).toEqual({ x: 1, y: 1, z: 1 });
  });

  it("exposes reference and value fields from properties", () => {
    expect(fp.reference?.value).toBe("REF**");
    expect(fp.reference?.layer).toBe("F.SilkS");
    expect(fp.value?.value).toBe("R_0603_1608Metric");
    expect(fp.value?.effects?.font.thickness).toBe(0.15);
    expect(fp.getProperty("Datasheet")?.hide).toBe(true);
  });

  it("groups graphics by layer", () => {
    expect(fp.linesOn("F.Fab")).toHaveLength(4);
    expect(fp.linesOn("F.CrtYd")).toHaveLength(4);
    expect(fp.userTexts.map(t => t.text)).toEqual(["${REFERENCE}"]);
    const box = fp.padsBoundingBox();
    expect(box.valid).toBe(true);
    expect(box.center.x).toBeCloseTo(0);
    expect(box.center.y).toBeCloseTo(0);
  });
});

describe("line endings", () => {
  it("detects the first line break style", () => {
    expect(detectLineEnding("(a)\n")).toBe("lf");
    expect(detectLineEnding("(a)\r\n(b)\n")).toBe("crlf");
    expect(detectLineEnding("(a)\r")).toBe("cr");
  });

  it("records CRLF files on load", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-fp-"));
    try {
      const file = path.join(dir, "Crlf.kicad_mod");
      fs.writeFileSync(file, '(footprint "Crlf"\r\n  (layer "F.Cu")\r\n)\r\n');
      expect(loadFootprintFile(file).lineEnding).toBe("crlf");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

// ─── Round trip ──────────────────────────────────────────────────────

describe("dumpFootprint", () => {
  it("writes an unmodified footprint back in canonical form", () => {
    const text = fs.readFileSync(SAMPLE, "utf-8");
    const fp = parseFootprint(text);
    expect(SExpressionParser.formatFile([dumpFootprint(fp)])).toBe(SExpressionParser.normalize(text));
  });

  it("rebuilds changed attributes in place", () => {
    const fp = parseFootprint('(footprint "T" (attr through_hole exclude_from_bom allow_missing_courtyard))');
    expect(fp.attr?.type).toBe("through_hole");
    expect(fp.attr?.excludeFromBom).toBe(true);
    expect(fp.attr?.other).toEqual(["allow_missing_courtyard"]);
    if (!fp.attr) return;
    fp.attr = { ...fp.attr, dnp: true };
    expect(dumpedChild(fp, "attr")).toBe("(attr through_hole exclude_from_bom dnp allow_missing_courtyard)");
  });

  it("computes circle radius from the end point and writes it back", () => {
    const fp = parseFootprint(
      '(footprint "C" (fp_circle (center 1 1) (end 2 1) (stroke (width 0.1) (type solid)) (layer "F.SilkS")))'
    );
    const [circle] = fp.circlesOn("F.SilkS");
    expect(circle.radius).toBe(1);
    fp.items = [{ ...circle, radius: 2 }];
    const node = findChild(dumpFootprint(fp), "fp_circle");
    const end = node ? findChild(node, "end") : undefined;
    expect(end && SExpressionParser.format(end)).toBe("(end 3 1)");
  });

  it("omits the rotation of unrotated pads", () => {
    const fp = new KicadFootprint({ name: "P" })
      .addPad({ number: "1", type: "smd", shape: "rect", x: 0, y: 0, width: 1, height: 1 })
      .build();
    expect(dumpedChild(fp, "pad")).toBe('(pad "1" smd rect (at 0 0) (size 1 1) (layers "F.Cu" "F.Mask" "F.Paste"))');
  });

  it("keeps legacy module files as modules", () => {
    const fp = parseFootprint(
      '(module Old (layer F.Cu)' +
        ' (fp_text reference "REF**" (at 0 0) (layer F.SilkS) (effects (font (size 1 1) (thickness 0.15))))' +
        ' (fp_text value Old (at 0 1) (layer F.Fab) (effects (font (size 1 1) (thickness 0.15))))' +
        " (model Old.wrl (at (xyz 0 0 1)) (scale (xyz 1 1 1)) (rotate (xyz 0 0 0))))"
    );
    expect(fp.legacy).toBe(true);
    expect(fp.reference?.value).toBe("REF**");
    expect(fp.value?.layer).toBe("F.Fab");
    expect(fp.models[0].offset).toEqual({ x: 0, y: 0, z: 1 });
    expect(keywordOf(dumpFootprint(fp))).toBe("module");
  });
});

// ─── Recovery ────────────────────────────────────────────────────────

describe("malformed footprints", () => {
  it("keeps a broken pad as raw syntax", () => {
    const fp = parseFootprint('(footprint "P" (pad "1" smd rect (at 0 0)))');
    expect(fp.pads).toEqual([]);
    expect(fp.rawItems).toHaveLength(1);
    expect(fp.issues.map(i => i.message)).toEqual(["(pad ...): missing (size w h)"]);
  });

  it("rejects forms that are not footprints", () => {
    expect(() => parseFootprint("(kicad_pcb (version 1))")).toThrow(SchemaError);
  });

  it("loads a directory in file order and collects files that fail", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-fp-"));
    try {
      const pretty = path.join(dir, "Parts.pretty");
      new KicadFootprint({ name: "B_Part" }).writeFile(pretty);
      new KicadFootprint({ name: "A_Part" }).writeFile(pretty);
      fs.writeFileSync(path.join(pretty, "Broken.kicad_mod"), '(footprint "Broken"');
      fs.writeFileSync(path.join(pretty, "notes.txt"), "ignored");

      const { footprints, errors } = loadFootprintDirectory(pretty);
      expect(footprints.map(f => f.name)).toEqual(["A_Part", "B_Part"]);
      expect(footprints[0].libName).toBe("Parts");
      expect(errors).toHaveLength(1);
      expect(errors[0].context.file).toBe(path.join(pretty, "Broken.kicad_mod"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("writes a footprint named after itself and reads it back", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-fp-"));
    try {
      const file = writeFootprintFile(loadFootprintFile(SAMPLE), path.join(dir, "Copy.pretty"));
      expect(path.basename(file)).toBe("R_0603_1608Metric.kicad_mod");
      const again = loadFootprintFile(file);
      expect(again.libName).toBe("Copy");
      expect(again.pads).toHaveLength(2);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
