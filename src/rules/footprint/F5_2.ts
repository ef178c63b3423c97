import type { Effects, GraphicItem } from "@klc/kicad/common";
import type { Footprint } from "@klc/kicad/FootprintModel";
import type { RuleConstants } from "../constants";
import { Findings, defineRule, graphicString } from "../helpers";

const FAB_LAYERS = ["F.Fab", "B.Fab"];
const REFERENCE_MARKER = "${REFERENCE}";

function fontOf(field: { effects?: Effects }): { h: number; w: number; thickness: number } {
  const font = field.effects?.font;
  return { h: font?.size.h ?? 0, w: font?.size.w ?? 0, thickness: font?.thickness ?? 0 };
}

function checkValue(fp: Readonly<Footprint>, k: RuleConstants, out: Findings): void {
  const value = fp.value;
  if (!value) {
    out.error("Missing 'value' field");
    return;
  }

  const problems: string[] = [];
  if (value.value !== fp.name) {
    problems.push("Value text should match footprint name:", `Value text is '${value.value}', expected: '${fp.name}'`);
  }
  if (value.layer === undefined || !FAB_LAYERS.includes(value.layer)) {
    problems.push(`Component value is on layer ${value.layer ?? "(none)"} but should be on F.Fab or B.Fab`);
  }
  if (value.hide) problems.push("Component value is hidden (should be set to visible)");

  const font = fontOf(value);
  const fMin = Math.min(font.h, font.w);
  const fMax = Math.max(font.h, font.w);
  if (fMin < k.textSizeMin) {
    problems.push(`Value label size (${fMin}mm) is below minimum allowed value of ${k.textSizeMin}mm`);
  }
  if (fMax > k.textSizeMax) {
    problems.push(`Value label size (${fMax}mm) is above maximum allowed value of ${k.textSizeMax}mm`);
  }
  if (font.thickness < k.textThicknessMin || font.thickness > k.textThicknessMax) {
    problems.push(
      `Value label thickness (${font.thickness}mm) is outside allowed range of ${k.textThicknessMin}mm - ${k.textThicknessMax}mm`
    );
  }

  if (problems.length > 0) out.error("Value Label Errors").extra(...problems);
}

function checkSecondReference(fp: Readonly<Footprint>, k: RuleConstants, out: Findings): void {
  const markers = fp.userTexts.filter(t => t.text === REFERENCE_MARKER);
  const ref = markers[markers.length - 1];
  if (!ref) {
    if (!fp.isVirtual) {
      out.error("Second Reference Designator missing").extra(`Add RefDes to F.Fab layer with '${REFERENCE_MARKER}'`);
    }
    return;
  }
  if (ref.layer === undefined || !FAB_LAYERS.includes(ref.layer)) {
    out.error(`Reference designator found on layer '${ref.layer ?? "(none)"}', expected 'F.Fab'`);
    return;
  }

  const font = fontOf(ref);
  const errors: string[] = [];
  const warnings: string[] = [];
  if (font.h !== font.w) errors.push("RefDes aspect ratio should be 1:1");
  if (font.h < k.textSizeMin || font.h > k.textSizeMax) {
    warnings.push(`RefDes text size (${font.h}mm) is outside allowed range [${k.textSizeMin}mm - ${k.textSizeMax}mm]`);
  }
  if (font.thickness < k.textThicknessMin || font.thickness > k.textThicknessMax) {
    warnings.push(
      `RefDes text thickness (${font.thickness}mm) is outside allowed range [${k.textThicknessMin}mm - ${k.textThicknessMax}mm]`
    );
  }
  if (ref.unlocked) errors.push("RefDes on F.Fab layer should be locked (upright orientation)");

  if (errors.length > 0) out.error("RefDes errors").extra(...errors);
  if (warnings.length > 0) out.warning("RefDes warnings").extra(...warnings);
}

function checkLineWidths(drawings: readonly GraphicItem[], k: RuleConstants, out: Findings): void {
  const bad: GraphicItem[] = [];
  const nonNominal: GraphicItem[] = [];
  for (const g of drawings) {
    const width = g.stroke?.width ?? 0;
    if (width < k.fabWidthMin || width > k.fabWidthMax) bad.push(g);
    else if (width !== k.fabWidth) nonNominal.push(g);
  }

  const describe = (g: GraphicItem) => graphicString(g, { layer: true, width: true });
  if (bad.length > 0) {
    out.error(`Some fabrication layer lines have a width outside allowed range of [${k.fabWidthMin}mm - ${k.fabWidthMax}mm]`)
      .extra(...bad.map(describe));
  }
  if (nonNominal.length > 0) {
    out.warning(`Some fabrication layer lines are not using the nominal width of ${k.fabWidth} mm`)
      .extra(...nonNominal.map(describe));
  }
}

export const F5_2 = defineRule<Footprint>("footprint", "F5.2", "Fabrication layer requirements", (fp, out, ctx) => {
  const k = ctx.constants;
  const drawings = FAB_LAYERS.flatMap(layer => fp.graphicsOn(layer)).filter(g => g.kind !== "text");

  checkValue(fp, k, out);
  if (drawings.length === 0 && !fp.isVirtual) out.error("No drawings found on fabrication layer");
  checkLineWidths(drawings, k, out);
  checkSecondReference(fp, k, out);
  if (fp.userTexts.filter(t => t.text === REFERENCE_MARKER).length > 1) {
    out.error(`Multiple RefDes markers found with text '${REFERENCE_MARKER}'`);
  }
});
