import type { GraphicItem } from "@klc/kicad/common";
import type { Footprint } from "@klc/kicad/FootprintModel";
import { Point, samePoint } from "@klc/kicad/geometry";
import { defineRule, graphicString } from "../helpers";

type Outline = Extract<GraphicItem, { kind: "line" | "arc" }>;

const toNanometre = (mm: number) => Math.round(mm * 1e6);

/** Every coordinate a courtyard item is drawn through. */
function coordinatesOf(g: GraphicItem): number[] {
  switch (g.kind) {
    case "line":
    case "rectangle":
      return [g.start.x, g.start.y, g.end.x, g.end.y];
    case "arc":
      return [g.start.x, g.start.y, g.mid.x, g.mid.y, g.end.x, g.end.y];
    case "circle":
      return [g.center.x, g.center.y, g.center.x + g.radius, g.center.y];
    case "polyline":
    case "polygon":
    case "bezier":
      return g.points.flatMap(p => [p.x, p.y]);
    case "text":
      return [g.at.x, g.at.y];
  }
}

/**
 * Walk the outline from one item to the next connecting one. Returns the item
 * where the walk got stuck, or nothing when the outline closes.
 */
function findOpenEnd(items: readonly Outline[]): Outline | undefined {
  if (items.length === 0) return undefined;

  const remaining = [...items];
  let current = remaining.pop();
  if (!current) return undefined;
  let point: Point = current.start;
  const endPoint: Point = current.end;
  let tolerance = 0;

  while (remaining.length > 0) {
    tolerance = 0;
    let next: { index: number; point: Point } | undefined;
    for (let i = 0; i < remaining.length; i++) {
      const line = remaining[i];
      if (line.kind === "arc" || current.kind === "arc") tolerance = 0.01;
      if (samePoint(point, line.start, tolerance)) {
        next = { index: i, point: line.end };
        break;
      }
      if (samePoint(point, line.end, tolerance)) {
        next = { index: i, point: line.start };
        break;
      }
    }
    if (!next) return current;
    current = remaining[next.index];
    point = next.point;
    remaining.splice(next.index, 1);
  }

  return samePoint(point, endPoint, tolerance) ? undefined : current;
}

const outlineOf = (items: readonly GraphicItem[]) =>
  items.filter((g): g is Outline => g.kind === "line" || g.kind === "arc");

export const F5_3 = defineRule<Footprint>("footprint", "F5.3", "Courtyard layer requirements", (fp, out, ctx) => {
  const { courtyardWidth, courtyardGrid } = ctx.constants;
  const front = fp.graphicsOn("F.CrtYd").filter(g => g.kind !== "text");
  const back = fp.graphicsOn("B.CrtYd").filter(g => g.kind !== "text");

  if (front.length === 0 && back.length === 0) {
    out.error("No courtyard found!").extra("Add courtyard around footprint");
    return;
  }

  const unconnected = [findOpenEnd(outlineOf(front)), findOpenEnd(outlineOf(back))].filter(
    (g): g is Outline => g !== undefined
  );

  const grid = toNanometre(courtyardGrid);
  const courtyard = [...front, ...back];
  const badWidth = courtyard.filter(g => (g.stroke?.width ?? 0) !== courtyardWidth);
  const badGrid = courtyard.filter(g => coordinatesOf(g).some(c => toNanometre(c) % grid !== 0));

  if (badWidth.length > 0) {
    out.error(`Courtyard width error (expected width = ${courtyardWidth}mm)`)
      .extra(...badWidth.map(g => graphicString(g, { layer: true, width: true })));
  }
  if (badGrid.length > 0) {
    out.error(`Courtyard lines are not on ${courtyardGrid}mm grid`)
      .extra(...badGrid.map(g => graphicString(g, { layer: true })));
  }
  if (unconnected.length > 0) {
    out.error("Courtyard must be closed.")
      .extra("The following lines have unconnected endpoints", ...unconnected.map(g => graphicString(g, { layer: true })));
  }
});
