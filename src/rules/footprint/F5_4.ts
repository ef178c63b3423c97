import type { CircleItem, LineItem } from "@klc/kicad/common";
import type { Footprint } from "@klc/kicad/FootprintModel";
import { segmentsOverlap } from "@klc/kicad/geometry";
import { defineRule, graphicString } from "../helpers";

const LAYERS = ["F.Fab", "B.Fab", "F.SilkS", "B.SilkS", "F.CrtYd", "B.CrtYd"];

type Pair = [LineItem | CircleItem, LineItem | CircleItem];

function direction(line: LineItem): string {
  const dx = line.start.x - line.end.x;
  const dy = line.start.y - line.end.y;
  if (dx === 0) return "v";
  if (dy === 0) return "h";
  return (Math.round((dx / dy) * 1000) / 1000).toString();
}

function overlappingLines(lines: readonly LineItem[]): Pair[] {
  const byDirection = new Map<string, LineItem[]>();
  for (const line of lines) {
    const d = direction(line);
    byDirection.set(d, [...(byDirection.get(d) ?? []), line]);
  }

  const pairs: Pair[] = [];
  for (const group of byDirection.values()) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        if (segmentsOverlap(group[i], group[j])) pairs.push([group[i], group[j]]);
      }
    }
  }
  return pairs;
}

function identicalCircles(circles: readonly CircleItem[]): Pair[] {
  const pairs: Pair[] = [];
  for (let i = 0; i < circles.length; i++) {
    for (let j = i + 1; j < circles.length; j++) {
      const [a, b] = [circles[i], circles[j]];
      if (a.radius === b.radius && a.center.x === b.center.x && a.center.y === b.center.y) pairs.push([a, b]);
    }
  }
  return pairs;
}

export const F5_4 = defineRule<Footprint>(
  "footprint",
  "F5.4",
  "Elements on the graphic layer should not overlap",
  (fp, out) => {
    for (const layer of LAYERS) {
      const pairs = [...overlappingLines(fp.linesOn(layer)), ...identicalCircles(fp.circlesOn(layer))];
      if (pairs.length === 0) continue;
      out.error(`${layer} graphic elements should not overlap.`).extra(
        `The following elements overlap at least one other graphic element on layer ${layer}:`,
        ...pairs.map(([a, b]) => `${graphicString(a)} with ${graphicString(b)}`)
      );
    }
  }
);
