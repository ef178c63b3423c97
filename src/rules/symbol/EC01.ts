import type { ArcItem, CircleItem, PolylineItem } from "@klc/kicad/common";
import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { Segment, distance, pointString, segmentAngle, segmentKey, segmentLength } from "@klc/kicad/geometry";
import { Findings, defineRule } from "../helpers";

const SMALL_LENGTH = 0.1;
const VERY_SMALL_ANGLE = (0.4 * Math.PI) / 180;
const QUARTER = Math.PI / 2;
const EIGHTH = Math.PI / 4;

function segmentString(seg: Segment): string {
  return `${pointString(seg.start)} -> ${pointString(seg.end)}`;
}

function segmentsOf(polyline: PolylineItem): Segment[] {
  const segs: Segment[] = [];
  for (let i = 0; i + 1 < polyline.points.length; i++) {
    segs.push({ start: polyline.points[i], end: polyline.points[i + 1] });
  }
  return segs;
}

function checkDegenerateArcs(arcs: readonly ArcItem[], out: Findings): void {
  for (const arc of arcs) {
    if (distance(arc.start, arc.mid) < SMALL_LENGTH || distance(arc.end, arc.mid) < SMALL_LENGTH) {
      out.warning(
        `Arc has zero or near-zero size: start ${pointString(arc.start)}, mid ${pointString(arc.mid)}, end ${pointString(arc.end)}`
      );
    } else if (distance(arc.start, arc.end) < SMALL_LENGTH) {
      out.warning(`Arc starts and ends in the same place ${pointString(arc.start)}: is it a circle?`);
    }
  }
}

function checkDegeneratePolylines(polylines: readonly PolylineItem[], out: Findings): void {
  for (const polyline of polylines) {
    const n = polyline.points.length;
    if (n === 0) {
      out.warning("Polyline contains no points");
      continue;
    }
    if (n === 1) {
      out.warning(`Polyline contains only a single point: ${pointString(polyline.points[0])}`);
      continue;
    }

    segmentsOf(polyline).forEach((seg, i) => {
      const where = `(segment ${i + 1} of ${n - 1})`;
      const length = segmentLength(seg);
      if (length < SMALL_LENGTH) {
        out.warning(
          `Polyline contains a zero or near-zero length segment ${where}: ${segmentString(seg)}, length ${length.toFixed(6)}`
        );
      }

      const theta = segmentAngle(seg);
      const deviation = EIGHTH - Math.abs(EIGHTH - (theta % QUARTER));
      if (deviation > 0 && deviation < VERY_SMALL_ANGLE) {
        const degrees = (theta * 180) / Math.PI;
        out.warning(
          "Polyline contains a segment that is nearly but not exactly horizontal or vertical " +
            `${where}: segment ${segmentString(seg)} is ${degrees.toFixed(6)} degrees`
        );
      }
    });
  }
}

function checkDuplicates(
  polylines: readonly PolylineItem[],
  circles: readonly CircleItem[],
  arcs: readonly ArcItem[],
  out: Findings
): void {
  const segs = new Set<string>();
  for (const seg of polylines.flatMap(segmentsOf)) {
    const key = segmentKey(seg);
    if (segs.has(key)) out.warning(`The same segment exists multiple times: ${segmentString(seg)}`);
    segs.add(key);
  }

  const circleKeys = new Set<string>();
  for (const circle of circles) {
    const key = `${circle.center.x},${circle.center.y},${circle.radius}`;
    if (circleKeys.has(key)) {
      out.warning(`The same circle geometry exists multiple times: ${pointString(circle.center)}, radius ${circle.radius}`);
    }
    circleKeys.add(key);
  }

  const arcKeys = new Set<string>();
  for (const arc of arcs) {
    const key = [arc.start, arc.mid, arc.end].map(p => `${p.x},${p.y}`).join("|");
    if (arcKeys.has(key)) {
      out.warning(
        `The same arc geometry exists multiple times: ${pointString(arc.start)}, midpoint ${pointString(arc.mid)}, end ${pointString(arc.end)}`
      );
    }
    arcKeys.add(key);
  }
}

/** Extended geometry sanity checks. Only ever warns. */
export const EC01 = defineRule<LibSymbol>("symbol", "EC01", "Basic geometry checks", (symbol, out) => {
  const arcs: ArcItem[] = [];
  const circles: CircleItem[] = [];
  const polylines: PolylineItem[] = [];
  for (const g of symbol.graphics) {
    if (g.kind === "arc") arcs.push(g);
    else if (g.kind === "circle") circles.push(g);
    else if (g.kind === "polyline") polylines.push(g);
  }

  checkDegenerateArcs(arcs, out);
  checkDegeneratePolylines(polylines, out);
  // tiny circles are dots and stay allowed
  checkDuplicates(polylines, circles, arcs, out);
});
