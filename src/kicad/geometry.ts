export interface Point {
  x: number;
  y: number;
}

export function mmToMil(mm: number): number {
  return Math.round(mm / 0.0254);
}

export function milToMm(mil: number): number {
  return mil * 0.0254;
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function samePoint(a: Point, b: Point, tolerance = 0): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}

export function pointString(p: Point): string {
  return `(${p.x}, ${p.y})`;
}

/**
 * Axis-aligned bounding box. Starts empty; `valid` turns true once a point is added.
 */
export class BoundingBox {
  xmin = Infinity;
  ymin = Infinity;
  xmax = -Infinity;
  ymax = -Infinity;

  static of(points: readonly Point[]): BoundingBox {
    const bb = new BoundingBox();
    for (const p of points) bb.addPoint(p);
    return bb;
  }

  get valid(): boolean {
    return this.xmin <= this.xmax && this.ymin <= this.ymax;
  }

  get width(): number {
    return this.valid ? this.xmax - this.xmin : 0;
  }

  get height(): number {
    return this.valid ? this.ymax - this.ymin : 0;
  }

  get center(): Point {
    return { x: (this.xmin + this.xmax) / 2, y: (this.ymin + this.ymax) / 2 };
  }

  addPoint(p: Point, radius = 0): this {
    this.xmin = Math.min(this.xmin, p.x - radius);
    this.ymin = Math.min(this.ymin, p.y - radius);
    this.xmax = Math.max(this.xmax, p.x + radius);
    this.ymax = Math.max(this.ymax, p.y + radius);
    return this;
  }

  addBox(other: BoundingBox): this {
    if (other.valid) {
      this.addPoint({ x: other.xmin, y: other.ymin });
      this.addPoint({ x: other.xmax, y: other.ymax });
    }
    return this;
  }
}

export interface Segment {
  start: Point;
  end: Point;
}

export function segmentLength(seg: Segment): number {
  return distance(seg.start, seg.end);
}

/** Angle of the segment in radians, normalised to [0, 2π). */
export function segmentAngle(seg: Segment): number {
  const a = Math.atan2(seg.end.y - seg.start.y, seg.end.x - seg.start.x);
  return a < 0 ? a + 2 * Math.PI : a;
}

/** Order-independent key, so A→B and B→A compare equal. */
export function segmentKey(seg: Segment): string {
  const a = `${seg.start.x},${seg.start.y}`;
  const b = `${seg.end.x},${seg.end.y}`;
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

const EPSILON = 1e-9;

function cross(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * True when two collinear segments share more than a single point.
 * Segments that only touch at an endpoint do not overlap.
 */
export function segmentsOverlap(s1: Segment, s2: Segment): boolean {
  if (Math.abs(cross(s1.start, s1.end, s2.start)) > EPSILON) return false;
  if (Math.abs(cross(s1.start, s1.end, s2.end)) > EPSILON) return false;

  const dx = s1.end.x - s1.start.x;
  const dy = s1.end.y - s1.start.y;
  const useX = Math.abs(dx) >= Math.abs(dy);
  const project = (p: Point) => (useX ? p.x : p.y);

  const a1 = Math.min(project(s1.start), project(s1.end));
  const a2 = Math.max(project(s1.start), project(s1.end));
  const b1 = Math.min(project(s2.start), project(s2.end));
  const b2 = Math.max(project(s2.start), project(s2.end));

  return Math.min(a2, b2) - Math.max(a1, b1) > EPSILON;
}
