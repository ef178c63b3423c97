import {
  SExpr,
  SList,
  atomText,
  findChild,
  findChildren,
  hasFlag,
  isList,
  keywordOf,
  num,
  numberAt,
  str,
  sym,
  tagged,
  yesNo,
} from "./SExpressionParser";
import { SchemaError } from "./errors";
import type { Point } from "./geometry";

// ─── Shared element types ────────────────────────────────────────────

export interface Position {
  x: number;
  y: number;
  rotation: number;
}

export interface Font {
  /** (size h w) */
  size: { h: number; w: number };
  thickness?: number;
  face?: string;
  bold: boolean;
  italic: boolean;
}

export interface Effects {
  font: Font;
  justify: string[];
  hide: boolean;
}

export interface Stroke {
  width: number;
  type: string;
}

/** Unrecognised syntax, carried through load/dump untouched. */
export interface RawItem {
  kind: "raw";
  node: SList;
}

export interface Property {
  kind: "property";
  name: string;
  value: string;
  private: boolean;
  /** Legacy `(id n)` field index. */
  id?: number;
  at?: Position;
  layer?: string;
  hide: boolean;
  unlocked: boolean;
  effects?: Effects;
}

interface GraphicBase {
  stroke?: Stroke;
  fill?: string;
  /** Footprint layer, undefined for symbols. */
  layer?: string;
  /** Symbol unit (0 = common to all units). */
  unit: number;
  /** Symbol body style (0 = common, 1 = normal, 2 = De Morgan). */
  style: number;
}

export interface LineItem extends GraphicBase { kind: "line"; start: Point; end: Point }
export interface RectangleItem extends GraphicBase { kind: "rectangle"; start: Point; end: Point }
export interface CircleItem extends GraphicBase { kind: "circle"; center: Point; radius: number }
export interface ArcItem extends GraphicBase { kind: "arc"; start: Point; mid: Point; end: Point }
export interface PolylineItem extends GraphicBase { kind: "polyline"; points: Point[] }
export interface PolygonItem extends GraphicBase { kind: "polygon"; points: Point[] }
export interface BezierItem extends GraphicBase { kind: "bezier"; points: Point[] }
export interface TextItem extends GraphicBase {
  kind: "text";
  text: string;
  at: Position;
  effects?: Effects;
  /** Footprint `fp_text` role; symbols only have free text. */
  role?: "user" | "reference" | "value";
  hide: boolean;
  unlocked: boolean;
}

export type GraphicItem =
  | LineItem
  | RectangleItem
  | CircleItem
  | ArcItem
  | PolylineItem
  | PolygonItem
  | BezierItem
  | TextItem;

export type GraphicKind = GraphicItem["kind"];

// ─── Source tracking ─────────────────────────────────────────────────

const origins = new WeakMap<object, SList>();

/**
 * Link a typed item to the node it was read from. Dumping an item that still
 * has its origin returns that node, so unmodified input survives byte for byte.
 * Copies (`{ ...item }`) have no origin and are rebuilt from their fields.
 */
export function remember<T extends object>(item: T, node: SList): T {
  origins.set(item, node);
  return item;
}

export function originOf(item: object): SList | undefined {
  return origins.get(item);
}

export function raw(node: SList): RawItem {
  return remember({ kind: "raw", node }, node);
}

// ─── Readers ─────────────────────────────────────────────────────────

export function schemaError(node: SList, message: string): SchemaError {
  const keyword = keywordOf(node) ?? "(list)";
  return new SchemaError(keyword, `(${keyword} ...): ${message}`);
}

export function requireString(node: SList, index: number, what: string): string {
  const item = node.items[index];
  const text = item && item.type !== "list" ? atomText(item) : undefined;
  if (text === undefined) {
    throw schemaError(node, `expected ${what} at position ${index}`);
  }
  return text;
}

export function requireNumber(node: SList, index: number, what: string): number {
  const value = numberAt(node, index);
  if (value === undefined) {
    throw schemaError(node, `expected numeric ${what} at position ${index}`);
  }
  return value;
}

/** `(keyword x y)` as a point. */
export function readXY(node: SList): Point {
  return { x: requireNumber(node, 1, "x"), y: requireNumber(node, 2, "y") };
}

export function requirePoint(parent: SList, keyword: string): Point {
  const child = findChild(parent, keyword);
  if (!child) throw schemaError(parent, `missing (${keyword} x y)`);
  return readXY(child);
}

export function optionalPoint(parent: SList, keyword: string): Point | undefined {
  const child = findChild(parent, keyword);
  return child ? readXY(child) : undefined;
}

export function readPosition(node: SList): Position {
  return {
    x: requireNumber(node, 1, "x"),
    y: requireNumber(node, 2, "y"),
    rotation: numberAt(node, 3) ?? 0,
  };
}

export function optionalPosition(parent: SList): Position | undefined {
  const at = findChild(parent, "at");
  return at ? readPosition(at) : undefined;
}

/** `(keyword "value")` or `(keyword value)` child text. */
export function childText(parent: SList, keyword: string): string | undefined {
  const child = findChild(parent, keyword);
  return child ? atomText(child.items[1]) : undefined;
}

export function childNumber(parent: SList, keyword: string): number | undefined {
  const child = findChild(parent, keyword);
  return child ? numberAt(child, 1) : undefined;
}

/** `(keyword yes|no)`, falling back to `fallback` when absent. */
export function childYesNo(parent: SList, keyword: string, fallback: boolean): boolean {
  const child = findChild(parent, keyword);
  if (!child) return fallback;
  const value = atomText(child.items[1]);
  return value === undefined || value === "yes";
}

/** Value of a `(flag yes|no)` node; a bare `(flag)` counts as yes. */
export function flagValue(node: SList): boolean {
  const value = atomText(node.items[1]);
  return value === undefined || value === "yes";
}

export interface EmbeddedFile {
  name: string;
  type: string;
}

/** Names and types listed under `(embedded_files (file (name ..) (type ..) ..))`. */
export function embeddedFilesOf(items: readonly RawItem[]): EmbeddedFile[] {
  const files: EmbeddedFile[] = [];
  for (const item of items) {
    if (keywordOf(item.node) !== "embedded_files") continue;
    for (const file of findChildren(item.node, "file")) {
      files.push({ name: childText(file, "name") ?? "", type: childText(file, "type") ?? "" });
    }
  }
  return files;
}

export function readPoints(parent: SList): Point[] {
  const pts = findChild(parent, "pts");
  if (!pts) throw schemaError(parent, "missing (pts ...)");
  return findChildren(pts, "xy").map(readXY);
}

export function readEffects(node: SList): Effects {
  const font = findChild(node, "font");
  let size = { h: 1.27, w: 1.27 };
  if (font) {
    const sizeNode = findChild(font, "size");
    if (sizeNode) {
      size = { h: requireNumber(sizeNode, 1, "height"), w: requireNumber(sizeNode, 2, "width") };
    }
  }
  const justifyNode = findChild(node, "justify");
  const justify = justifyNode
    ? justifyNode.items.slice(1).map(i => atomText(i)).filter((t): t is string => t !== undefined)
    : [];

  return {
    font: {
      size,
      thickness: font ? childNumber(font, "thickness") : undefined,
      face: font ? childText(font, "face") : undefined,
      bold: font ? hasFlag(font, "bold") : false,
      italic: font ? hasFlag(font, "italic") : false,
    },
    justify,
    hide: hasFlag(node, "hide"),
  };
}

export function optionalEffects(parent: SList): Effects | undefined {
  const effects = findChild(parent, "effects");
  return effects ? readEffects(effects) : undefined;
}

/** `(stroke (width w) (type t))`, or a bare `(width w)` in older footprints. */
export function readStroke(parent: SList): Stroke | undefined {
  const stroke = findChild(parent, "stroke");
  if (stroke) {
    return {
      width: childNumber(stroke, "width") ?? 0,
      type: childText(stroke, "type") ?? "default",
    };
  }
  const width = childNumber(parent, "width");
  return width === undefined ? undefined : { width, type: "solid" };
}

/** `(fill (type t))` in symbols, `(fill solid|none|yes|no)` in footprints. */
export function readFill(parent: SList): string | undefined {
  const fill = findChild(parent, "fill");
  if (!fill) return undefined;
  return childText(fill, "type") ?? atomText(fill.items[1]);
}

export function readProperty(node: SList): Property {
  let index = 1;
  let isPrivate = false;
  if (atomText(node.items[1]) === "private" && node.items.length > 3 && node.items[1].type === "symbol") {
    isPrivate = true;
    index = 2;
  }
  const name = requireString(node, index, "property name");
  const value = requireString(node, index + 1, "property value");
  const effects = optionalEffects(node);
  return remember(
    {
      kind: "property",
      name,
      value,
      private: isPrivate,
      id: childNumber(node, "id"),
      at: optionalPosition(node),
      layer: childText(node, "layer"),
      hide: hasFlag(node, "hide") || (effects?.hide ?? false),
      unlocked: childYesNo(node, "unlocked", false),
      effects,
    },
    node
  );
}

// ─── Writers ─────────────────────────────────────────────────────────

export function xy(keyword: string, p: Point): SList {
  return tagged(keyword, num(p.x), num(p.y));
}

export function at(pos: Position, withRotation = true): SList {
  return withRotation ? tagged("at", num(pos.x), num(pos.y), num(pos.rotation)) : tagged("at", num(pos.x), num(pos.y));
}

export function pts(points: readonly Point[]): SList {
  return tagged("pts", ...points.map(p => xy("xy", p)));
}

/**
 * Build an `(effects ...)` node. `hide` is written only when the owner does
 * not carry its own `(hide yes)`.
 */
export function dumpEffects(effects: Effects, withHide = false): SList {
  const font: SExpr[] = [];
  if (effects.font.face !== undefined) font.push(tagged("face", str(effects.font.face)));
  font.push(tagged("size", num(effects.font.size.h), num(effects.font.size.w)));
  if (effects.font.thickness !== undefined) font.push(tagged("thickness", num(effects.font.thickness)));
  if (effects.font.bold) font.push(yesNo("bold", true));
  if (effects.font.italic) font.push(yesNo("italic", true));

  const items: SExpr[] = [tagged("font", ...font)];
  if (effects.justify.length > 0) items.push(tagged("justify", ...effects.justify.map(j => sym(j))));
  if (withHide && effects.hide) items.push(yesNo("hide", true));
  return tagged("effects", ...items);
}

export function dumpStroke(stroke: Stroke): SList {
  return tagged("stroke", tagged("width", num(stroke.width)), tagged("type", sym(stroke.type)));
}

export function dumpProperty(prop: Property): SList {
  const origin = originOf(prop);
  if (origin) return origin;

  const items: SExpr[] = [];
  if (prop.private) items.push(sym("private"));
  items.push(str(prop.name), str(prop.value));
  if (prop.id !== undefined) items.push(tagged("id", num(prop.id)));
  if (prop.at) items.push(at(prop.at));
  if (prop.layer !== undefined) items.push(tagged("layer", str(prop.layer)));
  if (prop.unlocked) items.push(yesNo("unlocked", true));
  if (prop.hide) items.push(yesNo("hide", true));
  if (prop.effects) items.push(dumpEffects(prop.effects));
  return tagged("property", ...items);
}

export function defaultEffects(size = 1.27): Effects {
  return { font: { size: { h: size, w: size }, bold: false, italic: false }, justify: [], hide: false };
}

export function isKeyword(node: SExpr, keyword: string): node is SList {
  return isList(node, keyword);
}

// ─── Header layout ───────────────────────────────────────────────────

/** A header child (flag, version, attribute) written from a typed field. */
export interface HeaderField {
  keyword: string;
  /** Current typed value; `undefined` omits the child. */
  value: unknown;
  build: () => SList;
  /** Position among the body items when the field was not loaded. */
  defaultSlot: "start" | "end";
}

interface LoadedHeader {
  slot: number;
  seq: number;
  node: SList;
  fingerprint: string;
}

/**
 * Remembers where header children sat between body items and what they held,
 * so an unchanged header is written back as the node it was read from and in
 * its original place.
 */
export class HeaderLayout {
  private loaded = new Map<string, LoadedHeader>();

  record(keyword: string, slot: number, node: SList, value: unknown): void {
    if (this.loaded.has(keyword)) return;
    this.loaded.set(keyword, { slot, seq: this.loaded.size, node, fingerprint: JSON.stringify(value) });
  }

  has(keyword: string): boolean {
    return this.loaded.has(keyword);
  }

  arrange(fields: readonly HeaderField[], body: readonly SList[]): SList[] {
    const placed: { slot: number; order: number; node: SList }[] = [];
    fields.forEach((field, index) => {
      if (field.value === undefined) return;
      const prev = this.loaded.get(field.keyword);
      const node = prev && prev.fingerprint === JSON.stringify(field.value) ? prev.node : field.build();
      const slot = prev ? prev.slot : field.defaultSlot === "start" ? 0 : body.length;
      placed.push({ slot: Math.min(slot, body.length), order: prev ? prev.seq : 1000 + index, node });
    });
    placed.sort((a, b) => a.slot - b.slot || a.order - b.order);

    const out: SList[] = [];
    let next = 0;
    for (let i = 0; i <= body.length; i++) {
      while (next < placed.length && placed[next].slot === i) out.push(placed[next++].node);
      if (i < body.length) out.push(body[i]);
    }
    return out;
  }
}
