import * as fs from "fs";
import * as path from "path";
import {
  SExpressionParser,
  SExpr,
  SList,
  atomText,
  findChild,
  hasFlag,
  isList,
  keywordOf,
  num,
  str,
  sym,
  tagged,
  yesNo,
} from "./SExpressionParser";
import {
  Effects,
  EmbeddedFile,
  GraphicItem,
  HeaderLayout,
  Position,
  Property,
  RawItem,
  TextItem,
  at,
  childNumber,
  childText,
  defaultEffects,
  dumpEffects,
  dumpProperty,
  dumpStroke,
  embeddedFilesOf,
  flagValue,
  optionalEffects,
  originOf,
  pts,
  raw,
  readFill,
  readPoints,
  readPosition,
  readProperty,
  readStroke,
  readXY,
  remember,
  requirePoint,
  requireString,
  schemaError,
  xy,
} from "./common";
import { KicadError, SchemaError } from "./errors";
import { BoundingBox, distance } from "./geometry";

export const FOOTPRINT_VERSION = 20241229;

// ─── Types ───────────────────────────────────────────────────────────

export type PadType = "smd" | "thru_hole" | "np_thru_hole" | "connect";

export interface Pad {
  kind: "pad";
  number: string;
  type: string;
  shape: string;
  at: Position;
  size: { w: number; h: number };
  /** Drill diameter (first dimension for oval holes). */
  drill?: number;
  layers: string[];
  roundrectRatio?: number;
}

export interface Xyz {
  x: number;
  y: number;
  z: number;
}

export interface Model3D {
  kind: "model";
  path: string;
  offset: Xyz;
  scale: Xyz;
  rotate: Xyz;
  hide: boolean;
}

export interface FootprintAttributes {
  type?: "smd" | "through_hole" | "virtual";
  excludeFromBom: boolean;
  excludeFromPosFiles: boolean;
  boardOnly: boolean;
  dnp: boolean;
  /** Flags this model does not interpret, kept in order. */
  other: string[];
}

export type FootprintItem = Property | GraphicItem | Pad | Model3D | RawItem;

/** Reference or Value, from a property or a legacy `fp_text reference|value`. */
export interface FieldText {
  value: string;
  layer?: string;
  at?: Position;
  hide: boolean;
  unlocked: boolean;
  effects?: Effects;
}

export type LineEnding = "lf" | "crlf" | "cr";

// ─── Footprint ───────────────────────────────────────────────────────

export class Footprint {
  name: string;
  /** Library name, from the enclosing `<lib>.pretty` directory. */
  libName: string;
  /** File the footprint was read from, if any. */
  fileName?: string;
  /** Written as the pre-KiCad 6 `(module ...)` form. */
  legacy = false;
  /** Bare atoms after the name, such as `locked` or `placed`. */
  flags: SExpr[] = [];
  version?: number;
  generator?: string;
  generatorVersion?: string;
  layer?: string;
  descr?: string;
  tags?: string;
  attr?: FootprintAttributes;
  embeddedFonts?: boolean;
  lineEnding: LineEnding = "lf";
  items: FootprintItem[] = [];
  issues: SchemaError[] = [];
  /** @internal */
  readonly layout = new HeaderLayout();

  constructor(name: string, libName: string = "") {
    this.name = name;
    this.libName = libName;
  }

  get properties(): Property[] {
    return this.items.filter((i): i is Property => i.kind === "property");
  }

  get pads(): Pad[] {
    return this.items.filter((i): i is Pad => i.kind === "pad");
  }

  get models(): Model3D[] {
    return this.items.filter((i): i is Model3D => i.kind === "model");
  }

  get graphics(): GraphicItem[] {
    return this.items.filter(
      (i): i is GraphicItem => i.kind !== "property" && i.kind !== "pad" && i.kind !== "model" && i.kind !== "raw"
    );
  }

  /** Free texts (`fp_text user`). */
  get userTexts(): TextItem[] {
    return this.graphics.filter((g): g is TextItem => g.kind === "text" && g.role === "user");
  }

  get rawItems(): RawItem[] {
    return this.items.filter((i): i is RawItem => i.kind === "raw");
  }

  get description(): string {
    return this.descr ?? this.getProperty("Description")?.value ?? "";
  }

  get isVirtual(): boolean {
    return this.attr?.type === "virtual" || this.attr?.boardOnly === true;
  }

  get embeddedFiles(): EmbeddedFile[] {
    return embeddedFilesOf(this.rawItems);
  }

  get hasEmbeddedFiles(): boolean {
    return this.embeddedFiles.length > 0;
  }

  get reference(): FieldText | undefined {
    return this.field("Reference", "reference");
  }

  get value(): FieldText | undefined {
    return this.field("Value", "value");
  }

  getProperty(name: string): Property | undefined {
    return this.properties.find(p => p.name === name);
  }

  graphicsOn(layer: string): GraphicItem[] {
    return this.graphics.filter(g => g.layer === layer);
  }

  linesOn(layer: string): Extract<GraphicItem, { kind: "line" }>[] {
    return this.graphicsOn(layer).filter((g): g is Extract<GraphicItem, { kind: "line" }> => g.kind === "line");
  }

  circlesOn(layer: string): Extract<GraphicItem, { kind: "circle" }>[] {
    return this.graphicsOn(layer).filter((g): g is Extract<GraphicItem, { kind: "circle" }> => g.kind === "circle");
  }

  padsOfType(type: PadType): Pad[] {
    return this.pads.filter(p => p.type === type);
  }

  /** Extents of all pads, each taken as its rotated size around its position. */
  padsBoundingBox(): BoundingBox {
    const box = new BoundingBox();
    for (const pad of this.pads) {
      const rotated = Math.abs(Math.round(pad.at.rotation)) % 180 === 90;
      const w = (rotated ? pad.size.h : pad.size.w) / 2;
      const h = (rotated ? pad.size.w : pad.size.h) / 2;
      box.addPoint({ x: pad.at.x - w, y: pad.at.y - h });
      box.addPoint({ x: pad.at.x + w, y: pad.at.y + h });
    }
    return box;
  }

  /** Extents of the non-text drawings on one layer. */
  layerBoundingBox(layer: string): BoundingBox {
    const box = new BoundingBox();
    for (const g of this.graphicsOn(layer)) {
      switch (g.kind) {
        case "line":
        case "rectangle":
          box.addPoint(g.start).addPoint(g.end);
          break;
        case "circle":
          box.addPoint(g.center, g.radius);
          break;
        case "arc":
          box.addPoint(g.start).addPoint(g.mid).addPoint(g.end);
          break;
        case "polyline":
        case "polygon":
        case "bezier":
          g.points.forEach(p => box.addPoint(p));
          break;
        case "text":
          break;
      }
    }
    return box;
  }

  private field(propertyName: string, role: "reference" | "value"): FieldText | undefined {
    const prop = this.getProperty(propertyName);
    if (prop) {
      return {
        value: prop.value,
        layer: prop.layer,
        at: prop.at,
        hide: prop.hide,
        unlocked: prop.unlocked,
        effects: prop.effects,
      };
    }
    const text = this.graphics.find((g): g is TextItem => g.kind === "text" && g.role === role);
    return text
      ? { value: text.text, layer: text.layer, at: text.at, hide: text.hide, unlocked: text.unlocked, effects: text.effects }
      : undefined;
  }
}

// ─── Load ────────────────────────────────────────────────────────────

const ATTR_TYPES = new Set(["smd", "through_hole", "virtual"]);

/**
 * Build a footprint from a `(footprint ...)` or legacy `(module ...)` node.
 */
export function loadFootprint(node: SExpr, fileName?: string, libName: string = ""): Footprint {
  if (!isList(node) || (keywordOf(node) !== "footprint" && keywordOf(node) !== "module")) {
    throw new SchemaError(keywordOf(node) ?? "(atom)", "Expected a (footprint ...) form", { file: fileName });
  }
  const name = requireString(node, 1, "footprint name").split(":").pop() ?? "";
  const fp = new Footprint(name, libName);
  fp.fileName = fileName;
  fp.legacy = keywordOf(node) === "module";

  for (const child of node.items.slice(2)) {
    if (!isList(child)) {
      fp.flags.push(child);
      continue;
    }
    const slot = fp.items.length;
    try {
      if (readFootprintHeader(fp, child, slot)) continue;
      fp.items.push(readFootprintItem(child));
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      fp.issues.push(err.withContext({ entity: name, file: fileName }));
      fp.items.push(raw(child));
    }
  }
  return fp;
}

function readFootprintHeader(fp: Footprint, child: SList, slot: number): boolean {
  const keyword = keywordOf(child);
  switch (keyword) {
    case "version":
      fp.version = childNumberAt(child);
      fp.layout.record(keyword, slot, child, fp.version);
      return true;
    case "generator":
      fp.generator = requireString(child, 1, "generator");
      fp.layout.record(keyword, slot, child, fp.generator);
      return true;
    case "generator_version":
      fp.generatorVersion = requireString(child, 1, "generator version");
      fp.layout.record(keyword, slot, child, fp.generatorVersion);
      return true;
    case "layer":
      fp.layer = requireString(child, 1, "layer");
      fp.layout.record(keyword, slot, child, fp.layer);
      return true;
    case "descr":
      fp.descr = requireString(child, 1, "description");
      fp.layout.record(keyword, slot, child, fp.descr);
      return true;
    case "tags":
      fp.tags = requireString(child, 1, "tags");
      fp.layout.record(keyword, slot, child, fp.tags);
      return true;
    case "attr":
      fp.attr = readAttributes(child);
      fp.layout.record(keyword, slot, child, fp.attr);
      return true;
    case "embedded_fonts":
      fp.embeddedFonts = flagValue(child);
      fp.layout.record(keyword, slot, child, fp.embeddedFonts);
      return true;
    default:
      return false;
  }
}

function childNumberAt(node: SList): number {
  const value = Number(atomText(node.items[1]));
  if (!Number.isFinite(value)) throw schemaError(node, "expected a number");
  return value;
}

function readAttributes(node: SList): FootprintAttributes {
  const attr: FootprintAttributes = {
    excludeFromBom: false,
    excludeFromPosFiles: false,
    boardOnly: false,
    dnp: false,
    other: [],
  };
  for (const item of node.items.slice(1)) {
    const flag = atomText(item);
    if (flag === undefined) continue;
    if (ATTR_TYPES.has(flag)) {
      attr.type = flag === "smd" ? "smd" : flag === "virtual" ? "virtual" : "through_hole";
    } else if (flag === "exclude_from_bom") attr.excludeFromBom = true;
    else if (flag === "exclude_from_pos_files") attr.excludeFromPosFiles = true;
    else if (flag === "board_only") attr.boardOnly = true;
    else if (flag === "dnp") attr.dnp = true;
    else attr.other.push(flag);
  }
  return attr;
}

function readFootprintItem(node: SList): FootprintItem {
  const layer = childText(node, "layer");
  const base = () => ({ stroke: readStroke(node), fill: readFill(node), layer, unit: 0, style: 0 });
  switch (keywordOf(node)) {
    case "property":
      return readProperty(node);
    case "fp_line":
      return remember({ kind: "line", start: requirePoint(node, "start"), end: requirePoint(node, "end"), ...base() }, node);
    case "fp_rect":
      return remember(
        { kind: "rectangle", start: requirePoint(node, "start"), end: requirePoint(node, "end"), ...base() },
        node
      );
    case "fp_circle": {
      const center = requirePoint(node, "center");
      return remember({ kind: "circle", center, radius: distance(center, requirePoint(node, "end")), ...base() }, node);
    }
    case "fp_arc":
      return remember(
        {
          kind: "arc",
          start: requirePoint(node, "start"),
          mid: requirePoint(node, "mid"),
          end: requirePoint(node, "end"),
          ...base(),
        },
        node
      );
    case "fp_poly":
      return remember({ kind: "polygon", points: readPoints(node), ...base() }, node);
    case "fp_curve":
      return remember({ kind: "bezier", points: readPoints(node), ...base() }, node);
    case "fp_text":
      return readText(node);
    case "pad":
      return readPad(node);
    case "model":
      return readModel(node);
    default:
      return raw(node);
  }
}

function readText(node: SList): TextItem {
  const role = requireString(node, 1, "text type");
  if (role !== "user" && role !== "reference" && role !== "value") {
    throw schemaError(node, `unknown text type "${role}"`);
  }
  const atNode = findChild(node, "at");
  if (!atNode) throw schemaError(node, "missing (at x y)");
  const effects = optionalEffects(node);
  return remember(
    {
      kind: "text",
      role,
      text: requireString(node, 2, "text"),
      at: readPosition(atNode),
      layer: childText(node, "layer"),
      effects,
      hide: hasFlag(node, "hide") || (effects?.hide ?? false),
      // KiCad 8+ writes `(unlocked yes)`; older files put `unlocked` inside `at`
      unlocked: hasFlag(node, "unlocked") || hasFlag(atNode, "unlocked"),
      unit: 0,
      style: 0,
    },
    node
  );
}

function readPad(node: SList): Pad {
  const number = requireString(node, 1, "pad number");
  const type = requireString(node, 2, "pad type");
  const shape = requireString(node, 3, "pad shape");
  const atNode = findChild(node, "at");
  if (!atNode) throw schemaError(node, "missing (at x y)");
  const sizeNode = findChild(node, "size");
  if (!sizeNode) throw schemaError(node, "missing (size w h)");
  const size = readXY(sizeNode);
  const drillNode = findChild(node, "drill");
  const layersNode = findChild(node, "layers");

  return remember(
    {
      kind: "pad",
      number,
      type,
      shape,
      at: readPosition(atNode),
      size: { w: size.x, h: size.y },
      drill: drillNode ? drillNode.items.map(i => (i.type === "number" ? i.value : undefined)).find(v => v !== undefined) : undefined,
      layers: layersNode ? layersNode.items.slice(1).map(i => atomText(i) ?? "") : [],
      roundrectRatio: childNumber(node, "roundrect_rratio"),
    },
    node
  );
}

function readXyz(parent: SList, keyword: string, fallback: number): Xyz {
  const child = findChild(parent, keyword);
  const xyz = child ? findChild(child, "xyz") : undefined;
  if (!xyz) return { x: fallback, y: fallback, z: fallback };
  const [x, y, z] = [1, 2, 3].map(i => {
    const item = xyz.items[i];
    if (!item || item.type !== "number") throw schemaError(xyz, "expected (xyz x y z)");
    return item.value;
  });
  return { x, y, z };
}

function readModel(node: SList): Model3D {
  // KiCad 5 wrote the offset as `(at (xyz ...))`
  const offset = findChild(node, "offset") ? readXyz(node, "offset", 0) : readXyz(node, "at", 0);
  return remember(
    {
      kind: "model",
      path: requireString(node, 1, "model path"),
      offset,
      scale: readXyz(node, "scale", 1),
      rotate: readXyz(node, "rotate", 0),
      hide: hasFlag(node, "hide"),
    },
    node
  );
}

// ─── Dump ────────────────────────────────────────────────────────────

export function dumpFootprint(fp: Footprint): SList {
  const body = fp.items.map(dumpFootprintItem);
  const text = (keyword: string, value: string | undefined) => ({
    keyword,
    value,
    build: () => tagged(keyword, str(value ?? "")),
    defaultSlot: "start" as const,
  });
  const children = fp.layout.arrange(
    [
      { keyword: "version", value: fp.version, build: () => tagged("version", num(fp.version ?? FOOTPRINT_VERSION)), defaultSlot: "start" },
      text("generator", fp.generator),
      text("generator_version", fp.generatorVersion),
      text("layer", fp.layer),
      text("descr", fp.descr),
      text("tags", fp.tags),
      { keyword: "attr", value: fp.attr, build: () => dumpAttributes(fp.attr), defaultSlot: "end" },
      {
        keyword: "embedded_fonts",
        value: fp.embeddedFonts,
        build: () => yesNo("embedded_fonts", fp.embeddedFonts === true),
        defaultSlot: "end",
      },
    ],
    body
  );
  return tagged(fp.legacy ? "module" : "footprint", str(fp.name), ...fp.flags, ...children);
}

function dumpAttributes(attr: FootprintAttributes | undefined): SList {
  const flags: string[] = [];
  if (attr?.type) flags.push(attr.type);
  if (attr?.boardOnly) flags.push("board_only");
  if (attr?.excludeFromPosFiles) flags.push("exclude_from_pos_files");
  if (attr?.excludeFromBom) flags.push("exclude_from_bom");
  if (attr?.dnp) flags.push("dnp");
  flags.push(...(attr?.other ?? []));
  return tagged("attr", ...flags.map(f => sym(f)));
}

function dumpFootprintItem(item: FootprintItem): SList {
  const origin = originOf(item);
  if (origin) return origin;

  switch (item.kind) {
    case "raw":
      return item.node;
    case "property":
      return dumpProperty(item);
    case "pad":
      return dumpPad(item);
    case "model":
      return dumpModel(item);
    default:
      return dumpFootprintGraphic(item);
  }
}

function dumpFootprintGraphic(item: GraphicItem): SList {
  const stroke = dumpStroke(item.stroke ?? { width: 0.1, type: "solid" });
  const layer = tagged("layer", str(item.layer ?? "F.Fab"));
  const fill = item.fill !== undefined ? [tagged("fill", sym(item.fill))] : [];
  switch (item.kind) {
    case "line":
      return tagged("fp_line", xy("start", item.start), xy("end", item.end), stroke, layer);
    case "rectangle":
      return tagged("fp_rect", xy("start", item.start), xy("end", item.end), stroke, ...fill, layer);
    case "circle":
      return tagged(
        "fp_circle",
        xy("center", item.center),
        xy("end", { x: item.center.x + item.radius, y: item.center.y }),
        stroke,
        ...fill,
        layer
      );
    case "arc":
      return tagged("fp_arc", xy("start", item.start), xy("mid", item.mid), xy("end", item.end), stroke, layer);
    case "polyline":
    case "polygon":
      return tagged("fp_poly", pts(item.points), stroke, ...fill, layer);
    case "bezier":
      return tagged("fp_curve", pts(item.points), stroke, layer);
    case "text": {
      const items: SExpr[] = [sym(item.role ?? "user"), str(item.text), at(item.at)];
      if (item.unlocked) items.push(yesNo("unlocked", true));
      items.push(layer);
      if (item.hide) items.push(yesNo("hide", true));
      items.push(dumpEffects(item.effects ?? defaultEffects(1)));
      return tagged("fp_text", ...items);
    }
  }
}

function dumpPad(pad: Pad): SList {
  const items: SExpr[] = [str(pad.number), sym(pad.type), sym(pad.shape), at(pad.at, pad.at.rotation !== 0)];
  items.push(tagged("size", num(pad.size.w), num(pad.size.h)));
  if (pad.drill !== undefined) items.push(tagged("drill", num(pad.drill)));
  items.push(tagged("layers", ...pad.layers.map(l => str(l))));
  if (pad.roundrectRatio !== undefined) items.push(tagged("roundrect_rratio", num(pad.roundrectRatio)));
  return tagged("pad", ...items);
}

function dumpXyz(keyword: string, v: Xyz): SList {
  return tagged(keyword, tagged("xyz", num(v.x), num(v.y), num(v.z)));
}

function dumpModel(model: Model3D): SList {
  const items: SExpr[] = [str(model.path)];
  if (model.hide) items.push(yesNo("hide", true));
  items.push(dumpXyz("offset", model.offset), dumpXyz("scale", model.scale), dumpXyz("rotate", model.rotate));
  return tagged("model", ...items);
}

// ─── Files ───────────────────────────────────────────────────────────

export function detectLineEnding(content: string): LineEnding {
  if (content.includes("\r\n")) return "crlf";
  if (content.includes("\r")) return "cr";
  return "lf";
}

/** `Foo.pretty/Bar.kicad_mod` → `Foo`. */
export function libNameFromFootprintPath(filePath: string): string {
  return path.basename(path.dirname(path.resolve(filePath))).replace(/\.pretty$/, "");
}

export function loadFootprintFile(filePath: string): Footprint {
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const forms = SExpressionParser.parse(content);
    if (forms.length !== 1) {
      throw new SchemaError("footprint", `Expected one top-level form, found ${forms.length}`);
    }
    const fp = loadFootprint(forms[0], filePath, libNameFromFootprintPath(filePath));
    fp.lineEnding = detectLineEnding(content);
    return fp;
  } catch (err) {
    if (err instanceof KicadError) throw err.withContext({ file: filePath });
    throw err;
  }
}

export interface FootprintDirectoryLoad {
  footprints: Footprint[];
  errors: KicadError[];
}

/** Every `.kicad_mod` in a `.pretty` directory, in file-name order. */
export function loadFootprintDirectory(prettyDir: string): FootprintDirectoryLoad {
  const result: FootprintDirectoryLoad = { footprints: [], errors: [] };
  const files = fs
    .readdirSync(prettyDir)
    .filter(f => f.endsWith(".kicad_mod"))
    .sort();
  for (const file of files) {
    try {
      result.footprints.push(loadFootprintFile(path.join(prettyDir, file)));
    } catch (err) {
      if (!(err instanceof KicadError)) throw err;
      result.errors.push(err);
    }
  }
  return result;
}

/** Write `<dir>/<name>.kicad_mod`, returning the file path. */
export function writeFootprintFile(fp: Footprint, dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, `${fp.name}.kicad_mod`);
  fs.writeFileSync(filePath, SExpressionParser.formatFile([dumpFootprint(fp)]));
  return filePath;
}
