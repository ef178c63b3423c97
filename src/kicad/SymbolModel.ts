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
  at,
  childNumber,
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
  remember,
  requirePoint,
  requireString,
  schemaError,
  xy,
} from "./common";
import { SchemaError } from "./errors";
import { BoundingBox, Point } from "./geometry";

// ─── Types ───────────────────────────────────────────────────────────

export const PIN_ELECTRICAL_TYPES = [
  "input",
  "output",
  "bidirectional",
  "tri_state",
  "passive",
  "free",
  "unspecified",
  "power_in",
  "power_out",
  "open_collector",
  "open_emitter",
  "no_connect",
] as const;

export type PinDirection = "R" | "U" | "L" | "D";

export interface PinAlternate {
  name: string;
  etype: string;
  shape: string;
}

export interface Pin {
  kind: "pin";
  name: string;
  number: string;
  etype: string;
  shape: string;
  at: Position;
  length: number;
  hide: boolean;
  global: boolean;
  nameEffects?: Effects;
  numberEffects?: Effects;
  alternates: PinAlternate[];
  unit: number;
  style: number;
}

/** Body item of a symbol or unit. */
export type SymbolBodyItem = Pin | GraphicItem | RawItem;

/** A `(symbol "<name>_<unit>_<style>" ...)` sub-symbol. */
export interface SymbolUnit {
  kind: "unit";
  unit: number;
  style: number;
  unitName?: string;
  items: SymbolBodyItem[];
}

export type SymbolItem = Property | SymbolUnit | SymbolBodyItem;

export interface CenterRectangle {
  start: Point;
  end: Point;
  center: Point;
  unit: number;
}

// ─── LibSymbol ───────────────────────────────────────────────────────

export class LibSymbol {
  name: string;
  libName: string;
  /** Parent symbol name. Resolved through the library, never held as a pointer. */
  extends?: string;
  power?: "global" | "local";
  pinNumbersHidden?: boolean;
  pinNames?: { offset?: number; hide: boolean };
  excludeFromSim?: boolean;
  inBom?: boolean;
  onBoard?: boolean;
  embeddedFonts?: boolean;
  items: SymbolItem[] = [];
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

  get units(): SymbolUnit[] {
    return this.items.filter((i): i is SymbolUnit => i.kind === "unit");
  }

  /** Every pin, top-level and in units. */
  get pins(): Pin[] {
    return this.bodyItems().filter((i): i is Pin => i.kind === "pin");
  }

  get graphics(): GraphicItem[] {
    return this.bodyItems().filter((i): i is GraphicItem => i.kind !== "pin" && i.kind !== "raw");
  }

  get rawItems(): RawItem[] {
    return this.items.filter((i): i is RawItem => i.kind === "raw");
  }

  get unitCount(): number {
    return Math.max(1, ...this.units.map(u => u.unit));
  }

  get demorganCount(): number {
    return Math.max(1, ...this.units.map(u => u.style));
  }

  get isDerived(): boolean {
    return this.extends !== undefined;
  }

  get isPowerSymbol(): boolean {
    return this.power !== undefined;
  }

  get isGraphicSymbol(): boolean {
    return this.extends === undefined && (this.pins.length === 0 || this.getProperty("Reference")?.value === "#SYM");
  }

  get embeddedFiles(): EmbeddedFile[] {
    return embeddedFilesOf(this.rawItems);
  }

  get hasEmbeddedFiles(): boolean {
    return this.embeddedFiles.length > 0;
  }

  get footprintFilters(): string[] {
    const filters = this.getProperty("ki_fp_filters");
    return filters ? filters.value.split(/\s+/).filter(f => f.length > 0) : [];
  }

  getProperty(name: string): Property | undefined {
    return this.properties.find(p => p.name === name);
  }

  /** Set a property value, replacing the loaded item so it is dumped from its fields. */
  setProperty(name: string, value: string, hide = false): Property {
    const index = this.items.findIndex(i => i.kind === "property" && i.name === name);
    if (index >= 0) {
      const current = this.items[index];
      if (current.kind === "property") {
        const next: Property = { ...current, value };
        this.items[index] = next;
        return next;
      }
    }
    const prop: Property = {
      kind: "property",
      name,
      value,
      private: false,
      at: { x: 0, y: 0, rotation: 0 },
      hide,
      unlocked: false,
      effects: defaultEffects(),
    };
    const lastProp = this.items.reduce((last, item, i) => (item.kind === "property" ? i : last), -1);
    this.items.splice(lastProp + 1, 0, prop);
    return prop;
  }

  pinsByName(name: string): Pin[] {
    return this.pins.filter(p => p.name === name);
  }

  pinsByNumber(number: string): Pin[] {
    return this.pins.filter(p => p.number === number);
  }

  /**
   * The rectangle (or closed 4-corner polyline) whose centre lies closest to
   * the origin, optionally restricted to some units.
   */
  getCenterRectangle(units?: readonly number[]): CenterRectangle | undefined {
    let best: CenterRectangle | undefined;
    let bestDist = Infinity;
    for (const g of this.graphics) {
      if (units && !units.includes(g.unit)) continue;
      let box: BoundingBox | undefined;
      if (g.kind === "rectangle") box = BoundingBox.of([g.start, g.end]);
      else if (g.kind === "polyline" && isRectanglePolyline(g.points)) box = BoundingBox.of(g.points);
      if (!box) continue;

      const center = box.center;
      const dist = Math.hypot(center.x, center.y);
      if (dist < bestDist) {
        bestDist = dist;
        best = {
          start: { x: box.xmin, y: box.ymax },
          end: { x: box.xmax, y: box.ymin },
          center,
          unit: g.unit,
        };
      }
    }
    return best;
  }

  /** Resistors, capacitors, transistors: few pins and no body rectangle. */
  isSmallComponent(): boolean {
    const count = this.pins.length;
    if (count <= 2) return true;
    return count <= 4 && this.getCenterRectangle() === undefined;
  }

  /**
   * Pins grouped by location, unit and body style. Pins common to all units
   * (unit 0) or styles (style 0) land in every stack they cover.
   */
  getPinStacks(): Map<string, Pin[]> {
    const stacks = new Map<string, Pin[]>();
    const unitCount = this.unitCount;
    const styleCount = this.demorganCount;
    for (const pin of this.pins) {
      const unitList = pin.unit === 0 ? range(1, unitCount) : [pin.unit];
      const styleList = pin.style === 0 ? range(1, styleCount) : [pin.style];
      for (const style of styleList) {
        for (const unit of unitList) {
          const key = `x${pin.at.x}_y${pin.at.y}_u${unit}_d${style}`;
          const stack = stacks.get(key);
          if (stack) stack.push(pin);
          else stacks.set(key, [pin]);
        }
      }
    }
    return stacks;
  }

  private bodyItems(): SymbolBodyItem[] {
    const out: SymbolBodyItem[] = [];
    for (const item of this.items) {
      if (item.kind === "unit") out.push(...item.items);
      else if (item.kind !== "property") out.push(item);
    }
    return out;
  }
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}

function isRectanglePolyline(points: readonly Point[]): boolean {
  if (points.length !== 5) return false;
  const first = points[0];
  const last = points[4];
  if (first.x !== last.x || first.y !== last.y) return false;
  for (let i = 1; i < points.length; i++) {
    const dx = points[i].x - points[i - 1].x;
    const dy = points[i].y - points[i - 1].y;
    if (dx !== 0 && dy !== 0) return false;
  }
  return true;
}

export function normalizeRotation(rotation: number): number {
  return ((Math.round(rotation) % 360) + 360) % 360;
}

/** Direction the pin points from its connection point: 0° → R, 90° → U, 180° → L, 270° → D. */
export function pinDirection(pin: Pin): PinDirection {
  switch (normalizeRotation(pin.at.rotation)) {
    case 90:
      return "U";
    case 180:
      return "L";
    case 270:
      return "D";
    default:
      return "R";
  }
}

// ─── Load ────────────────────────────────────────────────────────────

const UNIT_NAME_RE = /^(.*)_(\d+)_(\d+)$/;

/**
 * Build a symbol from its `(symbol ...)` node. A malformed header throws
 * `SchemaError`; malformed children become raw items recorded in `issues`.
 */
export function loadSymbol(node: SList, libName: string): LibSymbol {
  if (keywordOf(node) !== "symbol") {
    throw schemaError(node, "expected (symbol ...)");
  }
  // legacy files write "Lib:Name"
  const name = requireString(node, 1, "symbol name").split(":").pop() ?? "";
  if (name.length === 0) throw schemaError(node, "empty symbol name");

  const symbol = new LibSymbol(name, libName);
  const body = node.items.slice(2);
  for (const child of body) {
    if (!isList(child)) {
      symbol.issues.push(new SchemaError("symbol", `Unexpected atom in symbol "${name}"`, { entity: name }));
      continue;
    }
    const slot = symbol.items.length;
    if (readSymbolHeader(symbol, child, slot)) continue;

    try {
      symbol.items.push(readSymbolChild(child, symbol));
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      symbol.issues.push(err.withContext({ entity: name }));
      symbol.items.push(raw(child));
    }
  }
  return symbol;
}

function readSymbolHeader(symbol: LibSymbol, child: SList, slot: number): boolean {
  const keyword = keywordOf(child);
  switch (keyword) {
    case "extends": {
      const parent = requireString(child, 1, "parent name");
      symbol.extends = parent.split(":").pop() ?? parent;
      symbol.layout.record(keyword, slot, child, symbol.extends);
      return true;
    }
    case "power":
      symbol.power = atomText(child.items[1]) === "local" ? "local" : "global";
      symbol.layout.record(keyword, slot, child, symbol.power);
      return true;
    case "pin_numbers":
      symbol.pinNumbersHidden = hasFlag(child, "hide");
      symbol.layout.record(keyword, slot, child, symbol.pinNumbersHidden);
      return true;
    case "pin_names":
      symbol.pinNames = { offset: childNumber(child, "offset"), hide: hasFlag(child, "hide") };
      symbol.layout.record(keyword, slot, child, symbol.pinNames);
      return true;
    case "exclude_from_sim":
      symbol.excludeFromSim = flagValue(child);
      symbol.layout.record(keyword, slot, child, symbol.excludeFromSim);
      return true;
    case "in_bom":
      symbol.inBom = flagValue(child);
      symbol.layout.record(keyword, slot, child, symbol.inBom);
      return true;
    case "on_board":
      symbol.onBoard = flagValue(child);
      symbol.layout.record(keyword, slot, child, symbol.onBoard);
      return true;
    case "embedded_fonts":
      symbol.embeddedFonts = flagValue(child);
      symbol.layout.record(keyword, slot, child, symbol.embeddedFonts);
      return true;
    default:
      return false;
  }
}

function readSymbolChild(child: SList, symbol: LibSymbol): SymbolItem {
  switch (keywordOf(child)) {
    case "property":
      return readProperty(child);
    case "symbol":
      return readUnit(child, symbol);
    default:
      return readBodyItem(child, 0, 0);
  }
}

function readUnit(node: SList, symbol: LibSymbol): SymbolUnit {
  const symbolName = symbol.name;
  const unitName = requireString(node, 1, "unit name").split(":").pop() ?? "";
  const match = UNIT_NAME_RE.exec(unitName);
  if (!match || match[1] !== symbolName) {
    throw schemaError(node, `invalid unit name "${unitName}" for symbol "${symbolName}"`);
  }
  const unit = Number(match[2]);
  const style = Number(match[3]);
  const items: SymbolBodyItem[] = [];
  let displayName: string | undefined;

  for (const child of node.items.slice(2)) {
    if (!isList(child)) continue;
    if (keywordOf(child) === "unit_name") {
      displayName = atomText(child.items[1]);
      continue;
    }
    try {
      items.push(readBodyItem(child, unit, style));
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      symbol.issues.push(err.withContext({ entity: symbolName }));
      items.push(raw(child));
    }
  }
  return remember({ kind: "unit", unit, style, unitName: displayName, items }, node);
}

function readBodyItem(node: SList, unit: number, style: number): SymbolBodyItem {
  const base = () => ({ stroke: readStroke(node), fill: readFill(node), unit, style });
  switch (keywordOf(node)) {
    case "pin":
      return readPin(node, unit, style);
    case "rectangle":
      return remember(
        { kind: "rectangle", start: requirePoint(node, "start"), end: requirePoint(node, "end"), ...base() },
        node
      );
    case "circle": {
      const radius = childNumber(node, "radius");
      if (radius === undefined) throw schemaError(node, "missing (radius r)");
      return remember({ kind: "circle", center: requirePoint(node, "center"), radius, ...base() }, node);
    }
    case "arc":
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
    case "polyline":
      return remember({ kind: "polyline", points: readPoints(node), ...base() }, node);
    case "bezier":
      return remember({ kind: "bezier", points: readPoints(node), ...base() }, node);
    case "text": {
      const atNode = findChild(node, "at");
      if (!atNode) throw schemaError(node, "missing (at x y rot)");
      const effects = optionalEffects(node);
      return remember(
        {
          kind: "text",
          text: requireString(node, 1, "text"),
          at: readPosition(atNode),
          effects,
          hide: effects?.hide ?? false,
          unlocked: false,
          unit,
          style,
        },
        node
      );
    }
    default:
      return raw(node);
  }
}

function readPin(node: SList, unit: number, style: number): Pin {
  // `(pin <etype> <shape> ...)`; both atoms may be missing in hand-written input
  const atoms = node.items.slice(1).filter(i => i.type === "symbol").map(i => atomText(i) ?? "");
  const flags = new Set(["hide", "global"]);
  const [etype = "unspecified", shape = "line"] = atoms.filter(a => !flags.has(a));

  const atNode = findChild(node, "at");
  const nameNode = findChild(node, "name");
  const numberNode = findChild(node, "number");
  const alternates = findChildren(node, "alternate").map(alt => ({
    name: requireString(alt, 1, "alternate name"),
    etype: requireString(alt, 2, "alternate type"),
    shape: requireString(alt, 3, "alternate shape"),
  }));

  return remember(
    {
      kind: "pin",
      name: nameNode ? requireString(nameNode, 1, "pin name") : "",
      number: numberNode ? requireString(numberNode, 1, "pin number") : "",
      etype,
      shape,
      at: atNode ? readPosition(atNode) : { x: 0, y: 0, rotation: 0 },
      length: childNumber(node, "length") ?? 2.54,
      hide: hasFlag(node, "hide"),
      global: atoms.includes("global"),
      nameEffects: nameNode ? optionalEffects(nameNode) : undefined,
      numberEffects: numberNode ? optionalEffects(numberNode) : undefined,
      alternates,
      unit,
      style,
    },
    node
  );
}

// ─── Dump ────────────────────────────────────────────────────────────

export function dumpSymbol(symbol: LibSymbol): SList {
  const body = symbol.items.map(item => dumpSymbolItem(item, symbol.name));
  const pinNames = symbol.pinNames;
  const children = symbol.layout.arrange(
    [
      { keyword: "extends", value: symbol.extends, build: () => tagged("extends", str(symbol.extends ?? "")), defaultSlot: "start" },
      {
        keyword: "power",
        value: symbol.power,
        build: () => (symbol.power === "local" ? tagged("power", sym("local")) : tagged("power")),
        defaultSlot: "start",
      },
      {
        keyword: "pin_numbers",
        value: symbol.pinNumbersHidden,
        build: () => tagged("pin_numbers", yesNo("hide", symbol.pinNumbersHidden === true)),
        defaultSlot: "start",
      },
      {
        keyword: "pin_names",
        value: pinNames,
        build: () => {
          const items: SExpr[] = [];
          if (pinNames?.offset !== undefined) items.push(tagged("offset", num(pinNames.offset)));
          if (pinNames?.hide) items.push(yesNo("hide", true));
          return tagged("pin_names", ...items);
        },
        defaultSlot: "start",
      },
      flag("exclude_from_sim", symbol.excludeFromSim),
      flag("in_bom", symbol.inBom),
      flag("on_board", symbol.onBoard),
      { ...flag("embedded_fonts", symbol.embeddedFonts), defaultSlot: "end" },
    ],
    body
  );
  return tagged("symbol", str(symbol.name), ...children);
}

function flag(keyword: string, value: boolean | undefined) {
  return {
    keyword,
    value,
    build: () => yesNo(keyword, value === true),
    defaultSlot: "start" as const,
  };
}

function dumpSymbolItem(item: SymbolItem, symbolName: string): SList {
  switch (item.kind) {
    case "property":
      return dumpProperty(item);
    case "unit":
      return dumpUnit(item, symbolName);
    default:
      return dumpBodyItem(item);
  }
}

function dumpUnit(unit: SymbolUnit, symbolName: string): SList {
  const origin = originOf(unit);
  const name = `${symbolName}_${unit.unit}_${unit.style}`;
  // a unit renamed for another symbol keeps its children but not its header
  if (origin && requireString(origin, 1, "unit name") === name) return origin;

  const items: SExpr[] = [str(name)];
  items.push(...unit.items.map(dumpBodyItem));
  if (unit.unitName !== undefined) items.push(tagged("unit_name", str(unit.unitName)));
  return tagged("symbol", ...items);
}

export function dumpBodyItem(item: SymbolBodyItem): SList {
  const origin = originOf(item);
  if (origin) return origin;

  switch (item.kind) {
    case "raw":
      return item.node;
    case "pin":
      return dumpPin(item);
    case "text":
      return tagged("text", str(item.text), at(item.at), dumpEffects(item.effects ?? defaultEffects(), true));
    default:
      return dumpGraphic(item);
  }
}

function dumpGraphic(item: Exclude<GraphicItem, { kind: "text" }>): SList {
  const style = [
    dumpStroke(item.stroke ?? { width: 0, type: "default" }),
    tagged("fill", tagged("type", sym(item.fill ?? "none"))),
  ];
  switch (item.kind) {
    case "rectangle":
      return tagged("rectangle", xy("start", item.start), xy("end", item.end), ...style);
    case "line":
      return tagged("polyline", pts([item.start, item.end]), ...style);
    case "circle":
      return tagged("circle", xy("center", item.center), tagged("radius", num(item.radius)), ...style);
    case "arc":
      return tagged("arc", xy("start", item.start), xy("mid", item.mid), xy("end", item.end), ...style);
    case "polyline":
    case "polygon":
      return tagged("polyline", pts(item.points), ...style);
    case "bezier":
      return tagged("bezier", pts(item.points), ...style);
  }
}

function dumpPin(pin: Pin): SList {
  const items: SExpr[] = [sym(pin.etype), sym(pin.shape), at(pin.at)];
  if (pin.global) items.push(sym("global"));
  items.push(tagged("length", num(pin.length)));
  if (pin.hide) items.push(yesNo("hide", true));
  items.push(tagged("name", str(pin.name), dumpEffects(pin.nameEffects ?? defaultEffects())));
  items.push(tagged("number", str(pin.number), dumpEffects(pin.numberEffects ?? defaultEffects())));
  for (const alt of [...pin.alternates].sort((a, b) => a.name.localeCompare(b.name))) {
    items.push(tagged("alternate", str(alt.name), sym(alt.etype), sym(alt.shape)));
  }
  return tagged("pin", ...items);
}
