import { Effects, GraphicItem, Property, defaultEffects } from "@klc/kicad/common";
import { SExpressionParser } from "@klc/kicad/SExpressionParser";
import { LibSymbol, Pin, SymbolBodyItem, SymbolUnit, dumpSymbol } from "@klc/kicad/SymbolModel";
import { milToMm } from "@klc/kicad/geometry";

// ─── Types ───────────────────────────────────────────────────────────

export type SymbolPinType =
    | "input"
    | "output"
    | "bidirectional"
    | "tri_state"
    | "passive"
    | "free"
    | "unspecified"
    | "power_in"
    | "power_out"
    | "open_collector"
    | "open_emitter"
    | "no_connect";
export type SymbolPinSide = "left" | "right" | "top" | "bottom";
export type SymbolPinStyle = "line" | "inverted" | "clock" | "inverted_clock" | "non_logic";

interface UnitOptions {
    /** 0 = common to all units. */
    unit?: number;
    /** 1 = normal, 2 = De Morgan, 0 = both. */
    style?: number;
}

export interface SymbolPinOptions extends UnitOptions {
    name: string;
    number: string;
    x: number;
    y: number;
    side: SymbolPinSide;
    type: SymbolPinType;
    style?: number;
    shape?: SymbolPinStyle;
    length?: number;
    hidden?: boolean;
}

export interface SymbolRectOptions extends UnitOptions {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    fill?: "none" | "background" | "outline";
    strokeWidth?: number;
}

export interface SymbolPolylineOptions extends UnitOptions {
    points: { x: number; y: number }[];
    fill?: "none" | "background" | "outline";
    strokeWidth?: number;
}

export interface SymbolTextOptions extends UnitOptions {
    text: string;
    x: number;
    y: number;
    fontSize?: number;
}

// ─── Pin side → rotation angle ───────────────────────────────────────

/** A pin on the left edge points right, into the body. */
function sideToAngle(side: SymbolPinSide): number {
    switch (side) {
        case "left": return 0;
        case "right": return 180;
        case "top": return 270;
        case "bottom": return 90;
    }
}

function hiddenEffects(): Effects {
    return { ...defaultEffects(), hide: true };
}

// ─── Class ───────────────────────────────────────────────────────────

/**
 * Programmatically builds a library symbol.
 *
 * @example
 * ```ts
 * const sym = new KicadSymbol({ name: "MyChip", reference: "U", footprint: "Package_SO:SOIC-8_3.9x4.9mm_P1.27mm" });
 * sym.addRect({ x1: -5.08, y1: 5.08, x2: 5.08, y2: -5.08 });
 * sym.addPin({ name: "VCC", number: "1", x: -7.62, y: 2.54, side: "left", type: "power_in" });
 * // sym.serialize() returns the (symbol "MyChip" ...) block
 * ```
 */
export class KicadSymbol {
    public readonly name: string;
    public readonly reference: string;
    public readonly value: string;
    public readonly extends?: string;

    private _footprint: string;
    private _datasheet: string;
    private _description: string;
    private _keywords: string;
    private _fpFilters: string[] = [];
    private _extraProperties: { name: string; value: string }[] = [];
    private _pins: Pin[] = [];
    private _graphics: GraphicItem[] = [];

    constructor(options: {
        name: string;
        reference?: string;
        footprint?: string;
        datasheet?: string;
        description?: string;
        keywords?: string;
        value?: string;
        /** Parent symbol; a derived symbol carries no pins or graphics of its own. */
        extends?: string;
    }) {
        this.name = options.name;
        this.reference = options.reference ?? "U";
        this.value = options.value ?? options.name;
        this.extends = options.extends;
        this._footprint = options.footprint ?? "";
        this._datasheet = options.datasheet ?? "";
        this._description = options.description ?? "";
        this._keywords = options.keywords ?? "";
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPin(options: SymbolPinOptions): this {
        this._pins.push({
            kind: "pin",
            name: options.name,
            number: options.number,
            etype: options.type,
            shape: options.shape ?? "line",
            at: { x: options.x, y: options.y, rotation: sideToAngle(options.side) },
            length: options.length ?? 2.54,
            hide: options.hidden ?? false,
            global: false,
            alternates: [],
            unit: options.unit ?? 1,
            style: options.style ?? 1,
        });
        return this;
    }

    public addRect(options: SymbolRectOptions): this {
        this._graphics.push({
            kind: "rectangle",
            start: { x: options.x1, y: options.y1 },
            end: { x: options.x2, y: options.y2 },
            stroke: { width: options.strokeWidth ?? 0.254, type: "default" },
            fill: options.fill ?? "background",
            unit: options.unit ?? 0,
            style: options.style ?? 1,
        });
        return this;
    }

    public addPolyline(options: SymbolPolylineOptions): this {
        this._graphics.push({
            kind: "polyline",
            points: options.points.map(p => ({ x: p.x, y: p.y })),
            stroke: { width: options.strokeWidth ?? 0.254, type: "default" },
            fill: options.fill ?? "none",
            unit: options.unit ?? 0,
            style: options.style ?? 1,
        });
        return this;
    }

    public addText(options: SymbolTextOptions): this {
        this._graphics.push({
            kind: "text",
            text: options.text,
            at: { x: options.x, y: options.y, rotation: 0 },
            effects: defaultEffects(options.fontSize ?? 1.27),
            hide: false,
            unlocked: false,
            unit: options.unit ?? 1,
            style: options.style ?? 1,
        });
        return this;
    }

    public setFootprint(footprint: string): this {
        this._footprint = footprint;
        return this;
    }

    public setDescription(description: string): this {
        this._description = description;
        return this;
    }

    public setKeywords(keywords: string): this {
        this._keywords = keywords;
        return this;
    }

    public setDatasheet(url: string): this {
        this._datasheet = url;
        return this;
    }

    public setFootprintFilters(filters: string[]): this {
        this._fpFilters = [...filters];
        return this;
    }

    /** Extra user property, e.g. a `KLC_S4.1` exception note. */
    public addProperty(name: string, value: string): this {
        this._extraProperties.push({ name, value });
        return this;
    }

    // ── Build ──────────────────────────────────────────────────────────

    public build(libName = ""): LibSymbol {
        const symbol = new LibSymbol(this.name, libName);
        symbol.extends = this.extends;
        symbol.excludeFromSim = false;
        symbol.inBom = true;
        symbol.onBoard = true;

        const { top, bottom } = this._extent();
        symbol.items.push(
            this._property("Reference", this.reference, 0, top + milToMm(125)),
            this._property("Value", this.value, 0, top + milToMm(50)),
            this._property("Footprint", this._footprint, 0, bottom - milToMm(50), true),
            this._property("Datasheet", this._datasheet, 0, 0, true),
            this._property("Description", this._description, 0, 0, true)
        );
        if (this._keywords) symbol.items.push(this._property("ki_keywords", this._keywords, 0, 0, true));
        if (this._fpFilters.length > 0) symbol.items.push(this._property("ki_fp_filters", this._fpFilters.join(" "), 0, 0, true));
        for (const extra of this._extraProperties) {
            symbol.items.push(this._property(extra.name, extra.value, 0, 0, true));
        }

        if (this.extends === undefined) {
            symbol.items.push(...this._units());
            symbol.embeddedFonts = false;
        }
        return symbol;
    }

    /** The `(symbol "Name" ...)` block. */
    public serialize(): string {
        return SExpressionParser.format(dumpSymbol(this.build()));
    }

    // ── Private helpers ────────────────────────────────────────────────

    /** Vertical extent of the body and pins, for field placement. */
    private _extent(): { top: number; bottom: number } {
        const ys: number[] = this._pins.map(p => p.at.y);
        for (const g of this._graphics) {
            if (g.kind === "rectangle") ys.push(g.start.y, g.end.y);
            else if (g.kind === "polyline") ys.push(...g.points.map(p => p.y));
        }
        if (ys.length === 0) return { top: 0, bottom: 0 };
        return { top: Math.max(...ys), bottom: Math.min(...ys) };
    }

    private _property(name: string, value: string, x: number, y: number, hide = false): Property {
        return {
            kind: "property",
            name,
            value,
            private: false,
            at: { x, y, rotation: 0 },
            hide,
            unlocked: false,
            effects: hide ? hiddenEffects() : defaultEffects(),
        };
    }

    /** Graphics first, then pins, grouped into `<name>_<unit>_<style>` sub-symbols. */
    private _units(): SymbolUnit[] {
        const units = new Map<string, SymbolUnit>();
        const place = (item: SymbolBodyItem & { unit: number; style: number }) => {
            const key = `${item.unit}_${item.style}`;
            let unit = units.get(key);
            if (!unit) {
                unit = { kind: "unit", unit: item.unit, style: item.style, items: [] };
                units.set(key, unit);
            }
            unit.items.push(item);
        };
        this._graphics.forEach(place);
        this._pins.forEach(place);
        return [...units.values()].sort((a, b) => a.unit - b.unit || a.style - b.style);
    }
}
