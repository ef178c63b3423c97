import { Effects, GraphicItem, Property, defaultEffects } from "@klc/kicad/common";
import { Footprint, FootprintAttributes, Model3D, Pad, Xyz, dumpFootprint, writeFootprintFile } from "@klc/kicad/FootprintModel";
import { SExpressionParser } from "@klc/kicad/SExpressionParser";

// ─── Types ───────────────────────────────────────────────────────────

export type PadType = "smd" | "thru_hole" | "np_thru_hole";
export type PadShape = "roundrect" | "circle" | "rect" | "oval";
export type FootprintLayer =
    | "F.Cu" | "B.Cu"
    | "F.SilkS" | "B.SilkS"
    | "F.Fab" | "B.Fab"
    | "F.CrtYd" | "B.CrtYd"
    | "F.Mask" | "B.Mask"
    | "F.Paste" | "B.Paste"
    | "Edge.Cuts";
export type FootprintAttr = "through_hole" | "smd" | "virtual";
export type TextJustify = "left" | "right";

export interface FootprintPadOptions {
    number: string;
    type: PadType;
    shape: PadShape;
    x: number;
    y: number;
    width: number;
    height: number;
    rotation?: number;
    layers?: string[];
    /** Roundrect radius ratio (0–1), only used when shape is "roundrect" */
    roundrectRatio?: number;
    /** Drill diameter for through-hole pads */
    drill?: number;
}

export interface FootprintLineOptions {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    layer?: FootprintLayer;
    width?: number;
}

export type FootprintRectOptions = FootprintLineOptions;

export interface FootprintArcOptions {
    start: { x: number; y: number };
    mid: { x: number; y: number };
    end: { x: number; y: number };
    layer?: FootprintLayer;
    width?: number;
}

export interface FootprintCircleOptions {
    x: number;
    y: number;
    radius: number;
    layer?: FootprintLayer;
    width?: number;
}

export interface FootprintTextOptions {
    text: string;
    x: number;
    y: number;
    layer?: FootprintLayer;
    fontSize?: number;
    thickness?: number;
    justify?: TextJustify;
}

export interface Model3DOptions {
    path: string;
    offset?: Partial<Xyz>;
    scale?: Partial<Xyz>;
    rotate?: Partial<Xyz>;
    hide?: boolean;
}

// ─── Helpers ─────────────────────────────────────────────────────────

function defaultLayers(type: PadType): string[] {
    switch (type) {
        case "smd":
            return ["F.Cu", "F.Mask", "F.Paste"];
        case "thru_hole":
            return ["*.Cu", "*.Mask"];
        case "np_thru_hole":
            return ["*.Cu", "*.Mask"];
    }
}

function xyz(v: Partial<Xyz> | undefined, fallback: number): Xyz {
    return { x: v?.x ?? fallback, y: v?.y ?? fallback, z: v?.z ?? fallback };
}

function fieldEffects(size = 1, thickness = 0.15, justify: string[] = []): Effects {
    const effects = defaultEffects(size);
    return { ...effects, font: { ...effects.font, thickness }, justify };
}

// ─── Class ───────────────────────────────────────────────────────────

/**
 * Programmatically builds a footprint.
 *
 * @example
 * ```ts
 * const fp = new KicadFootprint({ name: "MyModule" });
 * fp.addPad({ number: "1", type: "smd", shape: "roundrect", x: 0, y: 0, width: 1.5, height: 0.8 });
 * fp.addLine({ x1: -2, y1: -1, x2: 2, y2: -1 });
 * fp.writeFile("MyLib.pretty");
 * ```
 */
export class KicadFootprint {
    public readonly name: string;
    /** Default layer for the footprint */
    public readonly layer: FootprintLayer;
    public readonly attr: FootprintAttr;

    private _description = "";
    private _tags = "";
    private _pads: Pad[] = [];
    private _graphics: GraphicItem[] = [];
    private _models3d: Model3D[] = [];

    constructor(options: {
        name: string;
        layer?: FootprintLayer;
        attr?: FootprintAttr;
        description?: string;
        tags?: string;
    }) {
        this.name = options.name;
        this.layer = options.layer ?? "F.Cu";
        this.attr = options.attr ?? "smd";
        this._description = options.description ?? "";
        this._tags = options.tags ?? "";
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPad(options: FootprintPadOptions): this {
        this._pads.push({
            kind: "pad",
            number: options.number,
            type: options.type,
            shape: options.shape,
            at: { x: options.x, y: options.y, rotation: options.rotation ?? 0 },
            size: { w: options.width, h: options.height },
            drill: options.drill,
            layers: options.layers ?? defaultLayers(options.type),
            roundrectRatio: options.shape === "roundrect" ? options.roundrectRatio ?? 0.25 : undefined,
        });
        return this;
    }

    public addLine(options: FootprintLineOptions): this {
        this._graphics.push({
            kind: "line",
            start: { x: options.x1, y: options.y1 },
            end: { x: options.x2, y: options.y2 },
            stroke: { width: options.width ?? 0.12, type: "solid" },
            layer: options.layer ?? "F.SilkS",
            unit: 0,
            style: 0,
        });
        return this;
    }

    /** Four lines around the box, so outline checks see connected segments. */
    public addRect(options: FootprintRectOptions): this {
        const { x1, y1, x2, y2 } = options;
        const edge = { layer: options.layer, width: options.width };
        return this
            .addLine({ x1, y1, x2, y2: y1, ...edge })
            .addLine({ x1: x2, y1, x2, y2, ...edge })
            .addLine({ x1: x2, y1: y2, x2: x1, y2, ...edge })
            .addLine({ x1, y1: y2, x2: x1, y2: y1, ...edge });
    }

    public addArc(options: FootprintArcOptions): this {
        this._graphics.push({
            kind: "arc",
            start: { ...options.start },
            mid: { ...options.mid },
            end: { ...options.end },
            stroke: { width: options.width ?? 0.12, type: "solid" },
            layer: options.layer ?? "F.SilkS",
            unit: 0,
            style: 0,
        });
        return this;
    }

    public addCircle(options: FootprintCircleOptions): this {
        this._graphics.push({
            kind: "circle",
            center: { x: options.x, y: options.y },
            radius: options.radius,
            stroke: { width: options.width ?? 0.12, type: "solid" },
            layer: options.layer ?? "F.SilkS",
            unit: 0,
            style: 0,
        });
        return this;
    }

    public addText(options: FootprintTextOptions): this {
        this._graphics.push({
            kind: "text",
            role: "user",
            text: options.text,
            at: { x: options.x, y: options.y, rotation: 0 },
            effects: fieldEffects(options.fontSize, options.thickness, options.justify ? [options.justify] : []),
            layer: options.layer ?? "F.Fab",
            hide: false,
            unlocked: false,
            unit: 0,
            style: 0,
        });
        return this;
    }

    public setDescription(description: string): this {
        this._description = description;
        return this;
    }

    public setTags(tags: string): this {
        this._tags = tags;
        return this;
    }

    /** Replace every linked 3D model with this one. */
    public set3DModel(model: Model3DOptions): this {
        this._models3d = [];
        return this.add3DModel(model);
    }

    public add3DModel(model: Model3DOptions): this {
        this._models3d.push({
            kind: "model",
            path: model.path,
            offset: xyz(model.offset, 0),
            scale: xyz(model.scale, 1),
            rotate: xyz(model.rotate, 0),
            hide: model.hide ?? false,
        });
        return this;
    }

    // ── Build ──────────────────────────────────────────────────────────

    public build(libName = ""): Footprint {
        const fp = new Footprint(this.name, libName);
        fp.version = 20241229;
        fp.generator = "kicad_lib_check";
        fp.generatorVersion = "9.0";
        fp.layer = this.layer;
        fp.descr = this._description;
        fp.tags = this._tags;

        const attr: FootprintAttributes = {
            type: this.attr,
            excludeFromBom: this.attr === "virtual",
            excludeFromPosFiles: this.attr === "virtual",
            boardOnly: false,
            dnp: false,
            other: [],
        };
        fp.attr = attr;
        fp.embeddedFonts = false;

        fp.items.push(
            this._property("Reference", "REF**", 0, -2, "F.SilkS"),
            this._property("Value", this.name, 0, 2, "F.Fab"),
            this._property("Datasheet", "", 0, 0, "F.Fab", true),
            this._property("Description", "", 0, 0, "F.Fab", true),
            ...this._graphics.map(g => ({ ...g })),
            ...this._pads.map(p => ({ ...p })),
            ...this._models3d.map(m => ({ ...m }))
        );
        return fp;
    }

    public serialize(): string {
        return SExpressionParser.formatFile([dumpFootprint(this.build())]);
    }

    /**
     * Write the footprint to a `.pretty` directory.
     * @returns The full path to the written file.
     */
    public writeFile(prettyDir: string): string {
        return writeFootprintFile(this.build(), prettyDir);
    }

    // ── Private helpers ────────────────────────────────────────────────

    private _property(name: string, value: string, x: number, y: number, layer: string, hide = false): Property {
        return {
            kind: "property",
            name,
            value,
            private: false,
            at: { x, y, rotation: 0 },
            layer,
            hide,
            unlocked: false,
            effects: fieldEffects(),
        };
    }
}
