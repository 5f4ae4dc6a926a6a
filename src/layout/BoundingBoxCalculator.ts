import { LayoutConfig } from "../config/config";
import { GeometryError } from "./errors";
import {
    Point,
    Rect,
    Rotation,
    direction,
    isFinitePoint,
    normalizeRotation,
    rectAround,
    rectCenter,
    rectFromPoints,
    rotatePoint,
    rotateRect,
    unionRects,
} from "./geometry";
import { TextMetrics, TextSize } from "./TextMetrics";
import { Logger, Pin, RegionBox, SymbolBounds, SymbolShape } from "./types";

export type BoundingBoxConfig = Pick<LayoutConfig, "textHeight" | "widthRatio" | "designatorClearance">;

/** Text shown next to a placed symbol: reference designator and, optionally, its value. */
export interface DesignatorText {
    designator: string;
    value?: string;
}

const ORIENTATIONS = new Set(["up", "down", "left", "right"]);

export function checkRotation(rotation: number): Rotation {
    const r = normalizeRotation(rotation);
    if (r === null) {
        throw new GeometryError(`rotation ${rotation} is not one of 0, 90, 180, 270`);
    }
    return r;
}

export function checkShape(shape: SymbolShape): void {
    if (shape.type === "rectangle") {
        if (!isFinitePoint(shape.min) || !isFinitePoint(shape.max)) {
            throw new GeometryError("rectangle outline has non-finite corners");
        }
        if (shape.max.x < shape.min.x || shape.max.y < shape.min.y) {
            throw new GeometryError(`rectangle outline max (${shape.max.x}, ${shape.max.y}) lies below min (${shape.min.x}, ${shape.min.y})`);
        }
        return;
    }
    if (shape.points.length < 3) {
        throw new GeometryError(`polygon outline needs at least 3 points, got ${shape.points.length}`);
    }
    if (!shape.points.every(isFinitePoint)) {
        throw new GeometryError("polygon outline has non-finite points");
    }
}

export function checkPin(pin: Pin): void {
    if (!ORIENTATIONS.has(pin.orientation)) {
        throw new GeometryError(`pin '${pin.name}' has unknown orientation '${pin.orientation}'`);
    }
    if (!isFinitePoint(pin.offset)) {
        throw new GeometryError(`pin '${pin.name}' has a non-finite offset`);
    }
    if (!Number.isFinite(pin.length) || pin.length <= 0) {
        throw new GeometryError(`pin '${pin.name}' has degenerate length ${pin.length}`);
    }
}

/** Connection point of a pin relative to the symbol origin. */
export function pinEndpoint(pin: Pin, rotation: Rotation): Point {
    const d = direction(pin.orientation);
    return rotatePoint({
        x: pin.offset.x + d.x * pin.length,
        y: pin.offset.y + d.y * pin.length,
    }, rotation);
}

/**
 * Computes the regions a symbol occupies: the rotated body outline, the pins
 * with their name labels, and a candidate block for the designator text.
 *
 * All boxes are relative to the symbol origin; callers translate them to the
 * placed position.
 */
export class BoundingBoxCalculator {
    readonly metrics: TextMetrics;

    constructor(private config: BoundingBoxConfig, logger: Logger = console) {
        this.metrics = new TextMetrics(config.textHeight, config.widthRatio, logger);
    }

    compute(shape: SymbolShape, pins: ReadonlyArray<Pin>, rotation: number, text?: DesignatorText): SymbolBounds {
        const rot = checkRotation(rotation);
        checkShape(shape);
        pins.forEach(checkPin);

        const body: RegionBox = { ...this.bodyBox(shape, rot), region: "body" };

        const pinRects: Rect[] = [];
        for (const pin of pins) {
            pinRects.push(...this.pinRects(pin, rot));
        }
        const pinUnion = unionRects(pinRects);
        const pinLabels: RegionBox | null = pinUnion ? { ...pinUnion, region: "pin-labels" } : null;

        const bodyAndPins = pinUnion ? unionRects([body, pinUnion]) : null;
        const bounds: SymbolBounds = {
            rotation: rot,
            body,
            pinLabels,
            bodyAndPins: bodyAndPins ?? { minX: body.minX, minY: body.minY, maxX: body.maxX, maxY: body.maxY },
            designator: null,
        };

        if (text) {
            bounds.designator = this.designatorCandidate(bounds.bodyAndPins, text);
        }
        return bounds;
    }

    bodyBox(shape: SymbolShape, rotation: Rotation): Rect {
        if (shape.type === "rectangle") {
            return rotateRect({ minX: shape.min.x, minY: shape.min.y, maxX: shape.max.x, maxY: shape.max.y }, rotation);
        }
        return rectFromPoints(shape.points.map(p => rotatePoint(p, rotation)));
    }

    /** The pin segment and, for named pins, the label rectangle anchored at the pin offset. */
    pinRects(pin: Pin, rotation: Rotation): Rect[] {
        const d = direction(pin.orientation);
        const a = pin.offset;
        const end = { x: a.x + d.x * pin.length, y: a.y + d.y * pin.length };
        const rects = [rectFromPoints([rotatePoint(a, rotation), rotatePoint(end, rotation)])];

        const width = this.metrics.width(pin.name);
        if (width > 0) {
            const half = this.config.textHeight / 2;
            const far = { x: a.x + d.x * width, y: a.y + d.y * width };
            // widen across the pin axis by half the text height on each side
            const across = { x: d.y !== 0 ? half : 0, y: d.x !== 0 ? half : 0 };
            const local = rectFromPoints([
                { x: a.x - across.x, y: a.y - across.y },
                { x: far.x + across.x, y: far.y + across.y },
            ]);
            rects.push(rotateRect(local, rotation));
        }
        return rects;
    }

    designatorSize(text: DesignatorText): TextSize {
        return this.metrics.measureLines([text.designator, text.value]);
    }

    /** Designator block centred above the body+pins box. */
    designatorCandidate(bodyAndPins: Rect, text: DesignatorText): RegionBox {
        const size = this.designatorSize(text);
        const center = {
            x: rectCenter(bodyAndPins).x,
            y: bodyAndPins.minY - this.config.designatorClearance - size.height / 2,
        };
        return { ...rectAround(center, size.width, size.height), region: "designator" };
    }
}

/** One-shot form of {@link BoundingBoxCalculator.compute}. */
export function computeBBox(
    shape: SymbolShape,
    pins: ReadonlyArray<Pin>,
    rotation: number,
    config: BoundingBoxConfig,
    text?: DesignatorText,
): SymbolBounds {
    return new BoundingBoxCalculator(config).compute(shape, pins, rotation, text);
}
