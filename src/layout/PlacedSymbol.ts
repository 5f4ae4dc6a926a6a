import { BoundingBoxCalculator, pinEndpoint } from "./BoundingBoxCalculator";
import { LayoutError } from "./errors";
import { Point, Rect, Rotation, rectAround, rectHeight, rectWidth, translatePoint, translateRect } from "./geometry";
import { PlacementState, RegionBox, SymbolBounds, SymbolDefinition, SymbolInstance, SymbolKind } from "./types";

export interface PinEndpoint {
    name: string;
    x: number;
    y: number;
}

/**
 * A symbol instance bound to a position and rotation on the canvas.
 *
 * Local bounds are computed lazily and dropped whenever the rotation or the
 * label text changes, together with the designator placement; canvas boxes
 * are derived from the current position.
 */
export class PlacedSymbol {
    readonly id: string;
    readonly definition: SymbolDefinition;
    state: PlacementState = "unplaced";
    position: Point | null = null;
    /** Centre of the designator block relative to `position` */
    designatorOffset: Point | null = null;

    private _designator: string;
    private _value: string;
    private _rotation: number;
    private cached: SymbolBounds | null = null;

    constructor(instance: SymbolInstance, private calculator: BoundingBoxCalculator) {
        this.id = instance.id ?? instance.designator;
        this.definition = instance.definition;
        this._designator = instance.designator;
        this._value = instance.value ?? "";
        this._rotation = instance.rotation ?? 0;
    }

    get kind(): SymbolKind {
        return this.definition.kind;
    }

    get designator(): string {
        return this._designator;
    }

    get value(): string {
        return this._value;
    }

    /** Rotation as requested; {@link bounds} rejects non-cardinal values. */
    get rotation(): number {
        return this._rotation;
    }

    setDesignator(designator: string): void {
        if (designator === this._designator) return;
        this._designator = designator;
        this.invalidate();
    }

    setValue(value: string): void {
        if (value === this._value) return;
        this._value = value;
        this.invalidate();
    }

    setRotation(rotation: Rotation): void {
        if (rotation === this._rotation) return;
        this._rotation = rotation;
        this.invalidate();
    }

    // a designator placed for the old text has to be placed again
    private invalidate(): void {
        this.cached = null;
        this.designatorOffset = null;
    }

    /** Bounds relative to the symbol origin. Throws GeometryError for a malformed definition. */
    get bounds(): SymbolBounds {
        if (!this.cached) {
            this.cached = this.calculator.compute(
                this.definition.shape,
                this.definition.pins,
                this._rotation,
                { designator: this._designator, value: this._value },
            );
        }
        return this.cached;
    }

    private requirePosition(): Point {
        if (!this.position) {
            throw new LayoutError(`${this.id} has not been given a position yet`);
        }
        return this.position;
    }

    /** Body+pins box if the symbol stood at `position`. */
    boxAt(position: Point): Rect {
        return translateRect(this.bounds.bodyAndPins, position);
    }

    /** Body+pins box on the canvas. */
    get box(): Rect {
        return this.boxAt(this.requirePosition());
    }

    /** Size of the designator block. */
    get designatorSize(): { width: number; height: number } {
        const candidate = this.bounds.designator;
        return candidate ? { width: rectWidth(candidate), height: rectHeight(candidate) } : { width: 0, height: 0 };
    }

    /** Designator block on the canvas, once the positioner has placed it. */
    get designatorBox(): RegionBox | null {
        if (!this.designatorOffset || !this.position) return null;
        const { width, height } = this.designatorSize;
        const center = translatePoint(this.position, this.designatorOffset);
        return { ...rectAround(center, width, height), region: "designator" };
    }

    get designatorPosition(): Point | null {
        if (!this.designatorOffset || !this.position) return null;
        return translatePoint(this.position, this.designatorOffset);
    }

    /** Every region box on the canvas: body, pin labels (if any) and the placed designator (if any). */
    regionBoxes(): RegionBox[] {
        const position = this.requirePosition();
        const { body, pinLabels } = this.bounds;
        const boxes: RegionBox[] = [{ ...translateRect(body, position), region: "body" }];
        if (pinLabels) {
            boxes.push({ ...translateRect(pinLabels, position), region: "pin-labels" });
        }
        const designator = this.designatorBox;
        if (designator) boxes.push(designator);
        return boxes;
    }

    /** Connection point of every pin on the canvas. */
    pinEndpoints(): PinEndpoint[] {
        const position = this.requirePosition();
        const rotation = this.bounds.rotation;
        return this.definition.pins.map(pin => {
            const p = translatePoint(pinEndpoint(pin, rotation), position);
            return { name: pin.name, x: p.x, y: p.y };
        });
    }
}
