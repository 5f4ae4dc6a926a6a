import { LayoutConfig, validateConfig } from "../config/config";
import { BoundingBoxCalculator } from "./BoundingBoxCalculator";
import { Canvas } from "./Canvas";
import { conflictsWith } from "./CollisionDetector";
import { GeometryError, PlacementExhausted } from "./errors";
import { Point, Rect, containsRect, rectHeight, rectWidth, snap, snapUp } from "./geometry";
import { PlacedSymbol } from "./PlacedSymbol";
import { AttemptOutcome, Trace } from "./Trace";
import { Logger, PlacementState, SymbolInstance } from "./types";

export interface EngineOptions {
    trace?: Trace;
    logger?: Logger;
}

export type FailedPlacement =
    | { symbolId: string; reason: "geometry"; lastPosition: null; conflictsWith: string[]; error: GeometryError }
    | { symbolId: string; reason: "exhausted"; lastPosition: Point; conflictsWith: string[]; error: PlacementExhausted };

export interface PlacementOutcome {
    symbol: PlacedSymbol;
    state: PlacementState;
    attempts: number;
    failure: FailedPlacement | null;
}

/**
 * Offsets of an expanding square spiral in grid units: the origin first,
 * then ring 1, ring 2, ... Each ring starts to the right of the origin and
 * runs clockwise (Y grows downward).
 */
export function* spiralOffsets(): Generator<Point> {
    yield { x: 0, y: 0 };
    for (let k = 1; ; k++) {
        for (let y = 0; y <= k; y++) yield { x: k, y };
        for (let x = k - 1; x >= -k; x--) yield { x, y: k };
        for (let y = k - 1; y >= -k; y--) yield { x: -k, y };
        for (let x = -k + 1; x <= k; x++) yield { x, y: -k };
        for (let y = -k + 1; y <= -1; y++) yield { x: k, y };
    }
}

/**
 * Places symbols one at a time against everything already resolved.
 *
 * Each symbol goes unplaced -> tentative -> resolved | failed. A tentative
 * position comes from the instance's hint or from the configured proposal
 * (row-major packing or a uniform cell grid); on a
 * conflict the engine walks a spiral of grid steps around it until the
 * retry budget runs out.
 */
export class PlacementEngine {
    readonly config: LayoutConfig;
    readonly canvas = new Canvas();
    readonly trace: Trace;
    readonly calculator: BoundingBoxCalculator;
    private logger: Logger;
    private failed: FailedPlacement[] = [];

    // row-major packing cursor, in sheet coordinates
    private cursorX: number;
    private cursorY: number;
    private rowHeight = 0;
    // next cell of the uniform grid proposal
    private cellIndex = 0;

    constructor(config: LayoutConfig, options: EngineOptions = {}) {
        this.config = validateConfig(config);
        this.trace = options.trace ?? new Trace();
        this.logger = options.logger ?? console;
        this.calculator = new BoundingBoxCalculator(this.config, this.logger);
        this.cursorX = this.config.sheet.margin;
        this.cursorY = this.config.sheet.margin;
    }

    /** Drawing area inside the sheet margins. */
    get drawingArea(): Rect {
        const { width, height, margin } = this.config.sheet;
        return { minX: margin, minY: margin, maxX: width - margin, maxY: height - margin };
    }

    get failures(): readonly FailedPlacement[] {
        return this.failed;
    }

    placeAll(instances: SymbolInstance[]): PlacementOutcome[] {
        return instances.map(instance => this.add(instance));
    }

    /** Adds one symbol to the canvas and resolves its position. */
    add(instance: SymbolInstance): PlacementOutcome {
        const symbol = new PlacedSymbol(instance, this.calculator);
        this.canvas.add(symbol);

        let bodyAndPins: Rect;
        try {
            bodyAndPins = symbol.bounds.bodyAndPins;
        } catch (e) {
            if (!(e instanceof GeometryError)) throw e;
            const error = e.forSymbol(symbol.id);
            return this.fail(symbol, 0, { symbolId: symbol.id, reason: "geometry", lastPosition: null, conflictsWith: [], error });
        }

        const proposal = instance.position ? { ...instance.position } : this.propose(bodyAndPins);
        this.transition(symbol, "tentative");
        symbol.position = proposal;

        const resolved = this.canvas.resolved();
        const seen = new Set<string>();
        const conflicting: string[] = [];
        const step = this.config.gridStep;
        const area = this.drawingArea;
        let attempt = 0;
        let last = proposal;

        for (const offset of spiralOffsets()) {
            if (attempt >= this.config.retryBudget) break;
            attempt++;

            const candidate = { x: proposal.x + offset.x * step, y: proposal.y + offset.y * step };
            const box = symbol.boxAt(candidate);
            last = candidate;

            let outcome: AttemptOutcome;
            let conflicts: string[] = [];
            if (!containsRect(area, box)) {
                outcome = "out-of-bounds";
            } else {
                conflicts = conflictsWith(box, resolved, this.config.tolerance);
                outcome = conflicts.length === 0 ? "resolved" : "conflict";
            }

            this.trace.record({ type: "attempt", symbolId: symbol.id, attempt, position: candidate, outcome, conflicts });

            if (outcome === "resolved") {
                symbol.position = candidate;
                this.transition(symbol, "resolved");
                return { symbol, state: symbol.state, attempts: attempt, failure: null };
            }
            for (const id of conflicts) {
                if (!seen.has(id)) {
                    seen.add(id);
                    conflicting.push(id);
                }
            }
        }

        symbol.position = last;
        const error = new PlacementExhausted(symbol.id, attempt, last, conflicting);
        return this.fail(symbol, attempt, { symbolId: symbol.id, reason: "exhausted", lastPosition: last, conflictsWith: conflicting, error });
    }

    private fail(symbol: PlacedSymbol, attempts: number, failure: FailedPlacement): PlacementOutcome {
        this.transition(symbol, "failed");
        this.failed.push(failure);
        this.logger.warn(`⚠️  ${failure.error.message}`);
        return { symbol, state: symbol.state, attempts, failure };
    }

    private transition(symbol: PlacedSymbol, to: PlacementState): void {
        this.trace.record({ type: "state", symbolId: symbol.id, from: symbol.state, to });
        symbol.state = to;
    }

    private propose(bodyAndPins: Rect): Point {
        return this.config.proposal === "grid" ? this.nextGridCell() : this.nextCell(bodyAndPins);
    }

    /**
     * Centre of the next uniform grid cell, row-major across the drawing area,
     * snapped to the grid. Wraps to the first cell once every cell is used.
     */
    private nextGridCell(): Point {
        const area = this.drawingArea;
        const cell = this.config.gridCell;
        const cols = Math.max(1, Math.floor(rectWidth(area) / cell));
        const rows = Math.max(1, Math.floor(rectHeight(area) / cell));

        const index = this.cellIndex % (cols * rows);
        this.cellIndex++;
        const col = index % cols;
        const row = Math.floor(index / cols);
        const step = this.config.gridStep;
        return {
            x: snap(area.minX + (col + 0.5) * cell, step),
            y: snap(area.minY + (row + 0.5) * cell, step),
        };
    }

    /**
     * Next free cell of the row-major packing, as the symbol origin that puts
     * the box's top-left corner at the cursor (rounded up to the grid).
     * Falls back to the first cell once the sheet is full.
     */
    private nextCell(bodyAndPins: Rect): Point {
        const { margin, width, height } = this.config.sheet;
        const w = rectWidth(bodyAndPins);
        const h = rectHeight(bodyAndPins);
        const step = this.config.gridStep;

        if (this.cursorX > margin && this.cursorX + w > width - margin) {
            this.cursorX = margin;
            this.cursorY += this.rowHeight + this.config.symbolSpacing;
            this.rowHeight = 0;
        }

        if (this.cursorY + h > height - margin) {
            return {
                x: snapUp(margin - bodyAndPins.minX, step),
                y: snapUp(margin - bodyAndPins.minY, step),
            };
        }

        const origin = {
            x: snapUp(this.cursorX - bodyAndPins.minX, step),
            y: snapUp(this.cursorY - bodyAndPins.minY, step),
        };
        this.cursorX = origin.x + bodyAndPins.maxX + this.config.symbolSpacing;
        this.rowHeight = Math.max(this.rowHeight, origin.y + bodyAndPins.maxY - this.cursorY);
        return origin;
    }
}
