import { LayoutConfig } from "../config/config";
import { Canvas } from "./Canvas";
import { overlaps } from "./CollisionDetector";
import { LayoutError } from "./errors";
import { Point, Rect, rectAround, rectCenter } from "./geometry";
import { PlacedSymbol } from "./PlacedSymbol";
import { Trace } from "./Trace";
import { Logger } from "./types";

export type DesignatorSide = "above" | "right" | "below" | "left";

export const DESIGNATOR_SIDES: readonly DesignatorSide[] = ["above", "right", "below", "left"];

/**
 * Places the designator/value block of a resolved symbol next to its
 * body+pins box. Sides are tried in a fixed order; if every side collides,
 * the first one is used anyway and a warning is emitted.
 */
export class DesignatorPositioner {
    constructor(
        private config: Pick<LayoutConfig, "designatorClearance" | "tolerance">,
        private trace: Trace = new Trace(),
        private logger: Logger = console,
    ) { }

    /** Candidate block centres around a box, in priority order. */
    candidates(box: Rect, size: { width: number; height: number }): Point[] {
        const c = this.config.designatorClearance;
        const center = rectCenter(box);
        return [
            { x: center.x, y: box.minY - c - size.height / 2 },
            { x: box.maxX + c + size.width / 2, y: center.y },
            { x: center.x, y: box.maxY + c + size.height / 2 },
            { x: box.minX - c - size.width / 2, y: center.y },
        ];
    }

    /**
     * Chooses the designator position of `symbol`, stores its offset on the
     * symbol and returns the absolute block centre.
     */
    place(symbol: PlacedSymbol, canvas: Canvas): Point {
        const origin = symbol.position;
        if (!origin || symbol.state !== "resolved") {
            throw new LayoutError(`${symbol.id} must be resolved before its designator is placed`);
        }
        const box = symbol.box;
        const size = symbol.designatorSize;
        const candidates = this.candidates(box, size);

        const obstacles: Rect[] = canvas.resolved().filter(s => s !== symbol).map(s => s.box);
        for (const other of canvas.placedDesignators()) {
            const placed = other.designatorBox;
            if (other !== symbol && placed) obstacles.push(placed);
        }

        let chosen = 0;
        let fallback = true;
        for (let i = 0; i < candidates.length; i++) {
            const block = rectAround(candidates[i], size.width, size.height);
            if (!obstacles.some(o => overlaps(block, o, this.config.tolerance))) {
                chosen = i;
                fallback = false;
                break;
            }
        }

        const position = candidates[chosen];
        if (fallback) {
            const message = `No free spot for designator of ${symbol.id}, placing it ${DESIGNATOR_SIDES[0]} anyway`;
            this.logger.warn(`⚠️  ${message}`);
            this.trace.record({ type: "warning", symbolId: symbol.id, message });
        }
        this.trace.record({ type: "designator", symbolId: symbol.id, candidate: chosen, position, fallback });

        symbol.designatorOffset = { x: position.x - origin.x, y: position.y - origin.y };
        return position;
    }
}
