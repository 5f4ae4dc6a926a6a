import { Point } from "./geometry";

/** Base class of every error raised by the layout engine. */
export class LayoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A label could not be measured. Recovered locally with a zero width. */
export class MetricsError extends LayoutError {
    constructor(message: string, readonly label: unknown) {
        super(message);
    }
}

/** A symbol shape or pin cannot be rotated or bounded. The symbol is skipped. */
export class GeometryError extends LayoutError {
    constructor(readonly detail: string, readonly symbolId: string | null = null) {
        super(symbolId ? `${symbolId}: ${detail}` : detail);
    }

    /** Copy of this error attributed to a symbol. */
    forSymbol(symbolId: string): GeometryError {
        return new GeometryError(this.detail, symbolId);
    }
}

/** A symbol used up its retry budget without finding a conflict-free position. */
export class PlacementExhausted extends LayoutError {
    constructor(
        readonly symbolId: string,
        readonly attempts: number,
        readonly lastPosition: Point,
        readonly conflictsWith: string[],
    ) {
        const against = conflictsWith.length > 0 ? ` (conflicts with ${conflictsWith.join(", ")})` : "";
        super(`${symbolId}: no free position after ${attempts} attempts, last tried (${lastPosition.x}, ${lastPosition.y})${against}`);
    }
}

/** Invalid configuration or layout request. Aborts the pass before any placement. */
export class ConfigurationError extends LayoutError {
    constructor(readonly field: string, message: string) {
        super(`Invalid layout configuration '${field}': ${message}`);
    }
}
