import { Point } from "./geometry";
import { PlacementState } from "./types";

export type AttemptOutcome = "resolved" | "conflict" | "out-of-bounds";

export type TraceEvent =
    | {
        type: "attempt";
        symbolId: string;
        attempt: number;
        position: Point;
        outcome: AttemptOutcome;
        conflicts: string[];
    }
    | { type: "state"; symbolId: string; from: PlacementState; to: PlacementState }
    | { type: "designator"; symbolId: string; candidate: number; position: Point; fallback: boolean }
    | { type: "warning"; symbolId: string | null; message: string };

export type TraceEventType = TraceEvent["type"];

/**
 * Ordered record of what the engine did during one pass. Replaces ad hoc
 * debug printing: tests and callers query it instead of scraping logs.
 */
export class Trace {
    private readonly entries: TraceEvent[] = [];

    record(event: TraceEvent): void {
        this.entries.push(event);
    }

    get events(): readonly TraceEvent[] {
        return this.entries;
    }

    forSymbol(symbolId: string): TraceEvent[] {
        return this.entries.filter(e => e.symbolId === symbolId);
    }

    ofType<T extends TraceEventType>(type: T): Extract<TraceEvent, { type: T }>[] {
        return this.entries.filter((e): e is Extract<TraceEvent, { type: T }> => e.type === type);
    }
}
