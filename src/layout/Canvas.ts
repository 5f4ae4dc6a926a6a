import { ConfigurationError } from "./errors";
import { PlacedSymbol } from "./PlacedSymbol";
import { PlacementState } from "./types";

/**
 * The symbols of one layout pass, kept in insertion order and addressed by id.
 * Owned and mutated by a single placement engine.
 */
export class Canvas {
    private symbols = new Map<string, PlacedSymbol>();

    add(symbol: PlacedSymbol): void {
        if (this.symbols.has(symbol.id)) {
            throw new ConfigurationError("symbols", `duplicate symbol id '${symbol.id}'`);
        }
        this.symbols.set(symbol.id, symbol);
    }

    get(id: string): PlacedSymbol | undefined {
        return this.symbols.get(id);
    }

    get size(): number {
        return this.symbols.size;
    }

    /** All symbols in insertion order. */
    all(): PlacedSymbol[] {
        return Array.from(this.symbols.values());
    }

    withState(state: PlacementState): PlacedSymbol[] {
        return this.all().filter(s => s.state === state);
    }

    resolved(): PlacedSymbol[] {
        return this.withState("resolved");
    }

    /** Resolved symbols whose designator block has been placed. */
    placedDesignators(): PlacedSymbol[] {
        return this.resolved().filter(s => s.designatorOffset !== null);
    }
}
