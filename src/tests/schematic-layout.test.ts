import { describe, it, expect } from "vitest";
import { DEFAULT_LAYOUT_CONFIG, resolveConfig } from "../config/config";
import { ConfigurationError } from "../layout/errors";
import { generateSchematic } from "../layout/SchematicLayout";
import { block, connector, instance, quietLogger, resistor } from "./helpers";

describe("generateSchematic", () => {
    it("reports placement, rotation and pin endpoints per symbol", () => {
        const logger = quietLogger();
        const result = generateSchematic([
            instance(resistor, "R1", { value: "10k", position: { x: 50, y: 50 } }),
            instance(resistor, "R2", { value: "4k7", rotation: -270 }),
        ], resolveConfig(), { logger });

        const [r1, r2] = result.symbols;
        expect(r1).toMatchObject({ id: "R1", designator: "R1", value: "10k", kind: "passive", state: "resolved", rotation: 0 });
        expect(r1.position).toEqual({ x: 50, y: 50 });
        expect(r1.pins.map(p => p.name)).toEqual(["1", "2"]);
        expect(r1.pins[0].x).toBe(50);
        expect(r1.pins[0].y).toBeCloseTo(46.19);
        expect(r2.rotation).toBe(90);
        expect(r2.state).toBe("resolved");

        expect(result.failures).toEqual([]);
        expect(result.warnings).toEqual([]);
        expect(result.overlay).toBeUndefined();
        expect(logger.log).toHaveBeenCalledWith("  → Placed 2/2 symbols");
    });

    it("reports failed symbols and keeps placing the rest", () => {
        const logger = quietLogger();
        const result = generateSchematic([
            instance(resistor, "X1", { rotation: 45 }),
            instance(connector, "J1"),
        ], resolveConfig(), { logger });

        expect(result.symbols[0]).toEqual({
            id: "X1",
            designator: "X1",
            value: "",
            kind: "passive",
            state: "failed",
            position: null,
            rotation: null,
            box: null,
            designatorPosition: null,
            designatorOffset: null,
            designatorBox: null,
            pins: [],
        });
        expect(result.symbols[1].state).toBe("resolved");
        expect(result.failures.map(f => [f.symbolId, f.reason])).toEqual([["X1", "geometry"]]);
        expect(result.warnings).toEqual(["X1: rotation 45 is not one of 0, 90, 180, 270"]);
        expect(logger.log).toHaveBeenCalledWith("  → Placed 1/2 symbols");
    });

    it("emits region rectangles when the debug overlay is on", () => {
        const config = resolveConfig({ debugOverlay: true });
        const result = generateSchematic([instance(resistor, "R1", { position: { x: 50, y: 50 } })], config, { logger: quietLogger() });

        expect(result.overlay?.map(o => [o.symbolId, o.region, o.state])).toEqual([
            ["R1", "body", "resolved"],
            ["R1", "pin-labels", "resolved"],
            ["R1", "designator", "resolved"],
        ]);
        expect(result.overlay?.[0].rect.minX).toBeCloseTo(48.984);
        expect(result.overlay?.[0].rect.maxY).toBeCloseTo(52.54);
    });

    it("includes exhausted symbols at their last position in the overlay", () => {
        const config = resolveConfig({
            gridStep: 5,
            symbolSpacing: 0,
            retryBudget: 5,
            sheet: { width: 30, height: 30, margin: 10 },
            debugOverlay: true,
        });
        const result = generateSchematic([instance(block(10), "A1"), instance(block(10), "A2")], config, { logger: quietLogger() });

        expect(result.overlay?.filter(o => o.symbolId === "A2")).toEqual([
            { symbolId: "A2", region: "body", state: "failed", rect: { minX: 5, minY: 15, maxX: 15, maxY: 25 } },
        ]);
        expect(result.symbols[1].position).toEqual({ x: 10, y: 20 });
        expect(result.symbols[1].box).toBeNull();
        expect(result.warnings).toEqual(["A2: no free position after 5 attempts, last tried (10, 20) (conflicts with A1)"]);
    });

    it("does not change placement when the overlay is enabled", () => {
        const instances = [
            instance(resistor, "R1", { position: { x: 60, y: 60 } }),
            instance(resistor, "R2", { position: { x: 60, y: 60 } }),
            instance(connector, "J1"),
        ];
        const plain = generateSchematic(instances, resolveConfig(), { logger: quietLogger() });
        const debug = generateSchematic(instances, resolveConfig({ debugOverlay: true }), { logger: quietLogger() });
        expect(debug.symbols).toEqual(plain.symbols);
    });

    it("gives identical results for identical input", () => {
        const instances = [
            instance(resistor, "R1", { value: "10k", position: { x: 60, y: 60 } }),
            instance(resistor, "R2", { value: "4k7", rotation: 90, position: { x: 60, y: 60 } }),
            instance(resistor, "R3", { rotation: 270, position: { x: 60, y: 60 } }),
            instance(connector, "J1", { rotation: 180 }),
        ];
        const config = resolveConfig({ debugOverlay: true });
        const first = generateSchematic(instances, config, { logger: quietLogger() });
        const second = generateSchematic(instances, config, { logger: quietLogger() });

        expect(second.symbols).toEqual(first.symbols);
        expect(second.overlay).toEqual(first.overlay);
        expect(second.trace.events).toEqual(first.trace.events);
        expect(first.symbols.map(s => s.rotation)).toEqual([0, 90, 270, 180]);
        expect(first.symbols.every(s => s.designatorOffset !== null)).toBe(true);
    });

    it("rejects duplicate ids before placing anything", () => {
        const logger = quietLogger();
        expect(() => generateSchematic([
            instance(resistor, "R1"),
            instance(resistor, "R2", { id: "R1" }),
        ], resolveConfig(), { logger })).toThrow(ConfigurationError);
        expect(logger.log).not.toHaveBeenCalled();
    });

    it("rejects an invalid configuration before placing anything", () => {
        const logger = quietLogger();
        expect(() => generateSchematic([instance(resistor, "R1")], { ...DEFAULT_LAYOUT_CONFIG, tolerance: -1 }, { logger }))
            .toThrow("Invalid layout configuration 'tolerance': must not be negative, got -1");
        expect(logger.log).not.toHaveBeenCalled();
    });
});
