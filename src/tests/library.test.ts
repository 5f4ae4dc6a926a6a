import { describe, it, expect } from "vitest";
import * as path from "path";
import { resolveConfig } from "../config/config";
import { GeometryError } from "../layout/errors";
import { generateSchematic } from "../layout/SchematicLayout";
import { loadCircuit, parseCircuitYaml } from "../library/CircuitLoader";
import { SymbolLibrary, defineSymbol, parseLibraryYaml } from "../library/SymbolLibrary";
import { quietLogger } from "./helpers";

const symbolsDir = path.join(__dirname, "assets", "symbols");

describe("SymbolLibrary", () => {
    it("loads definitions from YAML libraries in the search path", () => {
        const library = new SymbolLibrary([path.join(__dirname, "assets"), symbolsDir]);
        const r = library.getSymbol("Device:R");

        expect(r).not.toBeNull();
        if (r) {
            expect(r.name).toBe("Device:R");
            expect(r.kind).toBe("passive");
            expect(r.shape).toEqual({ type: "rectangle", min: { x: -1.016, y: -2.54 }, max: { x: 1.016, y: 2.54 } });
            expect(r.pins.map(p => p.name)).toEqual(["1", "2"]);
            expect(r.pins[0]).toEqual({ name: "1", orientation: "up", offset: { x: 0, y: -2.54 }, length: 1.27 });
        }
        expect(library.getSymbol("Device:R")).toBe(r);
        expect(library.getSymbol("Device:D")?.shape.type).toBe("polygon");
        expect(library.getSymbol("Connector:Conn_01x04")?.pins).toHaveLength(4);
    });

    it("returns null for unknown symbols and libraries", () => {
        const library = new SymbolLibrary([symbolsDir]);
        expect(library.getSymbol("Device:Nope")).toBeNull();
        expect(library.getSymbol("Missing:R")).toBeNull();
        expect(library.getSymbol("R")).toBeNull();
    });

    it("raises GeometryError for malformed definitions", () => {
        const library = new SymbolLibrary([symbolsDir]);
        expect(() => library.getSymbol("Broken:NoShape")).toThrow(GeometryError);
        expect(() => library.getSymbol("Broken:NoShape")).toThrow("Broken:NoShape: shape must be a mapping");

        const yaml = [
            "symbols:",
            "  X:",
            "    shape: { rectangle: { min: [0, 0], max: [1, 1] } }",
            "    pins: [{ name: A, orientation: north, offset: [0, 0], length: 1 }]",
        ].join("\n");
        expect(() => parseLibraryYaml(yaml, "T"))
            .toThrow('T:X.pins[0]: orientation must be one of up, down, left, right, got "north"');
        expect(() => parseLibraryYaml("parts: []", "T")).toThrow("Symbol library T must contain a 'symbols' mapping");
    });

    it("serves registered definitions alongside file libraries", () => {
        const library = new SymbolLibrary([symbolsDir]);
        const custom = defineSymbol("Device:Custom", { shape: { type: "rectangle", min: { x: 0, y: 0 }, max: { x: 1, y: 1 } } });
        library.register(custom);

        expect(library.getSymbol("Device:Custom")).toBe(custom);
        expect(library.getSymbol("Device:R")?.kind).toBe("passive");
        expect(() => library.register(defineSymbol("Custom", { shape: custom.shape }))).toThrow("Symbol name 'Custom' must have the form Library:Symbol");
    });

    it("freezes defined symbols and copies their input", () => {
        const offset = { x: 0, y: 0 };
        const definition = defineSymbol("Test:T", {
            shape: { type: "rectangle", min: { x: -1, y: -1 }, max: { x: 1, y: 1 } },
            pins: [{ name: "1", orientation: "left", offset, length: 1 }],
        });
        offset.x = 5;

        expect(definition.kind).toBe("generic");
        expect(definition.pins[0].offset).toEqual({ x: 0, y: 0 });
        expect(Object.isFrozen(definition)).toBe(true);
        expect(Object.isFrozen(definition.pins)).toBe(true);
        expect(Object.isFrozen(definition.pins[0])).toBe(true);
    });
});

describe("CircuitLoader", () => {
    const library = new SymbolLibrary([symbolsDir]);

    it("loads instances in file order", () => {
        const circuit = loadCircuit(path.join(__dirname, "assets", "circuit.yml"), library);

        expect(circuit.name).toBe("divider");
        expect(circuit.instances.map(i => i.designator)).toEqual(["R1", "R2", "C1", "J1"]);
        expect(circuit.instances.map(i => i.value)).toEqual(["10k", "4k7", "100n", undefined]);
        expect(circuit.instances[0].definition).toBe(library.getSymbol("Device:R"));
        expect(circuit.instances[1].rotation).toBe(90);
        expect(circuit.instances[2].position).toEqual({ x: 100, y: 80 });
        expect(circuit.instances[3].id).toBe("header");
    });

    it("lays out a loaded circuit", () => {
        const circuit = loadCircuit(path.join(__dirname, "assets", "circuit.yml"), library);
        const result = generateSchematic(circuit.instances, resolveConfig(), { logger: quietLogger() });

        expect(result.symbols.map(s => [s.id, s.state])).toEqual([
            ["R1", "resolved"],
            ["R2", "resolved"],
            ["C1", "resolved"],
            ["header", "resolved"],
        ]);
        expect(result.symbols[2].position).toEqual({ x: 100, y: 80 });
        expect(result.warnings).toEqual([]);
    });

    it("reads numeric designators and values as strings", () => {
        const circuit = parseCircuitYaml("symbols:\n  - { symbol: \"Device:C\", designator: C1, value: 100 }\n", library);
        expect(circuit.name).toBe("circuit");
        expect(circuit.instances[0].value).toBe("100");
    });

    it("names the designator of an unknown symbol", () => {
        expect(() => parseCircuitYaml("symbols:\n  - { symbol: \"Device:Nope\", designator: Q1 }\n", library))
            .toThrow("Q1: symbol 'Device:Nope' not found in library");
        expect(() => parseCircuitYaml("symbols:\n  - { symbol: \"Device:R\" }\n", library))
            .toThrow("symbols[0] needs a designator");
        expect(() => parseCircuitYaml("name: empty\n", library)).toThrow("Circuit description must contain a 'symbols' list");
    });

    it("fails on a missing file", () => {
        expect(() => loadCircuit(path.join(__dirname, "assets", "nope.yml"), library)).toThrow("Circuit description not found");
    });
});
