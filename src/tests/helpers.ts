import { vi } from "vitest";
import { Orientation } from "../layout/geometry";
import { Pin, SymbolDefinition, SymbolInstance } from "../layout/types";
import { defineSymbol } from "../library/SymbolLibrary";

export const resistor: SymbolDefinition = defineSymbol("Device:R", {
    kind: "passive",
    shape: { type: "rectangle", min: { x: -1.016, y: -2.54 }, max: { x: 1.016, y: 2.54 } },
    pins: [
        { name: "1", orientation: "up", offset: { x: 0, y: -2.54 }, length: 1.27 },
        { name: "2", orientation: "down", offset: { x: 0, y: 2.54 }, length: 1.27 },
    ],
});

export const connector: SymbolDefinition = defineSymbol("Connector:Conn_01x04", {
    kind: "connector",
    shape: { type: "rectangle", min: { x: -1.27, y: -5.08 }, max: { x: 1.27, y: 5.08 } },
    pins: [0, 1, 2, 3].map((i): Pin => ({
        name: String(i + 1),
        orientation: "left",
        offset: { x: -1.27, y: -3.81 + i * 2.54 },
        length: 3.81,
    })),
});

/** 4 x 30 pins around a square body. */
export function microcontroller(pinsPerSide = 30): SymbolDefinition {
    const half = (pinsPerSide + 2) * 2.54 / 2;
    const start = -((pinsPerSide - 1) * 2.54) / 2;
    const sides: { port: string; orientation: Orientation; at: (t: number) => { x: number; y: number } }[] = [
        { port: "PA", orientation: "left", at: t => ({ x: -half, y: t }) },
        { port: "PB", orientation: "up", at: t => ({ x: t, y: -half }) },
        { port: "PC", orientation: "right", at: t => ({ x: half, y: t }) },
        { port: "PD", orientation: "down", at: t => ({ x: t, y: half }) },
    ];

    const pins: Pin[] = [];
    for (const side of sides) {
        for (let i = 0; i < pinsPerSide; i++) {
            pins.push({ name: `${side.port}${i}`, orientation: side.orientation, offset: side.at(start + i * 2.54), length: 2.54 });
        }
    }
    return defineSymbol("MCU:Generic", {
        kind: "integrated-circuit",
        shape: { type: "rectangle", min: { x: -half, y: -half }, max: { x: half, y: half } },
        pins,
    });
}

/** Square body without pins, `size` wide. */
export function block(size: number, name = "Test:Block"): SymbolDefinition {
    const h = size / 2;
    return defineSymbol(name, { shape: { type: "rectangle", min: { x: -h, y: -h }, max: { x: h, y: h } } });
}

export function instance(definition: SymbolDefinition, designator: string, extra: Partial<SymbolInstance> = {}): SymbolInstance {
    return { definition, designator, ...extra };
}

export function quietLogger() {
    return { log: vi.fn(), warn: vi.fn() };
}
