import * as fs from "fs";
import * as yaml from "js-yaml";
import { Point } from "../layout/geometry";
import { SymbolInstance } from "../layout/types";
import { SymbolLibrary } from "./SymbolLibrary";

export interface CircuitDescription {
  name: string;
  instances: SymbolInstance[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") throw new Error(`${where} must be a string, got ${JSON.stringify(value)}`);
  return value;
}

function optionalNumber(value: unknown, where: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") throw new Error(`${where} must be a number, got ${JSON.stringify(value)}`);
  return value;
}

function optionalPosition(value: unknown, where: string): Point | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value) && value.length === 2 && typeof value[0] === "number" && typeof value[1] === "number") {
    return { x: value[0], y: value[1] };
  }
  if (isRecord(value) && typeof value.x === "number" && typeof value.y === "number") {
    return { x: value.x, y: value.y };
  }
  throw new Error(`${where} must be [x, y] or { x, y }, got ${JSON.stringify(value)}`);
}

/**
 * Parses a YAML circuit description. Symbol order in the file is the
 * placement order.
 *
 * ```yaml
 * name: divider
 * symbols:
 *   - { symbol: "Device:R", designator: R1, value: 10k }
 *   - { symbol: "Device:R", designator: R2, value: 4k7, rotation: 90 }
 * ```
 */
export function parseCircuitYaml(content: string, library: SymbolLibrary): CircuitDescription {
  const doc = yaml.load(content);
  if (!isRecord(doc) || !Array.isArray(doc.symbols)) {
    throw new Error("Circuit description must contain a 'symbols' list");
  }

  const name = optionalString(doc.name, "name") ?? "circuit";
  const instances = doc.symbols.map((raw: unknown, i: number): SymbolInstance => {
    const where = `symbols[${i}]`;
    if (!isRecord(raw)) throw new Error(`${where} must be a mapping`);

    const designator = optionalString(raw.designator, `${where}.designator`);
    if (!designator) throw new Error(`${where} needs a designator`);

    const symbolName = optionalString(raw.symbol, `${where}.symbol`);
    if (!symbolName) throw new Error(`${designator} needs a symbol reference`);
    const definition = library.getSymbol(symbolName);
    if (!definition) {
      throw new Error(`${designator}: symbol '${symbolName}' not found in library`);
    }

    return {
      id: optionalString(raw.id, `${where}.id`),
      definition,
      designator,
      value: optionalString(raw.value, `${where}.value`),
      rotation: optionalNumber(raw.rotation, `${designator}.rotation`),
      position: optionalPosition(raw.position, `${where}.position`),
    };
  });

  return { name, instances };
}

export function loadCircuit(filePath: string, library: SymbolLibrary): CircuitDescription {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Circuit description not found: ${filePath}`);
  }
  return parseCircuitYaml(fs.readFileSync(filePath, "utf-8"), library);
}
