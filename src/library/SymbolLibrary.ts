import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { GeometryError } from "../layout/errors";
import { Orientation, Point } from "../layout/geometry";
import { Pin, SYMBOL_KINDS, SymbolDefinition, SymbolKind, SymbolShape } from "../layout/types";

export interface SymbolDefinitionInput {
  kind?: SymbolKind;
  shape: SymbolShape;
  pins?: ReadonlyArray<Pin>;
}

/**
 * Builds a frozen symbol definition. Pins and shape are copied so the
 * definition can be shared between placements without aliasing the input.
 */
export function defineSymbol(name: string, input: SymbolDefinitionInput): SymbolDefinition {
  const shape: SymbolShape = input.shape.type === "rectangle"
    ? { type: "rectangle", min: { ...input.shape.min }, max: { ...input.shape.max } }
    : { type: "polygon", points: input.shape.points.map(p => ({ ...p })) };

  const pins: Pin[] = (input.pins ?? []).map(pin => Object.freeze({
    name: pin.name,
    orientation: pin.orientation,
    offset: { ...pin.offset },
    length: pin.length,
  }));

  const definition: SymbolDefinition = {
    name,
    kind: input.kind ?? "generic",
    shape: Object.freeze(shape),
    pins: Object.freeze(pins),
  };
  return Object.freeze(definition);
}

const ORIENTATIONS: readonly Orientation[] = ["up", "down", "left", "right"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(where: string, message: string): GeometryError {
  return new GeometryError(message, where);
}

function readPoint(value: unknown, where: string): Point {
  if (!Array.isArray(value) || value.length !== 2 || typeof value[0] !== "number" || typeof value[1] !== "number") {
    throw invalid(where, `expected [x, y], got ${JSON.stringify(value)}`);
  }
  return { x: value[0], y: value[1] };
}

function readShape(value: unknown, where: string): SymbolShape {
  if (!isRecord(value)) throw invalid(where, "shape must be a mapping");
  if (value.rectangle !== undefined) {
    const rect = value.rectangle;
    if (!isRecord(rect)) throw invalid(where, "rectangle needs min and max");
    return { type: "rectangle", min: readPoint(rect.min, `${where}.rectangle.min`), max: readPoint(rect.max, `${where}.rectangle.max`) };
  }
  if (value.polygon !== undefined) {
    if (!Array.isArray(value.polygon)) throw invalid(where, "polygon must be a list of points");
    return { type: "polygon", points: value.polygon.map((p, i) => readPoint(p, `${where}.polygon[${i}]`)) };
  }
  throw invalid(where, "shape must be a rectangle or a polygon");
}

function readPin(value: unknown, where: string): Pin {
  if (!isRecord(value)) throw invalid(where, "pin must be a mapping");
  // pin names like 1 or 2 come out of YAML as numbers
  const name = typeof value.name === "number" ? String(value.name) : value.name;
  if (typeof name !== "string") throw invalid(where, "pin needs a name");
  const orientation = ORIENTATIONS.find(o => o === value.orientation);
  if (!orientation) {
    throw invalid(where, `orientation must be one of ${ORIENTATIONS.join(", ")}, got ${JSON.stringify(value.orientation)}`);
  }
  if (typeof value.length !== "number") throw invalid(where, "pin needs a numeric length");
  return { name, orientation, offset: readPoint(value.offset, `${where}.offset`), length: value.length };
}

/** Parses one YAML library document into definitions named `libName:symbol`. */
export function parseLibraryYaml(content: string, libName: string): Map<string, SymbolDefinition> {
  const doc = yaml.load(content);
  if (!isRecord(doc) || !isRecord(doc.symbols)) {
    throw new Error(`Symbol library ${libName} must contain a 'symbols' mapping`);
  }

  const definitions = new Map<string, SymbolDefinition>();
  for (const [symName, raw] of Object.entries(doc.symbols)) {
    const where = `${libName}:${symName}`;
    if (!isRecord(raw)) throw invalid(where, "definition must be a mapping");

    const kind = raw.kind === undefined ? "generic" : SYMBOL_KINDS.find(k => k === raw.kind);
    if (!kind) throw invalid(where, `unknown kind ${JSON.stringify(raw.kind)}`);

    const pinList = raw.pins ?? [];
    if (!Array.isArray(pinList)) throw invalid(where, "pins must be a list");

    definitions.set(symName, defineSymbol(where, {
      kind,
      shape: readShape(raw.shape, where),
      pins: pinList.map((p, i) => readPin(p, `${where}.pins[${i}]`)),
    }));
  }
  return definitions;
}

/**
 * Static symbol definitions, looked up as "Library:Symbol".
 * Each library is a `<Library>.yml` file in one of the search paths, loaded on first use.
 */
export class SymbolLibrary {
  private loadedLibraries = new Map<string, Map<string, SymbolDefinition>>();
  private registered = new Map<string, SymbolDefinition>();
  constructor(private readonly libraryPaths: string[] = []) { }

  /** Adds definitions that do not come from a file, e.g. generated ones. They shadow file definitions. */
  register(definition: SymbolDefinition): void {
    const [libName, symName] = definition.name.split(":");
    if (!libName || !symName) {
      throw new Error(`Symbol name '${definition.name}' must have the form Library:Symbol`);
    }
    this.registered.set(definition.name, definition);
  }

  /**
   * @param qualifiedName "Library:Symbol" format
   * @returns null when the library or the symbol does not exist
   */
  getSymbol(qualifiedName: string): SymbolDefinition | null {
    const registered = this.registered.get(qualifiedName);
    if (registered) return registered;

    const [libName, symName] = qualifiedName.split(":");
    if (!libName || !symName) return null;

    if (!this.ensureLibraryLoaded(libName)) return null;
    return this.loadedLibraries.get(libName)?.get(symName) ?? null;
  }

  private ensureLibraryLoaded(libName: string): boolean {
    if (this.loadedLibraries.has(libName)) return true;

    for (const searchPath of this.libraryPaths) {
      const filePath = path.join(searchPath, `${libName}.yml`);
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, "utf-8");
        this.loadedLibraries.set(libName, parseLibraryYaml(content, libName));
        return true;
      }
    }
    return false;
  }
}
