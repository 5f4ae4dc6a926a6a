import { Orientation, Point, Rect, Rotation } from "./geometry";

/** A pin of a symbol definition, in symbol-local coordinates. */
export interface Pin {
  readonly name: string;
  /** Direction the pin points away from the body */
  readonly orientation: Orientation;
  /** Where the pin leaves the body */
  readonly offset: Readonly<Point>;
  readonly length: number;
}

/** Body outline of a symbol, independent of placement. */
export type SymbolShape =
  | { readonly type: "rectangle"; readonly min: Readonly<Point>; readonly max: Readonly<Point> }
  | { readonly type: "polygon"; readonly points: ReadonlyArray<Readonly<Point>> };

/** Component category. Carried for the caller; geometry never branches on it. */
export type SymbolKind = "passive" | "connector" | "integrated-circuit" | "generic";

export const SYMBOL_KINDS: readonly SymbolKind[] = ["passive", "connector", "integrated-circuit", "generic"];

/** A reusable library symbol: outline plus ordered pins. */
export interface SymbolDefinition {
  /** "Library:Name" */
  readonly name: string;
  readonly kind: SymbolKind;
  readonly shape: SymbolShape;
  readonly pins: ReadonlyArray<Pin>;
}

/** One entry of the ordered circuit description handed to the layout engine. */
export interface SymbolInstance {
  /** Unique within one layout pass. Defaults to the designator. */
  id?: string;
  definition: SymbolDefinition;
  designator: string;
  value?: string;
  rotation?: number;
  /** Initial position hint; the engine still nudges it on conflict */
  position?: Point;
}

export type PlacementState = "unplaced" | "tentative" | "resolved" | "failed";

export type BoxRegion = "body" | "pin-labels" | "designator";

export interface RegionBox extends Rect {
  region: BoxRegion;
}

/** Bounds of a symbol at a given rotation, relative to its origin. */
export interface SymbolBounds {
  rotation: Rotation;
  body: RegionBox;
  /** Union of pin segments and pin-name labels; null for symbols without pins */
  pinLabels: RegionBox | null;
  /** Minimal rectangle containing the body, every pin and every pin label */
  bodyAndPins: Rect;
  /** Candidate designator block, resolved later by the designator positioner */
  designator: RegionBox | null;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}
