import { LayoutConfig, validateConfig } from "../config/config";
import { DesignatorPositioner } from "./DesignatorPositioner";
import { ConfigurationError } from "./errors";
import { Point, Rect, Rotation } from "./geometry";
import { PinEndpoint } from "./PlacedSymbol";
import { FailedPlacement, PlacementEngine } from "./PlacementEngine";
import { Trace } from "./Trace";
import { BoxRegion, Logger, PlacementState, SymbolInstance, SymbolKind } from "./types";

/** Final placement of one symbol, as handed to a schematic emitter. */
export interface SymbolPlacement {
  id: string;
  designator: string;
  value: string;
  kind: SymbolKind;
  state: PlacementState;
  /** Final position for resolved symbols, last attempted one for exhausted ones, null after a geometry error */
  position: Point | null;
  rotation: Rotation | null;
  box: Rect | null;
  designatorPosition: Point | null;
  designatorOffset: Point | null;
  designatorBox: Rect | null;
  pins: PinEndpoint[];
}

/** One drawable rectangle of the debug overlay. */
export interface OverlayRect {
  symbolId: string;
  region: BoxRegion;
  state: PlacementState;
  rect: Rect;
}

export interface LayoutResult {
  symbols: SymbolPlacement[];
  failures: FailedPlacement[];
  warnings: string[];
  trace: Trace;
  /** Present only when the configuration enables the debug overlay */
  overlay?: OverlayRect[];
}

export interface LayoutOptions {
  logger?: Logger;
}

const WARNING_PREFIX = /^⚠️\s+/;

/**
 * Runs one complete layout pass over an ordered list of symbol instances:
 * placement, then designator positioning. The canvas is built from scratch
 * on every call.
 *
 * Configuration problems and duplicate ids abort before any placement;
 * per-symbol problems are reported in `failures` and never abort the pass.
 */
export function generateSchematic(instances: SymbolInstance[], config: LayoutConfig, options: LayoutOptions = {}): LayoutResult {
  const valid = validateConfig(config);

  const ids = new Set<string>();
  for (const instance of instances) {
    const id = instance.id ?? instance.designator;
    if (ids.has(id)) {
      throw new ConfigurationError("symbols", `duplicate symbol id '${id}'`);
    }
    ids.add(id);
  }

  const warnings: string[] = [];
  const baseLogger = options.logger ?? console;
  const logger: Logger = {
    log: (message) => baseLogger.log(message),
    warn: (message) => {
      warnings.push(message.replace(WARNING_PREFIX, ""));
      baseLogger.warn(message);
    },
  };

  const trace = new Trace();
  const engine = new PlacementEngine(valid, { trace, logger });
  engine.placeAll(instances);

  const positioner = new DesignatorPositioner(valid, trace, logger);
  for (const symbol of engine.canvas.resolved()) {
    positioner.place(symbol, engine.canvas);
  }

  const all = engine.canvas.all();
  const resolvedCount = all.filter(s => s.state === "resolved").length;
  logger.log(`  → Placed ${resolvedCount}/${all.length} symbols`);

  const symbols: SymbolPlacement[] = all.map(symbol => {
    const placed = symbol.state === "resolved";
    const hasBounds = symbol.position !== null;
    return {
      id: symbol.id,
      designator: symbol.designator,
      value: symbol.value,
      kind: symbol.kind,
      state: symbol.state,
      position: symbol.position,
      rotation: hasBounds ? symbol.bounds.rotation : null,
      box: placed ? symbol.box : null,
      designatorPosition: symbol.designatorPosition,
      designatorOffset: symbol.designatorOffset,
      designatorBox: symbol.designatorBox,
      pins: placed ? symbol.pinEndpoints() : [],
    };
  });

  const result: LayoutResult = {
    symbols,
    failures: [...engine.failures],
    warnings,
    trace,
  };

  if (valid.debugOverlay) {
    result.overlay = [];
    for (const symbol of all) {
      if (symbol.position === null) continue;
      for (const rect of symbol.regionBoxes()) {
        const { region, ...bounds } = rect;
        result.overlay.push({ symbolId: symbol.id, region, state: symbol.state, rect: bounds });
      }
    }
  }

  return result;
}
