export * from "./layout/geometry";
export * from "./layout/types";
export * from "./layout/errors";
export * from "./layout/TextMetrics";
export * from "./layout/BoundingBoxCalculator";
export * from "./layout/CollisionDetector";
export * from "./layout/Trace";
export * from "./layout/PlacedSymbol";
export * from "./layout/Canvas";
export * from "./layout/PlacementEngine";
export * from "./layout/DesignatorPositioner";
export * from "./layout/SchematicLayout";
export * from "./layout/Annotator";
export * from "./config/config";
export * from "./library/SymbolLibrary";
export * from "./library/CircuitLoader";
