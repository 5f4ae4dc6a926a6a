import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigurationError } from "../layout/errors";

export interface SheetConfig {
    width: number;
    height: number;
    margin: number;
}

/**
 * How unhinted symbols get their first position: `pack` fills rows left to
 * right by box size, `grid` puts one symbol per uniform cell of `gridCell`.
 */
export type ProposalStrategy = "pack" | "grid";

export const PROPOSAL_STRATEGIES: readonly ProposalStrategy[] = ["pack", "grid"];

/**
 * Tunables of one layout pass. Every engine instance receives its own
 * copy; nothing is read from module state.
 */
export interface LayoutConfig {
    /** Label text height in mm */
    textHeight: number;
    /** Average glyph width as a fraction of the text height */
    widthRatio: number;
    /** Overlap depth two boxes may share before they count as colliding */
    tolerance: number;
    /** Maximum placement attempts per symbol, the initial proposal included */
    retryBudget: number;
    /** Position snapping and nudge step */
    gridStep: number;
    /** Gap between neighbouring cells of the initial packing */
    symbolSpacing: number;
    /** Gap between a symbol's body+pins box and its designator block */
    designatorClearance: number;
    proposal: ProposalStrategy;
    /** Cell size of the `grid` proposal */
    gridCell: number;
    sheet: SheetConfig;
    /** Emit raw region rectangles alongside the placement */
    debugOverlay: boolean;
}

export type LayoutConfigInput = Partial<Omit<LayoutConfig, "sheet">> & { sheet?: Partial<SheetConfig> };

// The width ratio and retry budget are visual tuning values, not exact contracts.
export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = Object.freeze({
    textHeight: 1.27,
    widthRatio: 0.65,
    tolerance: 0,
    retryBudget: 48,
    gridStep: 2.54,
    symbolSpacing: 5.08,
    designatorClearance: 1.27,
    proposal: "pack",
    gridCell: 25.4,
    sheet: Object.freeze({ width: 297, height: 210, margin: 12.7 }),
    debugOverlay: false,
});

const NUMERIC_FIELDS = [
    "textHeight",
    "widthRatio",
    "tolerance",
    "retryBudget",
    "gridStep",
    "symbolSpacing",
    "designatorClearance",
    "gridCell",
] as const;

const SHEET_FIELDS = ["width", "height", "margin"] as const;

const ENV_OVERRIDES: Record<string, (typeof NUMERIC_FIELDS)[number]> = {
    LAYOUT_TEXT_HEIGHT: "textHeight",
    LAYOUT_WIDTH_RATIO: "widthRatio",
    LAYOUT_TOLERANCE: "tolerance",
    LAYOUT_RETRY_BUDGET: "retryBudget",
    LAYOUT_GRID_STEP: "gridStep",
};

function requireFinite(field: string, value: number): void {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigurationError(field, `expected a finite number, got ${String(value)}`);
    }
}

function requirePositive(field: string, value: number): void {
    requireFinite(field, value);
    if (value <= 0) throw new ConfigurationError(field, `must be greater than 0, got ${value}`);
}

function requireNonNegative(field: string, value: number): void {
    requireFinite(field, value);
    if (value < 0) throw new ConfigurationError(field, `must not be negative, got ${value}`);
}

/**
 * Checks a complete configuration. Throws a ConfigurationError naming the
 * first offending field; returns a frozen copy otherwise.
 */
export function validateConfig(config: LayoutConfig): LayoutConfig {
    requirePositive("textHeight", config.textHeight);
    requirePositive("widthRatio", config.widthRatio);
    requireNonNegative("tolerance", config.tolerance);
    requireFinite("retryBudget", config.retryBudget);
    if (!Number.isInteger(config.retryBudget) || config.retryBudget < 1) {
        throw new ConfigurationError("retryBudget", `must be a whole number of at least 1, got ${config.retryBudget}`);
    }
    requirePositive("gridStep", config.gridStep);
    requireNonNegative("symbolSpacing", config.symbolSpacing);
    requireNonNegative("designatorClearance", config.designatorClearance);
    if (!PROPOSAL_STRATEGIES.includes(config.proposal)) {
        throw new ConfigurationError("proposal", `expected one of ${PROPOSAL_STRATEGIES.join(", ")}, got ${String(config.proposal)}`);
    }
    requirePositive("gridCell", config.gridCell);
    requirePositive("sheet.width", config.sheet.width);
    requirePositive("sheet.height", config.sheet.height);
    requireNonNegative("sheet.margin", config.sheet.margin);
    if (2 * config.sheet.margin >= Math.min(config.sheet.width, config.sheet.height)) {
        throw new ConfigurationError("sheet.margin", `margin ${config.sheet.margin} leaves no drawing area on a ${config.sheet.width} x ${config.sheet.height} sheet`);
    }
    if (typeof config.debugOverlay !== "boolean") {
        throw new ConfigurationError("debugOverlay", `expected a boolean, got ${String(config.debugOverlay)}`);
    }

    return Object.freeze({ ...config, sheet: Object.freeze({ ...config.sheet }) });
}

/** Fills unset fields from the defaults and validates the result. */
export function resolveConfig(input: LayoutConfigInput = {}): LayoutConfig {
    return validateConfig({
        ...DEFAULT_LAYOUT_CONFIG,
        ...input,
        sheet: { ...DEFAULT_LAYOUT_CONFIG.sheet, ...input.sheet },
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string, field: string): number | undefined {
    const value = source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number") {
        throw new ConfigurationError(field, `expected a number, got ${JSON.stringify(value)}`);
    }
    return value;
}

/** Parses the YAML form of a layout configuration into a partial config. */
export function parseConfigYaml(content: string, source = "layout config"): LayoutConfigInput {
    let doc: unknown;
    try {
        doc = yaml.load(content);
    } catch (e) {
        throw new ConfigurationError(source, `could not parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (doc === undefined || doc === null) return {};
    if (!isRecord(doc)) {
        throw new ConfigurationError(source, "expected a mapping at the top level");
    }

    const input: LayoutConfigInput = {};
    for (const key of NUMERIC_FIELDS) {
        const value = readNumber(doc, key, key);
        if (value !== undefined) input[key] = value;
    }

    if (doc.proposal !== undefined) {
        const proposal = PROPOSAL_STRATEGIES.find(p => p === doc.proposal);
        if (!proposal) {
            throw new ConfigurationError("proposal", `expected one of ${PROPOSAL_STRATEGIES.join(", ")}, got ${JSON.stringify(doc.proposal)}`);
        }
        input.proposal = proposal;
    }

    if (doc.debugOverlay !== undefined) {
        if (typeof doc.debugOverlay !== "boolean") {
            throw new ConfigurationError("debugOverlay", `expected a boolean, got ${JSON.stringify(doc.debugOverlay)}`);
        }
        input.debugOverlay = doc.debugOverlay;
    }

    if (doc.sheet !== undefined) {
        if (!isRecord(doc.sheet)) {
            throw new ConfigurationError("sheet", "expected a mapping with width, height and margin");
        }
        const sheet: Partial<SheetConfig> = {};
        for (const key of SHEET_FIELDS) {
            const value = readNumber(doc.sheet, key, `sheet.${key}`);
            if (value !== undefined) sheet[key] = value;
        }
        input.sheet = sheet;
    }

    return input;
}

/** Applies LAYOUT_* environment overrides on top of a partial config. */
export function applyEnvOverrides(input: LayoutConfigInput, env: NodeJS.ProcessEnv = process.env): LayoutConfigInput {
    const result: LayoutConfigInput = { ...input };
    for (const [name, field] of Object.entries(ENV_OVERRIDES)) {
        const raw = env[name];
        if (raw === undefined || raw.trim() === "") continue;
        const value = Number(raw);
        if (!Number.isFinite(value)) {
            throw new ConfigurationError(field, `${name}=${raw} is not a number`);
        }
        result[field] = value;
    }

    const overlay = env.LAYOUT_DEBUG_OVERLAY?.trim().toLowerCase();
    if (overlay) {
        if (overlay === "1" || overlay === "true") result.debugOverlay = true;
        else if (overlay === "0" || overlay === "false") result.debugOverlay = false;
        else throw new ConfigurationError("debugOverlay", `LAYOUT_DEBUG_OVERLAY=${env.LAYOUT_DEBUG_OVERLAY} is not one of 1, 0, true, false`);
    }
    return result;
}

/**
 * Loads the layout configuration.
 * Priority: LAYOUT_* env vars -> YAML file -> defaults.
 * The file is the argument, else $LAYOUT_CONFIG; a missing explicit file is an error.
 */
export function loadLayoutConfig(file?: string, env: NodeJS.ProcessEnv = process.env): LayoutConfig {
    const configPath = file ?? env.LAYOUT_CONFIG;
    let input: LayoutConfigInput = {};

    if (configPath) {
        const resolved = path.resolve(env.INIT_CWD || process.cwd(), configPath);
        if (!fs.existsSync(resolved)) {
            throw new ConfigurationError("file", `layout config not found: ${resolved}`);
        }
        input = parseConfigYaml(fs.readFileSync(resolved, "utf-8"), resolved);
    }

    return resolveConfig(applyEnvOverrides(input, env));
}
