import { MetricsError } from "./errors";
import { Logger } from "./types";

export interface TextSize {
    width: number;
    height: number;
}

/** Number of rendered characters, counted as code points. */
export function characterCount(text: string): number {
    return Array.from(text).length;
}

/**
 * Approximate rendered width of a label.
 *
 * This is a fixed glyph-aspect approximation, not a font lookup: every
 * character is `textHeight * widthRatio` wide.
 */
export function labelWidth(text: string, textHeight: number, widthRatio: number): number {
    return characterCount(text) * textHeight * widthRatio;
}

/**
 * Measures labels with the text height and width ratio of one layout
 * configuration. Malformed labels measure as zero width.
 */
export class TextMetrics {
    readonly errors: MetricsError[] = [];

    constructor(
        readonly textHeight: number,
        readonly widthRatio: number,
        private logger: Logger = console,
    ) { }

    width(text: unknown): number {
        if (typeof text !== "string") {
            const err = new MetricsError(`Cannot measure label of type ${text === null ? "null" : typeof text}, using zero width`, text);
            this.errors.push(err);
            this.logger.warn(`⚠️  ${err.message}`);
            return 0;
        }
        return labelWidth(text, this.textHeight, this.widthRatio);
    }

    measure(text: unknown): TextSize {
        return { width: this.width(text), height: this.textHeight };
    }

    /** Size of a block of stacked lines; empty lines are skipped. */
    measureLines(lines: unknown[]): TextSize {
        const present = lines.filter(l => l !== "" && l !== undefined);
        let width = 0;
        for (const line of present) {
            width = Math.max(width, this.width(line));
        }
        return { width, height: present.length * this.textHeight };
    }
}
