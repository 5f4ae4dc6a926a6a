import { SymbolInstance } from "./types";

export interface DuplicateDesignator {
  designator: string;
  /** Positions in the input list, first occurrence included */
  indices: number[];
}

export interface Renaming {
  index: number;
  from: string;
  to: string;
}

export interface AnnotationResult {
  instances: SymbolInstance[];
  renamed: Renaming[];
}

const DESIGNATOR = /^(.*?)(\d+|\?)?$/;

function splitDesignator(designator: string): { prefix: string; number: number | null } {
  const match = DESIGNATOR.exec(designator);
  const prefix = match ? match[1] : designator;
  const digits = match?.[2];
  return { prefix, number: digits && digits !== "?" ? parseInt(digits, 10) : null };
}

/** Designators used more than once, in order of first appearance. */
export function findDuplicateDesignators(instances: SymbolInstance[]): DuplicateDesignator[] {
  const seen = new Map<string, number[]>();
  instances.forEach((instance, i) => {
    const indices = seen.get(instance.designator);
    if (indices) indices.push(i);
    else seen.set(instance.designator, [i]);
  });
  return Array.from(seen.entries())
    .filter(([, indices]) => indices.length > 1)
    .map(([designator, indices]) => ({ designator, indices }));
}

/**
 * Gives every instance a unique designator.
 *
 * The first occurrence of a numbered designator keeps it. Later duplicates
 * and placeholders such as `R?` get the lowest number not yet used for their
 * prefix. Instances without an explicit id follow their new designator.
 */
export function annotateDesignators(instances: SymbolInstance[]): AnnotationResult {
  const taken = new Set<string>();
  const keep = new Set<number>();
  const counts = new Map<string, number>();
  for (const instance of instances) {
    counts.set(instance.designator, (counts.get(instance.designator) ?? 0) + 1);
  }

  instances.forEach((instance, i) => {
    const { designator } = instance;
    if (designator.endsWith("?") || taken.has(designator)) return;
    // unnumbered designators are only kept when unique
    const numbered = splitDesignator(designator).number !== null;
    if (numbered || counts.get(designator) === 1) {
      taken.add(designator);
      keep.add(i);
    }
  });

  const nextFree = new Map<string, number>();
  const renamed: Renaming[] = [];
  const result = instances.map((instance, i) => {
    if (keep.has(i)) return instance;

    const { prefix } = splitDesignator(instance.designator);
    let n = nextFree.get(prefix) ?? 1;
    while (taken.has(`${prefix}${n}`)) n++;
    const designator = `${prefix}${n}`;
    taken.add(designator);
    nextFree.set(prefix, n + 1);

    renamed.push({ index: i, from: instance.designator, to: designator });
    return { ...instance, designator };
  });

  return { instances: result, renamed };
}
