import { Rect } from "./geometry";

/** Anything with an id and a box that takes part in collision checks. */
export interface Collidable {
    readonly id: string;
    readonly box: Rect;
}

export interface ConflictPair {
    a: string;
    b: string;
}

export interface CollisionStats {
    totalSymbols: number;
    totalCollisions: number;
    /** Colliding pairs over all pairs; 0 for fewer than two symbols */
    collisionRate: number;
    /** Smallest edge-to-edge gap between any two boxes; negative when they overlap; null for fewer than two */
    minSpacing: number | null;
}

/**
 * Depth by which the projections of two boxes intersect on each axis.
 * Negative values are gaps.
 */
export function intersectionDepth(a: Rect, b: Rect): { x: number; y: number } {
    return {
        x: Math.min(a.maxX, b.maxX) - Math.max(a.minX, b.minX),
        y: Math.min(a.maxY, b.maxY) - Math.max(a.minY, b.minY),
    };
}

/**
 * Two boxes overlap iff their projections intersect by more than the
 * tolerance on both axes. With tolerance 0, edges may touch.
 */
export function overlaps(a: Rect, b: Rect, tolerance = 0): boolean {
    const depth = intersectionDepth(a, b);
    return depth.x > tolerance && depth.y > tolerance;
}

/** Ids of the items whose boxes overlap the given box, in input order. */
export function conflictsWith(box: Rect, others: Iterable<Collidable>, tolerance = 0): string[] {
    const ids: string[] = [];
    for (const other of others) {
        if (overlaps(box, other.box, tolerance)) ids.push(other.id);
    }
    return ids;
}

/**
 * Every conflicting pair, ordered by the position of the first item and then
 * the second in the input.
 */
export function findConflicts(items: Iterable<Collidable>, tolerance = 0): ConflictPair[] {
    const list = Array.from(items);
    const pairs: ConflictPair[] = [];
    for (let i = 0; i < list.length; i++) {
        for (let j = i + 1; j < list.length; j++) {
            if (overlaps(list[i].box, list[j].box, tolerance)) {
                pairs.push({ a: list[i].id, b: list[j].id });
            }
        }
    }
    return pairs;
}

/** Edge-to-edge gap between two boxes: the larger axis gap, negative when they overlap. */
export function spacing(a: Rect, b: Rect): number {
    const depth = intersectionDepth(a, b);
    return Math.max(-depth.x, -depth.y);
}

export function collisionStats(items: Iterable<Collidable>, tolerance = 0): CollisionStats {
    const list = Array.from(items);
    const totalPairs = list.length * (list.length - 1) / 2;
    const totalCollisions = findConflicts(list, tolerance).length;

    let minSpacing: number | null = null;
    for (let i = 0; i < list.length; i++) {
        for (let j = i + 1; j < list.length; j++) {
            const s = spacing(list[i].box, list[j].box);
            if (minSpacing === null || s < minSpacing) minSpacing = s;
        }
    }

    return {
        totalSymbols: list.length,
        totalCollisions,
        collisionRate: totalPairs > 0 ? totalCollisions / totalPairs : 0,
        minSpacing,
    };
}
