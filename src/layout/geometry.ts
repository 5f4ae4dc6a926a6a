export interface Point {
    x: number;
    y: number;
}

/** Axis-aligned rectangle in sheet millimetres (Y grows downward). */
export interface Rect {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export type Rotation = 0 | 90 | 180 | 270;

export type Orientation = "up" | "down" | "left" | "right";

const ROTATIONS: Record<Rotation, { cos: number; sin: number }> = {
    0: { cos: 1, sin: 0 },
    90: { cos: 0, sin: 1 },
    180: { cos: -1, sin: 0 },
    270: { cos: 0, sin: -1 },
};

const DIRECTIONS: Record<Orientation, Point> = {
    right: { x: 1, y: 0 },
    left: { x: -1, y: 0 },
    up: { x: 0, y: -1 },
    down: { x: 0, y: 1 },
};

// -0 compares unequal to 0 under Object.is
function unsigned(value: number): number {
    return value === 0 ? 0 : value;
}

/**
 * Normalizes any multiple of 90 degrees to 0/90/180/270.
 * Returns null for anything else.
 */
export function normalizeRotation(degrees: number): Rotation | null {
    if (!Number.isFinite(degrees) || degrees % 90 !== 0) return null;
    const r = ((degrees % 360) + 360) % 360;
    switch (r) {
        case 0: return 0;
        case 90: return 90;
        case 180: return 180;
        case 270: return 270;
        default: return null;
    }
}

/** Rotates a point about the origin. Exact for the four cardinal rotations. */
export function rotatePoint(p: Point, rotation: Rotation): Point {
    const { cos, sin } = ROTATIONS[rotation];
    return {
        x: unsigned(p.x * cos - p.y * sin),
        y: unsigned(p.x * sin + p.y * cos),
    };
}

export function direction(orientation: Orientation): Point {
    return DIRECTIONS[orientation];
}

export function translatePoint(p: Point, by: Point): Point {
    return { x: p.x + by.x, y: p.y + by.y };
}

export function rectFromPoints(points: Point[]): Rect {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const p of points) {
        if (p.x < minX) minX = p.x;
        if (p.x > maxX) maxX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.y > maxY) maxY = p.y;
    }
    return { minX, minY, maxX, maxY };
}

export function rectCorners(r: Rect): Point[] {
    return [
        { x: r.minX, y: r.minY },
        { x: r.maxX, y: r.minY },
        { x: r.maxX, y: r.maxY },
        { x: r.minX, y: r.maxY },
    ];
}

export function rotateRect(r: Rect, rotation: Rotation): Rect {
    return rectFromPoints(rectCorners(r).map(p => rotatePoint(p, rotation)));
}

export function unionRects(rects: Rect[]): Rect | null {
    if (rects.length === 0) return null;
    let { minX, minY, maxX, maxY } = rects[0];
    for (const r of rects) {
        if (r.minX < minX) minX = r.minX;
        if (r.minY < minY) minY = r.minY;
        if (r.maxX > maxX) maxX = r.maxX;
        if (r.maxY > maxY) maxY = r.maxY;
    }
    return { minX, minY, maxX, maxY };
}

export function translateRect(r: Rect, by: Point): Rect {
    return {
        minX: r.minX + by.x,
        minY: r.minY + by.y,
        maxX: r.maxX + by.x,
        maxY: r.maxY + by.y,
    };
}

export function expandRect(r: Rect, margin: number): Rect {
    return {
        minX: r.minX - margin,
        minY: r.minY - margin,
        maxX: r.maxX + margin,
        maxY: r.maxY + margin,
    };
}

export function rectWidth(r: Rect): number {
    return r.maxX - r.minX;
}

export function rectHeight(r: Rect): number {
    return r.maxY - r.minY;
}

export function rectCenter(r: Rect): Point {
    return { x: (r.minX + r.maxX) / 2, y: (r.minY + r.maxY) / 2 };
}

/** Rectangle of the given size centred on a point. */
export function rectAround(center: Point, width: number, height: number): Rect {
    return {
        minX: center.x - width / 2,
        minY: center.y - height / 2,
        maxX: center.x + width / 2,
        maxY: center.y + height / 2,
    };
}

export function containsPoint(r: Rect, p: Point): boolean {
    return p.x >= r.minX && p.x <= r.maxX && p.y >= r.minY && p.y <= r.maxY;
}

export function containsRect(outer: Rect, inner: Rect): boolean {
    return inner.minX >= outer.minX && inner.maxX <= outer.maxX &&
        inner.minY >= outer.minY && inner.maxY <= outer.maxY;
}

export function snap(value: number, step: number): number {
    return unsigned(Math.round(value / step) * step);
}

/** Smallest multiple of step that is >= value, ignoring float noise. */
export function snapUp(value: number, step: number): number {
    return unsigned(Math.ceil(value / step - 1e-9) * step);
}

export function isFinitePoint(p: Point): boolean {
    return Number.isFinite(p.x) && Number.isFinite(p.y);
}
