/**
 * Geometry of linked elements.
 *
 * Bound line endpoints are stored relative to their target: (0, 0) is the
 * target's center and ±1 its edges. Absolute coordinates of bound endpoints
 * are always derived from the target through this module.
 */
import type { LineElement, PathwayElement } from '../types/pathway';
import { isLineElement } from '../types/pathway';
import { GroupTypes } from '../types/vocabulary';

export interface Bounds {
    centerX: number;
    centerY: number;
    width: number;
    height: number;
}

export interface Point2D {
    x: number;
    y: number;
}

export interface RelativePoint {
    relX: number;
    relY: number;
}

/** Padding added around member bounds of a plain group. */
export const GROUP_MARGIN = 8;
/** Padding added around member bounds of a Complex group. */
export const COMPLEX_GROUP_MARGIN = 12;

/** Axis-aligned bounds of a rectangle rotated about its center. */
export function rotatedBounds(bounds: Bounds, rotation: number): Bounds {
    if (rotation === 0) return { ...bounds };
    const cos = Math.abs(Math.cos(rotation));
    const sin = Math.abs(Math.sin(rotation));
    return {
        centerX: bounds.centerX,
        centerY: bounds.centerY,
        width: bounds.width * cos + bounds.height * sin,
        height: bounds.width * sin + bounds.height * cos,
    };
}

/** Project an absolute point into the [-1, 1] frame of `bounds`. */
export function toRelative(bounds: Bounds, point: Point2D): RelativePoint {
    const dx = point.x - bounds.centerX;
    const dy = point.y - bounds.centerY;
    return {
        relX: dx !== 0 && bounds.width !== 0 ? dx / (bounds.width / 2) : 0,
        relY: dy !== 0 && bounds.height !== 0 ? dy / (bounds.height / 2) : 0,
    };
}

export function toAbsolute(bounds: Bounds, rel: RelativePoint): Point2D {
    return {
        x: bounds.centerX + (rel.relX * bounds.width) / 2,
        y: bounds.centerY + (rel.relY * bounds.height) / 2,
    };
}

/** Point at `position` (0..1) of the total length along a polyline. */
export function pointAlongPolyline(points: Point2D[], position: number): Point2D {
    if (points.length === 0) return { x: 0, y: 0 };
    if (points.length === 1) return { ...points[0] };

    const segments: number[] = [];
    let total = 0;
    for (let i = 1; i < points.length; i++) {
        const length = Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y);
        segments.push(length);
        total += length;
    }
    if (total === 0) return { ...points[0] };

    let remaining = Math.min(Math.max(position, 0), 1) * total;
    for (let i = 0; i < segments.length; i++) {
        const length = segments[i];
        if (remaining <= length || i === segments.length - 1) {
            const t = length === 0 ? 0 : Math.min(remaining / length, 1);
            const start = points[i];
            const end = points[i + 1];
            return { x: start.x + (end.x - start.x) * t, y: start.y + (end.y - start.y) * t };
        }
        remaining -= length;
    }
    return { ...points[points.length - 1] };
}

export function unionBounds(list: Bounds[]): Bounds | null {
    if (list.length === 0) return null;
    let left = Infinity;
    let top = Infinity;
    let right = -Infinity;
    let bottom = -Infinity;
    for (const b of list) {
        left = Math.min(left, b.centerX - b.width / 2);
        top = Math.min(top, b.centerY - b.height / 2);
        right = Math.max(right, b.centerX + b.width / 2);
        bottom = Math.max(bottom, b.centerY + b.height / 2);
    }
    return {
        centerX: (left + right) / 2,
        centerY: (top + bottom) / 2,
        width: right - left,
        height: bottom - top,
    };
}

/* ------------------------------------------------------------------ */
/*  Resolution against a document's elements                          */
/* ------------------------------------------------------------------ */

export type LinkTarget =
    | { kind: 'shape'; bounds: Bounds }
    | { kind: 'anchor'; point: Point2D };

/**
 * Resolves bounds and endpoint positions over one snapshot of elements.
 * Build a new context after the elements change.
 */
export class GeometryContext {
    private anchorIndex: Map<string, { line: LineElement; index: number }> | null = null;
    private readonly resolving = new Set<string>();

    constructor(private readonly elements: Record<string, PathwayElement>) {}

    /** Rotated bounds of a shaped element; States resolve through their DataNode. */
    shapeBounds(id: string): Bounds | null {
        const element = this.elements[id];
        if (!element || isLineElement(element)) return null;
        if (element.kind === 'State') {
            const parent = element.elementRef ? this.elements[element.elementRef] : undefined;
            if (parent && parent.kind === 'DataNode') {
                return rotatedBounds(
                    {
                        centerX: parent.centerX + (element.relX * parent.width) / 2,
                        centerY: parent.centerY + (element.relY * parent.height) / 2,
                        width: element.width,
                        height: element.height,
                    },
                    element.rotation,
                );
            }
        }
        return rotatedBounds(element, element.rotation);
    }

    findAnchor(id: string): { line: LineElement; index: number } | null {
        if (!this.anchorIndex) {
            this.anchorIndex = new Map();
            for (const element of Object.values(this.elements)) {
                if (!isLineElement(element)) continue;
                element.anchors.forEach((anchor, index) => {
                    if (anchor.elementId) this.anchorIndex?.set(anchor.elementId, { line: element, index });
                });
            }
        }
        return this.anchorIndex.get(id) ?? null;
    }

    linkTarget(ref: string): LinkTarget | null {
        const bounds = this.shapeBounds(ref);
        if (bounds) return { kind: 'shape', bounds };
        const anchor = this.findAnchor(ref);
        if (!anchor) return null;
        return { kind: 'anchor', point: this.anchorPosition(anchor.line, anchor.index) };
    }

    anchorPosition(line: LineElement, index: number): Point2D {
        const points = line.points.map((_, i) => this.absolutePoint(line, i));
        return pointAlongPolyline(points, line.anchors[index].position);
    }

    /** Derived absolute position of a line point; stored x/y when unbound. */
    absolutePoint(line: LineElement, index: number): Point2D {
        const point = line.points[index];
        if (!point.elementRef) return { x: point.x, y: point.y };

        const key = `${line.elementId}:${index}`;
        if (this.resolving.has(key)) return { x: point.x, y: point.y };
        this.resolving.add(key);
        try {
            const target = this.linkTarget(point.elementRef);
            if (!target) return { x: point.x, y: point.y };
            if (target.kind === 'anchor') return target.point;
            if (point.relX === null || point.relY === null) return { x: point.x, y: point.y };
            return toAbsolute(target.bounds, { relX: point.relX, relY: point.relY });
        } finally {
            this.resolving.delete(key);
        }
    }

    /** Bounds of a group computed from its members, with the group margin. */
    memberBounds(groupId: string, complex: boolean, visited = new Set<string>()): Bounds | null {
        visited.add(groupId);
        const parts: Bounds[] = [];
        for (const element of Object.values(this.elements)) {
            if (!('groupRef' in element) || element.groupRef !== groupId) continue;
            if (isLineElement(element)) {
                const points = element.points.map((_, i) => this.absolutePoint(element, i));
                if (points.length === 0) continue;
                const xs = points.map((p) => p.x);
                const ys = points.map((p) => p.y);
                const left = Math.min(...xs);
                const top = Math.min(...ys);
                parts.push({
                    centerX: (left + Math.max(...xs)) / 2,
                    centerY: (top + Math.max(...ys)) / 2,
                    width: Math.max(...xs) - left,
                    height: Math.max(...ys) - top,
                });
            } else if (element.kind === 'Group') {
                if (visited.has(element.elementId)) continue;
                const nested = this.memberBounds(
                    element.elementId,
                    GroupTypes.is(element.type, 'Complex'),
                    visited,
                );
                if (nested) parts.push(nested);
            } else {
                const bounds = this.shapeBounds(element.elementId);
                if (bounds) parts.push(bounds);
            }
        }
        const union = unionBounds(parts);
        if (!union) return null;
        const margin = complex ? COMPLEX_GROUP_MARGIN : GROUP_MARGIN;
        return {
            centerX: union.centerX,
            centerY: union.centerY,
            width: union.width + 2 * margin,
            height: union.height + 2 * margin,
        };
    }
}
