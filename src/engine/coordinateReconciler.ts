/**
 * Keeps stored coordinates of bound points consistent with their targets.
 *
 * A bound line point is authoritative in its relative form; its absolute
 * x/y is a cache. Documents that only carry the absolute form get the
 * relative one filled from the target's current bounds.
 */
import type { PathwayStore } from '../store/pathwayStore';
import type { LinePoint, PathwayElement } from '../types/pathway';
import { isLineElement } from '../types/pathway';
import { GroupTypes } from '../types/vocabulary';
import { GeometryContext, toRelative } from './geometry';

function samePoint(a: LinePoint, b: LinePoint): boolean {
    return a.x === b.x && a.y === b.y && a.relX === b.relX && a.relY === b.relY;
}

/** Fill missing relative coordinates of bound points; returns how many points changed. */
function fillRelative(store: PathwayStore): number {
    const state = store.getState();
    const geometry = new GeometryContext(state.elements);
    let filled = 0;

    for (const element of state.getElements()) {
        if (!isLineElement(element)) continue;
        const points = element.points.map((point) => {
            if (point.elementRef === null) return point;
            if (point.relX !== null && point.relY !== null) return point;
            const target = geometry.linkTarget(point.elementRef);
            if (!target) return point;
            filled++;
            if (target.kind === 'anchor') return { ...point, relX: 0, relY: 0 };
            return { ...point, ...toRelative(target.bounds, { x: point.x, y: point.y }) };
        });
        if (points.some((point, i) => point !== element.points[i])) {
            store.getState().updateElement(element.elementId, (current) =>
                isLineElement(current) ? { ...current, points } : current,
            );
        }
    }
    return filled;
}

/** Rewrite cached absolute positions from the relative form. */
function syncAbsolute(store: PathwayStore): void {
    const state = store.getState();
    const geometry = new GeometryContext(state.elements);

    for (const element of state.getElements()) {
        let next: PathwayElement = element;
        if (isLineElement(element)) {
            const points = element.points.map((point, index) => {
                if (point.elementRef === null) return point;
                const derived = { ...point, ...geometry.absolutePoint(element, index) };
                return samePoint(derived, point) ? point : derived;
            });
            if (points.some((point, i) => point !== element.points[i])) next = { ...element, points };
        } else if (element.kind === 'State' && element.elementRef !== null) {
            const bounds = geometry.shapeBounds(element.elementId);
            if (bounds && (bounds.centerX !== element.centerX || bounds.centerY !== element.centerY)) {
                next = { ...element, centerX: bounds.centerX, centerY: bounds.centerY };
            }
        }
        if (next !== element) {
            const replacement = next;
            store.getState().updateElement(element.elementId, () => replacement);
        }
    }
}

/**
 * Reconcile every bound point and State of a store. Returns the number of
 * points whose relative coordinates had to be filled in.
 */
export function reconcileCoordinates(store: PathwayStore): number {
    const filled = fillRelative(store);
    syncAbsolute(store);
    return filled;
}

/**
 * Size groups to their members. The older schema stores no group geometry,
 * so it is recomputed after decoding.
 */
export function applyGroupBounds(store: PathwayStore): number {
    let sized = 0;
    for (const element of store.getState().getElements()) {
        if (element.kind !== 'Group') continue;
        const geometry = new GeometryContext(store.getState().elements);
        const bounds = geometry.memberBounds(element.elementId, GroupTypes.is(element.type, 'Complex'));
        if (!bounds) continue;
        store.getState().updateElement(element.elementId, (current) =>
            current.kind === 'Group' ? { ...current, ...bounds } : current,
        );
        sized++;
    }
    return sized;
}
