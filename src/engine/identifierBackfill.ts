/**
 * Deterministic identifiers for elements a document leaves unidentified.
 *
 * Lines without an id get one derived from their geometry, so decoding the
 * same document twice yields the same ids. Collisions are resolved by
 * salting the seed with an increasing suffix.
 */
import { formatNumber } from '../schema/attributeTable';
import type { ElementDraft, LinePoint } from '../types/pathway';

/** 32-bit polynomial (multiplier 31) hash over UTF-16 code units. */
export function stringHash(value: string): number {
    let hash = 0;
    for (let i = 0; i < value.length; i++) {
        hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
    }
    return hash;
}

/** `id` + unsigned hex hash of `seed_i`, for the first i whose id is free. */
export function deriveId(seed: string, isTaken: (id: string) => boolean): string {
    for (let salt = 1; ; salt++) {
        const candidate = `id${(stringHash(`${seed}_${salt}`) >>> 0).toString(16)}`;
        if (!isTaken(candidate)) return candidate;
    }
}

/** Start/end coordinates and arrowheads of a line, concatenated. */
export function lineSeed(
    points: readonly LinePoint[],
    startArrowHead: string,
    endArrowHead: string,
): string {
    const start = points[0];
    const end = points[points.length - 1];
    const coordinates = start && end ? [start.x, start.y, end.x, end.y].map(formatNumber).join('') : '';
    return `${coordinates}${startArrowHead}${endArrowHead}`;
}

/**
 * Give every id-less line draft a derived id. Ids handed out here count as
 * taken for the following lines. Returns how many ids were assigned.
 */
export function backfillLineIds(drafts: ElementDraft[], isTaken: (id: string) => boolean): number {
    const assigned = new Set<string>();
    const taken = (id: string) => assigned.has(id) || isTaken(id);
    let count = 0;
    for (const draft of drafts) {
        if (draft.kind !== 'Interaction' && draft.kind !== 'GraphicalLine') continue;
        if (draft.elementId) continue;
        const id = deriveId(lineSeed(draft.points, draft.startArrowHead.name, draft.endArrowHead.name), taken);
        draft.elementId = id;
        assigned.add(id);
        count++;
    }
    return count;
}
