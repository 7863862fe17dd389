/**
 * Zustand store: single source of truth for one pathway document.
 *
 * Every structural mutation goes through the actions below so the private
 * identifier registry, the element map and the pools stay consistent.
 * Group membership and pool reference counts are derived on demand from the
 * back-references (`groupRef`, `*Ref` lists); nothing stores a forward list.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { DuplicateIdError } from '../errors';
import { GeometryContext, toRelative } from '../engine/geometry';
import { Logger } from '../services/logger';
import type {
    Annotation,
    AnnotationRef,
    Citation,
    CitationRef,
    DanglingReference,
    ElementDraft,
    ElementInfo,
    Evidence,
    EvidenceRef,
    Group,
    LineElement,
    Pathway,
    PathwayElement,
    PathwayObject,
    PoolKind,
    Xref,
} from '../types/pathway';
import { isLineElement } from '../types/pathway';
import { sameTerm } from '../types/vocabulary';
import { IdentifierRegistry, describeOwner } from './identifierRegistry';
import {
    createPathway,
    type AnnotationDraft,
    type CitationDraft,
    type EvidenceDraft,
} from './elementFactory';

/* ------------------------------------------------------------------ */
/*  State                                                             */
/* ------------------------------------------------------------------ */

export type ChangeType = 'add' | 'remove' | 'modify' | 'pathway' | 'pool';

/** Structural-change event published through `subscribe`. */
export interface PathwayChange {
    type: ChangeType;
    /** Affected identifier; null for pathway metadata. */
    id: string | null;
    revision: number;
}

export interface PathwayState {
    pathway: Pathway;
    /** All live elements, keyed by elementId. */
    elements: Record<string, PathwayElement>;
    /** Admission order of elements. */
    elementOrder: string[];
    annotations: Record<string, Annotation>;
    citations: Record<string, Citation>;
    evidences: Record<string, Evidence>;
    /** Incremented on every structural change. */
    revision: number;
    lastChange: PathwayChange | null;
}

/** Owner of a ref list: an element id, or null for the pathway itself. */
export type RefOwner = string | null;

export interface PathwayActions {
    /** Patch pathway metadata. */
    setPathway: (patch: Partial<Pathway>) => void;
    /** Admit an element; assigns an id when absent and returns it. */
    addElement: (draft: ElementDraft) => string;
    /** Replace an element through `updater`. The identifier cannot change. */
    updateElement: (id: string, updater: (element: PathwayElement) => PathwayElement) => boolean;
    /** Remove an element and clear every back-reference to it. */
    removeElement: (id: string) => boolean;
    /** Set or clear the group of an element. */
    setGroupRef: (id: string, groupId: string | null) => boolean;
    /** Bind a line point to an element or anchor, keeping its current position. */
    linkPoint: (lineId: string, index: number, targetId: string) => boolean;
    /** Release a bound line point at its derived position. */
    unlinkPoint: (lineId: string, index: number) => boolean;
    /** Add or reuse an annotation with identical content; returns its id. */
    addAnnotation: (draft: AnnotationDraft) => string;
    /** Add or reuse a citation with identical content; returns its id. */
    addCitation: (draft: CitationDraft) => string;
    /** Add or reuse an evidence with identical content; returns its id. */
    addEvidence: (draft: EvidenceDraft) => string;
    /** Remove an annotation when nothing refers to it. */
    removeAnnotation: (id: string) => boolean;
    /** Remove a citation when nothing refers to it. */
    removeCitation: (id: string) => boolean;
    /** Remove an evidence when nothing refers to it. */
    removeEvidence: (id: string) => boolean;
    addAnnotationRef: (owner: RefOwner, ref: AnnotationRef) => boolean;
    addCitationRef: (owner: RefOwner, ref: CitationRef) => boolean;
    addEvidenceRef: (owner: RefOwner, ref: EvidenceRef) => boolean;
    /** Number of refs, nested ones included, that point at a pool entry. */
    countReferences: (poolId: string) => number;
    /** Clear dangling group, element and alias references; returns how many. */
    fixReferences: () => number;
    /** List dangling references without changing anything. */
    danglingReferences: () => DanglingReference[];
    /** Assign ids to line points and anchors that lack one; returns how many. */
    ensureIds: () => number;
    /** Remove groups without members; returns the removed ids. */
    removeEmptyGroups: () => string[];
    /** Resolve any identifier of this document. */
    lookup: (id: string) => PathwayObject | null;
    /** Whether an id is live or was ever issued in this document. */
    isIdTaken: (id: string) => boolean;
    /** Reserve a fresh identifier. */
    allocateId: () => string;
    /** Elements whose groupRef is `groupId`, in admission order. */
    getMembers: (groupId: string) => PathwayElement[];
    /** All elements in admission order. */
    getElements: () => PathwayElement[];
}

export type PathwayStoreState = PathwayState & PathwayActions;
export type PathwayStore = StoreApi<PathwayStoreState>;

/* ------------------------------------------------------------------ */
/*  Helpers for ref lists                                             */
/* ------------------------------------------------------------------ */

function countInAnnotationRefs(refs: AnnotationRef[], counts: Map<string, number>): void {
    for (const ref of refs) {
        counts.set(ref.annotationId, (counts.get(ref.annotationId) ?? 0) + 1);
        countInCitationRefs(ref.citationRefs, counts);
        countInEvidenceRefs(ref.evidenceRefs, counts);
    }
}

function countInCitationRefs(refs: CitationRef[], counts: Map<string, number>): void {
    for (const ref of refs) {
        counts.set(ref.citationId, (counts.get(ref.citationId) ?? 0) + 1);
        countInAnnotationRefs(ref.annotationRefs, counts);
    }
}

function countInEvidenceRefs(refs: EvidenceRef[], counts: Map<string, number>): void {
    for (const ref of refs) {
        counts.set(ref.evidenceId, (counts.get(ref.evidenceId) ?? 0) + 1);
    }
}

function countRefs(owners: ElementInfo[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const owner of owners) {
        countInAnnotationRefs(owner.annotationRefs, counts);
        countInCitationRefs(owner.citationRefs, counts);
        countInEvidenceRefs(owner.evidenceRefs, counts);
    }
    return counts;
}

function sameXref(a: Xref | null, b: Xref | null): boolean {
    if (a === null || b === null) return a === b;
    return a.identifier === b.identifier && a.dataSource === b.dataSource;
}

function sameAnnotation(a: AnnotationDraft, b: AnnotationDraft): boolean {
    return (
        a.value === b.value &&
        sameTerm(a.type, b.type) &&
        sameXref(a.xref, b.xref) &&
        a.urlLink === b.urlLink
    );
}

function sameCitation(a: CitationDraft, b: CitationDraft): boolean {
    return (
        sameXref(a.xref, b.xref) &&
        a.urlLink === b.urlLink &&
        a.title === b.title &&
        a.source === b.source &&
        a.year === b.year &&
        a.authors.length === b.authors.length &&
        a.authors.every((author, i) => author === b.authors[i])
    );
}

function sameEvidence(a: EvidenceDraft, b: EvidenceDraft): boolean {
    return a.value === b.value && sameXref(a.xref, b.xref) && a.urlLink === b.urlLink;
}

/** Point and anchor ids carried by a line. */
function lineSubIds(element: ElementDraft | PathwayElement): string[] {
    if (element.kind !== 'Interaction' && element.kind !== 'GraphicalLine') return [];
    const ids: string[] = [];
    for (const point of element.points) if (point.elementId) ids.push(point.elementId);
    for (const anchor of element.anchors) if (anchor.elementId) ids.push(anchor.elementId);
    return ids;
}

function withId(draft: ElementDraft, elementId: string): PathwayElement {
    return { ...draft, elementId };
}

function omitKey<T>(record: Record<string, T>, key: string): Record<string, T> {
    const next = { ...record };
    delete next[key];
    return next;
}

function poolEntryExists(state: PathwayState, kind: PoolKind, id: string): boolean {
    switch (kind) {
        case 'annotation':
            return id in state.annotations;
        case 'citation':
            return id in state.citations;
        case 'evidence':
            return id in state.evidences;
    }
}

function withoutPoolEntry(state: PathwayState, kind: PoolKind, id: string): Partial<PathwayState> {
    switch (kind) {
        case 'annotation':
            return { annotations: omitKey(state.annotations, id) };
        case 'citation':
            return { citations: omitKey(state.citations, id) };
        case 'evidence':
            return { evidences: omitKey(state.evidences, id) };
    }
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createPathwayStore(pathway: Pathway = createPathway()): PathwayStore {
    return createStore<PathwayStoreState>((set, get) => {
        const registry = new IdentifierRegistry();

        const nextChange = (state: PathwayState, type: ChangeType, id: string | null) => ({
            revision: state.revision + 1,
            lastChange: { type, id, revision: state.revision + 1 },
        });

        /** Fail before touching the registry when any id is taken. */
        const assertIdsFree = (ids: string[], ignore: ReadonlySet<string> = new Set()): void => {
            const seen = new Set<string>();
            for (const id of ids) {
                if (ignore.has(id)) continue;
                const owner = registry.lookup(id);
                if (owner) throw new DuplicateIdError(id, describeOwner(owner));
                if (seen.has(id)) throw new DuplicateIdError(id, 'the same element');
                seen.add(id);
            }
        };

        const registerLineParts = (line: LineElement, only?: ReadonlySet<string>): void => {
            for (const point of line.points) {
                if (point.elementId && (!only || only.has(point.elementId))) {
                    registry.register(point.elementId, { kind: 'point', lineId: line.elementId });
                }
            }
            for (const anchor of line.anchors) {
                if (anchor.elementId && (!only || only.has(anchor.elementId))) {
                    registry.register(anchor.elementId, { kind: 'anchor', lineId: line.elementId });
                }
            }
        };

        const poolOwners = (state: PathwayState): ElementInfo[] => [
            state.pathway,
            ...Object.values(state.elements),
        ];

        const addPoolEntry = <T extends { elementId: string }>(
            kind: PoolKind,
            draft: Omit<T, 'elementId'> & { elementId?: string | null },
            pool: Record<string, T>,
            same: (a: Omit<T, 'elementId'>, b: Omit<T, 'elementId'>) => boolean,
            build: (elementId: string) => T,
            write: (next: Record<string, T>) => Partial<PathwayState>,
        ): string => {
            for (const existing of Object.values(pool)) {
                if (same(existing, draft)) return existing.elementId;
            }
            const id = draft.elementId ? draft.elementId : registry.allocate();
            registry.register(id, { kind });
            set((state) => ({
                ...write({ ...pool, [id]: build(id) }),
                ...nextChange(state, 'pool', id),
            }));
            return id;
        };

        const removePoolEntry = (id: string, kind: PoolKind): boolean => {
            const state = get();
            if (!poolEntryExists(state, kind, id)) return false;
            if ((countRefs(poolOwners(state)).get(id) ?? 0) > 0) return false;
            registry.release(id);
            set((current) => ({
                ...withoutPoolEntry(current, kind, id),
                ...nextChange(current, 'pool', id),
            }));
            return true;
        };

        const addRef = (owner: RefOwner, apply: (info: ElementInfo) => ElementInfo): boolean => {
            if (owner === null) {
                set((state) => ({
                    pathway: { ...state.pathway, ...apply(state.pathway) },
                    ...nextChange(state, 'pathway', null),
                }));
                return true;
            }
            return get().updateElement(owner, (element) => ({ ...element, ...apply(element) }));
        };

        const isGroup = (id: string): boolean => {
            const owner = registry.lookup(id);
            return owner?.kind === 'element' && owner.elementKind === 'Group';
        };

        const isLinkTarget = (id: string): boolean => {
            const owner = registry.lookup(id);
            return owner?.kind === 'element' || owner?.kind === 'anchor';
        };

        return {
            // --- Initial state ---
            pathway,
            elements: {},
            elementOrder: [],
            annotations: {},
            citations: {},
            evidences: {},
            revision: 0,
            lastChange: null,

            // --- Actions ---

            setPathway(patch) {
                set((state) => ({
                    pathway: { ...state.pathway, ...patch },
                    ...nextChange(state, 'pathway', null),
                }));
            },

            addElement(draft) {
                const id = draft.elementId ? draft.elementId : registry.allocate();
                assertIdsFree([id, ...lineSubIds(draft)]);

                const element = withId(draft, id);
                registry.register(id, { kind: 'element', elementKind: element.kind });
                if (isLineElement(element)) registerLineParts(element);

                set((state) => ({
                    elements: { ...state.elements, [id]: element },
                    elementOrder: [...state.elementOrder, id],
                    ...nextChange(state, 'add', id),
                }));
                return id;
            },

            updateElement(id, updater) {
                const current = get().elements[id];
                if (!current) return false;
                const next = withId(updater(current), id);

                const before = new Set(lineSubIds(current));
                const after = lineSubIds(next);
                const added = after.filter((subId) => !before.has(subId));
                assertIdsFree(added);
                const afterSet = new Set(after);
                for (const subId of before) {
                    if (!afterSet.has(subId)) registry.release(subId);
                }
                if (isLineElement(next)) registerLineParts(next, new Set(added));
                if (next.kind !== current.kind) {
                    registry.release(id);
                    registry.register(id, { kind: 'element', elementKind: next.kind });
                }

                set((state) => ({
                    elements: { ...state.elements, [id]: next },
                    ...nextChange(state, 'modify', id),
                }));
                return true;
            },

            removeElement(id) {
                const state = get();
                const element = state.elements[id];
                if (!element) return false;

                const removed = new Set<string>([id]);
                if (element.kind === 'DataNode') {
                    for (const other of Object.values(state.elements)) {
                        if (other.kind === 'State' && other.elementRef === id) removed.add(other.elementId);
                    }
                }

                const targets = new Set<string>(removed);
                const released: string[] = [];
                for (const removedId of removed) {
                    released.push(removedId);
                    const removedElement = state.elements[removedId];
                    for (const subId of lineSubIds(removedElement)) {
                        released.push(subId);
                        targets.add(subId);
                    }
                }

                const geometry = new GeometryContext(state.elements);
                const elements: Record<string, PathwayElement> = {};
                for (const [otherId, other] of Object.entries(state.elements)) {
                    if (removed.has(otherId)) continue;
                    let next: PathwayElement = other;
                    if ('groupRef' in next && next.groupRef !== null && removed.has(next.groupRef)) {
                        next = { ...next, groupRef: null };
                    }
                    if (next.kind === 'DataNode' && next.aliasRef !== null && removed.has(next.aliasRef)) {
                        next = { ...next, aliasRef: null };
                    }
                    if (isLineElement(next)) {
                        const line = next;
                        if (line.points.some((p) => p.elementRef !== null && targets.has(p.elementRef))) {
                            next = {
                                ...line,
                                points: line.points.map((point, index) => {
                                    if (point.elementRef === null || !targets.has(point.elementRef)) return point;
                                    const absolute = geometry.absolutePoint(line, index);
                                    return { ...point, ...absolute, elementRef: null, relX: null, relY: null };
                                }),
                            };
                        }
                    }
                    elements[otherId] = next;
                }

                const before = countRefs(poolOwners(state));
                const remaining: PathwayState = { ...state, elements };
                const after = countRefs(poolOwners(remaining));
                const orphaned = [...before.keys()].filter((poolId) => !after.has(poolId));
                for (const releasedId of released) registry.release(releasedId);
                for (const poolId of orphaned) registry.release(poolId);

                let pools: Pick<PathwayState, 'annotations' | 'citations' | 'evidences'> = state;
                for (const poolId of orphaned) {
                    pools = {
                        annotations: omitKey(pools.annotations, poolId),
                        citations: omitKey(pools.citations, poolId),
                        evidences: omitKey(pools.evidences, poolId),
                    };
                }

                set((current) => ({
                    elements,
                    elementOrder: current.elementOrder.filter((orderId) => !removed.has(orderId)),
                    annotations: pools.annotations,
                    citations: pools.citations,
                    evidences: pools.evidences,
                    ...nextChange(current, 'remove', id),
                }));
                return true;
            },

            setGroupRef(id, groupId) {
                if (groupId !== null && !isGroup(groupId)) return false;
                const element = get().elements[id];
                if (!element || !('groupRef' in element)) return false;
                return get().updateElement(id, (current) =>
                    'groupRef' in current ? { ...current, groupRef: groupId } : current,
                );
            },

            linkPoint(lineId, index, targetId) {
                const state = get();
                const line = state.elements[lineId];
                if (!line || !isLineElement(line) || !line.points[index]) return false;
                const geometry = new GeometryContext(state.elements);
                const target = geometry.linkTarget(targetId);
                if (!target) return false;

                const absolute = geometry.absolutePoint(line, index);
                const linked =
                    target.kind === 'anchor'
                        ? { ...target.point, relX: 0, relY: 0 }
                        : { ...absolute, ...toRelative(target.bounds, absolute) };
                return get().updateElement(lineId, (current) =>
                    isLineElement(current)
                        ? {
                              ...current,
                              points: current.points.map((point, i) =>
                                  i === index ? { ...point, ...linked, elementRef: targetId } : point,
                              ),
                          }
                        : current,
                );
            },

            unlinkPoint(lineId, index) {
                const state = get();
                const line = state.elements[lineId];
                if (!line || !isLineElement(line) || !line.points[index]) return false;
                const absolute = new GeometryContext(state.elements).absolutePoint(line, index);
                return get().updateElement(lineId, (current) =>
                    isLineElement(current)
                        ? {
                              ...current,
                              points: current.points.map((point, i) =>
                                  i === index
                                      ? { ...point, ...absolute, elementRef: null, relX: null, relY: null }
                                      : point,
                              ),
                          }
                        : current,
                );
            },

            addAnnotation(draft) {
                return addPoolEntry<Annotation>(
                    'annotation',
                    draft,
                    get().annotations,
                    sameAnnotation,
                    (elementId) => ({ ...draft, elementId }),
                    (annotations) => ({ annotations }),
                );
            },

            addCitation(draft) {
                return addPoolEntry<Citation>(
                    'citation',
                    draft,
                    get().citations,
                    sameCitation,
                    (elementId) => ({ ...draft, elementId }),
                    (citations) => ({ citations }),
                );
            },

            addEvidence(draft) {
                return addPoolEntry<Evidence>(
                    'evidence',
                    draft,
                    get().evidences,
                    sameEvidence,
                    (elementId) => ({ ...draft, elementId }),
                    (evidences) => ({ evidences }),
                );
            },

            removeAnnotation(id) {
                return removePoolEntry(id, 'annotation');
            },

            removeCitation(id) {
                return removePoolEntry(id, 'citation');
            },

            removeEvidence(id) {
                return removePoolEntry(id, 'evidence');
            },

            addAnnotationRef(owner, ref) {
                if (!get().annotations[ref.annotationId]) return false;
                return addRef(owner, (info) => ({ ...info, annotationRefs: [...info.annotationRefs, ref] }));
            },

            addCitationRef(owner, ref) {
                if (!get().citations[ref.citationId]) return false;
                return addRef(owner, (info) => ({ ...info, citationRefs: [...info.citationRefs, ref] }));
            },

            addEvidenceRef(owner, ref) {
                if (!get().evidences[ref.evidenceId]) return false;
                return addRef(owner, (info) => ({ ...info, evidenceRefs: [...info.evidenceRefs, ref] }));
            },

            countReferences(poolId) {
                return countRefs(poolOwners(get())).get(poolId) ?? 0;
            },

            danglingReferences() {
                const dangling: DanglingReference[] = [];
                for (const id of get().elementOrder) {
                    const element = get().elements[id];
                    if ('groupRef' in element && element.groupRef !== null && !isGroup(element.groupRef)) {
                        dangling.push({ ownerId: id, field: 'groupRef', target: element.groupRef });
                    }
                    if (element.kind === 'DataNode' && element.aliasRef !== null && !isGroup(element.aliasRef)) {
                        dangling.push({ ownerId: id, field: 'aliasRef', target: element.aliasRef });
                    }
                    if (element.kind === 'State' && element.elementRef !== null && !isLinkTarget(element.elementRef)) {
                        dangling.push({ ownerId: id, field: 'elementRef', target: element.elementRef });
                    }
                    if (isLineElement(element)) {
                        element.points.forEach((point, pointIndex) => {
                            if (point.elementRef !== null && !isLinkTarget(point.elementRef)) {
                                dangling.push({
                                    ownerId: id,
                                    field: 'elementRef',
                                    target: point.elementRef,
                                    pointIndex,
                                });
                            }
                        });
                    }
                }
                return dangling;
            },

            fixReferences() {
                const dangling = get().danglingReferences();
                if (dangling.length === 0) return 0;

                const owners = new Set(dangling.map((ref) => ref.ownerId));
                for (const ownerId of owners) {
                    get().updateElement(ownerId, (element) => {
                        let next: PathwayElement = element;
                        if ('groupRef' in next && next.groupRef !== null && !isGroup(next.groupRef)) {
                            next = { ...next, groupRef: null };
                        }
                        if (next.kind === 'DataNode' && next.aliasRef !== null && !isGroup(next.aliasRef)) {
                            next = { ...next, aliasRef: null };
                        }
                        if (next.kind === 'State' && next.elementRef !== null && !isLinkTarget(next.elementRef)) {
                            next = { ...next, elementRef: null };
                        }
                        if (isLineElement(next)) {
                            next = {
                                ...next,
                                points: next.points.map((point) =>
                                    point.elementRef !== null && !isLinkTarget(point.elementRef)
                                        ? { ...point, elementRef: null, relX: null, relY: null }
                                        : point,
                                ),
                            };
                        }
                        return next;
                    });
                }

                Logger.warn('pathway.fixReferences', {
                    fixed: dangling.length,
                    targets: [...new Set(dangling.map((ref) => ref.target))],
                });
                return dangling.length;
            },

            ensureIds() {
                let assigned = 0;
                for (const id of get().elementOrder) {
                    const element = get().elements[id];
                    if (!isLineElement(element)) continue;
                    const missing =
                        element.points.some((p) => !p.elementId) || element.anchors.some((a) => !a.elementId);
                    if (!missing) continue;
                    get().updateElement(id, (current) => {
                        if (!isLineElement(current)) return current;
                        return {
                            ...current,
                            points: current.points.map((point) => {
                                if (point.elementId) return point;
                                assigned++;
                                return { ...point, elementId: registry.allocate() };
                            }),
                            anchors: current.anchors.map((anchor) => {
                                if (anchor.elementId) return anchor;
                                assigned++;
                                return { ...anchor, elementId: registry.allocate() };
                            }),
                        };
                    });
                }
                return assigned;
            },

            removeEmptyGroups() {
                const removedIds: string[] = [];
                let found = true;
                while (found) {
                    found = false;
                    for (const element of get().getElements()) {
                        if (element.kind !== 'Group') continue;
                        if (get().getMembers(element.elementId).length > 0) continue;
                        get().removeElement(element.elementId);
                        removedIds.push(element.elementId);
                        found = true;
                    }
                }
                if (removedIds.length > 0) {
                    Logger.warn('pathway.removeEmptyGroups', { removed: removedIds });
                }
                return removedIds;
            },

            lookup(id) {
                const owner = registry.lookup(id);
                if (!owner) return null;
                const state = get();
                switch (owner.kind) {
                    case 'element': {
                        const element = state.elements[id];
                        return element ? { kind: 'element', element } : null;
                    }
                    case 'point':
                    case 'anchor': {
                        const line = state.elements[owner.lineId];
                        if (!line || !isLineElement(line)) return null;
                        if (owner.kind === 'point') {
                            const index = line.points.findIndex((p) => p.elementId === id);
                            return index < 0 ? null : { kind: 'point', line, index, point: line.points[index] };
                        }
                        const index = line.anchors.findIndex((a) => a.elementId === id);
                        return index < 0 ? null : { kind: 'anchor', line, index, anchor: line.anchors[index] };
                    }
                    case 'annotation': {
                        const annotation = state.annotations[id];
                        return annotation ? { kind: 'annotation', annotation } : null;
                    }
                    case 'citation': {
                        const citation = state.citations[id];
                        return citation ? { kind: 'citation', citation } : null;
                    }
                    case 'evidence': {
                        const evidence = state.evidences[id];
                        return evidence ? { kind: 'evidence', evidence } : null;
                    }
                }
            },

            isIdTaken(id) {
                return registry.isReserved(id);
            },

            allocateId() {
                return registry.allocate();
            },

            getMembers(groupId) {
                return get()
                    .getElements()
                    .filter((element) => 'groupRef' in element && element.groupRef === groupId);
            },

            getElements() {
                const { elements, elementOrder } = get();
                return elementOrder.map((id) => elements[id]);
            },
        };
    });
}

/** Group elements of a store, in admission order. */
export function getGroups(store: PathwayStore): Group[] {
    return store
        .getState()
        .getElements()
        .filter((element): element is Group => element.kind === 'Group');
}

/** Subscribe to structural changes; returns the unsubscribe function. */
export function onStructureChange(
    store: PathwayStore,
    listener: (change: PathwayChange) => void,
): () => void {
    return store.subscribe((state, previous) => {
        if (state.lastChange && state.lastChange !== previous.lastChange) {
            listener(state.lastChange);
        }
    });
}
