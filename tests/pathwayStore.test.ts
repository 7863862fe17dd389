import assert from 'node:assert/strict';
import test from 'node:test';
import { DuplicateIdError } from '../src/errors.ts';
import { Logger } from '../src/services/logger.ts';
import {
    createAnchor,
    createAnnotation,
    createDataNode,
    createGroup,
    createInteraction,
    createPoint,
    createState,
} from '../src/store/elementFactory.ts';
import { createPathwayStore, getGroups, onStructureChange, type PathwayChange } from '../src/store/pathwayStore.ts';
import type { LineElement, PathwayElement } from '../src/types/pathway.ts';

function asLine(element: PathwayElement | undefined): LineElement {
    if (!element || (element.kind !== 'Interaction' && element.kind !== 'GraphicalLine')) {
        throw new Error('expected a line element');
    }
    return element;
}

test('addElement allocates an identifier when the draft has none', () => {
    const store = createPathwayStore();
    const id = store.getState().addElement(createDataNode({ textLabel: 'Gene A' }));

    assert.match(id, /^[a-f][0-9a-f]{4}$/);
    assert.equal(store.getState().elements[id].kind, 'DataNode');
    assert.deepEqual(store.getState().elementOrder, [id]);
    assert.equal(store.getState().isIdTaken(id), true);
});

test('addElement rejects an identifier that is already used', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode(), elementId: 'n1' });

    assert.throws(() => store.getState().addElement({ ...createGroup(), elementId: 'n1' }), DuplicateIdError);
    assert.equal(store.getState().elementOrder.length, 1);
});

test('addElement rejects a line whose point id is taken', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode(), elementId: 'n1' });

    const line = createInteraction({ points: [createPoint(0, 0, { elementId: 'n1' }), createPoint(10, 0)] });
    assert.throws(() => store.getState().addElement(line), DuplicateIdError);
    assert.equal(store.getState().elementOrder.length, 1);
});

test('removeElement drops states and unbinds line points that targeted the node', () => {
    const store = createPathwayStore();
    const state = store.getState();
    state.addElement({ ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50 }), elementId: 'n1' });
    state.addElement({ ...createState({ elementRef: 'n1', relX: 1, relY: 1 }), elementId: 's1' });
    state.addElement({
        ...createInteraction({
            points: [createPoint(125, 100, { elementRef: 'n1', relX: 1, relY: 0 }), createPoint(200, 100)],
        }),
        elementId: 'i1',
    });

    assert.equal(store.getState().removeElement('n1'), true);

    assert.deepEqual(store.getState().elementOrder, ['i1']);
    assert.equal(store.getState().isIdTaken('s1'), true);
    assert.equal(store.getState().lookup('s1'), null);
    const [start] = asLine(store.getState().elements.i1).points;
    assert.deepEqual(start, { elementId: null, x: 125, y: 100, elementRef: null, relX: null, relY: null });
});

test('setGroupRef only accepts groups', () => {
    const store = createPathwayStore();
    const state = store.getState();
    state.addElement({ ...createGroup(), elementId: 'g1' });
    state.addElement({ ...createDataNode(), elementId: 'n1' });
    state.addElement({ ...createDataNode(), elementId: 'n2' });

    assert.equal(state.setGroupRef('n1', 'n2'), false);
    assert.equal(state.setGroupRef('n1', 'g1'), true);
    assert.deepEqual(
        store.getState().getMembers('g1').map((member) => member.elementId),
        ['n1'],
    );
    assert.deepEqual(
        getGroups(store).map((group) => group.elementId),
        ['g1'],
    );
});

test('linkPoint stores the endpoint relative to its target', () => {
    const store = createPathwayStore();
    const state = store.getState();
    state.addElement({ ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50 }), elementId: 'n1' });
    state.addElement({
        ...createInteraction({ points: [createPoint(125, 100), createPoint(300, 100)] }),
        elementId: 'i1',
    });

    assert.equal(state.linkPoint('i1', 0, 'n1'), true);
    const [start] = asLine(store.getState().elements.i1).points;
    assert.equal(start.elementRef, 'n1');
    assert.equal(start.relX, 1);
    assert.equal(start.relY, 0);

    assert.equal(store.getState().unlinkPoint('i1', 0), true);
    const [unlinked] = asLine(store.getState().elements.i1).points;
    assert.equal(unlinked.elementRef, null);
    assert.equal(unlinked.x, 125);
});

test('pool entries with equal content share one identifier', () => {
    const store = createPathwayStore();
    const first = store.getState().addAnnotation(createAnnotation('kinase'));
    const second = store.getState().addAnnotation(createAnnotation('kinase'));
    const third = store.getState().addAnnotation(createAnnotation('phosphatase'));

    assert.equal(first, second);
    assert.notEqual(first, third);
    assert.equal(Object.keys(store.getState().annotations).length, 2);
});

test('a referenced pool entry cannot be removed until its owner goes away', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode(), elementId: 'n1' });
    const annotationId = store.getState().addAnnotation(createAnnotation('kinase'));
    store.getState().addAnnotationRef('n1', { annotationId, citationRefs: [], evidenceRefs: [] });

    assert.equal(store.getState().countReferences(annotationId), 1);
    assert.equal(store.getState().removeAnnotation(annotationId), false);

    store.getState().removeElement('n1');
    assert.equal(store.getState().annotations[annotationId], undefined);
});

test('addAnnotationRef refuses an annotation that is not pooled', () => {
    const store = createPathwayStore();
    const added = store.getState().addAnnotationRef(null, { annotationId: 'nope', citationRefs: [], evidenceRefs: [] });
    assert.equal(added, false);
    assert.deepEqual(store.getState().pathway.annotationRefs, []);
});

test('fixReferences clears dangling references and returns how many it fixed', () => {
    Logger.clear();
    const store = createPathwayStore();
    const state = store.getState();
    state.addElement({ ...createDataNode({ groupRef: 'missing' }), elementId: 'n1' });
    state.addElement({
        ...createInteraction({
            points: [createPoint(0, 0, { elementRef: 'ghost', relX: 0, relY: 0 }), createPoint(10, 0)],
        }),
        elementId: 'i1',
    });

    assert.deepEqual(store.getState().danglingReferences(), [
        { ownerId: 'n1', field: 'groupRef', target: 'missing' },
        { ownerId: 'i1', field: 'elementRef', target: 'ghost', pointIndex: 0 },
    ]);
    assert.equal(store.getState().fixReferences(), 2);
    assert.deepEqual(store.getState().danglingReferences(), []);
    assert.equal(store.getState().fixReferences(), 0);

    const node = store.getState().elements.n1;
    assert.equal(node.kind === 'DataNode' ? node.groupRef : 'not a node', null);
    const warning = Logger.getEvents().find((event) => event.type === 'pathway.fixReferences');
    assert.deepEqual(warning?.payload, { fixed: 2, targets: ['missing', 'ghost'] });
});

test('ensureIds gives every point and anchor an identifier', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createInteraction(), elementId: 'i1' });

    assert.equal(store.getState().ensureIds(), 2);
    const line = asLine(store.getState().elements.i1);
    for (const point of line.points) {
        assert.ok(point.elementId);
        assert.equal(store.getState().lookup(point.elementId)?.kind, 'point');
    }
    assert.equal(store.getState().ensureIds(), 0);
});

test('removeEmptyGroups removes groups left empty by their nested groups', () => {
    const store = createPathwayStore();
    const state = store.getState();
    state.addElement({ ...createGroup(), elementId: 'outer' });
    state.addElement({ ...createGroup({ groupRef: 'outer' }), elementId: 'inner' });
    state.addElement({ ...createGroup(), elementId: 'kept' });
    state.addElement({ ...createDataNode({ groupRef: 'kept' }), elementId: 'n1' });

    assert.deepEqual(store.getState().removeEmptyGroups(), ['inner', 'outer']);
    assert.deepEqual(store.getState().elementOrder, ['kept', 'n1']);
});

test('lookup resolves points and anchors to their line', () => {
    const store = createPathwayStore();
    store.getState().addElement({
        ...createInteraction({
            points: [createPoint(0, 0), createPoint(10, 0, { elementId: 'p2' })],
            anchors: [createAnchor(0.5, { elementId: 'a1' })],
        }),
        elementId: 'i1',
    });

    const point = store.getState().lookup('p2');
    assert.equal(point?.kind, 'point');
    assert.equal(point?.kind === 'point' ? point.index : -1, 1);
    const anchor = store.getState().lookup('a1');
    assert.equal(anchor?.kind === 'anchor' ? anchor.line.elementId : null, 'i1');
});

test('onStructureChange reports each change once', () => {
    const store = createPathwayStore();
    const changes: PathwayChange[] = [];
    const unsubscribe = onStructureChange(store, (change) => changes.push(change));

    store.getState().addElement({ ...createDataNode(), elementId: 'n1' });
    store.getState().removeElement('n1');
    unsubscribe();
    store.getState().addElement({ ...createDataNode(), elementId: 'n2' });

    assert.deepEqual(changes, [
        { type: 'add', id: 'n1', revision: 1 },
        { type: 'remove', id: 'n1', revision: 2 },
    ]);
});
