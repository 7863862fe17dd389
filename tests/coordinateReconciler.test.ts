import assert from 'node:assert/strict';
import test from 'node:test';
import { applyGroupBounds, reconcileCoordinates } from '../src/engine/coordinateReconciler.ts';
import {
    createAnchor,
    createDataNode,
    createGraphicalLine,
    createGroup,
    createInteraction,
    createPoint,
    createState,
} from '../src/store/elementFactory.ts';
import { createPathwayStore } from '../src/store/pathwayStore.ts';
import type { LinePoint, PathwayElement } from '../src/types/pathway.ts';
import { GroupTypes } from '../src/types/vocabulary.ts';

function pointsOf(element: PathwayElement | undefined): LinePoint[] {
    if (!element || (element.kind !== 'Interaction' && element.kind !== 'GraphicalLine')) {
        throw new Error('expected a line element');
    }
    return element.points;
}

test('reconcile fills relative coordinates from the target bounds', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50 }), elementId: 'n1' });
    store.getState().addElement({
        ...createInteraction({ points: [createPoint(125, 100, { elementRef: 'n1' }), createPoint(300, 100)] }),
        elementId: 'i1',
    });

    assert.equal(reconcileCoordinates(store), 1);
    const [start] = pointsOf(store.getState().elements.i1);
    assert.equal(start.relX, 1);
    assert.equal(start.relY, 0);
});

test('moving a target moves the bound point on the next reconcile', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50 }), elementId: 'n1' });
    store.getState().addElement({
        ...createInteraction({
            points: [createPoint(125, 100, { elementRef: 'n1', relX: 1, relY: 0 }), createPoint(300, 100)],
        }),
        elementId: 'i1',
    });

    store.getState().updateElement('n1', (current) =>
        current.kind === 'DataNode' ? { ...current, centerX: 200 } : current,
    );
    assert.equal(reconcileCoordinates(store), 0);
    const [start] = pointsOf(store.getState().elements.i1);
    assert.equal(start.x, 225);
    assert.equal(start.y, 100);
});

test('a point bound to an anchor sits on the anchor', () => {
    const store = createPathwayStore();
    store.getState().addElement({
        ...createInteraction({
            points: [createPoint(0, 0), createPoint(100, 0)],
            anchors: [createAnchor(0.5, { elementId: 'a1' })],
        }),
        elementId: 'i1',
    });
    store.getState().addElement({
        ...createGraphicalLine({ points: [createPoint(10, 10, { elementRef: 'a1' }), createPoint(50, 80)] }),
        elementId: 'l1',
    });

    assert.equal(reconcileCoordinates(store), 1);
    const [start] = pointsOf(store.getState().elements.l1);
    assert.deepEqual(start, { elementId: null, x: 50, y: 0, elementRef: 'a1', relX: 0, relY: 0 });
});

test('states follow their data node', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50 }), elementId: 'n1' });
    store.getState().addElement({ ...createState({ elementRef: 'n1', relX: 1, relY: -1 }), elementId: 's1' });

    reconcileCoordinates(store);
    const state = store.getState().elements.s1;
    assert.equal(state.kind === 'State' ? state.centerX : null, 125);
    assert.equal(state.kind === 'State' ? state.centerY : null, 75);
});

test('applyGroupBounds wraps members with the group margin', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createGroup(), elementId: 'g1' });
    store.getState().addElement({ ...createGroup({ type: GroupTypes.known('Complex') }), elementId: 'g2' });
    store.getState().addElement({ ...createGroup(), elementId: 'empty' });
    store.getState().addElement({
        ...createDataNode({ centerX: 100, centerY: 100, width: 50, height: 50, groupRef: 'g1' }),
        elementId: 'n1',
    });
    store.getState().addElement({
        ...createDataNode({ centerX: 300, centerY: 100, width: 50, height: 50, groupRef: 'g2' }),
        elementId: 'n2',
    });

    assert.equal(applyGroupBounds(store), 2);
    const plain = store.getState().elements.g1;
    const complex = store.getState().elements.g2;
    assert.deepEqual(
        plain.kind === 'Group' ? [plain.centerX, plain.centerY, plain.width, plain.height] : null,
        [100, 100, 66, 66],
    );
    assert.deepEqual(
        complex.kind === 'Group' ? [complex.centerX, complex.centerY, complex.width, complex.height] : null,
        [300, 100, 74, 74],
    );
});
