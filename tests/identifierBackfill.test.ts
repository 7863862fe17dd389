import assert from 'node:assert/strict';
import test from 'node:test';
import { backfillLineIds, deriveId, lineSeed, stringHash } from '../src/engine/identifierBackfill.ts';
import { createDataNode, createGraphicalLine, createPoint } from '../src/store/elementFactory.ts';
import type { ElementDraft } from '../src/types/pathway.ts';
import { ArrowHeadTypes } from '../src/types/vocabulary.ts';

test('stringHash is the 31-multiplier polynomial hash', () => {
    assert.equal(stringHash(''), 0);
    assert.equal(stringHash('a'), 97);
    assert.equal(stringHash('ab'), 3105);
});

test('deriveId salts the seed until the id is free', () => {
    assert.equal(deriveId('x', () => false), 'id1ce2a');
    assert.equal(deriveId('x', (id) => id === 'id1ce2a'), 'id1ce2b');
});

test('lineSeed joins end coordinates and arrowheads', () => {
    const seed = lineSeed([createPoint(1, 2), createPoint(9, 9), createPoint(3, 4)], 'Undirected', 'Directed');
    assert.equal(seed, '1234UndirectedDirected');
});

test('backfillLineIds names only id-less lines and keeps them distinct', () => {
    const points = [createPoint(10, 10), createPoint(50, 10)];
    const drafts: ElementDraft[] = [
        createDataNode(),
        createGraphicalLine({ points, endArrowHead: ArrowHeadTypes.known('Directed') }),
        createGraphicalLine({ points, endArrowHead: ArrowHeadTypes.known('Directed') }),
        { ...createGraphicalLine(), elementId: 'kept' },
    ];

    assert.equal(backfillLineIds(drafts, () => false), 2);
    assert.equal(drafts[0].elementId, undefined);
    assert.equal(drafts[1].elementId, 'id5ca40653');
    assert.notEqual(drafts[2].elementId, drafts[1].elementId);
    assert.equal(drafts[3].elementId, 'kept');
});
