import assert from 'node:assert/strict';
import test from 'node:test';
import { DuplicateIdError } from '../src/errors.ts';
import { IdentifierRegistry, WIDE_ID_THRESHOLD, describeOwner } from '../src/store/identifierRegistry.ts';

test('allocate returns five hex digits starting with a letter', () => {
    const registry = new IdentifierRegistry();
    for (let i = 0; i < 200; i++) {
        assert.match(registry.allocate(), /^[a-f][0-9a-f]{4}$/);
    }
});

test('allocate never repeats an identifier', () => {
    const registry = new IdentifierRegistry();
    const seen = new Set<string>();
    for (let i = 0; i < 2000; i++) seen.add(registry.allocate());
    assert.equal(seen.size, 2000);
});

test('allocate widens to eight digits once enough ids were issued', () => {
    const registry = new IdentifierRegistry();
    for (let i = 0; i <= WIDE_ID_THRESHOLD; i++) {
        registry.register(`x${i}`, { kind: 'evidence' });
    }
    assert.match(registry.allocate(), /^[a-f][0-9a-f]{7}$/);
});

test('register rejects an identifier that is already mapped', () => {
    const registry = new IdentifierRegistry();
    registry.register('abc12', { kind: 'element', elementKind: 'DataNode' });

    assert.throws(
        () => registry.register('abc12', { kind: 'annotation' }),
        (error: unknown) =>
            error instanceof DuplicateIdError &&
            error.id === 'abc12' &&
            error.message === 'identifier "abc12" is already used by DataNode',
    );
});

test('release unmaps an identifier but keeps it reserved', () => {
    const registry = new IdentifierRegistry();
    registry.register('abc12', { kind: 'citation' });
    registry.release('abc12');

    assert.equal(registry.has('abc12'), false);
    assert.equal(registry.lookup('abc12'), null);
    assert.equal(registry.isReserved('abc12'), true);
    assert.equal(registry.size, 0);
});

test('lookup returns the owner descriptor', () => {
    const registry = new IdentifierRegistry();
    registry.register('p1', { kind: 'point', lineId: 'line1' });

    assert.deepEqual(registry.lookup('p1'), { kind: 'point', lineId: 'line1' });
    assert.deepEqual(registry.ids(), ['p1']);
    assert.equal(describeOwner({ kind: 'point', lineId: 'line1' }), 'point of line1');
    assert.equal(describeOwner({ kind: 'annotation' }), 'annotation');
});
