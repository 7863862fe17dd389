import assert from 'node:assert/strict';
import test from 'node:test';
import { ConversionError } from '../src/errors.ts';
import {
    XML_DECLARATION,
    childElement,
    childElements,
    childText,
    createElement,
    parseXml,
    serializeXml,
} from '../src/io/xmlTree.ts';

const SOURCE = `<?xml version="1.0" encoding="UTF-8"?>
<Pathway title="A &amp; B">
  <Comment>first</Comment>
  <DataNode elementId="n1"/>
  <Comment>second</Comment>
</Pathway>`;

test('parseXml keeps attributes, text and child order', () => {
    const root = parseXml(SOURCE);

    assert.equal(root.name, 'Pathway');
    assert.deepEqual(root.attributes, { title: 'A & B' });
    assert.deepEqual(
        root.children.map((child) => child.name),
        ['Comment', 'DataNode', 'Comment'],
    );
    assert.deepEqual(
        childElements(root, 'Comment').map((child) => child.text),
        ['first', 'second'],
    );
    assert.equal(childText(root, 'Comment'), 'first');
    assert.equal(childElement(root, 'DataNode')?.attributes.elementId, 'n1');
    assert.equal(childElement(root, 'Label'), null);
});

test('serializeXml writes the declaration and parses back to the same tree', () => {
    const root = createElement('Pathway', { title: 'A & B' }, [
        createElement('Comment', {}, [], 'x < y'),
        createElement('DataNode', { elementId: 'n1' }),
    ]);
    const xml = serializeXml(root);

    assert.equal(xml.startsWith(`${XML_DECLARATION}\n`), true);
    assert.deepEqual(parseXml(xml), root);
});

test('text keeps its surrounding whitespace through a round trip', () => {
    const root = parseXml(`<Pathway>
  <Comment>  indented note
</Comment>
  <Description> spaced </Description>
</Pathway>`);

    assert.equal(root.text, null);
    assert.equal(childElement(root, 'Comment')?.text, '  indented note\n');
    assert.equal(childText(root, 'Description'), 'spaced');
    assert.deepEqual(parseXml(serializeXml(root)), root);
});

test('parseXml rejects malformed documents', () => {
    assert.throws(() => parseXml('<Pathway><DataNode></Pathway>'), ConversionError);
});
