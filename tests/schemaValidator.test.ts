import assert from 'node:assert/strict';
import test from 'node:test';
import { SchemaValidationError } from '../src/errors.ts';
import { createElement, parseXml } from '../src/io/xmlTree.ts';
import { loadContentModel, orderChildren } from '../src/schema/contentModel.ts';
import { assertValidDocument, validateDocument } from '../src/schema/schemaValidator.ts';

const NAMESPACE = 'http://pathvisio.org/GPML/2021';

const BROKEN = `<Pathway xmlns="${NAMESPACE}">
  <DataNodes>
    <DataNode elementId="a" textLabel="x">
      <Graphics centerX="abc" centerY="1" width="1" height="1"/>
    </DataNode>
  </DataNodes>
  <Graphics boardWidth="1" boardHeight="1"/>
</Pathway>`;

test('violations carry the element path and a message', () => {
    const result = validateDocument(parseXml(BROKEN), '2021');

    assert.equal(result.valid, false);
    assert.deepEqual(result.violations, [
        { path: '/Pathway', message: 'required attribute title is missing' },
        {
            path: '/Pathway/DataNodes[1]/DataNode[1]/Graphics[1]',
            message: 'attribute centerX is not a number: "abc"',
        },
        { path: '/Pathway/Graphics[1]', message: 'element Graphics is out of order in Pathway' },
    ]);
});

test('assertValidDocument reports the first violation', () => {
    assert.throws(
        () => assertValidDocument(parseXml(BROKEN), '2021'),
        (error: unknown) =>
            error instanceof SchemaValidationError &&
            error.violations.length === 3 &&
            error.message === 'document is not valid: /Pathway: required attribute title is missing',
    );
});

test('unknown elements, duplicate ids and wrong namespaces are reported', () => {
    const xml = `<Pathway xmlns="urn:other" title="t">
  <Graphics boardWidth="1" boardHeight="1"/>
  <Labels>
    <Label elementId="dup" textLabel="a"><Graphics centerX="0" centerY="0" width="1" height="1"/></Label>
    <Label elementId="dup" textLabel="b"><Graphics centerX="0" centerY="0" width="1" height="1"/></Label>
  </Labels>
  <Widgets/>
</Pathway>`;
    const messages = validateDocument(parseXml(xml), '2021').violations.map((violation) => violation.message);

    assert.deepEqual(messages, [
        `namespace must be ${NAMESPACE}`,
        'identifier "dup" is already used at /Pathway/Labels[1]/Label[1]',
        'element Widgets is not allowed in Pathway',
    ]);
});

test('a minimal document is valid', () => {
    const root = parseXml(`<Pathway xmlns="${NAMESPACE}" title="t"><Graphics boardWidth="1" boardHeight="1"/></Pathway>`);
    assert.deepEqual(validateDocument(root, '2021'), { valid: true, violations: [] });
});

test('orderChildren sorts children into the schema sequence', () => {
    const root = createElement('Pathway', {}, [
        createElement('Groups'),
        createElement('Graphics'),
        createElement('Comment'),
        createElement('DataNodes'),
        createElement('Comment', {}, [], 'second'),
    ]);
    orderChildren(loadContentModel('2021'), root);

    assert.deepEqual(
        root.children.map((entry) => entry.text ?? entry.name),
        ['Comment', 'second', 'Graphics', 'DataNodes', 'Groups'],
    );
});
