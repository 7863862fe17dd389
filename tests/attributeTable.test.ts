import assert from 'node:assert/strict';
import test from 'node:test';
import { ConversionError, UnknownAttributeError } from '../src/errors.ts';
import { readXref } from '../src/io/codecSupport.ts';
import { createDataSourceResolver } from '../src/io/dataSources.ts';
import { createElement } from '../src/io/xmlTree.ts';
import { formatNumber, isDecimal, loadAttributeTable } from '../src/schema/attributeTable.ts';

const table2021 = loadAttributeTable('2021');

test('info expands attribute groups into tag keys', () => {
    assert.deepEqual(table2021.info('DataNode.Graphics', 'fontSize'), {
        valueKind: 'float',
        defaultValue: '12',
        isRequired: false,
    });
    assert.equal(table2021.info('Shape.Graphics', 'fillColor').defaultValue, 'Transparent');
    assert.equal(table2021.info('DataNode.Graphics', 'fillColor').defaultValue, 'ffffff');
});

test('info rejects a key outside the table', () => {
    assert.throws(
        () => table2021.info('DataNode.Graphics', 'colour'),
        (error: unknown) => error instanceof UnknownAttributeError && error.key === 'DataNode.Graphics@colour',
    );
});

test('write omits optional values equal to their default', () => {
    const graphics = createElement('Graphics');
    table2021.write('Shape.Graphics', 'fillColor', graphics, '00000000');
    table2021.write('Shape.Graphics', 'borderWidth', graphics, 1);
    table2021.write('Shape.Graphics', 'borderColor', graphics, '000000ff');
    table2021.write('Shape.Graphics', 'fontSize', graphics, 14);

    assert.deepEqual(graphics.attributes, { fontSize: '14' });
});

test('write keeps required values even when they look like defaults', () => {
    const graphics = createElement('Graphics');
    table2021.write('DataNode.Graphics', 'centerX', graphics, 0);
    assert.deepEqual(graphics.attributes, { centerX: '0' });
});

test('write removes an attribute set to null', () => {
    const graphics = createElement('Graphics', { zOrder: '5' });
    table2021.write('DataNode.Graphics', 'zOrder', graphics, null);
    assert.deepEqual(graphics.attributes, {});
});

test('write refuses a missing required value', () => {
    assert.throws(() => table2021.write('Pathway', 'title', createElement('Pathway'), null), ConversionError);
});

test('read falls back to the default of an absent attribute', () => {
    const graphics = createElement('Graphics', { centerX: '10' });

    assert.equal(table2021.read('DataNode.Graphics', 'hAlign', graphics), 'Center');
    assert.equal(table2021.readNumber('DataNode.Graphics', 'fontSize', graphics), 12);
    assert.equal(table2021.readInteger('DataNode.Graphics', 'zOrder', graphics), null);
    assert.equal(table2021.readNumber('DataNode.Graphics', 'centerX', graphics), 10);
});

test('read reports a missing required attribute', () => {
    assert.throws(
        () => table2021.read('DataNode.Graphics', 'width', createElement('Graphics')),
        (error: unknown) =>
            error instanceof ConversionError &&
            error.message === 'required attribute DataNode.Graphics@width is missing',
    );
});

test('readNumber reports malformed numbers with their key', () => {
    const graphics = createElement('Graphics', { centerX: 'left' });
    assert.throws(
        () => table2021.readNumber('DataNode.Graphics', 'centerX', graphics),
        (error: unknown) =>
            error instanceof ConversionError && error.context.key === 'DataNode.Graphics@centerX',
    );
});

test('readInteger rejects fractions', () => {
    const graphics = createElement('Graphics', { zOrder: '1.5' });
    assert.throws(() => table2021.readInteger('DataNode.Graphics', 'zOrder', graphics), ConversionError);
});

test('numbers must be plain decimals', () => {
    for (const raw of ['0x1A', 'Infinity', '', '1e', '1,5']) {
        const graphics = createElement('Graphics', { centerX: raw });
        assert.throws(() => table2021.readNumber('DataNode.Graphics', 'centerX', graphics), ConversionError, raw);
    }
    const graphics = createElement('Graphics', { centerX: ' -1.5e2 ' });
    assert.equal(table2021.readNumber('DataNode.Graphics', 'centerX', graphics), -150);
    assert.equal(isDecimal('.5'), true);
    assert.equal(isDecimal('5.'), true);
});

test('xref fields are read through the table', () => {
    const resolve = createDataSourceResolver([]);
    const names = { identifier: 'identifier', dataSource: 'dataSource' };
    const xref = (attributes: Record<string, string>) =>
        readXref(table2021, 'Xref', createElement('Xref', attributes), names, resolve);

    assert.equal(xref({}), null);
    assert.equal(xref({ identifier: ' ', dataSource: '' }), null);
    assert.deepEqual(xref({ identifier: 'P1', dataSource: 'X' }), { identifier: 'P1', dataSource: 'X' });
    assert.throws(
        () => readXref(table2021, 'Xref', createElement('Xref'), { identifier: 'ID', dataSource: 'Database' }, resolve),
        UnknownAttributeError,
    );
});

test('formatNumber writes negative zero as zero', () => {
    assert.equal(formatNumber(-0), '0');
    assert.equal(formatNumber(2.5), '2.5');
    assert.equal(formatNumber(100), '100');
});

test('the legacy table uses the older attribute names', () => {
    const legacy = loadAttributeTable('2013a');
    assert.equal(legacy.version, '2013a');
    assert.equal(legacy.has('DataNode.Graphics', 'CenterX'), true);
    assert.equal(legacy.has('DataNode.Graphics', 'centerX'), false);
});
