import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { GPML_CONFIG } from '../src/config/env.ts';
import { ConversionError, SchemaValidationError } from '../src/errors.ts';
import {
    convertDocument,
    detectVersion,
    readPathway,
    readPathwayFile,
    writePathway,
    writePathwayFile,
} from '../src/io/gpmlFormat.ts';
import { parseXml } from '../src/io/xmlTree.ts';
import { createDataNode } from '../src/store/elementFactory.ts';
import { createPathwayStore } from '../src/store/pathwayStore.ts';

function fixture(name: string): string {
    return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

test('detectVersion reads the root namespace', () => {
    assert.equal(detectVersion(parseXml(fixture('sample-2013a.gpml'))), '2013a');
    assert.equal(detectVersion(parseXml(fixture('sample-2021.gpml'))), '2021');
    assert.throws(
        () => detectVersion(parseXml('<Pathway xmlns="urn:other"/>')),
        (error: unknown) => error instanceof ConversionError && error.message === 'unsupported GPML namespace "urn:other"',
    );
});

test('readPathway refuses a document of another version than requested', () => {
    assert.throws(() => readPathway(fixture('sample-2021.gpml'), { version: '2013a' }), ConversionError);
});

test('writePathway uses the configured default version', () => {
    const xml = writePathway(readPathway(fixture('sample-2021.gpml')));
    assert.equal(detectVersion(parseXml(xml)), GPML_CONFIG.DEFAULT_VERSION);
});

test('writing with validation rejects an invalid document', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode({ textLabel: 'x', borderColor: 'zzz' }), elementId: 'n1' });

    assert.throws(
        () => writePathway(store, { version: '2021', validate: true }),
        (error: unknown) =>
            error instanceof SchemaValidationError &&
            error.violations[0]?.path === '/Pathway/DataNodes[1]/DataNode[1]/Graphics[1]' &&
            error.violations[0]?.message === 'attribute borderColor is not a color: "zzz"',
    );
});

test('converting to 2021 lifts authors and reports legacy leftovers', () => {
    const { xml, report } = convertDocument(fixture('sample-2013a.gpml'), '2021');

    assert.equal(report.changes, 1);
    assert.deepEqual(
        report.lossy.map((entry) => entry.feature),
        ['legacyProperty', 'legacyProperty', 'legacyProperty'],
    );
    const authors = readPathway(xml, { version: '2021' }).getState().pathway.authors;
    assert.deepEqual(
        authors.map((author) => author.name),
        ['Ann Example', 'Bob Example'],
    );
});

test('converting to 2013a lists what the older schema drops', () => {
    const { xml, report } = convertDocument(fixture('sample-2021.gpml'), '2013a');

    assert.deepEqual(
        report.lossy.map((entry) => [entry.elementId, entry.feature]),
        [
            [null, 'pathwayXref'],
            [null, 'backgroundColor'],
            [null, 'nestedRef'],
            [null, 'authorDetails'],
            ['n1', 'textColor'],
            ['n2', 'translucentColor'],
        ],
    );
    assert.equal(detectVersion(parseXml(xml)), '2013a');
    assert.equal(parseXml(xml).attributes.Author, 'Ann Example, Bob Example');
});

test('files are written and read back', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gpml-test-'));
    try {
        const path = join(dir, 'out.gpml');
        await writePathwayFile(readPathway(fixture('sample-2021.gpml')), path, { version: '2013a' });
        const store = await readPathwayFile(path, { version: '2013a' });

        assert.equal(store.getState().pathway.title, 'Signal test');
        assert.equal(store.getState().elements.n1?.kind, 'DataNode');
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});
