import assert from 'node:assert/strict';
import test from 'node:test';
import {
    ARROW_HEADS,
    DEPRECATED_BORDER,
    GROUP_STYLES,
    LEGACY_PATHWAY_KEYS,
    cellComponentShape,
    convertPathway,
    findLossyFeatures,
    fromLegacy,
    isLossyDowngrade,
    normalizeDeprecatedShapes,
    ontologyName,
    ontologyPrefix,
    toLegacy,
} from '../src/engine/versionConverter.ts';
import { readGpml2013a } from '../src/io/gpml2013aReader.ts';
import { writeGpml2021 } from '../src/io/gpml2021Writer.ts';
import { childElement, parseXml, type XmlElement } from '../src/io/xmlTree.ts';
import { Logger } from '../src/services/logger.ts';
import { createDataNode, createGroup, createPathway, createShape } from '../src/store/elementFactory.ts';
import { createPathwayStore } from '../src/store/pathwayStore.ts';
import { ArrowHeadTypes, GroupTypes, ShapeTypes } from '../src/types/vocabulary.ts';

test('rename tables translate both ways', () => {
    assert.deepEqual(fromLegacy(ARROW_HEADS, 'mim-conversion'), { kind: 'known', name: 'Conversion' });
    assert.equal(toLegacy(ARROW_HEADS, ArrowHeadTypes.known('Conversion')), 'mim-conversion');
    assert.deepEqual(fromLegacy(ARROW_HEADS, 'vendor-arrow'), { kind: 'custom', name: 'vendor-arrow' });
    assert.equal(toLegacy(ARROW_HEADS, { kind: 'custom', name: 'vendor-arrow' }), 'vendor-arrow');
});

test('ontology names and prefixes map to each other', () => {
    assert.equal(ontologyPrefix('Pathway Ontology'), 'PW');
    assert.equal(ontologyName('PW'), 'Pathway Ontology');
});

test('cell component markers name a shape', () => {
    assert.equal(cellComponentShape('Golgi Apparatus'), 'GolgiApparatus');
    assert.equal(cellComponentShape('Spaceship'), null);
});

test('deprecated compartment shapes get the compartment border', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createShape({ shapeType: ShapeTypes.known('Cell') }), elementId: 'c1' });
    store.getState().addElement({ ...createShape({ shapeType: ShapeTypes.known('Ribosome') }), elementId: 'r1' });
    store.getState().addElement({ ...createShape({ shapeType: ShapeTypes.known('Oval') }), elementId: 'o1' });

    assert.equal(normalizeDeprecatedShapes(store), 2);
    const cell = store.getState().elements.c1;
    const ribosome = store.getState().elements.r1;
    assert.equal(cell.kind === 'Shape' ? cell.shapeType.name : null, 'RoundedRectangle');
    assert.equal(cell.kind === 'Shape' ? cell.borderWidth : null, DEPRECATED_BORDER.borderWidth);
    assert.equal(cell.kind === 'Shape' ? cell.borderColor : null, 'c0c0c0');
    assert.equal(ribosome.kind === 'Shape' ? ribosome.shapeType.name : null, 'Hexagon');
    assert.equal(ribosome.kind === 'Shape' ? ribosome.borderWidth : null, 1);
});

test('a decoded Organelle shape becomes a bordered rounded rectangle in 2021', () => {
    const xml = `<Pathway xmlns="http://pathvisio.org/GPML/2013a" Name="Compartments">
  <Graphics BoardWidth="200" BoardHeight="200"/>
  <Shape GraphId="org1">
    <Graphics CenterX="50" CenterY="50" Width="40" Height="30" ShapeType="Organelle"/>
  </Shape>
</Pathway>`;
    const store = readGpml2013a(parseXml(xml));

    const report = convertPathway(store, '2013a', '2021');

    assert.equal(report.changes, 1);
    assert.deepEqual(report.lossy, []);
    const shape = store.getState().elements.org1;
    assert.equal(shape.kind, 'Shape');
    if (shape.kind !== 'Shape') return;
    assert.deepEqual(shape.shapeType, { kind: 'known', name: 'RoundedRectangle' });
    assert.deepEqual(shape.borderStyle, { kind: 'known', name: 'Double' });
    assert.equal(shape.borderWidth, 3);
    assert.equal(shape.borderColor, 'c0c0c0');

    const find = (parent: XmlElement, name: string): XmlElement => {
        const found = childElement(parent, name);
        if (!found) throw new Error(`missing ${name} in ${parent.name}`);
        return found;
    };
    const graphics = find(find(find(writeGpml2021(store), 'Shapes'), 'Shape'), 'Graphics');
    assert.equal(graphics.attributes.shapeType, 'RoundedRectangle');
    assert.equal(graphics.attributes.borderStyle, 'Double');
    assert.equal(graphics.attributes.borderWidth, '3');
});

test('upgrading lifts the legacy author list into authors', () => {
    const store = createPathwayStore(
        createPathway({
            dynamicProperties: {
                [LEGACY_PATHWAY_KEYS.author]: 'Ann Example, Bob Example',
                [LEGACY_PATHWAY_KEYS.email]: 'ann@example.org',
            },
        }),
    );

    const report = convertPathway(store, '2013a', '2021');
    assert.equal(report.changes, 1);
    assert.deepEqual(report.lossy, [
        {
            elementId: null,
            feature: 'legacyProperty',
            detail: `${LEGACY_PATHWAY_KEYS.email} has no 2021 counterpart`,
        },
    ]);
    const { pathway } = store.getState();
    assert.deepEqual(
        pathway.authors.map((author) => author.name),
        ['Ann Example', 'Bob Example'],
    );
    assert.deepEqual(pathway.dynamicProperties, { [LEGACY_PATHWAY_KEYS.email]: 'ann@example.org' });
});

test('downgrading reports what the older schema drops', () => {
    const store = createPathwayStore();
    store.getState().addElement({ ...createDataNode({ textColor: '0000ff' }), elementId: 'n1' });
    store.getState().addElement({ ...createDataNode({ fillColor: 'ff000080', aliasRef: 'g1' }), elementId: 'n2' });
    store.getState().addElement({ ...createGroup({ type: GroupTypes.known('Transparent') }), elementId: 'g1' });

    const features = findLossyFeatures(store).map((entry) => [entry.elementId, entry.feature]);
    assert.deepEqual(features, [
        ['n1', 'textColor'],
        ['n2', 'translucentColor'],
        ['n2', 'aliasRef'],
    ]);
    assert.equal(isLossyDowngrade(GROUP_STYLES, GroupTypes.known('Transparent')), false);
});

test('conversion between equal versions is a no-op', () => {
    const store = createPathwayStore();
    Logger.clear();
    const report = convertPathway(store, '2021', '2021');
    assert.deepEqual(report, { from: '2021', to: '2021', changes: 0, lossy: [] });
    assert.deepEqual(Logger.getEvents(), []);
});

test('lossy features are logged one by one', () => {
    const store = createPathwayStore(createPathway({ backgroundColor: 'eeeeee' }));
    Logger.clear();
    convertPathway(store, '2021', '2013a');

    const types = Logger.getEvents().map((event) => event.type);
    assert.deepEqual(types, ['converter.lossy', 'converter.done']);
});
