/**
 * GPML2013a writer. Inverse of the 2013a reader: current names are mapped
 * back through the rename tables and model fields the older schema has no
 * attribute for travel as `Attribute` markers.
 */
import {
    ANCHOR_SHAPES,
    ARROW_HEADS,
    CELL_COMPONENTS,
    CELL_COMPONENT_KEY,
    DATA_NODE_TYPES,
    DOUBLE_LINE_KEY,
    GROUP_STYLES,
    LEGACY_PATHWAY_KEYS,
    LINE_STYLES,
    SHAPE_TYPES,
    STATE_ROTATION_KEY,
    STATE_TYPES,
    isLegacyPathwayKey,
    ontologyName,
    toLegacy,
} from '../engine/versionConverter';
import { formatNumber, loadAttributeTable } from '../schema/attributeTable';
import { loadContentModel, orderChildren } from '../schema/contentModel';
import { Logger } from '../services/logger';
import type { PathwayStore } from '../store/pathwayStore';
import type {
    Annotation,
    Comment,
    DataNode,
    ElementInfo,
    Group,
    Label,
    LineElement,
    Shape,
    ShapeStyleProperty,
    ShapedElement,
    State,
    Xref,
} from '../types/pathway';
import { LineStyleTypes, ShapeTypes } from '../types/vocabulary';
import { FONT_2013A, byElementId, prepareForWrite, writeFont } from './codecSupport';
import { formatLegacyColor } from './colors';
import { DESCRIPTION_SOURCE, GPML2013A_NAMESPACE } from './gpml2013aReader';
import { createElement, type XmlElement } from './xmlTree';

const table = loadAttributeTable('2013a');

function textElement(name: string, text: string): XmlElement {
    return createElement(name, {}, [], text);
}

function writeInfo(
    element: XmlElement,
    info: ElementInfo,
    markers: Record<string, string> = {},
    comments: Comment[] = info.comments,
    properties: Record<string, string> = info.dynamicProperties,
): void {
    for (const comment of comments) {
        const child = textElement('Comment', comment.text);
        table.write('Comment', 'Source', child, comment.source);
        element.children.push(child);
    }
    for (const ref of info.citationRefs) {
        element.children.push(textElement('BiopaxRef', ref.citationId));
    }
    for (const [key, value] of Object.entries({ ...properties, ...markers })) {
        const attribute = createElement('Attribute');
        table.write('Attribute', 'Key', attribute, key);
        table.write('Attribute', 'Value', attribute, value);
        element.children.push(attribute);
    }
}

function writeXref(tag: string, xref: Xref | null): XmlElement {
    const element = createElement('Xref');
    table.write(tag, 'Database', element, xref?.dataSource ?? '');
    table.write(tag, 'ID', element, xref?.identifier ?? '');
    return element;
}

/** Shape style attributes; returns the marker properties it needs. */
function writeShapeStyle(tag: string, graphics: XmlElement, style: ShapeStyleProperty): Record<string, string> {
    const markers: Record<string, string> = {};
    table.write(tag, 'Color', graphics, formatLegacyColor(style.borderColor));
    if (LineStyleTypes.is(style.borderStyle, 'Double')) markers[DOUBLE_LINE_KEY] = 'Double';
    table.write(tag, 'LineStyle', graphics, toLegacy(LINE_STYLES, style.borderStyle));
    table.write(tag, 'LineThickness', graphics, style.borderWidth);
    table.write(tag, 'FillColor', graphics, formatLegacyColor(style.fillColor));

    const component = style.shapeType.kind === 'known' ? CELL_COMPONENTS[style.shapeType.name] : undefined;
    if (component) markers[CELL_COMPONENT_KEY] = component.label;
    const shapeType = component ? ShapeTypes.known(component.shape) : style.shapeType;
    table.write(tag, 'ShapeType', graphics, toLegacy(SHAPE_TYPES, shapeType));
    table.write(tag, 'ZOrder', graphics, style.zOrder);

    if (table.has(tag, 'Rotation')) {
        table.write(tag, 'Rotation', graphics, style.rotation);
    } else if (tag === 'State.Graphics' && style.rotation !== 0) {
        markers[STATE_ROTATION_KEY] = formatNumber(style.rotation);
    }
    return markers;
}

/** `<Graphics>` with rect, font and shape style; returns the markers. */
function boxGraphics(tag: string, element: ShapedElement): { graphics: XmlElement; markers: Record<string, string> } {
    const key = `${tag}.Graphics`;
    const graphics = createElement('Graphics');
    table.write(key, 'CenterX', graphics, element.centerX);
    table.write(key, 'CenterY', graphics, element.centerY);
    table.write(key, 'Width', graphics, element.width);
    table.write(key, 'Height', graphics, element.height);
    writeFont(table, key, graphics, FONT_2013A, element);
    const markers = writeShapeStyle(key, graphics, element);
    return { graphics, markers };
}

/* ------------------------------------------------------------------ */
/*  Elements                                                          */
/* ------------------------------------------------------------------ */

function writeDataNode(node: DataNode): XmlElement {
    const element = createElement('DataNode');
    table.write('DataNode', 'GraphId', element, node.elementId);
    table.write('DataNode', 'GroupRef', element, node.groupRef);
    table.write('DataNode', 'TextLabel', element, node.textLabel);
    table.write('DataNode', 'Type', element, toLegacy(DATA_NODE_TYPES, node.type));
    const { graphics, markers } = boxGraphics('DataNode', node);
    writeInfo(element, node, markers);
    element.children.push(graphics, writeXref('DataNode.Xref', node.xref));
    return element;
}

function writeState(state: State): XmlElement {
    const element = createElement('State');
    table.write('State', 'GraphId', element, state.elementId);
    table.write('State', 'GraphRef', element, state.elementRef);
    table.write('State', 'TextLabel', element, state.textLabel);
    table.write('State', 'StateType', element, toLegacy(STATE_TYPES, state.type));

    const graphics = createElement('Graphics');
    table.write('State.Graphics', 'RelX', graphics, state.relX);
    table.write('State.Graphics', 'RelY', graphics, state.relY);
    table.write('State.Graphics', 'Width', graphics, state.width);
    table.write('State.Graphics', 'Height', graphics, state.height);
    const markers = writeShapeStyle('State.Graphics', graphics, state);

    writeInfo(element, state, markers);
    element.children.push(graphics);
    if (state.xref) element.children.push(writeXref('State.Xref', state.xref));
    return element;
}

function writeLabel(label: Label): XmlElement {
    const element = createElement('Label');
    table.write('Label', 'GraphId', element, label.elementId);
    table.write('Label', 'GroupRef', element, label.groupRef);
    table.write('Label', 'TextLabel', element, label.textLabel);
    table.write('Label', 'Href', element, label.href);
    const { graphics, markers } = boxGraphics('Label', label);
    writeInfo(element, label, markers);
    element.children.push(graphics);
    return element;
}

function writeShape(shape: Shape): XmlElement {
    const element = createElement('Shape');
    table.write('Shape', 'GraphId', element, shape.elementId);
    table.write('Shape', 'GroupRef', element, shape.groupRef);
    table.write('Shape', 'TextLabel', element, shape.textLabel);
    const { graphics, markers } = boxGraphics('Shape', shape);
    writeInfo(element, shape, markers);
    element.children.push(graphics);
    return element;
}

/** Groups carry no geometry in this schema; GroupId and GraphId are both the elementId. */
function writeGroup(group: Group): XmlElement {
    const element = createElement('Group');
    table.write('Group', 'GroupId', element, group.elementId);
    table.write('Group', 'GraphId', element, group.elementId);
    table.write('Group', 'GroupRef', element, group.groupRef);
    table.write('Group', 'Style', element, toLegacy(GROUP_STYLES, group.type));
    table.write('Group', 'TextLabel', element, group.textLabel);
    writeInfo(element, group);
    return element;
}

function writeLine(line: LineElement): XmlElement {
    const tag = line.kind;
    const key = `${tag}.Graphics`;
    const element = createElement(tag);
    table.write(tag, 'GraphId', element, line.elementId);
    table.write(tag, 'GroupRef', element, line.groupRef);

    const graphics = createElement('Graphics');
    const markers: Record<string, string> = {};
    table.write(key, 'Color', graphics, formatLegacyColor(line.lineColor));
    table.write(key, 'LineThickness', graphics, line.lineWidth);
    if (LineStyleTypes.is(line.lineStyle, 'Double')) markers[DOUBLE_LINE_KEY] = 'Double';
    table.write(key, 'LineStyle', graphics, toLegacy(LINE_STYLES, line.lineStyle));
    table.write(key, 'ConnectorType', graphics, line.connectorType.name);
    table.write(key, 'ZOrder', graphics, line.zOrder);

    const last = line.points.length - 1;
    line.points.forEach((point, index) => {
        const child = createElement('Point');
        const arrowHead = index === 0 ? line.startArrowHead : index === last ? line.endArrowHead : null;
        table.write(`${key}.Point`, 'GraphId', child, point.elementId);
        table.write(`${key}.Point`, 'X', child, point.x);
        table.write(`${key}.Point`, 'Y', child, point.y);
        table.write(`${key}.Point`, 'RelX', child, point.relX);
        table.write(`${key}.Point`, 'RelY', child, point.relY);
        table.write(`${key}.Point`, 'GraphRef', child, point.elementRef);
        table.write(`${key}.Point`, 'ArrowHead', child, arrowHead ? toLegacy(ARROW_HEADS, arrowHead) : null);
        graphics.children.push(child);
    });
    for (const anchor of line.anchors) {
        const child = createElement('Anchor');
        table.write(`${key}.Anchor`, 'GraphId', child, anchor.elementId);
        table.write(`${key}.Anchor`, 'Position', child, anchor.position);
        table.write(`${key}.Anchor`, 'Shape', child, toLegacy(ANCHOR_SHAPES, anchor.shapeType));
        graphics.children.push(child);
    }

    writeInfo(element, line, markers);
    element.children.push(graphics);
    if (line.kind === 'Interaction' && line.xref) element.children.push(writeXref('Interaction.Xref', line.xref));
    return element;
}

/* ------------------------------------------------------------------ */
/*  Pathway                                                           */
/* ------------------------------------------------------------------ */

function centerElement(name: string, x: string | undefined, y: string | undefined): XmlElement {
    const element = createElement(name);
    table.write(name, 'CenterX', element, x ?? '0');
    table.write(name, 'CenterY', element, y ?? '0');
    return element;
}

function writeBiopax(store: PathwayStore): XmlElement | null {
    const state = store.getState();
    const biopax = createElement('Biopax');

    for (const citation of Object.values(state.citations).sort(byElementId)) {
        const xref = createElement('bp:PublicationXref');
        table.write('bp:PublicationXref', 'rdf:id', xref, citation.elementId);
        const add = (name: string, text: string | null) => {
            if (text !== null) xref.children.push(textElement(name, text));
        };
        add('bp:ID', citation.xref?.identifier ?? null);
        add('bp:DB', citation.xref?.dataSource ?? null);
        add('bp:TITLE', citation.title);
        add('bp:SOURCE', citation.source ?? citation.urlLink);
        add('bp:YEAR', citation.year);
        for (const author of citation.authors) add('bp:AUTHORS', author);
        biopax.children.push(xref);
    }

    const annotations = new Map<string, Annotation>();
    for (const ref of state.pathway.annotationRefs) {
        const annotation = state.annotations[ref.annotationId];
        if (annotation) annotations.set(annotation.elementId, annotation);
    }
    for (const annotation of [...annotations.values()].sort(byElementId)) {
        const term = createElement('bp:openControlledVocabulary');
        term.children.push(textElement('bp:TERM', annotation.value));
        if (annotation.xref) {
            term.children.push(textElement('bp:ID', annotation.xref.identifier));
            term.children.push(textElement('bp:Ontology', ontologyName(annotation.xref.dataSource)));
        }
        biopax.children.push(term);
    }
    return biopax.children.length > 0 ? biopax : null;
}

/** Encode a store as a GPML2013a root element. The store is repaired first. */
export function writeGpml2013a(store: PathwayStore): XmlElement {
    prepareForWrite(store);
    const state = store.getState();
    const { pathway } = state;
    const model = loadContentModel('2013a');

    const root = createElement('Pathway', { xmlns: GPML2013A_NAMESPACE });
    for (const [prefix, uri] of Object.entries(model.namespaces)) root.attributes[`xmlns:${prefix}`] = uri;

    const properties = pathway.dynamicProperties;
    const author =
        properties[LEGACY_PATHWAY_KEYS.author] ??
        (pathway.authors.length > 0 ? pathway.authors.map((entry) => entry.name).join(', ') : null);
    table.write('Pathway', 'Name', root, pathway.title);
    table.write('Pathway', 'Organism', root, pathway.organism);
    table.write('Pathway', 'Data-Source', root, pathway.source);
    table.write('Pathway', 'Version', root, pathway.version);
    table.write('Pathway', 'Author', root, author);
    table.write('Pathway', 'Maintainer', root, properties[LEGACY_PATHWAY_KEYS.maintainer] ?? null);
    table.write('Pathway', 'Email', root, properties[LEGACY_PATHWAY_KEYS.email] ?? null);
    table.write('Pathway', 'License', root, pathway.license);
    table.write('Pathway', 'Last-Modified', root, properties[LEGACY_PATHWAY_KEYS.lastModified] ?? null);

    const comments: Comment[] =
        pathway.description === null
            ? pathway.comments
            : [{ text: pathway.description, source: DESCRIPTION_SOURCE }, ...pathway.comments];
    const ownProperties = Object.fromEntries(
        Object.entries(properties).filter(([key]) => !isLegacyPathwayKey(key)),
    );
    writeInfo(root, pathway, {}, comments, ownProperties);

    const graphics = createElement('Graphics');
    table.write('Pathway.Graphics', 'BoardWidth', graphics, pathway.boardWidth);
    table.write('Pathway.Graphics', 'BoardHeight', graphics, pathway.boardHeight);
    root.children.push(graphics);

    for (const element of state.getElements()) {
        switch (element.kind) {
            case 'DataNode':
                root.children.push(writeDataNode(element));
                break;
            case 'State':
                root.children.push(writeState(element));
                break;
            case 'Label':
                root.children.push(writeLabel(element));
                break;
            case 'Shape':
                root.children.push(writeShape(element));
                break;
            case 'Group':
                root.children.push(writeGroup(element));
                break;
            case 'Interaction':
            case 'GraphicalLine':
                root.children.push(writeLine(element));
                break;
        }
    }

    root.children.push(
        centerElement('InfoBox', properties[LEGACY_PATHWAY_KEYS.infoBoxX], properties[LEGACY_PATHWAY_KEYS.infoBoxY]),
    );
    if (properties[LEGACY_PATHWAY_KEYS.legendX] !== undefined) {
        root.children.push(
            centerElement('Legend', properties[LEGACY_PATHWAY_KEYS.legendX], properties[LEGACY_PATHWAY_KEYS.legendY]),
        );
    }
    const biopax = writeBiopax(store);
    if (biopax) root.children.push(biopax);

    orderChildren(model, root);
    Logger.info('gpml.write', { version: '2013a', elements: state.elementOrder.length });
    return root;
}
