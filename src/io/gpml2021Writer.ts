/**
 * GPML2021 writer.
 */
import { isLegacyPathwayKey } from '../engine/versionConverter';
import { loadAttributeTable } from '../schema/attributeTable';
import { loadContentModel, orderChildren } from '../schema/contentModel';
import { Logger } from '../services/logger';
import type { PathwayStore } from '../store/pathwayStore';
import type {
    AnnotationRef,
    Author,
    CitationRef,
    DataNode,
    ElementInfo,
    EvidenceRef,
    LineElement,
    ShapedElement,
    State,
    Xref,
} from '../types/pathway';
import { FONT_2021, byElementId, prepareForWrite, writeFont } from './codecSupport';
import { formatColor } from './colors';
import { GPML2021_NAMESPACE } from './gpml2021Reader';
import { createElement, type XmlElement } from './xmlTree';

const table = loadAttributeTable('2021');

function writeXref(xref: Xref | null): XmlElement[] {
    if (!xref) return [];
    const element = createElement('Xref');
    table.write('Xref', 'identifier', element, xref.identifier);
    table.write('Xref', 'dataSource', element, xref.dataSource);
    return [element];
}

function writeUrl(link: string | null): XmlElement[] {
    if (link === null) return [];
    const element = createElement('Url');
    table.write('Url', 'link', element, link);
    return [element];
}

function refElement(tag: string, target: string, children: XmlElement[] = []): XmlElement {
    const element = createElement(tag, {}, children);
    table.write(tag, 'elementRef', element, target);
    return element;
}

function annotationRefs(refs: AnnotationRef[]): XmlElement[] {
    return refs.map((ref) =>
        refElement('AnnotationRef', ref.annotationId, [
            ...citationRefs(ref.citationRefs),
            ...evidenceRefs(ref.evidenceRefs),
        ]),
    );
}

function citationRefs(refs: CitationRef[]): XmlElement[] {
    return refs.map((ref) => refElement('CitationRef', ref.citationId, annotationRefs(ref.annotationRefs)));
}

function evidenceRefs(refs: EvidenceRef[]): XmlElement[] {
    return refs.map((ref) => refElement('EvidenceRef', ref.evidenceId));
}

function writeInfo(element: XmlElement, info: ElementInfo, properties = info.dynamicProperties): void {
    for (const comment of info.comments) {
        const child = createElement('Comment', {}, [], comment.text);
        table.write('Comment', 'source', child, comment.source);
        element.children.push(child);
    }
    for (const [key, value] of Object.entries(properties)) {
        const property = createElement('Property');
        table.write('Property', 'key', property, key);
        table.write('Property', 'value', property, value);
        element.children.push(property);
    }
    element.children.push(
        ...annotationRefs(info.annotationRefs),
        ...citationRefs(info.citationRefs),
        ...evidenceRefs(info.evidenceRefs),
    );
}

/** `<Graphics>` of a shaped element; States store a relative position instead of a rect. */
function shapeGraphics(key: string, element: ShapedElement): XmlElement {
    const graphics = createElement('Graphics');
    if (element.kind === 'State') {
        table.write(key, 'relX', graphics, element.relX);
        table.write(key, 'relY', graphics, element.relY);
    } else {
        table.write(key, 'centerX', graphics, element.centerX);
        table.write(key, 'centerY', graphics, element.centerY);
    }
    table.write(key, 'width', graphics, element.width);
    table.write(key, 'height', graphics, element.height);
    writeFont(table, key, graphics, FONT_2021, element);
    table.write(key, 'borderColor', graphics, formatColor(element.borderColor));
    table.write(key, 'borderStyle', graphics, element.borderStyle.name);
    table.write(key, 'borderWidth', graphics, element.borderWidth);
    table.write(key, 'fillColor', graphics, formatColor(element.fillColor));
    table.write(key, 'shapeType', graphics, element.shapeType.name);
    table.write(key, 'zOrder', graphics, element.zOrder);
    table.write(key, 'rotation', graphics, element.rotation);
    return graphics;
}

function shapedElement(element: Exclude<ShapedElement, State>, children: XmlElement[] = []): XmlElement {
    const tag = element.kind;
    const xml = createElement(tag);
    table.write(tag, 'elementId', xml, element.elementId);
    switch (element.kind) {
        case 'DataNode':
            table.write(tag, 'textLabel', xml, element.textLabel);
            table.write(tag, 'type', xml, element.type.name);
            table.write(tag, 'groupRef', xml, element.groupRef);
            table.write(tag, 'aliasRef', xml, element.aliasRef);
            xml.children.push(...writeXref(element.xref));
            break;
        case 'Label':
            table.write(tag, 'textLabel', xml, element.textLabel);
            table.write(tag, 'href', xml, element.href);
            table.write(tag, 'groupRef', xml, element.groupRef);
            break;
        case 'Shape':
            table.write(tag, 'textLabel', xml, element.textLabel);
            table.write(tag, 'groupRef', xml, element.groupRef);
            break;
        case 'Group':
            table.write(tag, 'type', xml, element.type.name);
            table.write(tag, 'textLabel', xml, element.textLabel);
            table.write(tag, 'groupRef', xml, element.groupRef);
            xml.children.push(...writeXref(element.xref));
            break;
    }
    xml.children.push(...children, shapeGraphics(`${tag}.Graphics`, element));
    writeInfo(xml, element);
    return xml;
}

function writeState(state: State): XmlElement {
    const xml = createElement('State');
    table.write('State', 'elementId', xml, state.elementId);
    table.write('State', 'textLabel', xml, state.textLabel);
    table.write('State', 'type', xml, state.type.name);
    xml.children.push(...writeXref(state.xref), shapeGraphics('State.Graphics', state));
    writeInfo(xml, state);
    return xml;
}

function writeDataNode(node: DataNode, states: State[]): XmlElement {
    const children = states.length > 0 ? [createElement('States', {}, states.map(writeState))] : [];
    return shapedElement(node, children);
}

function writeLine(line: LineElement): XmlElement {
    const xml = createElement(line.kind);
    table.write(line.kind, 'elementId', xml, line.elementId);
    table.write(line.kind, 'groupRef', xml, line.groupRef);
    if (line.kind === 'Interaction') xml.children.push(...writeXref(line.xref));

    const waypoints = createElement('Waypoints');
    const last = line.points.length - 1;
    line.points.forEach((point, index) => {
        const child = createElement('Point');
        const arrowHead = index === 0 ? line.startArrowHead : index === last ? line.endArrowHead : null;
        table.write('Point', 'elementId', child, point.elementId);
        table.write('Point', 'x', child, point.x);
        table.write('Point', 'y', child, point.y);
        table.write('Point', 'relX', child, point.relX);
        table.write('Point', 'relY', child, point.relY);
        table.write('Point', 'elementRef', child, point.elementRef);
        table.write('Point', 'arrowHead', child, arrowHead ? arrowHead.name : null);
        waypoints.children.push(child);
    });
    for (const anchor of line.anchors) {
        const child = createElement('Anchor');
        table.write('Anchor', 'elementId', child, anchor.elementId);
        table.write('Anchor', 'position', child, anchor.position);
        table.write('Anchor', 'shapeType', child, anchor.shapeType.name);
        waypoints.children.push(child);
    }

    const graphics = createElement('Graphics');
    table.write('Line.Graphics', 'lineColor', graphics, formatColor(line.lineColor));
    table.write('Line.Graphics', 'lineStyle', graphics, line.lineStyle.name);
    table.write('Line.Graphics', 'lineWidth', graphics, line.lineWidth);
    table.write('Line.Graphics', 'connectorType', graphics, line.connectorType.name);
    table.write('Line.Graphics', 'zOrder', graphics, line.zOrder);

    xml.children.push(waypoints, graphics);
    writeInfo(xml, line);
    return xml;
}

function writeAuthor(author: Author): XmlElement {
    const element = createElement('Author', {}, writeXref(author.xref));
    table.write('Author', 'name', element, author.name);
    table.write('Author', 'username', element, author.username);
    table.write('Author', 'order', element, author.order);
    return element;
}

function container(name: string, children: XmlElement[]): XmlElement[] {
    return children.length > 0 ? [createElement(name, {}, children)] : [];
}

/* ------------------------------------------------------------------ */
/*  Pools                                                             */
/* ------------------------------------------------------------------ */

function writePools(store: PathwayStore): XmlElement[] {
    const { annotations, citations, evidences } = store.getState();

    const annotationElements = Object.values(annotations)
        .sort(byElementId)
        .map((annotation) => {
            const element = createElement('Annotation', {}, [
                ...writeXref(annotation.xref),
                ...writeUrl(annotation.urlLink),
            ]);
            table.write('Annotation', 'elementId', element, annotation.elementId);
            table.write('Annotation', 'value', element, annotation.value);
            table.write('Annotation', 'type', element, annotation.type.name);
            return element;
        });

    const citationElements = Object.values(citations)
        .sort(byElementId)
        .map((citation) => {
            const authors = citation.authors.map((name) =>
                writeAuthor({ name, username: null, order: null, xref: null }),
            );
            const element = createElement('Citation', {}, [
                ...writeXref(citation.xref),
                ...writeUrl(citation.urlLink),
                ...authors,
            ]);
            table.write('Citation', 'elementId', element, citation.elementId);
            table.write('Citation', 'title', element, citation.title);
            table.write('Citation', 'source', element, citation.source);
            table.write('Citation', 'year', element, citation.year);
            return element;
        });

    const evidenceElements = Object.values(evidences)
        .sort(byElementId)
        .map((evidence) => {
            const element = createElement('Evidence', {}, [
                ...writeXref(evidence.xref),
                ...writeUrl(evidence.urlLink),
            ]);
            table.write('Evidence', 'elementId', element, evidence.elementId);
            table.write('Evidence', 'value', element, evidence.value);
            return element;
        });

    return [
        ...container('Annotations', annotationElements),
        ...container('Citations', citationElements),
        ...container('Evidences', evidenceElements),
    ];
}

/* ------------------------------------------------------------------ */
/*  Document                                                          */
/* ------------------------------------------------------------------ */

/** Encode a store as a GPML2021 root element. The store is repaired first. */
export function writeGpml2021(store: PathwayStore): XmlElement {
    prepareForWrite(store);
    const state = store.getState();
    const { pathway } = state;

    const root = createElement('Pathway', { xmlns: GPML2021_NAMESPACE });
    table.write('Pathway', 'title', root, pathway.title);
    table.write('Pathway', 'organism', root, pathway.organism);
    table.write('Pathway', 'source', root, pathway.source);
    table.write('Pathway', 'version', root, pathway.version);
    table.write('Pathway', 'license', root, pathway.license);

    root.children.push(...writeXref(pathway.xref));
    if (pathway.description !== null) root.children.push(createElement('Description', {}, [], pathway.description));
    root.children.push(...container('Authors', pathway.authors.map(writeAuthor)));

    const legacyKeys = Object.keys(pathway.dynamicProperties).filter(isLegacyPathwayKey);
    if (legacyKeys.length > 0) {
        Logger.warn('gpml.write.droppedProperties', { version: '2021', keys: legacyKeys });
    }
    const properties = Object.fromEntries(
        Object.entries(pathway.dynamicProperties).filter(([key]) => !isLegacyPathwayKey(key)),
    );
    writeInfo(root, pathway, properties);

    const graphics = createElement('Graphics');
    table.write('Pathway.Graphics', 'boardWidth', graphics, pathway.boardWidth);
    table.write('Pathway.Graphics', 'boardHeight', graphics, pathway.boardHeight);
    table.write('Pathway.Graphics', 'backgroundColor', graphics, formatColor(pathway.backgroundColor));
    root.children.push(graphics);

    const elements = state.getElements();
    const statesOf = (nodeId: string) =>
        elements.filter((element): element is State => element.kind === 'State' && element.elementRef === nodeId);

    const dataNodes: XmlElement[] = [];
    const interactions: XmlElement[] = [];
    const graphicalLines: XmlElement[] = [];
    const labels: XmlElement[] = [];
    const shapes: XmlElement[] = [];
    const groups: XmlElement[] = [];
    for (const element of elements) {
        switch (element.kind) {
            case 'DataNode':
                dataNodes.push(writeDataNode(element, statesOf(element.elementId)));
                break;
            case 'State':
                if (element.elementRef === null || state.elements[element.elementRef]?.kind !== 'DataNode') {
                    Logger.warn('gpml.write.orphanState', { elementId: element.elementId });
                }
                break;
            case 'Interaction':
                interactions.push(writeLine(element));
                break;
            case 'GraphicalLine':
                graphicalLines.push(writeLine(element));
                break;
            case 'Label':
                labels.push(shapedElement(element));
                break;
            case 'Shape':
                shapes.push(shapedElement(element));
                break;
            case 'Group':
                groups.push(shapedElement(element));
                break;
        }
    }

    root.children.push(
        ...container('DataNodes', dataNodes),
        ...container('Interactions', interactions),
        ...container('GraphicalLines', graphicalLines),
        ...container('Labels', labels),
        ...container('Shapes', shapes),
        ...container('Groups', groups),
        ...writePools(store),
    );

    orderChildren(loadContentModel('2021'), root);
    Logger.info('gpml.write', { version: '2021', elements: state.elementOrder.length });
    return root;
}
