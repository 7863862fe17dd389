/**
 * GPML2021 reader.
 *
 * Pool entries (Annotations, Citations, Evidences) are admitted the first
 * time something refers to them, so identical entries collapse into one.
 */
import { ConversionError } from '../errors';
import { reconcileCoordinates } from '../engine/coordinateReconciler';
import { backfillLineIds } from '../engine/identifierBackfill';
import { loadAttributeTable } from '../schema/attributeTable';
import { Logger } from '../services/logger';
import {
    createAnchor,
    createAnnotation,
    createCitation,
    createDataNode,
    createEvidence,
    createGraphicalLine,
    createGroup,
    createInteraction,
    createLabel,
    createShape,
    createState,
} from '../store/elementFactory';
import { createPathwayStore, type PathwayStore } from '../store/pathwayStore';
import type {
    AnnotationRef,
    Author,
    CitationRef,
    ElementDraft,
    ElementInfo,
    EvidenceRef,
    LinePoint,
    PoolKind,
    RectProperty,
    ShapeStyleProperty,
    Xref,
} from '../types/pathway';
import {
    AnchorShapeTypes,
    AnnotationTypes,
    ArrowHeadTypes,
    ConnectorTypes,
    DataNodeTypes,
    GroupTypes,
    LineStyleTypes,
    ShapeTypes,
    StateTypes,
} from '../types/vocabulary';
import { FONT_2021, readColor, readFont, readXref, requireChild, type ReadOptions } from './codecSupport';
import { defaultDataSourceResolver, type DataSourceResolver } from './dataSources';
import { childElement, childElements, type XmlElement } from './xmlTree';

export const GPML2021_NAMESPACE = 'http://pathvisio.org/GPML/2021';

const XREF_NAMES = { identifier: 'identifier', dataSource: 'dataSource' };

/** Children of a wrapper such as `<DataNodes>`, in document order. */
function listed(root: XmlElement, wrapper: string, name: string): XmlElement[] {
    const container = childElement(root, wrapper);
    return container ? childElements(container, name) : [];
}

class Gpml2021Reader {
    private readonly table = loadAttributeTable('2021');
    private readonly store = createPathwayStore();
    private readonly resolve: DataSourceResolver;

    /** Every elementId declared in the document; derived line ids avoid them. */
    private readonly declaredIds = new Set<string>();
    /** Pool entries by document id, until first referenced. */
    private readonly poolElements = new Map<string, { kind: PoolKind; element: XmlElement }>();
    /** Document pool id to admitted pool id. */
    private readonly admitted = new Map<string, string>();

    constructor(
        private readonly root: XmlElement,
        options: ReadOptions,
    ) {
        this.resolve = options.resolveDataSource ?? defaultDataSourceResolver();
    }

    read(): PathwayStore {
        const { root } = this;
        this.collectElementIds(root);
        this.indexPools();
        this.readPathway();

        for (const group of listed(root, 'Groups', 'Group')) this.add(this.readGroup(group));
        for (const label of listed(root, 'Labels', 'Label')) this.add(this.readLabel(label));
        for (const shape of listed(root, 'Shapes', 'Shape')) this.add(this.readShape(shape));

        const dataNodes = listed(root, 'DataNodes', 'DataNode');
        for (const node of dataNodes) this.add(this.readDataNode(node));
        for (const node of dataNodes) {
            const parentId = this.table.readString('DataNode', 'elementId', node);
            for (const state of listed(node, 'States', 'State')) this.add(this.readState(state, parentId));
        }

        const lines: ElementDraft[] = [
            ...listed(root, 'Interactions', 'Interaction').map((line) => this.readLine(line, 'Interaction')),
            ...listed(root, 'GraphicalLines', 'GraphicalLine').map((line) => this.readLine(line, 'GraphicalLine')),
        ];
        backfillLineIds(lines, (id) => this.declaredIds.has(id) || this.store.getState().isIdTaken(id));
        for (const line of lines) this.add(line);

        reconcileCoordinates(this.store);
        this.store.getState().removeEmptyGroups();

        Logger.info('gpml.read', {
            version: '2021',
            elements: this.store.getState().elementOrder.length,
            annotations: Object.keys(this.store.getState().annotations).length,
        });
        return this.store;
    }

    private add(draft: ElementDraft): void {
        this.store.getState().addElement(draft);
    }

    private collectElementIds(element: XmlElement): void {
        const elementId = element.attributes.elementId;
        if (elementId !== undefined) this.declaredIds.add(elementId);
        for (const child of element.children) this.collectElementIds(child);
    }

    /* ---------------------------------------------------------------- */
    /*  Pools and refs                                                  */
    /* ---------------------------------------------------------------- */

    private indexPools(): void {
        const pools: [string, string, PoolKind][] = [
            ['Annotations', 'Annotation', 'annotation'],
            ['Citations', 'Citation', 'citation'],
            ['Evidences', 'Evidence', 'evidence'],
        ];
        for (const [wrapper, tag, kind] of pools) {
            for (const element of listed(this.root, wrapper, tag)) {
                this.poolElements.set(this.table.readString(tag, 'elementId', element), { kind, element });
            }
        }
    }

    private url(element: XmlElement): string | null {
        const url = childElement(element, 'Url');
        return url ? this.table.readString('Url', 'link', url) : null;
    }

    private xref(element: XmlElement): Xref | null {
        return readXref(this.table, 'Xref', childElement(element, 'Xref'), XREF_NAMES, this.resolve);
    }

    /** Admit a pool entry on first reference; null when the document has no such entry. */
    private poolId(documentId: string, kind: PoolKind): string | null {
        const known = this.admitted.get(documentId);
        if (known !== undefined) return known;
        const entry = this.poolElements.get(documentId);
        if (!entry || entry.kind !== kind) {
            Logger.debug('gpml.read.unresolvedRef', { ref: documentId, kind });
            return null;
        }

        const state = this.store.getState();
        const id = this.admit(kind, entry.element, state.isIdTaken(documentId) ? null : documentId);
        this.admitted.set(documentId, id);
        return id;
    }

    private admit(kind: PoolKind, element: XmlElement, elementId: string | null): string {
        const { table } = this;
        const state = this.store.getState();
        switch (kind) {
            case 'annotation':
                return state.addAnnotation({
                    ...createAnnotation(table.readString('Annotation', 'value', element), {
                        type: AnnotationTypes.parse(table.readString('Annotation', 'type', element)),
                        xref: this.xref(element),
                        urlLink: this.url(element),
                    }),
                    elementId,
                });
            case 'citation':
                return state.addCitation({
                    ...createCitation({
                        xref: this.xref(element),
                        urlLink: this.url(element),
                        title: table.read('Citation', 'title', element),
                        source: table.read('Citation', 'source', element),
                        year: table.read('Citation', 'year', element),
                        authors: childElements(element, 'Author').map((author) =>
                            table.readString('Author', 'name', author),
                        ),
                    }),
                    elementId,
                });
            case 'evidence':
                return state.addEvidence({
                    ...createEvidence({
                        value: table.read('Evidence', 'value', element),
                        xref: this.xref(element),
                        urlLink: this.url(element),
                    }),
                    elementId,
                });
        }
    }

    private refTarget(element: XmlElement, tag: string): string {
        return this.table.readString(tag, 'elementRef', element);
    }

    private annotationRefs(parent: XmlElement): AnnotationRef[] {
        const refs: AnnotationRef[] = [];
        for (const element of childElements(parent, 'AnnotationRef')) {
            const annotationId = this.poolId(this.refTarget(element, 'AnnotationRef'), 'annotation');
            if (annotationId === null) continue;
            refs.push({
                annotationId,
                citationRefs: this.citationRefs(element),
                evidenceRefs: this.evidenceRefs(element),
            });
        }
        return refs;
    }

    private citationRefs(parent: XmlElement): CitationRef[] {
        const refs: CitationRef[] = [];
        for (const element of childElements(parent, 'CitationRef')) {
            const citationId = this.poolId(this.refTarget(element, 'CitationRef'), 'citation');
            if (citationId === null) continue;
            refs.push({ citationId, annotationRefs: this.annotationRefs(element) });
        }
        return refs;
    }

    private evidenceRefs(parent: XmlElement): EvidenceRef[] {
        const refs: EvidenceRef[] = [];
        for (const element of childElements(parent, 'EvidenceRef')) {
            const evidenceId = this.poolId(this.refTarget(element, 'EvidenceRef'), 'evidence');
            if (evidenceId !== null) refs.push({ evidenceId });
        }
        return refs;
    }

    private readInfo(element: XmlElement): ElementInfo {
        const dynamicProperties: Record<string, string> = {};
        for (const property of childElements(element, 'Property')) {
            dynamicProperties[this.table.readString('Property', 'key', property)] = this.table.readString(
                'Property',
                'value',
                property,
            );
        }
        return {
            comments: childElements(element, 'Comment').map((comment) => ({
                text: comment.text ?? '',
                source: this.table.read('Comment', 'source', comment),
            })),
            dynamicProperties,
            annotationRefs: this.annotationRefs(element),
            citationRefs: this.citationRefs(element),
            evidenceRefs: this.evidenceRefs(element),
        };
    }

    /* ---------------------------------------------------------------- */
    /*  Pathway                                                         */
    /* ---------------------------------------------------------------- */

    private readAuthor(element: XmlElement): Author {
        return {
            name: this.table.readString('Author', 'name', element),
            username: this.table.read('Author', 'username', element),
            order: this.table.readInteger('Author', 'order', element),
            xref: this.xref(element),
        };
    }

    private readPathway(): void {
        const { root, table } = this;
        const graphics = requireChild(root, 'Graphics', 'Pathway.Graphics');
        const description = childElement(root, 'Description');
        this.store.getState().setPathway({
            ...this.readInfo(root),
            title: table.readString('Pathway', 'title', root),
            organism: table.read('Pathway', 'organism', root),
            source: table.read('Pathway', 'source', root),
            version: table.read('Pathway', 'version', root),
            license: table.read('Pathway', 'license', root),
            description: description ? description.text ?? '' : null,
            xref: this.xref(root),
            authors: listed(root, 'Authors', 'Author').map((author) => this.readAuthor(author)),
            boardWidth: table.readNumber('Pathway.Graphics', 'boardWidth', graphics),
            boardHeight: table.readNumber('Pathway.Graphics', 'boardHeight', graphics),
            backgroundColor: readColor(table, 'Pathway.Graphics', 'backgroundColor', graphics),
        });
    }

    /* ---------------------------------------------------------------- */
    /*  Shaped elements                                                 */
    /* ---------------------------------------------------------------- */

    private readShapeStyle(tag: string, graphics: XmlElement): ShapeStyleProperty {
        const { table } = this;
        return {
            borderColor: readColor(table, tag, 'borderColor', graphics),
            borderStyle: LineStyleTypes.parse(table.readString(tag, 'borderStyle', graphics)),
            borderWidth: table.readNumber(tag, 'borderWidth', graphics),
            fillColor: readColor(table, tag, 'fillColor', graphics),
            shapeType: ShapeTypes.parse(table.readString(tag, 'shapeType', graphics)),
            zOrder: table.readInteger(tag, 'zOrder', graphics),
            rotation: table.readNumber(tag, 'rotation', graphics),
        };
    }

    private readRect(tag: string, graphics: XmlElement): RectProperty {
        return {
            centerX: this.table.readNumber(tag, 'centerX', graphics),
            centerY: this.table.readNumber(tag, 'centerY', graphics),
            width: this.table.readNumber(tag, 'width', graphics),
            height: this.table.readNumber(tag, 'height', graphics),
        };
    }

    private readBox(tag: string, element: XmlElement) {
        const key = `${tag}.Graphics`;
        const graphics = requireChild(element, 'Graphics', key);
        return {
            ...this.readInfo(element),
            ...this.readRect(key, graphics),
            ...readFont(this.table, key, graphics, FONT_2021, '000000'),
            ...this.readShapeStyle(key, graphics),
            elementId: this.table.readString(tag, 'elementId', element),
        };
    }

    private readGroup(element: XmlElement): ElementDraft {
        return createGroup({
            ...this.readBox('Group', element),
            type: GroupTypes.parse(this.table.readString('Group', 'type', element)),
            textLabel: this.table.read('Group', 'textLabel', element),
            xref: this.xref(element),
            groupRef: this.table.read('Group', 'groupRef', element),
        });
    }

    private readLabel(element: XmlElement): ElementDraft {
        return createLabel({
            ...this.readBox('Label', element),
            textLabel: this.table.readString('Label', 'textLabel', element),
            href: this.table.read('Label', 'href', element),
            groupRef: this.table.read('Label', 'groupRef', element),
        });
    }

    private readShape(element: XmlElement): ElementDraft {
        return createShape({
            ...this.readBox('Shape', element),
            textLabel: this.table.read('Shape', 'textLabel', element),
            groupRef: this.table.read('Shape', 'groupRef', element),
        });
    }

    private readDataNode(element: XmlElement): ElementDraft {
        return createDataNode({
            ...this.readBox('DataNode', element),
            textLabel: this.table.readString('DataNode', 'textLabel', element),
            type: DataNodeTypes.parse(this.table.readString('DataNode', 'type', element)),
            xref: this.xref(element),
            groupRef: this.table.read('DataNode', 'groupRef', element),
            aliasRef: this.table.read('DataNode', 'aliasRef', element),
        });
    }

    private readState(element: XmlElement, parentId: string): ElementDraft {
        const graphics = requireChild(element, 'Graphics', 'State.Graphics');
        return createState({
            ...this.readInfo(element),
            ...readFont(this.table, 'State.Graphics', graphics, FONT_2021, '000000'),
            ...this.readShapeStyle('State.Graphics', graphics),
            elementId: this.table.readString('State', 'elementId', element),
            width: this.table.readNumber('State.Graphics', 'width', graphics),
            height: this.table.readNumber('State.Graphics', 'height', graphics),
            relX: this.table.readNumber('State.Graphics', 'relX', graphics),
            relY: this.table.readNumber('State.Graphics', 'relY', graphics),
            textLabel: this.table.readString('State', 'textLabel', element),
            type: StateTypes.parse(this.table.readString('State', 'type', element)),
            xref: this.xref(element),
            elementRef: parentId,
        });
    }

    /* ---------------------------------------------------------------- */
    /*  Lines                                                           */
    /* ---------------------------------------------------------------- */

    private readLine(element: XmlElement, tag: 'Interaction' | 'GraphicalLine'): ElementDraft {
        const { table } = this;
        const waypoints = requireChild(element, 'Waypoints', 'Waypoints');
        const graphics = requireChild(element, 'Graphics', 'Line.Graphics');

        const pointElements = childElements(waypoints, 'Point');
        if (pointElements.length < 2) {
            throw new ConversionError(`${tag} needs at least two points, found ${pointElements.length}`, {
                tag: 'Point',
            });
        }
        const points: LinePoint[] = pointElements.map((point) => ({
            elementId: table.read('Point', 'elementId', point),
            x: table.readNumber('Point', 'x', point),
            y: table.readNumber('Point', 'y', point),
            elementRef: table.read('Point', 'elementRef', point),
            relX: table.readFloat('Point', 'relX', point),
            relY: table.readFloat('Point', 'relY', point),
        }));
        const arrowHead = (point: XmlElement) => ArrowHeadTypes.parse(table.readString('Point', 'arrowHead', point));

        const common = {
            ...this.readInfo(element),
            points,
            anchors: childElements(waypoints, 'Anchor').map((anchor) =>
                createAnchor(table.readNumber('Anchor', 'position', anchor), {
                    elementId: table.read('Anchor', 'elementId', anchor),
                    shapeType: AnchorShapeTypes.parse(table.readString('Anchor', 'shapeType', anchor)),
                }),
            ),
            startArrowHead: arrowHead(pointElements[0]),
            endArrowHead: arrowHead(pointElements[pointElements.length - 1]),
            groupRef: table.read(tag, 'groupRef', element),
            lineColor: readColor(table, 'Line.Graphics', 'lineColor', graphics),
            lineStyle: LineStyleTypes.parse(table.readString('Line.Graphics', 'lineStyle', graphics)),
            lineWidth: table.readNumber('Line.Graphics', 'lineWidth', graphics),
            connectorType: ConnectorTypes.parse(table.readString('Line.Graphics', 'connectorType', graphics)),
            zOrder: table.readInteger('Line.Graphics', 'zOrder', graphics),
        };
        const elementId = table.read(tag, 'elementId', element);
        if (tag === 'GraphicalLine') return { ...createGraphicalLine(common), elementId };
        return { ...createInteraction({ ...common, xref: this.xref(element) }), elementId };
    }
}

/** Decode a GPML2021 root element into a new store. */
export function readGpml2021(root: XmlElement, options: ReadOptions = {}): PathwayStore {
    if (root.name !== 'Pathway') {
        throw new ConversionError(`root element must be Pathway, found ${root.name}`, { tag: root.name });
    }
    return new Gpml2021Reader(root, options).read();
}
