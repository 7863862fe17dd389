/**
 * GPML2013a reader.
 *
 * The older schema keeps groups in their own `GroupId` namespace, stores
 * no group geometry, and carries several model fields as `Attribute`
 * markers; all of it is folded into the current model here. Decoding runs
 * against a fresh store, so a failure leaves nothing behind.
 */
import { ConversionError } from '../errors';
import { applyGroupBounds, reconcileCoordinates } from '../engine/coordinateReconciler';
import { backfillLineIds, deriveId } from '../engine/identifierBackfill';
import {
    ANCHOR_SHAPES,
    ARROW_HEADS,
    CELL_COMPONENT_KEY,
    DATA_NODE_TYPES,
    DOUBLE_LINE_KEY,
    GROUP_STYLES,
    LEGACY_PATHWAY_KEYS,
    LINE_STYLES,
    SHAPE_TYPES,
    STATE_ROTATION_KEY,
    STATE_TYPES,
    cellComponentShape,
    fromLegacy,
    ontologyPrefix,
} from '../engine/versionConverter';
import { formatNumber, isDecimal, loadAttributeTable } from '../schema/attributeTable';
import { Logger } from '../services/logger';
import {
    createAnchor,
    createCitation,
    createDataNode,
    createGraphicalLine,
    createGroup,
    createInteraction,
    createLabel,
    createShape,
    createState,
    groupGraphics,
} from '../store/elementFactory';
import { createPathwayStore, type PathwayStore } from '../store/pathwayStore';
import type {
    Anchor,
    AnnotationRef,
    CitationRef,
    ColorHex,
    Comment,
    ElementDraft,
    ElementInfo,
    LinePoint,
    ShapeStyleProperty,
    Xref,
} from '../types/pathway';
import {
    AnnotationTypes,
    ConnectorTypes,
    LineStyleTypes,
    ShapeTypes,
    type ShapeTypeName,
} from '../types/vocabulary';
import {
    FONT_2013A,
    readColor,
    readFont,
    readXref,
    requireChild,
    type ReadOptions,
} from './codecSupport';
import { canonicalDataSource, defaultDataSourceResolver, type DataSourceResolver } from './dataSources';
import { parseStateComment, stateCommentRefs } from './stateComments';
import { childElement, childElements, childText, type XmlElement } from './xmlTree';

export const GPML2013A_NAMESPACE = 'http://pathvisio.org/GPML/2013a';
export const DESCRIPTION_SOURCE = 'WikiPathways-description';

const XREF_NAMES = { identifier: 'ID', dataSource: 'Database' };

/** Marker attributes lifted out of an element's dynamic properties. */
interface LegacyMarkers {
    properties: Record<string, string>;
    doubleLine: boolean;
    cellComponent: ShapeTypeName | null;
    stateRotation: number | null;
}

function splitMarkers(source: Record<string, string>): LegacyMarkers {
    const properties = { ...source };
    const markers: LegacyMarkers = { properties, doubleLine: false, cellComponent: null, stateRotation: null };

    if (properties[DOUBLE_LINE_KEY] === 'Double') {
        markers.doubleLine = true;
        delete properties[DOUBLE_LINE_KEY];
    }
    const component = properties[CELL_COMPONENT_KEY];
    if (component !== undefined) {
        markers.cellComponent = cellComponentShape(component);
        if (markers.cellComponent) delete properties[CELL_COMPONENT_KEY];
    }
    const rotation = properties[STATE_ROTATION_KEY];
    if (rotation !== undefined && isDecimal(rotation)) {
        markers.stateRotation = Number(rotation);
        delete properties[STATE_ROTATION_KEY];
    }
    return markers;
}

function isUrl(value: string): boolean {
    return /^(https?:\/\/|www\.)/i.test(value.trim());
}

class Gpml2013aReader {
    private readonly table = loadAttributeTable('2013a');
    private readonly store = createPathwayStore();
    private readonly resolve: DataSourceResolver;

    /** Every GraphId in the document; freshly allocated ids avoid them. */
    private readonly graphIds = new Set<string>();
    /** GroupId to group elementId. */
    private readonly groupIds = new Map<string, string>();
    /** Group GraphId to group elementId, for points bound to a group. */
    private readonly groupGraphIds = new Map<string, string>();
    /** Biopax rdf:id to citation elementId. */
    private readonly citationIds = new Map<string, string>();

    constructor(
        private readonly root: XmlElement,
        options: ReadOptions,
    ) {
        this.resolve = options.resolveDataSource ?? defaultDataSourceResolver();
    }

    read(): PathwayStore {
        this.collectGraphIds(this.root);
        this.readCitations();
        this.readPathway();
        this.assignGroupIds();

        for (const element of this.root.children) {
            if (element.name === 'Group') this.store.getState().addElement(this.readGroup(element));
        }
        for (const element of this.root.children) {
            if (element.name === 'Label') this.store.getState().addElement(this.readLabel(element));
            if (element.name === 'Shape') this.store.getState().addElement(this.readShape(element));
        }
        for (const element of childElements(this.root, 'DataNode')) {
            this.store.getState().addElement(this.readDataNode(element));
        }
        for (const element of childElements(this.root, 'State')) {
            this.store.getState().addElement(this.readState(element));
        }

        const lines: ElementDraft[] = [];
        for (const element of this.root.children) {
            if (element.name === 'Interaction' || element.name === 'GraphicalLine') {
                lines.push(this.readLine(element, element.name));
            }
        }
        backfillLineIds(lines, (id) => this.graphIds.has(id) || this.store.getState().isIdTaken(id));
        for (const line of lines) this.store.getState().addElement(line);

        applyGroupBounds(this.store);
        reconcileCoordinates(this.store);
        this.store.getState().removeEmptyGroups();

        Logger.info('gpml.read', {
            version: '2013a',
            elements: this.store.getState().elementOrder.length,
            citations: Object.keys(this.store.getState().citations).length,
        });
        return this.store;
    }

    /* ---------------------------------------------------------------- */
    /*  Identifiers                                                     */
    /* ---------------------------------------------------------------- */

    private collectGraphIds(element: XmlElement): void {
        const graphId = element.attributes.GraphId;
        if (graphId !== undefined) this.graphIds.add(graphId);
        for (const child of element.children) this.collectGraphIds(child);
    }

    private freshId(): string {
        let id = this.store.getState().allocateId();
        while (this.graphIds.has(id)) id = this.store.getState().allocateId();
        return id;
    }

    /** A group keeps its GroupId unless another element already uses it as GraphId. */
    private assignGroupIds(): void {
        const claimed = new Set<string>();
        for (const group of childElements(this.root, 'Group')) {
            const groupId = this.table.readString('Group', 'GroupId', group);
            const graphId = this.table.read('Group', 'GraphId', group);
            const collides = (id: string) => claimed.has(id) || (this.graphIds.has(id) && id !== graphId);

            let elementId: string;
            if (!collides(groupId)) elementId = groupId;
            else if (graphId !== null && !claimed.has(graphId)) elementId = graphId;
            else elementId = this.freshId();

            claimed.add(elementId);
            this.groupIds.set(groupId, elementId);
            if (graphId !== null) this.groupGraphIds.set(graphId, elementId);
        }
    }

    private groupRef(tag: string, element: XmlElement): string | null {
        const raw = this.table.read(tag, 'GroupRef', element);
        return raw === null ? null : this.groupIds.get(raw) ?? raw;
    }

    private graphRef(raw: string | null): string | null {
        return raw === null ? null : this.groupGraphIds.get(raw) ?? raw;
    }

    /* ---------------------------------------------------------------- */
    /*  Pathway and Biopax                                              */
    /* ---------------------------------------------------------------- */

    private readCitations(): void {
        const biopax = childElement(this.root, 'Biopax');
        if (!biopax) return;
        for (const xref of childElements(biopax, 'bp:PublicationXref')) {
            const rdfId = this.table.readString('bp:PublicationXref', 'rdf:id', xref);
            const identifier = childText(xref, 'bp:ID');
            const database = childText(xref, 'bp:DB');
            const source = childText(xref, 'bp:SOURCE');
            const draft = createCitation({
                xref:
                    identifier || database
                        ? { identifier: identifier ?? '', dataSource: canonicalDataSource(database ?? '', this.resolve) }
                        : null,
                title: childText(xref, 'bp:TITLE'),
                source,
                urlLink: source !== null && isUrl(source) ? source : null,
                year: childText(xref, 'bp:YEAR'),
                authors: childElements(xref, 'bp:AUTHORS')
                    .map((author) => (author.text ?? '').trim())
                    .filter((author) => author.length > 0),
            });
            const free = !this.graphIds.has(rdfId) && !this.store.getState().isIdTaken(rdfId);
            const id = this.store.getState().addCitation({ ...draft, elementId: free ? rdfId : this.freshId() });
            this.citationIds.set(rdfId, id);
        }
    }

    /** Controlled-vocabulary terms become pathway-level annotations. */
    private readOntologyTerms(): void {
        const biopax = childElement(this.root, 'Biopax');
        if (!biopax) return;
        for (const term of childElements(biopax, 'bp:openControlledVocabulary')) {
            const value = childText(term, 'bp:TERM') ?? '';
            const identifier = childText(term, 'bp:ID');
            const ontology = childText(term, 'bp:Ontology') ?? '';
            const elementId = deriveId(
                `${value}${identifier ?? ''}${ontology}`,
                (id) => this.graphIds.has(id) || this.store.getState().isIdTaken(id),
            );
            const annotationId = this.store.getState().addAnnotation({
                elementId,
                value,
                type: AnnotationTypes.known('Ontology'),
                xref: identifier ? { identifier, dataSource: ontologyPrefix(ontology) } : null,
                urlLink: null,
            });
            this.store.getState().addAnnotationRef(null, { annotationId, citationRefs: [], evidenceRefs: [] });
        }
    }

    private readInfo(element: XmlElement): ElementInfo {
        const comments: Comment[] = childElements(element, 'Comment').map((comment) => ({
            text: comment.text ?? '',
            source: this.table.read('Comment', 'Source', comment),
        }));
        const citationRefs: CitationRef[] = [];
        for (const ref of childElements(element, 'BiopaxRef')) {
            const citationId = this.citationIds.get((ref.text ?? '').trim());
            if (citationId === undefined) {
                Logger.debug('gpml.read.unresolvedBiopaxRef', { ref: ref.text, owner: element.name });
                continue;
            }
            citationRefs.push({ citationId, annotationRefs: [] });
        }
        const dynamicProperties: Record<string, string> = {};
        for (const attribute of childElements(element, 'Attribute')) {
            const key = this.table.readString('Attribute', 'Key', attribute);
            dynamicProperties[key] = this.table.readString('Attribute', 'Value', attribute);
        }
        return { comments, dynamicProperties, annotationRefs: [], citationRefs, evidenceRefs: [] };
    }

    private readPathway(): void {
        const { root, table } = this;
        const graphics = requireChild(root, 'Graphics', 'Pathway.Graphics');
        const info = this.readInfo(root);

        const descriptionIndex = info.comments.findIndex((comment) => comment.source === DESCRIPTION_SOURCE);
        const description = descriptionIndex < 0 ? null : info.comments[descriptionIndex].text;
        const comments = info.comments.filter((_, i) => i !== descriptionIndex);

        const properties = { ...info.dynamicProperties };
        const keep = (key: string, value: string | null) => {
            if (value !== null) properties[key] = value;
        };
        keep(LEGACY_PATHWAY_KEYS.author, table.read('Pathway', 'Author', root));
        keep(LEGACY_PATHWAY_KEYS.maintainer, table.read('Pathway', 'Maintainer', root));
        keep(LEGACY_PATHWAY_KEYS.email, table.read('Pathway', 'Email', root));
        keep(LEGACY_PATHWAY_KEYS.lastModified, table.read('Pathway', 'Last-Modified', root));

        const infoBox = childElement(root, 'InfoBox');
        if (infoBox) {
            keep(LEGACY_PATHWAY_KEYS.infoBoxX, formatNumber(table.readNumber('InfoBox', 'CenterX', infoBox)));
            keep(LEGACY_PATHWAY_KEYS.infoBoxY, formatNumber(table.readNumber('InfoBox', 'CenterY', infoBox)));
        }
        const legend = childElement(root, 'Legend');
        if (legend) {
            keep(LEGACY_PATHWAY_KEYS.legendX, formatNumber(table.readNumber('Legend', 'CenterX', legend)));
            keep(LEGACY_PATHWAY_KEYS.legendY, formatNumber(table.readNumber('Legend', 'CenterY', legend)));
        }

        this.store.getState().setPathway({
            ...info,
            comments,
            dynamicProperties: properties,
            title: table.readString('Pathway', 'Name', root),
            organism: table.read('Pathway', 'Organism', root),
            source: table.read('Pathway', 'Data-Source', root),
            version: table.read('Pathway', 'Version', root),
            license: table.read('Pathway', 'License', root),
            description,
            boardWidth: table.readNumber('Pathway.Graphics', 'BoardWidth', graphics),
            boardHeight: table.readNumber('Pathway.Graphics', 'BoardHeight', graphics),
        });
        this.readOntologyTerms();
    }

    /* ---------------------------------------------------------------- */
    /*  Shaped elements                                                 */
    /* ---------------------------------------------------------------- */

    private readShapeStyle(tag: string, graphics: XmlElement, markers: LegacyMarkers): ShapeStyleProperty {
        const { table } = this;
        return {
            borderColor: readColor(table, tag, 'Color', graphics),
            borderStyle: markers.doubleLine
                ? LineStyleTypes.known('Double')
                : fromLegacy(LINE_STYLES, table.readString(tag, 'LineStyle', graphics)),
            borderWidth: table.readNumber(tag, 'LineThickness', graphics),
            fillColor: readColor(table, tag, 'FillColor', graphics),
            shapeType: markers.cellComponent
                ? ShapeTypes.known(markers.cellComponent)
                : fromLegacy(SHAPE_TYPES, table.readString(tag, 'ShapeType', graphics)),
            zOrder: table.readInteger(tag, 'ZOrder', graphics),
            rotation: table.has(tag, 'Rotation')
                ? table.readNumber(tag, 'Rotation', graphics)
                : markers.stateRotation ?? 0,
        };
    }

    private readRect(tag: string, graphics: XmlElement) {
        return {
            centerX: this.table.readNumber(tag, 'CenterX', graphics),
            centerY: this.table.readNumber(tag, 'CenterY', graphics),
            width: this.table.readNumber(tag, 'Width', graphics),
            height: this.table.readNumber(tag, 'Height', graphics),
        };
    }

    /** Rect, font and shape style of a `<Tag><Graphics/></Tag>` element. */
    private readBoxGraphics(tag: string, element: XmlElement, markers: LegacyMarkers) {
        const key = `${tag}.Graphics`;
        const graphics = requireChild(element, 'Graphics', key);
        const style = this.readShapeStyle(key, graphics, markers);
        return {
            ...this.readRect(key, graphics),
            ...readFont(this.table, key, graphics, FONT_2013A, style.borderColor),
            ...style,
        };
    }

    private readGroup(element: XmlElement): ElementDraft {
        const groupId = this.table.readString('Group', 'GroupId', element);
        const info = this.readInfo(element);
        const type = fromLegacy(GROUP_STYLES, this.table.readString('Group', 'Style', element));
        return {
            ...createGroup({
                ...info,
                ...groupGraphics(type),
                type,
                textLabel: this.table.read('Group', 'TextLabel', element),
                groupRef: this.groupRef('Group', element),
            }),
            elementId: this.groupIds.get(groupId) ?? groupId,
        };
    }

    private readLabel(element: XmlElement): ElementDraft {
        const info = this.readInfo(element);
        const markers = splitMarkers(info.dynamicProperties);
        return {
            ...createLabel({
                ...info,
                ...this.readBoxGraphics('Label', element, markers),
                dynamicProperties: markers.properties,
                textLabel: this.table.readString('Label', 'TextLabel', element),
                href: this.table.read('Label', 'Href', element),
                groupRef: this.groupRef('Label', element),
            }),
            elementId: this.table.read('Label', 'GraphId', element) ?? this.freshId(),
        };
    }

    private readShape(element: XmlElement): ElementDraft {
        const info = this.readInfo(element);
        const markers = splitMarkers(info.dynamicProperties);
        return {
            ...createShape({
                ...info,
                ...this.readBoxGraphics('Shape', element, markers),
                dynamicProperties: markers.properties,
                textLabel: this.table.read('Shape', 'TextLabel', element),
                groupRef: this.groupRef('Shape', element),
            }),
            elementId: this.table.read('Shape', 'GraphId', element) ?? this.freshId(),
        };
    }

    private readDataNode(element: XmlElement): ElementDraft {
        const info = this.readInfo(element);
        const markers = splitMarkers(info.dynamicProperties);
        return {
            ...createDataNode({
                ...info,
                ...this.readBoxGraphics('DataNode', element, markers),
                dynamicProperties: markers.properties,
                textLabel: this.table.readString('DataNode', 'TextLabel', element),
                type: fromLegacy(DATA_NODE_TYPES, this.table.readString('DataNode', 'Type', element)),
                xref: readXref(this.table, 'DataNode.Xref', childElement(element, 'Xref'), XREF_NAMES, this.resolve),
                groupRef: this.groupRef('DataNode', element),
            }),
            elementId: this.table.read('DataNode', 'GraphId', element) ?? this.freshId(),
        };
    }

    private readState(element: XmlElement): ElementDraft {
        const info = this.readInfo(element);
        const markers = splitMarkers(info.dynamicProperties);
        const graphics = requireChild(element, 'Graphics', 'State.Graphics');
        const style = this.readShapeStyle('State.Graphics', graphics, markers);
        const width = this.table.readNumber('State.Graphics', 'Width', graphics);
        const height = this.table.readNumber('State.Graphics', 'Height', graphics);
        const converted = this.convertStateComments(info.comments);
        const xref = readXref(this.table, 'State.Xref', childElement(element, 'Xref'), XREF_NAMES, this.resolve);
        return {
            ...createState({
                ...info,
                ...style,
                comments: converted.comments,
                annotationRefs: [...info.annotationRefs, ...converted.annotationRefs],
                width,
                height,
                textColor: style.borderColor,
                dynamicProperties: markers.properties,
                textLabel: this.table.readString('State', 'TextLabel', element),
                type: fromLegacy(STATE_TYPES, this.table.readString('State', 'StateType', element)),
                xref: converted.xref ?? xref,
                elementRef: this.table.read('State', 'GraphRef', element),
                relX: this.table.readNumber('State.Graphics', 'RelX', graphics),
                relY: this.table.readNumber('State.Graphics', 'RelY', graphics),
            }),
            elementId: this.table.read('State', 'GraphId', element) ?? this.freshId(),
        };
    }

    /** Structured phosphosite comments become pooled annotations and the State xref. */
    private convertStateComments(comments: Comment[]): {
        comments: Comment[];
        annotationRefs: AnnotationRef[];
        xref: Xref | null;
    } {
        const kept: Comment[] = [];
        const annotationRefs: AnnotationRef[] = [];
        let xref: Xref | null = null;
        const canonical = (ref: Xref): Xref => ({
            identifier: ref.identifier,
            dataSource: canonicalDataSource(ref.dataSource, this.resolve),
        });

        for (const comment of comments) {
            const entries = parseStateComment(comment.text);
            if (!entries) {
                kept.push(comment);
                continue;
            }
            const refs = stateCommentRefs(entries);
            if (refs.xref) xref = canonical(refs.xref);
            for (const draft of refs.annotations) {
                const annotationId = this.store.getState().addAnnotation({
                    ...draft,
                    xref: draft.xref ? canonical(draft.xref) : null,
                    elementId: this.freshId(),
                });
                annotationRefs.push({ annotationId, citationRefs: [], evidenceRefs: [] });
            }
        }
        return { comments: kept, annotationRefs, xref };
    }

    /* ---------------------------------------------------------------- */
    /*  Lines                                                           */
    /* ---------------------------------------------------------------- */

    private readLine(element: XmlElement, tag: 'Interaction' | 'GraphicalLine'): ElementDraft {
        const { table } = this;
        const key = `${tag}.Graphics`;
        const graphics = requireChild(element, 'Graphics', key);
        const pointKey = `${key}.Point`;
        const anchorKey = `${key}.Anchor`;

        const pointElements = childElements(graphics, 'Point');
        if (pointElements.length < 2) {
            throw new ConversionError(`${tag} needs at least two points, found ${pointElements.length}`, {
                tag: pointKey,
            });
        }
        const points: LinePoint[] = pointElements.map((point) => ({
            elementId: table.read(pointKey, 'GraphId', point),
            x: table.readNumber(pointKey, 'X', point),
            y: table.readNumber(pointKey, 'Y', point),
            elementRef: this.graphRef(table.read(pointKey, 'GraphRef', point)),
            relX: table.readFloat(pointKey, 'RelX', point),
            relY: table.readFloat(pointKey, 'RelY', point),
        }));
        const arrowHead = (point: XmlElement) => fromLegacy(ARROW_HEADS, table.readString(pointKey, 'ArrowHead', point));

        const anchors: Anchor[] = childElements(graphics, 'Anchor').map((anchor) =>
            createAnchor(table.readNumber(anchorKey, 'Position', anchor), {
                elementId: table.read(anchorKey, 'GraphId', anchor),
                shapeType: fromLegacy(ANCHOR_SHAPES, table.readString(anchorKey, 'Shape', anchor)),
            }),
        );

        const info = this.readInfo(element);
        const markers = splitMarkers(info.dynamicProperties);
        const lineColor: ColorHex = readColor(table, key, 'Color', graphics);
        const common = {
            ...info,
            dynamicProperties: markers.properties,
            points,
            anchors,
            startArrowHead: arrowHead(pointElements[0]),
            endArrowHead: arrowHead(pointElements[pointElements.length - 1]),
            groupRef: this.groupRef(tag, element),
            lineColor,
            lineStyle: markers.doubleLine
                ? LineStyleTypes.known('Double')
                : fromLegacy(LINE_STYLES, table.readString(key, 'LineStyle', graphics)),
            lineWidth: table.readNumber(key, 'LineThickness', graphics),
            connectorType: ConnectorTypes.parse(table.readString(key, 'ConnectorType', graphics)),
            zOrder: table.readInteger(key, 'ZOrder', graphics),
        };
        const elementId = table.read(tag, 'GraphId', element);
        if (tag === 'GraphicalLine') return { ...createGraphicalLine(common), elementId };
        return {
            ...createInteraction({
                ...common,
                xref: readXref(table, 'Interaction.Xref', childElement(element, 'Xref'), XREF_NAMES, this.resolve),
            }),
            elementId,
        };
    }
}

/** Decode a GPML2013a root element into a new store. */
export function readGpml2013a(root: XmlElement, options: ReadOptions = {}): PathwayStore {
    if (root.name !== 'Pathway') {
        throw new ConversionError(`root element must be Pathway, found ${root.name}`, { tag: root.name });
    }
    return new Gpml2013aReader(root, options).read();
}
