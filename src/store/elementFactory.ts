/**
 * Element factories. Each returns a draft filled with the model defaults,
 * ready for `addElement`.
 */
import type {
    Anchor,
    Annotation,
    Citation,
    DataNode,
    ElementDraft,
    ElementInfo,
    Evidence,
    FontProperty,
    GraphicalLine,
    Group,
    Interaction,
    Label,
    LinePoint,
    LineStyleProperty,
    Pathway,
    RectProperty,
    Shape,
    ShapeStyleProperty,
    State,
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
    type GroupType,
} from '../types/vocabulary';

type Overrides<T> = Partial<T>;

export const TRANSPARENT = '00000000';

export function emptyElementInfo(): ElementInfo {
    return {
        comments: [],
        dynamicProperties: {},
        annotationRefs: [],
        citationRefs: [],
        evidenceRefs: [],
    };
}

export function createPathway(overrides: Overrides<Pathway> = {}): Pathway {
    return {
        ...emptyElementInfo(),
        title: 'Untitled',
        organism: null,
        source: null,
        version: null,
        license: null,
        description: null,
        xref: null,
        boardWidth: 0,
        boardHeight: 0,
        backgroundColor: 'ffffff',
        authors: [],
        ...overrides,
    };
}

export function defaultFont(): FontProperty {
    return {
        textColor: '000000',
        fontName: 'Arial',
        bold: false,
        italic: false,
        underline: false,
        strikethru: false,
        fontSize: 12,
        hAlign: 'Center',
        vAlign: 'Middle',
    };
}

export function defaultShapeStyle(): ShapeStyleProperty {
    return {
        borderColor: '000000',
        borderStyle: LineStyleTypes.known('Solid'),
        borderWidth: 1,
        fillColor: 'ffffff',
        shapeType: ShapeTypes.known('Rectangle'),
        zOrder: null,
        rotation: 0,
    };
}

export function defaultLineStyle(): LineStyleProperty {
    return {
        lineColor: '000000',
        lineStyle: LineStyleTypes.known('Solid'),
        lineWidth: 1,
        connectorType: ConnectorTypes.known('Straight'),
        zOrder: null,
    };
}

function rect(): RectProperty {
    return { centerX: 0, centerY: 0, width: 0, height: 0 };
}

/* ------------------------------------------------------------------ */
/*  Shaped elements                                                   */
/* ------------------------------------------------------------------ */

export function createDataNode(overrides: Overrides<DataNode> = {}): ElementDraft<DataNode> {
    return {
        kind: 'DataNode',
        ...emptyElementInfo(),
        ...rect(),
        ...defaultFont(),
        ...defaultShapeStyle(),
        textLabel: '',
        type: DataNodeTypes.known('Undefined'),
        xref: null,
        groupRef: null,
        aliasRef: null,
        ...overrides,
    };
}

export function createState(overrides: Overrides<State> = {}): ElementDraft<State> {
    return {
        kind: 'State',
        ...emptyElementInfo(),
        ...rect(),
        ...defaultFont(),
        ...defaultShapeStyle(),
        textLabel: '',
        type: StateTypes.known('Undefined'),
        xref: null,
        elementRef: null,
        relX: 0,
        relY: 0,
        ...overrides,
    };
}

export function createLabel(overrides: Overrides<Label> = {}): ElementDraft<Label> {
    return {
        kind: 'Label',
        ...emptyElementInfo(),
        ...rect(),
        ...defaultFont(),
        ...defaultShapeStyle(),
        shapeType: ShapeTypes.known('None'),
        fillColor: TRANSPARENT,
        textLabel: '',
        href: null,
        groupRef: null,
        ...overrides,
    };
}

export function createShape(overrides: Overrides<Shape> = {}): ElementDraft<Shape> {
    return {
        kind: 'Shape',
        ...emptyElementInfo(),
        ...rect(),
        ...defaultFont(),
        ...defaultShapeStyle(),
        fillColor: TRANSPARENT,
        textLabel: null,
        groupRef: null,
        ...overrides,
    };
}

export function createGroup(overrides: Overrides<Group> = {}): ElementDraft<Group> {
    return {
        kind: 'Group',
        ...emptyElementInfo(),
        ...rect(),
        ...defaultFont(),
        ...defaultShapeStyle(),
        fillColor: TRANSPARENT,
        type: GroupTypes.known('Group'),
        textLabel: null,
        xref: null,
        groupRef: null,
        ...overrides,
    };
}

/** Graphics a group takes from its type when the document stores none. */
export function groupGraphics(
    type: GroupType,
): Pick<Group, 'textColor' | 'borderColor' | 'borderStyle' | 'borderWidth' | 'fillColor' | 'shapeType'> {
    const base = {
        textColor: '808080',
        borderColor: '808080',
        borderStyle: LineStyleTypes.known('Dashed'),
        borderWidth: 1,
        fillColor: 'b4b46419',
        shapeType: ShapeTypes.known('Rectangle'),
    };
    if (GroupTypes.is(type, 'Transparent')) {
        return { ...base, borderColor: TRANSPARENT, borderStyle: LineStyleTypes.known('Solid'), fillColor: TRANSPARENT };
    }
    if (GroupTypes.is(type, 'Complex')) {
        return { ...base, borderStyle: LineStyleTypes.known('Solid'), shapeType: ShapeTypes.known('Octagon') };
    }
    if (GroupTypes.is(type, 'Pathway')) return { ...base, fillColor: '00ff000c' };
    return base;
}

/* ------------------------------------------------------------------ */
/*  Lines                                                             */
/* ------------------------------------------------------------------ */

export function createPoint(x: number, y: number, overrides: Overrides<LinePoint> = {}): LinePoint {
    return { elementId: null, x, y, elementRef: null, relX: null, relY: null, ...overrides };
}

export function createAnchor(position: number, overrides: Overrides<Anchor> = {}): Anchor {
    return {
        elementId: null,
        position,
        shapeType: AnchorShapeTypes.known('Square'),
        ...overrides,
    };
}

function lineDefaults() {
    return {
        ...emptyElementInfo(),
        ...defaultLineStyle(),
        points: [createPoint(0, 0), createPoint(0, 0)],
        anchors: [],
        startArrowHead: ArrowHeadTypes.known('Undirected'),
        endArrowHead: ArrowHeadTypes.known('Undirected'),
        groupRef: null,
    };
}

export function createInteraction(
    overrides: Overrides<Interaction> = {},
): ElementDraft<Interaction> {
    return { kind: 'Interaction', ...lineDefaults(), xref: null, ...overrides };
}

export function createGraphicalLine(
    overrides: Overrides<GraphicalLine> = {},
): ElementDraft<GraphicalLine> {
    return { kind: 'GraphicalLine', ...lineDefaults(), ...overrides };
}

/* ------------------------------------------------------------------ */
/*  Pool entries (identifier assigned by the store)                   */
/* ------------------------------------------------------------------ */

export type AnnotationDraft = Omit<Annotation, 'elementId'> & { elementId?: string | null };
export type CitationDraft = Omit<Citation, 'elementId'> & { elementId?: string | null };
export type EvidenceDraft = Omit<Evidence, 'elementId'> & { elementId?: string | null };

export function createAnnotation(
    value: string,
    overrides: Overrides<Annotation> = {},
): AnnotationDraft {
    return {
        value,
        type: AnnotationTypes.known('Undefined'),
        xref: null,
        urlLink: null,
        ...overrides,
    };
}

export function createCitation(overrides: Overrides<Citation> = {}): CitationDraft {
    return {
        xref: null,
        urlLink: null,
        title: null,
        source: null,
        year: null,
        authors: [],
        ...overrides,
    };
}

export function createEvidence(overrides: Overrides<Evidence> = {}): EvidenceDraft {
    return { value: null, xref: null, urlLink: null, ...overrides };
}
