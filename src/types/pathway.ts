/**
 * Core semantic types for the pathway model.
 *
 * Design: the model is schema-neutral. Both GPML generations decode into
 * these types and encode from them; names and vocabularies follow the
 * current generation, and the older one is mapped at its codec boundary.
 * Cross-element links are plain identifier strings resolved through the
 * owning store, never object pointers.
 */
import type {
  AnchorShapeType,
  AnnotationType,
  ArrowHeadType,
  ConnectorType,
  DataNodeType,
  GroupType,
  HAlign,
  LineStyleType,
  ShapeType,
  StateType,
  VAlign,
} from './vocabulary';

/** Supported GPML schema generations. */
export type GpmlVersion = '2013a' | '2021';

/** Lowercase `rrggbb`, or `rrggbbaa` when not fully opaque. */
export type ColorHex = string;

/** Cross-reference into an external biological database. */
export interface Xref {
  identifier: string;
  dataSource: string;
}

export interface Comment {
  text: string;
  source: string | null;
}

/* ------------------------------------------------------------------ */
/*  Refs into the pathway-owned pools                                 */
/* ------------------------------------------------------------------ */

export interface EvidenceRef {
  evidenceId: string;
}

export interface CitationRef {
  citationId: string;
  /** Annotations qualifying this citation. */
  annotationRefs: AnnotationRef[];
}

export interface AnnotationRef {
  annotationId: string;
  citationRefs: CitationRef[];
  evidenceRefs: EvidenceRef[];
}

/** Fields shared by the pathway and every element. */
export interface ElementInfo {
  comments: Comment[];
  /** Open-ended key/value data kept for forward compatibility. */
  dynamicProperties: Record<string, string>;
  annotationRefs: AnnotationRef[];
  citationRefs: CitationRef[];
  evidenceRefs: EvidenceRef[];
}

export interface Author {
  name: string;
  username: string | null;
  order: number | null;
  xref: Xref | null;
}

/** Document root metadata. Exactly one per store. */
export interface Pathway extends ElementInfo {
  title: string;
  organism: string | null;
  source: string | null;
  version: string | null;
  license: string | null;
  description: string | null;
  xref: Xref | null;
  boardWidth: number;
  boardHeight: number;
  backgroundColor: ColorHex;
  authors: Author[];
}

/* ------------------------------------------------------------------ */
/*  Style property groups                                             */
/* ------------------------------------------------------------------ */

export interface RectProperty {
  centerX: number;
  centerY: number;
  width: number;
  height: number;
}

export interface FontProperty {
  textColor: ColorHex;
  fontName: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethru: boolean;
  fontSize: number;
  hAlign: HAlign;
  vAlign: VAlign;
}

export interface ShapeStyleProperty {
  borderColor: ColorHex;
  borderStyle: LineStyleType;
  borderWidth: number;
  fillColor: ColorHex;
  shapeType: ShapeType;
  zOrder: number | null;
  /** Radians. */
  rotation: number;
}

export interface LineStyleProperty {
  lineColor: ColorHex;
  lineStyle: LineStyleType;
  lineWidth: number;
  connectorType: ConnectorType;
  zOrder: number | null;
}

/* ------------------------------------------------------------------ */
/*  Elements                                                          */
/* ------------------------------------------------------------------ */

interface ElementBase extends ElementInfo {
  elementId: string;
}

interface ShapedBase extends ElementBase, RectProperty, FontProperty, ShapeStyleProperty {}

export interface DataNode extends ShapedBase {
  kind: 'DataNode';
  textLabel: string;
  type: DataNodeType;
  xref: Xref | null;
  groupRef: string | null;
  /** Group this node stands in for (type Alias). */
  aliasRef: string | null;
}

/**
 * A state glyph attached to a DataNode. Its center is stored relative to the
 * parent (relX/relY in [-1, 1]); centerX/centerY are kept in sync on reconcile.
 */
export interface State extends ShapedBase {
  kind: 'State';
  textLabel: string;
  type: StateType;
  xref: Xref | null;
  elementRef: string | null;
  relX: number;
  relY: number;
}

export interface Label extends ShapedBase {
  kind: 'Label';
  textLabel: string;
  href: string | null;
  groupRef: string | null;
}

export interface Shape extends ShapedBase {
  kind: 'Shape';
  textLabel: string | null;
  groupRef: string | null;
}

/** Members are exactly the elements whose groupRef equals this elementId. */
export interface Group extends ShapedBase {
  kind: 'Group';
  type: GroupType;
  textLabel: string | null;
  xref: Xref | null;
  groupRef: string | null;
}

export interface LinePoint {
  elementId: string | null;
  x: number;
  y: number;
  /** Element or anchor this point is attached to. */
  elementRef: string | null;
  relX: number | null;
  relY: number | null;
}

export interface Anchor {
  elementId: string | null;
  /** Fraction of the line length, 0.0 to 1.0. */
  position: number;
  shapeType: AnchorShapeType;
}

interface LineBase extends ElementBase, LineStyleProperty {
  points: LinePoint[];
  anchors: Anchor[];
  startArrowHead: ArrowHeadType;
  endArrowHead: ArrowHeadType;
  groupRef: string | null;
}

export interface Interaction extends LineBase {
  kind: 'Interaction';
  xref: Xref | null;
}

export interface GraphicalLine extends LineBase {
  kind: 'GraphicalLine';
}

export type ShapedElement = DataNode | State | Label | Shape | Group;
export type LineElement = Interaction | GraphicalLine;
export type PathwayElement = ShapedElement | LineElement;
export type ElementKind = PathwayElement['kind'];

/** An element before admission: the identifier may still be missing. */
export type ElementDraft<T extends PathwayElement = PathwayElement> = T extends PathwayElement
  ? Omit<T, 'elementId'> & { elementId?: string | null }
  : never;

/* ------------------------------------------------------------------ */
/*  Pools                                                             */
/* ------------------------------------------------------------------ */

export interface Annotation {
  elementId: string;
  value: string;
  type: AnnotationType;
  xref: Xref | null;
  urlLink: string | null;
}

export interface Citation {
  elementId: string;
  xref: Xref | null;
  urlLink: string | null;
  title: string | null;
  source: string | null;
  year: string | null;
  authors: string[];
}

export interface Evidence {
  elementId: string;
  value: string | null;
  xref: Xref | null;
  urlLink: string | null;
}

export type PoolKind = 'annotation' | 'citation' | 'evidence';

/** Anything addressable by identifier inside one document. */
export type PathwayObject =
  | { kind: 'element'; element: PathwayElement }
  | { kind: 'point'; line: LineElement; index: number; point: LinePoint }
  | { kind: 'anchor'; line: LineElement; index: number; anchor: Anchor }
  | { kind: 'annotation'; annotation: Annotation }
  | { kind: 'citation'; citation: Citation }
  | { kind: 'evidence'; evidence: Evidence };

/** A reference whose target no longer exists. */
export interface DanglingReference {
  ownerId: string;
  field: 'groupRef' | 'elementRef' | 'aliasRef';
  target: string;
  /** Point index for line endpoints. */
  pointIndex?: number;
}

export function isLineElement(element: PathwayElement): element is LineElement {
  return element.kind === 'Interaction' || element.kind === 'GraphicalLine';
}

export function isShapedElement(element: PathwayElement): element is ShapedElement {
  return !isLineElement(element);
}
