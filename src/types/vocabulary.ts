/**
 * Extensible vocabularies for the pathway model.
 *
 * Each vocabulary is a closed list of known names plus a `custom` fallback
 * for values written by newer or third-party tools. Known names keep
 * exhaustiveness checks; custom names survive a decode/encode cycle verbatim.
 */

/** A vocabulary value: one of the known names, or a preserved custom one. */
export type Term<K extends string> =
  | { readonly kind: 'known'; readonly name: K }
  | { readonly kind: 'custom'; readonly name: string };

export interface Vocabulary<K extends string> {
  /** Known names in declaration order. */
  readonly names: readonly K[];
  /** Build the term for a known name. */
  known: (name: K) => Term<K>;
  /** Case-insensitive match against known names; anything else becomes custom. */
  parse: (name: string) => Term<K>;
  /** Whether the term is the given known name. */
  is: (term: Term<K>, name: K) => boolean;
}

export function defineVocabulary<K extends string>(names: readonly K[]): Vocabulary<K> {
  const byLowerName = new Map<string, K>();
  for (const name of names) byLowerName.set(name.toLowerCase(), name);

  const known = (name: K): Term<K> => ({ kind: 'known', name });

  return {
    names,
    known,
    parse(name) {
      const match = byLowerName.get(name.trim().toLowerCase());
      return match === undefined ? { kind: 'custom', name } : known(match);
    },
    is(term, name) {
      return term.kind === 'known' && term.name === name;
    },
  };
}

/** Structural equality of two terms. */
export function sameTerm<K extends string>(a: Term<K>, b: Term<K>): boolean {
  return a.kind === b.kind && a.name === b.name;
}

/* ------------------------------------------------------------------ */
/*  Vocabularies                                                      */
/* ------------------------------------------------------------------ */

export const ShapeTypes = defineVocabulary([
  'None',
  'Rectangle',
  'RoundedRectangle',
  'Oval',
  'Triangle',
  'Pentagon',
  'Hexagon',
  'Octagon',
  'Line',
  'Arc',
  'Brace',
  'Mitochondria',
  'SarcoplasmicReticulum',
  'EndoplasmicReticulum',
  'GolgiApparatus',
  'Nucleolus',
  'Vacuole',
  'Lysosome',
  'CytosolRegion',
  'ExtracellularRegion',
  'Cell',
  'Nucleus',
  'Organelle',
  'Vesicle',
  'Membrane',
  'CellA',
  'Ribosome',
  'OrganA',
  'OrganB',
  'OrganC',
  'ProteinB',
  'Coronavirus',
  'DNA',
  'CellIcon',
] as const);
export type ShapeTypeName = (typeof ShapeTypes.names)[number];
export type ShapeType = Term<ShapeTypeName>;

export const ArrowHeadTypes = defineVocabulary([
  'Undirected',
  'Directed',
  'Conversion',
  'Inhibition',
  'Catalysis',
  'Stimulation',
  'Binding',
  'Translocation',
  'TranscriptionTranslation',
] as const);
export type ArrowHeadTypeName = (typeof ArrowHeadTypes.names)[number];
export type ArrowHeadType = Term<ArrowHeadTypeName>;

export const AnchorShapeTypes = defineVocabulary(['Square', 'Circle', 'None'] as const);
export type AnchorShapeTypeName = (typeof AnchorShapeTypes.names)[number];
export type AnchorShapeType = Term<AnchorShapeTypeName>;

export const ConnectorTypes = defineVocabulary(['Straight', 'Elbow', 'Curved', 'Segmented'] as const);
export type ConnectorTypeName = (typeof ConnectorTypes.names)[number];
export type ConnectorType = Term<ConnectorTypeName>;

export const DataNodeTypes = defineVocabulary([
  'Undefined',
  'GeneProduct',
  'DNA',
  'RNA',
  'Protein',
  'Complex',
  'Metabolite',
  'Pathway',
  'Disease',
  'Phenotype',
  'Alias',
  'Event',
  'Cell',
  'Organ',
] as const);
export type DataNodeTypeName = (typeof DataNodeTypes.names)[number];
export type DataNodeType = Term<DataNodeTypeName>;

export const GroupTypes = defineVocabulary([
  'Group',
  'Transparent',
  'Complex',
  'Pathway',
  'Analog',
  'Paralog',
] as const);
export type GroupTypeName = (typeof GroupTypes.names)[number];
export type GroupType = Term<GroupTypeName>;

export const LineStyleTypes = defineVocabulary(['Solid', 'Dashed', 'Double'] as const);
export type LineStyleTypeName = (typeof LineStyleTypes.names)[number];
export type LineStyleType = Term<LineStyleTypeName>;

export const StateTypes = defineVocabulary([
  'Undefined',
  'ProteinModification',
  'GeneticVariant',
  'EpigeneticModification',
] as const);
export type StateTypeName = (typeof StateTypes.names)[number];
export type StateType = Term<StateTypeName>;

export const AnnotationTypes = defineVocabulary(['Undefined', 'Ontology', 'Taxonomy'] as const);
export type AnnotationTypeName = (typeof AnnotationTypes.names)[number];
export type AnnotationType = Term<AnnotationTypeName>;

export type HAlign = 'Left' | 'Center' | 'Right';
export type VAlign = 'Top' | 'Middle' | 'Bottom';

export const H_ALIGNS: readonly HAlign[] = ['Left', 'Center', 'Right'];
export const V_ALIGNS: readonly VAlign[] = ['Top', 'Middle', 'Bottom'];
