/**
 * Differences between the two GPML generations.
 *
 * The rename tables are applied by the 2013a codec at its boundary, so the
 * model always holds current names. Deprecated values survive decoding and
 * are only replaced by `convertPathway` when moving a document to 2021;
 * moving back to 2013a never restores them and reports what cannot be
 * expressed in the older schema.
 */
import { isTransparent, toRgba } from '../io/colors';
import { Logger } from '../services/logger';
import type { PathwayStore } from '../store/pathwayStore';
import type { ColorHex, ElementInfo, GpmlVersion, PathwayElement } from '../types/pathway';
import { isLineElement } from '../types/pathway';
import {
    AnchorShapeTypes,
    ArrowHeadTypes,
    DataNodeTypes,
    GroupTypes,
    LineStyleTypes,
    ShapeTypes,
    StateTypes,
    type AnchorShapeTypeName,
    type ArrowHeadTypeName,
    type DataNodeTypeName,
    type GroupTypeName,
    type LineStyleTypeName,
    type ShapeTypeName,
    type StateTypeName,
    type Term,
    type Vocabulary,
} from '../types/vocabulary';

/* ------------------------------------------------------------------ */
/*  Rename tables                                                     */
/* ------------------------------------------------------------------ */

export interface RenameTable<K extends string> {
    vocabulary: Vocabulary<K>;
    /** Legacy spelling to current name. */
    fromLegacy: Record<string, K>;
    /** Current name to legacy spelling; names missing here are written as-is. */
    toLegacy: Partial<Record<K, string>>;
    /** Current names with no faithful legacy counterpart. */
    lossy: readonly K[];
}

export const GROUP_STYLES: RenameTable<GroupTypeName> = {
    vocabulary: GroupTypes,
    fromLegacy: { None: 'Group', Group: 'Transparent', Complex: 'Complex', Pathway: 'Pathway' },
    toLegacy: {
        Group: 'None',
        Transparent: 'Group',
        Complex: 'Complex',
        Pathway: 'Pathway',
        Analog: 'None',
        Paralog: 'None',
    },
    lossy: ['Analog', 'Paralog'],
};

export const DATA_NODE_TYPES: RenameTable<DataNodeTypeName> = {
    vocabulary: DataNodeTypes,
    fromLegacy: { Unknown: 'Undefined', Rna: 'RNA' },
    toLegacy: { Undefined: 'Unknown', RNA: 'Rna' },
    lossy: [],
};

export const STATE_TYPES: RenameTable<StateTypeName> = {
    vocabulary: StateTypes,
    fromLegacy: { Unknown: 'Undefined' },
    toLegacy: { Undefined: 'Unknown' },
    lossy: [],
};

/** Double is carried by a separate marker property in 2013a. */
export const LINE_STYLES: RenameTable<LineStyleTypeName> = {
    vocabulary: LineStyleTypes,
    fromLegacy: { Broken: 'Dashed' },
    toLegacy: { Dashed: 'Broken', Double: 'Solid' },
    lossy: [],
};

export const ARROW_HEADS: RenameTable<ArrowHeadTypeName> = {
    vocabulary: ArrowHeadTypes,
    fromLegacy: {
        Line: 'Undirected',
        Arrow: 'Directed',
        'mim-conversion': 'Conversion',
        'mim-modification': 'Conversion',
        'mim-cleavage': 'Conversion',
        'mim-gap': 'Conversion',
        'mim-branching-left': 'Conversion',
        'mim-branching-right': 'Conversion',
        'mim-inhibition': 'Inhibition',
        TBar: 'Inhibition',
        'mim-catalysis': 'Catalysis',
        'mim-stimulation': 'Stimulation',
        'mim-necessary-stimulation': 'Stimulation',
        'mim-binding': 'Binding',
        'mim-covalent-bond': 'Binding',
        'mim-translocation': 'Translocation',
        'mim-transcription-translation': 'TranscriptionTranslation',
    },
    toLegacy: {
        Undirected: 'Line',
        Directed: 'Arrow',
        Conversion: 'mim-conversion',
        Inhibition: 'mim-inhibition',
        Catalysis: 'mim-catalysis',
        Stimulation: 'mim-stimulation',
        Binding: 'mim-binding',
        Translocation: 'mim-translocation',
        TranscriptionTranslation: 'mim-transcription-translation',
    },
    lossy: [],
};

export const ANCHOR_SHAPES: RenameTable<AnchorShapeTypeName> = {
    vocabulary: AnchorShapeTypes,
    fromLegacy: { ReceptorRound: 'Square' },
    toLegacy: { Square: 'ReceptorRound' },
    lossy: [],
};

/** 2013a spelled some compartment shapes with spaces. */
export const SHAPE_TYPES: RenameTable<ShapeTypeName> = {
    vocabulary: ShapeTypes,
    fromLegacy: {
        'Sarcoplasmic Reticulum': 'SarcoplasmicReticulum',
        'Endoplasmic Reticulum': 'EndoplasmicReticulum',
        'Golgi Apparatus': 'GolgiApparatus',
        'Cytosol region': 'CytosolRegion',
        'Extracellular region': 'ExtracellularRegion',
    },
    toLegacy: {
        SarcoplasmicReticulum: 'Sarcoplasmic Reticulum',
        EndoplasmicReticulum: 'Endoplasmic Reticulum',
        GolgiApparatus: 'Golgi Apparatus',
        CytosolRegion: 'Cytosol region',
        ExtracellularRegion: 'Extracellular region',
    },
    lossy: [],
};

export function fromLegacy<K extends string>(table: RenameTable<K>, raw: string): Term<K> {
    const renamed = table.fromLegacy[raw.trim()];
    return renamed === undefined ? table.vocabulary.parse(raw) : table.vocabulary.known(renamed);
}

export function toLegacy<K extends string>(table: RenameTable<K>, term: Term<NoInfer<K>>): string {
    if (term.kind === 'custom') return term.name;
    return table.toLegacy[term.name] ?? term.name;
}

export function isLossyDowngrade<K extends string>(table: RenameTable<K>, term: Term<K>): boolean {
    return term.kind === 'known' && table.lossy.includes(term.name);
}

/** Ontology names of 2013a controlled vocabularies and their prefixes. */
export const OCV_ONTOLOGIES: Record<string, string> = {
    Disease: 'DOID',
    'Pathway Ontology': 'PW',
    'Cell Type': 'CL',
};

export function ontologyPrefix(name: string): string {
    return OCV_ONTOLOGIES[name] ?? name;
}

export function ontologyName(prefix: string): string {
    const match = Object.entries(OCV_ONTOLOGIES).find(([, value]) => value === prefix);
    return match ? match[0] : prefix;
}

/* ------------------------------------------------------------------ */
/*  2013a marker properties                                           */
/* ------------------------------------------------------------------ */

export const DOUBLE_LINE_KEY = 'org.pathvisio.DoubleLineProperty';
export const CELL_COMPONENT_KEY = 'org.pathvisio.CellularComponentProperty';
export const STATE_ROTATION_KEY = 'org.pathvisio.core.StateRotation';

export const LEGACY_PATHWAY_KEYS = {
    author: 'pathway_author_gpml2013a',
    maintainer: 'pathway_maintainer_gpml2013a',
    email: 'pathway_email_gpml2013a',
    lastModified: 'pathway_lastModified_gpml2013a',
    infoBoxX: 'pathway_infobox_centerX_gpml2013a',
    infoBoxY: 'pathway_infobox_centerY_gpml2013a',
    legendX: 'pathway_legend_centerX_gpml2013a',
    legendY: 'pathway_legend_centerY_gpml2013a',
} as const;

export function isLegacyPathwayKey(key: string): boolean {
    return Object.values(LEGACY_PATHWAY_KEYS).some((value) => value === key);
}

/** Compartment shapes stored in 2013a as a plain shape plus a marker property. */
export const CELL_COMPONENTS: Partial<Record<ShapeTypeName, { shape: ShapeTypeName; label: string }>> = {
    Cell: { shape: 'RoundedRectangle', label: 'Cell' },
    Nucleus: { shape: 'Oval', label: 'Nucleus' },
    EndoplasmicReticulum: { shape: 'EndoplasmicReticulum', label: 'Endoplasmic Reticulum' },
    GolgiApparatus: { shape: 'GolgiApparatus', label: 'Golgi Apparatus' },
    Mitochondria: { shape: 'Mitochondria', label: 'Mitochondria' },
    SarcoplasmicReticulum: { shape: 'SarcoplasmicReticulum', label: 'Sarcoplasmic Reticulum' },
    Organelle: { shape: 'RoundedRectangle', label: 'Organelle' },
    Lysosome: { shape: 'Oval', label: 'Lysosome' },
    Nucleolus: { shape: 'Oval', label: 'Nucleolus' },
    Vacuole: { shape: 'Oval', label: 'Vacuole' },
    Vesicle: { shape: 'Oval', label: 'Vesicle' },
    CytosolRegion: { shape: 'RoundedRectangle', label: 'Cytosol region' },
    ExtracellularRegion: { shape: 'RoundedRectangle', label: 'Extracellular region' },
    Membrane: { shape: 'RoundedRectangle', label: 'Membrane' },
};

/** Shape named by a cellular-component marker value, if it is one. */
export function cellComponentShape(label: string): ShapeTypeName | null {
    const match = ShapeTypes.names.find((name) => CELL_COMPONENTS[name]?.label === label.trim());
    return match ?? null;
}

/* ------------------------------------------------------------------ */
/*  Deprecated shapes                                                 */
/* ------------------------------------------------------------------ */

export const DEPRECATED_SHAPES: Partial<Record<ShapeTypeName, ShapeTypeName>> = {
    Cell: 'RoundedRectangle',
    Organelle: 'RoundedRectangle',
    Membrane: 'RoundedRectangle',
    CellA: 'Oval',
    Nucleus: 'Oval',
    OrganA: 'Oval',
    OrganB: 'Oval',
    OrganC: 'Oval',
    Vesicle: 'Oval',
    ProteinB: 'Hexagon',
    Ribosome: 'Hexagon',
};

/** Border given to compartment replacements. */
export const DEPRECATED_BORDER = {
    borderStyle: LineStyleTypes.known('Double'),
    borderWidth: 3,
    borderColor: 'c0c0c0',
} as const;

/** Replace deprecated shape kinds in place; returns how many elements changed. */
export function normalizeDeprecatedShapes(store: PathwayStore): number {
    let changed = 0;
    for (const element of store.getState().getElements()) {
        if (isLineElement(element) || element.shapeType.kind !== 'known') continue;
        const replacement = DEPRECATED_SHAPES[element.shapeType.name];
        if (!replacement) continue;
        const compartment = replacement === 'RoundedRectangle' || replacement === 'Oval';
        store.getState().updateElement(element.elementId, (current) =>
            isLineElement(current)
                ? current
                : {
                      ...current,
                      shapeType: ShapeTypes.known(replacement),
                      ...(compartment ? DEPRECATED_BORDER : {}),
                  },
        );
        changed++;
    }
    return changed;
}

/* ------------------------------------------------------------------ */
/*  Whole-document conversion                                         */
/* ------------------------------------------------------------------ */

export interface LossyFeature {
    /** Element concerned; null for pathway metadata. */
    elementId: string | null;
    feature: string;
    detail: string;
}

export interface ConversionReport {
    from: GpmlVersion;
    to: GpmlVersion;
    /** Model changes applied. */
    changes: number;
    lossy: LossyFeature[];
}

function isTranslucent(color: ColorHex): boolean {
    const { a } = toRgba(color);
    return a !== 255 && !isTransparent(color);
}

function hasNestedRefs(info: ElementInfo): boolean {
    return (
        info.annotationRefs.some((ref) => ref.citationRefs.length > 0 || ref.evidenceRefs.length > 0) ||
        info.citationRefs.some((ref) => ref.annotationRefs.length > 0)
    );
}

function elementColors(element: PathwayElement): ColorHex[] {
    if (isLineElement(element)) return [element.lineColor];
    return [element.borderColor, element.fillColor, element.textColor];
}

/** Features of the current model that the 2013a schema cannot carry. */
export function findLossyFeatures(store: PathwayStore): LossyFeature[] {
    const state = store.getState();
    const lossy: LossyFeature[] = [];
    const flag = (elementId: string | null, feature: string, detail: string) =>
        lossy.push({ elementId, feature, detail });

    const { pathway } = state;
    if (pathway.xref) flag(null, 'pathwayXref', 'pathway cross-reference is dropped');
    if (pathway.backgroundColor !== 'ffffff') flag(null, 'backgroundColor', 'board background color is dropped');
    if (pathway.evidenceRefs.length > 0) flag(null, 'evidenceRef', 'evidence references are dropped');
    if (hasNestedRefs(pathway)) flag(null, 'nestedRef', 'nested references are flattened away');
    if (pathway.authors.some((author) => author.username !== null || author.xref !== null || author.order !== null)) {
        flag(null, 'authorDetails', 'author username, order and cross-reference are dropped');
    }

    for (const element of state.getElements()) {
        const id = element.elementId;
        if (element.annotationRefs.length > 0) flag(id, 'annotationRef', 'element annotations are dropped');
        if (element.evidenceRefs.length > 0) flag(id, 'evidenceRef', 'evidence references are dropped');
        if (hasNestedRefs(element)) flag(id, 'nestedRef', 'nested references are flattened away');
        if (elementColors(element).some(isTranslucent)) flag(id, 'translucentColor', 'partial alpha is dropped');

        if (element.kind === 'Group' && isLossyDowngrade(GROUP_STYLES, element.type)) {
            flag(id, 'groupType', `group type ${element.type.name} becomes None`);
        }
        if (element.kind === 'DataNode' && element.aliasRef !== null) {
            flag(id, 'aliasRef', 'alias reference is dropped');
        }
        if (!isLineElement(element)) {
            if (element.rotation !== 0 && element.kind !== 'Shape' && element.kind !== 'State') {
                flag(id, 'rotation', `${element.kind} rotation is dropped`);
            }
            if (element.textColor !== element.borderColor && element.kind !== 'Group') {
                flag(id, 'textColor', 'text color is merged into the border color');
            }
        }
    }

    for (const citation of Object.values(state.citations)) {
        if (citation.urlLink !== null && citation.urlLink !== citation.source) {
            flag(citation.elementId, 'citationUrl', 'citation link is dropped');
        }
    }
    return lossy;
}

function upgrade(store: PathwayStore): ConversionReport {
    let changes = normalizeDeprecatedShapes(store);
    const lossy: LossyFeature[] = [];
    const { pathway } = store.getState();
    const properties = { ...pathway.dynamicProperties };

    const author = properties[LEGACY_PATHWAY_KEYS.author];
    if (author !== undefined) {
        delete properties[LEGACY_PATHWAY_KEYS.author];
        const authors =
            pathway.authors.length > 0
                ? pathway.authors
                : author
                      .split(',')
                      .map((name) => name.trim())
                      .filter((name) => name.length > 0)
                      .map((name) => ({ name, username: null, order: null, xref: null }));
        store.getState().setPathway({ authors, dynamicProperties: properties });
        changes++;
    }
    for (const key of Object.keys(properties)) {
        if (isLegacyPathwayKey(key)) flag2021(lossy, key);
    }
    return { from: '2013a', to: '2021', changes, lossy };
}

function flag2021(lossy: LossyFeature[], key: string): void {
    lossy.push({ elementId: null, feature: 'legacyProperty', detail: `${key} has no 2021 counterpart` });
}

/**
 * Move a decoded document between schema generations. Converting to 2021
 * rewrites deprecated values; converting to 2013a changes nothing and lists
 * what the older schema will drop.
 */
export function convertPathway(store: PathwayStore, from: GpmlVersion, to: GpmlVersion): ConversionReport {
    if (from === to) return { from, to, changes: 0, lossy: [] };
    const report: ConversionReport =
        to === '2021' ? upgrade(store) : { from, to, changes: 0, lossy: findLossyFeatures(store) };
    for (const feature of report.lossy) {
        Logger.warn('converter.lossy', { from, to, ...feature });
    }
    Logger.info('converter.done', { from, to, changes: report.changes, lossy: report.lossy.length });
    return report;
}
