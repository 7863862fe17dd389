/**
 * Phosphosite notes that older documents keep in State comments, written as
 * `ptm=p;direction=u;parentid=P12345`. Such a comment is replaced by pooled
 * annotations and, for `sitegrpid`, the State xref.
 */
import { createAnnotation, type AnnotationDraft } from '../store/elementFactory';
import type { Xref } from '../types/pathway';
import { AnnotationTypes } from '../types/vocabulary';

/** Keys that mark a comment as structured phosphosite data. */
const STATE_COMMENT_KEYS = new Set([
    'parent',
    'position',
    'ptm',
    'direction',
    'parentid',
    'parentsymbol',
    'site',
    'sitegrpid',
]);

const XREF_SOURCES: Partial<Record<string, string>> = { parentid: 'uniprot', parentsymbol: 'hgnc' };
const SITE_GROUP_SOURCE = 'phosphositeplus';

interface OntologyTerm {
    value: string;
    identifier: string;
    dataSource: string;
}

const PTM_TERMS: Partial<Record<string, OntologyTerm>> = {
    p: { value: 'Phosphorylation', identifier: '0000216', dataSource: 'SBO' },
    m: { value: 'Methylation', identifier: '0000214', dataSource: 'SBO' },
    me: { value: 'Methylation', identifier: '0000214', dataSource: 'SBO' },
    u: { value: 'Ubiquitination', identifier: '0000224', dataSource: 'SBO' },
    ub: { value: 'Ubiquitination', identifier: '0000224', dataSource: 'SBO' },
};

const DIRECTION_TERMS: Partial<Record<string, OntologyTerm>> = {
    u: { value: 'positive regulation of biological process', identifier: '0048518', dataSource: 'GO' },
    d: { value: 'negative regulation of biological process', identifier: '0048519', dataSource: 'GO' },
};

export interface StateCommentRefs {
    annotations: AnnotationDraft[];
    xref: Xref | null;
}

/**
 * Key/value pairs of a structured comment in written order, or null when the
 * comment is free text. Pairs without a value are skipped; `parent` is read
 * as `parentid`.
 */
export function parseStateComment(text: string): Map<string, string> | null {
    if (!text.includes('=') && !text.includes(';')) return null;

    const entries = new Map<string, string>();
    let structured = false;
    for (const part of text.trim().split(';')) {
        const [rawKey = '', rawValue = ''] = part.split('=');
        const key = rawKey.trim() === 'parent' ? 'parentid' : rawKey.trim();
        const value = rawValue.trim();
        if (STATE_COMMENT_KEYS.has(key)) structured = true;
        if (value !== '') entries.set(key, value);
    }
    return structured ? entries : null;
}

function ontologyAnnotation(value: string, term: OntologyTerm | undefined): AnnotationDraft {
    return createAnnotation(term ? term.value : value, {
        type: AnnotationTypes.known('Ontology'),
        xref: term ? { identifier: term.identifier, dataSource: term.dataSource } : null,
    });
}

export function stateCommentRefs(entries: Map<string, string>): StateCommentRefs {
    const refs: StateCommentRefs = { annotations: [], xref: null };
    for (const [key, value] of entries) {
        switch (key) {
            case 'sitegrpid':
                refs.xref = { identifier: value, dataSource: SITE_GROUP_SOURCE };
                break;
            case 'ptm':
                refs.annotations.push(ontologyAnnotation(value, PTM_TERMS[value]));
                break;
            case 'direction':
                refs.annotations.push(ontologyAnnotation(value, DIRECTION_TERMS[value]));
                break;
            default: {
                const source = XREF_SOURCES[key];
                refs.annotations.push(
                    createAnnotation(value, {
                        type: AnnotationTypes.parse(key),
                        xref: source ? { identifier: value, dataSource: source } : null,
                    }),
                );
            }
        }
    }
    return refs;
}
