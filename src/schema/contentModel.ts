/**
 * Content models of the two GPML schemas, loaded by file name.
 *
 * Each element key lists its allowed children in schema sequence order. The
 * same list is the writers' tag-precedence table.
 */
import { readFileSync } from 'node:fs';
import { ConversionError } from '../errors';
import type { XmlElement } from '../io/xmlTree';
import type { GpmlVersion } from '../types/pathway';

export interface ChildRule {
    tag: string;
    /** Key of the child in the attribute table and in this model. */
    key: string;
    min: number;
    /** Null when unbounded. */
    max: number | null;
}

export interface ContentModel {
    version: GpmlVersion;
    fileName: string;
    namespace: string;
    root: string;
    /** Prefix to namespace URI, declared on the root. */
    namespaces: Record<string, string>;
    elements: ReadonlyMap<string, ChildRule[]>;
}

export const SCHEMA_FILES: Record<GpmlVersion, string> = {
    '2013a': 'GPML2013a.schema.json',
    '2021': 'GPML2021.schema.json',
};

/* ------------------------------------------------------------------ */
/*  Loading                                                           */
/* ------------------------------------------------------------------ */

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toChildRule(value: unknown): ChildRule | null {
    if (!isObject(value) || typeof value.tag !== 'string' || typeof value.key !== 'string') return null;
    const min = value.min === undefined ? 0 : value.min;
    const max = value.max === undefined ? null : value.max;
    if (typeof min !== 'number' || (max !== null && typeof max !== 'number')) return null;
    return { tag: value.tag, key: value.key, min, max };
}

function toStringRecord(value: unknown): Record<string, string> | null {
    if (!isObject(value)) return null;
    const record: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry !== 'string') return null;
        record[key] = entry;
    }
    return record;
}

function parseContentModel(fileName: string, raw: unknown): ContentModel {
    const malformed = (detail: string) =>
        new ConversionError(`schema resource ${fileName} is malformed: ${detail}`);
    if (!isObject(raw)) throw malformed('not an object');
    const { version, namespace, root } = raw;
    if (version !== '2013a' && version !== '2021') throw malformed('version');
    if (typeof namespace !== 'string' || typeof root !== 'string') throw malformed('namespace or root');
    const namespaces = toStringRecord(raw.namespaces);
    if (!namespaces) throw malformed('namespaces');
    if (!isObject(raw.elements)) throw malformed('elements');

    const elements = new Map<string, ChildRule[]>();
    for (const [key, list] of Object.entries(raw.elements)) {
        if (!Array.isArray(list)) throw malformed(`children of ${key}`);
        const rules: ChildRule[] = [];
        for (const entry of list) {
            const rule = toChildRule(entry);
            if (!rule) throw malformed(`child rule of ${key}`);
            rules.push(rule);
        }
        elements.set(key, rules);
    }
    return { version, fileName, namespace, root, namespaces, elements };
}

const cache = new Map<string, ContentModel>();

/** Load a schema resource that sits beside this module. */
export function loadSchemaResource(fileName: string): ContentModel {
    const cached = cache.get(fileName);
    if (cached) return cached;
    let text: string;
    try {
        text = readFileSync(new URL(`./${fileName}`, import.meta.url), 'utf8');
    } catch (error) {
        throw new ConversionError(
            `schema resource ${fileName} cannot be read`,
            {},
            error instanceof Error ? error : undefined,
        );
    }
    const model = parseContentModel(fileName, JSON.parse(text));
    cache.set(fileName, model);
    return model;
}

export function loadContentModel(version: GpmlVersion): ContentModel {
    return loadSchemaResource(SCHEMA_FILES[version]);
}

/* ------------------------------------------------------------------ */
/*  Ordering                                                          */
/* ------------------------------------------------------------------ */

export function childRules(model: ContentModel, key: string): ChildRule[] {
    return model.elements.get(key) ?? [];
}

/**
 * Stable-sort children of `element` (recursively) by their position in the
 * parent's sequence. Unknown tags keep their relative order at the end.
 */
export function orderChildren(model: ContentModel, element: XmlElement, key: string = model.root): void {
    const rules = childRules(model, key);
    const rank = (tag: string): number => {
        const index = rules.findIndex((rule) => rule.tag === tag);
        return index < 0 ? rules.length : index;
    };
    const ranked = element.children.map((child, position) => ({ child, position, rank: rank(child.name) }));
    ranked.sort((a, b) => a.rank - b.rank || a.position - b.position);
    element.children = ranked.map((entry) => entry.child);

    for (const child of element.children) {
        const rule = rules.find((candidate) => candidate.tag === child.name);
        if (rule) orderChildren(model, child, rule.key);
    }
}
