/**
 * Attribute schema tables: one per GPML version.
 *
 * Keys are `Tag[.Sub]*@Attribute` (e.g. `DataNode.Graphics@CenterX`). Both the
 * readers and the writers go through a table for every attribute they touch,
 * so default handling is symmetric; a key outside the table is a bug and
 * raises `UnknownAttributeError`.
 */
import { readFileSync } from 'node:fs';
import { ConversionError, UnknownAttributeError } from '../errors';
import { parseColor, sameColor } from '../io/colors';
import type { XmlElement } from '../io/xmlTree';
import type { GpmlVersion } from '../types/pathway';

export type ValueKind = 'string' | 'id' | 'idref' | 'float' | 'integer' | 'color' | 'style';

export interface AttributeInfo {
    valueKind: ValueKind;
    /** Value assumed when the attribute is absent; null when there is none. */
    defaultValue: string | null;
    isRequired: boolean;
}

/** Float comparison tolerance for default elision. */
export const FLOAT_EPSILON = 1e-6;

const VALUE_KINDS: readonly ValueKind[] = ['string', 'id', 'idref', 'float', 'integer', 'color', 'style'];

const TABLE_FILES: Record<GpmlVersion, string> = {
    '2013a': 'gpml2013a.attributes.json',
    '2021': 'gpml2021.attributes.json',
};

/* ------------------------------------------------------------------ */
/*  Table                                                             */
/* ------------------------------------------------------------------ */

export class AttributeTable {
    constructor(
        readonly version: GpmlVersion,
        private readonly entries: ReadonlyMap<string, AttributeInfo>,
    ) {}

    info(tag: string, attribute: string): AttributeInfo {
        const entry = this.entries.get(`${tag}@${attribute}`);
        if (!entry) throw new UnknownAttributeError(this.version, `${tag}@${attribute}`);
        return entry;
    }

    has(tag: string, attribute: string): boolean {
        return this.entries.has(`${tag}@${attribute}`);
    }

    /** Attribute names declared for a tag key. */
    attributesOf(tag: string): string[] {
        const prefix = `${tag}@`;
        return [...this.entries.keys()]
            .filter((key) => key.startsWith(prefix))
            .map((key) => key.slice(prefix.length));
    }

    /** Value from the element, else the default; a missing required value is an error. */
    read(tag: string, attribute: string, element: XmlElement): string | null {
        const info = this.info(tag, attribute);
        const value = element.attributes[attribute];
        if (value !== undefined) return value;
        if (info.isRequired && info.defaultValue === null) {
            throw new ConversionError(`required attribute ${tag}@${attribute} is missing`, {
                tag,
                attribute,
                key: `${tag}@${attribute}`,
            });
        }
        return info.defaultValue;
    }

    /** Like `read`, for attributes that always resolve to a value. */
    readString(tag: string, attribute: string, element: XmlElement): string {
        const value = this.read(tag, attribute, element);
        if (value === null) {
            throw new ConversionError(`attribute ${tag}@${attribute} has no value and no default`, {
                tag,
                attribute,
                key: `${tag}@${attribute}`,
            });
        }
        return value;
    }

    /** Value from the element, else the default, else ''; missing required values are not an error. */
    readOrEmpty(tag: string, attribute: string, element: XmlElement): string {
        return element.attributes[attribute] ?? this.info(tag, attribute).defaultValue ?? '';
    }

    readFloat(tag: string, attribute: string, element: XmlElement): number | null {
        const value = this.read(tag, attribute, element);
        return value === null ? null : parseNumber(tag, attribute, value, false);
    }

    readInteger(tag: string, attribute: string, element: XmlElement): number | null {
        const value = this.read(tag, attribute, element);
        return value === null ? null : parseNumber(tag, attribute, value, true);
    }

    /** Float that has a default or is required. */
    readNumber(tag: string, attribute: string, element: XmlElement): number {
        return parseNumber(tag, attribute, this.readString(tag, attribute, element), false);
    }

    /**
     * Set an attribute on `element`, or omit it when the value is empty or
     * equals the registered default of an optional attribute.
     */
    write(tag: string, attribute: string, element: XmlElement, value: string | number | null): void {
        const info = this.info(tag, attribute);
        const text = value === null ? null : typeof value === 'number' ? formatNumber(value) : value;

        if (!info.isRequired && this.isDefault(tag, attribute, text)) {
            delete element.attributes[attribute];
            return;
        }
        if (text === null) {
            if (info.isRequired) {
                throw new ConversionError(`required attribute ${tag}@${attribute} has no value`, {
                    tag,
                    attribute,
                    key: `${tag}@${attribute}`,
                });
            }
            delete element.attributes[attribute];
            return;
        }
        element.attributes[attribute] = text;
    }

    /** Whether a value equals the registered default under the kind's equality. */
    isDefault(tag: string, attribute: string, value: string | null): boolean {
        const { valueKind, defaultValue } = this.info(tag, attribute);
        if (value === null || value === '') return defaultValue === null || defaultValue === value;
        if (defaultValue === null) return false;

        switch (valueKind) {
            case 'float':
            case 'integer': {
                const a = Number(value);
                const b = Number(defaultValue);
                return !isNaN(a) && !isNaN(b) && Math.abs(a - b) < FLOAT_EPSILON;
            }
            case 'color': {
                const a = parseColor(value);
                const b = parseColor(defaultValue);
                return a !== null && b !== null && sameColor(a, b);
            }
            default:
                return value === defaultValue;
        }
    }
}

/** Shortest round-tripping decimal text for a number. */
export function formatNumber(value: number): string {
    return Object.is(value, -0) ? '0' : String(value);
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Whether the text is a plain decimal number (no hex, no Infinity). */
export function isDecimal(value: string): boolean {
    return DECIMAL.test(value.trim());
}

function parseNumber(tag: string, attribute: string, value: string, integer: boolean): number {
    const parsed = isDecimal(value) ? Number(value.trim()) : NaN;
    if (isNaN(parsed) || (integer && !Number.isInteger(parsed))) {
        throw new ConversionError(
            `attribute ${tag}@${attribute} has malformed ${integer ? 'integer' : 'number'} "${value}"`,
            { tag, attribute, key: `${tag}@${attribute}` },
        );
    }
    return parsed;
}

/* ------------------------------------------------------------------ */
/*  Loading                                                           */
/* ------------------------------------------------------------------ */

interface RawAttribute {
    kind: ValueKind;
    default?: string;
    required?: boolean;
}

type RawAttributes = Record<string, RawAttribute>;

interface RawTag {
    include?: string[];
    attributes?: RawAttributes;
}

interface RawTable {
    version: GpmlVersion;
    groups: Record<string, RawAttributes>;
    tags: Record<string, RawTag>;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValueKind(value: unknown): value is ValueKind {
    return VALUE_KINDS.some((kind) => kind === value);
}

function isRawAttribute(value: unknown): value is RawAttribute {
    return (
        isObject(value) &&
        isValueKind(value.kind) &&
        (value.default === undefined || typeof value.default === 'string') &&
        (value.required === undefined || typeof value.required === 'boolean')
    );
}

function isRawAttributes(value: unknown): value is RawAttributes {
    return isObject(value) && Object.values(value).every(isRawAttribute);
}

function isRawTag(value: unknown): value is RawTag {
    return (
        isObject(value) &&
        (value.include === undefined ||
            (Array.isArray(value.include) && value.include.every((name) => typeof name === 'string'))) &&
        (value.attributes === undefined || isRawAttributes(value.attributes))
    );
}

function isRawTable(value: unknown): value is RawTable {
    return (
        isObject(value) &&
        (value.version === '2013a' || value.version === '2021') &&
        isObject(value.groups) &&
        Object.values(value.groups).every(isRawAttributes) &&
        isObject(value.tags) &&
        Object.values(value.tags).every(isRawTag)
    );
}

function toInfo(raw: RawAttribute): AttributeInfo {
    return {
        valueKind: raw.kind,
        defaultValue: raw.default ?? null,
        isRequired: raw.required ?? false,
    };
}

/** Expand groups; a tag's own attributes override included ones. */
export function buildAttributeTable(raw: RawTable): AttributeTable {
    const entries = new Map<string, AttributeInfo>();
    for (const [tag, definition] of Object.entries(raw.tags)) {
        for (const groupName of definition.include ?? []) {
            const group = raw.groups[groupName];
            if (!group) {
                throw new ConversionError(`attribute group "${groupName}" is not defined`, { tag });
            }
            for (const [attribute, info] of Object.entries(group)) {
                entries.set(`${tag}@${attribute}`, toInfo(info));
            }
        }
        for (const [attribute, info] of Object.entries(definition.attributes ?? {})) {
            entries.set(`${tag}@${attribute}`, toInfo(info));
        }
    }
    return new AttributeTable(raw.version, entries);
}

const cache = new Map<GpmlVersion, AttributeTable>();

export function loadAttributeTable(version: GpmlVersion): AttributeTable {
    const cached = cache.get(version);
    if (cached) return cached;

    const fileName = TABLE_FILES[version];
    const raw: unknown = JSON.parse(readFileSync(new URL(`./${fileName}`, import.meta.url), 'utf8'));
    if (!isRawTable(raw)) {
        throw new ConversionError(`attribute table ${fileName} is malformed`);
    }
    const table = buildAttributeTable(raw);
    cache.set(version, table);
    return table;
}
