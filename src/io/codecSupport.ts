/**
 * Small pieces shared by the GPML readers and writers.
 */
import { reconcileCoordinates } from '../engine/coordinateReconciler';
import { ConversionError } from '../errors';
import type { AttributeTable } from '../schema/attributeTable';
import type { PathwayStore } from '../store/pathwayStore';
import type { ColorHex, FontProperty, Xref } from '../types/pathway';
import { H_ALIGNS, V_ALIGNS, type HAlign, type VAlign } from '../types/vocabulary';
import { parseColor } from './colors';
import { canonicalDataSource, type DataSourceResolver } from './dataSources';
import { childElement, type XmlElement } from './xmlTree';

export interface ReadOptions {
    /** Canonicalizes Xref data source names; defaults to the bundled table. */
    resolveDataSource?: DataSourceResolver;
}

/** The single child a content model requires, or a ConversionError. */
export function requireChild(parent: XmlElement, name: string, key: string): XmlElement {
    const child = childElement(parent, name);
    if (!child) {
        throw new ConversionError(`${parent.name} has no ${name} element`, { tag: key });
    }
    return child;
}

export function readColor(table: AttributeTable, tag: string, attribute: string, element: XmlElement): ColorHex {
    const raw = table.readString(tag, attribute, element);
    const color = parseColor(raw);
    if (color === null) {
        throw new ConversionError(`attribute ${tag}@${attribute} has malformed color "${raw}"`, {
            tag,
            attribute,
            key: `${tag}@${attribute}`,
        });
    }
    return color;
}

export function parseHAlign(raw: string): HAlign {
    return H_ALIGNS.find((align) => align.toLowerCase() === raw.trim().toLowerCase()) ?? 'Center';
}

export function parseVAlign(raw: string): VAlign {
    return V_ALIGNS.find((align) => align.toLowerCase() === raw.trim().toLowerCase()) ?? 'Middle';
}

/** Attribute names carrying font style, per schema generation. */
export interface FontAttributes {
    textColor: string | null;
    fontName: string;
    fontWeight: string;
    fontStyle: string;
    fontDecoration: string;
    fontStrikethru: string;
    fontSize: string;
    hAlign: string;
    vAlign: string;
}

export const FONT_2013A: FontAttributes = {
    textColor: null,
    fontName: 'FontName',
    fontWeight: 'FontWeight',
    fontStyle: 'FontStyle',
    fontDecoration: 'FontDecoration',
    fontStrikethru: 'FontStrikethru',
    fontSize: 'FontSize',
    hAlign: 'Align',
    vAlign: 'Valign',
};

export const FONT_2021: FontAttributes = {
    textColor: 'textColor',
    fontName: 'fontName',
    fontWeight: 'fontWeight',
    fontStyle: 'fontStyle',
    fontDecoration: 'fontDecoration',
    fontStrikethru: 'fontStrikethru',
    fontSize: 'fontSize',
    hAlign: 'hAlign',
    vAlign: 'vAlign',
};

/** Font of a Graphics element; `textColor` is used when the schema has no attribute for it. */
export function readFont(
    table: AttributeTable,
    tag: string,
    graphics: XmlElement,
    names: FontAttributes,
    textColor: ColorHex,
): FontProperty {
    const style = (attribute: string, on: string) =>
        table.readString(tag, attribute, graphics).toLowerCase() === on.toLowerCase();
    return {
        textColor: names.textColor === null ? textColor : readColor(table, tag, names.textColor, graphics),
        fontName: table.readString(tag, names.fontName, graphics),
        bold: style(names.fontWeight, 'Bold'),
        italic: style(names.fontStyle, 'Italic'),
        underline: style(names.fontDecoration, 'Underline'),
        strikethru: style(names.fontStrikethru, 'Strikethru'),
        fontSize: table.readNumber(tag, names.fontSize, graphics),
        hAlign: parseHAlign(table.readString(tag, names.hAlign, graphics)),
        vAlign: parseVAlign(table.readString(tag, names.vAlign, graphics)),
    };
}

export function writeFont(
    table: AttributeTable,
    tag: string,
    graphics: XmlElement,
    names: FontAttributes,
    font: FontProperty,
): void {
    if (names.textColor !== null) table.write(tag, names.textColor, graphics, font.textColor);
    table.write(tag, names.fontName, graphics, font.fontName);
    table.write(tag, names.fontWeight, graphics, font.bold ? 'Bold' : 'Normal');
    table.write(tag, names.fontStyle, graphics, font.italic ? 'Italic' : 'Normal');
    table.write(tag, names.fontDecoration, graphics, font.underline ? 'Underline' : 'Normal');
    table.write(tag, names.fontStrikethru, graphics, font.strikethru ? 'Strikethru' : 'Normal');
    table.write(
        tag,
        names.fontSize,
        graphics,
        table.info(tag, names.fontSize).valueKind === 'integer' ? Math.round(font.fontSize) : font.fontSize,
    );
    table.write(tag, names.hAlign, graphics, font.hAlign);
    table.write(tag, names.vAlign, graphics, font.vAlign);
}

/** An Xref element, or null when it is absent or both fields are empty. */
export function readXref(
    table: AttributeTable,
    tag: string,
    element: XmlElement | null,
    names: { identifier: string; dataSource: string },
    resolve: DataSourceResolver,
): Xref | null {
    if (!element) return null;
    const identifier = table.readOrEmpty(tag, names.identifier, element).trim();
    const dataSource = table.readOrEmpty(tag, names.dataSource, element).trim();
    if (identifier === '' && dataSource === '') return null;
    return {
        identifier: table.readString(tag, names.identifier, element),
        dataSource: canonicalDataSource(table.readString(tag, names.dataSource, element), resolve),
    };
}

/** Sort key for writing pool entries and Biopax blocks. */
export function byElementId(a: { elementId: string }, b: { elementId: string }): number {
    return a.elementId < b.elementId ? -1 : a.elementId > b.elementId ? 1 : 0;
}

/**
 * Repairs run before every encode: dangling references are cleared, line
 * points and anchors get ids, and cached coordinates are refreshed.
 */
export function prepareForWrite(store: PathwayStore): void {
    const state = store.getState();
    state.fixReferences();
    state.ensureIds();
    reconcileCoordinates(store);
}
