/**
 * Minimal ordered element tree over fast-xml-parser.
 *
 * GPML child order is meaningful (points along a line, schema sequences), so
 * both directions run the parser and builder in `preserveOrder` mode and
 * expose a plain `XmlElement` tree to the codecs.
 */
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { GPML_CONFIG } from '../config/env';
import { ConversionError } from '../errors';

export interface XmlElement {
    /** Qualified tag name as written, e.g. `DataNode` or `bp:PublicationXref`. */
    name: string;
    attributes: Record<string, string>;
    children: XmlElement[];
    /** Character data as written; null when there is none or it only separates child elements. */
    text: string | null;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const xmlParser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: TEXT_KEY,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
    processEntities: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
});

const xmlBuilder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: TEXT_KEY,
    format: true,
    indentBy: ' '.repeat(GPML_CONFIG.INDENT),
    suppressEmptyNode: true,
    processEntities: true,
});

export function createElement(
    name: string,
    attributes: Record<string, string> = {},
    children: XmlElement[] = [],
    text: string | null = null,
): XmlElement {
    return { name, attributes, children, text };
}

export function childElement(parent: XmlElement, name: string): XmlElement | null {
    return parent.children.find((child) => child.name === name) ?? null;
}

export function childElements(parent: XmlElement, name: string): XmlElement[] {
    return parent.children.filter((child) => child.name === name);
}

/** Trimmed text of the first child with this name. */
export function childText(parent: XmlElement, name: string): string | null {
    return childElement(parent, name)?.text?.trim() ?? null;
}

/* ------------------------------------------------------------------ */
/*  Parsing                                                           */
/* ------------------------------------------------------------------ */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
    const attributes: Record<string, string> = {};
    if (!isRecord(value)) return attributes;
    for (const [key, raw] of Object.entries(value)) {
        attributes[key] = String(raw);
    }
    return attributes;
}

function appendNodes(parent: XmlElement, nodes: unknown[]): void {
    for (const node of nodes) {
        if (!isRecord(node)) continue;
        for (const [key, value] of Object.entries(node)) {
            if (key === ATTRIBUTES_KEY) continue;
            if (key === TEXT_KEY) {
                const text = String(value);
                parent.text = parent.text === null ? text : parent.text + text;
                continue;
            }
            const child = createElement(key, readAttributes(node[ATTRIBUTES_KEY]));
            if (Array.isArray(value)) appendNodes(child, value);
            parent.children.push(child);
        }
    }
    if (parent.children.length > 0 && parent.text !== null && parent.text.trim() === '') parent.text = null;
}

/** Parse a document and return its root element. */
export function parseXml(source: string): XmlElement {
    const validation = XMLValidator.validate(source);
    if (validation !== true) {
        throw new ConversionError(
            `malformed XML at line ${validation.err.line}, column ${validation.err.col}: ${validation.err.msg}`,
        );
    }

    const parsed: unknown = xmlParser.parse(source);
    const holder = createElement('#document');
    if (Array.isArray(parsed)) appendNodes(holder, parsed);
    const root = holder.children[0];
    if (!root) throw new ConversionError('document has no root element');
    return root;
}

/* ------------------------------------------------------------------ */
/*  Serialization                                                     */
/* ------------------------------------------------------------------ */

interface BuilderNode {
    [key: string]: BuilderNode[] | Record<string, string> | string;
}

function toBuilderNode(element: XmlElement): BuilderNode {
    const content: BuilderNode[] = [];
    if (element.text !== null && element.text !== '') content.push({ [TEXT_KEY]: element.text });
    for (const child of element.children) content.push(toBuilderNode(child));

    const node: BuilderNode = { [element.name]: content };
    if (Object.keys(element.attributes).length > 0) node[ATTRIBUTES_KEY] = { ...element.attributes };
    return node;
}

/** Serialize a root element, with XML declaration. */
export function serializeXml(root: XmlElement): string {
    const body: string = xmlBuilder.build([toBuilderNode(root)]);
    return `${XML_DECLARATION}\n${body.trim()}\n`;
}
