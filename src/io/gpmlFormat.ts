/**
 * Format facade: version detection, string and file entry points, and
 * whole-document conversion between the two GPML generations.
 */
import { open } from 'node:fs/promises';
import { GPML_CONFIG } from '../config/env';
import { convertPathway, type ConversionReport } from '../engine/versionConverter';
import { ConversionError } from '../errors';
import { assertValidDocument } from '../schema/schemaValidator';
import { Logger } from '../services/logger';
import type { PathwayStore } from '../store/pathwayStore';
import type { GpmlVersion } from '../types/pathway';
import type { ReadOptions } from './codecSupport';
import { GPML2013A_NAMESPACE, readGpml2013a } from './gpml2013aReader';
import { writeGpml2013a } from './gpml2013aWriter';
import { GPML2021_NAMESPACE, readGpml2021 } from './gpml2021Reader';
import { writeGpml2021 } from './gpml2021Writer';
import { parseXml, serializeXml, type XmlElement } from './xmlTree';

export interface PathwayReadOptions extends ReadOptions {
    /** Expected generation; detected from the namespace when omitted. */
    version?: GpmlVersion;
}

export interface PathwayWriteOptions {
    version?: GpmlVersion;
    /** Run the schema validator on the produced tree. */
    validate?: boolean;
}

export interface ConvertedDocument {
    xml: string;
    report: ConversionReport;
}

const NAMESPACES: Record<GpmlVersion, string> = {
    '2013a': GPML2013A_NAMESPACE,
    '2021': GPML2021_NAMESPACE,
};

/** Schema generation named by the root's default namespace. */
export function detectVersion(root: XmlElement): GpmlVersion {
    const namespace = root.attributes.xmlns;
    if (namespace === GPML2013A_NAMESPACE) return '2013a';
    if (namespace === GPML2021_NAMESPACE) return '2021';
    throw new ConversionError(`unsupported GPML namespace "${namespace ?? ''}"`, {
        tag: root.name,
        attribute: 'xmlns',
    });
}

export function readPathwayTree(root: XmlElement, options: PathwayReadOptions = {}): PathwayStore {
    const detected = detectVersion(root);
    if (options.version && options.version !== detected) {
        throw new ConversionError(
            `expected GPML${options.version} but the document declares ${NAMESPACES[detected]}`,
            { tag: root.name, attribute: 'xmlns' },
        );
    }
    return detected === '2013a' ? readGpml2013a(root, options) : readGpml2021(root, options);
}

/** Decode a GPML document into a fresh store. */
export function readPathway(xml: string, options: PathwayReadOptions = {}): PathwayStore {
    return readPathwayTree(parseXml(xml), options);
}

/** Encode a store as a GPML tree; the store is repaired in place first. */
export function writePathwayDocument(store: PathwayStore, options: PathwayWriteOptions = {}): XmlElement {
    const version = options.version ?? GPML_CONFIG.DEFAULT_VERSION;
    const root = version === '2013a' ? writeGpml2013a(store) : writeGpml2021(store);
    if (options.validate ?? GPML_CONFIG.VALIDATE_ON_WRITE) {
        assertValidDocument(root, version);
    }
    return root;
}

export function writePathway(store: PathwayStore, options: PathwayWriteOptions = {}): string {
    return serializeXml(writePathwayDocument(store, options));
}

/* ------------------------------------------------------------------ */
/*  Files                                                             */
/* ------------------------------------------------------------------ */

export async function readPathwayFile(path: string, options: PathwayReadOptions = {}): Promise<PathwayStore> {
    const handle = await open(path, 'r');
    try {
        const xml = await handle.readFile({ encoding: 'utf8' });
        const store = readPathway(xml, options);
        Logger.debug('gpml.file.read', { path });
        return store;
    } finally {
        await handle.close();
    }
}

export async function writePathwayFile(
    store: PathwayStore,
    path: string,
    options: PathwayWriteOptions = {},
): Promise<void> {
    const xml = writePathway(store, options);
    const handle = await open(path, 'w');
    try {
        await handle.writeFile(xml, { encoding: 'utf8' });
        Logger.debug('gpml.file.write', { path, bytes: Buffer.byteLength(xml) });
    } finally {
        await handle.close();
    }
}

/* ------------------------------------------------------------------ */
/*  Conversion                                                        */
/* ------------------------------------------------------------------ */

/** Read a document in either generation and write it in `to`. */
export function convertDocument(xml: string, to: GpmlVersion, options: ReadOptions = {}): ConvertedDocument {
    const root = parseXml(xml);
    const from = detectVersion(root);
    const store = readPathwayTree(root, options);
    const report = convertPathway(store, from, to);
    return { xml: writePathway(store, { version: to }), report };
}
