/**
 * Error kinds raised by the codec and the pathway store.
 *
 * Every error carries structured context readable with `VError.info(err)`.
 * Dangling references are not errors: they are repaired and tallied by
 * `fixReferences()`.
 */
import VError from 'verror';

/** A (tag, attribute) key outside the attribute table. Always a programming bug. */
export class UnknownAttributeError extends VError {
    readonly key: string;

    constructor(version: string, key: string) {
        super(
            { name: 'UnknownAttributeError', info: { version, key } },
            'attribute %s is not defined for GPML%s',
            key,
            version,
        );
        this.key = key;
    }
}

export interface ConversionContext {
    tag?: string;
    attribute?: string;
    key?: string;
}

/** Malformed or missing value while decoding or encoding a document. */
export class ConversionError extends VError {
    readonly context: ConversionContext;

    constructor(message: string, context: ConversionContext = {}, cause?: Error) {
        super(
            { name: 'ConversionError', info: { ...context }, cause: cause ?? null },
            '%s',
            message,
        );
        this.context = context;
    }
}

/** Explicit registration of an identifier that is already taken. */
export class DuplicateIdError extends VError {
    readonly id: string;

    constructor(id: string, existing: string) {
        super(
            { name: 'DuplicateIdError', info: { id, existing } },
            'identifier "%s" is already used by %s',
            id,
            existing,
        );
        this.id = id;
    }
}

export interface SchemaViolation {
    /** Slash-separated element path, e.g. `/Pathway/DataNode[2]/Graphics`. */
    path: string;
    message: string;
}

/** Aggregated schema validation failure. */
export class SchemaValidationError extends VError {
    readonly violations: SchemaViolation[];
    readonly document: string;

    constructor(violations: SchemaViolation[], document: string) {
        const first = violations[0];
        super(
            {
                name: 'SchemaValidationError',
                info: { violationCount: violations.length, path: first?.path ?? null },
            },
            'document is not valid: %s',
            first ? `${first.path}: ${first.message}` : 'unknown violation',
        );
        this.violations = violations;
        this.document = document;
    }
}
