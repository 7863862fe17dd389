/**
 * Structural validation of a GPML element tree against the version's content
 * model and attribute table. Read-only; runs as a separate, optional step.
 */
import { SchemaValidationError, type SchemaViolation } from '../errors';
import { parseColor } from '../io/colors';
import { serializeXml, type XmlElement } from '../io/xmlTree';
import { Logger } from '../services/logger';
import type { GpmlVersion } from '../types/pathway';
import { isDecimal, loadAttributeTable, type AttributeTable } from './attributeTable';
import { childRules, loadContentModel, type ContentModel } from './contentModel';

export interface ValidationResult {
    valid: boolean;
    violations: SchemaViolation[];
}

function isNamespaceAttribute(name: string): boolean {
    return name === 'xmlns' || name.startsWith('xmlns:') || name.startsWith('xsi:');
}

class TreeValidator {
    readonly violations: SchemaViolation[] = [];
    private readonly ids = new Map<string, string>();

    constructor(
        private readonly model: ContentModel,
        private readonly table: AttributeTable,
    ) {}

    private report(path: string, message: string): void {
        this.violations.push({ path, message });
    }

    validateRoot(root: XmlElement): void {
        const path = `/${root.name}`;
        if (root.name !== this.model.root) {
            this.report(path, `root element must be ${this.model.root}`);
            return;
        }
        if (root.attributes.xmlns !== this.model.namespace) {
            this.report(path, `namespace must be ${this.model.namespace}`);
        }
        this.validateElement(root, this.model.root, path);
    }

    private validateElement(element: XmlElement, key: string, path: string): void {
        this.validateAttributes(element, key, path);

        const rules = childRules(this.model, key);
        const counts = new Map<string, number>();
        let lastRank = -1;
        const positions = new Map<string, number>();

        for (const child of element.children) {
            const rank = rules.findIndex((rule) => rule.tag === child.name);
            const seen = (positions.get(child.name) ?? 0) + 1;
            positions.set(child.name, seen);
            const childPath = `${path}/${child.name}[${seen}]`;

            if (rank < 0) {
                this.report(childPath, `element ${child.name} is not allowed in ${element.name}`);
                continue;
            }
            if (rank < lastRank) {
                this.report(childPath, `element ${child.name} is out of order in ${element.name}`);
            }
            lastRank = Math.max(lastRank, rank);
            counts.set(child.name, (counts.get(child.name) ?? 0) + 1);
            this.validateElement(child, rules[rank].key, childPath);
        }

        for (const rule of rules) {
            const count = counts.get(rule.tag) ?? 0;
            if (count < rule.min) {
                this.report(path, `expected at least ${rule.min} ${rule.tag}, found ${count}`);
            }
            if (rule.max !== null && count > rule.max) {
                this.report(path, `expected at most ${rule.max} ${rule.tag}, found ${count}`);
            }
        }
    }

    private validateAttributes(element: XmlElement, key: string, path: string): void {
        const declared = new Set(this.table.attributesOf(key));

        for (const [name, value] of Object.entries(element.attributes)) {
            if (isNamespaceAttribute(name)) continue;
            if (!declared.has(name)) {
                this.report(path, `attribute ${name} is not declared for ${key}`);
                continue;
            }
            const { valueKind } = this.table.info(key, name);
            const number = isDecimal(value) ? Number(value) : NaN;
            if (valueKind === 'float' && isNaN(number)) {
                this.report(path, `attribute ${name} is not a number: "${value}"`);
            } else if (valueKind === 'integer' && !Number.isInteger(number)) {
                this.report(path, `attribute ${name} is not an integer: "${value}"`);
            } else if (valueKind === 'color' && parseColor(value) === null) {
                this.report(path, `attribute ${name} is not a color: "${value}"`);
            } else if (valueKind === 'id') {
                const previous = this.ids.get(value);
                if (previous !== undefined) {
                    this.report(path, `identifier "${value}" is already used at ${previous}`);
                } else {
                    this.ids.set(value, path);
                }
            }
        }

        for (const name of declared) {
            const info = this.table.info(key, name);
            if (info.isRequired && info.defaultValue === null && element.attributes[name] === undefined) {
                this.report(path, `required attribute ${name} is missing`);
            }
        }
    }
}

export function validateDocument(root: XmlElement, version: GpmlVersion): ValidationResult {
    const validator = new TreeValidator(loadContentModel(version), loadAttributeTable(version));
    validator.validateRoot(root);
    const { violations } = validator;
    if (violations.length > 0) {
        Logger.warn('schema.violation', { version, count: violations.length, first: violations[0] });
    }
    return { valid: violations.length === 0, violations };
}

/** Throw one aggregated error carrying the first violation and the document text. */
export function assertValidDocument(root: XmlElement, version: GpmlVersion): void {
    const { violations } = validateDocument(root, version);
    if (violations.length > 0) {
        throw new SchemaValidationError(violations, serializeXml(root));
    }
}
