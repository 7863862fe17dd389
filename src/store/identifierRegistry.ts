/**
 * Identifier registry: one per pathway document.
 *
 * Maps every live identifier to a small owner descriptor and remembers every
 * identifier it has ever handed out or accepted, so released ids are never
 * allocated again.
 */
import { customAlphabet } from 'nanoid';
import { DuplicateIdError } from '../errors';
import type { ElementKind } from '../types/pathway';

export type IdOwner =
    | { kind: 'element'; elementKind: ElementKind }
    | { kind: 'point'; lineId: string }
    | { kind: 'anchor'; lineId: string }
    | { kind: 'annotation' }
    | { kind: 'citation' }
    | { kind: 'evidence' };

const HEX_DIGITS = '0123456789abcdef';

/** Past this many issued ids, new ids grow from 5 to 8 hex digits. */
export const WIDE_ID_THRESHOLD = 0x10000;

const leadingLetter = customAlphabet('abcdef', 1);
const narrowTail = customAlphabet(HEX_DIGITS, 4);
const wideTail = customAlphabet(HEX_DIGITS, 7);

export function describeOwner(owner: IdOwner): string {
    switch (owner.kind) {
        case 'element':
            return owner.elementKind;
        case 'point':
        case 'anchor':
            return `${owner.kind} of ${owner.lineId}`;
        default:
            return owner.kind;
    }
}

export class IdentifierRegistry {
    private readonly owners = new Map<string, IdOwner>();
    private readonly issued = new Set<string>();

    /** New identifier, unique among live and previously issued ids. */
    allocate(): string {
        const wide = this.issued.size > WIDE_ID_THRESHOLD;
        let candidate: string;
        do {
            candidate = leadingLetter() + (wide ? wideTail() : narrowTail());
        } while (this.issued.has(candidate) || this.owners.has(candidate));
        this.issued.add(candidate);
        return candidate;
    }

    register(id: string, owner: IdOwner): void {
        const existing = this.owners.get(id);
        if (existing) {
            throw new DuplicateIdError(id, describeOwner(existing));
        }
        this.owners.set(id, owner);
        this.issued.add(id);
    }

    /** Unmap an id. It stays reserved. */
    release(id: string): void {
        this.owners.delete(id);
    }

    lookup(id: string): IdOwner | null {
        return this.owners.get(id) ?? null;
    }

    has(id: string): boolean {
        return this.owners.has(id);
    }

    /** Whether the id is live or was ever issued. */
    isReserved(id: string): boolean {
        return this.owners.has(id) || this.issued.has(id);
    }

    get size(): number {
        return this.owners.size;
    }

    ids(): string[] {
        return [...this.owners.keys()];
    }
}
