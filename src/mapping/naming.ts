/**
 * IRI minting for classes, properties and individuals.
 */

import type { IRI } from '../types/index.js';

function words(name: string): string[] {
    return name
        .replace(/(\p{Ll}|\p{N})(\p{Lu})/gu, '$1 $2')
        .replace(/(\p{Lu}+)(\p{Lu}\p{Ll})/gu, '$1 $2')
        .split(/[^\p{L}\p{N}]+/u)
        .filter(Boolean);
}

function capitalize(w: string): string {
    return w.charAt(0).toUpperCase() + w.slice(1);
}

function guardLeadingDigit(s: string): string {
    if (!s) return 'unnamed';
    return /^\p{N}/u.test(s) ? `_${s}` : s;
}

/** "order line" / "order_line" / "OrderLine" -> "OrderLine" */
export function toPascalCase(name: string): string {
    return guardLeadingDigit(words(name).map(capitalize).join(''));
}

/** "Order Line" / "order_line" / "HTTPServer" -> "orderLine" / "httpServer" */
export function toCamelCase(name: string): string {
    const [first, ...rest] = words(name);
    if (first === undefined) return 'unnamed';
    return guardLeadingDigit(first.toLowerCase() + rest.map(capitalize).join(''));
}

/** "Online Shop" -> "online-shop" */
export function slugify(name: string): string {
    return name
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, '-')
        .replace(/^-+|-+$/g, '');
}

/**
 * Namespace for minted IRIs. A base without '#' or '/' gets '#' appended.
 */
export function normalizeNamespace(base: string): IRI {
    const b = base.trim();
    return /[#/]$/.test(b) ? b : `${b}#`;
}

/**
 * Hands out local names under one namespace, suffixing `_2`, `_3`, ...
 * when a name is already taken by a different owner.
 */
export class IriMinter {
    private readonly namespace: IRI;
    private readonly owners = new Map<string, string>();

    constructor(namespace: IRI) {
        this.namespace = namespace;
    }

    mint(localName: string, ownerKey: string): { iri: IRI; renamed: boolean } {
        let candidate = localName;
        let n = 1;
        for (;;) {
            const owner = this.owners.get(candidate);
            if (owner === undefined) {
                this.owners.set(candidate, ownerKey);
                return { iri: this.namespace + candidate, renamed: n > 1 };
            }
            if (owner === ownerKey) {
                return { iri: this.namespace + candidate, renamed: n > 1 };
            }
            n++;
            candidate = `${localName}_${n}`;
        }
    }

    get base(): IRI {
        return this.namespace;
    }
}
