/**
 * Recognition of primitive type references across UML tools.
 *
 * Papyrus and Eclipse UML2 point at library hrefs
 * (pathmap://UML_LIBRARIES/UMLPrimitiveTypes.library.uml#String),
 * Enterprise Architect uses synthetic idrefs (EAJava_int, EAnone_String),
 * and hand-written exports often just say type="String".
 */

import table from '../data/datatypes.json';

const ALIASES: Record<string, string> = table.aliases;
const VENDOR_PREFIXES: readonly string[] = table.vendorPrefixes;

function stripVendorPrefix(token: string): string {
    for (const prefix of VENDOR_PREFIXES) {
        if (token.startsWith(prefix)) return token.slice(prefix.length);
    }
    return token;
}

/**
 * Canonical primitive name ("Integer", "String", ...) for a type token, or undefined.
 */
export function canonicalPrimitive(token: string | undefined | null): string | undefined {
    const t = stripVendorPrefix((token ?? '').trim());
    if (!t) return undefined;
    return ALIASES[t.toLowerCase()];
}

/**
 * Extract the fragment id from an href.
 * Example: "somefile.xmi#_abc" => "_abc".
 */
export function hrefFragment(href: string | undefined | null): string | undefined {
    const h = (href ?? '').trim();
    if (!h) return undefined;
    const idx = h.lastIndexOf('#');
    if (idx < 0) return undefined;
    const frag = h.slice(idx + 1).trim();
    return frag ? frag : undefined;
}

/**
 * Primitive named by a library href, e.g.
 * - pathmap://UML_LIBRARIES/UMLPrimitiveTypes.library.uml#Integer
 * - http://www.omg.org/spec/UML/20131001/PrimitiveTypes.xmi#Boolean
 * - http://www.w3.org/2001/XMLSchema#dateTime
 * - http://schema.omg.org/spec/UML/2.1/uml.xml#String
 */
export function primitiveFromHref(href: string | undefined | null): string | undefined {
    const h = (href ?? '').trim();
    if (!h) return undefined;

    const token = hrefFragment(h) ?? h.split('/').filter(Boolean).pop();
    const known = canonicalPrimitive(token);
    if (known) return known;

    // Library hrefs with an unknown token still denote a primitive (e.g. JavaPrimitiveTypes#char[]).
    if (/PrimitiveTypes|XMLSchema|UML_LIBRARIES/i.test(h) && token) return token;
    return undefined;
}

/**
 * Parses XMI IDREF lists (commonly whitespace-separated).
 */
export function parseIdRefList(value: string | undefined | null): string[] {
    const v = (value ?? '').trim();
    if (!v) return [];
    return v
        .split(/\s+/g)
        .map((s) => s.trim())
        .filter(Boolean);
}
