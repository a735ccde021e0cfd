/**
 * Namespace-tolerant XML helpers used by the XMI loader.
 *
 * XMI exports vary in namespace prefixes and versions (xmi:, uml:, UML:, XMI 2.1 vs 2.5.1).
 * These helpers match elements by localName (case-insensitive) and tolerate prefixed attributes.
 */

import { JSDOM } from 'jsdom';

let domParser: DOMParser | null = null;

function getDomParser(): DOMParser {
    if (!domParser) {
        const { window } = new JSDOM('');
        domParser = new window.DOMParser();
    }
    return domParser;
}

/** Lowercased local name (falls back to tagName). */
export function localName(el: Element): string {
    return (el.localName || el.tagName || '').toLowerCase();
}

/**
 * Attribute getter.
 *
 * - `attr(el, 'name')` reads the unprefixed attribute only.
 * - `attr(el, 'xmi:id')` reads `xmi:id` under any prefix spelling (`XMI:id`, `xmi:ID`).
 */
export function attr(el: Element, name: string): string | null {
    const direct = el.getAttribute(name);
    if (direct != null) return direct;

    const sep = name.indexOf(':');
    if (sep < 0) return null;

    const wantLocal = name.slice(sep + 1).toLowerCase();
    const wantPrefix = name.slice(0, sep).toLowerCase();
    for (const a of Array.from(el.attributes)) {
        if ((a.prefix ?? '').toLowerCase() === wantPrefix && a.localName.toLowerCase() === wantLocal) {
            return a.value;
        }
    }
    return null;
}

/**
 * Like {@link attr} but tries multiple names in order.
 */
export function attrAny(el: Element, names: readonly string[]): string | null {
    for (const name of names) {
        const v = attr(el, name);
        if (v != null) return v;
    }
    return null;
}

export function boolAttr(el: Element, name: string): boolean | undefined {
    const s = (attr(el, name) ?? '').trim().toLowerCase();
    if (!s) return undefined;
    if (s === 'true' || s === '1') return true;
    if (s === 'false' || s === '0') return false;
    return undefined;
}

export function text(el: Element | null | undefined): string {
    return (el?.textContent ?? '').trim();
}

export function childrenByLocalName(parent: Element, childName: string): Element[] {
    const want = childName.toLowerCase();
    return Array.from(parent.children).filter((c) => localName(c) === want);
}

export function childByLocalName(parent: Element, childName: string): Element | null {
    return childrenByLocalName(parent, childName)[0] ?? null;
}

export function getXmiId(el: Element): string | undefined {
    const s = attrAny(el, ['xmi:id', 'xmi.id', 'id'])?.trim();
    return s ? s : undefined;
}

export function getXmiIdRef(el: Element): string | undefined {
    const s = attrAny(el, ['xmi:idref', 'xmi.idref', 'idref'])?.trim();
    return s ? s : undefined;
}

/**
 * Metaclass of an element without its prefix: "uml:Class" -> "class".
 *
 * Falls back to the tag name so `<UML:Class>` (XMI 1.x) and `<uml:Class>` root elements work too.
 */
export function getMetaclass(el: Element): string {
    const explicit = attrAny(el, ['xmi:type', 'xsi:type'])?.trim();
    if (explicit) {
        const sep = explicit.lastIndexOf(':');
        return explicit.slice(sep + 1).toLowerCase();
    }
    return localName(el);
}

export function parseXmlLenient(xmlText: string): { doc: Document; parserError: string | null } {
    const doc = getDomParser().parseFromString(xmlText, 'application/xml');

    // DOMParser signals parse errors using a <parsererror> element.
    const pe = doc.getElementsByTagName('parsererror')[0];
    if (pe) {
        const msg = (pe.textContent ?? 'XML parse error').trim();
        return { doc, parserError: msg };
    }

    return { doc, parserError: null };
}
