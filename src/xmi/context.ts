import type { PipelineException, TypeRef } from '../types/index.js';
import { createDuplicateIdError } from '../types/index.js';
import { attr, childByLocalName, getMetaclass, getXmiId, getXmiIdRef, localName } from './xml.js';
import { canonicalPrimitive, hrefFragment, primitiveFromHref } from './primitives.js';

/**
 * Shared state for one XMI load: the id index and the strict/lenient policy.
 */
export interface LoadContext {
    strict: boolean;
    warnings: string[];
    index: Map<string, Element>;
    synthId: () => string;
}

export function createLoadContext(doc: Document, strict: boolean): LoadContext {
    const warnings: string[] = [];
    let synthCounter = 0;
    const ctx: LoadContext = {
        strict,
        warnings,
        index: new Map(),
        synthId: () => {
            synthCounter++;
            return `_synth_${synthCounter}`;
        },
    };
    ctx.index = buildXmiIdIndex(doc, ctx);
    return ctx;
}

/**
 * Throw in strict mode, record a warning otherwise.
 */
export function reportProblem(ctx: LoadContext, problem: PipelineException): void {
    if (ctx.strict) throw problem;
    ctx.warnings.push(problem.message);
}

/**
 * Elements inside <xmi:Extension> are tool-private (EA repeats attributes there).
 */
export function isInsideExtension(el: Element): boolean {
    let cur: Element | null = el;
    while (cur) {
        if (localName(cur) === 'extension') return true;
        cur = cur.parentElement;
    }
    return false;
}

/**
 * Build a lookup table from XMI ids to their elements, keeping the first occurrence.
 */
export function buildXmiIdIndex(doc: Document, ctx: LoadContext): Map<string, Element> {
    const index = new Map<string, Element>();

    const all = doc.getElementsByTagName('*');
    for (let i = 0; i < all.length; i++) {
        const el = all.item(i);
        if (!el || isInsideExtension(el)) continue;
        const id = getXmiId(el);
        if (!id) continue;
        if (index.has(id)) {
            reportProblem(ctx, createDuplicateIdError(id));
            continue;
        }
        index.set(id, el);
    }

    return index;
}

/**
 * Resolve a referenced id: model-local primitive types and data types named
 * like primitives become primitive references.
 */
function refToTypeRef(ctx: LoadContext, id: string): TypeRef {
    const target = ctx.index.get(id);
    if (target) {
        const metaclass = getMetaclass(target);
        const name = (attr(target, 'name') ?? '').trim();
        if (metaclass === 'primitivetype') {
            return { kind: 'primitive', name: canonicalPrimitive(name) ?? name };
        }
        if (metaclass === 'datatype') {
            const known = canonicalPrimitive(name);
            if (known) return { kind: 'primitive', name: known };
        }
        return { kind: 'element', id };
    }

    const known = canonicalPrimitive(id);
    if (known) return { kind: 'primitive', name: known };
    return { kind: 'unresolved', ref: id };
}

/**
 * Type of a typed element (property, association end):
 * `type="id"`, `<type xmi:idref="id"/>` or `<type href="lib#Name"/>`.
 */
export function resolveTypeRef(ctx: LoadContext, el: Element): TypeRef | undefined {
    const direct = (attr(el, 'type') ?? '').trim();
    if (direct) return refToTypeRef(ctx, direct);

    const typeEl = childByLocalName(el, 'type');
    if (!typeEl) return undefined;

    const idref = getXmiIdRef(typeEl);
    if (idref) return refToTypeRef(ctx, idref);

    const href = attr(typeEl, 'href');
    if (href) {
        const frag = hrefFragment(href);
        if (frag && ctx.index.has(frag)) return refToTypeRef(ctx, frag);
        const primitive = primitiveFromHref(href);
        if (primitive) return { kind: 'primitive', name: primitive };
        return { kind: 'unresolved', ref: href };
    }

    const named = canonicalPrimitive(attr(typeEl, 'name'));
    if (named) return { kind: 'primitive', name: named };
    return undefined;
}
