import type {
    AggregationKind,
    ClassifierKind,
    Multiplicity,
    UmlAttribute,
    UmlClass,
    UmlEnumeration,
    UmlGeneralization,
    UmlGeneralizationSet,
    UmlRealization,
} from '../types/index.js';
import { PipelineException, createInvalidMultiplicityError } from '../types/index.js';
import { LoadContext, reportProblem, resolveTypeRef } from './context.js';
import { UNCONSTRAINED, multiplicityFromBounds } from './multiplicity.js';
import { parseIdRefList } from './primitives.js';
import {
    attr,
    attrAny,
    boolAttr,
    childByLocalName,
    childrenByLocalName,
    getXmiId,
    getXmiIdRef,
    text,
} from './xml.js';

function optionalAttr(el: Element, name: string): string | undefined {
    const v = (attr(el, name) ?? '').trim();
    return v ? v : undefined;
}

function refAttrOrChild(el: Element, name: string): string | undefined {
    const direct = parseIdRefList(attr(el, name))[0];
    if (direct) return direct;
    const child = childByLocalName(el, name);
    return child ? getXmiIdRef(child) : undefined;
}

/**
 * Read `<lowerValue value=".."/>` / `<upperValue value=".."/>`, falling back to `lower`/`upper` attributes.
 * Invalid bounds are reported and replaced by 0..*.
 */
export function readMultiplicity(ctx: LoadContext, el: Element, owner: { id: string; name: string }): Multiplicity {
    const lowerEl = childByLocalName(el, 'lowerValue');
    const upperEl = childByLocalName(el, 'upperValue');
    // A LiteralInteger without a value attribute is 0
    const lower = lowerEl ? optionalAttr(lowerEl, 'value') ?? '0' : optionalAttr(el, 'lower');
    const upper = upperEl ? optionalAttr(upperEl, 'value') : optionalAttr(el, 'upper');

    try {
        return multiplicityFromBounds(lower, upper);
    } catch (e) {
        if (!(e instanceof PipelineException)) throw e;
        reportProblem(ctx, createInvalidMultiplicityError(`${lower ?? ''}..${upper ?? ''}`, owner));
        return { ...UNCONSTRAINED };
    }
}

/**
 * `<ownedComment body="..."/>` or `<ownedComment><body>..</body></ownedComment>`
 */
export function readComments(el: Element): string[] {
    const out: string[] = [];
    for (const c of childrenByLocalName(el, 'ownedComment')) {
        const body = (attr(c, 'body') ?? text(childByLocalName(c, 'body'))).trim();
        if (body) out.push(body);
    }
    return out;
}

function readAggregation(el: Element): AggregationKind {
    const raw = (attr(el, 'aggregation') ?? '').trim().toLowerCase();
    return raw === 'composite' || raw === 'shared' ? raw : 'none';
}

function readDefaultValue(el: Element): string | undefined {
    const child = childByLocalName(el, 'defaultValue');
    const v = child ? attrAny(child, ['value', 'body']) ?? text(childByLocalName(child, 'body')) : attr(el, 'default');
    const s = (v ?? '').trim();
    return s ? s : undefined;
}

export function parseAttribute(ctx: LoadContext, el: Element, owner: UmlClass): UmlAttribute | null {
    const id = getXmiId(el) ?? ctx.synthId();
    const name = (attr(el, 'name') ?? '').trim();
    const association = (attr(el, 'association') ?? '').trim() || undefined;

    if (!name && !association) {
        ctx.warnings.push(`Unnamed attribute '${id}' in class '${owner.name}' skipped`);
        return null;
    }

    const defaultValue = readDefaultValue(el);

    return {
        id,
        name,
        typeRef: resolveTypeRef(ctx, el),
        multiplicity: readMultiplicity(ctx, el, { id, name: name || id }),
        isStatic: boolAttr(el, 'isStatic') ?? false,
        isDerived: boolAttr(el, 'isDerived') ?? false,
        isReadOnly: boolAttr(el, 'isReadOnly') ?? false,
        ...(defaultValue !== undefined && { defaultValue }),
        ...(association && { association }),
        aggregation: readAggregation(el),
    };
}

export interface ParsedClassifier {
    cls: UmlClass;
    generalizations: UmlGeneralization[];
    realizations: UmlRealization[];
}

/**
 * Parse a Class / Interface / DataType / AssociationClass element.
 */
export function parseClassifier(
    ctx: LoadContext,
    el: Element,
    kind: ClassifierKind,
    packagePath: string[]
): ParsedClassifier {
    let id = getXmiId(el);
    const rawName = (attr(el, 'name') ?? '').trim();
    if (!id) {
        id = ctx.synthId();
        ctx.warnings.push(`Classifier '${rawName || kind}' has no xmi:id; using '${id}'`);
    }

    const cls: UmlClass = {
        id,
        name: rawName || id,
        kind,
        isAbstract: boolAttr(el, 'isAbstract') ?? false,
        attributes: [],
        operations: [],
        comments: readComments(el),
        packagePath,
    };
    if (!rawName) {
        ctx.warnings.push(`Classifier '${id}' has no name; using its id`);
    }

    for (const a of childrenByLocalName(el, 'ownedAttribute')) {
        const parsed = parseAttribute(ctx, a, cls);
        if (parsed) cls.attributes.push(parsed);
    }

    for (const op of childrenByLocalName(el, 'ownedOperation')) {
        const n = (attr(op, 'name') ?? '').trim();
        if (n) cls.operations.push(n);
    }

    const generalizations: UmlGeneralization[] = [];
    for (const g of childrenByLocalName(el, 'generalization')) {
        const general = refAttrOrChild(g, 'general');
        if (!general) {
            ctx.warnings.push(`Generalization in '${cls.name}' has no 'general' reference`);
            continue;
        }
        generalizations.push({
            id: getXmiId(g) ?? ctx.synthId(),
            childId: id,
            parentId: general,
            generalizationSetIds: parseIdRefList(attr(g, 'generalizationSet')),
        });
    }

    const realizations: UmlRealization[] = [];
    for (const r of childrenByLocalName(el, 'interfaceRealization')) {
        const supplier = refAttrOrChild(r, 'contract') ?? refAttrOrChild(r, 'supplier');
        if (!supplier) continue;
        realizations.push({ id: getXmiId(r) ?? ctx.synthId(), clientId: id, supplierId: supplier });
    }

    return { cls, generalizations, realizations };
}

export function parseEnumeration(ctx: LoadContext, el: Element, packagePath: string[]): UmlEnumeration {
    const id = getXmiId(el) ?? ctx.synthId();
    const name = (attr(el, 'name') ?? '').trim() || id;
    const literals = childrenByLocalName(el, 'ownedLiteral')
        .map((lit) => ({ id: getXmiId(lit) ?? ctx.synthId(), name: (attr(lit, 'name') ?? '').trim() }))
        .filter((lit) => {
            if (!lit.name) ctx.warnings.push(`Unnamed literal '${lit.id}' in enumeration '${name}' skipped`);
            return lit.name !== '';
        });

    return { id, name, literals, comments: readComments(el), packagePath };
}

export function parseGeneralizationSet(ctx: LoadContext, el: Element): { set: UmlGeneralizationSet; members: string[] } {
    const id = getXmiId(el) ?? ctx.synthId();
    const name = (attr(el, 'name') ?? '').trim();
    const members = [
        ...parseIdRefList(attr(el, 'generalization')),
        ...childrenByLocalName(el, 'generalization')
            .map((g) => getXmiIdRef(g))
            .filter((g): g is string => !!g),
    ];
    return {
        set: {
            id,
            ...(name && { name }),
            isDisjoint: boolAttr(el, 'isDisjoint') ?? false,
            isCovering: boolAttr(el, 'isCovering') ?? false,
        },
        members,
    };
}

/**
 * Standalone `<packagedElement xmi:type="uml:Realization" client=".." supplier=".."/>`
 */
export function parseRealization(ctx: LoadContext, el: Element): UmlRealization | null {
    const client = refAttrOrChild(el, 'client');
    const supplier = refAttrOrChild(el, 'supplier') ?? refAttrOrChild(el, 'contract');
    if (!client || !supplier) return null;
    return { id: getXmiId(el) ?? ctx.synthId(), clientId: client, supplierId: supplier };
}
