import type { UmlAssociation, UmlAssociationEnd, UmlClass } from '../types/index.js';
import { createUnresolvedReferenceError } from '../types/index.js';
import { LoadContext, reportProblem, resolveTypeRef } from './context.js';
import { readMultiplicity } from './parseClassifiers.js';
import { parseIdRefList } from './primitives.js';
import { attr, boolAttr, childrenByLocalName, getXmiId, getXmiIdRef, localName } from './xml.js';

function idRefsFrom(el: Element, name: string): string[] {
    return [
        ...parseIdRefList(attr(el, name)),
        ...childrenByLocalName(el, name)
            .map((c) => getXmiIdRef(c))
            .filter((c): c is string => !!c),
    ];
}

function parseEnd(
    ctx: LoadContext,
    endEl: Element,
    endId: string,
    ownedBy: UmlAssociationEnd['ownedBy'],
    navigableOwnedEnds: Set<string>,
    assocName: string
): UmlAssociationEnd | null {
    const name = (attr(endEl, 'name') ?? '').trim();
    const typeRef = resolveTypeRef(ctx, endEl);
    if (!typeRef || typeRef.kind !== 'element') {
        const ref = typeRef?.kind === 'unresolved' ? typeRef.ref : typeRef?.kind === 'primitive' ? typeRef.name : '(none)';
        reportProblem(ctx, createUnresolvedReferenceError(ref, { id: endId, name: name || undefined, role: `Association end of '${assocName}'` }));
        return null;
    }

    const aggregationRaw = (attr(endEl, 'aggregation') ?? '').trim().toLowerCase();
    const explicitNav = boolAttr(endEl, 'isNavigable');

    return {
        id: endId,
        ...(name && { name }),
        typeId: typeRef.id,
        multiplicity: readMultiplicity(ctx, endEl, { id: endId, name: name || endId }),
        aggregation: aggregationRaw === 'composite' || aggregationRaw === 'shared' ? aggregationRaw : 'none',
        navigable: explicitNav ?? (ownedBy === 'classifier' || navigableOwnedEnds.has(endId)),
        ownedBy,
    };
}

/**
 * Parse an Association (or the association half of an AssociationClass).
 *
 * Ends come from `memberEnd` references, each resolved either to an `ownedEnd` of
 * the association or to an `ownedAttribute` of a participating classifier.
 */
export function parseAssociation(ctx: LoadContext, el: Element, classId?: string): UmlAssociation | null {
    const id = getXmiId(el) ?? ctx.synthId();
    const name = (attr(el, 'name') ?? '').trim();
    const label = name || id;

    const ownedEnds = new Map<string, Element>();
    for (const oe of childrenByLocalName(el, 'ownedEnd')) {
        const oeId = getXmiId(oe) ?? ctx.synthId();
        ownedEnds.set(oeId, oe);
    }
    const navigableOwnedEnds = new Set(idRefsFrom(el, 'navigableOwnedEnd'));

    let memberEnds = idRefsFrom(el, 'memberEnd');
    if (memberEnds.length === 0) {
        memberEnds = [...ownedEnds.keys()];
    }

    const ends: UmlAssociationEnd[] = [];
    for (const endId of memberEnds) {
        const owned = ownedEnds.get(endId);
        if (owned) {
            const end = parseEnd(ctx, owned, endId, 'association', navigableOwnedEnds, label);
            if (end) ends.push(end);
            continue;
        }

        const target = ctx.index.get(endId);
        if (!target || localName(target) !== 'ownedattribute') {
            reportProblem(ctx, createUnresolvedReferenceError(endId, { id, name: name || undefined, role: 'Association' }));
            continue;
        }
        const end = parseEnd(ctx, target, endId, 'classifier', navigableOwnedEnds, label);
        if (end) ends.push(end);
    }

    if (ends.length < 2) {
        ctx.warnings.push(`Association '${label}' has fewer than two resolvable ends; skipped`);
        return null;
    }

    return {
        id,
        ...(name && { name }),
        ends,
        ...(classId && { classId }),
    };
}

/**
 * Drop ends (and then associations) whose type is not a classifier in the model.
 */
export function pruneAssociations(
    ctx: LoadContext,
    associations: UmlAssociation[],
    classes: Map<string, UmlClass>
): UmlAssociation[] {
    const out: UmlAssociation[] = [];
    for (const assoc of associations) {
        const label = assoc.name ?? assoc.id;
        const ends = assoc.ends.filter((end) => {
            if (classes.has(end.typeId)) return true;
            reportProblem(ctx, createUnresolvedReferenceError(end.typeId, {
                id: end.id,
                name: end.name,
                role: `Association end of '${label}'`,
            }));
            return false;
        });
        if (ends.length < 2) {
            ctx.warnings.push(`Association '${label}' has fewer than two resolvable ends; skipped`);
            continue;
        }
        out.push({ ...assoc, ends });
    }
    return out;
}
