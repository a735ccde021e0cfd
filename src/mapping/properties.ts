/**
 * Property pool: attributes and association ends become candidates first,
 * then candidates are merged or qualified before any axiom is emitted, so
 * naming decisions see every use of a name across the model.
 */

import type { IRI, Multiplicity, PropertyNaming } from '../types/index.js';
import { IriMinter, toCamelCase, toPascalCase } from './naming.js';

export interface PropertyCandidate {
    /** Unique per candidate */
    key: string;
    /** UML element the axioms are traced back to */
    elementId: string;
    label: string;
    kind: 'data' | 'object';
    domain: IRI;
    domainName: string;
    range?: IRI;
    multiplicity: Multiplicity;
    /** Key of the candidate for the opposite association end */
    inverseKey?: string;
    /** Forced single-valued (part-to-whole direction of a composition) */
    functionalHint?: boolean;
}

export interface ResolvedProperty {
    iri: IRI;
    label: string;
    kind: 'data' | 'object';
    range?: IRI;
    candidates: PropertyCandidate[];
}

function signature(c: PropertyCandidate): string {
    return `${c.kind}|${c.range ?? ''}`;
}

/**
 * Group candidates into properties.
 *
 * `shared`: candidates with the same local name share one property when they
 * agree on kind and range; a name used with different kinds or ranges is
 * qualified by the owning class on every use.
 * `qualified`: every candidate is qualified by its owning class.
 */
export function resolveProperties(
    candidates: PropertyCandidate[],
    minter: IriMinter,
    naming: PropertyNaming,
    warn: (message: string) => void
): { properties: ResolvedProperty[]; byKey: Map<string, ResolvedProperty> } {
    const byName = new Map<string, PropertyCandidate[]>();
    for (const c of candidates) {
        const local = toCamelCase(c.label);
        const group = byName.get(local) ?? [];
        group.push(c);
        byName.set(local, group);
    }

    const properties: ResolvedProperty[] = [];
    const byKey = new Map<string, ResolvedProperty>();

    const emit = (local: string, ownerKey: string, members: PropertyCandidate[]) => {
        const { iri, renamed } = minter.mint(local, ownerKey);
        if (renamed) {
            warn(`Property name '${local}' is already used by another entity; minted <${iri}>`);
        }
        const prop: ResolvedProperty = {
            iri,
            label: members[0].label,
            kind: members[0].kind,
            ...(members[0].range && { range: members[0].range }),
            candidates: members,
        };
        properties.push(prop);
        for (const m of members) byKey.set(m.key, prop);
    };

    for (const [local, group] of byName) {
        const signatures = new Set(group.map(signature));
        const conflicting = signatures.size > 1;

        if (naming === 'shared' && !conflicting) {
            emit(local, `property:${local}`, group);
            continue;
        }

        if (conflicting && naming === 'shared') {
            warn(`Property name '${local}' is used with different types; qualified by owning class`);
        }
        for (const c of group) {
            const qualifiedLocal = toCamelCase(c.domainName) + toPascalCase(c.label);
            emit(qualifiedLocal, `property:${qualifiedLocal}:${c.key}`, [c]);
        }
    }

    return { properties, byKey };
}
