/**
 * UML Model Loader
 *
 * Parses an XMI 2.x export (Papyrus, Eclipse UML2, Enterprise Architect, MagicDraw)
 * into the in-memory class model consumed by the mapping engine.
 */

import type {
    ClassifierKind,
    LoadOptions,
    UmlAssociation,
    UmlClass,
    UmlEnumeration,
    UmlGeneralization,
    UmlGeneralizationSet,
    UmlModel,
    UmlRealization,
} from '../types/index.js';
import {
    createEmptyInputError,
    createUnresolvedReferenceError,
    createXmiParseError,
} from '../types/index.js';
import { LoadContext, createLoadContext, reportProblem } from './context.js';
import { parseAssociation, pruneAssociations } from './parseAssociations.js';
import {
    parseClassifier,
    parseEnumeration,
    parseGeneralizationSet,
    parseRealization,
} from './parseClassifiers.js';
import { attr, getMetaclass, getXmiId, localName, parseXmlLenient } from './xml.js';

const CLASSIFIER_KINDS = new Map<string, ClassifierKind>([
    ['class', 'class'],
    ['interface', 'interface'],
    ['datatype', 'datatype'],
    ['associationclass', 'associationClass'],
]);

/** Metaclasses with no counterpart in the class-diagram rule table */
const IGNORED_METACLASSES = new Set([
    'usecase', 'actor', 'activity', 'statemachine', 'interaction', 'component',
    'node', 'artifact', 'collaboration', 'signal', 'profile', 'stereotype',
    'dependency', 'usage', 'abstraction', 'instancespecification', 'comment',
    'constraint', 'primitivetype', 'profileapplication', 'packageimport', 'diagram',
]);

/** Containers whose children are walked */
const CONTAINER_TAGS = new Set(['packagedelement', 'ownedmember', 'ownedtype', 'nestedclassifier', 'nestedpackage']);

interface Collected {
    classes: UmlClass[];
    enumerations: UmlEnumeration[];
    associations: UmlAssociation[];
    generalizations: UmlGeneralization[];
    generalizationSets: Array<{ set: UmlGeneralizationSet; members: string[] }>;
    realizations: UmlRealization[];
    packages: string[];
}

function walk(ctx: LoadContext, parent: Element, path: string[], out: Collected): void {
    for (const el of Array.from(parent.children)) {
        const tag = localName(el);
        if (tag === 'extension' || tag === 'documentation') continue;

        const metaclass = getMetaclass(el);
        const isTopLevel = parent === parent.ownerDocument.documentElement || CONTAINER_TAGS.has(tag);
        if (!isTopLevel && !CONTAINER_TAGS.has(tag) && !CLASSIFIER_KINDS.has(metaclass)) {
            // ownedAttribute, ownedEnd, ... are handled by their owners
            continue;
        }

        const name = (attr(el, 'name') ?? '').trim();
        const kind = CLASSIFIER_KINDS.get(metaclass);

        // Only the first element carrying an id is part of the model
        const id = getXmiId(el);
        if (id && ctx.index.get(id) !== el) {
            ctx.warnings.push(`Element${name ? ` '${name}'` : ''} reuses xmi:id '${id}'; skipped`);
            continue;
        }

        if (kind) {
            const parsed = parseClassifier(ctx, el, kind, path);
            out.classes.push(parsed.cls);
            out.generalizations.push(...parsed.generalizations);
            out.realizations.push(...parsed.realizations);
            if (kind === 'associationClass') {
                const assoc = parseAssociation(ctx, el, parsed.cls.id);
                if (assoc) out.associations.push(assoc);
            }
            walk(ctx, el, [...path, parsed.cls.name], out);
            continue;
        }

        switch (metaclass) {
            case 'model':
                walk(ctx, el, path, out);
                break;
            case 'package': {
                const pkgPath = name ? [...path, name] : path;
                if (name) out.packages.push(pkgPath.join('::'));
                walk(ctx, el, pkgPath, out);
                break;
            }
            case 'enumeration':
                out.enumerations.push(parseEnumeration(ctx, el, path));
                break;
            case 'association': {
                const assoc = parseAssociation(ctx, el);
                if (assoc) out.associations.push(assoc);
                break;
            }
            case 'generalizationset':
                out.generalizationSets.push(parseGeneralizationSet(ctx, el));
                break;
            case 'realization':
            case 'interfacerealization': {
                const r = parseRealization(ctx, el);
                if (r) out.realizations.push(r);
                break;
            }
            default:
                if (IGNORED_METACLASSES.has(metaclass)) break;
                if (CONTAINER_TAGS.has(tag)) {
                    ctx.warnings.push(`Unsupported element '${metaclass}'${name ? ` '${name}'` : ''} skipped`);
                    break;
                }
                // Wrapper elements such as <xmi:XMI> or <uml:Model>
                walk(ctx, el, path, out);
        }
    }
}

function findModelName(root: Element): string {
    if (getMetaclass(root) === 'model') return (attr(root, 'name') ?? '').trim() || 'model';
    for (const el of Array.from(root.children)) {
        if (getMetaclass(el) === 'model') return (attr(el, 'name') ?? '').trim() || 'model';
    }
    return (attr(root, 'name') ?? '').trim() || 'model';
}

/**
 * Drop references that point outside the parsed classifiers.
 */
function resolveReferences(ctx: LoadContext, out: Collected): Omit<UmlModel, 'name' | 'warnings'> {
    const classes = new Map(out.classes.map((c) => [c.id, c]));

    // Targets that exist but are not classifiers (enumerations, components) are dropped
    // with a warning; only targets missing from the document count as dangling.
    const checkTarget = (targetId: string, from: { id: string; name?: string; role: string }): boolean => {
        if (classes.has(targetId)) return true;
        if (ctx.index.has(targetId)) {
            ctx.warnings.push(`${from.role} '${from.name ?? from.id}' targets '${targetId}', which is not a class; skipped`);
        } else {
            reportProblem(ctx, createUnresolvedReferenceError(targetId, from));
        }
        return false;
    };

    const generalizations = out.generalizations.filter((g) =>
        checkTarget(g.parentId, { id: g.id, name: classes.get(g.childId)?.name, role: 'Generalization of' })
    );

    // Set membership may be recorded on either side.
    const byId = new Map(generalizations.map((g) => [g.id, g]));
    for (const { set, members } of out.generalizationSets) {
        for (const gid of members) {
            const g = byId.get(gid);
            if (g && !g.generalizationSetIds.includes(set.id)) g.generalizationSetIds.push(set.id);
        }
    }

    const realizations = out.realizations.filter((r) =>
        checkTarget(r.clientId, { id: r.id, role: 'Realization' })
        && checkTarget(r.supplierId, { id: r.id, role: 'Realization' })
    );

    return {
        classes: out.classes,
        enumerations: out.enumerations,
        associations: pruneAssociations(ctx, out.associations, classes),
        generalizations,
        generalizationSets: out.generalizationSets.map((s) => s.set),
        realizations,
        packages: out.packages,
    };
}

/**
 * Load a UML class model from XMI text.
 *
 * Lenient by default: dangling references, duplicate ids and malformed
 * multiplicities become warnings. With `strict: true` they throw.
 */
export function loadXmi(xmi: string, options: LoadOptions = {}): UmlModel {
    if (!xmi || !xmi.trim()) {
        throw createEmptyInputError();
    }

    const { doc, parserError } = parseXmlLenient(xmi);
    if (parserError) {
        throw createXmiParseError(parserError, xmi);
    }

    const root = doc.documentElement;
    const ctx = createLoadContext(doc, options.strict ?? false);
    const out: Collected = {
        classes: [],
        enumerations: [],
        associations: [],
        generalizations: [],
        generalizationSets: [],
        realizations: [],
        packages: [],
    };

    // A bare <uml:Model> / <uml:Package> root is itself the container.
    walk(ctx, root, [], out);

    const resolved = resolveReferences(ctx, out);
    if (resolved.classes.length === 0 && resolved.enumerations.length === 0) {
        ctx.warnings.push('No classes found in the XMI document');
    }

    return {
        name: findModelName(root),
        ...resolved,
        warnings: ctx.warnings,
    };
}
