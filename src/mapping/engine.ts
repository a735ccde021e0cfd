/**
 * Mapping Engine
 *
 * Applies the UML → OWL rule table to a loaded class model. The engine is
 * deterministic: the same model and options always produce the same axioms
 * in the same order.
 */

import type {
    Axiom,
    ClassExpression,
    DisjointPolicy,
    IRI,
    MappingOptions,
    MappingReport,
    Ontology,
    PropertyNaming,
    UmlAssociation,
    UmlAssociationEnd,
    UmlClass,
    UmlEnumeration,
    UmlModel,
} from '../types/index.js';
import { DEFAULTS, NS, createMappingError } from '../types/index.js';
import { AxiomBuilder } from './builder.js';
import { cardinalityRestrictions } from './cardinality.js';
import { xsdFor } from './datatypes.js';
import { IriMinter, normalizeNamespace, slugify, toCamelCase, toPascalCase } from './naming.js';
import { PropertyCandidate, ResolvedProperty, resolveProperties } from './properties.js';

export interface MappingResult {
    ontology: Ontology;
    report: MappingReport;
}

export interface ResolvedMappingOptions {
    namespace: IRI;
    ontologyIri: IRI;
    propertyNaming: PropertyNaming;
    disjointSiblings: DisjointPolicy;
    emitCardinality: boolean;
    qualifiedCardinality: boolean;
    emitLabels: boolean;
    includeInterfaces: boolean;
    strict: boolean;
}

/**
 * Fill in defaults. Without an explicit base, the namespace is derived from
 * the model name: model "Online Shop" -> http://example.org/online-shop#
 */
export function resolveMappingOptions(model: Pick<UmlModel, 'name'>, options: MappingOptions = {}): ResolvedMappingOptions {
    const slug = slugify(model.name);
    const namespace = normalizeNamespace(
        options.baseIri ?? (slug ? `http://example.org/${slug}#` : DEFAULTS.baseIri)
    );
    return {
        namespace,
        ontologyIri: options.ontologyIri ?? namespace.replace(/[#/]$/, ''),
        propertyNaming: options.propertyNaming ?? DEFAULTS.propertyNaming,
        disjointSiblings: options.disjointSiblings ?? DEFAULTS.disjointSiblings,
        emitCardinality: options.emitCardinality ?? DEFAULTS.emitCardinality,
        qualifiedCardinality: options.qualifiedCardinality ?? DEFAULTS.qualifiedCardinality,
        emitLabels: options.emitLabels ?? DEFAULTS.emitLabels,
        includeInterfaces: options.includeInterfaces ?? DEFAULTS.includeInterfaces,
        strict: options.strict ?? DEFAULTS.strict,
    };
}

function named(iri: IRI): ClassExpression {
    return { type: 'Class', iri };
}

function unionOrSingle(iris: IRI[]): ClassExpression {
    return iris.length === 1 ? named(iris[0]) : { type: 'ObjectUnionOf', operands: iris.map(named) };
}

function unique<T>(items: T[]): T[] {
    return [...new Set(items)];
}

export class MappingEngine {
    private readonly opts: ResolvedMappingOptions;
    private readonly model: UmlModel;
    private readonly out = new AxiomBuilder();
    private readonly minter: IriMinter;
    private readonly classIris = new Map<string, IRI>();
    private readonly classNames = new Map<string, string>();
    private readonly acceptedParents = new Map<string, string[]>();

    constructor(model: UmlModel, options: MappingOptions = {}) {
        this.model = model;
        this.opts = resolveMappingOptions(model, options);
        this.minter = new IriMinter(this.opts.namespace);
    }

    get options(): ResolvedMappingOptions {
        return this.opts;
    }

    map(): MappingResult {
        this.mintClasses();
        for (const cls of this.model.classes) this.mapClass(cls);
        for (const en of this.model.enumerations) this.mapEnumeration(en);

        const candidates = [
            ...this.attributeCandidates(),
            ...this.associationCandidates(),
        ];
        const { properties, byKey } = resolveProperties(
            candidates,
            this.minter,
            this.opts.propertyNaming,
            (m) => this.out.warn(m)
        );
        for (const prop of properties) this.mapProperty(prop, byKey);

        this.mapGeneralizations();
        this.mapRealizations();
        this.mapDisjointness();
        this.mapGeneralizationSets();

        const ontology: Ontology = {
            iri: this.opts.ontologyIri,
            prefixes: {
                '': this.opts.namespace,
                owl: NS.owl,
                rdf: NS.rdf,
                rdfs: NS.rdfs,
                xsd: NS.xsd,
            },
            axioms: this.out.axioms,
        };
        return { ontology, report: this.out.report(this.model.warnings) };
    }

    // ---- classes and enumerations -------------------------------------------------

    private mintClasses(): void {
        const all: Array<{ id: string; name: string }> = [...this.model.classes, ...this.model.enumerations];
        for (const c of all) {
            const local = toPascalCase(c.name);
            const { iri, renamed } = this.minter.mint(local, `class:${c.id}`);
            if (renamed) {
                this.out.warn(`Class name '${c.name}' is used by more than one element; minted <${iri}>`);
            }
            this.classIris.set(c.id, iri);
            this.classNames.set(c.id, c.name);
        }
    }

    private iriOf(id: string): IRI {
        const iri = this.classIris.get(id);
        if (iri === undefined) throw createMappingError(`no IRI minted for element '${id}'`);
        return iri;
    }

    private annotate(subject: IRI, label: string, comments: string[], sourceId: string): void {
        if (this.opts.emitLabels && label) {
            this.out.add({ type: 'AnnotationAssertion', property: 'label', subject, value: label }, sourceId);
        }
        for (const comment of comments) {
            this.out.add({ type: 'AnnotationAssertion', property: 'comment', subject, value: comment }, sourceId);
        }
    }

    private mapClass(cls: UmlClass): void {
        const iri = this.iriOf(cls.id);
        this.out.add({ type: 'Declaration', entity: 'Class', iri }, cls.id);
        this.annotate(iri, cls.name, cls.comments, cls.id);
        for (const op of cls.operations) {
            this.out.skip({
                id: cls.id,
                name: `${cls.name}.${op}()`,
                kind: 'operation',
                reason: 'Operations have no OWL counterpart',
            });
        }
    }

    private mapEnumeration(en: UmlEnumeration): void {
        const iri = this.iriOf(en.id);
        this.out.add({ type: 'Declaration', entity: 'Class', iri }, en.id);
        this.annotate(iri, en.name, en.comments, en.id);

        if (en.literals.length === 0) {
            this.out.warn(`Enumeration '${en.name}' has no literals`);
            return;
        }

        const individuals: IRI[] = [];
        for (const lit of en.literals) {
            const minted = this.minter.mint(toPascalCase(lit.name), `individual:${lit.id}`);
            if (minted.renamed) {
                this.out.warn(`Literal '${en.name}.${lit.name}' clashes with another name; minted <${minted.iri}>`);
            }
            individuals.push(minted.iri);
            this.out.add({ type: 'Declaration', entity: 'NamedIndividual', iri: minted.iri }, lit.id);
            this.out.add({ type: 'ClassAssertion', cls: iri, individual: minted.iri }, lit.id);
            if (this.opts.emitLabels) {
                this.out.add(
                    { type: 'AnnotationAssertion', property: 'label', subject: minted.iri, value: lit.name },
                    lit.id
                );
            }
        }
        this.out.add(
            { type: 'EquivalentClasses', classes: [named(iri), { type: 'ObjectOneOf', individuals }] },
            en.id
        );
        if (individuals.length > 1) {
            this.out.add({ type: 'DifferentIndividuals', individuals }, en.id);
        }
    }

    // ---- property candidates ------------------------------------------------------

    private attributeCandidates(): PropertyCandidate[] {
        const associationIds = new Set(this.model.associations.map((a) => a.id));
        // Ends claimed by an association's memberEnd, with or without association= on the property
        const endIds = new Set(this.model.associations.flatMap((a) => a.ends.map((e) => e.id)));
        const out: PropertyCandidate[] = [];

        for (const cls of this.model.classes) {
            const domain = this.iriOf(cls.id);
            for (const attr of cls.attributes) {
                if (attr.association !== undefined && associationIds.has(attr.association)) continue;
                if (endIds.has(attr.id)) continue;

                const skip = (reason: string) =>
                    this.out.skip({ id: attr.id, name: `${cls.name}.${attr.name}`, kind: 'attribute', reason });

                if (attr.isStatic) {
                    skip('Static attributes describe the class, not its instances');
                    continue;
                }

                const base = {
                    key: attr.id,
                    elementId: attr.id,
                    label: attr.name,
                    domain,
                    domainName: cls.name,
                    multiplicity: attr.multiplicity,
                };
                const ref = attr.typeRef;

                if (ref === undefined) {
                    out.push({ ...base, kind: 'data' });
                } else if (ref.kind === 'primitive') {
                    const range = xsdFor(ref.name);
                    if (range === undefined) {
                        this.out.warn(`No XSD datatype for '${ref.name}' (${cls.name}.${attr.name}); range omitted`);
                    }
                    out.push({ ...base, kind: 'data', ...(range && { range }) });
                } else if (ref.kind === 'element') {
                    const range = this.classIris.get(ref.id);
                    if (range === undefined) {
                        skip(`Type '${ref.id}' is not a class, interface, data type or enumeration`);
                        continue;
                    }
                    out.push({ ...base, kind: 'object', range });
                } else {
                    skip(`Unresolved type '${ref.ref}'`);
                }
            }
        }
        return out;
    }

    private endTypeName(end: UmlAssociationEnd): string {
        return this.classNames.get(end.typeId) ?? end.typeId;
    }

    private associationCandidates(): PropertyCandidate[] {
        const out: PropertyCandidate[] = [];
        for (const assoc of this.model.associations) {
            const ends = assoc.ends.filter((e) => this.classIris.has(e.typeId));
            if (ends.length < 2) {
                this.out.skip({
                    id: assoc.id,
                    name: assoc.name ?? assoc.id,
                    kind: 'association',
                    reason: 'Fewer than two ends refer to mapped classes',
                });
                continue;
            }
            if (ends.length === 2) {
                out.push(...this.binaryCandidates(assoc, ends[0], ends[1]));
                if (assoc.classId !== undefined && this.classIris.has(assoc.classId)) {
                    out.push(...this.linkCandidates(assoc, assoc.classId, ends));
                }
            } else {
                out.push(...this.reify(assoc, ends));
            }
        }
        return out;
    }

    /**
     * One candidate per qualifying end. The property for an end points from
     * the opposite end's class to this end's class and carries this end's
     * multiplicity.
     */
    private binaryCandidates(assoc: UmlAssociation, a: UmlAssociationEnd, b: UmlAssociationEnd): PropertyCandidate[] {
        const pairs: Array<[UmlAssociationEnd, UmlAssociationEnd]> = [[a, b], [b, a]];
        let qualifying = pairs.filter(([end]) => Boolean(end.name) || end.navigable);
        if (qualifying.length === 0) qualifying = pairs;

        let associationNameUsed = false;
        const candidates = qualifying.map(([end, opposite]): PropertyCandidate => {
            let label = end.name;
            if (!label) {
                if (assoc.name && !associationNameUsed) {
                    label = assoc.name;
                    associationNameUsed = true;
                } else {
                    label = `has${toPascalCase(this.endTypeName(end))}`;
                }
            }
            return {
                key: `${assoc.id}:${end.id}`,
                elementId: assoc.id,
                label,
                kind: 'object',
                domain: this.iriOf(opposite.typeId),
                domainName: this.endTypeName(opposite),
                range: this.iriOf(end.typeId),
                multiplicity: end.multiplicity,
                // a composite opposite end is typed by the part, so this property runs part -> whole
                ...(opposite.aggregation === 'composite' && { functionalHint: true }),
            };
        });

        if (candidates.length === 2) {
            candidates[0].inverseKey = candidates[1].key;
            candidates[1].inverseKey = candidates[0].key;
        }
        return candidates;
    }

    /** Association class: each instance links exactly one participant per end */
    private linkCandidates(assoc: UmlAssociation, classId: string, ends: UmlAssociationEnd[]): PropertyCandidate[] {
        const domain = this.iriOf(classId);
        const domainName = this.classNames.get(classId) ?? classId;
        return ends.map((end): PropertyCandidate => ({
            key: `${classId}:link:${end.id}`,
            elementId: classId,
            label: toCamelCase(this.endTypeName(end)),
            kind: 'object',
            domain,
            domainName,
            range: this.iriOf(end.typeId),
            multiplicity: { lower: 1, upper: 1 },
            functionalHint: true,
        }));
    }

    /** N-ary association -> class whose instances link one participant per end */
    private reify(assoc: UmlAssociation, ends: UmlAssociationEnd[]): PropertyCandidate[] {
        let reified: IRI;
        let reifiedName: string;
        if (assoc.classId !== undefined && this.classIris.has(assoc.classId)) {
            reified = this.iriOf(assoc.classId);
            reifiedName = this.classNames.get(assoc.classId) ?? assoc.classId;
        } else {
            reifiedName = assoc.name || ends.map((e) => toPascalCase(this.endTypeName(e))).join('');
            const minted = this.minter.mint(toPascalCase(reifiedName), `class:${assoc.id}`);
            reified = minted.iri;
            this.out.add({ type: 'Declaration', entity: 'Class', iri: reified }, assoc.id);
            this.annotate(reified, reifiedName, [], assoc.id);
        }
        this.out.warn(
            `N-ary association '${reifiedName}' reified as class <${reified}>; end multiplicities are not mapped`
        );

        return ends.map((end): PropertyCandidate => ({
            key: `${assoc.id}:${end.id}`,
            elementId: assoc.id,
            label: end.name || toCamelCase(this.endTypeName(end)),
            kind: 'object',
            domain: reified,
            domainName: reifiedName,
            range: this.iriOf(end.typeId),
            multiplicity: { lower: 1, upper: 1 },
            functionalHint: true,
        }));
    }

    // ---- properties ---------------------------------------------------------------

    private mapProperty(prop: ResolvedProperty, byKey: Map<string, ResolvedProperty>): void {
        const isObject = prop.kind === 'object';
        const traceIds = unique(prop.candidates.map((c) => c.elementId));
        const addAll = (axiom: Axiom) => {
            for (const id of traceIds) this.out.add(axiom, id);
        };

        addAll({ type: 'Declaration', entity: isObject ? 'ObjectProperty' : 'DataProperty', iri: prop.iri });
        if (this.opts.emitLabels) {
            addAll({ type: 'AnnotationAssertion', property: 'label', subject: prop.iri, value: prop.label });
        }

        const domain = unionOrSingle(unique(prop.candidates.map((c) => c.domain)));
        addAll(isObject
            ? { type: 'ObjectPropertyDomain', property: prop.iri, domain }
            : { type: 'DataPropertyDomain', property: prop.iri, domain });

        if (prop.range !== undefined) {
            addAll(isObject
                ? { type: 'ObjectPropertyRange', property: prop.iri, range: prop.range }
                : { type: 'DataPropertyRange', property: prop.iri, range: prop.range });
        }

        const functional = prop.candidates.every((c) => c.functionalHint === true || c.multiplicity.upper === 1);
        if (functional) {
            addAll(isObject
                ? { type: 'FunctionalObjectProperty', property: prop.iri }
                : { type: 'FunctionalDataProperty', property: prop.iri });
        }

        if (this.opts.emitCardinality) {
            for (const c of prop.candidates) {
                const restrictions = cardinalityRestrictions(c.multiplicity, {
                    kind: prop.kind,
                    property: prop.iri,
                    range: prop.range,
                    functional,
                    qualified: this.opts.qualifiedCardinality,
                });
                for (const sup of restrictions) {
                    this.out.add({ type: 'SubClassOf', sub: named(c.domain), sup }, c.elementId);
                }
            }
        }

        // inverses only between properties that each carry a single association end
        if (prop.candidates.length === 1) {
            const [c] = prop.candidates;
            const other = c.inverseKey === undefined ? undefined : byKey.get(c.inverseKey);
            if (other !== undefined && other !== prop && other.candidates.length === 1) {
                this.out.add({ type: 'InverseObjectProperties', first: prop.iri, second: other.iri }, c.elementId);
            }
        }
    }

    // ---- hierarchy ----------------------------------------------------------------

    private reaches(from: string, target: string, seen = new Set<string>()): boolean {
        if (from === target) return true;
        if (seen.has(from)) return false;
        seen.add(from);
        return (this.acceptedParents.get(from) ?? []).some((p) => this.reaches(p, target, seen));
    }

    private addParent(childId: string, parentId: string, sourceId: string, what: string): void {
        if (this.reaches(parentId, childId)) {
            const message = `${what} from '${this.classNames.get(childId) ?? childId}' to '${this.classNames.get(parentId) ?? parentId}' closes a cycle`;
            if (this.opts.strict) {
                throw createMappingError(message, { elementId: sourceId });
            }
            this.out.warn(`${message}; skipped`);
            return;
        }
        const parents = this.acceptedParents.get(childId) ?? [];
        if (!parents.includes(parentId)) parents.push(parentId);
        this.acceptedParents.set(childId, parents);
        this.out.add({ type: 'SubClassOf', sub: named(this.iriOf(childId)), sup: named(this.iriOf(parentId)) }, sourceId);
    }

    private mapGeneralizations(): void {
        for (const gen of this.model.generalizations) {
            if (!this.classIris.has(gen.childId) || !this.classIris.has(gen.parentId)) {
                this.out.skip({
                    id: gen.id,
                    name: `${gen.childId} -> ${gen.parentId}`,
                    kind: 'generalization',
                    reason: 'General or specific classifier is not mapped',
                });
                continue;
            }
            this.addParent(gen.childId, gen.parentId, gen.id, 'Generalization');
        }
    }

    private mapRealizations(): void {
        for (const r of this.model.realizations) {
            const name = `${this.classNames.get(r.clientId) ?? r.clientId} -> ${this.classNames.get(r.supplierId) ?? r.supplierId}`;
            if (!this.opts.includeInterfaces) {
                this.out.skip({ id: r.id, name, kind: 'realization', reason: 'Interface realizations are disabled' });
                continue;
            }
            if (!this.classIris.has(r.clientId) || !this.classIris.has(r.supplierId)) {
                this.out.skip({ id: r.id, name, kind: 'realization', reason: 'Client or contract is not mapped' });
                continue;
            }
            this.addParent(r.clientId, r.supplierId, r.id, 'Realization');
        }
    }

    /** Direct children per parent over the accepted generalization edges, in model order */
    private childrenOf(parentId: string): string[] {
        const kids: string[] = [];
        for (const gen of this.model.generalizations) {
            if (gen.parentId !== parentId) continue;
            if ((this.acceptedParents.get(gen.childId) ?? []).includes(parentId) && !kids.includes(gen.childId)) {
                kids.push(gen.childId);
            }
        }
        return kids;
    }

    private mapDisjointness(): void {
        const policy = this.opts.disjointSiblings;
        for (const cls of this.model.classes) {
            const kids = this.childrenOf(cls.id);
            const iris = kids.map((k) => this.iriOf(k));

            // interfaces are covered through realizations, not subclasses
            const abstractClass = cls.isAbstract && cls.kind !== 'interface';
            if (abstractClass) {
                if (kids.length === 0) {
                    this.out.warn(`Abstract class '${cls.name}' has no subclasses`);
                    continue;
                }
                this.out.add({ type: 'SubClassOf', sub: named(this.iriOf(cls.id)), sup: unionOrSingle(iris) }, cls.id);
            }

            const disjoint = policy === 'all' || (policy === 'abstract' && abstractClass);
            if (disjoint && iris.length > 1) {
                this.out.add({ type: 'DisjointClasses', classes: iris }, cls.id);
            }
        }
    }

    private mapGeneralizationSets(): void {
        for (const set of this.model.generalizationSets) {
            const members = this.model.generalizations.filter(
                (g) =>
                    g.generalizationSetIds.includes(set.id) &&
                    (this.acceptedParents.get(g.childId) ?? []).includes(g.parentId)
            );
            const label = set.name ?? set.id;
            if (members.length === 0) {
                this.out.warn(`Generalization set '${label}' has no mapped generalizations`);
                continue;
            }

            const kids = unique(members.map((g) => g.childId));
            if (set.isDisjoint && kids.length > 1) {
                this.out.add({ type: 'DisjointClasses', classes: kids.map((k) => this.iriOf(k)) }, set.id);
            }
            if (set.isCovering) {
                for (const parentId of unique(members.map((g) => g.parentId))) {
                    const covering = unique(members.filter((g) => g.parentId === parentId).map((g) => g.childId));
                    this.out.add(
                        {
                            type: 'SubClassOf',
                            sub: named(this.iriOf(parentId)),
                            sup: unionOrSingle(covering.map((k) => this.iriOf(k))),
                        },
                        set.id
                    );
                }
            }
        }
    }
}

export function createMappingEngine(model: UmlModel, options: MappingOptions = {}): MappingEngine {
    return new MappingEngine(model, options);
}

/**
 * Map a UML model to an OWL ontology plus a report of what was skipped,
 * warned about and produced from each UML element.
 */
export function mapModel(model: UmlModel, options: MappingOptions = {}): MappingResult {
    return createMappingEngine(model, options).map();
}
