import type {
    ConvertResponse,
    MapResponse,
    MappingReport,
    ModelSummary,
    Ontology,
    UmlModel,
    Verbosity,
} from '../types/index.js';
import type { ConvertResult } from '../pipeline.js';
import { formatMultiplicity } from '../xmi/index.js';

/**
 * Build a convert response based on verbosity level.
 */
export function buildConvertResponse(result: ConvertResult, verbosity: Verbosity): ConvertResponse {
    const base = {
        success: true,
        format: result.format,
        output: result.output,
    };

    if (verbosity === 'minimal') {
        return base;
    }

    const standard = {
        ...base,
        message: `Mapped ${result.model.classes.length} classes and ${result.model.enumerations.length} enumerations to ${result.ontology.axioms.length} axioms`,
        axiomCount: result.ontology.axioms.length,
        warnings: result.report.warnings,
    };

    if (verbosity === 'standard') {
        return standard;
    }

    return { ...standard, report: result.report, timings: result.timings };
}

/**
 * Build a map response (structural axioms, no serialization).
 */
export function buildMapResponse(ontology: Ontology, report: MappingReport, verbosity: Verbosity): MapResponse {
    const base: MapResponse = {
        success: true,
        ontologyIri: ontology.iri,
        stats: report.stats,
    };
    if (verbosity === 'minimal') return base;

    base.axioms = ontology.axioms;
    base.warnings = report.warnings;
    base.skipped = report.skipped;

    if (verbosity === 'detailed') {
        base.trace = report.trace;
    }
    return base;
}

/**
 * Compact overview of a loaded UML model.
 */
export function summarizeModel(model: UmlModel): ModelSummary {
    const names = new Map<string, string>();
    for (const c of model.classes) names.set(c.id, c.name);

    return {
        name: model.name,
        packages: model.packages,
        classes: model.classes.map((c) => ({
            id: c.id,
            name: c.name,
            kind: c.kind,
            isAbstract: c.isAbstract,
            attributes: c.attributes.length,
        })),
        enumerations: model.enumerations.map((e) => ({
            id: e.id,
            name: e.name,
            literals: e.literals.map((l) => l.name),
        })),
        associations: model.associations.map((a) => ({
            id: a.id,
            ...(a.name && { name: a.name }),
            ends: a.ends.map(
                (e) => `${e.name ?? '(unnamed)'}: ${names.get(e.typeId) ?? e.typeId} [${formatMultiplicity(e.multiplicity)}]`
            ),
        })),
        generalizations: model.generalizations.length,
        warnings: model.warnings,
    };
}
