/**
 * Rule-based pipeline: XMI -> UML model -> OWL axioms -> serialized ontology.
 */

import type {
    ConvertOptions,
    MappingReport,
    Ontology,
    OutputFormat,
    StageTimings,
    UmlModel,
} from './types/index.js';
import { DEFAULTS } from './types/index.js';
import { loadXmi } from './xmi/index.js';
import { mapModel } from './mapping/index.js';
import { serialize } from './serializer/index.js';

export interface ConvertResult {
    model: UmlModel;
    ontology: Ontology;
    format: OutputFormat;
    output: string;
    report: MappingReport;
    timings: StageTimings;
}

function elapsed(start: number): number {
    return Math.round((performance.now() - start) * 1000) / 1000;
}

export async function convertUml(xmi: string, options: ConvertOptions = {}): Promise<ConvertResult> {
    const format = options.format ?? DEFAULTS.format;
    const onProgress = options.onProgress;

    onProgress?.(0, 'Loading XMI');
    let start = performance.now();
    const model = loadXmi(xmi, { strict: options.strict });
    const loadMs = elapsed(start);

    onProgress?.(0.33, `Mapping ${model.classes.length} classes`);
    start = performance.now();
    const { ontology, report } = mapModel(model, options);
    const mapMs = elapsed(start);

    onProgress?.(0.66, `Serializing ${ontology.axioms.length} axioms as ${format}`);
    start = performance.now();
    const output = await serialize(ontology, format);
    const serializeMs = elapsed(start);

    onProgress?.(1, 'Done');
    return { model, ontology, format, output, report, timings: { loadMs, mapMs, serializeMs } };
}
