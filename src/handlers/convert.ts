import type { ConvertResponse, MapResponse, ModelSummary } from '../types/index.js';
import { convertUml } from '../pipeline.js';
import { loadXmi } from '../xmi/index.js';
import { mapModel } from '../mapping/index.js';
import { parseTurtle, ValidationResult } from '../serializer/index.js';
import { buildConvertResponse, buildMapResponse, summarizeModel } from '../utils/response.js';
import {
    ConvertArgsSchema,
    InspectArgsSchema,
    MapArgsSchema,
    ValidateArgsSchema,
    parseArgs,
    toMappingOptions,
} from './schemas.js';

export async function convertHandler(
    rawArgs: unknown,
    defaultBaseIri?: string,
    onProgress?: (progress: number | undefined, message: string) => void
): Promise<ConvertResponse> {
    const args = parseArgs(ConvertArgsSchema, rawArgs, 'convert-uml');
    const result = await convertUml(args.xmi, {
        ...toMappingOptions(args, defaultBaseIri),
        ...(args.format !== undefined && { format: args.format }),
        onProgress,
    });
    return buildConvertResponse(result, args.verbosity);
}

export function inspectHandler(rawArgs: unknown): ModelSummary {
    const args = parseArgs(InspectArgsSchema, rawArgs, 'inspect-uml');
    return summarizeModel(loadXmi(args.xmi, { strict: args.strict }));
}

export function mapHandler(rawArgs: unknown, defaultBaseIri?: string): MapResponse {
    const args = parseArgs(MapArgsSchema, rawArgs, 'map-uml');
    const options = toMappingOptions(args, defaultBaseIri);
    const model = loadXmi(args.xmi, { strict: options.strict });
    const { ontology, report } = mapModel(model, options);
    return buildMapResponse(ontology, report, args.verbosity);
}

export function validateOntologyHandler(rawArgs: unknown): ValidationResult {
    const args = parseArgs(ValidateArgsSchema, rawArgs, 'validate-ontology');
    return parseTurtle(args.turtle);
}
