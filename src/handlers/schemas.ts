import { z } from 'zod';
import type { MappingOptions } from '../types/index.js';
import { createInvalidArgumentError } from '../types/index.js';

export const VerbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard');

export const IriSchema = z.string().url();

const MappingArgs = {
    base_iri: IriSchema.optional(),
    ontology_iri: IriSchema.optional(),
    property_naming: z.enum(['shared', 'qualified']).optional(),
    disjoint_siblings: z.enum(['abstract', 'all', 'none']).optional(),
    emit_cardinality: z.boolean().optional(),
    qualified_cardinality: z.boolean().optional(),
    emit_labels: z.boolean().optional(),
    include_interfaces: z.boolean().optional(),
    strict: z.boolean().optional(),
};

export const ConvertArgsSchema = z.object({
    xmi: z.string(),
    format: z.enum(['turtle', 'ntriples', 'functional']).optional(),
    ...MappingArgs,
    verbosity: VerbositySchema,
});

export const MapArgsSchema = z.object({
    xmi: z.string(),
    ...MappingArgs,
    verbosity: VerbositySchema,
});

export const InspectArgsSchema = z.object({
    xmi: z.string(),
    strict: z.boolean().optional(),
});

export const ValidateArgsSchema = z.object({
    turtle: z.string(),
});

export const GenerateArgsSchema = z.object({
    xmi: z.string(),
    benchmark: z.boolean().default(true),
    save: z.boolean().default(false),
});

export const ListBenchmarksArgsSchema = z.object({
    model: z.string().optional(),
    summary: z.boolean().default(false),
});

export type ConvertArgs = z.infer<typeof ConvertArgsSchema>;
export type MapArgs = z.infer<typeof MapArgsSchema>;

/**
 * Validate raw tool arguments, raising INVALID_ARGUMENT with every issue.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.infer<S> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createInvalidArgumentError(`Invalid arguments for ${tool}: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
}

/** snake_case tool arguments -> library mapping options */
export function toMappingOptions(args: Omit<MapArgs, 'xmi' | 'verbosity'>, defaultBaseIri?: string): MappingOptions {
    const baseIri = args.base_iri ?? defaultBaseIri;
    return {
        ...(baseIri !== undefined && { baseIri }),
        ...(args.ontology_iri !== undefined && { ontologyIri: args.ontology_iri }),
        ...(args.property_naming !== undefined && { propertyNaming: args.property_naming }),
        ...(args.disjoint_siblings !== undefined && { disjointSiblings: args.disjoint_siblings }),
        ...(args.emit_cardinality !== undefined && { emitCardinality: args.emit_cardinality }),
        ...(args.qualified_cardinality !== undefined && { qualifiedCardinality: args.qualified_cardinality }),
        ...(args.emit_labels !== undefined && { emitLabels: args.emit_labels }),
        ...(args.include_interfaces !== undefined && { includeInterfaces: args.include_interfaces }),
        ...(args.strict !== undefined && { strict: args.strict }),
    };
}
