import type { ConvertOptions, DisjointPolicy, OutputFormat, PropertyNaming } from './types/index.js';
import { createInvalidArgumentError } from './types/index.js';
import { IriSchema } from './handlers/schemas.js';

export interface CliArgs {
    command?: string;
    file?: string;
    help: boolean;
    version: boolean;
    format?: OutputFormat;
    base?: string;
    out?: string;
    strict: boolean;
    disjoint?: DisjointPolicy;
    naming?: PropertyNaming;
    qualified: boolean;
    noLabels: boolean;
    model?: string;
    benchmark?: string;
    summary: boolean;
}

const FORMATS: readonly OutputFormat[] = ['turtle', 'ntriples', 'functional'];
const POLICIES: readonly DisjointPolicy[] = ['abstract', 'all', 'none'];
const NAMINGS: readonly PropertyNaming[] = ['shared', 'qualified'];

const VALUE_OPTIONS = new Set(['format', 'base', 'out', 'disjoint', 'naming', 'model', 'benchmark']);

function oneOf<T extends string>(allowed: readonly T[], value: string, option: string): T {
    const match = allowed.find((a) => a === value);
    if (match === undefined) {
        throw createInvalidArgumentError(
            `Invalid --${option} '${value}'. Valid options are: ${allowed.join(', ')}`
        );
    }
    return match;
}

function iri(value: string, option: string): string {
    if (!IriSchema.safeParse(value).success) {
        throw createInvalidArgumentError(`Invalid --${option} '${value}'. Expected an absolute IRI such as http://example.org/shop#`);
    }
    return value;
}

/**
 * Parse `uml2owl` arguments. Value options take `--name=value` or `--name value`.
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const out: CliArgs = {
        help: false,
        version: false,
        strict: false,
        qualified: false,
        noLabels: false,
        summary: false,
    };
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--help' || arg === '-h') { out.help = true; continue; }
        if (arg === '--version' || arg === '-v') { out.version = true; continue; }
        if (!arg.startsWith('--')) { positional.push(arg); continue; }

        const eq = arg.indexOf('=');
        const name = arg.slice(2, eq === -1 ? undefined : eq);
        let value = eq === -1 ? undefined : arg.slice(eq + 1);

        if (VALUE_OPTIONS.has(name) && value === undefined) {
            if (i + 1 >= argv.length) {
                throw createInvalidArgumentError(`Option --${name} needs a value`);
            }
            value = argv[++i];
        }

        switch (name) {
            case 'format': out.format = oneOf(FORMATS, value ?? '', name); break;
            case 'disjoint': out.disjoint = oneOf(POLICIES, value ?? '', name); break;
            case 'naming': out.naming = oneOf(NAMINGS, value ?? '', name); break;
            case 'base': out.base = iri(value ?? '', name); break;
            case 'out': out.out = value; break;
            case 'model': out.model = value; break;
            case 'benchmark': out.benchmark = value; break;
            case 'strict': out.strict = true; break;
            case 'qualified': out.qualified = true; break;
            case 'no-labels': out.noLabels = true; break;
            case 'summary': out.summary = true; break;
            default:
                throw createInvalidArgumentError(`Unknown option --${name}`);
        }
    }

    [out.command, out.file] = positional;
    return out;
}

export function toConvertOptions(args: CliArgs, defaultBaseIri?: string): ConvertOptions {
    const baseIri = args.base ?? defaultBaseIri;
    return {
        ...(args.format && { format: args.format }),
        ...(baseIri && { baseIri }),
        ...(args.disjoint && { disjointSiblings: args.disjoint }),
        ...(args.naming && { propertyNaming: args.naming }),
        ...(args.qualified && { qualifiedCardinality: true }),
        ...(args.noLabels && { emitLabels: false }),
        ...(args.strict && { strict: true }),
    };
}
