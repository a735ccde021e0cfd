/**
 * Ontology Serializer
 */

import { Writer } from 'n3';
import type { Ontology, OutputFormat } from '../types/index.js';
import { createSerializationError } from '../types/index.js';
import { toFunctionalSyntax } from './functional.js';
import { toQuads } from './quads.js';

export { toQuads } from './quads.js';
export { toFunctionalSyntax } from './functional.js';
export { parseTurtle } from './validate.js';
export type { ValidationResult } from './validate.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['turtle', 'ntriples', 'functional'];

/** File extension conventionally used for each format */
export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
    turtle: '.ttl',
    ntriples: '.nt',
    functional: '.ofn',
};

function writeRdf(ontology: Ontology, format: 'Turtle' | 'N-Triples'): Promise<string> {
    const writer = new Writer(format === 'Turtle' ? { format, prefixes: ontology.prefixes } : { format });
    writer.addQuads(toQuads(ontology));
    return new Promise((resolve, reject) => {
        writer.end((error, result) => {
            if (error) {
                reject(createSerializationError(error.message, { format }));
            } else {
                resolve(result);
            }
        });
    });
}

/**
 * Render an ontology in the requested exchange format.
 */
export async function serialize(ontology: Ontology, format: OutputFormat = 'turtle'): Promise<string> {
    switch (format) {
        case 'turtle':
            return writeRdf(ontology, 'Turtle');
        case 'ntriples':
            return writeRdf(ontology, 'N-Triples');
        case 'functional':
            return toFunctionalSyntax(ontology);
        default:
            throw createSerializationError(`unknown format '${String(format)}'`, { formats: OUTPUT_FORMATS });
    }
}
