import { DataFactory, Parser, Store } from 'n3';
import { NS } from '../types/index.js';

const { namedNode } = DataFactory;

export interface ValidationResult {
    valid: boolean;
    tripleCount: number;
    classes: number;
    objectProperties: number;
    dataProperties: number;
    individuals: number;
    /** Parser message when the text is not valid Turtle */
    error?: string;
    line?: number;
}

const EMPTY: Omit<ValidationResult, 'valid'> = {
    tripleCount: 0,
    classes: 0,
    objectProperties: 0,
    dataProperties: 0,
    individuals: 0,
};

/**
 * Parse Turtle and count the named OWL entities it types.
 * Never throws: a syntax error comes back as `valid: false` with the parser message.
 */
export function parseTurtle(text: string): ValidationResult {
    if (!text.trim()) {
        return { valid: false, ...EMPTY, error: 'Document is empty' };
    }

    let store: Store;
    try {
        store = new Store(new Parser({ format: 'text/turtle' }).parse(text));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        const line = /line (\d+)/.exec(message);
        return {
            valid: false,
            ...EMPTY,
            error: message,
            ...(line && { line: Number(line[1]) }),
        };
    }

    const typed = (local: string) =>
        store
            .getSubjects(namedNode(NS.rdf + 'type'), namedNode(NS.owl + local), null)
            .filter((s) => s.termType === 'NamedNode').length;

    return {
        valid: true,
        tripleCount: store.size,
        classes: typed('Class'),
        objectProperties: typed('ObjectProperty'),
        dataProperties: typed('DatatypeProperty'),
        individuals: typed('NamedIndividual'),
    };
}
