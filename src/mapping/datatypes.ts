import table from '../data/datatypes.json';
import { NS } from '../types/index.js';
import type { IRI } from '../types/index.js';

const XSD: Record<string, string> = table.xsd;

/**
 * XSD datatype for a canonical UML primitive name, or undefined when the
 * primitive has no standard counterpart (a range is then omitted).
 */
export function xsdFor(primitive: string): IRI | undefined {
    const local = XSD[primitive];
    return local ? NS.xsd + local : undefined;
}

/**
 * The datatype table as rows, for documentation resources.
 */
export function datatypeRows(): Array<{ uml: string; xsd: string; aliases: string[] }> {
    const aliases: Record<string, string> = table.aliases;
    return Object.entries(XSD).map(([uml, xsd]) => ({
        uml,
        xsd: `xsd:${xsd}`,
        aliases: Object.keys(aliases).filter((a) => aliases[a] === uml),
    }));
}
