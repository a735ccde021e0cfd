/**
 * MCP Resources - Mapping reference
 *
 * Browsable documentation of the UML → OWL rules and the datatype table
 * the mapping engine applies.
 */

import { datatypeRows } from '../mapping/index.js';
import { DEFAULTS } from '../types/index.js';
import { FORMAT_EXTENSIONS, OUTPUT_FORMATS } from '../serializer/index.js';

/**
 * Resource definition
 */
export interface Resource {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

export const RESOURCES: Resource[] = [
    {
        uri: 'uml2owl://rules',
        name: 'UML to OWL Mapping Rules',
        description: 'Which OWL axioms each UML class-diagram construct produces',
        mimeType: 'text/markdown',
    },
    {
        uri: 'uml2owl://datatypes',
        name: 'Datatype Table',
        description: 'UML / EA / Java primitive names and their XSD datatypes',
        mimeType: 'application/json',
    },
    {
        uri: 'uml2owl://formats',
        name: 'Output Formats',
        description: 'Serialization formats and default mapping options',
        mimeType: 'application/json',
    },
];

const RULES: Array<[string, string]> = [
    ['Class, Interface, DataType, AssociationClass', 'owl:Class with rdfs:label and rdfs:comment from owned comments'],
    ['Attribute of primitive type', 'owl:DatatypeProperty, rdfs:domain owner, rdfs:range XSD datatype'],
    ['Attribute typed by a class or enumeration', 'owl:ObjectProperty, rdfs:domain owner, rdfs:range class'],
    ['Binary association', 'one owl:ObjectProperty per named or navigable end; two ends give owl:inverseOf'],
    ['N-ary association', 'reified owl:Class with one functional owl:ObjectProperty per end'],
    ['Generalization, InterfaceRealization', 'rdfs:subClassOf'],
    ['Multiplicity upper 1', 'owl:FunctionalProperty when every use is single-valued, otherwise max 1 restriction'],
    ['Multiplicity lower > 0', 'owl:minCardinality restriction on the owner'],
    ['Multiplicity n..n', 'owl:cardinality n restriction on the owner'],
    ['Abstract class', 'direct subclasses pairwise disjoint, covering axiom A ⊑ S1 ⊔ … ⊔ Sn'],
    ['GeneralizationSet isDisjoint / isCovering', 'owl:AllDisjointClasses / covering axiom'],
    ['Enumeration', 'owl:Class equivalent to owl:oneOf its literals, owl:AllDifferent'],
    ['Composite aggregation', 'the part-to-whole property is functional'],
    ['Operation, static attribute', 'not mapped, listed in the report as skipped'],
];

function rulesMarkdown(): string {
    const lines = [
        '# UML to OWL Mapping Rules',
        '',
        '| UML | OWL |',
        '|-----|-----|',
        ...RULES.map(([uml, owl]) => `| ${uml} | ${owl} |`),
        '',
        'Property names are shared across classes when kind and range agree; a name used',
        'with different kinds or ranges is qualified with the owning class (`personName`).',
        'Disjointness of siblings follows the `disjoint_siblings` option (abstract | all | none).',
    ];
    return lines.join('\n');
}

export function getResourceContent(uri: string): string | null {
    switch (uri) {
        case 'uml2owl://rules':
            return rulesMarkdown();
        case 'uml2owl://datatypes':
            return JSON.stringify(datatypeRows(), null, 2);
        case 'uml2owl://formats':
            return JSON.stringify(
                {
                    formats: OUTPUT_FORMATS.map((f) => ({ name: f, extension: FORMAT_EXTENSIONS[f] })),
                    defaults: DEFAULTS,
                },
                null,
                2
            );
        default:
            return null;
    }
}

export function listResources(): Resource[] {
    return RESOURCES;
}
