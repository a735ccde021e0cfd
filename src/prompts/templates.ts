/**
 * MCP Prompts - Modelling Templates
 *
 * Guided workflows around the conversion tools.
 */

/**
 * Prompt argument definition
 */
export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

/**
 * Prompt definition
 */
export interface Prompt {
    name: string;
    description: string;
    arguments: PromptArgument[];
}

/**
 * Prompt message (for GetPrompt response)
 */
export interface PromptMessage {
    role: 'user' | 'assistant';
    content: {
        type: 'text';
        text: string;
    };
}

/**
 * GetPrompt response
 */
export interface GetPromptResult {
    description: string;
    messages: PromptMessage[];
}

export const PROMPTS: Prompt[] = [
    {
        name: 'uml-to-owl',
        description: 'Convert a UML class diagram (XMI) to OWL and review the mapping decisions',
        arguments: [
            { name: 'xmi', description: 'The XMI export of the class diagram', required: true },
            { name: 'base_iri', description: 'Namespace for the generated ontology', required: false },
        ],
    },
    {
        name: 'review-ontology',
        description: 'Check a Turtle ontology for the usual UML-to-OWL pitfalls',
        arguments: [
            { name: 'turtle', description: 'The ontology in Turtle', required: true },
        ],
    },
];

export function getPrompt(name: string, args: Record<string, string>): GetPromptResult | null {
    switch (name) {
        case 'uml-to-owl':
            return renderUmlToOwl(args['xmi'] || '', args['base_iri']);
        case 'review-ontology':
            return renderReviewOntology(args['turtle'] || '');
        default:
            return null;
    }
}

function renderUmlToOwl(xmi: string, baseIri?: string): GetPromptResult {
    const callArgs = JSON.stringify({ xmi: '<the XMI below>', ...(baseIri && { base_iri: baseIri }), verbosity: 'detailed' }, null, 2);
    return {
        description: 'UML to OWL conversion',
        messages: [
            {
                role: 'user',
                content: {
                    type: 'text',
                    text: `Convert this UML class diagram to an OWL ontology.

1. Call "inspect-uml" to list the classes, enumerations and associations that were recognised.
   Compare them with the diagram and mention anything that is missing.
2. Call "convert-uml" with:
${callArgs}
3. Go through report.warnings and report.skipped and explain each one.
4. Point out where UML and OWL semantics differ for this model:
   - generalizations that do NOT make siblings disjoint unless the parent is abstract
   - multiplicities that became functional properties or cardinality restrictions
   - association ends that share a property name across classes

UML XMI:
${xmi}`,
                },
            },
        ],
    };
}

function renderReviewOntology(turtle: string): GetPromptResult {
    return {
        description: 'Ontology review',
        messages: [
            {
                role: 'user',
                content: {
                    type: 'text',
                    text: `Review this ontology.

1. Call "validate-ontology" with the Turtle below; stop and report the parser error if it is not valid.
2. Check that:
   - every owl:ObjectProperty and owl:DatatypeProperty has rdfs:domain and rdfs:range
   - datatype ranges use xsd: datatypes
   - owl:FunctionalProperty is only used where the UML upper bound is 1
   - disjointness is only asserted between classes that cannot share instances
3. List concrete fixes as Turtle snippets.

Ontology:
${turtle}`,
                },
            },
        ],
    };
}

/**
 * List all available prompts
 */
export function listPrompts(): Prompt[] {
    return PROMPTS;
}
