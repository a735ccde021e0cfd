import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (output only), 'standard' (default, adds counts and warnings), 'detailed' (full report and timings)",
};

const xmiSchema = {
    type: 'string',
    description: 'UML class diagram exported as XMI 2.x (Papyrus, Eclipse UML2, Enterprise Architect, MagicDraw)',
};

const mappingProperties = {
    base_iri: {
        type: 'string',
        description: "Namespace for minted IRIs, e.g. 'http://example.org/shop#'. Default: derived from the model name.",
    },
    ontology_iri: {
        type: 'string',
        description: 'Ontology header IRI. Default: base_iri without its trailing separator.',
    },
    property_naming: {
        type: 'string',
        enum: ['shared', 'qualified'],
        description: "'shared' (default): same-named attributes with the same type share one property. 'qualified': always prefix with the owning class.",
    },
    disjoint_siblings: {
        type: 'string',
        enum: ['abstract', 'all', 'none'],
        description: "Which subclasses are declared disjoint: children of abstract classes (default), of every class, or none.",
    },
    emit_cardinality: {
        type: 'boolean',
        description: 'Emit cardinality restrictions for multiplicities. Default: true.',
    },
    qualified_cardinality: {
        type: 'boolean',
        description: 'Qualify cardinality restrictions with owl:onClass / owl:onDataRange. Default: false.',
    },
    emit_labels: {
        type: 'boolean',
        description: 'Emit rdfs:label with the UML names. Default: true.',
    },
    include_interfaces: {
        type: 'boolean',
        description: 'Map interface realizations to rdfs:subClassOf. Default: true.',
    },
    strict: {
        type: 'boolean',
        description: 'Fail on dangling references, duplicate ids, invalid multiplicities and generalization cycles instead of warning. Default: false.',
    },
};

export const TOOLS: Tool[] = [
    {
        name: 'convert-uml',
        description: `Convert a UML class diagram (XMI) into an OWL 2 ontology.

**When to use:** You have an XMI export and want an ontology file.
**When NOT to use:** You only want to see what was recognised in the diagram (use inspect-uml).

**Example:**
  xmi: "<xmi:XMI ...><uml:Model name=\\"Shop\\">...</uml:Model></xmi:XMI>"
  format: "turtle"
  → Returns: { success: true, format: "turtle", output: "@prefix : <http://example.org/shop#> ..." }

**Common issues:**
- Warnings about unresolved types usually mean the exporter referenced a profile library by href; the attribute is skipped.
- Siblings are only disjoint when their parent is abstract; set disjoint_siblings to change that.`,
        inputSchema: {
            type: 'object',
            properties: {
                xmi: xmiSchema,
                format: {
                    type: 'string',
                    enum: ['turtle', 'ntriples', 'functional'],
                    description: "Output syntax: 'turtle' (default), 'ntriples', or 'functional' (OWL functional-style).",
                },
                ...mappingProperties,
                verbosity: verbositySchema,
            },
            required: ['xmi'],
        },
    },
    {
        name: 'inspect-uml',
        description: `List the classes, enumerations, associations and packages recognised in an XMI document.

**When to use:** Before converting, to check the exporter's output was understood.`,
        inputSchema: {
            type: 'object',
            properties: {
                xmi: xmiSchema,
                strict: mappingProperties.strict,
            },
            required: ['xmi'],
        },
    },
    {
        name: 'map-uml',
        description: `Map a UML class diagram to OWL axioms as structured JSON, without serializing.

**When to use:** You want to see which axiom came from which UML element (verbosity: detailed adds the trace).`,
        inputSchema: {
            type: 'object',
            properties: {
                xmi: xmiSchema,
                ...mappingProperties,
                verbosity: verbositySchema,
            },
            required: ['xmi'],
        },
    },
    {
        name: 'validate-ontology',
        description: `Parse a Turtle document and count the OWL classes and properties it declares.

**Example:**
  turtle: "@prefix owl: <http://www.w3.org/2002/07/owl#> . <http://ex.org/A> a owl:Class ."
  → Returns: { valid: true, tripleCount: 1, classes: 1, ... }`,
        inputSchema: {
            type: 'object',
            properties: {
                turtle: {
                    type: 'string',
                    description: 'Ontology in Turtle syntax',
                },
            },
            required: ['turtle'],
        },
    },
    {
        name: 'generate-ontology',
        description: `Ask the configured language model (Ollama by default) to write an OWL ontology for an XMI document.

**When to use:** Comparing model output with the rule-based convert-uml, or benchmarking models.
**Configuration:** OLLAMA_URL / OLLAMA_MODEL, or OPENAI_BASE_URL / OPENAI_API_KEY / OPENAI_MODEL.`,
        inputSchema: {
            type: 'object',
            properties: {
                xmi: xmiSchema,
                benchmark: {
                    type: 'boolean',
                    description: 'Collect timing, size and token metrics. Default: true.',
                },
                save: {
                    type: 'boolean',
                    description: 'Append the metrics to the benchmark file. Default: false.',
                },
            },
            required: ['xmi'],
        },
    },
    {
        name: 'list-benchmarks',
        description: 'List recorded generation benchmarks, or a per-model summary.',
        inputSchema: {
            type: 'object',
            properties: {
                model: {
                    type: 'string',
                    description: 'Only runs of this model',
                },
                summary: {
                    type: 'boolean',
                    description: 'Return per-model aggregates instead of individual runs. Default: false.',
                },
            },
        },
    },
];
