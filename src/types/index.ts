/**
 * Shared type definitions for uml2owl
 */

// Re-export error types
export {
    PipelineException,
    getSuggestion,
    createEmptyInputError,
    createXmiParseError,
    createUnresolvedReferenceError,
    createDuplicateIdError,
    createInvalidMultiplicityError,
    createMappingError,
    createSerializationError,
    createLLMError,
    createStorageError,
    createInvalidArgumentError,
    serializePipelineError,
} from './errors.js';

export type {
    PipelineErrorCode,
    ErrorLocation,
    PipelineError,
} from './errors.js';

// Re-export UML model types
export type {
    Unbounded,
    Multiplicity,
    TypeRef,
    AggregationKind,
    ClassifierKind,
    UmlAttribute,
    UmlClass,
    UmlEnumerationLiteral,
    UmlEnumeration,
    UmlAssociationEnd,
    UmlAssociation,
    UmlGeneralization,
    UmlGeneralizationSet,
    UmlRealization,
    UmlModel,
    LoadOptions,
} from './uml.js';

// Re-export OWL types
export { NS } from './owl.js';

export type {
    IRI,
    EntityKind,
    CardinalityKind,
    ClassExpression,
    AnnotationProperty,
    Axiom,
    AxiomType,
    Ontology,
} from './owl.js';

// Re-export response types
export type {
    Verbosity,
    SkippedElement,
    MappingReport,
    StageTimings,
    MinimalConvertResponse,
    StandardConvertResponse,
    DetailedConvertResponse,
    ConvertResponse,
    MapResponse,
    ModelSummary,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    DisjointPolicy,
    PropertyNaming,
    OutputFormat,
    MappingOptions,
    ConvertOptions,
} from './options.js';

// Re-export LLM types
export type {
    LLMMessage,
    LLMResponse,
    LLMProvider,
    BenchmarkMetrics,
    GenerateOptions,
    GenerateResult,
} from './llm.js';
