/**
 * Structured Error System for uml2owl
 *
 * Provides machine-readable errors with codes, locations, and suggestions.
 */

/**
 * Error codes for pipeline operations
 */
export type PipelineErrorCode =
  | 'EMPTY_INPUT'            // Nothing to convert
  | 'XMI_PARSE_ERROR'        // Input is not well-formed XML
  | 'UNRESOLVED_REFERENCE'   // xmi:idref / type points nowhere (strict mode)
  | 'DUPLICATE_ID'           // Two elements share an xmi:id (strict mode)
  | 'INVALID_MULTIPLICITY'   // lower > upper, negative bounds (strict mode)
  | 'MAPPING_ERROR'          // Rule table could not be applied
  | 'SERIALIZATION_ERROR'    // RDF writer failure or unknown format
  | 'LLM_ERROR'              // Chat provider failed or answered nonsense
  | 'STORAGE_ERROR'          // Benchmark file could not be read or written
  | 'INVALID_ARGUMENT';      // Tool/CLI argument validation

/**
 * Location of the offending element in the source document
 */
export interface ErrorLocation {
  elementId?: string;
  elementName?: string;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, location and suggestions
 */
export interface PipelineError {
  code: PipelineErrorCode;
  message: string;
  location?: ErrorLocation;
  suggestion?: string;
  context?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping PipelineError for throw/catch patterns
 */
export class PipelineException extends Error {
  public readonly error: PipelineError;

  constructor(error: PipelineError) {
    super(error.message);
    this.name = 'PipelineException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineException);
    }
  }

  get code(): PipelineErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): PipelineError {
    return this.error;
  }
}

/**
 * Common XML parser messages and the fix that usually applies
 */
const XML_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /unbound namespace prefix|namespace/i,
      suggestion: 'Declare the xmi:/uml: namespaces on the root element (xmlns:xmi="http://www.omg.org/spec/XMI/20131001")',
    },
    {
      pattern: /unclosed|end tag|mismatch/i,
      suggestion: 'The export looks truncated or hand-edited - check that every element is closed',
    },
    {
      pattern: /entity/i,
      suggestion: 'Escape "&" and "<" inside names and comments (&amp; / &lt;)',
    },
    {
      pattern: /root element|document is empty|no element/i,
      suggestion: 'Pass the XMI document itself, not a file path or diagram image',
    },
  ];

/**
 * Get a suggestion for an XML parser message
 */
export function getSuggestion(parserMessage: string): string | undefined {
  for (const { pattern, suggestion } of XML_SUGGESTIONS) {
    if (pattern.test(parserMessage)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Pull "line N" / "column N" out of a DOM parser message if it has them
 */
function locateParserMessage(message: string): ErrorLocation | undefined {
  const line = /line[:\s]+(\d+)/i.exec(message);
  const col = /col(?:umn)?[:\s]+(\d+)/i.exec(message);
  if (!line && !col) return undefined;
  return {
    ...(line && { line: Number(line[1]) }),
    ...(col && { col: Number(col[1]) }),
  };
}

export function createEmptyInputError(what: string = 'UML input'): PipelineException {
  return new PipelineException({
    code: 'EMPTY_INPUT',
    message: `${what} cannot be empty`,
    suggestion: 'Export the class diagram as XMI 2.x and pass the file contents',
  });
}

/**
 * Create an XMI parse error from the DOM parser's message
 */
export function createXmiParseError(parserMessage: string, input?: string): PipelineException {
  const firstLine = parserMessage.split('\n')[0].trim();
  return new PipelineException({
    code: 'XMI_PARSE_ERROR',
    message: `Invalid XMI: ${firstLine || 'XML parse error'}`,
    location: locateParserMessage(parserMessage),
    suggestion: getSuggestion(parserMessage),
    context: input !== undefined ? input.slice(0, 200) : undefined,
  });
}

export function createUnresolvedReferenceError(
  ref: string,
  from: { id?: string; name?: string; role: string }
): PipelineException {
  return new PipelineException({
    code: 'UNRESOLVED_REFERENCE',
    message: `${from.role} '${from.name ?? from.id ?? '?'}' refers to '${ref}', which is not in the model`,
    location: { elementId: from.id, elementName: from.name },
    suggestion: 'Include the referenced package in the export, or disable strict mode to skip the reference',
    details: { ref },
  });
}

export function createDuplicateIdError(id: string): PipelineException {
  return new PipelineException({
    code: 'DUPLICATE_ID',
    message: `Duplicate xmi:id '${id}'`,
    location: { elementId: id },
    suggestion: 'Re-export the model; merged XMI files often repeat ids',
  });
}

export function createInvalidMultiplicityError(
  text: string,
  owner?: { id?: string; name?: string }
): PipelineException {
  return new PipelineException({
    code: 'INVALID_MULTIPLICITY',
    message: `Invalid multiplicity '${text}'${owner?.name ? ` on '${owner.name}'` : ''}`,
    location: owner ? { elementId: owner.id, elementName: owner.name } : undefined,
    suggestion: "Bounds must satisfy 0 <= lower <= upper, with '*' or -1 for unbounded",
  });
}

export function createMappingError(
  message: string,
  details?: Record<string, unknown>
): PipelineException {
  return new PipelineException({
    code: 'MAPPING_ERROR',
    message: `Mapping failed: ${message}`,
    details,
  });
}

export function createSerializationError(
  message: string,
  details?: Record<string, unknown>
): PipelineException {
  return new PipelineException({
    code: 'SERIALIZATION_ERROR',
    message: `Serialization failed: ${message}`,
    details,
  });
}

export function createLLMError(
  message: string,
  details?: Record<string, unknown>
): PipelineException {
  return new PipelineException({
    code: 'LLM_ERROR',
    message: `LLM provider failed: ${message}`,
    suggestion: 'Check OLLAMA_URL / OPENAI_BASE_URL and that the model is pulled',
    details,
  });
}

export function createStorageError(message: string, path: string, operation: 'read' | 'save' = 'save'): PipelineException {
  return new PipelineException({
    code: 'STORAGE_ERROR',
    message: `Failed to ${operation} benchmark results: ${message}`,
    details: { path },
  });
}

export function createInvalidArgumentError(message: string, details?: Record<string, unknown>): PipelineException {
  return new PipelineException({
    code: 'INVALID_ARGUMENT',
    message,
    details,
  });
}

/**
 * Serialize a PipelineError for JSON output
 */
export function serializePipelineError(error: PipelineError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.location && { location: error.location }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
