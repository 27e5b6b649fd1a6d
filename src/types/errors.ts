/**
 * Structured Error System
 *
 * Machine-readable errors with codes, suggestions and details.
 * Policy violations are not errors: they travel as the issue list of a narrative result.
 */

/**
 * Error codes for narrator operations
 */
export type NarrativeErrorCode =
  | 'DATA_MISSING'          // Static data file absent
  | 'DATA_INVALID'          // Static data file unreadable or wrong shape
  | 'CYCLE_DETECTED'        // 'requires' relation is not acyclic
  | 'GENERATION_FAILED'     // Transport or HTTP failure calling the generator
  | 'TIMEOUT'               // Generator call exceeded its time limit
  | 'INVALID_ARGUMENT'      // Tool/CLI argument failed validation
  | 'UNKNOWN_TOOL';         // MCP tool or resource name not registered

export interface NarrativeError {
  code: NarrativeErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping NarrativeError for throw/catch patterns
 */
export class NarrativeException extends Error {
  public readonly error: NarrativeError;

  constructor(error: NarrativeError) {
    super(error.message);
    this.name = 'NarrativeException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NarrativeException);
    }
  }

  get code(): NarrativeErrorCode {
    return this.error.code;
  }

  toJSON(): NarrativeError {
    return this.error;
  }
}

export function createDataMissingError(path: string): NarrativeException {
  return new NarrativeException({
    code: 'DATA_MISSING',
    message: `Missing data file: ${path}`,
    suggestion: 'Set NARRATIVE_DATA_DIR to the directory holding the vocabulary tables',
    details: { path },
  });
}

export function createDataInvalidError(path: string, reason: string): NarrativeException {
  return new NarrativeException({
    code: 'DATA_INVALID',
    message: `Invalid data file ${path}: ${reason}`,
    details: { path, reason },
  });
}

/**
 * Raised when the 'requires' walk re-enters a symbol still being expanded.
 * `cycle` starts and ends with the same symbol.
 */
export function createCycleError(cycle: string[]): NarrativeException {
  return new NarrativeException({
    code: 'CYCLE_DETECTED',
    message: `Cyclic 'requires' relation: ${cycle.join(' -> ')}`,
    suggestion: 'Remove one of the requires edges so the relation graph is acyclic',
    details: { cycle },
  });
}

export function createGenerationError(
  message: string,
  details?: Record<string, unknown>
): NarrativeException {
  return new NarrativeException({
    code: 'GENERATION_FAILED',
    message: `Generation service failed: ${message}`,
    suggestion: 'Check that the model server is reachable (OPENAI_BASE_URL / OLLAMA_URL)',
    details,
  });
}

export function createTimeoutError(
  limitMs: number,
  operation: string = 'Operation'
): NarrativeException {
  return new NarrativeException({
    code: 'TIMEOUT',
    message: `${operation} timed out after ${limitMs}ms`,
    suggestion: 'Increase LLM_TIMEOUT_MS or use a smaller model',
    details: { limitMs },
  });
}

/**
 * Generic error factory for codes without a dedicated constructor
 */
export function createGenericError(
  code: NarrativeErrorCode,
  message: string,
  details?: Record<string, unknown>
): NarrativeException {
  return new NarrativeException({
    code,
    message,
    details,
  });
}

/**
 * Serialize a NarrativeError for JSON output, omitting absent fields
 */
export function serializeNarrativeError(error: NarrativeError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}
