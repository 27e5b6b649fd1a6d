/**
 * Shared type definitions
 */

export {
    NarrativeException,
    createDataMissingError,
    createDataInvalidError,
    createCycleError,
    createGenerationError,
    createTimeoutError,
    createGenericError,
    serializeNarrativeError,
} from './errors.js';

export type {
    NarrativeErrorCode,
    NarrativeError,
} from './errors.js';

export type {
    SymbolKind,
    SymbolTable,
    RelationEntry,
    RelationGraph,
    LexiconMap,
    PassageRole,
    Passage,
    Quote,
} from './vocabulary.js';

export type {
    LLMMessage,
    LLMResponse,
    LLMProvider,
    GenerationRequest,
    GenerationOutput,
    NarrativeGeneratorLike,
} from './llm.js';

export type {
    StateTableau,
    InterpretationResult,
    LintResult,
    NarrativeResult,
    PipelineStep,
    NarrativeOptions,
} from './narrative.js';

export { DEFAULTS, LINT_EXEMPTIONS, FALLBACK_NARRATIVE, VERSION } from './options.js';
