/**
 * Symbolic Narrator - Library Entry Point
 *
 * Exports the pipeline stages for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Static data
export { VocabularyStore } from './vocabulary/store.js';
export { Lexicon } from './vocabulary/lexicon.js';
export {
    DATA_FILES,
    DEFAULT_DATA_DIR,
    loadDataTables,
    createNarrativeContext,
    loadNarrativeContext,
} from './vocabulary/loader.js';
export type { DataTables, NarrativeContext } from './vocabulary/loader.js';
export { checkDataConsistency } from './vocabulary/consistency.js';
export type { ConsistencyReport } from './vocabulary/consistency.js';

// Pipeline
export { tokenize, interpretEvent, buildStateTableau } from './interpreter.js';
export { expandWithRequires, prerequisitesOnly, findRequiresCycle } from './resolver.js';
export { selectPassages } from './evidence.js';
export { repairOutput, lintOutput, extractCapitalizedTokens } from './validator.js';
export { generateNarrative, shouldFallback, fallbackResult } from './orchestrator.js';

// Generation service boundary
export { StandardLLMProvider } from './llm/provider.js';
export { AiSdkProvider } from './llm/aiSdkProvider.js';
export { NarrativeGenerator, buildMessages, SYSTEM_PROMPT } from './llm/generator.js';
export { parseGenerationOutput, extractFirstJsonObject } from './llm/outputParser.js';

// Configuration
export { loadConfig } from './config.js';
export type { NarratorConfig, LLMConfig, ProviderKind } from './config.js';
export { createContainer, createProvider } from './container.js';
export type { NarratorContainer } from './container.js';

// Types and Interfaces
export * from './types/index.js';
