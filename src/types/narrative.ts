import type { GenerationOutput } from './llm.js';

export interface StateTableau {
    /** "<symbol> → <first yielded domain state>" */
    observable: string[];
    callable: string[];
}

export interface InterpretationResult {
    /** Raw tokens in input order, duplicates kept */
    tokens: string[];
    /** Activated vocabulary symbols, sorted */
    bagOfApi: string[];
    /** Distinct tokens with no neutral tag, sorted */
    unrepresentable: string[];
    stateTableau: StateTableau;
}

export interface LintResult {
    ok: boolean;
    issues: string[];
}

export interface NarrativeResult extends GenerationOutput {
    ok: boolean;
    issues?: string[];
    activatedTokens: string[];
    allowedTokens: string[];
    providedIds: string[];
    fallback?: boolean;
}

export type PipelineStep = 'interpret' | 'fallback' | 'expand' | 'select' | 'generate' | 'lint';

export interface NarrativeOptions {
    maxQuotes?: number;
    /**
     * Callback for stage updates.
     * @param step The stage about to run (or 'fallback' when short-circuiting).
     * @param message A descriptive message about the current step.
     */
    onProgress?: (step: PipelineStep, message: string) => void;
}
