import { loadConfig, NarratorConfig } from './config.js';
import { loadNarrativeContext, NarrativeContext } from './vocabulary/loader.js';
import { StandardLLMProvider } from './llm/provider.js';
import { AiSdkProvider } from './llm/aiSdkProvider.js';
import { NarrativeGenerator, NarrativeGeneratorOptions } from './llm/generator.js';
import type { LLMProvider } from './types/llm.js';

export interface NarratorContainer {
    config: NarratorConfig;
    context: NarrativeContext;
    llmProvider: LLMProvider;
    generator: NarrativeGenerator;
}

export function createProvider(config: NarratorConfig): LLMProvider {
    return config.provider === 'ai-sdk'
        ? new AiSdkProvider(config.llm)
        : new StandardLLMProvider(config.llm);
}

/**
 * Build everything once at process start. Loading the data tables is the
 * fatal step: a missing or malformed file throws before any request is served.
 */
export function createContainer(
    config: NarratorConfig = loadConfig(),
    generatorOptions: NarrativeGeneratorOptions = {}
): NarratorContainer {
    const context = loadNarrativeContext(config.dataDir);
    const llmProvider = createProvider(config);
    const generator = new NarrativeGenerator(llmProvider, generatorOptions);

    return {
        config,
        context,
        llmProvider,
        generator,
    };
}
