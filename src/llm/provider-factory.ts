import type { LlmConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';
import { LlmOracle } from './oracle.js';

/**
 * Resolve the LLM provider based on config.
 */
export function createProvider(config: LlmConfig, http: HttpClient): LlmProvider {
    const options = {
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        timeoutMs: config.timeoutMs,
    };

    switch (config.provider) {
        case 'ollama':
            return new OllamaProvider(http, options);
        case 'openai':
        default:
            return new OpenAiProvider(http, { ...options, apiKey: getApiKey('OPENAI_API_KEY') });
    }
}

// OpenAI's /completions endpoint only serves the legacy completion models.
const COMPLETION_MODEL = /instruct|davinci|babbage/i;

/**
 * Explain why a plain-prompt setup is unlikely to get answers, or return
 * undefined when it looks usable.
 */
export function plainPromptWarning(config: LlmConfig): string | undefined {
    if (config.chatTemplate || config.provider !== 'openai' || COMPLETION_MODEL.test(config.model)) {
        return undefined;
    }
    return `Plain prompts go to /completions, which does not serve chat model "${config.model}"; use an instruct model or keep chat templating on`;
}

/**
 * Build the oracle every pipeline stage receives. Constructed once per
 * process and passed by reference.
 */
export function createOracle(config: LlmConfig, http: HttpClient): LlmOracle {
    const warning = plainPromptWarning(config);
    if (warning) {
        getLogger().warn({ model: config.model }, warning);
    }
    return new LlmOracle(createProvider(config, http), { chatTemplate: config.chatTemplate });
}
