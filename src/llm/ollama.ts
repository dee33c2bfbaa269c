import { z } from 'zod';
import type {
    ChatMessage,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    LlmProviderOptions,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { HttpClient } from '../utils/http-client.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

const ChatResponseSchema = z.object({
    model: z.string().optional(),
    message: z.object({ content: z.string() }),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

const GenerateResponseSchema = z.object({
    model: z.string().optional(),
    response: z.string(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Provider for a local Ollama server.
 * Plain prompts are sent with `raw: true` so the server does not wrap them
 * in the model's own template a second time.
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly supportsChatTemplate = true;

    private readonly baseUrl: string;

    constructor(
        private readonly http: HttpClient,
        private readonly options: LlmProviderOptions
    ) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    async chat(messages: ChatMessage[], params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.options.model;
        const response = await this.http.post(
            `${this.baseUrl}/api/chat`,
            { model, messages, stream: false, options: this.sampling(params) },
            { timeout: this.options.timeoutMs, source: this.name }
        );

        const data = ChatResponseSchema.parse(response.data);
        return this.toResult(data.message.content, data.model ?? model, data.prompt_eval_count, data.eval_count);
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.options.model;
        const response = await this.http.post(
            `${this.baseUrl}/api/generate`,
            { model, prompt, raw: true, stream: false, options: this.sampling(params) },
            { timeout: this.options.timeoutMs, source: this.name }
        );

        const data = GenerateResponseSchema.parse(response.data);
        return this.toResult(data.response, data.model ?? model, data.prompt_eval_count, data.eval_count);
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.http.get(`${this.baseUrl}/api/tags`, { source: this.name, maxRetries: 0, timeout: 5000 });
            return true;
        } catch (error) {
            getLogger().debug({ error, baseUrl: this.baseUrl }, 'Ollama server not reachable');
            return false;
        }
    }

    private sampling(params: LlmCompletionParams): { temperature?: number; num_predict?: number } {
        return {
            temperature: params.temperature ?? this.options.temperature,
            num_predict: params.maxTokens ?? this.options.maxTokens,
        };
    }

    private toResult(
        text: string,
        model: string,
        promptTokens = 0,
        completionTokens = 0
    ): LlmCompletionResult {
        return {
            text,
            model,
            provider: this.name,
            usage: {
                promptTokens,
                completionTokens,
                totalTokens: promptTokens + completionTokens,
            },
        };
    }
}
