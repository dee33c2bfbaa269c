import { z } from 'zod';
import type {
    ChatMessage,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    LlmProviderOptions,
} from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const UsageSchema = z
    .object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
        total_tokens: z.number(),
    })
    .optional();

const ChatResponseSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
    usage: UsageSchema,
});

const CompletionResponseSchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({ text: z.string() })).min(1),
    usage: UsageSchema,
});

/**
 * Provider for the OpenAI API and OpenAI-compatible servers.
 * Chat requests go to /chat/completions, plain prompts to /completions.
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
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
            `${this.baseUrl}/chat/completions`,
            {
                model,
                messages,
                temperature: params.temperature ?? this.options.temperature,
                max_tokens: params.maxTokens ?? this.options.maxTokens,
            },
            { headers: this.headers(), timeout: this.options.timeoutMs, source: this.name }
        );

        const data = ChatResponseSchema.parse(response.data);
        return this.toResult(data.choices[0]?.message.content ?? '', data.model ?? model, data.usage);
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.options.model;
        const response = await this.http.post(
            `${this.baseUrl}/completions`,
            {
                model,
                prompt,
                temperature: params.temperature ?? this.options.temperature,
                max_tokens: params.maxTokens ?? this.options.maxTokens,
            },
            { headers: this.headers(), timeout: this.options.timeoutMs, source: this.name }
        );

        const data = CompletionResponseSchema.parse(response.data);
        return this.toResult(data.choices[0]?.text ?? '', data.model ?? model, data.usage);
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.options.apiKey);
    }

    private headers(): Record<string, string> {
        return this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {};
    }

    private toResult(
        text: string,
        model: string,
        usage: z.infer<typeof UsageSchema>
    ): LlmCompletionResult {
        return {
            text,
            model,
            provider: this.name,
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
                totalTokens: usage?.total_tokens ?? 0,
            },
        };
    }
}
