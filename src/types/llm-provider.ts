/**
 * Interface for LLM provider adapters (OpenAI, Ollama).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Whether the provider accepts role-tagged chat messages */
    readonly supportsChatTemplate: boolean;

    /**
     * Send role-tagged messages and return the assistant continuation.
     */
    chat(messages: ChatMessage[], params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Send a plain, already-templated prompt and return its continuation.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider is available (e.g., Ollama server is running).
     */
    isAvailable(): Promise<boolean>;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    /** Default sampling temperature */
    temperature?: number;
    /** Default response token limit */
    maxTokens?: number;
    /** Per-request timeout */
    timeoutMs?: number;
}
