/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Supported LLM backends.
 */
export type LlmProviderName = 'openai' | 'ollama';

/**
 * LLM provider configuration.
 */
export interface LlmConfig {
    provider: LlmProviderName;
    model: string;
    baseUrl?: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    /** Send role-tagged chat messages; when false, a plain "role: content" prompt is sent */
    chatTemplate: boolean;
}

/**
 * Alias reconciliation configuration.
 */
export interface ReconcileConfig {
    /** Log a warning before reconciling when the planned pairwise call count exceeds this */
    warnCallThreshold: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface RedactorConfig {
    // Files
    narrativePath: string;
    tablePath: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // LLM
    llm: LlmConfig;

    // Reconciliation
    reconcile: ReconcileConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RedactorConfig = {
    narrativePath: './narrative.txt',
    tablePath: './entities.csv',
    logLevel: 'info',
    jsonLogs: false,
    llm: {
        provider: 'openai',
        model: 'gpt-4o-mini',
        temperature: 0,
        maxTokens: 512,
        timeoutMs: 60000,
        chatTemplate: true,
    },
    reconcile: {
        warnCallThreshold: 50,
    },
};
