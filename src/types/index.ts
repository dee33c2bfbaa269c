/**
 * Barrel export for all shared types.
 */
export { TABLE_HEADER, UNKNOWN_ROLE, LOCATION_ROLE } from './entity.js';
export type { EntityRow, TabularData } from './entity.js';
export { ok, fail } from './result.js';
export type { Result, FailureKind, PipelineFailure } from './result.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    RedactorConfig,
    LogLevel,
    LlmProviderName,
    LlmConfig,
    ReconcileConfig,
} from './config.js';
export type {
    LlmProvider,
    ChatRole,
    ChatMessage,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
