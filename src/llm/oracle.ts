import type { ChatMessage, LlmProvider } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Text-generation oracle. Given a user prompt and an optional system
 * instruction, resolves to the generated text, or `''` when generation
 * failed. Implementations never reject.
 */
export interface Oracle {
    generate(prompt: string, systemInstruction?: string): Promise<string>;
}

/**
 * Build the role-tagged messages for one call: system first (when given),
 * then user.
 */
export function buildMessages(prompt: string, systemInstruction?: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (systemInstruction) {
        messages.push({ role: 'system', content: systemInstruction });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
}

/**
 * Plain-text fallback template: one `role: content` line per message,
 * terminated by `assistant:` so the model continues as the assistant.
 */
export function formatPlainPrompt(messages: ChatMessage[]): string {
    return messages.map((m) => `${m.role}: ${m.content}\n`).join('') + 'assistant:';
}

/**
 * Oracle backed by an LLM provider. Stateless: every call carries only its
 * own system instruction and prompt.
 */
export class LlmOracle implements Oracle {
    private calls = 0;
    private failures = 0;

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: { chatTemplate?: boolean } = {}
    ) {}

    async generate(prompt: string, systemInstruction?: string): Promise<string> {
        const logger = getLogger();
        const messages = buildMessages(prompt, systemInstruction);
        const useChat = (this.options.chatTemplate ?? true) && this.provider.supportsChatTemplate;
        this.calls++;

        try {
            const result = useChat
                ? await this.provider.chat(messages)
                : await this.provider.complete(formatPlainPrompt(messages));

            logger.debug(
                { provider: result.provider, model: result.model, tokens: result.usage.totalTokens, chat: useChat },
                'Oracle call complete'
            );
            return result.text.trim();
        } catch (error) {
            this.failures++;
            logger.warn({ error, provider: this.provider.name }, 'Oracle call failed, treating as empty response');
            return '';
        }
    }

    /**
     * Call and failure counts since construction.
     */
    getStats(): { calls: number; failures: number } {
        return { calls: this.calls, failures: this.failures };
    }
}
