import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LlmConfig, type RedactorConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const ProviderSchema = z.enum(['openai', 'ollama']);
const BaseUrlSchema = z.string().url();

/**
 * Shape accepted in redactor.config.json. Every key is optional;
 * missing keys fall through to the defaults.
 */
export const ConfigFileSchema = z
    .object({
        narrativePath: z.string().min(1),
        tablePath: z.string().min(1),
        logLevel: LogLevelSchema,
        jsonLogs: z.boolean(),
        llm: z
            .object({
                provider: ProviderSchema,
                model: z.string().min(1),
                baseUrl: BaseUrlSchema,
                temperature: z.number().min(0).max(2),
                maxTokens: z.number().int().positive(),
                timeoutMs: z.number().int().positive(),
                chatTemplate: z.boolean(),
            })
            .partial(),
        reconcile: z
            .object({
                warnCallThreshold: z.number().int().nonnegative(),
            })
            .partial(),
    })
    .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Overrides accepted from the command line. Nested sections may be partial.
 */
export type ConfigOverrides = Partial<Omit<RedactorConfig, 'llm' | 'reconcile'>> & {
    llm?: Partial<LlmConfig>;
    reconcile?: Partial<RedactorConfig['reconcile']>;
};

/**
 * Load configuration from redactor.config.json using cosmiconfig.
 * Returns null if no config file is found or it fails validation.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('redactor', {
        searchPlaces: ['redactor.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * The OpenAI key is read where needed and never stored in config.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const llm: Partial<LlmConfig> = {};

    const provider = ProviderSchema.safeParse(env['REDACTOR_LLM_PROVIDER']);
    if (provider.success) {
        llm.provider = provider.data;
    }
    if (env['REDACTOR_LLM_MODEL']) {
        llm.model = env['REDACTOR_LLM_MODEL'];
    }
    if (env['REDACTOR_LLM_BASE_URL']) {
        const baseUrl = BaseUrlSchema.safeParse(env['REDACTOR_LLM_BASE_URL']);
        if (baseUrl.success) {
            llm.baseUrl = baseUrl.data;
        } else {
            getLogger().warn({ value: env['REDACTOR_LLM_BASE_URL'] }, 'Ignoring invalid REDACTOR_LLM_BASE_URL');
        }
    }

    return Object.keys(llm).length > 0 ? { llm } : {};
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<RedactorConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...envConfig.llm,
            ...cliFlags.llm,
        },
        reconcile: {
            ...DEFAULT_CONFIG.reconcile,
            ...fileConfig?.reconcile,
            ...cliFlags.reconcile,
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
