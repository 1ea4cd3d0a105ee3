import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type DelayConfig,
    type LlmConfig,
    type RoleGraphConfig,
} from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

const configFileSchema = z
    .object({
        input: z.string(),
        collection: z.string().min(1),
        outDir: z.string(),
        mailto: z.string(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        delays: z
            .object({
                openalexMs: z.number().int().nonnegative(),
                sciteMs: z.number().int().nonnegative(),
                llmMs: z.number().int().nonnegative(),
            })
            .partial(),
        llm: z
            .object({
                enabled: z.boolean(),
                provider: z.literal('openai'),
                model: z.string(),
                temperature: z.number().min(0).max(2),
                maxEdges: z.number().int().positive(),
            })
            .partial(),
    })
    .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Overrides supplied by CLI flags. Nested objects may be partial.
 */
export type ConfigOverrides = Partial<Omit<RoleGraphConfig, 'delays' | 'llm'>> & {
    delays?: Partial<DelayConfig>;
    llm?: Partial<LlmConfig>;
};

/**
 * Load configuration from rolegraph.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults then apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('rolegraph', {
        searchPlaces: ['rolegraph.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
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
 * API keys are read where the clients are constructed, never stored in config.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Partial<RoleGraphConfig> {
    const config: Partial<RoleGraphConfig> = {};

    const mailto = env['OPENALEX_MAILTO'];
    if (mailto) config.mailto = mailto;

    const level = parseLogLevel(env['ROLEGRAPH_LOG_LEVEL']);
    if (level) config.logLevel = level;

    const collection = env['ROLEGRAPH_COLLECTION'];
    if (collection) config.collection = collection;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<RoleGraphConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);
    const flags = definedOnly(cliFlags);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...flags,
        // Deep merge nested objects
        delays: {
            ...DEFAULT_CONFIG.delays,
            ...fileConfig?.delays,
            ...definedOnly(flags.delays ?? {}),
        },
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...definedOnly(flags.llm ?? {}),
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}

// commander leaves unset options as undefined; they must not shadow lower layers
function definedOnly<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}
