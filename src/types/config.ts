/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Pipeline stages, in execution order.
 */
export const STAGES = [
    'extract',
    'fetch-works',
    'build-tables',
    'scope',
    'fetch-tallies',
    'merge-tallies',
    'assemble',
    'classify',
    'view',
] as const;

export type StageName = (typeof STAGES)[number];

/**
 * Delay applied between two calls of the same kind to an external service.
 */
export interface DelayConfig {
    openalexMs: number;
    sciteMs: number;
    llmMs: number;
}

/**
 * LLM classification configuration.
 */
export interface LlmConfig {
    enabled: boolean;
    provider: 'openai';
    model: string;
    temperature: number;
    /** Upper bound on edges classified per run (unbounded when absent) */
    maxEdges?: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface RoleGraphConfig {
    // Input
    input?: string;

    /** Collection name; each collection gets its own workspace directory */
    collection: string;

    // Output
    outDir: string;

    // External services
    mailto?: string;
    delays: DelayConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // LLM
    llm: LlmConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RoleGraphConfig = {
    collection: 'default',
    outDir: './output',
    delays: {
        openalexMs: 500,
        sciteMs: 300,
        llmMs: 0,
    },
    logLevel: 'info',
    jsonLogs: false,
    llm: {
        enabled: true,
        provider: 'openai',
        model: 'gpt-4.1-mini',
        temperature: 0.2,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    rolegraph_version: string;
    collection: string;
    config_json: string;
    stats_json: string;
}

/**
 * Completion record for one stage, stored in the `stages` table.
 */
export interface StageRecord {
    name: StageName;
    completed_at: string;
    rows_in: number;
    rows_out: number;
}
