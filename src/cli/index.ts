#!/usr/bin/env node
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { getApiKey, resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { HttpClient } from '../utils/http-client.js';
import { MissingPrerequisiteError, RoleGraphError } from '../utils/errors.js';
import { runPipeline, runStage, type PipelineContext } from '../builder/pipeline.js';
import { DocumentCache } from '../cache/document-cache.js';
import { exportTable, type TableFormat } from '../exporters/export.js';
import { LlmEdgeRoleClassifier } from '../llm/edge-role-classifier.js';
import { OpenAiProvider } from '../llm/openai-provider.js';
import { OpenAlexSource } from '../sources/openalex.js';
import { SciteSource } from '../sources/scite.js';
import { DATA_TABLES, PipelineDatabase, isDataTable } from '../storage/database.js';
import { ensureWorkspace, workspaceLayout } from '../storage/layout.js';
import type { LogLevel, RoleGraphConfig, StageName } from '../types/index.js';
import { STAGES } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    collection?: string;
    outDir?: string;
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface PipelineOptions extends CommonOptions {
    input?: string;
    mailto?: string;
    model?: string;
    maxEdges?: number;
    llm?: boolean;
}

function parseCount(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parseLevelOption(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected one of: debug, info, warn, error, silent.');
    }
    return level;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('-c, --collection <name>', 'Collection name (workspace directory)')
        .option('-o, --out-dir <path>', 'Output root directory')
        .option('--config <dir>', 'Directory to search for rolegraph.config.json')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevelOption)
        .option('--json-logs', 'Output JSON logs');
}

function withPipelineOptions(command: Command): Command {
    return withCommonOptions(command)
        .option('-i, --input <path>', 'Reference-manager export (Zotero JSON or CSL-JSON)')
        .option('--mailto <email>', 'Contact email for the OpenAlex polite pool')
        .option('--model <model>', 'Model used for edge role classification')
        .option('--max-edges <n>', 'Classify at most this many edges', parseCount)
        .option('--no-llm', 'Skip edge role classification');
}

async function loadConfig(opts: PipelineOptions): Promise<RoleGraphConfig> {
    const overrides: ConfigOverrides = {
        input: opts.input,
        collection: opts.collection,
        outDir: opts.outDir,
        mailto: opts.mailto,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        llm: {
            model: opts.model,
            maxEdges: opts.maxEdges,
            // commander sets `llm` to true unless --no-llm is given
            enabled: opts.llm === false ? false : undefined,
        },
    };

    const config = await resolveConfig(overrides, { searchFrom: opts.config });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Build the pipeline context with explicitly constructed collaborators.
 * The classifier is only available when OPENAI_API_KEY is set.
 */
function createContext(config: RoleGraphConfig, httpClient: HttpClient): PipelineContext {
    const layout = workspaceLayout(config.outDir, config.collection);
    ensureWorkspace(layout);

    const openAiKey = getApiKey('OPENAI_API_KEY');

    return {
        config,
        layout,
        db: new PipelineDatabase(layout.database),
        metadata: new OpenAlexSource(httpClient, {
            email: config.mailto,
            apiKey: getApiKey('OPENALEX_API_KEY'),
        }),
        tallies: new SciteSource(httpClient, { apiKey: getApiKey('SCITE_API_KEY') }),
        classifier: openAiKey
            ? new LlmEdgeRoleClassifier(
                  new OpenAiProvider(httpClient, { apiKey: openAiKey, model: config.llm.model }),
                  { model: config.llm.model, temperature: config.llm.temperature }
              )
            : undefined,
    };
}

async function withContext(
    opts: PipelineOptions,
    task: (ctx: PipelineContext) => Promise<void> | void
): Promise<void> {
    const config = await loadConfig(opts);
    const logger = getLogger();

    const httpClient = new HttpClient({ version: VERSION, email: config.mailto });
    let ctx: PipelineContext | undefined;
    try {
        ctx = createContext(config, httpClient);
        await task(ctx);
        logger.debug({ requests: httpClient.getAllRequestCounts() }, 'Requests made');
    } catch (error) {
        if (error instanceof MissingPrerequisiteError) {
            logger.error({ path: error.path, stage: error.stage }, error.message);
        } else if (error instanceof RoleGraphError) {
            logger.error({ details: error.details }, error.message);
        } else {
            logger.error({ error }, 'Command failed');
        }
        process.exitCode = 1;
    } finally {
        ctx?.db.close();
    }
}

const program = new Command();

program
    .name('rolegraph')
    .description('Build citation-role graphs from a reference-manager export.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

withPipelineOptions(program.command('run'))
    .description('Run every stage, from the reference export to the HTML viewer')
    .action(async (opts: PipelineOptions) => {
        await withContext(opts, async (ctx) => {
            const results = await runPipeline(ctx, VERSION);
            for (const result of results) {
                console.log(`  ${result.stage.padEnd(14)} ${result.rowsIn} → ${result.rowsOut}`);
            }
            console.log(`\nViewer: ${ctx.layout.viewerHtml}`);
        });
    });

// ─── Stage commands ───────────────────────────────────────

const STAGE_DESCRIPTIONS: Record<StageName, string> = {
    extract: 'Extract collection DOIs from the reference export',
    'fetch-works': 'Fetch OpenAlex work documents for the collection',
    'build-tables': 'Build paper and citation tables from the work documents',
    scope: 'Keep citations made by collection papers',
    'fetch-tallies': 'Fetch scite citation tallies for every paper DOI',
    'merge-tallies': 'Attach tallies to papers',
    assemble: 'Assemble the citation graph and write GraphML',
    classify: 'Classify the rhetorical role of every citation',
    view: 'Generate the HTML viewer',
};

for (const stage of STAGES) {
    withPipelineOptions(program.command(stage))
        .description(STAGE_DESCRIPTIONS[stage])
        .action(async (opts: PipelineOptions) => {
            await withContext(opts, async (ctx) => {
                const result = await runStage(ctx, stage);
                console.log(`${result.stage}: ${result.rowsIn} → ${result.rowsOut}`);
            });
        });
}

// ─── EXPORT command ───────────────────────────────────────

interface ExportOptions extends CommonOptions {
    format: string;
    file?: string;
}

withCommonOptions(program.command('export'))
    .description('Export a pipeline table to CSV or JSON')
    .argument('<table>', `Table: ${DATA_TABLES.join(' | ')}`)
    .option('-f, --format <format>', 'Export format: csv | json', 'csv')
    .option('--file <path>', 'Output file path')
    .action(async (table: string, opts: ExportOptions) => {
        const format = opts.format.toLowerCase();
        if (!isDataTable(table)) {
            console.error(`Invalid table: ${table}. Valid: ${DATA_TABLES.join(', ')}`);
            process.exitCode = 1;
            return;
        }
        if (format !== 'csv' && format !== 'json') {
            console.error(`Invalid format: ${format}. Valid: csv, json`);
            process.exitCode = 1;
            return;
        }
        const tableFormat: TableFormat = format;

        await withContext(opts, (ctx) => {
            const outputPath = opts.file ?? join(ctx.layout.root, `${table}.${tableFormat}`);
            const rows = exportTable(ctx.db, table, tableFormat, outputPath);
            console.log(`Exported ${rows} rows to ${outputPath}`);
        });
    });

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect'))
    .description('Show stage status and table row counts')
    .action(async (opts: CommonOptions) => {
        await withContext(opts, (ctx) => {
            const stats = ctx.db.getStats();
            const stages = new Map(ctx.db.getStages().map((stage) => [stage.name, stage]));

            console.log(`\nCollection "${ctx.config.collection}" (${ctx.layout.root})\n`);
            console.log('  Stages:');
            for (const stage of STAGES) {
                const record = stages.get(stage);
                console.log(
                    record
                        ? `    ${stage.padEnd(14)} ${record.rows_in} → ${record.rows_out}  (${record.completed_at})`
                        : `    ${stage.padEnd(14)} not run`
                );
            }

            console.log('\n  Tables:');
            for (const [table, count] of Object.entries(stats)) {
                console.log(`    ${table.padEnd(16)} ${count}`);
            }
            console.log('');
        });
    });

// ─── CACHE command ────────────────────────────────────────

withCommonOptions(program.command('cache'))
    .description('Manage the document cache of a collection')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string, opts: CommonOptions) => {
        if (action !== 'clear' && action !== 'stats') {
            console.error(`Unknown action: ${action}. Valid: clear, stats`);
            process.exitCode = 1;
            return;
        }

        await withContext(opts, (ctx) => {
            const dirs = { works: ctx.layout.worksDir, tallies: ctx.layout.talliesDir };
            for (const [kind, dir] of Object.entries(dirs)) {
                if (action === 'clear') {
                    rmSync(dir, { recursive: true, force: true });
                    console.log(`Cleared ${kind} cache.`);
                } else {
                    const stats = new DocumentCache(dir).getStats();
                    console.log(`${kind}: ${stats.entries} entries (${stats.directory})`);
                }
            }
        });
    });

await program.parseAsync();
