import type {
    EdgeRoleClassifier,
    MetadataSource,
    RoleGraphConfig,
    StageName,
    TallySource,
} from '../types/index.js';
import { STAGES } from '../types/index.js';
import { DocumentCache, type CacheEntry } from '../cache/document-cache.js';
import { readReferenceExport } from '../collection/reference-export.js';
import { writeGraphMl } from '../exporters/export.js';
import { assembleGraph, type CitationGraph } from '../graph/assembler.js';
import { EdgeRoleOrchestrator } from '../roles/orchestrator.js';
import type { PipelineDatabase } from '../storage/database.js';
import type { WorkspaceLayout } from '../storage/layout.js';
import { MalformedDocumentError, RoleGraphError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { writeViewer } from '../viewer/html-viewer.js';
import { scopeEdges } from './edge-scope.js';
import { fetchDocuments } from './fetch-documents.js';
import { buildTallyTable, mergeTallies, type TallyEntry } from './tally-merge.js';
import { buildWorkRecords, loadWorkTexts } from './work-records.js';

/**
 * Everything one pipeline invocation works with. Collaborators are built
 * by the caller; a stage that needs an absent collaborator fails.
 */
export interface PipelineContext {
    config: RoleGraphConfig;
    layout: WorkspaceLayout;
    db: PipelineDatabase;
    metadata?: MetadataSource;
    tallies?: TallySource;
    classifier?: EdgeRoleClassifier;
}

export interface StageResult {
    stage: StageName;
    rowsIn: number;
    rowsOut: number;
}

function completeStage(ctx: PipelineContext, stage: StageName, rowsIn: number, rowsOut: number): StageResult {
    ctx.db.markStageComplete(stage, rowsIn, rowsOut);
    getLogger().info({ stage, rowsIn, rowsOut }, 'Stage complete');
    return { stage, rowsIn, rowsOut };
}

function requireCollaborator<T>(value: T | undefined, what: string, stage: StageName): T {
    if (value === undefined) {
        throw new RoleGraphError(`Stage "${stage}" needs a ${what}`, { stage });
    }
    return value;
}

// ─── Stages ──────────────────────────────────────────────

export function extractStage(ctx: PipelineContext): StageResult {
    const input = ctx.config.input;
    if (!input) {
        throw new RoleGraphError('No reference export given (use --input or "input" in the config file)', {
            stage: 'extract',
        });
    }

    const dois = readReferenceExport(input);
    ctx.db.replaceCollectionDois(dois);
    return completeStage(ctx, 'extract', dois.length, dois.length);
}

export async function fetchWorksStage(ctx: PipelineContext): Promise<StageResult> {
    ctx.db.requireStage('extract', 'collection_dois', 'fetch-works');
    const source = requireCollaborator(ctx.metadata, 'metadata source', 'fetch-works');

    const dois = ctx.db.getCollectionDois();
    const cache = new DocumentCache(ctx.layout.worksDir);
    const summary = await fetchDocuments(dois, cache, (doi) => source.fetchWorkByDoi(doi), {
        kind: 'work',
        delayMs: ctx.config.delays.openalexMs,
        cacheMisses: false,
    });

    return completeStage(ctx, 'fetch-works', dois.length, summary.cached + summary.fetched);
}

export function buildTablesStage(ctx: PipelineContext): StageResult {
    const { papers, edges, counts } = buildWorkRecords(ctx.layout.worksDir);

    ctx.db.transaction(() => {
        ctx.db.replacePapers(papers);
        ctx.db.replaceRawEdges(edges);
    });
    return completeStage(ctx, 'build-tables', counts.documents, papers.length);
}

export function scopeStage(ctx: PipelineContext): StageResult {
    ctx.db.requireStage('build-tables', 'edges_raw', 'scope');

    const { edges, counts } = scopeEdges(ctx.db.getPapers(), ctx.db.getRawEdges());
    ctx.db.replaceScopedEdges(edges);
    return completeStage(ctx, 'scope', counts.rawEdges, counts.scopedEdges);
}

export async function fetchTalliesStage(ctx: PipelineContext): Promise<StageResult> {
    ctx.db.requireStage('build-tables', 'papers', 'fetch-tallies');
    const source = requireCollaborator(ctx.tallies, 'tally source', 'fetch-tallies');

    const dois = [...new Set(ctx.db.getPapers().flatMap((paper) => (paper.doi ? [paper.doi] : [])))];
    const cache = new DocumentCache(ctx.layout.talliesDir);
    await fetchDocuments(dois, cache, (doi) => source.fetchTallies(doi), {
        kind: 'tally',
        delayMs: ctx.config.delays.sciteMs,
        cacheMisses: true,
    });

    const entries: TallyEntry[] = [];
    for (const doi of dois) {
        let entry: CacheEntry;
        try {
            entry = cache.read(doi);
        } catch (error) {
            if (!(error instanceof MalformedDocumentError)) throw error;
            // Unmatched papers are zero-filled at merge time
            getLogger().warn({ doi, file: error.source, error: error.message }, 'Unreadable cached tally, skipping DOI');
            continue;
        }
        if (entry.status === 'hit') {
            entries.push({ doi, document: entry.data });
        }
    }

    const tallies = buildTallyTable(entries);
    ctx.db.replaceTallies(tallies);
    return completeStage(ctx, 'fetch-tallies', dois.length, tallies.length);
}

export function mergeTalliesStage(ctx: PipelineContext): StageResult {
    ctx.db.requireStage('build-tables', 'papers', 'merge-tallies');
    ctx.db.requireStage('fetch-tallies', 'tallies', 'merge-tallies');

    const papers = ctx.db.getPapers();
    const enriched = mergeTallies(papers, ctx.db.getTallies());
    ctx.db.replaceEnrichedPapers(enriched);
    return completeStage(ctx, 'merge-tallies', papers.length, enriched.length);
}

/**
 * Rebuild the citation graph from the enriched paper and scoped edge tables.
 */
export function loadCitationGraph(ctx: PipelineContext, stage: StageName): CitationGraph {
    ctx.db.requireStage('merge-tallies', 'papers_enriched', stage);
    ctx.db.requireStage('scope', 'edges_scoped', stage);
    return assembleGraph(ctx.db.getEnrichedPapers(), ctx.db.getScopedEdges()).graph;
}

export function assembleStage(ctx: PipelineContext): StageResult {
    const graph = loadCitationGraph(ctx, 'assemble');
    writeGraphMl(graph, ctx.layout.graphMl);
    return completeStage(ctx, 'assemble', ctx.db.countRows('edges_scoped'), graph.size);
}

export async function classifyStage(ctx: PipelineContext): Promise<StageResult> {
    const graph = loadCitationGraph(ctx, 'classify');

    if (!ctx.config.llm.enabled) {
        getLogger().warn('Edge role classification disabled, no edge will be drawn');
        ctx.db.replaceEdgeRoles([]);
        return completeStage(ctx, 'classify', graph.size, 0);
    }

    const classifier = requireCollaborator(ctx.classifier, 'edge role classifier', 'classify');
    const orchestrator = new EdgeRoleOrchestrator(classifier, {
        delayMs: ctx.config.delays.llmMs,
        maxEdges: ctx.config.llm.maxEdges,
    });
    const { annotations } = await orchestrator.annotate(graph, loadWorkTexts(ctx.layout.worksDir));

    ctx.db.replaceEdgeRoles(annotations);
    return completeStage(ctx, 'classify', graph.size, annotations.length);
}

export function viewStage(ctx: PipelineContext): StageResult {
    const graph = loadCitationGraph(ctx, 'view');
    ctx.db.requireStage('classify', 'edge_roles', 'view');

    const elements = writeViewer(
        graph,
        ctx.db.getEdgeRoles(),
        loadWorkTexts(ctx.layout.worksDir),
        ctx.layout.viewerHtml,
        `Citation roles · ${ctx.config.collection}`
    );
    return completeStage(ctx, 'view', graph.size, elements.edges.length);
}

const STAGE_RUNNERS: Record<StageName, (ctx: PipelineContext) => StageResult | Promise<StageResult>> = {
    extract: extractStage,
    'fetch-works': fetchWorksStage,
    'build-tables': buildTablesStage,
    scope: scopeStage,
    'fetch-tallies': fetchTalliesStage,
    'merge-tallies': mergeTalliesStage,
    assemble: assembleStage,
    classify: classifyStage,
    view: viewStage,
};

export async function runStage(ctx: PipelineContext, stage: StageName): Promise<StageResult> {
    getLogger().debug({ stage }, 'Stage starting');
    return STAGE_RUNNERS[stage](ctx);
}

/**
 * Run every stage in order and record the run.
 */
export async function runPipeline(ctx: PipelineContext, version: string): Promise<StageResult[]> {
    const logger = getLogger();
    const startTime = Date.now();
    logger.info({ collection: ctx.config.collection, workspace: ctx.layout.root }, 'Starting pipeline');

    const results: StageResult[] = [];
    for (const stage of STAGES) {
        results.push(await runStage(ctx, stage));
    }

    const elapsedMs = Date.now() - startTime;
    ctx.db.insertRun({
        created_at: new Date().toISOString(),
        rolegraph_version: version,
        collection: ctx.config.collection,
        config_json: JSON.stringify(ctx.config),
        stats_json: JSON.stringify({ elapsedMs, stages: results, tables: ctx.db.getStats() }),
    });

    logger.info({ elapsedMs, workspace: ctx.layout.root }, 'Pipeline complete');
    return results;
}
