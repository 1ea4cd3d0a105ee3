import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    classifyStage,
    runPipeline,
    runStage,
    scopeStage,
    type PipelineContext,
} from '../builder/pipeline.js';
import { OpenAlexSource } from '../sources/openalex.js';
import { PipelineDatabase } from '../storage/database.js';
import { ensureWorkspace, workspaceLayout } from '../storage/layout.js';
import type {
    EdgeRoleClassifier,
    EdgeRoleInput,
    EdgeRoleResult,
    MetadataSource,
    RoleGraphConfig,
    TallySource,
} from '../types/index.js';
import { DEFAULT_CONFIG, EdgeRole, ZERO_TALLIES } from '../types/index.js';
import { MissingPrerequisiteError, RoleGraphError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';

class MapMetadataSource implements MetadataSource {
    readonly name = 'works-fixture';
    readonly requested: string[] = [];

    constructor(private readonly works: Record<string, unknown>) {}

    async fetchWorkByDoi(doi: string): Promise<unknown | null> {
        this.requested.push(doi);
        return this.works[doi] ?? null;
    }
}

class MapTallySource implements TallySource {
    readonly name = 'tallies-fixture';

    constructor(private readonly tallies: Record<string, unknown>) {}

    async fetchTallies(doi: string): Promise<unknown | null> {
        return this.tallies[doi] ?? null;
    }
}

class TitleClassifier implements EdgeRoleClassifier {
    async classify(input: EdgeRoleInput): Promise<EdgeRoleResult> {
        return {
            role: input.cited.title === 'Beta' ? EdgeRole.METHOD : EdgeRole.SUPPORT,
            confidence: 0.6,
            reason: `${input.citing.title} cites ${input.cited.title}`,
        };
    }
}

const WORKS: Record<string, unknown> = {
    '10.1/a': {
        id: 'W1',
        doi: 'https://doi.org/10.1/A',
        title: 'Alpha',
        publication_year: 2020,
        referenced_works: ['W2', 'W9'],
        authorships: [{ author: { display_name: 'Jane Doe' } }],
        abstract_inverted_index: { alpha: [0], text: [1] },
    },
    '10.1/b': {
        id: 'W2',
        doi: '10.1/b',
        title: 'Beta',
        publication_year: 2021,
        referenced_works: ['W1'],
    },
};

const TALLIES: Record<string, unknown> = {
    '10.1/a': { doi: '10.1/a', supporting: 2, total: 5, citingPublications: 4 },
};

describe('pipeline', () => {
    let dir: string;
    let ctx: PipelineContext;
    let metadata: MapMetadataSource;

    function makeContext(overrides: Partial<RoleGraphConfig> = {}): PipelineContext {
        const config: RoleGraphConfig = {
            ...DEFAULT_CONFIG,
            input: join(dir, 'export.json'),
            outDir: join(dir, 'out'),
            collection: 'test',
            delays: { openalexMs: 0, sciteMs: 0, llmMs: 0 },
            ...overrides,
        };
        const layout = workspaceLayout(config.outDir, config.collection);
        ensureWorkspace(layout);
        return {
            config,
            layout,
            db: new PipelineDatabase(layout.database),
            metadata,
            tallies: new MapTallySource(TALLIES),
            classifier: new TitleClassifier(),
        };
    }

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'rolegraph-pipeline-'));
        writeFileSync(
            join(dir, 'export.json'),
            JSON.stringify([{ DOI: '10.1/A' }, { data: { DOI: 'https://doi.org/10.1/b' } }, { DOI: '10.1/missing' }])
        );
        metadata = new MapMetadataSource(WORKS);
        ctx = makeContext();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        ctx.db.close();
        rmSync(dir, { recursive: true, force: true });
    });

    it('should run every stage and record row counts', async () => {
        const results = await runPipeline(ctx, '1.0.0-test');

        expect(results.map((r) => [r.stage, r.rowsIn, r.rowsOut])).toEqual([
            ['extract', 3, 3],
            ['fetch-works', 3, 2],
            ['build-tables', 2, 2],
            ['scope', 3, 3],
            ['fetch-tallies', 2, 2],
            ['merge-tallies', 2, 2],
            ['assemble', 3, 2],
            ['classify', 2, 2],
            ['view', 2, 2],
        ]);

        expect(ctx.db.getEnrichedPapers()).toEqual([
            {
                work_id: 'W1',
                doi: '10.1/a',
                title: 'Alpha',
                year: 2020,
                in_collection: true,
                ...ZERO_TALLIES,
                supporting: 2,
                total: 5,
                citing_publications: 4,
            },
            { work_id: 'W2', doi: '10.1/b', title: 'Beta', year: 2021, in_collection: true, ...ZERO_TALLIES },
        ]);

        expect(ctx.db.getEdgeRoles()).toEqual([
            { citing_id: 'W1', cited_id: 'W2', role: EdgeRole.METHOD, confidence: 0.6, reason: 'Alpha cites Beta' },
            { citing_id: 'W2', cited_id: 'W1', role: EdgeRole.SUPPORT, confidence: 0.6, reason: 'Beta cites Alpha' },
        ]);

        expect(existsSync(ctx.layout.graphMl)).toBe(true);
        const html = readFileSync(ctx.layout.viewerHtml, 'utf-8');
        expect(html).toContain('"label":"Doe 2020"');

        const runs = ctx.db.getRuns();
        expect(runs).toHaveLength(1);
        expect(runs[0]?.rolegraph_version).toBe('1.0.0-test');
        expect(runs[0]?.collection).toBe('test');
    });

    it('should cache fetched documents and not request them again', async () => {
        await runStage(ctx, 'extract');
        await runStage(ctx, 'fetch-works');
        await runStage(ctx, 'fetch-works');

        // the unknown DOI is not cached, so it is asked twice
        expect(metadata.requested).toEqual([
            '10.1/a',
            '10.1/b',
            '10.1/missing',
            '10.1/missing',
        ]);
        expect(existsSync(join(ctx.layout.worksDir, '10.1_a.json'))).toBe(true);
    });

    it('should cache an empty tally answer as null', async () => {
        for (const stage of ['extract', 'fetch-works', 'build-tables', 'fetch-tallies'] as const) {
            await runStage(ctx, stage);
        }
        expect(readFileSync(join(ctx.layout.talliesDir, '10.1_b.json'), 'utf-8')).toBe('null');
        expect(ctx.db.getTallies()).toEqual([
            { doi: '10.1/a', ...ZERO_TALLIES, supporting: 2, total: 5, citing_publications: 4 },
            { doi: '10.1/b', ...ZERO_TALLIES },
        ]);
    });

    it('should skip a DOI whose response body is unreadable and fetch the rest', async () => {
        writeFileSync(
            join(dir, 'export.json'),
            JSON.stringify([{ DOI: '10.1/a' }, { DOI: '10.1/b' }, { DOI: '10.1/c' }])
        );
        const requested: string[] = [];
        vi.stubGlobal('fetch', vi.fn(async (url: string) => {
            requested.push(url);
            const body = url.endsWith('/10.1/b') ? '{ truncated' : JSON.stringify({ id: `W-${url.slice(-1)}` });
            return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
        }));
        const withClient: PipelineContext = { ...ctx, metadata: new OpenAlexSource(new HttpClient()) };

        await runStage(withClient, 'extract');
        const result = await runStage(withClient, 'fetch-works');

        expect(requested).toHaveLength(3);
        expect(result).toEqual({ stage: 'fetch-works', rowsIn: 3, rowsOut: 2 });
        expect(existsSync(join(ctx.layout.worksDir, '10.1_b.json'))).toBe(false);
        expect(JSON.parse(readFileSync(join(ctx.layout.worksDir, '10.1_c.json'), 'utf-8'))).toEqual({ id: 'W-c' });
    });

    it('should skip a corrupt cached tally and keep the others', async () => {
        for (const stage of ['extract', 'fetch-works', 'build-tables'] as const) {
            await runStage(ctx, stage);
        }
        mkdirSync(ctx.layout.talliesDir, { recursive: true });
        writeFileSync(join(ctx.layout.talliesDir, '10.1_a.json'), '{ half-writ');

        const result = await runStage(ctx, 'fetch-tallies');

        expect(result).toEqual({ stage: 'fetch-tallies', rowsIn: 2, rowsOut: 1 });
        expect(ctx.db.getTallies()).toEqual([{ doi: '10.1/b', ...ZERO_TALLIES }]);

        await runStage(ctx, 'merge-tallies');
        expect(ctx.db.getEnrichedPapers().map((p) => [p.work_id, p.total])).toEqual([
            ['W1', 0],
            ['W2', 0],
        ]);
    });

    it('should refuse to run a stage before its producer', () => {
        expect(() => scopeStage(ctx)).toThrow(MissingPrerequisiteError);
        expect(() => scopeStage(ctx)).toThrow(`${ctx.layout.database}#edges_raw`);
    });

    it('should fail the extract stage without an input file', async () => {
        ctx.db.close();
        ctx = makeContext({ input: undefined });
        await expect(runStage(ctx, 'extract')).rejects.toBeInstanceOf(RoleGraphError);
    });

    it('should fail when a collaborator is missing', async () => {
        await runStage(ctx, 'extract');
        const withoutSource: PipelineContext = { ...ctx, metadata: undefined };
        await expect(runStage(withoutSource, 'fetch-works')).rejects.toThrow(
            'Stage "fetch-works" needs a metadata source'
        );
    });

    it('should write an empty annotation table when classification is disabled', async () => {
        for (const stage of ['extract', 'fetch-works', 'build-tables', 'scope', 'fetch-tallies', 'merge-tallies', 'assemble'] as const) {
            await runStage(ctx, stage);
        }
        const disabled: PipelineContext = {
            ...ctx,
            config: { ...ctx.config, llm: { ...ctx.config.llm, enabled: false } },
        };

        const result = await classifyStage(disabled);
        expect(result).toEqual({ stage: 'classify', rowsIn: 2, rowsOut: 0 });
        expect(ctx.db.getEdgeRoles()).toEqual([]);

        const view = await runStage(ctx, 'view');
        expect(view.rowsOut).toBe(0);
    });
});
