import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildWorkRecords, loadWorkTexts, workYear } from '../builder/work-records.js';
import { scopeEdges } from '../builder/edge-scope.js';
import { assembleGraph } from '../graph/assembler.js';
import { mergeTallies } from '../builder/tally-merge.js';
import { MissingPrerequisiteError } from '../utils/errors.js';

function writeWork(dir: string, file: string, content: unknown): void {
    fs.writeFileSync(path.join(dir, file), typeof content === 'string' ? content : JSON.stringify(content));
}

describe('buildWorkRecords', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rolegraph-works-'));
    });

    it('should build papers and raw edges from work documents', () => {
        writeWork(dir, '10.1_a.json', {
            id: 'https://openalex.org/W1',
            doi: 'https://doi.org/10.1/A',
            title: 'First paper',
            publication_year: 2019,
            referenced_works: ['https://openalex.org/W2', 'https://openalex.org/W3', ''],
        });
        writeWork(dir, '10.1_b.json', {
            id: 'https://openalex.org/W2',
            ids: { doi: 'https://doi.org/10.1/b' },
            display_name: 'Second paper',
            publication_date: '2021-03-04',
            referenced_works: ['https://openalex.org/W1', 'https://openalex.org/W1'],
        });

        const { papers, edges, counts } = buildWorkRecords(dir);

        expect(papers).toEqual([
            { work_id: 'https://openalex.org/W1', doi: '10.1/a', title: 'First paper', year: 2019, in_collection: true },
            { work_id: 'https://openalex.org/W2', doi: '10.1/b', title: 'Second paper', year: 2021, in_collection: true },
        ]);
        expect(edges).toEqual([
            { citing_id: 'https://openalex.org/W1', cited_id: 'https://openalex.org/W2' },
            { citing_id: 'https://openalex.org/W1', cited_id: 'https://openalex.org/W3' },
            { citing_id: 'https://openalex.org/W2', cited_id: 'https://openalex.org/W1' },
        ]);
        expect(counts).toEqual({ documents: 2, skipped: 0, duplicates: 0 });
    });

    it('should skip malformed documents and documents without id', () => {
        writeWork(dir, 'a.json', '{ broken');
        writeWork(dir, 'b.json', [1, 2, 3]);
        writeWork(dir, 'c.json', { title: 'no id' });
        writeWork(dir, 'd.json', { id: 'W4', title: 'kept' });
        writeWork(dir, 'notes.txt', 'ignored');

        const { papers, counts } = buildWorkRecords(dir);

        expect(papers.map((p) => p.work_id)).toEqual(['W4']);
        expect(counts).toEqual({ documents: 4, skipped: 3, duplicates: 0 });
    });

    it('should keep the first document by filename when work ids collide', () => {
        writeWork(dir, 'b.json', { id: 'W1', title: 'Later file' });
        writeWork(dir, 'a.json', { id: 'W1', title: 'Earlier file' });

        const { papers, counts } = buildWorkRecords(dir);

        expect(papers).toHaveLength(1);
        expect(papers[0]?.title).toBe('Earlier file');
        expect(counts.duplicates).toBe(1);
    });

    it('should keep self citations', () => {
        writeWork(dir, 'a.json', { id: 'W1', title: 'Self', referenced_works: ['W1'] });
        expect(buildWorkRecords(dir).edges).toEqual([{ citing_id: 'W1', cited_id: 'W1' }]);
    });

    it('should default missing fields', () => {
        writeWork(dir, 'a.json', { id: 'W1', doi: 'not a doi', title: null });
        expect(buildWorkRecords(dir).papers).toEqual([
            { work_id: 'W1', doi: null, title: '', year: null, in_collection: true },
        ]);
    });

    it('should fail when the works directory does not exist', () => {
        expect(() => buildWorkRecords(path.join(dir, 'missing'))).toThrow(MissingPrerequisiteError);
    });

    it('should drop a citation to an unfetched work only at graph assembly', () => {
        writeWork(dir, 'a.json', { id: 'W1', title: 'One', referenced_works: ['W2', 'W9'] });
        writeWork(dir, 'b.json', { id: 'W2', title: 'Two' });

        const { papers, edges } = buildWorkRecords(dir);
        expect(edges).toContainEqual({ citing_id: 'W1', cited_id: 'W9' });

        const scoped = scopeEdges(papers, edges);
        expect(scoped.edges).toContainEqual({ citing_id: 'W1', cited_id: 'W9' });

        const { graph, counts } = assembleGraph(mergeTallies(papers, []), scoped.edges);
        expect(graph.hasEdge('W1', 'W9')).toBe(false);
        expect(counts.addedEdges).toBe(counts.scopedEdges - 1);
        expect(counts.addedEdges).toBeLessThanOrEqual(scoped.counts.scopedEdges);
        expect(scoped.counts.scopedEdges).toBeLessThanOrEqual(scoped.counts.rawEdges);
    });
});

describe('workYear', () => {
    it('should fall back to the publication date', () => {
        expect(workYear({ publication_year: 2001 })).toBe(2001);
        expect(workYear({ publication_date: '1999-12-31' })).toBe(1999);
        expect(workYear({ publication_date: 'unknown' })).toBeNull();
        expect(workYear({})).toBeNull();
    });
});

describe('loadWorkTexts', () => {
    it('should reconstruct abstracts and build author-year labels', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rolegraph-texts-'));
        writeWork(dir, 'a.json', {
            id: 'W1',
            publication_year: 2020,
            abstract_inverted_index: { A: [2], quick: [0], fox: [3], brown: [1] },
            authorships: [{ author: { display_name: 'Jane Doe' } }, { author: { display_name: 'Rick Roe' } }],
        });
        writeWork(dir, 'b.json', { id: 'W2', abstract: 'Plain abstract.' });

        const texts = loadWorkTexts(dir);

        expect(texts.get('W1')).toEqual({ abstract: 'quick brown A fox', label: 'Doe & Roe 2020' });
        expect(texts.get('W2')).toEqual({ abstract: 'Plain abstract.', label: 'Unknown' });
    });
});
