import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { CitationEdge, Paper, WorkText } from '../types/index.js';
import { edgeKey } from '../types/index.js';
import { openAlexWorkSchema, type OpenAlexWork } from '../sources/openalex.js';
import { canonicalDoi, invertedIndexToText, shortLabel } from '../sources/utils.js';
import { MissingPrerequisiteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface WorkRecordCounts {
    /** Files read */
    documents: number;
    /** Files that were malformed or had no id */
    skipped: number;
    /** Documents whose work id was already taken by an earlier file */
    duplicates: number;
}

export interface WorkRecords {
    papers: Paper[];
    edges: CitationEdge[];
    counts: WorkRecordCounts;
}

interface LoadedWork {
    file: string;
    work: OpenAlexWork & { id: string };
}

function listWorkFiles(worksDir: string): string[] {
    if (!existsSync(worksDir)) {
        throw new MissingPrerequisiteError(worksDir, 'build-tables');
    }
    return readdirSync(worksDir)
        .filter((name) => name.endsWith('.json'))
        .sort();
}

/**
 * Read every work document in filename order. Documents that are not JSON
 * objects, or that carry no id, are skipped with a warning.
 */
function loadWorks(worksDir: string): { works: LoadedWork[]; documents: number; skipped: number } {
    const logger = getLogger();
    const files = listWorkFiles(worksDir);
    const works: LoadedWork[] = [];
    let skipped = 0;

    for (const file of files) {
        const filePath = join(worksDir, file);
        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(filePath, 'utf-8'));
        } catch (error) {
            logger.warn({ file: filePath, error: String(error) }, 'Skipping unreadable work document');
            skipped++;
            continue;
        }

        if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
            logger.warn({ file: filePath }, 'Skipping work document that is not an object');
            skipped++;
            continue;
        }

        const work = openAlexWorkSchema.parse(raw);
        const id = work.id;
        if (!id) {
            logger.warn({ file: filePath }, 'Skipping work document without id');
            skipped++;
            continue;
        }

        works.push({ file, work: { ...work, id } });
    }

    return { works, documents: files.length, skipped };
}

/**
 * Integer year from `publication_year`, falling back to the leading
 * four digits of `publication_date`.
 */
export function workYear(work: OpenAlexWork): number | null {
    if (typeof work.publication_year === 'number') return work.publication_year;

    const date = work.publication_date;
    if (date && /^\d{4}/.test(date)) {
        return Number.parseInt(date.slice(0, 4), 10);
    }
    return null;
}

export function workToPaper(work: OpenAlexWork & { id: string }): Paper {
    return {
        work_id: work.id,
        doi: canonicalDoi(work.doi || work.ids?.doi || null),
        title: work.title || work.display_name || '',
        year: workYear(work),
        in_collection: true,
    };
}

/**
 * Build the paper and raw-edge tables from a directory of OpenAlex work
 * documents.
 *
 * Files are processed in sorted filename order; when two documents share a
 * work id the first one wins. Edges are deduplicated by ordered pair, self
 * citations included.
 */
export function buildWorkRecords(worksDir: string): WorkRecords {
    const logger = getLogger();
    const { works, documents, skipped } = loadWorks(worksDir);

    const papers = new Map<string, Paper>();
    const edges = new Map<string, CitationEdge>();
    let duplicates = 0;

    for (const { file, work } of works) {
        if (papers.has(work.id)) {
            logger.warn({ file, workId: work.id }, 'Duplicate work id, keeping the first document');
            duplicates++;
        } else {
            papers.set(work.id, workToPaper(work));
        }

        for (const cited of work.referenced_works ?? []) {
            if (!cited) continue;
            const key = edgeKey(work.id, cited);
            if (!edges.has(key)) {
                edges.set(key, { citing_id: work.id, cited_id: cited });
            }
        }
    }

    const counts: WorkRecordCounts = { documents, skipped, duplicates };
    logger.info(
        { ...counts, papers: papers.size, edges: edges.size },
        'Work records built'
    );

    return { papers: [...papers.values()], edges: [...edges.values()], counts };
}

/**
 * Abstract and author-year label of every work, keyed by work id.
 * Follows the same first-seen rule as `buildWorkRecords`.
 */
export function loadWorkTexts(worksDir: string): Map<string, WorkText> {
    const { works } = loadWorks(worksDir);
    const texts = new Map<string, WorkText>();

    for (const { work } of works) {
        if (texts.has(work.id)) continue;

        const authors = (work.authorships ?? [])
            .map((authorship) => authorship.author?.display_name ?? '')
            .filter((name) => name.trim().length > 0);

        texts.set(work.id, {
            abstract: invertedIndexToText(work.abstract_inverted_index) ?? work.abstract ?? '',
            label: shortLabel(authors, workYear(work)),
        });
    }

    return texts;
}
