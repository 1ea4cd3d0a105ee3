import type { EnrichedPaper, Paper, TallyCounts, TallyRecord } from '../types/index.js';
import { TALLY_FIELDS, ZERO_TALLIES } from '../types/index.js';
import { sciteTallySchema } from '../sources/scite.js';
import { canonicalDoi } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

/**
 * One fetched tally document, or null when the service had no data.
 */
export interface TallyEntry {
    doi: string;
    document: unknown | null;
}

/**
 * Turn fetched tally documents into tally rows. A missing document, or a
 * counter that is not a non-negative integer, counts as 0.
 */
export function buildTallyTable(entries: readonly TallyEntry[]): TallyRecord[] {
    return entries.map(({ doi, document }) => {
        if (document === null || typeof document !== 'object' || Array.isArray(document)) {
            return { doi, ...ZERO_TALLIES };
        }
        const tally = sciteTallySchema.parse(document);
        return {
            doi,
            supporting: tally.supporting,
            contradicting: tally.contradicting,
            mentioning: tally.mentioning,
            unclassified: tally.unclassified,
            total: tally.total,
            citing_publications: tally.citingPublications,
        };
    });
}

function pickCounts(record: TallyCounts): TallyCounts {
    const counts: TallyCounts = { ...ZERO_TALLIES };
    for (const field of TALLY_FIELDS) {
        counts[field] = record[field];
    }
    return counts;
}

/**
 * Attach tallies to papers by canonical DOI.
 *
 * Tally DOIs are canonicalized on their own, so a tally keyed by
 * "https://doi.org/10.1/ABC" still reaches the paper with DOI "10.1/abc".
 * The first record per canonical DOI wins. Papers without a match, or
 * without a DOI, get zeros.
 */
export function mergeTallies(papers: readonly Paper[], tallies: readonly TallyRecord[]): EnrichedPaper[] {
    const logger = getLogger();
    const byDoi = new Map<string, TallyCounts>();
    let ignored = 0;
    let collisions = 0;

    for (const record of tallies) {
        const doi = canonicalDoi(record.doi);
        if (!doi) {
            logger.debug({ doi: record.doi }, 'Ignoring tally with unusable DOI');
            ignored++;
            continue;
        }
        if (byDoi.has(doi)) {
            logger.warn({ doi, raw: record.doi }, 'Duplicate tally for DOI, keeping the first record');
            collisions++;
            continue;
        }
        byDoi.set(doi, pickCounts(record));
    }

    let matched = 0;
    const enriched = papers.map((paper): EnrichedPaper => {
        const counts = paper.doi ? byDoi.get(paper.doi) : undefined;
        if (counts) matched++;
        return { ...paper, ...(counts ?? ZERO_TALLIES) };
    });

    logger.info(
        { papers: papers.length, tallies: tallies.length, matched, collisions, ignored },
        'Tallies merged'
    );
    return enriched;
}
