/**
 * Paper: one bibliographic work, keyed by its OpenAlex work id.
 * Field names match the SQLite columns of the `papers` table.
 */
export interface Paper {
    /** OpenAlex work id as delivered by the source (e.g. "https://openalex.org/W123") */
    work_id: string;

    /** Canonical DOI (lowercase, no URL prefix), or null when absent/invalid */
    doi: string | null;

    /** Paper title (empty string when the source has none) */
    title: string;

    /** Publication year */
    year: number | null;

    /** Whether the work belongs to the user's collection */
    in_collection: boolean;
}

/**
 * The six scite tally counters attached to every enriched paper.
 */
export interface TallyCounts {
    supporting: number;
    contradicting: number;
    mentioning: number;
    unclassified: number;
    total: number;
    citing_publications: number;
}

export const TALLY_FIELDS = [
    'supporting',
    'contradicting',
    'mentioning',
    'unclassified',
    'total',
    'citing_publications',
] as const satisfies ReadonlyArray<keyof TallyCounts>;

export type TallyField = (typeof TALLY_FIELDS)[number];

export const ZERO_TALLIES: Readonly<TallyCounts> = Object.freeze({
    supporting: 0,
    contradicting: 0,
    mentioning: 0,
    unclassified: 0,
    total: 0,
    citing_publications: 0,
});

/**
 * A tally row keyed by DOI (not by work id).
 */
export interface TallyRecord extends TallyCounts {
    doi: string;
}

/**
 * Paper after the tally merge. Every counter is always present.
 */
export interface EnrichedPaper extends Paper, TallyCounts {}

/**
 * Text used when classifying an edge or labelling a node.
 */
export interface WorkText {
    abstract: string;
    /** Author-year short label, e.g. "Doe & Roe 2020" */
    label: string;
}
