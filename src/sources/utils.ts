/**
 * Shared identifier and text utilities for sources.
 */

/**
 * URL/scheme prefixes stripped from DOIs, compared case-insensitively.
 */
const DOI_PREFIXES = [
    'https://doi.org/',
    'http://doi.org/',
    'https://dx.doi.org/',
    'http://dx.doi.org/',
    'doi:',
] as const;

/**
 * Canonicalize a DOI for cross-source joining.
 * "  https://doi.org/10.1234/ABC " → "10.1234/abc"
 *
 * Prefixes are stripped repeatedly, so stacked forms such as
 * "doi:https://doi.org/10.1/x" resolve too and canonicalDoi is idempotent.
 * A value without a "/" is not a DOI and yields null, never "".
 */
export function canonicalDoi(raw: string | null | undefined): string | null {
    if (typeof raw !== 'string') return null;

    let doi = raw.trim();
    let stripped = true;
    while (stripped) {
        stripped = false;
        const lower = doi.toLowerCase();
        for (const prefix of DOI_PREFIXES) {
            if (lower.startsWith(prefix)) {
                doi = doi.slice(prefix.length).trim();
                stripped = true;
                break;
            }
        }
    }

    return doi.includes('/') ? doi.toLowerCase() : null;
}

/**
 * Turn a canonical DOI into a filesystem-friendly cache filename (no extension).
 * "10.1234/abc:def" → "10.1234_abc_def"
 */
export function doiToFilename(doi: string): string {
    return doi.replace(/[/:]/g, '_');
}

/**
 * Returns "W123" for either "W123" or "https://openalex.org/W123".
 */
export function normalizeOpenAlexId(raw: string): string {
    return raw.replace(/^https?:\/\/openalex\.org\//, '');
}

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * Each word is placed once, at its earliest listed position; words are then
 * ordered by that position and joined with single spaces.
 *
 * @returns Reconstructed abstract text, or null when there is nothing to reconstruct
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex || typeof invertedIndex !== 'object') {
        return null;
    }

    const words: Array<[number, string]> = [];

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        const valid = positions.filter((pos) => typeof pos === 'number' && Number.isFinite(pos) && pos >= 0);
        if (valid.length === 0) continue;
        words.push([Math.min(...valid), word]);
    }

    if (words.length === 0) return null;

    // Sort by position (stable, so ties keep index order)
    words.sort((a, b) => a[0] - b[0]);

    return words.map(([, word]) => word).join(' ');
}

/**
 * Build an author-year short label from author display names.
 * ["Ada Lovelace", "Alan Turing"], 1950 → "Lovelace & Turing 1950"
 */
export function shortLabel(authorNames: string[], year: number | null): string {
    const lastNames = authorNames
        .map((name) => name.trim().split(/\s+/).pop() ?? '')
        .filter((name) => name.length > 0);

    let core: string;
    if (lastNames.length === 0) {
        core = 'Unknown';
    } else if (lastNames.length === 1) {
        core = lastNames[0] ?? 'Unknown';
    } else if (lastNames.length === 2) {
        core = `${lastNames[0]} & ${lastNames[1]}`;
    } else {
        core = `${lastNames[0]} et al.`;
    }

    return year !== null ? `${core} ${year}` : core;
}
