import type { DocumentCache } from '../cache/document-cache.js';
import { RoleGraphError } from '../utils/errors.js';
import { HttpError, sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface FetchOptions {
    /** Label used in log lines ("work", "tally") */
    kind: string;
    /** Pause between two requests */
    delayMs: number;
    /** Store a null result so the DOI is not asked again */
    cacheMisses: boolean;
}

export interface FetchSummary {
    requested: number;
    cached: number;
    fetched: number;
    missing: number;
    failed: number;
}

/**
 * Fetch one document per DOI into the cache.
 *
 * DOIs already cached are not requested again. A failed request skips that
 * DOI only; the next run retries it since nothing was stored.
 */
export async function fetchDocuments(
    dois: readonly string[],
    cache: DocumentCache,
    fetchOne: (doi: string) => Promise<unknown | null>,
    options: FetchOptions
): Promise<FetchSummary> {
    const logger = getLogger();
    const summary: FetchSummary = { requested: dois.length, cached: 0, fetched: 0, missing: 0, failed: 0 };

    let requests = 0;
    for (const doi of dois) {
        if (cache.has(doi)) {
            summary.cached++;
            continue;
        }

        if (requests > 0) await sleep(options.delayMs);
        requests++;

        let document: unknown | null;
        try {
            document = await fetchOne(doi);
        } catch (error) {
            if (error instanceof HttpError || error instanceof RoleGraphError) {
                logger.warn({ doi, kind: options.kind, error: error.message }, 'Fetch failed, skipping DOI');
                summary.failed++;
                continue;
            }
            throw error;
        }

        if (document === null) {
            logger.debug({ doi, kind: options.kind }, 'No document for DOI');
            summary.missing++;
            if (options.cacheMisses) cache.write(doi, null);
            continue;
        }

        cache.write(doi, document);
        summary.fetched++;
    }

    logger.info({ kind: options.kind, ...summary }, 'Fetch finished');
    return summary;
}
