import { mkdirSync, existsSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { doiToFilename } from '../sources/utils.js';
import { MalformedDocumentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Result of reading one cache entry.
 */
export type CacheEntry =
    | { status: 'missing' }
    | { status: 'hit'; data: unknown };

/**
 * File-system cache of fetched documents, one JSON file per DOI.
 *
 * The filename is derived from the canonical DOI, so a rerun finds earlier
 * fetches by existence check alone. Entries never expire and are never
 * overwritten. `null` is a valid entry ("the service has no data").
 */
export class DocumentCache {
    readonly directory: string;

    constructor(directory: string) {
        this.directory = directory;
        mkdirSync(this.directory, { recursive: true });
        getLogger().debug({ cacheDir: this.directory }, 'Cache initialized');
    }

    pathFor(doi: string): string {
        return join(this.directory, `${doiToFilename(doi)}.json`);
    }

    has(doi: string): boolean {
        return existsSync(this.pathFor(doi));
    }

    /**
     * Read a cached document. Throws MalformedDocumentError on invalid JSON.
     */
    read(doi: string): CacheEntry {
        const filePath = this.pathFor(doi);
        if (!existsSync(filePath)) return { status: 'missing' };

        const raw = readFileSync(filePath, 'utf-8');
        try {
            return { status: 'hit', data: JSON.parse(raw) };
        } catch (error) {
            throw new MalformedDocumentError(
                `Cached document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                filePath
            );
        }
    }

    /**
     * Store a document. Returns false (and writes nothing) when an entry exists.
     */
    write(doi: string, data: unknown): boolean {
        const filePath = this.pathFor(doi);
        if (existsSync(filePath)) return false;

        writeFileSync(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8', flag: 'wx' });
        return true;
    }

    /**
     * Cached filenames, sorted.
     */
    files(): string[] {
        return readdirSync(this.directory)
            .filter((name) => name.endsWith('.json'))
            .sort();
    }

    getStats(): { directory: string; entries: number } {
        return { directory: this.directory, entries: this.files().length };
    }
}
