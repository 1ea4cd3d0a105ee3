import { z } from 'zod';
import type { SourceOptions, TallySource } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { isNotFound } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { encodeDoiPath } from './openalex.js';

const SCITE_BASE = 'https://api.scite.ai';

const counter = z.coerce.number().int().nonnegative().catch(0);

/**
 * scite tally document. Missing or unreadable counters read as 0.
 */
export const sciteTallySchema = z.object({
    doi: z.string().nullish().catch(null),
    supporting: counter,
    contradicting: counter,
    mentioning: counter,
    unclassified: counter,
    total: counter,
    citingPublications: counter,
});

export type SciteTally = z.infer<typeof sciteTallySchema>;

/**
 * scite.ai tally source. Works with or without an API key; without one the
 * public endpoint returns limited data.
 */
export class SciteSource implements TallySource {
    readonly name = 'scite';
    private readonly apiKey?: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options?: SourceOptions
    ) {
        this.apiKey = options?.apiKey;
        this.baseUrl = options?.baseUrl ?? SCITE_BASE;
    }

    async fetchTallies(doi: string): Promise<unknown | null> {
        const url = `${this.baseUrl}/tallies/${encodeDoiPath(doi)}`;
        const headers: Record<string, string> = this.apiKey ? { 'x-api-key': this.apiKey } : {};

        try {
            const response = await this.httpClient.get(url, { source: 'scite', headers });
            return response.data ?? null;
        } catch (error) {
            if (isNotFound(error)) {
                getLogger().debug({ doi }, 'scite has no data for DOI');
                return null;
            }
            throw error;
        }
    }
}
