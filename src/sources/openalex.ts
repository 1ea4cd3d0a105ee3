import { z } from 'zod';
import type { MetadataSource, SourceOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { isNotFound } from '../utils/http-client.js';
import { MalformedDocumentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex work document (subset of relevant fields).
 * Every field tolerates a wrong type by falling back to "absent", so one odd
 * field never costs the whole document.
 */
export const openAlexWorkSchema = z.object({
    id: z.string().trim().min(1).optional().catch(undefined),
    doi: z.string().nullish().catch(null),
    ids: z
        .object({ doi: z.string().nullish().catch(null) })
        .partial()
        .nullish()
        .catch(null),
    title: z.string().nullish().catch(null),
    display_name: z.string().nullish().catch(null),
    publication_year: z.number().int().nullish().catch(null),
    publication_date: z.string().nullish().catch(null),
    abstract_inverted_index: z.record(z.array(z.number())).nullish().catch(null),
    abstract: z.string().nullish().catch(null),
    referenced_works: z.array(z.string().catch('')).nullish().catch(null),
    authorships: z
        .array(
            z
                .object({
                    author: z
                        .object({ display_name: z.string().nullish().catch(null) })
                        .nullish()
                        .catch(null),
                })
                .catch({ author: null })
        )
        .nullish()
        .catch(null),
});

export type OpenAlexWork = z.infer<typeof openAlexWorkSchema>;

/**
 * OpenAlex metadata source: looks works up by DOI.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexSource implements MetadataSource {
    readonly name = 'OpenAlex';
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options?: SourceOptions
    ) {
        this.apiKey = options?.apiKey;
        this.email = options?.email;
        this.baseUrl = options?.baseUrl ?? OPENALEX_BASE;
    }

    async fetchWorkByDoi(doi: string): Promise<unknown | null> {
        const params = new URLSearchParams();
        this.addAuthParams(params);

        const query = params.toString() ? `?${params.toString()}` : '';
        const url = `${this.baseUrl}/works/https://doi.org/${encodeDoiPath(doi)}${query}`;
        getLogger().debug({ url }, 'OpenAlex fetch work');

        try {
            const response = await this.httpClient.get(url, { source: 'openalex' });
            if (typeof response.data !== 'object' || response.data === null || Array.isArray(response.data)) {
                throw new MalformedDocumentError('OpenAlex returned a non-object work document', url);
            }
            return response.data;
        } catch (error) {
            if (isNotFound(error)) {
                getLogger().debug({ doi }, 'OpenAlex has no work for DOI');
                return null;
            }
            throw error;
        }
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

/**
 * Percent-encode each DOI segment but keep the "/" separators.
 */
export function encodeDoiPath(doi: string): string {
    return doi.split('/').map(encodeURIComponent).join('/');
}
