import type { EdgeRoleResult } from './edge.js';

/**
 * Bibliographic metadata service (OpenAlex).
 * Returns the raw work document, or null when the DOI is unknown.
 * Transport failures are thrown as errors.
 */
export interface MetadataSource {
    readonly name: string;
    fetchWorkByDoi(doi: string): Promise<unknown | null>;
}

/**
 * Citation-tally service (scite).
 * Returns the raw tally document, or null for "no data".
 */
export interface TallySource {
    readonly name: string;
    fetchTallies(doi: string): Promise<unknown | null>;
}

/**
 * Text of one side of a citation edge.
 */
export interface EdgeEndpointText {
    title: string;
    abstract: string;
}

export interface EdgeRoleInput {
    citing: EdgeEndpointText;
    cited: EdgeEndpointText;
}

/**
 * Rhetorical-role classifier for a single citation edge.
 * Throws `MalformedClassificationError` when the service answers with
 * something that cannot be read as a classification.
 */
export interface EdgeRoleClassifier {
    classify(input: EdgeRoleInput): Promise<EdgeRoleResult>;
}

/**
 * Options for source initialization.
 */
export interface SourceOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    /** Base URL override */
    baseUrl?: string;
}
