import { DirectedGraph } from 'graphology';
import type { CitationEdge, EnrichedPaper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export type AttributeValue = string | number | boolean;

/**
 * Node attributes of the citation graph. Absent values are stored as ""
 * so every attribute has a serializable scalar type.
 */
export type CitationNodeAttributes = {
    doi: string;
    title: string;
    year: number | '';
    in_collection: boolean;
    supporting: number;
    contradicting: number;
    mentioning: number;
    unclassified: number;
    total: number;
    citing_publications: number;
};

export type CitationGraph = DirectedGraph<CitationNodeAttributes>;

export interface AssemblyCounts {
    nodes: number;
    scopedEdges: number;
    addedEdges: number;
}

/**
 * Map absent values (null, undefined, NaN) to "".
 */
export function sanitizeAttribute<T extends AttributeValue>(value: T | null | undefined): T | '' {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number' && Number.isNaN(value)) return '';
    return value;
}

function sanitizeCount(value: number): number {
    const sanitized = sanitizeAttribute(value);
    return sanitized === '' ? 0 : sanitized;
}

export function nodeAttributes(paper: EnrichedPaper): CitationNodeAttributes {
    return {
        doi: sanitizeAttribute(paper.doi),
        title: sanitizeAttribute(paper.title),
        year: sanitizeAttribute(paper.year),
        in_collection: paper.in_collection,
        supporting: sanitizeCount(paper.supporting),
        contradicting: sanitizeCount(paper.contradicting),
        mentioning: sanitizeCount(paper.mentioning),
        unclassified: sanitizeCount(paper.unclassified),
        total: sanitizeCount(paper.total),
        citing_publications: sanitizeCount(paper.citing_publications),
    };
}

export function createCitationGraph(): CitationGraph {
    return new DirectedGraph<CitationNodeAttributes>({ allowSelfLoops: true });
}

/**
 * Build the directed citation graph: one node per paper, keyed by work id,
 * and every scoped edge whose two endpoints are nodes.
 */
export function assembleGraph(
    papers: readonly EnrichedPaper[],
    scopedEdges: readonly CitationEdge[]
): { graph: CitationGraph; counts: AssemblyCounts } {
    const graph = createCitationGraph();

    for (const paper of papers) {
        if (!graph.hasNode(paper.work_id)) {
            graph.addNode(paper.work_id, nodeAttributes(paper));
        }
    }

    let dropped = 0;
    for (const edge of scopedEdges) {
        if (graph.hasNode(edge.citing_id) && graph.hasNode(edge.cited_id)) {
            graph.mergeEdge(edge.citing_id, edge.cited_id);
        } else {
            dropped++;
        }
    }

    const counts: AssemblyCounts = {
        nodes: graph.order,
        scopedEdges: scopedEdges.length,
        addedEdges: graph.size,
    };
    getLogger().info({ ...counts, outsideCollection: dropped }, 'Citation graph assembled');
    return { graph, counts };
}
