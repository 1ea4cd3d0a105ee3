import type { CitationEdge, Paper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export interface ScopedEdges {
    edges: CitationEdge[];
    counts: { rawEdges: number; scopedEdges: number };
}

/**
 * Keep the edges whose citing side is a paper of the collection.
 * The cited side is left unchecked; the graph assembler drops edges that
 * point outside the node set.
 */
export function scopeEdges(papers: readonly Paper[], rawEdges: readonly CitationEdge[]): ScopedEdges {
    const ids = new Set(papers.map((paper) => paper.work_id));
    const edges = rawEdges.filter((edge) => ids.has(edge.citing_id));

    const counts = { rawEdges: rawEdges.length, scopedEdges: edges.length };
    getLogger().info(counts, 'Edges scoped to collection');
    return { edges, counts };
}
