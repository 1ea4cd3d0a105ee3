import type {
    CitationEdge,
    EdgeRoleAnnotation,
    EdgeRoleClassifier,
    EdgeRoleInput,
    WorkText,
} from '../types/index.js';
import { EdgeRole, edgeKey } from '../types/index.js';
import type { CitationGraph } from '../graph/assembler.js';
import { MalformedClassificationError } from '../utils/errors.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/** Confidence given to an edge whose classification could not be parsed. */
export const FALLBACK_CONFIDENCE = 0.3;

export interface OrchestratorOptions {
    /** Pause between two classification calls */
    delayMs?: number;
    /** Classify at most this many eligible edges */
    maxEdges?: number;
}

export interface AnnotationStats {
    edges: number;
    skippedNoTitle: number;
    classified: number;
    fallbacks: number;
    failed: number;
    beyondLimit: number;
}

export interface AnnotationResult {
    annotations: EdgeRoleAnnotation[];
    stats: AnnotationStats;
}

export function fallbackAnnotation(edge: CitationEdge, error: MalformedClassificationError): EdgeRoleAnnotation {
    return {
        ...edge,
        role: EdgeRole.BACKGROUND,
        confidence: FALLBACK_CONFIDENCE,
        reason: error.message,
    };
}

/**
 * Drives the edge role classifier over every edge of the citation graph.
 *
 * Edges are visited in insertion order. An edge is eligible only when both
 * endpoints have a non-empty title. A response that cannot be parsed
 * becomes a BACKGROUND annotation; a failed call leaves the edge without
 * an annotation, which keeps it out of the viewer.
 */
export class EdgeRoleOrchestrator {
    private readonly delayMs: number;
    private readonly maxEdges?: number;

    constructor(
        private readonly classifier: EdgeRoleClassifier,
        options: OrchestratorOptions = {}
    ) {
        this.delayMs = options.delayMs ?? 0;
        this.maxEdges = options.maxEdges;
    }

    async annotate(graph: CitationGraph, texts: ReadonlyMap<string, WorkText>): Promise<AnnotationResult> {
        const logger = getLogger();
        const annotations: EdgeRoleAnnotation[] = [];
        const stats: AnnotationStats = {
            edges: graph.size,
            skippedNoTitle: 0,
            classified: 0,
            fallbacks: 0,
            failed: 0,
            beyondLimit: 0,
        };

        let calls = 0;
        for (const { source, target, sourceAttributes, targetAttributes } of graph.edgeEntries()) {
            const edge: CitationEdge = { citing_id: source, cited_id: target };

            if (!sourceAttributes.title || !targetAttributes.title) {
                stats.skippedNoTitle++;
                continue;
            }

            if (this.maxEdges !== undefined && calls >= this.maxEdges) {
                stats.beyondLimit++;
                continue;
            }

            if (calls > 0) await sleep(this.delayMs);
            calls++;

            const input: EdgeRoleInput = {
                citing: { title: sourceAttributes.title, abstract: texts.get(source)?.abstract ?? '' },
                cited: { title: targetAttributes.title, abstract: texts.get(target)?.abstract ?? '' },
            };

            try {
                const result = await this.classifier.classify(input);
                annotations.push({ ...edge, ...result });
                stats.classified++;
            } catch (error) {
                if (error instanceof MalformedClassificationError) {
                    logger.warn({ ...edge, content: error.content }, 'Unparseable classification, using fallback role');
                    annotations.push(fallbackAnnotation(edge, error));
                    stats.fallbacks++;
                } else {
                    logger.warn(
                        { ...edge, error: error instanceof Error ? error.message : String(error) },
                        'Classification failed, edge left unannotated'
                    );
                    stats.failed++;
                }
            }
        }

        logger.info({ ...stats, annotations: annotations.length }, 'Edge roles annotated');
        return { annotations, stats };
    }
}

/**
 * The edges a renderer may draw: exactly the graph edges that carry an
 * annotation for their ordered pair.
 */
export function renderableEdges(
    graph: CitationGraph,
    annotations: readonly EdgeRoleAnnotation[]
): Array<EdgeRoleAnnotation> {
    const byPair = new Map<string, EdgeRoleAnnotation>();
    for (const annotation of annotations) {
        byPair.set(edgeKey(annotation.citing_id, annotation.cited_id), annotation);
    }

    const renderable: EdgeRoleAnnotation[] = [];
    graph.forEachEdge((_edge, _attributes, source, target) => {
        const annotation = byPair.get(edgeKey(source, target));
        if (annotation) renderable.push(annotation);
    });
    return renderable;
}
