import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

/**
 * On-disk layout of one collection's workspace.
 *
 *   <outDir>/<collection>/
 *     rolegraph.db             pipeline tables
 *     works/<doi>.json         cached OpenAlex work documents
 *     tallies/<doi>.json       cached scite tally documents
 *     citation_graph.graphml   assembled graph
 *     citation_graph.html      viewer
 */
export interface WorkspaceLayout {
    root: string;
    database: string;
    worksDir: string;
    talliesDir: string;
    graphMl: string;
    viewerHtml: string;
}

export function workspaceLayout(outDir: string, collection: string): WorkspaceLayout {
    const root = resolve(outDir, collection);
    return {
        root,
        database: join(root, 'rolegraph.db'),
        worksDir: join(root, 'works'),
        talliesDir: join(root, 'tallies'),
        graphMl: join(root, 'citation_graph.graphml'),
        viewerHtml: join(root, 'citation_graph.html'),
    };
}

export function ensureWorkspace(layout: WorkspaceLayout): void {
    mkdirSync(layout.root, { recursive: true });
}
