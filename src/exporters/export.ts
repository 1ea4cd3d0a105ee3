import { writeFileSync } from 'node:fs';
import type { CitationGraph, CitationNodeAttributes } from '../graph/assembler.js';
import type { DataTable, PipelineDatabase } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type TableFormat = 'json' | 'csv';

type GraphMlType = 'string' | 'long' | 'boolean';

/**
 * GraphML key declarations, one per node attribute.
 */
const NODE_KEYS = [
    ['doi', 'string'],
    ['title', 'string'],
    ['year', 'long'],
    ['in_collection', 'boolean'],
    ['supporting', 'long'],
    ['contradicting', 'long'],
    ['mentioning', 'long'],
    ['unclassified', 'long'],
    ['total', 'long'],
    ['citing_publications', 'long'],
] as const satisfies ReadonlyArray<readonly [keyof CitationNodeAttributes, GraphMlType]>;

// Code points XML 1.0 does not allow, even as character references
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

function esc(value: string): string {
    return value
        .replace(XML_FORBIDDEN, '')
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

// ─── GraphML ─────────────────────────────────────────────

/**
 * Serialize the citation graph as GraphML. Empty attribute values are
 * left out so typed keys never carry "".
 */
export function graphToGraphMl(graph: CitationGraph): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
`;
    for (const [name, type] of NODE_KEYS) {
        xml += `  <key id="${name}" for="node" attr.name="${name}" attr.type="${type}"/>\n`;
    }
    xml += `  <graph id="citations" edgedefault="directed">\n`;

    graph.forEachNode((node, attributes) => {
        xml += `    <node id="${esc(node)}">\n`;
        for (const [name] of NODE_KEYS) {
            const value = attributes[name];
            if (value === '') continue;
            xml += `      <data key="${name}">${esc(String(value))}</data>\n`;
        }
        xml += `    </node>\n`;
    });

    graph.forEachEdge((_edge, _attributes, source, target) => {
        xml += `    <edge source="${esc(source)}" target="${esc(target)}"/>\n`;
    });

    xml += `  </graph>
</graphml>
`;
    return xml;
}

export function writeGraphMl(graph: CitationGraph, outputPath: string): void {
    writeFileSync(outputPath, graphToGraphMl(graph), 'utf-8');
    getLogger().info({ outputPath, nodes: graph.order, edges: graph.size }, 'GraphML written');
}

// ─── Tables ──────────────────────────────────────────────

function csvField(value: unknown): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function rowsToCsv(columns: readonly string[], rows: ReadonlyArray<Record<string, unknown>>): string {
    let csv = columns.map(csvField).join(',') + '\n';
    for (const row of rows) {
        csv += columns.map((column) => csvField(row[column])).join(',') + '\n';
    }
    return csv;
}

/**
 * Dump one pipeline table to CSV or JSON.
 */
export function exportTable(
    db: PipelineDatabase,
    table: DataTable,
    format: TableFormat,
    outputPath: string
): number {
    const rows = db.tableRows(table);

    let content: string;
    switch (format) {
        case 'json':
            content = JSON.stringify(rows, null, 2) + '\n';
            break;
        case 'csv':
            content = rowsToCsv(db.tableColumns(table), rows);
            break;
    }

    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ table, format, outputPath, rows: rows.length }, 'Table exported');
    return rows.length;
}
