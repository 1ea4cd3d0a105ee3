import { existsSync, readFileSync } from 'node:fs';
import { canonicalDoi } from '../sources/utils.js';
import { MalformedDocumentError, MissingPrerequisiteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

type ExportItem = Record<string, unknown>;

/**
 * The three shapes a reference-manager export arrives in.
 *
 *   list    `[item, item, ...]`
 *   wrapped `{ "items": [item, ...] }`
 *   single  one bare item object
 */
export type ReferenceExport =
    | { shape: 'list'; items: unknown[] }
    | { shape: 'wrapped'; items: unknown[] }
    | { shape: 'single'; item: ExportItem };

function isRecord(value: unknown): value is ExportItem {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve parsed export JSON into one of the accepted shapes.
 */
export function classifyReferenceExport(data: unknown, source = '<export>'): ReferenceExport {
    if (Array.isArray(data)) {
        return { shape: 'list', items: data };
    }
    if (isRecord(data)) {
        const items = data['items'];
        if (Array.isArray(items)) {
            return { shape: 'wrapped', items };
        }
        return { shape: 'single', item: data };
    }
    throw new MalformedDocumentError(
        `Unexpected JSON structure in reference export: ${data === null ? 'null' : typeof data}`,
        source
    );
}

function exportItems(exported: ReferenceExport): unknown[] {
    switch (exported.shape) {
        case 'list':
        case 'wrapped':
            return exported.items;
        case 'single':
            return [exported.item];
    }
}

function doiField(record: ExportItem): string | null {
    for (const key of ['DOI', 'doi']) {
        const value = record[key];
        if (typeof value === 'string' && value.trim()) return value;
    }
    return null;
}

/**
 * Canonical DOI of one export item. Zotero API items nest metadata under
 * `data`, CSL-JSON items keep it at the top level; the nested form wins.
 */
export function resolveItemDoi(item: unknown): string | null {
    if (!isRecord(item)) return null;

    const nested = item['data'];
    const raw = (isRecord(nested) ? doiField(nested) : null) ?? doiField(item);
    return canonicalDoi(raw);
}

/**
 * The collection: sorted, deduplicated canonical DOIs of every export item
 * that has one.
 */
export function extractCollectionDois(data: unknown, source = '<export>'): string[] {
    const exported = classifyReferenceExport(data, source);
    const items = exportItems(exported);

    const dois = new Set<string>();
    let skipped = 0;
    for (const item of items) {
        const doi = resolveItemDoi(item);
        if (doi) {
            dois.add(doi);
        } else {
            skipped++;
        }
    }

    // Code-unit order, independent of locale
    const sorted = [...dois].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    getLogger().info(
        { shape: exported.shape, items: items.length, dois: sorted.length, withoutDoi: skipped },
        'Collection extracted'
    );
    return sorted;
}

/**
 * Load a reference-manager export file and extract its collection DOIs.
 */
export function readReferenceExport(path: string): string[] {
    if (!existsSync(path)) {
        throw new MissingPrerequisiteError(path, 'extract');
    }

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new MalformedDocumentError(
            `Reference export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    return extractCollectionDois(data, path);
}
