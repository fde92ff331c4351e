/**
 * ManifestLoader - Reads batch manifests (JSON or CSV) into ManifestItems
 *
 * JSON: { "<hint>": [urls] }, { "<hint>": { "items": [urls] } } or
 * [{ "url": ..., "source": ... }]
 * CSV: a source/Source column and an items_comma_separated/items column
 * holding comma-separated URLs
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as csvParse } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ManifestItem } from '../download/core/types';

export type ManifestFormat = 'json' | 'csv';

const MANIFEST_FORMATS: readonly ManifestFormat[] = ['json', 'csv'];

const ArrayEntrySchema = z.object({
    url: z.union([z.string(), z.number()]),
    source: z.string().nullish(),
});

const CsvRowsSchema = z.array(z.record(z.string()));

export function createManifestItem(sourceHint: string, url: string): ManifestItem | null {
    const normalized = url.trim();
    if (!normalized) {
        return null;
    }
    return Object.freeze({ sourceHint, url: normalized });
}

export function isManifestFormat(value: string): value is ManifestFormat {
    return (MANIFEST_FORMATS as readonly string[]).includes(value);
}

/**
 * Explicit format, else the file extension
 */
export function detectFormat(filePath: string, format?: string): ManifestFormat {
    const candidate = (format || path.extname(filePath).replace(/^\./, '')).toLowerCase();
    if (!isManifestFormat(candidate)) {
        throw new Error(`Unsupported manifest format: ${candidate}`);
    }
    return candidate;
}

function pushItem(items: ManifestItem[], sourceHint: string, url: unknown): void {
    if (url === undefined || url === null || url === '') return;
    const item = createManifestItem(sourceHint, String(url));
    if (item) {
        items.push(item);
    }
}

export function parseJsonManifest(content: string): ManifestItem[] {
    const data: unknown = JSON.parse(content);
    const items: ManifestItem[] = [];

    if (Array.isArray(data)) {
        for (const entry of data) {
            const parsed = ArrayEntrySchema.safeParse(entry);
            if (!parsed.success) {
                logger.debug('Skipping manifest entry without a url', { entry });
                continue;
            }
            pushItem(items, parsed.data.source ?? '', parsed.data.url);
        }
        return items;
    }

    if (typeof data !== 'object' || data === null) {
        throw new Error('JSON manifest must be an object or array');
    }

    for (const [sourceHint, value] of Object.entries(data)) {
        let urls: unknown = value;
        if (typeof urls === 'object' && urls !== null && !Array.isArray(urls)) {
            urls = 'items' in urls ? urls.items : [];
        }
        if (!Array.isArray(urls)) {
            continue;
        }
        for (const url of urls) {
            pushItem(items, sourceHint, url);
        }
    }
    return items;
}

export function parseCsvManifest(content: string): ManifestItem[] {
    const rows = CsvRowsSchema.parse(
        csvParse(content, {
            columns: true,
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true,
            bom: true,
        }),
    );

    const items: ManifestItem[] = [];
    for (const row of rows) {
        const sourceHint = row.source || row.Source || '';
        const field = row.items_comma_separated || row.items || '';
        for (const part of field.split(',')) {
            pushItem(items, sourceHint, part);
        }
    }
    return items;
}

export function parseManifest(content: string, format: ManifestFormat): ManifestItem[] {
    return format === 'json' ? parseJsonManifest(content) : parseCsvManifest(content);
}

export async function loadManifest(filePath: string, format?: string): Promise<ManifestItem[]> {
    const resolved = detectFormat(filePath, format);
    const content = await fs.readFile(filePath, 'utf-8');
    const items = parseManifest(content, resolved);

    logger.info('Manifest loaded', { path: filePath, format: resolved, items: items.length });
    return items;
}
