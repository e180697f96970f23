#!/usr/bin/env node
import * as core from '@actions/core';
import { fetchSheetCsv } from './source';
import { parseSourceRows } from './parser';
import { WishlistConverter } from './converter';
import { formatWishlist } from './formatter';
import { writeOutputFile } from './writer';
import { OUTPUT_PATH, SHEET_CSV_URL, WISHLIST_DESCRIPTION, WISHLIST_TITLE } from './config';

export interface RunOptions {
    sourceUrl?: string;
    outputPath?: string;
}

export async function run(options: RunOptions = {}): Promise<void> {
    const sourceUrl = options.sourceUrl ?? SHEET_CSV_URL;
    const outputPath = options.outputPath ?? OUTPUT_PATH;

    try {
        core.info(`Fetching roll sheet from ${sourceUrl}`);
        const csv = await fetchSheetCsv(sourceUrl);
        const rows = parseSourceRows(csv);
        core.info(`Read ${rows.length} rows.`);

        const converter = new WishlistConverter(WISHLIST_TITLE, WISHLIST_DESCRIPTION);
        const { document, skipped } = converter.convert(rows);

        if (skipped.length > 0) {
            core.startGroup(`Skipped ${skipped.length} rows`);
            try {
                skipped.forEach(s => core.warning(`Skipping ${s.reason}`));
            } finally {
                core.endGroup();
            }
        }

        const lineCount = document.blocks.reduce((n, b) => n + b.entries.length, 0);
        core.info(`Writing ${lineCount} rolls for ${document.blocks.length} rows to ${outputPath}`);
        await writeOutputFile(outputPath, formatWishlist(document));
        core.info('Done!');
    } catch (error) {
        core.setFailed(error instanceof Error ? error.message : String(error));
    }
}

if (require.main === module) {
    void run();
}
