import { ConversionResult, SkippedRow, SourceRow, WishlistBlock, WishlistEntry } from './types';

const MAX_HASH = 4294967295;

export function parseHash(value: string): number | null {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        return null;
    }
    const hash = Number(trimmed);
    if (hash === 0 || hash > MAX_HASH) {
        return null;
    }
    return hash;
}

/**
 * Splits a perks cell into perk sets. Sets are separated by ';' or line
 * breaks, perks inside a set by ','. Throws on the first token that is not
 * a valid hash.
 */
export function parsePerkSets(cell: string): number[][] {
    const sets: number[][] = [];

    for (const segment of cell.split(/[;\r\n]+/)) {
        if (!segment.trim()) continue;

        const perks: number[] = [];
        for (const token of segment.split(',')) {
            const hash = parseHash(token);
            if (hash === null) {
                throw new Error(`invalid perk hash '${token.trim()}'`);
            }
            perks.push(hash);
        }
        sets.push(perks);
    }

    return sets;
}

export function normalizeTags(cell: string | undefined): string[] {
    if (!cell) return [];
    return cell
        .split(',')
        .map(t => t.trim().toLowerCase())
        .filter(t => t.length > 0);
}

export function buildComment(notes: string | undefined, tags: string[]): string | undefined {
    const text = (notes ?? '').replace(/\s*[\r\n]+\s*/g, ' ').trim();
    if (!text && tags.length === 0) {
        return undefined;
    }
    return tags.length > 0 ? `${text}|tags:${tags.join(',')}` : text;
}

export class WishlistConverter {
    private title: string;
    private description: string;

    constructor(title: string, description: string) {
        this.title = title;
        this.description = description;
    }

    public convert(rows: Iterable<SourceRow>): ConversionResult {
        const blocks: WishlistBlock[] = [];
        const skipped: SkippedRow[] = [];

        for (const row of rows) {
            const block = this.convertRow(row, skipped);
            if (block) {
                blocks.push(block);
            }
        }

        return {
            document: { title: this.title, description: this.description, blocks },
            skipped,
        };
    }

    private convertRow(row: SourceRow, skipped: SkippedRow[]): WishlistBlock | null {
        const label = row.name ? `${row.name} (row ${row.row})` : `row ${row.row}`;

        if (!row.item.trim()) {
            skipped.push({ row: row.row, reason: `${label}: missing item hash` });
            return null;
        }

        const item = parseHash(row.item);
        if (item === null) {
            skipped.push({ row: row.row, reason: `${label}: invalid item hash '${row.item.trim()}'` });
            return null;
        }

        let perkSets: number[][];
        try {
            perkSets = parsePerkSets(row.perks);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            skipped.push({ row: row.row, reason: `${label}: ${message}` });
            return null;
        }

        if (perkSets.length === 0) {
            skipped.push({ row: row.row, reason: `${label}: no perks listed` });
            return null;
        }

        // Same perks in a different order are the same roll
        const seen = new Set<string>();
        const entries: WishlistEntry[] = [];
        for (const perks of perkSets) {
            const key = [...perks].sort((a, b) => a - b).join(',');
            if (seen.has(key)) continue;
            seen.add(key);
            entries.push({ item, perks });
        }

        return {
            source: row.row,
            comment: buildComment(row.notes, normalizeTags(row.tags)),
            entries,
        };
    }
}
