import { parse } from 'csv-parse/sync';
import { SourceRow } from './types';
import { SourceFormatError } from './errors';

const ITEM_COLUMNS = ['item', 'hash', 'item hash'];
const PERKS_COLUMNS = ['perks', 'rolls'];

interface ParsedRecord {
    record: Record<string, string | undefined>;
    info: { lines: number };
}

function findColumn(header: string[], candidates: string[]): string | undefined {
    return candidates.find(c => header.includes(c));
}

// `lines` is the line a record ends on; quoted cells can span several
function sheetRow(record: Record<string, string | undefined>, lines: number): number {
    let breaks = 0;
    for (const value of Object.values(record)) {
        breaks += value?.match(/\r\n|\r|\n/g)?.length ?? 0;
    }
    return lines - breaks;
}

export function parseSourceRows(content: string): SourceRow[] {
    let header: string[] = [];

    const records = parse(content, {
        columns: (names: string[]) => {
            header = names.map(n => n.trim().toLowerCase());
            return header;
        },
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
        info: true,
    }) as ParsedRecord[];

    const itemColumn = findColumn(header, ITEM_COLUMNS);
    const perksColumn = findColumn(header, PERKS_COLUMNS);

    if (!itemColumn) {
        throw new SourceFormatError(`No item column found (expected one of: ${ITEM_COLUMNS.join(', ')})`);
    }
    if (!perksColumn) {
        throw new SourceFormatError(`No perks column found (expected one of: ${PERKS_COLUMNS.join(', ')})`);
    }

    return records.map(({ record, info }) => ({
        row: sheetRow(record, info.lines),
        name: record['name'] || undefined,
        item: record[itemColumn] ?? '',
        perks: record[perksColumn] ?? '',
        notes: record['notes'] || undefined,
        tags: record['tags'] || undefined,
    }));
}
