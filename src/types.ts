export interface SourceRow {
    row: number; // line in the sheet, the header being row 1
    name?: string;
    item: string; // raw item hash cell
    perks: string; // raw perks cell: sets separated by ';' or newlines, perks by ','
    notes?: string;
    tags?: string;
}

export interface WishlistEntry {
    item: number;
    perks: number[];
}

export interface WishlistBlock {
    source: number; // row the block came from
    comment?: string; // rendered without the leading '//notes:'
    entries: WishlistEntry[];
}

export interface WishlistDocument {
    title: string;
    description: string;
    blocks: WishlistBlock[];
}

export interface SkippedRow {
    row: number;
    reason: string;
}

export interface ConversionResult {
    document: WishlistDocument;
    skipped: SkippedRow[];
}
