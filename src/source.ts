import fetch, { Response } from 'node-fetch';
import { SheetFetchError } from './errors';

export async function fetchSheetCsv(url: string): Promise<string> {
    let res: Response;
    try {
        res = await fetch(url, { headers: { Accept: 'text/csv' } });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SheetFetchError(`Could not reach spreadsheet at ${url}: ${message}`);
    }

    if (!res.ok) {
        throw new SheetFetchError(`Spreadsheet request failed: ${res.status} ${res.statusText}`);
    }

    return res.text();
}
