import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import fetch from 'node-fetch';
import * as core from '@actions/core';
import { run } from '../src/main';
import { WISHLIST_DESCRIPTION, WISHLIST_TITLE } from '../src/config';

jest.mock('node-fetch', () => ({ __esModule: true, default: jest.fn() }));
jest.mock('@actions/core');

describe('run', () => {
    const mockFetch = fetch as unknown as jest.Mock;
    let dir: string;
    let outputPath: string;

    beforeEach(() => {
        jest.clearAllMocks();
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wishlist-run-'));
        outputPath = path.join(dir, 'wishlist.txt');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function respondWith(status: number, statusText: string, body: string) {
        mockFetch.mockResolvedValue({ ok: status >= 200 && status < 300, status, statusText, text: async () => body });
    }

    it('should write the wishlist and warn about skipped rows', async () => {
        respondWith(200, 'OK',
            'name,item,perks,notes\n' +
            'Ace,100,"1,2;3,4",good roll\n' +
            'Broken,,5,\n' +
            'Cold,200,6,\n'
        );

        await run({ sourceUrl: 'https://sheets.example/export', outputPath });

        expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
            `title:${WISHLIST_TITLE}\n` +
            `description:${WISHLIST_DESCRIPTION}\n` +
            '\n' +
            '//notes:good roll\n' +
            'dimwishlist:item=100&perks=1,2\n' +
            'dimwishlist:item=100&perks=3,4\n' +
            '\n' +
            'dimwishlist:item=200&perks=6\n'
        );
        expect(core.warning).toHaveBeenCalledTimes(1);
        expect(core.warning).toHaveBeenCalledWith('Skipping Broken (row 3): missing item hash');
        expect(core.setFailed).not.toHaveBeenCalled();
        expect(core.endGroup).toHaveBeenCalledTimes(1);
    });

    it('should fail the run when the sheet is unreachable', async () => {
        respondWith(500, 'Internal Server Error', '');

        await run({ sourceUrl: 'https://sheets.example/export', outputPath });

        expect(core.setFailed).toHaveBeenCalledWith('Spreadsheet request failed: 500 Internal Server Error');
        expect(fs.existsSync(outputPath)).toBe(false);
    });

    it('should fail the run when the sheet has no perks column', async () => {
        respondWith(200, 'OK', 'item,notes\n1,a\n');

        await run({ sourceUrl: 'https://sheets.example/export', outputPath });

        expect(core.setFailed).toHaveBeenCalledWith('No perks column found (expected one of: perks, rolls)');
    });

    it('should fail the run when the output cannot be written', async () => {
        respondWith(200, 'OK', 'item,perks\n1,2\n');
        const blocker = path.join(dir, 'blocker');
        fs.writeFileSync(blocker, '');

        await run({ sourceUrl: 'https://sheets.example/export', outputPath: path.join(blocker, 'wishlist.txt') });

        expect(core.setFailed).toHaveBeenCalledTimes(1);
    });

    it('should fail the run when a directory sits at the output path', async () => {
        respondWith(200, 'OK', 'item,perks\n1,2\n');
        fs.mkdirSync(outputPath);

        await run({ sourceUrl: 'https://sheets.example/export', outputPath });

        expect(core.setFailed).toHaveBeenCalledTimes(1);
        expect(core.info).not.toHaveBeenCalledWith('Done!');
        expect(fs.readdirSync(outputPath)).toEqual([]);
    });
});
