import * as fs from 'fs';
import * as path from 'path';
import * as io from '@actions/io';

/**
 * Replaces `outputPath` with `content`. The file is written next to the
 * destination first and renamed into place, so a failed run leaves any
 * previous output untouched. A directory at `outputPath` is an error.
 */
export async function writeOutputFile(outputPath: string, content: string): Promise<void> {
    const tmpPath = `${outputPath}.tmp`;

    await io.mkdirP(path.dirname(path.resolve(outputPath)));

    try {
        await fs.promises.writeFile(tmpPath, content, 'utf-8');
        await fs.promises.rename(tmpPath, outputPath);
    } catch (error) {
        await io.rmRF(tmpPath);
        throw error;
    }
}
