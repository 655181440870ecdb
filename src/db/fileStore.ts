import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read a UTF-8 file, or `null` when it does not exist. */
export async function readTextIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, 'utf-8');
    } catch (err: unknown) {
        if (isMissing(err)) return null;
        throw err;
    }
}

/**
 * Replace a file in one step: write a sibling temp file, then rename it
 * over the target. Readers see either the old or the new content.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = join(dirname(path), `.${basename(path)}.tmp`);
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
}

export async function appendLine(path: string, line: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await appendFile(path, `${line}\n`, 'utf-8');
}
