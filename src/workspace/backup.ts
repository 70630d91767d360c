/**
 * Backup naming and atomic replacement of healed files.
 */

import { basename, dirname, extname, join } from 'node:path';

import { AtomicWriteError, describeError } from '../utils/errors.js';
import type { FileSystem } from './ports/filesystem.js';

export const BACKUP_SUFFIX = '.healer.backup';
export const TEMP_SUFFIX = '.healer.tmp';

function stemOf(path: string): string {
    return basename(path, extname(path));
}

/**
 * First free sibling name: `svc.healer.backup`, then `svc-1.healer.backup`, ...
 */
export async function createBackupPath(fs: FileSystem, target: string): Promise<string> {
    const dir = dirname(target);
    const stem = stemOf(target);

    let candidate = join(dir, `${stem}${BACKUP_SUFFIX}`);
    for (let counter = 1; await fs.exists(candidate); counter++) {
        candidate = join(dir, `${stem}-${counter}${BACKUP_SUFFIX}`);
    }
    return candidate;
}

/**
 * Write to a sibling temp file, then rename it over the target. The temp
 * file is removed on any failure and the target is left untouched.
 */
export async function writeAtomically(fs: FileSystem, target: string, content: string): Promise<void> {
    const tempPath = join(dirname(target), `${stemOf(target)}${TEMP_SUFFIX}`);
    try {
        await fs.writeFile(tempPath, content);
        await fs.rename(tempPath, target);
    } catch (error) {
        try {
            if (await fs.exists(tempPath)) {
                await fs.remove(tempPath);
            }
        } catch (cleanupError) {
            throw new AtomicWriteError(target, `${describeError(error)} (cleanup failed: ${describeError(cleanupError)})`);
        }
        throw new AtomicWriteError(target, error);
    }
}
