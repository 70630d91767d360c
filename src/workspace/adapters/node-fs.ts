/**
 * Adapter: NodeFileSystem
 *
 * FileSystem implementation backed by node:fs/promises.
 */

import { constants } from 'node:fs';
import { access, copyFile, lstat, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';

import type { AccessMode, FileStat, FileSystem } from '../ports/filesystem.js';

/**
 * Strict UTF-8 decode: invalid byte sequences throw instead of turning into
 * U+FFFD, so damaged files surface as read errors.
 */
export function decodeUtf8(bytes: Uint8Array): string {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

export class NodeFileSystem implements FileSystem {
    async readFile(path: string): Promise<string> {
        return decodeUtf8(await readFile(path));
    }

    writeFile(path: string, content: string): Promise<void> {
        return writeFile(path, content, 'utf8');
    }

    copyFile(from: string, to: string): Promise<void> {
        return copyFile(from, to);
    }

    rename(from: string, to: string): Promise<void> {
        return rename(from, to);
    }

    remove(path: string): Promise<void> {
        return rm(path, { force: true });
    }

    async exists(path: string): Promise<boolean> {
        try {
            await lstat(path);
            return true;
        } catch {
            return false;
        }
    }

    async stat(path: string): Promise<FileStat> {
        const stats = await lstat(path);
        return {
            isFile: stats.isFile(),
            isDirectory: stats.isDirectory(),
            isSymbolicLink: stats.isSymbolicLink(),
            size: stats.size,
            mtimeMs: stats.mtimeMs
        };
    }

    readDir(path: string): Promise<string[]> {
        return readdir(path);
    }

    async canAccess(path: string, mode: AccessMode): Promise<boolean> {
        try {
            await access(path, mode === 'read' ? constants.R_OK : constants.W_OK);
            return true;
        } catch {
            return false;
        }
    }
}
