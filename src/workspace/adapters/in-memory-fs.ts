/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem for tests. Files live in a Map keyed by absolute
 * POSIX path; directories exist implicitly as prefixes of stored paths.
 */

import type { AccessMode, FileStat, FileSystem } from '../ports/filesystem.js';

interface StoredFile {
    content: string;
    mtimeMs: number;
}

export class InMemoryFileSystem implements FileSystem {
    private files = new Map<string, StoredFile>();
    private readOnly = new Set<string>();
    private unreadable = new Set<string>();
    private failingWrites = new Set<string>();
    private clock = Date.now();

    // --- FileSystem interface ---

    readFile(path: string): Promise<string> {
        const file = this.files.get(path);
        if (file === undefined) {
            return Promise.reject(new Error(`ENOENT: no such file or directory, open '${path}'`));
        }
        if (this.unreadable.has(path)) {
            return Promise.reject(new Error(`EACCES: permission denied, open '${path}'`));
        }
        return Promise.resolve(file.content);
    }

    writeFile(path: string, content: string): Promise<void> {
        if (this.failingWrites.has(path)) {
            return Promise.reject(new Error(`ENOSPC: no space left on device, write '${path}'`));
        }
        this.files.set(path, { content, mtimeMs: this.clock });
        return Promise.resolve();
    }

    copyFile(from: string, to: string): Promise<void> {
        const file = this.files.get(from);
        if (file === undefined) {
            return Promise.reject(new Error(`ENOENT: no such file or directory, copyfile '${from}'`));
        }
        this.files.set(to, { ...file });
        return Promise.resolve();
    }

    rename(from: string, to: string): Promise<void> {
        const file = this.files.get(from);
        if (file === undefined) {
            return Promise.reject(new Error(`ENOENT: no such file or directory, rename '${from}'`));
        }
        this.files.delete(from);
        this.files.set(to, file);
        return Promise.resolve();
    }

    remove(path: string): Promise<void> {
        this.files.delete(path);
        return Promise.resolve();
    }

    exists(path: string): Promise<boolean> {
        return Promise.resolve(this.files.has(path) || this.isDirectory(path));
    }

    stat(path: string): Promise<FileStat> {
        const file = this.files.get(path);
        if (file !== undefined) {
            return Promise.resolve({
                isFile: true,
                isDirectory: false,
                isSymbolicLink: false,
                size: Buffer.byteLength(file.content, 'utf8'),
                mtimeMs: file.mtimeMs
            });
        }
        if (this.isDirectory(path)) {
            return Promise.resolve({ isFile: false, isDirectory: true, isSymbolicLink: false, size: 0, mtimeMs: this.clock });
        }
        return Promise.reject(new Error(`ENOENT: no such file or directory, lstat '${path}'`));
    }

    readDir(path: string): Promise<string[]> {
        const prefix = path.endsWith('/') ? path : `${path}/`;
        const entries = new Set<string>();
        for (const filePath of this.files.keys()) {
            if (filePath.startsWith(prefix)) {
                entries.add(filePath.slice(prefix.length).split('/')[0]);
            }
        }
        return Promise.resolve([...entries].sort());
    }

    canAccess(path: string, mode: AccessMode): Promise<boolean> {
        if (!this.files.has(path) && !this.isDirectory(path)) return Promise.resolve(false);
        if (mode === 'read') return Promise.resolve(!this.unreadable.has(path));
        return Promise.resolve(!this.readOnly.has(path));
    }

    // --- Test helpers ---

    /** Set a file directly (convenience for test setup) */
    setFile(path: string, content: string, mtimeMs: number = this.clock): void {
        this.files.set(path, { content, mtimeMs });
    }

    getFile(path: string): string | undefined {
        return this.files.get(path)?.content;
    }

    /** Paths of all stored files, sorted */
    listFiles(): string[] {
        return [...this.files.keys()].sort();
    }

    markReadOnly(path: string): void {
        this.readOnly.add(path);
    }

    markUnreadable(path: string): void {
        this.unreadable.add(path);
    }

    failWritesTo(path: string): void {
        this.failingWrites.add(path);
    }

    /** Move the clock used for new files' modification times */
    setClock(mtimeMs: number): void {
        this.clock = mtimeMs;
    }

    private isDirectory(path: string): boolean {
        const prefix = path.endsWith('/') ? path : `${path}/`;
        for (const filePath of this.files.keys()) {
            if (filePath.startsWith(prefix)) return true;
        }
        return false;
    }
}
