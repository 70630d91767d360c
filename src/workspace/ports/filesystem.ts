/**
 * Port: FileSystem
 *
 * Abstracts disk access so the pipeline and the workspace auditor can run
 * against the real file system or an in-memory one in tests.
 */

export interface FileStat {
    isFile: boolean;
    isDirectory: boolean;
    isSymbolicLink: boolean;
    size: number;
    mtimeMs: number;
}

export type AccessMode = 'read' | 'write';

export interface FileSystem {
    /** Read the entire contents of a file as UTF-8 text */
    readFile(path: string): Promise<string>;

    /** Write UTF-8 text content to a file (creates or overwrites) */
    writeFile(path: string, content: string): Promise<void>;

    copyFile(from: string, to: string): Promise<void>;

    /** Move a file into place, replacing any existing target */
    rename(from: string, to: string): Promise<void>;

    remove(path: string): Promise<void>;

    exists(path: string): Promise<boolean>;

    /** Stat without following symbolic links */
    stat(path: string): Promise<FileStat>;

    /** Names of the entries directly inside a directory */
    readDir(path: string): Promise<string[]>;

    canAccess(path: string, mode: AccessMode): Promise<boolean>;
}
