import fs from 'fs';

export interface DirectoryEntry {
    name: string;
    isDirectory: boolean;
}

/**
 * Synchronous filesystem access used by the cleanup engine.
 *
 * Every method throws the underlying error on failure; callers decide which
 * failures are absorbed and which are wrapped.
 */
export interface Storage {
    /** True for anything with a directory entry, dangling symlinks included. */
    exists: (path: string) => boolean;
    isDirectory: (path: string) => boolean;
    /** Immediate entries of a directory, without following symlinks. */
    listDirectory: (path: string) => DirectoryEntry[];
    removeFile: (path: string) => void;
    removeDirectory: (path: string) => void;
}

export const createStorage = (): Storage => ({
    exists: (path: string): boolean => fs.lstatSync(path, { throwIfNoEntry: false }) !== undefined,

    isDirectory: (path: string): boolean => fs.statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false,

    listDirectory: (path: string): DirectoryEntry[] =>
        fs.readdirSync(path, { withFileTypes: true }).map((entry) => ({
            name: entry.name,
            isDirectory: entry.isDirectory(),
        })),

    removeFile: (path: string): void => {
        fs.unlinkSync(path);
    },

    removeDirectory: (path: string): void => {
        fs.rmSync(path, { recursive: true });
    },
});
