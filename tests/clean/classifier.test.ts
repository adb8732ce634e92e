import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { classifyBinaries } from '../../src/clean/classifier';
import { FileOperationError } from '../../src/util/errors';
import { parseOSArch } from '../../src/util/osarch';
import { createStorage } from '../../src/util/storage';
import type { Storage } from '../../src/util/storage';
import { createTempDir, removeTempDir, writeTree } from '../helpers/tempTree';

describe('classifyBinaries', () => {
    let tmp: string;
    let out: string;

    beforeEach(() => {
        tmp = createTempDir();
        out = path.join(tmp, 'out');
    });

    afterEach(() => {
        removeTempDir(tmp);
    });

    const products = new Map([
        ['app', ['linux-amd64', 'darwin-amd64'].map(parseOSArch)],
        ['tool', ['linux-amd64'].map(parseOSArch)],
    ]);

    it('selects binaries of the requested products and architectures', () => {
        writeTree(out, {
            'stray.txt': 'not a tag dir',
            'v1.0.0': {
                'notes.txt': 'not an os-arch dir',
                'linux-amd64': { app: 'a', tool: 't', other: 'o', 'app.sha256': 's' },
                'darwin-amd64': { app: 'a', tool: 't' },
                'windows-amd64': { app: 'a' },
            },
            snapshot: { 'linux-amd64': { tool: 't' } },
        });

        const result = classifyBinaries(out, products);

        expect([...result].sort()).toEqual([
            path.join(out, 'snapshot', 'linux-amd64', 'tool'),
            path.join(out, 'v1.0.0', 'darwin-amd64', 'app'),
            path.join(out, 'v1.0.0', 'linux-amd64', 'app'),
            path.join(out, 'v1.0.0', 'linux-amd64', 'tool'),
        ]);
    });

    it('ignores a file named like an os-arch directory', () => {
        writeTree(out, { tag: { 'linux-amd64': 'a file, not a directory' } });

        expect(classifyBinaries(out, products).size).toBe(0);
    });

    it('returns nothing when the output directory does not exist', () => {
        expect(classifyBinaries(path.join(tmp, 'missing'), products).size).toBe(0);
    });

    it('returns nothing for products without architectures', () => {
        writeTree(out, { tag: { 'linux-amd64': { app: 'a' } } });

        expect(classifyBinaries(out, new Map([['app', []]])).size).toBe(0);
    });

    it('fails when a tag directory cannot be read', () => {
        writeTree(out, { tag: { 'linux-amd64': { app: 'a' } } });
        const tagDir = path.join(out, 'tag');
        const real = createStorage();
        const storage: Storage = {
            ...real,
            listDirectory: (p: string) => {
                if (p === tagDir) {
                    throw new Error('EACCES: permission denied');
                }
                return real.listDirectory(p);
            },
        };

        expect(() => classifyBinaries(out, products, storage)).toThrow(FileOperationError);
        expect(() => classifyBinaries(out, products, storage)).toThrow(`failed to read directory: ${tagDir}`);
    });
});
