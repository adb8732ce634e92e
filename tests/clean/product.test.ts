import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { cleanProduct, cleanProducts, planProductRemovals } from '../../src/clean/product';
import type { ProductCleanTarget } from '../../src/config/project';
import { CleanError, FileOperationError } from '../../src/util/errors';
import { parseOSArch } from '../../src/util/osarch';
import { createStorage } from '../../src/util/storage';
import type { Storage } from '../../src/util/storage';
import { templatePattern } from '../../src/clean/patterns';
import { createTempDir, listTree, removeTempDir, writeTree } from '../helpers/tempTree';

describe('product cleanup', () => {
    let tmp: string;

    beforeEach(() => {
        tmp = createTempDir();
        writeTree(tmp, {
            build: {
                'v1.0.0': {
                    'linux-amd64': { app: 'a', tool: 't' },
                    'darwin-arm64': { app: 'a' },
                },
            },
            dist: { 'app-1.0.0.tgz': 'archive', 'tool-1.0.0.tgz': 'archive' },
        });
    });

    afterEach(() => {
        removeTempDir(tmp);
    });

    const targetFor = (productName: string, osArchs: string[]): ProductCleanTarget => ({
        productName,
        outputRoots: new Map([[path.join(tmp, 'build'), new Map([[productName, osArchs.map(parseOSArch)]])]]),
        dists: [
            {
                productName,
                outputDir: path.join(tmp, 'dist'),
                artifactPatterns: [templatePattern(`${productName}-\u0000.tgz`, '\u0000')],
            },
        ],
    });

    it('plans binaries and dist artifacts together', () => {
        const plan = planProductRemovals(targetFor('app', ['linux-amd64', 'darwin-arm64']));

        expect(plan.entries()).toEqual([
            { path: path.join(tmp, 'build', 'v1.0.0', 'darwin-arm64', 'app'), root: path.join(tmp, 'build'), isDirectory: false },
            { path: path.join(tmp, 'build', 'v1.0.0', 'linux-amd64', 'app'), root: path.join(tmp, 'build'), isDirectory: false },
            { path: path.join(tmp, 'dist', 'app-1.0.0.tgz'), root: path.join(tmp, 'dist'), isDirectory: false },
        ]);
    });

    it('writes a header and the removed paths in a dry run', () => {
        const lines: string[] = [];

        const result = cleanProduct(targetFor('app', ['linux-amd64', 'darwin-arm64']), { dryRun: true, sink: (line) => lines.push(line) });

        expect(lines).toEqual([
            '[DRY RUN] Clean app will remove paths:',
            `[DRY RUN]     ${path.join(tmp, 'build', 'v1.0.0', 'darwin-arm64', 'app')}`,
            `[DRY RUN]     ${path.join(tmp, 'build', 'v1.0.0', 'darwin-arm64')}`,
            `[DRY RUN]     ${path.join(tmp, 'build', 'v1.0.0', 'linux-amd64', 'app')}`,
            `[DRY RUN]     ${path.join(tmp, 'dist', 'app-1.0.0.tgz')}`,
        ]);
        expect(result.productName).toBe('app');
        expect(result.removed).toHaveLength(4);
    });

    it('removes the outputs of one product and keeps the others', () => {
        const result = cleanProduct(targetFor('app', ['linux-amd64', 'darwin-arm64']), { dryRun: false, sink: () => undefined });

        expect(result.removed).toHaveLength(4);
        expect(listTree(tmp)).toEqual([
            'build/',
            'build/v1.0.0/',
            'build/v1.0.0/linux-amd64/',
            'build/v1.0.0/linux-amd64/tool',
            'dist/',
            'dist/tool-1.0.0.tgz',
        ]);
    });

    it('cleans products in order until nothing is left', () => {
        const results = cleanProducts(
            [targetFor('app', ['linux-amd64', 'darwin-arm64']), targetFor('tool', ['linux-amd64'])],
            { dryRun: false, sink: () => undefined }
        );

        expect(results.map((r) => r.productName)).toEqual(['app', 'tool']);
        expect(results[1].removed).toEqual([
            path.join(tmp, 'build', 'v1.0.0', 'linux-amd64', 'tool'),
            path.join(tmp, 'build', 'v1.0.0', 'linux-amd64'),
            path.join(tmp, 'build', 'v1.0.0'),
            path.join(tmp, 'build'),
            path.join(tmp, 'dist', 'tool-1.0.0.tgz'),
            path.join(tmp, 'dist'),
        ]);
        expect(listTree(tmp)).toEqual([]);
    });

    it('reports a failure against the product it happened in', () => {
        const real = createStorage();
        const storage: Storage = {
            ...real,
            removeFile: (p: string) => {
                if (path.basename(p) === 'tool') {
                    throw new Error('EPERM: operation not permitted');
                }
                real.removeFile(p);
            },
        };
        const failing = path.join(tmp, 'build', 'v1.0.0', 'linux-amd64', 'tool');

        let caught: unknown;
        try {
            cleanProducts(
                [targetFor('app', ['linux-amd64']), targetFor('tool', ['linux-amd64'])],
                { dryRun: false, sink: () => undefined, storage }
            );
        } catch (error: unknown) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(CleanError);
        expect(caught).toMatchObject({
            productName: 'tool',
            message: `failed to clean tool: failed to remove file: ${failing}`,
        });
        expect(caught instanceof CleanError && caught.cause).toBeInstanceOf(FileOperationError);
    });
});
