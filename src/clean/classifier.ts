import path from 'path';
import { FileOperationError } from '../util/errors';
import { getLogger } from '../util/logger';
import { formatOSArch } from '../util/osarch';
import type { OSArch } from '../util/osarch';
import { createStorage } from '../util/storage';
import type { DirectoryEntry, Storage } from '../util/storage';

/** Product name → the OS/architectures it is built for. */
export type ProductTargets = ReadonlyMap<string, readonly OSArch[]>;

const indexByOSArch = (products: ProductTargets): Map<string, Set<string>> => {
    const index = new Map<string, Set<string>>();
    for (const [product, osArchs] of products) {
        for (const osArch of osArchs) {
            const key = formatOSArch(osArch);
            const names = index.get(key) ?? new Set<string>();
            names.add(product);
            index.set(key, names);
        }
    }
    return index;
};

const readDirectory = (storage: Storage, dir: string): DirectoryEntry[] => {
    try {
        return storage.listDirectory(dir);
    } catch (error: unknown) {
        throw new FileOperationError('failed to read directory', dir, error);
    }
};

/**
 * Find the binaries of the given products under `outputRoot`, laid out as
 * `outputRoot/<tag>/<os-arch>/<product>`.
 *
 * The tag directory name is not checked. A missing output root is not an
 * error: there is simply nothing to clean.
 */
export const classifyBinaries = (
    outputRoot: string,
    products: ProductTargets,
    storage: Storage = createStorage()
): Set<string> => {
    const binaries = new Set<string>();
    const productsByOSArch = indexByOSArch(products);

    let rootEntries: DirectoryEntry[];
    try {
        rootEntries = storage.listDirectory(outputRoot);
    } catch (error: unknown) {
        getLogger().debug(`CLEAN_BIN_SKIPPED: Output directory not readable | Directory: ${outputRoot} | Error: ${String(error)}`);
        return binaries;
    }

    for (const tagEntry of rootEntries) {
        if (!tagEntry.isDirectory) {
            continue;
        }
        const tagDir = path.join(outputRoot, tagEntry.name);
        for (const osArchEntry of readDirectory(storage, tagDir)) {
            if (!osArchEntry.isDirectory) {
                continue;
            }
            const expected = productsByOSArch.get(osArchEntry.name);
            if (expected === undefined) {
                continue;
            }
            const osArchDir = path.join(tagDir, osArchEntry.name);
            for (const binEntry of readDirectory(storage, osArchDir)) {
                if (expected.has(binEntry.name)) {
                    binaries.add(path.join(osArchDir, binEntry.name));
                }
            }
        }
    }
    return binaries;
};
