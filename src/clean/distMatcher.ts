import path from 'path';
import { getLogger } from '../util/logger';
import { createStorage } from '../util/storage';
import type { DirectoryEntry, Storage } from '../util/storage';
import { describePattern, firstMatch, productPattern } from './patterns';
import type { ArtifactPattern } from './patterns';

export interface DistMatch {
    path: string;
    isDirectory: boolean;
}

/**
 * Find the entries of `distOutputDir` that are distribution artifacts of
 * `productName`.
 *
 * Matchers are tried in order and the first match wins: the version-agnostic
 * `<productName>-*` pattern, then `artifactPatterns`. A missing or unreadable
 * directory means there is no distribution output yet and yields no matches.
 */
export const matchDistArtifacts = (
    distOutputDir: string,
    productName: string,
    artifactPatterns: readonly ArtifactPattern[],
    storage: Storage = createStorage()
): DistMatch[] => {
    const logger = getLogger();
    const patterns = [productPattern(productName), ...artifactPatterns];

    let entries: DirectoryEntry[];
    try {
        entries = storage.listDirectory(distOutputDir);
    } catch (error: unknown) {
        logger.debug(`DIST_MATCH_SKIPPED: Distribution directory not readable | Directory: ${distOutputDir} | Error: ${String(error)}`);
        return [];
    }

    const matches: DistMatch[] = [];
    for (const entry of entries) {
        const index = firstMatch(patterns, entry.name);
        if (index === -1) {
            continue;
        }
        logger.silly(`DIST_MATCH: ${entry.name} matched ${describePattern(patterns[index])}`);
        matches.push({ path: path.join(distOutputDir, entry.name), isDirectory: entry.isDirectory });
    }
    return matches;
};
