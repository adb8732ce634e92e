import { PlannerConsistencyError } from '../util/errors';
import type { DistMatch } from './distMatcher';

export interface RemovalEntry {
    /** Absolute path to remove. */
    path: string;
    /** Boundary directory: cascading removal never goes above it. */
    root: string;
    isDirectory: boolean;
}

/**
 * An immutable set of removal entries keyed by path.
 */
export class RemovalPlan {
    private readonly byPath: ReadonlyMap<string, RemovalEntry>;

    private constructor(byPath: Map<string, RemovalEntry>) {
        this.byPath = byPath;
    }

    static empty(): RemovalPlan {
        return new RemovalPlan(new Map());
    }

    /**
     * Build a plan from entries, deduplicating by path. The same path planned
     * with a different root or directory flag is a planner defect.
     */
    static of(entries: Iterable<RemovalEntry>): RemovalPlan {
        const byPath = new Map<string, RemovalEntry>();
        for (const entry of entries) {
            const existing = byPath.get(entry.path);
            if (existing !== undefined && (existing.root !== entry.root || existing.isDirectory !== entry.isDirectory)) {
                throw new PlannerConsistencyError(
                    `path ${entry.path} planned twice with conflicting metadata (root ${existing.root}, directory ${existing.isDirectory} vs root ${entry.root}, directory ${entry.isDirectory})`,
                    entry.path
                );
            }
            byPath.set(entry.path, Object.freeze({ ...entry }));
        }
        return new RemovalPlan(byPath);
    }

    get size(): number {
        return this.byPath.size;
    }

    get(path: string): RemovalEntry | undefined {
        return this.byPath.get(path);
    }

    /** Entries in ascending lexicographic order of their paths. */
    entries(): RemovalEntry[] {
        return [...this.byPath.values()].sort(comparePaths);
    }
}

// code-unit order, independent of locale
const comparePaths = (a: RemovalEntry, b: RemovalEntry): number => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

export interface BinaryRemovals {
    outputRoot: string;
    paths: Iterable<string>;
}

export interface DistRemovals {
    distOutputDir: string;
    matches: readonly DistMatch[];
}

/**
 * Merge classified binaries and matched dist artifacts into one plan, tagging
 * each path with the root boundary it belongs to.
 */
export const planRemovals = (binaries: readonly BinaryRemovals[], dists: readonly DistRemovals[]): RemovalPlan => {
    const entries: RemovalEntry[] = [];
    for (const { outputRoot, paths } of binaries) {
        for (const binaryPath of paths) {
            entries.push({ path: binaryPath, root: outputRoot, isDirectory: false });
        }
    }
    for (const { distOutputDir, matches } of dists) {
        for (const match of matches) {
            entries.push({ path: match.path, root: distOutputDir, isDirectory: match.isDirectory });
        }
    }
    return RemovalPlan.of(entries);
};
