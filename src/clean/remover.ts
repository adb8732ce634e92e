import path from 'path';
import { FileOperationError, PlannerConsistencyError } from '../util/errors';
import { getLogger } from '../util/logger';
import { createStorage } from '../util/storage';
import type { DirectoryEntry, Storage } from '../util/storage';
import type { RemovalPlan } from './planner';

export const DRY_RUN_PREFIX = '[DRY RUN]';

/** Receives one report line at a time. */
export type ReportSink = (line: string) => void;

export const formatRemovedLine = (removedPath: string): string => `${DRY_RUN_PREFIX}     ${removedPath}`;

/**
 * Paths removed (or, in a dry run, treated as removed) during one execution.
 * Emptiness checks consult it so that a dry run sees the same directory
 * contents a real run would.
 */
export class VirtualRemovedSet {
    private readonly paths = new Set<string>();

    add(removedPath: string): void {
        this.paths.add(removedPath);
    }

    has(candidate: string): boolean {
        return this.paths.has(candidate);
    }

    /** Removed paths in the order they were added. */
    toArray(): string[] {
        return [...this.paths];
    }
}

/**
 * Where the upward walk from a removed path ended.
 */
export type CascadeState =
    | { kind: 'cascading'; dir: string }
    | { kind: 'stopped-at-root'; dir: string }
    | { kind: 'stopped-missing-parent'; dir: string }
    | { kind: 'stopped-non-empty'; dir: string };

export type CascadeStopState = Exclude<CascadeState, { kind: 'cascading' }>;

export interface RemoverOptions {
    dryRun: boolean;
    sink?: ReportSink;
    storage?: Storage;
}

export interface RemovalResult {
    /** Every removed path in processing order: leaf, then cascaded parents, then root. */
    removed: string[];
}

/**
 * True when `candidate` lies strictly below `root` once both are resolved, so
 * `..` segments cannot climb out of the root.
 */
export const isUnderRoot = (candidate: string, root: string): boolean => {
    const relative = path.relative(path.resolve(root), path.resolve(candidate));
    return relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
};

/**
 * Executes a removal plan, deleting each planned path and then every ancestor
 * directory that the removal left empty, up to and including the entry's root.
 *
 * In dry-run mode nothing is touched on disk; the removed paths are reported to
 * the sink instead and the same sequence is returned as a real run would
 * produce from the same starting state.
 */
export class CascadingRemover {
    private readonly dryRun: boolean;
    private readonly sink: ReportSink;
    private readonly storage: Storage;

    constructor(options: RemoverOptions) {
        this.dryRun = options.dryRun;
        this.sink = options.sink ?? ((line: string) => getLogger().info(line));
        this.storage = options.storage ?? createStorage();
    }

    execute(plan: RemovalPlan): RemovalResult {
        const removedSet = new VirtualRemovedSet();

        for (const entry of plan.entries()) {
            const root = path.resolve(entry.root);
            const target = path.resolve(entry.path);
            if (!isUnderRoot(target, root)) {
                throw new PlannerConsistencyError(`root dir path ${entry.root} does not contain ${entry.path}`, entry.path);
            }

            this.removeLeaf(target, entry.isDirectory);
            this.markRemoved(target, removedSet);

            const stop = this.cascade(target, root, removedSet);
            getLogger().silly(`CLEAN_CASCADE: ${target} | Stopped: ${stop.kind} | Directory: ${stop.dir}`);

            this.removeIfEmpty(root, removedSet);
        }

        return { removed: removedSet.toArray() };
    }

    /**
     * Walk upward from the parent of `removedPath` until the walk stops.
     */
    cascade(removedPath: string, root: string, removedSet: VirtualRemovedSet): CascadeStopState {
        let state: CascadeState = { kind: 'cascading', dir: path.dirname(removedPath) };
        while (state.kind === 'cascading') {
            state = this.step(state.dir, root, removedSet);
        }
        return state;
    }

    /**
     * One transition of the cascade: decide what happens to `dir`.
     */
    step(dir: string, root: string, removedSet: VirtualRemovedSet): CascadeState {
        if (dir === root) {
            return { kind: 'stopped-at-root', dir };
        }
        if (!this.isPresent(dir, removedSet)) {
            return { kind: 'stopped-missing-parent', dir };
        }
        if (!this.removeIfEmpty(dir, removedSet)) {
            return { kind: 'stopped-non-empty', dir };
        }
        return { kind: 'cascading', dir: path.dirname(dir) };
    }

    /**
     * Remove `dir` if it is present and, as far as this execution is concerned,
     * empty. Returns whether it was removed.
     */
    removeIfEmpty(dir: string, removedSet: VirtualRemovedSet): boolean {
        if (!this.isPresent(dir, removedSet)) {
            return false;
        }

        let entries: DirectoryEntry[];
        try {
            entries = this.storage.listDirectory(dir);
        } catch (error: unknown) {
            throw new FileOperationError('failed to read directory', dir, error);
        }
        if (this.dryRun) {
            entries = entries.filter((entry) => !removedSet.has(path.join(dir, entry.name)));
        }
        if (entries.length !== 0) {
            return false;
        }

        if (!this.dryRun) {
            try {
                this.storage.removeDirectory(dir);
            } catch (error: unknown) {
                throw new FileOperationError('failed to remove directory', dir, error);
            }
        }
        this.markRemoved(dir, removedSet);
        return true;
    }

    private markRemoved(removedPath: string, removedSet: VirtualRemovedSet): void {
        removedSet.add(removedPath);
        if (this.dryRun) {
            this.sink(formatRemovedLine(removedPath));
        }
    }

    private removeLeaf(target: string, isDirectory: boolean): void {
        if (this.dryRun || !this.storage.exists(target)) {
            return;
        }
        try {
            if (isDirectory) {
                this.storage.removeDirectory(target);
            } else {
                this.storage.removeFile(target);
            }
        } catch (error: unknown) {
            throw new FileOperationError(`failed to remove ${isDirectory ? 'directory' : 'file'}`, target, error);
        }
    }

    // a path already removed in this execution counts as absent in both modes
    private isPresent(candidate: string, removedSet: VirtualRemovedSet): boolean {
        return !removedSet.has(candidate) && this.storage.exists(candidate);
    }
}
