import { CleanError } from '../util/errors';
import { getLogger } from '../util/logger';
import { createStorage } from '../util/storage';
import type { Storage } from '../util/storage';
import type { ProductCleanTarget } from '../config/project';
import { classifyBinaries } from './classifier';
import { matchDistArtifacts } from './distMatcher';
import { planRemovals } from './planner';
import type { BinaryRemovals, DistRemovals, RemovalPlan } from './planner';
import { CascadingRemover, DRY_RUN_PREFIX } from './remover';
import type { RemovalResult, ReportSink } from './remover';

export interface CleanOptions {
    dryRun: boolean;
    sink?: ReportSink;
    storage?: Storage;
}

export interface ProductCleanResult extends RemovalResult {
    productName: string;
}

export const planProductRemovals = (target: ProductCleanTarget, storage: Storage = createStorage()): RemovalPlan => {
    const binaries: BinaryRemovals[] = [...target.outputRoots].map(([outputRoot, products]) => ({
        outputRoot,
        paths: classifyBinaries(outputRoot, products, storage),
    }));
    const dists: DistRemovals[] = target.dists.map((dist) => ({
        distOutputDir: dist.outputDir,
        matches: matchDistArtifacts(dist.outputDir, dist.productName, dist.artifactPatterns, storage),
    }));
    return planRemovals(binaries, dists);
};

/**
 * Remove (or, in a dry run, report) the build and dist outputs of one product.
 */
export const cleanProduct = (target: ProductCleanTarget, options: CleanOptions): ProductCleanResult => {
    const storage = options.storage ?? createStorage();
    const sink = options.sink ?? ((line: string) => getLogger().info(line));

    const plan = planProductRemovals(target, storage);
    getLogger().verbose(`CLEAN_PLANNED: Removal plan built | Product: ${target.productName} | Paths: ${plan.size}`);

    if (options.dryRun) {
        sink(`${DRY_RUN_PREFIX} Clean ${target.productName} will remove paths:`);
    }

    const remover = new CascadingRemover({ dryRun: options.dryRun, sink, storage });
    return { productName: target.productName, ...remover.execute(plan) };
};

/**
 * Clean each product in turn. The first failure aborts the run and is
 * reported against the product it happened in.
 */
export const cleanProducts = (targets: readonly ProductCleanTarget[], options: CleanOptions): ProductCleanResult[] => {
    const results: ProductCleanResult[] = [];
    for (const target of targets) {
        try {
            results.push(cleanProduct(target, options));
        } catch (error: unknown) {
            throw new CleanError(target.productName, error);
        }
    }
    return results;
};
