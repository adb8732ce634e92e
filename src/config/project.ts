import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigurationError, describeError } from '../util/errors';
import { getLogger } from '../util/logger';
import { currentOSArch, parseOSArch } from '../util/osarch';
import type { OSArch } from '../util/osarch';
import { createDister } from '../dist/dister';
import { artifactPatternsFor } from '../dist/nameTemplate';
import type { ArtifactPattern } from '../clean/patterns';
import { ProjectConfigSchema } from './schema';
import type { ProductConfig, ProjectConfig } from './schema';

/** Per-architecture binaries of one output root: product → OS/archs. */
export type OutputRootTargets = Map<string, readonly OSArch[]>;

export interface DistCandidate {
    productName: string;
    outputDir: string;
    artifactPatterns: ArtifactPattern[];
}

export interface ProductCleanTarget {
    productName: string;
    /** Absolute output root → products whose binaries live there. */
    outputRoots: Map<string, OutputRootTargets>;
    dists: DistCandidate[];
}

export const parseProjectConfig = (content: string, source: string): ProjectConfig => {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (error: unknown) {
        throw new ConfigurationError(`failed to parse YAML in ${source}: ${describeError(error)}`, error);
    }

    const parsed = ProjectConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new ConfigurationError(`invalid configuration in ${source}: ${msg}`);
    }
    return parsed.data;
};

export const loadProjectConfig = (configPath: string): ProjectConfig => {
    let content: string;
    try {
        content = fs.readFileSync(configPath, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigurationError(`failed to read configuration file ${configPath}: ${describeError(error)}`, error);
    }
    getLogger().verbose(`CONFIG_LOADED: Read project configuration | File: ${configPath}`);
    return parseProjectConfig(content, configPath);
};

const osArchsOf = (product: ProductConfig): OSArch[] =>
    product.build.osArchs === undefined ? [currentOSArch()] : product.build.osArchs.map(parseOSArch);

const toCleanTarget = (productName: string, product: ProductConfig, projectDir: string): ProductCleanTarget => {
    const outputRoot = path.resolve(projectDir, product.build.outputDir);
    const dists = product.dist.map((dist): DistCandidate => ({
        productName,
        outputDir: path.resolve(projectDir, dist.outputDir),
        artifactPatterns: artifactPatternsFor(createDister(dist.type, dist.config), dist.nameTemplate, productName),
    }));

    return {
        productName,
        outputRoots: new Map([[outputRoot, new Map([[productName, osArchsOf(product)]])]]),
        dists,
    };
};

/**
 * Resolve the requested products (all of them, sorted by name, when none are
 * requested) into clean targets with absolute paths.
 */
export const resolveCleanTargets = (
    project: ProjectConfig,
    projectDir: string,
    requested: readonly string[] = []
): ProductCleanTarget[] => {
    const known = Object.keys(project.products).sort();
    const names = requested.length === 0 ? known : [...requested];

    const unknown = names.filter((name) => !known.includes(name));
    if (unknown.length > 0) {
        throw new ConfigurationError(`unknown product(s): ${unknown.join(', ')} (configured: ${known.join(', ')})`);
    }

    return names.map((name) => toCleanTarget(name, project.products[name], projectDir));
};
