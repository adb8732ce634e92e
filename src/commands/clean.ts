#!/usr/bin/env node
import path from 'path';
import { DEFAULT_CONFIG_FILE } from '../config/schema';
import { loadProjectConfig, resolveCleanTargets } from '../config/project';
import { cleanProducts } from '../clean/product';
import type { ProductCleanResult } from '../clean/product';
import { CleanError, ConfigurationError, describeError } from '../util/errors';
import { getDryRunLogger, getLogger, setLogLevel } from '../util/logger';
import type { Config } from '../types';

const executeInternal = async (runConfig: Config): Promise<ProductCleanResult[]> => {
    const isDryRun = runConfig.dryRun || false;
    if (runConfig.debug) {
        setLogLevel('debug');
    } else if (runConfig.verbose) {
        setLogLevel('verbose');
    }
    const logger = getDryRunLogger(isDryRun);

    const projectDirectory = path.resolve(runConfig.projectDirectory || process.cwd());
    const configPath = path.resolve(projectDirectory, runConfig.configFile || DEFAULT_CONFIG_FILE);

    const project = loadProjectConfig(configPath);
    const targets = resolveCleanTargets(project, projectDirectory, runConfig.products);

    logger.verbose(`CLEAN_STARTING: Cleaning product outputs | Products: ${targets.map((t) => t.productName).join(', ')} | Project: ${projectDirectory}`);

    // report lines already carry their own dry-run marker
    const report = getLogger();
    const results = cleanProducts(targets, { dryRun: isDryRun, sink: (line) => report.info(line) });

    for (const result of results) {
        logger.verbose(`CLEAN_SUCCESS: Cleaned product outputs | Product: ${result.productName} | Paths: ${result.removed.length}`);
    }
    return results;
};

export const execute = async (runConfig: Config): Promise<ProductCleanResult[]> => {
    try {
        return await executeInternal(runConfig);
    } catch (error: unknown) {
        const logger = getLogger();

        if (error instanceof CleanError || error instanceof ConfigurationError) {
            logger.error(`CLEAN_COMMAND_FAILED: Clean command failed | Error: ${error.message}`);
            if (error.cause instanceof Error) {
                logger.debug(`Caused by: ${error.cause.message}`);
            }
            throw error;
        }

        // Unexpected errors
        logger.error(`CLEAN_UNEXPECTED_ERROR: Clean encountered unexpected error | Error: ${describeError(error)} | Type: unexpected`);
        throw error;
    }
};
