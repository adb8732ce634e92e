/**
 * Error types raised by the cleanup engine and its configuration layer.
 */

/**
 * A filesystem read or delete failed. Always fatal for the current product.
 */
export class FileOperationError extends Error {
    constructor(message: string, public readonly path: string, cause?: unknown) {
        super(`${message}: ${path}`, { cause });
        this.name = 'FileOperationError';
    }
}

/**
 * The removal plan is inconsistent: a path outside its root boundary, or the
 * same path planned twice with different metadata. This is a defect in
 * whatever built the plan and is never retried.
 */
export class PlannerConsistencyError extends Error {
    constructor(message: string, public readonly path: string) {
        super(message);
        this.name = 'PlannerConsistencyError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ConfigurationError';
    }
}

export class DistError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'DistError';
    }
}

/**
 * Wraps any failure that happened while cleaning one product.
 */
export class CleanError extends Error {
    constructor(public readonly productName: string, cause: unknown) {
        super(`failed to clean ${productName}: ${describeError(cause)}`, { cause });
        this.name = 'CleanError';
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
