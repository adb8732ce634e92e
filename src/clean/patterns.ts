import path from 'path';

/**
 * Filename patterns used to recognise distribution artifacts.
 *
 * - `prefix`: the name starts with `prefix` and has at least one more character.
 * - `exact`: the name is exactly `name`.
 * - `template`: the name is the `segments` joined by non-empty wildcards, for
 *   example `['app-', '.tgz']` matches `app-1.0.0.tgz` but not `app-.tgz`.
 */
export type ArtifactPattern =
    | { kind: 'prefix'; prefix: string }
    | { kind: 'exact'; name: string }
    | { kind: 'template'; segments: readonly string[] };

export const prefixPattern = (prefix: string): ArtifactPattern => ({ kind: 'prefix', prefix });

/** Exact match on the basename of `artifactPath`. */
export const exactPattern = (artifactPath: string): ArtifactPattern => ({ kind: 'exact', name: path.basename(artifactPath) });

/**
 * Pattern for every `<productName>-<anything>` entry, whatever its version.
 */
export const productPattern = (productName: string): ArtifactPattern => prefixPattern(`${productName}-`);

/**
 * Build a pattern from a rendered name in which `wildcard` marks the positions
 * that may hold any non-empty text. Without a wildcard this is an exact match.
 */
export const templatePattern = (renderedName: string, wildcard: string): ArtifactPattern => {
    const segments = path.basename(renderedName).split(wildcard);
    if (segments.length === 1) {
        return { kind: 'exact', name: segments[0] };
    }
    return { kind: 'template', segments };
};

const matchesSegments = (name: string, segments: readonly string[]): boolean => {
    const first = segments[0];
    const last = segments[segments.length - 1];
    if (!name.startsWith(first) || !name.endsWith(last)) {
        return false;
    }

    // each wildcard consumes at least one character
    let cursor = first.length + 1;
    const end = name.length - last.length;
    for (const middle of segments.slice(1, -1)) {
        const found = name.indexOf(middle, cursor);
        if (found === -1 || found + middle.length > end - 1) {
            return false;
        }
        cursor = found + middle.length + 1;
    }
    return cursor <= end;
};

export const matchesPattern = (pattern: ArtifactPattern, name: string): boolean => {
    switch (pattern.kind) {
        case 'prefix':
            return name.length > pattern.prefix.length && name.startsWith(pattern.prefix);
        case 'exact':
            return name === pattern.name;
        case 'template':
            return matchesSegments(name, pattern.segments);
    }
};

/**
 * Index of the first pattern that matches `name`, or -1.
 */
export const firstMatch = (patterns: readonly ArtifactPattern[], name: string): number =>
    patterns.findIndex((pattern) => matchesPattern(pattern, name));

export const describePattern = (pattern: ArtifactPattern): string => {
    switch (pattern.kind) {
        case 'prefix':
            return `${pattern.prefix}*`;
        case 'exact':
            return pattern.name;
        case 'template':
            return pattern.segments.join('*');
    }
};
