import { ConfigurationError } from './errors';

export interface OSArch {
    os: string;
    arch: string;
}

/**
 * Canonical `os-arch` form, which is also the name of the per-architecture
 * output directory.
 */
export const formatOSArch = (osArch: OSArch): string => `${osArch.os}-${osArch.arch}`;

export const parseOSArch = (value: string): OSArch => {
    const parts = value.split('-');
    if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
        throw new ConfigurationError(`not a valid OS-architecture value (expected "os-arch"): "${value}"`);
    }
    return { os: parts[0], arch: parts[1] };
};

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
    darwin: 'darwin',
    linux: 'linux',
    win32: 'windows',
    freebsd: 'freebsd',
};

const ARCH_NAMES: Partial<Record<string, string>> = {
    x64: 'amd64',
    arm64: 'arm64',
    arm: 'arm',
    ia32: '386',
};

/**
 * The OS/architecture of the running process, in the naming used for output
 * directories.
 */
export const currentOSArch = (platform: NodeJS.Platform = process.platform, arch: string = process.arch): OSArch => {
    const os = OS_NAMES[platform];
    if (os === undefined) {
        throw new ConfigurationError(`Unsupported platform: ${platform}`);
    }
    const cpu = ARCH_NAMES[arch];
    if (cpu === undefined) {
        throw new ConfigurationError(`Unsupported architecture: ${arch}`);
    }
    return { os, arch: cpu };
};
