/**
 * Options for a single command invocation.
 */
export interface Config {
    dryRun?: boolean;
    verbose?: boolean;
    debug?: boolean;
    /** Directory that output and config paths are resolved against. Defaults to the working directory. */
    projectDirectory?: string;
    /** Project configuration file, relative to the project directory. */
    configFile?: string;
    /** Products to clean; every configured product when empty. */
    products?: string[];
}
