// Commands
export { execute as clean } from './commands/clean';
export type { Config } from './types';

// Cleanup engine
export * from './clean/classifier';
export * from './clean/distMatcher';
export * from './clean/patterns';
export * from './clean/planner';
export * from './clean/remover';
export * from './clean/product';

// Distribution types
export * from './dist/dister';
export * from './dist/manual';
export * from './dist/nameTemplate';

// Configuration
export * from './config/schema';
export * from './config/project';

// Utilities
export * from './util/errors';
export * from './util/logger';
export * from './util/osarch';
export * from './util/storage';
