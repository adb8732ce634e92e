import { z } from 'zod';
import { DEFAULT_NAME_TEMPLATE } from '../dist/nameTemplate';

export const DEFAULT_CONFIG_FILE = 'dist.yml';
export const DEFAULT_BUILD_OUTPUT_DIRECTORY = 'build';
export const DEFAULT_DIST_OUTPUT_DIRECTORY = 'dist';

const BuildSchema = z.object({
    outputDir: z.string().min(1).default(DEFAULT_BUILD_OUTPUT_DIRECTORY),
    // os-arch strings; the current platform when omitted
    osArchs: z.array(z.string().min(1)).optional(),
});

const DistSchema = z.object({
    type: z.string().min(1),
    outputDir: z.string().min(1).default(DEFAULT_DIST_OUTPUT_DIRECTORY),
    nameTemplate: z.string().min(1).default(DEFAULT_NAME_TEMPLATE),
    config: z.unknown().optional(),
});

const ProductSchema = z.object({
    build: BuildSchema.default({}),
    dist: z.array(DistSchema).default([]),
});

export const ProjectConfigSchema = z.object({
    products: z.record(z.string().min(1), ProductSchema),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ProductConfig = z.infer<typeof ProductSchema>;
export type DistConfig = z.infer<typeof DistSchema>;
