/**
 * Configuration Schema Module
 *
 * Zod schema definitions for `provision.yml`.
 */

import { z } from 'zod';

import { DEFAULT_DOWNLOAD_HOST } from '../catalog/catalog.js';

export const ScopeSchema = z.enum(['machine', 'user']);

/**
 * YAML reads an unquoted `2.4` as a number; accept it, but a quoted string
 * is the only way to express versions such as '2.10'.
 */
export const VersionRequirementSchema = z.union([
  z.string().min(1),
  z.number().nonnegative().transform((value) => String(value)),
]);

export const InstallRootsSchema = z
  .object({
    runtime: z.string().min(1).optional(),
    framework: z.string().min(1).optional(),
    extensions: z.string().min(1).optional(),
  })
  .strict()
  .default({});

export const PackageManagerSchema = z
  .object({
    command: z.string().min(1),
    /** `{package}` is replaced by the dependency's package name */
    args: z.array(z.string()).default(['install', '{package}']),
  })
  .strict();

export const DependencyOverrideSchema = z
  .object({
    name: z.string().min(1),
    /** null removes the version requirement */
    min_version: VersionRequirementSchema.nullable().optional(),
    download_url: z.string().url().optional(),
    extracted_dir: z.string().min(1).optional(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    version: z.literal(1).default(1),
    scope: ScopeSchema.default('machine'),
    download_host: z.string().url().default(DEFAULT_DOWNLOAD_HOST),
    install_roots: InstallRootsSchema,
    package_manager: PackageManagerSchema.optional(),
    dependencies: z.array(DependencyOverrideSchema).default([]),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type DependencyOverrideConfig = z.infer<typeof DependencyOverrideSchema>;
export type PackageManager = z.infer<typeof PackageManagerSchema>;
