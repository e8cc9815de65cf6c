import { z } from 'zod';

/**
 * Cython compiler directives applied to every annotated module.
 */
export const DEFAULT_DIRECTIVES: Record<string, boolean | number> = {
  boundscheck: false,
  wraparound: false,
  nonecheck: false,
  cdivision: true,
  language_level: 3,
  initializedcheck: false,
  infer_types: true,
};

export const CompilerConfigSchema = z.object({
  /** Executable invoked once per unit */
  command: z.string().min(1).default('cythonize'),
  /**
   * Argument template. `{source}`, `{outDir}` and `{directives}` are substituted per unit.
   */
  args: z
    .array(z.string())
    .default(['-3', '--inplace', '--force', '-X', '{directives}', '{source}']),
  /** Pinned toolchain version; queried with `<command> --version` when absent */
  version: z.string().optional(),
  versionArgs: z.array(z.string()).default(['--version']),
  timeoutMs: z.number().int().min(1000).default(10 * 60 * 1000),
  gracePeriodMs: z.number().int().min(0).default(5000),
  directives: z
    .record(z.string(), z.union([z.boolean(), z.number(), z.string()]))
    .default(DEFAULT_DIRECTIVES),
  maxOutputBytes: z.number().int().min(1024).default(1024 * 1024),
});

export const CleanConfigSchema = z.object({
  artifactExtensions: z.array(z.string()).default(['.so', '.pyd']),
  artifactDirs: z.array(z.string()).default(['build', 'cython_cache']),
  keep: z.array(z.string()).default([]),
});

export const PackagingConfigSchema = z.object({
  python: z.string().default('python3'),
  wheelDir: z.string().default('dist'),
  timeoutMs: z.number().int().min(1000).default(15 * 60 * 1000),
});

export const BuildConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Output directory for annotated sources and compiled artifacts, relative to the cwd */
  outputDir: z.string().default('build_lib'),
  /** Cache directory for the fingerprint store and logs; relative paths resolve against the target */
  cacheDir: z.string().default('.cyforge'),
  /** Scratch area for library builds */
  tempDir: z.string().default('.cyforge_tmp'),
  /** Extension of the source files to compile */
  extension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, 'must look like ".py"')
    .default('.py'),
  /** Extra exclusion rules appended after exclude.txt / .gitignore */
  exclude: z.array(z.string()).default([]),
  /** Worker pool size; defaults to the available hardware parallelism */
  concurrency: z.number().int().min(1).max(256).optional(),
  compiler: CompilerConfigSchema.default({}),
  clean: CleanConfigSchema.default({}),
  packaging: PackagingConfigSchema.default({}),
});

export type CompilerConfig = z.infer<typeof CompilerConfigSchema>;
export type CleanConfig = z.infer<typeof CleanConfigSchema>;
export type PackagingConfig = z.infer<typeof PackagingConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
/** Config as written in YAML files or passed as flags, before defaults are applied */
export type BuildConfigInput = z.input<typeof BuildConfigSchema>;
