import { BuildConfigSchema, type BuildConfig, type BuildConfigInput } from '@cyforge/shared';

/** Defaults with a pinned toolchain version, so nothing queries a real compiler. */
export function buildConfigForTest(overrides: BuildConfigInput = {}): BuildConfig {
  return BuildConfigSchema.parse({
    ...overrides,
    compiler: { version: 'fake-1.0', ...overrides.compiler },
  });
}
