import type { BuildConfig, Logger } from '@cyforge/shared';
import type { Compiler } from '@cyforge/exec';
import type { ProcessRunner } from '@cyforge/core';
import type { OutputRenderer } from '../output/renderer';

/** Everything a command needs, resolved once from flags and config. */
export interface CommandContext {
  cwd: string;
  config: BuildConfig;
  runId: string;
  logger: Logger;
  renderer: OutputRenderer;
  signal?: AbortSignal;
  compiler?: Compiler;
  run?: ProcessRunner;
}
