import { LifecycleController } from '@cyforge/core';
import type { CleanSummary } from '../output/renderer';
import type { CommandContext } from './context';

/**
 * `--clean [keep]`: removes compiled artifacts under the working directory. The optional
 * value is one more keep pattern, such as the name of a directory to spare.
 */
export async function cleanOutput(
  ctx: CommandContext,
  keep: string | true,
): Promise<CleanSummary> {
  const controller = new LifecycleController({ logger: ctx.logger, cwd: ctx.cwd });
  const result = await controller.clean({
    runId: ctx.runId,
    config: ctx.config,
    keep: keep === true ? [] : [keep],
  });
  return {
    status: result.exitCode === 0 ? 'SUCCESS' : 'FAILURE',
    runId: result.runId,
    root: ctx.cwd,
    removed: result.removed,
    kept: result.kept,
    warnings: result.warnings,
  };
}
