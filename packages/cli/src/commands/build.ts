import path from 'path';
import {
  listArtifacts,
  runBuildPipeline,
  runLibraryPipeline,
  type PipelineOptions,
  type PipelineResult,
} from '@cyforge/core';
import type { BuildSummary } from '../output/renderer';
import type { CommandContext } from './context';

export interface BuildFlags {
  target?: string;
  output?: string;
  install?: boolean;
  lib?: string;
  list?: boolean;
  retryMissing?: boolean;
}

function pipelineOptions(ctx: CommandContext, flags: BuildFlags): PipelineOptions {
  return {
    runId: ctx.runId,
    config: ctx.config,
    logger: ctx.logger,
    cwd: ctx.cwd,
    signal: ctx.signal,
    retryMissing: flags.retryMissing,
    install: flags.install,
    compiler: ctx.compiler,
    run: ctx.run,
  };
}

export function summarize(
  ctx: CommandContext,
  result: PipelineResult,
  extra: Pick<BuildSummary, 'targetDir' | 'library' | 'logFile'>,
): BuildSummary {
  const report = result.report.toJSON();
  const first = result.runs[0];
  return {
    status: result.exitCode === 0 ? 'SUCCESS' : 'FAILURE',
    runId: ctx.runId,
    state: result.state,
    exitCode: result.exitCode,
    ...extra,
    outputDir: first.outputDir,
    succeeded: report.succeeded,
    skipped: report.skipped.length,
    failed: report.failed.map((f) => ({
      path: f.path,
      code: f.code,
      message: f.message,
      exitCode: f.exitCode,
      diagnostics: f.diagnostics,
      missingModules: f.missingModules,
    })),
    cancelled: report.cancelled,
    missingModules: result.report.allMissingModules(),
    installedModules: result.installedModules,
    warnings: report.warnings,
    wheel: result.wheel,
    durationMs: result.runs.reduce((sum, run) => sum + run.durationMs, 0),
  };
}

/** `--target`: builds a source tree, optionally packaging it afterwards. */
export async function buildTarget(
  ctx: CommandContext,
  flags: BuildFlags & { target: string },
  logFile?: string,
): Promise<BuildSummary> {
  const result = await runBuildPipeline(flags.target, flags.output, pipelineOptions(ctx, flags));
  const summary = summarize(ctx, result, {
    targetDir: path.resolve(ctx.cwd, flags.target),
    logFile,
  });
  if (flags.list) {
    summary.artifacts = await listArtifacts(
      summary.outputDir,
      ctx.config.clean.artifactExtensions,
    );
  }
  return summary;
}

/** `--lib`: compiles and reinstalls an installed library. */
export async function buildLibrary(
  ctx: CommandContext,
  flags: BuildFlags & { lib: string },
  logFile?: string,
): Promise<BuildSummary> {
  const result = await runLibraryPipeline(flags.lib, pipelineOptions(ctx, flags));
  return summarize(ctx, result, { library: flags.lib, logFile });
}
