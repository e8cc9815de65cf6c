import path from 'path';
import { remove } from 'fs-extra';
import type { BuildConfig, Logger } from '@cyforge/shared';
import { CommandCompiler, type Compiler } from '@cyforge/exec';
import type { BuildReport } from '../scheduler/report';
import { LibraryLocator, ModuleInstaller, Packager, type ProcessRunner } from '../packaging';
import { LifecycleController, type RunResult } from './controller';
import type { TerminalState } from './states';

export interface PipelineOptions {
  runId: string;
  config: BuildConfig;
  logger: Logger;
  cwd?: string;
  signal?: AbortSignal;
  /** Install unresolved modules and rebuild the units that needed them */
  retryMissing?: boolean;
  /** Build a wheel and install it once the build succeeded */
  install?: boolean;
  compiler?: Compiler;
  /** Process runner for the Python steps */
  run?: ProcessRunner;
  /** Observes each controller before its run starts */
  onController?: (controller: LifecycleController) => void;
}

export interface PipelineResult {
  runs: RunResult[];
  /** The first run's report with later runs folded in */
  report: BuildReport;
  state: TerminalState;
  exitCode: 0 | 1;
  installedModules: string[];
  wheel?: string;
}

/**
 * Builds `targetDir`, then runs the optional follow-up steps: a retry after installing
 * missing modules, and packaging. Each retry is a separate run with its own run id over the
 * affected units only, sharing the fingerprint store and the compiler.
 */
export async function runBuildPipeline(
  targetDir: string,
  outputDir: string | undefined,
  options: PipelineOptions,
  projectDir: string = options.cwd ?? process.cwd(),
): Promise<PipelineResult> {
  const { config, logger } = options;
  const compiler = options.compiler ?? new CommandCompiler(config.compiler, logger);
  const python = { run: options.run, logger, signal: options.signal };

  const runOnce = (runId: string, onlyPaths?: string[]): Promise<RunResult> => {
    const controller = new LifecycleController({ logger, compiler, cwd: options.cwd });
    options.onController?.(controller);
    return controller.build({
      runId,
      config,
      targetDir,
      outputDir,
      onlyPaths,
      signal: options.signal,
    });
  };

  const first = await runOnce(options.runId);
  const runs = [first];
  const report = first.report;

  let installedModules: string[] = [];
  const missing = first.report.allMissingModules();
  if (options.retryMissing && missing.length > 0 && !options.signal?.aborted) {
    installedModules = await new ModuleInstaller(config.packaging, python).install(missing);
    const retry = await runOnce(`${options.runId}-retry`, [...first.report.missingModules.keys()]);
    runs.push(retry);
    report.merge(retry.report);
  }

  const state: TerminalState =
    report.attempted > 0 && report.succeeded.size === 0 ? 'failed' : 'done';
  const exitCode: 0 | 1 = state === 'failed' ? 1 : report.exitCode;

  let wheel: string | undefined;
  if (options.install) {
    if (exitCode === 0) {
      wheel = await new Packager(config.packaging, python).buildAndInstall(projectDir);
    } else {
      await logger.warn('Build failed; skipping wheel build and install');
    }
  }

  return { runs, report, state, exitCode, installedModules, wheel };
}

/**
 * Compiles an installed library: stages a copy of its sources under the temp directory,
 * builds it in place, packages and reinstalls it. The copy is removed afterwards.
 */
export async function runLibraryPipeline(
  name: string,
  options: PipelineOptions,
): Promise<PipelineResult & { libraryDir: string }> {
  const { config } = options;
  const locator = new LibraryLocator(config.packaging, {
    run: options.run,
    logger: options.logger,
    signal: options.signal,
  });
  const sourceDir = await locator.locate(name);
  const tempDir = path.resolve(options.cwd ?? process.cwd(), config.tempDir);
  const staged = await locator.stage(name, sourceDir, tempDir);
  try {
    const result = await runBuildPipeline(
      staged,
      path.join(staged, 'build'),
      { ...options, install: true },
      staged,
    );
    return { ...result, libraryDir: sourceDir };
  } finally {
    await remove(staged);
  }
}
