import { existsSync } from 'fs';
import path from 'path';
import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  isUserError,
  type BuildConfig,
  type LogLevel,
  type Logger,
} from '@cyforge/shared';
import type { Compiler } from '@cyforge/exec';
import { ConfigLoader, type ProcessRunner } from '@cyforge/core';
import { OutputRenderer } from './output/renderer';
import { buildLibrary, buildTarget } from './commands/build';
import { cleanOutput } from './commands/clean';
import { listOutput } from './commands/list';
import type { CommandContext } from './commands/context';

export interface CliOptions {
  target?: string;
  output?: string;
  install?: boolean;
  lib?: string;
  clean?: string | true;
  list?: boolean;
  jobs?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  retryMissing?: boolean;
}

/** Seams for tests and the bin entry; everything defaults to the real process. */
export interface CliDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  signal?: AbortSignal;
  compiler?: Compiler;
  run?: ProcessRunner;
  runId?: string;
}

export function createProgram(): Command {
  return new Command()
    .name('cyforge')
    .description('Compile Python sources to native extension modules with Cython, incrementally')
    .version(version)
    .option('-t, --target <dir>', 'Target folder to compile')
    .option('-o, --output <dir>', 'Output directory (default: build_lib)')
    .option('-i, --install', 'Build a wheel and install it')
    .option('-l, --lib <name>', 'Name of an installed library to compile and reinstall')
    .option('-c, --clean [keep]', 'Remove compiled output, sparing paths matching [keep]')
    .option('--list', 'List compiled modules with their sizes')
    .option('-j, --jobs <n>', 'Number of parallel workers')
    .option('--config <path>', 'Path to configuration file')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--retry-missing', 'Install missing modules, then rebuild the affected files');
}

export function parseJobs(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new UsageError(`--jobs must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

function logLevel(options: CliOptions): LogLevel {
  if (options.verbose) return 'debug';
  return options.json ? 'warn' : 'info';
}

function createLogger(
  options: CliOptions,
  config: BuildConfig,
  baseDir: string,
  runId: string,
): { logger: Logger; logFile?: string; flush: () => Promise<void> } {
  const level = logLevel(options);
  // A file logger would create a missing target on its first write; the scan reports it instead.
  const fileLogging =
    options.clean === undefined && (!!options.lib || (!!options.target && existsSync(baseDir)));
  if (!fileLogging) {
    return { logger: new ConsoleLogger({ level }), flush: () => Promise.resolve() };
  }
  const logFile = path.join(path.resolve(baseDir, config.cacheDir), 'logs', `build-${runId}.jsonl`);
  const logger = new JsonlLogger(logFile, {}, level);
  return { logger, logFile, flush: () => logger.flush() };
}

async function execute(options: CliOptions, deps: CliDeps): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const renderer = new OutputRenderer(!!options.json, !!options.verbose);

  if (options.clean === undefined && !options.lib && !options.target && !options.list) {
    throw new UsageError('Please provide --target, --lib, --clean or --list');
  }
  const jobs = parseJobs(options.jobs);
  const baseDir = options.target ? path.resolve(cwd, options.target) : cwd;
  const config = ConfigLoader.load({
    configPath: options.config ? path.resolve(cwd, options.config) : undefined,
    cwd: baseDir,
    env: deps.env,
    homeDir: deps.homeDir,
    flags: { outputDir: options.output, concurrency: jobs },
  });

  const runId = deps.runId ?? Date.now().toString();
  const { logger, logFile, flush } = createLogger(options, config, baseDir, runId);
  const ctx: CommandContext = {
    cwd,
    config,
    runId,
    logger,
    renderer,
    signal: deps.signal,
    compiler: deps.compiler,
    run: deps.run,
  };

  try {
    if (options.clean !== undefined) {
      const summary = await cleanOutput(ctx, options.clean);
      renderer.renderClean(summary);
      return 0;
    }
    if (options.lib) {
      const summary = await buildLibrary(ctx, { ...options, lib: options.lib }, logFile);
      renderer.renderBuild(summary);
      return summary.exitCode;
    }
    if (options.target) {
      const summary = await buildTarget(ctx, { ...options, target: options.target }, logFile);
      renderer.renderBuild(summary);
      return summary.exitCode;
    }
    renderer.renderArtifacts(await listOutput(ctx, options.output));
    return 0;
  } finally {
    await flush();
  }
}

/**
 * Parses `argv`, runs the selected mode and returns the process exit code: 0 on success,
 * 1 when the run failed and 2 for usage or configuration errors.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram();
  program.exitOverride();

  let exitCode = 0;
  program.action(async (options: CliOptions) => {
    exitCode = await execute(options, deps);
  });

  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed its message; help and version exit cleanly.
      return e.exitCode === 0 ? 0 : 2;
    }
    const opts = program.opts<CliOptions>();
    new OutputRenderer(!!opts.json, !!opts.verbose).error(e);
    return isUserError(e) ? 2 : 1;
  }
}
