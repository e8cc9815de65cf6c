import { EventEmitter } from 'events';
import path from 'path';
import {
  StateTransitionError,
  createEvent,
  defaultConcurrency,
  isWithin,
  normalizePath,
  type BuildConfig,
  type BuildEvent,
  type EventInit,
  type Logger,
} from '@cyforge/shared';
import {
  FINGERPRINT_FILENAME,
  FingerprintStore,
  Scanner,
  compileRules,
  loadExclusionRules,
  type ScanResult,
  type SourceUnit,
} from '@cyforge/repo';
import { CommandCompiler, type Compiler } from '@cyforge/exec';
import { BuildReport } from '../scheduler/report';
import { TaskScheduler } from '../scheduler/scheduler';
import { cleanArtifacts } from './cleaner';
import { LifecycleMachine, type LifecycleState, type TerminalState } from './states';
import { toolchainFingerprint } from './toolchain';

export interface LifecycleDeps {
  logger: Logger;
  /** Defaults to a CommandCompiler over `config.compiler` */
  compiler?: Compiler;
  scanner?: Scanner;
  /** Base for relative target, output and temp paths */
  cwd?: string;
}

export interface BuildRequest {
  runId: string;
  config: BuildConfig;
  targetDir: string;
  /** Overrides `config.outputDir` */
  outputDir?: string;
  /** Restricts the build to these unit paths; stale-entry pruning is skipped */
  onlyPaths?: readonly string[];
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  state: TerminalState;
  exitCode: 0 | 1;
  report: BuildReport;
  scan?: ScanResult;
  /** Store entries dropped because their files are gone */
  pruned: string[];
  toolchainVersion?: string;
  outputDir: string;
  durationMs: number;
}

export interface CleanRequest {
  runId: string;
  config: BuildConfig;
  /** Directory to clean; defaults to the working directory */
  root?: string;
  /** Keep patterns added to `config.clean.keep` */
  keep?: readonly string[];
}

export interface CleanRunResult {
  runId: string;
  state: TerminalState;
  exitCode: 0 | 1;
  removed: string[];
  kept: string[];
  warnings: string[];
  durationMs: number;
}

/**
 * Drives a single run through scan, prune, build and report, or through clean.
 *
 * Every transition is checked against the lifecycle table and published twice: as an
 * EventEmitter event named after the BuildEvent type, and on the logger. A controller is
 * good for one run; start another run with a new controller.
 */
export class LifecycleController extends EventEmitter {
  private machine?: LifecycleMachine;
  private runId = '';
  private readonly scanner: Scanner;
  private readonly cwd: string;

  constructor(private readonly deps: LifecycleDeps) {
    super();
    this.scanner = deps.scanner ?? new Scanner({ logger: deps.logger });
    this.cwd = deps.cwd ?? process.cwd();
  }

  get state(): LifecycleState {
    return this.machine?.state ?? 'idle';
  }

  async build(request: BuildRequest): Promise<RunResult> {
    const startedAt = Date.now();
    const { config } = request;
    const targetDir = path.resolve(this.cwd, request.targetDir);
    const outputDir = path.resolve(this.cwd, request.outputDir ?? config.outputDir);
    const cacheDir = path.resolve(targetDir, config.cacheDir);
    const tempDir = path.resolve(this.cwd, config.tempDir);
    const concurrency = config.concurrency ?? defaultConcurrency();
    const compiler = this.deps.compiler ?? new CommandCompiler(config.compiler, this.deps.logger);
    const report = new BuildReport();
    const logger = this.deps.logger;

    const machine = this.start(request.runId, 'scanning');
    await this.publish({
      type: 'RunStarted',
      payload: { mode: 'build', targetDir, outputDir, concurrency },
    });

    let scan: ScanResult | undefined;
    let pruned: string[] = [];
    let toolchainVersion: string | undefined;

    const finish = async (state: TerminalState): Promise<RunResult> => {
      await this.moveTo(machine, state);
      const durationMs = Date.now() - startedAt;
      await this.publish({
        type: 'RunFinished',
        payload: {
          state,
          succeeded: report.succeeded.size,
          failed: report.failed.size,
          skipped: report.skipped.size,
          durationMs,
        },
      });
      return {
        runId: request.runId,
        state,
        exitCode: state === 'failed' ? 1 : report.exitCode,
        report,
        scan,
        pruned,
        toolchainVersion,
        outputDir,
        durationMs,
      };
    };

    const fail = async (error: unknown): Promise<never> => {
      await logger.debug(`Run failed: ${error instanceof Error ? error.message : String(error)}`);
      await finish('failed');
      throw error;
    };

    const schedulerOptions = {
      outDir: outputDir,
      directives: config.compiler.directives,
      artifactExtensions: config.clean.artifactExtensions,
      concurrency,
      signal: request.signal,
    };

    // Scanning
    await this.moveTo(machine, 'scanning');
    try {
      const scanStartedAt = Date.now();
      const matcher = compileRules(await loadExclusionRules(targetDir, { extra: config.exclude }));
      scan = await this.scanner.scan(targetDir, matcher, {
        extension: config.extension,
        concurrency,
        skipDirs: skipDirsWithin(targetDir, [cacheDir, outputDir, tempDir]),
        signal: request.signal,
      });
      for (const warning of scan.warnings) report.warn(warning);
      await this.publish({
        type: 'ScanFinished',
        payload: {
          unitCount: scan.units.length,
          warnings: scan.warnings,
          durationMs: Date.now() - scanStartedAt,
        },
      });
    } catch (error) {
      return fail(error);
    }

    // Pruning
    await this.moveTo(machine, 'pruning');
    let scheduler: TaskScheduler;
    let stale: SourceUnit[];
    try {
      toolchainVersion = toolchainFingerprint(await compiler.version(), config.compiler);
      const store = await FingerprintStore.load(path.join(cacheDir, FINGERPRINT_FILENAME), {
        toolchainVersion,
        logger,
      });
      if (store.loadWarning) report.warn(store.loadWarning);

      let units = scan.units;
      if (request.onlyPaths) {
        const only = new Set(request.onlyPaths);
        units = units.filter((unit) => only.has(unit.relativePath));
      } else {
        pruned = store.prune(units.map((unit) => unit.relativePath));
        if (pruned.length > 0) {
          await logger.debug(`Dropped ${pruned.length} fingerprints of removed files`);
        }
      }

      scheduler = new TaskScheduler({ compiler, store, logger, runId: request.runId });
      stale = await scheduler.partition(units, report, schedulerOptions);
    } catch (error) {
      return fail(error);
    }

    // Building
    await this.moveTo(machine, 'building');
    await logger.info(
      `Compiling ${stale.length} of ${scan.units.length} units with ${concurrency} workers`,
    );
    let buildError: unknown;
    try {
      await scheduler.build(stale, report, schedulerOptions);
    } catch (error) {
      buildError = error;
    }

    // Reporting
    await this.moveTo(machine, 'reporting');
    const missing = report.allMissingModules();
    if (missing.length > 0) {
      await this.publish({ type: 'MissingModulesDetected', payload: { modules: missing } });
    }
    if (buildError !== undefined) {
      return fail(buildError);
    }
    const nothingSucceeded = report.attempted > 0 && report.succeeded.size === 0;
    return finish(nothingSucceeded ? 'failed' : 'done');
  }

  async clean(request: CleanRequest): Promise<CleanRunResult> {
    const startedAt = Date.now();
    const { config } = request;
    const root = path.resolve(this.cwd, request.root ?? '.');
    const machine = this.start(request.runId, 'cleaning');

    await this.publish({ type: 'RunStarted', payload: { mode: 'clean', targetDir: root } });
    await this.moveTo(machine, 'cleaning');
    try {
      const keep = compileRules([...config.clean.keep, ...(request.keep ?? [])]);
      // Fingerprints would otherwise vouch for modules this clean deletes.
      const storeFile = path.resolve(root, config.cacheDir, FINGERPRINT_FILENAME);
      const result = await cleanArtifacts({
        root,
        artifactExtensions: config.clean.artifactExtensions,
        artifactDirs: [...config.clean.artifactDirs, config.outputDir, config.tempDir],
        files: isWithin(root, storeFile) ? [normalizePath(path.relative(root, storeFile))] : [],
        keep,
        logger: this.deps.logger,
      });
      await this.publish({
        type: 'CleanFinished',
        payload: { removed: result.removed, kept: result.kept },
      });
      await this.moveTo(machine, 'done');
      return {
        runId: request.runId,
        state: 'done',
        exitCode: 0,
        ...result,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      await this.moveTo(machine, 'failed');
      throw error;
    }
  }

  private start(runId: string, first: LifecycleState): LifecycleMachine {
    if (this.machine) {
      throw new StateTransitionError(this.machine.state, first);
    }
    this.runId = runId;
    const machine = new LifecycleMachine();
    this.machine = machine;
    return machine;
  }

  private async moveTo(machine: LifecycleMachine, to: LifecycleState): Promise<void> {
    const from = machine.state;
    machine.transition(to);
    await this.publish({ type: 'StateChanged', payload: { from, to } });
  }

  private async publish(init: EventInit): Promise<BuildEvent> {
    const event = createEvent(this.runId, init);
    this.emit(event.type, event);
    await this.deps.logger.log(event);
    return event;
  }
}

/** Root-relative forms of the directories that lie inside `root`. */
function skipDirsWithin(root: string, dirs: readonly string[]): string[] {
  return dirs
    .filter((dir) => dir !== root && isWithin(root, dir))
    .map((dir) => normalizePath(path.relative(root, dir)));
}
