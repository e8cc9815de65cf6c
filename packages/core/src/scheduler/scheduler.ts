import path from 'path';
import {
  AppError,
  CompileError,
  MissingModuleError,
  PoolCancelledError,
  WorkerPool,
  createEvent,
  defaultConcurrency,
  normalizePath,
  type Logger,
} from '@cyforge/shared';
import type { FingerprintStore, SourceUnit } from '@cyforge/repo';
import {
  parseMissingModules,
  summarizeDiagnostics,
  type CompileResult,
  type Compiler,
  type DirectiveValue,
} from '@cyforge/exec';
import { annotateUnit, type AnnotatedSource } from '../annotate/annotator';
import { DEFAULT_ARTIFACT_EXTENSIONS, findCompiledModule } from '../artifacts/list';
import { BuildReport, type ErrorDetail } from './report';

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped' | 'cancelled';

/** One unit's passage through a run; only the worker that claimed it changes it. */
export interface BuildTask {
  readonly unit: SourceUnit;
  annotatedSourcePath?: string;
  status: TaskStatus;
}

export interface ScheduleOptions {
  /** Root of the annotated sources and compiled artifacts */
  outDir: string;
  directives: Record<string, DirectiveValue>;
  /** Extensions of compiled modules; defaults to `.so` and `.pyd` */
  artifactExtensions?: readonly string[];
  concurrency?: number;
  signal?: AbortSignal;
}

export interface TaskSchedulerDeps {
  compiler: Compiler;
  store: FingerprintStore;
  logger: Logger;
  runId: string;
  annotate?: (unit: SourceUnit, outDir: string) => Promise<AnnotatedSource>;
}

/**
 * Splits units into fresh and stale, then compiles the stale ones on a bounded pool.
 *
 * A scheduler serves one run: each path is claimed once, so the compiler sees a path at most
 * once however the input is ordered or duplicated. Successful units are recorded in the store
 * and the store is flushed before `build` returns, cancelled or not.
 */
export class TaskScheduler {
  private readonly tasks = new Map<string, BuildTask>();
  private readonly annotate: (unit: SourceUnit, outDir: string) => Promise<AnnotatedSource>;

  constructor(private readonly deps: TaskSchedulerDeps) {
    this.annotate = deps.annotate ?? annotateUnit;
  }

  async submit(units: readonly SourceUnit[], options: ScheduleOptions): Promise<BuildReport> {
    const report = new BuildReport();
    const stale = await this.partition(units, report, options);
    await this.build(stale, report, options);
    return report;
  }

  task(relativePath: string): Readonly<BuildTask> | undefined {
    return this.tasks.get(relativePath);
  }

  /**
   * Registers every unit and returns the stale ones in input order. Fresh units are reported
   * as skipped. A unit built into another output directory, or whose compiled module is gone,
   * is stale.
   */
  async partition(
    units: readonly SourceUnit[],
    report: BuildReport,
    options: Pick<ScheduleOptions, 'outDir' | 'concurrency' | 'signal'>,
  ): Promise<SourceUnit[]> {
    const registered: BuildTask[] = [];
    for (const unit of units) {
      if (this.tasks.has(unit.relativePath)) {
        report.warn(`Duplicate unit ignored: ${unit.relativePath}`);
        continue;
      }
      const task: BuildTask = { unit, status: 'pending' };
      this.tasks.set(unit.relativePath, task);
      registered.push(task);
    }

    const pool = new WorkerPool(options.concurrency ?? defaultConcurrency(), options.signal);
    const stale = new Set<string>();
    await Promise.all(
      registered.map(async (task) => {
        const relativePath = task.unit.relativePath;
        try {
          const verdict = await pool.submit(() =>
            this.deps.store.isStale(task.unit, options.outDir),
          );
          if (verdict.stale) {
            stale.add(relativePath);
            return;
          }
          task.status = 'skipped';
          report.skip(relativePath);
          await this.deps.logger.log(
            createEvent(this.deps.runId, { type: 'UnitSkipped', payload: { path: relativePath } }),
          );
        } catch (error) {
          if (error instanceof PoolCancelledError) {
            task.status = 'cancelled';
            report.cancel(relativePath);
            return;
          }
          // The file changed or vanished between the scan and the check.
          task.status = 'failed';
          report.fail(relativePath, toErrorDetail(error));
        }
      }),
    );

    return registered.filter((task) => stale.has(task.unit.relativePath)).map((task) => task.unit);
  }

  /**
   * Compiles `units` with at most `concurrency` compilers running at once.
   */
  async build(
    units: readonly SourceUnit[],
    report: BuildReport,
    options: ScheduleOptions,
  ): Promise<void> {
    const pool = new WorkerPool(options.concurrency ?? defaultConcurrency(), options.signal);
    const claimed = new Set<string>();

    const outcomes = await Promise.allSettled(
      units.map((unit) => {
        if (claimed.has(unit.relativePath)) {
          report.warn(`Duplicate unit ignored: ${unit.relativePath}`);
          return Promise.resolve();
        }
        claimed.add(unit.relativePath);
        const task = this.taskFor(unit);
        return pool
          .submit((slot) => this.runTask(task, slot, report, options))
          .catch((error: unknown) => {
            if (!(error instanceof PoolCancelledError)) throw error;
            task.status = 'cancelled';
            report.cancel(unit.relativePath);
          });
      }),
    ).finally(() => this.flushStore(report));

    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') throw outcome.reason;
    }
  }

  private taskFor(unit: SourceUnit): BuildTask {
    const existing = this.tasks.get(unit.relativePath);
    if (existing) return existing;
    const task: BuildTask = { unit, status: 'pending' };
    this.tasks.set(unit.relativePath, task);
    return task;
  }

  private async runTask(
    task: BuildTask,
    slot: number,
    report: BuildReport,
    options: ScheduleOptions,
  ): Promise<void> {
    const { unit } = task;
    const relativePath = unit.relativePath;
    const logger = this.deps.logger.child({ worker: slot });
    const startedAt = Date.now();
    task.status = 'running';

    try {
      const annotated = await this.annotate(unit, options.outDir);
      task.annotatedSourcePath = annotated.outputPath;
      if (options.signal?.aborted) {
        task.status = 'cancelled';
        report.cancel(relativePath);
        await logger.debug(`Cancelled ${relativePath}`);
        return;
      }

      const result = await this.deps.compiler.compile({
        sourcePath: annotated.outputPath,
        outDir: options.outDir,
        directives: options.directives,
        signal: options.signal,
      });
      if (result.cancelled) {
        task.status = 'cancelled';
        report.cancel(relativePath);
        await logger.debug(`Cancelled ${relativePath}`);
        return;
      }
      const failure = compileFailure(result);
      if (failure) {
        throw failure;
      }

      const modulePath = await findCompiledModule(
        annotated.outputPath,
        options.artifactExtensions ?? DEFAULT_ARTIFACT_EXTENSIONS,
      );
      if (!modulePath) {
        report.warn(`No compiled module found for ${relativePath}; it will be rebuilt next run`);
      }
      const outDir = path.resolve(options.outDir);
      const fingerprint = await this.deps.store.fingerprint(unit, {
        content: annotated.sourceContent,
        outputDir: outDir,
        artifactPath: modulePath ? normalizePath(path.relative(outDir, modulePath)) : undefined,
      });
      this.deps.store.record(unit, fingerprint);
      task.status = 'succeeded';
      report.succeed(relativePath);
      await logger.trace(
        createEvent(this.deps.runId, {
          type: 'UnitCompiled',
          payload: { path: relativePath, durationMs: Date.now() - startedAt },
        }),
        `Compiled ${relativePath}`,
      );
    } catch (error) {
      const detail = toErrorDetail(error);
      task.status = 'failed';
      report.fail(relativePath, detail);
      await logger.trace(
        createEvent(this.deps.runId, {
          type: 'UnitFailed',
          payload: {
            path: relativePath,
            exitCode: detail.exitCode,
            message: detail.message,
            missingModules: detail.missingModules,
          },
        }),
        `Failed ${relativePath}: ${detail.message}`,
      );
    }
  }

  private async flushStore(report: BuildReport): Promise<void> {
    try {
      await this.deps.store.flush();
    } catch (error) {
      report.warn(`Could not save fingerprints: ${(error as Error).message}`);
      await this.deps.logger.error(error as Error, 'Fingerprint flush failed');
    }
  }
}

/**
 * The error a finished compile amounts to, or undefined when it succeeded.
 */
export function compileFailure(result: CompileResult): CompileError | undefined {
  if (result.exitCode === 0 && !result.timedOut) {
    return undefined;
  }
  const diagnostics = summarizeDiagnostics(result);
  if (result.timedOut) {
    return new CompileError(`Compiler timed out after ${result.durationMs}ms`, {
      exitCode: result.exitCode,
      diagnostics,
    });
  }
  const missing = parseMissingModules(`${result.stderr}\n${result.stdout}`);
  if (missing.length > 0) {
    return new MissingModuleError(missing, { exitCode: result.exitCode, diagnostics });
  }
  return new CompileError(`Compiler exited with code ${result.exitCode}`, {
    exitCode: result.exitCode,
    diagnostics,
  });
}

export function toErrorDetail(error: unknown): ErrorDetail {
  if (error instanceof MissingModuleError) {
    return {
      code: error.code,
      message: error.message,
      exitCode: error.exitCode,
      diagnostics: error.diagnostics,
      missingModules: error.moduleNames,
    };
  }
  if (error instanceof CompileError) {
    return {
      code: error.code,
      message: error.message,
      exitCode: error.exitCode,
      diagnostics: error.diagnostics,
    };
  }
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, diagnostics: '' };
  }
  return {
    code: 'UnknownError',
    message: error instanceof Error ? error.message : String(error),
    diagnostics: '',
  };
}
