import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_DIRECTIVES, ProcessError } from '@cyforge/shared';
import { FingerprintStore, type SourceUnit } from '@cyforge/repo';
import type { Compiler } from '@cyforge/exec';
import { annotateUnit } from '../annotate/annotator';
import { FakeCompiler, type FakeBehaviour } from '../__fixtures__/fake-compiler';
import { RecordingLogger } from '../__fixtures__/recording-logger';
import { TaskScheduler, compileFailure } from './scheduler';

describe('TaskScheduler', () => {
  let tmpDir: string;
  let srcDir: string;
  let outDir: string;
  let storePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-scheduler-test-'));
    srcDir = path.join(tmpDir, 'src');
    outDir = path.join(tmpDir, 'out');
    storePath = path.join(tmpDir, '.cyforge', 'fingerprints.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function unitFor(relativePath: string): Promise<SourceUnit> {
    const absolutePath = path.join(srcDir, relativePath);
    const stats = await fs.stat(absolutePath);
    return { relativePath, absolutePath, sizeBytes: stats.size, modifiedTime: stats.mtimeMs };
  }

  async function writeUnits(files: Record<string, string>): Promise<SourceUnit[]> {
    const units: SourceUnit[] = [];
    for (const [relativePath, content] of Object.entries(files)) {
      const absolutePath = path.join(srcDir, relativePath);
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });
      await fs.writeFile(absolutePath, content);
      units.push(await unitFor(relativePath));
    }
    return units;
  }

  async function run(
    units: readonly SourceUnit[],
    behaviour?: FakeBehaviour,
    options: {
      concurrency?: number;
      signal?: AbortSignal;
      compiler?: Compiler;
      annotate?: typeof annotateUnit;
    } = {},
  ) {
    const compiler = new FakeCompiler(behaviour);
    const logger = new RecordingLogger();
    const store = await FingerprintStore.load(storePath, { toolchainVersion: 'fake-1.0' });
    const scheduler = new TaskScheduler({
      compiler: options.compiler ?? compiler,
      store,
      logger,
      runId: 'run-1',
      annotate: options.annotate,
    });
    const report = await scheduler.submit(units, {
      outDir,
      directives: DEFAULT_DIRECTIVES,
      concurrency: options.concurrency ?? 4,
      signal: options.signal,
    });
    return { compiler, logger, store, scheduler, report };
  }

  const THREE = { 'a.py': 'a = 1\n', 'b.py': 'b = 1\n', 'c.py': 'c = 1\n' };

  it('annotates and compiles every stale unit', async () => {
    const units = await writeUnits(THREE);
    const { compiler, report, store, scheduler, logger } = await run(units);

    expect([...report.succeeded].sort()).toEqual(['a.py', 'b.py', 'c.py']);
    expect(report.exitCode).toBe(0);
    expect(compiler.calls.sort()).toEqual([
      path.join(outDir, 'a.pyx'),
      path.join(outDir, 'b.pyx'),
      path.join(outDir, 'c.pyx'),
    ]);
    expect(compiler.requests[0].outDir).toBe(outDir);
    expect(compiler.requests[0].directives).toEqual(DEFAULT_DIRECTIVES);
    expect(await fs.readFile(path.join(outDir, 'a.pyx'), 'utf8')).toBe('# cimport cython\na = 1\n');
    expect(store.get('a.py')).toMatchObject({ outputDir: outDir, artifactPath: 'a.so' });
    expect(scheduler.task('a.py')).toMatchObject({
      status: 'succeeded',
      annotatedSourcePath: path.join(outDir, 'a.pyx'),
    });
    expect(logger.ofType('UnitCompiled').map((e) => e.payload.path).sort()).toEqual([
      'a.py',
      'b.py',
      'c.py',
    ]);

    const saved = await FingerprintStore.load(storePath, { toolchainVersion: 'fake-1.0' });
    expect(saved.paths()).toEqual(['a.py', 'b.py', 'c.py']);
  });

  it('makes no compiler calls when nothing changed', async () => {
    const units = await writeUnits(THREE);
    await run(units);

    const second = await run(units);
    expect(second.compiler.calls).toEqual([]);
    expect([...second.report.skipped].sort()).toEqual(['a.py', 'b.py', 'c.py']);
    expect(second.logger.ofType('UnitSkipped')).toHaveLength(3);
    expect(second.report.exitCode).toBe(0);
  });

  it('rebuilds a unit whose compiled module was deleted', async () => {
    const units = await writeUnits(THREE);
    await run(units);
    await fs.rm(path.join(outDir, 'b.so'));

    const second = await run(units);
    expect(second.compiler.calls).toEqual([path.join(outDir, 'b.pyx')]);
    expect([...second.report.skipped].sort()).toEqual(['a.py', 'c.py']);
  });

  it('warns when the compiler leaves no module, and rebuilds the unit next time', async () => {
    const units = await writeUnits({ 'a.py': 'x = 1\n' });
    let calls = 0;
    const silent: Compiler = {
      version: () => Promise.resolve('fake-1.0'),
      compile: () => {
        calls++;
        return Promise.resolve({ exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false });
      },
    };

    const first = await run(units, undefined, { compiler: silent });
    expect([...first.report.succeeded]).toEqual(['a.py']);
    expect(first.report.warnings).toEqual([
      'No compiled module found for a.py; it will be rebuilt next run',
    ]);

    await run(units, undefined, { compiler: silent });
    expect(calls).toBe(2);
  });

  it('rebuilds only the unit whose content changed', async () => {
    await writeUnits(THREE);
    await run(await Promise.all(Object.keys(THREE).map(unitFor)));

    const bPath = path.join(srcDir, 'b.py');
    await fs.writeFile(bPath, 'b = 2\n');
    const later = new Date(Date.now() + 10_000);
    await fs.utimes(bPath, later, later);

    const second = await run(await Promise.all(Object.keys(THREE).map(unitFor)));
    expect(second.compiler.calls).toEqual([path.join(outDir, 'b.pyx')]);
    expect([...second.report.skipped].sort()).toEqual(['a.py', 'c.py']);
  });

  it('does not rebuild a touched unit', async () => {
    await writeUnits(THREE);
    await run(await Promise.all(Object.keys(THREE).map(unitFor)));

    const later = new Date(Date.now() + 10_000);
    await fs.utimes(path.join(srcDir, 'a.py'), later, later);

    const second = await run(await Promise.all(Object.keys(THREE).map(unitFor)));
    expect(second.compiler.calls).toEqual([]);
  });

  it('keeps going after a failure and leaves the failed unit unrecorded', async () => {
    const units = await writeUnits(THREE);
    const { report, store } = await run(units, (request) =>
      request.sourcePath.endsWith('b.pyx')
        ? { exitCode: 1, stderr: 'b.pyx:1:0: Syntax error in simple statement list\n' }
        : {},
    );

    expect([...report.succeeded].sort()).toEqual(['a.py', 'c.py']);
    expect(report.failed.get('b.py')).toEqual({
      code: 'CompileError',
      message: 'Compiler exited with code 1',
      exitCode: 1,
      diagnostics: 'b.pyx:1:0: Syntax error in simple statement list',
    });
    expect(report.exitCode).toBe(1);
    expect(store.paths()).toEqual(['a.py', 'c.py']);

    const retry = await run(units);
    expect(retry.compiler.calls).toEqual([path.join(outDir, 'b.pyx')]);
  });

  it('files unresolved imports under missingModules', async () => {
    const units = await writeUnits({ 'b.py': 'import numpy\n' });
    const { report, logger } = await run(units, () => ({
      exitCode: 1,
      stderr: "ModuleNotFoundError: No module named 'numpy'\n",
    }));

    expect(report.failed.get('b.py')).toMatchObject({
      code: 'MissingModuleError',
      message: 'Unresolved modules: numpy',
      missingModules: ['numpy'],
    });
    expect(report.missingModules.get('b.py')).toEqual(['numpy']);
    expect(report.allMissingModules()).toEqual(['numpy']);
    expect(logger.ofType('UnitFailed')[0].payload).toEqual({
      path: 'b.py',
      exitCode: 1,
      message: 'Unresolved modules: numpy',
      missingModules: ['numpy'],
    });
  });

  it('reports a timed out compile as a failure', async () => {
    const units = await writeUnits({ 'a.py': 'x = 1\n' });
    const { report } = await run(units, () => ({ exitCode: -1, timedOut: true, durationMs: 1000 }));
    expect(report.failed.get('a.py')?.message).toBe('Compiler timed out after 1000ms');
  });

  it('reports a compiler that cannot start', async () => {
    const units = await writeUnits({ 'a.py': 'x = 1\n' });
    const { report } = await run(units, () => {
      throw new ProcessError('Failed to start cythonize: spawn cythonize ENOENT');
    });
    expect(report.failed.get('a.py')).toEqual({
      code: 'ProcessError',
      message: 'Failed to start cythonize: spawn cythonize ENOENT',
      diagnostics: '',
    });
  });

  it('never compiles a path twice, whatever the concurrency', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 20; i++) files[`pkg/m${i}.py`] = `v = ${i}\n`;
    const units = await writeUnits(files);

    const { compiler, report } = await run([...units, ...units], undefined, { concurrency: 8 });

    expect(compiler.calls).toHaveLength(20);
    expect(new Set(compiler.calls).size).toBe(20);
    expect(compiler.maxActive).toBeLessThanOrEqual(8);
    expect(report.succeeded.size).toBe(20);
    expect(report.warnings).toHaveLength(20);
    expect(report.warnings[0]).toBe('Duplicate unit ignored: pkg/m0.py');
  });

  it('stops on cancel and flushes what already succeeded', async () => {
    const units = await writeUnits(THREE);
    const controller = new AbortController();

    const { report } = await run(
      units,
      (request) => {
        if (request.sourcePath.endsWith('b.pyx')) {
          controller.abort();
          return { exitCode: -1, cancelled: true };
        }
        return {};
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect([...report.succeeded]).toEqual(['a.py']);
    expect([...report.cancelled].sort()).toEqual(['b.py', 'c.py']);
    expect(report.exitCode).toBe(1);

    const saved = await FingerprintStore.load(storePath, { toolchainVersion: 'fake-1.0' });
    expect(saved.paths()).toEqual(['a.py']);
  });

  it('reports a unit as cancelled when the abort lands before its compile starts', async () => {
    const units = await writeUnits({ 'a.py': 'x = 1\n' });
    const controller = new AbortController();

    const { report, compiler } = await run(units, undefined, {
      signal: controller.signal,
      annotate: async (unit, dir) => {
        const annotated = await annotateUnit(unit, dir);
        controller.abort();
        return annotated;
      },
    });

    expect(compiler.calls).toEqual([]);
    expect([...report.cancelled]).toEqual(['a.py']);
    expect(report.failed.size).toBe(0);
    expect(report.exitCode).toBe(1);
  });

  it('fails a unit that disappeared after the scan', async () => {
    const units = await writeUnits({ 'a.py': 'x = 1\n' });
    await fs.rm(units[0].absolutePath);
    const { report, compiler } = await run(units);
    expect(compiler.calls).toEqual([]);
    expect(report.failed.get('a.py')?.message).toMatch(/ENOENT/);
  });
});

describe('compileFailure', () => {
  const ok = { exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false };

  it('accepts a clean exit', () => {
    expect(compileFailure(ok)).toBeUndefined();
  });

  it('prefers the timeout over the exit code', () => {
    expect(compileFailure({ ...ok, exitCode: -1, timedOut: true, durationMs: 50 })?.message).toBe(
      'Compiler timed out after 50ms',
    );
  });
});
