import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { ProcessRequest, ProcessResult } from '@cyforge/exec';
import { FakeCompiler, type FakeBehaviour } from '../__fixtures__/fake-compiler';
import { RecordingLogger } from '../__fixtures__/recording-logger';
import { buildConfigForTest } from '../__fixtures__/test-config';
import type { ProcessRunner } from '../packaging';
import { runBuildPipeline, runLibraryPipeline, type PipelineOptions } from './pipeline';

describe('build pipeline', () => {
  let cwd: string;
  let requests: ProcessRequest[];

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-pipeline-test-'));
    requests = [];
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  async function write(relativePath: string, content = 'x = 1\n'): Promise<void> {
    const absolute = path.join(cwd, relativePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content);
  }

  /** Python stand-in: the wheel build drops a wheel into dist/, the lookup prints `libDir`. */
  function fakePython(libDir = ''): ProcessRunner {
    return async (request) => {
      requests.push(request);
      const args = request.args ?? [];
      const result: ProcessResult = {
        exitCode: 0,
        stdout: '',
        stderr: '',
        durationMs: 1,
        timedOut: false,
        cancelled: false,
        truncated: false,
      };
      if (args.includes('build') && request.cwd) {
        await fs.mkdir(path.join(request.cwd, 'dist'), { recursive: true });
        await fs.writeFile(path.join(request.cwd, 'dist', 'proj-0.1-py3-none-any.whl'), '');
      }
      if (args[0] === '-c') {
        return { ...result, stdout: `${libDir}\n` };
      }
      return result;
    };
  }

  function optionsFor(behaviour?: FakeBehaviour, run: ProcessRunner = fakePython()) {
    const compiler = new FakeCompiler(behaviour);
    const options: PipelineOptions = {
      runId: 'run-1',
      config: buildConfigForTest({ concurrency: 2 }),
      logger: new RecordingLogger(),
      cwd,
      compiler,
      run,
    };
    return { compiler, options };
  }

  it('installs missing modules and rebuilds only the affected units', async () => {
    await write('proj/a.py');
    await write('proj/b.py');
    let bAttempts = 0;
    const { compiler, options } = optionsFor((request) => {
      if (request.sourcePath.endsWith('b.pyx') && bAttempts++ === 0) {
        return { exitCode: 1, stderr: "ModuleNotFoundError: No module named 'numpy.linalg'\n" };
      }
      return {};
    });

    const result = await runBuildPipeline('proj', undefined, { ...options, retryMissing: true });

    expect(result.runs.map((r) => r.runId)).toEqual(['run-1', 'run-1-retry']);
    expect(result.installedModules).toEqual(['numpy']);
    expect(requests.map((r) => r.args)).toEqual([['-m', 'pip', 'install', 'numpy']]);
    expect(compiler.calls.filter((c) => c.endsWith('b.pyx'))).toHaveLength(2);
    expect(compiler.calls.filter((c) => c.endsWith('a.pyx'))).toHaveLength(1);
    expect([...result.report.succeeded].sort()).toEqual(['a.py', 'b.py']);
    expect(result.report.failed.size).toBe(0);
    expect(result.report.missingModules.size).toBe(0);
    expect(result.exitCode).toBe(0);
    expect(result.state).toBe('done');
  });

  it('leaves missing modules alone without --retry-missing', async () => {
    await write('proj/a.py');
    const { options } = optionsFor(() => ({ exitCode: 1, stderr: "No module named 'numpy'\n" }));

    const result = await runBuildPipeline('proj', undefined, options);

    expect(result.runs).toHaveLength(1);
    expect(requests).toEqual([]);
    expect(result.exitCode).toBe(1);
    expect(result.state).toBe('failed');
  });

  it('packages and installs after a clean build', async () => {
    await write('proj/a.py');
    const { options } = optionsFor();

    const result = await runBuildPipeline('proj', undefined, { ...options, install: true });

    const wheel = path.join(cwd, 'dist', 'proj-0.1-py3-none-any.whl');
    expect(result.wheel).toBe(wheel);
    expect(requests.map((r) => r.args)).toEqual([
      ['-m', 'build', '--wheel'],
      ['-m', 'pip', 'install', '--upgrade', wheel],
    ]);
    expect(requests[0].cwd).toBe(cwd);
  });

  it('does not package a failed build', async () => {
    await write('proj/a.py');
    const { options } = optionsFor(() => ({ exitCode: 1 }));

    const result = await runBuildPipeline('proj', undefined, { ...options, install: true });

    expect(result.wheel).toBeUndefined();
    expect(requests).toEqual([]);
  });

  it('compiles a staged copy of an installed library and removes it afterwards', async () => {
    await write('site/mylib/__init__.py');
    await write('site/mylib/core.py');
    const { compiler, options } = optionsFor(undefined, fakePython(path.join(cwd, 'site', 'mylib')));

    const result = await runLibraryPipeline('mylib', options);

    const staged = path.join(cwd, '.cyforge_tmp', 'mylib');
    expect(result.libraryDir).toBe(path.join(cwd, 'site', 'mylib'));
    expect(compiler.calls.sort()).toEqual([
      path.join(staged, 'build', '__init__.pyx'),
      path.join(staged, 'build', 'core.pyx'),
    ]);
    expect(requests.map((r) => r.args ?? [])).toEqual([
      ['-c', expect.stringContaining('find_spec(sys.argv[1])'), 'mylib'],
      ['-m', 'build', '--wheel'],
      ['-m', 'pip', 'install', '--upgrade', path.join(staged, 'dist', 'proj-0.1-py3-none-any.whl')],
    ]);
    expect(result.wheel).toBe(path.join(staged, 'dist', 'proj-0.1-py3-none-any.whl'));
    await expect(fs.access(staged)).rejects.toThrow();
    await expect(fs.access(path.join(cwd, 'site', 'mylib', 'core.py'))).resolves.toBeUndefined();
  });

  it('removes the staged copy when the build throws', async () => {
    await write('site/mylib/__init__.py');
    await write('site/mylib/exclude.txt', 'bad[\n');
    const { options } = optionsFor(undefined, fakePython(path.join(cwd, 'site', 'mylib')));

    await expect(runLibraryPipeline('mylib', options)).rejects.toThrow(/Invalid exclusion rule/);
    await expect(fs.access(path.join(cwd, '.cyforge_tmp', 'mylib'))).rejects.toThrow();
  });
});
