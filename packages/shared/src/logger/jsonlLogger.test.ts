import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { UnitCompiled } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  const event: UnitCompiled = {
    schemaVersion: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
    runId: 'run-1',
    type: 'UnitCompiled',
    payload: { path: 'pkg/a.py', durationMs: 12 },
  };

  it('creates the log directory and writes events as JSON lines', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'cyforge-logger-test-'));
    const logPath = join(tmpDir, 'logs', 'build.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(event);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content).toBe(JSON.stringify(event) + '\n');
  });

  it('keeps the order of events logged without awaiting, across children', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'cyforge-logger-test-'));
    const logPath = join(tmpDir, 'build.jsonl');
    const logger = new JsonlLogger(logPath);
    const child = logger.child({ worker: 1 });

    void logger.log(event);
    void child.log({ ...event, payload: { path: 'pkg/b.py', durationMs: 3 } });
    void logger.log({ ...event, payload: { path: 'pkg/c.py', durationMs: 4 } });
    await logger.flush();

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines.map((l) => JSON.parse(l).payload.path)).toEqual([
      'pkg/a.py',
      'pkg/b.py',
      'pkg/c.py',
    ]);
  });

  it('reports write failures on stderr instead of throwing', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'cyforge-logger-test-'));
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    // The log path is an existing directory, so appendFile fails.
    const logger = new JsonlLogger(tmpDir);

    await expect(logger.log(event)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${tmpDir}`,
      expect.any(Error),
    );
  });

  it('prefixes text messages with bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new JsonlLogger('/unused.jsonl', { run: 'r1' });

    logger.info('hello');
    logger.debug('hidden');

    expect(infoSpy).toHaveBeenCalledWith('[run=r1] hello');
    expect(debugSpy).not.toHaveBeenCalled();
  });
});
