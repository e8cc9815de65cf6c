import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ProcessError } from '@cyforge/shared';
import { characterBoundary, runProcess } from './runner';

const node = process.execPath;

describe('runProcess', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-runner-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('captures output and the exit code', async () => {
    const result = await runProcess({
      command: node,
      args: ['-e', "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"],
    });
    expect(result).toMatchObject({
      exitCode: 3,
      stdout: 'out',
      stderr: 'err',
      timedOut: false,
      cancelled: false,
      truncated: false,
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('runs in the requested directory with extra environment', async () => {
    const result = await runProcess({
      command: node,
      args: ['-e', 'console.log(process.cwd()); console.log(process.env.CYFORGE_TEST_VAR)'],
      cwd: tmpDir,
      env: { CYFORGE_TEST_VAR: 'test-value' },
    });
    expect(result.stdout).toBe(`${await fs.realpath(tmpDir)}\ntest-value\n`);
  });

  it('keeps at most maxOutputBytes of output', async () => {
    const result = await runProcess({
      command: node,
      args: ['-e', "process.stdout.write('x'.repeat(5000))"],
      maxOutputBytes: 1024,
    });
    expect(result.exitCode).toBe(0);
    expect(result.truncated).toBe(true);
    expect(result.stdout).toBe('x'.repeat(1024));
  });

  it('does not split a multi-byte character when truncating', async () => {
    const result = await runProcess({
      command: node,
      args: ['-e', "process.stdout.write('\u00e9'.repeat(1000))"],
      maxOutputBytes: 1025,
    });
    expect(result.truncated).toBe(true);
    expect(result.stdout).toBe('\u00e9'.repeat(512));
  });

  it('terminates a process that runs past its timeout', async () => {
    const result = await runProcess({
      command: node,
      args: ['-e', 'setInterval(() => {}, 1000)'],
      timeoutMs: 200,
      gracePeriodMs: 100,
    });
    expect(result.timedOut).toBe(true);
    expect(result.cancelled).toBe(false);
    expect(result.exitCode).toBe(-1);
  });

  it('kills a process that ignores SIGTERM once the grace period ends', async () => {
    const result = await runProcess({
      command: node,
      args: [
        '-e',
        "process.on('SIGTERM', () => {}); process.stdout.write('ready'); setInterval(() => {}, 1000)",
      ],
      timeoutMs: 500,
      gracePeriodMs: 300,
    });
    expect(result.stdout).toBe('ready');
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(result.durationMs).toBeGreaterThanOrEqual(750);
  });

  it('stops the process when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = runProcess({
      command: node,
      args: ['-e', 'setInterval(() => {}, 1000)'],
      gracePeriodMs: 100,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);
    const result = await pending;
    expect(result.cancelled).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBe(-1);
  });

  it('reports a cancelled result without starting when already aborted', async () => {
    const marker = path.join(tmpDir, 'started');
    const result = await runProcess({
      command: node,
      args: ['-e', `require('fs').writeFileSync(${JSON.stringify(marker)}, '')`],
      signal: AbortSignal.abort(),
    });
    expect(result).toEqual({
      exitCode: -1,
      stdout: '',
      stderr: '',
      durationMs: 0,
      timedOut: false,
      cancelled: true,
      truncated: false,
    });
    await expect(fs.access(marker)).rejects.toThrow();
  });

  it('rejects with a ProcessError when the command cannot start', async () => {
    const pending = runProcess({ command: 'cyforge-no-such-command' });
    await expect(pending).rejects.toBeInstanceOf(ProcessError);
    await expect(pending).rejects.toThrow(/^Failed to start cyforge-no-such-command: spawn cyforge-no-such-command ENOENT$/);
  });
});

describe('characterBoundary', () => {
  const text = Buffer.from('aé€', 'utf8'); // 1 + 2 + 3 bytes

  it('keeps a limit that falls between characters', () => {
    expect(characterBoundary(text, 1)).toBe(1);
    expect(characterBoundary(text, 3)).toBe(3);
    expect(characterBoundary(text, 6)).toBe(6);
  });

  it('backs up to the start of a cut character', () => {
    expect(characterBoundary(text, 2)).toBe(1);
    expect(characterBoundary(text, 4)).toBe(3);
    expect(characterBoundary(text, 5)).toBe(3);
  });
});
