import { spawn, spawnSync } from 'child_process';
import { ProcessError, isWindows } from '@cyforge/shared';

export interface ProcessRequest {
  command: string;
  args?: readonly string[];
  cwd?: string;
  /** Merged over the parent environment */
  env?: Record<string, string>;
  /** No limit when absent */
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL once the process has to stop. Defaults to 5000. */
  gracePeriodMs?: number;
  /** Combined stdout + stderr bytes kept in memory. Defaults to 1 MiB. */
  maxOutputBytes?: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  /** -1 when the process was ended by a signal */
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  /** Output beyond `maxOutputBytes` was dropped */
  truncated: boolean;
}

export const DEFAULT_GRACE_PERIOD_MS = 5000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (isWindows()) {
    // taskkill is the only way to reach the children on Windows; it always forces.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // Negative pid signals the whole process group; the child was spawned detached to lead one.
  try {
    process.kill(-pid, signal);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ESRCH') {
      throw error;
    }
  }
}

/**
 * Largest offset at or below `limit` that does not split a UTF-8 sequence in `chunk`.
 */
export function characterBoundary(chunk: Buffer, limit: number): number {
  let end = Math.min(limit, chunk.length);
  // Continuation bytes look like 10xxxxxx; back up to the lead byte of the cut character.
  while (end > 0 && end < chunk.length && (chunk[end] & 0xc0) === 0x80) {
    end--;
  }
  return end;
}

/**
 * Runs one external process to completion and captures its output.
 *
 * A timeout or an abort sends SIGTERM to the process group, then SIGKILL after the grace
 * period. Both resolve normally with `timedOut` or `cancelled` set, and so does a signal that
 * was already aborted, without spawning anything. Only a failure to start the process rejects.
 */
export function runProcess(request: ProcessRequest): Promise<ProcessResult> {
  const gracePeriodMs = request.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
  const maxOutputBytes = request.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

  if (request.signal?.aborted) {
    return Promise.resolve({
      exitCode: -1,
      stdout: '',
      stderr: '',
      durationMs: 0,
      timedOut: false,
      cancelled: true,
      truncated: false,
    });
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    const start = Date.now();
    const chunks: Record<'stdout' | 'stderr', Buffer[]> = { stdout: [], stderr: [] };
    let captured = 0;
    let truncated = false;
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let timeoutTimer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const child = spawn(request.command, [...(request.args ?? [])], {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
      windowsHide: true,
    });

    const terminate = () => {
      if (killTimer !== undefined || child.pid === undefined) return;
      const pid = child.pid;
      killProcessTree(pid, 'SIGTERM');
      killTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), gracePeriodMs);
    };

    const onAbort = () => {
      cancelled = true;
      terminate();
    };

    const cleanup = () => {
      settled = true;
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);
      request.signal?.removeEventListener('abort', onAbort);
    };

    const capture = (stream: 'stdout' | 'stderr') => (chunk: Buffer) => {
      if (truncated) return;
      const room = maxOutputBytes - captured;
      if (chunk.length > room) {
        chunks[stream].push(chunk.subarray(0, characterBoundary(chunk, room)));
        captured = maxOutputBytes;
        truncated = true;
        return;
      }
      chunks[stream].push(chunk);
      captured += chunk.length;
    };

    if (request.timeoutMs !== undefined) {
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, request.timeoutMs);
    }
    request.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', capture('stdout'));
    child.stderr.on('data', capture('stderr'));

    child.on('error', (err) => {
      if (settled) return;
      cleanup();
      reject(
        new ProcessError(`Failed to start ${request.command}: ${err.message}`, { cause: err }),
      );
    });

    child.on('close', (code) => {
      if (settled) return;
      cleanup();
      resolve({
        exitCode: code ?? -1,
        stdout: Buffer.concat(chunks.stdout).toString('utf8'),
        stderr: Buffer.concat(chunks.stderr).toString('utf8'),
        durationMs: Date.now() - start,
        timedOut,
        cancelled,
        truncated,
      });
    });
  });
}
