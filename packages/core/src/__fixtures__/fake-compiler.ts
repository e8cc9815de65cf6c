import { promises as fs } from 'fs';
import type { CompileRequest, CompileResult, Compiler } from '@cyforge/exec';

export type FakeBehaviour = (
  request: CompileRequest,
) => Partial<CompileResult> | Promise<Partial<CompileResult>>;

/**
 * In-process stand-in for the external compiler. Records every request and how many ran at once,
 * and leaves a `<stem>.so` beside every source it compiles successfully.
 */
export class FakeCompiler implements Compiler {
  readonly requests: CompileRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly behaviour: FakeBehaviour = () => ({}),
    private readonly toolchainVersion = 'fake-1.0',
  ) {}

  get calls(): string[] {
    return this.requests.map((r) => r.sourcePath);
  }

  version(): Promise<string> {
    return Promise.resolve(this.toolchainVersion);
  }

  async compile(request: CompileRequest): Promise<CompileResult> {
    this.requests.push(request);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, 2));
      const outcome = await this.behaviour(request);
      const result = { exitCode: 0, stdout: '', stderr: '', durationMs: 2, timedOut: false, ...outcome };
      if (result.exitCode === 0 && !result.timedOut && !result.cancelled) {
        await fs.writeFile(request.sourcePath.replace(/\.pyx$/, '.so'), 'module');
      }
      return result;
    } finally {
      this.active--;
    }
  }
}
