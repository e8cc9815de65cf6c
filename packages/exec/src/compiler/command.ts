import path from 'path';
import { ConfigError, ProcessError, type CompilerConfig, type Logger } from '@cyforge/shared';
import { parseCommand } from '../command/parser';
import { runProcess } from '../runner/runner';
import { expandArgs, formatDirectives } from './template';
import type { CompileRequest, CompileResult, Compiler } from './types';

const VERSION_TIMEOUT_MS = 30_000;

/**
 * Runs a configurable command line once per unit, in the unit's output directory.
 *
 * `config.command` may carry leading `KEY=value` assignments and fixed arguments; `config.args`
 * is the per-unit template with `{source}`, `{outDir}`, `{module}` and `{directives}`.
 */
export class CommandCompiler implements Compiler {
  private readonly bin: string;
  private readonly fixedArgs: string[];
  private readonly env: Record<string, string>;
  private versionPromise?: Promise<string>;

  constructor(
    private readonly config: CompilerConfig,
    private readonly logger?: Logger,
  ) {
    const parsed = parseCommand(config.command);
    if (!parsed.bin) {
      throw new ConfigError(`compiler.command does not name an executable: "${config.command}"`);
    }
    this.bin = parsed.bin;
    this.fixedArgs = parsed.args;
    this.env = parsed.env;
  }

  version(): Promise<string> {
    if (this.config.version) {
      return Promise.resolve(this.config.version);
    }
    if (!this.versionPromise) {
      this.versionPromise = this.queryVersion();
    }
    return this.versionPromise;
  }

  async compile(request: CompileRequest): Promise<CompileResult> {
    const args = [
      ...this.fixedArgs,
      ...expandArgs(this.config.args, {
        source: request.sourcePath,
        outDir: request.outDir,
        module: path.basename(request.sourcePath, path.extname(request.sourcePath)),
        directives: formatDirectives(request.directives),
      }),
    ];
    void this.logger?.debug(`${this.bin} ${args.join(' ')}`);

    const result = await runProcess({
      command: this.bin,
      args,
      cwd: request.outDir,
      env: this.env,
      timeoutMs: this.config.timeoutMs,
      gracePeriodMs: this.config.gracePeriodMs,
      maxOutputBytes: this.config.maxOutputBytes,
      signal: request.signal,
    });
    return result;
  }

  private async queryVersion(): Promise<string> {
    const args = [...this.fixedArgs, ...this.config.versionArgs];
    const result = await runProcess({
      command: this.bin,
      args,
      env: this.env,
      timeoutMs: VERSION_TIMEOUT_MS,
      gracePeriodMs: this.config.gracePeriodMs,
    });
    // Some tools print their version on stderr.
    const firstLine = `${result.stdout}\n${result.stderr}`
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    if (result.exitCode !== 0 || !firstLine) {
      throw new ProcessError(
        `Could not determine the compiler version with "${[this.bin, ...args].join(' ')}"`,
        { exitCode: result.exitCode, details: { stderr: result.stderr.trim() } },
      );
    }
    void this.logger?.debug(`Compiler version: ${firstLine}`);
    return firstLine;
  }
}
