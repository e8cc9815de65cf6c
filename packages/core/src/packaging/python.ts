import {
  ConfigError,
  ProcessError,
  type Logger,
  type PackagingConfig,
} from '@cyforge/shared';
import {
  parseCommand,
  runProcess,
  summarizeDiagnostics,
  type ProcessRequest,
  type ProcessResult,
} from '@cyforge/exec';

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;

export interface PythonOptions {
  /** Replaces process spawning; tests pass an in-process fake */
  run?: ProcessRunner;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * The configured interpreter, invoked as `<python> <args...>`. Every call that does not exit
 * cleanly becomes a ProcessError named after the step.
 */
export class PythonInvoker {
  private readonly bin: string;
  private readonly fixedArgs: string[];
  private readonly env: Record<string, string>;
  private readonly run: ProcessRunner;

  constructor(
    private readonly config: PackagingConfig,
    private readonly options: PythonOptions = {},
  ) {
    const parsed = parseCommand(config.python);
    if (!parsed.bin) {
      throw new ConfigError(`packaging.python does not name an executable: "${config.python}"`);
    }
    this.bin = parsed.bin;
    this.fixedArgs = parsed.args;
    this.env = parsed.env;
    this.run = options.run ?? runProcess;
  }

  get logger(): Logger | undefined {
    return this.options.logger;
  }

  async invoke(step: string, args: readonly string[], cwd?: string): Promise<ProcessResult> {
    const fullArgs = [...this.fixedArgs, ...args];
    await this.options.logger?.debug(`${this.bin} ${fullArgs.join(' ')}`);
    const result = await this.run({
      command: this.bin,
      args: fullArgs,
      cwd,
      env: this.env,
      timeoutMs: this.config.timeoutMs,
      signal: this.options.signal,
    });

    if (result.cancelled) {
      throw new ProcessError(`${step} was cancelled`, { exitCode: result.exitCode });
    }
    if (result.timedOut) {
      throw new ProcessError(`${step} timed out after ${result.durationMs}ms`, {
        exitCode: result.exitCode,
        details: { output: summarizeDiagnostics(result) },
      });
    }
    if (result.exitCode !== 0) {
      throw new ProcessError(`${step} failed with exit code ${result.exitCode}`, {
        exitCode: result.exitCode,
        details: { output: summarizeDiagnostics(result) },
      });
    }
    return result;
  }
}
