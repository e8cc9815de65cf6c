export type DirectiveValue = boolean | number | string;

export interface CompileRequest {
  /** Annotated source handed to the compiler */
  sourcePath: string;
  /** Working directory; compiled artifacts land here */
  outDir: string;
  directives: Record<string, DirectiveValue>;
  signal?: AbortSignal;
}

export interface CompileResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled?: boolean;
  truncated?: boolean;
}

/**
 * Turns one annotated source into a native extension module.
 */
export interface Compiler {
  /** Version of the toolchain; stable for the lifetime of the instance */
  version(): Promise<string>;
  compile(request: CompileRequest): Promise<CompileResult>;
}
