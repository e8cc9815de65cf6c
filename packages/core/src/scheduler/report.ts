import type { ErrorCode } from '@cyforge/shared';

export interface ErrorDetail {
  code: ErrorCode;
  message: string;
  exitCode?: number;
  /** Tail of the compiler output */
  diagnostics: string;
  missingModules?: string[];
}

export interface BuildReportJson {
  succeeded: string[];
  failed: Array<{ path: string } & ErrorDetail>;
  skipped: string[];
  cancelled: string[];
  missingModules: Record<string, string[]>;
  warnings: string[];
}

/**
 * Outcome of one run, filled in by workers as units finish. Paths are unit relative paths.
 */
export class BuildReport {
  readonly succeeded = new Set<string>();
  readonly failed = new Map<string, ErrorDetail>();
  readonly skipped = new Set<string>();
  /** Units that were stale but never finished because the run was cancelled */
  readonly cancelled = new Set<string>();
  readonly missingModules = new Map<string, string[]>();
  readonly warnings: string[] = [];

  succeed(path: string): void {
    this.succeeded.add(path);
  }

  fail(path: string, detail: ErrorDetail): void {
    this.failed.set(path, detail);
    this.missingModules.delete(path);
    if (detail.missingModules && detail.missingModules.length > 0) {
      this.missingModules.set(path, detail.missingModules);
    }
  }

  skip(path: string): void {
    this.skipped.add(path);
  }

  cancel(path: string): void {
    this.cancelled.add(path);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  /** Units the compiler was asked to build */
  get attempted(): number {
    return this.succeeded.size + this.failed.size;
  }

  get exitCode(): 0 | 1 {
    return this.failed.size > 0 || this.cancelled.size > 0 ? 1 : 0;
  }

  /** Every unresolved module across the run, sorted */
  allMissingModules(): string[] {
    return [...new Set([...this.missingModules.values()].flat())].sort();
  }

  /**
   * Folds a follow-up run over the same units into this one. A unit that failed here and
   * succeeded in `next` counts as succeeded.
   */
  merge(next: BuildReport): void {
    for (const path of next.succeeded) {
      this.failed.delete(path);
      this.missingModules.delete(path);
      this.cancelled.delete(path);
      this.succeeded.add(path);
    }
    for (const [path, detail] of next.failed) {
      this.fail(path, detail);
    }
    for (const path of next.cancelled) {
      this.failed.delete(path);
      this.cancelled.add(path);
    }
    this.warnings.push(...next.warnings);
  }

  toJSON(): BuildReportJson {
    return {
      succeeded: [...this.succeeded].sort(),
      failed: [...this.failed.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([path, detail]) => ({ path, ...detail })),
      skipped: [...this.skipped].sort(),
      cancelled: [...this.cancelled].sort(),
      missingModules: Object.fromEntries(
        [...this.missingModules.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
      ),
      warnings: [...this.warnings],
    };
  }
}
