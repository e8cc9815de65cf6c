import pc from 'picocolors';
import { AppError } from '@cyforge/shared';
import { formatSize, type ArtifactEntry } from '@cyforge/core';
import { printTable } from './index';

export interface FailureSummary {
  path: string;
  code: string;
  message: string;
  exitCode?: number;
  diagnostics: string;
  missingModules?: string[];
}

export interface BuildSummary {
  status: 'SUCCESS' | 'FAILURE';
  runId: string;
  state: 'done' | 'failed';
  exitCode: 0 | 1;
  targetDir?: string;
  library?: string;
  outputDir: string;
  succeeded: string[];
  skipped: number;
  failed: FailureSummary[];
  cancelled: string[];
  missingModules: string[];
  installedModules: string[];
  warnings: string[];
  wheel?: string;
  logFile?: string;
  durationMs: number;
  artifacts?: ArtifactEntry[];
}

export interface CleanSummary {
  status: 'SUCCESS' | 'FAILURE';
  runId: string;
  root: string;
  removed: string[];
  kept: string[];
  warnings: string[];
}

export interface ArtifactListing {
  outputDir: string;
  artifacts: ArtifactEntry[];
}

const MAX_LISTED = 10;

export class OutputRenderer {
  constructor(
    private isJson: boolean,
    private verbose = false,
  ) {}

  renderBuild(data: BuildSummary): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    if (data.state === 'failed') {
      console.log(`\n${pc.red('❌ Build failed.')}`);
    } else if (data.exitCode === 0) {
      console.log(`\n${pc.green('✅ Build succeeded.')}`);
    } else {
      console.log(`\n${pc.yellow('⚠️  Build finished with failures.')}`);
    }

    const counts = [
      `Compiled: ${data.succeeded.length}`,
      `Skipped: ${data.skipped}`,
      `Failed: ${data.failed.length}`,
    ];
    if (data.cancelled.length > 0) counts.push(`Cancelled: ${data.cancelled.length}`);
    console.log(`  ${counts.join('  ')} ${pc.gray(`(${(data.durationMs / 1000).toFixed(1)}s)`)}`);

    if (data.failed.length > 0) {
      console.log(pc.bold('\nFailures:'));
      for (const failure of data.failed) {
        console.log(`  - ${pc.red(failure.path)}: ${failure.message}`);
        if (failure.diagnostics) {
          for (const line of failure.diagnostics.split('\n')) {
            console.log(pc.gray(`      ${line}`));
          }
        }
      }
    }

    if (data.missingModules.length > 0) {
      console.log(`${pc.bold('\nMissing modules:')} ${data.missingModules.join(', ')}`);
    }
    if (data.installedModules.length > 0) {
      console.log(`${pc.bold('\nInstalled modules:')} ${data.installedModules.join(', ')}`);
    }

    this.renderWarnings(data.warnings);

    console.log(pc.bold('\nArtifacts:'));
    console.log(`  Run ID: ${data.runId}`);
    console.log(`  Output: ${data.outputDir}`);
    if (data.wheel) console.log(`  Wheel: ${data.wheel}`);
    if (data.logFile) console.log(`  Log: ${data.logFile}`);

    if (data.artifacts) {
      this.renderArtifactTable(data.artifacts);
    }

    if (data.missingModules.length > 0 && data.installedModules.length === 0) {
      console.log(pc.bold('\nNext steps:'));
      console.log(`  - Install the missing modules and retry with ${pc.cyan('--retry-missing')}.`);
    }
  }

  renderClean(data: CleanSummary): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    console.log(`\n${pc.green(`🧹 Cleaned ${data.root}`)}`);
    this.renderList('Removed', data.removed);
    this.renderList('Kept', data.kept);
    if (data.removed.length === 0) {
      console.log(pc.gray('  Nothing to remove.'));
    }
    this.renderWarnings(data.warnings);
  }

  renderArtifacts(data: ArtifactListing): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }
    console.log(pc.bold(`\nArtifacts in ${data.outputDir}:`));
    this.renderArtifactTable(data.artifacts);
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(error: unknown): void {
    if (this.isJson) {
      console.log(
        JSON.stringify({
          error:
            error instanceof AppError
              ? { code: error.code, message: error.message, details: error.details }
              : {
                  code: 'UnknownError',
                  message: error instanceof Error ? error.message : String(error),
                },
        }),
      );
      return;
    }

    console.error(pc.red(`❌ Error: ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (this.verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  private renderList(title: string, items: string[]): void {
    if (items.length === 0) return;
    console.log(pc.bold(`\n${title}:`));
    items.slice(0, MAX_LISTED).forEach((item) => console.log(`  - ${item}`));
    if (items.length > MAX_LISTED) {
      console.log(`  ... and ${items.length - MAX_LISTED} more.`);
    }
  }

  private renderWarnings(warnings: string[]): void {
    if (warnings.length === 0) return;
    console.log(pc.bold(pc.yellow('\nWarnings:')));
    warnings.slice(0, MAX_LISTED).forEach((w) => console.log(`  - ${w}`));
    if (warnings.length > MAX_LISTED) {
      console.log(`  ... and ${warnings.length - MAX_LISTED} more.`);
    }
  }

  private renderArtifactTable(artifacts: ArtifactEntry[]): void {
    if (artifacts.length === 0) {
      console.log(pc.gray('  No compiled modules found.'));
      return;
    }
    printTable(
      artifacts.map((a) => ({ Module: a.path, Size: formatSize(a.sizeBytes) })),
      { head: ['Module', 'Size'] },
    );
    const total = artifacts.reduce((sum, a) => sum + a.sizeBytes, 0);
    console.log(`  ${artifacts.length} modules, ${formatSize(total)}`);
  }
}
