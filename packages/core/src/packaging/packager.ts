import { promises as fs } from 'fs';
import path from 'path';
import { ProcessError, type PackagingConfig } from '@cyforge/shared';
import { PythonInvoker, type PythonOptions } from './python';

/**
 * Builds a wheel for a project directory and installs it with pip.
 */
export class Packager {
  private readonly python: PythonInvoker;

  constructor(
    private readonly config: PackagingConfig,
    options: PythonOptions = {},
  ) {
    this.python = new PythonInvoker(config, options);
  }

  /** Runs the wheel build and returns the path of the newest wheel. */
  async buildWheel(projectDir: string): Promise<string> {
    await this.python.logger?.info(`Building wheel in ${projectDir}`);
    await this.python.invoke('Wheel build', ['-m', 'build', '--wheel'], projectDir);
    return this.newestWheel(projectDir);
  }

  /**
   * Newest wheel in the wheel directory. "Newest" is the last name in sort order, which puts
   * higher versions of the same project last.
   */
  async newestWheel(projectDir: string): Promise<string> {
    const wheelDir = path.resolve(projectDir, this.config.wheelDir);
    let names: string[];
    try {
      names = await fs.readdir(wheelDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
      names = [];
    }
    const wheels = names.filter((name) => name.endsWith('.whl')).sort();
    const newest = wheels[wheels.length - 1];
    if (newest === undefined) {
      throw new ProcessError(`No wheel found in ${wheelDir}`, { details: { wheelDir } });
    }
    return path.join(wheelDir, newest);
  }

  async install(wheelPath: string): Promise<void> {
    await this.python.logger?.info(`Installing ${path.basename(wheelPath)}`);
    await this.python.invoke('Wheel install', ['-m', 'pip', 'install', '--upgrade', wheelPath]);
  }

  async buildAndInstall(projectDir: string): Promise<string> {
    const wheel = await this.buildWheel(projectDir);
    await this.install(wheel);
    return wheel;
  }
}
