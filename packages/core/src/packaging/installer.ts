import { installableName } from '@cyforge/exec';
import type { PackagingConfig } from '@cyforge/shared';
import { PythonInvoker, type PythonOptions } from './python';

/**
 * Installs the packages behind unresolved imports.
 */
export class ModuleInstaller {
  private readonly python: PythonInvoker;

  constructor(config: PackagingConfig, options: PythonOptions = {}) {
    this.python = new PythonInvoker(config, options);
  }

  /**
   * Installs the top-level package of every module in one pip call. Returns the package
   * names, sorted; nothing runs for an empty list.
   */
  async install(moduleNames: readonly string[]): Promise<string[]> {
    const packages = [...new Set(moduleNames.map(installableName))].sort();
    if (packages.length === 0) {
      return packages;
    }
    await this.python.logger?.info(`Installing missing modules: ${packages.join(', ')}`);
    await this.python.invoke('Module install', ['-m', 'pip', 'install', ...packages]);
    return packages;
  }
}
