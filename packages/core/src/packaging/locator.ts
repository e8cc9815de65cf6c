import path from 'path';
import { copy, remove } from 'fs-extra';
import { ProcessError, UsageError, type PackagingConfig } from '@cyforge/shared';
import { PythonInvoker, type PythonOptions } from './python';

const NOT_FOUND_EXIT_CODE = 3;

// The name arrives as argv[1], never spliced into the source.
const LOCATE_SCRIPT = [
  'import importlib.util, os, sys',
  'spec = importlib.util.find_spec(sys.argv[1])',
  `if spec is None or not spec.origin: sys.exit(${NOT_FOUND_EXIT_CODE})`,
  'print(os.path.dirname(os.path.abspath(spec.origin)))',
].join('\n');

const LIBRARY_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Finds the source directory of an installed library and stages a private copy of it.
 */
export class LibraryLocator {
  private readonly python: PythonInvoker;

  constructor(config: PackagingConfig, options: PythonOptions = {}) {
    this.python = new PythonInvoker(config, options);
  }

  async locate(name: string): Promise<string> {
    if (!LIBRARY_NAME.test(name)) {
      throw new UsageError(`Not a valid library name: "${name}"`);
    }
    try {
      const result = await this.python.invoke('Library lookup', ['-c', LOCATE_SCRIPT, name]);
      const dir = result.stdout.trim().split(/\r?\n/).pop();
      if (!dir) {
        throw new ProcessError(`Library lookup printed no directory for ${name}`);
      }
      return dir;
    } catch (error) {
      if (error instanceof ProcessError && error.exitCode === NOT_FOUND_EXIT_CODE) {
        throw new UsageError(`Library ${name} not found`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Copies `sourceDir` to `<tempDir>/<name>`, replacing any earlier copy, and returns the
   * copy's path.
   */
  async stage(name: string, sourceDir: string, tempDir: string): Promise<string> {
    const dest = path.resolve(tempDir, name);
    await remove(dest);
    await this.python.logger?.info(`Copying ${name} sources to ${dest}`);
    await copy(sourceDir, dest, {
      filter: (src) => path.basename(src) !== '__pycache__',
    });
    return dest;
  }
}
