import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { findCompiledModule, formatSize, listArtifacts } from './list';

describe('listArtifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-artifacts-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists compiled modules with sizes, sorted by path', async () => {
    await fs.mkdir(path.join(dir, 'pkg', 'sub'), { recursive: true });
    await fs.writeFile(path.join(dir, 'pkg', 'sub', 'b.so'), 'abc');
    await fs.writeFile(path.join(dir, 'pkg', 'a.cpython-311-x86_64-linux-gnu.so'), 'abcdef');
    await fs.writeFile(path.join(dir, 'mod.pyd'), '');
    await fs.writeFile(path.join(dir, 'pkg', 'a.pyx'), 'ignored');

    expect(await listArtifacts(dir)).toEqual([
      { path: 'mod.pyd', sizeBytes: 0 },
      { path: 'pkg/a.cpython-311-x86_64-linux-gnu.so', sizeBytes: 6 },
      { path: 'pkg/sub/b.so', sizeBytes: 3 },
    ]);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await listArtifacts(path.join(dir, 'nope'))).toEqual([]);
  });
});

describe('findCompiledModule', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-module-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('finds a tagged module beside the source', async () => {
    await fs.writeFile(path.join(dir, 'a.pyx'), '');
    await fs.writeFile(path.join(dir, 'ab.so'), '');
    await fs.writeFile(path.join(dir, 'a.c'), '');
    await fs.writeFile(path.join(dir, 'a.cpython-311-x86_64-linux-gnu.so'), '');

    expect(await findCompiledModule(path.join(dir, 'a.pyx'))).toBe(
      path.join(dir, 'a.cpython-311-x86_64-linux-gnu.so'),
    );
  });

  it('finds an untagged module', async () => {
    await fs.writeFile(path.join(dir, 'b.pyd'), '');
    expect(await findCompiledModule(path.join(dir, 'b.pyx'))).toBe(path.join(dir, 'b.pyd'));
  });

  it('returns undefined when the compiler left no module', async () => {
    await fs.writeFile(path.join(dir, 'a.pyx'), '');
    await fs.writeFile(path.join(dir, 'ab.so'), '');
    expect(await findCompiledModule(path.join(dir, 'a.pyx'))).toBeUndefined();
  });
});

describe('formatSize', () => {
  it('picks a unit', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1536)).toBe('1.5 KiB');
    expect(formatSize(3 * 1024 * 1024)).toBe('3.0 MiB');
  });
});
