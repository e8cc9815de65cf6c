import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { atomicWrite } from './io';

describe('atomicWrite', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyforge-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const target = path.join(tmpDir, 'nested', 'deeper', 'state.json');
    await atomicWrite(target, '{"a":1}');
    expect(await fs.readFile(target, 'utf-8')).toBe('{"a":1}');
  });

  it('replaces existing content and leaves no temp files behind', async () => {
    const target = path.join(tmpDir, 'state.json');
    await atomicWrite(target, 'old');
    await atomicWrite(target, 'new');

    expect(await fs.readFile(target, 'utf-8')).toBe('new');
    expect(await fs.readdir(tmpDir)).toEqual(['state.json']);
  });

  it('keeps the previous file when the rename target is unusable', async () => {
    const target = path.join(tmpDir, 'state.json');
    await fs.mkdir(target);
    await fs.writeFile(path.join(target, 'inner'), 'x');

    await expect(atomicWrite(target, 'new')).rejects.toThrow();
    expect(await fs.readdir(tmpDir)).toEqual(['state.json']);
  });
});
