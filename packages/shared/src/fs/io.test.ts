import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { atomicWrite } from './io';

describe('atomicWrite', () => {
  let tmpDir: string;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('creates missing directories and writes content', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'moonfmt-io-'));
    const target = path.join(tmpDir, 'nested', 'init.lua');

    await atomicWrite(target, 'local x = 1\n');

    expect(await fs.readFile(target, 'utf8')).toBe('local x = 1\n');
    expect(await fs.readdir(path.dirname(target))).toEqual(['init.lua']);
  });

  it.skipIf(process.platform === 'win32')('preserves the mode of the replaced file', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'moonfmt-io-'));
    const target = path.join(tmpDir, 'run.lua');
    await fs.writeFile(target, 'old');
    await fs.chmod(target, 0o755);

    await atomicWrite(target, 'new');

    const stats = await fs.stat(target);
    expect(stats.mode & 0o777).toBe(0o755);
    expect(await fs.readFile(target, 'utf8')).toBe('new');
  });
});
