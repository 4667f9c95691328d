import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Readable } from 'stream';
import { shouldFormat } from '@moonfmt/discovery';
import { ConfigError, RunOptionsSchema, UsageError, type RunOptionsInput } from '@moonfmt/shared';
import { BrokenStream, CaptureStream, MemoryLogger } from '../__fixtures__/io';
import { runFormat } from './controller';

vi.mock('@moonfmt/discovery', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@moonfmt/discovery')>();
  return { ...actual, shouldFormat: vi.fn(actual.shouldFormat) };
});

describe('runFormat', () => {
  let tmpDir: string;
  let stdout: CaptureStream;
  let logger: MemoryLogger;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'moonfmt-run-test-'));
    stdout = new CaptureStream();
    logger = new MemoryLogger();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  const read = (filePath: string) => fs.readFile(path.join(tmpDir, filePath), 'utf8');

  function run(input: RunOptionsInput, stdin: Readable = Readable.from([])) {
    return runFormat(RunOptionsSchema.parse({ color: 'never', ...input }), {
      cwd: tmpDir,
      logger,
      stdout,
      stdin,
    });
  }

  it('fails before reading anything when no files are given', async () => {
    await expect(run({ files: [] })).rejects.toThrow(UsageError);
    await expect(run({ files: [] })).rejects.toThrow('error: no files provided');
  });

  it('exits 0 and rewrites files in write mode', async () => {
    await createFiles({ 'a.lua': '    x = 1  \n', 'src/b.lua': '\ty = 2\n' });

    const result = await run({ files: ['.'] });

    expect(result).toEqual({ exitCode: 0, dispatched: 2, processed: 2 });
    expect(await read('a.lua')).toBe('\tx = 1\n');
    expect(await read('src/b.lua')).toBe('\ty = 2\n');
    expect(stdout.text).toBe('');
  });

  it('exits 0 in check mode when everything is formatted', async () => {
    await createFiles({ 'a.lua': 'x = 1\n' });

    expect((await run({ files: ['.'], check: true })).exitCode).toBe(0);
    expect(stdout.text).toBe('');
  });

  it('emits one diff per unformatted file in check mode and touches nothing', async () => {
    await createFiles({ 'a.lua': 'x = 1\n', 'b.lua': 'y = 2   \n' });

    const result = await run({ files: ['.'], check: true });

    expect(result.exitCode).toBe(1);
    expect(stdout.chunks).toEqual(['Diff in b.lua:\n   1      |-y = 2   \n        1 |+y = 2\n']);
    expect(await read('b.lua')).toBe('y = 2   \n');
  });

  it('only recurses into lua files but formats explicit paths of any kind', async () => {
    await createFiles({ 'a.lua': 'a  \n', 'notes.txt': 'n  \n', 'b.txt': 'b  \n' });

    const result = await run({ files: ['.', 'b.txt'] });

    expect(result).toEqual({ exitCode: 0, dispatched: 2, processed: 2 });
    expect(await read('a.lua')).toBe('a\n');
    expect(await read('b.txt')).toBe('b\n');
    expect(await read('notes.txt')).toBe('n  \n');
  });

  it('diffs explicit paths of any kind in check mode and leaves them untouched', async () => {
    await createFiles({ 'a.lua': 'a  \n', 'b.txt': 'b  \n' });

    const result = await run({ files: ['a.lua', 'b.txt'], check: true });

    expect(result).toEqual({ exitCode: 1, dispatched: 2, processed: 2 });
    expect([...stdout.chunks].sort()).toEqual([
      'Diff in a.lua:\n   1      |-a  \n        1 |+a\n',
      'Diff in b.txt:\n   1      |-b  \n        1 |+b\n',
    ]);
    expect(await read('a.lua')).toBe('a  \n');
    expect(await read('b.txt')).toBe('b  \n');
  });

  it('leaves files inside a directory named like a lua file alone', async () => {
    await createFiles({ 'vendor.lua/README.md': 'keep  \n', 'vendor.lua/init.lua': 'x  \n' });

    const result = await run({ files: ['.'] });

    expect(result).toEqual({ exitCode: 0, dispatched: 1, processed: 1 });
    expect(await read('vendor.lua/README.md')).toBe('keep  \n');
    expect(await read('vendor.lua/init.lua')).toBe('x\n');
  });

  it('matches the lua extension case-sensitively', async () => {
    await createFiles({ 'NOTES.LUA': 'n  \n' });

    const result = await run({ files: ['.'] });

    expect(result).toEqual({ exitCode: 0, dispatched: 0, processed: 0 });
    expect(await read('NOTES.LUA')).toBe('n  \n');
  });

  it.skipIf(process.platform === 'win32')('walks past names made only of dots', async () => {
    await createFiles({ '...': 'dots  \n', 'a.lua': 'a  \n' });

    const result = await run({ files: ['.'] });

    expect(result).toEqual({ exitCode: 0, dispatched: 1, processed: 1 });
    expect(logger.errors).toEqual([]);
    expect(await read('...')).toBe('dots  \n');
    expect(await read('a.lua')).toBe('a\n');
  });

  it('reports an entry the filter cannot judge and carries on', async () => {
    await createFiles({ 'a.lua': 'a  \n', 'b.lua': 'b  \n' });
    vi.mocked(shouldFormat).mockImplementationOnce(() => {
      throw new RangeError('bad path');
    });

    const result = await run({ files: ['.'] });

    expect(result).toEqual({ exitCode: 1, dispatched: 1, processed: 1 });
    expect(logger.errors).toEqual(['error: could not walk: a.lua: bad path']);
    expect(await read('a.lua')).toBe('a  \n');
    expect(await read('b.lua')).toBe('b\n');
  });

  it('logs diffs it cannot write to a closed stdout and still finishes', async () => {
    await createFiles({ 'a.lua': 'a  \n', 'b.lua': 'b  \n' });
    const closed = new BrokenStream(new Error('EPIPE'));

    const result = await runFormat(
      RunOptionsSchema.parse({ files: ['.'], check: true, color: 'never', numThreads: 1 }),
      { cwd: tmpDir, logger, stdout: closed, stdin: Readable.from([]) },
    );

    expect(result).toEqual({ exitCode: 1, dispatched: 2, processed: 2 });
    expect(logger.errors).toHaveLength(2);
    expect(logger.errors[0]).toBe('could not write diff to stdout: EPIPE');
    expect(closed.listenerCount('error')).toBe(0);
    expect(await read('a.lua')).toBe('a  \n');
  });

  it('lets override globs replace the default extension filter', async () => {
    await createFiles({ 'a.lua': 'a  \n', 'b.luau': 'b  \n' });

    const result = await run({ files: ['.'], glob: ['**/*.luau'] });

    expect(result.dispatched).toBe(1);
    expect(await read('a.lua')).toBe('a  \n');
    expect(await read('b.luau')).toBe('b\n');
  });

  it('rejects an unparsable glob before touching any file', async () => {
    await createFiles({ 'a.lua': 'a  \n' });

    const error = await run({ files: ['.'], glob: ['src/[a'] }).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty(
      'message',
      "error: cannot parse glob pattern src/[a: unclosed character class; missing ']'",
    );
    expect(await read('a.lua')).toBe('a  \n');
  });

  it('fails the run when check mode meets stdin', async () => {
    const stdin = Readable.from(['x  \n']);

    const result = await run({ files: ['-'], check: true }, stdin);

    expect(result).toEqual({ exitCode: 1, dispatched: 1, processed: 1 });
    expect(logger.errors).toEqual(['warning: `--check` cannot be used whilst reading from stdin']);
    expect(stdout.text).toBe('');
  });

  it('formats stdin to stdout', async () => {
    const result = await run({ files: ['-'] }, Readable.from(['x  \n']));

    expect(result.exitCode).toBe(0);
    expect(stdout.text).toBe('x\n');
  });

  it('reports a missing root, fails, and still formats the rest', async () => {
    await createFiles({ 'a.lua': 'a  \n' });

    const result = await run({ files: ['missing.lua', 'a.lua'] });

    expect(result).toEqual({ exitCode: 1, dispatched: 1, processed: 1 });
    expect(logger.errors).toHaveLength(1);
    expect(logger.errors[0]).toMatch(/^error: could not walk: missing\.lua: ENOENT/);
    expect(await read('a.lua')).toBe('a\n');
  });

  it('fails the run when a single file fails', async () => {
    await createFiles({ 'bin.lua': '\0', 'ok.lua': 'ok  \n' });

    const result = await run({ files: ['.'] });

    expect(result.exitCode).toBe(1);
    expect(logger.errors).toEqual(['Could not format file bin.lua: input is not a text file']);
    expect(await read('ok.lua')).toBe('ok\n');
  });

  it('reads configuration from the working directory and command-line overrides', async () => {
    await createFiles({ '.moonfmt.yaml': 'indentType: Spaces\nindentWidth: 2\n', 'a.lua': '\tx\n' });

    await run({ files: ['a.lua'] });
    expect(await read('a.lua')).toBe('  x\n');

    await run({ files: ['a.lua'], formatOverrides: { indentWidth: 3 } });
    expect(await read('a.lua')).toBe('  x\n');

    await run({ files: ['a.lua'], formatOverrides: { indentType: 'Tabs', indentWidth: 2 } });
    expect(await read('a.lua')).toBe('\tx\n');
  });

  it('applies the range to every file', async () => {
    await createFiles({ 'a.lua': 'a  \nb  \n' });

    await run({ files: ['a.lua'], rangeStart: 0, rangeEnd: 3 });

    expect(await read('a.lua')).toBe('a\nb  \n');
  });

  it('rejects a reversed range', async () => {
    await expect(run({ files: ['.'], rangeStart: 5, rangeEnd: 1 })).rejects.toThrow(
      'error: invalid range: start 5 is after end 1',
    );
  });

  it('logs the pool size', async () => {
    await createFiles({ 'a.lua': 'a\n' });

    await run({ files: ['a.lua'], numThreads: 3, verbose: true });

    expect(logger.debugs[0]).toBe('creating a pool with 3 threads');
  });

  it('handles one outcome per file under concurrency without interleaving diffs', async () => {
    const names = Array.from({ length: 40 }, (_, i) => `f${String(i).padStart(2, '0')}.lua`);
    await createFiles(Object.fromEntries(names.map((name, i) => [name, `    x = ${i}  \n`])));

    const result = await run({ files: ['.'], check: true, numThreads: 4 });

    expect(result).toEqual({ exitCode: 1, dispatched: 40, processed: 40 });
    const expected = names.map(
      (name, i) => `Diff in ${name}:\n   1      |-    x = ${i}  \n        1 |+\tx = ${i}\n`,
    );
    expect([...stdout.chunks].sort()).toEqual(expected.sort());
  });
});
