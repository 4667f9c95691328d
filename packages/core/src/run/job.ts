import fs from 'fs/promises';
import path from 'path';
import { performance } from 'perf_hooks';
import {
  DiffError,
  FormatError,
  IoError,
  UsageError,
  atomicWrite,
  toError,
  type FormatConfig,
  type Logger,
} from '@moonfmt/shared';
import type { DiscoveredEntry } from '@moonfmt/discovery';
import type { DiffRenderer } from '../diff';
import type { FormatEngine, FormatRange } from '../engine';
import type { Sender } from './channel';
import { COMPLETED, type JobOutcome } from './outcome';
import { decodeUtf8, readAll, writeAll } from './streams';

export const DIFF_CONTEXT_LINES = 3;

/**
 * Everything a job reads. Built once per run and shared by every job.
 */
export interface JobContext {
  cwd: string;
  check: boolean;
  config: FormatConfig;
  range?: FormatRange;
  engine: FormatEngine;
  diff: DiffRenderer;
  useColor: boolean;
  logger: Logger;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

async function formatFile(filePath: string, ctx: JobContext): Promise<JobOutcome> {
  const absPath = path.resolve(ctx.cwd, filePath);

  let contents: string;
  try {
    contents = decodeUtf8(await fs.readFile(absPath));
  } catch (cause) {
    throw new IoError(`Failed to read ${filePath}`, { cause, path: filePath });
  }

  const started = performance.now();
  let formatted: string;
  try {
    formatted = await ctx.engine.format(contents, ctx.config, ctx.range);
  } catch (cause) {
    throw new FormatError(`Could not format file ${filePath}`, { cause });
  }
  await ctx.logger.debug(
    `formatted ${filePath} in ${(performance.now() - started).toFixed(2)}ms`,
  );

  if (ctx.check) {
    let diff: Buffer | null;
    try {
      diff = ctx.diff.render(
        contents,
        formatted,
        DIFF_CONTEXT_LINES,
        `Diff in ${filePath}:`,
        ctx.useColor,
      );
    } catch (cause) {
      throw new DiffError(`Failed to create diff for ${filePath}`, { cause });
    }
    return diff ? { kind: 'diff', diff } : COMPLETED;
  }

  try {
    await atomicWrite(absPath, formatted);
  } catch (cause) {
    throw new IoError(`Could not write to ${filePath}`, { cause, path: filePath });
  }
  return COMPLETED;
}

async function formatStdin(ctx: JobContext): Promise<JobOutcome> {
  if (ctx.check) {
    throw new UsageError('warning: `--check` cannot be used whilst reading from stdin');
  }

  let input: string;
  try {
    input = await readAll(ctx.stdin);
  } catch (cause) {
    throw new IoError('Could not read from stdin', { cause });
  }

  let formatted: string;
  try {
    formatted = await ctx.engine.format(input, ctx.config, ctx.range);
  } catch (cause) {
    throw new FormatError('Failed to format from stdin', { cause });
  }

  try {
    await writeAll(ctx.stdout, formatted);
  } catch (cause) {
    throw new IoError('Could not output to stdout', { cause });
  }
  return COMPLETED;
}

/**
 * Formats one discovered entry and reports the outcome on `tx`, then closes `tx`.
 * Failures become a `failed` outcome; this never rejects.
 */
export async function runJob(
  entry: DiscoveredEntry,
  ctx: JobContext,
  tx: Sender<JobOutcome>,
): Promise<void> {
  try {
    let outcome: JobOutcome;
    try {
      outcome = entry.kind === 'stdin' ? await formatStdin(ctx) : await formatFile(entry.path, ctx);
    } catch (error) {
      outcome = { kind: 'failed', error: toError(error) };
    }
    tx.send(outcome);
  } finally {
    tx.close();
  }
}
