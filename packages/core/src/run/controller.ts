import { OverrideMatcher, PathWalker, shouldFormat } from '@moonfmt/discovery';
import {
  ConsoleLogger,
  UsageError,
  WalkError,
  type Logger,
  type RunOptions,
} from '@moonfmt/shared';
import { ConfigLoader } from '../config/loader';
import { UnifiedDiffRenderer, resolveColor, type DiffRenderer } from '../diff';
import { LayoutEngine, buildRange, type FormatEngine } from '../engine';
import { Channel } from './channel';
import { runJob, type JobContext } from './job';
import type { JobOutcome } from './outcome';
import { WorkerPool } from './pool';
import { ResultSink } from './sink';
import { ExitStatus, type ExitCode } from './status';

/**
 * Collaborators of a run. Every field defaults to the real implementation.
 */
export interface RunDeps {
  cwd?: string;
  engine?: FormatEngine;
  diffRenderer?: DiffRenderer;
  logger?: Logger;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  walker?: PathWalker;
}

export interface RunResult {
  exitCode: ExitCode;
  /** Jobs dispatched, one per entry that survived discovery and filtering */
  dispatched: number;
  /** Outcomes the sink consumed */
  processed: number;
}

/**
 * Formats (or, in check mode, diffs) every file reachable from `options.files`.
 *
 * Configuration problems throw before anything is read. Everything after that, including
 * traversal errors and per-file failures, is reported through the logger and folded into the
 * exit code.
 */
export async function runFormat(options: RunOptions, deps: RunDeps = {}): Promise<RunResult> {
  if (options.files.length === 0) {
    throw new UsageError('error: no files provided');
  }

  const cwd = deps.cwd ?? process.cwd();
  const logger = deps.logger ?? new ConsoleLogger({ verbose: options.verbose });
  const stdout = deps.stdout ?? process.stdout;

  const config = ConfigLoader.load({
    cwd,
    configPath: options.configPath,
    flags: options.formatOverrides,
  });
  const range = buildRange(options.rangeStart, options.rangeEnd);
  const overrides = options.glob ? OverrideMatcher.build(options.glob) : undefined;

  const ctx: JobContext = {
    cwd,
    check: options.check,
    config,
    range,
    engine: deps.engine ?? new LayoutEngine(),
    diff: deps.diffRenderer ?? new UnifiedDiffRenderer(),
    useColor: resolveColor(options.color),
    logger,
    stdin: deps.stdin ?? process.stdin,
    stdout,
  };

  await logger.debug(`creating a pool with ${options.numThreads} threads`);
  const pool = new WorkerPool(options.numThreads);
  const channel = new Channel<JobOutcome>();
  const tx = channel.sender();
  const status = new ExitStatus();
  const sink = new ResultSink({ stdout, logger, status });
  pool.spawn(() => sink.drain(channel.receive()));

  const walker = deps.walker ?? new PathWalker();
  let dispatched = 0;
  try {
    for await (const event of walker.walk(options.files, { cwd, overrides })) {
      if (event.kind === 'error') {
        await logger.error(event.error, 'error: could not walk');
        status.fail();
        continue;
      }
      const { entry } = event;
      let selected: boolean;
      try {
        selected = shouldFormat(entry, overrides === undefined);
      } catch (cause) {
        const shown = entry.kind === 'file' ? entry.path : '-';
        await logger.error(new WalkError(shown, shown, { cause }), 'error: could not walk');
        status.fail();
        continue;
      }
      if (!selected) {
        continue;
      }
      const jobTx = tx.clone();
      dispatched++;
      pool.execute(() => runJob(entry, ctx, jobTx));
    }
  } finally {
    tx.close();
  }

  await pool.join();
  return { exitCode: status.code, dispatched, processed: sink.processed };
}
