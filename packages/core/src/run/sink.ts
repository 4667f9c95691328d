import { toError, type Logger } from '@moonfmt/shared';
import type { JobOutcome } from './outcome';
import type { ExitStatus } from './status';
import { writeAll } from './streams';

export interface ResultSinkOptions {
  stdout: NodeJS.WritableStream;
  logger: Logger;
  status: ExitStatus;
}

/**
 * The single consumer of job outcomes. Outcomes are handled one at a time, so diff output from
 * concurrent jobs never interleaves.
 */
export class ResultSink {
  private handled = 0;

  constructor(private readonly options: ResultSinkOptions) {}

  /** Outcomes consumed so far. */
  get processed(): number {
    return this.handled;
  }

  async drain(outcomes: AsyncIterable<JobOutcome>): Promise<void> {
    for await (const outcome of outcomes) {
      this.handled++;
      await this.handle(outcome);
    }
  }

  private async handle(outcome: JobOutcome): Promise<void> {
    const { stdout, logger, status } = this.options;
    switch (outcome.kind) {
      case 'completed':
        return;
      case 'diff':
        status.fail();
        try {
          await writeAll(stdout, outcome.diff);
        } catch (error) {
          await logger.error(toError(error), 'could not write diff to stdout');
        }
        return;
      case 'failed':
        status.fail();
        await logger.error(outcome.error);
        return;
    }
  }
}
