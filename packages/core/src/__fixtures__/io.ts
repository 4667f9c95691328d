import { Writable } from 'stream';
import { formatErrorChain, type Logger } from '@moonfmt/shared';

/** Collects everything written to it. Each write is recorded as one chunk. */
export class CaptureStream extends Writable {
  readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/**
 * A writable whose every write fails with `error`, like a closed pipe.
 * Nothing listens for `'error'`.
 */
export class BrokenStream extends Writable {
  constructor(private readonly error: Error) {
    super();
  }

  _write(_chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    callback(this.error);
  }
}

/** Records log lines as they would be printed. */
export class MemoryLogger implements Logger {
  readonly debugs: string[] = [];
  readonly errors: string[] = [];

  debug(message: string): void {
    this.debugs.push(message);
  }

  error(error: Error, message?: string): void {
    const chain = formatErrorChain(error);
    this.errors.push(message ? `${message}: ${chain}` : chain);
  }
}
