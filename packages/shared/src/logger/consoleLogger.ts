import { formatErrorChain } from '../errors';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    // stdout is reserved for diffs and formatted stdin
    console.error(message);
  }

  error(error: Error, message?: string): void {
    const chain = formatErrorChain(error);
    console.error(message ? `${message}: ${chain}` : chain);
  }
}
