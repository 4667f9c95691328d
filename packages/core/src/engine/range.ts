import { ConfigError } from '@moonfmt/shared';
import type { FormatRange } from './types';

/**
 * Builds the range shared by every job of a run, or `undefined` when neither bound is given.
 */
export function buildRange(start?: number, end?: number): FormatRange | undefined {
  if (start === undefined && end === undefined) {
    return undefined;
  }
  if (start !== undefined && end !== undefined && start > end) {
    throw new ConfigError(`error: invalid range: start ${start} is after end ${end}`);
  }
  return { start, end };
}
