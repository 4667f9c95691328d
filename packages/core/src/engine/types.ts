import type { FormatConfig, MaybePromise } from '@moonfmt/shared';

/**
 * Character offsets into the input, start inclusive and end exclusive.
 * A missing bound extends to that end of the input.
 */
export interface FormatRange {
  readonly start?: number;
  readonly end?: number;
}

/**
 * A formatter for one source text. Implementations are shared by every job of a run and may be
 * called concurrently.
 */
export interface FormatEngine {
  format(content: string, config: FormatConfig, range?: FormatRange): MaybePromise<string>;
}
