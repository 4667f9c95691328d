import type { WalkError } from '@moonfmt/shared';
import type { OverrideMatcher } from './overrides';

/** Root that addresses standard input instead of a path. */
export const STDIN_MARKER = '-';

/** Per-directory ignore file, gitignore syntax. */
export const IGNORE_FILENAME = '.moonfmtignore';

/** Files reached by recursion must match this unless override globs are given. */
export const DEFAULT_GLOB = '**/*.lua';

export type DiscoveredEntry =
  | { kind: 'stdin' }
  | {
      kind: 'file';
      /** Path as the user would write it: the root joined with the walked segments */
      path: string;
      /** True when the path was named as a root rather than reached by recursion */
      explicit: boolean;
    };

export type DiscoveryEvent =
  | { kind: 'entry'; entry: DiscoveredEntry }
  | { kind: 'error'; error: WalkError };

export interface DiscoverOptions {
  /** Directory relative roots and override globs are resolved against. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Compiled include-glob overrides. When set, they alone decide which recursed files are kept. */
  overrides?: OverrideMatcher;
  /** Ignore-file name honoured in every traversed directory. */
  ignoreFilename?: string;
  /** Also honour ignore files found in the parent directories of each root. Defaults to true. */
  parents?: boolean;
}
