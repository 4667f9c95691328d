import { expandGlob } from './glob';
import { fileMatcher } from './matchers';
import { toMatchPath } from './paths';
import { DEFAULT_GLOB, type DiscoveredEntry } from './types';

const defaultMatcher = fileMatcher(expandGlob(DEFAULT_GLOB));

export function matchesDefaultGlob(filePath: string): boolean {
  const matchPath = toMatchPath(filePath);
  return matchPath !== '' && defaultMatcher.ignores(matchPath);
}

/**
 * Decides whether a discovered entry is dispatched:
 *
 * | entry                     | decision                                   |
 * | ------------------------- | ------------------------------------------ |
 * | stdin                     | always                                     |
 * | explicitly named file     | always, with or without override globs     |
 * | overrides supplied        | already decided by the overrides upstream  |
 * | otherwise                 | iff the path matches {@link DEFAULT_GLOB}  |
 */
export function shouldFormat(entry: DiscoveredEntry, useDefaultGlob: boolean): boolean {
  if (entry.kind === 'stdin' || entry.explicit || !useDefaultGlob) {
    return true;
  }
  return matchesDefaultGlob(entry.path);
}
