import type { Ignore } from 'ignore';
import { ConfigError } from '@moonfmt/shared';
import { expandGlob, GlobSyntaxError } from './glob';
import { fileMatcher, treeMatcher } from './matchers';

/**
 * Include-glob overrides. A plain pattern whitelists, a `!pattern` excludes, and the last
 * matching pattern wins. Without any whitelist pattern everything not excluded is kept.
 *
 * Internally the whitelist is the `ignore` matcher's "ignored" state and exclusions its
 * "unignored" state. Files are judged by their own path; directories by gitignore rules.
 */
export class OverrideMatcher {
  private constructor(
    private readonly files: Ignore,
    private readonly directories: Ignore,
    private readonly hasWhitelist: boolean,
    readonly patterns: readonly string[],
  ) {}

  /**
   * @throws ConfigError when a pattern cannot be parsed
   */
  static build(patterns: readonly string[]): OverrideMatcher {
    const rules: string[] = [];
    let hasWhitelist = false;

    for (const pattern of patterns) {
      const negated = pattern.startsWith('!');
      const body = negated ? pattern.slice(1) : pattern;
      let expanded: string[];
      try {
        if (body.trim() === '') {
          throw new GlobSyntaxError('empty pattern');
        }
        expanded = expandGlob(body);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`error: cannot parse glob pattern ${pattern}: ${reason}`, {
          details: { pattern },
        });
      }

      rules.push(...expanded.map((glob) => (negated ? `!${glob}` : glob)));
      hasWhitelist ||= !negated;
    }

    return new OverrideMatcher(fileMatcher(rules), treeMatcher(rules), hasWhitelist, [
      ...patterns,
    ]);
  }

  /** Whether a file reached by recursion is selected. `matchPath` is relative, forward-slashed. */
  matchesFile(matchPath: string): boolean {
    if (!matchPath) return !this.hasWhitelist;
    const result = this.files.test(matchPath);
    if (result.unignored) return false;
    if (result.ignored) return true;
    return !this.hasWhitelist;
  }

  /** Directories are pruned only by an explicit exclusion. */
  excludesDirectory(matchPath: string): boolean {
    if (!matchPath) return false;
    return this.directories.test(`${matchPath}/`).unignored;
  }
}
