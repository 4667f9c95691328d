import ignore, { type Ignore } from 'ignore';

/**
 * Every matcher is case-sensitive, and takes any relative path, including names made only of
 * dots such as `...`.
 */
const MATCHER_OPTIONS = { ignorecase: false, allowRelativePaths: true };

/** A gitignore-style matcher: a rule matching a directory covers everything below it. */
export function treeMatcher(rules: string | readonly string[]): Ignore {
  return ignore(MATCHER_OPTIONS).add(typeof rules === 'string' ? rules : [...rules]);
}

/**
 * A matcher that judges a file by its own path only, so `*.lua` does not select
 * `vendor.lua/README.md`. The closing `!*\/` rule leaves every directory unmatched, which keeps
 * a match on a parent from carrying over to the files inside it.
 */
export function fileMatcher(rules: readonly string[]): Ignore {
  return treeMatcher([...rules, '!*/']);
}
