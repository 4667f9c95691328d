import path from 'node:path';

/**
 * Normalizes a path into the relative, forward-slash form glob matchers expect:
 * no drive or root prefix, no leading `./` or `../` segments.
 */
export function toMatchPath(p: string): string {
  const { root } = path.parse(p);
  const segments = p
    .slice(root.length)
    .split(/[\\/]+/)
    .filter((segment) => segment !== '' && segment !== '.');

  while (segments.length > 0 && segments[0] === '..') {
    segments.shift();
  }
  return segments.join('/');
}

/**
 * Path of `absPath` as seen from `base`, or undefined when it does not lie below `base`.
 */
export function relativeWithin(base: string, absPath: string): string | undefined {
  const rel = path.relative(base, absPath);
  if (!rel || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return undefined;
  }
  return rel.split(path.sep).join('/');
}
