import nodeFs from 'node:fs/promises';
import path from 'node:path';
import type { Ignore } from 'ignore';
import { errnoCode } from '@moonfmt/shared';
import { treeMatcher } from './matchers';
import { relativeWithin } from './paths';

type Fs = Pick<typeof nodeFs, 'readFile'>;

export interface IgnoreLayer {
  /** Absolute directory holding the ignore file; patterns are relative to it */
  base: string;
  matcher: Ignore;
}

/**
 * Ignore files in effect for a directory, shallowest first.
 * Kept immutable so sibling subtrees never see each other's rules.
 */
export type IgnoreStack = readonly IgnoreLayer[];

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Reads `<dir>/<filename>` into a layer, or returns undefined when there is none.
 * Any other read failure propagates.
 */
export async function readIgnoreLayer(
  dir: string,
  filename: string,
  fs: Fs = nodeFs,
): Promise<IgnoreLayer | undefined> {
  let content: string;
  try {
    content = await fs.readFile(path.join(dir, filename), 'utf-8');
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
  return { base: dir, matcher: treeMatcher(content) };
}

/** Directories strictly above `absDir`, from the filesystem root down. */
export function ancestorsOf(absDir: string): string[] {
  const ancestors: string[] = [];
  let current = path.dirname(absDir);
  let previous = absDir;
  while (current !== previous) {
    ancestors.unshift(current);
    previous = current;
    current = path.dirname(current);
  }
  return ancestors;
}

/**
 * Whether `absPath` is ignored. The deepest layer with an opinion decides; a `!pattern`
 * in a deeper file re-includes what a shallower one ignored.
 */
export function isIgnored(stack: IgnoreStack, absPath: string, isDirectory: boolean): boolean {
  for (let i = stack.length - 1; i >= 0; i--) {
    const layer = stack[i];
    const rel = relativeWithin(layer.base, absPath);
    if (rel === undefined) continue;

    const result = layer.matcher.test(isDirectory ? `${rel}/` : rel);
    if (result.ignored) return true;
    if (result.unignored) return false;
  }
  return false;
}
