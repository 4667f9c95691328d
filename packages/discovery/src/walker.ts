import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { WalkError } from '@moonfmt/shared';
import { ancestorsOf, isIgnored, readIgnoreLayer, type IgnoreStack } from './ignore-stack';
import { relativeWithin } from './paths';
import type { OverrideMatcher } from './overrides';
import {
  IGNORE_FILENAME,
  STDIN_MARKER,
  type DiscoverOptions,
  type DiscoveryEvent,
} from './types';

type Fs = typeof nodeFs;

interface WalkContext {
  cwd: string;
  ignoreFilename: string;
  overrides?: OverrideMatcher;
  /** Absolute path of the root being walked, the fallback base for override globs */
  rootAbs: string;
}

function walkError(displayPath: string, cause: unknown): DiscoveryEvent {
  return { kind: 'error', error: new WalkError(displayPath, displayPath, { cause }) };
}

/**
 * Streams the entries below the given roots.
 *
 * Roots are visited once each, in order: `-` yields the stdin entry, a file yields itself as an
 * explicit entry (ignore files and overrides do not apply to it), and a directory is walked
 * depth first with entries sorted by name. Hidden entries are included; symbolic links are
 * yielded when they point at a file and never descended into.
 *
 * Failures on individual entries are yielded as `error` events and the walk carries on.
 */
export class PathWalker {
  private readonly fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async *walk(roots: readonly string[], options: DiscoverOptions = {}): AsyncGenerator<DiscoveryEvent> {
    const cwd = options.cwd ?? process.cwd();
    const ignoreFilename = options.ignoreFilename ?? IGNORE_FILENAME;
    const visited = new Set<string>();
    let stdinSeen = false;

    for (const root of roots) {
      if (root === STDIN_MARKER) {
        if (!stdinSeen) {
          stdinSeen = true;
          yield { kind: 'entry', entry: { kind: 'stdin' } };
        }
        continue;
      }

      const rootAbs = path.resolve(cwd, root);
      if (visited.has(rootAbs)) continue;
      visited.add(rootAbs);

      let stats;
      try {
        stats = await this.fs.stat(rootAbs);
      } catch (error) {
        yield walkError(root, error);
        continue;
      }

      if (stats.isFile()) {
        yield { kind: 'entry', entry: { kind: 'file', path: root, explicit: true } };
      } else if (stats.isDirectory()) {
        const ctx: WalkContext = { cwd, ignoreFilename, overrides: options.overrides, rootAbs };
        let stack: IgnoreStack = [];
        if (options.parents ?? true) {
          for (const ancestor of ancestorsOf(rootAbs)) {
            try {
              const layer = await readIgnoreLayer(ancestor, ignoreFilename, this.fs);
              if (layer) stack = [...stack, layer];
            } catch (error) {
              yield walkError(path.join(ancestor, ignoreFilename), error);
            }
          }
        }
        yield* this.walkDirectory(root, rootAbs, stack, ctx);
      }
    }
  }

  private async *walkDirectory(
    displayDir: string,
    absDir: string,
    parentStack: IgnoreStack,
    ctx: WalkContext,
  ): AsyncGenerator<DiscoveryEvent> {
    let stack = parentStack;
    try {
      const layer = await readIgnoreLayer(absDir, ctx.ignoreFilename, this.fs);
      if (layer) stack = [...stack, layer];
    } catch (error) {
      yield walkError(path.join(displayDir, ctx.ignoreFilename), error);
    }

    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(absDir, { withFileTypes: true });
    } catch (error) {
      yield walkError(displayDir, error);
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const displayPath = path.join(displayDir, entry.name);
      const absPath = path.join(absDir, entry.name);

      if (entry.isDirectory()) {
        let pruned: boolean;
        try {
          pruned = this.prunes(stack, absPath, ctx);
        } catch (error) {
          yield walkError(displayPath, error);
          continue;
        }
        if (!pruned) yield* this.walkDirectory(displayPath, absPath, stack, ctx);
        continue;
      }

      if (entry.isSymbolicLink()) {
        let target;
        try {
          target = await this.fs.stat(absPath);
        } catch {
          continue; // dangling link
        }
        if (!target.isFile()) continue;
      } else if (!entry.isFile()) {
        continue;
      }

      let selected: boolean;
      try {
        selected = this.selects(stack, absPath, ctx);
      } catch (error) {
        yield walkError(displayPath, error);
        continue;
      }
      if (selected) {
        yield { kind: 'entry', entry: { kind: 'file', path: displayPath, explicit: false } };
      }
    }
  }

  private prunes(stack: IgnoreStack, absDir: string, ctx: WalkContext): boolean {
    if (isIgnored(stack, absDir, true)) return true;
    return ctx.overrides?.excludesDirectory(this.overridePath(absDir, ctx)) ?? false;
  }

  private selects(stack: IgnoreStack, absFile: string, ctx: WalkContext): boolean {
    if (isIgnored(stack, absFile, false)) return false;
    return ctx.overrides?.matchesFile(this.overridePath(absFile, ctx)) ?? true;
  }

  /** Override globs are relative to the working directory, or to the root when outside it. */
  private overridePath(absPath: string, ctx: WalkContext): string {
    return relativeWithin(ctx.cwd, absPath) ?? relativeWithin(ctx.rootAbs, absPath) ?? '';
  }
}
