import { structuredPatch } from 'diff';
import pc from 'picocolors';
import type { ColorMode } from '@moonfmt/shared';

/**
 * Renders the difference between an original and a formatted text.
 * Returns `null` when the two are identical.
 */
export interface DiffRenderer {
  render(
    original: string,
    formatted: string,
    contextLines: number,
    header: string,
    useColor: boolean,
  ): Buffer | null;
}

export const HUNK_SEPARATOR = '-'.repeat(80);

function column(line?: number): string {
  return (line === undefined ? '' : String(line)).padStart(4);
}

/**
 * Line-numbered diff built on `structuredPatch`:
 *
 * ```text
 * Diff in src/init.lua:
 *    1    1 | local x = 1
 *    2      |-  return x
 *         2 |+\treturn x
 * ```
 */
export class UnifiedDiffRenderer implements DiffRenderer {
  render(
    original: string,
    formatted: string,
    contextLines: number,
    header: string,
    useColor: boolean,
  ): Buffer | null {
    if (original === formatted) {
      return null;
    }
    const patch = structuredPatch('original', 'formatted', original, formatted, '', '', {
      context: contextLines,
    });
    if (patch.hunks.length === 0) {
      return null;
    }

    const colors = pc.createColors(useColor);
    const out: string[] = [colors.bold(header)];

    patch.hunks.forEach((hunk, index) => {
      if (index > 0) out.push(HUNK_SEPARATOR);
      let oldLine = hunk.oldStart;
      let newLine = hunk.newStart;
      for (const line of hunk.lines) {
        const sign = line.charAt(0);
        const text = line.slice(1);
        if (sign === '-') {
          out.push(colors.red(`${column(oldLine)} ${column()} |-${text}`));
          oldLine++;
        } else if (sign === '+') {
          out.push(colors.green(`${column()} ${column(newLine)} |+${text}`));
          newLine++;
        } else if (sign === ' ') {
          out.push(`${column(oldLine)} ${column(newLine)} | ${text}`);
          oldLine++;
          newLine++;
        }
        // '\' marks "No newline at end of file" and is not a line of either text
      }
    });

    return Buffer.from(`${out.join('\n')}\n`);
  }
}

/**
 * `auto` follows picocolors' terminal detection.
 */
export function resolveColor(mode: ColorMode): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return pc.isColorSupported;
}
