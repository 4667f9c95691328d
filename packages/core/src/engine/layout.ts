import { FormatError, type FormatConfig } from '@moonfmt/shared';
import type { FormatEngine, FormatRange } from './types';

interface Line {
  text: string;
  eol: string;
  offset: number;
}

function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  const breaks = /\r?\n/g;
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = breaks.exec(content)) !== null) {
    lines.push({ text: content.slice(last, match.index), eol: match[0], offset: last });
    last = match.index + match[0].length;
  }
  if (last < content.length) {
    lines.push({ text: content.slice(last), eol: '', offset: last });
  }
  return lines;
}

function indentColumns(indent: string, width: number): number {
  let columns = 0;
  for (const char of indent) {
    columns += char === '\t' ? width : 1;
  }
  return columns;
}

/**
 * Whitespace-level formatter. It does not parse the source: it rewrites indentation, trailing
 * whitespace, line endings and the final newline, leaving every other character untouched.
 */
export class LayoutEngine implements FormatEngine {
  format(content: string, config: FormatConfig, range?: FormatRange): string {
    if (content.includes('\0')) {
      throw new FormatError('input is not a text file');
    }
    const start = range?.start ?? 0;
    const end = range?.end ?? Number.POSITIVE_INFINITY;
    if (start > end) {
      throw new FormatError(`invalid range: start ${start} is after end ${end}`);
    }

    const newline = config.lineEndings === 'Windows' ? '\r\n' : '\n';
    const lines = splitLines(content);
    const inRange = (line: Line) => line.offset >= start && line.offset < end;

    for (const line of lines) {
      if (!inRange(line)) continue;
      line.text = this.reindent(line.text.trimEnd(), config);
      if (line.eol) line.eol = newline;
    }

    const lastLine = lines.at(-1);
    if (lastLine && inRange(lastLine)) {
      while (lines.length > 0 && lines[lines.length - 1].text === '') {
        lines.pop();
      }
      const tail = lines.at(-1);
      if (tail) tail.eol = newline;
    }

    return lines.map((line) => line.text + line.eol).join('');
  }

  private reindent(text: string, config: FormatConfig): string {
    const indent = /^[ \t]*/.exec(text)?.[0] ?? '';
    if (indent.length === 0) return text;
    const columns = indentColumns(indent, config.indentWidth);
    const body = text.slice(indent.length);
    if (config.indentType === 'Spaces') {
      return ' '.repeat(columns) + body;
    }
    const levels = Math.floor(columns / config.indentWidth);
    return '\t'.repeat(levels) + ' '.repeat(columns % config.indentWidth) + body;
  }
}
