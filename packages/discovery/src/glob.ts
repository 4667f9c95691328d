/**
 * Syntax error in a user-supplied glob. Messages follow the usual glob-library wording.
 */
export class GlobSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GlobSyntaxError';
  }
}

function closeOfClass(pattern: string, open: number): number {
  let i = open + 1;
  if (pattern[i] === '!' || pattern[i] === '^') i++;
  // a leading `]` is literal
  if (pattern[i] === ']') i++;
  const close = pattern.indexOf(']', i);
  if (close === -1) {
    throw new GlobSyntaxError("unclosed character class; missing ']'");
  }

  const body = pattern.slice(open + 1, close);
  for (let j = 1; j + 1 < body.length; j++) {
    if (body[j] !== '-') continue;
    const from = body[j - 1];
    const to = body[j + 1];
    if (from > to) {
      throw new GlobSyntaxError(`invalid range; '${from}' > '${to}'`);
    }
  }
  return close;
}

/**
 * Validates one glob and expands `{a,b}` alternates into plain gitignore-style patterns,
 * which the `ignore` matcher understands.
 *
 * @throws GlobSyntaxError for unclosed classes or alternates, nested alternates, inverted
 * ranges and a trailing escape.
 */
export function expandGlob(pattern: string): string[] {
  const segments: string[][] = [];
  let text = '';
  let alternates: string[] | undefined;

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    switch (ch) {
      case '\\': {
        if (i + 1 >= pattern.length) {
          throw new GlobSyntaxError('dangling escape');
        }
        text += ch + pattern[i + 1];
        i++;
        break;
      }
      case '[': {
        const close = closeOfClass(pattern, i);
        text += pattern.slice(i, close + 1);
        i = close;
        break;
      }
      case '{': {
        if (alternates) {
          throw new GlobSyntaxError('nested alternate groups are not allowed');
        }
        segments.push([text]);
        text = '';
        alternates = [];
        break;
      }
      case ',': {
        if (alternates) {
          alternates.push(text);
          text = '';
        } else {
          text += ch;
        }
        break;
      }
      case '}': {
        if (!alternates) {
          throw new GlobSyntaxError("unopened alternate group; missing '{'");
        }
        alternates.push(text);
        segments.push(alternates);
        alternates = undefined;
        text = '';
        break;
      }
      default:
        text += ch;
    }
  }

  if (alternates) {
    throw new GlobSyntaxError("unclosed alternate group; missing '}'");
  }
  segments.push([text]);

  return segments.reduce<string[]>(
    (acc, options) => acc.flatMap((prefix) => options.map((option) => prefix + option)),
    [''],
  );
}
