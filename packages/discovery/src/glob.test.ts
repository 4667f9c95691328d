import { describe, it, expect } from 'vitest';
import { expandGlob, GlobSyntaxError } from './glob';

describe('expandGlob', () => {
  it('passes plain globs through', () => {
    expect(expandGlob('**/*.lua')).toEqual(['**/*.lua']);
    expect(expandGlob('src/[a-c]*.lua')).toEqual(['src/[a-c]*.lua']);
  });

  it('expands alternates, including several groups', () => {
    expect(expandGlob('*.{lua,luau}')).toEqual(['*.lua', '*.luau']);
    expect(expandGlob('{src,lib}/*.{a,b}')).toEqual(['src/*.a', 'src/*.b', 'lib/*.a', 'lib/*.b']);
  });

  it('keeps braces inside classes and escapes literal', () => {
    expect(expandGlob('[{]x')).toEqual(['[{]x']);
    expect(expandGlob('\\{x\\}')).toEqual(['\\{x\\}']);
  });

  it.each([
    ['src/[abc', "unclosed character class; missing ']'"],
    ['*.{lua', "unclosed alternate group; missing '}'"],
    ['*.lua}', "unopened alternate group; missing '{'"],
    ['{a,{b,c}}', 'nested alternate groups are not allowed'],
    ['[z-a]', "invalid range; 'z' > 'a'"],
    ['trailing\\', 'dangling escape'],
  ])('rejects %s', (pattern, message) => {
    expect(() => expandGlob(pattern)).toThrow(GlobSyntaxError);
    expect(() => expandGlob(pattern)).toThrow(message);
  });
});
