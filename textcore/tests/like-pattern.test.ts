import { describe, it, test, expect } from 'vitest';
import { decodeUtf8 } from '../buffer/c-string';
import { createTextContext } from '../context/text-context';
import { DiagnosticCode } from '../context/diagnostics';
import { escapeLike, globToLike } from '../sql/like-pattern';

const DOLLAR = 0x24;

describe('globToLike', () => {
  test.each([
    ['foo*', 'foo%'],
    ['f?o', 'f_o'],
    ['*foo%bar*', '%foo$%bar%'],
    ['a_b', 'a$_b'],
    ['a$b', 'a$$b'],
    ['a\\*b', 'a$*b'],
    ['a\\?', 'a$?'],
    ['ab\\', 'ab'],
    ['', ''],
  ])('%j becomes %j', (glob, expected) => {
    expect(decodeUtf8(globToLike(glob, DOLLAR))).toBe(expected);
  });
});

describe('escapeLike', () => {
  it('escapes LIKE wildcards and leaves glob wildcards alone', () => {
    expect(decodeUtf8(escapeLike('50%_off', DOLLAR))).toBe('50$%$_off');
    expect(decodeUtf8(escapeLike('a*b?', DOLLAR))).toBe('a*b?');
  });

  it('takes a backslash as an escape for the next character', () => {
    expect(decodeUtf8(escapeLike('x\\y', DOLLAR))).toBe('x$y');
  });

  it('writes a non-ASCII escape character as UTF-8', () => {
    expect(Array.from(escapeLike('%', 0xA7))).toEqual([0xC2, 0xA7, 0x25]);
  });

  it('gives an empty pattern when it outgrows the context limit', () => {
    const codes: DiagnosticCode[] = [];
    const context = createTextContext({ stringLimit: 3, onDiagnostic: (code) => { codes.push(code); } });
    expect(escapeLike('abcd', DOLLAR, context).length).toBe(0);
    expect(codes).toEqual([DiagnosticCode.StringTooBig]);
  });
});
