import { describe, it, expect } from 'vitest';
import { decodeUtf8, encodeUtf8 } from '../buffer/c-string';
import { validateUtf8 } from '../charset/charset-bridge';
import {
  downcaseInPlace,
  initial,
  initialInto,
  lower,
  lowerInto,
  toLowerLatin1,
  toUpperLatin1,
  unicodeDowncaseInPlace,
  unicodeInitial,
  unicodeLower,
  unicodeLowerInto,
  unicodeUpcaseInPlace,
  unicodeUpper,
  unicodeUpperInto,
  upcaseInPlace,
  upper,
  upperInto,
} from '../unicode/case-mapper';

const latin1 = (bytes: Uint8Array) => Array.from(bytes);

describe('Latin-1 case table', () => {
  it('maps letters and leaves everything else', () => {
    expect(toUpperLatin1(0x61)).toBe(0x41);
    expect(toUpperLatin1(0xE9)).toBe(0xC9);
    expect(toUpperLatin1(0xDF)).toBe(0xDF);
    expect(toUpperLatin1(0xF7)).toBe(0xF7);
    expect(toUpperLatin1(0xFF)).toBe(0xFF);
    expect(toUpperLatin1(0x31)).toBe(0x31);
    expect(toLowerLatin1(0xC9)).toBe(0xE9);
    expect(toLowerLatin1(0xD7)).toBe(0xD7);
    expect(toLowerLatin1(0x5A)).toBe(0x7A);
  });
});

describe('Latin-1 flavour', () => {
  it('maps in place up to the first NUL', () => {
    const bytes = new Uint8Array([0x68, 0x69, 0xE9, 0, 0x78]);
    expect(upcaseInPlace(bytes)).toBe(bytes);
    expect(latin1(bytes)).toEqual([0x48, 0x49, 0xC9, 0, 0x78]);
    downcaseInPlace(bytes);
    expect(latin1(bytes)).toEqual([0x68, 0x69, 0xE9, 0, 0x78]);
  });

  it('truncates into a caller buffer and terminates it', () => {
    const dest = new Uint8Array(4).fill(0x2E);
    expect(decodeUtf8(upperInto('hello', dest))).toBe('HEL');
    expect(dest[3]).toBe(0);
    expect(decodeUtf8(lowerInto('ABC', new Uint8Array(8)))).toBe('abc');
  });

  it('initial-cases into a caller buffer', () => {
    expect(decodeUtf8(initialInto('hELLO', new Uint8Array(16)))).toBe('Hello');
    const tiny = new Uint8Array(1).fill(0x2E);
    expect(initialInto('abc', tiny).length).toBe(0);
    expect(tiny[0]).toBe(0);
  });

  it('writes an empty string for absent input', () => {
    const dest = new Uint8Array(4).fill(0x2E);
    expect(upperInto(null, dest).length).toBe(0);
    expect(dest[0]).toBe(0);
  });

  it('allocates exact copies', () => {
    expect(decodeUtf8(upper('abc'))).toBe('ABC');
    expect(decodeUtf8(lower('ABC'))).toBe('abc');
    expect(decodeUtf8(initial('wORLD'))).toBe('World');
    expect(upper('').length).toBe(0);
  });

  it('keeps string input valid UTF-8', () => {
    const cafe = lower('CAFÉ');
    expect(decodeUtf8(cafe)).toBe('café');
    expect(validateUtf8(cafe)).toBe(true);
    expect(decodeUtf8(upper('straße'))).toBe('STRAßE');
    expect(decodeUtf8(initial('éCOLE'))).toBe('École');
    expect(decodeUtf8(upper('\u20ACuro'))).toBe('\u20ACURO');
  });

  it('never cuts a character of string input in half', () => {
    const dest = new Uint8Array(3).fill(0x2E);
    expect(decodeUtf8(lowerInto('AÉ', dest))).toBe('a');
    expect(dest[1]).toBe(0);
    expect(Array.from(lowerInto('É', new Uint8Array(8)))).toEqual([0xC3, 0xA9]);
  });

  it('maps byte input as Latin-1', () => {
    expect(latin1(lower(new Uint8Array([0x43, 0xC9])))).toEqual([0x63, 0xE9]);
  });
});

describe('Unicode in place', () => {
  it('uppercases codepoints of the same encoded length', () => {
    const bytes = encodeUtf8('áâ');
    expect(unicodeUpcaseInPlace(bytes)).toEqual({ changed: 2, skipped: 0 });
    expect(decodeUtf8(bytes)).toBe('ÁÂ');
  });

  it('leaves sharp s alone because its uppercase is two letters', () => {
    const bytes = encodeUtf8('thiß');
    expect(unicodeUpcaseInPlace(bytes)).toEqual({ changed: 3, skipped: 1 });
    expect(latin1(bytes)).toEqual([0x54, 0x48, 0x49, 0xC3, 0x9F]);
  });

  it('skips a mapping that would change the byte length', () => {
    const kelvin = encodeUtf8('\u212A');
    expect(unicodeDowncaseInPlace(kelvin)).toEqual({ changed: 0, skipped: 1 });
    expect(latin1(kelvin)).toEqual([0xE2, 0x84, 0xAA]);

    const dotless = encodeUtf8('\u0131');
    expect(unicodeUpcaseInPlace(dotless)).toEqual({ changed: 0, skipped: 1 });
    expect(latin1(dotless)).toEqual([0xC4, 0xB1]);
  });

  it('lowercases in place', () => {
    const bytes = encodeUtf8('THIß');
    expect(unicodeDowncaseInPlace(bytes)).toEqual({ changed: 3, skipped: 0 });
    expect(decodeUtf8(bytes)).toBe('thiß');
  });
});

describe('Unicode copies', () => {
  it('applies the full mapping', () => {
    expect(decodeUtf8(unicodeUpper('thiß'))).toBe('THISS');
    expect(decodeUtf8(unicodeUpper('aaaA'))).toBe('AAAA');
    expect(decodeUtf8(unicodeLower('ÁÂ'))).toBe('áâ');
    expect(decodeUtf8(unicodeInitial('éCOLE'))).toBe('École');
  });

  it('replaces malformed input', () => {
    expect(latin1(unicodeUpper(new Uint8Array([0x61, 0xFF])))).toEqual([0x41, 0xEF, 0xBF, 0xBD]);
  });

  it('never splits a codepoint when writing into a buffer', () => {
    const dest = new Uint8Array(3);
    expect(decodeUtf8(unicodeUpperInto('aé', dest))).toBe('A');
    expect(dest[1]).toBe(0);
    expect(decodeUtf8(unicodeUpperInto('ß', new Uint8Array(3)))).toBe('SS');
    expect(decodeUtf8(unicodeLowerInto('ÀB', new Uint8Array(8)))).toBe('àb');
  });
});
