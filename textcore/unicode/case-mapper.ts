/**
 * Case transforms in two flavours.
 *
 * Latin-1: one character in, one character out, through a fixed 256-entry
 * table. Byte input is treated as Latin-1 whatever its real encoding. A JS
 * string is mapped per UTF-16 unit (units above 0xFF pass through) and the
 * result is UTF-8 encoded, so string input always yields valid UTF-8.
 *
 * Unicode: UTF-8 in, UTF-8 out. The in-place forms cannot change the length
 * of the string, so they only apply mappings to a single codepoint of the
 * same encoded length and count the rest as skipped. The copying forms apply
 * the full mapping (ß uppercases to SS) and size their output in a first pass.
 */

import { cstrlen, encodeUtf8, type TextInput } from '../buffer/c-string';
import { CharacterCodes } from '../scanner/character-codes';
import { encodeCodepoint, forEachCodepoint, utf8Length, walkCodepoints } from './utf8-walker';

const upperTable = new Uint8Array(256);
const lowerTable = new Uint8Array(256);

for (let c = 0; c < 256; c++) {
  upperTable[c] = c;
  lowerTable[c] = c;
}
for (let c = CharacterCodes.a; c <= CharacterCodes.z; c++) {
  upperTable[c] = c - 0x20;
  lowerTable[c - 0x20] = c;
}
for (let c = CharacterCodes.latin1LowerStart; c <= CharacterCodes.latin1LowerEnd; c++) {
  if (c === CharacterCodes.division) continue;
  upperTable[c] = c - 0x20;
  lowerTable[c - 0x20] = c;
}

export function toUpperLatin1(byte: number): number {
  return upperTable[byte & 0xFF];
}

export function toLowerLatin1(byte: number): number {
  return lowerTable[byte & 0xFF];
}

function source(text: TextInput | null | undefined): Uint8Array {
  if (!text) return new Uint8Array(0);
  return typeof text === 'string' ? encodeUtf8(text) : text;
}

function mapInPlace(bytes: Uint8Array, table: Uint8Array): Uint8Array {
  const end = cstrlen(bytes);
  for (let i = 0; i < end; i++) bytes[i] = table[bytes[i]];
  return bytes;
}

export function upcaseInPlace(bytes: Uint8Array): Uint8Array {
  return mapInPlace(bytes, upperTable);
}

export function downcaseInPlace(bytes: Uint8Array): Uint8Array {
  return mapInPlace(bytes, lowerTable);
}

// Map a JS string up to its first NUL and encode the result as UTF-8.
function mapString(text: string, first: Uint8Array, rest: Uint8Array): Uint8Array {
  let mapped = '';
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c === CharacterCodes.nullCharacter) break;
    mapped += c <= CharacterCodes.maxLatin1Character ? String.fromCharCode((i ? rest : first)[c]) : text[i];
  }
  return encodeUtf8(mapped);
}

function mapBytes(text: TextInput | null | undefined, first: Uint8Array, rest: Uint8Array): Uint8Array {
  if (typeof text === 'string') return mapString(text, first, rest);
  const bytes = source(text);
  const out = new Uint8Array(cstrlen(bytes));
  for (let p = 0; p < out.length; p++) out[p] = (p ? rest : first)[bytes[p]];
  return out;
}

// Map into dest, leaving room for the NUL. String input is cut at a codepoint boundary.
function mapInto(text: TextInput | null | undefined, dest: Uint8Array, first: Uint8Array,
  rest: Uint8Array): Uint8Array {
  if (!dest.length) return dest;
  const mapped = mapBytes(text, first, rest);
  let end = Math.min(mapped.length, dest.length - 1);
  if (typeof text === 'string') {
    while (end > 0 && end < mapped.length && (mapped[end] & 0xC0) === 0x80) end--;
  }
  dest.set(mapped.subarray(0, end));
  dest[end] = CharacterCodes.nullCharacter;
  return dest.subarray(0, end);
}

/** Uppercase into `dest`, truncating to fit with its NUL. Returns the written view. */
export function upperInto(text: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  return mapInto(text, dest, upperTable, upperTable);
}

export function lowerInto(text: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  return mapInto(text, dest, lowerTable, lowerTable);
}

/** First character uppercased, the rest lowercased. */
export function initialInto(text: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  return mapInto(text, dest, upperTable, lowerTable);
}

export function upper(text: TextInput | null | undefined): Uint8Array {
  return mapBytes(text, upperTable, upperTable);
}

export function lower(text: TextInput | null | undefined): Uint8Array {
  return mapBytes(text, lowerTable, lowerTable);
}

export function initial(text: TextInput | null | undefined): Uint8Array {
  return mapBytes(text, upperTable, lowerTable);
}

/* Unicode */

export interface InPlaceCaseResult {
  /** Codepoints rewritten. */
  changed: number;
  /** Codepoints whose mapping would change the string's length, left as they were. */
  skipped: number;
}

type CaseMapping = (codepoint: number) => string;

const fullUpper: CaseMapping = (codepoint) => String.fromCodePoint(codepoint).toUpperCase();
const fullLower: CaseMapping = (codepoint) => String.fromCodePoint(codepoint).toLowerCase();

function codepointsOf(text: string): number[] {
  return Array.from(text, (ch) => ch.codePointAt(0) ?? CharacterCodes.replacementCharacter);
}

function mapCodepointsInPlace(bytes: Uint8Array, mapping: CaseMapping): InPlaceCaseResult {
  const result: InPlaceCaseResult = { changed: 0, skipped: 0 };
  forEachCodepoint(bytes, (codepoint, target, offset, length) => {
    const mapped = codepointsOf(mapping(codepoint));
    if (mapped.length === 1 && mapped[0] === codepoint) return true;
    if (mapped.length === 1 && utf8Length(mapped[0]) === length) {
      encodeCodepoint(mapped[0], target, offset);
      result.changed++;
    } else {
      result.skipped++;
    }
    return true;
  });
  return result;
}

/** Uppercase UTF-8 in place where the mapping keeps each codepoint's length. */
export function unicodeUpcaseInPlace(bytes: Uint8Array): InPlaceCaseResult {
  return mapCodepointsInPlace(bytes, fullUpper);
}

export function unicodeDowncaseInPlace(bytes: Uint8Array): InPlaceCaseResult {
  return mapCodepointsInPlace(bytes, fullLower);
}

function unicodeMapInto(text: TextInput | null | undefined, dest: Uint8Array, mapping: CaseMapping): Uint8Array {
  if (!dest.length) return dest;
  const limit = dest.length - 1;
  let pos = 0;
  walk: for (const { codepoint } of walkCodepoints(source(text))) {
    for (const mapped of codepointsOf(mapping(codepoint))) {
      const n = utf8Length(mapped);
      if (pos + n > limit) break walk;
      pos = encodeCodepoint(mapped, dest, pos);
    }
  }
  dest[pos] = CharacterCodes.nullCharacter;
  return dest.subarray(0, pos);
}

/**
 * Uppercase UTF-8 into `dest`. Output stops at the last whole codepoint that
 * fits with the NUL. Returns the written view.
 */
export function unicodeUpperInto(text: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  return unicodeMapInto(text, dest, fullUpper);
}

export function unicodeLowerInto(text: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  return unicodeMapInto(text, dest, fullLower);
}

// Size, allocate once, fill. Malformed sequences come out as U+FFFD.
function unicodeMapCopy(text: TextInput | null | undefined, mappingAt: (index: number) => CaseMapping): Uint8Array {
  const bytes = source(text);
  const pieces: number[][] = [];
  let size = 0;
  let index = 0;
  for (const { codepoint } of walkCodepoints(bytes)) {
    const mapped = codepointsOf(mappingAt(index++)(codepoint));
    for (const cp of mapped) size += utf8Length(cp);
    pieces.push(mapped);
  }

  const out = new Uint8Array(size);
  let pos = 0;
  for (const mapped of pieces) {
    for (const cp of mapped) pos = encodeCodepoint(cp, out, pos);
  }
  return out;
}

export function unicodeUpper(text: TextInput | null | undefined): Uint8Array {
  return unicodeMapCopy(text, () => fullUpper);
}

export function unicodeLower(text: TextInput | null | undefined): Uint8Array {
  return unicodeMapCopy(text, () => fullLower);
}

/** First codepoint uppercased, the rest lowercased. */
export function unicodeInitial(text: TextInput | null | undefined): Uint8Array {
  return unicodeMapCopy(text, (index) => index ? fullLower : fullUpper);
}
