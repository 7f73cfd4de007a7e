/**
 * Small helpers over NUL-terminated byte strings used by command parsing:
 * prefix matching, seeking, bounded copies and substitutions. Anything that
 * builds a result of unknown size writes through a long output buffer and
 * is truncated at its capacity.
 */

import { cstrlen, toBytes, type TextInput } from '../buffer/c-string';
import { createCursor, createOutputBuffer, safeChr, safeStr, safeStrl } from '../buffer/bounded-appender';
import { BUFFER_LEN } from '../buffer/limits';
import { CharacterCodes, isAlphaNumeric, isWhiteSpace } from '../scanner/character-codes';
import { toLowerLatin1 } from '../unicode/case-mapper';

function prefixMatches(string: Uint8Array, prefix: Uint8Array): boolean {
  const stringEnd = cstrlen(string);
  const prefixEnd = cstrlen(prefix);
  if (prefixEnd > stringEnd) return false;
  for (let i = 0; i < prefixEnd; i++) {
    if (toLowerLatin1(string[i]) !== toLowerLatin1(prefix[i])) return false;
  }
  return true;
}

/** Case-insensitive prefix test. An empty prefix matches anything. */
export function stringPrefix(string: TextInput | null | undefined, prefix: TextInput | null | undefined): boolean {
  if (string == null || prefix == null) return false;
  return prefixMatches(toBytes(string), toBytes(prefix));
}

/** stringPrefix(), except that an empty prefix never matches. */
export function stringPrefixe(string: TextInput | null | undefined, prefix: TextInput | null | undefined): boolean {
  if (string == null || prefix == null) return false;
  const prefixBytes = toBytes(prefix);
  if (!cstrlen(prefixBytes)) return false;
  return prefixMatches(toBytes(string), prefixBytes);
}

/**
 * Offset of the first word in `src` that starts with `sub`, compared
 * case-insensitively. Words are runs of ASCII letters and digits.
 */
export function stringMatch(src: TextInput | null | undefined, sub: TextInput | null | undefined): number | undefined {
  if (src == null || sub == null) return undefined;
  const bytes = toBytes(src);
  const subBytes = toBytes(sub);
  if (!cstrlen(subBytes)) return undefined;

  const end = cstrlen(bytes);
  let offset = 0;
  while (offset < end) {
    if (prefixMatches(bytes.subarray(offset), subBytes)) return offset;
    while (offset < end && isAlphaNumeric(bytes[offset])) offset++;
    while (offset < end && !isAlphaNumeric(bytes[offset])) offset++;
  }
  return undefined;
}

/** Offset of the first non-whitespace byte at or after `start`. */
export function skipSpace(bytes: Uint8Array, start: number = 0): number {
  const end = cstrlen(bytes);
  let offset = start;
  while (offset < end && isWhiteSpace(bytes[offset])) offset++;
  return offset;
}

/** Offset of the first `ch` at or after `start`, or the end of the string. */
export function seekChar(bytes: Uint8Array, ch: number, start: number = 0): number {
  const end = cstrlen(bytes);
  let offset = start;
  while (offset < end && bytes[offset] !== ch) offset++;
  return offset;
}

/** Copy of `src` up to (not including) the first `ch`. */
export function copyUpTo(src: TextInput, ch: number): Uint8Array {
  const bytes = toBytes(src);
  return bytes.slice(0, seekChar(bytes, ch));
}

/** Replace every occurrence of `old` in `string` with `newbit`. */
export function replaceString(old: TextInput, newbit: TextInput, string: TextInput): Uint8Array {
  const cursor = createCursor(createOutputBuffer());
  const oldSource = toBytes(old);
  const oldBytes = oldSource.subarray(0, cstrlen(oldSource));
  const newBytes = toBytes(newbit);
  const bytes = toBytes(string);
  const end = cstrlen(bytes);

  if (!oldBytes.length) {
    safeStr(bytes, cursor);
    return cursor.buffer.slice(0, cursor.pos);
  }

  let offset = 0;
  while (offset < end) {
    const found = indexOfBytes(bytes, oldBytes, offset, end);
    if (found < 0) {
      safeStrl(bytes.subarray(offset), end - offset, cursor);
      break;
    }
    safeStrl(bytes.subarray(offset), found - offset, cursor);
    safeStr(newBytes, cursor);
    offset = found + oldBytes.length;
  }
  return cursor.buffer.slice(0, cursor.pos);
}

function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from: number, end: number): number {
  const last = end - needle.length;
  outer: for (let i = from; i <= last; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

function startsWithAt(bytes: Uint8Array, offset: number, needle: Uint8Array): boolean {
  if (offset + needle.length > bytes.length) return false;
  for (let j = 0; j < needle.length; j++) {
    if (bytes[offset + j] !== needle[j]) return false;
  }
  return true;
}

/** Tokens replaced by iteration text and position in list commands. */
export const standardTokens: readonly [string, string] = ['##', '#@'];

/**
 * Replace occurrences of two strings in one pass. Where both could match at
 * the same offset the first one wins.
 */
export function replaceString2(olds: readonly [TextInput, TextInput], newbits: readonly [TextInput, TextInput],
  string: TextInput): Uint8Array {
  const cursor = createCursor(createOutputBuffer());
  const first = toBytes(olds[0]);
  const second = toBytes(olds[1]);
  const oldBytes = [first.subarray(0, cstrlen(first)), second.subarray(0, cstrlen(second))];
  const source = toBytes(string);
  const bytes = source.subarray(0, cstrlen(source));

  let offset = 0;
  while (offset < bytes.length) {
    if (oldBytes[0].length && startsWithAt(bytes, offset, oldBytes[0])) {
      safeStr(newbits[0], cursor);
      offset += oldBytes[0].length;
    } else if (oldBytes[1].length && startsWithAt(bytes, offset, oldBytes[1])) {
      safeStr(newbits[1], cursor);
      offset += oldBytes[1].length;
    } else {
      safeChr(bytes[offset], cursor);
      offset++;
    }
  }
  return cursor.buffer.slice(0, cursor.pos);
}

/**
 * Offset of the first `ch` not escaped by a backslash, or undefined.
 * A backslash escapes any single byte, including another backslash.
 */
export function strchrUnescaped(bytes: Uint8Array | null | undefined, ch: number): number | undefined {
  if (!bytes) return undefined;
  const end = cstrlen(bytes);
  let i = 0;
  while (i < end && bytes[i] !== ch) {
    if (bytes[i] === CharacterCodes.backslash && i + 1 < end) i++;
    i++;
  }
  return i < end ? i : undefined;
}

export interface ListItem {
  /** The item, without surrounding quotes. */
  name: Uint8Array;
  /** Offset just past the item (and its closing quote). */
  next: number;
}

/**
 * Read the next name from a space-separated list starting at `start`.
 * A name is a single word or a double-quoted string.
 */
export function nextInList(list: Uint8Array, start: number = 0): ListItem {
  const cursor = createCursor(createOutputBuffer());
  const end = cstrlen(list);
  let head = start;
  while (head < end && list[head] === CharacterCodes.space) head++;

  let quoted = false;
  if (head < end && list[head] === CharacterCodes.doubleQuote) {
    head++;
    quoted = true;
  }

  while (head < end && (quoted || list[head] !== CharacterCodes.space) && list[head] !== CharacterCodes.doubleQuote) {
    safeChr(list[head], cursor);
    head++;
  }
  if (quoted && head < end) head++;

  return { name: cursor.buffer.slice(0, cursor.pos), next: head };
}

/**
 * Strip whitespace from the end of the first `len` bytes, overwriting it
 * with NULs. Returns the new length.
 */
export function removeTrailingWhitespace(bytes: Uint8Array, len: number): number {
  len = Math.min(len, bytes.length);
  while (len > 0 && isWhiteSpace(bytes[len - 1])) {
    bytes[--len] = CharacterCodes.nullCharacter;
  }
  return len;
}

/**
 * Copy at most `dest.length - 1` bytes of `src` into `dest` and terminate it.
 * Returns the written view.
 */
export function copyBounded(src: TextInput | null | undefined, dest: Uint8Array): Uint8Array {
  if (src == null || !dest.length) return dest.subarray(0, 0);
  const bytes = toBytes(src);
  const n = Math.min(cstrlen(bytes), dest.length - 1);
  dest.set(bytes.subarray(0, n));
  dest[n] = CharacterCodes.nullCharacter;
  return dest.subarray(0, n);
}

/**
 * `text` unchanged when it is at most `lim` bytes long, otherwise its first
 * `lim - 1` bytes (never more than a long buffer holds).
 */
export function chopString(text: TextInput, lim: number): Uint8Array {
  const bytes = toBytes(text);
  const len = cstrlen(bytes);
  lim = Math.max(0, lim);
  if (len <= lim) return bytes.subarray(0, len);
  return copyBounded(bytes, new Uint8Array(Math.min(lim, BUFFER_LEN))).slice();
}
