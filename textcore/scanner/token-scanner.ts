/**
 * Separator-delimited tokens over NUL-terminated strings.
 *
 * A separator inside a control span never ends a token. When the separator
 * is a space, runs of spaces after a separator collapse into one boundary;
 * any other separator is significant on every occurrence.
 *
 * Every function takes a TextUnit: byteUnit compares single bytes against
 * the separator, codepointUnit compares decoded codepoints.
 */

import { cstrlen, encodeUtf8, toBytes, type TextInput } from '../buffer/c-string';
import { createCursor, createOutputBuffer, safeChr, safeStr } from '../buffer/bounded-appender';
import { createStringBuilder } from '../buffer/string-builder';
import type { TextContext } from '../context/text-context';
import { byteUnit, codepointUnit, type TextUnit } from '../unicode/text-unit';
import { CharacterCodes, isControlSpanStart } from './character-codes';
import { skipControlSpan } from './control-span';

/** Position in a mutable string being split; undefined once it is used up. */
export interface TokenCursor {
  readonly bytes: Uint8Array;
  pos: number | undefined;
}

/** Cursor over a private copy of `text` (or over `text` itself when it is already bytes). */
export function createTokenCursor(text: TextInput | null | undefined): TokenCursor {
  if (text == null) return { bytes: new Uint8Array(0), pos: undefined };
  return { bytes: typeof text === 'string' ? encodeUtf8(text) : text, pos: 0 };
}

/** Offset past a run of spaces at `offset`, when `sep` is a space. */
export function skipSeparatorRuns(bytes: Uint8Array, offset: number, sep: number,
  unit: TextUnit = byteUnit): number {
  if (sep !== CharacterCodes.space) return offset;
  let length: number;
  while ((length = unit.length(bytes, offset)) > 0 && unit.value(bytes, offset) === sep)
    offset += length;
  return offset;
}

/** Offset of the separator ending the token that starts at `start`, if any. */
export function findSeparator(bytes: Uint8Array, start: number, sep: number,
  unit: TextUnit = byteUnit): number | undefined {
  let offset = start;
  while (true) {
    const length = unit.length(bytes, offset);
    if (!length) return undefined;

    const value = unit.value(bytes, offset);
    if (value === sep) return offset;

    if (isControlSpanStart(value))
      offset = skipControlSpan(bytes, offset);
    else
      offset += length;
  }
}

/**
 * Offset where the token after the one at `start` begins, or undefined when
 * the token at `start` is the last one.
 */
export function findNextTokenStart(bytes: Uint8Array, start: number, sep: number,
  unit: TextUnit = byteUnit): number | undefined {
  const sepAt = findSeparator(bytes, start, sep, unit);
  if (sepAt === undefined) return undefined;
  return skipSeparatorRuns(bytes, sepAt + unit.length(bytes, sepAt), sep, unit);
}

/**
 * Split off the token at the cursor. The separator's first byte is
 * overwritten with NUL and the cursor moves to the start of the remainder
 * (undefined after the last token).
 * @returns a view of the token, or undefined when the cursor was used up.
 */
export function splitToken(cursor: TokenCursor, sep: number, unit: TextUnit = byteUnit): Uint8Array | undefined {
  const start = cursor.pos;
  if (start === undefined) return undefined;
  const { bytes } = cursor;

  const sepAt = findSeparator(bytes, start, sep, unit);
  if (sepAt === undefined) {
    cursor.pos = undefined;
    return bytes.subarray(start, cstrlen(bytes, start));
  }

  const next = sepAt + unit.length(bytes, sepAt);
  bytes[sepAt] = CharacterCodes.nullCharacter;
  cursor.pos = skipSeparatorRuns(bytes, next, sep, unit);
  return bytes.subarray(start, sepAt);
}

/** Number of tokens; 0 for an empty string. */
export function countTokens(bytes: Uint8Array, sep: number, unit: TextUnit = byteUnit): number {
  if (!cstrlen(bytes)) return 0;
  let n = 0;
  let pos: number | undefined = 0;
  while (pos !== undefined) {
    n++;
    pos = findNextTokenStart(bytes, pos, sep, unit);
  }
  return n;
}

/**
 * Trim leading and trailing spaces when `sep` is a space, writing a NUL
 * after the last kept byte. Any other separator leaves the text alone.
 */
export function trimSpaceSep(bytes: Uint8Array, sep: number): Uint8Array {
  const end = cstrlen(bytes);
  if (sep !== CharacterCodes.space) return bytes.subarray(0, end);

  let start = 0;
  while (start < end && bytes[start] === CharacterCodes.space) start++;
  let last = end;
  while (last > start && bytes[last - 1] === CharacterCodes.space) last--;
  if (last < bytes.length) bytes[last] = CharacterCodes.nullCharacter;
  return bytes.subarray(start, last);
}

interface ListSink {
  token(token: Uint8Array | undefined): void;
  separator(): void;
}

function sameText(token: Uint8Array, word: Uint8Array): boolean {
  const wordLength = cstrlen(word);
  if (token.length !== wordLength) return false;
  for (let i = 0; i < wordLength; i++) {
    if (token[i] !== word[i]) return false;
  }
  return true;
}

function removeFirst(cursor: TokenCursor, word: Uint8Array, sep: number, unit: TextUnit, sink: ListSink): void {
  let token = splitToken(cursor, sep, unit);
  if (token && sameText(token, word)) {
    sink.token(splitToken(cursor, sep, unit));
  } else {
    sink.token(token);
    while (cursor.pos !== undefined) {
      token = splitToken(cursor, sep, unit);
      if (!token || sameText(token, word)) break;
      sink.separator();
      sink.token(token);
    }
  }
  while (cursor.pos !== undefined) {
    token = splitToken(cursor, sep, unit);
    sink.separator();
    sink.token(token);
  }
}

/**
 * Remove the first occurrence of `word` from a `sep`-separated list.
 * Destructive on `list` when it is a byte array. The result is bounded by
 * the long buffer capacity.
 */
export function removeWord(list: TextInput, word: TextInput, sep: number): Uint8Array {
  const cursor = createCursor(createOutputBuffer());
  removeFirst(createTokenCursor(list), toBytes(word), sep, byteUnit, {
    token: (token) => { safeStr(token, cursor); },
    separator: () => { safeChr(sep, cursor); },
  });
  return cursor.buffer.slice(0, cursor.pos);
}

/**
 * Codepoint-separated removeWord(). The result goes through a string builder
 * limited by the context's string limit, so it is empty if it grows too big.
 */
export function removeWordCodepoints(list: TextInput, word: TextInput, sep: number,
  context?: TextContext): Uint8Array {
  const builder = createStringBuilder({ context });
  removeFirst(createTokenCursor(list), toBytes(word), sep, codepointUnit, {
    token: (token) => { builder.appendStr(token); },
    separator: () => { builder.appendUchar(sep); },
  });
  return builder.finish();
}
