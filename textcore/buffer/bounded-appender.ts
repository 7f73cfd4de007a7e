/**
 * Bounded appends into fixed-capacity output buffers.
 *
 * A buffer of capacity C holds at most C - 1 bytes of text; the last byte is
 * reserved for the terminating NUL, which only terminate() writes. Appends
 * advance the cursor and return a residual: 0 when everything fit, otherwise
 * the number of input bytes that did not. A cursor already past C - 1 makes
 * every append fail without touching the buffer.
 */

import { format } from 'node:util';

import { cstrlen, decodeUtf8, encodeUtf8, type TextInput } from './c-string';
import { BUFFER_LEN } from './limits';
import { CharacterCodes } from '../scanner/character-codes';
import { visibleLength } from '../scanner/control-span';
import { decodeCodepoint, encodeCodepoint, utf8Length } from '../unicode/utf8-walker';

/** Write position into a buffer, owned by a single build operation. */
export interface BufferCursor {
  readonly buffer: Uint8Array;
  pos: number;
}

export function createOutputBuffer(capacity: number = BUFFER_LEN): Uint8Array {
  if (!Number.isSafeInteger(capacity) || capacity < 1)
    throw new Error('OutputBuffer: capacity must be a positive integer');
  return new Uint8Array(capacity);
}

export function createCursor(buffer: Uint8Array, pos: number = 0): BufferCursor {
  return { buffer, pos };
}

/** Write the terminating NUL at the cursor. The cursor does not move. */
export function terminate(cursor: BufferCursor): void {
  const { buffer } = cursor;
  if (!buffer.length) return;
  buffer[Math.min(cursor.pos, buffer.length - 1)] = CharacterCodes.nullCharacter;
}

/** Text written so far, decoded from UTF-8. */
export function cursorText(cursor: BufferCursor): string {
  return decodeUtf8(cursor.buffer.subarray(0, cursor.pos));
}

/**
 * Append one byte.
 * @returns 0 on success, 1 when the buffer is full.
 */
export function safeChr(ch: number, cursor: BufferCursor): number {
  if (cursor.pos >= cursor.buffer.length - 1) return 1;
  cursor.buffer[cursor.pos++] = ch & 0xFF;
  return 0;
}

function appendBytes(bytes: Uint8Array, len: number, cursor: BufferCursor): number {
  const limit = cursor.buffer.length - 1;
  const blen = cursor.pos;
  if (blen >= limit) return len;
  const clen = len + blen <= limit ? len : limit - blen;
  cursor.buffer.set(bytes.subarray(0, clen), blen);
  cursor.pos += clen;
  return len - clen;
}

/**
 * Append a string up to its first NUL. Bytes that do not fit are dropped and
 * counted in the residual; a multi-byte sequence may be cut at the limit.
 */
export function safeStr(text: TextInput | null | undefined, cursor: BufferCursor): number {
  if (!text) return 0;

  if (typeof text === 'string') {
    // most appends are a single ASCII character
    const first = text.charCodeAt(0);
    if (first === CharacterCodes.nullCharacter) return 0;
    if (text.length === 1 && first <= CharacterCodes.maxAsciiCharacter)
      return safeChr(first, cursor);
    text = encodeUtf8(text);
  }

  const len = cstrlen(text);
  if (len === 0) return 0;
  if (len === 1) return safeChr(text[0], cursor);
  return appendBytes(text, len, cursor);
}

/** Append the first `len` bytes of `text`. NUL bytes inside are copied. */
export function safeStrl(text: TextInput | null | undefined, len: number, cursor: BufferCursor): number {
  if (!text || len <= 0) return 0;
  const bytes = typeof text === 'string' ? encodeUtf8(text) : text;
  if (!bytes.length || bytes[0] === CharacterCodes.nullCharacter) return 0;
  len = Math.min(len, bytes.length);
  if (len === 1) return safeChr(bytes[0], cursor);
  return appendBytes(bytes, len, cursor);
}

/**
 * Append one codepoint as UTF-8, all or nothing.
 * @returns 0 on success, 1 when it does not fit or is not a valid codepoint.
 */
export function safeUchar(codepoint: number, cursor: BufferCursor): number {
  const n = utf8Length(codepoint);
  if (!n || cursor.pos + n > cursor.buffer.length - 1) return 1;
  cursor.pos = encodeCodepoint(codepoint, cursor.buffer, cursor.pos);
  return 0;
}

/**
 * Append a UTF-8 string codepoint by codepoint, re-encoding malformed
 * sequences as U+FFFD. Nothing is written unless all of it fits.
 * @returns 0 on success, 1 on failure.
 */
export function safeUtf8(text: TextInput | null | undefined, cursor: BufferCursor): number {
  if (!text) return 0;
  const bytes = typeof text === 'string' ? encodeUtf8(text) : text;

  let needed = 0;
  let offset = 0;
  while (true) {
    const { codepoint, length } = decodeCodepoint(bytes, offset);
    if (!length) break;
    needed += utf8Length(codepoint);
    offset += length;
  }
  if (cursor.pos + needed > cursor.buffer.length - 1) return 1;

  offset = 0;
  let pos = cursor.pos;
  while (true) {
    const { codepoint, length } = decodeCodepoint(bytes, offset);
    if (!length) break;
    pos = encodeCodepoint(codepoint, cursor.buffer, pos);
    offset += length;
  }
  cursor.pos = pos;
  return 0;
}

/**
 * Append a string, wrapped in double quotes when it contains a space.
 * A quoted append that does not fit is rolled back entirely.
 */
export function safeStrSpace(text: TextInput | null | undefined, cursor: BufferCursor): number {
  if (!text) return 0;
  const bytes = typeof text === 'string' ? encodeUtf8(text) : text;
  const len = cstrlen(bytes);
  if (!len) return 0;

  const spaceAt = bytes.indexOf(CharacterCodes.space);
  if (spaceAt < 0 || spaceAt >= len) return safeStr(bytes, cursor);

  const saved = cursor.pos;
  if (safeChr(CharacterCodes.doubleQuote, cursor) ||
      safeStr(bytes, cursor) ||
      safeChr(CharacterCodes.doubleQuote, cursor)) {
    cursor.pos = saved;
    return 1;
  }
  return 0;
}

/**
 * Append `n` copies of a byte.
 * @returns 0 on success, 1 when the buffer filled up first.
 */
export function safeFill(ch: number, n: number, cursor: BufferCursor): number {
  if (n < 1) return 0;
  if (n === 1) return safeChr(ch, cursor);

  let ret = 0;
  const capacity = cursor.buffer.length;
  if (cursor.pos + n + 1 > capacity) {
    n = capacity - cursor.pos;
    if (n > 0) n--;
    ret = 1;
    if (n <= 0) return ret;
  }
  cursor.buffer.fill(ch & 0xFF, cursor.pos, cursor.pos + n);
  cursor.pos += n;
  return ret;
}

/**
 * Pad the NUL-terminated text in `buffer` with `ch` until it has `n` visible
 * characters. Control spans do not count. The result is NUL-terminated.
 */
export function safeFillTo(ch: number, n: number, buffer: Uint8Array): number {
  const capacity = buffer.length;
  if (n >= capacity) n = capacity - 1;

  const current = visibleLength(buffer);
  if (current >= n) return 0;

  const cursor = createCursor(buffer, cstrlen(buffer));
  if (cursor.pos >= capacity) return 1;
  const ret = safeFill(ch, n - current, cursor);
  terminate(cursor);
  return ret;
}

const hexDigits = '0123456789abcdef';

/** Append a byte as two lowercase hex digits. */
export function safeHexChar(byte: number, cursor: BufferCursor): number {
  if (safeChr(hexDigits.charCodeAt((byte >> 4) & 0x0F), cursor)) return 1;
  if (safeChr(hexDigits.charCodeAt(byte & 0x0F), cursor)) return 1;
  return 0;
}

/** Append the first `len` bytes of `bytes` as hex, stopping at the first failure. */
export function safeHexStr(bytes: Uint8Array, len: number, cursor: BufferCursor): number {
  const end = Math.min(len, bytes.length);
  for (let n = 0; n < end; n++) {
    if (safeHexChar(bytes[n], cursor)) return 1;
  }
  return 0;
}

/** Append printf-style formatted text (node:util format directives). */
export function safeFormat(cursor: BufferCursor, fmt: string, ...args: unknown[]): number {
  return safeStr(format(fmt, ...args), cursor);
}

/**
 * Append the separator that goes before item `curNum` of a list:
 * nothing before the first item, `delim space` between items, and
 * `[delim] space conjoin space` before the last one.
 */
export function safeItemizer(curNum: number, done: boolean, delim: TextInput, conjoin: TextInput,
  space: TextInput, cursor: BufferCursor): void {
  if (curNum === 1) return;
  if (done) {
    if (curNum >= 3) safeStr(delim, cursor);
    safeStr(space, cursor);
    safeStr(conjoin, cursor);
  } else {
    safeStr(delim, cursor);
  }
  safeStr(space, cursor);
}
