/**
 * UTF-8 codepoint walking over NUL-terminated byte strings.
 *
 * Input is assumed to be well formed. Where it is not, a sequence decodes to
 * U+FFFD covering its lead byte plus whatever continuation bytes actually
 * follow it, so walking always makes progress and never reads past a NUL.
 * Use validateUtf8() when the distinction matters.
 */

import { CharacterCodes } from '../scanner/character-codes';

export interface DecodedCodepoint {
  codepoint: number;
  /** Encoded length in bytes; 0 at end of string. */
  length: number;
}

export interface CodepointStep extends DecodedCodepoint {
  /** Byte offset of the first byte of the sequence. */
  offset: number;
}

/**
 * Per-codepoint callback. Return false to stop the walk.
 */
export type CodepointCallback =
  (codepoint: number, source: Uint8Array, offset: number, length: number) => boolean;

const END: DecodedCodepoint = Object.freeze({ codepoint: 0, length: 0 });

function isContinuation(b: number): boolean {
  return (b & 0xC0) === 0x80;
}

function trailCount(lead: number): number {
  if (lead >= 0xC2 && lead <= 0xDF) return 1;
  if (lead >= 0xE0 && lead <= 0xEF) return 2;
  if (lead >= 0xF0 && lead <= 0xF4) return 3;
  return -1;
}

const minimumForLength = [0, 0, 0x80, 0x800, 0x10000];

/** Decode the sequence starting at `offset`. */
export function decodeCodepoint(bytes: Uint8Array, offset: number): DecodedCodepoint {
  if (offset >= bytes.length) return END;
  const lead = bytes[offset];
  if (lead === CharacterCodes.nullCharacter) return END;
  if (lead < 0x80) return { codepoint: lead, length: 1 };

  const trail = trailCount(lead);
  if (trail < 0) return { codepoint: CharacterCodes.replacementCharacter, length: 1 };

  let cp = lead & (0x3F >> trail);
  let i = offset + 1;
  const last = offset + trail;
  while (i <= last && i < bytes.length && isContinuation(bytes[i])) {
    cp = (cp << 6) | (bytes[i] & 0x3F);
    i++;
  }

  const length = i - offset;
  if (length !== trail + 1) return { codepoint: CharacterCodes.replacementCharacter, length };

  // overlong forms, surrogates and values past U+10FFFF
  if (cp < minimumForLength[length] ||
      (cp >= 0xD800 && cp <= 0xDFFF) ||
      cp > CharacterCodes.maxCodepoint)
    return { codepoint: CharacterCodes.replacementCharacter, length };

  return { codepoint: cp, length };
}

/** Bytes needed to encode `codepoint`; 0 when it is not a Unicode scalar range value. */
export function utf8Length(codepoint: number): number {
  if (codepoint < 0) return 0;
  if (codepoint < 0x80) return 1;
  if (codepoint < 0x800) return 2;
  if (codepoint < 0x10000) return 3;
  if (codepoint <= CharacterCodes.maxCodepoint) return 4;
  return 0;
}

/**
 * Write `codepoint` at `offset` and return the offset after it. The caller
 * guarantees room for utf8Length(codepoint) bytes.
 */
export function encodeCodepoint(codepoint: number, out: Uint8Array, offset: number): number {
  if (codepoint < 0x80) {
    out[offset++] = codepoint;
  } else if (codepoint < 0x800) {
    out[offset++] = 0xC0 | (codepoint >> 6);
    out[offset++] = 0x80 | (codepoint & 0x3F);
  } else if (codepoint < 0x10000) {
    out[offset++] = 0xE0 | (codepoint >> 12);
    out[offset++] = 0x80 | ((codepoint >> 6) & 0x3F);
    out[offset++] = 0x80 | (codepoint & 0x3F);
  } else {
    out[offset++] = 0xF0 | (codepoint >> 18);
    out[offset++] = 0x80 | ((codepoint >> 12) & 0x3F);
    out[offset++] = 0x80 | ((codepoint >> 6) & 0x3F);
    out[offset++] = 0x80 | (codepoint & 0x3F);
  }
  return offset;
}

/** Lazily walk the codepoints of `bytes` from `start` up to the first NUL. */
export function* walkCodepoints(bytes: Uint8Array, start: number = 0): Generator<CodepointStep, void, undefined> {
  let offset = start;
  while (true) {
    const { codepoint, length } = decodeCodepoint(bytes, offset);
    if (!length) return;
    yield { codepoint, offset, length };
    offset += length;
  }
}

/**
 * Call `callback` for every codepoint.
 * @returns true if the whole string was walked, false if the callback stopped it.
 */
export function forEachCodepoint(bytes: Uint8Array, callback: CodepointCallback): boolean {
  let offset = 0;
  while (true) {
    const { codepoint, length } = decodeCodepoint(bytes, offset);
    if (!length) return true;
    if (!callback(codepoint, bytes, offset, length)) return false;
    offset += length;
  }
}

/** Offset just past the codepoint at `offset` (unchanged at end of string). */
export function nextCodepointOffset(bytes: Uint8Array, offset: number): number {
  return offset + decodeCodepoint(bytes, offset).length;
}

/** Offset of the codepoint that ends at `offset` (0 stays 0). */
export function previousCodepointOffset(bytes: Uint8Array, offset: number): number {
  if (offset <= 0) return 0;
  let i = offset - 1;
  while (i > 0 && offset - i < 4 && isContinuation(bytes[i])) i--;
  if (decodeCodepoint(bytes, i).length === offset - i) return i;
  return offset - 1;
}

/** Number of codepoints before the first NUL. */
export function codepointLength(bytes: Uint8Array): number {
  let n = 0;
  let offset = 0;
  let length: number;
  while ((length = decodeCodepoint(bytes, offset).length) > 0) {
    n++;
    offset += length;
  }
  return n;
}

/** Byte length of the first `n` codepoints (fewer if the string is shorter). */
export function codepointPrefixBytes(bytes: Uint8Array, n: number): number {
  let offset = 0;
  let length: number;
  while (n-- > 0 && (length = decodeCodepoint(bytes, offset).length) > 0) {
    offset += length;
  }
  return offset;
}

/** Newly allocated copy of the first `n` codepoints. */
export function copyCodepoints(bytes: Uint8Array, n: number): Uint8Array {
  return bytes.slice(0, codepointPrefixBytes(bytes, n));
}

/**
 * Offset of the first occurrence of `codepoint` at or after `start`, or the
 * offset of the end of the string when there is none.
 */
export function seekCodepoint(bytes: Uint8Array, codepoint: number, start: number = 0): number {
  let offset = start;
  while (true) {
    const decoded = decodeCodepoint(bytes, offset);
    if (!decoded.length || decoded.codepoint === codepoint) return offset;
    offset += decoded.length;
  }
}
