/**
 * StringBuilder - growable byte sink with its own length limit.
 * The alternative to a fixed output buffer when the final size is unknown.
 *
 * Exceeding the limit does not truncate: the builder drops everything it
 * holds, records StringBuilderError.TooBig and ignores later appends until
 * finish() or clear(). finish() then yields an empty string.
 */

import { format } from 'node:util';

import { cstrlen, decodeUtf8, encodeUtf8, type TextInput } from './c-string';
import { BUFFER_LEN } from './limits';
import { CharacterCodes } from '../scanner/character-codes';
import { DiagnosticCode } from '../context/diagnostics';
import type { TextContext } from '../context/text-context';
import { graphemePrefixBytes } from '../unicode/grapheme-walker';
import { codepointPrefixBytes, encodeCodepoint, utf8Length } from '../unicode/utf8-walker';

export const enum StringBuilderError {
  None = 0,
  TooBig = 1,
}

export interface StringBuilder {
  /** Append the first `len` bytes of `bytes` (all of them by default). */
  appendBytes(bytes: Uint8Array, len?: number): void;
  /** Append text up to its first NUL. */
  appendStr(text: TextInput | null | undefined): void;
  appendChr(ch: number): void;
  /** Append one codepoint as UTF-8; invalid codepoints are ignored. */
  appendUchar(codepoint: number): void;
  appendFormat(fmt: string, ...args: unknown[]): void;
  /** Append up to `n` codepoints of `text`. */
  appendCodepoints(text: TextInput, n: number): void;
  /** Append up to `n` grapheme clusters of `text`. */
  appendGraphemes(text: TextInput, n: number, context: TextContext): void;
  /** Append text, double-quoted when it contains a space. */
  appendStrSpace(text: TextInput | null | undefined): void;
  /** Append the list separator before item `curNum` (see safeItemizer). */
  appendItemizer(curNum: number, done: boolean, delim: TextInput, conjoin: TextInput, space: TextInput): void;

  length(): number;
  error(): StringBuilderError;

  /** Take the accumulated bytes and reset the builder. */
  finish(): Uint8Array;
  /** finish(), decoded from UTF-8. */
  finishString(): string;
  clear(): void;

  fillDebugState(state: Partial<StringBuilderDebugState>): void;
}

export interface StringBuilderDebugState {
  length: number;
  capacity: number;
  limit: number;
  error: StringBuilderError;
}

export interface StringBuilderOptions {
  /** Maximum length plus one for the terminator. Defaults to the context limit. */
  limit?: number;
  /** Source of the default limit and receiver of StringTooBig diagnostics. */
  context?: TextContext;
}

const INITIAL_CAPACITY = 64;

export function createStringBuilder({ limit, context }: StringBuilderOptions = {}): StringBuilder {
  const maxLength = limit ?? context?.stringLimit ?? BUFFER_LEN;
  if (!Number.isSafeInteger(maxLength) || maxLength < 1)
    throw new Error('StringBuilder: limit must be a positive integer');

  let bytes = new Uint8Array(Math.min(INITIAL_CAPACITY, maxLength));
  let len = 0;
  let errorCode = StringBuilderError.None;

  // Make room for `extra` more bytes, or enter the error state.
  function reserve(extra: number): boolean {
    if (errorCode !== StringBuilderError.None) return false;
    const required = len + extra;
    if (required + 1 > maxLength) {
      len = 0;
      errorCode = StringBuilderError.TooBig;
      if (context)
        context.report(DiagnosticCode.StringTooBig,
          'StringBuilder: ' + required + ' bytes exceeds the limit of ' + (maxLength - 1));
      return false;
    }
    if (required > bytes.length) {
      let next = bytes.length * 2;
      while (next < required) next *= 2;
      const grown = new Uint8Array(Math.min(next, maxLength));
      grown.set(bytes.subarray(0, len));
      bytes = grown;
    }
    return true;
  }

  function appendBytes(source: Uint8Array, count: number = source.length): void {
    count = Math.min(count, source.length);
    if (count <= 0 || !reserve(count)) return;
    bytes.set(source.subarray(0, count), len);
    len += count;
  }

  function appendStr(text: TextInput | null | undefined): void {
    if (!text) return;
    const source = typeof text === 'string' ? encodeUtf8(text) : text;
    appendBytes(source, cstrlen(source));
  }

  function appendChr(ch: number): void {
    if (!reserve(1)) return;
    bytes[len++] = ch & 0xFF;
  }

  function appendUchar(codepoint: number): void {
    const n = utf8Length(codepoint);
    if (!n || !reserve(n)) return;
    len = encodeCodepoint(codepoint, bytes, len);
  }

  function appendFormat(fmt: string, ...args: unknown[]): void {
    appendStr(format(fmt, ...args));
  }

  function appendCodepoints(text: TextInput, n: number): void {
    if (n <= 0) return;
    const source = typeof text === 'string' ? encodeUtf8(text) : text;
    appendBytes(source, codepointPrefixBytes(source, n));
  }

  function appendGraphemes(text: TextInput, n: number, ctx: TextContext): void {
    if (n <= 0) return;
    const source = typeof text === 'string' ? encodeUtf8(text) : text;
    appendBytes(source, graphemePrefixBytes(source, n, ctx));
  }

  function appendStrSpace(text: TextInput | null | undefined): void {
    if (!text) return;
    const source = typeof text === 'string' ? encodeUtf8(text) : text;
    const end = cstrlen(source);
    if (!end) return;
    const spaceAt = source.indexOf(CharacterCodes.space);
    if (spaceAt >= 0 && spaceAt < end) {
      appendChr(CharacterCodes.doubleQuote);
      appendBytes(source, end);
      appendChr(CharacterCodes.doubleQuote);
    } else {
      appendBytes(source, end);
    }
  }

  function appendItemizer(curNum: number, done: boolean, delim: TextInput, conjoin: TextInput,
    space: TextInput): void {
    if (curNum === 1) return;
    if (done) {
      if (curNum >= 3) appendStr(delim);
      appendStr(space);
      appendStr(conjoin);
    } else {
      appendStr(delim);
    }
    appendStr(space);
  }

  function clear(): void {
    len = 0;
    errorCode = StringBuilderError.None;
  }

  function finish(): Uint8Array {
    const result = errorCode === StringBuilderError.None ? bytes.slice(0, len) : new Uint8Array(0);
    clear();
    return result;
  }

  function finishString(): string {
    return decodeUtf8(finish());
  }

  function fillDebugState(state: Partial<StringBuilderDebugState>): void {
    state.length = len;
    state.capacity = bytes.length;
    state.limit = maxLength;
    state.error = errorCode;
  }

  return {
    appendBytes,
    appendStr,
    appendChr,
    appendUchar,
    appendFormat,
    appendCodepoints,
    appendGraphemes,
    appendStrSpace,
    appendItemizer,
    length: () => len,
    error: () => errorCode,
    finish,
    finishString,
    clear,
    fillDebugState,
  };
}
