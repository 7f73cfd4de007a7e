/**
 * String ordering. Case-insensitive comparison folds case and orders by
 * codepoint; uniStrcoll() asks the context's locale collator and falls back
 * to byte order when there is none.
 *
 * All three return -1, 0 or 1.
 */

import { cstrlen, decodeUtf8, encodeUtf8, type TextInput } from '../buffer/c-string';
import type { TextContext } from '../context/text-context';

function text(input: TextInput): string {
  return typeof input === 'string' ? input : decodeUtf8(input);
}

function bytesOf(input: TextInput): Uint8Array {
  return typeof input === 'string' ? encodeUtf8(input) : input.subarray(0, cstrlen(input));
}

function foldCase(s: string): string {
  return s.toUpperCase().toLowerCase();
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareCodepoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff) return sign(diff);
  }
  return sign(left.length - right.length);
}

function firstCodepoints(s: string, n: number): string {
  return Array.from(s).slice(0, Math.max(0, n)).join('');
}

export function uniStrcasecmp(a: TextInput, b: TextInput): number {
  return compareCodepoints(foldCase(text(a)), foldCase(text(b)));
}

/** uniStrcasecmp() over at most the first `n` codepoints of each string. */
export function uniStrncasecmp(a: TextInput, b: TextInput, n: number): number {
  return compareCodepoints(foldCase(firstCodepoints(text(a), n)), foldCase(firstCodepoints(text(b), n)));
}

/** Byte order of UTF-8, which is also codepoint order. */
export function compareBytes(a: TextInput, b: TextInput): number {
  const left = bytesOf(a);
  const right = bytesOf(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return sign(left.length - right.length);
}

/** Locale-sensitive comparison through the context's collator. */
export function uniStrcoll(a: TextInput, b: TextInput, context: TextContext): number {
  const collator = context.collator();
  if (!collator) return compareBytes(a, b);
  return sign(collator.compare(text(a), text(b)));
}
