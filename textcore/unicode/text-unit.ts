/**
 * One walker, three views. A TextUnit says how long the unit at an offset is
 * and what value a scanner compares against a separator, so counting,
 * prefix measuring and tokenizing are written once for bytes, codepoints and
 * grapheme clusters.
 */

import { decodeCodepoint } from './utf8-walker';

export type TextUnitKind = 'byte' | 'codepoint' | 'grapheme';

export interface TextUnit {
  readonly kind: TextUnitKind;

  /** Byte length of the unit starting at `offset`; 0 at end of string. */
  length(bytes: Uint8Array, offset: number): number;

  /**
   * Value of the unit at `offset`: the byte itself, the codepoint, or the
   * first codepoint of the cluster.
   */
  value(bytes: Uint8Array, offset: number): number;
}

export const byteUnit: TextUnit = {
  kind: 'byte',
  length(bytes, offset) {
    return offset < bytes.length && bytes[offset] !== 0 ? 1 : 0;
  },
  value(bytes, offset) {
    return offset < bytes.length ? bytes[offset] : 0;
  },
};

export const codepointUnit: TextUnit = {
  kind: 'codepoint',
  length(bytes, offset) {
    return decodeCodepoint(bytes, offset).length;
  },
  value(bytes, offset) {
    return decodeCodepoint(bytes, offset).codepoint;
  },
};

/** Number of units before the first NUL. */
export function countUnits(bytes: Uint8Array, unit: TextUnit, start: number = 0): number {
  let n = 0;
  let offset = start;
  let length: number;
  while ((length = unit.length(bytes, offset)) > 0) {
    n++;
    offset += length;
  }
  return n;
}

/** Byte length of the first `n` units. */
export function unitPrefixBytes(bytes: Uint8Array, n: number, unit: TextUnit): number {
  let offset = 0;
  let length: number;
  while (n-- > 0 && (length = unit.length(bytes, offset)) > 0) {
    offset += length;
  }
  return offset;
}
