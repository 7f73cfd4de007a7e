/**
 * Control spans: runs of bytes that scanning treats as one opaque unit.
 *
 *   markup tag span   0x02 ... 0x03
 *   escape span       0x1B ... 'm'   (ANSI SGR terminator)
 *
 * Spans are recognised, never interpreted. A span with no terminator runs to
 * the end of the string. Span content is always measured in bytes, whatever
 * unit the surrounding scan uses.
 */

import { CharacterCodes, isControlSpanStart } from './character-codes';
import { decodeCodepoint } from '../unicode/utf8-walker';

export const enum SpanState {
  Normal = 0,
  InMarkupTag = 1,
  InEscapeSequence = 2,
}

/** Advance the span state machine over one byte. */
export function nextSpanState(state: SpanState, byte: number): SpanState {
  switch (state) {
    case SpanState.Normal:
      if (byte === CharacterCodes.tagStart) return SpanState.InMarkupTag;
      if (byte === CharacterCodes.escape) return SpanState.InEscapeSequence;
      return SpanState.Normal;
    case SpanState.InMarkupTag:
      return byte === CharacterCodes.tagEnd ? SpanState.Normal : SpanState.InMarkupTag;
    case SpanState.InEscapeSequence:
      return byte === CharacterCodes.m ? SpanState.Normal : SpanState.InEscapeSequence;
  }
}

/**
 * Given the offset of a span opener, return the offset just past its
 * terminator, or the end of the string when it has none.
 */
export function skipControlSpan(bytes: Uint8Array, offset: number): number {
  let state = nextSpanState(SpanState.Normal, bytes[offset]);
  let i = offset + 1;
  while (state !== SpanState.Normal && i < bytes.length && bytes[i] !== CharacterCodes.nullCharacter) {
    state = nextSpanState(state, bytes[i]);
    i++;
  }
  return i;
}

/** Codepoints outside control spans. */
export function visibleLength(bytes: Uint8Array): number {
  let n = 0;
  let offset = 0;
  while (offset < bytes.length) {
    const b = bytes[offset];
    if (b === CharacterCodes.nullCharacter) break;
    if (isControlSpanStart(b)) {
      offset = skipControlSpan(bytes, offset);
      continue;
    }
    offset += decodeCodepoint(bytes, offset).length;
    n++;
  }
  return n;
}
