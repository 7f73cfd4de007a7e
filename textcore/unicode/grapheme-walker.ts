/**
 * Extended grapheme cluster walking over UTF-8 byte strings.
 *
 * Break decisions come from the context's classifier (Intl.Segmenter unless
 * replaced). The bytes are decoded once per walk together with a table
 * mapping every UTF-16 index back to its byte offset, so cluster boundaries
 * are reported in bytes of the original string.
 */

import type { TextContext } from '../context/text-context';
import { decodeCodepoint } from './utf8-walker';
import type { TextUnit } from './text-unit';

export interface GraphemeStep {
  /** Byte offset of the cluster. */
  offset: number;
  /** Byte length of the cluster. */
  length: number;
  /** Ordinal position of the cluster in the walk. */
  index: number;
}

/**
 * Per-cluster callback. `cluster` is a view that is only valid during the
 * call. Return false to stop the walk.
 */
export type GraphemeCallback =
  (cluster: Uint8Array, source: Uint8Array, offset: number, length: number) => boolean;

// Clusters shorter than this are handed out through a reused scratch view.
const SMALL_CLUSTER_BYTES = 33;

// Codepoints decoded for a single-cluster lookup; doubled while the cluster fills the window.
const CLUSTER_WINDOW = 32;

interface DecodedText {
  text: string;
  /** Byte offset of every UTF-16 index, plus one entry for the end. */
  offsets: Uint32Array;
  /** True when decoding reached the end of the string. */
  complete: boolean;
}

function decodeWithOffsets(bytes: Uint8Array, start: number, limit: number = Infinity): DecodedText {
  const parts: string[] = [];
  const byteOffsets: number[] = [];
  let offset = start;
  let complete = false;
  while (parts.length < limit) {
    const { codepoint, length } = decodeCodepoint(bytes, offset);
    if (!length) {
      complete = true;
      break;
    }
    const ch = String.fromCodePoint(codepoint);
    parts.push(ch);
    byteOffsets.push(offset);
    if (ch.length === 2) byteOffsets.push(offset);
    offset += length;
  }
  if (!complete) complete = !decodeCodepoint(bytes, offset).length;
  byteOffsets.push(offset);
  return { text: parts.join(''), offsets: Uint32Array.from(byteOffsets), complete };
}

/** Lazily walk the clusters of `bytes` from `start` up to the first NUL. */
export function* walkGraphemes(bytes: Uint8Array, context: TextContext,
  start: number = 0): Generator<GraphemeStep, void, undefined> {
  const { text, offsets } = decodeWithOffsets(bytes, start);
  if (!text) return;

  let index = 0;
  for (const data of context.segmenter().segment(text)) {
    const offset = offsets[data.index];
    const end = offsets[data.index + data.segment.length];
    yield { offset, length: end - offset, index: index++ };
  }
}

function firstSegment(segments: Iterable<{ index: number; segment: string }>): string | undefined {
  for (const data of segments) return data.segment;
  return undefined;
}

/**
 * Byte length of the cluster starting at `offset`; 0 at end of string.
 * Only a window of codepoints after `offset` is segmented: a break found
 * before the end of the window has its right-hand neighbour in view.
 */
export function firstGraphemeBytes(bytes: Uint8Array, offset: number, context: TextContext): number {
  for (let limit = CLUSTER_WINDOW; ; limit *= 2) {
    const { text, offsets, complete } = decodeWithOffsets(bytes, offset, limit);
    if (!text) return 0;
    const segment = firstSegment(context.segmenter().segment(text));
    if (segment === undefined) return 0;
    if (segment.length < text.length || complete) return offsets[segment.length] - offset;
  }
}

/** Number of clusters before the first NUL. */
export function graphemeLength(bytes: Uint8Array, context: TextContext): number {
  let n = 0;
  for (const _ of walkGraphemes(bytes, context)) n++;
  return n;
}

/** Byte length of the first `n` clusters. */
export function graphemePrefixBytes(bytes: Uint8Array, n: number, context: TextContext): number {
  let end = 0;
  if (n <= 0) return 0;
  for (const step of walkGraphemes(bytes, context)) {
    end = step.offset + step.length;
    if (step.index + 1 >= n) break;
  }
  return end;
}

/** Newly allocated copy of the first `n` clusters. */
export function copyGraphemes(bytes: Uint8Array, n: number, context: TextContext): Uint8Array {
  return bytes.slice(0, graphemePrefixBytes(bytes, n, context));
}

/** Byte offset of the start of every cluster. */
export function graphemeBreaks(bytes: Uint8Array, context: TextContext): number[] {
  const breaks: number[] = [];
  for (const step of walkGraphemes(bytes, context)) breaks.push(step.offset);
  return breaks;
}

/**
 * Call `callback` for every cluster.
 * @returns true if the whole string was walked, false if the callback stopped it.
 */
export function forEachGrapheme(bytes: Uint8Array, callback: GraphemeCallback, context: TextContext): boolean {
  const scratch = new Uint8Array(SMALL_CLUSTER_BYTES);
  for (const { offset, length } of walkGraphemes(bytes, context)) {
    let cluster: Uint8Array;
    if (length < SMALL_CLUSTER_BYTES) {
      scratch.set(bytes.subarray(offset, offset + length));
      scratch[length] = 0;
      cluster = scratch.subarray(0, length);
    } else {
      cluster = bytes.slice(offset, offset + length);
    }
    if (!callback(cluster, bytes, offset, length)) return false;
  }
  return true;
}

/** Grapheme view for the generic unit walkers and scanners. */
export function createGraphemeUnit(context: TextContext): TextUnit {
  return {
    kind: 'grapheme',
    length(bytes, offset) {
      return firstGraphemeBytes(bytes, offset, context);
    },
    value(bytes, offset) {
      return decodeCodepoint(bytes, offset).codepoint;
    },
  };
}
