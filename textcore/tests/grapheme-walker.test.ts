import { describe, it, expect } from 'vitest';
import { encodeUtf8 } from '../buffer/c-string';
import { createTextContext } from '../context/text-context';
import {
  copyGraphemes,
  createGraphemeUnit,
  firstGraphemeBytes,
  forEachGrapheme,
  graphemeBreaks,
  graphemeLength,
  graphemePrefixBytes,
  walkGraphemes,
} from '../unicode/grapheme-walker';
import { byteUnit, countUnits } from '../unicode/text-unit';
import { codepointLength } from '../unicode/utf8-walker';

// "aa", then "a" with a combining acute accent, then "q"
const combining = new Uint8Array([0x61, 0x61, 0x61, 0xCC, 0x81, 0x71]);

describe('GraphemeWalker', () => {
  const context = createTextContext();

  it('keeps a combining mark with its base', () => {
    expect(graphemeBreaks(combining, context)).toEqual([0, 1, 2, 5]);
    expect(graphemeLength(combining, context)).toBe(4);
    expect(graphemeLength(combining.subarray(0, 5), context)).toBe(3);
  });

  it('walks clusters with byte offsets and ordinals', () => {
    expect(Array.from(walkGraphemes(combining, context))).toEqual([
      { offset: 0, length: 1, index: 0 },
      { offset: 1, length: 1, index: 1 },
      { offset: 2, length: 3, index: 2 },
      { offset: 5, length: 1, index: 3 },
    ]);
  });

  it('measures the first n clusters', () => {
    expect(graphemePrefixBytes(combining, 3, context)).toBe(5);
    expect(graphemePrefixBytes(combining, 0, context)).toBe(0);
    expect(graphemePrefixBytes(combining, 99, context)).toBe(6);
    expect(Array.from(copyGraphemes(combining, 3, context))).toEqual([0x61, 0x61, 0x61, 0xCC, 0x81]);
  });

  it('measures the cluster at an offset', () => {
    expect(firstGraphemeBytes(combining, 2, context)).toBe(3);
    expect(firstGraphemeBytes(combining, 6, context)).toBe(0);
  });

  it('treats a regional indicator pair as one cluster', () => {
    const flag = encodeUtf8('\u{1F1EB}\u{1F1F7}');
    expect(graphemeLength(flag, context)).toBe(1);
    expect(codepointLength(flag)).toBe(2);
    expect(flag.length).toBe(8);
  });

  it('stops at the first NUL', () => {
    expect(graphemeLength(new Uint8Array([0x61, 0, 0x62]), context)).toBe(1);
  });

  it('never counts more clusters than codepoints or codepoints than bytes', () => {
    for (const text of ['', 'ascii', 'näive', '\u{1F1EB}\u{1F1F7}!', 'e\u0301\u0302x']) {
      const bytes = encodeUtf8(text);
      expect(graphemeLength(bytes, context)).toBeLessThanOrEqual(codepointLength(bytes));
      expect(codepointLength(bytes)).toBeLessThanOrEqual(bytes.length);
    }
  });

  it('plugs into the generic unit walkers', () => {
    expect(countUnits(combining, createGraphemeUnit(context))).toBe(4);
    expect(countUnits(combining, byteUnit)).toBe(6);
  });

  it('segments a bounded window when measuring one cluster', () => {
    const inputs: number[] = [];
    const intl = new Intl.Segmenter(undefined, { granularity: 'grapheme' });
    const counting = createTextContext({
      segmenter: {
        segment: (input) => {
          inputs.push(input.length);
          return intl.segment(input);
        },
      },
    });
    const text = new Uint8Array(1000).fill(0x61);
    expect(countUnits(text, createGraphemeUnit(counting))).toBe(1000);
    expect(Math.max(...inputs)).toBe(32);
  });

  it('widens the window for a cluster longer than it', () => {
    const long = encodeUtf8('e' + '\u0301'.repeat(40) + 'x');
    expect(firstGraphemeBytes(long, 0, context)).toBe(81);
    expect(firstGraphemeBytes(long, 81, context)).toBe(1);
  });

  it('uses the classifier supplied by the context', () => {
    const whole = createTextContext({
      segmenter: { segment: (input) => [{ index: 0, segment: input }] },
    });
    expect(graphemeLength(encodeUtf8('abc'), whole)).toBe(1);
  });
});

describe('forEachGrapheme', () => {
  const context = createTextContext();

  it('hands every cluster to the callback and reports completion', () => {
    const clusters: number[][] = [];
    const offsets: number[] = [];
    const done = forEachGrapheme(combining, (cluster, source, offset) => {
      clusters.push(Array.from(cluster));
      offsets.push(offset);
      expect(source).toBe(combining);
      return true;
    }, context);
    expect(done).toBe(true);
    expect(clusters).toEqual([[0x61], [0x61], [0x61, 0xCC, 0x81], [0x71]]);
    expect(offsets).toEqual([0, 1, 2, 5]);
  });

  it('stops when the callback says so', () => {
    let calls = 0;
    expect(forEachGrapheme(combining, () => ++calls < 2, context)).toBe(false);
    expect(calls).toBe(2);
  });

  it('reuses one scratch area for small clusters', () => {
    const buffers: ArrayBufferLike[] = [];
    forEachGrapheme(encodeUtf8('ab'), (cluster) => {
      buffers.push(cluster.buffer);
      return true;
    }, context);
    expect(buffers.length).toBe(2);
    expect(buffers[0]).toBe(buffers[1]);
  });

  it('copies clusters of 33 bytes or more', () => {
    const big = encodeUtf8('e' + '\u0301'.repeat(16));
    const lengths: number[] = [];
    let copy: number[] = [];
    forEachGrapheme(big, (cluster, _source, _offset, length) => {
      lengths.push(length);
      copy = Array.from(cluster);
      return true;
    }, context);
    expect(lengths).toEqual([33]);
    expect(copy).toEqual(Array.from(big));
  });
});
