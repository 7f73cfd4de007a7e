import { describe, it, expect } from 'vitest';
import { encodeUtf8 } from '../buffer/c-string';
import { latin1ToUtf8, utf8ToLatin1, validateUtf8 } from '../charset/charset-bridge';
import { DiagnosticCode } from '../context/diagnostics';

const bytes = (...values: number[]) => new Uint8Array(values);

function collect() {
  const reports: [DiagnosticCode, string][] = [];
  const onDiagnostic = (code: DiagnosticCode, message: string) => { reports.push([code, message]); };
  return { reports, onDiagnostic };
}

describe('latin1ToUtf8', () => {
  it('passes ASCII through and widens the upper half', () => {
    expect(Array.from(latin1ToUtf8(bytes(0x41, 0xE9)))).toEqual([0x41, 0xC3, 0xA9]);
    expect(Array.from(latin1ToUtf8(bytes(0xFF)))).toEqual([0xC3, 0xBF]);
  });

  it('converts only the requested length', () => {
    expect(Array.from(latin1ToUtf8(bytes(0x41, 0xE9, 0x42), 2))).toEqual([0x41, 0xC3, 0xA9]);
  });

  it('round-trips every non-NUL Latin-1 byte', () => {
    const latin = new Uint8Array(255);
    for (let i = 0; i < 255; i++) latin[i] = i + 1;
    const utf8 = latin1ToUtf8(latin);
    expect(utf8.length).toBe(127 + 128 * 2);
    expect(validateUtf8(utf8)).toBe(true);
    expect(Array.from(utf8ToLatin1(utf8))).toEqual(Array.from(latin));
  });

  describe('with telnet commands', () => {
    it('unescapes a doubled IAC', () => {
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0xFF), 2, true))).toEqual([0xC3, 0xBF]);
    });

    it('copies option negotiation through untranslated', () => {
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0xFD, 0x01, 0x41), 4, true))).toEqual([0xFF, 0xFD, 0x01, 0x41]);
    });

    it('reports option negotiation without an option byte', () => {
      const { reports, onDiagnostic } = collect();
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0xFD), 2, true, onDiagnostic))).toEqual([0xFF, 0xFD]);
      expect(reports).toEqual([[DiagnosticCode.InvalidTelnetSequence, 'Option negotiation without an option byte']]);
    });

    it('copies a subnegotiation up to its SE', () => {
      const input = bytes(0xFF, 0xFA, 0x18, 0x01, 0xFF, 0xF0, 0x41);
      expect(Array.from(latin1ToUtf8(input, input.length, true))).toEqual([0xFF, 0xFA, 0x18, 0x01, 0xFF, 0xF0, 0x41]);
    });

    it('reports an unterminated subnegotiation once', () => {
      const { reports, onDiagnostic } = collect();
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0xFA, 0x18), 3, true, onDiagnostic))).toEqual([0xFF, 0xFA, 0x18]);
      expect(reports).toEqual([[DiagnosticCode.UnterminatedSubnegotiation, 'IAC SB without SE before end of input']]);
    });

    it('keeps IAC NOP', () => {
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0xF1), 2, true))).toEqual([0xFF, 0xF1]);
    });

    it('drops an unknown command and its byte', () => {
      const { reports, onDiagnostic } = collect();
      expect(Array.from(latin1ToUtf8(bytes(0xFF, 0x01, 0x41), 3, true, onDiagnostic))).toEqual([0x41]);
      expect(reports).toEqual([[DiagnosticCode.InvalidTelnetSequence, 'Invalid telnet sequence character 1']]);
    });

    it('stops at a trailing IAC', () => {
      const { reports, onDiagnostic } = collect();
      expect(Array.from(latin1ToUtf8(bytes(0x41, 0xFF), 2, true, onDiagnostic))).toEqual([0x41]);
      expect(reports).toEqual([[DiagnosticCode.InvalidTelnetSequence, 'IAC at end of input']]);
    });
  });
});

describe('utf8ToLatin1', () => {
  it('narrows codepoints up to U+00FF', () => {
    expect(Array.from(utf8ToLatin1(encodeUtf8('café')))).toEqual([0x63, 0x61, 0x66, 0xE9]);
  });

  it('replaces wider codepoints with a single question mark', () => {
    expect(Array.from(utf8ToLatin1(encodeUtf8('€')))).toEqual([0x3F]);
    expect(Array.from(utf8ToLatin1(encodeUtf8('\u{1F600}a')))).toEqual([0x3F, 0x61]);
    expect(Array.from(utf8ToLatin1(bytes(0xC4, 0x80)))).toEqual([0x3F]);
  });

  it('replaces malformed bytes', () => {
    expect(Array.from(utf8ToLatin1(bytes(0x41, 0x80, 0x42)))).toEqual([0x41, 0x3F, 0x42]);
    expect(Array.from(utf8ToLatin1(bytes(0xC3, 0x41)))).toEqual([0x3F, 0x41]);
    expect(Array.from(utf8ToLatin1(bytes(0xE2, 0x82)))).toEqual([0x3F]);
    expect(Array.from(utf8ToLatin1(bytes(0xFF)))).toEqual([0x3F]);
  });

  it('stops at the first NUL', () => {
    expect(Array.from(utf8ToLatin1(bytes(0x41, 0x00, 0x42)))).toEqual([0x41]);
  });
});

describe('validateUtf8', () => {
  it('accepts well-formed text', () => {
    expect(validateUtf8(encodeUtf8('aé€\u{1F600}'))).toBe(true);
    expect(validateUtf8(bytes())).toBe(true);
  });

  it('rejects missing or stray continuation bytes', () => {
    expect(validateUtf8(bytes(0xC3))).toBe(false);
    expect(validateUtf8(bytes(0xC3, 0x41))).toBe(false);
    expect(validateUtf8(bytes(0x80))).toBe(false);
    expect(validateUtf8(bytes(0xF0, 0x9F, 0x98))).toBe(false);
    expect(validateUtf8(bytes(0xFF))).toBe(false);
  });

  it('ignores everything after the first NUL', () => {
    expect(validateUtf8(bytes(0x41, 0x00, 0x80))).toBe(true);
  });
});
