/**
 * Latin-1 <-> UTF-8 conversion and UTF-8 validation.
 *
 * Both conversions are lossy where they have to be and never fail. Output
 * arrays are sized exactly by a counting pass over the same walk that fills
 * them.
 */

import { CharacterCodes } from '../scanner/character-codes';
import { DiagnosticCode, type DiagnosticHandler } from '../context/diagnostics';
import { TelnetCodes } from './telnet-codes';

interface ByteSink {
  /** Destination, absent during the counting pass. */
  out: Uint8Array | undefined;
  pos: number;
}

function put(sink: ByteSink, byte: number): void {
  if (sink.out) sink.out[sink.pos] = byte;
  sink.pos++;
}

function encodeLatin1(sink: ByteSink, c: number): void {
  put(sink, 0xC0 | (c >> 6));
  put(sink, 0x80 | (c & 0x3F));
}

// Diagnostics are only raised while filling, so each problem is reported once.
function latin1Walk(latin: Uint8Array, len: number, telnet: boolean, sink: ByteSink,
  onDiagnostic: DiagnosticHandler | undefined): void {
  for (let n = 0; n < len; n++) {
    const c = latin[n];
    if (!telnet || c !== TelnetCodes.IAC) {
      if (c <= CharacterCodes.maxAsciiCharacter) put(sink, c);
      else encodeLatin1(sink, c);
      continue;
    }

    if (n + 1 >= len) {
      if (onDiagnostic)
        onDiagnostic(DiagnosticCode.InvalidTelnetSequence, 'IAC at end of input');
      break;
    }

    const command = latin[++n];
    switch (command) {
      case TelnetCodes.IAC:
        encodeLatin1(sink, TelnetCodes.IAC);
        break;

      case TelnetCodes.SB:
        put(sink, TelnetCodes.IAC);
        while (n < len && latin[n] !== TelnetCodes.SE) put(sink, latin[n++]);
        if (n < len) {
          put(sink, TelnetCodes.SE);
        } else if (onDiagnostic) {
          onDiagnostic(DiagnosticCode.UnterminatedSubnegotiation, 'IAC SB without SE before end of input');
        }
        break;

      case TelnetCodes.DO:
      case TelnetCodes.DONT:
      case TelnetCodes.WILL:
      case TelnetCodes.WONT:
        put(sink, TelnetCodes.IAC);
        put(sink, command);
        if (n + 1 < len) {
          put(sink, latin[++n]);
        } else if (onDiagnostic) {
          onDiagnostic(DiagnosticCode.InvalidTelnetSequence, 'Option negotiation without an option byte');
        }
        break;

      case TelnetCodes.NOP:
        put(sink, TelnetCodes.IAC);
        put(sink, TelnetCodes.NOP);
        break;

      default:
        if (onDiagnostic)
          onDiagnostic(DiagnosticCode.InvalidTelnetSequence,
            'Invalid telnet sequence character ' + command.toString(16).toUpperCase());
    }
  }
}

/**
 * Convert the first `length` bytes of a Latin-1 string to UTF-8.
 *
 * With `telnet` set, IAC starts an in-band telnet command that is copied
 * through untranslated: IAC NOP, IAC DO/DONT/WILL/WONT <option> and
 * IAC SB ... SE. IAC IAC is an escaped 0xFF and becomes U+00FF. IAC followed
 * by anything else is dropped along with that byte.
 */
export function latin1ToUtf8(latin: Uint8Array, length: number = latin.length, telnet: boolean = false,
  onDiagnostic?: DiagnosticHandler): Uint8Array {
  const len = Math.max(0, Math.min(length, latin.length));
  const counter: ByteSink = { out: undefined, pos: 0 };
  latin1Walk(latin, len, telnet, counter, undefined);

  const sink: ByteSink = { out: new Uint8Array(counter.pos), pos: 0 };
  latin1Walk(latin, len, telnet, sink, onDiagnostic);
  return sink.out ?? new Uint8Array(0);
}

function isContinuation(b: number): boolean {
  return (b & 0xC0) === 0x80;
}

// Continuation bytes actually present after a lead, up to `max`.
function continuationRun(utf8: Uint8Array, start: number, max: number): number {
  let n = 0;
  while (n < max && start + n < utf8.length && isContinuation(utf8[start + n])) n++;
  return n;
}

function utf8Walk(utf8: Uint8Array, sink: ByteSink): void {
  let n = 0;
  while (n < utf8.length) {
    const b = utf8[n];
    if (b === CharacterCodes.nullCharacter) break;

    if (b <= CharacterCodes.maxAsciiCharacter) {
      put(sink, b);
      n++;
    } else if ((b & 0xE0) === 0xC0) {
      const trail = continuationRun(utf8, n + 1, 1);
      put(sink, trail && (b & 0x1F) <= 0x03 ? ((b & 0x03) << 6) | (utf8[n + 1] & 0x3F) : CharacterCodes.question);
      n += 1 + trail;
    } else if ((b & 0xF0) === 0xE0) {
      put(sink, CharacterCodes.question);
      n += 1 + continuationRun(utf8, n + 1, 2);
    } else if ((b & 0xF8) === 0xF0) {
      put(sink, CharacterCodes.question);
      n += 1 + continuationRun(utf8, n + 1, 3);
    } else {
      // stray continuation byte or a lead that no encoding uses
      put(sink, CharacterCodes.question);
      n++;
    }
  }
}

/**
 * Convert UTF-8 (up to its first NUL) to Latin-1. Codepoints above U+00FF
 * and malformed sequences each become a single `?`.
 */
export function utf8ToLatin1(utf8: Uint8Array): Uint8Array {
  const counter: ByteSink = { out: undefined, pos: 0 };
  utf8Walk(utf8, counter);

  const sink: ByteSink = { out: new Uint8Array(counter.pos), pos: 0 };
  utf8Walk(utf8, sink);
  return sink.out ?? new Uint8Array(0);
}

/**
 * Structural UTF-8 check up to the first NUL: every lead byte must be
 * followed by exactly the continuation bytes it announces.
 */
export function validateUtf8(utf8: Uint8Array): boolean {
  let nconts = 0;
  for (let n = 0; n < utf8.length; n++) {
    const b = utf8[n];
    if (b === CharacterCodes.nullCharacter) break;

    if (b <= CharacterCodes.maxAsciiCharacter) {
      if (nconts) return false;
    } else if ((b & 0xF8) === 0xF0) {
      if (nconts) return false;
      nconts = 3;
    } else if ((b & 0xF0) === 0xE0) {
      if (nconts) return false;
      nconts = 2;
    } else if ((b & 0xE0) === 0xC0) {
      if (nconts) return false;
      nconts = 1;
    } else if (isContinuation(b)) {
      if (!nconts) return false;
      nconts--;
    } else {
      return false;
    }
  }
  return nconts === 0;
}
