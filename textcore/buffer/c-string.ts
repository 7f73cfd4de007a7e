/**
 * NUL-terminated byte strings. Every reader in this package stops at the
 * first 0x00 byte or at the end of the array, whichever comes first.
 */

/** Text accepted by the appenders: a JS string is UTF-8 encoded first. */
export type TextInput = string | Uint8Array;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/** Offset of the first NUL at or after `start`, or `bytes.length`. */
export function cstrlen(bytes: Uint8Array, start: number = 0): number {
  const nul = bytes.indexOf(0, start);
  return nul < 0 ? bytes.length : nul;
}

export function encodeUtf8(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode up to the first NUL. Malformed sequences become U+FFFD. */
export function decodeUtf8(bytes: Uint8Array, start: number = 0): string {
  return decoder.decode(bytes.subarray(start, cstrlen(bytes, start)));
}

export function toBytes(text: TextInput): Uint8Array {
  return typeof text === 'string' ? encoder.encode(text) : text;
}

