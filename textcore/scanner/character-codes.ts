/**
 * Byte and codepoint constants shared by the appenders, scanners and the
 * charset bridge. Everything here is a single byte value unless noted.
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,
  maxLatin1Character = 0xFF,

  // Control span sentinels
  tagStart = 0x02,              // markup tag span opener
  tagEnd = 0x03,                // markup tag span terminator
  escape = 0x1B,                // ANSI escape span opener, runs to 'm'

  // Control characters
  tab = 0x09,
  lineFeed = 0x0A,              // \n
  verticalTab = 0x0B,
  formFeed = 0x0C,
  carriageReturn = 0x0D,        // \r

  // ASCII printable characters
  space = 0x20,
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  percent = 0x25,               // %
  asterisk = 0x2A,              // *
  minus = 0x2D,                 // -

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  question = 0x3F,              // ?

  A = 0x41,
  Z = 0x5A,

  backslash = 0x5C,             // \
  underscore = 0x5F,            // _

  a = 0x61,
  m = 0x6D,
  z = 0x7A,

  // Latin-1 letter block; 0xD7 and 0xF7 are the multiplication/division signs
  latin1UpperStart = 0xC0,      // À
  latin1UpperEnd = 0xDE,        // Þ
  multiplication = 0xD7,        // ×
  sharpS = 0xDF,                // ß
  latin1LowerStart = 0xE0,      // à
  division = 0xF7,              // ÷
  latin1LowerEnd = 0xFE,        // þ

  replacementCharacter = 0xFFFD,
  maxCodepoint = 0x10FFFF,

  digit0 = CharacterCodes._0,
  digit9 = CharacterCodes._9,
}

/**
 * ASCII whitespace: space and the control characters from tab through
 * carriage return.
 */
export function isWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         (ch >= CharacterCodes.tab && ch <= CharacterCodes.carriageReturn);
}

/**
 * Check if character is an ASCII letter
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes.digit0 && ch <= CharacterCodes.digit9;
}

/**
 * Check if character is an ASCII letter or digit
 */
export function isAlphaNumeric(ch: number): boolean {
  return isLetter(ch) || isDigit(ch);
}

/** True for the bytes that open a control span. */
export function isControlSpanStart(ch: number): boolean {
  return ch === CharacterCodes.tagStart || ch === CharacterCodes.escape;
}
