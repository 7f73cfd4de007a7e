/**
 * Out-of-band diagnostics. Operations in this package never throw at run
 * time; anything worth a log line is handed to a DiagnosticHandler instead.
 */

export enum DiagnosticCode {
  None,
  /** IAC followed by a byte that starts no known telnet sequence. */
  InvalidTelnetSequence,
  /** IAC SB with no IAC SE before the end of the input. */
  UnterminatedSubnegotiation,
  /** The locale collator could not be created; byte order is used instead. */
  CollatorUnavailable,
  /** A string builder grew past its limit and dropped its content. */
  StringTooBig,
  /** The most negative 64-bit integer was requested in a base other than 8, 10 or 16. */
  UnsupportedIntegerBase,
}

export type DiagnosticHandler = (code: DiagnosticCode, message: string) => void;

export function diagnosticName(code: DiagnosticCode): string {
  return DiagnosticCode[code] ?? 'DiagnosticCode:0x' + code.toString(16).toUpperCase();
}
