export { createTextContext } from './context/text-context';
export type {
  GraphemeSegmenter,
  TextCollator,
  TextContext,
  TextContextDebugState,
  TextContextOptions,
} from './context/text-context';
export { DiagnosticCode, diagnosticName } from './context/diagnostics';
export type { DiagnosticHandler } from './context/diagnostics';

// Buffers and appenders
export { BUFFER_LEN, SBUF_LEN } from './buffer/limits';
export { cstrlen, decodeUtf8, encodeUtf8, toBytes } from './buffer/c-string';
export type { TextInput } from './buffer/c-string';
export * from './buffer/bounded-appender';
export * from './buffer/integer-formatter';
export { createStringBuilder, StringBuilderError } from './buffer/string-builder';
export type { StringBuilder, StringBuilderDebugState, StringBuilderOptions } from './buffer/string-builder';

// Unicode
export * from './unicode/utf8-walker';
export * from './unicode/grapheme-walker';
export { byteUnit, codepointUnit, countUnits, unitPrefixBytes } from './unicode/text-unit';
export type { TextUnit, TextUnitKind } from './unicode/text-unit';
export * from './unicode/case-mapper';
export * from './unicode/collation';

// Scanning
export { CharacterCodes, isAlphaNumeric, isControlSpanStart, isDigit, isLetter, isWhiteSpace } from './scanner/character-codes';
export { nextSpanState, skipControlSpan, SpanState, visibleLength } from './scanner/control-span';
export * from './scanner/token-scanner';

// Charsets
export { latin1ToUtf8, utf8ToLatin1, validateUtf8 } from './charset/charset-bridge';
export { TelnetCodes } from './charset/telnet-codes';

export { escapeLike, globToLike } from './sql/like-pattern';
export * from './text/string-utils';
