/**
 * SQL LIKE patterns from user text. `%`, `_` and the escape character are
 * escaped; a backslash escapes the character after it. globToLike() also
 * turns the glob wildcards `*` and `?` into `%` and `_`.
 */

import { toBytes, type TextInput } from '../buffer/c-string';
import { createStringBuilder } from '../buffer/string-builder';
import type { TextContext } from '../context/text-context';
import { CharacterCodes } from '../scanner/character-codes';
import { walkCodepoints } from '../unicode/utf8-walker';

function buildPattern(input: TextInput, esc: number, translateGlob: boolean, context: TextContext | undefined): Uint8Array {
  const out = createStringBuilder({ context });
  let escapeNext = false;

  for (const { codepoint } of walkCodepoints(toBytes(input))) {
    if (escapeNext) {
      out.appendUchar(esc);
      out.appendUchar(codepoint);
      escapeNext = false;
    } else if (codepoint === CharacterCodes.percent || codepoint === CharacterCodes.underscore || codepoint === esc) {
      out.appendUchar(esc);
      out.appendUchar(codepoint);
    } else if (codepoint === CharacterCodes.backslash) {
      escapeNext = true;
    } else if (translateGlob && codepoint === CharacterCodes.asterisk) {
      out.appendChr(CharacterCodes.percent);
    } else if (translateGlob && codepoint === CharacterCodes.question) {
      out.appendChr(CharacterCodes.underscore);
    } else {
      out.appendUchar(codepoint);
    }
  }
  // a trailing backslash escapes nothing and is dropped

  return out.finish();
}

/** LIKE pattern equivalent to a `*`/`?` glob. */
export function globToLike(glob: TextInput, esc: number, context?: TextContext): Uint8Array {
  return buildPattern(glob, esc, true, context);
}

/** LIKE pattern matching `text` literally. */
export function escapeLike(text: TextInput, esc: number, context?: TextContext): Uint8Array {
  return buildPattern(text, esc, false, context);
}
