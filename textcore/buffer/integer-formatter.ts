/**
 * Base-N integer rendering straight into a bounded buffer.
 *
 * Values are signed 64-bit integers. A number outside the safe integer range,
 * or a bigint outside 64 bits, wraps the way a 64-bit cast would.
 */

import { type BufferCursor, safeChr, safeFormat, safeStr } from './bounded-appender';
import { CharacterCodes } from '../scanner/character-codes';
import { DiagnosticCode, type DiagnosticHandler } from '../context/diagnostics';

export interface FormatIntegerOptions {
  /** Total length of the destination, terminating NUL included. Defaults to the buffer capacity. */
  maxlen?: number;
  onDiagnostic?: DiagnosticHandler;
}

export interface DivMod {
  quot: number;
  rem: number;
}

const digits = '0123456789abcdefghijklmnopqrstuvwxyz';

// Enough for the most negative 64-bit value in base 2 plus its sign.
const STACK_SIZE = 128;

const INT64_MIN = -(1n << 63n);

/**
 * Truncating quotient and remainder. A non-negative dividend always gets a
 * non-negative remainder, whatever the division primitive does with signs.
 */
export function divmod(num: number, denom: number): DivMod {
  let rem = num % denom;
  let quot = (num - rem) / denom;
  if (num >= 0 && rem < 0) {
    quot--;
    rem += denom;
  }
  return { quot, rem };
}

function clampBase(base: number): number {
  base = Math.trunc(base);
  if (!(base >= 2)) return 2;
  if (base > 36) return 36;
  return base;
}

/**
 * Render `value` in `base` (clamped to 2..36) at the cursor.
 * @returns 0 on success, 1 when the buffer filled up (digits that fit stay written).
 */
export function formatInteger(value: number | bigint, base: number, cursor: BufferCursor,
  options: FormatIntegerOptions = {}): number {
  const maxlen = Math.min(options.maxlen ?? cursor.buffer.length, cursor.buffer.length);
  if (cursor.pos >= maxlen - 1) return 1;

  base = clampBase(base);

  const stack = new Uint8Array(STACK_SIZE);
  let current = STACK_SIZE;
  let neg = false;

  if (typeof value === 'number' && !Number.isFinite(value)) return 1;
  const truncated = typeof value === 'number' ? Math.trunc(value) : value;

  if (typeof truncated === 'number' && Number.isSafeInteger(truncated)) {
    let quot = truncated;
    if (quot < 0) {
      neg = true;
      quot = -quot;
    }
    do {
      const r = divmod(quot, base);
      stack[--current] = digits.charCodeAt(r.rem);
      quot = r.quot;
    } while (quot);
  } else {
    let big = BigInt.asIntN(64, BigInt(truncated));
    if (big === INT64_MIN) return formatMostNegative(big, base, cursor, options.onDiagnostic);
    if (big < 0n) {
      neg = true;
      big = -big;
    }
    const bigBase = BigInt(base);
    do {
      stack[--current] = digits.charCodeAt(Number(big % bigBase));
      big /= bigBase;
    } while (big);
  }

  if (neg) stack[--current] = CharacterCodes.minus;

  const size = STACK_SIZE - current;
  if (cursor.pos + size < maxlen - 2) {
    cursor.buffer.set(stack.subarray(current), cursor.pos);
    cursor.pos += size;
    return 0;
  }

  while (current < STACK_SIZE) {
    if (cursor.pos >= maxlen - 1) return 1;
    cursor.buffer[cursor.pos++] = stack[current++];
  }
  return 0;
}

// The absolute value of the most negative integer does not fit in 64 bits,
// so it is handed to the formatted-print path for the bases it knows.
function formatMostNegative(value: bigint, base: number, cursor: BufferCursor,
  onDiagnostic: DiagnosticHandler | undefined): number {
  switch (base) {
    case 10:
      return safeFormat(cursor, '%s', value.toString(10));
    case 16:
      return safeFormat(cursor, '%s', BigInt.asUintN(64, value).toString(16));
    case 8:
      return safeFormat(cursor, '%s', BigInt.asUintN(64, value).toString(8));
    default:
      if (onDiagnostic)
        onDiagnostic(DiagnosticCode.UnsupportedIntegerBase,
          'Cannot render the most negative 64-bit integer in base ' + base);
      return 0;
  }
}

/** Append a signed integer in base 10. */
export function safeInteger(value: number | bigint, cursor: BufferCursor): number {
  return formatInteger(value, 10, cursor);
}

/** Append an unsigned 64-bit integer in base 10; residual as for safeStr(). */
export function safeUinteger(value: number | bigint, cursor: BufferCursor): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return 1;
    value = BigInt(Math.trunc(value));
  }
  return safeStr(BigInt.asUintN(64, value).toString(10), cursor);
}

/**
 * Append an object reference as `#<n>`. Partial references are never left
 * behind: on failure the cursor is restored.
 */
export function safeDbref(ref: number, cursor: BufferCursor): number {
  const saved = cursor.pos;
  if (safeChr(CharacterCodes.hash, cursor) || formatInteger(ref, 10, cursor)) {
    cursor.pos = saved;
    return 1;
  }
  return 0;
}
