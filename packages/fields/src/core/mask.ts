import { InvalidSpanError } from '../errors/errors.js';
import type { CheckSpan } from '../types/arith.js';
import type { Scalar } from './scalar.js';

/**
 * Contiguous run of bits addressed from the least significant bit.
 */
export interface BitSpan {
  readonly bits: number;
  readonly offset: number;
}

/**
 * Number of bits a scalar occupies.
 */
export function width<W extends number>(scalar: Scalar<number | bigint, W>): W {
  return scalar.width;
}

/**
 * Raw mask with `count` set bits starting at `start`. No validation; callers
 * go through {@link assertSpan} first.
 */
export function bitMask(start: number, count: number): bigint {
  return ((1n << BigInt(count)) - 1n) << BigInt(start);
}

/**
 * Reject a span that is empty, negative, fractional or wider than `scalar`.
 *
 * @param role - What the span addresses ("source", "destination", field name)
 */
export function assertSpan(scalar: Scalar, span: BitSpan, role = 'span'): void {
  const { bits, offset } = span;
  if (!Number.isInteger(bits) || bits <= 0) {
    throw new InvalidSpanError(role, scalar.label, scalar.width, span, 'a span must cover at least one bit');
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidSpanError(role, scalar.label, scalar.width, span, 'offsets must be non-negative integers');
  }
  if (offset + bits > scalar.width) {
    throw new InvalidSpanError(
      role,
      scalar.label,
      scalar.width,
      span,
      `bits [${offset}, ${offset + bits}) extend past bit ${scalar.width - 1}`
    );
  }
}

/**
 * Value of `scalar` with `count` consecutive bits set starting at `start`.
 *
 * @example
 * ```typescript
 * mask(u8, 2, 3); // 0b00011100
 * ```
 */
export function mask<
  V extends number | bigint,
  W extends number,
  const Start extends number,
  const Count extends number,
>(scalar: Scalar<V, W>, start: Start, count: Count & CheckSpan<Count, Start, W>): V {
  assertSpan(scalar, { bits: count, offset: start }, 'mask');
  return scalar.fromBits(bitMask(start, count));
}
