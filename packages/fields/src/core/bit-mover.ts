import type { CheckSpan } from '../types/arith.js';
import { assertSpan, bitMask } from './mask.js';
import type { Scalar } from './scalar.js';

/**
 * Description of a bit move: which `bits` to take from where in `source`,
 * and where to put them in `dest`.
 */
export interface MoveSpec<
  SV extends number | bigint,
  SW extends number,
  DV extends number | bigint,
  DW extends number,
> {
  readonly bits: number;
  readonly sourceOffset: number;
  readonly source: Scalar<SV, SW>;
  /** Defaults to `source`. */
  readonly dest?: Scalar<DV, DW>;
  /** Defaults to 0. */
  readonly destOffset?: number;
  /**
   * Skip masking the source. The caller guarantees the source holds no bits
   * outside the span, or accepts that they travel along.
   */
  readonly skipMask?: boolean;
}

/** A resolved move, ready to run on values. */
export type BitMove<SV, DV> = (value: SV) => DV;

/**
 * Core relocation on raw bits. Exported for the field views, which already
 * hold validated spans and bigint values.
 *
 * The cast/shift order depends on the direction: a right shift happens in the
 * source width before narrowing (the bits may start above the destination's
 * top bit), a left shift happens after narrowing into the destination width
 * (the bits may end above the source's top bit).
 *
 * @internal
 */
export function relocate(
  raw: bigint,
  bits: number,
  sourceOffset: number,
  sourceWidth: number,
  destOffset: number,
  destWidth: number,
  skipMask: boolean
): bigint {
  let value = BigInt.asUintN(sourceWidth, raw);
  if (!skipMask) value &= bitMask(sourceOffset, bits);

  const shift = sourceOffset - destOffset;
  if (shift === 0) return BigInt.asUintN(destWidth, value);
  if (shift > 0) return BigInt.asUintN(destWidth, value >> BigInt(shift));
  return BigInt.asUintN(destWidth, BigInt.asUintN(destWidth, value) << BigInt(-shift));
}

/**
 * Build a function that moves `bits` bits from `sourceOffset` of a `source`
 * value to `destOffset` of a `dest` value. Both spans are validated here,
 * once, before the returned function ever runs.
 *
 * @example
 * ```typescript
 * const channelOf = moveBits({ bits: 2, sourceOffset: 5, source: u8 });
 * channelOf(0b0110_0000); // 0b11
 *
 * const widen = moveBits({ bits: 2, sourceOffset: 1, source: u8, dest: u16, destOffset: 12 });
 * widen(0b110); // 0b0011_0000_0000_0000
 * ```
 */
export function moveBits<
  SV extends number | bigint,
  SW extends number,
  DV extends number | bigint = SV,
  DW extends number = SW,
>(spec: MoveSpec<SV, SW, DV, DW> & { readonly dest: Scalar<DV, DW> }): BitMove<SV, DV>;
export function moveBits<SV extends number | bigint, SW extends number>(
  spec: MoveSpec<SV, SW, SV, SW> & { readonly dest?: undefined }
): BitMove<SV, SV>;
export function moveBits(spec: MoveSpec<number | bigint, number, number | bigint, number>): BitMove<number | bigint, number | bigint> {
  const { bits, sourceOffset, source, destOffset = 0, skipMask = false } = spec;
  const dest = spec.dest ?? source;

  assertSpan(source, { bits, offset: sourceOffset }, 'source');
  assertSpan(dest, { bits, offset: destOffset }, 'destination');

  const sourceWidth = source.width;
  const destWidth = dest.width;
  return (value) =>
    dest.fromBits(
      relocate(source.toBits(value), bits, sourceOffset, sourceWidth, destOffset, destWidth, skipMask)
    );
}

/**
 * Positional form of {@link moveBits} with compile-time span checks when the
 * counts and offsets are literals.
 */
export function moveSpan<
  SV extends number | bigint,
  SW extends number,
  DV extends number | bigint,
  DW extends number,
  const B extends number,
  const SO extends number,
  const DO extends number = 0,
>(
  bits: B & CheckSpan<B, SO, SW> & CheckSpan<B, DO, DW>,
  sourceOffset: SO,
  source: Scalar<SV, SW>,
  dest: Scalar<DV, DW>,
  destOffset?: DO,
  skipMask = false
): BitMove<SV, DV> {
  return moveBits({ bits, sourceOffset, source, dest, destOffset, skipMask });
}
