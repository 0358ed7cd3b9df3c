import { ScalarDefinitionError, ScalarValueError } from '../errors/errors.js';

/**
 * Fixed-width unsigned scalar used as storage, source or destination of a
 * bit move.
 *
 * All bit arithmetic runs on `bigint` so widths above 32 behave exactly like
 * narrow ones. `toBits` exposes a value's underlying representation at full
 * precision; `fromBits` is the truncating cast back into the scalar.
 *
 * @template V - JavaScript value type (`number`, `bigint`, or an enum)
 * @template W - Bit width
 */
export interface Scalar<V extends number | bigint = number | bigint, W extends number = number> {
  /** Discriminant for runtime type checking */
  readonly kind: 'scalar';

  /** Human-readable name for error messages */
  readonly label: string;

  readonly width: W;

  /** Underlying representation of `value`, never truncated. */
  toBits(value: V): bigint;

  /** Cast raw bits into this scalar, keeping only the low `width` bits. */
  fromBits(bits: bigint): V;
}

/** Value type carried by a scalar. */
export type ValueOf<S> = S extends Scalar<infer V extends number | bigint, number> ? V : never;

/**
 * Numbers stay exact up to 2^53, but keeping `number` scalars at 32 bits or
 * less matches what JavaScript's own bitwise operators can express.
 */
const MAX_NUMBER_WIDTH = 32;

function assertWidth(label: string, width: number, max: number): void {
  if (!Number.isInteger(width) || width <= 0 || width > max) {
    throw new ScalarDefinitionError(label, `width must be an integer in [1, ${max}], got ${width}`);
  }
}

function numberBits(label: string, value: number): bigint {
  if (!Number.isSafeInteger(value) || value < 0) throw new ScalarValueError(label, value);
  return BigInt(value);
}

function bigintBits(label: string, value: bigint): bigint {
  if (value < 0n) throw new ScalarValueError(label, value);
  return value;
}

/**
 * Define an unsigned scalar held in a JavaScript `number`.
 *
 * @example
 * ```typescript
 * const u12 = uint('u12', 12);
 * ```
 */
export function uint<const W extends number>(label: string, width: W): Scalar<number, W> {
  assertWidth(label, width, MAX_NUMBER_WIDTH);
  const scalar: Scalar<number, W> = {
    kind: 'scalar',
    label,
    width,
    toBits: (value) => numberBits(label, value),
    fromBits: (bits) => Number(BigInt.asUintN(width, bits)),
  };
  return Object.freeze(scalar);
}

/** Define an unsigned scalar held in a `bigint` (any width). */
export function ubig<const W extends number>(label: string, width: W): Scalar<bigint, W> {
  assertWidth(label, width, Number.MAX_SAFE_INTEGER);
  const scalar: Scalar<bigint, W> = {
    kind: 'scalar',
    label,
    width,
    toBits: (value) => bigintBits(label, value),
    fromBits: (bits) => BigInt.asUintN(width, bits),
  };
  return Object.freeze(scalar);
}

export const u8 = uint('u8', 8);
export const u16 = uint('u16', 16);
export const u32 = uint('u32', 32);
export const u64 = ubig('u64', 64);

/**
 * Raw byte. Same representation as {@link u8}; kept distinct so layouts can
 * say "opaque octet" rather than "small number".
 */
export const byte = uint('byte', 8);

/** Numeric members of a TypeScript enum object. */
export type EnumValue<E> = Extract<E[keyof E], number>;

/**
 * Scalar whose values are the members of a numeric TypeScript enum, stored
 * in the representation of `base`.
 *
 * Bits that name no member still decode (TypeScript enums are open at run
 * time), matching a plain integer cast.
 *
 * @example
 * ```typescript
 * enum Channel { Process, Page, Diagnosis, Isdu }
 * const channel = enumOf(u8, Channel);
 * ```
 */
export function enumOf<E extends Record<string, string | number>, W extends number>(
  base: Scalar<number, W>,
  members: E,
  label = `enum<${base.label}>`
): Scalar<EnumValue<E>, W> {
  const declared = Object.values(members).filter((v): v is number => typeof v === 'number');
  const outOfRange = declared.filter((v) => !Number.isSafeInteger(v) || v < 0 || base.fromBits(BigInt(v)) !== v);
  if (outOfRange.length > 0) {
    throw new ScalarDefinitionError(
      label,
      `members ${outOfRange.join(', ')} are not representable in ${base.label}`
    );
  }
  const scalar: Scalar<EnumValue<E>, W> = {
    kind: 'scalar',
    label,
    width: base.width,
    toBits: (value) => base.toBits(value),
    // Enum members are plain numbers at run time; the cast is the same brand
    // step an integer-to-enum conversion performs.
    fromBits: (bits) => base.fromBits(bits) as EnumValue<E>,
  };
  return Object.freeze(scalar);
}

/**
 * Runtime type guard for scalars (used to validate configuration objects
 * coming from untyped callers).
 */
export function isScalar(x: unknown): x is Scalar {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Scalar).kind === 'scalar' &&
    typeof (x as Scalar).label === 'string' &&
    typeof (x as Scalar).width === 'number' &&
    typeof (x as Scalar).toBits === 'function' &&
    typeof (x as Scalar).fromBits === 'function'
  );
}
