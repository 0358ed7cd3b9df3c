/*
 * Type-level span arithmetic.
 * ---------------------------
 * Bit counts and offsets written as literals are checked by the compiler:
 * an impossible span turns the offending argument into a branded object type
 * that no number satisfies, so the call does not type-check. Non-literal
 * numbers (computed at run time) pass through and are checked when the
 * definition is evaluated.
 */

declare const DEFINITION_ERROR: unique symbol;

/**
 * Compile-time diagnostic carried by a rejected argument (span, name).
 * The message shows up in the compiler output next to the call site.
 */
export interface DefinitionError<Message extends string> {
  readonly [DEFINITION_ERROR]: Message;
}

export type IsLiteral<N extends number> = number extends N ? false : true;

/** Non-negative integer literal (`-1`, `1.5` and `number` are rejected). */
export type IsNatural<N extends number> =
  IsLiteral<N> extends true
    ? `${N}` extends `-${string}`
      ? false
      : `${N}` extends `${bigint}`
        ? true
        : false
    : false;

type Tuple<N extends number, Acc extends unknown[] = []> = Acc['length'] extends N
  ? Acc
  : Tuple<N, [...Acc, unknown]>;

/**
 * Sum of two non-negative integer literals. Falls back to `number` when either
 * side is not a literal.
 */
export type Add<A extends number, B extends number> =
  IsNatural<A> extends true
    ? IsNatural<B> extends true
      ? [...Tuple<A>, ...Tuple<B>]['length'] extends infer R extends number
        ? R
        : number
      : number
    : number;

/** `A <= B` for non-negative integer literals. */
export type LessOrEqual<A extends number, B extends number> =
  Tuple<B> extends [...Tuple<A>, ...unknown[]] ? true : false;

/**
 * Resolves to `unknown` when `offset + bits <= width` (or when any operand is
 * only known at run time) and to a {@link DefinitionError} otherwise. Used as
 * `bits: B & CheckSpan<B, O, W>`.
 */
export type CheckSpan<B extends number, O extends number, W extends number> =
  IsNatural<B> extends true
    ? B extends 0
      ? DefinitionError<'a field must span at least one bit'>
      : IsNatural<O> extends true
        ? IsNatural<W> extends true
          ? LessOrEqual<Add<B, O>, W> extends true
            ? unknown
            : DefinitionError<`${B} bits at offset ${O} do not fit in ${W} bits`>
          : unknown
        : unknown
    : IsLiteral<B> extends true
      ? DefinitionError<'bit counts must be non-negative integers'>
      : unknown;

/**
 * Resolves to `unknown` for a usable field name and to a
 * {@link DefinitionError} for an empty or already declared one.
 */
export type CheckName<N extends string, Declared> = N extends ''
  ? DefinitionError<'field names cannot be empty'>
  : N extends keyof Declared
    ? DefinitionError<`field '${N}' is already declared`>
    : unknown;
