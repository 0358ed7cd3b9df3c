import { Strategy } from '../config/settings.js';
import type { Scalar } from './scalar.js';

/**
 * Offset sentinel: place the result at the field's own position in storage,
 * i.e. do not shift at all.
 *
 * Distinct from leaving `offset` out, which means "use the next layer's
 * offset" (and finally 0).
 */
export const SOURCE_POSITION: unique symbol = Symbol.for('bitweave.sourcePosition');
export type SourcePosition = typeof SOURCE_POSITION;

/** Offset in a field configuration. */
export type Offset = number | SourcePosition;

/**
 * Per-field configuration. Every attribute is optional; an absent attribute
 * defers to the next layer (call site → field → layout → settings).
 *
 * @template R - Result/value type of the field
 */
export interface FieldConfig<R extends Scalar = Scalar> {
  /** Type `get` returns and `set` accepts. Defaults to the storage type. */
  readonly type?: R;

  /** LSB-relative position of the field's bits inside `type`. */
  readonly offset?: Offset;

  /** Write strategy for out-of-range bits. */
  readonly strategy?: Strategy;
}

/**
 * Call-site override for reads. A strategy has no effect on a read and is
 * rejected.
 */
export interface GetOverride<R extends Scalar = Scalar> {
  readonly type?: R;
  readonly offset?: Offset;
  readonly strategy?: never;
}

/**
 * Call-site override for writes. The value type is fixed by the field and is
 * rejected here.
 */
export interface SetOverride<A extends Strategy = Strategy> {
  readonly type?: never;
  readonly offset?: Offset;
  readonly strategy?: A;
}

/** Empty configuration (every attribute unspecified). */
export const NO_CONFIG: FieldConfig = Object.freeze({});

// ---------- Type-level resolution ----------

/** `type` of `C` when specified, else `Fallback`. */
export type PickType<C, Fallback> = C extends { readonly type: infer R extends Scalar } ? R : Fallback;

/** `strategy` of `C` when specified, else `Fallback`. */
export type PickStrategy<C, Fallback> = C extends { readonly strategy: infer S extends Strategy }
  ? S
  : Fallback;

/** Return type of a write under strategy `S`. */
export type SetResult<S> = S extends typeof Strategy.ReturnBool ? boolean : void;

// ---------- Runtime resolution ----------

function compact(config: {
  type: Scalar | undefined;
  offset: Offset | undefined;
  strategy: Strategy | undefined;
}): FieldConfig {
  const out: { type?: Scalar; offset?: Offset; strategy?: Strategy } = {};
  if (config.type !== undefined) out.type = config.type;
  if (config.offset !== undefined) out.offset = config.offset;
  if (config.strategy !== undefined) out.strategy = config.strategy;
  return Object.freeze(out);
}

/**
 * Merge two configuration layers attribute by attribute. `high` wins wherever
 * it specifies an attribute. Neither input is modified; the result is frozen.
 *
 * @example
 * ```typescript
 * mergeConfig({ offset: SOURCE_POSITION }, { type: u8, offset: 3 });
 * // { type: u8, offset: SOURCE_POSITION }
 * ```
 */
export function mergeConfig(high: FieldConfig, low: FieldConfig): FieldConfig {
  return compact({
    type: high.type ?? low.type,
    offset: high.offset ?? low.offset,
    strategy: high.strategy ?? low.strategy,
  });
}

/**
 * Resolve an offset against the field's own position. An unspecified offset
 * falls back to 0.
 */
export function resolveOffset(offset: Offset | undefined, fieldOffset: number): number {
  if (offset === SOURCE_POSITION) return fieldOffset;
  return offset ?? 0;
}

export function isOffset(x: unknown): x is Offset {
  return x === SOURCE_POSITION || (typeof x === 'number' && Number.isInteger(x) && x >= 0);
}
