import { assertStrategy, DEFAULT_SETTINGS, Strategy, type Settings } from '../config/settings.js';
import { FieldRangeError, ForbiddenOverrideError, InvalidSpanError } from '../errors/errors.js';
import { relocate, type BitMove } from './bit-mover.js';
import {
  isOffset,
  NO_CONFIG,
  resolveOffset,
  type FieldConfig,
  type GetOverride,
  type Offset,
  type PickStrategy,
  type PickType,
  type SetOverride,
  type SetResult,
} from './field-config.js';
import { assertSpan, bitMask, type BitSpan } from './mask.js';
import { isScalar, type Scalar, type ValueOf } from './scalar.js';

/**
 * Anything holding a storage word in a `raw` property. Layout records
 * implement this; a plain `{ raw: 0 }` works too.
 */
export interface StorageCell<V extends number | bigint = number | bigint> {
  raw: V;
}

/** Writer bound to one resolved override. */
export type FieldWriter<SV extends number | bigint, V, Result> = (cell: StorageCell<SV>, value: V) => Result;

/** Resolved read: where the field's bits land. */
interface ReadPlan {
  readonly dest: Scalar;
  readonly destOffset: number;
}

/** Resolved write: where the bits sit in the value, and what to do with strays. */
interface WritePlan {
  readonly valueType: Scalar;
  readonly valueOffset: number;
  readonly strategy: Strategy;
}

/**
 * Frozen snapshot of a view's resolved defaults.
 */
export interface FieldDescription {
  readonly name: string;
  readonly bits: number;
  readonly offset: number;
  readonly storage: string;
  readonly type: string;
  readonly resultOffset: number;
  readonly strategy: Strategy;
}

export interface FieldViewOptions {
  /** Used in error messages. @default 'field' */
  readonly name?: string;
  /** @default DEFAULT_SETTINGS */
  readonly settings?: Settings;
}

/**
 * Stateless descriptor of one field: a span inside a storage scalar plus a
 * default configuration. The storage word itself is always supplied by the
 * caller.
 *
 * Configuration is resolved in three layers per call, highest priority
 * first: call-site override, field default, settings default. The field's
 * own layer is resolved and validated when the view is constructed, so a call
 * without an override does no validation at all.
 *
 * @template S  - Storage scalar
 * @template R  - Default result/value type
 * @template ST - Default write strategy
 * @template A  - Strategies available under the view's settings
 *
 * @example
 * ```typescript
 * const channel = new FieldView(u8, { bits: 2, offset: 5 }, { type: u8 });
 * channel.get(0b0110_0000); // 0b11
 *
 * const cell = { raw: 0 };
 * channel.set(cell, 2); // cell.raw === 0b0100_0000
 * ```
 */
export class FieldView<
  S extends Scalar = Scalar,
  R extends Scalar = S,
  ST extends Strategy = Strategy,
  A extends Strategy = Strategy,
> {
  readonly name: string;
  readonly bits: number;
  readonly offset: number;
  readonly storage: S;
  /** Field-level configuration as declared (unspecified attributes absent). */
  readonly config: FieldConfig;
  readonly settings: Settings;

  private readonly defaultRead: ReadPlan;
  private readonly defaultWrite: WritePlan;

  constructor(storage: S, span: BitSpan, config: FieldConfig = NO_CONFIG, options: FieldViewOptions = {}) {
    this.name = options.name ?? 'field';
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.storage = storage;
    this.bits = span.bits;
    this.offset = span.offset;
    this.config = Object.isFrozen(config) ? config : Object.freeze({ ...config });

    assertSpan(storage, span, this.name);
    this.assertConfig(config);

    const type = config.type ?? storage;
    const offset = resolveOffset(config.offset, this.offset);
    this.defaultRead = this.checkRead({ dest: type, destOffset: offset });
    this.defaultWrite = this.checkWrite({
      valueType: type,
      valueOffset: offset,
      strategy: config.strategy ?? this.settings.defaultStrategy,
    });
  }

  /** Field bits as a mask over the storage type. */
  mask(): ValueOf<S>;
  mask(): number | bigint {
    return this.storage.fromBits(bitMask(this.offset, this.bits));
  }

  /**
   * Extract the field from a storage value.
   *
   * @param source - Storage word
   * @param override - Result type and/or offset for this call only
   */
  get<const C extends GetOverride = {}>(source: ValueOf<S>, override?: C): ValueOf<PickType<C, R>>;
  get(source: number | bigint, override?: GetOverride): number | bigint {
    return this.read(this.readPlan(override), source);
  }

  /**
   * Write `value` into the field of `cell.raw`.
   *
   * Returns `true`/`false` under the `return-bool` strategy and nothing
   * otherwise; the return type follows the resolved strategy.
   *
   * @throws FieldRangeError under `raise-error` when `value` has bits outside the field
   */
  set<const C extends SetOverride<A> = {}>(
    cell: StorageCell<ValueOf<S>>,
    value: ValueOf<R>,
    override?: C
  ): SetResult<PickStrategy<C, ST>>;
  set(cell: StorageCell, value: number | bigint, override?: SetOverride): boolean | void {
    return this.write(this.writePlan(override), cell, value);
  }

  /**
   * Resolve a read override once and return a bound extractor. Validation of
   * the override happens here, not on every call.
   */
  reader<const C extends GetOverride = {}>(override?: C): BitMove<ValueOf<S>, ValueOf<PickType<C, R>>>;
  reader(override?: GetOverride): (source: never) => number | bigint {
    const plan = this.readPlan(override);
    return (source: number | bigint) => this.read(plan, source);
  }

  /**
   * Resolve a write override once and return a bound writer.
   */
  writer<const C extends SetOverride<A> = {}>(
    override?: C
  ): FieldWriter<ValueOf<S>, ValueOf<R>, SetResult<PickStrategy<C, ST>>>;
  writer(override?: SetOverride): (cell: never, value: never) => boolean | void {
    const plan = this.writePlan(override);
    return (cell: StorageCell, value: number | bigint) => this.write(plan, cell, value);
  }

  /** Resolved defaults of this view. */
  describe(): FieldDescription {
    return Object.freeze({
      name: this.name,
      bits: this.bits,
      offset: this.offset,
      storage: this.storage.label,
      type: this.defaultRead.dest.label,
      resultOffset: this.defaultRead.destOffset,
      strategy: this.defaultWrite.strategy,
    });
  }

  // ---------- resolution ----------

  private assertConfig(config: FieldConfig): void {
    if (config.type !== undefined && !isScalar(config.type)) {
      throw new InvalidSpanError(this.name, String(config.type), 0, this, 'type is not a scalar');
    }
    if (config.offset !== undefined && !isOffset(config.offset)) {
      throw new InvalidSpanError(
        this.name,
        (config.type ?? this.storage).label,
        (config.type ?? this.storage).width,
        { bits: this.bits, offset: NaN },
        'offsets must be non-negative integers'
      );
    }
    if (config.strategy !== undefined) assertStrategy(config.strategy, this.settings);
  }

  private checkRead(plan: ReadPlan): ReadPlan {
    assertSpan(plan.dest, { bits: this.bits, offset: plan.destOffset }, `${this.name} result`);
    return Object.freeze(plan);
  }

  private checkWrite(plan: WritePlan): WritePlan {
    assertSpan(plan.valueType, { bits: this.bits, offset: plan.valueOffset }, `${this.name} value`);
    assertStrategy(plan.strategy, this.settings);
    return Object.freeze(plan);
  }

  private readPlan(override: GetOverride | undefined): ReadPlan {
    if (override === undefined || override === NO_CONFIG) return this.defaultRead;
    if (override.strategy !== undefined) {
      throw new ForbiddenOverrideError(this.name, 'get', 'strategy');
    }
    if (override.type === undefined && override.offset === undefined) return this.defaultRead;
    this.assertConfig(override);

    return this.checkRead({
      dest: override.type ?? this.defaultRead.dest,
      destOffset: this.pickOffset(override.offset, this.defaultRead.destOffset),
    });
  }

  private writePlan(override: SetOverride | undefined): WritePlan {
    if (override === undefined || override === NO_CONFIG) return this.defaultWrite;
    if (override.type !== undefined) {
      throw new ForbiddenOverrideError(this.name, 'set', 'type');
    }
    if (override.offset === undefined && override.strategy === undefined) return this.defaultWrite;
    this.assertConfig(override);

    return this.checkWrite({
      valueType: this.defaultWrite.valueType,
      valueOffset: this.pickOffset(override.offset, this.defaultWrite.valueOffset),
      strategy: override.strategy ?? this.defaultWrite.strategy,
    });
  }

  /** A call-site offset wins; otherwise keep the already-resolved field offset. */
  private pickOffset(offset: Offset | undefined, resolved: number): number {
    return offset === undefined ? resolved : resolveOffset(offset, this.offset);
  }

  // ---------- execution ----------

  private read(plan: ReadPlan, source: number | bigint): number | bigint {
    const moved = relocate(
      this.storage.toBits(source),
      this.bits,
      this.offset,
      this.storage.width,
      plan.destOffset,
      plan.dest.width,
      false
    );
    return plan.dest.fromBits(moved);
  }

  private write(plan: WritePlan, cell: StorageCell, value: number | bigint): boolean | undefined {
    const raw = plan.valueType.toBits(value);
    const strategy = plan.strategy;
    const checked = strategy === Strategy.ReturnBool || strategy === Strategy.RaiseError;

    if (checked) {
      const outside = raw & ~bitMask(plan.valueOffset, this.bits);
      if (outside !== 0n) {
        if (strategy === Strategy.ReturnBool) return false;
        throw new FieldRangeError(this.name, this.bits, plan.valueOffset, raw, outside);
      }
    }

    // Checked values are already clean, and unchecked ones are written as-is.
    const skipMask = strategy !== Strategy.Mask;
    const moved = relocate(
      raw,
      this.bits,
      plan.valueOffset,
      plan.valueType.width,
      this.offset,
      this.storage.width,
      skipMask
    );
    const cleared = this.storage.toBits(cell.raw) & ~bitMask(this.offset, this.bits);
    cell.raw = this.storage.fromBits(cleared | moved);

    return strategy === Strategy.ReturnBool ? true : undefined;
  }
}
