import {
  assertStrategy,
  isCompletenessPolicy,
  type CompletenessPolicy,
  type Settings,
  type Strategy,
} from '../config/settings.js';
import {
  DuplicateFieldError,
  IncompleteLayoutError,
  InvalidSettingsError,
  InvalidSpanError,
  LayoutOverflowError,
  UnknownFieldError,
} from '../errors/errors.js';
import type { Add, CheckName, CheckSpan } from '../types/arith.js';
import {
  mergeConfig,
  NO_CONFIG,
  type FieldConfig,
  type GetOverride,
  type PickStrategy,
  type PickType,
  type SetOverride,
  type SetResult,
} from './field-config.js';
import { FieldView, type StorageCell } from './field-view.js';
import type { Scalar, ValueOf } from './scalar.js';

/**
 * Phantom record of a declared field's resolved types. Never instantiated.
 */
export interface FieldTypes<R = Scalar, ST = Strategy> {
  readonly result: R;
  readonly strategy: ST;
}

export type FieldMap = { readonly [name: string]: FieldTypes<unknown, unknown> };

type ResultOf<T> = T extends { readonly result: infer R extends Scalar } ? R : never;
type StrategyOf<T> = T extends { readonly strategy: infer S extends Strategy } ? S : never;

/** Types of a field declared with `config` under layout defaults `LD`. */
type DeclaredField<C, LD, S extends Scalar, D extends Strategy> = FieldTypes<
  PickType<C, PickType<LD, S>>,
  PickStrategy<C, PickStrategy<LD, D>>
>;

type WithField<F extends FieldMap, N extends string, T> = F & { readonly [K in N]: T };

/** Frozen name → view map of a built layout. */
export type LayoutFields<V extends number | bigint, W extends number, F extends FieldMap, A extends Strategy> = {
  readonly [K in keyof F]: FieldView<Scalar<V, W>, ResultOf<F[K]>, StrategyOf<F[K]>, A>;
};

/** Plain object of every field's current value. */
export type FieldValues<F extends FieldMap> = {
  -readonly [K in keyof F]: ValueOf<ResultOf<F[K]>>;
};

/** {@link FieldValues} with `bigint` values as decimal strings. */
export type JsonValues<F extends FieldMap> = {
  -readonly [K in keyof F]: JsonValue<ValueOf<ResultOf<F[K]>>>;
};

type JsonValue<V> = V extends bigint ? string : V;

/** Generated `getX` / `setX` accessors for every field `x`. */
export type Accessors<F extends FieldMap, A extends Strategy> = {
  readonly [K in keyof F & string as `get${Capitalize<K>}`]: <C extends GetOverride = {}>(
    override?: C
  ) => ValueOf<PickType<C, ResultOf<F[K]>>>;
} & {
  readonly [K in keyof F & string as `set${Capitalize<K>}`]: <C extends SetOverride<A> = {}>(
    value: ValueOf<ResultOf<F[K]>>,
    override?: C
  ) => SetResult<PickStrategy<C, StrategyOf<F[K]>>>;
};

export type LayoutRecord<V extends number | bigint, F extends FieldMap, A extends Strategy> = BitRecord<V, F, A> &
  Accessors<F, A>;

/** One entry of a layout, with its resolved offset. */
export type LayoutDeclaration =
  | {
      readonly kind: 'field';
      readonly name: string;
      readonly bits: number;
      readonly offset: number;
      readonly config: FieldConfig;
    }
  | {
      readonly kind: 'padding';
      readonly bits: number;
      readonly offset: number;
    };

export interface BuildOptions {
  /** Used in diagnostics and record errors. @default 'layout' */
  readonly name?: string;
  /** Overrides `settings.completeness` for this build. */
  readonly completeness?: CompletenessPolicy;
}

const capitalize = (name: string): string => name.charAt(0).toUpperCase() + name.slice(1);

/** Name of the generated accessor for `field`. */
export function accessorName(prefix: 'get' | 'set', field: string): string {
  return `${prefix}${capitalize(field)}`;
}

// ---------- Builder ----------

/**
 * Immutable sequential layout builder. Every `field` / `pad` call returns a
 * new builder with the declaration appended at the current cursor; the
 * cursor is tracked in the type as well, so literal bit counts that overflow
 * the storage word fail to compile.
 *
 * @template V      - Storage value type
 * @template W      - Storage width
 * @template LD     - Layout-wide default configuration
 * @template D      - Settings default strategy
 * @template A      - Strategies available under the settings
 * @template Cursor - Bits allocated so far
 * @template F      - Declared fields
 */
export class LayoutBuilder<
  V extends number | bigint,
  W extends number,
  LD extends FieldConfig,
  D extends Strategy,
  A extends Strategy,
  Cursor extends number = 0,
  F extends FieldMap = {},
> {
  /** Bits allocated so far. */
  readonly cursor: number;

  constructor(
    readonly storage: Scalar<V, W>,
    readonly defaults: FieldConfig,
    readonly settings: Settings<D>,
    readonly declarations: readonly LayoutDeclaration[] = []
  ) {
    this.cursor = declarations.reduce((sum, declaration) => sum + declaration.bits, 0);
    if (defaults.strategy !== undefined) assertStrategy(defaults.strategy, settings);
  }

  /**
   * Declare the next `bits` bits as field `name`.
   *
   * @throws DuplicateFieldError when `name` or its accessors are taken
   * @throws LayoutOverflowError when the field does not fit
   */
  field<const N extends string, const B extends number, const C extends FieldConfig & { readonly strategy?: A } = {}>(
    name: N & CheckName<N, F>,
    bits: B & CheckSpan<B, Cursor, W>,
    config?: C
  ): LayoutBuilder<V, W, LD, D, A, Add<Cursor, B>, WithField<F, N, DeclaredField<C, LD, Scalar<V, W>, D>>> {
    this.assertName(name);
    this.assertFits(name, bits);
    const declaration: LayoutDeclaration = {
      kind: 'field',
      name,
      bits,
      offset: this.cursor,
      config: config ?? NO_CONFIG,
    };
    return new LayoutBuilder<V, W, LD, D, A, Add<Cursor, B>, WithField<F, N, DeclaredField<C, LD, Scalar<V, W>, D>>>(
      this.storage,
      this.defaults,
      this.settings,
      [...this.declarations, Object.freeze(declaration)]
    );
  }

  /** Skip `bits` bits without declaring a field. */
  pad<const B extends number>(bits: B & CheckSpan<B, Cursor, W>): LayoutBuilder<V, W, LD, D, A, Add<Cursor, B>, F> {
    this.assertFits('padding', bits);
    const declaration: LayoutDeclaration = { kind: 'padding', bits, offset: this.cursor };
    return new LayoutBuilder<V, W, LD, D, A, Add<Cursor, B>, F>(this.storage, this.defaults, this.settings, [
      ...this.declarations,
      Object.freeze(declaration),
    ]);
  }

  /**
   * Resolve every declaration into a {@link FieldView} and generate the
   * record class.
   *
   * @throws IncompleteLayoutError under the `error` completeness policy
   */
  build(options: BuildOptions = {}): Layout<V, W, F, A> {
    const completeness = options.completeness ?? this.settings.completeness;
    if (!isCompletenessPolicy(completeness)) {
      throw new InvalidSettingsError(`unknown completeness policy '${String(completeness)}'`);
    }
    return new Layout<V, W, F, A>(
      options.name ?? 'layout',
      this.storage,
      this.defaults,
      this.settings,
      this.declarations,
      completeness
    );
  }

  private fieldNames(): string[] {
    return this.declarations.flatMap((d) => (d.kind === 'field' ? [d.name] : []));
  }

  private assertName(name: string): void {
    const declared = this.fieldNames();
    if (typeof name !== 'string' || name.length === 0) {
      throw new DuplicateFieldError(String(name), declared);
    }
    // 'foo' and 'Foo' would both generate getFoo / setFoo.
    const accessor = accessorName('get', name);
    if (declared.some((other) => other === name || accessorName('get', other) === accessor)) {
      throw new DuplicateFieldError(name, declared);
    }
  }

  private assertFits(declaration: string, bits: number): void {
    if (!Number.isInteger(bits) || bits <= 0) {
      throw new InvalidSpanError(
        declaration,
        this.storage.label,
        this.storage.width,
        { bits, offset: this.cursor },
        'a span must cover at least one bit'
      );
    }
    if (this.cursor + bits > this.storage.width) {
      throw new LayoutOverflowError(declaration, this.cursor, bits, this.storage.width);
    }
  }
}

// ---------- Records ----------

function defineValue(target: object, name: string, value: number | string | bigint): void {
  Object.defineProperty(target, name, { value, enumerable: true, writable: true, configurable: true });
}

interface RecordSchema<V extends number | bigint> {
  readonly name: string;
  readonly storage: Scalar<V>;
  readonly views: ReadonlyMap<string, FieldView>;
}

/**
 * Owner of one storage word. Layouts generate a subclass per build that adds
 * the named `getX` / `setX` accessors; use {@link Layout.create} rather than
 * constructing this directly.
 */
export class BitRecord<V extends number | bigint, F extends FieldMap, A extends Strategy> implements StorageCell<V> {
  raw: V;

  constructor(
    private readonly schema: RecordSchema<V>,
    raw?: V
  ) {
    const { storage } = schema;
    this.raw = raw === undefined ? storage.fromBits(0n) : storage.fromBits(storage.toBits(raw));
  }

  get<K extends keyof F & string, const C extends GetOverride = {}>(
    name: K,
    override?: C
  ): ValueOf<PickType<C, ResultOf<F[K]>>>;
  get(name: string, override?: GetOverride): number | bigint {
    return this.view(name).get(this.raw, override);
  }

  set<K extends keyof F & string, const C extends SetOverride<A> = {}>(
    name: K,
    value: ValueOf<ResultOf<F[K]>>,
    override?: C
  ): SetResult<PickStrategy<C, StrategyOf<F[K]>>>;
  set(name: string, value: number | bigint, override?: SetOverride): boolean | void {
    return this.view(name).set(this, value, override);
  }

  /** Current value of every field, in declaration order. */
  values(): FieldValues<F> {
    const values = {} as FieldValues<F>;
    for (const [name, view] of this.schema.views) {
      defineValue(values, name, view.get(this.raw));
    }
    return values;
  }

  /** Like {@link values}, with `bigint` fields written as decimal strings. */
  toJSON(): JsonValues<F> {
    const json = {} as JsonValues<F>;
    for (const [name, view] of this.schema.views) {
      const value = view.get(this.raw);
      defineValue(json, name, typeof value === 'bigint' ? value.toString() : value);
    }
    return json;
  }

  private view(name: string): FieldView {
    const view = this.schema.views.get(name);
    if (view === undefined) {
      throw new UnknownFieldError(name, this.schema.name, [...this.schema.views.keys()]);
    }
    return view;
  }
}

// ---------- Layout ----------

/**
 * Result of {@link LayoutBuilder.build}: resolved field views over one
 * storage scalar, plus a factory for records that own a storage word.
 *
 * @example
 * ```typescript
 * const control = layout(u8)
 *   .field('address', 5)
 *   .field('channel', 2, { type: channelType })
 *   .field('direction', 1, { type: directionType })
 *   .build({ name: 'MSequenceControl' });
 *
 * const octet = control.create(0b1110_0000);
 * octet.getChannel(); // Channel.Isdu
 * ```
 */
export class Layout<V extends number | bigint, W extends number, F extends FieldMap, A extends Strategy> {
  readonly fields: LayoutFields<V, W, F, A>;
  readonly width: W;
  /** Fields and padding in declaration order, with resolved offsets. */
  readonly declarations: readonly LayoutDeclaration[];
  /** Bits covered by fields and padding. */
  readonly allocated: number;

  private readonly views: ReadonlyMap<string, FieldView>;
  private readonly Record: new (raw?: V) => BitRecord<V, F, A>;

  constructor(
    readonly name: string,
    readonly storage: Scalar<V, W>,
    defaults: FieldConfig,
    settings: Settings,
    declarations: readonly LayoutDeclaration[],
    completeness: CompletenessPolicy = settings.completeness
  ) {
    this.width = storage.width;

    const views = new Map<string, FieldView>();
    const resolved: LayoutDeclaration[] = [];
    let cursor = 0;
    for (const declaration of declarations) {
      if (cursor + declaration.bits > storage.width) {
        throw new LayoutOverflowError(
          declaration.kind === 'field' ? declaration.name : 'padding',
          cursor,
          declaration.bits,
          storage.width
        );
      }
      if (declaration.kind === 'field') {
        const accessor = accessorName('get', declaration.name);
        if (declaration.name.length === 0 || [...views.keys()].some((n) => accessorName('get', n) === accessor)) {
          throw new DuplicateFieldError(declaration.name, [...views.keys()]);
        }
        const view = new FieldView<Scalar>(
          storage,
          { bits: declaration.bits, offset: cursor },
          mergeConfig(declaration.config, defaults),
          { name: declaration.name, settings }
        );
        views.set(declaration.name, view);
      }
      resolved.push(Object.freeze({ ...declaration, offset: cursor }));
      cursor += declaration.bits;
    }
    this.declarations = Object.freeze(resolved);
    this.allocated = cursor;
    this.views = views;

    if (cursor < storage.width && completeness !== 'allow') {
      if (completeness === 'error') {
        throw new IncompleteLayoutError(name, cursor, storage.width, [...views.keys()]);
      }
      console.warn(`[${settings.namespace}] Layout '${name}' allocates ${cursor} of ${storage.width} bits.`);
    }

    const fields = {} as LayoutFields<V, W, F, A>;
    for (const [field, view] of views) {
      Object.defineProperty(fields, field, { value: view, enumerable: true });
    }
    this.fields = Object.freeze(fields);
    this.Record = defineRecord<V, F, A>({ name, storage, views });
  }

  /** Whether fields and padding cover every bit of the storage word. */
  isComplete(): boolean {
    return this.allocated === this.width;
  }

  /** View of one field. */
  field<K extends keyof F & string>(name: K): LayoutFields<V, W, F, A>[K] {
    if (!this.views.has(name)) {
      throw new UnknownFieldError(name, this.name, [...this.views.keys()]);
    }
    return this.fields[name];
  }

  /** New record holding `raw` (zero when omitted). */
  create(raw?: V): LayoutRecord<V, F, A> {
    // The accessors are installed on the generated prototype at run time.
    return new this.Record(raw) as LayoutRecord<V, F, A>;
  }

  /** Whether `value` is a record created by this layout. */
  owns(value: unknown): value is LayoutRecord<V, F, A> {
    return value instanceof this.Record;
  }
}

function defineRecord<V extends number | bigint, F extends FieldMap, A extends Strategy>(
  schema: RecordSchema<V>
): new (raw?: V) => BitRecord<V, F, A> {
  class GeneratedRecord extends BitRecord<V, F, A> {
    constructor(raw?: V) {
      super(schema, raw);
    }
  }

  for (const [name, view] of schema.views) {
    Object.defineProperty(GeneratedRecord.prototype, accessorName('get', name), {
      value(this: StorageCell, override?: GetOverride) {
        return view.get(this.raw, override);
      },
    });
    Object.defineProperty(GeneratedRecord.prototype, accessorName('set', name), {
      value(this: StorageCell, value: number | bigint, override?: SetOverride) {
        return view.set(this, value, override);
      },
    });
  }
  Object.defineProperty(GeneratedRecord, 'name', { value: schema.name });

  return GeneratedRecord;
}
