import { defineSettings, type AvailableStrategy, type Settings, type SettingsInput, type Strategy } from '../config/settings.js';
import { NO_CONFIG, type FieldConfig, type PickStrategy, type PickType } from '../core/field-config.js';
import { FieldView } from '../core/field-view.js';
import { LayoutBuilder } from '../core/layout.js';
import type { Scalar } from '../core/scalar.js';
import type { CheckSpan } from '../types/arith.js';

/**
 * Field views and layouts bound to one settings value.
 *
 * The settings only supply the lowest-priority defaults: the strategy used when
 * neither the call nor the field picks one, whether `raise-error` exists, and
 * the completeness policy of `build()`.
 *
 * @template D - Default strategy
 * @template E - Whether error-raising writes are available
 *
 * @example
 * ```typescript
 * const strict = createBitfields({ defaultStrategy: 'return-bool' });
 * const flag = strict.view(u8, 1, 7);
 * const ok: boolean = flag.set(cell, 1);
 * ```
 */
export class Bitfields<D extends Strategy = 'mask', E extends boolean = true> {
  constructor(readonly settings: Settings<D, E>) {}

  /**
   * Standalone view of `bits` bits at `offset` in `storage`.
   *
   * @param name - Used in error messages
   */
  view<
    V extends number | bigint,
    W extends number,
    const B extends number,
    const O extends number,
    const C extends FieldConfig & { readonly strategy?: AvailableStrategy<E> } = {},
  >(
    storage: Scalar<V, W>,
    bits: B & CheckSpan<B, O, W>,
    offset: O,
    config?: C,
    name?: string
  ): FieldView<Scalar<V, W>, PickType<C, Scalar<V, W>>, PickStrategy<C, D>, AvailableStrategy<E>> {
    return new FieldView<Scalar<V, W>, PickType<C, Scalar<V, W>>, PickStrategy<C, D>, AvailableStrategy<E>>(
      storage,
      { bits, offset },
      config ?? NO_CONFIG,
      { name, settings: this.settings }
    );
  }

  /**
   * Start a sequential layout over `storage`. `defaults` apply to every field
   * and lose to the field's own configuration attribute by attribute.
   */
  layout<
    V extends number | bigint,
    W extends number,
    const LD extends FieldConfig & { readonly strategy?: AvailableStrategy<E> } = {},
  >(storage: Scalar<V, W>, defaults?: LD): LayoutBuilder<V, W, LD, D, AvailableStrategy<E>> {
    return new LayoutBuilder<V, W, LD, D, AvailableStrategy<E>>(storage, defaults ?? NO_CONFIG, this.settings);
  }
}

/**
 * Create a toolkit with its own settings. Invalid settings throw
 * `InvalidSettingsError` here, before any field exists.
 */
export function createBitfields<const D extends Strategy = 'mask', const E extends boolean = true>(
  input: SettingsInput<D, E> = {}
): Bitfields<D, E> {
  return new Bitfields(defineSettings(input));
}

/** Toolkit with the default settings (`mask`, errors on, namespace `bitweave`). */
export const bitfields = createBitfields();

export const view = bitfields.view.bind(bitfields);
export const layout = bitfields.layout.bind(bitfields);
