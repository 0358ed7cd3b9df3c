import { InvalidSettingsError, StrategyUnavailableError } from '../errors/errors.js';

/**
 * Assignment strategies, dictating what a write does when the value has bits
 * set outside the field.
 *
 *   - **Unchecked**: write as-is; stray bits may corrupt neighbouring fields
 *   - **Mask**: drop stray bits, keep the rest (default)
 *   - **ReturnBool**: refuse the write and return `false`
 *   - **RaiseError**: refuse the write and throw a `FieldRangeError`
 */
export const Strategy = {
  Unchecked: 'unchecked',
  Mask: 'mask',
  ReturnBool: 'return-bool',
  RaiseError: 'raise-error',
} as const;

export type StrategyType = (typeof Strategy)[keyof typeof Strategy];
export type Strategy = StrategyType;

/** Strategies available when error-raising writes are switched on or off. */
export type AvailableStrategy<E extends boolean> = E extends true
  ? Strategy
  : Exclude<Strategy, typeof Strategy.RaiseError>;

/**
 * What to do when `build()` finishes with unallocated bits.
 */
export type CompletenessPolicy = 'allow' | 'warn' | 'error';

/**
 * Build-time configuration. Each setting only affects the lowest-priority
 * fallback; field and call-site configuration always win.
 */
export interface Settings<D extends Strategy = Strategy, E extends boolean = boolean> {
  /**
   * Strategy used when neither the call nor the field names one.
   *
   * @default 'mask'
   */
  readonly defaultStrategy: D;

  /**
   * Whether the `raise-error` strategy exists.
   *
   * @default true
   */
  readonly errors: E;

  /**
   * Prefix for diagnostics written to the console.
   *
   * @default 'bitweave'
   */
  readonly namespace: string;

  /**
   * Layout completeness policy applied by `build()` unless overridden.
   *
   * @default 'allow'
   */
  readonly completeness: CompletenessPolicy;
}

export interface SettingsInput<D extends Strategy = Strategy, E extends boolean = boolean> {
  defaultStrategy?: D;
  errors?: E;
  namespace?: string;
  completeness?: CompletenessPolicy;
}

export const DEFAULT_SETTINGS: Settings<'mask', true> = Object.freeze({
  defaultStrategy: Strategy.Mask,
  errors: true,
  namespace: 'bitweave',
  completeness: 'allow',
});

const STRATEGIES: readonly string[] = Object.values(Strategy);
const POLICIES: readonly string[] = ['allow', 'warn', 'error'];

export function isStrategy(x: unknown): x is Strategy {
  return typeof x === 'string' && STRATEGIES.includes(x);
}

export function isCompletenessPolicy(x: unknown): x is CompletenessPolicy {
  return typeof x === 'string' && POLICIES.includes(x);
}

/**
 * Reject unknown strategies, and `raise-error` when the settings switched
 * error-raising writes off.
 */
export function assertStrategy(strategy: unknown, settings: Settings): asserts strategy is Strategy {
  if (!isStrategy(strategy)) {
    throw new StrategyUnavailableError(String(strategy), settings.namespace);
  }
  if (strategy === Strategy.RaiseError && !settings.errors) {
    throw new StrategyUnavailableError(strategy, settings.namespace);
  }
}

/**
 * Validate and freeze a settings object, filling in defaults.
 *
 * @example
 * ```typescript
 * const settings = defineSettings({ defaultStrategy: 'return-bool', errors: false });
 * ```
 */
export function defineSettings(): Settings<'mask', true>;
export function defineSettings<const D extends Strategy = 'mask', const E extends boolean = true>(
  input: SettingsInput<D, E>
): Settings<D, E>;
export function defineSettings(input: SettingsInput = {}): Settings {
  const defaultStrategy = input.defaultStrategy ?? DEFAULT_SETTINGS.defaultStrategy;
  const errors = input.errors ?? DEFAULT_SETTINGS.errors;
  const namespace = input.namespace ?? DEFAULT_SETTINGS.namespace;
  const completeness = input.completeness ?? DEFAULT_SETTINGS.completeness;

  if (!isStrategy(defaultStrategy)) {
    throw new InvalidSettingsError(`unknown default strategy '${String(defaultStrategy)}'`);
  }
  if (typeof errors !== 'boolean') {
    throw new InvalidSettingsError(`'errors' must be a boolean`);
  }
  if (!errors && defaultStrategy === Strategy.RaiseError) {
    throw new InvalidSettingsError(`default strategy 'raise-error' requires errors: true`);
  }
  if (typeof namespace !== 'string' || namespace.length === 0) {
    throw new InvalidSettingsError('namespace must be a non-empty string');
  }
  if (!isCompletenessPolicy(completeness)) {
    throw new InvalidSettingsError(`unknown completeness policy '${String(completeness)}'`);
  }

  return Object.freeze({ defaultStrategy, errors, namespace, completeness });
}
