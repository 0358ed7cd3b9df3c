export { Bitfields, bitfields, createBitfields, layout, view } from './api/bitfields.js';

export {
  assertStrategy,
  DEFAULT_SETTINGS,
  defineSettings,
  isCompletenessPolicy,
  isStrategy,
  Strategy,
} from './config/settings.js';
export type {
  AvailableStrategy,
  CompletenessPolicy,
  Settings,
  SettingsInput,
  StrategyType,
} from './config/settings.js';

export { byte, enumOf, isScalar, u16, u32, u64, u8, ubig, uint } from './core/scalar.js';
export type { EnumValue, Scalar, ValueOf } from './core/scalar.js';

export { mask, width } from './core/mask.js';
export type { BitSpan } from './core/mask.js';

export { moveBits, moveSpan } from './core/bit-mover.js';
export type { BitMove, MoveSpec } from './core/bit-mover.js';

export { isOffset, mergeConfig, NO_CONFIG, resolveOffset, SOURCE_POSITION } from './core/field-config.js';
export type {
  FieldConfig,
  GetOverride,
  Offset,
  PickStrategy,
  PickType,
  SetOverride,
  SetResult,
  SourcePosition,
} from './core/field-config.js';

export { FieldView } from './core/field-view.js';
export type { FieldDescription, FieldViewOptions, FieldWriter, StorageCell } from './core/field-view.js';

export { accessorName, BitRecord, Layout, LayoutBuilder } from './core/layout.js';
export type {
  Accessors,
  BuildOptions,
  FieldMap,
  FieldTypes,
  FieldValues,
  JsonValues,
  LayoutDeclaration,
  LayoutFields,
  LayoutRecord,
} from './core/layout.js';

export type { Add, CheckName, CheckSpan, DefinitionError } from './types/arith.js';

// Errors
export {
  DuplicateFieldError,
  FieldRangeError,
  ForbiddenOverrideError,
  IncompleteLayoutError,
  InvalidSettingsError,
  InvalidSpanError,
  LayoutOverflowError,
  ScalarDefinitionError,
  ScalarValueError,
  StrategyUnavailableError,
  UnknownFieldError,
} from './errors/errors.js';
