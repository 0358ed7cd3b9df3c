import { describe, expect, expectTypeOf, it } from 'vitest';

import {
  isOffset,
  mergeConfig,
  NO_CONFIG,
  resolveOffset,
  SOURCE_POSITION,
  type FieldConfig,
  type PickStrategy,
  type PickType,
  type SetResult,
} from '../src/core/field-config.js';
import { u16, u8 } from '../src/core/scalar.js';

describe('SOURCE_POSITION', () => {
  it('is a registered symbol', () => {
    expect(SOURCE_POSITION).toBe(Symbol.for('bitweave.sourcePosition'));
  });
});

describe('mergeConfig', () => {
  it('overrides attribute by attribute', () => {
    expect(mergeConfig({ offset: SOURCE_POSITION }, { type: u8, offset: 3 })).toEqual({
      type: u8,
      offset: SOURCE_POSITION,
    });
    expect(mergeConfig({ strategy: 'return-bool' }, { type: u16, strategy: 'mask' })).toEqual({
      type: u16,
      strategy: 'return-bool',
    });
  });

  it('keeps unspecified attributes absent', () => {
    const merged = mergeConfig({}, NO_CONFIG);
    expect(Object.keys(merged)).toEqual([]);
    expect('offset' in mergeConfig({ type: u8 }, {})).toBe(false);
  });

  it('distinguishes offset 0 from an unspecified offset', () => {
    expect(mergeConfig({ offset: 0 }, { offset: 4 }).offset).toBe(0);
    expect(mergeConfig({}, { offset: 4 }).offset).toBe(4);
  });

  it('returns a new frozen value and leaves inputs alone', () => {
    const high: FieldConfig = { offset: 1 };
    const low: FieldConfig = { type: u8 };
    const merged = mergeConfig(high, low);

    expect(Object.isFrozen(merged)).toBe(true);
    expect(merged).not.toBe(high);
    expect(high).toEqual({ offset: 1 });
    expect(low).toEqual({ type: u8 });
  });
});

describe('resolveOffset', () => {
  it('resolves SOURCE_POSITION to the field offset', () => {
    expect(resolveOffset(SOURCE_POSITION, 5)).toBe(5);
  });

  it('falls back to 0 when unspecified', () => {
    expect(resolveOffset(undefined, 5)).toBe(0);
    expect(resolveOffset(3, 5)).toBe(3);
  });
});

describe('isOffset', () => {
  it('accepts non-negative integers and the sentinel', () => {
    expect(isOffset(0)).toBe(true);
    expect(isOffset(31)).toBe(true);
    expect(isOffset(SOURCE_POSITION)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isOffset(-1)).toBe(false);
    expect(isOffset(1.5)).toBe(false);
    expect(isOffset('2')).toBe(false);
    expect(isOffset(Symbol('sourcePosition'))).toBe(false);
  });
});

describe('type-level resolution', () => {
  it('picks specified attributes and falls back otherwise', () => {
    expectTypeOf<PickType<{ readonly type: typeof u16 }, typeof u8>>().toEqualTypeOf<typeof u16>();
    expectTypeOf<PickType<{}, typeof u8>>().toEqualTypeOf<typeof u8>();
    expectTypeOf<PickStrategy<{ readonly strategy: 'unchecked' }, 'mask'>>().toEqualTypeOf<'unchecked'>();
    expectTypeOf<PickStrategy<{ readonly offset: 2 }, 'mask'>>().toEqualTypeOf<'mask'>();
  });

  it('types writes as boolean only under return-bool', () => {
    expectTypeOf<SetResult<'return-bool'>>().toEqualTypeOf<boolean>();
    expectTypeOf<SetResult<'mask'>>().toEqualTypeOf<void>();
    expectTypeOf<SetResult<'raise-error'>>().toEqualTypeOf<void>();
  });
});
