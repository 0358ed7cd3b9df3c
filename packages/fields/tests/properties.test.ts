import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { DEFAULT_SETTINGS, Strategy } from '../src/config/settings.js';
import { NO_CONFIG, SOURCE_POSITION } from '../src/core/field-config.js';
import { FieldView } from '../src/core/field-view.js';
import { Layout, type FieldMap, type LayoutDeclaration } from '../src/core/layout.js';
import { bitMask } from '../src/core/mask.js';
import { u32 } from '../src/core/scalar.js';
import { FieldRangeError } from '../src/errors/errors.js';

/** A span `[offset, offset + bits)` inside 32 bits. */
const span32 = fc
  .integer({ min: 1, max: 32 })
  .chain((bits) => fc.tuple(fc.constant(bits), fc.integer({ min: 0, max: 32 - bits })));

/** A span plus the value offset its writes read from: a position or SOURCE_POSITION. */
const placed32 = span32.chain(([bits, offset]) =>
  fc.tuple(
    fc.constant(bits),
    fc.constant(offset),
    fc.oneof(fc.integer({ min: 0, max: 32 - bits }), fc.constant(SOURCE_POSITION))
  )
);

const word32 = fc.integer({ min: 0, max: 0xffff_ffff });

const masked = (value: number, offset: number, bits: number): number =>
  Number(BigInt(value) & bitMask(offset, bits));

describe('field properties', () => {
  it('a zero-shift get equals masking the source', () => {
    fc.assert(
      fc.property(span32, word32, ([bits, offset], source) => {
        const field = new FieldView(u32, { bits, offset }, { offset: SOURCE_POSITION });
        expect(field.get(source)).toBe(masked(source, offset, bits));
      })
    );
  });

  it('a masked write reads back as the value cut to the field width', () => {
    fc.assert(
      fc.property(span32, word32, word32, ([bits, offset], initial, value) => {
        const field = new FieldView(u32, { bits, offset });
        const cell = { raw: initial };
        field.set(cell, value);
        expect(field.get(cell.raw)).toBe(masked(value, 0, bits));
      })
    );
  });

  it('a masked write leaves every other bit alone and is idempotent', () => {
    fc.assert(
      fc.property(span32, word32, word32, ([bits, offset], initial, value) => {
        const field = new FieldView(u32, { bits, offset });
        const outside = (raw: number): bigint => BigInt(raw) & ~bitMask(offset, bits);
        const cell = { raw: initial };

        field.set(cell, value);
        const once = cell.raw;
        field.set(cell, value);

        expect(outside(once)).toBe(outside(initial));
        expect(cell.raw).toBe(once);
      })
    );
  });

  it('checked writes succeed exactly when the value fits at the merged offset', () => {
    fc.assert(
      fc.property(placed32, word32, word32, ([bits, offset, valueOffset], initial, value) => {
        const field = new FieldView(u32, { bits, offset }, { offset: valueOffset });
        const from = valueOffset === SOURCE_POSITION ? offset : valueOffset;
        const fits = (BigInt(value) & ~bitMask(from, bits)) === 0n;

        const cell = { raw: initial };
        expect(field.set(cell, value, { strategy: Strategy.ReturnBool })).toBe(fits);
        if (fits) {
          expect(field.get(cell.raw)).toBe(value);
        } else {
          expect(cell.raw).toBe(initial);
        }

        const strict = { raw: initial };
        if (fits) {
          field.set(strict, value, { strategy: Strategy.RaiseError });
          expect(strict.raw).toBe(cell.raw);
        } else {
          expect(() => field.set(strict, value, { strategy: Strategy.RaiseError })).toThrow(FieldRangeError);
          expect(strict.raw).toBe(initial);
        }
      })
    );
  });
});

describe('layout properties', () => {
  const sizes = fc.array(fc.integer({ min: 1, max: 8 }), { maxLength: 4 });

  const build = (bits: number[]): Layout<number, 32, FieldMap, Strategy> => {
    const declarations = bits.map(
      (size, i): LayoutDeclaration => ({ kind: 'field', name: `f${i}`, bits: size, offset: 0, config: NO_CONFIG })
    );
    return new Layout<number, 32, FieldMap, Strategy>('generated', u32, NO_CONFIG, DEFAULT_SETTINGS, declarations);
  };

  it('offsets are prefix sums of the declared widths', () => {
    fc.assert(
      fc.property(sizes, (bits) => {
        const generated = build(bits);
        let expected = 0;
        bits.forEach((size, i) => {
          expect(generated.field(`f${i}`).offset).toBe(expected);
          expect(generated.declarations[i]?.offset).toBe(expected);
          expected += size;
        });
        expect(generated.allocated).toBe(expected);
      })
    );
  });

  it('a layout is complete exactly when its widths sum to the storage width', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 1, max: 16 }), { minLength: 1, maxLength: 2 }), (bits) => {
        const total = bits.reduce((sum, size) => sum + size, 0);
        expect(build(bits).isComplete()).toBe(total === 32);
      })
    );
    expect(build([16, 16]).isComplete()).toBe(true);
  });
});
