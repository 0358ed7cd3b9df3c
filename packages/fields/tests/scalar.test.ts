import { describe, expect, expectTypeOf, it } from 'vitest';

import { byte, enumOf, isScalar, u16, u32, u64, u8, ubig, uint } from '../src/core/scalar.js';
import { ScalarDefinitionError, ScalarValueError } from '../src/errors/errors.js';

enum Channel {
  Process,
  Page,
  Diagnosis,
  Isdu,
}

describe('uint', () => {
  it('exposes label and width', () => {
    const u12 = uint('u12', 12);
    expect(u12.label).toBe('u12');
    expect(u12.width).toBe(12);
    expect(u12.kind).toBe('scalar');
    expectTypeOf(u12.width).toEqualTypeOf<12>();
  });

  it('truncates on fromBits', () => {
    expect(uint('u12', 12).fromBits(0x1fffn)).toBe(0xfff);
    expect(u8.fromBits(0x1ffn)).toBe(0xff);
    expect(u32.fromBits(0x1_0000_0001n)).toBe(1);
  });

  it('keeps full precision on toBits', () => {
    expect(u8.toBits(255)).toBe(255n);
    expect(u8.toBits(0x1ff)).toBe(0x1ffn);
  });

  it('rejects values with no unsigned integer representation', () => {
    expect(() => u8.toBits(-1)).toThrow(ScalarValueError);
    expect(() => u8.toBits(1.5)).toThrow(ScalarValueError);
    expect(() => u16.toBits(Number.NaN)).toThrow(ScalarValueError);
  });

  it('rejects widths outside [1, 32]', () => {
    expect(() => uint('u0', 0)).toThrow(ScalarDefinitionError);
    expect(() => uint('u33', 33)).toThrow(ScalarDefinitionError);
    expect(() => uint('half', 1.5)).toThrow(ScalarDefinitionError);
  });

  it('freezes scalars', () => {
    expect(Object.isFrozen(u8)).toBe(true);
  });
});

describe('ubig', () => {
  it('handles 64-bit values', () => {
    expect(u64.width).toBe(64);
    expect(u64.fromBits((1n << 64n) | 5n)).toBe(5n);
    expect(u64.toBits(0xffff_ffff_ffff_ffffn)).toBe(0xffff_ffff_ffff_ffffn);
    expectTypeOf(u64.fromBits(0n)).toEqualTypeOf<bigint>();
  });

  it('rejects negative bigints', () => {
    expect(() => u64.toBits(-1n)).toThrow(ScalarValueError);
  });

  it('allows widths above 64', () => {
    const u128 = ubig('u128', 128);
    expect(u128.fromBits(1n << 127n)).toBe(1n << 127n);
    expect(u128.fromBits(1n << 128n)).toBe(0n);
  });
});

describe('byte', () => {
  it('is an 8-bit scalar distinct from u8', () => {
    expect(byte.width).toBe(8);
    expect(byte.label).toBe('byte');
    expect(byte).not.toBe(u8);
  });
});

describe('enumOf', () => {
  it('decodes enum members', () => {
    const channel = enumOf(u8, Channel);
    expect(channel.label).toBe('enum<u8>');
    expect(channel.width).toBe(8);
    expect(channel.fromBits(3n)).toBe(Channel.Isdu);
    expect(channel.toBits(Channel.Page)).toBe(1n);
    expectTypeOf(channel.fromBits(0n)).toEqualTypeOf<Channel>();
  });

  it('accepts a custom label', () => {
    expect(enumOf(u8, Channel, 'Channel').label).toBe('Channel');
  });

  it('rejects members the base cannot represent', () => {
    const u2 = uint('u2', 2);
    expect(() => enumOf(u2, { Low: 0, High: 4 })).toThrow(ScalarDefinitionError);
    expect(() => enumOf(u8, { Below: -1 })).toThrow(/not representable in u8/);
  });
});

describe('isScalar', () => {
  it('recognises scalars only', () => {
    expect(isScalar(u8)).toBe(true);
    expect(isScalar(enumOf(u8, Channel))).toBe(true);
    expect(isScalar({})).toBe(false);
    expect(isScalar(null)).toBe(false);
    expect(isScalar({ kind: 'scalar', label: 'x', width: 8 })).toBe(false);
  });
});
