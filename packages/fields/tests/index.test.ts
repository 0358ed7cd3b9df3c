import { describe, expect, it } from 'vitest';

import {
  bitfields,
  createBitfields,
  FieldRangeError,
  FieldView,
  Layout,
  LayoutBuilder,
  layout,
  mask,
  mergeConfig,
  moveBits,
  SOURCE_POSITION,
  Strategy,
  u8,
  view,
  width,
} from '../src/index.js';
import { createBitfields as createImpl } from '../src/api/bitfields.js';
import { FieldRangeError as FieldRangeImpl } from '../src/errors/errors.js';
import { FieldView as FieldViewImpl } from '../src/core/field-view.js';
import { Layout as LayoutImpl, LayoutBuilder as BuilderImpl } from '../src/core/layout.js';
import { SOURCE_POSITION as SourcePositionImpl } from '../src/core/field-config.js';

describe('package public index', () => {
  it('re-exports the public api surface', () => {
    expect(createBitfields).toBe(createImpl);
    expect(FieldRangeError).toBe(FieldRangeImpl);
    expect(FieldView).toBe(FieldViewImpl);
    expect(Layout).toBe(LayoutImpl);
    expect(LayoutBuilder).toBe(BuilderImpl);
    expect(SOURCE_POSITION).toBe(SourcePositionImpl);
    expect(Strategy.Mask).toBe('mask');
    expect(typeof moveBits).toBe('function');
    expect(typeof mergeConfig).toBe('function');
  });

  it('binds view and layout to the default toolkit', () => {
    expect(view(u8, 3, 2).settings).toBe(bitfields.settings);
    expect(layout(u8).settings).toBe(bitfields.settings);
    expect(width(u8)).toBe(8);
    expect(mask(u8, 0, 4)).toBe(0xf);
  });
});
