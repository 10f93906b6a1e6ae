// Font fixtures shared by the text tests.
import * as opentype from 'opentype.js';
import { FontAsset } from './font-asset';
import type { FontAssetOptions, OutlineFont, OutlineGlyph } from './font-asset';
import type { CoverageMask, GlyphRasterizer } from './glyph-raster';

type Box = [number, number, number, number];

export interface MockGlyphSpec {
  advanceWidth: number;
  leftSideBearing?: number;
  /** Ink rectangle in font units, y up: [xMin, yMin, xMax, yMax]. Omit for a glyph without ink. */
  box?: Box;
}

export interface MockOutlineOptions {
  unitsPerEm?: number;
  ascender?: number;
  descender?: number;
  lineGap?: number;
  /** Advance of glyph 0 (.notdef). */
  notdefAdvance?: number;
  /** [left codepoint, right codepoint, font units]. */
  kerning?: Array<[number, number, number]>;
}

export interface MockFontParts {
  outline: OutlineFont;
  rasterizer: GlyphRasterizer;
}

/**
 * Coverage of an axis-aligned box scaled to pixels. Each pixel gets the
 * fraction of its area the box covers.
 */
export function boxCoverage(box: Box, scale: number): CoverageMask | null {
  const [xMin, yMin, xMax, yMax] = box;
  // Pixel space: y grows down from the baseline.
  const x0 = xMin * scale;
  const x1 = xMax * scale;
  const y0 = -yMax * scale;
  const y1 = -yMin * scale;
  const left = Math.floor(x0);
  const top = Math.floor(y0);
  const width = Math.ceil(x1) - left;
  const height = Math.ceil(y1) - top;
  if (width <= 0 || height <= 0) return null;

  const coverage = new Uint8Array(width * height);
  for (let row = 0; row < height; row++) {
    const cy = Math.min(y1, top + row + 1) - Math.max(y0, top + row);
    for (let col = 0; col < width; col++) {
      const cx = Math.min(x1, left + col + 1) - Math.max(x0, left + col);
      coverage[row * width + col] = Math.round(cx * cy * 255);
    }
  }
  return { coverage, width, height, left, top };
}

/**
 * In-memory OutlineFont plus a box rasterizer. Codepoints get glyph indices
 * 1..n in ascending order; index 0 is an inkless .notdef.
 */
export function mockFontParts(
  glyphs: Record<number, MockGlyphSpec>,
  options: MockOutlineOptions = {},
): MockFontParts {
  const codepoints = Object.keys(glyphs).map(Number).sort((a, b) => a - b);
  const indexByCodepoint = new Map<number, number>();
  const byIndex: OutlineGlyph[] = [{ advanceWidth: options.notdefAdvance ?? 0, leftSideBearing: 0 }];
  const boxes = new Map<number, Box>();
  for (const cp of codepoints) {
    const def = glyphs[cp];
    const index = byIndex.length;
    indexByCodepoint.set(cp, index);
    byIndex.push({ advanceWidth: def.advanceWidth, leftSideBearing: def.leftSideBearing ?? 0 });
    if (def.box) boxes.set(index, def.box);
  }
  const pairs = new Map<string, number>();
  for (const [left, right, value] of options.kerning ?? []) {
    const l = indexByCodepoint.get(left);
    const r = indexByCodepoint.get(right);
    if (l !== undefined && r !== undefined) pairs.set(`${l},${r}`, value);
  }

  const outline: OutlineFont = {
    unitsPerEm: options.unitsPerEm ?? 10,
    ascender: options.ascender ?? 8,
    descender: options.descender ?? -2,
    lineGap: options.lineGap ?? 0,
    glyphIndex: (codepoint) => indexByCodepoint.get(codepoint) ?? 0,
    glyph: (index) => byIndex[index] ?? null,
    kerning: (left, right) => pairs.get(`${left},${right}`) ?? 0,
  };
  const rasterizer: GlyphRasterizer = {
    rasterize(index, scale) {
      const box = boxes.get(index);
      return box ? boxCoverage(box, scale) : null;
    },
  };
  return { outline, rasterizer };
}

export function mockFont(
  glyphs: Record<number, MockGlyphSpec>,
  options?: MockOutlineOptions,
  assetOptions?: FontAssetOptions,
): FontAsset {
  const { outline, rasterizer } = mockFontParts(glyphs, options);
  return new FontAsset(outline, rasterizer, assetOptions);
}

function rectGlyph(name: string, unicode: number, advanceWidth: number, box: Box): opentype.Glyph {
  const [xMin, yMin, xMax, yMax] = box;
  const path = new opentype.Path();
  path.moveTo(xMin, yMin);
  path.lineTo(xMax, yMin);
  path.lineTo(xMax, yMax);
  path.lineTo(xMin, yMax);
  path.close();
  const glyph = new opentype.Glyph({ name, unicode, advanceWidth, path });
  glyph.leftSideBearing = xMin;
  return glyph;
}

/**
 * OpenType font (1000 units/em) with:
 * - .notdef, advance 500, no ink (glyph 0)
 * - ' ' advance 250, no ink (glyph 1)
 * - 'A' ink 100..400 x 0..700, advance 600, bearing 100 (glyph 2)
 * - 'B' ink 50..450 x 0..500, advance 500, bearing 50 (glyph 3)
 */
export function buildTestFont(): opentype.Font {
  const notdef = new opentype.Glyph({
    name: '.notdef',
    unicode: 0,
    advanceWidth: 500,
    path: new opentype.Path(),
  });
  const space = new opentype.Glyph({
    name: 'space',
    unicode: 32,
    advanceWidth: 250,
    path: new opentype.Path(),
  });
  return new opentype.Font({
    familyName: 'GlyphBlitTest',
    styleName: 'Regular',
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    glyphs: [
      notdef,
      space,
      rectGlyph('A', 65, 600, [100, 0, 400, 700]),
      rectGlyph('B', 66, 500, [50, 0, 450, 500]),
    ],
  });
}

/** `buildTestFont()` serialized to OpenType bytes. */
export function buildTestFontBytes(): ArrayBuffer {
  return buildTestFont().toArrayBuffer();
}
