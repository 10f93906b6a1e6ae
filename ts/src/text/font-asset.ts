import { colorize } from './bitmap';
import type { GlyphBitmap } from './bitmap';
import { loadShaperFont, shaperRasterizer } from './glyph-raster';
import type { GlyphRasterizer } from './glyph-raster';
import { openTypeOutline, parseOpenType, toArrayBuffer } from './opentype-outline';

/** Horizontal metrics of one glyph in font units. */
export interface OutlineGlyph {
  advanceWidth: number;
  leftSideBearing: number;
}

/**
 * Read-only metrics source behind a FontAsset. Implemented over opentype.js
 * by `openTypeOutline()`; tests supply their own.
 */
export interface OutlineFont {
  readonly unitsPerEm: number;
  readonly ascender: number;
  readonly descender: number;
  readonly lineGap: number;
  /** Glyph index for a codepoint, 0 when unmapped. */
  glyphIndex(codepoint: number): number;
  glyph(index: number): OutlineGlyph | null;
  /** Pair adjustment in font units, 0 when the font has none. */
  kerning(leftIndex: number, rightIndex: number): number;
}

/**
 * How a pixel size maps to font units.
 * - height: size equals ascender - descender
 * - upem: size equals units-per-em
 */
export type FontSizeMode = 'height' | 'upem';

export interface FontAssetOptions {
  /** Default: 'height'. */
  sizeMode?: FontSizeMode;
}

/** A rendered glyph. The bitmap already carries the requested RGB. */
export interface GlyphResult {
  readonly bitmap: GlyphBitmap;
  /** Scaled advance, truncated to whole pixels. */
  readonly xAdvance: number;
  /** Top row of the bitmap relative to the baseline (negative above it). */
  readonly yOffset: number;
}

export interface HorizontalMetrics {
  advanceWidth: number;
  leftSideBearing: number;
}

export interface LineMetrics {
  ascent: number;
  descent: number;
  lineGap: number;
  lineHeight: number;
}

/**
 * Parsed outline font. Metrics and kerning come from the OutlineFont, glyph
 * coverage from the GlyphRasterizer. Immutable after construction and holds
 * no rendering state; rendered glyphs are memoized by a GlyphCache in front of it.
 */
export class FontAsset {
  readonly outline: OutlineFont;
  readonly sizeMode: FontSizeMode;
  private readonly rasterizer: GlyphRasterizer;

  constructor(outline: OutlineFont, rasterizer: GlyphRasterizer, options: FontAssetOptions = {}) {
    if (!(outline.unitsPerEm > 0)) {
      throw new Error(`Invalid font: unitsPerEm must be > 0 (got ${outline.unitsPerEm})`);
    }
    this.outline = outline;
    this.rasterizer = rasterizer;
    this.sizeMode = options.sizeMode ?? 'height';
  }

  /**
   * Parse TrueType/OpenType bytes. opentype.js reads the metric and kerning
   * tables; text-shaper rasterizes the outlines.
   * @throws (rejects) If the bytes are not a usable font. No partial font is ever returned.
   */
  static async fromBytes(bytes: ArrayBuffer | Uint8Array, options?: FontAssetOptions): Promise<FontAsset> {
    const buffer = toArrayBuffer(bytes);
    const outline = openTypeOutline(parseOpenType(buffer));
    const shaped = await loadShaperFont(buffer);
    return new FontAsset(outline, shaperRasterizer(shaped, outline.unitsPerEm), options);
  }

  /** Glyph index for a codepoint, 0 when the font has no mapping. */
  glyphIndex(codepoint: number): number {
    return this.outline.glyphIndex(codepoint);
  }

  /** Multiplier from font units to pixels for the requested size. */
  scaleFactor(pixelSize: number): number {
    const { unitsPerEm, ascender, descender } = this.outline;
    const height = ascender - descender;
    const units = this.sizeMode === 'height' && height > 0 ? height : unitsPerEm;
    return pixelSize / units;
  }

  /** Scaled advance and left side bearing, or null when the codepoint has no glyph. */
  horizontalMetrics(codepoint: number, pixelSize: number): HorizontalMetrics | null {
    const index = this.glyphIndex(codepoint);
    if (index === 0) return null;
    const glyph = this.outline.glyph(index);
    if (!glyph) return null;
    const scale = this.scaleFactor(pixelSize);
    return {
      advanceWidth: Math.trunc(glyph.advanceWidth * scale),
      leftSideBearing: Math.trunc(glyph.leftSideBearing * scale),
    };
  }

  /** Scaled pair adjustment between two codepoints; 0 when either glyph is missing or no pair exists. */
  kerning(left: number, right: number, pixelSize: number): number {
    const leftIndex = this.glyphIndex(left);
    const rightIndex = this.glyphIndex(right);
    if (leftIndex === 0 || rightIndex === 0) return 0;
    const units = this.outline.kerning(leftIndex, rightIndex);
    if (!units) return 0;
    return Math.trunc(units * this.scaleFactor(pixelSize));
  }

  /**
   * Unscaled advance in font units. Unmapped codepoints resolve to glyph 0,
   * so they measure as the font's .notdef glyph.
   */
  rawAdvance(codepoint: number): number {
    return this.outline.glyph(this.glyphIndex(codepoint))?.advanceWidth ?? 0;
  }

  lineMetrics(pixelSize: number): LineMetrics {
    const scale = this.scaleFactor(pixelSize);
    const ascent = Math.trunc(this.outline.ascender * scale);
    const descent = Math.trunc(this.outline.descender * scale);
    const lineGap = Math.trunc(this.outline.lineGap * scale);
    return { ascent, descent, lineGap, lineHeight: ascent - descent + lineGap };
  }

  /**
   * Render one glyph at `scale` with the packed 0xRRGGBB color baked in.
   * Returns null for unmapped codepoints and for glyphs without ink (spaces).
   */
  rasterize(codepoint: number, scale: number, packedColor: number): GlyphResult | null {
    const index = this.glyphIndex(codepoint);
    if (index === 0) return null;
    const glyph = this.outline.glyph(index);
    if (!glyph) return null;

    const mask = this.rasterizer.rasterize(index, scale);
    if (!mask) return null;

    const bitmap = Object.freeze(colorize(mask.coverage, mask.width, mask.height, packedColor));
    return Object.freeze({
      bitmap,
      xAdvance: Math.trunc(glyph.advanceWidth * scale),
      yOffset: mask.top,
    });
  }
}
