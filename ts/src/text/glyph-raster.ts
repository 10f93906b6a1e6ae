import { Font, PixelMode, rasterizeGlyph } from 'text-shaper';

/** 8-bit coverage for one glyph, positioned relative to the pen origin on the baseline. */
export interface CoverageMask {
  /** One byte per pixel, row-major, `width` bytes per row. */
  coverage: Uint8Array;
  width: number;
  height: number;
  /** Pixel column of the mask's left edge relative to the pen origin. */
  left: number;
  /** Pixel row of the mask's top edge relative to the baseline (negative above it). */
  top: number;
}

/** Renders glyph coverage by glyph index. */
export interface GlyphRasterizer {
  /** Coverage for glyph `index` at `scale` pixels per font unit, or null when the glyph has no ink. */
  rasterize(index: number, scale: number): CoverageMask | null;
}

/** The fields of a text-shaper raster that coverage extraction reads. */
export interface GrayRaster {
  bitmap: {
    width: number;
    rows: number;
    pitch: number;
    buffer: Uint8Array;
  };
  bearingX: number;
  bearingY: number;
}

/**
 * Copy a gray raster into a tightly packed mask. Rows are read through
 * `pitch`. Returns null for empty bitmaps and for bitmaps with no coverage.
 */
export function coverageFromRaster(raster: GrayRaster): CoverageMask | null {
  const { width, rows, pitch, buffer } = raster.bitmap;
  if (width <= 0 || rows <= 0) return null;

  const coverage = new Uint8Array(width * rows);
  let inked = false;
  for (let row = 0; row < rows; row += 1) {
    const srcRow = row * pitch;
    for (let col = 0; col < width; col += 1) {
      const alpha = buffer[srcRow + col] ?? 0;
      coverage[row * width + col] = alpha;
      if (alpha > 0) inked = true;
    }
  }
  if (!inked) return null;

  return {
    coverage,
    width,
    height: rows,
    left: raster.bearingX,
    top: -raster.bearingY,
  };
}

/**
 * Parse font bytes with text-shaper.
 * @throws `Invalid font: …` when text-shaper rejects the bytes.
 */
export async function loadShaperFont(buffer: ArrayBuffer): Promise<Font> {
  try {
    return await Font.loadAsync(buffer);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid font: ${reason}`);
  }
}

/**
 * GlyphRasterizer over text-shaper's `rasterizeGlyph`. Sizes are passed in
 * em mode, so `scale * unitsPerEm` is the pixel size handed to the library.
 */
export function shaperRasterizer(font: Font, unitsPerEm: number): GlyphRasterizer {
  const options = {
    padding: 0,
    pixelMode: PixelMode.Gray,
    sizeMode: 'em',
    hinting: false,
  } as const;

  return {
    rasterize(index: number, scale: number): CoverageMask | null {
      const raster = rasterizeGlyph(font, index, scale * unitsPerEm, options);
      if (!raster) return null;
      return coverageFromRaster(raster);
    },
  };
}
