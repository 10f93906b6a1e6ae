/**
 * RGBA8 glyph bitmap. Every pixel carries the requested RGB; coverage lives
 * in the alpha channel only.
 */
export interface GlyphBitmap {
  readonly width: number;
  readonly height: number;
  /** Row-major RGBA, `width * 4` bytes per row. */
  readonly data: Uint8ClampedArray;
}

export function createBitmap(width: number, height: number): GlyphBitmap {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/** Bake a packed 0xRRGGBB color into a coverage mask. */
export function colorize(
  coverage: Uint8Array,
  width: number,
  height: number,
  packedColor: number,
): GlyphBitmap {
  const bitmap = createBitmap(width, height);
  const r = (packedColor >> 16) & 0xFF;
  const g = (packedColor >> 8) & 0xFF;
  const b = packedColor & 0xFF;
  const data = bitmap.data;
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    data[o] = r;
    data[o + 1] = g;
    data[o + 2] = b;
    data[o + 3] = coverage[i];
  }
  return bitmap;
}

/** Alpha value at (x, y), or 0 outside the bitmap. */
export function alphaAt(bitmap: GlyphBitmap, x: number, y: number): number {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return 0;
  return bitmap.data[(y * bitmap.width + x) * 4 + 3];
}

/** Deep copy, so the caller owns the pixel data. */
export function cloneBitmap(bitmap: GlyphBitmap): GlyphBitmap {
  return { width: bitmap.width, height: bitmap.height, data: bitmap.data.slice() };
}
