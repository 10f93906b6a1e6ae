import type { GlyphBitmap } from './bitmap';
import type { Color } from './color';

/**
 * Destination for rendered glyphs. Implementations composite using the
 * bitmap's alpha only; its RGB already carries the requested color.
 */
export interface Surface {
  blit(bitmap: GlyphBitmap, x: number, y: number): void;
}

/** One recorded blit. */
export interface BlitRecord {
  bitmap: GlyphBitmap;
  x: number;
  y: number;
}

/** Surface that only records blits, in call order. */
export class RecordingSurface implements Surface {
  readonly blits: BlitRecord[] = [];

  blit(bitmap: GlyphBitmap, x: number, y: number): void {
    this.blits.push({ bitmap, x, y });
  }

  reset(): void {
    this.blits.length = 0;
  }
}

/**
 * In-memory RGBA8 render target. Blits are source-over composited and
 * clipped to the surface bounds.
 */
export class RgbaSurface implements Surface {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`RgbaSurface size must be positive integers (got ${width}x${height})`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);
  }

  clear(color: Color): void {
    const a = color.a ?? 255;
    for (let i = 0; i < this.data.length; i += 4) {
      this.data[i] = color.r;
      this.data[i + 1] = color.g;
      this.data[i + 2] = color.b;
      this.data[i + 3] = a;
    }
  }

  /** RGBA at (x, y); out-of-range coordinates read as transparent black. */
  getPixel(x: number, y: number): [number, number, number, number] {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return [0, 0, 0, 0];
    const o = (y * this.width + x) * 4;
    return [this.data[o], this.data[o + 1], this.data[o + 2], this.data[o + 3]];
  }

  /** Fractional origins are truncated toward zero. */
  blit(bitmap: GlyphBitmap, originX: number, originY: number): void {
    const x = Math.trunc(originX);
    const y = Math.trunc(originY);
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + bitmap.width);
    const y1 = Math.min(this.height, y + bitmap.height);
    const src = bitmap.data;
    const dst = this.data;

    for (let dy = y0; dy < y1; dy++) {
      for (let dx = x0; dx < x1; dx++) {
        const s = ((dy - y) * bitmap.width + (dx - x)) * 4;
        const sa = src[s + 3];
        if (sa === 0) continue;
        const d = (dy * this.width + dx) * 4;
        if (sa === 255) {
          dst[d] = src[s];
          dst[d + 1] = src[s + 1];
          dst[d + 2] = src[s + 2];
          dst[d + 3] = 255;
          continue;
        }
        const alpha = sa / 255;
        const inv = 1 - alpha;
        dst[d] = src[s] * alpha + dst[d] * inv;
        dst[d + 1] = src[s + 1] * alpha + dst[d + 1] * inv;
        dst[d + 2] = src[s + 2] * alpha + dst[d + 2] * inv;
        dst[d + 3] = sa + dst[d + 3] * inv;
      }
    }
  }
}
