import { cloneBitmap } from './bitmap';
import { packedColorFromColor } from './color';
import type { Color } from './color';
import type { FontAsset, GlyphResult } from './font-asset';

export interface GlyphCacheOptions {
  /**
   * Maximum number of entries before the least recently used one is evicted.
   * Default: Infinity (entries live as long as the cache).
   */
  capacity?: number;
  /** Called after every rasterization that produced an entry. */
  onRasterize?: (codepoint: number, packedColor: number, pixelSize: number) => void;
}

export interface GlyphCacheStats {
  hits: number;
  misses: number;
  /** Rasterizer calls, including those that produced no ink. */
  rasterizations: number;
  evictions: number;
  entries: number;
}

/** Composite key: packed RGB, pixel size and codepoint compared as one value. */
export function glyphCacheKey(packedColor: number, pixelSize: number, codepoint: number): string {
  return `${packedColor}:${pixelSize}:${codepoint}`;
}

/** Copy of a cached result whose pixel data belongs to the caller. */
function handOut(entry: GlyphResult): GlyphResult {
  return Object.freeze({
    bitmap: Object.freeze(cloneBitmap(entry.bitmap)),
    xAdvance: entry.xAdvance,
    yOffset: entry.yOffset,
  });
}

/**
 * Memoizes FontAsset.rasterize() by (RGB color, pixel size, codepoint).
 *
 * Stored bitmaps never leave the cache: every lookup returns a copy, so
 * writes through a returned bitmap cannot change later lookups.
 * Color buckets ignore alpha: two colors with the same RGB share entries.
 * Glyphs without ink are not cached, so they are re-checked on every lookup.
 * With the default capacity the cache only grows; callers bound memory by
 * limiting the distinct (color, size) combinations they draw with.
 */
export class GlyphCache {
  readonly font: FontAsset;
  private readonly entries = new Map<string, GlyphResult>();
  private readonly capacity: number;
  private readonly onRasterize?: (codepoint: number, packedColor: number, pixelSize: number) => void;

  private hits = 0;
  private misses = 0;
  private rasterizations = 0;
  private evictions = 0;

  constructor(font: FontAsset, options: GlyphCacheOptions = {}) {
    const capacity = options.capacity ?? Infinity;
    if (!(capacity > 0)) {
      throw new Error('GlyphCache capacity must be > 0');
    }
    this.font = font;
    this.capacity = capacity;
    this.onRasterize = options.onRasterize;
  }

  /**
   * Return a copy of the cached glyph, rasterizing and storing it on first use.
   * Null when the glyph has no ink.
   */
  getOrRender(codepoint: number, color: Color, pixelSize: number): GlyphResult | null {
    const packedColor = packedColorFromColor(color);
    const key = glyphCacheKey(packedColor, pixelSize, codepoint);

    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      if (this.capacity !== Infinity) {
        // Re-insert to mark as most recently used.
        this.entries.delete(key);
        this.entries.set(key, cached);
      }
      return handOut(cached);
    }

    this.misses++;
    this.rasterizations++;
    const scale = this.font.scaleFactor(pixelSize);
    const result = this.font.rasterize(codepoint, scale, packedColor);
    if (!result) return null;

    this.entries.set(key, result);
    if (this.entries.size > this.capacity) this.evictOldest();
    this.onRasterize?.(codepoint, packedColor, pixelSize);
    return handOut(result);
  }

  has(codepoint: number, color: Color, pixelSize: number): boolean {
    return this.entries.has(glyphCacheKey(packedColorFromColor(color), pixelSize, codepoint));
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): GlyphCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      rasterizations: this.rasterizations,
      evictions: this.evictions,
      entries: this.entries.size,
    };
  }

  /** Drop every entry. Counters are kept. */
  clear(): void {
    this.entries.clear();
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    this.evictions++;
  }
}
