import type { Color } from './text/color';
import { WHITE } from './text/color';
import type { FontSizeMode } from './text/font-asset';

/** Configuration for a TextRenderer. */
export interface TextRendererConfig {
  /** Default pixel size. Default: 16. */
  size?: number;
  /** Default text color. Default: white. */
  color?: Color;
  /** How pixel sizes map to font units. Default: 'height'. */
  sizeMode?: FontSizeMode;
  /** Glyph cache entry limit (LRU). Default: Infinity, never evict. */
  cacheCapacity?: number;
  /** Log a console warning the first time a codepoint has no glyph. Default: false. */
  warnOnMissingGlyph?: boolean;
}

/** Resolved config with all defaults applied. */
export interface ResolvedTextConfig {
  size: number;
  color: Color;
  sizeMode: FontSizeMode;
  cacheCapacity: number;
  warnOnMissingGlyph: boolean;
}

/** Cache statistics (subset of renderer stats). */
export interface TextRendererStats {
  cacheEntries: number;
  cacheHits: number;
  cacheMisses: number;
  rasterizations: number;
  evictions: number;
}

/** Reject a pixel size that cannot be rendered. */
export function assertPixelSize(size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw new Error(`size must be > 0 (got ${size})`);
  }
}

export function validateConfig(config: TextRendererConfig = {}): ResolvedTextConfig {
  const size = config.size ?? 16;
  assertPixelSize(size);
  const cacheCapacity = config.cacheCapacity ?? Infinity;
  if (!(cacheCapacity > 0)) {
    throw new Error('cacheCapacity must be > 0');
  }
  return {
    size,
    color: config.color ?? WHITE,
    sizeMode: config.sizeMode ?? 'height',
    cacheCapacity,
    warnOnMissingGlyph: config.warnOnMissingGlyph ?? false,
  };
}
