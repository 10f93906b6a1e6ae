export { TextRenderer, formatCodepoint } from './text/text-renderer';
export type { TextRendererEvents, DrawOptions, TextRendererPartsConfig } from './text/text-renderer';
export type { TextRendererConfig, ResolvedTextConfig, TextRendererStats } from './types';
export { validateConfig } from './types';
export { FontRegistry } from './text/font-registry';

// Core
export { FontAsset } from './text/font-asset';
export type {
  OutlineFont,
  OutlineGlyph,
  FontAssetOptions,
  FontSizeMode,
  GlyphResult,
  HorizontalMetrics,
  LineMetrics,
} from './text/font-asset';
export { openTypeOutline, parseOpenType, toArrayBuffer } from './text/opentype-outline';
export { GlyphCache, glyphCacheKey } from './text/glyph-cache';
export type { GlyphCacheOptions, GlyphCacheStats } from './text/glyph-cache';
export { layoutText, drawText, measureWidth } from './text/text-layout';
export type { GlyphBlit, TextStyle, TextLayoutResult } from './text/text-layout';

// Pixels
export { RgbaSurface, RecordingSurface } from './text/surface';
export type { Surface, BlitRecord } from './text/surface';
export { createBitmap, colorize, alphaAt, cloneBitmap } from './text/bitmap';
export type { GlyphBitmap } from './text/bitmap';
export { packedColorFromColor, parseColor, unpackColor, WHITE } from './text/color';
export type { Color } from './text/color';
export { coverageFromRaster, loadShaperFont, shaperRasterizer } from './text/glyph-raster';
export type { CoverageMask, GlyphRasterizer, GrayRaster } from './text/glyph-raster';

// Diagnostics
export { EventBus } from './event-bus';
export { asciiDump, ASCII_RAMP } from './debug/ascii-dump';
