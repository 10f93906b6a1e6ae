import { EventBus } from '../event-bus';
import type { ResolvedTextConfig, TextRendererConfig, TextRendererStats } from '../types';
import { assertPixelSize, validateConfig } from '../types';
import type { Color } from './color';
import { FontAsset } from './font-asset';
import type { LineMetrics } from './font-asset';
import { GlyphCache } from './glyph-cache';
import type { Surface } from './surface';
import { drawText, layoutText, measureWidth } from './text-layout';
import type { TextLayoutResult, TextStyle } from './text-layout';

export type TextRendererEvents = {
  /** A codepoint with no glyph in the font was drawn (once per codepoint). */
  'glyph:missing': { codepoint: number };
  /** A glyph was rasterized and cached. */
  'glyph:rasterized': { codepoint: number; size: number; packedColor: number };
};

/** Per-call overrides of the configured defaults. */
export interface DrawOptions {
  size?: number;
  color?: Color;
}

/** Config accepted alongside an already-built FontAsset. */
export type TextRendererPartsConfig = Omit<TextRendererConfig, 'sizeMode'>;

export function formatCodepoint(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Owns one FontAsset and the GlyphCache in front of it. Every component that
 * draws text holds its own renderer; there is no process-wide font state.
 *
 * Construct via `await TextRenderer.fromBytes(bytes, config)`, or
 * `TextRenderer.fromParts(font, config)` for a prebuilt FontAsset.
 */
export class TextRenderer {
  readonly font: FontAsset;
  readonly events = new EventBus<TextRendererEvents>();
  private readonly config: ResolvedTextConfig;
  private readonly cache: GlyphCache;
  private readonly reportedMissing = new Set<number>();

  private constructor(config: ResolvedTextConfig, font: FontAsset) {
    this.config = config;
    this.font = font;
    this.cache = new GlyphCache(font, {
      capacity: config.cacheCapacity,
      onRasterize: (codepoint, packedColor, size) => {
        this.events.emit('glyph:rasterized', { codepoint, size, packedColor });
      },
    });
  }

  /**
   * Parse font bytes and build a renderer.
   * @throws (rejects) If the config is invalid or the bytes are not a usable font.
   */
  static async fromBytes(bytes: ArrayBuffer | Uint8Array, config?: TextRendererConfig): Promise<TextRenderer> {
    const resolved = validateConfig(config);
    const font = await FontAsset.fromBytes(bytes, { sizeMode: resolved.sizeMode });
    return new TextRenderer(resolved, font);
  }

  static fromParts(font: FontAsset, config?: TextRendererPartsConfig): TextRenderer {
    return new TextRenderer(validateConfig({ ...config, sizeMode: font.sizeMode }), font);
  }

  /** Resolved defaults. */
  get defaults(): Readonly<ResolvedTextConfig> {
    return this.config;
  }

  get stats(): TextRendererStats {
    const s = this.cache.stats;
    return {
      cacheEntries: s.entries,
      cacheHits: s.hits,
      cacheMisses: s.misses,
      rasterizations: s.rasterizations,
      evictions: s.evictions,
    };
  }

  /** Position glyphs for `text` with the pen origin at (x, y) on the baseline. */
  layout(text: string, x: number, y: number, options?: DrawOptions): TextLayoutResult {
    const style = this.resolveStyle(options);
    this.reportMissingGlyphs(text);
    return layoutText(text, this.cache, style, x, y);
  }

  /** Draw `text` to `surface` with the baseline origin at (x, y). Returns the final pen offset. */
  draw(surface: Surface, text: string, x: number, y: number, options?: DrawOptions): number {
    const style = this.resolveStyle(options);
    this.reportMissingGlyphs(text);
    return drawText(surface, text, this.cache, style, x, y);
  }

  measureWidth(text: string, size?: number): number {
    const px = size ?? this.config.size;
    assertPixelSize(px);
    return measureWidth(text, this.font, px);
  }

  lineMetrics(size?: number): LineMetrics {
    const px = size ?? this.config.size;
    assertPixelSize(px);
    return this.font.lineMetrics(px);
  }

  /** Drop cached glyphs and listeners. */
  destroy(): void {
    this.cache.clear();
    this.events.destroy();
    this.reportedMissing.clear();
  }

  private resolveStyle(options?: DrawOptions): TextStyle {
    const size = options?.size ?? this.config.size;
    assertPixelSize(size);
    return { size, color: options?.color ?? this.config.color };
  }

  private reportMissingGlyphs(text: string): void {
    if (!this.config.warnOnMissingGlyph) return;
    for (const ch of text) {
      const codepoint = ch.codePointAt(0) ?? 0;
      if (this.reportedMissing.has(codepoint)) continue;
      if (this.font.glyphIndex(codepoint) !== 0) continue;
      this.reportedMissing.add(codepoint);
      console.warn(`TextRenderer: no glyph for ${formatCodepoint(codepoint)}, skipping`);
      this.events.emit('glyph:missing', { codepoint });
    }
  }
}
