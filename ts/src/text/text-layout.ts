import type { GlyphBitmap } from './bitmap';
import type { Color } from './color';
import type { FontAsset } from './font-asset';
import type { GlyphCache } from './glyph-cache';
import type { Surface } from './surface';

/** Positioned glyph ready to blit. */
export interface GlyphBlit {
  codepoint: number;
  bitmap: GlyphBitmap;
  x: number;
  y: number;
}

export interface TextStyle {
  /** Pixel size. */
  size: number;
  color: Color;
}

export interface TextLayoutResult {
  glyphs: GlyphBlit[];
  /** Pen offset from the origin after the last drawn glyph. */
  penX: number;
}

const NUL = 0;

/**
 * Walk `text` by Unicode scalar value and position each inked glyph.
 *
 * Glyphs without a bitmap (spaces, unmapped codepoints) are skipped without
 * moving the pen or becoming the kerning predecessor. A positive kern for a
 * glyph cancels its bearing instead of applying advance - bearing.
 */
export function layoutText(
  text: string,
  cache: GlyphCache,
  style: TextStyle,
  originX: number,
  originY: number,
): TextLayoutResult {
  const font = cache.font;
  const glyphs: GlyphBlit[] = [];
  let penX = 0;
  let previous = NUL;

  for (const ch of text) {
    const codepoint = ch.codePointAt(0) ?? NUL;
    const glyph = cache.getOrRender(codepoint, style.color, style.size);
    if (!glyph) continue;

    const metrics = font.horizontalMetrics(codepoint, style.size);
    const advance = metrics?.advanceWidth ?? 0;
    const lsb = metrics?.leftSideBearing ?? 0;
    const kern = font.kerning(previous, codepoint, style.size);

    penX += lsb + kern;
    glyphs.push({
      codepoint,
      bitmap: glyph.bitmap,
      x: originX + penX,
      y: originY + glyph.yOffset,
    });

    if (kern > 0) {
      penX -= lsb;
    } else {
      penX += advance - lsb;
    }
    previous = codepoint;
  }

  return { glyphs, penX };
}

/** Lay out `text` and blit each glyph to `surface` in scalar order. Returns the final pen offset. */
export function drawText(
  surface: Surface,
  text: string,
  cache: GlyphCache,
  style: TextStyle,
  originX: number,
  originY: number,
): number {
  const { glyphs, penX } = layoutText(text, cache, style, originX, originY);
  for (const g of glyphs) {
    surface.blit(g.bitmap, g.x, g.y);
  }
  return penX;
}

/**
 * Width of `text` from raw advances only: advances are summed in font units
 * and scaled once, with no bearing or kerning. Does not touch any cache, so
 * it can differ from the pen position reached by drawText().
 */
export function measureWidth(text: string, font: FontAsset, pixelSize: number): number {
  let total = 0;
  for (const ch of text) {
    total += font.rawAdvance(ch.codePointAt(0) ?? NUL);
  }
  return Math.trunc(total * font.scaleFactor(pixelSize));
}
