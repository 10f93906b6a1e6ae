import * as opentype from 'opentype.js';
import type { OutlineFont, OutlineGlyph } from './font-asset';

/** Copy font bytes into an ArrayBuffer of their own. */
export function toArrayBuffer(bytes: ArrayBuffer | Uint8Array): ArrayBuffer {
  if (!(bytes instanceof Uint8Array)) return bytes;
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Parse font bytes with opentype.js.
 * @throws `Invalid font: …` for anything opentype.js cannot read or that has no glyphs.
 */
export function parseOpenType(bytes: ArrayBuffer | Uint8Array): opentype.Font {
  let font: opentype.Font;
  try {
    font = opentype.parse(toArrayBuffer(bytes));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid font: ${reason}`);
  }
  if (!(font.unitsPerEm > 0) || font.glyphs.length === 0) {
    throw new Error('Invalid font: no glyph outlines');
  }
  return font;
}

/** Adapt an opentype.js Font to the OutlineFont interface. */
export function openTypeOutline(font: opentype.Font): OutlineFont {
  const hhea = font.tables['hhea'];
  const lineGap = typeof hhea?.lineGap === 'number' ? hhea.lineGap : 0;

  return {
    unitsPerEm: font.unitsPerEm,
    ascender: font.ascender,
    descender: font.descender,
    lineGap,
    glyphIndex(codepoint: number): number {
      if (codepoint < 0 || codepoint > 0x10FFFF) return 0;
      return font.charToGlyphIndex(String.fromCodePoint(codepoint)) || 0;
    },
    glyph(index: number): OutlineGlyph | null {
      if (index < 0 || index >= font.glyphs.length) return null;
      const glyph = font.glyphs.get(index);
      return {
        advanceWidth: glyph.advanceWidth || 0,
        leftSideBearing: glyph.getMetrics().leftSideBearing || 0,
      };
    },
    kerning(leftIndex: number, rightIndex: number): number {
      return font.getKerningValue(leftIndex, rightIndex) || 0;
    },
  };
}
