import type { GlyphBitmap } from '../text/bitmap';

/** Alpha ramp from empty to fully covered. */
export const ASCII_RAMP = ' .:-=+*#%@';

/**
 * Render the alpha channel of an RGBA image (a glyph bitmap or an RgbaSurface)
 * as text, one line per row. Alpha 0 maps to ' ', 255 to '@'.
 */
export function asciiDump(image: GlyphBitmap): string {
  const last = ASCII_RAMP.length - 1;
  const lines: string[] = [];
  for (let y = 0; y < image.height; y++) {
    let line = '';
    for (let x = 0; x < image.width; x++) {
      const alpha = image.data[(y * image.width + x) * 4 + 3];
      line += ASCII_RAMP[Math.round((alpha / 255) * last)];
    }
    lines.push(line);
  }
  return lines.join('\n');
}
