/** RGBA color with 0-255 channels. Alpha is optional and never part of a cache key. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a?: number;
}

export const WHITE: Color = { r: 255, g: 255, b: 255, a: 255 };

/**
 * Pack the RGB channels into a 24-bit integer (0xRRGGBB).
 * Alpha is dropped: colors that differ only in alpha share a packed value.
 */
export function packedColorFromColor(color: Color): number {
  return ((color.r & 0xFF) << 16) + ((color.g & 0xFF) << 8) + (color.b & 0xFF);
}

export function unpackColor(packed: number): Color {
  return {
    r: (packed >> 16) & 0xFF,
    g: (packed >> 8) & 0xFF,
    b: packed & 0xFF,
    a: 255,
  };
}

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/** Parse `#rgb`, `#rrggbb` or `#rrggbbaa`. */
export function parseColor(value: string): Color {
  if (!HEX_COLOR.test(value)) {
    throw new Error(`Invalid color '${value}': expected #rgb, #rrggbb or #rrggbbaa`);
  }
  let hex = value.slice(1);
  if (hex.length === 3) {
    hex = hex[0] + hex[0] + hex[1] + hex[1] + hex[2] + hex[2];
  }
  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
    a: hex.length === 8 ? parseInt(hex.slice(6, 8), 16) : 255,
  };
}
