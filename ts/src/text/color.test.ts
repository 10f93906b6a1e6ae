import { describe, it, expect } from 'vitest';
import { packedColorFromColor, parseColor, unpackColor } from './color';
import { alphaAt, colorize } from './bitmap';

describe('packedColorFromColor', () => {
  it('packs RGB into 0xRRGGBB', () => {
    expect(packedColorFromColor({ r: 0x12, g: 0x34, b: 0x56 })).toBe(0x123456);
  });

  it('ignores alpha', () => {
    const opaque = packedColorFromColor({ r: 200, g: 100, b: 50, a: 255 });
    const faint = packedColorFromColor({ r: 200, g: 100, b: 50, a: 3 });
    expect(faint).toBe(opaque);
  });

  it('unpacks back to opaque channels', () => {
    expect(unpackColor(0xFF8000)).toEqual({ r: 255, g: 128, b: 0, a: 255 });
  });
});

describe('parseColor', () => {
  it('parses short and long hex forms', () => {
    expect(parseColor('#f80')).toEqual({ r: 255, g: 136, b: 0, a: 255 });
    expect(parseColor('#102030')).toEqual({ r: 16, g: 32, b: 48, a: 255 });
    expect(parseColor('#10203080')).toEqual({ r: 16, g: 32, b: 48, a: 128 });
  });

  it('rejects malformed strings', () => {
    expect(() => parseColor('red')).toThrow("Invalid color 'red'");
    expect(() => parseColor('#12345')).toThrow('Invalid color');
  });
});

describe('colorize', () => {
  it('bakes RGB into every pixel and keeps coverage as alpha', () => {
    const bitmap = colorize(new Uint8Array([0, 128, 255, 7]), 2, 2, 0x0A0B0C);
    expect(bitmap.width).toBe(2);
    expect(bitmap.height).toBe(2);
    expect([...bitmap.data.slice(0, 8)]).toEqual([10, 11, 12, 0, 10, 11, 12, 128]);
    expect(alphaAt(bitmap, 0, 1)).toBe(255);
    expect(alphaAt(bitmap, 1, 1)).toBe(7);
    expect(alphaAt(bitmap, 2, 0)).toBe(0);
  });
});
