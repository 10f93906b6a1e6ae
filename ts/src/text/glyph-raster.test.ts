import { describe, it, expect } from 'vitest';
import { coverageFromRaster } from './glyph-raster';

describe('coverageFromRaster', () => {
  it('packs rows read through the pitch', () => {
    // 2x2 gray bitmap with 4-byte row stride; bytes past the width are padding.
    const mask = coverageFromRaster({
      bitmap: { width: 2, rows: 2, pitch: 4, buffer: new Uint8Array([10, 20, 99, 99, 30, 40, 99, 99]) },
      bearingX: 1,
      bearingY: 5,
    });
    expect(mask).not.toBeNull();
    if (!mask) return;
    expect([...mask.coverage]).toEqual([10, 20, 30, 40]);
    expect(mask.width).toBe(2);
    expect(mask.height).toBe(2);
  });

  it('places the mask from the bearings', () => {
    const mask = coverageFromRaster({
      bitmap: { width: 1, rows: 3, pitch: 1, buffer: new Uint8Array([255, 255, 255]) },
      bearingX: -2,
      bearingY: 7,
    });
    expect(mask?.left).toBe(-2);
    expect(mask?.top).toBe(-7);
  });

  it('returns null for an empty bitmap', () => {
    expect(coverageFromRaster({
      bitmap: { width: 0, rows: 0, pitch: 0, buffer: new Uint8Array(0) },
      bearingX: 0,
      bearingY: 0,
    })).toBeNull();
  });

  it('returns null when no pixel has coverage', () => {
    expect(coverageFromRaster({
      bitmap: { width: 2, rows: 1, pitch: 2, buffer: new Uint8Array([0, 0]) },
      bearingX: 0,
      bearingY: 1,
    })).toBeNull();
  });
});
