import { describe, it, expect } from 'vitest';
import { assertPixelSize, validateConfig } from './types';
import { WHITE } from './text/color';

describe('validateConfig', () => {
  it('returns defaults for an empty config', () => {
    const cfg = validateConfig();
    expect(cfg.size).toBe(16);
    expect(cfg.color).toBe(WHITE);
    expect(cfg.sizeMode).toBe('height');
    expect(cfg.cacheCapacity).toBe(Infinity);
    expect(cfg.warnOnMissingGlyph).toBe(false);
  });

  it('preserves user overrides', () => {
    const color = { r: 10, g: 20, b: 30 };
    const cfg = validateConfig({
      size: 24,
      color,
      sizeMode: 'upem',
      cacheCapacity: 128,
      warnOnMissingGlyph: true,
    });
    expect(cfg).toEqual({
      size: 24,
      color,
      sizeMode: 'upem',
      cacheCapacity: 128,
      warnOnMissingGlyph: true,
    });
  });

  it('throws on invalid size', () => {
    expect(() => validateConfig({ size: 0 })).toThrow('size must be > 0 (got 0)');
    expect(() => validateConfig({ size: -3 })).toThrow('size must be > 0');
    expect(() => validateConfig({ size: NaN })).toThrow('size must be > 0');
  });

  it('throws on invalid cacheCapacity', () => {
    expect(() => validateConfig({ cacheCapacity: 0 })).toThrow('cacheCapacity must be > 0');
    expect(() => validateConfig({ cacheCapacity: NaN })).toThrow('cacheCapacity');
  });
});

describe('assertPixelSize', () => {
  it('accepts positive sizes', () => {
    expect(() => assertPixelSize(0.5)).not.toThrow();
    expect(() => assertPixelSize(72)).not.toThrow();
  });

  it('rejects infinity', () => {
    expect(() => assertPixelSize(Infinity)).toThrow('size must be > 0 (got Infinity)');
  });
});
