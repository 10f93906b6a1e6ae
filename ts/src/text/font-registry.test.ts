import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FontRegistry } from './font-registry';
import { buildTestFontBytes } from './test-fonts';

describe('FontRegistry', () => {
  const bytes = buildTestFontBytes();
  let dir = '';

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'glyph-blit-'));
    writeFileSync(join(dir, 'test.otf'), new Uint8Array(bytes));
    writeFileSync(join(dir, 'broken.otf'), 'not a font');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('registers fonts by name', async () => {
    const registry = new FontRegistry();
    const renderer = await registry.register('ui', bytes, { size: 12 });
    expect(registry.has('ui')).toBe(true);
    expect(registry.get('ui')).toBe(renderer);
    expect(renderer.defaults.size).toBe(12);
    expect(registry.list()).toEqual(['ui']);
  });

  it('rejects duplicate names', async () => {
    const registry = new FontRegistry();
    await registry.register('ui', bytes);
    await expect(registry.register('ui', bytes)).rejects.toThrow("Font 'ui' is already registered");
    await expect(registry.load('ui', join(dir, 'test.otf'))).rejects.toThrow("Font 'ui' is already registered");
  });

  it('accepts only one of two concurrent registrations under one name', async () => {
    const registry = new FontRegistry();
    const results = await Promise.allSettled([registry.register('ui', bytes), registry.register('ui', bytes)]);
    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    expect(registry.list()).toEqual(['ui']);
  });

  it('throws for unknown names', () => {
    expect(() => new FontRegistry().get('nope')).toThrow("Font 'nope' is not registered");
  });

  it('loads a font file from disk', async () => {
    const registry = new FontRegistry();
    const renderer = await registry.load('disk', join(dir, 'test.otf'), { sizeMode: 'upem' });
    expect(renderer.font.rawAdvance(65)).toBe(600);
    expect(registry.list()).toEqual(['disk']);
  });

  it('does not register a malformed file', async () => {
    const registry = new FontRegistry();
    await expect(registry.load('bad', join(dir, 'broken.otf'))).rejects.toThrow(/^Invalid font: /);
    expect(registry.has('bad')).toBe(false);
  });

  it('propagates missing-file errors', async () => {
    const registry = new FontRegistry();
    await expect(registry.load('gone', join(dir, 'missing.otf'))).rejects.toThrow(/ENOENT/);
  });

  it('unregister removes a font and is a no-op for unknown names', async () => {
    const registry = new FontRegistry();
    await registry.register('a', bytes);
    await registry.register('b', bytes);
    registry.unregister('a');
    registry.unregister('zzz');
    expect(registry.list()).toEqual(['b']);
  });

  it('destroy empties the registry', async () => {
    const registry = new FontRegistry();
    await registry.register('a', bytes);
    registry.destroy();
    expect(registry.list()).toEqual([]);
  });
});
