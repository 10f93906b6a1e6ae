import { readFile } from 'node:fs/promises';
import type { TextRendererConfig } from '../types';
import { TextRenderer } from './text-renderer';

/**
 * Named fonts, each with its own TextRenderer.
 *
 * Fonts are registered from bytes or loaded from disk. Names are unique;
 * replacing a font means unregistering it first.
 */
export class FontRegistry {
  private readonly renderers = new Map<string, TextRenderer>();

  /**
   * Register font bytes under `name`.
   * @throws (rejects) On duplicate names, invalid config or malformed font bytes.
   */
  async register(name: string, bytes: ArrayBuffer | Uint8Array, config?: TextRendererConfig): Promise<TextRenderer> {
    this.assertFree(name);
    const renderer = await TextRenderer.fromBytes(bytes, config);
    // Another registration may have claimed the name while the font was parsing.
    this.assertFree(name);
    this.renderers.set(name, renderer);
    return renderer;
  }

  /** Read a font file from disk and register it under `name`. */
  async load(name: string, path: string, config?: TextRendererConfig): Promise<TextRenderer> {
    this.assertFree(name);
    const bytes = await readFile(path);
    return this.register(name, bytes, config);
  }

  /** @throws If no font is registered under `name`. */
  get(name: string): TextRenderer {
    const renderer = this.renderers.get(name);
    if (!renderer) throw new Error(`Font '${name}' is not registered`);
    return renderer;
  }

  has(name: string): boolean {
    return this.renderers.has(name);
  }

  /** Registered names in registration order. */
  list(): string[] {
    return [...this.renderers.keys()];
  }

  /** Remove and tear down a font. No-op if not found. */
  unregister(name: string): void {
    const renderer = this.renderers.get(name);
    if (!renderer) return;
    renderer.destroy();
    this.renderers.delete(name);
  }

  destroy(): void {
    for (const renderer of this.renderers.values()) renderer.destroy();
    this.renderers.clear();
  }

  private assertFree(name: string): void {
    if (this.renderers.has(name)) throw new Error(`Font '${name}' is already registered`);
  }
}
