import { describe, it, expect } from 'vitest';
import { asciiDump } from './ascii-dump';
import { colorize } from '../text/bitmap';
import { RgbaSurface } from '../text/surface';
import { TextRenderer } from '../text/text-renderer';
import { mockFont } from '../text/test-fonts';

describe('asciiDump', () => {
  it('maps alpha onto the ramp', () => {
    expect(asciiDump(colorize(new Uint8Array([0, 128, 255]), 3, 1, 0))).toBe(' +@');
  });

  it('dumps a rendered surface row by row', () => {
    const font = mockFont({
      65: { advanceWidth: 3, box: [0, 0, 2, 2] },
    }, { unitsPerEm: 4, ascender: 3, descender: -1 });
    const renderer = TextRenderer.fromParts(font, { size: 4 });
    const surface = new RgbaSurface(6, 3);
    renderer.draw(surface, 'AA', 0, 3);
    expect(asciiDump(surface)).toBe([
      '      ',
      '@@ @@ ',
      '@@ @@ ',
    ].join('\n'));
  });
});
