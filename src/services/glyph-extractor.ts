import fs from 'fs-extra';
import opentype from 'opentype.js';
import type { ExtractedGlyph, FontMetadata } from '../types/glyph';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  // Node buffers can be views into a larger shared pool.
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Reads a compiled font back: family, vertical metrics and every encoded glyph.
 */
export function inspectFontBuffer(bytes: Uint8Array): FontMetadata {
  const font = opentype.parse(toArrayBuffer(bytes));

  const extractedGlyphs: ExtractedGlyph[] = [];

  for (let i = 0; i < font.glyphs.length; i++) {
    const glyph = font.glyphs.get(i);

    if (glyph.unicode !== undefined && glyph.unicode >= 32) {
      const commands = glyph.path ? glyph.path.commands : [];

      extractedGlyphs.push({
        name: glyph.name || `glyph_${glyph.unicode}`,
        unicode: glyph.unicode,
        unicodeChar: String.fromCodePoint(glyph.unicode),
        advanceWidth: glyph.advanceWidth ?? 0,
        contourCount: commands.filter((command) => command.type === 'M').length,
      });
    }
  }

  return {
    fontFamily: font.names.fontFamily?.en || 'Unknown',
    unitsPerEm: font.unitsPerEm,
    ascender: font.ascender,
    descender: font.descender,
    glyphs: extractedGlyphs,
  };
}

export async function inspectFont(fontPath: string): Promise<FontMetadata> {
  try {
    const fontBuffer = await fs.readFile(fontPath);
    return inspectFontBuffer(fontBuffer);
  } catch (error) {
    throw new Error(`Error reading glyphs from ${fontPath}: ${error}`, { cause: error });
  }
}
