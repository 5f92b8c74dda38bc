import fs from 'fs-extra';
import { randomUUID } from 'crypto';
import * as path from 'path';
import type { FontDocument, FontSettings, GlyphEntry } from '../types/font';
import type { CharacterSpec } from '../types/layout';
import { AssemblyError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { OpenTypeCompiler, type FontCompiler } from './font-compiler';
import { inspectFontBuffer } from './glyph-extractor';

export interface AssembledFont {
  fontPath: string;
  byteLength: number;
  glyphCount: number;
}

export function buildFontDocument(fontName: string, settings: FontSettings, spaceAdvance: number, glyphs: GlyphEntry[]): FontDocument {
  return {
    fontName,
    styleName: settings.styleName,
    unitsPerEm: settings.unitsPerEm,
    ascender: settings.ascender,
    descender: settings.descender,
    spaceAdvance,
    glyphs: [...glyphs].sort((a, b) => a.spec.cellIndex - b.spec.cellIndex),
  };
}

/**
 * Internal consistency check: one entry per selected character, each with
 * metrics that add up. A failure here means an upstream stage dropped a glyph.
 */
export function assertComplete(document: FontDocument, specs: CharacterSpec[]): void {
  const present = new Set(document.glyphs.map((entry) => entry.spec.codepoint));
  const missing = specs.filter((spec) => !present.has(spec.codepoint));

  if (missing.length > 0) {
    const [first] = missing;
    throw new AssemblyError(`Font document is missing ${missing.length} glyph(s): ${missing.map((spec) => spec.char).join(' ')}`, {
      character: first.char,
      codepoint: first.codepoint,
    });
  }

  if (present.size !== document.glyphs.length) {
    throw new AssemblyError('Font document holds more than one glyph for a character');
  }

  for (const { spec, metrics } of document.glyphs) {
    if (metrics.advanceWidth !== metrics.leftBearing + metrics.inkWidth + metrics.rightBearing) {
      throw new AssemblyError('Advance width does not equal bearings plus ink width', {
        character: spec.char,
        codepoint: spec.codepoint,
      });
    }
  }
}

async function compileAndVerify(document: FontDocument, specs: CharacterSpec[], compiler: FontCompiler): Promise<Uint8Array> {
  let bytes: Uint8Array;
  try {
    bytes = await compiler.compile(document);
  } catch (error) {
    throw new AssemblyError(`${compiler.name} failed: ${describeError(error)}`, {}, error);
  }

  let encoded: Set<number>;
  try {
    encoded = new Set(inspectFontBuffer(bytes).glyphs.map((glyph) => glyph.unicode));
  } catch (error) {
    throw new AssemblyError(`Compiled font cannot be read back: ${describeError(error)}`, {}, error);
  }

  const lost = specs.find((spec) => !encoded.has(spec.codepoint));
  if (lost) {
    throw new AssemblyError('Compiled font does not encode every character', { character: lost.char, codepoint: lost.codepoint });
  }
  return bytes;
}

/**
 * Emits the font at `outputPath`. The bytes go to a uniquely named sibling
 * first and are moved into place only once complete, so the output path holds
 * either the whole font or nothing new.
 */
export async function assembleFont(
  document: FontDocument,
  specs: CharacterSpec[],
  outputPath: string,
  compiler: FontCompiler = new OpenTypeCompiler()
): Promise<AssembledFont> {
  const startTime = Date.now();
  assertComplete(document, specs);

  const bytes = await compileAndVerify(document, specs, compiler);

  const directory = path.dirname(outputPath);
  const partialPath = path.join(directory, `.${path.basename(outputPath)}.${randomUUID()}.partial`);

  try {
    await fs.ensureDir(directory);
    await fs.writeFile(partialPath, bytes);
    await fs.move(partialPath, outputPath, { overwrite: true });
  } catch (error) {
    await fs.remove(partialPath);
    throw new AssemblyError(`Error writing font: ${describeError(error)}`, { path: outputPath }, error);
  }

  logger.timed('info', 'assemble', 'font written', startTime, {
    fontPath: outputPath,
    bytes: bytes.byteLength,
    glyphs: document.glyphs.length,
  });

  return { fontPath: outputPath, byteLength: bytes.byteLength, glyphCount: document.glyphs.length };
}
