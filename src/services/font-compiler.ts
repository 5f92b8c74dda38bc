import opentype from 'opentype.js';
import type { Glyph, Path } from 'opentype.js';
import type { FontDocument } from '../types/font';
import type { Contour } from '../types/glyph';
import { glyphNameFor } from '../utils/unicode-utils';
import { REFERENCE_EM } from './glyph-normalizer';

/**
 * Serializes a complete FontDocument into font file bytes.
 */
export interface FontCompiler {
  readonly name: string;
  readonly extension: string;
  compile(document: FontDocument): Promise<Uint8Array>;
}

function contoursToPath(contours: Contour[], shiftX: number): Path {
  const path = new opentype.Path();
  for (const contour of contours) {
    path.moveTo(contour.start.x + shiftX, contour.start.y);
    for (const segment of contour.segments) {
      switch (segment.type) {
        case 'line':
          path.lineTo(segment.to.x + shiftX, segment.to.y);
          break;
        case 'quad':
          path.quadraticCurveTo(segment.control.x + shiftX, segment.control.y, segment.to.x + shiftX, segment.to.y);
          break;
        case 'cubic':
          path.bezierCurveTo(
            segment.control1.x + shiftX,
            segment.control1.y,
            segment.control2.x + shiftX,
            segment.control2.y,
            segment.to.x + shiftX,
            segment.to.y
          );
          break;
      }
    }
    path.closePath();
  }
  return path;
}

/** Hollow box shown for characters the font does not have. */
function notdefGlyph(document: FontDocument): Glyph {
  const ratio = document.unitsPerEm / REFERENCE_EM;
  const advanceWidth = Math.round(500 * ratio);
  const margin = Math.round(50 * ratio);
  const stroke = Math.max(20, Math.round(advanceWidth / 25));
  const top = document.ascender;
  const bottom = document.descender;

  const path = new opentype.Path();
  path.moveTo(margin, bottom);
  path.lineTo(advanceWidth - margin, bottom);
  path.lineTo(advanceWidth - margin, top);
  path.lineTo(margin, top);
  path.closePath();

  path.moveTo(margin + stroke, top - stroke);
  path.lineTo(advanceWidth - margin - stroke, top - stroke);
  path.lineTo(advanceWidth - margin - stroke, bottom + stroke);
  path.lineTo(margin + stroke, bottom + stroke);
  path.closePath();

  return new opentype.Glyph({ name: '.notdef', unicode: 0, advanceWidth, path });
}

/**
 * Compiles to OpenType with CFF outlines through opentype.js. Each outline is
 * shifted so its left edge sits on its left side bearing.
 */
export class OpenTypeCompiler implements FontCompiler {
  readonly name = 'opentype.js';
  readonly extension = 'otf';

  async compile(document: FontDocument): Promise<Uint8Array> {
    const glyphs: Glyph[] = [
      notdefGlyph(document),
      new opentype.Glyph({ name: 'space', unicode: 32, advanceWidth: document.spaceAdvance, path: new opentype.Path() }),
    ];

    for (const { spec, outline, metrics } of document.glyphs) {
      const shiftX = outline.bounds ? metrics.leftBearing - outline.bounds.xMin : 0;
      glyphs.push(
        new opentype.Glyph({
          name: glyphNameFor(spec.codepoint),
          unicode: spec.codepoint,
          advanceWidth: metrics.advanceWidth,
          path: contoursToPath(outline.contours, shiftX),
        })
      );
    }

    const font = new opentype.Font({
      familyName: document.fontName,
      styleName: document.styleName,
      unitsPerEm: document.unitsPerEm,
      ascender: document.ascender,
      descender: document.descender,
      glyphs,
    });

    return new Uint8Array(font.toArrayBuffer());
  }
}
