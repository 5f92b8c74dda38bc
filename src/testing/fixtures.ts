import type { Contour, RawPath } from '../types/glyph';
import type { CellImage, CharacterClass, CharacterSpec, GrayImage } from '../types/layout';
import type { TracingEngine } from '../services/tracing-engine';

export function specFor(char: string, charClass: CharacterClass = 'upper', cellIndex = 0): CharacterSpec {
  return { codepoint: char.codePointAt(0) ?? 0, char, label: char, charClass, cellIndex };
}

export function blankImage(width: number, height: number, value = 255): GrayImage {
  return { width, height, data: new Uint8Array(width * height).fill(value) };
}

export function fillRect(image: GrayImage, x: number, y: number, width: number, height: number, value = 0): void {
  for (let row = y; row < y + height; row++) {
    image.data.fill(value, row * image.width + x, row * image.width + x + width);
  }
}

/** Axis-aligned square, clockwise on screen (positive area in y-down pixel space). */
export function squareContour(x: number, y: number, size: number): Contour {
  return {
    start: { x, y },
    segments: [
      { type: 'line', to: { x: x + size, y } },
      { type: 'line', to: { x: x + size, y: y + size } },
      { type: 'line', to: { x, y: y + size } },
    ],
  };
}

export function blankCell(width = 10, height = 10): CellImage {
  return { width, height, ink: new Uint8Array(width * height), inkPixels: 0, origin: { x: 0, y: 0 } };
}

/**
 * Deterministic stand-in for a real tracer: one rectangle around the ink
 * pixels, on pixel edges.
 */
export class BoundingBoxEngine implements TracingEngine {
  readonly name = 'bounding-box';

  async trace(cell: CellImage): Promise<RawPath> {
    let xMin = Infinity;
    let yMin = Infinity;
    let xMax = -Infinity;
    let yMax = -Infinity;
    for (let y = 0; y < cell.height; y++) {
      for (let x = 0; x < cell.width; x++) {
        if (cell.ink[y * cell.width + x] === 1) {
          xMin = Math.min(xMin, x);
          yMin = Math.min(yMin, y);
          xMax = Math.max(xMax, x + 1);
          yMax = Math.max(yMax, y + 1);
        }
      }
    }
    if (xMin === Infinity) return { contours: [] };
    return {
      contours: [
        {
          start: { x: xMin, y: yMin },
          segments: [
            { type: 'line', to: { x: xMax, y: yMin } },
            { type: 'line', to: { x: xMax, y: yMax } },
            { type: 'line', to: { x: xMin, y: yMax } },
          ],
        },
      ],
    };
  }
}
