import type { Bounds, Contour, GlyphOutline, Point, RawPath } from '../types/glyph';
import type { ClassScale, ScaleConfig } from '../types/font';
import type { CharacterSpec } from '../types/layout';
import { contoursBounds, mapContour } from '../utils/geometry';

/** Em size the scale, offset and spacing tables are written for. */
export const REFERENCE_EM = 1000;

export interface NormalizeOptions {
  unitsPerEm: number;
  /** Design-space x the glyph's horizontal center is placed on. */
  centerLine: number;
  /** Image pixels per template unit. */
  pixelsPerUnit: number;
}

export function resolveScale(spec: CharacterSpec, scale: ScaleConfig): ClassScale {
  const base = scale.classes[spec.charClass];
  const override = scale.characters[spec.char];
  return {
    scaleFactor: override?.scaleFactor ?? base.scaleFactor,
    verticalOffset: override?.verticalOffset ?? base.verticalOffset,
  };
}

/**
 * Mirrors contours about `y = axis`: y-down image space becomes y-up font space.
 * The point order is kept, so every contour's orientation flips with it.
 */
export function flipVertical(contours: Contour[], axis = 0): Contour[] {
  return contours.map((contour) => mapContour(contour, (point) => ({ x: point.x, y: 2 * axis - point.y })));
}

function roundCoordinate(value: number): number {
  // Math.round(-0.4) is -0
  return Math.round(value) || 0;
}

function roundPoint(point: Point): Point {
  return { x: roundCoordinate(point.x), y: roundCoordinate(point.y) };
}

/**
 * Maps a traced cell outline into design units: uniform class scale, horizontal
 * center on the center line, bottom of the ink on the class's vertical offset,
 * y flipped to point up, integer coordinates.
 */
export function normalizeGlyph(rawPath: RawPath, spec: CharacterSpec, scaleConfig: ScaleConfig, options: NormalizeOptions): GlyphOutline {
  const pixelBounds = contoursBounds(rawPath.contours);
  if (!pixelBounds) {
    return { codepoint: spec.codepoint, contours: [], bounds: null };
  }

  const { scaleFactor, verticalOffset } = resolveScale(spec, scaleConfig);
  const emRatio = options.unitsPerEm / REFERENCE_EM;
  const scale = (scaleFactor * emRatio) / options.pixelsPerUnit;
  const baselineShift = verticalOffset * emRatio;
  const centerX = (pixelBounds.xMin + pixelBounds.xMax) / 2;

  // Scale about the box's bottom center, then flip so the bottom edge lands on y = 0.
  const scaled = rawPath.contours.map((contour) =>
    mapContour(contour, (point) => ({
      x: (point.x - centerX) * scale,
      y: (point.y - pixelBounds.yMax) * scale,
    }))
  );

  const contours = flipVertical(scaled).map((contour) =>
    mapContour(contour, (point) => roundPoint({ x: point.x + options.centerLine, y: point.y + baselineShift }))
  );

  return { codepoint: spec.codepoint, contours, bounds: contoursBounds(contours) };
}

export function outlineWidth(bounds: Bounds | null): number {
  return bounds ? bounds.xMax - bounds.xMin : 0;
}
