import { EMPTY_PATH, type Contour, type RawPath } from '../types/glyph';
import type { CellImage, CharacterSpec } from '../types/layout';
import { TracingFailure, describeError } from '../utils/errors';
import { contourVertices, distinctPointCount, pointInContour, reverseContour, signedArea } from '../utils/geometry';
import { logger as defaultLogger, type PipelineLogger } from '../utils/logger';
import type { TracingEngine } from './tracing-engine';

const MIN_CONTOUR_AREA = 1e-6;

/**
 * Sign of the pixel-space shoelace area of outer contours. The normalizer flips
 * y, which turns these counter-clockwise, the direction PostScript outlines
 * expect for filled regions. Holes take the opposite sign.
 */
export const OUTER_AREA_SIGN = -1;

export interface VectorizationResult {
  path: RawPath;
  failure?: TracingFailure;
}

function samePoint(a: { x: number; y: number }, b: { x: number; y: number }): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Drops a final straight segment that only returns to the start point. */
function dropClosingLine(contour: Contour): Contour {
  const last = contour.segments[contour.segments.length - 1];
  if (contour.segments.length > 1 && last?.type === 'line' && samePoint(last.to, contour.start)) {
    return { start: contour.start, segments: contour.segments.slice(0, -1) };
  }
  return contour;
}

export function stripDegenerateContours(contours: Contour[]): Contour[] {
  return contours
    .map(dropClosingLine)
    .filter((contour) => distinctPointCount(contour) >= 3 && Math.abs(signedArea(contour)) > MIN_CONTOUR_AREA);
}

/**
 * Orients every contour by its nesting depth: even depth is filled, odd depth
 * is a hole. The tracer's own orientation is ignored.
 */
export function normalizeWinding(contours: Contour[]): Contour[] {
  return contours.map((contour, index) => {
    const vertex = contourVertices(contour)[0];
    let depth = 0;
    contours.forEach((other, otherIndex) => {
      if (otherIndex !== index && pointInContour(vertex, other)) depth++;
    });

    const wanted = depth % 2 === 0 ? OUTER_AREA_SIGN : -OUTER_AREA_SIGN;
    return Math.sign(signedArea(contour)) === wanted ? contour : reverseContour(contour);
  });
}

export function cleanRawPath(rawPath: RawPath): RawPath {
  const contours = stripDegenerateContours(rawPath.contours);
  return contours.length === 0 ? EMPTY_PATH : { contours: normalizeWinding(contours) };
}

/**
 * Traces one cell. Engine errors and empty results never propagate: the cell
 * becomes an empty path and the failure is logged and returned.
 */
export async function vectorizeCell(
  cell: CellImage,
  spec: CharacterSpec,
  engine: TracingEngine,
  log: PipelineLogger = defaultLogger
): Promise<VectorizationResult> {
  const context = { character: spec.char, codepoint: spec.codepoint, cellIndex: spec.cellIndex };

  let traced: RawPath;
  try {
    traced = await engine.trace(cell);
  } catch (error) {
    const failure = new TracingFailure(`${engine.name} failed: ${describeError(error)}`, context, error);
    log.warn('vectorize', 'tracing failed, using empty glyph', { ...context, error: failure.message });
    return { path: EMPTY_PATH, failure };
  }

  const cleaned = cleanRawPath(traced);
  if (cleaned.contours.length === 0) {
    const failure = new TracingFailure(`${engine.name} produced no usable contours`, context);
    log.warn('vectorize', 'no contours traced, using empty glyph', context);
    return { path: EMPTY_PATH, failure };
  }

  log.debug('vectorize', 'cell traced', { ...context, contours: cleaned.contours.length });
  return { path: cleaned };
}
