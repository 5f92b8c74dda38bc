export interface Point {
  x: number;
  y: number;
}

export type Segment =
  | { type: 'line'; to: Point }
  | { type: 'quad'; control: Point; to: Point }
  | { type: 'cubic'; control1: Point; control2: Point; to: Point };

/**
 * A closed contour. The last segment implicitly returns to `start`.
 */
export interface Contour {
  start: Point;
  segments: Segment[];
}

export interface Bounds {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

/** Traced outline in cell-local pixel space, y pointing down. */
export interface RawPath {
  contours: Contour[];
}

export const EMPTY_PATH: RawPath = Object.freeze({ contours: [] });

/** Outline in font design units, y pointing up, origin on the baseline. */
export interface GlyphOutline {
  codepoint: number;
  contours: Contour[];
  bounds: Bounds | null;
}

export interface GlyphMetrics {
  advanceWidth: number;
  leftBearing: number;
  rightBearing: number;
  inkWidth: number;
}

export interface ExtractedGlyph {
  name: string;
  unicode: number;
  unicodeChar: string;
  advanceWidth: number;
  contourCount: number;
}

export interface FontMetadata {
  fontFamily: string;
  unitsPerEm: number;
  ascender: number;
  descender: number;
  glyphs: ExtractedGlyph[];
}
