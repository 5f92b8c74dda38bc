import type { Bounds, Contour, Point, Segment } from '../types/glyph';

/** Every point of the contour in drawing order, control points included. */
export function contourPoints(contour: Contour): Point[] {
  const points: Point[] = [contour.start];
  for (const segment of contour.segments) {
    switch (segment.type) {
      case 'line':
        points.push(segment.to);
        break;
      case 'quad':
        points.push(segment.control, segment.to);
        break;
      case 'cubic':
        points.push(segment.control1, segment.control2, segment.to);
        break;
    }
  }
  return points;
}

/** On-curve points only. */
export function contourVertices(contour: Contour): Point[] {
  return [contour.start, ...contour.segments.map((segment) => segment.to)];
}

/**
 * Shoelace area of the control polygon. Positive means counter-clockwise in a
 * y-up system, which is clockwise on screen in a y-down one.
 */
export function signedArea(contour: Contour): number {
  const points = contourPoints(contour);
  let sum = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

export function pointInContour(point: Point, contour: Contour): boolean {
  const polygon = contourPoints(contour);
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if (a.y > point.y !== b.y > point.y && point.x < ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }
  return inside;
}

/**
 * Same outline traversed the other way. Curve controls swap so the shape is unchanged.
 */
export function reverseContour(contour: Contour): Contour {
  const vertices = contourVertices(contour);
  const segments: Segment[] = [];

  // Segment i runs vertices[i] -> vertices[i + 1] (the last one closes back to start).
  for (let i = contour.segments.length - 1; i >= 0; i--) {
    const segment = contour.segments[i];
    const from = vertices[i];
    switch (segment.type) {
      case 'line':
        segments.push({ type: 'line', to: from });
        break;
      case 'quad':
        segments.push({ type: 'quad', control: segment.control, to: from });
        break;
      case 'cubic':
        segments.push({ type: 'cubic', control1: segment.control2, control2: segment.control1, to: from });
        break;
    }
  }

  return { start: vertices[vertices.length - 1], segments };
}

export function mapContour(contour: Contour, transform: (point: Point) => Point): Contour {
  return {
    start: transform(contour.start),
    segments: contour.segments.map((segment): Segment => {
      switch (segment.type) {
        case 'line':
          return { type: 'line', to: transform(segment.to) };
        case 'quad':
          return { type: 'quad', control: transform(segment.control), to: transform(segment.to) };
        case 'cubic':
          return {
            type: 'cubic',
            control1: transform(segment.control1),
            control2: transform(segment.control2),
            to: transform(segment.to),
          };
      }
    }),
  };
}

/**
 * Box around every on-curve and control point, or null when there are none.
 */
export function contoursBounds(contours: Contour[]): Bounds | null {
  let bounds: Bounds | null = null;
  for (const contour of contours) {
    for (const point of contourPoints(contour)) {
      if (!bounds) {
        bounds = { xMin: point.x, yMin: point.y, xMax: point.x, yMax: point.y };
      } else {
        bounds.xMin = Math.min(bounds.xMin, point.x);
        bounds.yMin = Math.min(bounds.yMin, point.y);
        bounds.xMax = Math.max(bounds.xMax, point.x);
        bounds.yMax = Math.max(bounds.yMax, point.y);
      }
    }
  }
  return bounds;
}

export function distinctPointCount(contour: Contour): number {
  return new Set(contourVertices(contour).map((point) => `${point.x},${point.y}`)).size;
}
