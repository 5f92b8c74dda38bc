import ImageTracer from 'imagetracerjs';
import type { TracePath, TraceOptions } from 'imagetracerjs';
import type { Contour, RawPath, Segment } from '../types/glyph';
import type { CellImage } from '../types/layout';
import type { TracingConfig } from './config-loader';

/**
 * Turns one binarized cell into vector contours in the cell's pixel space.
 * Implementations may reject or return no contours; the vectorization adapter
 * deals with both.
 */
export interface TracingEngine {
  readonly name: string;
  trace(cell: CellImage): Promise<RawPath>;
}

const INK_INDEX = 0;
const PALETTE = [
  { r: 0, g: 0, b: 0, a: 255 },
  { r: 255, g: 255, b: 255, a: 255 },
];

function toRGBA(cell: CellImage): Uint8ClampedArray {
  const data = new Uint8ClampedArray(cell.width * cell.height * 4);
  for (let i = 0; i < cell.ink.length; i++) {
    const value = cell.ink[i] === 1 ? 0 : 255;
    data[i * 4] = value;
    data[i * 4 + 1] = value;
    data[i * 4 + 2] = value;
    data[i * 4 + 3] = 255;
  }
  return data;
}

function toContour(path: TracePath): Contour | null {
  const [first] = path.segments;
  if (!first) return null;

  const segments: Segment[] = path.segments.map((segment): Segment => {
    if (segment.type === 'Q' && segment.x3 !== undefined && segment.y3 !== undefined) {
      return { type: 'quad', control: { x: segment.x2, y: segment.y2 }, to: { x: segment.x3, y: segment.y3 } };
    }
    return { type: 'line', to: { x: segment.x2, y: segment.y2 } };
  });

  return { start: { x: first.x1, y: first.y1 }, segments };
}

/**
 * Tracing engine backed by imagetracerjs, run in process on the cell mask.
 */
export class ImageTracerEngine implements TracingEngine {
  readonly name = 'imagetracerjs';

  constructor(private readonly config: TracingConfig) {}

  async trace(cell: CellImage): Promise<RawPath> {
    // The fixed two-color palette and a single quantization cycle keep the layers
    // exactly ink and background; imagetracerjs fills the remaining options in place.
    const options: TraceOptions = {
      ltres: this.config.ltres,
      qtres: this.config.qtres,
      pathomit: this.config.pathomit,
      rightangleenhance: true,
      colorquantcycles: 1,
      numberofcolors: PALETTE.length,
      blurradius: 0,
      layering: 0,
      pal: PALETTE.map((color) => ({ ...color })),
    };

    const traced = ImageTracer.imagedataToTracedata({ width: cell.width, height: cell.height, data: toRGBA(cell) }, options);
    const layer = traced.layers[INK_INDEX] ?? [];

    const contours: Contour[] = [];
    for (const path of layer) {
      const contour = toContour(path);
      if (contour) contours.push(contour);
    }
    return { contours };
  }
}
