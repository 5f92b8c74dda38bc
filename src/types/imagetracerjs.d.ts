declare module 'imagetracerjs' {
  export interface RGBAColor {
    r: number;
    g: number;
    b: number;
    a: number;
  }

  export interface TraceSegment {
    type: 'L' | 'Q';
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    x3?: number;
    y3?: number;
  }

  export interface TracePath {
    segments: TraceSegment[];
  }

  export interface TraceData {
    layers: TracePath[][];
  }

  export interface ImageDataLike {
    width: number;
    height: number;
    data: ArrayLike<number>;
  }

  export interface TraceOptions {
    ltres?: number;
    qtres?: number;
    pathomit?: number;
    rightangleenhance?: boolean;
    numberofcolors?: number;
    colorquantcycles?: number;
    layering?: number;
    blurradius?: number;
    pal?: RGBAColor[];
  }

  export interface ImageTracer {
    imagedataToTracedata(imgd: ImageDataLike, options?: TraceOptions): TraceData;
  }

  const tracer: ImageTracer;
  export default tracer;
}
