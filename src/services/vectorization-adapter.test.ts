import { describe, it, expect, beforeEach } from 'vitest';
import type { Contour, RawPath } from '../types/glyph';
import { TracingFailure } from '../utils/errors';
import { signedArea } from '../utils/geometry';
import { PipelineLogger } from '../utils/logger';
import { blankCell, specFor, squareContour } from '../testing/fixtures';
import type { TracingEngine } from './tracing-engine';
import { OUTER_AREA_SIGN, cleanRawPath, normalizeWinding, stripDegenerateContours, vectorizeCell } from './vectorization-adapter';

function fixedEngine(result: RawPath): TracingEngine {
  return { name: 'fixed', trace: async () => result };
}

const failingEngine: TracingEngine = {
  name: 'broken',
  trace: async () => {
    throw new Error('segfault in tracer');
  },
};

const flatLine: Contour = {
  start: { x: 0, y: 0 },
  segments: [
    { type: 'line', to: { x: 5, y: 0 } },
    { type: 'line', to: { x: 10, y: 0 } },
  ],
};

describe('vectorization-adapter', () => {
  let log: PipelineLogger;

  beforeEach(() => {
    log = new PipelineLogger('silent');
  });

  describe('normalizeWinding', () => {
    it('orients outer contours and holes oppositely', () => {
      // Both traced in the same direction
      const [outer, hole] = normalizeWinding([squareContour(0, 0, 10), squareContour(3, 3, 4)]);
      expect(Math.sign(signedArea(outer))).toBe(OUTER_AREA_SIGN);
      expect(Math.sign(signedArea(hole))).toBe(-OUTER_AREA_SIGN);
    });

    it('treats an island inside a hole as filled', () => {
      const [outer, hole, island] = normalizeWinding([squareContour(0, 0, 30), squareContour(5, 5, 20), squareContour(10, 10, 10)]);
      expect(Math.sign(signedArea(outer))).toBe(OUTER_AREA_SIGN);
      expect(Math.sign(signedArea(hole))).toBe(-OUTER_AREA_SIGN);
      expect(Math.sign(signedArea(island))).toBe(OUTER_AREA_SIGN);
    });

    it('orients separate shapes as outer contours', () => {
      const shapes = normalizeWinding([squareContour(0, 0, 4), squareContour(10, 0, 4)]);
      expect(shapes.map((contour) => Math.sign(signedArea(contour)))).toEqual([OUTER_AREA_SIGN, OUTER_AREA_SIGN]);
    });

    it('leaves correctly oriented contours untouched', () => {
      const [outer] = normalizeWinding([squareContour(0, 0, 10)]);
      expect(normalizeWinding([outer])).toEqual([outer]);
    });
  });

  describe('stripDegenerateContours', () => {
    it('drops contours without area', () => {
      const twoPoints: Contour = { start: { x: 0, y: 0 }, segments: [{ type: 'line', to: { x: 3, y: 3 } }] };
      expect(stripDegenerateContours([flatLine, twoPoints, squareContour(0, 0, 2)])).toEqual([squareContour(0, 0, 2)]);
    });

    it('drops an explicit closing segment', () => {
      const closed = squareContour(0, 0, 2);
      closed.segments.push({ type: 'line', to: { x: 0, y: 0 } });
      expect(stripDegenerateContours([closed])).toEqual([squareContour(0, 0, 2)]);
    });
  });

  describe('cleanRawPath', () => {
    it('returns the shared empty path when nothing survives', () => {
      expect(cleanRawPath({ contours: [flatLine] })).toEqual({ contours: [] });
    });
  });

  describe('vectorizeCell', () => {
    const spec = specFor('A');

    it('returns cleaned contours from the engine', async () => {
      const result = await vectorizeCell(blankCell(), spec, fixedEngine({ contours: [squareContour(1, 1, 6)] }), log);
      expect(result.failure).toBeUndefined();
      expect(result.path.contours).toHaveLength(1);
      expect(signedArea(result.path.contours[0])).toBe(-36);
    });

    it('turns an engine error into an empty glyph and a warning', async () => {
      const result = await vectorizeCell(blankCell(), spec, failingEngine, log);

      expect(result.path.contours).toEqual([]);
      expect(result.failure).toBeInstanceOf(TracingFailure);
      expect(result.failure?.message).toBe('broken failed: segfault in tracer');
      expect(result.failure?.context).toEqual({ character: 'A', codepoint: 65, cellIndex: 0 });

      const warnings = log.getEntries().filter((entry) => entry.level === 'warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].scope).toBe('vectorize');
      expect(warnings[0].character).toBe('A');
    });

    it('reports an engine that finds no usable contours', async () => {
      const result = await vectorizeCell(blankCell(), spec, fixedEngine({ contours: [flatLine] }), log);
      expect(result.path.contours).toEqual([]);
      expect(result.failure?.message).toBe('fixed produced no usable contours');
      expect(log.getEntries().filter((entry) => entry.level === 'warn')).toHaveLength(1);
    });
  });
});
