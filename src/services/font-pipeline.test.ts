import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { GrayImage } from '../types/layout';
import { ExtractionError, LayoutError } from '../utils/errors';
import { BoundingBoxEngine, blankImage, fillRect } from '../testing/fixtures';
import { loadConfig, type FontgenConfig } from './config-loader';
import { generateFontFromTemplate, planTemplate } from './font-pipeline';
import { inspectFont } from './glyph-extractor';
import type { TracingEngine } from './tracing-engine';

const engine = new BoundingBoxEngine();

/** 10x10 grid of 200px cells, 20px margin, 4px borders. */
function scenarioConfig(base: FontgenConfig): FontgenConfig {
  return {
    ...base,
    layout: { rows: 10, columns: 10, cellWidth: 200, cellHeight: 200, margin: 20, borderThickness: 4 },
    scale: {
      ...base.scale,
      classes: { ...base.scale.classes, upper: { scaleFactor: 4, verticalOffset: 0 } },
    },
  };
}

/** Template for "AB" with a 150px square drawn in A's cell and B left blank. */
function filledTemplate(factor = 1): GrayImage {
  const image = blankImage(2040 * factor, 2040 * factor);
  for (const x of [20, 220]) {
    fillRect(image, x * factor, 20 * factor, 200 * factor, 4 * factor, 30);
    fillRect(image, x * factor, 20 * factor, 4 * factor, 200 * factor, 30);
  }
  fillRect(image, 45 * factor, 45 * factor, 150 * factor, 150 * factor, 0);
  return image;
}

describe('font-pipeline', () => {
  let config: FontgenConfig;
  let dir: string;

  beforeAll(async () => {
    config = scenarioConfig(await loadConfig());
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'font-pipeline-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('planTemplate', () => {
    it('lays out the whole default character set', async () => {
      const defaults = await loadConfig();
      const plan = planTemplate(defaults);
      expect(plan.specs).toHaveLength(94);
      expect(plan.layout.rows).toBe(8);
    });

    it('rejects an empty selection', () => {
      expect(() => planTemplate({ ...config, characterSets: { upper: '', lower: '', digit: '', symbol: '' } })).toThrow(LayoutError);
    });
  });

  describe('generateFontFromTemplate', () => {
    it('turns a drawn square into a glyph of the scaled width', async () => {
      const result = await generateFontFromTemplate({
        image: filledTemplate(),
        fontName: 'Test Hand',
        outputDir: dir,
        config,
        selection: { characters: 'AB' },
        engine,
      });

      expect(result.fontPath).toBe(path.join(dir, 'Test-Hand.otf'));
      expect(result.pixelsPerUnit).toBe(1);
      expect(result.emptyCharacters).toEqual(['B']);
      expect(result.tracingFailures).toEqual([]);
      expect(result.workDir).toBeUndefined();

      const [a, b] = result.glyphs;
      expect(a.outline.bounds).toEqual({ xMin: -50, yMin: 0, xMax: 550, yMax: 600 });
      expect(a.metrics).toEqual({ advanceWidth: 680, leftBearing: 40, rightBearing: 40, inkWidth: 600 });
      expect(b.outline.contours).toEqual([]);
      expect(b.metrics.advanceWidth).toBe(500);

      const metadata = await inspectFont(result.fontPath);
      expect(metadata.fontFamily).toBe('Test Hand');
      expect(metadata.glyphs.map((glyph) => [glyph.unicodeChar, glyph.advanceWidth])).toEqual([
        [' ', 250],
        ['A', 680],
        ['B', 500],
      ]);
    });

    it('reads templates rasterized at twice the size', async () => {
      const result = await generateFontFromTemplate({
        image: filledTemplate(2),
        fontName: 'Test Hand',
        outputDir: dir,
        config,
        selection: { characters: 'AB' },
        engine,
      });

      expect(result.pixelsPerUnit).toBe(2);
      expect(result.glyphs[0].metrics.inkWidth).toBe(600);
    });

    it('keeps going when a cell fails to trace', async () => {
      const broken: TracingEngine = {
        name: 'broken',
        trace: async () => {
          throw new Error('tracer crashed');
        },
      };

      const result = await generateFontFromTemplate({
        image: filledTemplate(),
        fontName: 'Test Hand',
        outputDir: dir,
        config,
        selection: { characters: 'AB' },
        engine: broken,
      });

      expect(result.tracingFailures).toEqual([{ character: 'A', message: 'broken failed: tracer crashed' }]);
      expect(result.glyphs[0].metrics.advanceWidth).toBe(500);
      expect(await fs.pathExists(result.fontPath)).toBe(true);
    });

    it('raises ExtractionError for an undersized image and writes nothing', async () => {
      await expect(
        generateFontFromTemplate({
          image: blankImage(1000, 1000),
          fontName: 'Test Hand',
          outputDir: dir,
          config,
          selection: { characters: 'AB' },
          engine,
        })
      ).rejects.toBeInstanceOf(ExtractionError);
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('refuses a template rasterized at a fractional scale', async () => {
      const image = blankImage(3060, 3060);
      fillRect(image, 330, 60, 225, 225, 0);

      await expect(
        generateFontFromTemplate({
          image,
          fontName: 'Test Hand',
          outputDir: dir,
          config,
          selection: { characters: 'AB' },
          engine,
        })
      ).rejects.toThrow(/does not match a 10x10 grid/);
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('removes the job directory of a failed job', async () => {
      const workRoot = path.join(dir, 'work');
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));

      await expect(
        generateFontFromTemplate({
          image: filledTemplate(),
          fontName: 'Test Hand',
          outputDir: path.join(dir, 'fonts'),
          config,
          selection: { characters: 'AB' },
          engine,
          signal: controller.signal,
          keepIntermediates: true,
          workRoot,
        })
      ).rejects.toThrow('cancelled');
      expect(await fs.readdir(workRoot)).toEqual([]);
      expect(await fs.pathExists(path.join(dir, 'fonts'))).toBe(false);
    });

    it('writes no font once cancelled', async () => {
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));

      await expect(
        generateFontFromTemplate({
          image: filledTemplate(),
          fontName: 'Test Hand',
          outputDir: dir,
          config,
          selection: { characters: 'AB' },
          engine,
          signal: controller.signal,
        })
      ).rejects.toThrow('cancelled');
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('keeps per-cell artifacts in a directory of its own', async () => {
      const workRoot = path.join(dir, 'work');
      const options = {
        image: filledTemplate(),
        fontName: 'Test Hand',
        outputDir: path.join(dir, 'fonts'),
        config,
        selection: { characters: 'AB' },
        engine,
        keepIntermediates: true,
        workRoot,
      };

      const first = await generateFontFromTemplate(options);
      const second = await generateFontFromTemplate(options);

      expect(first.workDir).toBeDefined();
      expect(first.workDir).not.toBe(second.workDir);
      expect(path.dirname(first.workDir ?? '')).toBe(workRoot);

      const cells = await fs.readdir(path.join(first.workDir ?? '', 'cells'));
      expect(cells.sort()).toEqual(['0041.png', '0041.svg']);
    });
  });
});
