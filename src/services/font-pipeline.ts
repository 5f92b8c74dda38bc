import * as path from 'path';
import type { GlyphEntry } from '../types/font';
import { EMPTY_PATH, type RawPath } from '../types/glyph';
import type { CharacterSelection, CharacterSpec, GrayImage, GridLayout } from '../types/layout';
import { LayoutError } from '../utils/errors';
import { logger } from '../utils/logger';
import { mapWithConcurrency } from '../utils/worker-pool';
import type { FontgenConfig } from './config-loader';
import { createJobWorkspace, fontFileName, removeJobWorkspace, writeCellArtifacts, type JobWorkspace } from './file-handler';
import { assembleFont, buildFontDocument } from './font-assembler';
import { OpenTypeCompiler, type FontCompiler } from './font-compiler';
import { normalizeGlyph } from './glyph-normalizer';
import { buildCharacterSpecs, resolveLayout, scaleLayout, selectCharacters, validateLayout } from './layout-model';
import { calculateMetrics, spaceAdvance } from './metrics-calculator';
import { extractCell, inferPixelScale, loadGrayImage, validateImageForLayout, type ExtractionOptions } from './region-extractor';
import { ImageTracerEngine, type TracingEngine } from './tracing-engine';
import { vectorizeCell } from './vectorization-adapter';

export interface TemplatePlan {
  specs: CharacterSpec[];
  layout: GridLayout;
}

/**
 * Character set and validated grid for a selection. Template rendering and
 * font generation both start here, so their geometry always agrees.
 */
export function planTemplate(config: FontgenConfig, selection?: CharacterSelection): TemplatePlan {
  const specs = selectCharacters(buildCharacterSpecs(config.characterSets), selection);
  if (specs.length === 0) {
    throw new LayoutError('No characters selected');
  }
  const layout = resolveLayout(config.layout, specs.length);
  validateLayout(layout, specs, config.extraction.safetyMargin);
  return { specs, layout };
}

export interface GenerateFontOptions {
  /** Path of the filled-in template, or an already decoded image. */
  image: string | GrayImage;
  fontName: string;
  outputDir: string;
  config: FontgenConfig;
  selection?: CharacterSelection;
  engine?: TracingEngine;
  compiler?: FontCompiler;
  signal?: AbortSignal;
  /** Keep per-cell bitmaps and outlines in a job directory under `workRoot`. */
  keepIntermediates?: boolean;
  workRoot?: string;
  onProgress?: (completed: number, total: number) => void;
}

export interface GenerateFontResult {
  fontPath: string;
  byteLength: number;
  pixelsPerUnit: number;
  glyphs: GlyphEntry[];
  emptyCharacters: string[];
  tracingFailures: Array<{ character: string; message: string }>;
  workDir?: string;
}

interface CellResult {
  entry: GlyphEntry;
  empty: boolean;
  failure?: string;
}

export async function generateFontFromTemplate(options: GenerateFontOptions): Promise<GenerateFontResult> {
  const startTime = Date.now();
  const { config } = options;
  const { specs, layout } = planTemplate(config, options.selection);

  const image = typeof options.image === 'string' ? await loadGrayImage(options.image) : options.image;
  const pixelsPerUnit = inferPixelScale(image, layout);
  const pixelLayout = scaleLayout(layout, pixelsPerUnit);
  validateImageForLayout(image, pixelLayout);

  const extraction: ExtractionOptions = {
    threshold: config.extraction.threshold,
    safetyMargin: config.extraction.safetyMargin * pixelsPerUnit,
    minInkPixels: config.extraction.minInkPixels * pixelsPerUnit * pixelsPerUnit,
  };
  const engine = options.engine ?? new ImageTracerEngine(config.tracing);
  const compiler = options.compiler ?? new OpenTypeCompiler();
  const workspace: JobWorkspace | undefined = options.keepIntermediates ? await createJobWorkspace(options.workRoot) : undefined;

  logger.info('pipeline', 'generating font', {
    fontName: options.fontName,
    characters: specs.length,
    pixelsPerUnit,
    engine: engine.name,
    workDir: workspace?.dir,
  });

  try {
    return await runJob(options, { specs, image, pixelLayout, pixelsPerUnit, extraction, engine, compiler, workspace }, startTime);
  } catch (error) {
    if (workspace) {
      await removeJobWorkspace(workspace);
    }
    throw error;
  }
}

interface JobContext {
  specs: CharacterSpec[];
  image: GrayImage;
  pixelLayout: GridLayout;
  pixelsPerUnit: number;
  extraction: ExtractionOptions;
  engine: TracingEngine;
  compiler: FontCompiler;
  workspace?: JobWorkspace;
}

async function runJob(options: GenerateFontOptions, job: JobContext, startTime: number): Promise<GenerateFontResult> {
  const { config } = options;
  const { specs, image, pixelLayout, pixelsPerUnit, extraction, engine, compiler, workspace } = job;
  const normalizeOptions = { unitsPerEm: config.font.unitsPerEm, centerLine: config.font.centerLine, pixelsPerUnit };

  const cells = await mapWithConcurrency(
    specs,
    async (spec): Promise<CellResult> => {
      const extracted = extractCell(image, spec, pixelLayout, extraction);

      let rawPath: RawPath = EMPTY_PATH;
      let failure: string | undefined;
      if (extracted.kind === 'ink') {
        const vectorized = await vectorizeCell(extracted.cell, spec, engine);
        rawPath = vectorized.path;
        failure = vectorized.failure?.message;
        if (workspace) {
          await writeCellArtifacts(workspace, spec, extracted.cell, vectorized.failure ? undefined : rawPath);
        }
      }

      const outline = normalizeGlyph(rawPath, spec, config.scale, normalizeOptions);
      const metrics = calculateMetrics(outline, spec, config.spacing, config.font.unitsPerEm);
      return { entry: { spec, outline, metrics }, empty: extracted.kind === 'empty', failure };
    },
    { concurrency: config.concurrency, signal: options.signal, onProgress: options.onProgress }
  );

  options.signal?.throwIfAborted();

  const document = buildFontDocument(
    options.fontName,
    config.font,
    spaceAdvance(config.spacing, config.font.unitsPerEm),
    cells.map((cell) => cell.entry)
  );
  const fontPath = path.join(options.outputDir, fontFileName(options.fontName, compiler.extension));
  const assembled = await assembleFont(document, specs, fontPath, compiler);

  const emptyCharacters = cells.filter((cell) => cell.empty).map((cell) => cell.entry.spec.char);
  const tracingFailures = cells.flatMap((cell) => (cell.failure ? [{ character: cell.entry.spec.char, message: cell.failure }] : []));

  logger.timed('info', 'pipeline', 'font generated', startTime, {
    fontPath: assembled.fontPath,
    empty: emptyCharacters.length,
    tracingFailures: tracingFailures.length,
  });

  return {
    fontPath: assembled.fontPath,
    byteLength: assembled.byteLength,
    pixelsPerUnit,
    glyphs: document.glyphs,
    emptyCharacters,
    tracingFailures,
    workDir: workspace?.dir,
  };
}
