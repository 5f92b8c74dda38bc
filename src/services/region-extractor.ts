import sharp from 'sharp';
import fs from 'fs-extra';
import type { CellExtraction, CharacterSpec, GrayImage, GridLayout } from '../types/layout';
import { ExtractionError } from '../utils/errors';
import { cellFor, templateSize } from './layout-model';

export interface ExtractionOptions {
  /** Luminance below this value is ink. One value for the whole image. */
  threshold: number;
  /** Extra pixels trimmed inside the drawn border. */
  safetyMargin: number;
  /** Cells with fewer ink pixels are reported empty. */
  minInkPixels: number;
}

export async function loadGrayImage(imagePath: string): Promise<GrayImage> {
  if (!(await fs.pathExists(imagePath))) {
    throw new ExtractionError('Template image not found', { path: imagePath });
  }

  try {
    const { data, info } = await sharp(imagePath).flatten({ background: '#ffffff' }).greyscale().raw().toBuffer({ resolveWithObject: true });

    const pixels = new Uint8Array(info.width * info.height);
    for (let i = 0; i < pixels.length; i++) {
      pixels[i] = data[i * info.channels];
    }
    return { width: info.width, height: info.height, data: pixels };
  } catch (error) {
    throw new ExtractionError(`Error decoding template image: ${error}`, { path: imagePath }, error);
  }
}

/**
 * Integer factor at which the image is the template, with or without its
 * trailing margin. Falls back to 1 when no factor matches; validation against
 * the scaled layout then reports the mismatch.
 */
export function inferPixelScale(image: GrayImage, layout: GridLayout): number {
  const size = templateSize(layout);
  const neededWidth = layout.margin + layout.columns * layout.cellWidth;
  const neededHeight = layout.margin + layout.rows * layout.cellHeight;

  const largest = Math.floor(Math.min(image.width / neededWidth, image.height / neededHeight));
  for (let factor = largest; factor > 1; factor--) {
    const fitsWidth = image.width >= factor * neededWidth && image.width <= factor * size.width;
    const fitsHeight = image.height >= factor * neededHeight && image.height <= factor * size.height;
    if (fitsWidth && fitsHeight) return factor;
  }
  return 1;
}

/**
 * The image must be the template at the layout's scale, optionally without
 * its trailing margin. Anything larger would shift every crop.
 */
export function validateImageForLayout(image: GrayImage, layout: GridLayout): void {
  const neededWidth = layout.margin + layout.columns * layout.cellWidth;
  const neededHeight = layout.margin + layout.rows * layout.cellHeight;
  const size = templateSize(layout);

  if (image.width < neededWidth || image.height < neededHeight) {
    throw new ExtractionError(
      `Image is ${image.width}x${image.height}px, too small for a ${layout.rows}x${layout.columns} grid of ${layout.cellWidth}x${layout.cellHeight}px cells (needs ${neededWidth}x${neededHeight}px)`
    );
  }
  if (image.width > size.width || image.height > size.height) {
    throw new ExtractionError(
      `Image is ${image.width}x${image.height}px, which does not match a ${layout.rows}x${layout.columns} grid of ${layout.cellWidth}x${layout.cellHeight}px cells (expected ${size.width}x${size.height}px, or without the trailing margin)`
    );
  }
  if (image.data.length !== image.width * image.height) {
    throw new ExtractionError(`Image buffer holds ${image.data.length} pixels, expected ${image.width * image.height}`);
  }
}

/**
 * Crops one cell inside its border and binarizes it. Assumes the image was
 * validated against the layout.
 */
export function extractCell(image: GrayImage, spec: CharacterSpec, layout: GridLayout, options: ExtractionOptions): CellExtraction {
  const rect = cellFor(spec, layout);
  const inset = layout.borderThickness + options.safetyMargin;

  const originX = rect.x + inset;
  const originY = rect.y + inset;
  const width = rect.width - 2 * inset;
  const height = rect.height - 2 * inset;

  const ink = new Uint8Array(width * height);
  let inkPixels = 0;

  for (let y = 0; y < height; y++) {
    const row = (originY + y) * image.width + originX;
    for (let x = 0; x < width; x++) {
      if (image.data[row + x] < options.threshold) {
        ink[y * width + x] = 1;
        inkPixels++;
      }
    }
  }

  if (inkPixels < Math.max(1, options.minInkPixels)) {
    return { kind: 'empty', spec };
  }

  return {
    kind: 'ink',
    spec,
    cell: { width, height, ink, inkPixels, origin: { x: originX, y: originY } },
  };
}

export function extractCells(image: GrayImage, specs: CharacterSpec[], layout: GridLayout, options: ExtractionOptions): CellExtraction[] {
  validateImageForLayout(image, layout);
  return specs.map((spec) => extractCell(image, spec, layout, options));
}
