import { glob } from 'glob';
import fs from 'fs-extra';
import sharp from 'sharp';
import { randomUUID } from 'crypto';
import * as os from 'os';
import * as path from 'path';
import type { RawPath } from '../types/glyph';
import type { CellImage, CharacterSpec } from '../types/layout';
import { rawPathToSVG } from '../utils/svg-utils';

const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp', 'tif', 'tiff'];

export async function findTemplateImages(directory: string): Promise<string[]> {
  try {
    const pattern = path.join(directory, `**/*.{${IMAGE_EXTENSIONS.join(',')}}`).split(path.sep).join('/');
    const files = await glob(pattern, { nocase: true });
    return files.sort();
  } catch (error) {
    throw new Error(`Error finding template images: ${error}`);
  }
}

/**
 * File name for a font, with anything outside letters, digits, dot, dash and
 * underscore replaced so the name cannot leave the output directory.
 */
export function fontFileName(fontName: string, extension: string): string {
  const base = fontName.trim().replace(/[^\w.-]+/g, '-').replace(/^[.-]+/, '');
  return `${base || 'font'}.${extension}`;
}

export interface JobWorkspace {
  jobId: string;
  dir: string;
  cellsDir: string;
}

/**
 * Creates a directory owned by one generation job. The random job id keeps
 * concurrent jobs apart.
 */
export async function createJobWorkspace(root: string = path.join(os.tmpdir(), 'template-to-font')): Promise<JobWorkspace> {
  const jobId = randomUUID();
  const dir = path.join(root, jobId);
  const cellsDir = path.join(dir, 'cells');
  await fs.ensureDir(cellsDir);
  return { jobId, dir, cellsDir };
}

export async function removeJobWorkspace(workspace: JobWorkspace): Promise<void> {
  await fs.remove(workspace.dir);
}

function cellFileStem(spec: CharacterSpec): string {
  return spec.codepoint.toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Writes a cell's binarized bitmap (PNG) and, when traced, its outline (SVG).
 */
export async function writeCellArtifacts(workspace: JobWorkspace, spec: CharacterSpec, cell: CellImage, rawPath?: RawPath): Promise<string[]> {
  const stem = path.join(workspace.cellsDir, cellFileStem(spec));
  const pixels = Buffer.alloc(cell.width * cell.height);
  for (let i = 0; i < cell.ink.length; i++) {
    pixels[i] = cell.ink[i] === 1 ? 0 : 255;
  }

  const written = [`${stem}.png`];
  await sharp(pixels, { raw: { width: cell.width, height: cell.height, channels: 1 } }).png().toFile(`${stem}.png`);

  if (rawPath) {
    await fs.writeFile(`${stem}.svg`, rawPathToSVG(rawPath, cell.width, cell.height), 'utf8');
    written.push(`${stem}.svg`);
  }
  return written;
}
