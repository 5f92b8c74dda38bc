import sharp from 'sharp';
import fs from 'fs-extra';
import * as path from 'path';
import type { CharacterSpec, GridLayout } from '../types/layout';
import { escapeXml } from '../utils/svg-utils';
import { logger } from '../utils/logger';
import { cellFor, templateSize } from './layout-model';

/** Gray level of the corner labels. Binarization thresholds must stay below it. */
export const LABEL_LUMINANCE = 0xbd;

const BORDER_COLOR = '#222222';
const LABEL_COLOR = `#${LABEL_LUMINANCE.toString(16).repeat(3)}`;

export type TemplateFormat = 'svg' | 'png';

export interface TemplateOptions {
  title?: string;
  /** Raster pixels per template unit, PNG only. */
  scale?: number;
}

export function renderTemplateSvg(specs: CharacterSpec[], layout: GridLayout, options: TemplateOptions = {}): string {
  const { width, height } = templateSize(layout);
  const border = layout.borderThickness;
  const labelSize = Math.max(8, Math.round(Math.min(layout.cellWidth, layout.cellHeight) * 0.14));

  const boxes: string[] = [];
  const labels: string[] = [];

  for (const spec of specs) {
    const cell = cellFor(spec, layout);

    // Stroke is centered on the path, so offset by half its width to keep it inside the cell.
    if (border > 0) {
      boxes.push(
        `    <rect x="${cell.x + border / 2}" y="${cell.y + border / 2}" width="${cell.width - border}" height="${cell.height - border}"/>`
      );
    }
    labels.push(`    <text x="${cell.x + border + 3}" y="${cell.y + border + labelSize}">${escapeXml(spec.label)}</text>`);
  }

  const title = escapeXml(options.title ?? 'Font template - draw each character inside its box');

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  <title>${title}</title>
  <rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>
  <g fill="none" stroke="${BORDER_COLOR}" stroke-width="${border}">
${boxes.join('\n')}
  </g>
  <g fill="${LABEL_COLOR}" font-family="Arial, Helvetica, sans-serif" font-size="${labelSize}">
${labels.join('\n')}
  </g>
</svg>
`;
}

export async function renderTemplatePng(specs: CharacterSpec[], layout: GridLayout, options: TemplateOptions = {}): Promise<Buffer> {
  const scale = options.scale ?? 1;
  if (!Number.isInteger(scale) || scale < 1) {
    throw new Error(`Template scale must be a positive integer, got ${scale}`);
  }

  const svg = renderTemplateSvg(specs, layout, options);
  return sharp(Buffer.from(svg), { density: 72 * scale })
    .flatten({ background: '#ffffff' })
    .png()
    .toBuffer();
}

export async function writeTemplate(
  specs: CharacterSpec[],
  layout: GridLayout,
  outputPath: string,
  format: TemplateFormat,
  options: TemplateOptions = {}
): Promise<string> {
  await fs.ensureDir(path.dirname(outputPath));

  if (format === 'svg') {
    await fs.writeFile(outputPath, renderTemplateSvg(specs, layout, options), 'utf8');
  } else {
    await fs.writeFile(outputPath, await renderTemplatePng(specs, layout, options));
  }

  logger.info('template', 'template written', { outputPath, format, characters: specs.length });
  return outputPath;
}
