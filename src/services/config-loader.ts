import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { logger } from '../utils/logger';
import { LABEL_LUMINANCE } from './template-renderer';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/default-config.json', import.meta.url));

function perClass<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ upper: schema, lower: schema, digit: schema, symbol: schema });
}

const classScaleSchema = z.object({
  scaleFactor: z.number().positive(),
  verticalOffset: z.number(),
});

const classSpacingSchema = z.object({
  leftBearing: z.number().int().nonnegative(),
  rightBearing: z.number().int().nonnegative(),
  minAdvance: z.number().int().nonnegative(),
});

const characterOverridesSchema = z.record(z.string().length(1), classScaleSchema.partial());

export const fontgenConfigSchema = z.object({
  characterSets: perClass(z.string().regex(/^\S*$/, { message: 'must not contain whitespace; the space glyph is always included' })),
  layout: z.object({
    rows: z.number().int().positive().optional(),
    columns: z.number().int().positive(),
    cellWidth: z.number().int().positive(),
    cellHeight: z.number().int().positive(),
    margin: z.number().int().nonnegative(),
    borderThickness: z.number().int().nonnegative(),
  }),
  extraction: z.object({
    threshold: z
      .number()
      .int()
      .min(1)
      .max(LABEL_LUMINANCE - 1, { message: `threshold must stay below the template label luminance (${LABEL_LUMINANCE})` }),
    safetyMargin: z.number().int().nonnegative(),
    minInkPixels: z.number().int().nonnegative(),
  }),
  tracing: z.object({
    ltres: z.number().positive(),
    qtres: z.number().positive(),
    pathomit: z.number().int().nonnegative(),
  }),
  font: z.object({
    unitsPerEm: z.number().int().min(16).max(16384),
    ascender: z.number().int(),
    descender: z.number().int().max(0),
    styleName: z.string().min(1),
    centerLine: z.number(),
  }),
  scale: z.object({
    classes: perClass(classScaleSchema),
    characters: characterOverridesSchema,
  }),
  spacing: z.object({
    classes: perClass(classSpacingSchema),
    characters: z.record(z.string().length(1), classSpacingSchema.partial()),
    spaceWidth: z.number().int().nonnegative(),
  }),
  concurrency: z.number().int().min(1).max(64),
});

export type FontgenConfig = z.infer<typeof fontgenConfigSchema>;
export type GridConfig = FontgenConfig['layout'];
export type ExtractionConfig = FontgenConfig['extraction'];
export type TracingConfig = FontgenConfig['tracing'];

export interface LoadConfigOptions {
  configPath?: string;
  characterOverridesPath?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merges `overlay` into `base`. Objects merge key by key, anything else in the
 * overlay replaces the base value.
 */
export function mergeConfig(base: unknown, overlay: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(overlay)) {
    return overlay === undefined ? base : overlay;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    result[key] = mergeConfig(base[key], value);
  }
  return result;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  if (!(await fs.pathExists(filePath))) {
    throw new ConfigError('Configuration file not found', { path: filePath });
  }
  try {
    const content: unknown = await fs.readJson(filePath);
    return content;
  } catch (error) {
    throw new ConfigError(`Error parsing configuration: ${error}`, { path: filePath }, error);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseConfig(raw: unknown, source = 'configuration'): FontgenConfig {
  const result = fontgenConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, { path: source });
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<FontgenConfig> {
  let raw = await readJsonFile(DEFAULT_CONFIG_PATH);

  if (options.configPath) {
    raw = mergeConfig(raw, await readJsonFile(options.configPath));
  }

  if (options.characterOverridesPath) {
    const overrides = characterOverridesSchema.safeParse(await readJsonFile(options.characterOverridesPath));
    if (!overrides.success) {
      throw new ConfigError(`Invalid character overrides: ${formatIssues(overrides.error)}`, { path: options.characterOverridesPath });
    }
    raw = mergeConfig(raw, { scale: { characters: overrides.data } });
    logger.info('config', 'character overrides applied', { characters: Object.keys(overrides.data) });
  }

  return parseConfig(raw, options.configPath ?? DEFAULT_CONFIG_PATH);
}
