import type { CharacterClass, CharacterSpec } from './layout';
import type { GlyphMetrics, GlyphOutline } from './glyph';

export interface FontSettings {
  unitsPerEm: number;
  ascender: number;
  descender: number;
  styleName: string;
}

export interface ClassScale {
  scaleFactor: number;
  verticalOffset: number;
}

export interface ScaleConfig {
  classes: Record<CharacterClass, ClassScale>;
  characters: Record<string, Partial<ClassScale>>;
}

export interface ClassSpacing {
  leftBearing: number;
  rightBearing: number;
  minAdvance: number;
}

export interface SpacingConfig {
  classes: Record<CharacterClass, ClassSpacing>;
  characters: Record<string, Partial<ClassSpacing>>;
  spaceWidth: number;
}

export interface GlyphEntry {
  spec: CharacterSpec;
  outline: GlyphOutline;
  metrics: GlyphMetrics;
}

export interface FontDocument extends FontSettings {
  fontName: string;
  spaceAdvance: number;
  glyphs: GlyphEntry[];
}
