import type { ClassSpacing, SpacingConfig } from '../types/font';
import type { GlyphMetrics, GlyphOutline } from '../types/glyph';
import type { CharacterSpec } from '../types/layout';
import { REFERENCE_EM, outlineWidth } from './glyph-normalizer';

export function resolveSpacing(spec: CharacterSpec, spacing: SpacingConfig, unitsPerEm: number): ClassSpacing {
  const base = spacing.classes[spec.charClass];
  const override = spacing.characters[spec.char];
  const ratio = unitsPerEm / REFERENCE_EM;
  return {
    leftBearing: Math.round((override?.leftBearing ?? base.leftBearing) * ratio),
    rightBearing: Math.round((override?.rightBearing ?? base.rightBearing) * ratio),
    minAdvance: Math.round((override?.minAdvance ?? base.minAdvance) * ratio),
  };
}

/**
 * Advance width and side bearings for one glyph. Blank glyphs keep at least the
 * class's minimum advance, with the extra space on the right.
 */
export function calculateMetrics(outline: GlyphOutline, spec: CharacterSpec, spacing: SpacingConfig, unitsPerEm: number): GlyphMetrics {
  const { leftBearing, rightBearing, minAdvance } = resolveSpacing(spec, spacing, unitsPerEm);
  const inkWidth = outlineWidth(outline.bounds);

  if (inkWidth === 0) {
    const advanceWidth = Math.max(leftBearing + rightBearing, minAdvance);
    return { advanceWidth, leftBearing, rightBearing: advanceWidth - leftBearing, inkWidth };
  }

  return { advanceWidth: leftBearing + inkWidth + rightBearing, leftBearing, rightBearing, inkWidth };
}

export function spaceAdvance(spacing: SpacingConfig, unitsPerEm: number): number {
  return Math.round((spacing.spaceWidth * unitsPerEm) / REFERENCE_EM);
}
