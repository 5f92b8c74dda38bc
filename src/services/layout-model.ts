import { CHARACTER_CLASSES, type CharacterClass, type CharacterSelection, type CharacterSpec, type GridLayout, type Rect } from '../types/layout';
import { LayoutError } from '../utils/errors';
import type { GridConfig } from './config-loader';

/**
 * Builds the ordered character set, one spec per character, in class order.
 */
export function buildCharacterSpecs(characterSets: Record<CharacterClass, string>): CharacterSpec[] {
  const specs: CharacterSpec[] = [];
  const seen = new Map<number, CharacterClass>();

  for (const charClass of CHARACTER_CLASSES) {
    for (const char of Array.from(characterSets[charClass])) {
      const codepoint = char.codePointAt(0);
      if (codepoint === undefined) continue;

      const previous = seen.get(codepoint);
      if (previous !== undefined) {
        throw new LayoutError(`Character is listed twice (${previous} and ${charClass})`, { character: char, codepoint });
      }
      seen.set(codepoint, charClass);

      specs.push({ codepoint, char, label: char, charClass, cellIndex: specs.length });
    }
  }

  return specs;
}

/**
 * Narrows the set to the selected classes and characters, keeping the set's
 * order and renumbering cells from 0 so the template stays dense.
 */
export function selectCharacters(specs: CharacterSpec[], selection?: CharacterSelection): CharacterSpec[] {
  if (!selection || (!selection.classes?.length && !selection.characters)) {
    return specs;
  }

  const wanted = selection.characters ? new Set(Array.from(selection.characters)) : undefined;
  if (wanted) {
    const known = new Set(specs.map((spec) => spec.char));
    const unknown = [...wanted].filter((char) => !known.has(char));
    if (unknown.length > 0) {
      throw new LayoutError(`Selection contains characters outside the character set: ${unknown.join(' ')}`);
    }
  }

  const classes = selection.classes?.length ? new Set(selection.classes) : undefined;

  return specs
    .filter((spec) => (!classes || classes.has(spec.charClass)) && (!wanted || wanted.has(spec.char)))
    .map((spec, index) => ({ ...spec, cellIndex: index }));
}

export function resolveLayout(grid: GridConfig, count: number): GridLayout {
  return {
    rows: grid.rows ?? Math.max(1, Math.ceil(count / grid.columns)),
    columns: grid.columns,
    cellWidth: grid.cellWidth,
    cellHeight: grid.cellHeight,
    margin: grid.margin,
    borderThickness: grid.borderThickness,
  };
}

export function cellFor(spec: CharacterSpec, layout: GridLayout): Rect {
  const capacity = layout.rows * layout.columns;
  if (!Number.isInteger(spec.cellIndex) || spec.cellIndex < 0 || spec.cellIndex >= capacity) {
    throw new LayoutError(`Cell index ${spec.cellIndex} is outside the ${layout.rows}x${layout.columns} grid`, {
      character: spec.char,
      cellIndex: spec.cellIndex,
    });
  }

  const row = Math.floor(spec.cellIndex / layout.columns);
  const col = spec.cellIndex % layout.columns;

  return {
    x: layout.margin + col * layout.cellWidth,
    y: layout.margin + row * layout.cellHeight,
    width: layout.cellWidth,
    height: layout.cellHeight,
  };
}

export function templateSize(layout: GridLayout): { width: number; height: number } {
  return {
    width: 2 * layout.margin + layout.columns * layout.cellWidth,
    height: 2 * layout.margin + layout.rows * layout.cellHeight,
  };
}

/**
 * Scales every length of the layout, for templates rasterized above 1:1.
 */
export function scaleLayout(layout: GridLayout, factor: number): GridLayout {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new LayoutError(`Layout scale must be a positive integer, got ${factor}`);
  }
  return {
    rows: layout.rows,
    columns: layout.columns,
    cellWidth: layout.cellWidth * factor,
    cellHeight: layout.cellHeight * factor,
    margin: layout.margin * factor,
    borderThickness: layout.borderThickness * factor,
  };
}

export function validateLayout(layout: GridLayout, specs: CharacterSpec[], safetyMargin = 0): void {
  const lengths: Array<[string, number, number]> = [
    ['rows', layout.rows, 1],
    ['columns', layout.columns, 1],
    ['cellWidth', layout.cellWidth, 1],
    ['cellHeight', layout.cellHeight, 1],
    ['margin', layout.margin, 0],
    ['borderThickness', layout.borderThickness, 0],
  ];
  for (const [name, value, min] of lengths) {
    if (!Number.isInteger(value) || value < min) {
      throw new LayoutError(`${name} must be an integer of at least ${min}, got ${value}`);
    }
  }

  const inset = layout.borderThickness + safetyMargin;
  if (2 * inset >= layout.cellWidth || 2 * inset >= layout.cellHeight) {
    throw new LayoutError(`Border and safety margin (${inset}px per side) leave no room inside ${layout.cellWidth}x${layout.cellHeight} cells`);
  }

  if (layout.rows * layout.columns < specs.length) {
    throw new LayoutError(`${layout.rows}x${layout.columns} grid cannot hold ${specs.length} characters`);
  }

  const codepoints = new Set<number>();
  const cells = new Set<number>();
  for (const spec of specs) {
    if (codepoints.has(spec.codepoint)) {
      throw new LayoutError('Duplicate codepoint in character set', { character: spec.char, codepoint: spec.codepoint });
    }
    if (cells.has(spec.cellIndex)) {
      throw new LayoutError('Two characters share a cell', { character: spec.char, cellIndex: spec.cellIndex });
    }
    codepoints.add(spec.codepoint);
    cells.add(spec.cellIndex);
    cellFor(spec, layout);
  }
}
