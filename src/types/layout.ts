export type CharacterClass = 'upper' | 'lower' | 'digit' | 'symbol';

export const CHARACTER_CLASSES: readonly CharacterClass[] = ['upper', 'lower', 'digit', 'symbol'];

export interface CharacterSpec {
  codepoint: number;
  char: string;
  label: string;
  charClass: CharacterClass;
  cellIndex: number;
}

export interface CharacterSelection {
  classes?: CharacterClass[];
  characters?: string;
}

export interface GridLayout {
  rows: number;
  columns: number;
  cellWidth: number;
  cellHeight: number;
  margin: number;
  borderThickness: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Single-channel luminance image, one byte per pixel, row-major.
 */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface CellImage {
  width: number;
  height: number;
  /** 1 for ink, 0 for background, row-major. */
  ink: Uint8Array;
  inkPixels: number;
  origin: { x: number; y: number };
}

export type CellExtraction = { kind: 'ink'; spec: CharacterSpec; cell: CellImage } | { kind: 'empty'; spec: CharacterSpec };
