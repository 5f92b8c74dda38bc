/**
 * PostScript glyph name for a codepoint: ASCII letters keep their
 * own name, everything else uses the `uniXXXX` form.
 */
export function glyphNameFor(codepoint: number): string {
  const char = String.fromCodePoint(codepoint);
  if (/^[A-Za-z]$/.test(char)) {
    return char;
  }
  const hex = codepoint.toString(16).toUpperCase();
  return codepoint > 0xffff ? `u${hex.padStart(5, '0')}` : `uni${hex.padStart(4, '0')}`;
}

export function codepointLabel(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}
