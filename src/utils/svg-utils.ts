import type { Contour, RawPath } from '../types/glyph';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2).replace(/\.?0+$/, '');
}

export function contoursToPathData(contours: Contour[]): string {
  return contours
    .map((contour) => {
      const commands = [`M${formatNumber(contour.start.x)} ${formatNumber(contour.start.y)}`];
      for (const segment of contour.segments) {
        switch (segment.type) {
          case 'line':
            commands.push(`L${formatNumber(segment.to.x)} ${formatNumber(segment.to.y)}`);
            break;
          case 'quad':
            commands.push(
              `Q${formatNumber(segment.control.x)} ${formatNumber(segment.control.y)} ${formatNumber(segment.to.x)} ${formatNumber(segment.to.y)}`
            );
            break;
          case 'cubic':
            commands.push(
              `C${formatNumber(segment.control1.x)} ${formatNumber(segment.control1.y)} ${formatNumber(segment.control2.x)} ${formatNumber(segment.control2.y)} ${formatNumber(segment.to.x)} ${formatNumber(segment.to.y)}`
            );
            break;
        }
      }
      commands.push('Z');
      return commands.join(' ');
    })
    .join(' ');
}

/**
 * Serializes a traced cell outline as a standalone SVG in the cell's pixel space.
 */
export function rawPathToSVG(rawPath: RawPath, width: number, height: number): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  <path d="${contoursToPathData(rawPath.contours)}" fill="#000000" fill-rule="nonzero"/>
</svg>`;
}
