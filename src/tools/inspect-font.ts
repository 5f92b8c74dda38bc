import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import fs from 'fs-extra';
import { inspectFont } from '../services/glyph-extractor';
import { codepointLabel } from '../utils/unicode-utils';

const inspectFontSchema = z.object({
  fontPath: z.string().describe('Font file to inspect'),
  limit: z.number().int().positive().optional().describe('Maximum glyphs to list (default: 20)'),
});

export function registerInspectFontTool(server: McpServer): void {
  server.tool('inspect-font', 'Show the metrics and glyphs of a generated font', inspectFontSchema.shape, async ({ fontPath, limit = 20 }) => {
    try {
      if (!(await fs.pathExists(fontPath))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Font ${fontPath} does not exist`,
            },
          ],
        };
      }

      const metadata = await inspectFont(fontPath);
      const blank = metadata.glyphs.filter((glyph) => glyph.contourCount === 0);

      const glyphLines = metadata.glyphs
        .slice(0, limit)
        .map((glyph) => `   • ${glyph.unicodeChar} ${codepointLabel(glyph.unicode)} ${glyph.name}: advance ${glyph.advanceWidth}, ${glyph.contourCount} contour(s)`)
        .join('\n');

      const report = `🔍 Font analysis:
- Family: ${metadata.fontFamily}
- Units per EM: ${metadata.unitsPerEm}
- Ascender: ${metadata.ascender}
- Descender: ${metadata.descender}
- Encoded glyphs: ${metadata.glyphs.length} (${blank.length} blank)

🔤 Glyphs:
${glyphLines}${metadata.glyphs.length > limit ? `\n   ... and ${metadata.glyphs.length - limit} more` : ''}`;

      return {
        content: [
          {
            type: 'text',
            text: report,
          },
        ],
      };
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: `❌ Error: ${error}`,
          },
        ],
      };
    }
  });
}
