import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import fs from 'fs-extra';
import { loadConfig } from '../services/config-loader';
import { generateFontFromTemplate } from '../services/font-pipeline';
import { describeError } from '../utils/errors';
import { characterClassSchema } from './generate-template';

const generateFontSchema = z.object({
  imagePath: z.string().describe('Filled-in template image'),
  fontName: z.string().min(1).describe('Font family name'),
  outputDir: z.string().optional().describe('Output directory (default: "./fonts")'),
  characters: z.string().optional().describe('Characters the template was generated for'),
  classes: z.array(characterClassSchema).optional().describe('Character classes the template was generated for'),
  configPath: z.string().optional().describe('JSON file overriding the default configuration'),
  characterOverridesPath: z.string().optional().describe('JSON file with per-character scaleFactor / verticalOffset'),
  keepIntermediates: z.boolean().optional().describe('Keep per-cell bitmaps and outlines (default: false)'),
});

export function registerGenerateFontTool(server: McpServer): void {
  server.tool(
    'generate-font-from-template',
    'Generate an OpenType font from a filled-in character template image',
    generateFontSchema.shape,
    async ({ imagePath, fontName, outputDir = './fonts', characters, classes, configPath, characterOverridesPath, keepIntermediates = false }) => {
      try {
        if (!(await fs.pathExists(imagePath))) {
          return {
            content: [
              {
                type: 'text',
                text: `❌ Image ${imagePath} does not exist`,
              },
            ],
          };
        }

        const config = await loadConfig({ configPath, characterOverridesPath });
        const result = await generateFontFromTemplate({
          image: imagePath,
          fontName,
          outputDir,
          config,
          selection: { characters, classes },
          keepIntermediates,
        });

        const drawn = result.glyphs.length - result.emptyCharacters.length - result.tracingFailures.length;

        const report = `✅ Font generated successfully!

📊 Statistics:
• Characters: ${result.glyphs.length}
• Drawn glyphs: ${drawn}
• Blank cells: ${result.emptyCharacters.length}${result.emptyCharacters.length > 0 ? ` (${result.emptyCharacters.join(' ')})` : ''}
• Tracing failures: ${result.tracingFailures.length}${result.tracingFailures.length > 0 ? ` (${result.tracingFailures.map((failure) => failure.character).join(' ')})` : ''}
• Template resolution: ${result.pixelsPerUnit}x

📁 Generated files:
   • ${result.fontPath} (${result.byteLength} bytes)${result.workDir ? `\n   • ${result.workDir} (per-cell bitmaps and outlines)` : ''}`;

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
              text: `❌ Error: ${describeError(error)}`,
            },
          ],
        };
      }
    }
  );
}
