import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import * as path from 'path';
import { loadConfig } from '../services/config-loader';
import { planTemplate } from '../services/font-pipeline';
import { templateSize } from '../services/layout-model';
import { writeTemplate } from '../services/template-renderer';
import { describeError } from '../utils/errors';

export const characterClassSchema = z.enum(['upper', 'lower', 'digit', 'symbol']);

const generateTemplateSchema = z.object({
  output: z.string().optional().describe('Output file path without extension (default: "./font_template")'),
  format: z.enum(['svg', 'png']).optional().describe('Template format (default: "png")'),
  scale: z.number().int().min(1).max(8).optional().describe('PNG pixels per template unit (default: 1)'),
  characters: z.string().optional().describe('Only include these characters'),
  classes: z.array(characterClassSchema).optional().describe('Only include these character classes'),
  configPath: z.string().optional().describe('JSON file overriding the default configuration'),
});

export function registerGenerateTemplateTool(server: McpServer): void {
  server.tool(
    'generate-template',
    'Generate a blank character template (boxes and labels) to draw a font into',
    generateTemplateSchema.shape,
    async ({ output = './font_template', format = 'png', scale = 1, characters, classes, configPath }) => {
      try {
        const config = await loadConfig({ configPath });
        const { specs, layout } = planTemplate(config, { characters, classes });
        const outputPath = `${output}.${format}`;

        await writeTemplate(specs, layout, outputPath, format, { scale });

        const size = templateSize(layout);
        const report = `✅ Template created: ${path.resolve(outputPath)}

📐 Layout:
• Characters: ${specs.length}
• Grid: ${layout.rows} rows x ${layout.columns} columns
• Cell: ${layout.cellWidth}x${layout.cellHeight}px, margin ${layout.margin}px, border ${layout.borderThickness}px
• Size: ${size.width * scale}x${size.height * scale}px${scale > 1 ? ` (scale ${scale})` : ''}

✏️ Draw each character inside its box in dark ink, keep the image size unchanged, then run generate-font-from-template.`;

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
